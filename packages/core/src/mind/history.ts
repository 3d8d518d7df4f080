import type { ChatMessage } from '../types.js';

/** Everything from this marker on is presentation appended to a reply. */
export const STATE_ANNOTATION_MARKER = '\n\nEmotional State';

export const HISTORY_WINDOW = 6; // 3 exchanges

export const NO_HISTORY = 'No prior conversation.';

export function stripAnnotation(content: string): string {
  const idx = content.indexOf(STATE_ANNOTATION_MARKER);
  return idx === -1 ? content : content.slice(0, idx);
}

/**
 * Render the last few messages as prompt context, oldest first.
 */
export function buildHistoryContext(
  messages: readonly ChatMessage[],
  window = HISTORY_WINDOW,
): string {
  const sorted = [...messages].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  const recent = window > 0 ? sorted.slice(-window) : [];

  if (recent.length === 0) return NO_HISTORY;

  const body = recent
    .map((m) => {
      const who = m.role === 'user' ? 'User' : m.role === 'assistant' ? 'Assistant' : 'System';
      return `[${who} at ${m.timestamp}]:\n${stripAnnotation(m.content)}`;
    })
    .join('\n\n---\n\n');

  return `=== Recent Conversation ===
${body}
=== End of History ===`;
}
