import { resolve } from 'node:path';
import {
  ActivityStore,
  ConversationStore,
  SettingsStore,
  type Conversation,
} from '@mindloop/core';

export interface RootOptions {
  root?: string;
}

export interface Workspace {
  root: string;
  settings: SettingsStore;
  conversations: ConversationStore;
  activity: ActivityStore;
}

/** Stores for commands that never call a model and so need no API key. */
export function openWorkspace(opts: RootOptions): Workspace {
  const root = resolve(opts.root ?? process.env.MINDLOOP_ROOT ?? '.');
  return {
    root,
    settings: new SettingsStore(root),
    conversations: new ConversationStore(root),
    activity: new ActivityStore(root),
  };
}

/** The named conversation, or the most recently active one. */
export function pickConversation(ws: Workspace, id?: string): Conversation {
  if (id) {
    const found = ws.conversations.get(id);
    if (!found) throw new Error(`Conversation ${id} not found`);
    return found;
  }
  const latest = ws.conversations.list()[0];
  if (!latest) throw new Error('No conversations yet. Run `mindloop chat` first.');
  return latest;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
