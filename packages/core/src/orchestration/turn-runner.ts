import type { ActivitySink } from '../activity.js';
import type { CompletionClient } from '../agent/client.js';
import { ConversationNotFoundError } from '../errors.js';
import { createBlender, type Blender } from '../mind/blender.js';
import { HISTORY_WINDOW } from '../mind/history.js';
import { MindOrchestrator, type TurnResult } from '../mind/orchestrator.js';
import type { PromptTemplates } from '../mind/prompts.js';
import { AGENT_ROLES, type ChatMessage, type MindSettings, type ProcessingState } from '../types.js';
import type { HistoryStore } from '../store/conversations.js';
import type { TemperatureStore } from '../store/settings.js';
import { generateId, now } from '../utils.js';
import { KeyedLock } from './turn-lock.js';

export type TurnSettings = Pick<MindSettings, 'model' | 'dayDreamEnabled' | 'agentModels'>;

export interface TurnSettingsSource {
  get(conversationId: string): TurnSettings;
}

export interface TurnRunnerConfig {
  client: CompletionClient;
  temperatures: TemperatureStore;
  history: HistoryStore;
  /** Per-conversation model choice and DayDream toggle. */
  settings?: TurnSettingsSource;
  /** Global DayDream switch. Off wins over a conversation's setting. */
  dayDream?: boolean;
  blender?: Blender;
  prompts?: Partial<PromptTemplates>;
  onActivity?: ActivitySink;
}

export interface RunTurnOptions {
  signal?: AbortSignal;
  onProgress?: (state: ProcessingState) => void;
}

/**
 * Runs one turn end to end: load state, process, then persist the analysis
 * record, both chat messages and finally the next temperatures. Turns on the
 * same conversation run one at a time. A failed turn writes nothing, and an
 * unknown conversation fails before any completion call.
 */
export class TurnRunner {
  private readonly lock = new KeyedLock();
  private readonly blender: Blender;

  constructor(private readonly config: TurnRunnerConfig) {
    this.blender = config.blender ?? createBlender();
  }

  run(conversationId: string, userInput: string, options: RunTurnOptions = {}): Promise<TurnResult> {
    return this.lock.run(conversationId, () => this.execute(conversationId, userInput, options));
  }

  private async execute(conversationId: string, userInput: string, options: RunTurnOptions): Promise<TurnResult> {
    const { temperatures, history, onActivity } = this.config;
    if (!(await history.hasConversation(conversationId))) {
      throw new ConversationNotFoundError(conversationId);
    }
    const settings = this.config.settings?.get(conversationId);

    const currentTemps = await temperatures.loadCurrentTemperatures(conversationId);
    const recent = await history.loadRecentMessages(conversationId, HISTORY_WINDOW);
    const startedAt = now();

    const orchestrator = new MindOrchestrator({
      client: this.config.client,
      model: settings?.model,
      agentModels: settings?.agentModels,
      blender: this.blender,
      prompts: this.config.prompts,
    });

    const result = await orchestrator.processTurn(userInput, recent, currentTemps, {
      conversationId,
      dayDream: (this.config.dayDream ?? true) && (settings?.dayDreamEnabled ?? true),
      signal: options.signal,
      onProgress: options.onProgress,
      onActivity,
    });

    const messages: ChatMessage[] = [
      { id: generateId('msg'), role: 'user', content: userInput, timestamp: startedAt },
      { id: generateId('msg'), role: 'assistant', content: result.displayText, timestamp: now() },
    ];
    await history.appendAnalysisRecord(conversationId, result.analysis);
    await history.appendMessages(conversationId, messages);
    // Last, so a failed append leaves the conversation on its old vector.
    await temperatures.saveTemperatures(conversationId, result.nextTemperatures);

    onActivity?.(
      'temperatures_updated',
      `Temperatures updated for ${conversationId}`,
      AGENT_ROLES.map((role) => `${role}=${result.nextTemperatures[role].toFixed(2)}`).join(' '),
    );

    return result;
  }
}
