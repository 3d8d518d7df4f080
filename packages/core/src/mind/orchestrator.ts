/**
 * Mind pipeline
 *
 * One turn:
 * 1. Render recent history
 * 2. Run each agent stage in order, feeding declared upstream outputs forward
 * 3. Integrate all outputs into a reply (T = 0.4)
 * 4. Ask for a self-analysis of the emotional state (T = 0.7)
 * 5. Parse + blend it into the temperatures for the next turn
 *
 * Nothing is persisted here. The caller gets the record and the new vector
 * and decides what to store.
 */

import type { ActivitySink } from '../activity.js';
import type { CompletionClient } from '../agent/client.js';
import { StageError, TurnAbortedError, isCompletionError } from '../errors.js';
import type {
  AgentOutput,
  AgentRole,
  AnalysisRecord,
  ChatMessage,
  EmotionCategory,
  ProcessingState,
  TemperatureVector,
} from '../types.js';
import { generateId, fillTemplate, now } from '../utils.js';
import { createBlender, type Blender } from './blender.js';
import { EMOTION_CATALOGUE } from './emotion-table.js';
import { buildHistoryContext } from './history.js';
import { parseEmotionalState } from './parser.js';
import { DEFAULT_PROMPTS, renderCatalogue, type PromptTemplates, type StageName } from './prompts.js';
import { activeStages, buildStagePrompt, renderAgentOutputs } from './stages.js';
import { formatTurnSummary } from './summary.js';

export const INTEGRATION_TEMPERATURE = 0.4;
export const SELF_ANALYSIS_TEMPERATURE = 0.7;

export interface OrchestratorConfig {
  client: CompletionClient;
  /** Model for every call unless overridden per role. */
  model?: string;
  agentModels?: Partial<Record<AgentRole, string>>;
  blender?: Blender;
  prompts?: Partial<PromptTemplates>;
  catalogue?: readonly EmotionCategory[];
}

export interface TurnOptions {
  conversationId?: string;
  /** Run the DayDream stage. Default true. */
  dayDream?: boolean;
  signal?: AbortSignal;
  onProgress?: (state: ProcessingState) => void;
  onActivity?: ActivitySink;
}

export interface TurnResult {
  /** Integrated reply. */
  reply: string;
  /** Reply with the emotional state and next temperatures appended. */
  displayText: string;
  analysis: AnalysisRecord;
  nextTemperatures: TemperatureVector;
}

export class MindOrchestrator {
  private readonly client: CompletionClient;
  private readonly model?: string;
  private readonly agentModels: Partial<Record<AgentRole, string>>;
  private readonly blender: Blender;
  private readonly prompts: PromptTemplates;
  private readonly catalogueText: string;

  constructor(config: OrchestratorConfig) {
    this.client = config.client;
    this.model = config.model;
    this.agentModels = config.agentModels ?? {};
    this.blender = config.blender ?? createBlender();
    this.prompts = { ...DEFAULT_PROMPTS, ...config.prompts };
    this.catalogueText = renderCatalogue(config.catalogue ?? EMOTION_CATALOGUE);
  }

  async processTurn(
    userInput: string,
    history: readonly ChatMessage[],
    currentTemps: TemperatureVector,
    options: TurnOptions = {},
  ): Promise<TurnResult> {
    const { signal, onActivity } = options;
    const progress = (state: ProcessingState) => notify(options.onProgress, state);
    const conversationId = options.conversationId ?? '';
    const stages = activeStages(options.dayDream ?? true);

    onActivity?.('turn_started', `Turn started (${stages.length} stages)`, userInput.slice(0, 200));
    progress('idle');

    let current: StageName = stages[0].role;
    try {
      const historyText = buildHistoryContext(history);
      const outputs = new Map<AgentRole, string>();
      const agentOutputs: AgentOutput[] = [];

      for (const stage of stages) {
        current = stage.role;
        progress(stage.state);

        const temperature = currentTemps[stage.role];
        const model = this.client.resolveModel(this.agentModels[stage.role] ?? this.model);
        const prompt = buildStagePrompt(stage, { userInput, history: historyText, outputs }, this.prompts);
        const text = await this.call(prompt, temperature, model, signal);

        outputs.set(stage.role, text);
        agentOutputs.push({ role: stage.role, text, temperature, model, completedAt: now() });
        onActivity?.('stage_completed', `${stage.role} responded`, `${text.length} chars at T=${temperature.toFixed(2)}`);
      }

      progress('integrating');
      const allOutputs = renderAgentOutputs(outputs);
      const model = this.client.resolveModel(this.model);

      current = 'Integration';
      const reply = await this.call(
        fillTemplate(this.prompts.Integration, { userInput, agentOutputs: allOutputs }),
        INTEGRATION_TEMPERATURE,
        model,
        signal,
      );

      current = 'SelfAnalysis';
      const selfAnalysis = await this.call(
        fillTemplate(this.prompts.SelfAnalysis, { agentOutputs: allOutputs, catalogue: this.catalogueText }),
        SELF_ANALYSIS_TEMPERATURE,
        model,
        signal,
      );

      const emotionalState = parseEmotionalState(selfAnalysis);
      const nextTemperatures = this.blender(emotionalState);

      const analysis: AnalysisRecord = {
        id: generateId('an'),
        conversationId,
        createdAt: now(),
        userInput,
        agentOutputs,
        integratedReply: reply,
        selfAnalysis,
        emotionalState,
        nextTemperatures,
      };

      onActivity?.(
        'turn_completed',
        `Turn completed with ${emotionalState.length} emotional measurements`,
        emotionalState.map((m) => `${m.percentage}% ${m.label}`).join(', '),
      );

      return {
        reply,
        displayText: formatTurnSummary(reply, selfAnalysis, nextTemperatures),
        analysis,
        nextTemperatures,
      };
    } catch (err) {
      const failure = this.classify(err, current, signal);
      onActivity?.('turn_failed', `Turn failed at ${current}`, failure.message);
      throw failure;
    } finally {
      progress('idle');
    }
  }

  private async call(prompt: string, temperature: number, model: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new TurnAbortedError();
    return this.client.complete({ prompt, temperature, model, signal });
  }

  private classify(err: unknown, stage: StageName, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return err instanceof TurnAbortedError && err.stage ? err : new TurnAbortedError(stage);
    }
    if (isCompletionError(err)) {
      err.stage = stage;
      return err;
    }
    return new StageError(stage, err);
  }
}

function notify(onProgress: ((state: ProcessingState) => void) | undefined, state: ProcessingState): void {
  if (!onProgress) return;
  try {
    onProgress(state);
  } catch (err) {
    console.error('[progress]', err instanceof Error ? err.message : err);
  }
}
