export { MindOrchestrator, INTEGRATION_TEMPERATURE, SELF_ANALYSIS_TEMPERATURE } from './orchestrator.js';
export type { OrchestratorConfig, TurnOptions, TurnResult } from './orchestrator.js';
export { blend, createBlender } from './blender.js';
export type { Blender, BlendOptions, DayDreamRule } from './blender.js';
export { parseEmotionalState } from './parser.js';
export {
  DEFAULT_EMOTION_TABLE,
  EMOTION_CATALOGUE,
  loadEmotionTable,
  loadEmotionCatalogue,
  loadTemperaturePresets,
  TEMPERATURE_PRESETS,
  findPreset,
  resolveEmotion,
} from './emotion-table.js';
export type { EmotionTable } from './emotion-table.js';
export {
  ROLE_INFO,
  BASELINE_TEMPERATURES,
  baselineTemperatures,
  temperatureEffectiveness,
  temperatureBand,
} from './roles.js';
export type { RoleInfo, EffectivenessRating, TemperatureBand } from './roles.js';
export { buildHistoryContext, stripAnnotation, STATE_ANNOTATION_MARKER, HISTORY_WINDOW } from './history.js';
export { DEFAULT_PROMPTS, renderCatalogue } from './prompts.js';
export type { PromptTemplates, StageName } from './prompts.js';
export { STAGES, activeStages } from './stages.js';
export type { StageDefinition } from './stages.js';
export { formatTurnSummary, formatTemperatureLine } from './summary.js';
