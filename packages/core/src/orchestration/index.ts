export { KeyedLock } from './turn-lock.js';
export { TurnRunner } from './turn-runner.js';
export type { TurnRunnerConfig, TurnSettings, TurnSettingsSource, RunTurnOptions } from './turn-runner.js';
