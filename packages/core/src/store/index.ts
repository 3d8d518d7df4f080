export { SettingsStore } from './settings.js';
export type { TemperatureStore, SettingsPatch } from './settings.js';
export { ConversationStore } from './conversations.js';
export type { HistoryStore } from './conversations.js';
