export * from './types.js';
export * from './errors.js';
export { JsonStore } from './storage.js';
export { generateId, now, clamp, fillTemplate } from './utils.js';
export { ActivityStore, ActivityType, ActivityEventSchema } from './activity.js';
export type { ActivityEvent, ActivitySink } from './activity.js';
export { loadConfig, createCompletionClient } from './config.js';
export type { MindConfig } from './config.js';
export * from './agent/index.js';
export * from './mind/index.js';
export * from './store/index.js';
export * from './orchestration/index.js';
export { registerMindTools } from './mcp/tools.js';
export type { MindToolContext } from './mcp/tools.js';
