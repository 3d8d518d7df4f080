import { z } from 'zod';

// ── Constants ───────────────────────────────────────────────────

export const MIND_DIR = '.mindloop';

// ── Agent Roles ─────────────────────────────────────────────────

/** Canonical order: pipeline execution order and display order. */
export const AGENT_ROLES = [
  'Cortex',
  'Seer',
  'Oracle',
  'House',
  'Prudence',
  'DayDream',
  'Conscience',
] as const;

export const AgentRole = z.enum(AGENT_ROLES);
export type AgentRole = z.infer<typeof AgentRole>;

// ── Temperatures ────────────────────────────────────────────────

export const Temperature = z.number().min(0).max(1);

export const TemperatureVectorSchema = z.object({
  Cortex: Temperature,
  Seer: Temperature,
  Oracle: Temperature,
  House: Temperature,
  Prudence: Temperature,
  DayDream: Temperature,
  Conscience: Temperature,
});

export type TemperatureVector = z.infer<typeof TemperatureVectorSchema>;

// ── Emotions ────────────────────────────────────────────────────

export const EmotionMeasurementSchema = z.object({
  label: z.string().min(1),
  percentage: z.number(),
});

export type EmotionMeasurement = z.infer<typeof EmotionMeasurementSchema>;

export const EmotionTemperatureEntrySchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  temperatures: TemperatureVectorSchema,
});

export type EmotionTemperatureEntry = z.infer<typeof EmotionTemperatureEntrySchema>;

export const EmotionTableSchema = z.array(EmotionTemperatureEntrySchema).min(1);

export const TemperaturePresetSchema = z.object({
  name: z.string().min(1),
  emotions: z.array(EmotionMeasurementSchema).min(1),
});

export type TemperaturePreset = z.infer<typeof TemperaturePresetSchema>;

export const TemperaturePresetListSchema = z.array(TemperaturePresetSchema).min(1);

export const EmotionCategorySchema = z.object({
  name: z.string(),
  hint: z.string(),
  states: z.array(z.object({
    name: z.string(),
    gloss: z.string(),
  })).min(1),
});

export type EmotionCategory = z.infer<typeof EmotionCategorySchema>;

export const EmotionCatalogueSchema = z.array(EmotionCategorySchema).min(1);

// ── Processing state (progress signal) ──────────────────────────

export const ProcessingState = z.enum([
  'idle',
  'analyzing',
  'scanning',
  'evaluating',
  'considering',
  'assessing',
  'exploring',
  'weighing',
  'integrating',
]);
export type ProcessingState = z.infer<typeof ProcessingState>;

// ── Chat ────────────────────────────────────────────────────────

export const MessageRole = z.enum(['user', 'assistant', 'system']);
export type MessageRole = z.infer<typeof MessageRole>;

export const ChatMessageSchema = z.object({
  id: z.string(),
  role: MessageRole,
  content: z.string(),
  timestamp: z.string().datetime(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

// ── Analysis records ────────────────────────────────────────────

export const AgentOutputSchema = z.object({
  role: AgentRole,
  text: z.string(),
  temperature: Temperature,
  model: z.string(),
  completedAt: z.string().datetime(),
});

export type AgentOutput = z.infer<typeof AgentOutputSchema>;

export const AnalysisRecordSchema = z.object({
  id: z.string(),
  conversationId: z.string(),
  createdAt: z.string().datetime(),
  userInput: z.string(),
  agentOutputs: z.array(AgentOutputSchema),
  integratedReply: z.string(),
  selfAnalysis: z.string(),
  emotionalState: z.array(EmotionMeasurementSchema),
  nextTemperatures: TemperatureVectorSchema,
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

export const ConversationSchema = z.object({
  id: z.string(),
  title: z.string().default('New Chat'),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  messages: z.array(ChatMessageSchema).default([]),
  analyses: z.array(AnalysisRecordSchema).default([]),
});

export type Conversation = z.infer<typeof ConversationSchema>;

// ── Settings ────────────────────────────────────────────────────

export const MindSettingsSchema = z.object({
  model: z.string().optional(),
  temperatures: TemperatureVectorSchema,
  dayDreamEnabled: z.boolean().default(true),
  agentModels: z.record(AgentRole, z.string()).default({}),
  updatedAt: z.string().datetime(),
});

export type MindSettings = z.infer<typeof MindSettingsSchema>;

export const SettingsFileSchema = z.object({
  conversations: z.record(z.string(), MindSettingsSchema).default({}),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;
