import { blend, type Blender } from '../mind/blender.js';
import { baselineTemperatures } from '../mind/roles.js';
import { JsonStore } from '../storage.js';
import {
  SettingsFileSchema,
  Temperature,
  TemperatureVectorSchema,
  type AgentRole,
  type EmotionMeasurement,
  type MindSettings,
  type SettingsFile,
  type TemperatureVector,
} from '../types.js';
import { now } from '../utils.js';

type MaybePromise<T> = T | Promise<T>;

/** Where the current temperature vector of a conversation lives. */
export interface TemperatureStore {
  /** Baseline when nothing has been saved yet. */
  loadCurrentTemperatures(conversationId: string): MaybePromise<TemperatureVector>;
  saveTemperatures(conversationId: string, temperatures: TemperatureVector): MaybePromise<void>;
}

export type SettingsPatch = Partial<Pick<MindSettings, 'model' | 'dayDreamEnabled' | 'agentModels'>>;

function defaultSettings(): MindSettings {
  return {
    temperatures: baselineTemperatures(),
    dayDreamEnabled: true,
    agentModels: {},
    updatedAt: now(),
  };
}

/**
 * Per-conversation model and temperature settings in `.mindloop/settings.json`.
 * Every call re-reads the file, so writes from another process (the CLI
 * next to a running MCP server) are never masked by a stale cache.
 */
export class SettingsStore implements TemperatureStore {
  private store: JsonStore<SettingsFile>;

  constructor(dataRoot: string) {
    this.store = new JsonStore<SettingsFile>(dataRoot, 'settings.json', SettingsFileSchema, { conversations: {} });
  }

  get(conversationId: string): MindSettings {
    this.store.invalidate();
    return this.store.read().conversations[conversationId] ?? defaultSettings();
  }

  loadCurrentTemperatures(conversationId: string): TemperatureVector {
    return { ...this.get(conversationId).temperatures };
  }

  saveTemperatures(conversationId: string, temperatures: TemperatureVector): void {
    const validated = TemperatureVectorSchema.parse(temperatures);
    this.put(conversationId, { temperatures: validated });
  }

  resetTemperatures(conversationId: string): TemperatureVector {
    const baseline = baselineTemperatures();
    this.put(conversationId, { temperatures: baseline });
    return baseline;
  }

  /** Switch a conversation to the blend of a hand-picked emotional state. */
  applyBlend(
    conversationId: string,
    measurements: readonly EmotionMeasurement[],
    blender: Blender = blend,
  ): TemperatureVector {
    const temperatures = TemperatureVectorSchema.parse(blender(measurements));
    this.put(conversationId, { temperatures });
    return temperatures;
  }

  /** Override one agent's temperature, keeping the rest of the vector. */
  setTemperature(conversationId: string, role: AgentRole, value: number): TemperatureVector {
    const temperatures = { ...this.get(conversationId).temperatures, [role]: Temperature.parse(value) };
    this.put(conversationId, { temperatures });
    return temperatures;
  }

  update(conversationId: string, patch: SettingsPatch): MindSettings {
    return this.put(conversationId, patch);
  }

  remove(conversationId: string): void {
    this.store.invalidate();
    this.store.update((data) => {
      const { [conversationId]: _removed, ...rest } = data.conversations;
      return { conversations: rest };
    });
  }

  private put(conversationId: string, patch: Partial<MindSettings>): MindSettings {
    let saved = defaultSettings();
    this.store.invalidate();
    this.store.update((data) => {
      saved = { ...(data.conversations[conversationId] ?? defaultSettings()), ...patch, updatedAt: now() };
      return { conversations: { ...data.conversations, [conversationId]: saved } };
    });
    return saved;
  }
}
