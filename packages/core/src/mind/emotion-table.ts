import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  EmotionCatalogueSchema,
  EmotionTableSchema,
  TemperaturePresetListSchema,
  type EmotionCategory,
  type EmotionTemperatureEntry,
  type TemperaturePreset,
} from '../types.js';

const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

/**
 * Ordered emotion → temperature table. Lookup is first-match-wins, so
 * row order is part of the mapping.
 */
export type EmotionTable = readonly EmotionTemperatureEntry[];

export function loadEmotionTable(path: string): EmotionTable {
  return EmotionTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export function loadEmotionCatalogue(path: string): EmotionCategory[] {
  return EmotionCatalogueSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export function loadTemperaturePresets(path: string): TemperaturePreset[] {
  return TemperaturePresetListSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

export const DEFAULT_EMOTION_TABLE: EmotionTable = loadEmotionTable(DATA_DIR + 'emotion-temperatures.json');

export const EMOTION_CATALOGUE: EmotionCategory[] = loadEmotionCatalogue(DATA_DIR + 'emotion-catalogue.json');

/** Named emotional states a conversation can be switched to by hand. */
export const TEMPERATURE_PRESETS: TemperaturePreset[] = loadTemperaturePresets(DATA_DIR + 'temperature-presets.json');

export function findPreset(
  name: string,
  presets: readonly TemperaturePreset[] = TEMPERATURE_PRESETS,
): TemperaturePreset | undefined {
  const wanted = name.trim().toLowerCase();
  return presets.find((p) => p.name.toLowerCase() === wanted);
}

/** Case-insensitive substring match of any row keyword against the label. */
export function resolveEmotion(
  label: string,
  table: EmotionTable = DEFAULT_EMOTION_TABLE,
): EmotionTemperatureEntry | undefined {
  const lowered = label.toLowerCase();
  return table.find((entry) => entry.keywords.some((k) => lowered.includes(k.toLowerCase())));
}
