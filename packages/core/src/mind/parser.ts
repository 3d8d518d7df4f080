import type { EmotionMeasurement } from '../types.js';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a self-analysis block into measurements.
 *
 * Accepts only lines of the form `<number>% <label>`: exactly one `%`, a
 * decimal before it, a non-empty label after it. Headers, notes and blank
 * lines are dropped. Percentages are returned as written; they are not
 * expected to total 100.
 */
export function parseEmotionalState(text: string): EmotionMeasurement[] {
  const measurements: EmotionMeasurement[] = [];

  for (const line of text.split(/\r?\n/)) {
    const parts = line.split('%');
    if (parts.length !== 2) continue;

    const amount = parts[0].trim();
    const label = parts[1].trim();
    if (!label || !DECIMAL.test(amount)) continue;

    const percentage = Number(amount);
    if (!Number.isFinite(percentage)) continue;

    measurements.push({ label, percentage });
  }

  return measurements;
}
