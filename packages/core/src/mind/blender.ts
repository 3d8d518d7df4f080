import { AGENT_ROLES, type AgentRole, type EmotionMeasurement, type TemperatureVector } from '../types.js';
import { clamp } from '../utils.js';
import { DEFAULT_EMOTION_TABLE, resolveEmotion, type EmotionTable } from './emotion-table.js';
import { BASELINE_TEMPERATURES, baselineTemperatures, mapVector } from './roles.js';

/**
 * How DayDream's temperature is derived.
 *
 * - `table`: the blended table value, like every other role.
 * - `associative`: starts at 0.8 and is nudged by creative or analytical
 *   labels, then clamped to [0.6, 1.0].
 */
export type DayDreamRule = 'table' | 'associative';

export interface BlendOptions {
  table?: EmotionTable;
  dayDreamRule?: DayDreamRule;
}

export type Blender = (measurements: readonly EmotionMeasurement[]) => TemperatureVector;

const ASSOCIATIVE_START = 0.8;
const ASSOCIATIVE_FLOOR = 0.6;
const ASSOCIATIVE_CEILING = 1.0;

const ASSOCIATIVE_NUDGES: ReadonlyArray<{ keywords: string[]; delta: number }> = [
  { keywords: ['curiosity', 'surprise'], delta: 0.05 },
  { keywords: ['creative', 'inspiration'], delta: 0.1 },
  { keywords: ['analytical', 'critical'], delta: -0.05 },
];

function weighted(measurements: readonly EmotionMeasurement[]): Array<{ label: string; weight: number }> | null {
  if (measurements.length === 0) return null;
  const total = measurements.reduce((sum, m) => sum + m.percentage, 0);
  if (total === 0 || !Number.isFinite(total)) return null;
  return measurements.map((m) => ({ label: m.label, weight: m.percentage / total }));
}

function associativeDayDream(weights: ReadonlyArray<{ label: string; weight: number }>): number {
  let value = ASSOCIATIVE_START;
  for (const { label, weight } of weights) {
    const lowered = label.toLowerCase();
    const nudge = ASSOCIATIVE_NUDGES.find((n) => n.keywords.some((k) => lowered.includes(k)));
    if (nudge) value += nudge.delta * weight;
  }
  return clamp(value, ASSOCIATIVE_FLOOR, ASSOCIATIVE_CEILING);
}

/**
 * Weighted average of the table rows matched by each measurement's label.
 *
 * Weights are `percentage / total`, so a self-analysis that adds up to 60
 * is scaled up, not rejected. Unmatched labels contribute the baseline.
 * Empty input or a zero total yields the baseline.
 */
export function createBlender(options: BlendOptions = {}): Blender {
  const table = options.table ?? DEFAULT_EMOTION_TABLE;
  const rule = options.dayDreamRule ?? 'table';

  return (measurements) => {
    const weights = weighted(measurements);
    if (!weights) return baselineTemperatures();

    const sums: Record<AgentRole, number> = mapVector(() => 0);
    for (const { label, weight } of weights) {
      const row = resolveEmotion(label, table)?.temperatures ?? BASELINE_TEMPERATURES;
      for (const role of AGENT_ROLES) {
        sums[role] += weight * row[role];
      }
    }

    if (rule === 'associative') {
      sums.DayDream = associativeDayDream(weights);
    }

    // Extreme weights can overflow to opposite infinities
    return mapVector((role) =>
      Number.isNaN(sums[role]) ? BASELINE_TEMPERATURES[role] : clamp(sums[role], 0, 1),
    );
  };
}

const defaultBlender = createBlender();

export function blend(measurements: readonly EmotionMeasurement[], options?: BlendOptions): TemperatureVector {
  return options ? createBlender(options)(measurements) : defaultBlender(measurements);
}
