import type { AgentRole, TemperatureVector } from '../types.js';

export interface RoleInfo {
  label: string;
  icon: string;
  /** What the role contributes to a turn. Rendered into its prompt. */
  description: string;
  /** What its temperature controls, shown next to the value. */
  focus: string;
  baseline: number;
  /** Temperature band the role performs best in. Presentation only. */
  optimal: { min: number; max: number };
}

export const ROLE_INFO: Record<AgentRole, RoleInfo> = {
  Cortex: {
    label: 'Cortex',
    icon: '🧠',
    description: 'Basic cognition and emotional processing of the immediate input',
    focus: 'Emotional Processing',
    baseline: 0.7,
    optimal: { min: 0.5, max: 0.7 },
  },
  Seer: {
    label: 'Seer',
    icon: '👁️',
    description: 'Pattern recognition and prediction of implications',
    focus: 'Pattern Recognition',
    baseline: 0.4,
    optimal: { min: 0.2, max: 0.4 },
  },
  Oracle: {
    label: 'Oracle',
    icon: '🔮',
    description: 'Strategic planning and probability analysis across possible futures',
    focus: 'Strategy Formation',
    baseline: 0.4,
    optimal: { min: 0.3, max: 0.5 },
  },
  House: {
    label: 'House',
    icon: '🏛️',
    description: 'Practical feasibility, resources and system boundaries',
    focus: 'Implementation',
    baseline: 0.4,
    optimal: { min: 0.3, max: 0.5 },
  },
  Prudence: {
    label: 'Prudence',
    icon: '⚖️',
    description: 'Risk assessment and constraint management',
    focus: 'Risk Assessment',
    baseline: 0.3,
    optimal: { min: 0.2, max: 0.4 },
  },
  DayDream: {
    label: 'Day-Dream',
    icon: '💭',
    description: 'Creative associations between the current input and earlier exchanges',
    focus: 'Creative Association',
    baseline: 0.8,
    optimal: { min: 0.7, max: 0.9 },
  },
  Conscience: {
    label: 'Conscience',
    icon: '🤔',
    description: 'Ethical oversight and moral judgment',
    focus: 'Moral Judgment',
    baseline: 0.5,
    optimal: { min: 0.4, max: 0.6 },
  },
};

function vectorFrom(pick: (role: AgentRole) => number): TemperatureVector {
  return {
    Cortex: pick('Cortex'),
    Seer: pick('Seer'),
    Oracle: pick('Oracle'),
    House: pick('House'),
    Prudence: pick('Prudence'),
    DayDream: pick('DayDream'),
    Conscience: pick('Conscience'),
  };
}

export const BASELINE_TEMPERATURES: Readonly<TemperatureVector> = Object.freeze(
  vectorFrom((role) => ROLE_INFO[role].baseline),
);

export function baselineTemperatures(): TemperatureVector {
  return { ...BASELINE_TEMPERATURES };
}

export function mapVector(fn: (role: AgentRole) => number): TemperatureVector {
  return vectorFrom(fn);
}

// ── Effectiveness ───────────────────────────────────────────────

export type EffectivenessRating = 'Optimal' | 'Near-Optimal' | 'Less-Optimal' | 'Sub-Optimal';

/**
 * 100% inside the role's optimal band, minus 20 points per 0.1 outside it.
 */
export function temperatureEffectiveness(
  role: AgentRole,
  temperature: number,
): { percentage: number; rating: EffectivenessRating } {
  const { min, max } = ROLE_INFO[role].optimal;
  if (temperature >= min && temperature <= max) {
    return { percentage: 100, rating: 'Optimal' };
  }

  const distance = temperature < min ? min - temperature : temperature - max;
  // Rounded so 0.8 against a 0.7 ceiling rates as 80, not 79.99...
  const percentage = Math.max(0, Math.round((100 - distance * 200) * 10) / 10);
  const rating: EffectivenessRating =
    percentage >= 80 ? 'Near-Optimal' : percentage >= 60 ? 'Less-Optimal' : 'Sub-Optimal';
  return { percentage, rating };
}

export type TemperatureBand = 'Very Low' | 'Low' | 'Moderate' | 'High' | 'Very High';

export function temperatureBand(temperature: number): TemperatureBand {
  if (temperature <= 0.3) return 'Very Low';
  if (temperature <= 0.5) return 'Low';
  if (temperature <= 0.7) return 'Moderate';
  if (temperature <= 0.8) return 'High';
  return 'Very High';
}
