import { AGENT_ROLES, type TemperatureVector } from '../types.js';
import { ROLE_INFO, temperatureEffectiveness } from './roles.js';
import { STATE_ANNOTATION_MARKER } from './history.js';

export function formatTemperatureLine(role: keyof TemperatureVector, temperature: number): string {
  const info = ROLE_INFO[role];
  const { percentage, rating } = temperatureEffectiveness(role, temperature);
  return `${info.label}: ${temperature.toFixed(2)} (${info.focus})\nEffectiveness: ${percentage.toFixed(1)}% - ${rating}`;
}

/**
 * Reply followed by the self-analysis and the temperatures chosen for the
 * next turn. The annotation starts with STATE_ANNOTATION_MARKER so history
 * rendering can cut it off again.
 */
export function formatTurnSummary(reply: string, selfAnalysis: string, next: TemperatureVector): string {
  const temps = AGENT_ROLES.map((role) => formatTemperatureLine(role, next[role])).join('\n\n');
  return `${reply}${STATE_ANNOTATION_MARKER} While Processing:
${selfAnalysis.trim()}

Updated Temperature Settings for Next Interaction:
${temps}`;
}
