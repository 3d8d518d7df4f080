import type { AgentRole, ProcessingState } from '../types.js';
import { fillTemplate } from '../utils.js';
import type { PromptTemplates } from './prompts.js';
import { ROLE_INFO } from './roles.js';

export interface StageDefinition {
  role: AgentRole;
  /** Progress value reported when the stage starts. */
  state: ProcessingState;
  /** Upstream roles whose output is visible to this stage. */
  dependsOn: readonly AgentRole[];
  usesHistory: boolean;
  usesInput: boolean;
  optional: boolean;
}

/**
 * The pipeline, in execution order. Each stage only sees the outputs it
 * declares, so the chain is linear even though a stage may read more than
 * its immediate predecessor.
 */
export const STAGES: readonly StageDefinition[] = [
  { role: 'Cortex', state: 'analyzing', dependsOn: [], usesHistory: true, usesInput: true, optional: false },
  { role: 'Seer', state: 'scanning', dependsOn: ['Cortex'], usesHistory: true, usesInput: true, optional: false },
  { role: 'Oracle', state: 'evaluating', dependsOn: ['Seer'], usesHistory: true, usesInput: true, optional: false },
  { role: 'House', state: 'considering', dependsOn: ['Oracle'], usesHistory: true, usesInput: true, optional: false },
  { role: 'Prudence', state: 'assessing', dependsOn: ['Oracle', 'House'], usesHistory: false, usesInput: false, optional: false },
  { role: 'DayDream', state: 'exploring', dependsOn: ['Cortex'], usesHistory: true, usesInput: true, optional: true },
  { role: 'Conscience', state: 'weighing', dependsOn: ['Prudence'], usesHistory: true, usesInput: true, optional: false },
];

export function activeStages(includeOptional: boolean): StageDefinition[] {
  return STAGES.filter((s) => includeOptional || !s.optional);
}

export interface StageContext {
  userInput: string;
  history: string;
  outputs: ReadonlyMap<AgentRole, string>;
}

export function buildStagePrompt(
  stage: StageDefinition,
  ctx: StageContext,
  templates: PromptTemplates,
): string {
  const vars: Record<string, string> = {
    description: ROLE_INFO[stage.role].description,
  };
  if (stage.usesInput) vars['userInput'] = ctx.userInput;
  if (stage.usesHistory) vars['history'] = ctx.history;

  for (const dep of stage.dependsOn) {
    const output = ctx.outputs.get(dep);
    if (output === undefined) {
      throw new Error(`${stage.role} needs ${dep} output, which has not been produced`);
    }
    vars[`${dep}Output`] = output;
  }

  return fillTemplate(templates[stage.role], vars);
}

/** `LABEL (focus): text` blocks for every output produced so far, in pipeline order. */
export function renderAgentOutputs(outputs: ReadonlyMap<AgentRole, string>): string {
  return STAGES.filter((s) => outputs.has(s.role))
    .map((s) => {
      const info = ROLE_INFO[s.role];
      return `${info.label.toUpperCase()} (${info.focus}): ${outputs.get(s.role) ?? ''}`;
    })
    .join('\n\n');
}
