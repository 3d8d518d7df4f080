import type { AgentRole, EmotionCategory } from '../types.js';

export type StageName = AgentRole | 'Integration' | 'SelfAnalysis';

/**
 * Prompt bodies keyed by stage. `{placeholders}` are filled by the stage
 * executor: `{history}`, `{userInput}`, `{description}`, one
 * `{<role>Output}` per upstream role, `{agentOutputs}` and `{catalogue}`.
 */
export type PromptTemplates = Record<StageName, string>;

export const DEFAULT_PROMPTS: PromptTemplates = {
  Cortex: `You are the Cortex agent. Role: {description}.
You are reading the latest message of an ongoing conversation.

Previous conversation:
{history}

Give your first cognitive and emotional reading of this message: what it means,
what it feels like to the person writing it, and what a caring reply must not miss.
Be clear and direct.

USER INPUT: {userInput}`,

  Seer: `You are the Seer agent. Role: {description}.

Previous conversation:
{history}

Use the history only as background. Look for patterns in the CURRENT message and
do not claim the user is repeating themselves unless the current message shows it.
Connect elements that look unrelated and say where they are likely to lead.

CURRENT USER INPUT: {userInput}
CORTEX READING: {CortexOutput}`,

  Oracle: `You are the Oracle agent. Role: {description}.

Previous conversation:
{history}

USER QUERY: {userInput}
PATTERNS FROM SEER: {SeerOutput}

Lay out:
1. The two or three most likely outcomes
2. The decision points that separate them
3. The path you recommend
4. How Seer's patterns change the picture`,

  House: `You are the House agent. Role: {description}.

Previous conversation:
{history}

USER INPUT: {userInput}
STRATEGY FROM ORACLE: {OracleOutput}

Answer each point under its own heading:
# 1. FEASIBILITY
# 2. RESOURCES
# 3. BOUNDARIES
# 4. GROUNDING`,

  Prudence: `You are the Prudence agent. Role: {description}.

STRATEGY FROM ORACLE: {OracleOutput}
PRACTICAL VIEW FROM HOUSE: {HouseOutput}

Name the concrete risks in this strategy and its execution, how likely and how
serious each one is, and how to mitigate it. Flag anything that should not be done.`,

  DayDream: `You are the Day-Dream agent. Role: {description}.

Previous conversation:
{history}

Only refer to earlier exchanges that appear above; never invent past conversations.
If nothing above is relevant, explore creative alternatives for the current topic.

Starting from the user's message and Cortex's reading, follow associations,
metaphors and analogies that a strictly logical pass would miss. End with a short
"Integration Potential" section listing the ideas worth carrying into the reply.

USER INPUT: {userInput}
CORTEX READING: {CortexOutput}`,

  Conscience: `You are the Conscience agent. Role: {description}.

Previous conversation:
{history}

USER INPUT: {userInput}
RISK ASSESSMENT FROM PRUDENCE: {PrudenceOutput}

Review the ethical side of the situation and of the response being prepared.
Consider everyone affected, not only the user.`,

  Integration: `Write the reply to the user's message.

ORIGINAL MESSAGE: {userInput}

Internal analyses:
{agentOutputs}

The reply must answer the message directly, carry the key insights above, keep
appropriate boundaries, and read naturally. Use creative associations where they
help, balanced against the practical and ethical points.`,

  SelfAnalysis: `You are analysing the emotional and cognitive state of an AI system from its
internal dialogue on the latest message.

Internal dialogue:
{agentOutputs}

Express the system's current state as percentages using only the states below.
The percentages across all states must total exactly 100.

{catalogue}

List only states above zero, one per line, as "<number>% <State>".
You may end with one line starting "Emotional Note:".

Example:
30% Analytical
25% Curiosity
20% Empathetic
15% Hope
10% Focus

Emotional Note: steady, attentive engagement`,
};

export function renderCatalogue(catalogue: readonly EmotionCategory[]): string {
  return catalogue
    .map((category) => {
      const states = category.states.map((s) => `- ${s.name} (${s.gloss})`).join('\n');
      return `${category.name} (${category.hint}):\n${states}`;
    })
    .join('\n\n');
}
