import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ActivityStore } from '../activity.js';
import { createBlender, type Blender } from '../mind/blender.js';
import { findPreset, TEMPERATURE_PRESETS } from '../mind/emotion-table.js';
import { formatTemperatureLine } from '../mind/summary.js';
import type { TurnRunner } from '../orchestration/turn-runner.js';
import type { ConversationStore } from '../store/conversations.js';
import type { SettingsStore } from '../store/settings.js';
import { AGENT_ROLES, AgentRole, Temperature, type TemperatureVector } from '../types.js';

export interface MindToolContext {
  runner: TurnRunner;
  settings: SettingsStore;
  conversations: ConversationStore;
  activity: ActivityStore;
  blender?: Blender;
}

const text = (t: string) => ({ content: [{ type: 'text' as const, text: t }] });
const failure = (t: string) => ({ content: [{ type: 'text' as const, text: t }], isError: true });

const missing = (id: string) => failure(`Conversation ${id} not found`);

const EmotionsInput = z.array(z.object({
  label: z.string().min(1),
  percentage: z.number(),
}));

function formatVector(temps: TemperatureVector): string {
  return AGENT_ROLES.map((role) => formatTemperatureLine(role, temps[role])).join('\n\n');
}

export function registerMindTools(server: McpServer, ctx: MindToolContext): void {
  const { runner, settings, conversations, activity } = ctx;
  const blender = ctx.blender ?? createBlender();

  server.registerTool('mind_process_turn', {
    title: 'Process Turn',
    description: 'Run one message through the seven agents, integrate a reply, and update the temperatures for the next turn. Omit conversationId to start a new conversation.',
    inputSchema: {
      message: z.string().min(1).describe('User message'),
      conversationId: z.string().optional().describe('Existing conversation id'),
    },
  }, async ({ message, conversationId }) => {
    let id = conversationId;
    if (id === undefined) {
      const created = conversations.create(message.slice(0, 60));
      activity.append('conversation_created', `Conversation: ${created.title}`, created.id);
      id = created.id;
    } else if (!conversations.hasConversation(id)) {
      return missing(id);
    }

    try {
      const result = await runner.run(id, message);
      return text(`${result.displayText}\n\nConversation: ${id}`);
    } catch (err) {
      return failure(err instanceof Error ? err.message : String(err));
    }
  });

  server.registerTool('mind_get_temperatures', {
    title: 'Get Temperatures',
    description: 'Current per-agent temperatures of a conversation with effectiveness ratings.',
    inputSchema: { conversationId: z.string() },
  }, async ({ conversationId }) => {
    if (!conversations.hasConversation(conversationId)) return missing(conversationId);
    return text(formatVector(settings.loadCurrentTemperatures(conversationId)));
  });

  server.registerTool('mind_reset_temperatures', {
    title: 'Reset Temperatures',
    description: 'Put a conversation back on the baseline temperatures.',
    inputSchema: { conversationId: z.string() },
  }, async ({ conversationId }) => {
    if (!conversations.hasConversation(conversationId)) return missing(conversationId);
    const baseline = settings.resetTemperatures(conversationId);
    activity.append('temperatures_reset', `Temperatures reset for ${conversationId}`);
    return text(`Reset to baseline:\n\n${formatVector(baseline)}`);
  });

  server.registerTool('mind_apply_emotions', {
    title: 'Apply Emotions',
    description: `Set a conversation's temperatures from a weighted emotional state or a named preset (${TEMPERATURE_PRESETS.map((p) => p.name).join(', ')}).`,
    inputSchema: {
      conversationId: z.string(),
      emotions: EmotionsInput.optional().describe('Weighted emotions, e.g. [{"label":"Joy","percentage":60}]'),
      preset: z.string().optional().describe('Preset name, instead of emotions'),
    },
  }, async ({ conversationId, emotions, preset }) => {
    if (!conversations.hasConversation(conversationId)) return missing(conversationId);
    if ((emotions === undefined) === (preset === undefined)) {
      return failure('Give either emotions or preset');
    }
    let measurements = emotions ?? [];
    if (preset !== undefined) {
      const found = findPreset(preset);
      if (!found) return failure(`Unknown preset "${preset}"`);
      measurements = found.emotions;
    }

    const temps = settings.applyBlend(conversationId, measurements, blender);
    const state = measurements.map((m) => `${m.percentage}% ${m.label}`).join(', ');
    activity.append('temperatures_updated', `Temperatures set by hand for ${conversationId}`, state);
    return text(`Applied ${state}:\n\n${formatVector(temps)}`);
  });

  server.registerTool('mind_set_temperature', {
    title: 'Set Temperature',
    description: 'Override one agent\'s temperature on a conversation.',
    inputSchema: {
      conversationId: z.string(),
      agent: AgentRole,
      value: Temperature.describe('Temperature from 0 to 1'),
    },
  }, async ({ conversationId, agent, value }) => {
    if (!conversations.hasConversation(conversationId)) return missing(conversationId);
    const temps = settings.setTemperature(conversationId, agent, value);
    activity.append('temperatures_updated', `${agent} set by hand for ${conversationId}`, `${agent}=${value.toFixed(2)}`);
    return text(formatTemperatureLine(agent, temps[agent]));
  });

  server.registerTool('mind_list_analyses', {
    title: 'List Analyses',
    description: 'Most recent analysis records of a conversation, newest first.',
    inputSchema: {
      conversationId: z.string(),
      limit: z.number().int().positive().optional().describe('How many (default 5)'),
    },
  }, async ({ conversationId, limit }) => {
    if (!conversations.hasConversation(conversationId)) return missing(conversationId);
    const analyses = conversations.listAnalyses(conversationId).slice(-(limit ?? 5)).reverse();
    if (analyses.length === 0) return text('No analyses yet.');
    const lines = analyses.map((a) => {
      const state = a.emotionalState.map((m) => `${m.percentage}% ${m.label}`).join(', ') || '(none parsed)';
      return `${a.id} | ${a.createdAt} | ${a.userInput.slice(0, 60)}\n  state: ${state}`;
    });
    return text(lines.join('\n'));
  });

  server.registerTool('mind_blend', {
    title: 'Blend Emotions',
    description: 'Compute the temperature vector for a weighted emotional state without calling a model.',
    inputSchema: {
      emotions: EmotionsInput.describe('Weighted emotions, e.g. [{"label":"Joy","percentage":60}]'),
    },
  }, async ({ emotions }) => {
    return text(formatVector(blender(emotions)));
  });
}
