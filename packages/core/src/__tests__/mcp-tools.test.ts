import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { registerMindTools } from '../mcp/tools.js';
import { ActivityStore } from '../activity.js';
import { TurnRunner } from '../orchestration/turn-runner.js';
import { ConversationStore } from '../store/conversations.js';
import { SettingsStore } from '../store/settings.js';
import { baselineTemperatures } from '../mind/roles.js';
import { ScriptedClient, fullTurnScript } from '../mind/__tests__/scripted-client.js';

interface ToolOutput {
  text: string;
  isError: boolean;
}

describe('MCP tools', () => {
  let tmpDir: string;
  let client: Client;
  let conversations: ConversationStore;
  let settings: SettingsStore;

  beforeEach(async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mindloop-mcp-'));
    conversations = new ConversationStore(tmpDir);
    settings = new SettingsStore(tmpDir);
    const activity = new ActivityStore(tmpDir);
    const runner = new TurnRunner({
      client: new ScriptedClient(fullTurnScript('100% Fear')),
      temperatures: settings,
      history: conversations,
      settings,
      onActivity: activity.sink(),
    });

    const server = new McpServer({ name: 'mindloop-test', version: '0.0.0' });
    registerMindTools(server, { runner, settings, conversations, activity });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown>): Promise<ToolOutput> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content.map((c) => (c.type === 'text' ? c.text : '')).join('');
    return { text, isError: result.isError === true };
  }

  it('lists the mind tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'mind_apply_emotions',
      'mind_blend',
      'mind_get_temperatures',
      'mind_list_analyses',
      'mind_process_turn',
      'mind_reset_temperatures',
      'mind_set_temperature',
    ]);
  });

  it('processes a turn in a new conversation and stores the result', async () => {
    const out = await call('mind_process_turn', { message: 'What now?' });

    expect(out.isError).toBe(false);
    expect(out.text.startsWith('Integrated reply\n\nEmotional State While Processing:\n100% Fear')).toBe(true);

    const [conversation] = conversations.list();
    expect(out.text.endsWith(`Conversation: ${conversation.id}`)).toBe(true);
    expect(conversation.title).toBe('What now?');
    expect(conversation.messages).toHaveLength(2);
    expect(conversations.listAnalyses(conversation.id)).toHaveLength(1);
    expect(settings.loadCurrentTemperatures(conversation.id).Prudence).toBe(0.8);
  });

  it('reports an unknown conversation as an error', async () => {
    const out = await call('mind_process_turn', { message: 'Hi', conversationId: 'conv_missing' });
    expect(out).toEqual({ text: 'Conversation conv_missing not found', isError: true });
  });

  it('shows and resets temperatures', async () => {
    const { id } = conversations.create();
    settings.saveTemperatures(id, { ...settings.loadCurrentTemperatures(id), Cortex: 0.2 });

    const before = await call('mind_get_temperatures', { conversationId: id });
    expect(before.text.split('\n\n')[0]).toBe('Cortex: 0.20 (Emotional Processing)\nEffectiveness: 40.0% - Sub-Optimal');

    const reset = await call('mind_reset_temperatures', { conversationId: id });
    expect(reset.text.startsWith('Reset to baseline:\n\nCortex: 0.70 (Emotional Processing)\nEffectiveness: 100.0% - Optimal')).toBe(true);
    expect(settings.loadCurrentTemperatures(id).Cortex).toBe(0.7);
  });

  it('lists analyses newest first', async () => {
    await call('mind_process_turn', { message: 'First' });
    const [conversation] = conversations.list();

    const out = await call('mind_list_analyses', { conversationId: conversation.id });
    expect(out.text).toContain('| First\n  state: 100% Fear');

    const { id } = conversations.create();
    const empty = await call('mind_list_analyses', { conversationId: id });
    expect(empty.text).toBe('No analyses yet.');
  });

  it('reports unknown conversations on every conversation tool', async () => {
    const expected = { text: 'Conversation conv_none not found', isError: true };

    expect(await call('mind_get_temperatures', { conversationId: 'conv_none' })).toEqual(expected);
    expect(await call('mind_reset_temperatures', { conversationId: 'conv_none' })).toEqual(expected);
    expect(await call('mind_list_analyses', { conversationId: 'conv_none' })).toEqual(expected);
    expect(await call('mind_apply_emotions', { conversationId: 'conv_none', preset: 'Critical Analysis' })).toEqual(expected);
    expect(await call('mind_set_temperature', { conversationId: 'conv_none', agent: 'Seer', value: 0.3 })).toEqual(expected);
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_none')).toEqual(baselineTemperatures());
  });

  it('applies explicit emotions to a conversation', async () => {
    const { id } = conversations.create();

    const out = await call('mind_apply_emotions', { conversationId: id, emotions: [{ label: 'Fear', percentage: 100 }] });

    expect(out.isError).toBe(false);
    expect(out.text.startsWith('Applied 100% Fear:\n\nCortex: ')).toBe(true);
    expect(settings.loadCurrentTemperatures(id).Prudence).toBe(0.8);
  });

  it('applies a named preset to a conversation', async () => {
    const { id } = conversations.create();

    const out = await call('mind_apply_emotions', { conversationId: id, preset: 'critical analysis' });

    expect(out.text.startsWith('Applied 50% analytical, 30% critical, 20% clarity:')).toBe(true);
    expect(settings.loadCurrentTemperatures(id).Prudence).toBeCloseTo(0.71, 10);
  });

  it('needs exactly one of emotions and preset', async () => {
    const { id } = conversations.create();

    expect(await call('mind_apply_emotions', { conversationId: id })).toEqual({ text: 'Give either emotions or preset', isError: true });
    expect(await call('mind_apply_emotions', {
      conversationId: id,
      preset: 'Critical Analysis',
      emotions: [{ label: 'Joy', percentage: 100 }],
    })).toEqual({ text: 'Give either emotions or preset', isError: true });
    expect(await call('mind_apply_emotions', { conversationId: id, preset: 'Zen' })).toEqual({ text: 'Unknown preset "Zen"', isError: true });
    expect(settings.loadCurrentTemperatures(id)).toEqual(baselineTemperatures());
  });

  it('sets a single agent temperature', async () => {
    const { id } = conversations.create();

    const out = await call('mind_set_temperature', { conversationId: id, agent: 'House', value: 0.35 });

    expect(out).toEqual({ text: 'House: 0.35 (Implementation)\nEffectiveness: 100.0% - Optimal', isError: false });
    expect(settings.loadCurrentTemperatures(id)).toEqual({ ...baselineTemperatures(), House: 0.35 });
  });

  it('blends without calling a model', async () => {
    const out = await call('mind_blend', { emotions: [{ label: 'Joy', percentage: 100 }] });
    expect(out.text.split('\n\n')[0]).toBe('Cortex: 0.80 (Emotional Processing)\nEffectiveness: 80.0% - Near-Optimal');
  });
});
