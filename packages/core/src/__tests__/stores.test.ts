import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SettingsStore } from '../store/settings.js';
import { ConversationStore } from '../store/conversations.js';
import { z } from 'zod';
import { ActivityStore } from '../activity.js';
import { JsonStore } from '../storage.js';
import { ConversationNotFoundError } from '../errors.js';
import { baselineTemperatures } from '../mind/roles.js';
import { resolveEmotion } from '../mind/emotion-table.js';
import { MIND_DIR, type AnalysisRecord, type ChatMessage } from '../types.js';

function message(n: number, content: string): ChatMessage {
  return {
    id: `msg_${n}`,
    role: n % 2 === 1 ? 'user' : 'assistant',
    content,
    timestamp: `2026-01-01T00:00:${String(n).padStart(2, '0')}.000Z`,
  };
}

function analysis(conversationId: string): AnalysisRecord {
  return {
    id: 'an_test',
    conversationId,
    createdAt: '2026-01-01T00:00:00.000Z',
    userInput: 'Hello',
    agentOutputs: [],
    integratedReply: 'Hi',
    selfAnalysis: '100% Joy',
    emotionalState: [{ label: 'Joy', percentage: 100 }],
    nextTemperatures: baselineTemperatures(),
  };
}

describe('SettingsStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mindloop-settings-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('starts from the baseline', () => {
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_a')).toEqual(baselineTemperatures());
  });

  it('persists saved temperatures across instances', () => {
    const next = { ...baselineTemperatures(), Prudence: 0.8 };
    new SettingsStore(tmpDir).saveTemperatures('conv_a', next);

    const reopened = new SettingsStore(tmpDir);
    expect(reopened.loadCurrentTemperatures('conv_a')).toEqual(next);
    expect(reopened.loadCurrentTemperatures('conv_b')).toEqual(baselineTemperatures());
  });

  it('rejects temperatures outside [0, 1]', () => {
    const store = new SettingsStore(tmpDir);
    expect(() => store.saveTemperatures('conv_a', { ...baselineTemperatures(), Cortex: 1.5 })).toThrow();
    expect(store.loadCurrentTemperatures('conv_a')).toEqual(baselineTemperatures());
  });

  it('resets to the baseline and keeps other settings', () => {
    const store = new SettingsStore(tmpDir);
    store.update('conv_a', { model: 'gpt-4.1', dayDreamEnabled: false });
    store.saveTemperatures('conv_a', { ...baselineTemperatures(), Seer: 0.9 });

    expect(store.resetTemperatures('conv_a')).toEqual(baselineTemperatures());

    const settings = new SettingsStore(tmpDir).get('conv_a');
    expect(settings.temperatures).toEqual(baselineTemperatures());
    expect(settings.model).toBe('gpt-4.1');
    expect(settings.dayDreamEnabled).toBe(false);
  });

  it('applies a blended emotional state', () => {
    const store = new SettingsStore(tmpDir);
    const applied = store.applyBlend('conv_a', [{ label: 'Fear', percentage: 100 }]);

    expect(applied).toEqual(resolveEmotion('fear')?.temperatures);
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_a')).toEqual(applied);
  });

  it('applies a blend through the given blender', () => {
    const store = new SettingsStore(tmpDir);
    const fixed = { ...baselineTemperatures(), Oracle: 0.2 };

    expect(store.applyBlend('conv_a', [{ label: 'Joy', percentage: 100 }], () => fixed)).toEqual(fixed);
    expect(store.loadCurrentTemperatures('conv_a').Oracle).toBe(0.2);
  });

  it('sets one agent temperature and keeps the others', () => {
    const store = new SettingsStore(tmpDir);
    store.saveTemperatures('conv_a', { ...baselineTemperatures(), Seer: 0.9 });

    const next = store.setTemperature('conv_a', 'House', 0.35);

    expect(next).toEqual({ ...baselineTemperatures(), Seer: 0.9, House: 0.35 });
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_a')).toEqual(next);
    expect(() => store.setTemperature('conv_a', 'House', 1.2)).toThrow();
    expect(store.loadCurrentTemperatures('conv_a').House).toBe(0.35);
  });

  it('sees writes made through another instance', () => {
    const server = new SettingsStore(tmpDir);
    const cli = new SettingsStore(tmpDir);
    expect(server.loadCurrentTemperatures('conv_a')).toEqual(baselineTemperatures());

    cli.setTemperature('conv_a', 'Cortex', 0.25);
    expect(server.loadCurrentTemperatures('conv_a').Cortex).toBe(0.25);

    server.update('conv_a', { dayDreamEnabled: false });
    expect(cli.get('conv_a').temperatures.Cortex).toBe(0.25);
    expect(cli.get('conv_a').dayDreamEnabled).toBe(false);
  });

  it('forgets a removed conversation', () => {
    const store = new SettingsStore(tmpDir);
    store.saveTemperatures('conv_a', { ...baselineTemperatures(), Seer: 0.9 });
    store.remove('conv_a');
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_a')).toEqual(baselineTemperatures());
  });

  it('falls back to the backup when the file is corrupted', () => {
    const store = new SettingsStore(tmpDir);
    store.saveTemperatures('conv_a', { ...baselineTemperatures(), Seer: 0.9 });
    store.saveTemperatures('conv_a', { ...baselineTemperatures(), Seer: 0.1 });
    writeFileSync(join(tmpDir, MIND_DIR, 'settings.json'), '{ not json', 'utf-8');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    // The backup holds the state before the last write
    expect(new SettingsStore(tmpDir).loadCurrentTemperatures('conv_a').Seer).toBe(0.9);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});

describe('ConversationStore', () => {
  let tmpDir: string;
  let store: ConversationStore;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mindloop-conv-'));
    store = new ConversationStore(tmpDir);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates and reads back a conversation', () => {
    const created = store.create('Planning');

    expect(created.id).toMatch(/^conv_[0-9a-f]{8}$/);
    expect(new ConversationStore(tmpDir).get(created.id)).toMatchObject({
      id: created.id,
      title: 'Planning',
      messages: [],
      analyses: [],
    });
  });

  it('returns null for unknown ids', () => {
    expect(store.get('conv_missing')).toBeNull();
  });

  it('lists conversations, most recently updated first', () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2026-01-01T10:00:00.000Z'));
      const first = store.create('First');
      vi.setSystemTime(new Date('2026-01-01T10:01:00.000Z'));
      const second = store.create('Second');
      expect(store.list().map((c) => c.id)).toEqual([second.id, first.id]);

      vi.setSystemTime(new Date('2026-01-01T10:02:00.000Z'));
      store.appendMessages(first.id, [message(1, 'Hello')]);
      expect(store.list().map((c) => c.id)).toEqual([first.id, second.id]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('loads only the most recent messages in time order', () => {
    const { id } = store.create();
    store.appendMessages(id, Array.from({ length: 8 }, (_, i) => message(i + 1, `m${i + 1}`)));

    expect(store.loadRecentMessages(id).map((m) => m.content)).toEqual(['m3', 'm4', 'm5', 'm6', 'm7', 'm8']);
    expect(store.loadRecentMessages(id, 2).map((m) => m.content)).toEqual(['m7', 'm8']);
    expect(store.loadRecentMessages(id, 0)).toEqual([]);
    expect(store.loadRecentMessages('conv_missing')).toEqual([]);
  });

  it('appends analysis records', () => {
    const { id } = store.create();
    store.appendAnalysisRecord(id, analysis(id));

    expect(new ConversationStore(tmpDir).listAnalyses(id)).toEqual([analysis(id)]);
  });

  it('refuses to append to a missing conversation', () => {
    expect(() => store.appendMessages('conv_missing', [message(1, 'x')])).toThrow('Conversation not found: conv_missing');
    expect(() => store.appendAnalysisRecord('conv_missing', analysis('conv_missing'))).toThrow(ConversationNotFoundError);
    expect(store.hasConversation('conv_missing')).toBe(false);
  });

  it('rejects ids that would leave the data directory', () => {
    expect(() => store.get('../settings')).toThrow('Invalid conversation id');
  });

  it('deletes a conversation together with its analyses', () => {
    const { id } = store.create();
    store.appendAnalysisRecord(id, analysis(id));
    store.appendMessages(id, [message(1, 'x')]);

    expect(store.delete(id)).toBe(true);
    expect(store.get(id)).toBeNull();
    expect(store.listAnalyses(id)).toEqual([]);
    expect(existsSync(join(tmpDir, MIND_DIR, 'conversations', `${id}.json.backup`))).toBe(false);
    expect(store.delete(id)).toBe(false);
  });

  it('skips stray files when listing', () => {
    store.create();
    mkdirSync(join(tmpDir, MIND_DIR, 'conversations'), { recursive: true });
    writeFileSync(join(tmpDir, MIND_DIR, 'conversations', 'notes.txt'), 'x', 'utf-8');

    expect(store.list()).toHaveLength(1);
  });
});

describe('JsonStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mindloop-json-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('serves its cached copy until invalidated', () => {
    const schema = z.object({ n: z.number() });
    const reader = new JsonStore(tmpDir, 'counter.json', schema, { n: 0 });
    const writer = new JsonStore(tmpDir, 'counter.json', schema, { n: 0 });

    expect(reader.read()).toEqual({ n: 0 });
    writer.write({ n: 3 });
    expect(reader.read()).toEqual({ n: 0 });

    reader.invalidate();
    expect(reader.read()).toEqual({ n: 3 });
  });
});

describe('ActivityStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'mindloop-activity-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns events newest first', () => {
    const activity = new ActivityStore(tmpDir);
    activity.append('turn_started', 'first');
    const sink = activity.sink();
    sink('turn_completed', 'second', 'details');

    const recent = new ActivityStore(tmpDir).getRecent();
    expect(recent.map((e) => e.description)).toEqual(['second', 'first']);
    expect(recent[0]).toMatchObject({ type: 'turn_completed', details: 'details' });
  });

  it('keeps events appended through separate instances', () => {
    const server = new ActivityStore(tmpDir);
    const cli = new ActivityStore(tmpDir);
    server.append('turn_started', 'from server');
    cli.append('temperatures_reset', 'from cli');
    server.append('turn_completed', 'from server again');

    expect(cli.getRecent().map((e) => e.description)).toEqual(['from server again', 'from cli', 'from server']);
  });

  it('caps the log at 500 events', () => {
    const activity = new ActivityStore(tmpDir);
    for (let i = 0; i < 505; i++) activity.append('stage_completed', `event ${i}`);

    const all = activity.getRecent(1000);
    expect(all).toHaveLength(500);
    expect(all[0].description).toBe('event 504');
    expect(all[499].description).toBe('event 5');
  });
});
