import { existsSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { ConversationNotFoundError } from '../errors.js';
import { JsonStore } from '../storage.js';
import {
  ConversationSchema,
  MIND_DIR,
  type AnalysisRecord,
  type ChatMessage,
  type Conversation,
} from '../types.js';
import { generateId, now } from '../utils.js';

type MaybePromise<T> = T | Promise<T>;

/** Read recent turns, append finished ones. */
export interface HistoryStore {
  hasConversation(conversationId: string): MaybePromise<boolean>;
  loadRecentMessages(conversationId: string, limit?: number): MaybePromise<ChatMessage[]>;
  appendMessages(conversationId: string, messages: ChatMessage[]): MaybePromise<void>;
  appendAnalysisRecord(conversationId: string, record: AnalysisRecord): MaybePromise<void>;
}

const CONVERSATIONS_DIR = 'conversations';

/**
 * One JSON file per conversation under `.mindloop/conversations/`, holding
 * its messages and the analysis record of every completed turn.
 */
export class ConversationStore implements HistoryStore {
  constructor(private readonly dataRoot: string) {}

  create(title = 'New Chat'): Conversation {
    const timestamp = now();
    const conversation: Conversation = {
      id: generateId('conv'),
      title,
      createdAt: timestamp,
      updatedAt: timestamp,
      messages: [],
      analyses: [],
    };
    this.file(conversation.id).write(conversation);
    return conversation;
  }

  hasConversation(conversationId: string): boolean {
    return existsSync(this.path(conversationId));
  }

  get(conversationId: string): Conversation | null {
    if (!existsSync(this.path(conversationId))) return null;
    return this.file(conversationId).read();
  }

  list(): Conversation[] {
    const dir = join(this.dataRoot, MIND_DIR, CONVERSATIONS_DIR);
    if (!existsSync(dir)) return [];
    return readdirSync(dir)
      .filter((f) => /^[\w-]+\.json$/.test(f))
      .map((f) => this.get(f.slice(0, -'.json'.length)))
      .filter((c): c is Conversation => c !== null)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  loadRecentMessages(conversationId: string, limit = 6): ChatMessage[] {
    const conversation = this.get(conversationId);
    if (!conversation || limit <= 0) return [];
    return [...conversation.messages]
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp))
      .slice(-limit);
  }

  appendMessages(conversationId: string, messages: ChatMessage[]): void {
    this.mutate(conversationId, (c) => ({ ...c, messages: [...c.messages, ...messages] }));
  }

  appendAnalysisRecord(conversationId: string, record: AnalysisRecord): void {
    this.mutate(conversationId, (c) => ({ ...c, analyses: [...c.analyses, record] }));
  }

  listAnalyses(conversationId: string): AnalysisRecord[] {
    return this.get(conversationId)?.analyses ?? [];
  }

  /** Removes the conversation together with its messages and analyses. */
  delete(conversationId: string): boolean {
    const path = this.path(conversationId);
    if (!existsSync(path)) return false;
    rmSync(path);
    rmSync(path + '.backup', { force: true });
    return true;
  }

  private mutate(conversationId: string, fn: (c: Conversation) => Conversation): Conversation {
    if (!this.hasConversation(conversationId)) {
      throw new ConversationNotFoundError(conversationId);
    }
    return this.file(conversationId).update((c) => ({ ...fn(c), updatedAt: now() }));
  }

  private file(conversationId: string): JsonStore<Conversation> {
    const placeholder: Conversation = {
      id: conversationId,
      title: 'New Chat',
      createdAt: now(),
      updatedAt: now(),
      messages: [],
      analyses: [],
    };
    return new JsonStore<Conversation>(this.dataRoot, this.relative(conversationId), ConversationSchema, placeholder);
  }

  private relative(conversationId: string): string {
    if (!/^[\w-]+$/.test(conversationId)) {
      throw new Error(`Invalid conversation id: ${conversationId}`);
    }
    return join(CONVERSATIONS_DIR, `${conversationId}.json`);
  }

  private path(conversationId: string): string {
    return join(this.dataRoot, MIND_DIR, this.relative(conversationId));
  }
}
