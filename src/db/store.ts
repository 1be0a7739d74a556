/**
 * ConversationStore: persistence seam for conversation records and history.
 *
 * Every failure a driver hits surfaces as PersistenceError. `commit` writes
 * the record and the turn's messages together or not at all.
 */
import { env } from '../config.js';
import type { ConversationRecord, ConversationSummary, Message, ScriptStatus } from '../core/types.js';

export interface ListFilter {
  status?: ScriptStatus;
  limit?: number;
}

export interface ConversationStore {
  /** Insert a new record; fails if the id exists. */
  create(record: ConversationRecord): Promise<void>;
  load(id: string): Promise<ConversationRecord | null>;
  /** Upsert the record without touching history. */
  save(record: ConversationRecord): Promise<void>;
  appendMessage(id: string, message: Message): Promise<void>;
  /** Upsert the record and append `messages` atomically. */
  commit(record: ConversationRecord, messages: readonly Message[]): Promise<void>;
  messages(id: string): Promise<Message[]>;
  /** Most recently updated first. */
  list(filter?: ListFilter): Promise<ConversationSummary[]>;
  /** Returns false when no such conversation existed. */
  delete(id: string): Promise<boolean>;
  close(): Promise<void>;
}

export async function createStore(): Promise<ConversationStore> {
  if (env.STORE_DRIVER === 'supabase') {
    const { SupabaseConversationStore } = await import('./supabase.js');
    return new SupabaseConversationStore();
  }
  const { SqliteConversationStore } = await import('./sqlite.js');
  return SqliteConversationStore.open(env.SQLITE_PATH);
}
