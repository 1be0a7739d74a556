/**
 * Supabase conversation store. Tables and the `commit_conversation` function
 * come from migrations/001_conversations.sql.
 *
 * There is no local write queue: a write that cannot reach Supabase fails the
 * turn with PersistenceError so the caller never sees an unsaved reply.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { CONVERSATION, env } from '../config.js';
import { PersistenceError } from '../core/errors.js';
import type { ConversationRecord, ConversationSummary, Message } from '../core/types.js';
import { telegram } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import { parseMessage, parseRecord, parseSummary } from './records.js';
import type { ConversationStore, ListFilter } from './store.js';

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;
let supabaseDown = false;

export function getSupabase(): SupabaseClient {
  if (!_supabase) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
      throw new PersistenceError('connect to Supabase', new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required'));
    }
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}

// ─── Connection error detection ───────────────────────────────────────────────

function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT'))
  );
}

async function run<T>(operation: string, fn: (db: SupabaseClient) => Promise<T>): Promise<T> {
  try {
    const result = await fn(getSupabase());
    if (supabaseDown) {
      supabaseDown = false;
      logger.info('Supabase reachable again');
      void telegram.info('Supabase reachable again. Conversation turns are being saved.');
    }
    return result;
  } catch (err) {
    if (isConnError(err) && !supabaseDown) {
      supabaseDown = true;
      void telegram.alert('Supabase unreachable. Conversation turns are failing until it recovers.');
    }
    throw err instanceof PersistenceError ? err : new PersistenceError(operation, err);
  }
}

function fail(message: string): never {
  throw new Error(message);
}

function rowFor(record: ConversationRecord): Record<string, unknown> {
  const { state } = record;
  return {
    id: state.id,
    title: state.title,
    platform: state.platform,
    status: state.status,
    phase: state.phase,
    record,
    created_at: state.created_at,
    updated_at: state.updated_at,
  };
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SupabaseConversationStore implements ConversationStore {
  create(record: ConversationRecord): Promise<void> {
    return run('create conversation', async (db) => {
      const { error } = await db.from('conversations').insert(rowFor(record));
      if (error) fail(error.message);
    });
  }

  load(id: string): Promise<ConversationRecord | null> {
    return run('load conversation', async (db) => {
      const { data, error } = await db.from('conversations').select('id, record').eq('id', id).maybeSingle();
      if (error) fail(error.message);
      return data ? parseRecord(data.record, id) : null;
    });
  }

  save(record: ConversationRecord): Promise<void> {
    return run('save conversation', async (db) => {
      const { error } = await db.from('conversations').upsert(rowFor(record));
      if (error) fail(error.message);
    });
  }

  appendMessage(id: string, message: Message): Promise<void> {
    return run('append message', async (db) => {
      const { error } = await db.from('messages').insert({ conversation_id: id, ...message });
      if (error) fail(error.message);
    });
  }

  /** One RPC call: the function body runs in a single transaction. */
  commit(record: ConversationRecord, messages: readonly Message[]): Promise<void> {
    return run('commit conversation', async (db) => {
      const { error } = await db.rpc('commit_conversation', {
        p_conversation: rowFor(record),
        p_messages: messages,
      });
      if (error) fail(error.message);
    });
  }

  messages(id: string): Promise<Message[]> {
    return run('read messages', async (db) => {
      const { data, error } = await db
        .from('messages')
        .select('role, content, timestamp')
        .eq('conversation_id', id)
        .order('id', { ascending: true });
      if (error) fail(error.message);
      return (data ?? []).map(parseMessage);
    });
  }

  list(filter: ListFilter = {}): Promise<ConversationSummary[]> {
    return run('list conversations', async (db) => {
      let q = db
        .from('conversations')
        .select('id, title, platform, status, updated_at')
        .order('updated_at', { ascending: false });
      if (filter.status) q = q.eq('status', filter.status);
      const { data, error } = await q.limit(filter.limit ?? CONVERSATION.listLimit);
      if (error) fail(error.message);
      return (data ?? []).map(parseSummary);
    });
  }

  delete(id: string): Promise<boolean> {
    return run('delete conversation', async (db) => {
      const { data, error } = await db.from('conversations').delete().eq('id', id).select('id');
      if (error) fail(error.message);
      return (data ?? []).length > 0;
    });
  }

  async close(): Promise<void> {
    _supabase = null;
  }
}
