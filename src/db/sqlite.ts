/**
 * SQLite conversation store (better-sqlite3). Default driver; also used with
 * `:memory:` in tests.
 */
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { PersistenceError } from '../core/errors.js';
import { CONVERSATION } from '../config.js';
import type { ConversationRecord, ConversationSummary, Message } from '../core/types.js';
import { logger } from '../utils/logger.js';
import { parseMessage, parseRecord, parseSummary } from './records.js';
import type { ConversationStore, ListFilter } from './store.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS conversations (
    id          TEXT PRIMARY KEY,
    title       TEXT NOT NULL,
    platform    TEXT NOT NULL,
    status      TEXT NOT NULL,
    phase       TEXT NOT NULL,
    record      TEXT NOT NULL,
    created_at  TEXT NOT NULL,
    updated_at  TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS messages (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    role            TEXT NOT NULL,
    content         TEXT NOT NULL,
    timestamp       TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, id);
  CREATE INDEX IF NOT EXISTS idx_conversations_updated ON conversations(updated_at DESC);
`;

interface ConversationRow {
  id: string;
  title: string;
  platform: string;
  status: string;
  phase: string;
  record: string;
  created_at: string;
  updated_at: string;
}

type RecordRow = Pick<ConversationRow, 'id' | 'record'>;
type SummaryRow = Pick<ConversationRow, 'id' | 'title' | 'platform' | 'status' | 'updated_at'>;
type MessageRow = { role: string; content: string; timestamp: string };

function rowFor(record: ConversationRecord): ConversationRow {
  const { state } = record;
  return {
    id: state.id,
    title: state.title,
    platform: state.platform,
    status: state.status,
    phase: state.phase,
    record: JSON.stringify(record),
    created_at: state.created_at,
    updated_at: state.updated_at,
  };
}

export class SqliteConversationStore implements ConversationStore {
  private constructor(private readonly db: Database.Database) {}

  static open(path: string): SqliteConversationStore {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
    const db = new Database(path);
    db.pragma('foreign_keys = ON');
    if (path !== ':memory:') db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    logger.debug('SQLite store opened', { path });
    return new SqliteConversationStore(db);
  }

  private guard<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn());
    } catch (err) {
      return Promise.reject(err instanceof PersistenceError ? err : new PersistenceError(operation, err));
    }
  }

  private insertRow(row: ConversationRow): void {
    this.db.prepare(`
      INSERT INTO conversations (id, title, platform, status, phase, record, created_at, updated_at)
      VALUES (@id, @title, @platform, @status, @phase, @record, @created_at, @updated_at)
    `).run(row);
  }

  private upsertRow(row: ConversationRow): void {
    this.db.prepare(`
      INSERT INTO conversations (id, title, platform, status, phase, record, created_at, updated_at)
      VALUES (@id, @title, @platform, @status, @phase, @record, @created_at, @updated_at)
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title, platform = excluded.platform, status = excluded.status,
        phase = excluded.phase, record = excluded.record, updated_at = excluded.updated_at
    `).run(row);
  }

  private insertMessage(id: string, message: Message): void {
    this.db.prepare('INSERT INTO messages (conversation_id, role, content, timestamp) VALUES (?, ?, ?, ?)')
      .run(id, message.role, message.content, message.timestamp);
  }

  create(record: ConversationRecord): Promise<void> {
    return this.guard('create conversation', () => this.insertRow(rowFor(record)));
  }

  load(id: string): Promise<ConversationRecord | null> {
    return this.guard('load conversation', () => {
      const row = this.db.prepare<[string], RecordRow>('SELECT id, record FROM conversations WHERE id = ?').get(id);
      return row ? parseRecord(row.record, row.id) : null;
    });
  }

  save(record: ConversationRecord): Promise<void> {
    return this.guard('save conversation', () => this.upsertRow(rowFor(record)));
  }

  appendMessage(id: string, message: Message): Promise<void> {
    return this.guard('append message', () => this.insertMessage(id, message));
  }

  commit(record: ConversationRecord, messages: readonly Message[]): Promise<void> {
    return this.guard('commit conversation', () => {
      this.db.transaction(() => {
        this.upsertRow(rowFor(record));
        for (const message of messages) this.insertMessage(record.state.id, message);
      })();
    });
  }

  messages(id: string): Promise<Message[]> {
    return this.guard('read messages', () =>
      this.db.prepare<[string], MessageRow>(
        'SELECT role, content, timestamp FROM messages WHERE conversation_id = ? ORDER BY id ASC',
      ).all(id).map(parseMessage));
  }

  list(filter: ListFilter = {}): Promise<ConversationSummary[]> {
    return this.guard('list conversations', () => {
      const limit = filter.limit ?? CONVERSATION.listLimit;
      const columns = 'SELECT id, title, platform, status, updated_at FROM conversations';
      const rows = filter.status
        ? this.db.prepare<[string, number], SummaryRow>(
            `${columns} WHERE status = ? ORDER BY updated_at DESC LIMIT ?`,
          ).all(filter.status, limit)
        : this.db.prepare<[number], SummaryRow>(
            `${columns} ORDER BY updated_at DESC LIMIT ?`,
          ).all(limit);
      return rows.map(parseSummary);
    });
  }

  delete(id: string): Promise<boolean> {
    return this.guard('delete conversation', () =>
      this.db.prepare('DELETE FROM conversations WHERE id = ?').run(id).changes > 0);
  }

  close(): Promise<void> {
    return this.guard<void>('close store', () => this.db.close());
  }
}
