import { PersistenceError } from '../src/core/errors.js';
import type {
  Candidate, ConversationRecord, ConversationSummary, Domain, GenerationContext, GenerationProvider, Message,
} from '../src/core/types.js';
import type { ConversationStore, ListFilter } from '../src/db/store.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function candidates(prefix: string, n = 3): Candidate[] {
  return Array.from({ length: n }, (_, i) => ({
    label: `${prefix} ${i + 1}`,
    value: `${prefix} text ${i + 1}`,
    description: `why ${prefix} ${i + 1}`,
  }));
}

export interface ProviderCall {
  domain: Domain;
  context: GenerationContext;
}

type Script = (domain: Domain, context: GenerationContext, call: number) => Candidate[] | Promise<Candidate[]>;

/** Provider whose answers are written by the test. Records every call. */
export class ScriptedProvider implements GenerationProvider {
  readonly calls: ProviderCall[] = [];

  constructor(private script: Script = (domain, _ctx, call) => candidates(`${domain}#${call}`)) {}

  respond(script: Script): void {
    this.script = script;
  }

  async generate(domain: Domain, context: GenerationContext): Promise<Candidate[]> {
    this.calls.push({ domain, context });
    return this.script(domain, context, this.calls.length);
  }
}

/** In-process ConversationStore with switchable commit failure. */
export class MemoryStore implements ConversationStore {
  private readonly records = new Map<string, ConversationRecord>();
  private readonly history = new Map<string, Message[]>();
  failCommits = false;
  commits = 0;

  async create(record: ConversationRecord): Promise<void> {
    if (this.records.has(record.state.id)) throw new PersistenceError('create conversation', new Error('exists'));
    this.records.set(record.state.id, structuredClone(record));
  }

  async load(id: string): Promise<ConversationRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async save(record: ConversationRecord): Promise<void> {
    this.records.set(record.state.id, structuredClone(record));
  }

  async appendMessage(id: string, message: Message): Promise<void> {
    this.history.set(id, [...(this.history.get(id) ?? []), message]);
  }

  async commit(record: ConversationRecord, messages: readonly Message[]): Promise<void> {
    if (this.failCommits) throw new PersistenceError('commit conversation', new Error('disk full'));
    this.commits++;
    const id = record.state.id;
    this.records.set(id, structuredClone(record));
    this.history.set(id, [...(this.history.get(id) ?? []), ...messages]);
  }

  async messages(id: string): Promise<Message[]> {
    return [...(this.history.get(id) ?? [])];
  }

  async list(filter: ListFilter = {}): Promise<ConversationSummary[]> {
    return [...this.records.values()]
      .map(({ state }) => ({
        id: state.id, title: state.title, platform: state.platform, status: state.status, updated_at: state.updated_at,
      }))
      .filter((s) => !filter.status || s.status === filter.status)
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .slice(0, filter.limit ?? 50);
  }

  async delete(id: string): Promise<boolean> {
    this.history.delete(id);
    return this.records.delete(id);
  }

  async close(): Promise<void> {}
}
