/**
 * OptionRegistry: the one numbered, selectable option set of a conversation.
 *
 * The registry is rebuilt from the stored record on every request
 * (`restore`) and written back with `snapshot`, so the persisted set is the
 * only source of truth. Every presented set gets the next set number, and
 * option ids carry it (`hook-3-2` is option 2 of set 3), so an id from an
 * earlier set never resolves against a later one.
 */
import { EmptyGenerationError, IndexOutOfRangeError, NoPendingOptionsError } from './errors.js';
import type { Candidate, Domain, MergeMode, OptionItem, PendingOptions, SelectedOption } from './types.js';

export interface PresentMeta {
  mode: MergeMode;
  instruction: string | null;
  /** Values shown for this step before this set. */
  previouslyShown?: string[];
  now?: Date;
}

export class OptionRegistry {
  private pending: PendingOptions | null;
  private presented: number;

  private constructor(pending: PendingOptions | null, presented: number) {
    this.pending = pending;
    this.presented = presented;
  }

  /** `presented` is the number of sets shown in this conversation so far. */
  static restore(pending: PendingOptions | null, presented = 0): OptionRegistry {
    return new OptionRegistry(pending, presented);
  }

  get setsPresented(): number {
    return this.presented;
  }

  get size(): number {
    return this.pending?.options.length ?? 0;
  }

  current(): PendingOptions | null {
    return this.pending;
  }

  snapshot(): PendingOptions | null {
    return this.pending ? structuredClone(this.pending) : null;
  }

  /** Replace whatever is pending with a freshly numbered set. */
  present(step: Domain, candidates: readonly Candidate[], meta: PresentMeta): PendingOptions {
    if (candidates.length === 0) throw new EmptyGenerationError(step);

    const set = this.presented + 1;
    const options: OptionItem[] = candidates.map((c, i) => ({
      id: `${step}-${set}-${i + 1}`,
      label: c.label,
      value: c.value,
      description: c.description ?? '',
    }));

    this.pending = {
      options,
      origin_step: step,
      mode: meta.mode,
      instruction: meta.instruction,
      shown: [...(meta.previouslyShown ?? []), ...options.map((o) => o.value)],
      sources: candidates.map((c) => ({ provider: c.provider ?? null, model: c.model ?? null })),
      created_at: (meta.now ?? new Date()).toISOString(),
    };
    this.presented = set;
    return this.pending;
  }

  /** Consume the pending set by 1-based index. */
  resolve(index: number): SelectedOption {
    const pending = this.pending;
    if (!pending) throw new NoPendingOptionsError();

    const option = pending.options[index - 1];
    if (!Number.isInteger(index) || index < 1 || !option) {
      throw new IndexOutOfRangeError(index, pending.options.length);
    }

    const source = pending.sources[index - 1];
    this.pending = null;
    return {
      index,
      option,
      origin_step: pending.origin_step,
      mode: pending.mode,
      instruction: pending.instruction,
      provider: source?.provider ?? null,
      model: source?.model ?? null,
    };
  }

  /** Consume the pending set by option id. */
  resolveId(id: string): SelectedOption {
    const pending = this.pending;
    if (!pending) throw new NoPendingOptionsError();
    const position = pending.options.findIndex((o) => o.id === id);
    if (position < 0) throw new IndexOutOfRangeError(0, pending.options.length);
    return this.resolve(position + 1);
  }

  invalidate(): void {
    this.pending = null;
  }
}
