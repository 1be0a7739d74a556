import { EmptyGenerationError, IndexOutOfRangeError, NoPendingOptionsError } from '../src/core/errors.js';
import { OptionRegistry } from '../src/core/options.js';
import { FIXED_NOW, candidates } from './helpers.js';

function presented(): OptionRegistry {
  const registry = OptionRegistry.restore(null);
  registry.present('hook', candidates('hook'), { mode: 'create', instruction: 'short', now: FIXED_NOW });
  return registry;
}

describe('OptionRegistry.present', () => {
  it('numbers options and records what was shown', () => {
    const pending = presented().current();
    expect(pending).toEqual({
      options: [
        { id: 'hook-1-1', label: 'hook 1', value: 'hook text 1', description: 'why hook 1' },
        { id: 'hook-1-2', label: 'hook 2', value: 'hook text 2', description: 'why hook 2' },
        { id: 'hook-1-3', label: 'hook 3', value: 'hook text 3', description: 'why hook 3' },
      ],
      origin_step: 'hook',
      mode: 'create',
      instruction: 'short',
      shown: ['hook text 1', 'hook text 2', 'hook text 3'],
      sources: [
        { provider: null, model: null },
        { provider: null, model: null },
        { provider: null, model: null },
      ],
      created_at: '2026-03-01T12:00:00.000Z',
    });
  });

  it('appends to previously shown values and keeps provider metadata', () => {
    const registry = OptionRegistry.restore(null);
    const pending = registry.present(
      'cta',
      [{ label: 'Subscribe', value: 'Subscribe now', provider: 'openai', model: 'gpt-4o' }],
      { mode: 'edit', instruction: null, previouslyShown: ['old cta'] },
    );
    expect(pending.shown).toEqual(['old cta', 'Subscribe now']);
    expect(pending.sources).toEqual([{ provider: 'openai', model: 'gpt-4o' }]);
    expect(pending.options[0]?.description).toBe('');
  });

  it('rejects an empty candidate list and keeps the current set', () => {
    const registry = presented();
    expect(() => registry.present('hook', [], { mode: 'create', instruction: null })).toThrow(EmptyGenerationError);
    expect(registry.size).toBe(3);
  });
});

describe('OptionRegistry.resolve', () => {
  it('returns the chosen option with its metadata and clears the set', () => {
    const registry = presented();
    const selected = registry.resolve(2);
    expect(selected).toEqual({
      index: 2,
      option: { id: 'hook-1-2', label: 'hook 2', value: 'hook text 2', description: 'why hook 2' },
      origin_step: 'hook',
      mode: 'create',
      instruction: 'short',
      provider: null,
      model: null,
    });
    expect(registry.current()).toBeNull();
  });

  it('refuses a second selection from a consumed set', () => {
    const registry = presented();
    registry.resolve(1);
    expect(() => registry.resolve(1)).toThrow(NoPendingOptionsError);
  });

  it('range-checks without clearing the set', () => {
    const registry = presented();
    expect(() => registry.resolve(4)).toThrow(IndexOutOfRangeError);
    expect(() => registry.resolve(0)).toThrow(IndexOutOfRangeError);
    expect(() => registry.resolve(1.5)).toThrow(IndexOutOfRangeError);
    expect(registry.size).toBe(3);
  });

  it('resolves by option id and rejects ids from other sets', () => {
    expect(presented().resolveId('hook-1-3').index).toBe(3);
    expect(() => presented().resolveId('story-1-1')).toThrow(IndexOutOfRangeError);
    expect(() => OptionRegistry.restore(null).resolveId('hook-1-1')).toThrow(NoPendingOptionsError);
  });

  it('numbers each set so ids from a replaced set no longer resolve', () => {
    const registry = presented();
    registry.present('hook', candidates('again'), { mode: 'create', instruction: null });

    expect(registry.setsPresented).toBe(2);
    expect(registry.current()?.options.map((o) => o.id)).toEqual(['hook-2-1', 'hook-2-2', 'hook-2-3']);
    expect(() => registry.resolveId('hook-1-2')).toThrow(IndexOutOfRangeError);
    expect(registry.resolveId('hook-2-2').option.value).toBe('again text 2');
  });

  it('continues set numbering from the restored count', () => {
    const registry = OptionRegistry.restore(null, 4);
    const pending = registry.present('cta', candidates('cta', 1), { mode: 'create', instruction: null });
    expect(pending.options[0]?.id).toBe('cta-5-1');
    expect(registry.setsPresented).toBe(5);
  });
});

describe('OptionRegistry persistence', () => {
  it('restores from a snapshot that is detached from the live set', () => {
    const registry = presented();
    const snapshot = registry.snapshot();
    snapshot?.options.pop();
    expect(registry.size).toBe(3);

    const restored = OptionRegistry.restore(registry.snapshot(), registry.setsPresented);
    expect(restored.resolve(3).option.value).toBe('hook text 3');
  });

  it('invalidates idempotently', () => {
    const registry = presented();
    registry.invalidate();
    registry.invalidate();
    expect(registry.snapshot()).toBeNull();
  });
});
