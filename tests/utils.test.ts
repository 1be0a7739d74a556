import { KeyedMutex } from '../src/utils/mutex.js';
import { TimeoutError, withTimeout } from '../src/utils/timeout.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => { resolve = () => r(); });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs calls with the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const log: string[] = [];

    const first = mutex.runExclusive('a', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = mutex.runExclusive('a', async () => { log.push('second'); });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('does not hold other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.runExclusive('a', () => gate.promise);

    await expect(mutex.runExclusive('b', async () => 'b done')).resolves.toBe('b done');
    expect(mutex.isLocked('a')).toBe(true);
    gate.resolve();
    await blocked;
  });

  it('releases the key when a call fails', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('a', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    await expect(mutex.runExclusive('a', async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('a')).toBe(false);
  });
});

describe('withTimeout', () => {
  it('returns the result of a fast call', async () => {
    await expect(withTimeout(1000, async () => 'ok')).resolves.toBe('ok');
  });

  it('aborts the signal and rejects when the deadline passes', async () => {
    let signal: AbortSignal | undefined;
    const err: unknown = await withTimeout(10, (s) => {
      signal = s;
      return new Promise<string>(() => {});
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ timeoutMs: 10, message: 'Timed out after 10ms' });
    expect(signal?.aborted).toBe(true);
  });

  it('passes through errors from the call', async () => {
    await expect(withTimeout(1000, async () => { throw new Error('inner'); })).rejects.toThrow('inner');
  });
});
