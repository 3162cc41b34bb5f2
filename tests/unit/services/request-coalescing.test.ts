/**
 * Tests for request coalescing.
 */

import { describe, it, expect, vi } from 'vitest';
import { RequestCoalescer } from '../../../src/services/request-coalescing.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestCoalescer', () => {
  it('should execute function on first call', async () => {
    const coalescer = new RequestCoalescer<number>();
    const fn = vi.fn(async () => 42);

    const result = await coalescer.execute('key1', fn);

    expect(result).toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should coalesce concurrent identical requests', async () => {
    const coalescer = new RequestCoalescer<number>();
    let callCount = 0;

    const fn = vi.fn(async () => {
      callCount++;
      await new Promise((r) => setTimeout(r, 20));
      return callCount;
    });

    const results = await Promise.all([
      coalescer.execute('key1', fn),
      coalescer.execute('key1', fn),
      coalescer.execute('key1', fn),
      coalescer.execute('key1', fn),
      coalescer.execute('key1', fn),
    ]);

    expect(results).toEqual([1, 1, 1, 1, 1]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not coalesce different keys', async () => {
    const coalescer = new RequestCoalescer<number>();
    const fn = vi.fn(async () => 1);

    await Promise.all([
      coalescer.execute('key1', fn),
      coalescer.execute('key2', fn),
      coalescer.execute('key3', fn),
    ]);

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should run again once the first call has settled', async () => {
    const coalescer = new RequestCoalescer<number>();
    const fn = vi.fn(async () => 1);

    await coalescer.execute('key1', fn);
    await coalescer.execute('key1', fn);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should allow new requests after window expires', async () => {
    const coalescer = new RequestCoalescer<number>(10);
    const slow = deferred<number>();
    const first = vi.fn(() => slow.promise);
    const second = vi.fn(async () => 2);

    const pending = coalescer.execute('key1', first);
    await new Promise((r) => setTimeout(r, 20));

    await expect(coalescer.execute('key1', second)).resolves.toBe(2);
    expect(second).toHaveBeenCalledTimes(1);

    slow.resolve(1);
    await expect(pending).resolves.toBe(1);
  });

  it('should share rejections and release the key', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();
    const fn = vi.fn(() => gate.promise);

    const a = coalescer.execute('key1', fn);
    const b = coalescer.execute('key1', fn);
    gate.reject(new Error('upstream down'));

    await expect(a).rejects.toThrow('upstream down');
    await expect(b).rejects.toThrow('upstream down');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(coalescer.pendingCount).toBe(0);
  });

  it('should track pending count', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();

    const promise = coalescer.execute('key1', () => gate.promise);
    expect(coalescer.pendingCount).toBe(1);

    gate.resolve(1);
    await promise;
    expect(coalescer.pendingCount).toBe(0);
  });

  it('should clear all pending requests', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();

    const promise = coalescer.execute('key1', () => gate.promise);
    coalescer.clear();
    expect(coalescer.pendingCount).toBe(0);

    gate.resolve(1);
    await promise;
  });
});

describe('RequestCoalescer waiters', () => {
  it('should let one waiter leave without affecting the others', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();
    const shared: { signal?: AbortSignal } = {};
    const fn = vi.fn((signal: AbortSignal) => {
      shared.signal = signal;
      return gate.promise;
    });
    const leaving = new AbortController();

    const a = coalescer.execute('key1', fn, leaving.signal);
    const b = coalescer.execute('key1', fn);
    leaving.abort(new Error('gone'));

    await expect(a).rejects.toThrow('gone');
    expect(shared.signal?.aborted).toBe(false);

    gate.resolve(7);
    await expect(b).resolves.toBe(7);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should abort the shared call and release the key when every waiter leaves', async () => {
    const coalescer = new RequestCoalescer<number>();
    const signals: AbortSignal[] = [];
    const fn = vi.fn((signal: AbortSignal) => {
      signals.push(signal);
      return new Promise<number>((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    });
    const first = new AbortController();
    const second = new AbortController();

    const a = coalescer.execute('key1', fn, first.signal);
    const b = coalescer.execute('key1', fn, second.signal);
    first.abort(new Error('first left'));
    second.abort(new Error('second left'));

    await expect(a).rejects.toThrow('first left');
    await expect(b).rejects.toThrow('second left');
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
    expect(coalescer.pendingCount).toBe(0);
  });

  it('should reject at once for an already aborted signal', async () => {
    const coalescer = new RequestCoalescer<number>();
    const controller = new AbortController();
    controller.abort(new Error('too late'));

    await expect(coalescer.execute('key1', async () => 1, controller.signal)).rejects.toThrow('too late');
  });
});
