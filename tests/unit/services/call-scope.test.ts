import { describe, it, expect, vi, afterEach } from 'vitest';
import { CallScope } from '../../../src/services/call-scope.js';

describe('CallScope', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts its signal when the deadline passes', () => {
    vi.useFakeTimers();
    const scope = new CallScope(100);

    vi.advanceTimersByTime(99);
    expect(scope.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut).toBe(true);
    expect(scope.signal.reason).toBeInstanceOf(Error);
    expect(String(scope.signal.reason)).toBe('Error: Deadline of 100ms exceeded');
  });

  it('follows the caller signal without marking a timeout', () => {
    const parent = new AbortController();
    const scope = new CallScope(1000, parent.signal);

    parent.abort(new Error('client went away'));

    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut).toBe(false);
    scope.dispose();
  });

  it('starts aborted when the caller signal already is', () => {
    const parent = new AbortController();
    parent.abort();

    const scope = new CallScope(1000, parent.signal);

    expect(scope.signal.aborted).toBe(true);
  });

  it('stops the deadline on settle', () => {
    vi.useFakeTimers();
    const scope = new CallScope(100);

    scope.settle();
    vi.advanceTimersByTime(500);

    expect(scope.signal.aborted).toBe(false);
    expect(scope.timedOut).toBe(false);
  });

  it('unlinks the caller signal on dispose', () => {
    const parent = new AbortController();
    const scope = new CallScope(1000, parent.signal);

    scope.dispose();
    parent.abort();

    expect(scope.signal.aborted).toBe(false);
  });

  it('aborts on close', () => {
    const scope = new CallScope(1000);

    scope.close();

    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut).toBe(false);
  });

  it('treats a non-positive timeout as no deadline', () => {
    vi.useFakeTimers();
    const scope = new CallScope(0);

    vi.advanceTimersByTime(60_000);

    expect(scope.signal.aborted).toBe(false);
  });
});
