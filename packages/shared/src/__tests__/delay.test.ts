import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { delay, withTimeout, AbortedError } from '../utils/delay.js';

describe('delay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the given time', async () => {
    let done = false;
    const pending = delay(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(delay(1000, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it('should reject when the signal aborts mid-wait', async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await expect(pending).rejects.toThrow('Operation aborted');
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the value when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'late')).resolves.toBe('ok');
  });

  it('should return the fallback once the timeout elapses', async () => {
    const never = new Promise<string>(() => {});
    const pending = withTimeout(never, 1000, 'late');
    await vi.advanceTimersByTimeAsync(1000);
    await expect(pending).resolves.toBe('late');
  });
});
