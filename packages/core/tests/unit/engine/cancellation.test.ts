import { describe, expect, it, vi } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts uncancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeUndefined();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('records the reason and throws CancellationError afterwards', () => {
    const token = new CancellationToken();
    token.cancel('Interrupted');
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('Interrupted');
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('Interrupted');
  });

  it('uses a default reason', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.reason).toBe('Run was cancelled');
  });

  it('runs callbacks once and ignores repeated cancels', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.onCancel(callback);
    token.cancel('first');
    token.cancel('second');
    expect(callback).toHaveBeenCalledTimes(1);
    expect(token.reason).toBe('first');
  });

  it('fires callbacks registered after cancellation immediately', () => {
    const token = new CancellationToken();
    token.cancel();
    const callback = vi.fn();
    token.onCancel(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('skips callbacks removed with offCancel', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.offCancel(callback);
    token.cancel();
    expect(callback).not.toHaveBeenCalled();
  });

  it('runs every callback and rethrows failures together', () => {
    const token = new CancellationToken();
    const after = vi.fn();
    token.onCancel(() => {
      throw new Error('boom');
    });
    token.onCancel(after);

    expect(() => token.cancel()).toThrow('Cancellation callbacks failed');
    expect(after).toHaveBeenCalledTimes(1);
    expect(token.isCancelled).toBe(true);
  });

  describe('sleep', () => {
    it('resolves true when the delay elapses', async () => {
      vi.useFakeTimers();
      try {
        const token = new CancellationToken();
        const done = token.sleep(100);
        await vi.advanceTimersByTimeAsync(100);
        await expect(done).resolves.toBe(true);
      } finally {
        vi.useRealTimers();
      }
    });

    it('resolves false as soon as the token is cancelled', async () => {
      const token = new CancellationToken();
      const done = token.sleep(60_000);
      token.cancel();
      await expect(done).resolves.toBe(false);
    });

    it('resolves false immediately on a cancelled token', async () => {
      const token = new CancellationToken();
      token.cancel();
      await expect(token.sleep(60_000)).resolves.toBe(false);
    });
  });
});
