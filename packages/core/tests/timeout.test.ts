import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError, withTimeout } from '../src/index';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs without a deadline when none is given', async () => {
    await expect(withTimeout({ timeoutMs: undefined, label: 'Work', run: async () => 'done' })).resolves.toBe('done');
  });

  it('rejects and aborts the signal once the deadline passes', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout({
      timeoutMs: 50,
      label: 'Work',
      run: (signal) => {
        seen = signal;
        return new Promise<string>(() => {});
      }
    });
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('Work', 50));

    await vi.advanceTimersByTimeAsync(50);

    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('resolves when the work beats the deadline', async () => {
    await expect(withTimeout({ timeoutMs: 1_000, label: 'Work', run: async () => 7 })).resolves.toBe(7);
  });
});
