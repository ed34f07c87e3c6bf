import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, withTimeout, sleep } from '../../../src/utils/timing.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the value when the work finishes first', async () => {
    await expect(withTimeout(async () => 'done', 1000, 'work')).resolves.toBe('done');
  });

  it('should reject with TimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => undefined);

    const result = withTimeout(() => never, 500, 'MFA strategy "webhook"');
    const assertion = expect(result).rejects.toThrow(
      new TimeoutError('MFA strategy "webhook"', 500)
    );
    await vi.advanceTimersByTimeAsync(500);

    await assertion;
  });

  it('should propagate rejections from the work itself', async () => {
    const failing = async (): Promise<string> => {
      throw new Error('boom');
    };

    await expect(withTimeout(failing, 1000, 'work')).rejects.toThrow('boom');
  });

  it('should abort the signal handed to the work on timeout', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;

    const result = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      },
      100,
      'work'
    );
    const assertion = expect(result).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  it('should wait for aborted work to stop when a settle time is given', async () => {
    const order: string[] = [];

    const result = withTimeout(
      async (signal) => {
        await sleep(60);
        order.push(`work stopped, aborted=${signal.aborted}`);
        return 'late';
      },
      10,
      'work',
      1000
    );
    await result.catch(() => order.push('caller resumed'));

    expect(order).toEqual(['work stopped, aborted=true', 'caller resumed']);
  });
});

describe('sleep', () => {
  it('should return immediately for non-positive durations', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
    await expect(sleep(-5)).resolves.toBeUndefined();
  });
});
