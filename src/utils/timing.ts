import { setTimeout as delay } from 'timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms: number) => {
  if (ms > 0) {
    await delay(ms);
  }
};

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run work against a deadline. The work receives a signal that is aborted
 * with the TimeoutError when the deadline passes.
 *
 * With `settleMs` the caller waits up to that long for aborted work to stop
 * before the TimeoutError is rethrown, so the next step never overlaps it.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  settleMs: number = 0
): Promise<T> {
  const controller = new AbortController();
  const running = work(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, ms);
      controller.abort(error);
      reject(error);
    }, ms);
  });

  try {
    return await Promise.race([running, timeout]);
  } catch (error) {
    if (controller.signal.aborted && settleMs > 0) {
      const settled = new AbortController();
      await Promise.race([
        running.then(noop, noop).finally(() => settled.abort()),
        delay(settleMs, undefined, { signal: settled.signal }).catch(noop),
      ]);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

function noop(): void {}

/**
 * fetch() with an abort deadline, optionally tied to a caller's signal
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  signal?.throwIfAborted();

  const controller = new AbortController();
  const onAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}
