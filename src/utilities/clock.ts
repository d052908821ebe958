import { CancelledError } from '../errors/import-errors.js';

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or rejects with `CancelledError` when the signal aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number, signal?: AbortSignal) => new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Wait cancelled'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Wait cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  })
};
