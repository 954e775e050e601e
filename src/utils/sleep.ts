/**
 * Cancellable wait
 *
 * Resolves after `ms`, or rejects with CancelledError as soon as the
 * signal aborts, so Ctrl+C interrupts a pending backoff or poll delay
 * immediately.
 */

import { cancelledFrom } from '../errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledFrom(signal));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(cancelledFrom(signal));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
