import { CancelledError } from '../types/errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

// setTimeout-based wait that rejects with CancelledError when the signal fires
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) return Promise.reject(new CancelledError());
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
