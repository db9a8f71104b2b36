import { RateLimiterAbortedError } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-based sleep. Rejects with RateLimiterAbortedError when the signal
 * fires before the timer does.
 */
export const sleep: Sleep = (ms, signal) => new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
        reject(new RateLimiterAbortedError());
        return;
    }

    const onAbort = () => {
        clearTimeout(timer);
        reject(new RateLimiterAbortedError());
    };

    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
});
