import { performance } from 'perf_hooks';
import { Mutex, MutexInterface } from 'async-mutex';
import type { Logger } from 'winston';
import { logger as defaultLogger } from '../observability';
import { ConfigurationError, RateLimiterAbortedError, RateLimiterClosedError } from '../../utils/errors';
import { sleep as defaultSleep, Sleep } from '../../utils/sleep';

export interface RateLimiterConfig {
    /** Tokens replenished per window. */
    readonly maxRequests: number;
    /** Window length in seconds. */
    readonly timeWindow: number;
    /** Floor, in seconds, on the wait between grants once the bucket is empty. */
    readonly minDelay: number;
    /** Extra capacity above maxRequests. */
    readonly burstSize: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = Object.freeze({
    maxRequests: 10,
    timeWindow: 60,
    minDelay: 0.1,
    burstSize: 3
});

export const DEFAULT_HISTORY_MAX_AGE = 3600;

/**
 * Build a validated, frozen limiter config. Throws before anything is
 * constructed if a field is out of range.
 */
export function createRateLimiterConfig(overrides: Partial<RateLimiterConfig> = {}): RateLimiterConfig {
    const config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...overrides };

    if (!Number.isInteger(config.maxRequests) || config.maxRequests <= 0) {
        throw new ConfigurationError('maxRequests must be a positive integer');
    }
    if (!Number.isFinite(config.timeWindow) || config.timeWindow <= 0) {
        throw new ConfigurationError('timeWindow must be positive');
    }
    if (!Number.isFinite(config.minDelay) || config.minDelay < 0) {
        throw new ConfigurationError('minDelay cannot be negative');
    }
    if (!Number.isInteger(config.burstSize) || config.burstSize < 0) {
        throw new ConfigurationError('burstSize cannot be negative');
    }

    return Object.freeze(config);
}

export interface RateLimiterOptions {
    /** Monotonic clock in milliseconds. */
    clock?: () => number;
    sleep?: Sleep;
    logger?: Logger;
}

/**
 * Async token bucket. Starts with maxRequests tokens, refills continuously at
 * maxRequests / timeWindow tokens per second up to maxRequests + burstSize.
 * Refill, wait, decrement and history write run as one section under a mutex.
 */
export class RateLimiter {
    readonly config: RateLimiterConfig;

    private _tokens: number;
    private lastRefill: number;
    private requestHistory = new Map<string, number>();
    private _closed = false;
    private readonly lock = new Mutex();
    private readonly clock: () => number;
    private readonly sleep: Sleep;
    private readonly logger: Logger;

    constructor(config: Partial<RateLimiterConfig> = {}, options: RateLimiterOptions = {}) {
        this.config = createRateLimiterConfig(config);
        this.clock = options.clock ?? (() => performance.now());
        this.sleep = options.sleep ?? defaultSleep;
        this.logger = options.logger ?? defaultLogger;
        this._tokens = this.config.maxRequests;
        this.lastRefill = this.clock();
    }

    get tokens(): number {
        return this._tokens;
    }

    get closed(): boolean {
        return this._closed;
    }

    get historySize(): number {
        return this.requestHistory.size;
    }

    get capacity(): number {
        return this.config.maxRequests + this.config.burstSize;
    }

    /** Tokens generated per second. */
    get refillRate(): number {
        return this.config.maxRequests / this.config.timeWindow;
    }

    /**
     * Wait for a token. Rejects with RateLimiterClosedError after close(), and
     * with RateLimiterAbortedError if `signal` fires before the token is taken;
     * an aborted call never consumes a token.
     */
    async acquire(key?: string, signal?: AbortSignal): Promise<void> {
        this.assertOpen();
        if (signal?.aborted) {
            throw new RateLimiterAbortedError();
        }

        try {
            const release = await this.lockOrAbort(signal);
            try {
                this.assertOpen();
                if (signal?.aborted) {
                    throw new RateLimiterAbortedError();
                }

                this.refillTokens();
                while (this._tokens <= 0) {
                    await this.sleep(this.calculateDelay() * 1000, signal);
                    this.refillTokens();
                }

                // Clock first: a fault here must leave tokens and history as they were
                const now = this.clock();
                this._tokens -= 1;
                if (key !== undefined) {
                    this.requestHistory.set(key, now);
                }
            } finally {
                release();
            }
        } catch (error) {
            if (!(error instanceof RateLimiterClosedError) && !(error instanceof RateLimiterAbortedError)) {
                this.logger.error(`Error acquiring token: ${errorMessage(error)}`);
            }
            throw error;
        }
    }

    /**
     * Acquire a token, then run `fn`.
     */
    async schedule<T>(fn: () => Promise<T>, key?: string, signal?: AbortSignal): Promise<T> {
        await this.acquire(key, signal);
        return fn();
    }

    /**
     * Current token count including what has accrued since the last refill.
     * Does not mutate state.
     */
    availableTokens(): number {
        try {
            const elapsed = (this.clock() - this.lastRefill) / 1000;
            return Math.min(this.capacity, this._tokens + elapsed * this.refillRate);
        } catch (error) {
            this.logger.error(`Error getting available tokens: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Number of keys granted within the last `windowSeconds`. Omitted or 0
     * means the configured time window.
     */
    getRequestCount(windowSeconds?: number): number {
        const seconds = windowSeconds || this.config.timeWindow;
        try {
            const now = this.clock();
            let count = 0;
            for (const instant of this.requestHistory.values()) {
                if ((now - instant) / 1000 <= seconds) count++;
            }
            return count;
        } catch (error) {
            this.logger.error(`Error getting request count: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Drop history entries older than `maxAge` seconds.
     */
    cleanupHistory(maxAge: number = DEFAULT_HISTORY_MAX_AGE): void {
        try {
            const now = this.clock();
            for (const [key, instant] of this.requestHistory) {
                if ((now - instant) / 1000 > maxAge) {
                    this.requestHistory.delete(key);
                }
            }
        } catch (error) {
            this.logger.error(`Error cleaning history: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Idempotent. Waits for any in-flight admission, prunes stale history and
     * marks the limiter closed.
     */
    async close(): Promise<void> {
        if (this._closed) return;

        try {
            await this.lock.runExclusive(() => {
                if (this._closed) return;
                this.cleanupHistory();
                this._closed = true;
            });
            this.logger.debug('Rate limiter closed');
        } catch (error) {
            this.logger.error(`Error closing rate limiter: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Take the mutex, or reject as soon as `signal` aborts while queued. A lock
     * granted after the abort is released straight away.
     */
    private lockOrAbort(signal?: AbortSignal): Promise<MutexInterface.Releaser> {
        const locked = this.lock.acquire();
        if (!signal) return locked;

        return new Promise<MutexInterface.Releaser>((resolve, reject) => {
            const onAbort = () => reject(new RateLimiterAbortedError());
            signal.addEventListener('abort', onAbort, { once: true });

            void locked.then((release) => {
                signal.removeEventListener('abort', onAbort);
                if (signal.aborted) {
                    release();
                    reject(new RateLimiterAbortedError());
                    return;
                }
                resolve(release);
            }, (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            });
        });
    }

    private assertOpen(): void {
        if (this._closed) {
            throw new RateLimiterClosedError();
        }
    }

    private refillTokens(): void {
        try {
            const now = this.clock();
            const elapsed = (now - this.lastRefill) / 1000;
            this._tokens = Math.min(this.capacity, this._tokens + elapsed * this.refillRate);
            this.lastRefill = now;
        } catch (error) {
            this.logger.error(`Error refilling tokens: ${errorMessage(error)}`);
            throw error;
        }
    }

    /** Seconds until one token is generated, floored by minDelay. */
    private calculateDelay(): number {
        return Math.max(1 / this.refillRate, this.config.minDelay);
    }
}

const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
