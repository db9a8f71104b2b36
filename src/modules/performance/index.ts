import { ConfigurationError } from '../../utils/errors';

export interface PerformanceStats {
    readonly avgTime: number;
    readonly minTime: number;
    readonly maxTime: number;
    /** Fraction (0-1) of successes within the retained window. */
    readonly successRate: number;
    readonly totalRequests: number;
    readonly successfulRequests: number;
    /** Lifetime requests over elapsed session minutes (at least one minute). */
    readonly requestsPerMinute: number;
    readonly startTime: Date;
}

export interface PerformanceSummary {
    avgTime: number;
    minTime: number;
    maxTime: number;
    /** Percentage, 1 decimal. */
    successRate: number;
    totalRequests: number;
    successfulRequests: number;
    requestsPerMinute: number;
    uptimeMinutes: number;
}

export const DEFAULT_WINDOW_SIZE = 100;

const round = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
};

/**
 * Rolling-window accounting of scrape durations (seconds) and outcomes.
 * Durations and successes are evicted together once the window is full;
 * the request counters cover the whole session.
 */
export class PerformanceMonitor {
    readonly windowSize: number;

    private scrapeTimes: number[] = [];
    private successHistory: boolean[] = [];
    private totalRequests = 0;
    private successfulRequests = 0;
    private startTime: number;
    private lastStats: PerformanceStats | null = null;

    constructor(windowSize: number = DEFAULT_WINDOW_SIZE, private readonly now: () => number = Date.now) {
        if (!Number.isInteger(windowSize) || windowSize <= 0) {
            throw new ConfigurationError('windowSize must be a positive integer');
        }
        this.windowSize = windowSize;
        this.startTime = this.now();
    }

    addScrape(duration: number, success: boolean): void {
        this.scrapeTimes.push(duration);
        this.successHistory.push(success);
        if (this.scrapeTimes.length > this.windowSize) {
            this.scrapeTimes.shift();
            this.successHistory.shift();
        }

        this.totalRequests++;
        if (success) {
            this.successfulRequests++;
        }
        this.lastStats = null;
    }

    getStats(): PerformanceStats {
        if (this.lastStats) {
            return this.lastStats;
        }

        if (this.scrapeTimes.length === 0) {
            return Object.freeze({
                avgTime: 0,
                minTime: 0,
                maxTime: 0,
                successRate: 0,
                totalRequests: 0,
                successfulRequests: 0,
                requestsPerMinute: 0,
                startTime: new Date(this.startTime)
            });
        }

        let total = 0;
        let minTime = Infinity;
        let maxTime = -Infinity;
        for (const duration of this.scrapeTimes) {
            total += duration;
            if (duration < minTime) minTime = duration;
            if (duration > maxTime) maxTime = duration;
        }
        const successes = this.successHistory.filter(Boolean).length;
        const elapsedMinutes = (this.now() - this.startTime) / 60000;

        const stats: PerformanceStats = Object.freeze({
            avgTime: total / this.scrapeTimes.length,
            minTime,
            maxTime,
            successRate: successes / this.successHistory.length,
            totalRequests: this.totalRequests,
            successfulRequests: this.successfulRequests,
            requestsPerMinute: this.totalRequests / Math.max(1, elapsedMinutes),
            startTime: new Date(this.startTime)
        });

        this.lastStats = stats;
        return stats;
    }

    /**
     * Display-ready summary. `uptimeMinutes` is computed on every call.
     */
    getStatsDict(): PerformanceSummary {
        const stats = this.getStats();
        return {
            avgTime: round(stats.avgTime, 2),
            minTime: round(stats.minTime, 2),
            maxTime: round(stats.maxTime, 2),
            successRate: round(stats.successRate * 100, 1),
            totalRequests: stats.totalRequests,
            successfulRequests: stats.successfulRequests,
            requestsPerMinute: round(stats.requestsPerMinute, 2),
            uptimeMinutes: round((this.now() - stats.startTime.getTime()) / 60000, 1)
        };
    }

    reset(): void {
        this.scrapeTimes = [];
        this.successHistory = [];
        this.totalRequests = 0;
        this.successfulRequests = 0;
        this.startTime = this.now();
        this.lastStats = null;
    }
}
