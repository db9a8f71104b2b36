import { PerformanceMonitor } from '../src/modules/performance';
import { ConfigurationError } from '../src/utils/errors';

const makeMonitor = (windowSize?: number) => {
    const time = { now: 0 };
    const monitor = new PerformanceMonitor(windowSize, () => time.now);
    return { monitor, time };
};

describe('PerformanceMonitor', () => {
    test('computes window statistics from recorded scrapes', () => {
        const { monitor } = makeMonitor();
        monitor.addScrape(1.0, true);
        monitor.addScrape(3.0, false);
        monitor.addScrape(2.0, true);

        const stats = monitor.getStats();
        expect(stats.avgTime).toBe(2.0);
        expect(stats.minTime).toBe(1.0);
        expect(stats.maxTime).toBe(3.0);
        expect(stats.successRate).toBeCloseTo(0.667, 3);
        expect(stats.totalRequests).toBe(3);
        expect(stats.successfulRequests).toBe(2);
    });

    test('evicts the oldest samples once the window is full, counters keep the lifetime totals', () => {
        const { monitor } = makeMonitor(3);
        monitor.addScrape(10, true);
        monitor.addScrape(1, true);
        monitor.addScrape(2, false);
        monitor.addScrape(3, true);

        const stats = monitor.getStats();
        expect(stats.avgTime).toBe(2);
        expect(stats.minTime).toBe(1);
        expect(stats.maxTime).toBe(3);
        expect(stats.successRate).toBeCloseTo(2 / 3, 10);
        expect(stats.totalRequests).toBe(4);
        expect(stats.successfulRequests).toBe(3);
    });

    test('success rate reflects the window while throughput reflects the session', () => {
        const { monitor, time } = makeMonitor(2);
        monitor.addScrape(1, true);
        monitor.addScrape(1, true);
        monitor.addScrape(1, false);
        monitor.addScrape(1, false);
        time.now = 2 * 60 * 1000;

        const stats = monitor.getStats();
        expect(stats.successRate).toBe(0);
        expect(stats.successfulRequests).toBe(2);
        expect(stats.requestsPerMinute).toBe(2);
    });

    test('requests per minute never divides by less than one minute', () => {
        const { monitor } = makeMonitor();
        monitor.addScrape(0.5, true);
        monitor.addScrape(0.5, true);
        monitor.addScrape(0.5, true);

        expect(monitor.getStats().requestsPerMinute).toBe(3);
    });

    test('an empty monitor reports zeros and the session start', () => {
        const { monitor } = makeMonitor();
        const stats = monitor.getStats();

        expect(stats).toEqual({
            avgTime: 0,
            minTime: 0,
            maxTime: 0,
            successRate: 0,
            totalRequests: 0,
            successfulRequests: 0,
            requestsPerMinute: 0,
            startTime: new Date(0)
        });
    });

    test('memoizes the snapshot until the next sample', () => {
        const { monitor } = makeMonitor();
        monitor.addScrape(1, true);

        const first = monitor.getStats();
        const second = monitor.getStats();
        expect(second).toBe(first);
        expect(Object.isFrozen(first)).toBe(true);

        monitor.addScrape(2, false);
        const third = monitor.getStats();
        expect(third).not.toBe(first);
        expect(third.totalRequests).toBe(2);
    });

    test('getStatsDict rounds for display', () => {
        const { monitor, time } = makeMonitor();
        monitor.addScrape(1.25, true);
        monitor.addScrape(2.5, true);
        monitor.addScrape(3.0, false);
        time.now = 90 * 1000;

        expect(monitor.getStatsDict()).toEqual({
            avgTime: 2.25,
            minTime: 1.25,
            maxTime: 3,
            successRate: 66.7,
            totalRequests: 3,
            successfulRequests: 2,
            requestsPerMinute: 2,
            uptimeMinutes: 1.5
        });
    });

    test('uptime is computed on every call even when the snapshot is cached', () => {
        const { monitor, time } = makeMonitor();
        monitor.addScrape(1, true);
        monitor.addScrape(1, true);
        monitor.addScrape(1, true);

        time.now = 60 * 1000;
        const first = monitor.getStatsDict();
        time.now = 120 * 1000;
        const second = monitor.getStatsDict();

        expect(first.uptimeMinutes).toBe(1);
        expect(second.uptimeMinutes).toBe(2);
        expect(second.requestsPerMinute).toBe(first.requestsPerMinute);
    });

    test('reset restores the zero baseline and restarts the session clock', () => {
        const { monitor, time } = makeMonitor();
        monitor.addScrape(1, true);
        monitor.addScrape(4, false);
        monitor.getStats();

        time.now = 5 * 60 * 1000;
        monitor.reset();

        expect(monitor.getStatsDict()).toEqual({
            avgTime: 0,
            minTime: 0,
            maxTime: 0,
            successRate: 0,
            totalRequests: 0,
            successfulRequests: 0,
            requestsPerMinute: 0,
            uptimeMinutes: 0
        });
        expect(monitor.getStats().startTime.getTime()).toBe(5 * 60 * 1000);
    });

    test('handles a window far larger than the argument limit of a function call', () => {
        const size = 300_000;
        const { monitor } = makeMonitor(size);
        for (let i = 0; i < size; i++) {
            monitor.addScrape(i === 0 ? 0.5 : i === size - 1 ? 9 : 2, true);
        }

        const stats = monitor.getStats();
        expect(stats.minTime).toBe(0.5);
        expect(stats.maxTime).toBe(9);
        expect(stats.totalRequests).toBe(size);
        expect(stats.successRate).toBe(1);
    });

    test.each([0, -5, 2.5])('rejects a window size of %p', (size) => {
        expect(() => new PerformanceMonitor(size)).toThrow(ConfigurationError);
    });

    test('defaults to a window of 100 samples', () => {
        expect(new PerformanceMonitor().windowSize).toBe(100);
    });
});
