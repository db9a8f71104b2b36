import { performance } from 'perf_hooks';
import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { ScrapingConfig, TargetsConfig, toRateLimiterConfig } from '../config';
import { AdRecord } from '../modules/ad-record';
import { AdExporter } from '../modules/exporter';
import { ContactExtractor } from '../modules/extractor';
import { HttpFetcher } from '../modules/fetcher';
import { logger as defaultLogger } from '../modules/observability';
import { PerformanceMonitor } from '../modules/performance';
import { RateLimiter } from '../modules/rate-limiter';
import { SerpParser } from '../modules/serp';
import { FetchResult, PageFetcher, SearchTarget, SponsoredAd } from '../types';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';

export interface ScraperDeps {
    fetcher?: PageFetcher;
    limiter?: RateLimiter;
    monitor?: PerformanceMonitor;
    exporter?: AdExporter;
    logger?: Logger;
    sleep?: Sleep;
    random?: () => number;
}

export interface RunResult {
    records: AdRecord[];
    outputPath: string;
}

export const expandTargets = (targets: TargetsConfig): SearchTarget[] =>
    targets.keywords.flatMap((keyword) => targets.locations.map((location) => ({ keyword, location })));

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Search -> sponsored ads -> landing pages -> contact records.
 * Every outbound request waits on the rate limiter and is reported to the
 * performance monitor. Individual failures are logged and skipped.
 */
export class AdsScraper {
    readonly limiter: RateLimiter;
    readonly monitor: PerformanceMonitor;

    private fetcher: PageFetcher;
    private exporter: AdExporter;
    private logger: Logger;
    private sleep: Sleep;
    private random: () => number;

    constructor(private readonly config: ScrapingConfig, deps: ScraperDeps = {}) {
        this.fetcher = deps.fetcher ?? new HttpFetcher(config);
        this.limiter = deps.limiter ?? new RateLimiter(toRateLimiterConfig(config));
        this.monitor = deps.monitor ?? new PerformanceMonitor(config.monitor_window);
        this.exporter = deps.exporter ?? new AdExporter(config.output_dir);
        this.logger = deps.logger ?? defaultLogger;
        this.sleep = deps.sleep ?? defaultSleep;
        this.random = deps.random ?? Math.random;
    }

    async scrape(targets: TargetsConfig): Promise<AdRecord[]> {
        const limit = pLimit(this.config.max_concurrent);
        const batches = await Promise.all(
            expandTargets(targets).map((target) => limit(() => this.scrapeTarget(target)))
        );
        return batches.flat();
    }

    /**
     * Scrape, export to CSV and close the limiter, even when scraping fails.
     */
    async run(targets: TargetsConfig): Promise<RunResult> {
        try {
            const records = await this.scrape(targets);
            const outputPath = await this.exporter.write(records);
            this.logger.info(`Saved ${records.length} ads to ${outputPath}`);
            this.logger.info(`Performance: ${JSON.stringify(this.monitor.getStatsDict())}`);
            return { records, outputPath };
        } finally {
            await this.limiter.close();
        }
    }

    async scrapeTarget(target: SearchTarget): Promise<AdRecord[]> {
        const searchUrl = SerpParser.buildSearchUrl(this.config.base_url, target.keyword, target.location);
        this.logger.info(`Searching "${target.keyword}" in ${target.location}`);

        let serp: FetchResult;
        try {
            serp = await this.timedFetch(searchUrl, `${target.keyword}|${target.location}`);
        } catch (error) {
            this.logger.warn(`Search failed for "${target.keyword}" / ${target.location}: ${describeError(error)}`);
            return [];
        }

        const ads = SerpParser.parseAds(serp.data, serp.finalUrl);
        this.logger.info(`Found ${ads.length} sponsored ads for "${target.keyword}" / ${target.location}`);

        const records: AdRecord[] = [];
        for (const ad of ads) {
            await this.politeDelay();
            const record = await this.visitAd(ad, target);
            if (record) records.push(record);
        }
        return records;
    }

    async visitAd(ad: SponsoredAd, target: SearchTarget): Promise<AdRecord | null> {
        try {
            const page = await this.timedFetch(ad.url, new URL(ad.url).host);
            const contact = ContactExtractor.extract(page.data, page.finalUrl);

            return new AdRecord({
                keyword: target.keyword,
                location: target.location,
                website_url: ad.url,
                title: ad.title,
                description: ad.description,
                phone_number: contact.phones[0],
                email: contact.emails[0],
                price: ad.price,
                social_links: contact.social_links,
                meta_tags: contact.meta_tags,
                ad_position: ad.position
            });
        } catch (error) {
            this.logger.warn(`Skipping ad "${ad.title}" (${ad.url}): ${describeError(error)}`);
            return null;
        }
    }

    /**
     * Wait for admission, fetch, and record duration (seconds) and outcome.
     */
    private async timedFetch(url: string, key: string): Promise<FetchResult> {
        await this.limiter.acquire(key);

        const start = performance.now();
        try {
            const result = await this.fetcher.fetch(url);
            this.monitor.addScrape((performance.now() - start) / 1000, true);
            return result;
        } catch (error) {
            this.monitor.addScrape((performance.now() - start) / 1000, false);
            throw error;
        }
    }

    private async politeDelay(): Promise<void> {
        const [min, max] = this.config.delay_range;
        const seconds = min + (max - min) * this.random();
        if (seconds > 0) {
            await this.sleep(seconds * 1000);
        }
    }
}
