import axios, { AxiosInstance, AxiosProxyConfig } from 'axios';
import * as rax from 'retry-axios';
import type { ProxyConfig, ScrapingConfig } from '../../config';
import { FetchResult, PageFetcher } from '../../types';
import { FetchError } from '../../utils/errors';
import { logger } from '../observability';

// Statuses that usually mean the exit IP is blocked; worth another proxy
const PROXY_BLOCK_STATUSES = [403, 407, 429];

export const toAxiosProxy = (proxyUrl: string): AxiosProxyConfig => {
    const url = new URL(proxyUrl);
    const protocol = url.protocol.replace(/:$/, '');
    const proxy: AxiosProxyConfig = {
        protocol,
        host: url.hostname,
        port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80
    };
    if (url.username) {
        proxy.auth = {
            username: decodeURIComponent(url.username),
            password: decodeURIComponent(url.password)
        };
    }
    return proxy;
};

/**
 * Round-robin over the configured proxies. Moves on every
 * `rotationInterval` seconds, or immediately via next().
 */
export class ProxyRotator {
    private index = 0;
    private rotatedAt: number;

    constructor(
        private readonly urls: string[],
        private readonly rotationInterval: number,
        private readonly now: () => number = Date.now
    ) {
        if (urls.length === 0) {
            throw new Error('ProxyRotator needs at least one proxy URL');
        }
        this.rotatedAt = this.now();
    }

    static fromConfig(config: ProxyConfig, now?: () => number): ProxyRotator | null {
        if (!config.enabled) return null;
        return new ProxyRotator(config.urls, config.rotation_interval, now);
    }

    current(): string {
        if ((this.now() - this.rotatedAt) / 1000 >= this.rotationInterval) {
            this.next();
        }
        return this.urls[this.index];
    }

    next(): string {
        this.index = (this.index + 1) % this.urls.length;
        this.rotatedAt = this.now();
        return this.urls[this.index];
    }
}

export class HttpFetcher implements PageFetcher {
    private client: AxiosInstance;
    private proxies: ProxyRotator | null;
    private proxyAttempts: number;

    constructor(config: ScrapingConfig, proxies: ProxyRotator | null = ProxyRotator.fromConfig(config.proxy)) {
        this.client = axios.create({
            timeout: config.timeout * 1000,
            responseType: 'text',
            headers: {
                'User-Agent': config.user_agent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9'
            }
        });

        this.client.defaults.raxConfig = {
            instance: this.client,
            retry: config.retry_limit,
            noResponseRetries: config.retry_limit,
            httpMethodsToRetry: ['GET', 'HEAD', 'OPTIONS'],
            statusCodesToRetry: [[429, 429], [500, 599]],
            backoffType: 'exponential'
        };
        rax.attach(this.client);

        this.proxies = proxies;
        this.proxyAttempts = proxies ? config.proxy.max_retries : 1;
    }

    async fetch(url: string): Promise<FetchResult> {
        let lastError: unknown;
        let lastStatus = 0;

        for (let attempt = 1; attempt <= this.proxyAttempts; attempt++) {
            const proxyUrl = this.proxies?.current();

            try {
                const response = await this.client.get<string>(url, {
                    proxy: proxyUrl ? toAxiosProxy(proxyUrl) : undefined
                });
                const responseUrl: unknown = response.request?.res?.responseUrl;

                return {
                    url,
                    status: response.status,
                    data: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                    finalUrl: typeof responseUrl === 'string' ? responseUrl : url
                };
            } catch (error) {
                lastError = error;
                lastStatus = axios.isAxiosError(error) ? error.response?.status ?? 0 : 0;

                if (lastStatus && !PROXY_BLOCK_STATUSES.includes(lastStatus)) break;
                if (!this.proxies) break;

                const nextProxy = this.proxies.next();
                logger.warn(`Fetch attempt ${attempt} for ${url} failed (status ${lastStatus}), rotating proxy to ${new URL(nextProxy).host}`);
            }
        }

        const reason = lastError instanceof Error ? lastError.message : String(lastError);
        throw new FetchError(`Fetch failed for ${url}: ${reason}`, url, lastStatus);
    }
}
