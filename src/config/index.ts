import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { RateLimiterConfig } from '../modules/rate-limiter';

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

const httpUrl = (label: string) => z.string().refine((value) => {
    try {
        const url = new URL(value);
        return (url.protocol === 'http:' || url.protocol === 'https:') && url.host.length > 0;
    } catch {
        return false;
    }
}, (value) => ({ message: `Invalid ${label}: ${value}` }));

export const ProxySchema = z.object({
    enabled: z.boolean().default(false),
    urls: z.array(httpUrl('proxy URL')).default([]),
    rotation_interval: z.number().positive('rotation_interval must be positive').default(300),
    max_retries: z.number().int().positive('max_retries must be positive').default(3)
}).refine((proxy) => !proxy.enabled || proxy.urls.length > 0, {
    message: 'Proxy URLs required when enabled',
    path: ['urls']
});

export const LoggingSchema = z.object({
    level: z.preprocess(
        (value) => (typeof value === 'string' ? value.toUpperCase() : value),
        z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'])
    ).default('INFO'),
    format: z.enum(['text', 'json']).default('text'),
    file: z.string().min(1).nullable().default('scraper.log'),
    console: z.boolean().default(true)
});

export const TargetsSchema = z.object({
    keywords: z.array(z.string({ invalid_type_error: 'All keywords must be strings' }))
        .min(1, 'At least one keyword required'),
    locations: z.array(z.string({ invalid_type_error: 'All locations must be strings' }))
        .min(1, 'At least one location required')
});

export const ScrapingConfigSchema = z.object({
    proxy: ProxySchema.default({}),
    logging: LoggingSchema.default({}),
    targets: TargetsSchema.optional(),
    retry_limit: z.number().int().positive('retry_limit must be positive').default(3),
    timeout: z.number().positive('timeout must be positive').default(10),
    delay_range: z.tuple([z.number().nonnegative(), z.number().nonnegative()])
        .refine(([min, max]) => min <= max, 'Invalid delay range')
        .default([2, 5]),
    max_concurrent: z.number().int().positive().default(3),
    max_requests_per_window: z.number().int().positive().default(10),
    time_window: z.number().positive().default(60),
    min_delay: z.number().nonnegative().default(0.1),
    burst_size: z.number().int().nonnegative().default(3),
    monitor_window: z.number().int().positive().default(100),
    base_url: httpUrl('base URL').default('https://www.google.com'),
    output_dir: z.string().min(1).default('results'),
    user_agent: z.string().min(1).default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'
    )
});

export type ProxyConfig = z.infer<typeof ProxySchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type TargetsConfig = z.infer<typeof TargetsSchema>;
export type ScrapingConfig = z.infer<typeof ScrapingConfigSchema>;
export type ScrapingConfigInput = z.input<typeof ScrapingConfigSchema>;

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map((issue) => {
        const where = issue.path.join('.');
        return where ? `${where}: ${issue.message}` : issue.message;
    });

/**
 * Validate a raw (already parsed) config object. Throws immediately if any
 * value is missing or invalid.
 */
export function parseConfig(raw: unknown): ScrapingConfig {
    const result = ScrapingConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, issues);
    }
    return result.data;
}

export function parseTargets(raw: unknown): TargetsConfig {
    const result = TargetsSchema.safeParse(raw);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigurationError(`Invalid targets:\n  - ${issues.join('\n  - ')}`, issues);
    }
    return result.data;
}

/**
 * Load configuration from a YAML file. YAML syntax errors are rethrown as
 * js-yaml's YAMLException.
 */
export const loadConfig = (configPath: string = DEFAULT_CONFIG_PATH): ScrapingConfig => {
    const resolved = path.resolve(configPath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigurationError(`Config file not found: ${resolved}`);
    }

    const document = yaml.load(fs.readFileSync(resolved, 'utf8'));
    if (document === null || typeof document !== 'object' || Array.isArray(document)) {
        throw new ConfigurationError('Invalid YAML format: must be a mapping');
    }

    return parseConfig(document);
};

export const ensureOutputDir = (config: ScrapingConfig): string => {
    const dir = path.resolve(config.output_dir);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
};

export const toRateLimiterConfig = (config: ScrapingConfig): Partial<RateLimiterConfig> => ({
    maxRequests: config.max_requests_per_window,
    timeWindow: config.time_window,
    minDelay: config.min_delay,
    burstSize: config.burst_size
});
