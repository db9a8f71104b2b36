export * from './config';
export * from './modules/rate-limiter';
export * from './modules/performance';
export * from './modules/ad-record';
export * from './modules/serp';
export * from './modules/extractor';
export * from './modules/fetcher';
export * from './modules/exporter';
export { logger, configureLogging } from './modules/observability';
export * from './scraper';
export * from './types';
export * from './utils/errors';
export { sleep } from './utils/sleep';
export type { Sleep } from './utils/sleep';
