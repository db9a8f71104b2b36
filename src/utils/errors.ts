/**
 * Standardized error classes for the scraper.
 */

export class ScraperError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends ScraperError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class ValidationError extends ScraperError {
    constructor(message: string, code = 'VALIDATION_ERROR') {
        super(message, code, { fatal: false });
    }
}

export class URLValidationError extends ValidationError {
    constructor(message: string) {
        super(message, 'URL_VALIDATION_ERROR');
    }
}

export class RateLimiterClosedError extends ScraperError {
    constructor(message = 'Rate limiter is closed') {
        super(message, 'RATE_LIMITER_CLOSED');
    }
}

export class RateLimiterAbortedError extends ScraperError {
    constructor(message = 'Token acquisition aborted') {
        super(message, 'RATE_LIMITER_ABORTED');
    }
}

export class FetchError extends ScraperError {
    constructor(message: string, public url: string, public status = 0) {
        super(message, 'FETCH_ERROR', { url, status });
    }
}
