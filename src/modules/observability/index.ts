import path from 'path';
import winston from 'winston';
import 'winston-daily-rotate-file';
import type { LoggingConfig } from '../../config';

export type LogLevelName = LoggingConfig['level'];

const LEVELS: Record<LogLevelName, string> = {
    DEBUG: 'debug',
    INFO: 'info',
    WARNING: 'warn',
    ERROR: 'error',
    CRITICAL: 'error'
};

export const toWinstonLevel = (level: LogLevelName): string => LEVELS[level];

/**
 * scraper.log -> scraper-%DATE%.log, so the rotating transport keeps the
 * configured base name.
 */
export const rotatingFilename = (file: string): string => {
    const ext = path.extname(file);
    const base = ext ? file.slice(0, -ext.length) : file;
    return `${base}-%DATE%${ext || '.log'}`;
};

const textFormat = winston.format.printf((info) => {
    const { timestamp, level, message } = info;
    return `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`;
});

const buildFormat = (format: LoggingConfig['format']): winston.Logform.Format =>
    winston.format.combine(
        winston.format.timestamp(),
        format === 'json' ? winston.format.json() : textFormat
    );

export const logger: winston.Logger = winston.createLogger({
    level: 'info',
    format: buildFormat('text'),
    silent: process.env.NODE_ENV === 'test',
    transports: [new winston.transports.Console()]
});

export const buildTransports = (config: LoggingConfig): winston.transport[] => {
    const transports: winston.transport[] = [];

    if (config.file) {
        transports.push(new winston.transports.DailyRotateFile({
            filename: rotatingFilename(config.file),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d'
        }));
    }
    if (config.console) {
        transports.push(new winston.transports.Console());
    }

    return transports;
};

/**
 * Reconfigure the shared logger from the `logging` section of the config.
 * Existing transports are closed and replaced.
 */
export function configureLogging(config: LoggingConfig, target: winston.Logger = logger): winston.Logger {
    target.configure({
        level: toWinstonLevel(config.level),
        format: buildFormat(config.format),
        silent: target.silent,
        transports: buildTransports(config)
    });
    return target;
}
