/**
 * Winston Logger Configuration
 * Logs to stderr (stdout is reserved for rendered reports) and, when LOG_DIR is set, to files
 */

import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Custom log format for console output
 */
const consoleFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${stack}` : '';
    return `${timestamp} [${level}] ${message}${metaStr}${stackStr}`;
});

/**
 * Custom log format for file output (no colors)
 */
const fileFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${stack}` : '';
    return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}${stackStr}`;
});

function buildTransports(): winston.transport[] {
    const transports: winston.transport[] = [
        new winston.transports.Console({
            stderrLevels: LOG_LEVELS,
            format: combine(
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                consoleFormat
            ),
        }),
    ];

    const logDir = process.env.LOG_DIR?.trim();
    if (!logDir) {
        return transports;
    }

    const logsDir = path.resolve(process.cwd(), logDir);
    if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
    }

    transports.push(
        new winston.transports.File({
            filename: path.join(logsDir, 'app.log'),
            format: combine(
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                fileFormat
            ),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
        new winston.transports.File({
            filename: path.join(logsDir, 'error.log'),
            level: 'error',
            format: combine(
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                fileFormat
            ),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        })
    );

    return transports;
}

/**
 * Winston logger instance
 * - Console: colorized, timestamped, written to stderr
 * - File: plain text app.log / error.log under LOG_DIR
 */
const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT?.toLowerCase() === 'true',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
    ),
    transports: buildTransports(),
});

/**
 * Log a section header for visual separation
 */
export function logSection(title: string): void {
    const separator = '═'.repeat(60);
    logger.info(separator);
    logger.info(`  ${title.toUpperCase()}`);
    logger.info(separator);
}

/**
 * Log a success message with checkmark
 */
export function logSuccess(message: string): void {
    logger.info(`✓ ${message}`);
}

/**
 * Log a failure message with X
 */
export function logFailure(message: string): void {
    logger.error(`✗ ${message}`);
}

/**
 * Log a warning message
 */
export function logWarning(message: string): void {
    logger.warn(`⚠ ${message}`);
}

/**
 * Create a child logger with additional metadata
 */
export function createChildLogger(meta: Record<string, unknown>): winston.Logger {
    return logger.child(meta);
}

export { logger };
export default logger;
