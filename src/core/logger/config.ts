/**
 * Logger configuration Zod schemas and validation.
 *
 * Configuration is optional: every field has a default, so an empty
 * object (or a missing file) yields a working setup.
 *
 * @example
 * ```yaml
 * # loglane.yml
 * level: warning
 * file: logs/app_logs.txt
 * maxSize: 5mb
 * maxFiles: 3
 * bufferSize: 25
 * flushInterval: 5000
 * ```
 */
import { readFile } from 'node:fs/promises';

import { attempt } from '@logosdx/utils';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'critical']);

/**
 * File size pattern (e.g., '5mb', '100kb').
 */
const FileSizeSchema = z
    .string()
    .regex(/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i, 'Invalid file size format (e.g., "5mb")');

/**
 * Complete logger configuration schema.
 */
export const LoggerConfigSchema = z.object({
    level: LogLevelSchema.default('info'),
    file: z.string().min(1, 'Log file path is required').default('logs/app_logs.txt'),
    maxSize: FileSizeSchema.default('5mb'),
    maxFiles: z.number().int().min(1).default(3),
    bufferSize: z.number().int().min(1).default(25),
    flushInterval: z.number().int().min(1).default(5000),
    maxStackFrames: z.number().int().min(0).default(10),
    caller: z.string().min(1).default('app'),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

/**
 * Validated logger configuration.
 *
 * - level: minimum level written
 * - file: current log file, relative to the logger root
 * - maxSize: rotate when the current file grows past this
 * - maxFiles: archives kept by rotation
 * - bufferSize: lines buffered before a flush
 * - flushInterval: milliseconds between time-based flushes
 * - maxStackFrames: frames kept in a stack trace
 * - caller: caller id used when a call names none
 */
export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

/**
 * Logger configuration as written by users.
 */
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when logger configuration validation fails.
 */
export class LoggerConfigError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'LoggerConfigError';

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse and validate logger configuration, filling in defaults.
 *
 * @throws LoggerConfigError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseLoggerConfig({ level: 'warning' })
 * // config.maxSize === '5mb' (default)
 * ```
 */
export function parseLoggerConfig(input: unknown): LoggerConfig {

    const result = LoggerConfigSchema.safeParse(input ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new LoggerConfigError(
            firstIssue?.message ?? 'Logger config validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = parseLoggerConfig({});

/**
 * Load logger configuration from a YAML file.
 *
 * A missing file yields the defaults; an unreadable or invalid one
 * throws.
 *
 * @throws LoggerConfigError if the content is invalid
 *
 * @example
 * ```typescript
 * const [config, err] = await attempt(() => loadLoggerConfig('loglane.yml'))
 * if (err) {
 *     console.error(`Invalid logger config: ${err.message}`)
 * }
 * ```
 */
export async function loadLoggerConfig(filepath: string): Promise<LoggerConfig> {

    const [content, err] = await attempt(() => readFile(filepath, 'utf-8'));

    if (err) {

        if ('code' in err && err.code === 'ENOENT') {

            return { ...DEFAULT_LOGGER_CONFIG };

        }

        throw new Error(`Failed to read logger config: ${err.message}`);

    }

    const parsed: unknown = parseYaml(content);

    return parseLoggerConfig(parsed);

}
