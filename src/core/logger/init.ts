/**
 * Logger Initialization
 *
 * Builds and starts a Logger from an optional YAML config file plus
 * inline overrides. Create one logger at startup and pass it to the
 * code that logs; stop it on shutdown to flush what is buffered.
 *
 * @example
 * ```typescript
 * // In the application entry point
 * const logger = await createLogger({
 *     root: process.cwd(),
 *     configFile: 'loglane.yml',
 *     config: { level: 'debug' },
 *     flushOnExit: true,
 * })
 *
 * const log = logger.child('Bootstrap')
 * log.info('Ready')
 * ```
 */
import { resolve } from 'node:path';

import { loadLoggerConfig, type LoggerConfigInput } from './config.js';
import { Logger, type LoggerOptions } from './logger.js';

/**
 * Options for createLogger.
 */
export interface CreateLoggerOptions extends LoggerOptions {

    /** YAML config file, relative to root. Inline `config` wins over it. */
    configFile?: string;

}

/**
 * Create and start a logger.
 *
 * @throws LoggerConfigError if the config file or overrides are invalid
 */
export async function createLogger(options: CreateLoggerOptions = {}): Promise<Logger> {

    const { configFile, ...loggerOptions } = options;
    const root = options.root ?? process.cwd();

    let config: LoggerConfigInput = { ...options.config };

    if (configFile) {

        const fromFile = await loadLoggerConfig(resolve(root, configFile));

        config = { ...fromFile, ...options.config };

    }

    const logger = new Logger({ ...loggerOptions, root, config });

    await logger.start();

    return logger;

}
