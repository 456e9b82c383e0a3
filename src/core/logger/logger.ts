/**
 * Logger
 *
 * The pipeline entry point. Each call is level filtered, formatted
 * into a console line and a persisted line, handed to the console sink
 * and enqueued for the file writer. The call never waits on file I/O.
 *
 * Log loss is possible: lines still buffered when the process dies, or
 * whose append fails, are not written. Call `forceFlush()` or `stop()`
 * before reading the files or exiting.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ root: process.cwd(), config: { level: 'info' } })
 * await logger.start()
 *
 * logger.info('Server listening', { port: 8080 }, { caller: 'Server' })
 * logger.warning(sensitive`Retrying login for ${redact.email(email)}`)
 *
 * await logger.stop()
 * ```
 */
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { attempt, attemptSync } from '@logosdx/utils';

import { createObserver, type LoggerObserver } from '../observer.js';
import { captureStackTrace, formatEvent } from './formatter.js';
import { isTraceLevel, shouldLog } from './levels.js';
import { WriteQueue } from './queue.js';
import { readLogFiles } from './reader.js';
import { listGenerations, parseSize } from './rotation.js';
import { StreamSink, type ConsoleSink } from './sink.js';
import { parseLoggerConfig, type LoggerConfig, type LoggerConfigInput } from './config.js';
import type {
    LogLevel,
    LoggerState,
    LogMessage,
    LogMetadata,
    LogRecord,
    QueueStats,
} from './types.js';
import { LEVEL_INFO } from './types.js';

/**
 * Separator between generations in `getLogFileContents()`.
 */
export const GENERATION_SEPARATOR = '\n--- Previous Log File ---\n';

/**
 * Frames belonging to the pipeline on every capture:
 * captureStackTrace, #log and the public method.
 */
const INTERNAL_FRAMES = 3;

/**
 * Module-private entry point for ScopedLogger.
 */
const logFromScope = Symbol('logFromScope');

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Directory the configured file path is relative to (default: cwd) */
    root?: string;

    /** Logger configuration */
    config?: LoggerConfigInput;

    /** Console sink (defaults to stderr; null for none) */
    sink?: ConsoleSink | null;

    /** Time source for entry timestamps */
    clock?: () => Date;

    /** Flush and stop on process `beforeExit` */
    flushOnExit?: boolean;

    /** Print observer activity to stderr */
    debug?: boolean;

}

/**
 * Per-call options.
 */
export interface EntryOptions {

    /** Caller identifier (defaults to the configured caller) */
    caller?: string;

    /** Source line of the call */
    line?: number;

    /** Append the call stack (error and critical only) */
    includeStackTrace?: boolean;

}

/**
 * Logging methods shared by Logger and ScopedLogger.
 */
export interface LogMethods {

    log(level: LogLevel, message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;
    debug(message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;
    info(message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;
    warning(message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;
    error(message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;
    critical(message: LogMessage, metadata?: LogMetadata, options?: EntryOptions): void;

}

/**
 * Buffered, redacting, rotating file logger.
 */
export class Logger implements LogMethods {

    /** Lifecycle, flush, rotation and failure events */
    readonly events: LoggerObserver;

    #config: LoggerConfig;
    #filepath: string;
    #minimumLevel: LogLevel;
    #sink: ConsoleSink | null;
    #clock: () => Date;
    #queue: WriteQueue;
    #state: LoggerState = 'idle';
    #flushOnExit: boolean;
    #exitHandler: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = parseLoggerConfig(options.config ?? {});
        this.#filepath = resolve(options.root ?? process.cwd(), this.#config.file);
        this.#minimumLevel = this.#config.level;
        this.#sink = options.sink === undefined ? new StreamSink() : options.sink;
        this.#clock = options.clock ?? (() => new Date());
        this.#flushOnExit = options.flushOnExit ?? false;

        this.events = createObserver('loglane', options.debug ?? false);

        this.#queue = new WriteQueue({
            filepath: this.#filepath,
            bufferSize: this.#config.bufferSize,
            flushInterval: this.#config.flushInterval,
            maxSize: parseSize(this.#config.maxSize),
            maxFiles: this.#config.maxFiles,
            events: this.events,
        });

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Validated configuration.
     */
    get config(): Readonly<LoggerConfig> {

        return this.#config;

    }

    /**
     * Write queue statistics.
     */
    get stats(): QueueStats {

        return this.#queue.stats;

    }

    /**
     * Start the logger.
     *
     * Creates the log directory and file and starts the periodic flush.
     */
    async start(): Promise<void> {

        if (this.#state !== 'idle') {

            return;

        }

        await this.#queue.start();

        if (this.#flushOnExit) {

            this.#exitHandler = () => {

                void this.stop();

            };

            process.once('beforeExit', this.#exitHandler);

        }

        this.#state = 'running';

        this.events.emit('logger:started', {
            file: this.#filepath,
            level: this.#minimumLevel,
        });

    }

    /**
     * Stop the logger.
     *
     * Flushes pending entries; later calls are ignored.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'flushing';

        if (this.#exitHandler) {

            process.removeListener('beforeExit', this.#exitHandler);
            this.#exitHandler = null;

        }

        await this.#queue.stop();

        this.#state = 'stopped';

        this.events.emit('logger:stopped', { file: this.#filepath });

    }

    // ─────────────────────────────────────────────────────────────
    // Level
    // ─────────────────────────────────────────────────────────────

    /**
     * Minimum level that is logged.
     */
    getMinimumLevel(): LogLevel {

        return this.#minimumLevel;

    }

    /**
     * Change the minimum level. Takes effect for the next call.
     */
    setMinimumLevel(level: LogLevel): void {

        this.#minimumLevel = level;

    }

    // ─────────────────────────────────────────────────────────────
    // Logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log at an explicit level.
     */
    log(level: LogLevel, message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log(level, message, metadata, options);

    }

    /**
     * Log a debug message.
     */
    debug(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log('debug', message, metadata, options);

    }

    /**
     * Log an info message.
     */
    info(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log('info', message, metadata, options);

    }

    /**
     * Log a warning.
     */
    warning(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log('warning', message, metadata, options);

    }

    /**
     * Log an error. Pass `includeStackTrace` to append the call stack.
     */
    error(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log('error', message, metadata, options);

    }

    /**
     * Log a critical failure. The call stack is included unless
     * `includeStackTrace` is false.
     */
    critical(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#log('critical', message, metadata, {
            ...options,
            includeStackTrace: options.includeStackTrace ?? true,
        });

    }

    /**
     * Logger bound to a caller id.
     *
     * @example
     * ```typescript
     * const log = logger.child('PaymentService')
     * log.error('Charge declined', { orderId: 'A-1' })
     * ```
     */
    child(caller: string): ScopedLogger {

        return new ScopedLogger(this, caller);

    }

    /**
     * Filter, format, dispatch and enqueue one event.
     *
     * @param extraFrames - Pipeline frames above the public method
     */
    #log(
        level: LogLevel,
        message: LogMessage,
        metadata: LogMetadata | undefined,
        options: EntryOptions,
        extraFrames = 0,
    ): void {

        if (this.#state !== 'running') {

            return;

        }

        if (!shouldLog(level, this.#minimumLevel)) {

            return;

        }

        const timestamp = this.#clock();
        const includeStackTrace = options.includeStackTrace ?? false;

        const stackTrace = includeStackTrace && isTraceLevel(level)
            ? captureStackTrace(INTERNAL_FRAMES + extraFrames, this.#config.maxStackFrames)
            : undefined;

        const [entry, formatErr] = attemptSync(() => formatEvent({
            timestamp,
            level,
            callerId: options.caller ?? this.#config.caller,
            lineNumber: options.line,
            message,
            metadata,
            includeStackTrace,
            stackTrace,
        }));

        if (formatErr) {

            this.events.emit('logger:error', { operation: 'format', error: formatErr });

            return;

        }

        this.#dispatch(level, entry.console);
        this.#queue.enqueue(entry.persisted);

    }

    /**
     * Hand the console rendering to the sink. Sink failures are
     * reported, never thrown.
     */
    #dispatch(level: LogLevel, text: string): void {

        const sink = this.#sink;

        if (!sink) {

            return;

        }

        const [, err] = attemptSync(() => sink.write(LEVEL_INFO[level].severity, text));

        if (err) {

            this.events.emit('logger:error', { operation: 'sink', error: err });

        }

    }

    /**
     * Entry point for ScopedLogger, which adds one frame.
     */
    [logFromScope](level: LogLevel, message: LogMessage, metadata: LogMetadata | undefined, options: EntryOptions): void {

        this.#log(level, message, metadata, options, 1);

    }

    // ─────────────────────────────────────────────────────────────
    // Files
    // ─────────────────────────────────────────────────────────────

    /**
     * Path of the current log file.
     */
    getLogFileLocation(): string {

        return this.#filepath;

    }

    /**
     * Paths of every existing generation, current first.
     */
    async getAllLogFileLocations(): Promise<string[]> {

        const files = await listGenerations(this.#filepath, this.#config.maxFiles);

        return files.includes(this.#filepath) ? files : [this.#filepath, ...files];

    }

    /**
     * Text of every generation, current first, joined by
     * GENERATION_SEPARATOR.
     *
     * Reads what is on disk; buffered lines are not included.
     *
     * @returns The text, or null when no generation has content
     */
    async getLogFileContents(): Promise<string | null> {

        const files = await listGenerations(this.#filepath, this.#config.maxFiles);
        const contents: string[] = [];

        for (const file of files) {

            const [content, err] = await attempt(() => readFile(file, 'utf-8'));

            if (!err) {

                contents.push(content);

            }

        }

        if (contents.every((content) => content.length === 0)) {

            return null;

        }

        return contents.join(GENERATION_SEPARATOR);

    }

    /**
     * Total size of all generations in bytes.
     */
    async getLogFileSizeBytes(): Promise<number> {

        const files = await listGenerations(this.#filepath, this.#config.maxFiles);
        let total = 0;

        for (const file of files) {

            const [stats, err] = await attempt(() => stat(file));

            if (!err) {

                total += stats.size;

            }

        }

        return total;

    }

    /**
     * Most recent parsed entries across all generations, oldest first.
     *
     * @param limit - Maximum entries (default: all)
     */
    async getRecentEntries(limit?: number): Promise<LogRecord[]> {

        const files = await listGenerations(this.#filepath, this.#config.maxFiles);

        // Oldest archive first so entries come out in chronological order
        const result = await readLogFiles([...files].reverse(), { limit });

        return result.entries;

    }

    /**
     * Drop buffered lines and truncate every generation.
     */
    async clearLogFiles(): Promise<void> {

        await this.#queue.clear();

    }

    /**
     * Append everything logged so far.
     */
    async forceFlush(): Promise<void> {

        await this.#queue.forceFlush();

    }

}

/**
 * Logger bound to a caller id.
 */
export class ScopedLogger implements LogMethods {

    #logger: Logger;
    #caller: string;

    constructor(logger: Logger, caller: string) {

        this.#logger = logger;
        this.#caller = caller;

    }

    /**
     * Caller id this logger writes as.
     */
    get caller(): string {

        return this.#caller;

    }

    log(level: LogLevel, message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope](level, message, metadata, { ...options, caller: options.caller ?? this.#caller });

    }

    debug(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope]('debug', message, metadata, { ...options, caller: options.caller ?? this.#caller });

    }

    info(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope]('info', message, metadata, { ...options, caller: options.caller ?? this.#caller });

    }

    warning(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope]('warning', message, metadata, { ...options, caller: options.caller ?? this.#caller });

    }

    error(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope]('error', message, metadata, { ...options, caller: options.caller ?? this.#caller });

    }

    critical(message: LogMessage, metadata?: LogMetadata, options: EntryOptions = {}): void {

        this.#logger[logFromScope]('critical', message, metadata, {
            ...options,
            caller: options.caller ?? this.#caller,
            includeStackTrace: options.includeStackTrace ?? true,
        });

    }

}
