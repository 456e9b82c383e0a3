/**
 * Logger Module
 *
 * Buffered file logging with dual-channel redaction.
 *
 * Features:
 * - Level filtering with a mutable minimum level
 * - Console rendering with real values, file rendering redacted
 * - Batched, single-writer appends
 * - Size-based rotation over numbered generations
 * - Parsing persisted lines back into records
 */

// Types
export type {
    LogLevel,
    SinkSeverity,
    LevelInfo,
    MetadataValue,
    LogMetadata,
    LogMessage,
    Channel,
    LogEvent,
    FormattedEntry,
    LogRecord,
    RotationResult,
    QueueStats,
    WriterState,
    LoggerState,
} from './types.js';

export { LEVEL_INFO, LOG_LEVELS } from './types.js';

// Levels
export { levelRank, shouldLog, isTraceLevel, parseLevel } from './levels.js';

// Redaction
export {
    REDACTION_RULES,
    scrubText,
    Redacted,
    RedactedMessage,
    sensitive,
    redact,
    renderMessage,
    type RedactionRule,
    type MessagePart,
} from './redact.js';

// Formatter
export {
    TIMESTAMP_FORMAT,
    formatTimestamp,
    formatCaller,
    formatMetadata,
    formatStackTrace,
    captureStackTrace,
    formatEvent,
} from './formatter.js';

// Reader
export {
    parseTimestamp,
    parseLine,
    parseLines,
    readLogFiles,
    type ReadLogsOptions,
    type ReadLogsResult,
} from './reader.js';

// Rotation
export {
    parseSize,
    generationPath,
    fileExists,
    listGenerations,
    needsRotation,
    rotateGenerations,
    checkAndRotate,
} from './rotation.js';

// Queue
export { WriteQueue, type WriteQueueOptions } from './queue.js';

// Sinks
export { StreamSink, noopSink, type ConsoleSink, type StreamSinkOptions } from './sink.js';

// Config
export {
    LoggerConfigSchema,
    LoggerConfigError,
    DEFAULT_LOGGER_CONFIG,
    parseLoggerConfig,
    loadLoggerConfig,
    type LoggerConfig,
    type LoggerConfigInput,
} from './config.js';

// Logger
export {
    Logger,
    ScopedLogger,
    GENERATION_SEPARATOR,
    type LoggerOptions,
    type EntryOptions,
    type LogMethods,
} from './logger.js';

// Initialization
export { createLogger, type CreateLoggerOptions } from './init.js';
