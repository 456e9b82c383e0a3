/**
 * Logger Types
 *
 * Type definitions for the loglane pipeline. Every log call becomes
 * a LogEvent, which is rendered into two lines: one for the console
 * sink and one for the rotating log file.
 */
import type { Redacted, RedactedMessage } from './redact.js';

/**
 * Log severity levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

/**
 * Severity understood by the external console sink.
 */
export type SinkSeverity = 'debug' | 'info' | 'default' | 'error' | 'fault';

/**
 * Fixed properties of a level.
 */
export interface LevelInfo {

    /** Numeric rank, also written to the log file */
    rank: number;

    /** Display glyph */
    glyph: string;

    /** Console sink severity */
    severity: SinkSeverity;

}

/**
 * Level table. Ranks define the total order used for filtering.
 */
export const LEVEL_INFO: Readonly<Record<LogLevel, LevelInfo>> = {
    debug: { rank: 0, glyph: '🐛', severity: 'debug' },
    info: { rank: 1, glyph: '💙', severity: 'info' },
    warning: { rank: 2, glyph: '⚠️', severity: 'default' },
    error: { rank: 3, glyph: '❤️', severity: 'error' },
    critical: { rank: 4, glyph: '💀', severity: 'fault' },
};

/**
 * All levels in rank order.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error', 'critical'];

/**
 * Scalar metadata value. Rendered with `String(value)`.
 */
export type MetadataValue = string | number | boolean;

/**
 * Ordered key/value metadata.
 *
 * A Map keeps exact insertion order; plain objects follow the usual
 * property order (integer-like keys first).
 */
export type LogMetadata = Readonly<Record<string, MetadataValue>> | ReadonlyMap<string, MetadataValue>;

/**
 * Anything that can be logged as a message.
 */
export type LogMessage = string | Redacted | RedactedMessage;

/**
 * Output channel a message is rendered for.
 *
 * - console: real values, no scanning
 * - persisted: placeholders and automatic scanning
 */
export type Channel = 'console' | 'persisted';

/**
 * A single log call, before formatting.
 */
export interface LogEvent {

    /** When the call was made */
    timestamp: Date;

    level: LogLevel;

    /** Caller identifier, e.g. a module name */
    callerId: string;

    /** Source line of the call, when known */
    lineNumber?: number;

    message: LogMessage;

    metadata?: LogMetadata;

    /** Append the stack trace (error and critical only) */
    includeStackTrace: boolean;

    /** Captured call-site frames */
    stackTrace?: readonly string[];

}

/**
 * The two renderings of one LogEvent.
 */
export interface FormattedEntry {

    /** Fully resolved text for the console sink (no timestamp, no newline) */
    console: string;

    /** Redacted line for the log file, newline terminated */
    persisted: string;

}

/**
 * A persisted line parsed back into its fields.
 *
 * `message` holds everything after the caller block, including the
 * metadata suffix.
 */
export interface LogRecord {

    timestamp: Date;

    level: LogLevel;

    glyph: string;

    callerId: string;

    lineNumber?: number;

    message: string;

}

/**
 * Log rotation result.
 */
export interface RotationResult {

    /** Whether rotation occurred */
    rotated: boolean;

    /** Current file path (if rotated) */
    oldFile?: string;

    /** Newest archive path (if rotated) */
    newFile?: string;

    /** Archives removed because they were shifted past the cap */
    deletedFiles?: string[];

    /** Steps that failed; the remaining steps still ran */
    failures?: Error[];

}

/**
 * Write queue statistics.
 */
export interface QueueStats {

    /** Lines waiting in the buffer */
    pending: number;

    /** Lines appended since start */
    totalWritten: number;

    /** Bytes appended since start */
    totalBytes: number;

    /** Number of successful flushes */
    flushCount: number;

    /** Whether an append is in flight */
    isWriting: boolean;

}

/**
 * Buffer state of the writer.
 */
export type WriterState = 'idle' | 'buffering' | 'flushing';

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'flushing' | 'stopped';
