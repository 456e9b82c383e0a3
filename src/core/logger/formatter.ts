/**
 * Log Formatter
 *
 * Renders a LogEvent into its console and persisted lines. Both share
 * the `glyph [caller] text | metadata` layout; only the message text
 * differs (resolved vs. redacted) and the persisted line carries the
 * timestamp and level rank in front.
 */
import dayjs from 'dayjs'

import type { FormattedEntry, LogEvent, LogMetadata, MetadataValue } from './types.js'
import { LEVEL_INFO } from './types.js'
import { isTraceLevel } from './levels.js'
import { renderMessage } from './redact.js'


/**
 * Timestamp layout of persisted lines (local time).
 */
export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS'


/**
 * Format a timestamp for the log file.
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date(2024, 0, 15, 10, 30, 45, 123))
 * // '2024-01-15 10:30:45.123'
 * ```
 */
export function formatTimestamp(date: Date): string {

    return dayjs(date).format(TIMESTAMP_FORMAT)
}


/**
 * Format the caller block, with `:line` when the line is known.
 */
export function formatCaller(callerId: string, lineNumber?: number): string {

    return lineNumber === undefined ? callerId : `${callerId}:${lineNumber}`
}


/**
 * Type guard for Map metadata.
 */
function isMetadataMap(metadata: LogMetadata): metadata is ReadonlyMap<string, MetadataValue> {

    return metadata instanceof Map
}


/**
 * Format metadata as ` | key=value, key=value`, in insertion order.
 *
 * Returns an empty string when there is no metadata. Values are not
 * redacted.
 */
export function formatMetadata(metadata?: LogMetadata): string {

    if (!metadata) {

        return ''
    }

    const entries = isMetadataMap(metadata)
        ? [...metadata.entries()]
        : Object.entries(metadata)

    if (entries.length === 0) {

        return ''
    }

    return ` | ${entries.map(([key, value]) => `${key}=${String(value)}`).join(', ')}`
}


/**
 * Format stack frames as a block of lines following the entry.
 */
export function formatStackTrace(frames?: readonly string[]): string {

    if (!frames || frames.length === 0) {

        return ''
    }

    return `\n${frames.join('\n')}`
}


/**
 * Capture the frames of the current call stack.
 *
 * @param skipFrames - Innermost frames to drop (this function and the
 * pipeline's own frames)
 * @param maxFrames - Upper bound on returned frames
 *
 * @example
 * ```typescript
 * // Inside a function called by user code:
 * captureStackTrace(2, 10)  // frames starting at the user code
 * ```
 */
export function captureStackTrace(skipFrames: number, maxFrames: number): string[] {

    if (maxFrames <= 0) {

        return []
    }

    const previousLimit = Error.stackTraceLimit

    Error.stackTraceLimit = skipFrames + maxFrames + 1

    const stack = new Error().stack ?? ''

    Error.stackTraceLimit = previousLimit

    return stack
        .split('\n')
        .slice(1)
        .map((line) => line.trim())
        .filter((line) => line.startsWith('at '))
        .slice(skipFrames, skipFrames + maxFrames)
}


/**
 * Render one event into its console and persisted lines.
 *
 * @example
 * ```typescript
 * const entry = formatEvent({
 *     timestamp: new Date(2024, 0, 15, 10, 30, 45, 123),
 *     level: 'info',
 *     callerId: 'AuthService',
 *     lineNumber: 42,
 *     message: 'Email: user@example.com',
 *     metadata: { userId: '12345' },
 *     includeStackTrace: false,
 * })
 * // entry.console:   '💙 [AuthService:42] Email: user@example.com | userId=12345'
 * // entry.persisted: '[2024-01-15 10:30:45.123] 1 💙 [AuthService:42] Email: [REDACTED_EMAIL] | userId=12345\n'
 * ```
 */
export function formatEvent(event: LogEvent): FormattedEntry {

    const info = LEVEL_INFO[event.level]
    const header = `${info.glyph} [${formatCaller(event.callerId, event.lineNumber)}]`

    const metadata = formatMetadata(event.metadata)
    const trace = event.includeStackTrace && isTraceLevel(event.level)
        ? formatStackTrace(event.stackTrace)
        : ''

    const consoleText = renderMessage(event.message, 'console')
    const persistedText = renderMessage(event.message, 'persisted')

    return {
        console: `${header} ${consoleText}${metadata}${trace}`,
        persisted: `[${formatTimestamp(event.timestamp)}] ${info.rank} ${header} ${persistedText}${metadata}${trace}\n`,
    }
}
