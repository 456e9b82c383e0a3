/**
 * Level Classifier
 *
 * Ranks, filtering and parsing of log levels.
 *
 * Filtering rule: an event is logged when its rank is greater than
 * or equal to the rank of the configured minimum level.
 */
import type { LogLevel } from './types.js';
import { LEVEL_INFO, LOG_LEVELS } from './types.js';

/**
 * Levels that may carry a stack trace.
 */
const TRACE_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(['error', 'critical']);

/**
 * Numeric rank of a level.
 */
export function levelRank(level: LogLevel): number {

    return LEVEL_INFO[level].rank;

}

/**
 * Check if an event at `level` passes the `minimum` filter.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warning')   // true
 * shouldLog('debug', 'info')      // false
 * shouldLog('info', 'info')       // true
 * ```
 */
export function shouldLog(level: LogLevel, minimum: LogLevel): boolean {

    return levelRank(level) >= levelRank(minimum);

}

/**
 * Whether a level gets a stack trace when one is requested.
 */
export function isTraceLevel(level: LogLevel): boolean {

    return TRACE_LEVELS.has(level);

}

/**
 * Parse a level token as written in a log line.
 *
 * Accepts the numeric rank or the level name, case-insensitive.
 *
 * @example
 * ```typescript
 * parseLevel('2')         // 'warning'
 * parseLevel('CRITICAL')  // 'critical'
 * parseLevel('trace')     // null
 * ```
 */
export function parseLevel(token: string): LogLevel | null {

    const normalized = token.trim().toLowerCase();

    for (const level of LOG_LEVELS) {

        if (normalized === level || normalized === String(LEVEL_INFO[level].rank)) {

            return level;

        }

    }

    return null;

}
