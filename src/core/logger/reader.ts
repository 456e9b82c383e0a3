/**
 * Log File Reader
 *
 * Parses persisted log lines back into LogRecords. Lines that do not
 * match the entry grammar (stack-trace frames, separators, corrupt
 * lines) are skipped rather than reported.
 *
 * @example
 * ```typescript
 * parseLine('[2024-01-15 10:30:45.123] 1 💙 [AuthService:42] Signed in')
 * // { level: 'info', callerId: 'AuthService', lineNumber: 42, message: 'Signed in', ... }
 *
 * const result = await readLogFiles(['logs/app_logs_1.txt', 'logs/app_logs.txt'], { limit: 100 })
 * console.log(result.entries) // Most recent 100 entries, oldest first
 * ```
 */
import * as fs from 'node:fs/promises';

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { attempt } from '@logosdx/utils';

import { parseLevel } from './levels.js';
import { TIMESTAMP_FORMAT } from './formatter.js';
import type { LogRecord } from './types.js';

dayjs.extend(customParseFormat);

/**
 * `[timestamp] LEVEL glyph [caller] message`
 */
const LINE_PATTERN = /^\[(.*?)\] (\w+) (.*?) \[(.*?)\] (.*)$/;

/**
 * Caller block with an optional `:line` suffix.
 */
const CALLER_PATTERN = /^(.*?)(?::(\d+))?$/;

/**
 * Options for reading log files.
 */
export interface ReadLogsOptions {

    /** Maximum entries to return (default: all) */
    limit?: number;

}

/**
 * Result from reading log files.
 */
export interface ReadLogsResult {

    /** Parsed log entries, oldest first */
    entries: LogRecord[];

    /** Number of lines that parsed as entries */
    totalLines: number;

    /** Whether there are more entries beyond the limit */
    hasMore: boolean;

}

/**
 * Parse a persisted timestamp, strictly.
 *
 * @returns The instant, or null when the text is not in
 * `YYYY-MM-DD HH:mm:ss.SSS` form
 */
export function parseTimestamp(text: string): Date | null {

    const parsed = dayjs(text, TIMESTAMP_FORMAT, true);

    return parsed.isValid() ? parsed.toDate() : null;

}

/**
 * Parse one persisted line.
 *
 * Lines written without a `:line` suffix in the caller block parse
 * as well; `lineNumber` is then absent.
 *
 * @returns The record, or null when the line is not an entry
 */
export function parseLine(line: string): LogRecord | null {

    const match = LINE_PATTERN.exec(line);

    if (!match) {

        return null;

    }

    const [, timestampText = '', levelText = '', glyph = '', caller = '', message = ''] = match;

    const timestamp = parseTimestamp(timestampText);

    if (!timestamp) {

        return null;

    }

    const level = parseLevel(levelText);

    if (!level) {

        return null;

    }

    const callerMatch = CALLER_PATTERN.exec(caller);
    const callerId = callerMatch?.[1] ?? caller;
    const lineText = callerMatch?.[2];

    const record: LogRecord = {
        timestamp,
        level,
        glyph,
        callerId,
        message,
    };

    if (lineText !== undefined) {

        record.lineNumber = Number(lineText);

    }

    return record;

}

/**
 * Parse every entry in a block of text, in order.
 *
 * Non-entry lines are skipped.
 */
export function parseLines(text: string): LogRecord[] {

    const records: LogRecord[] = [];

    for (const line of text.split('\n')) {

        if (!line.trim()) continue;

        const record = parseLine(line);

        if (record) {

            records.push(record);

        }

    }

    return records;

}

/**
 * Read log entries from several files.
 *
 * Files are read in the given order, which should be oldest first.
 * Missing or unreadable files contribute nothing.
 *
 * @param filepaths - Generation files, oldest first
 * @param options - Read options
 * @returns Parsed entries and metadata
 *
 * @example
 * ```typescript
 * // Everything
 * const all = await readLogFiles(files)
 *
 * // Last 50 entries
 * const recent = await readLogFiles(files, { limit: 50 })
 * ```
 */
export async function readLogFiles(
    filepaths: readonly string[],
    options: ReadLogsOptions = {},
): Promise<ReadLogsResult> {

    const records: LogRecord[] = [];

    for (const filepath of filepaths) {

        const [content, err] = await attempt(() => fs.readFile(filepath, 'utf-8'));

        if (err) {

            // File doesn't exist or can't be read
            continue;

        }

        records.push(...parseLines(content));

    }

    const totalLines = records.length;
    const { limit } = options;

    if (limit === undefined || limit >= totalLines) {

        return { entries: records, totalLines, hasMore: false };

    }

    const startIdx = Math.max(0, totalLines - Math.max(0, limit));

    return {
        entries: records.slice(startIdx),
        totalLines,
        hasMore: startIdx > 0,
    };

}
