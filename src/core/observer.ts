/**
 * Logger event system.
 *
 * Each Logger owns an observer. The pipeline never throws I/O failures
 * at its callers; it reports them here instead, alongside lifecycle
 * events.
 *
 * @example
 * ```typescript
 * const cleanup = logger.events.on('logger:error', ({ operation, error }) => {
 *     process.stderr.write(`log ${operation} failed: ${error.message}\n`)
 * })
 *
 * // Later
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { LogLevel } from './logger/types.js'


/**
 * Pipeline step that failed.
 */
export type LoggerOperation = 'write' | 'rotate' | 'clear' | 'sink' | 'format'


/**
 * All events emitted by the logging pipeline.
 */
export interface LoggerEvents {

    // Lifecycle
    'logger:started': { file: string; level: LogLevel }
    'logger:stopped': { file: string }

    // Writer
    'logger:flushed': { entries: number; bytes: number }
    'logger:rotated': { oldFile: string; newFile: string; deletedFiles: string[] }
    'logger:cleared': { files: string[] }

    // Failures (recovered locally)
    'logger:error': { operation: LoggerOperation; error: Error }
}

export type LoggerEventNames = Events<LoggerEvents>;
export type LoggerObserver = ObserverEngine<LoggerEvents>


/**
 * Create an observer for one logger.
 *
 * @param name - Observer name, shown when spying
 * @param spy - Print every emitted event to stderr
 */
export function createObserver(name = 'loglane', spy = false): LoggerObserver {

    return new ObserverEngine<LoggerEvents>({
        name,
        spy: spy
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined
    })
}
