/**
 * Console Sinks
 *
 * The console sink receives the fully resolved rendering of every
 * event. It is fire-and-forget: it returns nothing, and a dropped or
 * delayed console write never affects the log file.
 */
import type { Writable } from 'node:stream';

import ansis from 'ansis';

import type { SinkSeverity } from './types.js';

/**
 * External console sink.
 */
export interface ConsoleSink {

    write(severity: SinkSeverity, text: string): void;

}

/**
 * Severity colors.
 */
const SEVERITY_COLOR: Record<SinkSeverity, (text: string) => string> = {
    debug: (text) => ansis.gray(text),
    info: (text) => ansis.cyan(text),
    default: (text) => ansis.yellow(text),
    error: (text) => ansis.red(text),
    fault: (text) => ansis.bold.red(text),
};

/**
 * Options for StreamSink.
 */
export interface StreamSinkOptions {

    /** Colorize by severity (defaults to whether the stream is a TTY) */
    color?: boolean;

}

/**
 * Sink that writes one line per event to a stream.
 *
 * @example
 * ```typescript
 * const sink = new StreamSink(process.stderr)
 * sink.write('error', '❤️ [Billing] Charge failed')
 * ```
 */
export class StreamSink implements ConsoleSink {

    #stream: Writable;
    #color: boolean;

    constructor(stream: Writable = process.stderr, options: StreamSinkOptions = {}) {

        this.#stream = stream;
        this.#color = options.color ?? ('isTTY' in stream && stream.isTTY === true);

    }

    write(severity: SinkSeverity, text: string): void {

        const line = this.#color ? SEVERITY_COLOR[severity](text) : text;

        this.#stream.write(`${line}\n`);

    }

}

/**
 * Sink that discards everything.
 */
export const noopSink: ConsoleSink = {
    write: () => undefined,
};
