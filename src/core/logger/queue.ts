/**
 * Write Queue
 *
 * Buffers persisted lines and appends them to the log file in
 * batches. All file mutation (append, rotation, truncation) runs on a
 * single serialized promise chain, the writer, so writes never
 * interleave.
 *
 * The queue guarantees:
 * - Order preservation (first enqueued = first written)
 * - Non-blocking enqueue (callers never wait on I/O)
 * - Rotation checked after every successful flush
 * - Graceful shutdown (stop waits for pending writes)
 *
 * A flush happens when the buffer is non-empty and one of these holds:
 * it was forced, the buffer reached `bufferSize`, or `flushInterval`
 * has passed since the last flush. The decision is taken after every
 * enqueue and on a periodic tick.
 */
import { appendFile, mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { attempt } from '@logosdx/utils'

import type { LoggerObserver } from '../observer.js'
import { checkAndRotate, listGenerations } from './rotation.js'
import type { QueueStats, WriterState } from './types.js'


/**
 * Options for WriteQueue construction.
 */
export interface WriteQueueOptions {

    /** Current log file */
    filepath: string

    /** Flush once this many lines are buffered */
    bufferSize: number

    /** Flush once this many milliseconds passed since the last flush */
    flushInterval: number

    /** Rotate when the current file is larger than this (bytes) */
    maxSize: number

    /** Archives kept by rotation */
    maxFiles: number

    /** Where failures and writer events are reported */
    events: LoggerObserver
}


/**
 * Buffered, single-writer queue for a rotating log file.
 *
 * @example
 * ```typescript
 * const queue = new WriteQueue({
 *     filepath: '/logs/app_logs.txt',
 *     bufferSize: 25,
 *     flushInterval: 5000,
 *     maxSize: parseSize('5mb'),
 *     maxFiles: 3,
 *     events: createObserver(),
 * })
 * await queue.start()
 *
 * queue.enqueue('line 1\n')
 * queue.enqueue('line 2\n')
 *
 * await queue.forceFlush()  // Both lines are on disk
 * await queue.stop()
 * ```
 */
export class WriteQueue {

    #options: WriteQueueOptions
    #buffer: string[] = []
    #lastFlush = Date.now()
    #isStarted = false
    #isStopping = false
    #isWriting = false
    #flushScheduled = false
    #totalWritten = 0
    #totalBytes = 0
    #flushCount = 0

    // Bumped by clear(); flushes queued under an older value are skipped
    #generation = 0

    // Tail of the writer chain; every file mutation is appended here
    #writer: Promise<void> = Promise.resolve()

    #ticker: ReturnType<typeof setInterval> | null = null

    constructor(options: WriteQueueOptions) {

        this.#options = { ...options }
    }


    /**
     * Get the log file path.
     */
    get filepath(): string {

        return this.#options.filepath
    }


    /**
     * Check if the queue is running.
     */
    get isRunning(): boolean {

        return this.#isStarted && !this.#isStopping
    }


    /**
     * Current writer state.
     */
    get state(): WriterState {

        if (this.#isWriting) {

            return 'flushing'
        }

        return this.#buffer.length > 0 ? 'buffering' : 'idle'
    }


    /**
     * Get queue statistics.
     */
    get stats(): QueueStats {

        return {
            pending: this.#buffer.length,
            totalWritten: this.#totalWritten,
            totalBytes: this.#totalBytes,
            flushCount: this.#flushCount,
            isWriting: this.#isWriting,
        }
    }


    /**
     * Start the queue.
     *
     * Creates the log directory and an empty current file if needed,
     * then starts the periodic flush check.
     */
    async start(): Promise<void> {

        if (this.#isStarted) {

            return
        }

        const dir = dirname(this.#options.filepath)
        const [_, err] = await attempt(() => mkdir(dir, { recursive: true }))

        if (err) {

            throw new Error(`Failed to create log directory: ${err.message}`)
        }

        const [, createErr] = await attempt(() => writeFile(this.#options.filepath, '', { flag: 'a' }))

        if (createErr) {

            this.#options.events.emit('logger:error', { operation: 'write', error: createErr })
        }

        this.#lastFlush = Date.now()
        this.#isStarted = true
        this.#isStopping = false

        this.#ticker = setInterval(() => {

            this.#tick()
        }, this.#options.flushInterval)

        // The periodic check alone should not keep the process alive
        this.#ticker.unref()
    }


    /**
     * Stop the queue.
     *
     * Flushes all pending entries before stopping.
     */
    async stop(): Promise<void> {

        if (!this.#isStarted) {

            return
        }

        this.#isStopping = true

        if (this.#ticker) {

            clearInterval(this.#ticker)
            this.#ticker = null
        }

        await this.forceFlush()

        this.#isStarted = false
        this.#isStopping = false
    }


    /**
     * Enqueue a log line for writing.
     *
     * This is non-blocking - the caller doesn't wait for the write.
     * Lines are dropped when the queue is not running.
     *
     * @param line - Formatted log line (newline terminated)
     */
    enqueue(line: string): void {

        if (!this.#isStarted || this.#isStopping) {

            return
        }

        this.#buffer.push(line)

        if (this.#shouldFlush(false)) {

            this.#scheduleFlush()
        }
    }


    /**
     * Flush everything enqueued so far.
     *
     * Resolves once those lines are appended (or the append failed and
     * was reported). Calling it again with nothing enqueued writes
     * nothing. Lines dropped by a clear() issued meanwhile stay dropped.
     */
    async forceFlush(): Promise<void> {

        const generation = this.#generation

        await this.#schedule(() => this.#flush(generation))
    }


    /**
     * Wait for the writer to finish its current work without
     * scheduling a flush.
     */
    async idle(): Promise<void> {

        await this.#writer
    }


    /**
     * Drop buffered lines and truncate every existing generation.
     *
     * Lines enqueued after this call are kept.
     *
     * @returns The truncated files
     */
    async clear(): Promise<string[]> {

        this.#buffer = []
        this.#generation++

        let cleared: string[] = []

        await this.#schedule(async () => {

            cleared = await this.#truncateAll()

            // Lines enqueued while a stale flush was pending still need one
            this.#tick()
        })

        return cleared
    }


    /**
     * Periodic flush check.
     */
    #tick(): void {

        if (this.#shouldFlush(false)) {

            this.#scheduleFlush()
        }
    }


    /**
     * Flush decision. An empty buffer never flushes.
     */
    #shouldFlush(force: boolean): boolean {

        if (this.#buffer.length === 0) {

            return false
        }

        return force
            || this.#buffer.length >= this.#options.bufferSize
            || Date.now() - this.#lastFlush >= this.#options.flushInterval
    }


    /**
     * Queue one flush on the writer unless one is already waiting.
     */
    #scheduleFlush(): void {

        if (this.#flushScheduled) {

            return
        }

        this.#flushScheduled = true

        const generation = this.#generation

        void this.#schedule(() => this.#flush(generation))
    }


    /**
     * Append a task to the writer chain.
     *
     * Tasks report their own failures; anything that still escapes is
     * reported here so the chain keeps running.
     */
    #schedule(task: () => Promise<void>): Promise<void> {

        const run = this.#writer.then(task).catch((error: unknown) => {

            this.#options.events.emit('logger:error', {
                operation: 'write',
                error: error instanceof Error ? error : new Error(String(error)),
            })
        })

        this.#writer = run

        return run
    }


    /**
     * Write the buffer in one append, then check rotation.
     *
     * Runs on the writer only. A flush queued before a clear() writes
     * nothing: the lines it was meant for were dropped, and the ones
     * in the buffer now belong after the truncation.
     *
     * @param generation - Value of the clear counter when queued
     */
    async #flush(generation: number): Promise<void> {

        this.#flushScheduled = false

        if (generation !== this.#generation || !this.#shouldFlush(true)) {

            return
        }

        const lines = this.#buffer
        this.#buffer = []
        this.#lastFlush = Date.now()

        const chunk = lines.join('')

        this.#isWriting = true

        const [_, err] = await attempt(() =>
            appendFile(this.#options.filepath, chunk, 'utf-8')
        )

        this.#isWriting = false

        if (err) {

            // The batch is lost; the next flush is the retry for new lines
            this.#options.events.emit('logger:error', { operation: 'write', error: err })
            return
        }

        const bytes = Buffer.byteLength(chunk, 'utf-8')

        this.#totalWritten += lines.length
        this.#totalBytes += bytes
        this.#flushCount++

        this.#options.events.emit('logger:flushed', { entries: lines.length, bytes })

        await this.#rotate()
    }


    /**
     * Rotate the generations when the current file is over the cap.
     */
    async #rotate(): Promise<void> {

        const result = await checkAndRotate(
            this.#options.filepath,
            this.#options.maxSize,
            this.#options.maxFiles,
        )

        for (const error of result.failures ?? []) {

            this.#options.events.emit('logger:error', { operation: 'rotate', error })
        }

        if (result.rotated && result.oldFile && result.newFile) {

            this.#options.events.emit('logger:rotated', {
                oldFile: result.oldFile,
                newFile: result.newFile,
                deletedFiles: result.deletedFiles ?? [],
            })
        }
    }


    /**
     * Truncate every existing generation to zero bytes.
     */
    async #truncateAll(): Promise<string[]> {

        const files = await listGenerations(this.#options.filepath, this.#options.maxFiles)
        const cleared: string[] = []

        for (const file of files) {

            const [, err] = await attempt(() => writeFile(file, '', 'utf-8'))

            if (err) {

                this.#options.events.emit('logger:error', { operation: 'clear', error: err })
                continue
            }

            cleared.push(file)
        }

        this.#options.events.emit('logger:cleared', { files: cleared })

        return cleared
    }
}
