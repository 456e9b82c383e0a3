/**
 * Log Rotation
 *
 * Size-based rotation over a fixed set of generations:
 *
 *     app_logs.txt     current, always written to
 *     app_logs_1.txt   newest archive
 *     ...
 *     app_logs_N.txt   oldest archive, N = maxFiles
 *
 * When the current file exceeds the cap, archives shift up by one,
 * the oldest falls off, current becomes `_1` and an empty current
 * is created.
 */
import { stat, rename, unlink, writeFile } from 'node:fs/promises'
import { dirname, basename, join, extname } from 'node:path'
import { attempt } from '@logosdx/utils'

import type { RotationResult } from './types.js'


/**
 * Parse a size string (e.g., '5mb', '1gb') to bytes.
 *
 * @param size - Size string with unit suffix
 * @returns Size in bytes
 *
 * @example
 * ```typescript
 * parseSize('5mb')   // 5242880
 * parseSize('1gb')   // 1073741824
 * parseSize('512kb') // 524288
 * ```
 */
export function parseSize(size: string): number {

    const match = size.toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/)

    if (!match || !match[1]) {

        throw new Error(`Invalid size format: ${size}`)
    }

    const value = parseFloat(match[1])
    const unit = match[2] ?? 'b'

    const multipliers: Record<string, number> = {
        b: 1,
        kb: 1024,
        mb: 1024 * 1024,
        gb: 1024 * 1024 * 1024,
    }

    const multiplier = multipliers[unit]

    if (multiplier === undefined) {

        throw new Error(`Invalid size unit: ${unit}`)
    }

    return Math.floor(value * multiplier)
}


/**
 * Path of a generation. Index 0 is the current file.
 *
 * @example
 * ```typescript
 * generationPath('/logs/app_logs.txt', 0)  // '/logs/app_logs.txt'
 * generationPath('/logs/app_logs.txt', 2)  // '/logs/app_logs_2.txt'
 * ```
 */
export function generationPath(filepath: string, index: number): string {

    if (index === 0) {

        return filepath
    }

    const dir = dirname(filepath)
    const ext = extname(filepath)
    const base = basename(filepath, ext)

    return join(dir, `${base}_${index}${ext}`)
}


/**
 * Check whether a file exists.
 */
export async function fileExists(filepath: string): Promise<boolean> {

    const [, err] = await attempt(() => stat(filepath))

    return !err
}


/**
 * List existing generations: current first, then archives newest to
 * oldest.
 *
 * @param filepath - Current log file path
 * @param maxFiles - Number of archives kept
 */
export async function listGenerations(filepath: string, maxFiles: number): Promise<string[]> {

    const files: string[] = []

    for (let i = 0; i <= maxFiles; i++) {

        const path = generationPath(filepath, i)

        if (await fileExists(path)) {

            files.push(path)
        }
    }

    return files
}


/**
 * Check if a log file needs rotation.
 *
 * @param filepath - Path to log file
 * @param maxSize - Maximum size in bytes
 * @returns true if file is larger than maxSize
 */
export async function needsRotation(filepath: string, maxSize: number): Promise<boolean> {

    const [stats, err] = await attempt(() => stat(filepath))

    if (err) {

        // File doesn't exist or can't be read - no rotation needed
        return false
    }

    return stats.size > maxSize
}


/**
 * Remove a file if it exists.
 *
 * @returns true when a file was removed
 */
async function removeIfExists(filepath: string, failures: Error[]): Promise<boolean> {

    if (!(await fileExists(filepath))) {

        return false
    }

    const [, err] = await attempt(() => unlink(filepath))

    if (err) {

        failures.push(err)
        return false
    }

    return true
}


/**
 * Shift every generation up by one and start an empty current file.
 *
 * Each step is best-effort: a failed step is recorded and the
 * remaining steps still run.
 *
 * @param filepath - Current log file path
 * @param maxFiles - Number of archives kept
 * @returns Rotation result
 */
export async function rotateGenerations(filepath: string, maxFiles: number): Promise<RotationResult> {

    const failures: Error[] = []
    const deletedFiles: string[] = []

    for (let i = maxFiles - 1; i >= 1; i--) {

        const source = generationPath(filepath, i)

        if (!(await fileExists(source))) {

            continue
        }

        const target = generationPath(filepath, i + 1)

        if (await removeIfExists(target, failures)) {

            deletedFiles.push(target)
        }

        const [, err] = await attempt(() => rename(source, target))

        if (err) {

            failures.push(err)
        }
    }

    const newFile = generationPath(filepath, 1)

    if (await removeIfExists(newFile, failures)) {

        deletedFiles.push(newFile)
    }

    const [, renameErr] = await attempt(() => rename(filepath, newFile))

    if (renameErr) {

        failures.push(renameErr)
    }

    const [, createErr] = await attempt(() => writeFile(filepath, '', { flag: 'a' }))

    if (createErr) {

        failures.push(createErr)
    }

    return {
        rotated: !renameErr,
        oldFile: filepath,
        newFile,
        deletedFiles: deletedFiles.length > 0 ? deletedFiles : undefined,
        failures: failures.length > 0 ? failures : undefined,
    }
}


/**
 * Check and perform rotation if needed.
 *
 * @param filepath - Path to log file
 * @param maxSize - Maximum size in bytes
 * @param maxFiles - Number of archives kept
 * @returns Rotation result
 *
 * @example
 * ```typescript
 * const result = await checkAndRotate('/logs/app_logs.txt', parseSize('5mb'), 3)
 * if (result.rotated) {
 *     console.log(`Rotated to ${result.newFile}`)
 * }
 * ```
 */
export async function checkAndRotate(
    filepath: string,
    maxSize: number,
    maxFiles: number
): Promise<RotationResult> {

    const shouldRotate = await needsRotation(filepath, maxSize)

    if (!shouldRotate) {

        return { rotated: false }
    }

    return rotateGenerations(filepath, maxFiles)
}
