import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { createLogger } from '../../../src/core/logger/init.js';
import type { Logger } from '../../../src/core/logger/logger.js';

describe('logger: init', () => {

    let testDir: string;
    let logger: Logger | null;

    beforeEach(async () => {

        testDir = join(
            tmpdir(),
            `loglane-test-init-${Date.now()}-${Math.random().toString(36).slice(2)}`,
        );
        await mkdir(testDir, { recursive: true });
        logger = null;

    });

    afterEach(async () => {

        await logger?.stop();
        await rm(testDir, { recursive: true, force: true });

    });

    it('should return a running logger', async () => {

        logger = await createLogger({ root: testDir, sink: null });

        expect(logger.state).toBe('running');
        expect(logger.getLogFileLocation()).toBe(join(testDir, 'logs', 'app_logs.txt'));

    });

    it('should load the config file relative to root', async () => {

        await writeFile(join(testDir, 'loglane.yml'), 'level: error\nfile: out/app.log\n');

        logger = await createLogger({ root: testDir, configFile: 'loglane.yml', sink: null });

        expect(logger.getMinimumLevel()).toBe('error');
        expect(logger.getLogFileLocation()).toBe(join(testDir, 'out', 'app.log'));

    });

    it('should let inline config win over the file', async () => {

        await writeFile(join(testDir, 'loglane.yml'), 'level: error\nbufferSize: 10\n');

        logger = await createLogger({
            root: testDir,
            configFile: 'loglane.yml',
            config: { level: 'debug' },
            sink: null,
        });

        expect(logger.getMinimumLevel()).toBe('debug');
        expect(logger.config.bufferSize).toBe(10);

    });

    it('should use defaults when the config file is missing', async () => {

        logger = await createLogger({ root: testDir, configFile: 'absent.yml', sink: null });

        expect(logger.config.level).toBe('info');

    });

});
