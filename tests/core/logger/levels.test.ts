import { describe, it, expect } from 'vitest';

import {
    levelRank,
    shouldLog,
    isTraceLevel,
    parseLevel,
} from '../../../src/core/logger/levels.js';
import { LEVEL_INFO, LOG_LEVELS } from '../../../src/core/logger/types.js';

describe('logger: levels', () => {

    describe('LEVEL_INFO', () => {

        it('should rank levels from debug to critical', () => {

            expect(LOG_LEVELS.map(levelRank)).toEqual([0, 1, 2, 3, 4]);

        });

        it('should have a glyph per level', () => {

            expect(LEVEL_INFO.debug.glyph).toBe('🐛');
            expect(LEVEL_INFO.info.glyph).toBe('💙');
            expect(LEVEL_INFO.warning.glyph).toBe('⚠️');
            expect(LEVEL_INFO.error.glyph).toBe('❤️');
            expect(LEVEL_INFO.critical.glyph).toBe('💀');

        });

        it('should map levels to sink severities', () => {

            expect(LOG_LEVELS.map((level) => LEVEL_INFO[level].severity)).toEqual([
                'debug',
                'info',
                'default',
                'error',
                'fault',
            ]);

        });

    });

    describe('shouldLog', () => {

        it('should log levels at or above the minimum', () => {

            expect(shouldLog('warning', 'warning')).toBe(true);
            expect(shouldLog('error', 'warning')).toBe(true);
            expect(shouldLog('critical', 'debug')).toBe(true);

        });

        it('should skip levels below the minimum', () => {

            expect(shouldLog('debug', 'info')).toBe(false);
            expect(shouldLog('info', 'warning')).toBe(false);
            expect(shouldLog('error', 'critical')).toBe(false);

        });

        it('should agree with rank order for every pair', () => {

            for (const level of LOG_LEVELS) {

                for (const minimum of LOG_LEVELS) {

                    expect(shouldLog(level, minimum)).toBe(levelRank(level) >= levelRank(minimum));

                }

            }

        });

    });

    describe('isTraceLevel', () => {

        it('should only accept error and critical', () => {

            expect(LOG_LEVELS.filter(isTraceLevel)).toEqual(['error', 'critical']);

        });

    });

    describe('parseLevel', () => {

        it('should parse numeric ranks', () => {

            expect(parseLevel('0')).toBe('debug');
            expect(parseLevel('2')).toBe('warning');
            expect(parseLevel('4')).toBe('critical');

        });

        it('should parse names case-insensitively', () => {

            expect(parseLevel('INFO')).toBe('info');
            expect(parseLevel('Warning')).toBe('warning');
            expect(parseLevel('error')).toBe('error');

        });

        it('should reject unknown tokens', () => {

            expect(parseLevel('5')).toBeNull();
            expect(parseLevel('trace')).toBeNull();
            expect(parseLevel('')).toBeNull();

        });

    });

});
