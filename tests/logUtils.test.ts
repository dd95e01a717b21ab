// tests/logUtils.test.ts

import chalk from 'chalk';
import { describe, expect, it } from 'vitest';

import type { ILogFacility } from '../src/@types/index.ts';
import { createLogger, getLogger, NoopLogFacility } from '../src/utils/logging/logUtils.ts';

class RecordingFacility implements ILogFacility {
    lines: Array<[string, unknown]> = [];

    log(...input: unknown[]): void {
        this.lines.push(['log', input[0]]);
    }

    warn(...input: unknown[]): void {
        this.lines.push(['warn', input[0]]);
    }

    error(...input: unknown[]): void {
        this.lines.push(['error', input[0]]);
    }
}

describe('Logging utilities', () => {
    it('should prefix messages with the level and logger name', () => {
        const facility = new RecordingFacility();
        const logger = createLogger('codec', facility);
        logger.info('decoding');
        logger.warn('odd flag');
        logger.error('truncated');

        expect(facility.lines).toEqual([
            ['log', chalk.blue('[INFO] codec :: decoding')],
            ['warn', chalk.yellow('[WARNING] codec :: odd flag')],
            ['error', chalk.red('[ERROR] codec :: truncated')],
        ]);
        expect(logger.warnMessages).toEqual(['odd flag']);
        expect(logger.errorMessages).toEqual(['truncated']);
    });

    it('should only print debug messages when verbose, but always keep them', () => {
        const quiet = new RecordingFacility();
        const quietLogger = createLogger('quiet', quiet);
        quietLogger.debug('hidden');
        expect(quiet.lines).toEqual([]);
        expect(quietLogger.debugMessages).toEqual(['hidden']);

        const loud = new RecordingFacility();
        createLogger('loud', loud, true).debug('shown');
        expect(loud.lines).toEqual([['log', chalk.magenta('[DEBUG] loud :: shown')]]);
    });

    it('should return the same logger for the same name', () => {
        const first = getLogger('shared-name', NoopLogFacility);
        expect(getLogger('shared-name', console, true)).toBe(first);
        expect(first.verbose).toBe(false);
        expect(getLogger('other-name', NoopLogFacility)).not.toBe(first);
    });
});
