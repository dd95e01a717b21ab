// tests/deltaPredictor.test.ts

import { describe, expect, it } from 'vitest';

import {
    decodeDelta,
    DELTA_TABLE,
    deltaDecodeLine,
    deltaEncodeLine,
    encodeDelta,
} from '../src/core/coding/deltaPredictor.ts';

describe('Delta predictor', () => {
    it('should decode symbol 0 to the previous sample', () => {
        for (let previous = 0; previous < 256; previous++) {
            expect(decodeDelta(0, previous)).toBe(previous);
        }
    });

    it('should step up for odd symbols and down for even ones', () => {
        expect(decodeDelta(1, 10)).toBe(11);
        expect(decodeDelta(2, 10)).toBe(9);
        expect(decodeDelta(20, 10)).toBe(0);
    });

    it('should store symbols above twice the folded predictor literally', () => {
        expect(decodeDelta(30, 10)).toBe(30);
        expect(decodeDelta(255, 0)).toBe(255);
    });

    it('should mirror predictors in the upper half', () => {
        expect(decodeDelta(1, 245)).toBe(244);
        expect(decodeDelta(2, 245)).toBe(246);
        expect(decodeDelta(255, 200)).toBe(0);
    });

    it('should encode the symbols the table decodes', () => {
        expect(encodeDelta(11, 10)).toBe(1);
        expect(encodeDelta(9, 10)).toBe(2);
        expect(encodeDelta(30, 10)).toBe(30);
        expect(encodeDelta(244, 245)).toBe(1);
        expect(encodeDelta(0, 200)).toBe(255);
        expect(encodeDelta(200, 200)).toBe(0);
    });

    it('should invert encoding for every sample and predictor pair', () => {
        for (let previous = 0; previous < 256; previous++) {
            for (let current = 0; current < 256; current++) {
                const symbol = encodeDelta(current, previous);
                expect(symbol).toBeGreaterThanOrEqual(0);
                expect(symbol).toBeLessThanOrEqual(255);
                if (decodeDelta(symbol, previous) !== current) {
                    expect({ previous, current, decoded: decodeDelta(symbol, previous) }).toEqual({
                        previous,
                        current,
                        decoded: current,
                    });
                }
            }
        }
    });

    it('should expose a frozen 256x256 table', () => {
        expect(DELTA_TABLE.length).toBe(256);
        expect(DELTA_TABLE.every((row) => row.length === 256)).toBe(true);
        expect(Object.isFrozen(DELTA_TABLE)).toBe(true);
        expect(Object.isFrozen(DELTA_TABLE[17])).toBe(true);
    });

    it('should keep the first sample of a line literal', () => {
        const line = Uint8Array.from([10, 11, 9, 30]);
        const symbols = deltaEncodeLine(line);
        expect([...symbols]).toEqual([10, 1, 4, 30]);
        expect([...deltaDecodeLine(symbols)]).toEqual([10, 11, 9, 30]);
    });

    it('should handle empty lines', () => {
        expect(deltaEncodeLine(new Uint8Array(0)).length).toBe(0);
        expect(deltaDecodeLine(new Uint8Array(0)).length).toBe(0);
    });
});
