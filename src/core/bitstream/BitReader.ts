// src/core/bitstream/BitReader.ts

import { EndOfStreamError } from '../../errors/index.ts';
import type { ByteCursor } from './ByteCursor.ts';

/**
 * MSB-first bit reader. The accumulator holds at most one byte and is refilled one byte at a time,
 * so the cursor never runs ahead of the bits actually consumed.
 */
export class BitReader {
    private accumulator = 0;
    private available = 0;

    constructor(private readonly cursor: ByteCursor) {}

    /**
     * Reads the next `bitCount` bits, most significant first.
     *
     * @param {number} bitCount - Number of bits to read (1-32).
     * @return {number} The bits as an unsigned integer.
     * @throws {EndOfStreamError} If a byte is needed but the input is exhausted.
     */
    getBits(bitCount: number): number {
        if (!Number.isInteger(bitCount) || bitCount < 1 || bitCount > 32) {
            throw new RangeError(`Invalid bit count: ${bitCount}`);
        }

        let result = 0;
        let needed = bitCount;
        while (needed > 0) {
            if (this.available === 0) {
                const next = this.cursor.readByte();
                if (!next.ok) {
                    throw new EndOfStreamError(`End of stream at byte ${this.cursor.offset}`);
                }
                this.accumulator = next.value;
                this.available = 8;
            }

            const take = Math.min(needed, this.available);
            const shift = this.available - take;
            const chunk = (this.accumulator >> shift) & ((1 << take) - 1);
            // Multiplication keeps 32-bit reads unsigned.
            result = result * (1 << take) + chunk;

            this.available = shift;
            this.accumulator &= (1 << shift) - 1;
            needed -= take;
        }
        return result;
    }

    getNextBit(): number {
        return this.getBits(1);
    }
}
