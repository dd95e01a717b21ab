// src/core/bitstream/BitWriter.ts

import { Buffer } from 'node:buffer';

/**
 * MSB-first bit writer. Complete bytes are emitted as soon as they fill up; `flush` pads the last
 * partial byte with zero bits.
 */
export class BitWriter {
    private readonly bytes: number[] = [];
    private accumulator = 0;
    private pending = 0;

    /**
     * Appends the low `bitCount` bits of `value`.
     *
     * @param {number} value - Unsigned integer to take the bits from.
     * @param {number} bitCount - Number of bits to append (0-32).
     */
    writeBits(value: number, bitCount: number): void {
        if (!Number.isInteger(bitCount) || bitCount < 0 || bitCount > 32) {
            throw new RangeError(`Invalid bit count: ${bitCount}`);
        }
        if (!Number.isInteger(value) || value < 0) {
            throw new RangeError(`Invalid bit value: ${value}`);
        }

        let remaining = bitCount;
        while (remaining > 0) {
            const take = Math.min(remaining, 8 - this.pending);
            const shift = remaining - take;
            const chunk = Math.floor(value / 2 ** shift) & ((1 << take) - 1);

            this.accumulator = (this.accumulator << take) | chunk;
            this.pending += take;
            remaining = shift;

            if (this.pending === 8) {
                this.bytes.push(this.accumulator);
                this.accumulator = 0;
                this.pending = 0;
            }
        }
    }

    /**
     * Emits the residual bits, left-justified, as one final byte. A no-op when nothing is pending.
     */
    flush(): void {
        if (this.pending > 0) {
            this.bytes.push((this.accumulator << (8 - this.pending)) & 0xff);
            this.accumulator = 0;
            this.pending = 0;
        }
    }

    /** Total number of bits written, including the ones not yet emitted. */
    get bitLength(): number {
        return this.bytes.length * 8 + this.pending;
    }

    toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }
}
