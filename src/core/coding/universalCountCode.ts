// src/core/coding/universalCountCode.ts

import type { BitReader } from '../bitstream/BitReader.ts';
import type { BitWriter } from '../bitstream/BitWriter.ts';

// A prefix of n - 1 zero bits and a one bit selects the range [2^n - 2, 2^(n+1) - 3],
// the n-bit suffix is the offset inside it.

const MAX_PREFIX_LENGTH = 32;

/**
 * Reads one count from the stream.
 *
 * @param {BitReader} reader - Source of the bits.
 * @return {number} The decoded non-negative count.
 */
export function decodeCount(reader: BitReader): number {
    let n = 1;
    while (reader.getNextBit() === 0) {
        n++;
        if (n > MAX_PREFIX_LENGTH) {
            throw new RangeError('Count prefix exceeds 32 bits');
        }
    }
    return reader.getBits(n) + 2 ** n - 2;
}

/**
 * Number of suffix bits used for `count`.
 *
 * @param {number} count - Non-negative integer.
 * @return {number} The n for which 2^n - 2 <= count <= 2^(n+1) - 3.
 */
export function countSuffixLength(count: number): number {
    if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`Invalid count: ${count}`);
    }
    let n = 1;
    while (count > 2 ** (n + 1) - 3) {
        n++;
    }
    return n;
}

/**
 * Writes one count in the form `decodeCount` reads.
 *
 * @param {BitWriter} writer - Destination of the bits.
 * @param {number} count - Non-negative integer to encode.
 */
export function encodeCount(writer: BitWriter, count: number): void {
    const n = countSuffixLength(count);
    if (n > MAX_PREFIX_LENGTH) {
        throw new RangeError(`Count too large: ${count}`);
    }
    writer.writeBits(0, n - 1);
    writer.writeBits(1, 1);
    writer.writeBits(count - (2 ** n - 2), n);
}
