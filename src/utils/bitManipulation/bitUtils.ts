// src/utils/bitManipulation/bitUtils.ts

/**
 * Returns the number of bits needed to represent an unsigned value (0 for 0).
 *
 * @param {number} value - The unsigned integer to measure.
 * @return {number} floor(log2(value)) + 1, or 0 when value is 0.
 */
export function bitLength(value: number): number {
    let length = 0;
    let remaining = value;
    while (remaining > 0) {
        remaining = Math.floor(remaining / 2);
        length++;
    }
    return length;
}

/**
 * Inverts an 8-bit sample.
 *
 * @param {number} value - Sample in the range 0-255.
 * @return {number} 255 - value.
 */
export function invertSample(value: number): number {
    return 255 - value;
}
