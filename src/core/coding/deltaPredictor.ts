// src/core/coding/deltaPredictor.ts

/**
 * Mirrored-range delta prediction. The previous sample is folded onto 0..127 so a symbol can describe
 * a step in either direction without leaving 0..255; symbols above twice the folded predictor are
 * stored as-is.
 */

function mirror(previous: number): number {
    return previous < 128 ? previous : 255 - previous;
}

function computeDecoded(symbol: number, previous: number): number {
    const m = mirror(previous);
    let value: number;
    if (2 * m < symbol) {
        value = symbol;
    } else if (symbol & 1) {
        value = m + ((symbol + 1) >> 1);
    } else {
        value = m - (symbol >> 1);
    }
    return previous < 128 ? value : 255 - value;
}

function buildDeltaTable(): ReadonlyArray<ReadonlyArray<number>> {
    const rows: ReadonlyArray<number>[] = [];
    for (let symbol = 0; symbol < 256; symbol++) {
        const row: number[] = [];
        for (let previous = 0; previous < 256; previous++) {
            row.push(computeDecoded(symbol, previous));
        }
        rows.push(Object.freeze(row));
    }
    return Object.freeze(rows);
}

/**
 * `DELTA_TABLE[symbol][previous]` is the decoded sample. Built once at load time and never written to.
 */
export const DELTA_TABLE = buildDeltaTable();

export function decodeDelta(symbol: number, previous: number): number {
    return DELTA_TABLE[symbol][previous];
}

/**
 * Computes the symbol that `decodeDelta` maps back to `current` under the same predictor.
 *
 * @param {number} current - Sample to encode (0-255).
 * @param {number} previous - The original sample to its left (0-255).
 * @return {number} Symbol in the range 0-255.
 */
export function encodeDelta(current: number, previous: number): number {
    const m = mirror(previous);
    const folded = previous < 128 ? current : 255 - current;
    if (folded > 2 * m) {
        return folded;
    }
    const step = folded - m;
    return step > 0 ? 2 * step - 1 : -2 * step;
}

/**
 * Replaces a line of samples by its delta symbols. The first sample is kept literally.
 */
export function deltaEncodeLine(line: Uint8Array): Uint8Array {
    const symbols = new Uint8Array(line.length);
    if (line.length === 0) return symbols;
    symbols[0] = line[0];
    for (let i = 1; i < line.length; i++) {
        symbols[i] = encodeDelta(line[i], line[i - 1]);
    }
    return symbols;
}

/**
 * Resolves a line of delta symbols in place, left to right, against the already decoded neighbour.
 */
export function deltaDecodeLine(symbols: Uint8Array): Uint8Array {
    for (let i = 1; i < symbols.length; i++) {
        symbols[i] = DELTA_TABLE[symbols[i]][symbols[i - 1]];
    }
    return symbols;
}
