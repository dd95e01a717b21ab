// src/core/coding/scanlineCodec.ts

import type { ScanlineToken } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import { CorruptStreamError } from '../../errors/index.ts';
import { bitLength } from '../../utils/bitManipulation/bitUtils.ts';
import type { BitReader } from '../bitstream/BitReader.ts';
import type { BitWriter } from '../bitstream/BitWriter.ts';
import { deltaDecodeLine, deltaEncodeLine } from './deltaPredictor.ts';
import { decodeCount, encodeCount } from './universalCountCode.ts';

// Each token: 3-bit width code, then a count (stored minus one).
// Width code 0 is a run of zero symbols; width code w reads `count` literals of w + 1 bits.
const WIDTH_CODE_BITS = 3;
const ZERO_RUN_WIDTH_CODE = 0;
const MIN_LITERAL_WIDTH = 2;

/**
 * Reads the tokens of one line of one channel into raw delta symbols.
 *
 * @param {BitReader} reader - Bit source positioned at the first token of the line.
 * @param {number} width - Number of samples in the line.
 * @return {Uint8Array} The raw symbols, before delta resolution.
 * @throws {CorruptStreamError} If a token runs past the end of the line.
 */
export function readScanlineSymbols(reader: BitReader, width: number): Uint8Array {
    const symbols = new Uint8Array(width);
    let position = 0;
    while (position < width) {
        const widthCode = reader.getBits(WIDTH_CODE_BITS);
        const count = decodeCount(reader) + 1;
        if (position + count > width) {
            throw new CorruptStreamError(
                `Run of ${count} at position ${position} overflows a line of ${width} samples`,
            );
        }
        if (widthCode === ZERO_RUN_WIDTH_CODE) {
            // Already zero-filled.
            position += count;
        } else {
            const sampleBits = widthCode + 1;
            for (let i = 0; i < count; i++) {
                symbols[position++] = reader.getBits(sampleBits);
            }
        }
    }
    return symbols;
}

/**
 * Decodes one line of one channel: token stream, then delta resolution.
 *
 * @param {BitReader} reader - Bit source positioned at the first token of the line.
 * @param {number} width - Number of samples in the line.
 * @return {Uint8Array} The decoded samples.
 */
export function decodeScanline(reader: BitReader, width: number): Uint8Array {
    return deltaDecodeLine(readScanlineSymbols(reader, width));
}

/**
 * Splits delta symbols into the tokens the encoder emits: zero runs (capped at the configured run
 * length) and single-value literal runs.
 *
 * @param {Uint8Array} symbols - Delta symbols of one line.
 * @return {ScanlineToken[]} Tokens in stream order.
 */
export function tokenizeSymbols(symbols: Uint8Array): ScanlineToken[] {
    const { maxRunLength } = config.scanline;
    const tokens: ScanlineToken[] = [];
    let position = 0;
    while (position < symbols.length) {
        const symbol = symbols[position];
        if (symbol === 0) {
            let run = 1;
            while (position + run < symbols.length && symbols[position + run] === 0 && run < maxRunLength) {
                run++;
            }
            tokens.push({ kind: 'zero-run', count: run });
            position += run;
        } else {
            tokens.push({
                kind: 'literal-run',
                bitWidth: Math.max(MIN_LITERAL_WIDTH, bitLength(symbol)),
                values: [symbol],
            });
            position++;
        }
    }
    return tokens;
}

/**
 * Tokenizes a line of samples as `encodeScanline` would write it.
 */
export function tokenizeScanline(line: Uint8Array): ScanlineToken[] {
    return tokenizeSymbols(deltaEncodeLine(line));
}

/**
 * Writes tokens to the stream. Accepts literal runs of any length, not only the ones
 * `tokenizeSymbols` produces.
 *
 * @param {BitWriter} writer - Destination of the bits.
 * @param {ScanlineToken[]} tokens - Tokens of one line.
 */
export function writeTokens(writer: BitWriter, tokens: ScanlineToken[]): void {
    for (const token of tokens) {
        if (token.kind === 'zero-run') {
            writer.writeBits(ZERO_RUN_WIDTH_CODE, WIDTH_CODE_BITS);
            encodeCount(writer, token.count - 1);
            continue;
        }
        if (token.bitWidth < MIN_LITERAL_WIDTH || token.bitWidth > 8 || token.values.length === 0) {
            throw new RangeError(`Invalid literal run: width ${token.bitWidth}, ${token.values.length} values`);
        }
        writer.writeBits(token.bitWidth - 1, WIDTH_CODE_BITS);
        encodeCount(writer, token.values.length - 1);
        for (const value of token.values) {
            writer.writeBits(value, token.bitWidth);
        }
    }
}

/**
 * Encodes one line of one channel.
 *
 * @param {BitWriter} writer - Destination of the bits; shared by every line of the image.
 * @param {Uint8Array} line - The samples of the line.
 */
export function encodeScanline(writer: BitWriter, line: Uint8Array): void {
    writeTokens(writer, tokenizeScanline(line));
}
