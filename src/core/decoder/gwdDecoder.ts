// src/core/decoder/gwdDecoder.ts

import type { IDecodedGwd, IGwdMetadata, ILogger, IRasterBuffer } from '../../@types/index.ts';
import { ALPHA_FLAG, HEADER_SIZE, PAYLOAD_SIZE_ORIGIN } from '../../config/index.ts';
import { InvalidHeaderError } from '../../errors/index.ts';
import { BitReader } from '../bitstream/BitReader.ts';
import { ByteCursor } from '../bitstream/ByteCursor.ts';
import { decodeScanline } from '../coding/scanlineCodec.ts';
import { readMetadata } from '../metadata/metadataCodec.ts';
import { appendChannel, channelsForBitsPerPixel, createRaster, invertPlane, writeChannelRow } from '../raster/rasterBuffer.ts';

export interface IGwdDecodeOptions {
    logger?: ILogger;
}

/**
 * Decodes every line of an image from a bitstream positioned at its first token. Lines are stored
 * row by row; within a row, one line per channel.
 *
 * @param {ByteCursor} cursor - Positioned right after the header.
 * @param {IGwdMetadata} metadata - Header of the image.
 * @return {IRasterBuffer} The stored channels, without any alpha.
 */
export function decodePixels(cursor: ByteCursor, metadata: IGwdMetadata): IRasterBuffer {
    const { width, height, bitsPerPixel } = metadata;
    const channels = channelsForBitsPerPixel(bitsPerPixel);
    const raster = createRaster(width, height, channels);
    const reader = new BitReader(cursor);

    for (let y = 0; y < height; y++) {
        for (let c = 0; c < channels; c++) {
            writeChannelRow(raster, y, c, decodeScanline(reader, width));
        }
    }
    return raster;
}

/**
 * Reads the optional alpha sub-image that follows the primary payload.
 *
 * @return {Uint8Array | null} The decoded (already inverted) alpha plane, or null when there is none
 * or it does not fit the primary image.
 */
function readAlphaPlane(
    bytes: Uint8Array,
    metadata: IGwdMetadata,
    logger?: ILogger,
): Uint8Array | null {
    const cursor = new ByteCursor(bytes, PAYLOAD_SIZE_ORIGIN + metadata.payloadSize);
    const flag = cursor.readByte();
    if (!flag.ok || flag.value !== ALPHA_FLAG) {
        return null;
    }

    const alphaOffset = cursor.offset;
    const alphaHeader = readMetadata(bytes, alphaOffset);
    if (!alphaHeader.ok) {
        logger?.debug(`Alpha flag set but no sub-image header (${alphaHeader.reason}); ignoring alpha.`);
        return null;
    }
    const alphaMeta = alphaHeader.value;
    if (alphaMeta.bitsPerPixel !== 8 || alphaMeta.width !== metadata.width || alphaMeta.height !== metadata.height) {
        logger?.debug(
            `Alpha sub-image ${alphaMeta.width}x${alphaMeta.height}@${alphaMeta.bitsPerPixel}bpp does not match ` +
                `${metadata.width}x${metadata.height}; ignoring alpha.`,
        );
        return null;
    }

    cursor.seek(alphaOffset + HEADER_SIZE);
    const alpha = decodePixels(cursor, alphaMeta);
    return invertPlane(alpha.data);
}

/**
 * Decodes a complete GWD file.
 *
 * @param {Uint8Array} bytes - The file contents.
 * @param {IGwdDecodeOptions} [options] - Optional logger for diagnostics.
 * @return {IDecodedGwd} Header, samples in stored channel order, and whether alpha was merged.
 * @throws {InvalidHeaderError} If the input does not start with a GWD header.
 * @throws {UnsupportedFormatError} If the bit depth is not 8, 24 or 32.
 * @throws {EndOfStreamError} If the payload is truncated.
 */
export function decodeGwd(bytes: Uint8Array, options: IGwdDecodeOptions = {}): IDecodedGwd {
    const { logger } = options;
    const header = readMetadata(bytes);
    if (!header.ok) {
        throw new InvalidHeaderError(header.reason);
    }
    const metadata = header.value;
    logger?.debug(
        `GWD header: ${metadata.width}x${metadata.height}, ${metadata.bitsPerPixel}bpp, payload ${metadata.payloadSize}.`,
    );

    const raster = decodePixels(new ByteCursor(bytes, HEADER_SIZE), metadata);
    if (raster.channels === 1) {
        return { metadata, raster, hasAlpha: false };
    }

    const alpha = readAlphaPlane(bytes, metadata, logger);
    if (!alpha) {
        return { metadata, raster, hasAlpha: false };
    }
    return { metadata, raster: appendChannel(raster, alpha), hasAlpha: true };
}
