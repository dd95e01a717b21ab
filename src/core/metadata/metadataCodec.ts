// src/core/metadata/metadataCodec.ts

import { Buffer } from 'node:buffer';
import type { IGwdMetadata, ReadResult } from '../../@types/index.ts';
import { GWD_MAGIC, HEADER_SIZE } from '../../config/index.ts';

// Layout: payloadSize u32 LE | "GWD" | width u16 BE | height u16 BE | bitsPerPixel u8

/**
 * Reads a GWD header at `offset`.
 *
 * @param {Uint8Array} bytes - The file contents.
 * @param {number} [offset=0] - Position of the header.
 * @return {ReadResult<IGwdMetadata>} The metadata, or `short-header` / `bad-magic`.
 */
export function readMetadata(bytes: Uint8Array, offset = 0): ReadResult<IGwdMetadata> {
    if (offset < 0 || bytes.length - offset < HEADER_SIZE) {
        return { ok: false, reason: 'short-header' };
    }
    const header = Buffer.from(bytes.buffer, bytes.byteOffset + offset, HEADER_SIZE);
    if (!header.subarray(4, 7).equals(GWD_MAGIC)) {
        return { ok: false, reason: 'bad-magic' };
    }
    return {
        ok: true,
        value: {
            payloadSize: header.readUInt32LE(0),
            width: header.readUInt16BE(7),
            height: header.readUInt16BE(9),
            bitsPerPixel: header.readUInt8(11),
        },
    };
}

/**
 * Serializes a GWD header.
 *
 * @param {IGwdMetadata} metadata - Header fields.
 * @return {Buffer} The 12 header bytes.
 * @throws {RangeError} If a field does not fit its slot.
 */
export function writeMetadata(metadata: IGwdMetadata): Buffer {
    const header = Buffer.alloc(HEADER_SIZE);
    // Buffer's write methods reject out-of-range values with a RangeError.
    header.writeUInt32LE(metadata.payloadSize, 0);
    GWD_MAGIC.copy(header, 4);
    header.writeUInt16BE(metadata.width, 7);
    header.writeUInt16BE(metadata.height, 9);
    header.writeUInt8(metadata.bitsPerPixel, 11);
    return header;
}

export function isGwd(bytes: Uint8Array): boolean {
    return readMetadata(bytes).ok;
}
