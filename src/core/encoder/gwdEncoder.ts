// src/core/encoder/gwdEncoder.ts

import { Buffer } from 'node:buffer';
import type { BitsPerPixel, IRasterBuffer } from '../../@types/index.ts';
import { ALPHA_FLAG, HEADER_SIZE, PAYLOAD_SIZE_ORIGIN } from '../../config/index.ts';
import { BitWriter } from '../bitstream/BitWriter.ts';
import { encodeScanline } from '../coding/scanlineCodec.ts';
import { writeMetadata } from '../metadata/metadataCodec.ts';
import { createRaster, extractChannelRow, extractPlane, invertPlane } from '../raster/rasterBuffer.ts';

/**
 * Encodes the lines of `raster` (rows, then channels 0..channelCount-1) into one flushed bitstream.
 */
export function encodePixels(raster: IRasterBuffer, channelCount: number): Buffer {
    const writer = new BitWriter();
    for (let y = 0; y < raster.height; y++) {
        for (let c = 0; c < channelCount; c++) {
            encodeScanline(writer, extractChannelRow(raster, y, c));
        }
    }
    writer.flush();
    return writer.toBuffer();
}

function encodeAlphaSubImage(raster: IRasterBuffer): Buffer {
    const plane = createRaster(raster.width, raster.height, 1);
    plane.data.set(invertPlane(extractPlane(raster, 3)));
    const header = writeMetadata({
        width: raster.width,
        height: raster.height,
        bitsPerPixel: 8,
        payloadSize: raster.width * raster.height,
    });
    return Buffer.concat([Buffer.from([ALPHA_FLAG]), header, encodePixels(plane, 1)]);
}

export function bitsPerPixelForRaster(raster: IRasterBuffer): BitsPerPixel {
    switch (raster.channels) {
        case 1:
            return 8;
        case 3:
            return 24;
        case 4:
            return 32;
    }
}

/**
 * Encodes a raster as a GWD file. Channels are written in the raster's order, unchanged.
 *
 * One channel gives an 8bpp image and three channels a 24bpp image, both declaring
 * `payloadSize = width * height * bytesPerPixel`. Four channels give a 24bpp image followed by an
 * inverted alpha sub-image; there `payloadSize` is set so that `4 + payloadSize` lands on the alpha
 * flag.
 *
 * @param {IRasterBuffer} raster - Samples to encode.
 * @return {Buffer} The complete file.
 */
export function encodeGwd(raster: IRasterBuffer): Buffer {
    const bitsPerPixel = bitsPerPixelForRaster(raster);
    const { width, height } = raster;

    if (bitsPerPixel === 8) {
        const header = writeMetadata({ width, height, bitsPerPixel, payloadSize: width * height });
        return Buffer.concat([header, encodePixels(raster, 1)]);
    }

    const payload = encodePixels(raster, 3);
    if (bitsPerPixel === 24) {
        const header = writeMetadata({ width, height, bitsPerPixel, payloadSize: width * height * 3 });
        return Buffer.concat([header, payload]);
    }

    const header = writeMetadata({
        width,
        height,
        bitsPerPixel: 24,
        payloadSize: HEADER_SIZE - PAYLOAD_SIZE_ORIGIN + payload.length,
    });
    return Buffer.concat([header, payload, encodeAlphaSubImage(raster)]);
}
