// src/core/raster/rasterBuffer.ts

import type { ChannelCount, IRasterBuffer } from '../../@types/index.ts';
import { UnsupportedFormatError } from '../../errors/index.ts';
import { invertSample } from '../../utils/bitManipulation/bitUtils.ts';

const SUPPORTED_CHANNEL_COUNTS: readonly ChannelCount[] = [1, 3, 4];

export function isChannelCount(value: number): value is ChannelCount {
    return SUPPORTED_CHANNEL_COUNTS.some((count) => count === value);
}

/**
 * Maps a GWD bit depth to the number of stored channels. 32bpp images keep three stored channels;
 * their alpha comes from the sub-image.
 *
 * @param {number} bitsPerPixel - Bit depth from the header.
 * @return {1 | 3} Stored channel count.
 * @throws {UnsupportedFormatError} For any other bit depth.
 */
export function channelsForBitsPerPixel(bitsPerPixel: number): 1 | 3 {
    switch (bitsPerPixel) {
        case 8:
            return 1;
        case 24:
        case 32:
            return 3;
        default:
            throw new UnsupportedFormatError(`Unsupported bits per pixel: ${bitsPerPixel}`);
    }
}

export function createRaster(width: number, height: number, channels: number): IRasterBuffer {
    if (!isChannelCount(channels)) {
        throw new UnsupportedFormatError(`Unsupported channel count: ${channels}`);
    }
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
        throw new RangeError(`Invalid raster size: ${width}x${height}`);
    }
    return { width, height, channels, data: new Uint8Array(width * height * channels) };
}

/**
 * Wraps existing interleaved samples after checking that their length matches the shape.
 */
export function toRaster(data: Uint8Array, width: number, height: number, channels: number): IRasterBuffer {
    const raster = createRaster(width, height, channels);
    if (data.length !== raster.data.length) {
        throw new RangeError(
            `Expected ${raster.data.length} samples for ${width}x${height}x${channels}, got ${data.length}`,
        );
    }
    raster.data.set(data);
    return raster;
}

/**
 * Copies one channel of one row out of the interleaved buffer.
 */
export function extractChannelRow(raster: IRasterBuffer, row: number, channel: number): Uint8Array {
    const { width, channels, data } = raster;
    const line = new Uint8Array(width);
    let index = row * width * channels + channel;
    for (let x = 0; x < width; x++, index += channels) {
        line[x] = data[index];
    }
    return line;
}

/**
 * Writes one channel of one row into the interleaved buffer.
 */
export function writeChannelRow(raster: IRasterBuffer, row: number, channel: number, line: Uint8Array): void {
    const { width, channels, data } = raster;
    let index = row * width * channels + channel;
    for (let x = 0; x < width; x++, index += channels) {
        data[index] = line[x];
    }
}

/**
 * Copies a single channel out as a `width * height` plane.
 */
export function extractPlane(raster: IRasterBuffer, channel: number): Uint8Array {
    const { width, height, channels, data } = raster;
    const plane = new Uint8Array(width * height);
    for (let i = 0, index = channel; i < plane.length; i++, index += channels) {
        plane[i] = data[index];
    }
    return plane;
}

export function invertPlane(plane: Uint8Array): Uint8Array {
    return plane.map(invertSample);
}

/**
 * Returns a new 4-channel raster with `plane` as the last channel.
 *
 * @param {IRasterBuffer} raster - A 3-channel raster.
 * @param {Uint8Array} plane - `width * height` samples.
 * @return {IRasterBuffer} The merged raster.
 */
export function appendChannel(raster: IRasterBuffer, plane: Uint8Array): IRasterBuffer {
    if (raster.channels !== 3) {
        throw new UnsupportedFormatError(`Cannot append a channel to a ${raster.channels}-channel raster`);
    }
    if (plane.length !== raster.width * raster.height) {
        throw new RangeError(`Plane of ${plane.length} samples does not match ${raster.width}x${raster.height}`);
    }
    const merged = createRaster(raster.width, raster.height, 4);
    for (let pixel = 0; pixel < plane.length; pixel++) {
        const src = pixel * 3;
        const dst = pixel * 4;
        merged.data[dst] = raster.data[src];
        merged.data[dst + 1] = raster.data[src + 1];
        merged.data[dst + 2] = raster.data[src + 2];
        merged.data[dst + 3] = plane[pixel];
    }
    return merged;
}

/**
 * Returns a 3-channel copy without the alpha channel.
 */
export function dropAlpha(raster: IRasterBuffer): IRasterBuffer {
    if (raster.channels !== 4) {
        return raster;
    }
    const opaque = createRaster(raster.width, raster.height, 3);
    for (let pixel = 0; pixel < raster.width * raster.height; pixel++) {
        opaque.data.set(raster.data.subarray(pixel * 4, pixel * 4 + 3), pixel * 3);
    }
    return opaque;
}

/**
 * Returns a copy with channels 0 and 2 swapped (BGR to RGB, BGRA to RGBA). Single-channel rasters are
 * returned unchanged.
 */
export function reverseColorChannels(raster: IRasterBuffer): IRasterBuffer {
    if (raster.channels === 1) {
        return raster;
    }
    const data = Uint8Array.from(raster.data);
    for (let index = 0; index < data.length; index += raster.channels) {
        data[index] = raster.data[index + 2];
        data[index + 2] = raster.data[index];
    }
    return { ...raster, data };
}
