// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import sharp from 'sharp';
import type { IImageLoadOptions, ImageProcessor, IRasterBuffer } from '../../../@types/index.ts';
import { config } from '../../../config/index.ts';
import { toRaster } from '../../raster/rasterBuffer.ts';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Loads an image as raw interleaved sRGB samples. Alpha is removed unless `keepAlpha` is set, in
     * which case an alpha channel is added to images that lack one.
     *
     * @param {string} pngPath - The file path to the image.
     * @param {IImageLoadOptions} [options] - Whether to keep an alpha channel.
     * @return {Promise<IRasterBuffer>} The raw samples.
     */
    public async loadImageData(pngPath: string, options: IImageLoadOptions = {}): Promise<IRasterBuffer> {
        const base = sharp(pngPath).toColourspace('srgb');
        const image = options.keepAlpha ? base.ensureAlpha() : base.removeAlpha();
        const { data, info } = await image.raw().toBuffer({ resolveWithObject: true });
        return toRaster(data, info.width, info.height, info.channels);
    }

    /**
     * Encodes raw samples as PNG in memory.
     *
     * @param {IRasterBuffer} raster - Samples to encode; 1, 3 or 4 channels.
     * @return {Promise<Uint8Array>} The PNG file contents.
     */
    public async encodePng(raster: IRasterBuffer): Promise<Uint8Array> {
        return await sharp(raster.data, {
            raw: {
                width: raster.width,
                height: raster.height,
                channels: raster.channels,
            },
        })
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toBuffer();
    }
}
