// src/core/imageProcessing/processor.ts

import type { IImageLoadOptions, ImageProcessor, IRasterBuffer } from '../../@types/index.ts';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.ts';

export const defaultImageProcessor: ImageProcessor = new SharpImageProcessor();

/**
 * Loads raw image samples from the specified path using the given processor.
 *
 * @param {string} pngPath - The file path of the image to be loaded.
 * @param {IImageLoadOptions} [options] - Load options.
 * @param {ImageProcessor} [processor] - The processor to use; sharp by default.
 * @return {Promise<IRasterBuffer>} A promise that resolves to the raw samples.
 */
export async function loadImageData(
    pngPath: string,
    options: IImageLoadOptions = {},
    processor: ImageProcessor = defaultImageProcessor,
): Promise<IRasterBuffer> {
    return await processor.loadImageData(pngPath, options);
}

/**
 * Encodes raw samples as a PNG using the given processor.
 *
 * @param {IRasterBuffer} raster - The raw samples.
 * @param {ImageProcessor} [processor] - The processor to use; sharp by default.
 * @return {Promise<Uint8Array>} A promise that resolves to the PNG bytes.
 */
export async function encodePng(
    raster: IRasterBuffer,
    processor: ImageProcessor = defaultImageProcessor,
): Promise<Uint8Array> {
    return await processor.encodePng(raster);
}
