// src/index.ts

export * from './@types/index.ts';
export * from './errors/index.ts';
export { BitReader } from './core/bitstream/BitReader.ts';
export { BitWriter } from './core/bitstream/BitWriter.ts';
export { ByteCursor } from './core/bitstream/ByteCursor.ts';
export { decodeCount, encodeCount } from './core/coding/universalCountCode.ts';
export { DELTA_TABLE, decodeDelta, encodeDelta } from './core/coding/deltaPredictor.ts';
export { decodeScanline, encodeScanline, tokenizeScanline, writeTokens } from './core/coding/scanlineCodec.ts';
export { isGwd, readMetadata, writeMetadata } from './core/metadata/metadataCodec.ts';
export { decodeGwd } from './core/decoder/gwdDecoder.ts';
export { encodeGwd } from './core/encoder/gwdEncoder.ts';
export { createRaster, dropAlpha, reverseColorChannels } from './core/raster/rasterBuffer.ts';
export { convertGwdToPng } from './core/conversion/gwdToPng/index.ts';
export { convertPngToGwd } from './core/conversion/pngToGwd/index.ts';
export { batchConvert } from './core/batch/batchProcess.ts';
export { packArchive, unpackArchive } from './core/archive/archiveTools.ts';
export { readArchive, writeArchive } from './core/archive/archiveCodec.ts';
export { getLogger, NoopLogFacility } from './utils/logging/logUtils.ts';
