// src/config/index.ts

import { Buffer } from 'node:buffer';

export const GWD_MAGIC = Buffer.from('GWD', 'ascii');

export const HEADER_SIZE = 12;

/** Offset of the first byte counted by `payloadSize`. */
export const PAYLOAD_SIZE_ORIGIN = 4;

export const ALPHA_FLAG = 0x01;

export const ARCHIVE_TERMINATOR = Buffer.from([0x00, 0x00, 0x00, 0x00]);

export const config = {
    imageCompression: {
        compressionLevel: 7,
        adaptiveFiltering: false,
    },
    scanline: {
        maxRunLength: 255, // Longest zero run emitted as a single token
    },
    extensions: {
        gwd: '.gwd',
        png: '.png',
    },
    archive: {
        restartEntryName: 'system_setup_ss', // Indices jump to restartIndex from this entry on
        restartIndex: 10000,
        orderFileName: 'order.json',
    },
};
