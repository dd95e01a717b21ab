// src/errors/index.ts

import type { ReadFailureReason } from '../@types/index.ts';

export type GwdErrorCode =
    | 'END_OF_STREAM'
    | 'INVALID_HEADER'
    | 'UNSUPPORTED_FORMAT'
    | 'CORRUPT_STREAM'
    | 'IO_FAILURE';

/**
 * Base class for every failure raised by the codec and the conversion pipeline.
 */
export class GwdError extends Error {
    constructor(readonly code: GwdErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GwdError';
    }
}

/**
 * A bit or byte was requested past the end of the input.
 */
export class EndOfStreamError extends GwdError {
    constructor(message = 'End of stream') {
        super('END_OF_STREAM', message);
        this.name = 'EndOfStreamError';
    }
}

/**
 * The input does not start with a GWD header. Callers usually treat this as "not this format".
 */
export class InvalidHeaderError extends GwdError {
    constructor(readonly reason: ReadFailureReason, message = `Invalid GWD header (${reason})`) {
        super('INVALID_HEADER', message);
        this.name = 'InvalidHeaderError';
    }
}

export class UnsupportedFormatError extends GwdError {
    constructor(message: string) {
        super('UNSUPPORTED_FORMAT', message);
        this.name = 'UnsupportedFormatError';
    }
}

/**
 * The bitstream is readable but its tokens do not describe a valid scanline.
 */
export class CorruptStreamError extends GwdError {
    constructor(message: string) {
        super('CORRUPT_STREAM', message);
        this.name = 'CorruptStreamError';
    }
}

export class IOFailureError extends GwdError {
    constructor(message: string, cause: unknown) {
        super('IO_FAILURE', message, { cause });
        this.name = 'IOFailureError';
    }
}
