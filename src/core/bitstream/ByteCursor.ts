// src/core/bitstream/ByteCursor.ts

import type { ReadResult } from '../../@types/index.ts';

/**
 * Forward reader over an in-memory byte array with absolute seeking.
 * Reads past the end report `end-of-stream` instead of throwing.
 */
export class ByteCursor {
    private position: number;

    constructor(private readonly bytes: Uint8Array, offset = 0) {
        this.position = 0;
        this.seek(offset);
    }

    get offset(): number {
        return this.position;
    }

    get remaining(): number {
        return Math.max(0, this.bytes.length - this.position);
    }

    seek(offset: number): void {
        if (!Number.isInteger(offset) || offset < 0) {
            throw new RangeError(`Invalid seek offset: ${offset}`);
        }
        this.position = offset;
    }

    readByte(): ReadResult<number> {
        if (this.position >= this.bytes.length) {
            return { ok: false, reason: 'end-of-stream' };
        }
        return { ok: true, value: this.bytes[this.position++] };
    }
}
