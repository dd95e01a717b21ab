// src/core/archive/archiveCodec.ts

import { Buffer } from 'node:buffer';
import type { IArchiveEntry, IArchiveOrderEntry } from '../../@types/index.ts';
import { ARCHIVE_TERMINATOR, config } from '../../config/index.ts';
import { EndOfStreamError } from '../../errors/index.ts';

// Entry: size u32 LE | index u32 LE | nameLength u16 LE | name (UTF-8) | data. A zero size ends the archive.
const ENTRY_HEADER_SIZE = 10;

/**
 * Serializes one entry.
 *
 * @param {IArchiveEntry} entry - Name, index and contents.
 * @return {Buffer} Entry header, name and data.
 */
export function writeArchiveEntry(entry: IArchiveEntry): Buffer {
    if (entry.data.length === 0) {
        throw new RangeError(`Entry "${entry.name}" is empty; a zero size marks the end of the archive`);
    }
    const name = Buffer.from(entry.name, 'utf8');
    const header = Buffer.alloc(ENTRY_HEADER_SIZE);
    header.writeUInt32LE(entry.data.length, 0);
    header.writeUInt32LE(entry.index, 4);
    header.writeUInt16LE(name.length, 8);
    return Buffer.concat([header, name, entry.data]);
}

export function writeArchive(entries: IArchiveEntry[]): Buffer {
    return Buffer.concat([...entries.map(writeArchiveEntry), ARCHIVE_TERMINATOR]);
}

/**
 * Parses an archive up to its terminator.
 *
 * @param {Uint8Array} bytes - Archive contents.
 * @return {IArchiveEntry[]} The entries in file order; `data` views the input without copying.
 * @throws {EndOfStreamError} If an entry or the terminator is cut short.
 */
export function readArchive(bytes: Uint8Array): IArchiveEntry[] {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const entries: IArchiveEntry[] = [];
    let offset = 0;

    while (true) {
        if (offset + 4 > buffer.length) {
            throw new EndOfStreamError(`Archive ends at byte ${offset} without a terminator`);
        }
        const size = buffer.readUInt32LE(offset);
        if (size === 0) {
            return entries;
        }
        if (offset + ENTRY_HEADER_SIZE > buffer.length) {
            throw new EndOfStreamError(`Truncated entry header at byte ${offset}`);
        }
        const index = buffer.readUInt32LE(offset + 4);
        const nameLength = buffer.readUInt16LE(offset + 8);
        const nameStart = offset + ENTRY_HEADER_SIZE;
        const dataStart = nameStart + nameLength;
        const dataEnd = dataStart + size;
        if (dataEnd > buffer.length) {
            throw new EndOfStreamError(`Truncated entry at byte ${offset}`);
        }
        entries.push({
            name: buffer.toString('utf8', nameStart, dataStart),
            index,
            data: buffer.subarray(dataStart, dataEnd),
        });
        offset = dataEnd;
    }
}

/**
 * Assigns archive indices to an ordered list of names. Entry i gets index i until the restart
 * entry, which gets the restart index; every entry after it counts on from there.
 *
 * @param {IArchiveOrderEntry[]} order - Names in archive order.
 * @return {number[]} One index per entry.
 */
export function assignArchiveIndices(order: IArchiveOrderEntry[]): number[] {
    const { restartEntryName, restartIndex } = config.archive;
    const indices: number[] = [];
    let restartedAt: number | null = null;

    order.forEach((entry, position) => {
        if (restartedAt === null && entry.name === restartEntryName) {
            restartedAt = position;
        }
        indices.push(restartedAt === null ? position : restartIndex + position - restartedAt);
    });
    return indices;
}
