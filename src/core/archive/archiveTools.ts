// src/core/archive/archiveTools.ts

import * as path from 'node:path';
import type { IArchiveEntry, IArchiveOrderEntry, IPackOptions, IUnpackOptions } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import {
    ensureOutputDirectory,
    readBufferFromFile,
    writeBufferToFile,
} from '../../utils/storage/storageUtils.ts';
import { assignArchiveIndices, readArchive, writeArchive } from './archiveCodec.ts';

/**
 * Validates the parsed contents of an order file.
 *
 * @param {unknown} value - Parsed JSON.
 * @return {IArchiveOrderEntry[]} The order entries.
 * @throws {Error} If the value is not an array of `{ name: string }`.
 */
export function parseOrderFile(value: unknown): IArchiveOrderEntry[] {
    if (!Array.isArray(value)) {
        throw new Error('Order file must contain a JSON array');
    }
    return value.map((item: unknown, position) => {
        if (typeof item !== 'object' || item === null || !('name' in item) || typeof item.name !== 'string') {
            throw new Error(`Order entry ${position} has no "name" string`);
        }
        return { name: item.name };
    });
}

/**
 * Packs the files of a directory into an archive, in the order listed by a JSON order file.
 *
 * @param {IPackOptions} options - Input directory, order file, output archive and logger.
 * @return {Promise<IArchiveEntry[]>} The entries written.
 */
export async function packArchive(options: IPackOptions): Promise<IArchiveEntry[]> {
    const { inputFolder, orderFile, outputFile, logger } = options;
    const orderText = (await readBufferFromFile(orderFile)).toString('utf8');
    const order = parseOrderFile(JSON.parse(orderText));
    const indices = assignArchiveIndices(order);

    const entries: IArchiveEntry[] = [];
    for (const [position, { name }] of order.entries()) {
        const data = await readBufferFromFile(path.join(inputFolder, name));
        entries.push({ name, index: indices[position], data });
        logger.debug(`Packed "${name}" as entry ${indices[position]} (${data.length} bytes).`);
    }

    await writeBufferToFile(outputFile, writeArchive(entries));
    logger.success(`Archive "${outputFile}" created with ${entries.length} entries.`);
    return entries;
}

/**
 * Extracts every entry of an archive into a directory and writes an order file listing them, so the
 * directory can be packed again.
 *
 * @param {IUnpackOptions} options - Archive path, output directory and logger.
 * @return {Promise<IArchiveEntry[]>} The entries extracted.
 */
export async function unpackArchive(options: IUnpackOptions): Promise<IArchiveEntry[]> {
    const { inputFile, outputFolder, logger } = options;
    const entries = readArchive(await readBufferFromFile(inputFile));
    await ensureOutputDirectory(outputFolder);

    for (const entry of entries) {
        const target = path.resolve(outputFolder, entry.name);
        if (path.relative(path.resolve(outputFolder), target).startsWith('..')) {
            throw new Error(`Entry name "${entry.name}" points outside the output folder`);
        }
        await writeBufferToFile(target, entry.data);
        logger.debug(`Extracted entry ${entry.index} "${entry.name}" (${entry.data.length} bytes).`);
    }

    const order: IArchiveOrderEntry[] = entries.map(({ name }) => ({ name }));
    const orderPath = path.join(outputFolder, config.archive.orderFileName);
    await writeBufferToFile(orderPath, new TextEncoder().encode(JSON.stringify(order, null, 2)));
    logger.success(`Extracted ${entries.length} entries from "${inputFile}".`);
    return entries;
}
