// src/core/batch/batchProcess.ts

import * as path from 'node:path';
import type { ConversionDirection, IBatchOptions, IBatchReportEntry } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import { InvalidHeaderError } from '../../errors/index.ts';
import { ensureOutputDirectory, hasExtension, readDirectory, replaceExtension } from '../../utils/storage/storageUtils.ts';
import { convertGwdToPng } from '../conversion/gwdToPng/index.ts';
import { convertPngToGwd } from '../conversion/pngToGwd/index.ts';

const directionExtensions: Record<ConversionDirection, { from: string; to: string }> = {
    gwd2png: { from: config.extensions.gwd, to: config.extensions.png },
    png2gwd: { from: config.extensions.png, to: config.extensions.gwd },
};

/**
 * Lists the files of `inputFolder` that a batch in `direction` would convert.
 *
 * @param {string} inputFolder - Directory to scan (not recursive).
 * @param {ConversionDirection} direction - Which extension to pick.
 * @return {Promise<string[]>} Matching file names, sorted.
 */
export async function listConvertibleFiles(inputFolder: string, direction: ConversionDirection): Promise<string[]> {
    const { from } = directionExtensions[direction];
    const files = await readDirectory(inputFolder);
    return files.filter((file) => hasExtension(file, from));
}

async function convertFile(options: IBatchOptions, inputFile: string, outputFile: string): Promise<void> {
    const { direction, verbose, logger, keepAlpha, imageProcessor } = options;
    if (direction === 'gwd2png') {
        await convertGwdToPng({ inputFile, outputFile, verbose, logger, imageProcessor });
    } else {
        await convertPngToGwd({ inputFile, outputFile, verbose, logger, keepAlpha, imageProcessor });
    }
}

/**
 * Converts every matching file of a directory, one at a time. A file that fails is reported and the
 * batch moves on to the next one; files that are not GWD images are reported as skipped.
 *
 * @param {IBatchOptions} options - Direction, folders, logger and optional progress bar.
 * @return {Promise<IBatchReportEntry[]>} One entry per matching file, in processing order.
 */
export async function batchConvert(options: IBatchOptions): Promise<IBatchReportEntry[]> {
    const { direction, inputFolder, outputFolder, logger, progressBar } = options;
    const files = await listConvertibleFiles(inputFolder, direction);
    await ensureOutputDirectory(outputFolder);
    logger.info(`Found ${files.length} file(s) to convert in "${inputFolder}".`);

    const report: IBatchReportEntry[] = [];
    progressBar?.start(files.length, 0);

    for (const file of files) {
        const inputFile = path.join(inputFolder, file);
        const outputFile = path.join(outputFolder, replaceExtension(file, directionExtensions[direction].to));

        try {
            await convertFile(options, inputFile, outputFile);
            report.push({ file, status: 'converted' });
        } catch (error) {
            if (error instanceof InvalidHeaderError) {
                logger.warn(`Invalid GWD file: ${file}`);
                report.push({ file, status: 'skipped', reason: error.message });
            } else {
                const reason = error instanceof Error ? error.message : String(error);
                logger.error(`Error processing ${file}: ${reason}`);
                report.push({ file, status: 'failed', reason });
            }
        }
        progressBar?.increment({ file });
    }

    progressBar?.stop();
    const converted = report.filter((entry) => entry.status === 'converted').length;
    logger.info(`Converted ${converted} of ${files.length} file(s).`);
    return report;
}
