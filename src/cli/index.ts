// src/cli/index.ts

import { Command } from 'commander';
import * as path from 'node:path';
import cliProgress from 'cli-progress';
import type { ConversionDirection, IBatchReportEntry, ILogger, IProgressBar } from '../@types/index.ts';
import { batchConvert } from '../core/batch/batchProcess.ts';
import { packArchive, unpackArchive } from '../core/archive/archiveTools.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';

interface ICommonCliOptions {
    log?: boolean;
    verbose?: boolean;
}

interface IPngToGwdCliOptions extends ICommonCliOptions {
    alpha?: boolean;
}

function createProgressBar(): IProgressBar {
    return new cliProgress.SingleBar(
        {
            format: 'Converting |{bar}| {percentage}% || {value}/{total} files {file}',
            barCompleteChar: '█',
            barIncompleteChar: '░',
            hideCursor: true,
        },
        cliProgress.Presets.shades_grey,
    );
}

function summarize(report: IBatchReportEntry[], logger: ILogger): void {
    for (const entry of report.filter((item) => item.status !== 'converted')) {
        console.log(`${entry.status.toUpperCase()}: ${entry.file}${entry.reason ? ` (${entry.reason})` : ''}`);
    }
    logger.debug(`Batch report: ${JSON.stringify(report)}`);
}

async function runBatch(
    direction: ConversionDirection,
    inputDir: string,
    outputDir: string,
    options: IPngToGwdCliOptions,
): Promise<void> {
    const verbose = options.verbose || false;
    const isLogging = options.log || false;
    const logger = getLogger(direction, isLogging ? console : NoopLogFacility, verbose);
    const progressBar = isLogging ? undefined : createProgressBar();

    try {
        const report = await batchConvert({
            direction,
            inputFolder: path.resolve(inputDir),
            outputFolder: path.resolve(outputDir),
            verbose,
            logger,
            keepAlpha: options.alpha || false,
            progressBar,
        });
        summarize(report, logger);
    } catch (error) {
        progressBar?.stop();
        console.error(`Batch conversion failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}

export const program = new Command();
program
    .name('gwd-tools')
    .description('Convert GWD images to PNG and back, and pack AdvSys3 archives')
    .version('1.0.0');

program
    .command('gwd2png')
    .description('Convert every .gwd file of a directory to PNG')
    .argument('<inputDir>', 'Directory with GWD files')
    .argument('<outputDir>', 'Directory for the PNG files')
    .option('-l, --log', 'Enable logging instead of the progress bar')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (inputDir: string, outputDir: string, options: ICommonCliOptions) => {
        await runBatch('gwd2png', inputDir, outputDir, options);
    });

program
    .command('png2gwd')
    .description('Convert every .png file of a directory to GWD')
    .argument('<inputDir>', 'Directory with PNG files')
    .argument('<outputDir>', 'Directory for the GWD files')
    .option('-a, --alpha', 'Keep transparency as an alpha sub-image')
    .option('-l, --log', 'Enable logging instead of the progress bar')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (inputDir: string, outputDir: string, options: IPngToGwdCliOptions) => {
        await runBatch('png2gwd', inputDir, outputDir, options);
    });

program
    .command('pack')
    .description('Pack the files of a directory into an AdvSys3 archive')
    .argument('<inputDir>', 'Directory with the files to pack')
    .argument('<orderFile>', 'JSON array of { "name": ... } in archive order')
    .argument('<outputFile>', 'Archive to write')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (inputDir: string, orderFile: string, outputFile: string, options: ICommonCliOptions) => {
        const logger = getLogger('pack', console, options.verbose || false);
        try {
            await packArchive({
                inputFolder: path.resolve(inputDir),
                orderFile: path.resolve(orderFile),
                outputFile: path.resolve(outputFile),
                logger,
            });
        } catch (error) {
            logger.error(`Packing failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    });

program
    .command('unpack')
    .description('Extract an AdvSys3 archive into a directory')
    .argument('<archive>', 'Archive to read')
    .argument('<outputDir>', 'Directory for the extracted files')
    .option('-v, --verbose', 'Enable verbose logging')
    .showHelpAfterError()
    .action(async (archive: string, outputDir: string, options: ICommonCliOptions) => {
        const logger = getLogger('unpack', console, options.verbose || false);
        try {
            await unpackArchive({
                inputFile: path.resolve(archive),
                outputFolder: path.resolve(outputDir),
                logger,
            });
        } catch (error) {
            logger.error(`Unpacking failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exitCode = 1;
        }
    });
