// src/core/conversion/pngToGwd/stateMachine.ts

import type { Buffer } from 'node:buffer';
import type { IPngToGwdOptions, IRasterBuffer } from '../../../@types/index.ts';
import { AbstractStateMachine } from '../../../stateMachine/AbstractStateMachine.ts';
import { PngToGwdStates } from '../../../stateMachine/definedStates.ts';
import { writeBufferToFile } from '../../../utils/storage/storageUtils.ts';
import { encodeGwd } from '../../encoder/gwdEncoder.ts';
import { loadImageData } from '../../imageProcessing/processor.ts';

export class PngToGwdStateMachine extends AbstractStateMachine<PngToGwdStates, IPngToGwdOptions> {
    private raster: IRasterBuffer | null = null;
    private encoded: Buffer | null = null;

    constructor(options: IPngToGwdOptions) {
        super(PngToGwdStates.INIT, options);
        this.stateTransitions = [
            { state: PngToGwdStates.INIT, handler: this.init },
            { state: PngToGwdStates.LOAD_IMAGE, handler: this.loadImage },
            { state: PngToGwdStates.ENCODE, handler: this.encode },
            { state: PngToGwdStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): PngToGwdStates {
        return PngToGwdStates.COMPLETED;
    }

    protected getErrorState(): PngToGwdStates {
        return PngToGwdStates.ERROR;
    }

    private init(): void {
        const { logger, verbose, inputFile } = this.options;
        if (verbose) logger.info(`Converting "${inputFile}" to GWD...`);
    }

    private async loadImage(): Promise<void> {
        const { inputFile, keepAlpha, imageProcessor, logger } = this.options;
        this.raster = await loadImageData(inputFile, { keepAlpha }, imageProcessor);
        logger.debug(`Loaded ${this.raster.width}x${this.raster.height} with ${this.raster.channels} channels.`);
    }

    /**
     * Channels go to the encoder in the order they were loaded. Decoding swaps channels 0 and 2
     * before saving, so a GWD written here comes back with red and blue exchanged.
     */
    private encode(): void {
        if (!this.raster) {
            throw new Error(`Missing raster in state "${this.state}"`);
        }
        this.encoded = encodeGwd(this.raster);
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, inputFile, logger } = this.options;
        if (!this.encoded) {
            throw new Error(`Missing encoded data in state "${this.state}"`);
        }
        await writeBufferToFile(outputFile, this.encoded);
        logger.success(`Converted "${inputFile}" to "${outputFile}"`);
    }
}
