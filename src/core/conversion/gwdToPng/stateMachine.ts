// src/core/conversion/gwdToPng/stateMachine.ts

import type { IDecodedGwd, IGwdToPngOptions, IRasterBuffer } from '../../../@types/index.ts';
import { AbstractStateMachine } from '../../../stateMachine/AbstractStateMachine.ts';
import { GwdToPngStates } from '../../../stateMachine/definedStates.ts';
import { readBufferFromFile, writeBufferToFile } from '../../../utils/storage/storageUtils.ts';
import { decodeGwd } from '../../decoder/gwdDecoder.ts';
import { encodePng } from '../../imageProcessing/processor.ts';
import { reverseColorChannels } from '../../raster/rasterBuffer.ts';

export class GwdToPngStateMachine extends AbstractStateMachine<GwdToPngStates, IGwdToPngOptions> {
    private input: Uint8Array | null = null;
    private decoded: IDecodedGwd | null = null;
    private displayRaster: IRasterBuffer | null = null;

    constructor(options: IGwdToPngOptions) {
        super(GwdToPngStates.INIT, options);
        this.stateTransitions = [
            { state: GwdToPngStates.INIT, handler: this.init },
            { state: GwdToPngStates.READ_INPUT, handler: this.readInput },
            { state: GwdToPngStates.DECODE, handler: this.decode },
            { state: GwdToPngStates.REORDER_CHANNELS, handler: this.reorderChannels },
            { state: GwdToPngStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): GwdToPngStates {
        return GwdToPngStates.COMPLETED;
    }

    protected getErrorState(): GwdToPngStates {
        return GwdToPngStates.ERROR;
    }

    private init(): void {
        const { logger, verbose, inputFile } = this.options;
        if (verbose) logger.info(`Converting "${inputFile}" to PNG...`);
    }

    private async readInput(): Promise<void> {
        this.input = await readBufferFromFile(this.options.inputFile);
    }

    private decode(): void {
        const { logger } = this.options;
        this.decoded = decodeGwd(this.requireValue(this.input, 'input'), { logger });
        const { width, height, bitsPerPixel } = this.decoded.metadata;
        logger.info(
            `Saving image with width=${width}, height=${height}, bpp=${bitsPerPixel}` +
                (this.decoded.hasAlpha ? ' (with alpha)' : ''),
        );
    }

    /**
     * GWD stores colour lines as B, G, R; PNG wants R, G, B. Alpha stays last.
     */
    private reorderChannels(): void {
        this.displayRaster = reverseColorChannels(this.requireValue(this.decoded, 'decoded image').raster);
    }

    private async writeOutput(): Promise<void> {
        const { outputFile, imageProcessor, logger } = this.options;
        const png = await encodePng(this.requireValue(this.displayRaster, 'raster'), imageProcessor);
        await writeBufferToFile(outputFile, png);
        logger.success(`Converted "${this.options.inputFile}" to "${outputFile}"`);
    }

    private requireValue<T>(value: T | null, label: string): T {
        if (value === null) {
            throw new Error(`Missing ${label} in state "${this.state}"`);
        }
        return value;
    }
}
