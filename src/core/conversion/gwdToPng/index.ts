// src/core/conversion/gwdToPng/index.ts

import type { IGwdToPngOptions } from '../../../@types/index.ts';
import { GwdToPngStateMachine } from './stateMachine.ts';

/**
 * Converts one GWD file to a PNG file.
 *
 * @param {IGwdToPngOptions} options - Input and output paths, logger and optional image processor.
 * @return {Promise<void>} Resolves once the PNG has been written.
 */
export async function convertGwdToPng(options: IGwdToPngOptions): Promise<void> {
    const stateMachine = new GwdToPngStateMachine(options);
    await stateMachine.run();
}
