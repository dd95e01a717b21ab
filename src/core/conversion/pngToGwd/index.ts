// src/core/conversion/pngToGwd/index.ts

import type { IPngToGwdOptions } from '../../../@types/index.ts';
import { PngToGwdStateMachine } from './stateMachine.ts';

/**
 * Converts one PNG (or any image sharp reads) to a GWD file.
 *
 * @param {IPngToGwdOptions} options - Input and output paths, alpha handling and logger.
 * @return {Promise<void>} Resolves once the GWD file has been written.
 */
export async function convertPngToGwd(options: IPngToGwdOptions): Promise<void> {
    const stateMachine = new PngToGwdStateMachine(options);
    await stateMachine.run();
}
