import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export async function createTempFolder(prefix: string): Promise<string> {
    return await mkdtemp(path.join(os.tmpdir(), `gwd-tools-${prefix}-`));
}

export async function removeTempFolder(folder: string): Promise<void> {
    await rm(folder, { recursive: true, force: true });
}
