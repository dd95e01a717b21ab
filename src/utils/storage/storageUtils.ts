// src/utils/storage/storageUtils.ts

import type { Buffer } from 'node:buffer';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { IOFailureError } from '../../errors/index.ts';

/**
 * Ensures that the specified output directory exists, creating it and any missing parents.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {Promise<void>}
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    try {
        await mkdir(outputFolder, { recursive: true });
    } catch (error) {
        throw new IOFailureError(`Failed to create directory "${outputFolder}"`, error);
    }
}

/**
 * Writes data to a file. If the write fails, whatever was written is removed so no truncated file
 * is left behind.
 *
 * @param {string} filePath - The path of the file where the data will be written.
 * @param {Uint8Array} data - The bytes to write.
 * @return {Promise<void>}
 */
export async function writeBufferToFile(filePath: string, data: Uint8Array): Promise<void> {
    try {
        await writeFile(filePath, data);
    } catch (error) {
        await rm(filePath, { force: true });
        throw new IOFailureError(`Failed to write "${filePath}"`, error);
    }
}

/**
 * Reads the entire contents of a file.
 *
 * @param {string} filePath - The file path of the file to be read.
 * @returns {Promise<Buffer>} - The contents of the file.
 */
export async function readBufferFromFile(filePath: string): Promise<Buffer> {
    try {
        return await readFile(filePath);
    } catch (error) {
        throw new IOFailureError(`Failed to read "${filePath}"`, error);
    }
}

/**
 * Lists the names of the regular files in a directory, sorted by name.
 *
 * @param {string} dirPath - The path of the directory to read.
 * @return {Promise<string[]>} - File names, without their directory.
 */
export async function readDirectory(dirPath: string): Promise<string[]> {
    try {
        const entries = await readdir(dirPath, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isFile())
            .map((entry) => entry.name)
            .sort();
    } catch (error) {
        throw new IOFailureError(`Failed to read directory "${dirPath}"`, error);
    }
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @param {string} filePath - The path to the file or directory.
 * @return {Promise<boolean>} Resolves to true if the path exists, otherwise false.
 */
export async function filePathExists(filePath: string): Promise<boolean> {
    try {
        await stat(filePath);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}

/**
 * Checks a file name's extension, ignoring case.
 *
 * @param {string} filename - The name of the file to check.
 * @param {string} extension - Expected extension, including the dot.
 * @return {boolean}
 */
export function hasExtension(filename: string, extension: string): boolean {
    return extname(filename).toLowerCase() === extension.toLowerCase();
}

/**
 * Replaces a file name's extension.
 *
 * @param {string} filename - e.g. "title.gwd".
 * @param {string} extension - e.g. ".png".
 * @return {string} e.g. "title.png".
 */
export function replaceExtension(filename: string, extension: string): string {
    return basename(filename, extname(filename)) + extension;
}
