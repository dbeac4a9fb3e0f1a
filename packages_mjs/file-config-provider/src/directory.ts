/**
 * Filesystem helpers used while registering an instance.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { DOCUMENT_EXTENSIONS, documentBaseName } from '@internal/config-document';
import {
    InternalError,
    InvalidInputError,
    NotFoundError,
    describeError,
    hasErrorCode
} from './errors.js';

/**
 * Resolve a configured directory to an absolute path. Relative paths resolve
 * beside the declaring file when one is given, otherwise against the working
 * directory.
 */
export function resolveDirectory(directory: string, sourceFilePath?: string): string {
    if (!path.isAbsolute(directory) && sourceFilePath) {
        return path.join(path.dirname(sourceFilePath), directory);
    }
    return path.resolve(directory);
}

export async function assertDirectory(absPath: string): Promise<void> {
    let stats: Stats;
    try {
        stats = await fs.stat(absPath);
    } catch (error) {
        if (hasErrorCode(error) && error.code === 'ENOENT') {
            throw new NotFoundError(`directory does not exist: ${absPath}`);
        }
        throw new InternalError(`failed to stat directory: ${describeError(error)}`, error);
    }
    if (!stats.isDirectory()) {
        throw new InvalidInputError(`path is not a directory: ${absPath}`);
    }
}

export async function canonicalizePath(absPath: string): Promise<string> {
    try {
        return path.normalize(await fs.realpath(absPath));
    } catch (error) {
        throw new InternalError(`failed to canonicalize path: ${describeError(error)}`, error);
    }
}

/**
 * Map base name -> absolute path for every document directly inside `dirPath`.
 * Entries are visited in name order. Subdirectories are skipped; hidden
 * files count as documents.
 */
export async function enumerateDocumentFiles(dirPath: string): Promise<Map<string, string>> {
    const pattern = `*{${DOCUMENT_EXTENSIONS.join(',')}}`;
    let names: string[];
    try {
        names = await glob(pattern, { cwd: dirPath, nodir: true, dot: true });
    } catch (error) {
        throw new InternalError(
            `failed to enumerate document files: failed to read directory "${dirPath}": ${describeError(error)}`,
            error
        );
    }

    const files = new Map<string, string>();
    for (const name of names.sort()) {
        const baseName = documentBaseName(name);
        if (baseName === null) {
            continue;
        }
        if (files.has(baseName)) {
            throw new InternalError(
                `failed to enumerate document files: duplicate file base name "${baseName}" in directory "${dirPath}"`
            );
        }
        files.set(baseName, path.join(dirPath, name));
    }

    if (files.size === 0) {
        throw new InternalError(`failed to enumerate document files: no document files found in directory "${dirPath}"`);
    }
    return files;
}
