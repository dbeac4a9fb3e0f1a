/**
 * YAML document store.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Document, MapDocument, fromPlain, map } from './document.js';
import { DocumentError, DocumentParseError } from './errors.js';

export const DOCUMENT_EXTENSIONS: readonly string[] = ['.yaml', '.yml', '.json'];

/**
 * Parses the file at an absolute path into a map document.
 * Implementations must not cache and must be safe to call concurrently.
 */
export interface DocumentStore {
    parse(absolutePath: string): Promise<MapDocument>;
}

/**
 * Strip a recognized document extension. Returns null when the file is not
 * a document. Matching is case-sensitive.
 */
export function documentBaseName(fileName: string): string | null {
    const ext = path.extname(fileName);
    if (!DOCUMENT_EXTENSIONS.includes(ext)) {
        return null;
    }
    const base = fileName.slice(0, fileName.length - ext.length);
    return base.length > 0 ? base : null;
}

export class YamlDocumentStore implements DocumentStore {
    async parse(absolutePath: string): Promise<MapDocument> {
        let content: string;
        try {
            content = await fs.readFile(absolutePath, 'utf8');
        } catch (error) {
            throw new DocumentParseError(absolutePath, errorMessage(error));
        }
        return parseDocument(content, absolutePath);
    }
}

/**
 * Parse document text. An empty document is an empty map; any other
 * top-level value that is not a mapping is rejected.
 */
export function parseDocument(content: string, filePath: string): MapDocument {
    let raw: unknown;
    try {
        raw = yaml.load(content, { filename: filePath });
    } catch (error) {
        throw new DocumentParseError(filePath, errorMessage(error));
    }

    if (raw === null || raw === undefined) {
        return map();
    }

    let doc: Document;
    try {
        doc = fromPlain(raw);
    } catch (error) {
        if (error instanceof DocumentError) {
            throw new DocumentParseError(filePath, error.message);
        }
        throw error;
    }

    if (doc.kind !== 'map') {
        throw new DocumentParseError(filePath, `top-level value must be a mapping, got ${doc.kind}`);
    }
    return doc;
}

function errorMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
