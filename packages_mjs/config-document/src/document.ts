/**
 * Document model shared by the store and the provider.
 *
 * A document is a tree of three node kinds. Maps keep insertion order so a
 * parsed file round-trips with its keys in source order.
 */

import { DocumentConversionError } from './errors.js';

export type ScalarValue = string | number | boolean | null;

export interface ScalarDocument {
    kind: 'scalar';
    value: ScalarValue;
}

export interface ListDocument {
    kind: 'list';
    items: Document[];
}

export interface MapDocument {
    kind: 'map';
    entries: Map<string, Document>;
}

export type Document = ScalarDocument | ListDocument | MapDocument;

export type PlainValue = ScalarValue | PlainValue[] | { [key: string]: PlainValue };
export type PlainMap = { [key: string]: PlainValue };

export function scalar(value: ScalarValue): ScalarDocument {
    return { kind: 'scalar', value };
}

export function list(items: Document[] = []): ListDocument {
    return { kind: 'list', items };
}

export function map(entries: Iterable<[string, Document]> = []): MapDocument {
    return { kind: 'map', entries: new Map(entries) };
}

export function isMap(doc: Document): doc is MapDocument {
    return doc.kind === 'map';
}

/**
 * Convert a value produced by a parser (YAML/JSON) into a document.
 * Timestamps become ISO-8601 strings.
 */
export function fromPlain(value: unknown, keyPath: string[] = []): Document {
    if (value === null || value === undefined) {
        return scalar(null);
    }
    if (typeof value === 'string' || typeof value === 'boolean') {
        return scalar(value);
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new DocumentConversionError(keyPath, 'non-finite number');
        }
        return scalar(value);
    }
    if (value instanceof Date) {
        return scalar(value.toISOString());
    }
    if (Array.isArray(value)) {
        return list(value.map((item, index) => fromPlain(item, [...keyPath, String(index)])));
    }
    if (isPlainObject(value)) {
        const entries: Array<[string, Document]> = [];
        for (const [key, child] of Object.entries(value)) {
            entries.push([key, fromPlain(child, [...keyPath, key])]);
        }
        return map(entries);
    }
    throw new DocumentConversionError(keyPath, describeType(value));
}

function isPlainObject(value: unknown): value is object {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === null || proto === Object.prototype;
}

function describeType(value: unknown): string {
    if (typeof value === 'object' && value !== null) {
        return Object.prototype.toString.call(value).slice(8, -1);
    }
    return typeof value;
}

export function toPlain(doc: ScalarDocument): ScalarValue;
export function toPlain(doc: MapDocument): PlainMap;
export function toPlain(doc: Document): PlainValue;
export function toPlain(doc: Document): PlainValue {
    switch (doc.kind) {
        case 'scalar':
            return doc.value;
        case 'list':
            return doc.items.map(item => toPlain(item));
        case 'map':
            // Own data properties only: a `__proto__` key must stay a key.
            return Object.fromEntries(
                [...doc.entries].map(([key, child]): [string, PlainValue] => [key, toPlain(child)])
            );
    }
}
