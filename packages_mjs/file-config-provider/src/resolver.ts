/**
 * Fetch resolution.
 *
 * A fetch path is read in one of two shapes depending on the registry:
 *
 *   [alias, file, ...keys]  segment 0 names a registered instance
 *   [file, ...keys]         exactly one instance is registered
 *
 * `file` may be the wildcard, which merges every document of the instance in
 * ascending base-name order (later files win). A trailing wildcard returns the
 * map it follows unchanged.
 */

import {
    Document,
    DocumentStore,
    MapDocument,
    isMap,
    mergeAll,
    toPlain
} from '@internal/config-document';
import { FetchPath, FetchResult, Instance, WILDCARD } from './domain.js';
import {
    FailedPreconditionError,
    InternalError,
    InvalidInputError,
    NotFoundError,
    describeError
} from './errors.js';
import { getLogger } from './logger.js';
import type { InstanceRegistry } from './registry.js';

const logger = getLogger();

export type RegistryView = Pick<InstanceRegistry, 'get' | 'size' | 'sole'>;

export type ResolutionMode =
    | { mode: 'explicit'; instance: Instance }
    | { mode: 'implicit'; instance: Instance }
    | { mode: 'uninitialized' }
    | { mode: 'ambiguous' };

/**
 * Decide how segment 0 is read: alias membership first, then instance count.
 */
export function detectMode(registry: RegistryView, head: string): ResolutionMode {
    const named = registry.get(head);
    if (named) {
        return { mode: 'explicit', instance: named };
    }
    const sole = registry.sole();
    if (sole) {
        return { mode: 'implicit', instance: sole };
    }
    if (registry.size === 0) {
        return { mode: 'uninitialized' };
    }
    return { mode: 'ambiguous' };
}

export interface FileTarget {
    instance: Instance;
    fileName: string;
    /** Index in the fetch path of the first key below the file. */
    keysFrom: number;
}

export function locateFile(registry: RegistryView, path: FetchPath): FileTarget {
    if (path.length === 0) {
        throw new InvalidInputError('path cannot be empty');
    }
    if (path[0] === '') {
        throw new InvalidInputError('path[0] cannot be empty');
    }

    const detected = detectMode(registry, path[0]);
    switch (detected.mode) {
        case 'explicit':
            if (path.length < 2) {
                throw new InvalidInputError('path must contain at least [alias, filename]');
            }
            return { instance: detected.instance, fileName: path[1], keysFrom: 2 };
        case 'implicit':
            return { instance: detected.instance, fileName: path[0], keysFrom: 1 };
        case 'uninitialized':
            throw new FailedPreconditionError('no provider instances initialized');
        case 'ambiguous':
            throw new NotFoundError(
                `provider instance "${path[0]}" not found (hint: with multiple instances, path must start with alias)`
            );
    }
}

/**
 * Walk `path` from `keysFrom` down into `doc`.
 */
export function navigate(doc: Document, path: FetchPath, target: FileTarget): Document {
    let current = doc;
    for (let i = target.keysFrom; i < path.length; i++) {
        const key = path[i];

        if (key === WILDCARD && i === path.length - 1) {
            if (!isMap(current)) {
                throw new InvalidInputError(
                    `cannot expand path ${formatPath(path)}: wildcard at index ${i} applied to a non-map value`
                );
            }
            return current;
        }

        if (!isMap(current)) {
            throw new InvalidInputError(
                `cannot navigate to path ${formatPath(path)}: element at index ${i} is not a map`
            );
        }

        const next = current.entries.get(key);
        if (next === undefined) {
            throw new NotFoundError(
                `path element "${key}" not found in file "${target.fileName}" (provider instance "${target.instance.alias}")`
            );
        }
        current = next;
    }
    return current;
}

/**
 * Results are always map-shaped; scalars and lists are wrapped under `value`.
 */
export function shapeResult(doc: Document): FetchResult {
    if (isMap(doc)) {
        return toPlain(doc);
    }
    return { value: toPlain(doc) };
}

export class ResolutionEngine {
    constructor(
        private registry: RegistryView,
        private store: DocumentStore
    ) { }

    async resolve(path: FetchPath): Promise<Document> {
        const target = locateFile(this.registry, path);
        logger.debug(`Fetching from provider instance: alias="${target.instance.alias}" path=${formatPath(path)}`);

        const doc = target.fileName === WILDCARD
            ? await this.loadMerged(target.instance)
            : await this.loadFile(target.instance, target.fileName);

        return navigate(doc, path, target);
    }

    async fetch(path: FetchPath): Promise<FetchResult> {
        return shapeResult(await this.resolve(path));
    }

    private async loadFile(instance: Instance, fileName: string): Promise<MapDocument> {
        const filePath = instance.files.get(fileName);
        if (filePath === undefined) {
            throw new NotFoundError(`file "${fileName}" not found in provider instance "${instance.alias}"`);
        }
        return this.parse(filePath);
    }

    private async loadMerged(instance: Instance): Promise<MapDocument> {
        const baseNames = [...instance.files.keys()].sort();
        const docs: MapDocument[] = [];
        for (const baseName of baseNames) {
            const filePath = instance.files.get(baseName);
            if (filePath !== undefined) {
                docs.push(await this.parse(filePath));
            }
        }
        return mergeAll(docs);
    }

    private async parse(filePath: string): Promise<MapDocument> {
        try {
            return await this.store.parse(filePath);
        } catch (error) {
            throw new InternalError(`failed to parse document file "${filePath}": ${describeError(error)}`, error);
        }
    }
}

function formatPath(path: FetchPath): string {
    return JSON.stringify(path);
}
