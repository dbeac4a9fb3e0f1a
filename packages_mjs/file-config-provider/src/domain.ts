/**
 * Data models for the file config provider.
 */

import type { PlainMap } from '@internal/config-document';

export const PROVIDER_VERSION = '0.2.1';
export const PROVIDER_TYPE = 'file';

/** Reserved path segment: merge every file, or expand the map it trails. */
export const WILDCARD = '*';

/**
 * One configuration unit: an alias bound to a canonical directory and the
 * documents found directly inside it.
 */
export interface Instance {
    readonly alias: string;
    /** Canonical absolute path (symlinks resolved). */
    readonly directory: string;
    /** Base name (extension stripped) -> absolute file path. */
    readonly files: ReadonlyMap<string, string>;
    readonly ready: true;
}

export interface InitRequest {
    alias: string;
    /** `directory` is required; other keys are ignored. */
    config: Record<string, unknown>;
    /** File that declared this instance; relative directories resolve beside it. */
    sourceFilePath?: string;
}

export type FetchPath = readonly string[];

export type FetchResult = PlainMap;

export interface InfoResult {
    version: string;
    type: string;
}

export enum HealthStatus {
    OK = 'OK',
    DEGRADED = 'DEGRADED',
}

export interface HealthResult {
    status: HealthStatus;
    message: string;
}
