/**
 * Service facade.
 *
 * Init and Shutdown take the write side of the lock for their whole duration,
 * filesystem work included; Fetch, Info and Health share the read side, so
 * fetches run concurrently with each other but never alongside a registration.
 */

import { DocumentStore, YamlDocumentStore } from '@internal/config-document';
import {
    FetchPath,
    FetchResult,
    HealthResult,
    HealthStatus,
    InfoResult,
    InitRequest,
    PROVIDER_TYPE,
    PROVIDER_VERSION
} from './domain.js';
import { ReadWriteLock } from './lock.js';
import { InstanceRegistry } from './registry.js';
import { ResolutionEngine } from './resolver.js';

export interface FileProviderServiceOptions {
    version?: string;
    providerType?: string;
    store?: DocumentStore;
}

export class FileProviderService {
    private lock = new ReadWriteLock();
    private registry = new InstanceRegistry();
    private engine: ResolutionEngine;
    private version: string;
    private providerType: string;

    constructor(options: FileProviderServiceOptions = {}) {
        this.version = options.version ?? PROVIDER_VERSION;
        this.providerType = options.providerType ?? PROVIDER_TYPE;
        this.engine = new ResolutionEngine(this.registry, options.store ?? new YamlDocumentStore());
    }

    async init(request: InitRequest): Promise<void> {
        await this.lock.write(() => this.registry.register(request));
    }

    fetch(path: FetchPath): Promise<FetchResult> {
        return this.lock.read(() => this.engine.fetch(path));
    }

    info(): Promise<InfoResult> {
        return this.lock.read(() => ({
            version: this.version,
            type: this.providerType
        }));
    }

    health(): Promise<HealthResult> {
        return this.lock.read(() => {
            if (this.registry.size === 0) {
                return { status: HealthStatus.DEGRADED, message: 'no instances initialized' };
            }
            return { status: HealthStatus.OK, message: 'healthy' };
        });
    }

    async shutdown(): Promise<void> {
        await this.lock.write(() => this.registry.reset());
    }

    /** Registered aliases in commit order. */
    aliases(): Promise<string[]> {
        return this.lock.read(() => this.registry.aliases());
    }
}
