/**
 * Instance registry.
 *
 * Owns every registered instance together with two indexes: canonical
 * directory -> alias (a directory may back only one instance) and the commit
 * order. A registration either commits to all three or changes none of them.
 *
 * Registrations form one all-or-nothing batch: when a registration fails after
 * earlier ones succeeded, every committed instance is removed, newest first,
 * and the error reports how many were rolled back. A directory already owned
 * by another alias is rejected without touching the registry.
 */

import { Instance, InitRequest } from './domain.js';
import {
    assertDirectory,
    canonicalizePath,
    enumerateDocumentFiles,
    resolveDirectory
} from './directory.js';
import {
    ConflictError,
    InvalidInputError,
    ProviderError,
    toProviderError
} from './errors.js';
import { getLogger } from './logger.js';
import { parseInitConfig } from './validators.js';

const logger = getLogger();

export class InstanceRegistry {
    private instances: Map<string, Instance> = new Map();
    private directoryIndex: Map<string, string> = new Map();
    private order: string[] = [];

    get size(): number {
        return this.instances.size;
    }

    has(alias: string): boolean {
        return this.instances.has(alias);
    }

    get(alias: string): Instance | undefined {
        return this.instances.get(alias);
    }

    /** Aliases in commit order. */
    aliases(): string[] {
        return [...this.order];
    }

    /** The only registered instance, when exactly one exists. */
    sole(): Instance | undefined {
        if (this.instances.size !== 1) {
            return undefined;
        }
        return this.instances.values().next().value;
    }

    async register(request: InitRequest): Promise<Instance> {
        const { alias } = request;

        let directory: string;
        try {
            directory = await this.locate(request);
        } catch (error) {
            throw this.fail(alias, error);
        }

        const owner = this.directoryIndex.get(directory);
        if (owner !== undefined) {
            logger.warn(`Rejected provider instance: alias="${alias}" directory="${directory}" owner="${owner}"`);
            throw new ConflictError(
                `directory "${directory}" already registered by provider instance "${owner}", cannot register as "${alias}"`
            );
        }

        let files: Map<string, string>;
        try {
            files = await enumerateDocumentFiles(directory);
        } catch (error) {
            throw this.fail(alias, error);
        }

        const instance: Instance = {
            alias,
            directory,
            files,
            ready: true
        };
        Object.freeze(instance);

        this.instances.set(alias, instance);
        this.directoryIndex.set(directory, alias);
        this.order.push(alias);

        logger.info(`Initialized provider instance: alias="${alias}" directory="${directory}" files=${files.size}`);
        return instance;
    }

    reset(): void {
        if (this.instances.size > 0) {
            logger.info(`Reset provider registry: removed ${this.instances.size} instance(s)`);
        }
        this.instances = new Map();
        this.directoryIndex = new Map();
        this.order = [];
    }

    /** Steps up to canonicalization: validate the request, find the directory. */
    private async locate(request: InitRequest): Promise<string> {
        const { alias, config, sourceFilePath } = request;
        if (alias === '') {
            throw new InvalidInputError('alias cannot be empty');
        }
        if (this.instances.has(alias)) {
            throw new ConflictError('provider instance already initialized');
        }

        const { directory } = parseInitConfig(config);
        const absPath = resolveDirectory(directory, sourceFilePath);
        await assertDirectory(absPath);
        return canonicalizePath(absPath);
    }

    private fail(alias: string, cause: unknown): ProviderError {
        const error = toProviderError(cause);
        if (alias !== '') {
            error.message = `alias "${alias}": ${error.message}`;
        }

        const count = this.order.length;
        if (count > 0) {
            this.rollbackAll();
            error.markRolledBack(count);
        }
        logger.warn(`Provider instance registration failed: ${error.message}`);
        return error;
    }

    private rollbackAll(): void {
        for (let i = this.order.length - 1; i >= 0; i--) {
            const alias = this.order[i];
            logger.info(`Rolling back provider instance: alias="${alias}"`);
            const instance = this.instances.get(alias);
            if (instance) {
                this.directoryIndex.delete(instance.directory);
                this.instances.delete(alias);
            }
        }
        this.order = [];
    }
}
