/**
 * Runtime configuration for the HTTP harness, read from the environment.
 */

import { z } from 'zod';
import { LOG_LEVELS, LogLevel, isLogLevel } from './logger.js';
import { formatIssues } from './validators.js';

const LogLevelSchema = z
    .string()
    .transform(value => value.toLowerCase())
    .refine((value): value is LogLevel => isLogLevel(value), {
        message: `must be one of ${Object.keys(LOG_LEVELS).join(', ')}`
    });

export const RuntimeConfigSchema = z.object({
    FILE_PROVIDER_HOST: z.string().min(1).default('127.0.0.1'),
    FILE_PROVIDER_PORT: z.coerce.number().int().min(0).max(65535).default(0),
    FILE_PROVIDER_LOG_LEVEL: LogLevelSchema.default('info')
});

export interface RuntimeConfig {
    host: string;
    port: number;
    logLevel: LogLevel;
}

export class RuntimeConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RuntimeConfigError';
    }
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const result = RuntimeConfigSchema.safeParse(env);
    if (!result.success) {
        throw new RuntimeConfigError(`Invalid runtime configuration: ${formatIssues(result.error)}`);
    }
    return {
        host: result.data.FILE_PROVIDER_HOST,
        port: result.data.FILE_PROVIDER_PORT,
        logLevel: result.data.FILE_PROVIDER_LOG_LEVEL
    };
}
