export * from './domain.js';
export * from './errors.js';
export * from './logger.js';
export * from './lock.js';
export * from './registry.js';
export * from './resolver.js';
export * from './service.js';
export * from './server.js';
export * from './config.js';
export { createProgram, startServer } from './cli.js';
export type { RunningServer, ServeOptions } from './cli.js';
export { parseInitConfig, InitConfigSchema, InitBodySchema, FetchBodySchema } from './validators.js';
