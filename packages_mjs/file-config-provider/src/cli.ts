import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import type { FastifyInstance } from 'fastify';
import { RuntimeConfig, loadRuntimeConfig } from './config.js';
import { PROVIDER_VERSION } from './domain.js';
import { LogLevel, getLogger, isLogLevel, setLogLevel } from './logger.js';
import { buildServer } from './server.js';
import { FileProviderService } from './service.js';

const logger = getLogger();

export interface RunningServer {
    app: FastifyInstance;
    service: FileProviderService;
    port: number;
    stop(): Promise<void>;
}

export interface ServeOptions {
    host?: string;
    port?: number;
    logLevel?: LogLevel;
}

/**
 * Start listening and announce the bound port on stdout as
 * `PROVIDER_PORT=<port>`; the process that spawned us reads that line.
 */
export async function startServer(
    config: RuntimeConfig,
    announce: (line: string) => void = line => process.stdout.write(`${line}\n`)
): Promise<RunningServer> {
    setLogLevel(config.logLevel);

    const service = new FileProviderService();
    const app = buildServer(service, {
        requestLogging: config.logLevel === 'debug' || config.logLevel === 'trace'
    });

    await app.listen({ host: config.host, port: config.port });

    const address = app.server.address();
    const port = typeof address === 'object' && address !== null ? address.port : config.port;

    announce(`PROVIDER_PORT=${port}`);
    logger.info(`File provider v${PROVIDER_VERSION} listening on ${config.host}:${port}`);

    return {
        app,
        service,
        port,
        stop: async () => {
            await service.shutdown();
            await app.close();
        }
    };
}

function parsePort(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
    }
    return port;
}

function parseLogLevel(value: string): LogLevel {
    const level = value.toLowerCase();
    if (!isLogLevel(level)) {
        throw new InvalidArgumentError('Unknown log level.');
    }
    return level;
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('file-config-provider')
        .description('Serve configuration documents from one or more directories')
        .version(PROVIDER_VERSION);

    program
        .command('serve')
        .description('Start the provider on a loopback port')
        .option('-H, --host <host>', 'Interface to bind')
        .option('-p, --port <port>', 'Port to bind (0 picks a free port)', parsePort)
        .option('-l, --log-level <level>', 'silent, error, warn, info, debug or trace', parseLogLevel)
        .action(async (options: ServeOptions) => {
            dotenv.config();
            const base = loadRuntimeConfig();
            const running = await startServer({
                host: options.host ?? base.host,
                port: options.port ?? base.port,
                logLevel: options.logLevel ?? base.logLevel
            });

            const onSignal = (signal: NodeJS.Signals): void => {
                logger.info(`Received ${signal}, stopping server...`);
                running.stop().catch((error: unknown) => {
                    logger.error('Shutdown failed:', error);
                    process.exitCode = 1;
                });
            };
            process.once('SIGINT', onSignal);
            process.once('SIGTERM', onSignal);
        });

    return program;
}
