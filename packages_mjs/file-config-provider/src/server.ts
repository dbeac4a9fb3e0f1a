/**
 * HTTP harness exposing the provider operations.
 */

import Fastify, { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { ErrorKind, isProviderError } from './errors.js';
import { getLogger } from './logger.js';
import { FileProviderService } from './service.js';
import { FetchBodySchema, InitBodySchema, parseBody } from './validators.js';

const logger = getLogger();

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
    InvalidInput: 400,
    NotFound: 404,
    Conflict: 409,
    FailedPrecondition: 412,
    Internal: 500
};

export interface ErrorDetail {
    code: ErrorKind;
    message: string;
    details?: { rolledBack: number };
}

export interface ErrorResponse {
    error: ErrorDetail;
}

export interface ServerOptions {
    /** Enable Fastify's request logger. */
    requestLogging?: boolean;
}

export function buildServer(service: FileProviderService, options: ServerOptions = {}): FastifyInstance {
    const app = Fastify({ logger: options.requestLogging ?? false });

    app.setErrorHandler((error: FastifyError, request, reply) => sendError(reply, error));

    app.post('/init', async (request) => {
        const body = parseBody(InitBodySchema, request.body);
        await service.init(body);
        return {};
    });

    app.post('/fetch', async (request) => {
        const { path } = parseBody(FetchBodySchema, request.body);
        return { value: await service.fetch(path) };
    });

    app.get('/info', async () => service.info());

    app.get('/health', async () => service.health());

    app.post('/shutdown', async () => {
        await service.shutdown();
        return {};
    });

    return app;
}

function sendError(reply: FastifyReply, error: FastifyError): FastifyReply {
    let detail: ErrorDetail;
    if (isProviderError(error)) {
        detail = { code: error.kind, message: error.message };
        if (error.rolledBack !== undefined) {
            detail.details = { rolledBack: error.rolledBack };
        }
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
        // Fastify's own request errors: bad JSON, unsupported media type.
        detail = { code: 'InvalidInput', message: error.message };
    } else {
        logger.error(`Unhandled error: ${error.message}`);
        detail = { code: 'Internal', message: error.message };
    }

    const body: ErrorResponse = { error: detail };
    return reply.status(STATUS_BY_KIND[detail.code]).send(body);
}
