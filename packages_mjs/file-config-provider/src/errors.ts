export type ErrorKind =
    | 'InvalidInput'
    | 'NotFound'
    | 'Conflict'
    | 'FailedPrecondition'
    | 'Internal';

export class ProviderError extends Error {
    /** Number of instances removed by a registration rollback, if one ran. */
    public rolledBack?: number;

    constructor(
        public kind: ErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'ProviderError';
    }

    markRolledBack(count: number): this {
        this.rolledBack = count;
        this.message = `${this.message}; rolled back all ${count} instance(s)`;
        return this;
    }
}

export class InvalidInputError extends ProviderError {
    constructor(message: string) {
        super('InvalidInput', message);
        this.name = 'InvalidInputError';
    }
}

export class NotFoundError extends ProviderError {
    constructor(message: string) {
        super('NotFound', message);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends ProviderError {
    constructor(message: string) {
        super('Conflict', message);
        this.name = 'ConflictError';
    }
}

export class FailedPreconditionError extends ProviderError {
    constructor(message: string) {
        super('FailedPrecondition', message);
        this.name = 'FailedPreconditionError';
    }
}

export class InternalError extends ProviderError {
    constructor(
        message: string,
        public cause?: unknown
    ) {
        super('Internal', message);
        this.name = 'InternalError';
    }
}

export function isProviderError(error: unknown): error is ProviderError {
    return error instanceof ProviderError;
}

// Structural checks: errors thrown by Node's own modules fail `instanceof Error` inside a VM context.
export function hasMessage(error: unknown): error is { message: string } {
    return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

export function hasErrorCode(error: unknown): error is { code: string } {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

export function toProviderError(error: unknown): ProviderError {
    if (isProviderError(error)) {
        return error;
    }
    return new InternalError(describeError(error), error);
}

export function describeError(error: unknown): string {
    return hasMessage(error) ? error.message : String(error);
}
