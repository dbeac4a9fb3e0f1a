import { z } from 'zod';
import { InvalidInputError } from './errors.js';

export const InitConfigSchema = z.object({
    directory: z.string()
});

export type InitConfig = z.infer<typeof InitConfigSchema>;

export const InitBodySchema = z.object({
    alias: z.string(),
    config: z.record(z.unknown()),
    sourceFilePath: z.string().optional()
});

export const FetchBodySchema = z.object({
    path: z.array(z.string())
});

export function formatIssues(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join(', ');
}

/**
 * Validate an instance config block. Only `directory` is read; unknown keys
 * are stripped.
 */
export function parseInitConfig(config: Record<string, unknown>): InitConfig {
    const result = InitConfigSchema.safeParse(config);
    if (result.success) {
        return result.data;
    }

    const issue = result.error.issues[0];
    if (issue.code === z.ZodIssueCode.invalid_type) {
        if (issue.received === z.ZodParsedType.undefined) {
            throw new InvalidInputError("missing required config key 'directory'");
        }
        throw new InvalidInputError(`directory must be a string, got ${issue.received}`);
    }
    throw new InvalidInputError(`invalid config: ${formatIssues(result.error)}`);
}

export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
        throw new InvalidInputError(`invalid request body: ${formatIssues(result.error)}`);
    }
    return result.data;
}
