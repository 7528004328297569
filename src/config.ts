import { z } from 'zod';
import { createConfigError } from './types/errors.js';
import { DEFAULTS } from './types/options.js';
import type { OutputFormat } from './types/options.js';
import { fail, ok } from './types/result.js';
import type { Result } from './types/result.js';

const booleanFlag = z
    .enum(['0', '1', 'true', 'false'])
    .optional()
    .transform(value => value === undefined ? undefined : value === '1' || value === 'true');

const envSchema = z.object({
    EXPRCALC_STRICT: booleanFlag.describe('Reject unrecognized characters while tokenizing'),
    EXPRCALC_FORMAT: z.enum(['text', 'json']).optional().describe("Output format: 'text' (default) or 'json'"),
});

export interface Config {
    strict: boolean;
    format: OutputFormat;
}

interface ZodIssueLike {
    readonly path: readonly (string | number)[];
    readonly message: string;
}

/**
 * Render zod issues as `path: message` pairs joined by "; "
 */
export function formatZodIssues(issues: readonly ZodIssueLike[]): string {
    const details = issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
    return `Invalid configuration: ${details.join('; ')}`;
}

/**
 * Read configuration from environment variables, falling back to DEFAULTS
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<Config> {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        return fail(createConfigError(formatZodIssues(parsed.error.issues), {
            issues: parsed.error.issues.map(issue => issue.path.join('.')),
        }));
    }

    return ok({
        strict: parsed.data.EXPRCALC_STRICT ?? DEFAULTS.strict,
        format: parsed.data.EXPRCALC_FORMAT ?? DEFAULTS.format,
    });
}
