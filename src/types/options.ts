export type OutputFormat = 'text' | 'json';

export interface TokenizeOptions {
    /**
     * Reject characters that match no token instead of skipping them.
     * Whitespace is always skipped.
     */
    strict?: boolean;
}

export type CalculateOptions = TokenizeOptions;

export interface CliOptions extends CalculateOptions {
    format?: OutputFormat;
    /** Print the parsed tree instead of evaluating it */
    ast?: boolean;
}

export const DEFAULTS = {
    strict: false,
    format: 'text',
} as const;
