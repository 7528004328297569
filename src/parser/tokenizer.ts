import type { Token, TokenType } from '../types/parser.js';
import type { TokenizeOptions } from '../types/options.js';
import { createLexError } from '../types/errors.js';
import { fail, ok } from '../types/result.js';
import type { Result } from '../types/result.js';

// Alternatives in priority order; the capture group that matched decides the token type.
const TOKEN_PATTERN = /(and|or|xor)|(<=|>=|==|\/=|!=)|([<>=])|([-+])|([*/])|([0-9]+)|(\()|(\))/gi;

const GROUP_TYPES: readonly TokenType[] = [
    'LOGICAL',
    'RELATIONAL',
    'RELATIONAL',
    'ADDITIVE',
    'MULTIPLICATIVE',
    'INTEGER',
    'LPAREN',
    'RPAREN',
];

/**
 * Tokenizer for integer expressions
 *
 * Scans for the leftmost match of the combined token pattern, repeatedly.
 * Text between matches is skipped unless `strict` is set.
 */
export class Tokenizer {
    private input: string;
    private strict: boolean;
    private tokens: Token[] = [];

    constructor(input: string, options: TokenizeOptions = {}) {
        this.input = input;
        this.strict = options.strict ?? false;
    }

    tokenize(): Result<Token[]> {
        const pattern = new RegExp(TOKEN_PATTERN.source, TOKEN_PATTERN.flags);
        let pos = 0;
        this.tokens = [];

        for (const match of this.input.matchAll(pattern)) {
            const start = match.index ?? pos;
            const skipped = this.checkSkipped(pos, start);
            if (!skipped.ok) return skipped;

            this.tokens.push({ type: this.typeOf(match), value: match[0], position: start });
            pos = start + match[0].length;
        }

        const trailing = this.checkSkipped(pos, this.input.length);
        if (!trailing.ok) return trailing;

        if (this.tokens.length === 0) {
            return fail(createLexError('No tokens found in input', this.input));
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.input.length });
        return ok(this.tokens);
    }

    private typeOf(match: RegExpMatchArray): TokenType {
        const group = GROUP_TYPES.findIndex((_, i) => match[i + 1] !== undefined);
        return GROUP_TYPES[group];
    }

    private checkSkipped(from: number, to: number): Result<true> {
        if (!this.strict) return ok(true);

        for (let i = from; i < to; i++) {
            const char = this.input[i];
            if (!/\s/.test(char)) {
                return fail(createLexError(`Unexpected character '${char}'`, this.input, i));
            }
        }
        return ok(true);
    }
}
