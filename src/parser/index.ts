import type { Expression } from '../types/ast.js';
import type { TokenizeOptions } from '../types/options.js';
import type { Result } from '../types/result.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse an expression string into a tree
 */
export function parse(input: string, options: TokenizeOptions = {}): Result<Expression> {
    const tokens = new Tokenizer(input, options).tokenize();
    if (!tokens.ok) return tokens;
    return new Parser(tokens.value, input).parse();
}
