/**
 * exprcalc - Library Entry Point
 *
 * Exports the tokenizer, parser, evaluator and helpers for use in other projects.
 * Nothing here writes to the console or touches process state.
 */

import { parse } from './parser/index.js';
import { evaluate } from './utils/evaluation.js';
import { CalcException } from './types/errors.js';
import type { CalculateOptions } from './types/options.js';
import type { Result } from './types/result.js';

// Parser
export { parse, Tokenizer, Parser } from './parser/index.js';

// Evaluation
export {
    evaluate,
    applyLogical,
    applyRelational,
    applyAdditive,
    applyMultiplicative,
} from './utils/evaluation.js';

// Printing
export { astToString } from './utils/ast/printer.js';
export { astToJSON } from './utils/ast/serialize.js';
export type { ExpressionJSON } from './utils/ast/serialize.js';

// Configuration
export { loadConfig, formatZodIssues } from './config.js';
export type { Config } from './config.js';

// Types and Interfaces
export * from './types/index.js';

/**
 * Tokenize, parse and evaluate an expression
 */
export function calculate(input: string, options: CalculateOptions = {}): Result<bigint> {
    const tree = parse(input, options);
    if (!tree.ok) return tree;
    return evaluate(tree.value);
}

/**
 * Like calculate, but throws a CalcException on failure
 */
export function calculateOrThrow(input: string, options: CalculateOptions = {}): bigint {
    const result = calculate(input, options);
    if (!result.ok) {
        throw new CalcException(result.error);
    }
    return result.value;
}
