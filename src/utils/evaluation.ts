/**
 * Expression Evaluation
 *
 * Post-order evaluation of an expression tree to a signed 64-bit integer.
 * Evaluation is pure; the same tree always yields the same result.
 */

import type {
    AdditiveOperator,
    Expression,
    LogicalOperator,
    MultiplicativeOperator,
    RelationalOperator,
} from '../types/ast.js';
import { createArithmeticError, createEvalError } from '../types/errors.js';
import { fail, ok } from '../types/result.js';
import type { Result } from '../types/result.js';

const int64 = (value: bigint): bigint => BigInt.asIntN(64, value);
const flag = (condition: boolean): bigint => condition ? 1n : 0n;

/**
 * Evaluate an expression tree
 */
export function evaluate(node: Expression): Result<bigint> {
    switch (node.type) {
        case 'literal':
            return ok(node.value);
        case 'parenthesized':
            return evaluate(node.inner);
    }

    const left = evaluate(node.left);
    if (!left.ok) return left;
    const right = evaluate(node.right);
    if (!right.ok) return right;

    switch (node.type) {
        case 'logical':
            return applyLogical(node.op, left.value, right.value);
        case 'relational':
            return applyRelational(node.op, left.value, right.value);
        case 'additive':
            return applyAdditive(node.op, left.value, right.value);
        case 'multiplicative':
            return applyMultiplicative(node.op, left.value, right.value);
    }
}

/**
 * `and` / `or` treat values > 0 as true; `xor` compares non-zero-ness.
 */
export function applyLogical(op: LogicalOperator, a: bigint, b: bigint): Result<bigint> {
    switch (op) {
        case 'and': return ok(flag(a > 0n && b > 0n));
        case 'or': return ok(flag(a > 0n || b > 0n));
        case 'xor': return ok(flag((a !== 0n) !== (b !== 0n)));
        default: return unimplemented('logical', op);
    }
}

export function applyRelational(op: RelationalOperator, a: bigint, b: bigint): Result<bigint> {
    switch (op) {
        case '<': return ok(flag(a < b));
        case '<=': return ok(flag(a <= b));
        case '>': return ok(flag(a > b));
        case '>=': return ok(flag(a >= b));
        case '==': return ok(flag(a === b));
        case '!=':
        case '/=': return ok(flag(a !== b));
        default: return unimplemented('relational', op);
    }
}

export function applyAdditive(op: AdditiveOperator, a: bigint, b: bigint): Result<bigint> {
    switch (op) {
        case '+': return ok(int64(a + b));
        case '-': return ok(int64(a - b));
        default: return unimplemented('additive', op);
    }
}

export function applyMultiplicative(op: MultiplicativeOperator, a: bigint, b: bigint): Result<bigint> {
    switch (op) {
        case '*': return ok(int64(a * b));
        case '/':
            if (b === 0n) return fail(createArithmeticError(a));
            // bigint division truncates toward zero
            return ok(int64(a / b));
        default: return unimplemented('multiplicative', op);
    }
}

// Reached only by trees built outside the parser, e.g. deserialized from JSON.
function unimplemented(nodeType: string, op: never): Result<never> {
    return fail(createEvalError(nodeType, String(op)));
}
