import type { Expression, ExpressionType } from '../../types/index.js';

/**
 * JSON-safe mirror of an expression tree; literal values become decimal strings
 */
export type ExpressionJSON =
    | { type: Exclude<ExpressionType, 'literal' | 'parenthesized'>; op: string; left: ExpressionJSON; right: ExpressionJSON }
    | { type: 'literal'; value: string }
    | { type: 'parenthesized'; inner: ExpressionJSON };

export function astToJSON(node: Expression): ExpressionJSON {
    switch (node.type) {
        case 'literal':
            return { type: 'literal', value: node.value.toString() };
        case 'parenthesized':
            return { type: 'parenthesized', inner: astToJSON(node.inner) };
        default:
            return {
                type: node.type,
                op: node.op,
                left: astToJSON(node.left),
                right: astToJSON(node.right),
            };
    }
}
