import type { Expression } from '../../types/index.js';

/**
 * Pretty-print an expression tree back to source form.
 * Grouping is kept only where the tree has a parenthesized node.
 */
export function astToString(node: Expression): string {
    switch (node.type) {
        case 'literal':
            return node.value.toString();
        case 'parenthesized':
            return `(${astToString(node.inner)})`;
        case 'logical':
        case 'relational':
        case 'additive':
        case 'multiplicative':
            return `${astToString(node.left)} ${node.op} ${astToString(node.right)}`;
    }
}
