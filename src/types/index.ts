/**
 * Shared type definitions for exprcalc
 */

// Re-export error types
export {
    CalcException,
    ERROR_KINDS,
    getSuggestion,
    createLexError,
    createSyntaxError,
    createArithmeticError,
    createEvalError,
    createConfigError,
    serializeCalcError,
    formatCalcError,
} from './errors.js';

export type {
    CalcErrorCode,
    ErrorSpan,
    CalcError,
} from './errors.js';

// Re-export AST types
export {
    LOGICAL_OPERATORS,
    RELATIONAL_OPERATORS,
    ADDITIVE_OPERATORS,
    MULTIPLICATIVE_OPERATORS,
    isLogicalOperator,
    isRelationalOperator,
    isAdditiveOperator,
    isMultiplicativeOperator,
} from './ast.js';

export type {
    ExpressionType,
    Expression,
    BinaryExpression,
    LogicalNode,
    RelationalNode,
    AdditiveNode,
    MultiplicativeNode,
    LiteralNode,
    ParenthesizedNode,
    LogicalOperator,
    RelationalOperator,
    AdditiveOperator,
    MultiplicativeOperator,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export result helpers
export { ok, fail } from './result.js';
export type { Result } from './result.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    OutputFormat,
    TokenizeOptions,
    CalculateOptions,
    CliOptions,
} from './options.js';
