/**
 * Structured Error System for exprcalc
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for the calculation pipeline
 */
export type CalcErrorCode =
  | 'LEX_ERROR'          // Input produced no tokens
  | 'SYNTAX_ERROR'       // Grammar violation while parsing
  | 'ARITHMETIC_ERROR'   // Division by zero
  | 'EVAL_ERROR'         // Operator a node cannot evaluate
  | 'CONFIG_ERROR';      // Invalid environment configuration

/**
 * Display name for each error code, used as the prefix of reported messages
 */
export const ERROR_KINDS: Record<CalcErrorCode, string> = {
  LEX_ERROR: 'LexError',
  SYNTAX_ERROR: 'SyntaxError',
  ARITHMETIC_ERROR: 'ArithmeticError',
  EVAL_ERROR: 'EvalError',
  CONFIG_ERROR: 'ConfigError',
};

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface CalcError {
  code: CalcErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending expression
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping CalcError for throw/catch patterns
 */
export class CalcException extends Error {
  public readonly error: CalcError;

  constructor(error: CalcError) {
    super(error.message);
    this.name = 'CalcException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CalcException);
    }
  }

  toJSON(): CalcError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /(^|\()\s*-/,
      suggestion: "Unary minus is not supported - write '0 - n' instead"
    },
    {
      pattern: /(^|[^=<>!/])=(?!=)/,
      suggestion: "Use '==' to compare for equality"
    },
    {
      pattern: /[-+*/<>=]\s*$/,
      suggestion: 'Incomplete expression - missing right operand after operator'
    },
    {
      pattern: /\b(and|or|xor)\s*$/i,
      suggestion: 'Incomplete logical expression - missing right operand'
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

function spanAt(input: string, position: number, length: number = 1): ErrorSpan {
  return {
    start: position,
    end: position + Math.max(length, 1),
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  };
}

/**
 * Create a lexical error. Without a position the whole input was unusable.
 */
export function createLexError(
  message: string,
  input: string,
  position?: number
): CalcError {
  return {
    code: 'LEX_ERROR',
    message,
    span: position !== undefined ? spanAt(input, position) : undefined,
    context: input,
  };
}

/**
 * Create a syntax error with optional span and suggestion
 */
export function createSyntaxError(
  message: string,
  input: string,
  position?: number,
  length?: number
): CalcError {
  return {
    code: 'SYNTAX_ERROR',
    message,
    span: position !== undefined ? spanAt(input, position, length) : undefined,
    suggestion: getSuggestion(input),
    context: input,
  };
}

export function createArithmeticError(
  dividend: bigint
): CalcError {
  return {
    code: 'ARITHMETIC_ERROR',
    message: 'Division by zero',
    details: { dividend: dividend.toString() },
  };
}

/**
 * Create an error for an operator spelling a node's evaluator does not know
 */
export function createEvalError(
  nodeType: string,
  op: string
): CalcError {
  return {
    code: 'EVAL_ERROR',
    message: `Unimplemented ${nodeType} operator '${op}'`,
    details: { nodeType, op },
  };
}

export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): CalcError {
  return {
    code: 'CONFIG_ERROR',
    message,
    details,
  };
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a CalcError for JSON output
 */
export function serializeCalcError(error: CalcError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * One-line human-readable form, e.g. "SyntaxError: Unexpected token ')'"
 */
export function formatCalcError(error: CalcError): string {
  return `${ERROR_KINDS[error.code]}: ${error.message}`;
}
