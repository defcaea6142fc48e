/**
 * Structured errors for the language front end.
 *
 * Only two things are errors: text that does not parse, and calls to a
 * predicate the program never defines. A failed unification is an ordinary
 * empty result, never an exception.
 */

export type ClausalErrorCode =
  | "SYNTAX_ERROR" // malformed program or query text
  | "UNDEFINED_RELATION"; // call to a predicate absent from the program

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line: number;
  col: number;
}

export interface ClausalErrorInfo {
  code: ClausalErrorCode;
  message: string;
  span?: ErrorSpan;
  context?: string;
  details?: Record<string, unknown>;
}

export class ClausalError extends Error {
  public readonly error: ClausalErrorInfo;

  constructor(error: ClausalErrorInfo) {
    super(error.message);
    this.name = "ClausalError";
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): ClausalErrorCode {
    return this.error.code;
  }

  toJSON(): ClausalErrorInfo {
    return this.error;
  }
}

export class ClausalSyntaxError extends ClausalError {
  constructor(error: ClausalErrorInfo) {
    super(error);
    this.name = "ClausalSyntaxError";
  }

  get span(): ErrorSpan | undefined {
    return this.error.span;
  }
}

export class UndefinedRelationError extends ClausalError {
  public readonly symbol: string;

  constructor(symbol: string) {
    super({
      code: "UNDEFINED_RELATION",
      message: `Undefined relation '${symbol}'`,
      details: { symbol },
    });
    this.name = "UndefinedRelationError";
    this.symbol = symbol;
  }
}

function getLineNumber(input: string, position: number): number {
  return input.slice(0, position).split("\n").length;
}

function getColumnNumber(input: string, position: number): number {
  const lineStart = input.lastIndexOf("\n", position - 1) + 1;
  return position - lineStart + 1;
}

/**
 * Create a syntax error pointing at `position` in `input`.
 */
export function createSyntaxError(
  message: string,
  input: string,
  position: number,
): ClausalSyntaxError {
  const line = getLineNumber(input, position);
  const col = getColumnNumber(input, position);
  return new ClausalSyntaxError({
    code: "SYNTAX_ERROR",
    message: `${message} at line ${line}, column ${col}`,
    span: { start: position, end: position + 1, line, col },
    context: input,
  });
}

export function createUndefinedRelationError(
  symbol: string,
): UndefinedRelationError {
  return new UndefinedRelationError(symbol);
}
