/**
 * Error handling for pattern construction and matching
 *
 * Construction failures (bad literals, bad Prosite tokens, bad bounds) and
 * dispatch failures (a value that is not a pattern) are reported as errors.
 * An ordinary non-match is never an error: matchers return `false` and
 * `locate` returns `undefined`.
 */

import type { Alphabet } from "./types";

/**
 * Base error class for all biopattern errors
 */
export class BiopatternError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly position?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "BiopatternError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.position !== undefined) {
      msg += ` (position ${this.position})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid construction arguments: bounds, thresholds, counts, component lists
 */
export class ValidationError extends BiopatternError {
  constructor(message: string, position?: number, context?: string) {
    super(message, "VALIDATION_ERROR", position, context);
    this.name = "ValidationError";
  }
}

/**
 * A literal containing a symbol outside the chosen alphabet
 */
export class AlphabetError extends ValidationError {
  constructor(
    message: string,
    public readonly symbol: string,
    public readonly alphabet: Alphabet,
    position?: number,
    context?: string
  ) {
    super(message, position, context);
    this.name = "AlphabetError";
  }

  /**
   * Create error for the first invalid symbol of a literal
   */
  static forSymbol(
    literal: string,
    symbol: string,
    position: number,
    alphabet: Alphabet,
    subject: string = "literal"
  ): AlphabetError {
    return new AlphabetError(
      `Supplied ${subject} is not a valid ${alphabet.toUpperCase()} sequence: '${symbol}' at offset ${position}`,
      symbol,
      alphabet,
      position,
      `${subject}: ${literal}`
    );
  }
}

/**
 * Prosite expressions that cannot be compiled to a regular expression
 */
export class PrositeError extends BiopatternError {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly token?: string,
    tokenIndex?: number
  ) {
    super(message, "PROSITE_ERROR", tokenIndex, `expression: ${expression}`);
    this.name = "PrositeError";
  }

  /**
   * Create error for a token that fits none of the Prosite token classes
   */
  static forToken(expression: string, token: string, tokenIndex: number): PrositeError {
    return new PrositeError(
      `Invalid Prosite pattern: token '${token}' at index ${tokenIndex} could not be compiled`,
      expression,
      token,
      tokenIndex
    );
  }
}

/**
 * Regular expressions rejected by the host regex engine
 */
export class ExpressionError extends BiopatternError {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly systemError?: unknown
  ) {
    super(message, "EXPRESSION_ERROR", undefined, `expression: ${expression}`);
    this.name = "ExpressionError";
  }

  /**
   * Wrap the engine's SyntaxError
   */
  static fromSystemError(expression: string, systemError: unknown): ExpressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new ExpressionError(
      `Invalid regular expression: ${errorMessage}`,
      expression,
      systemError
    );
  }
}

/**
 * Dispatch on a value that is not a matchable pattern
 */
export class InvalidPatternError extends BiopatternError {
  constructor(
    message: string,
    public readonly kind?: string,
    context?: string
  ) {
    super(message, "INVALID_PATTERN", undefined, context);
    this.name = "InvalidPatternError";
  }

  static forValue(value: unknown): InvalidPatternError {
    if (typeof value === "object" && value !== null && "kind" in value) {
      const kind = String(value.kind);
      const detail =
        kind === "gap"
          ? "gaps are only matched as part of a series or repeat"
          : `unknown pattern kind '${kind}'`;
      return new InvalidPatternError(`Supplied pattern is invalid: ${detail}`, kind);
    }
    return new InvalidPatternError(
      "Supplied pattern is invalid",
      undefined,
      `received ${value === null ? "null" : typeof value}`
    );
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_SYMBOL:
    "Use the alphabet's IUPAC codes; 'x' and 'n' are accepted everywhere as wildcards",
  INVALID_BOUNDS: "Bounds must be non-negative integers with min <= max",
  INVALID_THRESHOLD: "Thresholds are fractions between 0 and 1",
  INVALID_PROSITE:
    "Prosite tokens are separated by '-': literals, x, [AC], {AC} or A(2,4)",
  INVALID_EXPRESSION: "Check the regular expression for unbalanced brackets or quantifiers",
  INVALID_PATTERN: "Build patterns with the factory functions; gaps belong inside a series or repeat",
  MALFORMED_COMPONENTS: "Series components alternate motif, gap, motif and end on a motif",
} as const;

/**
 * Pick a recovery suggestion for an error
 */
export function getErrorSuggestion(error: BiopatternError): string | undefined {
  if (error instanceof AlphabetError) {
    return ERROR_SUGGESTIONS.INVALID_SYMBOL;
  }
  if (error instanceof PrositeError) {
    return ERROR_SUGGESTIONS.INVALID_PROSITE;
  }
  if (error instanceof ExpressionError) {
    return ERROR_SUGGESTIONS.INVALID_EXPRESSION;
  }
  if (error instanceof InvalidPatternError) {
    return ERROR_SUGGESTIONS.INVALID_PATTERN;
  }

  const message = error.message.toLowerCase();
  if (message.includes("threshold")) {
    return ERROR_SUGGESTIONS.INVALID_THRESHOLD;
  }
  if (message.includes("min") || message.includes("max") || message.includes("bound")) {
    return ERROR_SUGGESTIONS.INVALID_BOUNDS;
  }
  if (message.includes("component")) {
    return ERROR_SUGGESTIONS.MALFORMED_COMPONENTS;
  }

  return undefined;
}
