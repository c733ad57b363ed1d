/**
 * Regular expression patterns
 *
 * The expression is compiled once, case-insensitively, and searched anywhere
 * in the input. No anchoring is added; write `^` or `$` to anchor.
 *
 * @module regex
 * @since v0.1.0
 */

import { ExpressionError } from "../errors";
import { toSymbols } from "../operations/core/sequence";
import type { RegexPattern, SequenceLike } from "../types";

/**
 * Compile a regular expression pattern
 *
 * @param prosite - Source expression, recorded when the regex came from the Prosite compiler
 * @throws {ExpressionError} When the host regex engine rejects the expression
 */
export function regexPattern(expression: string, prosite?: string): RegexPattern {
  let regex: RegExp;
  try {
    regex = new RegExp(expression, "i");
  } catch (error) {
    throw ExpressionError.fromSystemError(expression, error);
  }

  const pattern: RegexPattern = {
    kind: "regex",
    expression,
    regex,
    ...(prosite !== undefined ? { prosite } : {}),
  };
  return Object.freeze(pattern);
}

/**
 * True when the expression matches somewhere in the input
 */
export function matchRegex(pattern: RegexPattern, input: SequenceLike): boolean {
  return pattern.regex.test(toSymbols(input));
}
