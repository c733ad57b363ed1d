/**
 * Motif patterns: fuzzy literal matching with wildcards and a threshold
 *
 * A motif walks its literal against the input from the first symbol. The
 * walk stops at the first mismatch or when the input runs out, and the motif
 * scores the fraction of literal positions matched up to that point. Input
 * beyond the end of the literal is ignored, so a motif matches any input it
 * is a prefix of; the ordered matcher in `series.ts` relies on this.
 *
 * @module motif
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const tata = motif("TATAAA");
 * matchMotif(tata, "TATAAAGC");           // true, prefix match
 * matchMotif(motif("ACGA", { threshold: 0.75 }), "ACGT"); // true, 3 of 4
 * scoreMotif(motif("ACGA"), "ACGT");      // 0.75
 * ```
 */

import { type } from "arktype";
import { AlphabetError, ValidationError } from "../errors";
import { findInvalidSymbol, isWildcard } from "../operations/core/alphabet";
import { toSymbols } from "../operations/core/sequence";
import {
  type MotifOptions,
  MotifOptionsSchema,
  type MotifPattern,
  type SequenceLike,
} from "../types";
import { DEFAULT_ALPHABET, DEFAULT_THRESHOLD } from "./constants";

/**
 * Build a motif from a literal
 *
 * @throws {ValidationError} When the literal is empty or the threshold lies outside [0, 1]
 * @throws {AlphabetError} When the literal holds a symbol outside the alphabet
 */
export function motif(literal: string, options: MotifOptions = {}): MotifPattern {
  const validated = MotifOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid motif options: ${validated.summary}`);
  }

  const alphabet = validated.alphabet ?? DEFAULT_ALPHABET;
  const threshold = validated.threshold ?? DEFAULT_THRESHOLD;

  if (literal.length === 0) {
    throw new ValidationError("Motif literal must not be empty");
  }

  const invalid = findInvalidSymbol(alphabet, literal);
  if (invalid !== undefined) {
    throw AlphabetError.forSymbol(literal, invalid.symbol, invalid.position, alphabet, "motif");
  }

  const pattern: MotifPattern = {
    kind: "motif",
    literal: literal.toLowerCase(),
    threshold,
    alphabet,
  };
  return Object.freeze(pattern);
}

function symbolsMatch(literalSymbol: string, inputSymbol: string): boolean {
  return isWildcard(literalSymbol) || literalSymbol === inputSymbol.toLowerCase();
}

/**
 * Count literal positions matched before the first mismatch or the end of input
 */
function matchedPrefixLength(literal: string, symbols: string, offset: number): number {
  let matched = 0;
  while (matched < literal.length && offset + matched < symbols.length) {
    if (!symbolsMatch(literal.charAt(matched), symbols.charAt(offset + matched))) {
      break;
    }
    matched++;
  }
  return matched;
}

/**
 * Fraction of literal positions matched, in [0, 1]
 *
 * @param offset - Where in the input the literal is aligned, default 0
 */
export function scoreMotif(pattern: MotifPattern, input: SequenceLike, offset: number = 0): number {
  const { literal } = pattern;
  return matchedPrefixLength(literal, toSymbols(input), offset) / literal.length;
}

/**
 * Test a motif against the input starting at `offset`
 *
 * @param threshold - Effective threshold; a set passes its own here instead of
 *   overriding the motif's
 * @param offset - Where in the input the literal is aligned, default 0
 */
export function matchMotif(
  pattern: MotifPattern,
  input: SequenceLike,
  threshold: number = pattern.threshold,
  offset: number = 0
): boolean {
  const symbols = toSymbols(input);
  const { literal } = pattern;

  // Equal-length runs under an exact threshold: whole-run comparison
  if (threshold === 1 && symbols.length - offset === literal.length) {
    for (let i = 0; i < literal.length; i++) {
      if (!symbolsMatch(literal.charAt(i), symbols.charAt(offset + i))) {
        return false;
      }
    }
    return true;
  }

  return matchedPrefixLength(literal, symbols, offset) / literal.length >= threshold;
}
