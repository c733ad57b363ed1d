/**
 * Scan primitives: slide a pattern along a sequence
 *
 * Each offset `i` is tested by matching the pattern against the suffix
 * starting at `i`, so the pattern is anchored at the offset but free to end
 * anywhere. Regex patterns search their suffix unanchored and therefore
 * report offset 0 whenever they occur at all.
 *
 * @module locate
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const seq = dna`ACGTACGT`;
 * locate(seq, motif("ACGT"));    // 0
 * locate(seq, motif("TTTT"));    // undefined
 * locateAll(seq, motif("ACGT")); // [0, 4]
 * exists(seq, motif("GTAC"));    // true
 * ```
 */

import { InvalidPatternError } from "../errors";
import { isPattern } from "../patterns/guards";
import { matchPattern } from "../patterns/match";
import type { Pattern, SequenceLike } from "../types";
import { toSymbols } from "./core/sequence";

function assertMatchable(pattern: unknown): asserts pattern is Pattern {
  if (!isPattern(pattern) || pattern.kind === "gap") {
    throw InvalidPatternError.forValue(pattern);
  }
}

/**
 * Smallest offset whose suffix the pattern matches, or `undefined`
 *
 * @throws {InvalidPatternError} For a gap or a value that is not a pattern
 */
export function locate(sequence: SequenceLike, pattern: Pattern): number | undefined {
  assertMatchable(pattern);
  const symbols = toSymbols(sequence);

  for (let offset = 0; offset < symbols.length; offset++) {
    if (matchPattern(pattern, symbols.slice(offset))) {
      return offset;
    }
  }
  return undefined;
}

/**
 * Every offset whose suffix the pattern matches, ascending
 *
 * @throws {InvalidPatternError} For a gap or a value that is not a pattern
 */
export function locateAll(sequence: SequenceLike, pattern: Pattern): number[] {
  assertMatchable(pattern);
  const symbols = toSymbols(sequence);
  const offsets: number[] = [];

  for (let offset = 0; offset < symbols.length; offset++) {
    if (matchPattern(pattern, symbols.slice(offset))) {
      offsets.push(offset);
    }
  }
  return offsets;
}

/**
 * True when {@link locate} finds an offset
 *
 * @throws {InvalidPatternError} For a gap or a value that is not a pattern
 */
export function exists(sequence: SequenceLike, pattern: Pattern): boolean {
  return locate(sequence, pattern) !== undefined;
}
