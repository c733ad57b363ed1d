/**
 * Region patterns: `any` and `gap`
 *
 * Both describe a span by length alone. A gap is only ever consumed by the
 * ordered matcher of a series or repeat; an `any` region can be matched
 * directly, and can also enumerate the candidate windows it admits.
 *
 * @module region
 * @since v0.1.0
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { toSymbols } from "../operations/core/sequence";
import {
  type AnyPattern,
  type AnyWindow,
  BoundsSchema,
  type GapPattern,
  type SequenceLike,
} from "../types";

function validateBounds(min: number, max: number, subject: string): void {
  const validated = BoundsSchema({ min, max });
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid ${subject} bounds: ${validated.summary}`);
  }
}

/**
 * Region of any content whose length lies in [min, max]
 *
 * @throws {ValidationError} When bounds are negative, fractional or min > max
 */
export function anyRegion(min: number, max: number): AnyPattern {
  validateBounds(min, max, "any region");
  const pattern: AnyPattern = { kind: "any", min, max };
  return Object.freeze(pattern);
}

/**
 * Spacer of [min, max] symbols between the motifs of a series or repeat
 *
 * @throws {ValidationError} When bounds are negative, fractional or min > max
 */
export function gap(min: number, max: number): GapPattern {
  validateBounds(min, max, "gap");
  const pattern: GapPattern = { kind: "gap", min, max };
  return Object.freeze(pattern);
}

/**
 * Every contiguous window the region admits, by start offset then length
 *
 * For each start, window lengths run from `min` up to `max` or to the end of
 * the input, whichever comes first. An empty input yields no windows.
 *
 * @example
 * ```typescript
 * anyWindows(anyRegion(1, 2), "ACG").map((w) => w.symbols);
 * // ["A", "AC", "C", "CG", "G"]
 * ```
 */
export function anyWindows(pattern: AnyPattern, input: SequenceLike): AnyWindow[] {
  const symbols = toSymbols(input);
  const windows: AnyWindow[] = [];

  for (let start = 0; start < symbols.length; start++) {
    const longest = Math.min(pattern.max, symbols.length - start);
    for (let length = pattern.min; length <= longest; length++) {
      windows.push({ start, length, symbols: symbols.slice(start, start + length) });
    }
  }

  return windows;
}

/**
 * Boolean collapse of {@link anyWindows}: true when at least one window exists
 */
export function matchAny(pattern: AnyPattern, input: SequenceLike): boolean {
  const length = toSymbols(input).length;
  return length > 0 && length >= pattern.min;
}
