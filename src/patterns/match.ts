/**
 * Pattern dispatch
 *
 * `matchPattern` is the uniform match operation: it switches on the pattern's
 * `kind` and hands off to the matcher for that kind. Sets recurse through it.
 *
 * @module match
 * @since v0.1.0
 */

import { InvalidPatternError } from "../errors";
import type { Pattern, SequenceLike, SetPattern } from "../types";
import { matchMotif } from "./motif";
import { matchAny } from "./region";
import { matchRegex } from "./regex";
import { matchRepeat } from "./repeat";
import { matchSeries } from "./series";

/**
 * Test a pattern against the whole input
 *
 * `any` regions answer whether they admit at least one window. Gaps have no
 * match of their own.
 *
 * @throws {InvalidPatternError} For a gap or a value that is not a pattern
 */
export function matchPattern(pattern: Pattern, input: SequenceLike): boolean {
  switch (pattern.kind) {
    case "any":
      return matchAny(pattern, input);
    case "motif":
      return matchMotif(pattern, input);
    case "regex":
      return matchRegex(pattern, input);
    case "repeat":
      return matchRepeat(pattern, input);
    case "series":
      return matchSeries(pattern, input);
    case "set":
      return matchSet(pattern, input);
    case "gap":
      throw InvalidPatternError.forValue(pattern);
    default: {
      const unknownPattern: never = pattern;
      throw InvalidPatternError.forValue(unknownPattern);
    }
  }
}

/**
 * Try each component in order and stop at the first that matches.
 * Direct motif children are matched under the set's threshold.
 */
export function matchSet(pattern: SetPattern, input: SequenceLike): boolean {
  return pattern.components.some((component) =>
    component.kind === "motif"
      ? matchMotif(component, input, pattern.threshold)
      : matchPattern(component, input)
  );
}
