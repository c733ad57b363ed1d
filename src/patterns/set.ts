/**
 * Set patterns: first-match-wins alternation
 *
 * Matching lives in `match.ts`, next to the dispatcher it recurses through.
 *
 * @module set
 * @since v0.1.0
 */

import { type } from "arktype";
import { InvalidPatternError, ValidationError } from "../errors";
import { type MatchablePattern, type SetOptions, SetOptionsSchema, type SetPattern } from "../types";
import { DEFAULT_THRESHOLD } from "./constants";
import { isMatchablePattern } from "./guards";

/**
 * Build a set over sub-patterns, tried in declaration order
 *
 * The set's threshold replaces the threshold of every direct motif child
 * while the set is matched. Nested patterns keep their own.
 *
 * @throws {ValidationError} On an empty component list or a bad threshold
 * @throws {InvalidPatternError} When a component is a gap or not a pattern
 *
 * @example
 * ```typescript
 * const boxes = patternSet([motif("TATAAT"), motif("TATGTT")], { threshold: 0.8 });
 * ```
 */
export function patternSet(
  components: readonly MatchablePattern[],
  options: SetOptions = {}
): SetPattern {
  const validated = SetOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid set options: ${validated.summary}`);
  }
  if (components.length === 0) {
    throw new ValidationError("Set components must not be empty");
  }
  for (const component of components) {
    if (!isMatchablePattern(component)) {
      throw InvalidPatternError.forValue(component);
    }
  }

  const pattern: SetPattern = {
    kind: "set",
    components: Object.freeze([...components]),
    threshold: validated.threshold ?? DEFAULT_THRESHOLD,
  };
  return Object.freeze(pattern);
}
