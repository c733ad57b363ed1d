/**
 * Runtime guards for pattern values
 */

import { type MatchablePattern, PATTERN_KINDS, type Pattern } from "../types";

/**
 * True for any value carrying a known pattern `kind`
 */
export function isPattern(value: unknown): value is Pattern {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  const { kind } = value;
  return PATTERN_KINDS.some((known) => known === kind);
}

/**
 * True for patterns with a match operation, i.e. everything but gaps
 */
export function isMatchablePattern(value: unknown): value is MatchablePattern {
  return isPattern(value) && value.kind !== "gap";
}
