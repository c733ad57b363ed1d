/**
 * Repeat patterns: one motif, `count` copies, the same gap between each pair
 *
 * A repeat is expanded at construction into the alternating component list a
 * series would hold, and matched by the same ordered matcher.
 *
 * @module repeat
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * // three CAG copies, each separated by 0-2 symbols
 * const cag = repeat("CAG", 0, 2, { count: 3 });
 * matchPattern(cag, "CAGTCAGCAG"); // true
 * ```
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import {
  type OrderedLayout,
  type RepeatOptions,
  RepeatOptionsSchema,
  type RepeatPattern,
  type SequenceLike,
  type SeriesComponent,
} from "../types";
import { DEFAULT_REPEAT_COUNT } from "./constants";
import { motif } from "./motif";
import { gap } from "./region";
import { matchOrdered } from "./series";

/**
 * Build a repeat of `literal` separated by gaps of [minGap, maxGap]
 *
 * @throws {ValidationError} On bad gap bounds, threshold or count
 * @throws {AlphabetError} When the literal holds a symbol outside the alphabet
 */
export function repeat(
  literal: string,
  minGap: number,
  maxGap: number,
  options: RepeatOptions = {}
): RepeatPattern {
  const validated = RepeatOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid repeat options: ${validated.summary}`);
  }

  const count = validated.count ?? DEFAULT_REPEAT_COUNT;
  const unit = motif(literal, { threshold: validated.threshold, alphabet: validated.alphabet });
  const spacer = gap(minGap, maxGap);

  const components: SeriesComponent[] = [unit];
  for (let i = 1; i < count; i++) {
    components.push(spacer, unit);
  }
  const layout: OrderedLayout = {
    motifs: Object.freeze(Array.from({ length: count }, () => unit)),
    gaps: Object.freeze(Array.from({ length: count - 1 }, () => spacer)),
  };

  const pattern: RepeatPattern = {
    kind: "repeat",
    motif: unit,
    gap: spacer,
    count,
    components: Object.freeze(components),
    layout: Object.freeze(layout),
  };
  return Object.freeze(pattern);
}

/**
 * Test a repeat against the input
 */
export function matchRepeat(pattern: RepeatPattern, input: SequenceLike): boolean {
  return matchOrdered(pattern.layout, input);
}
