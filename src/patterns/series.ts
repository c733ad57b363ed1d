/**
 * Series patterns and the ordered gap-backtracking matcher
 *
 * A series is a list of motifs separated by gaps. Matching aligns the first
 * motif at the start of the input, then for each admissible gap length
 * (shortest first) aligns the next motif right after the gap, recursing until
 * the last motif matches. Failed `(motif, offset)` alignments are remembered,
 * so each is tried at most once per match call. The component list is checked
 * and split into motifs and gaps once, when the pattern is built.
 *
 * @module series
 * @since v0.1.0
 */

import { ValidationError } from "../errors";
import { toSymbols } from "../operations/core/sequence";
import type {
  GapPattern,
  MotifPattern,
  OrderedLayout,
  SequenceLike,
  SeriesComponent,
  SeriesPattern,
} from "../types";
import { matchMotif } from "./motif";

/**
 * Check that components alternate motif/gap, starting and ending on a motif
 *
 * @throws {ValidationError} On an empty, even-length or misordered list
 */
export function splitComponents(components: readonly SeriesComponent[]): OrderedLayout {
  if (components.length === 0) {
    throw new ValidationError("Series components must not be empty");
  }
  if (components.length % 2 === 0) {
    throw new ValidationError(
      `Series components must start and end on a motif, got ${components.length} components`
    );
  }

  const motifs: MotifPattern[] = [];
  const gaps: GapPattern[] = [];
  components.forEach((component, index) => {
    const expected = index % 2 === 0 ? "motif" : "gap";
    if (component.kind === "motif" && expected === "motif") {
      motifs.push(component);
    } else if (component.kind === "gap" && expected === "gap") {
      gaps.push(component);
    } else {
      throw new ValidationError(
        `Series component ${index} must be a ${expected}, got ${String(component.kind)}`,
        index
      );
    }
  });

  return { motifs: Object.freeze(motifs), gaps: Object.freeze(gaps) };
}

/**
 * Build a series from alternating motifs and gaps
 *
 * @example
 * ```typescript
 * const promoter = series([motif("TTGACA"), gap(15, 19), motif("TATAAT")]);
 * ```
 */
export function series(components: readonly SeriesComponent[]): SeriesPattern {
  const layout = splitComponents(components);
  const pattern: SeriesPattern = {
    kind: "series",
    components: Object.freeze([...components]),
    layout: Object.freeze(layout),
  };
  return Object.freeze(pattern);
}

/**
 * Ordered matcher shared by series and repeat
 *
 * Motif `i` is aligned at `start`; if it is not the last motif, each gap
 * length `g` in [gap.min, gap.max] places motif `i + 1` at
 * `start + motifLength + g`, provided that leaves input to match.
 */
export function matchOrdered(layout: OrderedLayout, input: SequenceLike): boolean {
  const { motifs, gaps } = layout;
  const symbols = toSymbols(input);
  const failed = new Set<number>();

  const visit = (index: number, start: number): boolean => {
    const key = index * (symbols.length + 1) + start;
    if (failed.has(key)) return false;

    const current = motifs[index];
    if (!matchMotif(current, symbols, current.threshold, start)) {
      failed.add(key);
      return false;
    }
    if (index === gaps.length) return true;

    const { min, max } = gaps[index];
    const remaining = symbols.length - start;
    for (let gapLength = min; gapLength <= max; gapLength++) {
      const split = current.literal.length + gapLength;
      if (split >= remaining) break;
      if (visit(index + 1, start + split)) return true;
    }

    failed.add(key);
    return false;
  };

  return visit(0, 0);
}

/**
 * Test a series against the input
 */
export function matchSeries(pattern: SeriesPattern, input: SequenceLike): boolean {
  return matchOrdered(pattern.layout, input);
}
