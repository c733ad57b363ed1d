/**
 * Basic usage: build patterns, match them, scan a sequence
 *
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  BiopatternError,
  dna,
  exists,
  gap,
  getErrorSuggestion,
  locate,
  locateAll,
  matchPattern,
  motif,
  patternSet,
  prosite,
  repeat,
  series,
} from "../src";

const promoterRegion = dna`GGCTTGACATTTATGCTTCCGGCTCGTATAATGTGTGGAATTG`;

// -35 and -10 boxes with a 15-19 bp spacer, allowing one mismatch per box
const sigma70 = series([
  motif("TTGACA", { threshold: 5 / 6 }),
  gap(15, 19),
  motif("TATAAT", { threshold: 5 / 6 }),
]);

console.log(`sigma70 promoter at offset ${locate(promoterRegion, sigma70) ?? "none"}`);

// Either box alone, as an alternation relaxed to 4 of 6 positions
const anyBox = patternSet([motif("TTGACA"), motif("TATAAT")], { threshold: 4 / 6 });
console.log(`box offsets: ${locateAll(promoterRegion, anyBox).join(", ")}`);

// Trinucleotide repeat with short interruptions
const cagRepeat = repeat("CAG", 0, 2, { count: 3 });
console.log(`CAG repeat present: ${exists(dna`TTCAGCAGTCAGAA`, cagRepeat)}`);

// Prosite notation compiles to a regular expression
const zincFinger = prosite("C-x(2,4)-C-x(3)-G");
console.log(`${zincFinger.prosite} -> /${zincFinger.expression}/i`);
console.log(`zinc finger match: ${matchPattern(zincFinger, "AACATGCAAAGTT")}`);

try {
  prosite("A-{1}");
} catch (error) {
  if (error instanceof BiopatternError) {
    console.error(error.toString());
    console.error(`Suggestion: ${getErrorSuggestion(error) ?? "none"}`);
  } else {
    throw error;
  }
}
