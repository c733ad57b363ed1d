import { describe, expect, test } from "vitest";
import { ExpressionError } from "../../src/errors";
import { matchRegex, regexPattern } from "../../src/patterns/regex";
import { createSequence } from "../../src/operations/core/sequence";

describe("regexPattern", () => {
  test("searches anywhere, ignoring case", () => {
    expect(matchRegex(regexPattern("GA.C"), "ttgatcaa")).toBe(true);
    expect(matchRegex(regexPattern("gatc"), "TTGATCAA")).toBe(true);
  });

  test("honours explicit anchors", () => {
    expect(matchRegex(regexPattern("^ACG"), "TACG")).toBe(false);
    expect(matchRegex(regexPattern("^ACG"), "ACGT")).toBe(true);
  });

  test("accepts sequences as input", () => {
    expect(matchRegex(regexPattern("T{3}"), createSequence("ACTTTG"))).toBe(true);
  });

  test("records no Prosite source for plain expressions", () => {
    const pattern = regexPattern("AC+");

    expect(pattern.expression).toBe("AC+");
    expect(pattern.prosite).toBeUndefined();
  });

  test("rejects expressions the engine cannot compile", () => {
    expect(() => regexPattern("AC(")).toThrow(ExpressionError);

    try {
      regexPattern("AC(");
    } catch (error) {
      expect(error).toBeInstanceOf(ExpressionError);
      if (error instanceof ExpressionError) {
        expect(error.expression).toBe("AC(");
        expect(error.code).toBe("EXPRESSION_ERROR");
      }
    }
  });
});
