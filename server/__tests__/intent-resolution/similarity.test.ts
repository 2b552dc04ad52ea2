import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { cosineSimilarity, findBestExample } from "../../services/intent-resolution/similarity";
import { ValidationError } from "../../utils/errors";
import type { IntentDefinition } from "../../../shared/schemas/intent";

const vectorOf = (length: number) =>
  fc.array(fc.float({ min: -100, max: 100, noNaN: true, noDefaultInfinity: true }), {
    minLength: length,
    maxLength: length,
  });

const pairOfVectors = fc.integer({ min: 1, max: 16 }).chain(length => fc.tuple(vectorOf(length), vectorOf(length)));

function intent(examples: Array<[string, number[]]>): IntentDefinition {
  return {
    name: "greeting",
    description: "",
    examples: examples.map(([text]) => text),
    exampleEmbeddings: examples.map(([, vector]) => vector),
    entitySlots: [],
    childIntents: [],
  };
}

describe("cosineSimilarity", () => {
  it("returns 1 for identical directions", () => {
    expect(cosineSimilarity([1, 0, 0], [1, 0, 0])).toBe(1);
    expect(cosineSimilarity([2, 0, 0], [5, 0, 0])).toBe(1);
  });

  it("returns 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("returns -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("returns 0 when either vector has zero magnitude", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
  });

  it("returns 0 for empty vectors", () => {
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it("throws a ValidationError on a dimension mismatch", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(ValidationError);
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow("Embedding dimensions differ: 2 vs 3");
  });

  it("is symmetric", () => {
    fc.assert(
      fc.property(pairOfVectors, ([a, b]) => {
        expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
      })
    );
  });

  it("stays within [-1, 1]", () => {
    fc.assert(
      fc.property(pairOfVectors, ([a, b]) => {
        const similarity = cosineSimilarity(a, b);
        expect(similarity).toBeGreaterThanOrEqual(-1);
        expect(similarity).toBeLessThanOrEqual(1);
      })
    );
  });

  it("scores a non-zero vector against itself as 1", () => {
    fc.assert(
      fc.property(
        vectorOf(8).filter(v => v.some(x => Math.abs(x) > 1e-3)),
        v => {
          expect(cosineSimilarity(v, v)).toBeCloseTo(1, 9);
        }
      )
    );
  });
});

describe("findBestExample", () => {
  it("picks the most similar example", () => {
    const best = findBestExample(
      [1, 0, 0],
      intent([
        ["good morning", [0.6, 0.8, 0]],
        ["hello", [1, 0, 0]],
      ])
    );
    expect(best).toEqual({ example: "hello", similarity: 1 });
  });

  it("keeps the earlier example on a tie", () => {
    const best = findBestExample(
      [1, 0, 0],
      intent([
        ["hi", [1, 0, 0]],
        ["hello", [3, 0, 0]],
      ])
    );
    expect(best?.example).toBe("hi");
  });

  it("returns null for an intent without examples", () => {
    expect(findBestExample([1, 0, 0], intent([]))).toBeNull();
  });

  it("propagates dimension mismatches", () => {
    expect(() => findBestExample([1, 0, 0], intent([["hi", [1, 0]]]))).toThrow(ValidationError);
  });
});
