import type { IntentDefinition } from "../../../shared/schemas/intent";
import { ValidationError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("similarity");

// Floating-point drift on unit vectors can land a hair outside [-1, 1].
const RANGE_TOLERANCE = 1e-9;

export interface ExampleMatch {
  example: string;
  similarity: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError(`Embedding dimensions differ: ${a.length} vs ${b.length}`, {
      left: a.length,
      right: b.length,
    });
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0 || !Number.isFinite(denominator)) return 0;

  const similarity = dotProduct / denominator;

  if (Number.isNaN(similarity)) {
    log.warn("Cosine similarity is not a number, treating as 0");
    return 0;
  }

  if (similarity > 1 || similarity < -1) {
    if (Math.abs(similarity) - 1 > RANGE_TOLERANCE) {
      log.warn("Cosine similarity out of range, clamping", { similarity });
    }
    return Math.max(-1, Math.min(1, similarity));
  }

  return similarity;
}

/**
 * Best-scoring example of `intent` for the query. Returns null for an intent
 * without examples. On equal scores the earlier example wins.
 */
export function findBestExample(queryEmbedding: number[], intent: IntentDefinition): ExampleMatch | null {
  let best: ExampleMatch | null = null;

  for (let index = 0; index < intent.exampleEmbeddings.length; index++) {
    const similarity = cosineSimilarity(queryEmbedding, intent.exampleEmbeddings[index]);
    if (best === null || similarity > best.similarity) {
      best = { example: intent.examples[index], similarity };
    }
  }

  return best;
}
