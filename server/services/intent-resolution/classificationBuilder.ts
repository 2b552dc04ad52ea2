import type { ClassificationResult, IntentMatch, RecommendedAction } from "../../../shared/schemas/intent";

export interface ActionThresholds {
  similarityThreshold: number;
  ambiguityThreshold: number;
  mismatchThreshold: number;
  highConfidenceThreshold: number;
}

export interface FactorWeights {
  semanticWeight: number;
  contextWeight: number;
  historicalWeight: number;
}

export interface AmbiguityAssessment {
  isAmbiguous: boolean;
  confidenceDifferential: number;
}

export interface BuildClassificationInput {
  query: string;
  candidates: IntentMatch[];
  thresholds: ActionThresholds;
  weights: FactorWeights;
  contextRelevance: number;
  providerError?: string;
}

const CLARIFICATION_CHOICES = 3;

const fmt = (value: number): string => value.toFixed(2);

/** Candidates at or above the similarity threshold, confidence descending. Equal confidences keep discovery order. */
export function rankMatches(candidates: IntentMatch[], similarityThreshold: number): IntentMatch[] {
  return candidates
    .filter(match => match.semanticSimilarity >= similarityThreshold)
    .sort((a, b) => b.confidence - a.confidence);
}

export function calculateAmbiguity(matches: IntentMatch[], ambiguityThreshold: number): AmbiguityAssessment {
  if (matches.length < 2) {
    return { isAmbiguous: false, confidenceDifferential: 1.0 };
  }
  const confidenceDifferential = matches[0].confidence - matches[1].confidence;
  return { isAmbiguous: confidenceDifferential < ambiguityThreshold, confidenceDifferential };
}

export function determineRecommendedAction(
  matches: IntentMatch[],
  isAmbiguous: boolean,
  thresholds: ActionThresholds
): RecommendedAction {
  if (matches.length === 0) return "no_match";

  const topConfidence = matches[0].confidence;
  if (topConfidence < thresholds.mismatchThreshold) return "fallback";
  if (isAmbiguous && topConfidence < thresholds.highConfidenceThreshold) return "clarify";
  if (topConfidence >= thresholds.highConfidenceThreshold) return "proceed";
  return "proceed_with_caution";
}

export function buildClarificationQuestion(matches: IntentMatch[]): string | undefined {
  if (matches.length < 2) return undefined;

  if (matches.length === 2) {
    return `Did you mean "${matches[0].intentName}" or "${matches[1].intentName}"?`;
  }

  const names = matches.slice(0, CLARIFICATION_CHOICES).map(match => `"${match.intentName}"`);
  const last = names.pop();
  return `Did you mean one of the following: ${names.join(", ")}, or ${last}?`;
}

export function buildExplanation(
  matches: IntentMatch[],
  ambiguity: AmbiguityAssessment,
  action: RecommendedAction,
  thresholds: ActionThresholds,
  weights: FactorWeights
): string {
  const top = matches[0];

  if (!top) {
    return [
      `No intents matched above similarity threshold ${fmt(thresholds.similarityThreshold)}`,
      `Final confidence: ${fmt(0)} → ${action}`,
    ].join("\n");
  }

  const lines = [
    `Top match: "${top.intentName}" via example "${top.matchedExample}"`,
    `Semantic similarity: ${fmt(top.semanticSimilarity)} (weight ${fmt(weights.semanticWeight)})`,
    `Context relevance: ${fmt(top.contextRelevance)} (weight ${fmt(weights.contextWeight)})`,
    `Historical accuracy: ${fmt(top.historicalAccuracy)} (weight ${fmt(weights.historicalWeight)})`,
  ];

  if (top.contextualBoost !== 0) {
    lines.push(`Contextual boost: +${fmt(top.contextualBoost)}`);
  }

  if (ambiguity.isAmbiguous) {
    lines.push(
      `Ambiguity differential: ${fmt(ambiguity.confidenceDifferential)} (threshold ${fmt(thresholds.ambiguityThreshold)})`
    );
  }

  lines.push(`Final confidence: ${fmt(top.confidence)} → ${action}`);
  return lines.join("\n");
}

/**
 * Runs rank → ambiguity → action → explanation in order and freezes the
 * result; each step reads what the previous one produced.
 */
export function buildClassificationResult(input: BuildClassificationInput): ClassificationResult {
  const { query, candidates, thresholds, weights, contextRelevance, providerError } = input;

  const matches = rankMatches(candidates, thresholds.similarityThreshold);
  const ambiguity = calculateAmbiguity(matches, thresholds.ambiguityThreshold);
  const recommendedAction = determineRecommendedAction(matches, ambiguity.isAmbiguous, thresholds);
  const factors = buildExplanation(matches, ambiguity, recommendedAction, thresholds, weights);
  const explanation = providerError === undefined ? factors : `Embedding provider error: ${providerError}\n${factors}`;
  const topMatch = matches[0] ?? null;

  const result: ClassificationResult = {
    query,
    matches,
    topMatch,
    isAmbiguous: ambiguity.isAmbiguous,
    confidenceDifferential: ambiguity.confidenceDifferential,
    recommendedAction,
    explanation,
    contextRelevance,
    historicalAccuracy: topMatch?.historicalAccuracy ?? 0,
  };

  if (recommendedAction === "clarify") {
    result.clarificationQuestion = buildClarificationQuestion(matches);
  }
  if (providerError !== undefined) {
    result.providerError = providerError;
  }

  matches.forEach(match => Object.freeze(match));
  Object.freeze(matches);
  return Object.freeze(result);
}
