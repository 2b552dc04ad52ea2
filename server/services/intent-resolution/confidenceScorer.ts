import type {
  ConversationMessage,
  DetectedIntent,
  IntentDefinition,
  IntentMatch,
} from "../../../shared/schemas/intent";
import type { ScoringConfig } from "../../config/intentResolution";
import { clamp01 } from "./modelJson";

/** Prior turns and detections visible to the scorer. The query being scored is not among the messages. */
export interface ScoringContext {
  messages: ConversationMessage[];
  detectedIntents: DetectedIntent[];
}

export type IntentLookup = (name: string) => IntentDefinition | undefined;

export const CONTEXT_RELEVANCE = {
  none: 0,
  minimalHistory: 0.2,
  continuation: 0.4,
  followUp: 0.8,
} as const;

const MAX_CONTEXTUAL_BOOST = 0.5;
const RECENT_INTENT_WINDOW = 3;
const FULL_SAMPLE_SIZE = 5;
const SHORT_QUERY_TOKENS = 3;

const BACK_REFERENCE_PATTERN =
  /\b(it|its|that|this|those|these|they|them|their|he|she|him|her|same|also|too|again|another|instead|else)\b|\b(what|how) about\b|^(and|but|or|so)\b/i;

const sameIntent = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

function tokenCount(query: string): number {
  return query.trim().split(/\s+/).filter(Boolean).length;
}

function mostRecent(detectedIntents: DetectedIntent[], count: number): DetectedIntent[] {
  return [...detectedIntents]
    .sort((a, b) => b.detectedAt.getTime() - a.detectedAt.getTime())
    .slice(0, count);
}

export function calculateContextRelevance(query: string, context: ScoringContext | null): number {
  if (!context || context.messages.length === 0) return CONTEXT_RELEVANCE.none;

  if (BACK_REFERENCE_PATTERN.test(query) || tokenCount(query) <= SHORT_QUERY_TOKENS) {
    return CONTEXT_RELEVANCE.followUp;
  }

  if (context.messages.length < 2) return CONTEXT_RELEVANCE.minimalHistory;

  return CONTEXT_RELEVANCE.continuation;
}

/**
 * Share of the last `sampleSize` detections that were `intentName`, discounted
 * by `min(1, sampleSize / 5)` for small windows.
 */
export function calculateHistoricalAccuracy(
  intentName: string,
  detectedIntents: DetectedIntent[],
  sampleSize: number
): number {
  if (sampleSize <= 0) return 0;

  const occurrences = mostRecent(detectedIntents, sampleSize).filter(d => sameIntent(d.intent, intentName)).length;
  const sampleDiscount = Math.min(1, sampleSize / FULL_SAMPLE_SIZE);

  return clamp01((occurrences / sampleSize) * sampleDiscount);
}

function isRelated(intent: IntentDefinition, recentName: string, lookup: IntentLookup): boolean {
  if (intent.parentIntent && sameIntent(intent.parentIntent, recentName)) return true;
  if (intent.childIntents.some(child => sameIntent(child, recentName))) return true;

  const recent = lookup(recentName);
  if (!recent) return false;
  if (recent.parentIntent && sameIntent(recent.parentIntent, intent.name)) return true;
  return recent.childIntents.some(child => sameIntent(child, intent.name));
}

export function calculateContextualBoost(
  intent: IntentDefinition,
  detectedIntents: DetectedIntent[],
  boostFactor: number,
  lookup: IntentLookup = () => undefined
): number {
  const factor = Math.min(MAX_CONTEXTUAL_BOOST, Math.max(0, boostFactor));
  const recent = mostRecent(detectedIntents, RECENT_INTENT_WINDOW).map(d => d.intent);
  if (recent.length === 0 || factor === 0) return 0;

  if (recent.some(name => sameIntent(name, intent.name))) return factor;
  if (recent.some(name => isRelated(intent, name, lookup))) return factor / 2;
  return 0;
}

export interface ScoreInput {
  intent: IntentDefinition;
  matchedExample: string;
  semanticSimilarity: number;
  query: string;
  context: ScoringContext | null;
  lookup?: IntentLookup;
}

export class ConfidenceScorer {
  constructor(private readonly config: ScoringConfig) {}

  get settings(): ScoringConfig {
    return this.config;
  }

  score(input: ScoreInput): IntentMatch {
    const { intent, matchedExample, semanticSimilarity, query, context } = input;
    const {
      semanticWeight,
      contextWeight,
      historicalWeight,
      contextualBoostFactor,
      historicalInteractionsCount,
      maxConfidence,
    } = this.config;

    const contextRelevance = calculateContextRelevance(query, context);
    const detectedIntents = context?.detectedIntents ?? [];
    const historicalAccuracy = calculateHistoricalAccuracy(intent.name, detectedIntents, historicalInteractionsCount);
    const contextualBoost = calculateContextualBoost(intent, detectedIntents, contextualBoostFactor, input.lookup);

    const rawScore = clamp01(
      semanticSimilarity * semanticWeight + contextRelevance * contextWeight + historicalAccuracy * historicalWeight
    );
    const confidence = Math.min(clamp01(maxConfidence), clamp01(rawScore + contextualBoost));

    return {
      intentName: intent.name,
      matchedExample,
      semanticSimilarity,
      contextRelevance,
      historicalAccuracy,
      contextualBoost,
      rawScore,
      confidence,
    };
  }
}
