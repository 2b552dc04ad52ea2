/**
 * Intent resolution configuration.
 *
 * Reads thresholds, weights and model names from the environment, validates
 * them and produces a typed, nested config. Unset variables take the defaults
 * below.
 */

import { z } from "zod";
import { ValidationError } from "../utils/errors";

const unitInterval = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();
const nonNegative = z.coerce.number().min(0);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

const envSchema = z.object({
  INTENT_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  INTENT_SIMILARITY_THRESHOLD: unitInterval.default(0.7),
  INTENT_HIGH_CONFIDENCE_THRESHOLD: unitInterval.default(0.85),
  INTENT_MISMATCH_THRESHOLD: unitInterval.default(0.5),
  INTENT_AMBIGUITY_THRESHOLD: unitInterval.default(0.1),

  INTENT_SEMANTIC_WEIGHT: nonNegative.default(1.0),
  INTENT_CONTEXT_WEIGHT: nonNegative.default(0.2),
  INTENT_HISTORICAL_WEIGHT: nonNegative.default(0.2),
  INTENT_CONTEXTUAL_BOOST: z.coerce.number().min(0).max(0.5).default(0.1),
  INTENT_HISTORY_COUNT: z.coerce.number().int().min(0).default(10),
  INTENT_MAX_CONFIDENCE: unitInterval.default(1.0),

  FALLBACK_THRESHOLD: unitInterval.default(0.5),
  FALLBACK_GENERALIZED_THRESHOLD: unitInterval.default(0.4),
  FALLBACK_PARTIAL_THRESHOLD: unitInterval.default(0.3),
  FALLBACK_MAX_QUESTIONS: positiveInt.default(3),
  FALLBACK_MAX_ALTERNATIVES: positiveInt.default(5),
  FALLBACK_CONTEXT_WINDOW: positiveInt.default(5),
  FALLBACK_MODEL: z.string().min(1).default("gpt-4o-mini"),

  REASONING_MODEL: z.string().min(1).default("gpt-4o-mini"),
  REASONING_SELF_VERIFICATION: booleanFlag.default("true"),
  REASONING_CONTEXT_MESSAGES: positiveInt.default(10),

  CONTEXT_MAX_MESSAGES: positiveInt.default(50),
  CONTEXT_MAX_INTENTS: positiveInt.default(20),
  CONTEXT_MAX_ENTITIES: positiveInt.default(50),

  DETECTION_MODEL: z.string().min(1).default("gpt-4o-mini"),
  DETECTION_CONFIDENCE_THRESHOLD: unitInterval.default(0.7),
  DETECTION_SELF_VERIFICATION: booleanFlag.default("true"),
  DETECTION_CONTEXT_MESSAGES: positiveInt.default(10),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  PROVIDER_TIMEOUT_MS: positiveInt.default(30000),
});

export interface ClassifierConfig {
  embeddingModel: string;
  similarityThreshold: number;
  highConfidenceThreshold: number;
  mismatchThreshold: number;
  ambiguityThreshold: number;
}

export interface ScoringConfig {
  semanticWeight: number;
  contextWeight: number;
  historicalWeight: number;
  contextualBoostFactor: number;
  historicalInteractionsCount: number;
  maxConfidence: number;
}

export interface FallbackConfig {
  fallbackThreshold: number;
  generalizedIntentThreshold: number;
  partialIntentThreshold: number;
  maxClarificationQuestions: number;
  maxAlternatives: number;
  minAlternativeConfidence: number;
  contextWindowSize: number;
  model: string;
  /** `{intent}` is replaced by the top alternative's name. */
  clarificationTemplate: string;
}

export interface ReasoningConfig {
  model: string;
  enableSelfVerification: boolean;
  maxContextMessages: number;
}

export interface DetectionConfig {
  model: string;
  /** Detections below this confidence get a verification pass. */
  confidenceThreshold: number;
  enableSelfVerification: boolean;
  maxContextMessages: number;
}

export interface ContextStoreConfig {
  maxMessageHistory: number;
  maxStoredIntents: number;
  maxTrackedEntities: number;
}

export interface ProviderConfig {
  apiKey?: string;
  baseURL?: string;
  timeoutMs: number;
}

export interface IntentResolutionConfig {
  classifier: ClassifierConfig;
  scoring: ScoringConfig;
  fallback: FallbackConfig;
  reasoning: ReasoningConfig;
  detection: DetectionConfig;
  context: ContextStoreConfig;
  provider: ProviderConfig;
}

export const DEFAULT_CLARIFICATION_TEMPLATE =
  "I'm not completely sure I understand. Are you asking about: {intent}? Or did you mean something else?";

export function loadIntentResolutionConfig(
  env: Record<string, string | undefined> = process.env
): IntentResolutionConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid intent resolution configuration:\n  - ${issues.join("\n  - ")}`, {
      issues,
    });
  }

  const vars = result.data;

  return {
    classifier: {
      embeddingModel: vars.INTENT_EMBEDDING_MODEL,
      similarityThreshold: vars.INTENT_SIMILARITY_THRESHOLD,
      highConfidenceThreshold: vars.INTENT_HIGH_CONFIDENCE_THRESHOLD,
      mismatchThreshold: vars.INTENT_MISMATCH_THRESHOLD,
      ambiguityThreshold: vars.INTENT_AMBIGUITY_THRESHOLD,
    },
    scoring: {
      semanticWeight: vars.INTENT_SEMANTIC_WEIGHT,
      contextWeight: vars.INTENT_CONTEXT_WEIGHT,
      historicalWeight: vars.INTENT_HISTORICAL_WEIGHT,
      contextualBoostFactor: vars.INTENT_CONTEXTUAL_BOOST,
      historicalInteractionsCount: vars.INTENT_HISTORY_COUNT,
      maxConfidence: vars.INTENT_MAX_CONFIDENCE,
    },
    fallback: {
      fallbackThreshold: vars.FALLBACK_THRESHOLD,
      generalizedIntentThreshold: vars.FALLBACK_GENERALIZED_THRESHOLD,
      partialIntentThreshold: vars.FALLBACK_PARTIAL_THRESHOLD,
      maxClarificationQuestions: vars.FALLBACK_MAX_QUESTIONS,
      maxAlternatives: vars.FALLBACK_MAX_ALTERNATIVES,
      minAlternativeConfidence: 0.2,
      contextWindowSize: vars.FALLBACK_CONTEXT_WINDOW,
      model: vars.FALLBACK_MODEL,
      clarificationTemplate: DEFAULT_CLARIFICATION_TEMPLATE,
    },
    reasoning: {
      model: vars.REASONING_MODEL,
      enableSelfVerification: vars.REASONING_SELF_VERIFICATION,
      maxContextMessages: vars.REASONING_CONTEXT_MESSAGES,
    },
    detection: {
      model: vars.DETECTION_MODEL,
      confidenceThreshold: vars.DETECTION_CONFIDENCE_THRESHOLD,
      enableSelfVerification: vars.DETECTION_SELF_VERIFICATION,
      maxContextMessages: vars.DETECTION_CONTEXT_MESSAGES,
    },
    context: {
      maxMessageHistory: vars.CONTEXT_MAX_MESSAGES,
      maxStoredIntents: vars.CONTEXT_MAX_INTENTS,
      maxTrackedEntities: vars.CONTEXT_MAX_ENTITIES,
    },
    provider: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      timeoutMs: vars.PROVIDER_TIMEOUT_MS,
    },
  };
}

export const DEFAULT_INTENT_RESOLUTION_CONFIG: IntentResolutionConfig = loadIntentResolutionConfig({});
