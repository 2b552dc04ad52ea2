import {
  DEFAULT_INTENT_RESOLUTION_CONFIG,
  type IntentResolutionConfig,
} from "../../config/intentResolution";
import type { ModelProvider } from "../../lib/modelProvider";
import { InMemoryConversationContextStore, type ConversationContextStore } from "./conversationStore";
import { FallbackManager } from "./fallbackManager";
import { IntentClassifier } from "./intentClassifier";
import { IntentDetector } from "./intentDetector";
import { IntentModelRegistry } from "./intentModelRegistry";
import type { MisclassificationSink } from "./misclassificationSink";
import { IntentResolutionPipeline } from "./pipeline";
import { ReasoningEngine } from "./reasoningEngine";

export { cosineSimilarity, findBestExample, type ExampleMatch } from "./similarity";
export { IntentClassificationModel, type IntentModelOptions } from "./intentModel";
export {
  ConfidenceScorer,
  calculateContextRelevance,
  calculateHistoricalAccuracy,
  calculateContextualBoost,
  CONTEXT_RELEVANCE,
  type ScoringContext,
} from "./confidenceScorer";
export {
  buildClassificationResult,
  rankMatches,
  calculateAmbiguity,
  determineRecommendedAction,
  buildClarificationQuestion,
  buildExplanation,
  type ActionThresholds,
  type FactorWeights,
} from "./classificationBuilder";
export { IntentClassifier, type IntentClassifierOptions } from "./intentClassifier";
export {
  FallbackManager,
  salvageQuestions,
  isStorableOutcome,
  type FallbackManagerOptions,
} from "./fallbackManager";
export {
  IntentDetector,
  applyReview,
  PARSE_ERROR_INTENT,
  type IntentDetectorOptions,
  type IntentReview,
} from "./intentDetector";
export {
  ReasoningEngine,
  reconcile,
  draftToResult,
  createErrorResult,
  getKeyReasoningSteps,
  type Verification,
} from "./reasoningEngine";
export {
  InMemoryConversationContextStore,
  recentEntities,
  summarizeContext,
  type ConversationContextStore,
} from "./conversationStore";
export { IntentModelRegistry } from "./intentModelRegistry";
export { LoggingMisclassificationSink, type MisclassificationSink } from "./misclassificationSink";
export {
  IntentResolutionPipeline,
  detectionFromClassification,
  UNKNOWN_INTENT,
  type ResolveOptions,
  type ResolutionOutcome,
} from "./pipeline";
export { decodeModelJson, extractJson, type ParseError, type Result } from "./modelJson";
export { getMetricsSnapshot, resetMetrics, type MetricsSnapshot } from "./telemetry";

export interface IntentResolutionServiceOptions {
  provider: ModelProvider;
  tenantId: string;
  config?: IntentResolutionConfig;
  registry?: IntentModelRegistry;
  contextStore?: ConversationContextStore;
  sink?: MisclassificationSink;
}

export interface IntentResolutionService {
  pipeline: IntentResolutionPipeline;
  classifier: IntentClassifier;
  fallbackManager: FallbackManager;
  reasoningEngine: ReasoningEngine;
  detector: IntentDetector;
  contextStore: ConversationContextStore;
  registry: IntentModelRegistry;
}

/** Wires the tenant's model, classifier, detector, fallback manager and reasoning engine around one provider. */
export function createIntentResolutionService(options: IntentResolutionServiceOptions): IntentResolutionService {
  const config = options.config ?? DEFAULT_INTENT_RESOLUTION_CONFIG;
  const registry = options.registry ?? new IntentModelRegistry(config.classifier);
  const contextStore = options.contextStore ?? new InMemoryConversationContextStore(config.context);
  const { provider, tenantId } = options;

  const classifier = new IntentClassifier({
    provider,
    model: registry.forTenant(tenantId),
    classifier: config.classifier,
    scoring: config.scoring,
    contextStore,
  });
  const fallbackManager = new FallbackManager({ provider, config: config.fallback, contextStore, sink: options.sink });
  const reasoningEngine = new ReasoningEngine({ provider, config: config.reasoning });
  const detector = new IntentDetector({ provider, config: config.detection, contextStore });
  const pipeline = new IntentResolutionPipeline({
    classifier,
    fallbackManager,
    reasoningEngine,
    contextStore,
    tenantId,
  });

  return { pipeline, classifier, fallbackManager, reasoningEngine, detector, contextStore, registry };
}
