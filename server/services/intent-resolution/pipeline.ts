import {
  FallbackLevel,
  type ChainOfThoughtResult,
  type ClassificationResult,
  type ConversationMessage,
  type FallbackResult,
  type IntentDetectionResult,
} from "../../../shared/schemas/intent";
import { createContext, getTraceId, runWithContext } from "../../lib/correlationContext";
import { getErrorMessage, isAbortError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { ConversationContextStore } from "./conversationStore";
import { isStorableOutcome, type FallbackManager } from "./fallbackManager";
import { requireNonEmpty } from "./guards";
import type { IntentClassifier } from "./intentClassifier";
import type { ReasoningEngine } from "./reasoningEngine";
import { withSpan } from "./telemetry";

const log = createLogger("intent-pipeline");

export const UNKNOWN_INTENT = "unknown";

export interface ResolveOptions {
  conversationId?: string;
  signal?: AbortSignal;
  /** Also run chain-of-thought reasoning over the query. */
  reason?: boolean;
}

export interface ResolutionOutcome {
  traceId: string;
  classification: ClassificationResult;
  detection: IntentDetectionResult;
  fallback?: FallbackResult;
  reasoning?: ChainOfThoughtResult;
}

export interface IntentResolutionPipelineOptions {
  classifier: IntentClassifier;
  fallbackManager: FallbackManager;
  reasoningEngine?: ReasoningEngine;
  contextStore?: ConversationContextStore;
  tenantId?: string;
}

export function detectionFromClassification(result: ClassificationResult): IntentDetectionResult {
  const top = result.topMatch;
  return {
    intent: top ? top.intentName : UNKNOWN_INTENT,
    query: result.query,
    confidence: top ? top.confidence : 0,
    entities: [],
    explanation: result.explanation,
  };
}

/**
 * classify → escalate → reason → record.
 *
 * Every store write happens last, after the abort signal is checked: the user
 * turn, then the detection (the classifier's, or a successful fallback tier's).
 * A cancelled resolution writes nothing.
 */
export class IntentResolutionPipeline {
  private readonly classifier: IntentClassifier;
  private readonly fallbackManager: FallbackManager;
  private readonly reasoningEngine?: ReasoningEngine;
  private readonly contextStore?: ConversationContextStore;
  private readonly tenantId?: string;

  constructor(options: IntentResolutionPipelineOptions) {
    this.classifier = options.classifier;
    this.fallbackManager = options.fallbackManager;
    this.reasoningEngine = options.reasoningEngine;
    this.contextStore = options.contextStore;
    this.tenantId = options.tenantId;
  }

  resolve(query: string, options: ResolveOptions = {}): Promise<ResolutionOutcome> {
    requireNonEmpty(query, "query");
    if (options.conversationId !== undefined) {
      requireNonEmpty(options.conversationId, "conversationId");
    }

    const context = createContext({
      traceId: getTraceId(),
      tenantId: this.tenantId,
      conversationId: options.conversationId,
    });

    return runWithContext(context, () =>
      withSpan("resolve", { "intent_resolution.with_context": Boolean(options.conversationId) }, () =>
        this.run(query, options, context.traceId)
      )
    );
  }

  private async run(query: string, options: ResolveOptions, traceId: string): Promise<ResolutionOutcome> {
    const { conversationId, signal } = options;

    const classification = conversationId
      ? await this.classifier.classifyWithContext(query, conversationId, undefined, signal)
      : await this.classifier.classify(query, undefined, signal);

    let detection = detectionFromClassification(classification);
    let fallback: FallbackResult | undefined;

    const shouldEscalate =
      classification.recommendedAction === "fallback" ||
      classification.recommendedAction === "no_match" ||
      this.fallbackManager.needsFallback(detection);

    if (shouldEscalate) {
      fallback = await this.fallbackManager.evaluateFallback(query, detection, conversationId, signal);
      signal?.throwIfAborted();

      if (isStorableOutcome(fallback)) {
        detection = fallback.finalResult;
      }
    }

    // A tier that ran and failed leaves nothing worth storing.
    const storeDetection =
      fallback !== undefined && fallback.fallbackLevel !== FallbackLevel.None
        ? fallback.isSuccessful
        : detection.intent !== UNKNOWN_INTENT;

    let reasoning: ChainOfThoughtResult | undefined;
    if (options.reason && this.reasoningEngine) {
      const history = conversationId ? await this.loadHistory(conversationId, signal) : [];
      reasoning = await this.reasoningEngine.reason(query, history, signal);
    }

    signal?.throwIfAborted();
    if (conversationId) {
      await this.record(conversationId, query, detection, storeDetection);
    }

    log.info("Resolved query", {
      intent: detection.intent,
      confidence: detection.confidence,
      action: classification.recommendedAction,
      fallbackLevel: fallback ? FallbackLevel[fallback.fallbackLevel] : "None",
    });

    return { traceId, classification, detection, fallback, reasoning };
  }

  private async loadHistory(conversationId: string, signal?: AbortSignal): Promise<ConversationMessage[]> {
    if (!this.contextStore) return [];
    try {
      const context = await this.contextStore.getContext(conversationId, signal);
      return context?.messages ?? [];
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.warn("Failed to load history for reasoning", { error: getErrorMessage(error) });
      return [];
    }
  }

  private async record(
    conversationId: string,
    query: string,
    detection: IntentDetectionResult,
    includeDetection: boolean
  ): Promise<void> {
    const store = this.contextStore;
    if (!store) return;

    try {
      await store.appendMessage(conversationId, { role: "user", content: query, timestamp: new Date() });
      if (includeDetection) {
        await store.appendDetectedIntent(conversationId, {
          intent: detection.intent,
          confidence: detection.confidence,
          detectedAt: new Date(),
          query,
          entities: detection.entities,
        });
      }
    } catch (error) {
      log.warn("Failed to record conversation turn", { error: getErrorMessage(error) });
    }
  }
}
