import { z } from "zod";
import type { HierarchicalIntentResult, IntentDetectionResult } from "../../../shared/schemas/intent";
import type { DetectionConfig } from "../../config/intentResolution";
import type { CompletionParams, ModelProvider } from "../../lib/modelProvider";
import { createExternalServiceError, getErrorMessage, isAbortError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { summarizeContext, type ConversationContextStore } from "./conversationStore";
import { requireNonEmpty } from "./guards";
import {
  booleanField,
  clamp01,
  confidenceField,
  decodeModelJson,
  nameField,
  objectListField,
  optionalNumberField,
  optionalStringField,
  stringField,
} from "./modelJson";
import { buildHierarchicalIntentPrompt, buildIntentDetectionPrompt, buildIntentReviewPrompt } from "./prompts";
import { recordProviderFailure, withSpan } from "./telemetry";

const log = createLogger("intent-detector");

export const PARSE_ERROR_INTENT = "parse_error";

const RankedIntentSchema = z.object({
  intent: nameField("unknown"),
  confidence: confidenceField(0),
  explanation: optionalStringField(),
});

export const DetectionResponseSchema = RankedIntentSchema.extend({
  entities: objectListField(
    z.object({
      type: nameField("unknown"),
      value: stringField(""),
      confidence: confidenceField(0),
    })
  ),
});

export const IntentReviewSchema = z.object({
  isCorrect: booleanField(true),
  correctedIntent: optionalStringField(),
  confidence: optionalNumberField().transform(value => (value === undefined ? undefined : clamp01(value))),
  explanation: optionalStringField(),
});

export const HierarchicalResponseSchema = z.object({
  topLevelIntent: RankedIntentSchema.optional().catch(undefined),
  subIntents: objectListField(RankedIntentSchema),
});

export type IntentReview = z.output<typeof IntentReviewSchema>;

export interface IntentDetectorOptions {
  provider: ModelProvider;
  config: DetectionConfig;
  /** Read for the context summary; the detector never writes to it. */
  contextStore?: ConversationContextStore;
}

/** A rejected review keeps the entities the first pass found. */
export function applyReview(initial: IntentDetectionResult, review: IntentReview): IntentDetectionResult {
  if (review.isCorrect) return { ...initial, entities: initial.entities.map(entity => ({ ...entity })) };

  return {
    intent: review.correctedIntent?.trim() || initial.intent,
    query: initial.query,
    confidence: review.confidence ?? initial.confidence,
    entities: initial.entities.map(entity => ({ ...entity })),
    explanation: review.explanation || initial.explanation,
  };
}

function parseErrorResult(query: string): IntentDetectionResult {
  return {
    intent: PARSE_ERROR_INTENT,
    query,
    confidence: 0,
    entities: [],
    explanation: "Failed to parse model response",
  };
}

/**
 * Asks the model directly for an intent and its entities, as opposed to the
 * embedding classifier. Low-confidence answers get a second review pass when
 * self-verification is on.
 */
export class IntentDetector {
  private readonly provider: ModelProvider;
  private readonly config: DetectionConfig;
  private readonly contextStore?: ConversationContextStore;

  constructor(options: IntentDetectorOptions) {
    this.provider = options.provider;
    this.config = options.config;
    this.contextStore = options.contextStore;
  }

  /**
   * Rejects with `ExternalServiceError` when the detection call fails, and
   * with the abort reason when cancelled. An unparseable answer resolves to
   * the `parse_error` intent.
   */
  detectIntent(query: string, conversationId?: string, signal?: AbortSignal): Promise<IntentDetectionResult> {
    requireNonEmpty(query, "query");

    return withSpan("detect", { "intent_resolution.has_conversation": conversationId !== undefined }, async span => {
      const contextSummary = conversationId ? await this.contextSummary(conversationId, signal) : "";
      const response = await this.complete(buildIntentDetectionPrompt(query, contextSummary), signal);

      const decoded = decodeModelJson(response, DetectionResponseSchema);
      if (!decoded.ok) {
        log.warn("Failed to parse intent detection response", { kind: decoded.error.kind, error: decoded.error.message });
        return parseErrorResult(query);
      }

      let result: IntentDetectionResult = { ...decoded.value, query };
      if (this.config.enableSelfVerification && result.confidence < this.config.confidenceThreshold) {
        const review = await this.review(query, result, signal);
        if (review) result = applyReview(result, review);
      }

      span.setAttributes({
        "intent_resolution.intent": result.intent,
        "intent_resolution.confidence": result.confidence,
      });
      log.info("Intent detected", {
        intent: result.intent,
        confidence: result.confidence,
        entities: result.entities.length,
      });
      return result;
    });
  }

  /** Splits a compound request into a main intent and the sub-intents it also carries. */
  classifyHierarchicalIntent(query: string, signal?: AbortSignal): Promise<HierarchicalIntentResult> {
    requireNonEmpty(query, "query");

    return withSpan("detect", { "intent_resolution.hierarchical": true }, async span => {
      const response = await this.complete(buildHierarchicalIntentPrompt(query), signal);

      const decoded = decodeModelJson(response, HierarchicalResponseSchema);
      if (!decoded.ok) {
        log.warn("Failed to parse hierarchical intent response", { error: decoded.error.message });
        return { topLevelIntent: parseErrorResult(query), subIntents: [], hasMultipleIntents: false };
      }

      const topLevelIntent: IntentDetectionResult = decoded.value.topLevelIntent
        ? { ...decoded.value.topLevelIntent, query, entities: [] }
        : {
            intent: "unknown",
            query,
            confidence: 0,
            entities: [],
            explanation: "No top-level intent found in response",
          };
      const subIntents = decoded.value.subIntents.map(
        (sub): IntentDetectionResult => ({ ...sub, query, entities: [] })
      );

      span.setAttribute("intent_resolution.sub_intents", subIntents.length);
      return { topLevelIntent, subIntents, hasMultipleIntents: subIntents.length > 0 };
    });
  }

  private async contextSummary(conversationId: string, signal?: AbortSignal): Promise<string> {
    if (!this.contextStore) return "";

    try {
      const context = await this.contextStore.getContext(conversationId, signal);
      return context ? summarizeContext(context, this.config.maxContextMessages) : "";
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.warn("Conversation context unavailable, detecting without it", { conversationId, error: getErrorMessage(error) });
      return "";
    }
  }

  private async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    const params: CompletionParams = { temperature: 0.1, topP: 0.95, maxTokens: 800, responseFormat: "json", signal };
    try {
      return await this.provider.generateCompletion(this.config.model, prompt, params);
    } catch (error) {
      if (isAbortError(error)) throw error;
      recordProviderFailure();
      log.error("Intent detection call failed", { error: getErrorMessage(error) });
      throw createExternalServiceError("intent-detection", error);
    }
  }

  private async review(
    query: string,
    initial: IntentDetectionResult,
    signal?: AbortSignal
  ): Promise<IntentReview | null> {
    let response: string;
    try {
      response = await this.provider.generateCompletion(this.config.model, buildIntentReviewPrompt(query, initial), {
        temperature: 0.1,
        topP: 0.95,
        maxTokens: 400,
        responseFormat: "json",
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.warn("Intent review failed, keeping first answer", { error: getErrorMessage(error) });
      return null;
    }

    const decoded = decodeModelJson(response, IntentReviewSchema);
    if (!decoded.ok) {
      log.warn("Failed to parse intent review response, keeping first answer", { error: decoded.error.message });
      return null;
    }
    return decoded.value;
  }
}
