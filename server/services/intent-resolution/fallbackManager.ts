import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import {
  FallbackLevel,
  type ConversationMessage,
  type Entity,
  type FallbackResult,
  type IntentDetectionResult,
  type MisclassificationData,
} from "../../../shared/schemas/intent";
import type { FallbackConfig } from "../../config/intentResolution";
import type { CompletionParams, ModelProvider } from "../../lib/modelProvider";
import { createValidationError, getErrorMessage, isAbortError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { ConversationContextStore } from "./conversationStore";
import { requireNonEmpty, requirePresent } from "./guards";
import { LoggingMisclassificationSink, type MisclassificationSink } from "./misclassificationSink";
import {
  confidenceField,
  decodeModelJson,
  nameField,
  objectListField,
  optionalStringField,
  stringField,
  stringListField,
} from "./modelJson";
import {
  buildAlternativeIntentsPrompt,
  buildClarificationQuestionsPrompt,
  buildGeneralizedIntentPrompt,
  buildPartialIntentPrompt,
  formatConversationWindow,
} from "./prompts";
import { recordFallback, withSpan } from "./telemetry";

const log = createLogger("fallback-manager");

export const AlternativeIntentSchema = z.object({
  intent: nameField("unknown"),
  confidence: confidenceField(0),
  explanation: optionalStringField(),
});

export const AlternativeIntentListSchema = z.array(
  AlternativeIntentSchema.catch({ intent: "unknown", confidence: 0, explanation: undefined })
);

export const ClarificationQuestionListSchema = z.array(z.unknown()).pipe(stringListField());

export const GeneralizedIntentSchema = z.object({
  intent: nameField("general_query"),
  confidence: confidenceField(0),
  explanation: stringField("Generalized intent"),
  suggestedNextStep: optionalStringField(),
});

export const PartialEntitySchema = z.object({
  type: nameField("unknown"),
  value: stringField(""),
  confidence: confidenceField(0),
});

export const PartialIntentSchema = z.object({
  partialIntent: nameField("unclear_intent"),
  confidence: confidenceField(0),
  extractedEntities: objectListField(PartialEntitySchema),
  missingInformation: nameField("Additional context needed"),
});

const NEXT_STEP_ENTITY = "next_step";
const MISSING_INFORMATION_ENTITY = "missing_information";
const DERIVED_ENTITY_CONFIDENCE = 0.9;

const ALTERNATIVES_PARAMS: CompletionParams = { temperature: 0.7, topP: 0.95 };
const QUESTIONS_PARAMS: CompletionParams = { temperature: 0.7, topP: 0.95 };
const GENERALIZE_PARAMS: CompletionParams = { temperature: 0.4, topP: 0.95, responseFormat: "json" };
const PARTIAL_PARAMS: CompletionParams = { temperature: 0.3, topP: 0.95, responseFormat: "json" };

interface PartialExtraction {
  detection: IntentDetectionResult;
  extractedEntities: Entity[];
}

type TierOutcome = Omit<FallbackResult, "misclassification" | "originalResult">;

export interface FallbackManagerOptions {
  provider: ModelProvider;
  config: FallbackConfig;
  contextStore?: ConversationContextStore;
  sink?: MisclassificationSink;
}

/** True for a tier that ran and succeeded; its final detection belongs in the conversation store. */
export function isStorableOutcome(result: FallbackResult): boolean {
  return result.fallbackLevel !== FallbackLevel.None && result.isSuccessful;
}

/** Quoted fragments, then bare lines, that end in a question mark. */
export function salvageQuestions(text: string): string[] {
  const quoted = Array.from(text.matchAll(/"([^"\n]+)"/g), match => match[1].trim()).filter(fragment =>
    fragment.endsWith("?")
  );
  if (quoted.length > 0) return quoted;

  return text
    .split("\n")
    .map(line => line.replace(/^[\s\-*\d.)\[\]]+/, "").replace(/["\],]+$/g, "").trim())
    .filter(line => line.length > 1 && line.endsWith("?"));
}

/**
 * Four-tier escalation used when classification confidence is too low:
 * clarification, generalized intent, partial extraction, handoff.
 *
 * `applyFallback` never rejects once its arguments are valid. Failures inside a
 * tier degrade that tier; anything else ends in ExplicitHandoff.
 */
export class FallbackManager {
  private readonly provider: ModelProvider;
  private readonly config: FallbackConfig;
  private readonly contextStore?: ConversationContextStore;
  private readonly sink: MisclassificationSink;

  constructor(options: FallbackManagerOptions) {
    this.provider = options.provider;
    this.config = options.config;
    this.contextStore = options.contextStore;
    this.sink = options.sink ?? new LoggingMisclassificationSink();
  }

  needsFallback(result: IntentDetectionResult | null | undefined): boolean {
    if (!result) return true;
    return result.confidence < this.config.fallbackThreshold;
  }

  /**
   * Escalates, then stores the detection of a successful tier when a
   * conversation id is given. Nothing is stored once `signal` has aborted.
   */
  applyFallback(
    query: string,
    initialResult: IntentDetectionResult,
    conversationId?: string,
    signal?: AbortSignal
  ): Promise<FallbackResult> {
    return this.evaluateFallback(query, initialResult, conversationId, signal).then(async result => {
      if (conversationId && isStorableOutcome(result) && !signal?.aborted) {
        await this.remember(conversationId, query, result.finalResult);
      }
      return result;
    });
  }

  /** Same escalation as `applyFallback`, but the caller owns any write to the store. */
  evaluateFallback(
    query: string,
    initialResult: IntentDetectionResult,
    conversationId?: string,
    signal?: AbortSignal
  ): Promise<FallbackResult> {
    requireNonEmpty(query, "query");
    requirePresent(initialResult, "initialResult");

    if (!this.needsFallback(initialResult)) {
      return Promise.resolve({
        fallbackLevel: FallbackLevel.None,
        originalResult: initialResult,
        finalResult: initialResult,
        alternatives: [],
        clarificationQuestions: [],
        isSuccessful: true,
        reason: "No fallback needed",
        requiresUserInteraction: false,
      });
    }

    return this.escalate(query, initialResult, async () => {
      const messages = conversationId ? await this.loadConversation(conversationId, signal) : [];
      return this.runTiers(query, initialResult, messages, signal);
    });
  }

  applyFallbackWithContext(
    query: string,
    initialResult: IntentDetectionResult,
    messages: ConversationMessage[],
    signal?: AbortSignal
  ): Promise<FallbackResult> {
    requireNonEmpty(query, "query");
    requirePresent(initialResult, "initialResult");

    return this.escalate(query, initialResult, () =>
      this.runTiers(query, initialResult, messages ?? [], signal)
    );
  }

  generateClarificationQuestions(
    query: string,
    alternatives: IntentDetectionResult[],
    maxQuestions = 3,
    signal?: AbortSignal
  ): Promise<string[]> {
    requireNonEmpty(query, "query");
    if (!Array.isArray(alternatives) || alternatives.length === 0) {
      throw createValidationError("alternatives", "cannot be empty");
    }
    if (!Number.isInteger(maxQuestions) || maxQuestions < 1) {
      throw createValidationError("maxQuestions", "must be a positive integer");
    }

    return this.questionsFor(query, alternatives, maxQuestions, signal);
  }

  async recordMisclassification(data: MisclassificationData): Promise<boolean> {
    requirePresent(data, "misclassificationData");
    try {
      await this.sink.record(data);
      return true;
    } catch (error) {
      log.error("Failed to record misclassification", { error: getErrorMessage(error) });
      return false;
    }
  }

  private escalate(
    query: string,
    original: IntentDetectionResult,
    run: () => Promise<TierOutcome>
  ): Promise<FallbackResult> {
    return withSpan(
      "fallback",
      { "intent_resolution.original_intent": original.intent, "intent_resolution.original_confidence": original.confidence },
      async span => {
        log.info("Applying fallback", { intent: original.intent, confidence: original.confidence });

        let outcome: TierOutcome;
        const details: Record<string, string> = {};
        try {
          outcome = await run();
          details.reason = outcome.reason;
        } catch (error) {
          const message = getErrorMessage(error);
          log.error("Fallback escalation failed, handing off", { error: message });
          details.error = message;
          if (error instanceof Error && error.stack) {
            details.stackTrace = error.stack;
          }
          outcome = {
            fallbackLevel: FallbackLevel.ExplicitHandoff,
            finalResult: original,
            alternatives: [],
            clarificationQuestions: [],
            isSuccessful: false,
            reason: `Error in fallback processing: ${message}`,
            requiresUserInteraction: true,
          };
        }

        if (outcome.alternatives.length > 0) {
          details.alternatives = outcome.alternatives.map(alternative => alternative.intent).join(",");
        }

        const misclassification: MisclassificationData = {
          id: uuidv4(),
          originalQuery: query,
          timestamp: new Date(),
          actualIntent: original.intent,
          expectedIntent:
            outcome.fallbackLevel === FallbackLevel.ExplicitHandoff ? undefined : outcome.finalResult.intent,
          confidence: original.confidence,
          fallbackApplied: outcome.fallbackLevel,
          fallbackSuccessful: outcome.isSuccessful,
          additionalDetails: details,
        };
        await this.recordMisclassification(misclassification);
        recordFallback(outcome.fallbackLevel, outcome.isSuccessful);

        span.setAttributes({
          "intent_resolution.fallback_level": FallbackLevel[outcome.fallbackLevel],
          "intent_resolution.fallback_successful": outcome.isSuccessful,
        });

        return { ...outcome, originalResult: original, misclassification };
      }
    );
  }

  private async runTiers(
    query: string,
    original: IntentDetectionResult,
    messages: ConversationMessage[],
    signal?: AbortSignal
  ): Promise<TierOutcome> {
    const conversation = formatConversationWindow(messages, this.config.contextWindowSize);

    const alternatives = await this.findAlternativeIntents(query, original, conversation, signal);
    if (alternatives.some(alternative => alternative.confidence > original.confidence)) {
      const questions = await this.questionsFor(query, alternatives, this.config.maxClarificationQuestions, signal);
      return {
        fallbackLevel: FallbackLevel.RequestClarification,
        finalResult: alternatives[0],
        alternatives,
        clarificationQuestions: questions,
        isSuccessful: questions.length > 0,
        reason: "Low confidence classification, requesting clarification",
        requiresUserInteraction: true,
      };
    }
    signal?.throwIfAborted();

    const generalized = await this.generalizeIntent(query, conversation, signal);
    if (generalized && generalized.confidence >= this.config.generalizedIntentThreshold) {
      return {
        fallbackLevel: FallbackLevel.GeneralizedIntent,
        finalResult: generalized,
        alternatives,
        clarificationQuestions: [],
        isSuccessful: true,
        reason: "Using generalized intent",
        requiresUserInteraction: false,
      };
    }
    signal?.throwIfAborted();

    const partial = await this.extractPartialIntent(query, conversation, signal);
    if (partial && partial.extractedEntities.some(entity => entity.confidence >= this.config.partialIntentThreshold)) {
      return {
        fallbackLevel: FallbackLevel.PartialIntentExtraction,
        finalResult: partial.detection,
        alternatives,
        clarificationQuestions: [],
        isSuccessful: true,
        reason: "Extracted partial intent information",
        requiresUserInteraction: false,
      };
    }
    signal?.throwIfAborted();

    log.debug("All fallback tiers failed, handing off");
    return {
      fallbackLevel: FallbackLevel.ExplicitHandoff,
      finalResult: original,
      alternatives,
      clarificationQuestions: [],
      isSuccessful: false,
      reason: "All fallback strategies failed",
      requiresUserInteraction: true,
    };
  }

  private async loadConversation(conversationId: string, signal?: AbortSignal): Promise<ConversationMessage[]> {
    if (!this.contextStore) return [];
    try {
      const context = await this.contextStore.getContext(conversationId, signal);
      return context?.messages ?? [];
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.warn("Failed to load conversation context, continuing without it", {
        conversationId,
        error: getErrorMessage(error),
      });
      return [];
    }
  }

  private async remember(conversationId: string, query: string, detection: IntentDetectionResult): Promise<void> {
    if (!this.contextStore) return;
    try {
      await this.contextStore.appendDetectedIntent(conversationId, {
        intent: detection.intent,
        confidence: detection.confidence,
        detectedAt: new Date(),
        query,
        entities: detection.entities,
      });
    } catch (error) {
      log.warn("Failed to store fallback detection", { conversationId, error: getErrorMessage(error) });
    }
  }

  private async complete(prompt: string, params: CompletionParams, signal?: AbortSignal): Promise<string> {
    return this.provider.generateCompletion(this.config.model, prompt, { ...params, signal });
  }

  private async findAlternativeIntents(
    query: string,
    original: IntentDetectionResult,
    conversation: string,
    signal?: AbortSignal
  ): Promise<IntentDetectionResult[]> {
    let response: string;
    try {
      response = await this.complete(buildAlternativeIntentsPrompt(query, original, conversation), ALTERNATIVES_PARAMS, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Failed to fetch alternative intents", { error: getErrorMessage(error) });
      return [];
    }

    const decoded = decodeModelJson(response, AlternativeIntentListSchema);
    if (!decoded.ok) {
      log.warn("Could not parse alternative intents", { kind: decoded.error.kind, error: decoded.error.message });
      return [];
    }

    const originalIntent = original.intent.toLowerCase();
    return decoded.value
      .filter(
        alternative =>
          alternative.intent.toLowerCase() !== originalIntent &&
          alternative.confidence >= this.config.minAlternativeConfidence
      )
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, this.config.maxAlternatives)
      .map(alternative => ({
        intent: alternative.intent,
        query,
        confidence: alternative.confidence,
        entities: [],
        explanation: alternative.explanation,
      }));
  }

  private async questionsFor(
    query: string,
    alternatives: IntentDetectionResult[],
    maxQuestions: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    const limit = Math.min(maxQuestions, this.config.maxClarificationQuestions);
    const templated = [this.config.clarificationTemplate.replaceAll("{intent}", alternatives[0].intent)];

    let response: string;
    try {
      response = await this.complete(
        buildClarificationQuestionsPrompt(query, alternatives.slice(0, this.config.maxAlternatives), limit),
        QUESTIONS_PARAMS,
        signal
      );
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Failed to generate clarification questions", { error: getErrorMessage(error) });
      return templated;
    }

    const decoded = decodeModelJson(response, ClarificationQuestionListSchema);
    if (decoded.ok) {
      return decoded.value.slice(0, limit);
    }

    log.warn("Could not parse clarification questions, salvaging", { error: decoded.error.message });
    const salvaged = salvageQuestions(response).slice(0, limit);
    return salvaged.length > 0 ? salvaged : templated;
  }

  private async generalizeIntent(
    query: string,
    conversation: string,
    signal?: AbortSignal
  ): Promise<IntentDetectionResult | null> {
    let response: string;
    try {
      response = await this.complete(buildGeneralizedIntentPrompt(query, conversation), GENERALIZE_PARAMS, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Failed to generalize intent", { error: getErrorMessage(error) });
      return null;
    }

    const decoded = decodeModelJson(response, GeneralizedIntentSchema);
    if (!decoded.ok) {
      log.warn("Could not parse generalized intent", { error: decoded.error.message });
      return {
        intent: "general_query",
        query,
        confidence: 0,
        entities: [],
        explanation: "Fallback to general query handling",
      };
    }

    const { intent, confidence, explanation, suggestedNextStep } = decoded.value;
    const entities: Entity[] = suggestedNextStep
      ? [{ type: NEXT_STEP_ENTITY, value: suggestedNextStep, confidence: DERIVED_ENTITY_CONFIDENCE }]
      : [];

    return { intent, query, confidence, entities, explanation };
  }

  private async extractPartialIntent(
    query: string,
    conversation: string,
    signal?: AbortSignal
  ): Promise<PartialExtraction | null> {
    let response: string;
    try {
      response = await this.complete(buildPartialIntentPrompt(query, conversation), PARTIAL_PARAMS, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Failed to extract partial intent", { error: getErrorMessage(error) });
      return null;
    }

    const decoded = decodeModelJson(response, PartialIntentSchema);
    if (!decoded.ok) {
      log.warn("Could not parse partial intent", { error: decoded.error.message });
      return null;
    }

    const { partialIntent, confidence, extractedEntities, missingInformation } = decoded.value;
    const missing: Entity = {
      type: MISSING_INFORMATION_ENTITY,
      value: missingInformation,
      confidence: DERIVED_ENTITY_CONFIDENCE,
    };

    return {
      detection: {
        intent: partialIntent,
        query,
        confidence,
        entities: [...extractedEntities, missing],
        explanation: `Partial intent extraction. Missing: ${missingInformation}`,
      },
      extractedEntities,
    };
  }
}
