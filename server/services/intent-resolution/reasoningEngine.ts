import { z } from "zod";
import type {
  ChainOfThoughtResult,
  ChainOfThoughtStep,
  ConversationMessage,
  Entity,
} from "../../../shared/schemas/intent";
import type { ReasoningConfig } from "../../config/intentResolution";
import type { ChatMessage, ModelProvider } from "../../lib/modelProvider";
import { getErrorMessage, isAbortError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { requireNonEmpty } from "./guards";
import {
  booleanField,
  clamp01,
  confidenceField,
  decodeModelJson,
  integerField,
  nameField,
  objectListField,
  optionalNumberField,
  optionalStringField,
  stringField,
  stringListField,
} from "./modelJson";
import { buildVerificationPrompt, CHAIN_OF_THOUGHT_SYSTEM_PROMPT } from "./prompts";
import { recordReasoning, withSpan } from "./telemetry";

const log = createLogger("reasoning-engine");

export const ReasoningDraftSchema = z.object({
  reasoning: objectListField(
    z.object({
      step: integerField(0),
      thought: stringField(""),
      conclusion: stringField(""),
    })
  ),
  finalConclusion: stringField("No conclusion provided"),
  confidenceScore: confidenceField(0.5),
  entities: objectListField(
    z.object({
      type: nameField("unknown"),
      value: stringField(""),
      confidence: confidenceField(0.5),
      importance: optionalNumberField(),
    })
  ),
  suggestedActions: stringListField(),
});

export const VerificationSchema = z.object({
  isValid: booleanField(true),
  confidenceScore: optionalNumberField().transform(value => (value === undefined ? undefined : clamp01(value))),
  issues: objectListField(
    z.object({
      step: integerField(0),
      issue: optionalStringField(),
      correction: optionalStringField(),
    })
  ),
  improvedConclusion: optionalStringField(),
});

export type ReasoningDraft = z.output<typeof ReasoningDraftSchema>;
export type Verification = z.output<typeof VerificationSchema>;

export interface ReasoningEngineOptions {
  provider: ModelProvider;
  config: ReasoningConfig;
}

/** Importance is on a 0–10 scale; when present it replaces the entity's confidence. */
export function draftToResult(draft: ReasoningDraft): ChainOfThoughtResult {
  const entities: Entity[] = draft.entities.map(entity => ({
    type: entity.type,
    value: entity.value,
    confidence: entity.importance === undefined ? entity.confidence : Math.min(1, Math.max(0, entity.importance / 10)),
  }));

  return {
    steps: draft.reasoning.map(step => ({
      stepNumber: step.step,
      thought: step.thought,
      conclusion: step.conclusion,
      isRevised: false,
    })),
    finalConclusion: draft.finalConclusion,
    confidenceScore: draft.confidenceScore,
    entities,
    suggestedActions: draft.suggestedActions,
    isVerified: false,
    hasError: false,
  };
}

/**
 * Folds a verification pass into the draft without touching it. A valid
 * verdict can only raise confidence; an invalid one applies the per-step
 * corrections (1-based) and takes the verifier's conclusion and confidence.
 */
export function reconcile(draft: ChainOfThoughtResult, verification: Verification | null): ChainOfThoughtResult {
  if (!verification) {
    return { ...draft, steps: draft.steps.map(step => ({ ...step })) };
  }

  if (verification.isValid) {
    return {
      ...draft,
      steps: draft.steps.map(step => ({ ...step })),
      confidenceScore: Math.max(draft.confidenceScore, verification.confidenceScore ?? draft.confidenceScore),
      isVerified: true,
    };
  }

  const corrections = new Map<number, string>();
  for (const issue of verification.issues) {
    const index = issue.step - 1;
    if (index >= 0 && index < draft.steps.length && issue.correction) {
      corrections.set(index, issue.correction);
    }
  }

  const steps: ChainOfThoughtStep[] = draft.steps.map((step, index) => {
    const correction = corrections.get(index);
    return correction === undefined ? { ...step } : { ...step, conclusion: correction, isRevised: true };
  });

  return {
    ...draft,
    steps,
    finalConclusion: verification.improvedConclusion || draft.finalConclusion,
    confidenceScore: verification.confidenceScore ?? draft.confidenceScore,
    isVerified: true,
  };
}

export function createErrorResult(errorMessage: string): ChainOfThoughtResult {
  return {
    steps: [{ stepNumber: 1, thought: "Error occurred during reasoning", conclusion: errorMessage, isRevised: false }],
    finalConclusion: "Unable to provide reasoning due to an error",
    confidenceScore: 0,
    entities: [],
    suggestedActions: [],
    isVerified: false,
    hasError: true,
    errorMessage,
  };
}

/**
 * Picks up to `maxSteps` steps for a summary: the first, any revised ones, the
 * last, then evenly spaced fillers. Returned in step order.
 */
export function getKeyReasoningSteps(result: ChainOfThoughtResult, maxSteps = 3): ChainOfThoughtStep[] {
  const { steps } = result;
  if (maxSteps <= 0) return [];
  if (steps.length <= maxSteps) return [...steps];

  const last = steps.length - 1;
  const chosen = new Set<number>([0]);
  if (maxSteps > 1) chosen.add(last);

  for (let i = 0; i < steps.length && chosen.size < maxSteps; i++) {
    if (steps[i].isRevised) chosen.add(i);
  }
  for (let slot = 1; slot < maxSteps - 1 && chosen.size < maxSteps; slot++) {
    chosen.add(Math.round((slot * last) / (maxSteps - 1)));
  }
  for (let i = 0; i < steps.length && chosen.size < maxSteps; i++) {
    chosen.add(i);
  }

  return Array.from(chosen)
    .sort((a, b) => a - b)
    .map(index => steps[index])
    .sort((a, b) => a.stepNumber - b.stepNumber);
}

export class ReasoningEngine {
  private readonly provider: ModelProvider;
  private readonly config: ReasoningConfig;

  constructor(options: ReasoningEngineOptions) {
    this.provider = options.provider;
    this.config = options.config;
  }

  /** Draft, then verify when enabled, then reconcile. Rejects only on abort. */
  reason(query: string, messages: ConversationMessage[] = [], signal?: AbortSignal): Promise<ChainOfThoughtResult> {
    requireNonEmpty(query, "query");

    return withSpan("reasoning", { "intent_resolution.context_messages": messages.length }, async span => {
      const result = await this.run(query, messages, signal);
      recordReasoning(result.hasError);
      span.setAttributes({
        "intent_resolution.reasoning_steps": result.steps.length,
        "intent_resolution.reasoning_confidence": result.confidenceScore,
        "intent_resolution.reasoning_verified": result.isVerified,
      });
      log.info("Chain-of-thought reasoning completed", {
        steps: result.steps.length,
        confidence: result.confidenceScore,
        verified: result.isVerified,
        hasError: result.hasError,
      });
      return result;
    });
  }

  private async run(query: string, messages: ConversationMessage[], signal?: AbortSignal): Promise<ChainOfThoughtResult> {
    const history: ChatMessage[] = [...messages]
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .slice(-this.config.maxContextMessages)
      .map(message => ({ role: message.role, content: message.content }));

    let response: string;
    try {
      response = await this.provider.generateChatCompletion(
        this.config.model,
        [{ role: "system", content: CHAIN_OF_THOUGHT_SYSTEM_PROMPT }, ...history, { role: "user", content: query }],
        { temperature: 0.2, topP: 0.95, maxTokens: 2048, responseFormat: "json", signal }
      );
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Reasoning draft failed", { error: getErrorMessage(error) });
      return createErrorResult(`Error during reasoning: ${getErrorMessage(error)}`);
    }

    const decoded = decodeModelJson(response, ReasoningDraftSchema);
    if (!decoded.ok) {
      log.error("Failed to parse reasoning response", { kind: decoded.error.kind, error: decoded.error.message });
      return createErrorResult("Failed to parse reasoning response");
    }

    const draft = draftToResult(decoded.value);
    if (!this.config.enableSelfVerification) return draft;

    const verification = await this.verify(draft, signal);
    return reconcile(draft, verification);
  }

  private async verify(draft: ChainOfThoughtResult, signal?: AbortSignal): Promise<Verification | null> {
    const draftJson = JSON.stringify(
      {
        steps: draft.steps.map(({ stepNumber, thought, conclusion }) => ({ step: stepNumber, thought, conclusion })),
        finalConclusion: draft.finalConclusion,
        confidenceScore: draft.confidenceScore,
        entities: draft.entities,
        suggestedActions: draft.suggestedActions,
      },
      null,
      2
    );

    let response: string;
    try {
      response = await this.provider.generateCompletion(this.config.model, buildVerificationPrompt(draftJson), {
        temperature: 0.1,
        topP: 0.95,
        maxTokens: 1024,
        responseFormat: "json",
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.error("Reasoning verification failed, keeping draft", { error: getErrorMessage(error) });
      return null;
    }

    const decoded = decodeModelJson(response, VerificationSchema);
    if (!decoded.ok) {
      log.warn("Failed to parse verification response, keeping draft", { error: decoded.error.message });
      return null;
    }
    return decoded.value;
  }
}
