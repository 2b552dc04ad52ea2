import { describe, it, expect, beforeEach } from "vitest";
import {
  createIntentResolutionService,
  detectionFromClassification,
  type IntentResolutionService,
} from "../../services/intent-resolution";
import { InMemoryConversationContextStore } from "../../services/intent-resolution/conversationStore";
import { DEFAULT_INTENT_RESOLUTION_CONFIG } from "../../config/intentResolution";
import { getTraceId } from "../../lib/correlationContext";
import { FallbackLevel } from "../../../shared/schemas/intent";
import { FakeModelProvider } from "../mocks/fakeModelProvider";

const EMBEDDINGS: Record<string, number[]> = {
  hello: [1, 0, 0],
  goodbye: [0, 1, 0],
  hey: [1, 0, 0],
  hmm: [1, 1, 0],
};

const DRAFT = JSON.stringify({
  reasoning: [{ step: 1, thought: "Restate the request", conclusion: "The user is greeting us" }],
  finalConclusion: "Greet the user back",
  confidenceScore: 0.8,
  entities: [],
  suggestedActions: ["Say hello"],
});

function abortError(message: string): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

describe("IntentResolutionPipeline", () => {
  let provider: FakeModelProvider;
  let store: InMemoryConversationContextStore;
  let service: IntentResolutionService;

  beforeEach(async () => {
    provider = new FakeModelProvider(EMBEDDINGS);
    store = new InMemoryConversationContextStore(DEFAULT_INTENT_RESOLUTION_CONFIG.context);
    service = createIntentResolutionService({ provider, tenantId: "acme", contextStore: store });
    await service.classifier.addIntent("greeting", "User says hello", ["hello"]);
    await service.classifier.addIntent("farewell", "User says goodbye", ["goodbye"]);
  });

  it("wires the tenant's model into the classifier", () => {
    expect(service.classifier.getModel()).toBe(service.registry.forTenant("acme"));
    expect(service.contextStore).toBe(store);
  });

  it("resolves a confident query and records the turn", async () => {
    const outcome = await service.pipeline.resolve("hey", { conversationId: "conv-1" });

    expect(outcome.classification.recommendedAction).toBe("proceed");
    expect(outcome.detection).toMatchObject({ intent: "greeting", query: "hey", confidence: 1 });
    expect(outcome.fallback).toBeUndefined();
    expect(outcome.reasoning).toBeUndefined();
    expect(outcome.traceId).toEqual(expect.any(String));

    const context = await store.getContext("conv-1");
    expect(context?.messages.map(message => [message.role, message.content])).toEqual([["user", "hey"]]);
    expect(context?.detectedIntents).toMatchObject([{ intent: "greeting", confidence: 1, query: "hey" }]);
  });

  it("uses earlier turns to score a follow-up", async () => {
    await service.pipeline.resolve("hey", { conversationId: "conv-1" });

    const outcome = await service.pipeline.resolve("hmm", { conversationId: "conv-1" });

    // Without the earlier turn "hmm" is an even split between greeting and farewell.
    expect(outcome.classification.contextRelevance).toBe(0.8);
    expect(outcome.classification.recommendedAction).toBe("proceed");
    expect(outcome.detection.intent).toBe("greeting");
    expect(outcome.detection.confidence).toBeCloseTo(Math.SQRT1_2 + 0.28, 10);
  });

  it("escalates a query nothing matches", async () => {
    provider.queue("[]", '{"intent": "general_query", "confidence": 0.6, "explanation": "General question"}');

    const outcome = await service.pipeline.resolve("what is the weather like", { conversationId: "conv-1" });

    expect(outcome.classification.recommendedAction).toBe("no_match");
    expect(outcome.fallback?.fallbackLevel).toBe(FallbackLevel.GeneralizedIntent);
    expect(outcome.fallback?.originalResult).toMatchObject({ intent: "unknown", confidence: 0 });
    expect(outcome.detection).toEqual({
      intent: "general_query",
      query: "what is the weather like",
      confidence: 0.6,
      entities: [],
      explanation: "General question",
    });

    const context = await store.getContext("conv-1");
    expect(context?.messages).toHaveLength(1);
    expect(context?.detectedIntents.map(detection => detection.intent)).toEqual(["general_query"]);
  });

  it("keeps the unknown detection out of the store after a handoff", async () => {
    provider.queue("[]", '{"confidence": 0.1}', '{"extractedEntities": []}');

    const outcome = await service.pipeline.resolve("what is the weather like", { conversationId: "conv-1" });

    expect(outcome.fallback?.fallbackLevel).toBe(FallbackLevel.ExplicitHandoff);
    expect(outcome.detection.intent).toBe("unknown");
    const context = await store.getContext("conv-1");
    expect(context?.messages).toHaveLength(1);
    expect(context?.detectedIntents).toEqual([]);
  });

  it("runs chain-of-thought reasoning on request", async () => {
    provider.queue(DRAFT, '{"isValid": true, "confidenceScore": 0.9}');

    const outcome = await service.pipeline.resolve("hey", { reason: true });

    expect(outcome.reasoning?.finalConclusion).toBe("Greet the user back");
    expect(outcome.reasoning?.confidenceScore).toBe(0.9);
    expect(outcome.reasoning?.isVerified).toBe(true);
  });

  it("passes stored history to the reasoning engine", async () => {
    await service.pipeline.resolve("hey", { conversationId: "conv-1" });
    provider.queue(DRAFT, '{"isValid": true}');

    await service.pipeline.resolve("hello", { conversationId: "conv-1", reason: true });

    const [, messages] = provider.generateChatCompletion.mock.calls[0];
    expect(messages.slice(1)).toEqual([
      { role: "user", content: "hey" },
      { role: "user", content: "hello" },
    ]);
  });

  it("runs every step under one trace id", async () => {
    let seen: string | undefined;
    provider.generateEmbedding.mockImplementationOnce(async () => {
      seen = getTraceId();
      return [1, 0, 0];
    });

    const outcome = await service.pipeline.resolve("hey");

    expect(seen).toBe(outcome.traceId);
  });

  it("writes nothing when cancelled before classification", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.pipeline.resolve("hey", { conversationId: "conv-1", signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(store.size).toBe(0);
  });

  it("writes nothing when cancelled during fallback", async () => {
    const controller = new AbortController();
    provider.generateCompletion.mockImplementationOnce(async () => {
      controller.abort(abortError("cancelled by caller"));
      return "[]";
    });

    await expect(
      service.pipeline.resolve("what is the weather like", { conversationId: "conv-1", signal: controller.signal })
    ).rejects.toThrow("cancelled by caller");
    await expect(store.getContext("conv-1")).resolves.toBeNull();
  });

  it("writes nothing when cancelled while clarification questions are generated", async () => {
    const controller = new AbortController();
    provider.generateCompletion
      .mockImplementationOnce(async () => '[{"intent": "billing_inquiry", "confidence": 0.6}]')
      .mockImplementationOnce(async () => {
        controller.abort(abortError("cancelled by caller"));
        return '["Is this about billing?"]';
      });

    await expect(
      service.pipeline.resolve("what is the weather like", { conversationId: "conv-1", signal: controller.signal })
    ).rejects.toThrow("cancelled by caller");
    expect(provider.generateCompletion).toHaveBeenCalledTimes(2);
    await expect(store.getContext("conv-1")).resolves.toBeNull();
  });

  it("stores the entities of a successful fallback tier", async () => {
    provider.queue(
      "[]",
      '{"intent": "general_query", "confidence": 0.6, "suggestedNextStep": "Ask for a city"}'
    );

    await service.pipeline.resolve("what is the weather like", { conversationId: "conv-1" });

    await expect(store.getRecentEntities("conv-1")).resolves.toEqual([
      { type: "next_step", value: "Ask for a city", confidence: 0.9 },
    ]);
  });

  it("validates arguments synchronously", () => {
    expect(() => service.pipeline.resolve("  ")).toThrow("Validation failed for 'query': cannot be empty");
    expect(() => service.pipeline.resolve("hey", { conversationId: "" })).toThrow(
      "Validation failed for 'conversationId': cannot be empty"
    );
  });
});

describe("detectionFromClassification", () => {
  it("reports unknown when nothing matched", async () => {
    const provider = new FakeModelProvider();
    const service = createIntentResolutionService({ provider, tenantId: "acme" });

    const classification = await service.classifier.classify("anything");

    expect(detectionFromClassification(classification)).toEqual({
      intent: "unknown",
      query: "anything",
      confidence: 0,
      entities: [],
      explanation: "No intents matched above similarity threshold 0.70\nFinal confidence: 0.00 → no_match",
    });
  });
});
