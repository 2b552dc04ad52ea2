import { describe, it, expect, beforeEach, vi } from "vitest";
import { IntentClassifier } from "../../services/intent-resolution/intentClassifier";
import { IntentClassificationModel } from "../../services/intent-resolution/intentModel";
import {
  InMemoryConversationContextStore,
  type ConversationContextStore,
} from "../../services/intent-resolution/conversationStore";
import { DEFAULT_INTENT_RESOLUTION_CONFIG } from "../../config/intentResolution";
import { ExternalServiceError, NotFoundError, ValidationError } from "../../utils/errors";
import { FakeModelProvider } from "../mocks/fakeModelProvider";

const config = DEFAULT_INTENT_RESOLUTION_CONFIG;

const EMBEDDINGS: Record<string, number[]> = {
  hello: [1, 0, 0],
  "hi there": [0.8, 0, 0.6],
  goodbye: [0, 1, 0],
  "see you later": [0, 0.8, 0.6],
  howdy: [0, 0, 1],
  hey: [1, 0, 0],
  hmm: [1, 1, 0],
};

const at = (minute: number) => new Date(Date.UTC(2024, 0, 1, 12, minute));

describe("IntentClassifier", () => {
  let provider: FakeModelProvider;
  let model: IntentClassificationModel;
  let store: InMemoryConversationContextStore;
  let classifier: IntentClassifier;

  function createClassifier(contextStore?: ConversationContextStore): IntentClassifier {
    return new IntentClassifier({
      provider,
      model,
      classifier: config.classifier,
      scoring: config.scoring,
      contextStore,
    });
  }

  async function addGreetingAndFarewell(): Promise<void> {
    await classifier.addIntent("greeting", "User says hello", ["hello", "hi there"]);
    await classifier.addIntent("farewell", "User says goodbye", ["goodbye", "see you later"]);
  }

  beforeEach(() => {
    provider = new FakeModelProvider(EMBEDDINGS);
    model = new IntentClassificationModel({ embeddingModel: "test-embedding", similarityThreshold: 0.7 });
    store = new InMemoryConversationContextStore(config.context);
    classifier = createClassifier(store);
  });

  describe("addIntent", () => {
    it("embeds every example in one batch", async () => {
      const intent = await classifier.addIntent("greeting", "User says hello", ["hello", "hi there"]);

      expect(provider.generateBatchEmbeddings).toHaveBeenCalledWith("test-embedding", ["hello", "hi there"], undefined);
      expect(intent.exampleEmbeddings).toEqual([
        [1, 0, 0],
        [0.8, 0, 0.6],
      ]);
      expect(model.getIntent("greeting")).toBe(intent);
    });

    it("hands out a definition that cannot drift from its embeddings", async () => {
      const intent = await classifier.addIntent("greeting", "User says hello", ["hi there", "hello"]);

      expect(() => intent.examples.pop()).toThrow(TypeError);
      expect(() => intent.exampleEmbeddings[0].push(1)).toThrow(TypeError);
      expect(() => model.listIntents()[0].childIntents.push("farewell")).toThrow(TypeError);

      const result = await classifier.classify("hello");
      expect(result.topMatch?.matchedExample).toBe("hello");
      expect(model.getIntent("greeting")?.examples).toEqual(["hi there", "hello"]);
    });

    it("stores relations and entity slots", async () => {
      const intent = await classifier.addIntent(
        "refund_request",
        "",
        ["hello"],
        [{ name: "order", entityType: "order_id", required: true }],
        { parentIntent: "billing_inquiry" }
      );

      expect(intent.parentIntent).toBe("billing_inquiry");
      expect(intent.childIntents).toEqual([]);
      expect(intent.entitySlots).toEqual([
        { name: "order", entityType: "order_id", required: true, extractionPrompts: [] },
      ]);
    });

    it("rejects invalid input before calling the provider", () => {
      expect(() => classifier.addIntent("", "", ["hello"])).toThrow(ValidationError);
      expect(() => classifier.addIntent("greeting", "", ["  "])).toThrow("Example cannot be empty");
      expect(provider.generateBatchEmbeddings).not.toHaveBeenCalled();
    });

    it("wraps embedding failures and leaves the model untouched", async () => {
      provider.embeddingError = new Error("embedding service down");

      await expect(classifier.addIntent("greeting", "", ["hello"])).rejects.toBeInstanceOf(ExternalServiceError);
      expect(model.size).toBe(0);
    });

    it("rejects a provider that returns the wrong number of embeddings", async () => {
      provider.generateBatchEmbeddings.mockResolvedValueOnce([[1, 0, 0]]);

      await expect(classifier.addIntent("greeting", "", ["hello", "hi there"])).rejects.toThrow(
        "Expected 2 embeddings, received 1"
      );
    });
  });

  describe("classify", () => {
    it("matches a greeting with full confidence", async () => {
      await addGreetingAndFarewell();

      const result = await classifier.classify("hey");

      expect(result.recommendedAction).toBe("proceed");
      expect(result.matches).toHaveLength(1);
      expect(result.topMatch?.intentName).toBe("greeting");
      expect(result.topMatch?.matchedExample).toBe("hello");
      expect(result.topMatch?.confidence).toBe(1);
      expect(result.isAmbiguous).toBe(false);
      expect(result.explanation).toBe(
        [
          'Top match: "greeting" via example "hello"',
          "Semantic similarity: 1.00 (weight 1.00)",
          "Context relevance: 0.00 (weight 0.20)",
          "Historical accuracy: 0.00 (weight 0.20)",
          "Final confidence: 1.00 → proceed",
        ].join("\n")
      );
    });

    it("asks for clarification between equally close intents", async () => {
      await addGreetingAndFarewell();

      const result = await classifier.classify("hmm");

      expect(result.matches.map(match => match.intentName)).toEqual(["greeting", "farewell"]);
      expect(result.matches[0].confidence).toBeCloseTo(Math.SQRT1_2, 10);
      expect(result.isAmbiguous).toBe(true);
      expect(result.confidenceDifferential).toBe(0);
      expect(result.recommendedAction).toBe("clarify");
      expect(result.clarificationQuestion).toBe('Did you mean "greeting" or "farewell"?');
    });

    it("honours a per-call similarity threshold", async () => {
      await addGreetingAndFarewell();

      const result = await classifier.classify("hmm", 0.75);

      expect(result.matches).toEqual([]);
      expect(result.recommendedAction).toBe("no_match");
      expect(result.explanation).toBe(
        "No intents matched above similarity threshold 0.75\nFinal confidence: 0.00 → no_match"
      );
    });

    it("returns no_match for an unrelated query", async () => {
      await addGreetingAndFarewell();

      const result = await classifier.classify("what is the capital of peru");

      expect(result.topMatch).toBeNull();
      expect(result.recommendedAction).toBe("no_match");
    });

    it("skips the provider when no intents are registered", async () => {
      const result = await classifier.classify("hey");

      expect(result.recommendedAction).toBe("no_match");
      expect(provider.generateEmbedding).not.toHaveBeenCalled();
    });

    it("returns the same result for the same input", async () => {
      await addGreetingAndFarewell();

      const first = await classifier.classify("hmm");
      const second = await classifier.classify("hmm");

      expect(second).toEqual(first);
    });

    it("validates arguments synchronously", () => {
      expect(() => classifier.classify("   ")).toThrow("Validation failed for 'query': cannot be empty");
      expect(() => classifier.classify("hey", 1.5)).toThrow(
        "Validation failed for 'similarityThreshold': must be a number between 0 and 1"
      );
      expect(provider.generateEmbedding).not.toHaveBeenCalled();
    });

    it("reports embedding failures as no_match with the provider error", async () => {
      await addGreetingAndFarewell();
      provider.embeddingError = new Error("rate limited");

      const result = await classifier.classify("hey");

      expect(result.recommendedAction).toBe("no_match");
      expect(result.providerError).toBe("rate limited");
      expect(result.explanation.split("\n")[0]).toBe("Embedding provider error: rate limited");
    });

    it("propagates cancellation", async () => {
      await addGreetingAndFarewell();
      const controller = new AbortController();
      controller.abort();

      await expect(classifier.classify("hey", undefined, controller.signal)).rejects.toMatchObject({
        name: "AbortError",
      });
    });

    it("skips intents whose embeddings have another dimension", async () => {
      await addGreetingAndFarewell();
      model.setIntent({
        name: "legacy",
        description: "",
        examples: ["old"],
        exampleEmbeddings: [[1, 0]],
        entitySlots: [],
        childIntents: [],
      });

      const result = await classifier.classify("hey");

      expect(result.matches.map(match => match.intentName)).toEqual(["greeting"]);
    });
  });

  describe("classifyWithContext", () => {
    it("folds conversation history into the score", async () => {
      await addGreetingAndFarewell();
      await store.appendMessage("conv-1", { role: "user", content: "hello", timestamp: at(0) });
      await store.appendMessage("conv-1", { role: "assistant", content: "Hi! How can I help?", timestamp: at(1) });
      await store.appendDetectedIntent("conv-1", { intent: "greeting", confidence: 1, detectedAt: at(0) });

      const result = await classifier.classifyWithContext("hmm", "conv-1");

      // greeting: 0.7071 + 0.8 * 0.2 + 0.1 * 0.2, then +0.1 boost
      // farewell: 0.7071 + 0.8 * 0.2
      expect(result.contextRelevance).toBe(0.8);
      expect(result.topMatch?.intentName).toBe("greeting");
      expect(result.topMatch?.historicalAccuracy).toBeCloseTo(0.1, 10);
      expect(result.topMatch?.contextualBoost).toBe(0.1);
      expect(result.topMatch?.confidence).toBeCloseTo(Math.SQRT1_2 + 0.28, 10);
      expect(result.matches[1].confidence).toBeCloseTo(Math.SQRT1_2 + 0.16, 10);
      expect(result.isAmbiguous).toBe(false);
      expect(result.recommendedAction).toBe("proceed");
    });

    it("scores without context for an unknown conversation", async () => {
      await addGreetingAndFarewell();

      const result = await classifier.classifyWithContext("hmm", "conv-unknown");

      expect(result.contextRelevance).toBe(0);
      expect(result.recommendedAction).toBe("clarify");
    });

    it("scores without context when the store fails", async () => {
      const failingStore: ConversationContextStore = {
        getContext: vi.fn().mockRejectedValue(new Error("store offline")),
        appendMessage: vi.fn().mockResolvedValue(undefined),
        appendDetectedIntent: vi.fn().mockResolvedValue(undefined),
      };
      classifier = createClassifier(failingStore);
      await addGreetingAndFarewell();

      const result = await classifier.classifyWithContext("hey", "conv-1");

      expect(failingStore.getContext).toHaveBeenCalledWith("conv-1", undefined);
      expect(result.topMatch?.intentName).toBe("greeting");
      expect(result.contextRelevance).toBe(0);
    });

    it("classifies without context when no store is configured", async () => {
      classifier = createClassifier();
      await addGreetingAndFarewell();

      const result = await classifier.classifyWithContext("hey", "conv-1");

      expect(result.recommendedAction).toBe("proceed");
    });

    it("rejects an empty conversation id synchronously", () => {
      expect(() => classifier.classifyWithContext("hey", "")).toThrow(
        "Validation failed for 'conversationId': cannot be empty"
      );
    });
  });

  describe("intent maintenance", () => {
    it("resolves and removes intents through aliases", async () => {
      await addGreetingAndFarewell();
      classifier.addIntentAlias("hi", "greeting");

      expect(classifier.resolveIntentName("HI")).toBe("greeting");
      expect(classifier.removeIntent("hi")).toBe(true);
      expect(() => classifier.resolveIntentName("hi")).toThrow(NotFoundError);
      expect(classifier.removeIntent("hi")).toBe(false);
      expect(model.listIntents().map(intent => intent.name)).toEqual(["farewell"]);
    });

    it("re-embeds updated examples", async () => {
      await addGreetingAndFarewell();
      classifier.addIntentAlias("salutation", "greeting");

      await expect(classifier.updateIntentExamples("salutation", ["howdy"])).resolves.toBe(true);

      expect(model.getIntent("greeting")?.exampleEmbeddings).toEqual([[0, 0, 1]]);
      const result = await classifier.classify("hey");
      expect(result.recommendedAction).toBe("no_match");
    });

    it("resolves false when updating an unknown intent", async () => {
      await expect(classifier.updateIntentExamples("missing", ["howdy"])).resolves.toBe(false);
      expect(provider.generateBatchEmbeddings).not.toHaveBeenCalled();
    });

    it("resolves false when the intent is removed mid-update", async () => {
      await addGreetingAndFarewell();
      provider.generateBatchEmbeddings.mockImplementationOnce(async () => {
        classifier.removeIntent("greeting");
        return [[0, 0, 1]];
      });

      await expect(classifier.updateIntentExamples("greeting", ["howdy"])).resolves.toBe(false);
      expect(model.hasIntent("greeting")).toBe(false);
    });

    it("swaps the model", async () => {
      const replacement = new IntentClassificationModel({ embeddingModel: "other", similarityThreshold: 0.5 });
      classifier.setModel(replacement);

      expect(classifier.getModel()).toBe(replacement);
    });
  });
});
