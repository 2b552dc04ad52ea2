import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import CircuitBreaker from "opossum";
import { LRUCache } from "lru-cache";
import { createHash } from "crypto";
import type { ChatMessage, CompletionParams, ModelProvider } from "./modelProvider";
import type { ProviderConfig } from "../config/intentResolution";
import { createExternalServiceError, isAbortError, ValidationError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { recordProviderFailure } from "../services/intent-resolution/telemetry";

const log = createLogger("openai-provider");

const SERVICE_NAME = "openai";

interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  params: CompletionParams;
}

interface EmbeddingRequest {
  model: string;
  input: string[];
  signal?: AbortSignal;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

function embeddingCacheKey(model: string, text: string): string {
  return createHash("sha256").update(`${model}:${text}`).digest("hex").substring(0, 32);
}

/**
 * ModelProvider backed by any OpenAI-compatible endpoint. Calls go through a
 * circuit breaker per operation kind; embeddings are memoised.
 */
export class OpenAIModelProvider implements ModelProvider {
  private client: OpenAI;
  private chatBreaker: CircuitBreaker<[ChatRequest], string>;
  private embeddingBreaker: CircuitBreaker<[EmbeddingRequest], number[][]>;
  private embeddingCache = new LRUCache<string, number[]>({
    max: 5000,
    ttl: 1000 * 60 * 60,
    updateAgeOnGet: true,
  });

  constructor(config: ProviderConfig) {
    if (!config.apiKey && !config.baseURL) {
      throw new ValidationError("OPENAI_API_KEY is not set and no OPENAI_BASE_URL was given");
    }

    this.client = new OpenAI({
      apiKey: config.apiKey ?? "local",
      baseURL: config.baseURL,
    });

    const breakerOptions: CircuitBreaker.Options = {
      timeout: config.timeoutMs,
      errorThresholdPercentage: 50,
      resetTimeout: 30000,
      volumeThreshold: 5,
      errorFilter: (error: unknown) => isAbortError(error),
    };

    this.chatBreaker = new CircuitBreaker(
      (request: ChatRequest) => this.callChat(request),
      { ...breakerOptions, name: "openai-chat" }
    );
    this.embeddingBreaker = new CircuitBreaker(
      (request: EmbeddingRequest) => this.callEmbeddings(request),
      { ...breakerOptions, name: "openai-embeddings" }
    );

    for (const breaker of [this.chatBreaker, this.embeddingBreaker]) {
      breaker.on("open", () => log.warn("Circuit breaker open", { breaker: breaker.name }));
      breaker.on("halfOpen", () => log.info("Circuit breaker half-open", { breaker: breaker.name }));
      breaker.on("close", () => log.info("Circuit breaker closed", { breaker: breaker.name }));
    }
  }

  async generateEmbedding(model: string, text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.generateBatchEmbeddings(model, [text], signal);
    return embedding;
  }

  async generateBatchEmbeddings(model: string, texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: Array<number[] | undefined> = texts.map(text =>
      this.embeddingCache.get(embeddingCacheKey(model, text))
    );
    const missingIndexes = results.flatMap((cached, index) => (cached ? [] : [index]));

    if (missingIndexes.length > 0) {
      const fetched = await this.fire(
        () => this.embeddingBreaker.fire({ model, input: missingIndexes.map(i => texts[i]), signal })
      );

      if (fetched.length !== missingIndexes.length) {
        throw createExternalServiceError(
          SERVICE_NAME,
          new Error(`Expected ${missingIndexes.length} embeddings, received ${fetched.length}`)
        );
      }

      missingIndexes.forEach((textIndex, position) => {
        const embedding = fetched[position];
        this.embeddingCache.set(embeddingCacheKey(model, texts[textIndex]), embedding);
        results[textIndex] = embedding;
      });
    }

    return results.map(embedding => embedding ?? []);
  }

  generateCompletion(model: string, prompt: string, params: CompletionParams = {}): Promise<string> {
    return this.generateChatCompletion(model, [{ role: "user", content: prompt }], params);
  }

  generateChatCompletion(model: string, messages: ChatMessage[], params: CompletionParams = {}): Promise<string> {
    return this.fire(() => this.chatBreaker.fire({ model, messages, params }));
  }

  getCircuitBreakerStats() {
    return {
      chat: { state: breakerState(this.chatBreaker), stats: this.chatBreaker.stats },
      embeddings: { state: breakerState(this.embeddingBreaker), stats: this.embeddingBreaker.stats },
    };
  }

  shutdown(): void {
    this.chatBreaker.shutdown();
    this.embeddingBreaker.shutdown();
  }

  private async fire<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isAbortError(error)) throw error;
      recordProviderFailure();
      log.error("Provider call failed", { error });
      throw createExternalServiceError(SERVICE_NAME, error);
    }
  }

  private async callChat({ model, messages, params }: ChatRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model,
        messages: messages.map(toOpenAIMessage),
        temperature: params.temperature,
        top_p: params.topP,
        max_tokens: params.maxTokens,
        response_format: params.responseFormat === "json" ? { type: "json_object" } : undefined,
      },
      { signal: params.signal }
    );

    return response.choices[0]?.message?.content ?? "";
  }

  private async callEmbeddings({ model, input, signal }: EmbeddingRequest): Promise<number[][]> {
    const response = await this.client.embeddings.create({ model, input }, { signal });
    return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }
}

function breakerState(breaker: CircuitBreaker): "open" | "half-open" | "closed" {
  if (breaker.opened) return "open";
  if (breaker.halfOpen) return "half-open";
  return "closed";
}
