import type { MessageRole } from "../../shared/schemas/intent";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface CompletionParams {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON response where it supports one. */
  responseFormat?: "text" | "json";
  signal?: AbortSignal;
}

/**
 * Embedding and completion backend consumed by the intent resolution core.
 * Every call is cancellable; timeouts and retries are the implementation's
 * concern.
 */
export interface ModelProvider {
  generateEmbedding(model: string, text: string, signal?: AbortSignal): Promise<number[]>;
  generateBatchEmbeddings(model: string, texts: string[], signal?: AbortSignal): Promise<number[][]>;
  generateCompletion(model: string, prompt: string, params?: CompletionParams): Promise<string>;
  generateChatCompletion(model: string, messages: ChatMessage[], params?: CompletionParams): Promise<string>;
}
