export * from "./services/intent-resolution";
export { OpenAIModelProvider } from "./lib/openaiProvider";
export type { ChatMessage, CompletionParams, ModelProvider } from "./lib/modelProvider";
export {
  loadIntentResolutionConfig,
  DEFAULT_INTENT_RESOLUTION_CONFIG,
  DEFAULT_CLARIFICATION_TEMPLATE,
  type IntentResolutionConfig,
  type ClassifierConfig,
  type ScoringConfig,
  type FallbackConfig,
  type ReasoningConfig,
  type DetectionConfig,
  type ContextStoreConfig,
  type ProviderConfig,
} from "./config/intentResolution";
export { getContext, getTraceId, runWithContext, createContext, type CorrelationContext } from "./lib/correlationContext";
export * from "./utils";
export * from "../shared/schemas/intent";
