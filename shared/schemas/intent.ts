import { z } from "zod";

export const RESOLVER_VERSION = "1.0.0";

export const RecommendedActionSchema = z.enum([
  "proceed",
  "proceed_with_caution",
  "clarify",
  "fallback",
  "no_match"
]);

export const MessageRoleSchema = z.enum(["user", "assistant", "system"]);

export const EntitySlotSchema = z.object({
  name: z.string().trim().min(1),
  entityType: z.string().trim().min(1),
  required: z.boolean().default(false),
  defaultValue: z.string().optional(),
  extractionPrompts: z.array(z.string()).default([])
});

export const IntentRelationsSchema = z.object({
  parentIntent: z.string().trim().min(1).optional(),
  childIntents: z.array(z.string().trim().min(1)).default([])
});

export const IntentDefinitionInputSchema = z.object({
  name: z.string().trim().min(1, "Intent name cannot be empty"),
  description: z.string().default(""),
  examples: z.array(z.string().trim().min(1, "Example cannot be empty")),
  entitySlots: z.array(EntitySlotSchema).default([])
});

export const ConversationMessageSchema = z.object({
  role: MessageRoleSchema,
  content: z.string(),
  timestamp: z.date()
});

export const EntitySchema = z.object({
  type: z.string(),
  value: z.string(),
  confidence: z.number()
});

export const DetectedIntentSchema = z.object({
  intent: z.string(),
  confidence: z.number().min(0).max(1),
  detectedAt: z.date(),
  query: z.string().optional(),
  entities: z.array(EntitySchema).optional()
});

export type RecommendedAction = z.infer<typeof RecommendedActionSchema>;
export type MessageRole = z.infer<typeof MessageRoleSchema>;
export type EntitySlot = z.infer<typeof EntitySlotSchema>;
export type EntitySlotInput = z.input<typeof EntitySlotSchema>;
export type IntentRelations = z.input<typeof IntentRelationsSchema>;
export type ConversationMessage = z.infer<typeof ConversationMessageSchema>;
export type DetectedIntent = z.infer<typeof DetectedIntentSchema>;
export type Entity = z.infer<typeof EntitySchema>;

/**
 * A named category of user request. `exampleEmbeddings[i]` is the embedding of
 * `examples[i]`; the two arrays always have the same length.
 */
export interface IntentDefinition {
  name: string;
  description: string;
  examples: string[];
  exampleEmbeddings: number[][];
  entitySlots: EntitySlot[];
  parentIntent?: string;
  childIntents: string[];
}

export interface IntentMatch {
  intentName: string;
  matchedExample: string;
  semanticSimilarity: number;
  contextRelevance: number;
  historicalAccuracy: number;
  contextualBoost: number;
  rawScore: number;
  confidence: number;
}

export interface ClassificationResult {
  query: string;
  matches: IntentMatch[];
  topMatch: IntentMatch | null;
  isAmbiguous: boolean;
  confidenceDifferential: number;
  recommendedAction: RecommendedAction;
  clarificationQuestion?: string;
  explanation: string;
  contextRelevance: number;
  historicalAccuracy: number;
  providerError?: string;
}

/** An entity seen across turns; (type, value) identifies it. */
export interface TrackedEntity {
  entity: Entity;
  firstMentionedAt: Date;
  lastMentionedAt: Date;
  mentionCount: number;
}

export interface ConversationContext {
  id: string;
  messages: ConversationMessage[];
  detectedIntents: DetectedIntent[];
  trackedEntities: TrackedEntity[];
  lastUpdatedAt: Date;
}

export interface IntentDetectionResult {
  intent: string;
  query: string;
  confidence: number;
  entities: Entity[];
  explanation?: string;
}

export interface HierarchicalIntentResult {
  topLevelIntent: IntentDetectionResult;
  subIntents: IntentDetectionResult[];
  hasMultipleIntents: boolean;
}

export enum FallbackLevel {
  None = 0,
  RequestClarification = 1,
  GeneralizedIntent = 2,
  PartialIntentExtraction = 3,
  ExplicitHandoff = 4
}

export interface MisclassificationData {
  id: string;
  originalQuery: string;
  timestamp: Date;
  actualIntent: string;
  expectedIntent?: string;
  confidence: number;
  fallbackApplied: FallbackLevel;
  fallbackSuccessful: boolean;
  userFeedback?: string;
  additionalDetails: Record<string, string>;
}

export interface FallbackResult {
  fallbackLevel: FallbackLevel;
  originalResult: IntentDetectionResult;
  finalResult: IntentDetectionResult;
  alternatives: IntentDetectionResult[];
  clarificationQuestions: string[];
  isSuccessful: boolean;
  reason: string;
  requiresUserInteraction: boolean;
  misclassification?: MisclassificationData;
}

export interface ChainOfThoughtStep {
  stepNumber: number;
  thought: string;
  conclusion: string;
  isRevised: boolean;
}

export interface ChainOfThoughtResult {
  steps: ChainOfThoughtStep[];
  finalConclusion: string;
  confidenceScore: number;
  entities: Entity[];
  suggestedActions: string[];
  isVerified: boolean;
  hasError: boolean;
  errorMessage?: string;
}
