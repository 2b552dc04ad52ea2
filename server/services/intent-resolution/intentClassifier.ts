import {
  IntentDefinitionInputSchema,
  IntentRelationsSchema,
  type ClassificationResult,
  type EntitySlotInput,
  type IntentDefinition,
  type IntentMatch,
  type IntentRelations,
} from "../../../shared/schemas/intent";
import type { ClassifierConfig, ScoringConfig } from "../../config/intentResolution";
import type { ModelProvider } from "../../lib/modelProvider";
import {
  AppError,
  createExternalServiceError,
  getErrorMessage,
  isAbortError,
  ValidationError,
} from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { buildClassificationResult } from "./classificationBuilder";
import { calculateContextRelevance, ConfidenceScorer, type ScoringContext } from "./confidenceScorer";
import type { ConversationContextStore } from "./conversationStore";
import { requireNonEmpty, requireUnitInterval } from "./guards";
import type { IntentClassificationModel } from "./intentModel";
import { findBestExample, type ExampleMatch } from "./similarity";
import { recordClassification, withSpan } from "./telemetry";

const log = createLogger("intent-classifier");

const EMBEDDING_SERVICE = "embedding-provider";

export interface IntentClassifierOptions {
  provider: ModelProvider;
  model: IntentClassificationModel;
  classifier: ClassifierConfig;
  scoring: ScoringConfig;
  contextStore?: ConversationContextStore;
}

function toEmbeddingError(error: unknown): unknown {
  if (isAbortError(error) || error instanceof AppError) return error;
  return createExternalServiceError(EMBEDDING_SERVICE, error);
}

/**
 * Embedding-based intent classifier over one tenant's model.
 *
 * Argument errors are thrown synchronously, before any provider call. Provider
 * failures during classification produce a `no_match` result carrying
 * `providerError`; aborts propagate.
 */
export class IntentClassifier {
  private model: IntentClassificationModel;
  private readonly provider: ModelProvider;
  private readonly config: ClassifierConfig;
  private readonly scorer: ConfidenceScorer;
  private readonly contextStore?: ConversationContextStore;

  constructor(options: IntentClassifierOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.config = options.classifier;
    this.scorer = new ConfidenceScorer(options.scoring);
    this.contextStore = options.contextStore;
  }

  getModel(): IntentClassificationModel {
    return this.model;
  }

  setModel(model: IntentClassificationModel): void {
    this.model = model;
  }

  classify(query: string, similarityThreshold?: number, signal?: AbortSignal): Promise<ClassificationResult> {
    requireNonEmpty(query, "query");
    requireUnitInterval(similarityThreshold, "similarityThreshold");

    return this.runClassification(query, null, similarityThreshold, signal);
  }

  classifyWithContext(
    query: string,
    conversationId: string,
    similarityThreshold?: number,
    signal?: AbortSignal
  ): Promise<ClassificationResult> {
    requireNonEmpty(query, "query");
    requireNonEmpty(conversationId, "conversationId");
    requireUnitInterval(similarityThreshold, "similarityThreshold");

    const store = this.contextStore;
    if (!store) {
      log.debug("No context store configured, classifying without context");
      return this.runClassification(query, null, similarityThreshold, signal);
    }

    return (async () => {
      const context = await this.loadScoringContext(store, conversationId, signal);
      return this.runClassification(query, context, similarityThreshold, signal);
    })();
  }

  addIntent(
    name: string,
    description: string,
    examples: string[],
    entitySlots?: EntitySlotInput[],
    relations?: IntentRelations,
    signal?: AbortSignal
  ): Promise<IntentDefinition> {
    const parsed = IntentDefinitionInputSchema.safeParse({ name, description, examples, entitySlots });
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map(issue => issue.message).join("; "), {
        issues: parsed.error.issues.map(issue => ({ path: issue.path.join("."), message: issue.message })),
      });
    }
    const parsedRelations = IntentRelationsSchema.safeParse(relations ?? {});
    if (!parsedRelations.success) {
      throw new ValidationError(parsedRelations.error.issues.map(issue => issue.message).join("; "));
    }

    const input = parsed.data;
    const model = this.model;

    return (async () => {
      const exampleEmbeddings = await this.embedExamples(model.embeddingModel, input.examples, signal);

      const intent: IntentDefinition = {
        name: input.name,
        description: input.description,
        examples: input.examples,
        exampleEmbeddings,
        entitySlots: input.entitySlots,
        parentIntent: parsedRelations.data.parentIntent,
        childIntents: parsedRelations.data.childIntents,
      };
      const stored = model.setIntent(intent);

      log.info("Added intent", { intent: stored.name, exampleCount: stored.examples.length });
      return stored;
    })();
  }

  /** Replaces an intent's examples and their embeddings. Resolves false when the name does not resolve. */
  updateIntentExamples(nameOrAlias: string, examples: string[], signal?: AbortSignal): Promise<boolean> {
    requireNonEmpty(nameOrAlias, "intentName");
    const parsed = IntentDefinitionInputSchema.shape.examples.safeParse(examples);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map(issue => issue.message).join("; "));
    }

    const model = this.model;
    const existing = model.getIntent(nameOrAlias);
    if (!existing) {
      log.warn("Intent not found for example update", { intent: nameOrAlias });
      return Promise.resolve(false);
    }
    const newExamples = parsed.data;

    return (async () => {
      const exampleEmbeddings = await this.embedExamples(model.embeddingModel, newExamples, signal);

      const current = model.getIntent(existing.name);
      if (!current) {
        log.warn("Intent removed while its examples were being embedded", { intent: existing.name });
        return false;
      }

      model.setIntent({ ...current, examples: newExamples, exampleEmbeddings });
      log.info("Updated intent examples", { intent: current.name, exampleCount: newExamples.length });
      return true;
    })();
  }

  removeIntent(nameOrAlias: string): boolean {
    const removed = this.model.removeIntent(nameOrAlias);
    if (!removed) return false;

    log.info("Removed intent", { intent: removed.removed.name, aliasCount: removed.aliases.length });
    return true;
  }

  addIntentAlias(alias: string, intentName: string): void {
    this.model.addAlias(alias, intentName);
  }

  resolveIntentName(nameOrAlias: string): string {
    return this.model.resolveIntentName(nameOrAlias);
  }

  private async embedExamples(embeddingModel: string, examples: string[], signal?: AbortSignal): Promise<number[][]> {
    if (examples.length === 0) return [];

    let embeddings: number[][];
    try {
      embeddings = await this.provider.generateBatchEmbeddings(embeddingModel, examples, signal);
    } catch (error) {
      throw toEmbeddingError(error);
    }

    if (embeddings.length !== examples.length) {
      throw createExternalServiceError(
        EMBEDDING_SERVICE,
        new Error(`Expected ${examples.length} embeddings, received ${embeddings.length}`)
      );
    }
    return embeddings;
  }

  private async loadScoringContext(
    store: ConversationContextStore,
    conversationId: string,
    signal?: AbortSignal
  ): Promise<ScoringContext | null> {
    try {
      const context = await store.getContext(conversationId, signal);
      if (!context) return null;

      return {
        messages: [...context.messages].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()),
        detectedIntents: context.detectedIntents,
      };
    } catch (error) {
      if (isAbortError(error)) throw error;
      log.warn("Failed to load conversation context, scoring without it", {
        conversationId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  private runClassification(
    query: string,
    context: ScoringContext | null,
    similarityThreshold: number | undefined,
    signal?: AbortSignal
  ): Promise<ClassificationResult> {
    const model = this.model;
    const threshold = similarityThreshold ?? model.similarityThreshold;
    const intents = model.listIntents().filter(intent => intent.exampleEmbeddings.length > 0);
    const contextRelevance = calculateContextRelevance(query, context);

    const build = (candidates: IntentMatch[], providerError?: string): ClassificationResult => {
      const result = buildClassificationResult({
        query,
        candidates,
        thresholds: {
          similarityThreshold: threshold,
          ambiguityThreshold: this.config.ambiguityThreshold,
          mismatchThreshold: this.config.mismatchThreshold,
          highConfidenceThreshold: this.config.highConfidenceThreshold,
        },
        weights: this.scorer.settings,
        contextRelevance,
        providerError,
      });
      recordClassification(result.recommendedAction);
      return result;
    };

    return withSpan("classify", { "intent_resolution.intent_count": intents.length }, async span => {
      if (intents.length === 0) {
        log.debug("No intents with examples registered");
        return build([]);
      }

      let queryEmbedding: number[];
      try {
        queryEmbedding = await this.provider.generateEmbedding(model.embeddingModel, query, signal);
      } catch (error) {
        if (isAbortError(error)) throw error;
        const message = getErrorMessage(error);
        log.error("Embedding provider failed during classification", { error: message });
        span.setAttribute("intent_resolution.provider_error", true);
        return build([], message);
      }

      const lookup = (name: string) => model.getIntent(name);
      const candidates = intents.flatMap((intent): IntentMatch[] => {
        let best: ExampleMatch | null;
        try {
          best = findBestExample(queryEmbedding, intent);
        } catch (error) {
          log.warn("Skipping intent with incompatible embeddings", { intent: intent.name, error: getErrorMessage(error) });
          return [];
        }
        if (!best) return [];

        return [
          this.scorer.score({
            intent,
            matchedExample: best.example,
            semanticSimilarity: best.similarity,
            query,
            context,
            lookup,
          }),
        ];
      });

      const result = build(candidates);
      span.setAttributes({
        "intent_resolution.match_count": result.matches.length,
        "intent_resolution.action": result.recommendedAction,
        "intent_resolution.top_confidence": result.topMatch?.confidence ?? 0,
      });
      log.debug("Classified query", {
        matchCount: result.matches.length,
        topIntent: result.topMatch?.intentName ?? "none",
        confidence: result.topMatch?.confidence ?? 0,
        action: result.recommendedAction,
      });
      return result;
    });
  }
}
