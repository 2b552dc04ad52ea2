import type {
  ConversationContext,
  ConversationMessage,
  DetectedIntent,
  Entity,
  TrackedEntity,
} from "../../../shared/schemas/intent";
import type { ContextStoreConfig } from "../../config/intentResolution";
import { createLogger } from "../../utils/logger";

const log = createLogger("conversation-store");

const SUMMARY_ENTITY_LIMIT = 5;
const SUMMARY_TOPIC_LIMIT = 3;

export interface ConversationContextStore {
  /** Resolves to null for an unknown conversation. */
  getContext(conversationId: string, signal?: AbortSignal): Promise<ConversationContext | null>;
  appendMessage(conversationId: string, message: ConversationMessage): Promise<void>;
  /** Also tracks the detection's entities, when it carries any. */
  appendDetectedIntent(conversationId: string, detection: DetectedIntent): Promise<void>;
}

function cloneDetection(detection: DetectedIntent): DetectedIntent {
  return detection.entities
    ? { ...detection, entities: detection.entities.map(entity => ({ ...entity })) }
    : { ...detection };
}

function cloneContext(context: ConversationContext): ConversationContext {
  return {
    id: context.id,
    messages: context.messages.map(message => ({ ...message })),
    detectedIntents: context.detectedIntents.map(cloneDetection),
    trackedEntities: context.trackedEntities.map(tracked => ({ ...tracked, entity: { ...tracked.entity } })),
    lastUpdatedAt: context.lastUpdatedAt,
  };
}

/** Most recently mentioned first; ties go to the more frequently mentioned entity. */
export function recentEntities(context: ConversationContext, entityType?: string, maxCount = 5): Entity[] {
  if (maxCount <= 0) return [];

  return context.trackedEntities
    .filter(tracked => entityType === undefined || tracked.entity.type === entityType)
    .sort(
      (a, b) =>
        b.lastMentionedAt.getTime() - a.lastMentionedAt.getTime() || b.mentionCount - a.mentionCount
    )
    .slice(0, maxCount)
    .map(tracked => ({ ...tracked.entity }));
}

/**
 * Plain-text digest of a conversation for prompts: the most mentioned
 * entities, the latest detected intents and, when `maxMessages` is given, the
 * newest messages. Empty sections are left out.
 */
export function summarizeContext(context: ConversationContext, maxMessages?: number): string {
  const sections: string[] = [];

  if (context.trackedEntities.length > 0) {
    const lines = [...context.trackedEntities]
      .sort((a, b) => b.mentionCount - a.mentionCount)
      .slice(0, SUMMARY_ENTITY_LIMIT)
      .map(tracked => `- ${tracked.entity.type}: ${tracked.entity.value}`);
    sections.push(["Key entities in this conversation:", ...lines].join("\n"));
  }

  if (context.detectedIntents.length > 0) {
    const lines = [...context.detectedIntents]
      .sort((a, b) => b.detectedAt.getTime() - a.detectedAt.getTime())
      .slice(0, SUMMARY_TOPIC_LIMIT)
      .map(detection => `- ${detection.intent}`);
    sections.push(["Recent topics discussed:", ...lines].join("\n"));
  }

  if (maxMessages !== undefined && maxMessages > 0 && context.messages.length > 0) {
    const lines = [...context.messages]
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .slice(-maxMessages)
      .map(message => `- ${message.role}: ${message.content}`);
    sections.push(["Recent messages:", ...lines].join("\n"));
  }

  return sections.join("\n\n");
}

export class InMemoryConversationContextStore implements ConversationContextStore {
  private contexts = new Map<string, ConversationContext>();

  constructor(
    private readonly config: ContextStoreConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getContext(conversationId: string, signal?: AbortSignal): Promise<ConversationContext | null> {
    signal?.throwIfAborted();
    const context = this.contexts.get(conversationId);
    return context ? cloneContext(context) : null;
  }

  async appendMessage(conversationId: string, message: ConversationMessage): Promise<void> {
    const context = this.getOrCreate(conversationId);
    context.messages.push({ ...message });

    const overflow = context.messages.length - this.config.maxMessageHistory;
    if (overflow > 0) {
      context.messages.splice(0, overflow);
    }
    context.lastUpdatedAt = this.now();
  }

  async appendDetectedIntent(conversationId: string, detection: DetectedIntent): Promise<void> {
    const context = this.getOrCreate(conversationId);
    context.detectedIntents.push(cloneDetection(detection));

    if (context.detectedIntents.length > this.config.maxStoredIntents) {
      context.detectedIntents = context.detectedIntents
        .sort((a, b) => a.detectedAt.getTime() - b.detectedAt.getTime())
        .slice(-this.config.maxStoredIntents);
    }

    for (const entity of detection.entities ?? []) {
      this.track(context, entity);
    }
    this.pruneEntities(context);
    context.lastUpdatedAt = this.now();
  }

  async getRecentEntities(
    conversationId: string,
    entityType?: string,
    maxCount = 5,
    signal?: AbortSignal
  ): Promise<Entity[]> {
    signal?.throwIfAborted();
    const context = this.contexts.get(conversationId);
    return context ? recentEntities(context, entityType, maxCount) : [];
  }

  /** Resolves to "" for an unknown conversation. */
  async generateContextSummary(conversationId: string, maxMessages?: number, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const context = this.contexts.get(conversationId);
    return context ? summarizeContext(context, maxMessages) : "";
  }

  async deleteContext(conversationId: string): Promise<boolean> {
    return this.contexts.delete(conversationId);
  }

  /** Drops conversations not updated within `maxAgeMs`; returns how many were removed. */
  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;

    for (const [id, context] of this.contexts) {
      if (context.lastUpdatedAt.getTime() < cutoff) {
        this.contexts.delete(id);
        removed++;
      }
    }

    if (removed > 0) {
      log.info("Removed stale conversation contexts", { removed, remaining: this.contexts.size });
    }
    return removed;
  }

  get size(): number {
    return this.contexts.size;
  }

  private track(context: ConversationContext, entity: Entity): void {
    const at = this.now();
    const existing = context.trackedEntities.find(
      tracked => tracked.entity.type === entity.type && tracked.entity.value === entity.value
    );

    if (existing) {
      existing.lastMentionedAt = at;
      existing.mentionCount++;
      existing.entity.confidence = Math.max(existing.entity.confidence, entity.confidence);
      return;
    }

    context.trackedEntities.push({ entity: { ...entity }, firstMentionedAt: at, lastMentionedAt: at, mentionCount: 1 });
  }

  /** Evicts the least mentioned entities first, the least recently mentioned among equals. */
  private pruneEntities(context: ConversationContext): void {
    const overflow = context.trackedEntities.length - this.config.maxTrackedEntities;
    if (overflow <= 0) return;

    const evicted = new Set<TrackedEntity>(
      [...context.trackedEntities]
        .sort(
          (a, b) => a.mentionCount - b.mentionCount || a.lastMentionedAt.getTime() - b.lastMentionedAt.getTime()
        )
        .slice(0, overflow)
    );
    context.trackedEntities = context.trackedEntities.filter(tracked => !evicted.has(tracked));
    log.debug("Pruned tracked entities", { conversationId: context.id, evicted: overflow });
  }

  private getOrCreate(conversationId: string): ConversationContext {
    let context = this.contexts.get(conversationId);
    if (!context) {
      context = { id: conversationId, messages: [], detectedIntents: [], trackedEntities: [], lastUpdatedAt: this.now() };
      this.contexts.set(conversationId, context);
    }
    return context;
  }
}
