import type { IntentDefinition } from "../../../shared/schemas/intent";
import { NotFoundError, ValidationError } from "../../utils/errors";

export interface IntentModelOptions {
  embeddingModel: string;
  similarityThreshold: number;
}

const normalizeKey = (name: string): string => name.trim().toLowerCase();

function frozenCopy<T>(items: T[]): T[] {
  const copy = [...items];
  Object.freeze(copy);
  return copy;
}

/** Deep-frozen copy, so a definition handed out cannot drift from its embeddings. */
function freezeIntent(intent: IntentDefinition): IntentDefinition {
  return Object.freeze({
    ...intent,
    examples: frozenCopy(intent.examples),
    exampleEmbeddings: frozenCopy(intent.exampleEmbeddings.map(frozenCopy)),
    entitySlots: frozenCopy(
      intent.entitySlots.map(slot => Object.freeze({ ...slot, extractionPrompts: frozenCopy(slot.extractionPrompts) }))
    ),
    childIntents: frozenCopy(intent.childIntents),
  });
}

/**
 * Per-tenant intent catalogue. Names and aliases are matched
 * case-insensitively; iteration follows insertion order. Stored definitions
 * are frozen copies of what was passed in.
 *
 * Not synchronised: callers that mutate while other calls classify must
 * serialise the writes themselves (see IntentModelRegistry.withWriteLock).
 */
export class IntentClassificationModel {
  readonly embeddingModel: string;
  readonly similarityThreshold: number;

  private intents = new Map<string, IntentDefinition>();
  private aliases = new Map<string, string>();

  constructor(options: IntentModelOptions) {
    this.embeddingModel = options.embeddingModel;
    this.similarityThreshold = options.similarityThreshold;
  }

  get size(): number {
    return this.intents.size;
  }

  listIntents(): IntentDefinition[] {
    return Array.from(this.intents.values());
  }

  hasIntent(nameOrAlias: string): boolean {
    return this.tryResolveIntentName(nameOrAlias) !== undefined;
  }

  getIntent(nameOrAlias: string): IntentDefinition | undefined {
    const name = this.tryResolveIntentName(nameOrAlias);
    return name === undefined ? undefined : this.intents.get(normalizeKey(name));
  }

  /** Adds the intent, replacing any existing one with the same name, and returns the stored copy. */
  setIntent(intent: IntentDefinition): IntentDefinition {
    if (!intent.name.trim()) {
      throw new ValidationError("Intent name cannot be empty");
    }
    if (intent.examples.length !== intent.exampleEmbeddings.length) {
      throw new ValidationError(
        `Intent '${intent.name}' has ${intent.examples.length} examples but ${intent.exampleEmbeddings.length} embeddings`
      );
    }
    const stored = freezeIntent(intent);
    this.intents.set(normalizeKey(intent.name), stored);
    return stored;
  }

  removeIntent(nameOrAlias: string): { removed: IntentDefinition; aliases: string[] } | undefined {
    const intent = this.getIntent(nameOrAlias);
    if (!intent) return undefined;

    this.intents.delete(normalizeKey(intent.name));

    const aliases = this.aliasesFor(intent.name);
    for (const alias of aliases) {
      this.aliases.delete(normalizeKey(alias));
    }

    return { removed: intent, aliases };
  }

  addAlias(alias: string, intentName: string): void {
    if (!alias.trim()) {
      throw new ValidationError("Alias cannot be empty");
    }
    const intent = this.getIntent(intentName);
    if (!intent) {
      throw new NotFoundError("Intent", intentName);
    }
    this.aliases.set(normalizeKey(alias), intent.name);
  }

  aliasesFor(intentName: string): string[] {
    const key = normalizeKey(intentName);
    return Array.from(this.aliases.entries())
      .filter(([, target]) => normalizeKey(target) === key)
      .map(([alias]) => alias);
  }

  tryResolveIntentName(nameOrAlias: string): string | undefined {
    const key = normalizeKey(nameOrAlias);
    const direct = this.intents.get(key);
    if (direct) return direct.name;

    const target = this.aliases.get(key);
    if (target === undefined) return undefined;
    return this.intents.get(normalizeKey(target))?.name;
  }

  resolveIntentName(nameOrAlias: string): string {
    const name = this.tryResolveIntentName(nameOrAlias);
    if (name === undefined) {
      throw new NotFoundError("Intent or alias", nameOrAlias);
    }
    return name;
  }
}
