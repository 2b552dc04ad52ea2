import type { ClassifierConfig } from "../../config/intentResolution";
import { KeyedAsyncLock } from "../../utils/asyncLock";
import { ValidationError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { IntentClassificationModel } from "./intentModel";

const log = createLogger("intent-model-registry");

/**
 * Owns one IntentClassificationModel per tenant. Models are created on first
 * access; `withWriteLock` serialises mutation for callers that need it.
 */
export class IntentModelRegistry {
  private models = new Map<string, IntentClassificationModel>();
  private lock = new KeyedAsyncLock();

  constructor(private readonly config: Pick<ClassifierConfig, "embeddingModel" | "similarityThreshold">) {}

  forTenant(tenantId: string): IntentClassificationModel {
    if (!tenantId.trim()) {
      throw new ValidationError("Tenant id cannot be empty");
    }

    let model = this.models.get(tenantId);
    if (!model) {
      model = new IntentClassificationModel({
        embeddingModel: this.config.embeddingModel,
        similarityThreshold: this.config.similarityThreshold,
      });
      this.models.set(tenantId, model);
      log.info("Created intent model for tenant", { tenantId });
    }
    return model;
  }

  hasTenant(tenantId: string): boolean {
    return this.models.has(tenantId);
  }

  /** Replaces the tenant's model, e.g. after loading a snapshot. */
  setTenantModel(tenantId: string, model: IntentClassificationModel): void {
    this.models.set(tenantId, model);
  }

  removeTenant(tenantId: string): boolean {
    return this.models.delete(tenantId);
  }

  tenants(): string[] {
    return Array.from(this.models.keys());
  }

  withWriteLock<T>(tenantId: string, fn: (model: IntentClassificationModel) => Promise<T>): Promise<T> {
    const model = this.forTenant(tenantId);
    return this.lock.withLock(tenantId, () => fn(model));
  }
}
