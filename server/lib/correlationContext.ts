import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

export interface CorrelationContext {
  traceId: string;
  tenantId?: string;
  conversationId?: string;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<CorrelationContext>();

export function getContext(): CorrelationContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getTraceId(): string | undefined {
  return asyncLocalStorage.getStore()?.traceId;
}

export function createContext(
  fields: Partial<Omit<CorrelationContext, "startTime">> = {}
): CorrelationContext {
  return {
    traceId: fields.traceId ?? randomUUID(),
    tenantId: fields.tenantId,
    conversationId: fields.conversationId,
    startTime: Date.now(),
  };
}

export function runWithContext<T>(context: CorrelationContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
