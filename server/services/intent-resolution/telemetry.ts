import { trace, SpanStatusCode, SpanKind, type Span } from "@opentelemetry/api";
import { RESOLVER_VERSION, FallbackLevel, type RecommendedAction } from "../../../shared/schemas/intent";

const tracer = trace.getTracer("intent-resolution", RESOLVER_VERSION);

type Operation = "classify" | "detect" | "fallback" | "reasoning" | "resolve";

interface LatencyBucket {
  count: number;
  sum: number;
  values: number[];
}

interface ResolutionMetricsStore {
  classifications: number;
  by_action: Record<RecommendedAction, number>;
  fallbacks: number;
  by_fallback_level: Record<string, number>;
  fallback_successes: number;
  reasoning_runs: number;
  reasoning_errors: number;
  provider_failures: number;
  latencies: Record<Operation, LatencyBucket>;
}

export interface MetricsSnapshot {
  classifications: number;
  by_action: Record<RecommendedAction, number>;
  fallbacks: number;
  by_fallback_level: Record<string, number>;
  fallback_success_rate: number;
  reasoning_runs: number;
  reasoning_errors: number;
  provider_failures: number;
  latency: Record<Operation, { count: number; avg_ms: number; p95_ms: number }>;
}

const MAX_LATENCY_SAMPLES = 1000;

function createEmptyLatencyBucket(): LatencyBucket {
  return { count: 0, sum: 0, values: [] };
}

function createEmptyStore(): ResolutionMetricsStore {
  return {
    classifications: 0,
    by_action: { proceed: 0, proceed_with_caution: 0, clarify: 0, fallback: 0, no_match: 0 },
    fallbacks: 0,
    by_fallback_level: {},
    fallback_successes: 0,
    reasoning_runs: 0,
    reasoning_errors: 0,
    provider_failures: 0,
    latencies: {
      classify: createEmptyLatencyBucket(),
      detect: createEmptyLatencyBucket(),
      fallback: createEmptyLatencyBucket(),
      reasoning: createEmptyLatencyBucket(),
      resolve: createEmptyLatencyBucket(),
    },
  };
}

let metrics = createEmptyStore();

function recordLatency(operation: Operation, ms: number): void {
  const bucket = metrics.latencies[operation];
  bucket.count++;
  bucket.sum += ms;

  if (bucket.values.length >= MAX_LATENCY_SAMPLES) {
    bucket.values.shift();
  }
  bucket.values.push(ms);
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

/**
 * Runs `fn` inside an active span named `intent_resolution.<operation>`. The
 * span records the exception and ends in error status when `fn` rejects.
 */
export async function withSpan<T>(
  operation: Operation,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  return tracer.startActiveSpan(
    `intent_resolution.${operation}`,
    {
      kind: SpanKind.INTERNAL,
      attributes: { "intent_resolution.version": RESOLVER_VERSION, ...attributes },
    },
    async span => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        if (error instanceof Error) {
          span.recordException(error);
        }
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw error;
      } finally {
        recordLatency(operation, Date.now() - startTime);
        span.end();
      }
    }
  );
}

export function recordClassification(action: RecommendedAction): void {
  metrics.classifications++;
  metrics.by_action[action]++;
}

export function recordFallback(level: FallbackLevel, successful: boolean): void {
  if (level === FallbackLevel.None) return;
  const key = FallbackLevel[level];
  metrics.fallbacks++;
  metrics.by_fallback_level[key] = (metrics.by_fallback_level[key] || 0) + 1;
  if (successful) metrics.fallback_successes++;
}

export function recordReasoning(hasError: boolean): void {
  metrics.reasoning_runs++;
  if (hasError) metrics.reasoning_errors++;
}

export function recordProviderFailure(): void {
  metrics.provider_failures++;
}

function summarizeLatency(bucket: LatencyBucket): { count: number; avg_ms: number; p95_ms: number } {
  return {
    count: bucket.count,
    avg_ms: bucket.count > 0 ? bucket.sum / bucket.count : 0,
    p95_ms: percentile(bucket.values, 95),
  };
}

export function getMetricsSnapshot(): MetricsSnapshot {
  const { latencies } = metrics;
  const latency = {
    classify: summarizeLatency(latencies.classify),
    detect: summarizeLatency(latencies.detect),
    fallback: summarizeLatency(latencies.fallback),
    reasoning: summarizeLatency(latencies.reasoning),
    resolve: summarizeLatency(latencies.resolve),
  };

  return {
    classifications: metrics.classifications,
    by_action: { ...metrics.by_action },
    fallbacks: metrics.fallbacks,
    by_fallback_level: { ...metrics.by_fallback_level },
    fallback_success_rate: metrics.fallbacks > 0 ? metrics.fallback_successes / metrics.fallbacks : 0,
    reasoning_runs: metrics.reasoning_runs,
    reasoning_errors: metrics.reasoning_errors,
    provider_failures: metrics.provider_failures,
    latency,
  };
}

export function resetMetrics(): void {
  metrics = createEmptyStore();
}
