import { z } from "zod";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface ParseError {
  kind: "no_json" | "invalid_json" | "schema";
  message: string;
  raw: string;
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/** The span from the first `{`/`[` to the last matching closing bracket. */
function bracketSpan(text: string): string | null {
  const starts = [text.indexOf("{"), text.indexOf("[")].filter(index => index >= 0);
  if (starts.length === 0) return null;

  const start = Math.min(...starts);
  const end = text.lastIndexOf(text[start] === "{" ? "}" : "]");
  if (end <= start) return null;

  return text.slice(start, end + 1);
}

/**
 * Pulls the JSON payload out of a model response: a fenced block first, then
 * the whole text when it opens with a bracket, then the bracket span inside
 * surrounding prose.
 */
export function extractJson(text: string): string | null {
  const fenced = text.match(FENCE_PATTERN);
  const candidate = (fenced ? fenced[1] : text).trim();
  if (!candidate) return null;

  if (candidate.startsWith("{") || candidate.startsWith("[")) {
    return candidate;
  }
  return bracketSpan(candidate);
}

function parseJson(text: string): Result<unknown, string> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function decodeModelJson<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): Result<z.output<S>, ParseError> {
  const json = extractJson(text);
  if (json === null) {
    return { ok: false, error: { kind: "no_json", message: "No JSON found in model response", raw: text } };
  }

  let parsed = parseJson(json);
  if (!parsed.ok) {
    // JSON followed by trailing prose.
    const span = bracketSpan(json);
    if (span !== null && span !== json) {
      const retried = parseJson(span);
      if (retried.ok) parsed = retried;
    }
  }
  if (!parsed.ok) {
    return { ok: false, error: { kind: "invalid_json", message: parsed.error, raw: text } };
  }

  const result = schema.safeParse(parsed.value);
  if (!result.success) {
    const message = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    return { ok: false, error: { kind: "schema", message, raw: text } };
  }

  return { ok: true, value: result.data };
}

const numericString = (value: unknown): unknown =>
  typeof value === "string" && value.trim() !== "" ? Number(value) : value;

// Field helpers: a missing or mistyped field takes its documented default.

export function stringField(fallback: string) {
  return z.string().catch(fallback);
}

export function nameField(fallback: string) {
  return z.string().trim().min(1).catch(fallback);
}

export function optionalStringField() {
  return z.string().optional().catch(undefined);
}

export function numberField(fallback: number) {
  return z.preprocess(numericString, z.number().finite()).catch(fallback);
}

export function optionalNumberField() {
  return z.preprocess(numericString, z.number().finite().optional()).catch(undefined);
}

/** Confidence in [0, 1]; out-of-range numbers are clamped. */
export function confidenceField(fallback: number) {
  return numberField(fallback).transform(clamp01);
}

export function integerField(fallback: number) {
  return numberField(fallback).transform(Math.trunc);
}

export function booleanField(fallback: boolean) {
  return z
    .union([z.boolean(), z.enum(["true", "false"]).transform(value => value === "true")])
    .catch(fallback);
}

export function stringListField() {
  return z
    .array(z.unknown())
    .catch([])
    .transform(items =>
      items.flatMap(item => (typeof item === "string" && item.trim() ? [item.trim()] : []))
    );
}

/** Keeps the elements `item` accepts; anything else is dropped. */
export function objectListField<S extends z.ZodTypeAny>(item: S) {
  return z
    .array(z.unknown())
    .catch([])
    .transform(items =>
      items.flatMap((entry): Array<z.output<S>> => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
