import { createValidationError } from "../../utils/errors";

export function requireNonEmpty(value: string | null | undefined, field: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw createValidationError(field, "cannot be empty");
  }
  return value;
}

export function requireUnitInterval(value: number | undefined, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw createValidationError(field, "must be a number between 0 and 1");
  }
  return value;
}

export function requirePresent<T>(value: T | null | undefined, field: string): T {
  if (value === null || value === undefined) {
    throw createValidationError(field, "is required");
  }
  return value;
}
