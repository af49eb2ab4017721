import { ValidationError } from "./errors.js";

export function parseNonNegativeInteger(
  value: unknown,
  invalidMessage: string,
): number {
  if (typeof value !== "string") {
    throw new ValidationError(invalidMessage);
  }

  const trimmed = value.trim();
  if (!/^\d+$/u.test(trimmed)) {
    throw new ValidationError(invalidMessage);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(invalidMessage);
  }

  return parsed;
}
