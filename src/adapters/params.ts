import { ValidationError } from "../bulk/errors";

export function optionalString(
  params: Record<string, unknown>,
  key: string
): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`${key} must be a string`, { param: key });
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function requiredString(
  params: Record<string, unknown>,
  key: string,
  message = `${key} is required`
): string {
  const value = optionalString(params, key);
  if (value === undefined) {
    throw new ValidationError(message, { param: key });
  }
  return value;
}

export function oneOf<T extends string>(
  params: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T {
  const value = optionalString(params, key);
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ValidationError(
      `Invalid or missing ${key}. Must be one of: ${allowed.join(", ")}`,
      { param: key }
    );
  }
  return match;
}

/** Reads a required string from a prepared context map. */
export function contextString(
  map: Record<string, unknown>,
  key: string
): string {
  const value = map[key];
  if (typeof value !== "string" || value === "") {
    throw new ValidationError(`Prepared context is missing ${key}`, { param: key });
  }
  return value;
}
