import { TooManyItemsError } from "./errors";

export interface CapacityLimits {
  minBatchSize: number;
  maxBatchSize: number;
  maxTotalItems: number;
}

export const MIN_BATCH_SIZE = 5;
export const MAX_BATCH_SIZE = 20;
export const MAX_TOTAL_ITEMS = 200;

export const DEFAULT_LIMITS: Readonly<CapacityLimits> = Object.freeze({
  minBatchSize: MIN_BATCH_SIZE,
  maxBatchSize: MAX_BATCH_SIZE,
  maxTotalItems: MAX_TOTAL_ITEMS,
});

export function validateTotal(
  count: number,
  limits: CapacityLimits = DEFAULT_LIMITS
): void {
  if (count > limits.maxTotalItems) {
    throw new TooManyItemsError(count, limits.maxTotalItems);
  }
}

/**
 * Bounds the per-turn blast radius while keeping a non-zero floor. A missing
 * or non-numeric request gets the largest batch.
 */
export function clampBatchSize(
  requested: number | undefined,
  limits: CapacityLimits = DEFAULT_LIMITS
): number {
  if (requested === undefined || !Number.isFinite(requested)) {
    return limits.maxBatchSize;
  }
  return Math.max(
    limits.minBatchSize,
    Math.min(Math.floor(requested), limits.maxBatchSize)
  );
}

export function assertCapacityLimits(limits: CapacityLimits): void {
  for (const [key, value] of Object.entries(limits)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Capacity limit ${key} must be a positive integer, got ${value}`);
    }
  }
  if (limits.minBatchSize > limits.maxBatchSize) {
    throw new Error(
      `minBatchSize (${limits.minBatchSize}) must not exceed maxBatchSize (${limits.maxBatchSize})`
    );
  }
}
