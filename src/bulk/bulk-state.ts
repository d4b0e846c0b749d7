import { z } from "zod";
import {
  BulkOperationState,
  DOMAIN_TAGS,
  JsonValue,
} from "../types/bulk";
import { CapacityLimits, DEFAULT_LIMITS } from "./capacity";
import { StateDecodeError, errorMessage } from "./errors";

export const STATE_VERSION = 1;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const jsonObjectSchema = z.record(jsonValueSchema);

const contextSchema = z.object({
  domain: z.enum(DOMAIN_TAGS),
  action: z.string().min(1),
  queryParams: jsonObjectSchema,
  actionParams: jsonObjectSchema,
  metadata: jsonObjectSchema.optional(),
});

const count = z.number().int().nonnegative();

const stateSchema = z.object({
  version: z.literal(STATE_VERSION),
  operationId: z.string().min(1),
  domain: z.enum(DOMAIN_TAGS),
  action: z.string().min(1),
  context: contextSchema,
  totalItems: count,
  batchSize: z.number().int().positive(),
  processedCount: count,
  cursor: count,
  errors: z.array(z.object({ itemId: z.string(), error: z.string() })),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  status: z.enum(["active", "completed", "cancelled"]),
});

function checkInvariants(
  state: BulkOperationState,
  limits: CapacityLimits
): string[] {
  const problems: string[] = [];
  if (state.processedCount > state.totalItems) {
    problems.push(`processedCount ${state.processedCount} exceeds totalItems ${state.totalItems}`);
  }
  if (state.totalItems > limits.maxTotalItems) {
    problems.push(`totalItems ${state.totalItems} exceeds limit ${limits.maxTotalItems}`);
  }
  if (state.batchSize < limits.minBatchSize || state.batchSize > limits.maxBatchSize) {
    problems.push(
      `batchSize ${state.batchSize} outside [${limits.minBatchSize}, ${limits.maxBatchSize}]`
    );
  }
  if (state.context.domain !== state.domain || state.context.action !== state.action) {
    problems.push("context does not match operation domain/action");
  }
  return problems;
}

export function encodeState(state: BulkOperationState): string {
  return JSON.stringify(state);
}

export function decodeState(
  raw: string,
  limits: CapacityLimits = DEFAULT_LIMITS
): BulkOperationState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StateDecodeError(`Stored bulk state is not valid JSON: ${errorMessage(err)}`, {}, err);
  }

  const result = stateSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new StateDecodeError(`Stored bulk state is malformed: ${issues}`);
  }

  const state: BulkOperationState = result.data;
  const problems = checkInvariants(state, limits);
  if (problems.length > 0) {
    throw new StateDecodeError(
      `Stored bulk state violates invariants: ${problems.join("; ")}`,
      { operationId: state.operationId }
    );
  }
  return state;
}
