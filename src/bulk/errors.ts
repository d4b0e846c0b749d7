import { BulkStatus } from "../types/bulk";

export type BulkErrorCode =
  | "VALIDATION"
  | "NOTHING_TO_PROCESS"
  | "TOO_MANY_ITEMS"
  | "COUNT_FAILED"
  | "FETCH_FAILED"
  | "BATCH_FAILED"
  | "INVALID_STATE"
  | "SESSION_ALREADY_ACTIVE"
  | "NO_ACTIVE_SESSION"
  | "SESSION_BUSY"
  | "UNKNOWN_DOMAIN"
  | "ADAPTER_CONTRACT"
  | "STATE_DECODE";

export type ErrorContext = Record<string, string | number | boolean | null>;

export abstract class BulkError extends Error {
  abstract readonly code: BulkErrorCode;
  /** Transport faults: the same call can be repeated on a later turn. */
  readonly retryable: boolean = false;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.context = context;
  }
}

export class ValidationError extends BulkError {
  readonly code: BulkErrorCode = "VALIDATION";
}

export class NothingToProcessError extends ValidationError {
  readonly code: BulkErrorCode = "NOTHING_TO_PROCESS";

  constructor(domain: string, action: string) {
    super("No items found matching your criteria", { domain, action });
  }
}

export class TooManyItemsError extends BulkError {
  readonly code = "TOO_MANY_ITEMS";

  constructor(
    readonly count: number,
    readonly limit: number
  ) {
    super(
      `This operation would affect ${count} items, which exceeds the maximum of ${limit}. Narrow the query and try again.`,
      { count, limit }
    );
  }
}

export class CountError extends BulkError {
  readonly code = "COUNT_FAILED";
  readonly retryable = true;
}

export class FetchError extends BulkError {
  readonly code = "FETCH_FAILED";
  readonly retryable = true;
}

/** Batch-wide fault: the caller assumes no item of the batch was processed. */
export class BatchExecutionError extends BulkError {
  readonly code = "BATCH_FAILED";
  readonly retryable = true;
}

export class InvalidStateError extends BulkError {
  readonly code = "INVALID_STATE";

  constructor(operation: string, status: BulkStatus, operationId: string) {
    super(`Cannot ${operation} a bulk operation in status '${status}'`, {
      operation,
      status,
      operationId,
    });
  }
}

export class SessionAlreadyActiveError extends BulkError {
  readonly code = "SESSION_ALREADY_ACTIVE";

  constructor(actorId: string, operationId: string | null) {
    super(
      "A bulk operation is already in progress. Say 'continue' to finish it or 'cancel' to stop it first.",
      { actorId, operationId }
    );
  }
}

/** Another request for the same actor has not finished yet. */
export class SessionBusyError extends BulkError {
  readonly code = "SESSION_BUSY";
  readonly retryable = true;

  constructor(actorId: string) {
    super("The previous request for this bulk operation is still running. Try again in a moment.", {
      actorId,
    });
  }
}

export class NoActiveSessionError extends BulkError {
  readonly code = "NO_ACTIVE_SESSION";

  constructor(actorId: string) {
    super("No bulk operation is in progress", { actorId });
  }
}

export class UnknownDomainError extends BulkError {
  readonly code = "UNKNOWN_DOMAIN";

  constructor(domain: string, available: readonly string[]) {
    super(
      `No bulk adapter registered for domain: ${domain}. Available adapters: ${available.join(", ") || "none"}`,
      { domain }
    );
  }
}

export class AdapterContractError extends BulkError {
  readonly code = "ADAPTER_CONTRACT";
}

export class StateDecodeError extends BulkError {
  readonly code = "STATE_DECODE";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
