import { randomUUID } from "node:crypto";
import { logger } from "../logger";
import {
  BulkItem,
  BulkItemError,
  BulkOperationState,
  BulkResult,
  BulkTransition,
} from "../types/bulk";
import { BulkAdapter } from "./bulk-adapter";
import { STATE_VERSION } from "./bulk-state";
import {
  CapacityLimits,
  DEFAULT_LIMITS,
  clampBatchSize,
  validateTotal,
} from "./capacity";
import {
  AdapterContractError,
  BatchExecutionError,
  BulkError,
  CountError,
  FetchError,
  InvalidStateError,
  NothingToProcessError,
  errorMessage,
} from "./errors";

export interface BulkControllerOptions {
  limits?: CapacityLimits;
  now?: () => Date;
  newId?: () => string;
}

/**
 * Drives one bulk operation through start/continue/cancel. Every call handles
 * exactly one conversational turn; the controller keeps nothing between calls
 * and never mutates the state it is given.
 */
export class BulkController {
  private readonly limits: CapacityLimits;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(opts: BulkControllerOptions = {}) {
    this.limits = opts.limits ?? DEFAULT_LIMITS;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  async start(
    adapter: BulkAdapter,
    params: Record<string, unknown>,
    requestedBatchSize?: number
  ): Promise<BulkTransition> {
    const context = await adapter.prepare(params);

    let total: number;
    try {
      total = await adapter.getTotalCount(context);
    } catch (err) {
      throw wrap(err, CountError, `Failed to count ${context.domain} items`, {
        domain: context.domain,
        action: context.action,
      });
    }

    if (!Number.isInteger(total) || total < 0) {
      throw new AdapterContractError(`Adapter ${adapter.domain} returned an invalid count: ${total}`);
    }
    validateTotal(total, this.limits);
    if (total === 0) {
      throw new NothingToProcessError(context.domain, context.action);
    }

    const batchSize = clampBatchSize(requestedBatchSize, this.limits);
    const timestamp = this.now().toISOString();
    const state: BulkOperationState = {
      version: STATE_VERSION,
      operationId: this.newId(),
      domain: context.domain,
      action: context.action,
      context,
      totalItems: total,
      batchSize,
      processedCount: 0,
      cursor: 0,
      errors: [],
      createdAt: timestamp,
      updatedAt: timestamp,
      status: "active",
    };

    logger.info(
      {
        tag: "Bulk",
        operationId: state.operationId,
        domain: state.domain,
        action: state.action,
        totalItems: total,
        batchSize,
        requestedBatchSize,
      },
      `Bulk ${state.action} on ${state.domain} started (${total} items, batches of ${batchSize})`
    );

    return {
      state,
      summary: {
        kind: "started",
        processedThisBatch: 0,
        processedTotal: 0,
        remaining: total,
        total,
        needsConfirmation: true,
        batchErrors: [],
      },
    };
  }

  async continue(
    state: BulkOperationState,
    adapter: BulkAdapter
  ): Promise<BulkTransition> {
    this.assertActive(state, "continue");
    const ctx = {
      operationId: state.operationId,
      domain: state.domain,
      offset: state.processedCount,
    };

    let fetched: BulkItem[];
    try {
      fetched = await adapter.getNextBatch(
        state.context,
        state.batchSize,
        state.processedCount
      );
    } catch (err) {
      throw wrap(err, FetchError, "Failed to fetch the next batch; nothing was processed", ctx);
    }

    // Never run more than the user confirmed, even if the item set grew.
    const remainingBefore = state.totalItems - state.processedCount;
    const batch = fetched.slice(0, Math.min(state.batchSize, remainingBefore));

    let results: BulkResult[] = [];
    if (batch.length > 0) {
      try {
        results = await adapter.executeBatch(batch, state.context);
      } catch (err) {
        throw wrap(
          err,
          BatchExecutionError,
          "The batch failed as a whole; nothing was processed",
          ctx
        );
      }
      assertResultsMatch(batch, results, adapter.domain);
    }

    const batchErrors: BulkItemError[] = results
      .filter((r) => !r.success)
      .map((r) => ({ itemId: r.itemId, error: r.error ?? "Unknown error" }));

    const processedCount = state.processedCount + batch.length;
    const done = batch.length === 0 || processedCount >= state.totalItems;
    const next: BulkOperationState = {
      ...state,
      processedCount,
      cursor: processedCount,
      errors: [...state.errors, ...batchErrors],
      updatedAt: this.now().toISOString(),
      status: done ? "completed" : "active",
    };

    logger.info(
      {
        tag: "Bulk",
        ...ctx,
        items: batch.length,
        failed: batchErrors.length,
        processedCount,
        totalItems: state.totalItems,
        status: next.status,
      },
      `Batch processed (${processedCount}/${state.totalItems} items)`
    );
    if (done && batch.length === 0 && processedCount < state.totalItems) {
      logger.warn(
        { tag: "Bulk", ...ctx, totalItems: state.totalItems },
        "Item source exhausted before the counted total was reached"
      );
    }

    return {
      state: next,
      summary: {
        kind: "advanced",
        processedThisBatch: batch.length,
        processedTotal: processedCount,
        remaining: done ? 0 : state.totalItems - processedCount,
        total: state.totalItems,
        needsConfirmation: !done,
        batchErrors,
      },
    };
  }

  cancel(state: BulkOperationState): BulkTransition {
    this.assertActive(state, "cancel");

    const next: BulkOperationState = {
      ...state,
      updatedAt: this.now().toISOString(),
      status: "cancelled",
    };

    logger.info(
      {
        tag: "Bulk",
        operationId: state.operationId,
        processedCount: state.processedCount,
        totalItems: state.totalItems,
      },
      `Bulk ${state.action} on ${state.domain} cancelled at ${state.processedCount}/${state.totalItems}`
    );

    return {
      state: next,
      summary: {
        kind: "cancelled",
        processedThisBatch: 0,
        processedTotal: state.processedCount,
        remaining: state.totalItems - state.processedCount,
        total: state.totalItems,
        needsConfirmation: false,
        batchErrors: [],
      },
    };
  }

  private assertActive(state: BulkOperationState, operation: string): void {
    if (state.status !== "active") {
      throw new InvalidStateError(operation, state.status, state.operationId);
    }
  }
}

type RetryableErrorClass = new (
  message: string,
  context: Record<string, string | number>,
  cause: unknown
) => BulkError;

function wrap(
  err: unknown,
  ErrorClass: RetryableErrorClass,
  message: string,
  context: Record<string, string | number>
): BulkError {
  if (err instanceof ErrorClass) return err;
  return new ErrorClass(`${message}: ${errorMessage(err)}`, context, err);
}

function assertResultsMatch(
  items: BulkItem[],
  results: BulkResult[],
  domain: string
): void {
  if (results.length !== items.length) {
    throw new AdapterContractError(
      `Adapter ${domain} returned ${results.length} results for ${items.length} items`
    );
  }
  items.forEach((item, i) => {
    if (results[i].itemId !== item.id) {
      throw new AdapterContractError(
        `Adapter ${domain} returned result for '${results[i].itemId}' at position ${i}, expected '${item.id}'`
      );
    }
  });
}
