import {
  BulkItem,
  BulkResult,
  DomainTag,
  PreparedBulkContext,
} from "../types/bulk";

/**
 * One implementation per integrated service. Adapters hold no conversation
 * state; everything they need between turns lives in the prepared context.
 */
export interface BulkAdapter {
  readonly domain: DomainTag;

  /** Validates raw parameters and resolves named references. Never touches items. */
  prepare(params: Record<string, unknown>): Promise<PreparedBulkContext>;

  getTotalCount(context: PreparedBulkContext): Promise<number>;

  /** Up to `batchSize` items starting at `offset`; empty once exhausted. Read-only. */
  getNextBatch(
    context: PreparedBulkContext,
    batchSize: number,
    offset: number
  ): Promise<BulkItem[]>;

  /**
   * One result per item, in input order. Item failures become failed results;
   * only batch-wide faults reject.
   */
  executeBatch(
    items: BulkItem[],
    context: PreparedBulkContext
  ): Promise<BulkResult[]>;
}
