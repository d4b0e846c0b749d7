import { BulkOperationState } from "../types/bulk";

export const FIXED_TIME = "2026-10-18T09:00:00.000Z";

export function makeState(overrides: Partial<BulkOperationState> = {}): BulkOperationState {
  return {
    version: 1,
    operationId: "op-1",
    domain: "mailbox",
    action: "label",
    context: {
      domain: "mailbox",
      action: "label",
      queryParams: { searchQuery: "from:newsletter@example.com" },
      actionParams: { labelId: "Label_1" },
    },
    totalItems: 50,
    batchSize: 10,
    processedCount: 0,
    cursor: 0,
    errors: [],
    createdAt: FIXED_TIME,
    updatedAt: FIXED_TIME,
    status: "active",
    ...overrides,
  };
}
