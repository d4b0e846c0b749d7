export const DOMAIN_TAGS = ["mailbox", "tasks"] as const;

export type DomainTag = (typeof DOMAIN_TAGS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface PreparedBulkContext {
  domain: DomainTag;
  action: string;
  queryParams: JsonObject;
  actionParams: JsonObject;
  metadata?: JsonObject;
}

/** Fetched per batch, never persisted between turns. */
export interface BulkItem {
  id: string;
  displayName: string;
  raw?: Record<string, unknown>;
}

export interface BulkResult {
  itemId: string;
  success: boolean;
  error?: string;
}

export interface BulkItemError {
  itemId: string;
  error: string;
}

export type BulkStatus = "active" | "completed" | "cancelled";

export interface BulkOperationState {
  version: number;
  operationId: string;
  domain: DomainTag;
  action: string;
  context: PreparedBulkContext;
  totalItems: number;
  batchSize: number;
  processedCount: number;
  cursor: number;
  errors: BulkItemError[];
  createdAt: string;
  updatedAt: string;
  status: BulkStatus;
}

export type BulkSummaryKind = "started" | "advanced" | "cancelled";

export interface BulkSummary {
  kind: BulkSummaryKind;
  processedThisBatch: number;
  processedTotal: number;
  remaining: number;
  total: number;
  needsConfirmation: boolean;
  batchErrors: BulkItemError[];
}

export interface BulkTransition {
  state: BulkOperationState;
  summary: BulkSummary;
}

export type BulkIntent = "continue" | "cancel" | "unrelated";
