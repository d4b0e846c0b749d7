import { BulkItemError, BulkOperationState, BulkSummary } from "../types/bulk";

const ERROR_LIST_LIMIT = 10;

const NEXT_STEP = "Say 'continue' to process the next batch, or 'cancel' to stop.";

function describe(state: BulkOperationState): string {
  return `${state.action} on ${state.domain}`;
}

export function presentStatus(
  state: BulkOperationState,
  summary: BulkSummary
): string {
  const { processedTotal, total, remaining } = summary;

  if (state.status === "cancelled") {
    return (
      `Bulk ${describe(state)} cancelled. ` +
      `${processedTotal}/${total} items were processed; ${remaining} items were not processed.`
    );
  }

  if (state.status === "completed") {
    const errorCount = state.errors.length;
    const lines = [
      `Completed bulk ${describe(state)}. Processed ${processedTotal}/${total} items, ` +
        `${remaining} remaining, ${errorCount} item(s) had errors.`,
    ];
    const details = presentErrors(state.errors);
    if (details) lines.push(details);
    return lines.join("\n\n");
  }

  if (summary.kind === "started") {
    return (
      `Ready to ${describe(state)} for ${total} item(s) in batches of ${state.batchSize}. ` +
      `Processed 0/${total}, ${remaining} remaining.\n\n` +
      "Say 'continue' to start, or 'cancel' to abort."
    );
  }

  const batchErrors = summary.batchErrors.length
    ? ` ${summary.batchErrors.length} item(s) in this batch had errors.`
    : "";
  return (
    `Processed ${summary.processedThisBatch} item(s) this batch ` +
    `(${processedTotal}/${total} total).${batchErrors} ${remaining} item(s) remaining.\n\n` +
    NEXT_STEP
  );
}

export function presentErrors(
  errors: BulkItemError[],
  limit: number = ERROR_LIST_LIMIT
): string {
  if (errors.length === 0) return "";
  const lines = ["Errors encountered:"];
  for (const err of errors.slice(0, limit)) {
    lines.push(`- ${err.itemId}: ${err.error}`);
  }
  if (errors.length > limit) {
    lines.push(`... and ${errors.length - limit} more error(s).`);
  }
  return lines.join("\n");
}

export function presentReminder(state: BulkOperationState): string {
  return (
    `You have a bulk ${describe(state)} in progress ` +
    `(${state.processedCount}/${state.totalItems} items processed, ` +
    `${state.totalItems - state.processedCount} remaining).\n\n` +
    NEXT_STEP
  );
}

/** Status of a stored state outside of a transition (e.g. a status query). */
export function summarizeState(state: BulkOperationState): BulkSummary {
  const remaining = state.status === "completed" ? 0 : state.totalItems - state.processedCount;
  return {
    kind: state.processedCount === 0 && state.status === "active" ? "started" : "advanced",
    processedThisBatch: 0,
    processedTotal: state.processedCount,
    remaining,
    total: state.totalItems,
    needsConfirmation: state.status === "active",
    batchErrors: [],
  };
}
