import { BulkAdapter } from "../bulk/bulk-adapter";
import {
  BatchExecutionError,
  CountError,
  FetchError,
  ValidationError,
  errorMessage,
} from "../bulk/errors";
import { ApiError } from "../clients/api-client";
import {
  LabelChange,
  MailClient,
  MailLabel,
  MailMessageSummary,
} from "../clients/mail-client";
import {
  BulkItem,
  BulkResult,
  JsonObject,
  PreparedBulkContext,
} from "../types/bulk";
import { contextString, oneOf, optionalString, requiredString } from "./params";

export const MAILBOX_ACTIONS = ["label", "archive", "move_to_label"] as const;
export type MailboxAction = (typeof MAILBOX_ACTIONS)[number];

export const MAILBOX_QUERY_TYPES = [
  "sender",
  "keyword",
  "subject",
  "label",
  "date_range",
] as const;

const INBOX = "INBOX";

/** Actions whose label change takes a message out of an inbox search. */
const REMOVES_INBOX: ReadonlySet<MailboxAction> = new Set(["archive", "move_to_label"]);

function searchTerms(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

// Search syntax writes spaces in label names as dashes.
function labelTerm(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "-");
}

const SEARCH_PREFIX = {
  sender: "from:",
  keyword: "",
  subject: "subject:",
  label: "label:",
} as const;

/**
 * Applies label changes to every message matching a search. The search string
 * is built once in `prepare`. Offsets stay valid only while the action leaves
 * every processed message inside the search, so `prepare` refuses searches on
 * the inbox for actions that remove it, and searches that exclude the label
 * being added.
 */
export class MailboxBulkAdapter implements BulkAdapter {
  readonly domain = "mailbox" as const;

  constructor(private client: MailClient) {}

  async prepare(params: Record<string, unknown>): Promise<PreparedBulkContext> {
    const action = oneOf(params, "action", MAILBOX_ACTIONS);
    const queryType = oneOf(params, "queryType", MAILBOX_QUERY_TYPES);
    const queryParams: JsonObject = { queryType };
    let searchQuery: string;

    if (queryType === "date_range") {
      const after = optionalString(params, "after");
      const before = optionalString(params, "before");
      if (!after && !before) {
        throw new ValidationError("date_range requires at least 'after' or 'before'", {
          param: "after",
        });
      }
      const parts: string[] = [];
      if (after) {
        queryParams.after = after;
        parts.push(`after:${after}`);
      }
      if (before) {
        queryParams.before = before;
        parts.push(`before:${before}`);
      }
      searchQuery = parts.join(" ");
    } else {
      const value = requiredString(
        params,
        "queryValue",
        "queryValue is required for this queryType"
      );
      queryParams[queryType] = value;
      searchQuery = `${SEARCH_PREFIX[queryType]}${value}`;
    }

    queryParams.searchQuery = searchQuery;
    const terms = searchTerms(searchQuery);

    if (REMOVES_INBOX.has(action)) {
      if (terms.includes("in:inbox") || terms.includes("label:inbox")) {
        throw new ValidationError(
          `Cannot ${action} by searching the inbox: processed messages would leave the search. Narrow by sender, subject, keyword or date instead.`,
          { param: "queryValue" }
        );
      }
    }

    const actionParams: JsonObject = {};
    if (action === "label" || action === "move_to_label") {
      const labelName = requiredString(
        params,
        "labelName",
        `labelName is required for action '${action}'`
      );
      let label: MailLabel | null;
      try {
        label = await this.client.findLabel(labelName);
      } catch (err) {
        throw new FetchError(`Failed to look up label '${labelName}': ${errorMessage(err)}`, {}, err);
      }
      if (!label) {
        throw new ValidationError(`Label '${labelName}' not found`, { param: "labelName" });
      }
      const excluded = [labelName, label.name].some((name) => {
        const term = labelTerm(name);
        return terms.includes(`-label:${term}`) || terms.includes(`-in:${term}`);
      });
      if (excluded) {
        throw new ValidationError(
          `Cannot add label '${label.name}' to a search that excludes it: processed messages would leave the search.`,
          { param: "queryValue" }
        );
      }
      actionParams.labelId = label.id;
      actionParams.labelName = label.name;
    }

    return { domain: this.domain, action, queryParams, actionParams };
  }

  async getTotalCount(context: PreparedBulkContext): Promise<number> {
    const query = contextString(context.queryParams, "searchQuery");
    try {
      return await this.client.countMessages(query);
    } catch (err) {
      throw new CountError(`Failed to count messages: ${errorMessage(err)}`, { query }, err);
    }
  }

  async getNextBatch(
    context: PreparedBulkContext,
    batchSize: number,
    offset: number
  ): Promise<BulkItem[]> {
    const query = contextString(context.queryParams, "searchQuery");
    let messages: MailMessageSummary[];
    try {
      messages = await this.client.listMessages(query, batchSize, offset);
    } catch (err) {
      throw new FetchError(`Failed to fetch messages: ${errorMessage(err)}`, { query, offset }, err);
    }
    return messages.slice(0, batchSize).map((m) => ({ id: m.id, displayName: m.subject }));
  }

  async executeBatch(
    items: BulkItem[],
    context: PreparedBulkContext
  ): Promise<BulkResult[]> {
    const ids = items.map((i) => i.id);
    const change = this.labelChange(context);
    if (!change) {
      return ids.map((itemId) => ({
        itemId,
        success: false,
        error: `Unsupported mailbox bulk action: ${context.action}`,
      }));
    }

    try {
      await this.client.batchModify(ids, change);
    } catch (err) {
      if (err instanceof ApiError && err.isAuthError) {
        throw new BatchExecutionError(
          `Mailbox rejected the batch: ${err.message}`,
          { status: err.status },
          err
        );
      }
      const message = errorMessage(err);
      return ids.map((itemId) => ({ itemId, success: false, error: message }));
    }
    return ids.map((itemId) => ({ itemId, success: true }));
  }

  private labelChange(context: PreparedBulkContext): LabelChange | null {
    switch (context.action) {
      case "label":
        return { addLabelIds: [contextString(context.actionParams, "labelId")], removeLabelIds: [] };
      case "archive":
        return { addLabelIds: [], removeLabelIds: [INBOX] };
      case "move_to_label":
        return {
          addLabelIds: [contextString(context.actionParams, "labelId")],
          removeLabelIds: [INBOX],
        };
      default:
        return null;
    }
  }
}
