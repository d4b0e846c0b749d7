import { BulkAdapter } from "../bulk/bulk-adapter";
import {
  CountError,
  FetchError,
  ValidationError,
  errorMessage,
} from "../bulk/errors";
import { BoardCard, BoardClient, BoardRef } from "../clients/board-client";
import {
  BulkItem,
  BulkResult,
  JsonObject,
  PreparedBulkContext,
} from "../types/bulk";
import { contextString, oneOf, requiredString } from "./params";

export const TASK_ACTIONS = ["add_label", "add_comment"] as const;

function pickByName(refs: BoardRef[], requested: string): BoardRef | undefined {
  const wanted = requested.trim().toLowerCase();
  return refs.find((r) => r.id === requested) ?? refs.find((r) => r.name.trim().toLowerCase() === wanted);
}

// Cards are handled one request at a time; a failed card never stops the rest.
export class TaskBoardBulkAdapter implements BulkAdapter {
  readonly domain = "tasks" as const;

  constructor(private client: BoardClient) {}

  async prepare(params: Record<string, unknown>): Promise<PreparedBulkContext> {
    const action = oneOf(params, "action", TASK_ACTIONS);
    const boardId = requiredString(params, "boardId");
    const listName = requiredString(params, "list");

    const list = pickByName(await this.lookup("lists", () => this.client.getLists(boardId)), listName);
    if (!list) {
      throw new ValidationError(`List '${listName}' not found on board ${boardId}`, { param: "list" });
    }

    const actionParams: JsonObject = {};
    if (action === "add_label") {
      const labelName = requiredString(params, "labelName", "labelName is required for action 'add_label'");
      const label = pickByName(await this.lookup("labels", () => this.client.getLabels(boardId)), labelName);
      if (!label) {
        throw new ValidationError(`Label '${labelName}' not found on board ${boardId}`, { param: "labelName" });
      }
      actionParams.labelId = label.id;
      actionParams.labelName = label.name;
    } else {
      actionParams.text = requiredString(params, "text", "text is required for action 'add_comment'");
    }

    return {
      domain: this.domain,
      action,
      queryParams: { boardId, listId: list.id, listName: list.name },
      actionParams,
    };
  }

  async getTotalCount(context: PreparedBulkContext): Promise<number> {
    const listId = contextString(context.queryParams, "listId");
    try {
      return await this.client.countCards(listId);
    } catch (err) {
      throw new CountError(`Failed to count cards: ${errorMessage(err)}`, { listId }, err);
    }
  }

  async getNextBatch(
    context: PreparedBulkContext,
    batchSize: number,
    offset: number
  ): Promise<BulkItem[]> {
    const listId = contextString(context.queryParams, "listId");
    let cards: BoardCard[];
    try {
      cards = await this.client.listCards(listId, batchSize, offset);
    } catch (err) {
      throw new FetchError(`Failed to fetch cards: ${errorMessage(err)}`, { listId, offset }, err);
    }
    return cards.slice(0, batchSize).map((c) => ({ id: c.id, displayName: c.name }));
  }

  async executeBatch(
    items: BulkItem[],
    context: PreparedBulkContext
  ): Promise<BulkResult[]> {
    const apply = this.cardAction(context);
    const results: BulkResult[] = [];
    for (const item of items) {
      try {
        await apply(item.id);
        results.push({ itemId: item.id, success: true });
      } catch (err) {
        results.push({ itemId: item.id, success: false, error: errorMessage(err) });
      }
    }
    return results;
  }

  private cardAction(context: PreparedBulkContext): (cardId: string) => Promise<void> {
    if (context.action === "add_label") {
      const labelId = contextString(context.actionParams, "labelId");
      return (cardId) => this.client.addLabel(cardId, labelId);
    }
    if (context.action === "add_comment") {
      const text = contextString(context.actionParams, "text");
      return (cardId) => this.client.addComment(cardId, text);
    }
    return async () => {
      throw new Error(`Unsupported tasks bulk action: ${context.action}`);
    };
  }

  private async lookup(what: string, fn: () => Promise<BoardRef[]>): Promise<BoardRef[]> {
    try {
      return await fn();
    } catch (err) {
      throw new FetchError(`Failed to load board ${what}: ${errorMessage(err)}`, {}, err);
    }
  }
}
