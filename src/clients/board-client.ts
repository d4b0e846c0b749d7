import { z } from "zod";
import { ApiClient } from "./api-client";

export interface BoardRef {
  id: string;
  name: string;
}

export interface BoardCard {
  id: string;
  name: string;
}

export interface BoardClient {
  getLists(boardId: string): Promise<BoardRef[]>;
  getLabels(boardId: string): Promise<BoardRef[]>;
  countCards(listId: string): Promise<number>;
  listCards(listId: string, limit: number, offset: number): Promise<BoardCard[]>;
  addLabel(cardId: string, labelId: string): Promise<void>;
  addComment(cardId: string, text: string): Promise<void>;
}

const refs = z.array(z.object({ id: z.string(), name: z.string() }));

const countResponse = z.object({ count: z.number().int().nonnegative() });

export class HttpBoardClient implements BoardClient {
  constructor(private api: ApiClient) {}

  async getLists(boardId: string): Promise<BoardRef[]> {
    const { body } = await this.api.request("GET", `/boards/${encodeURIComponent(boardId)}/lists`);
    return refs.parse(body);
  }

  async getLabels(boardId: string): Promise<BoardRef[]> {
    const { body } = await this.api.request("GET", `/boards/${encodeURIComponent(boardId)}/labels`);
    return refs.parse(body);
  }

  async countCards(listId: string): Promise<number> {
    const { body } = await this.api.request("GET", `/lists/${encodeURIComponent(listId)}/cards/count`);
    return countResponse.parse(body).count;
  }

  async listCards(listId: string, limit: number, offset: number): Promise<BoardCard[]> {
    const { body } = await this.api.request("GET", `/lists/${encodeURIComponent(listId)}/cards`, {
      query: { limit, offset },
    });
    return refs.parse(body);
  }

  async addLabel(cardId: string, labelId: string): Promise<void> {
    await this.api.request("POST", `/cards/${encodeURIComponent(cardId)}/labels`, {
      body: { labelId },
    });
  }

  async addComment(cardId: string, text: string): Promise<void> {
    await this.api.request("POST", `/cards/${encodeURIComponent(cardId)}/comments`, {
      body: { text },
    });
  }
}
