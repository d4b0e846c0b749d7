import { z } from "zod";
import { ApiClient } from "./api-client";

export interface MailLabel {
  id: string;
  name: string;
}

export interface MailMessageSummary {
  id: string;
  subject: string;
}

export interface LabelChange {
  addLabelIds: string[];
  removeLabelIds: string[];
}

export interface MailClient {
  findLabel(name: string): Promise<MailLabel | null>;
  countMessages(query: string): Promise<number>;
  listMessages(query: string, limit: number, offset: number): Promise<MailMessageSummary[]>;
  /** One request for the whole id list; the service reports no per-message status. */
  batchModify(messageIds: string[], change: LabelChange): Promise<void>;
}

const labelsResponse = z.object({
  labels: z.array(z.object({ id: z.string(), name: z.string() })),
});

const countResponse = z.object({ count: z.number().int().nonnegative() });

const messagesResponse = z.object({
  messages: z.array(
    z.object({ id: z.string(), subject: z.string().nullish() })
  ),
});

export class HttpMailClient implements MailClient {
  constructor(private api: ApiClient) {}

  async findLabel(name: string): Promise<MailLabel | null> {
    const { body } = await this.api.request("GET", "/labels");
    const { labels } = labelsResponse.parse(body);
    const wanted = name.trim().toLowerCase();
    return (
      labels.find((l) => l.id === name) ??
      labels.find((l) => l.name.toLowerCase() === wanted) ??
      null
    );
  }

  async countMessages(query: string): Promise<number> {
    const { body } = await this.api.request("GET", "/messages/count", {
      query: { q: query },
    });
    return countResponse.parse(body).count;
  }

  async listMessages(
    query: string,
    limit: number,
    offset: number
  ): Promise<MailMessageSummary[]> {
    const { body } = await this.api.request("GET", "/messages", {
      query: { q: query, limit, offset },
    });
    return messagesResponse.parse(body).messages.map((m) => ({
      id: m.id,
      subject: m.subject ?? "(no subject)",
    }));
  }

  async batchModify(messageIds: string[], change: LabelChange): Promise<void> {
    await this.api.request("POST", "/messages/batch-modify", {
      body: { ids: messageIds, ...change },
    });
  }
}
