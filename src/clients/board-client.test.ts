import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ApiClient } from "./api-client";
import { HttpBoardClient } from "./board-client";

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

describe("HttpBoardClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let board: HttpBoardClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    board = new HttpBoardClient(
      new ApiClient({
        name: "board",
        baseUrl: "http://board.test",
        auth: { kind: "apiKey", apiKey: "test-key" },
      })
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("pages cards of a list", async () => {
    fetchMock.mockResolvedValueOnce(json([{ id: "c1", name: "Fix login" }]));

    expect(await board.listCards("list 1", 5, 10)).toEqual([{ id: "c1", name: "Fix login" }]);
    expect(String(fetchMock.mock.calls[0][0])).toBe(
      "http://board.test/lists/list%201/cards?limit=5&offset=10"
    );
  });

  it("reads the card count", async () => {
    fetchMock.mockResolvedValueOnce(json({ count: 12 }));

    expect(await board.countCards("list-1")).toBe(12);
  });

  it("posts labels and comments", async () => {
    fetchMock.mockResolvedValueOnce(json({})).mockResolvedValueOnce(json({}));

    await board.addLabel("c1", "lbl-1");
    await board.addComment("c1", "done");

    expect(fetchMock.mock.calls.map(([url, init]) => [String(url), init?.method, init?.body])).toEqual([
      ["http://board.test/cards/c1/labels", "POST", '{"labelId":"lbl-1"}'],
      ["http://board.test/cards/c1/comments", "POST", '{"text":"done"}'],
    ]);
  });
});
