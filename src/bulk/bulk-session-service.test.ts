import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from "../logger";
import { AdapterRegistry } from "./adapter-registry";
import { BulkController } from "./bulk-controller";
import { BulkSessionService } from "./bulk-session-service";
import { decodeState, encodeState } from "./bulk-state";
import {
  NoActiveSessionError,
  SessionAlreadyActiveError,
  SessionBusyError,
  TooManyItemsError,
  UnknownDomainError,
} from "./errors";
import { SqliteSessionStore } from "../store/session-store";
import { FakeAdapter } from "../testing/fake-adapter";
import { FIXED_TIME, makeState } from "../testing/fixtures";

const ACTOR = "actor-1";

describe("BulkSessionService", () => {
  let store: SqliteSessionStore;
  let adapter: FakeAdapter;
  let service: BulkSessionService;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new SqliteSessionStore(":memory:", { ttlSeconds: 3600 });
    adapter = new FakeAdapter({ total: 12 });
    const registry = new AdapterRegistry();
    registry.register(adapter);
    const controller = new BulkController({
      now: () => new Date(FIXED_TIME),
      newId: () => "op-1",
    });
    service = new BulkSessionService(store, registry, controller);
  });

  afterEach(() => {
    store.close();
  });

  function storedState() {
    const raw = store.load(ACTOR);
    return raw === null ? null : decodeState(raw);
  }

  describe("startOperation", () => {
    it("stores the new operation and replies with the confirmation prompt", async () => {
      const { reply, state } = await service.startOperation(ACTOR, "mailbox", {}, 5);

      expect(state).toMatchObject({ status: "active", totalItems: 12, batchSize: 5 });
      expect(reply).toBe(
        "Ready to label on mailbox for 12 item(s) in batches of 5. Processed 0/12, 12 remaining.\n\n" +
          "Say 'continue' to start, or 'cancel' to abort."
      );
      expect(storedState()).toEqual(state);
      expect(adapter.executeCalls).toEqual([]);
    });

    it("refuses a second operation while one is active", async () => {
      await service.startOperation(ACTOR, "mailbox", {});

      await expect(service.startOperation(ACTOR, "mailbox", {})).rejects.toBeInstanceOf(
        SessionAlreadyActiveError
      );
    });

    it("refuses a second start while the first is still counting", async () => {
      const [first, second] = await Promise.allSettled([
        service.startOperation(ACTOR, "mailbox", {}, 5),
        service.startOperation(ACTOR, "mailbox", {}, 10),
      ]);

      expect(first.status).toBe("fulfilled");
      expect(second.status).toBe("rejected");
      if (second.status === "rejected") {
        expect(second.reason).toBeInstanceOf(SessionAlreadyActiveError);
      }
      expect(adapter.prepareCalls).toHaveLength(1);
      expect(storedState()).toMatchObject({ batchSize: 5 });
    });

    it("refuses a start that loses the race on a shared store", async () => {
      const registry = new AdapterRegistry();
      registry.register(adapter);
      const other = new BulkSessionService(
        store,
        registry,
        new BulkController({ now: () => new Date(FIXED_TIME), newId: () => "op-2" })
      );

      const [first, second] = await Promise.allSettled([
        service.startOperation(ACTOR, "mailbox", {}, 5),
        other.startOperation(ACTOR, "mailbox", {}, 10),
      ]);

      expect(first.status).toBe("fulfilled");
      expect(second.status).toBe("rejected");
      if (second.status === "rejected") {
        expect(second.reason).toBeInstanceOf(SessionAlreadyActiveError);
      }
      expect(storedState()).toMatchObject({ operationId: "op-1", batchSize: 5 });
    });

    it("keeps actors independent", async () => {
      await service.startOperation(ACTOR, "mailbox", {});
      await service.startOperation("actor-2", "mailbox", {});

      expect(store.countActive()).toBe(2);
    });

    it("rejects unknown domains before touching any adapter", async () => {
      await expect(service.startOperation(ACTOR, "calendar", {})).rejects.toBeInstanceOf(
        UnknownDomainError
      );
      expect(adapter.prepareCalls).toEqual([]);
      expect(store.load(ACTOR)).toBeNull();
    });

    it("stores nothing when the start is rejected", async () => {
      adapter.reportedTotal = 500;

      await expect(service.startOperation(ACTOR, "mailbox", {})).rejects.toBeInstanceOf(
        TooManyItemsError
      );
      expect(store.load(ACTOR)).toBeNull();
    });
  });

  describe("handleTurn", () => {
    it("leaves turns alone when no operation is active", async () => {
      expect(await service.handleTurn(ACTOR, "continue")).toEqual({ handled: false });
    });

    it("runs one batch per continue and persists progress", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);

      const outcome = await service.handleTurn(ACTOR, "Continue");

      expect(outcome).toMatchObject({
        handled: true,
        intent: "continue",
        retryable: false,
        reply:
          "Processed 5 item(s) this batch (5/12 total). 7 item(s) remaining.\n\n" +
          "Say 'continue' to process the next batch, or 'cancel' to stop.",
      });
      expect(adapter.executeCalls).toEqual([["item-1", "item-2", "item-3", "item-4", "item-5"]]);
      expect(storedState()).toMatchObject({ processedCount: 5, cursor: 5, status: "active" });
    });

    it("drops the session once the operation completes", async () => {
      adapter.failingIds.add("item-12");
      await service.startOperation(ACTOR, "mailbox", {}, 5);
      await service.handleTurn(ACTOR, "yes");
      await service.handleTurn(ACTOR, "yes");

      const outcome = await service.handleTurn(ACTOR, "yes");

      expect(outcome).toMatchObject({
        handled: true,
        intent: "continue",
        reply:
          "Completed bulk label on mailbox. Processed 12/12 items, 0 remaining, 1 item(s) had errors.\n\n" +
          "Errors encountered:\n- item-12: cannot modify item-12",
      });
      expect(store.load(ACTOR)).toBeNull();
      expect(await service.handleTurn(ACTOR, "yes")).toEqual({ handled: false });
    });

    it("cancels and drops the session", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);
      await service.handleTurn(ACTOR, "continue");

      const outcome = await service.handleTurn(ACTOR, "stop");

      expect(outcome).toMatchObject({
        handled: true,
        intent: "cancel",
        reply: "Bulk label on mailbox cancelled. 5/12 items were processed; 7 items were not processed.",
      });
      expect(store.load(ACTOR)).toBeNull();
      expect(adapter.executeCalls).toHaveLength(1);
    });

    it("reminds the actor on unrelated turns without processing anything", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);

      const outcome = await service.handleTurn(ACTOR, "what's on my calendar?");

      expect(outcome).toMatchObject({
        handled: true,
        intent: "unrelated",
        reply:
          "You have a bulk label on mailbox in progress (0/12 items processed, 12 remaining).\n\n" +
          "Say 'continue' to process the next batch, or 'cancel' to stop.",
      });
      expect(adapter.fetchCalls).toEqual([]);
      expect(storedState()).toMatchObject({ processedCount: 0, status: "active" });
    });

    it("keeps the state on a retryable failure so the actor can try again", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);
      adapter.failFetch = new Error("socket hang up");

      const outcome = await service.handleTurn(ACTOR, "continue");

      expect(outcome).toMatchObject({
        handled: true,
        intent: "continue",
        retryable: true,
        reply:
          "An error occurred while processing this batch: Failed to fetch the next batch; nothing was processed: socket hang up\n\n" +
          "You can try again by saying 'continue', or say 'cancel' to stop.",
      });
      expect(storedState()).toMatchObject({ processedCount: 0, status: "active" });
      expect(logger.warn).toHaveBeenCalledTimes(1);

      adapter.failFetch = null;
      const retry = await service.handleTurn(ACTOR, "continue");
      expect(retry).toMatchObject({ retryable: false });
      expect(adapter.executeCalls).toEqual([["item-1", "item-2", "item-3", "item-4", "item-5"]]);
    });

    it("runs a batch only once when two continues arrive together", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);

      const [first, second] = await Promise.allSettled([
        service.handleTurn(ACTOR, "continue"),
        service.handleTurn(ACTOR, "continue"),
      ]);

      expect(first.status).toBe("fulfilled");
      expect(second.status).toBe("rejected");
      if (second.status === "rejected") {
        expect(second.reason).toBeInstanceOf(SessionBusyError);
        expect(second.reason).toMatchObject({ retryable: true, code: "SESSION_BUSY" });
      }
      expect(adapter.executeCalls).toEqual([["item-1", "item-2", "item-3", "item-4", "item-5"]]);
      expect(storedState()).toMatchObject({ processedCount: 5 });

      const next = await service.handleTurn(ACTOR, "continue");
      expect(next).toMatchObject({ state: { processedCount: 10 } });
    });

    it("refuses to cancel while a batch is running", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);

      const pending = service.handleTurn(ACTOR, "continue");
      expect(() => service.cancelOperation(ACTOR)).toThrow(SessionBusyError);
      await pending;

      expect(service.cancelOperation(ACTOR).state).toMatchObject({
        status: "cancelled",
        processedCount: 5,
      });
    });

    it("discards stored state it cannot read", async () => {
      store.save(ACTOR, "{broken");

      expect(await service.handleTurn(ACTOR, "continue")).toEqual({ handled: false });
      expect(store.load(ACTOR)).toBeNull();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("discards a terminal state left in the store", async () => {
      store.save(ACTOR, encodeState(makeState({ processedCount: 50, cursor: 50, status: "completed" })));

      expect(await service.handleTurn(ACTOR, "continue")).toEqual({ handled: false });
      expect(store.load(ACTOR)).toBeNull();
    });
  });

  describe("getStatus", () => {
    it("returns null without an operation", () => {
      expect(service.getStatus(ACTOR)).toBeNull();
    });

    it("repeats the start prompt before the first batch", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);

      expect(service.getStatus(ACTOR)?.reply).toBe(
        "Ready to label on mailbox for 12 item(s) in batches of 5. Processed 0/12, 12 remaining.\n\n" +
          "Say 'continue' to start, or 'cancel' to abort."
      );
    });

    it("describes the active operation", async () => {
      await service.startOperation(ACTOR, "mailbox", {}, 5);
      await service.handleTurn(ACTOR, "continue");

      const status = service.getStatus(ACTOR);

      expect(status?.state.processedCount).toBe(5);
      expect(status?.reply).toBe(
        "You have a bulk label on mailbox in progress (5/12 items processed, 7 remaining).\n\n" +
          "Say 'continue' to process the next batch, or 'cancel' to stop."
      );
    });
  });

  describe("cancelOperation", () => {
    it("cancels the active operation", async () => {
      await service.startOperation(ACTOR, "mailbox", {});

      const { state } = service.cancelOperation(ACTOR);

      expect(state.status).toBe("cancelled");
      expect(store.load(ACTOR)).toBeNull();
    });

    it("throws when there is nothing to cancel", () => {
      expect(() => service.cancelOperation(ACTOR)).toThrow(NoActiveSessionError);
    });
  });
});
