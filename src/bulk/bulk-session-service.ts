import { logger } from "../logger";
import { SessionStore } from "../store/session-store";
import {
  BulkIntent,
  BulkOperationState,
  BulkTransition,
} from "../types/bulk";
import { AdapterRegistry } from "./adapter-registry";
import { BulkController } from "./bulk-controller";
import { decodeState, encodeState } from "./bulk-state";
import { CapacityLimits, DEFAULT_LIMITS } from "./capacity";
import {
  BulkError,
  NoActiveSessionError,
  SessionAlreadyActiveError,
  SessionBusyError,
  StateDecodeError,
} from "./errors";
import { routeTurn } from "./intent-gate";
import {
  presentReminder,
  presentStatus,
  summarizeState,
} from "./status-presenter";

export interface BulkReply {
  reply: string;
  state: BulkOperationState;
}

export type TurnOutcome =
  | { handled: false }
  | {
      handled: true;
      intent: BulkIntent;
      reply: string;
      state: BulkOperationState;
      retryable: boolean;
    };

/**
 * The front end's side of the bulk engine: loads the actor's state from the
 * store, hands it to the controller for one transition and writes the result
 * back (or drops it once terminal).
 */
export class BulkSessionService {
  private readonly limits: CapacityLimits;
  /** Actors with a start or turn still awaiting an adapter call. */
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly store: SessionStore,
    private readonly registry: AdapterRegistry,
    private readonly controller: BulkController,
    limits: CapacityLimits = DEFAULT_LIMITS
  ) {
    this.limits = limits;
  }

  async startOperation(
    actorId: string,
    domain: string,
    params: Record<string, unknown>,
    batchSize?: number
  ): Promise<BulkReply> {
    return this.withActorLock(
      actorId,
      () => new SessionAlreadyActiveError(actorId, null),
      async () => {
        const existing = this.loadActive(actorId);
        if (existing) {
          throw new SessionAlreadyActiveError(actorId, existing.operationId);
        }

        const adapter = this.registry.resolve(domain);
        const transition = await this.controller.start(adapter, params, batchSize);
        return this.commit(actorId, transition, { create: true });
      }
    );
  }

  async handleTurn(actorId: string, message: string): Promise<TurnOutcome> {
    return this.withActorLock(
      actorId,
      () => new SessionBusyError(actorId),
      () => this.runTurn(actorId, message)
    );
  }

  private async runTurn(actorId: string, message: string): Promise<TurnOutcome> {
    const state = this.loadActive(actorId);
    const decision = routeTurn(message, state);
    if (decision.route === "ordinary" || !state) {
      return { handled: false };
    }

    const { intent } = decision;
    logger.debug(
      { tag: "Bulk", actorId, operationId: state.operationId, intent },
      "Bulk gate classified turn"
    );

    if (intent === "unrelated") {
      return { handled: true, intent, reply: presentReminder(state), state, retryable: false };
    }

    if (intent === "cancel") {
      const { reply, state: next } = this.commit(actorId, this.controller.cancel(state));
      return { handled: true, intent, reply, state: next, retryable: false };
    }

    const adapter = this.registry.resolve(state.domain);
    try {
      const { reply, state: next } = this.commit(
        actorId,
        await this.controller.continue(state, adapter)
      );
      return { handled: true, intent, reply, state: next, retryable: false };
    } catch (err) {
      if (err instanceof BulkError && err.retryable) {
        logger.warn(
          { tag: "Bulk", actorId, operationId: state.operationId, err },
          "Batch failed, state left unchanged"
        );
        return {
          handled: true,
          intent,
          reply:
            `An error occurred while processing this batch: ${err.message}\n\n` +
            "You can try again by saying 'continue', or say 'cancel' to stop.",
          state,
          retryable: true,
        };
      }
      throw err;
    }
  }

  getStatus(actorId: string): BulkReply | null {
    const state = this.loadActive(actorId);
    if (!state) return null;
    // Before the first batch the start prompt still applies.
    const reply =
      state.processedCount === 0
        ? presentStatus(state, summarizeState(state))
        : presentReminder(state);
    return { reply, state };
  }

  cancelOperation(actorId: string): BulkReply {
    if (this.inFlight.has(actorId)) {
      throw new SessionBusyError(actorId);
    }
    const state = this.loadActive(actorId);
    if (!state) {
      throw new NoActiveSessionError(actorId);
    }
    return this.commit(actorId, this.controller.cancel(state));
  }

  private async withActorLock<T>(
    actorId: string,
    busy: () => BulkError,
    fn: () => Promise<T>
  ): Promise<T> {
    if (this.inFlight.has(actorId)) {
      throw busy();
    }
    this.inFlight.add(actorId);
    try {
      return await fn();
    } finally {
      this.inFlight.delete(actorId);
    }
  }

  private commit(
    actorId: string,
    transition: BulkTransition,
    opts: { create?: boolean } = {}
  ): BulkReply {
    const { state, summary } = transition;
    if (state.status === "active" && opts.create) {
      // Another process sharing the store may have started one meanwhile.
      if (!this.store.create(actorId, encodeState(state))) {
        throw new SessionAlreadyActiveError(actorId, null);
      }
    } else if (state.status === "active") {
      this.store.save(actorId, encodeState(state));
    } else {
      this.store.delete(actorId);
      logger.info(
        {
          tag: "Bulk",
          actorId,
          operationId: state.operationId,
          status: state.status,
          processedCount: state.processedCount,
          errors: state.errors.length,
        },
        `Bulk session closed (${state.status})`
      );
    }
    return { reply: presentStatus(state, summary), state };
  }

  private loadActive(actorId: string): BulkOperationState | null {
    const raw = this.store.load(actorId);
    if (raw === null) return null;

    let state: BulkOperationState;
    try {
      state = decodeState(raw, this.limits);
    } catch (err) {
      if (!(err instanceof StateDecodeError)) throw err;
      logger.warn({ tag: "Store", actorId, err }, "Discarding unreadable bulk state");
      this.store.delete(actorId);
      return null;
    }

    if (state.status !== "active") {
      this.store.delete(actorId);
      return null;
    }
    return state;
  }
}
