import type { SyncState } from "./types";

export type SyncEvent = "trigger" | "fetched" | "done" | "partial" | "error" | "reset";

/**
 * Allowed transitions per job:
 *
 *   idle --trigger--> syncing --fetched--> matching --done--> idle
 *   syncing --error--> failed --reset--> idle
 *   matching --partial--> partial --reset--> idle
 *   matching --error--> failed
 */
export const SYNC_TRANSITIONS: Record<SyncState, Partial<Record<SyncEvent, SyncState>>> = {
  idle: { trigger: "syncing" },
  syncing: { fetched: "matching", error: "failed" },
  matching: { done: "idle", partial: "partial", error: "failed" },
  partial: { reset: "idle" },
  failed: { reset: "idle" },
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: SyncState, readonly event: SyncEvent) {
    super(`Illegal sync transition: ${event} from ${from}`);
    this.name = "IllegalTransitionError";
  }
}

export function nextState(from: SyncState, event: SyncEvent): SyncState {
  const to = SYNC_TRANSITIONS[from][event];
  if (!to) throw new IllegalTransitionError(from, event);
  return to;
}

/** Terminal states of a run; the next trigger starts from idle again. */
export function isTerminal(state: SyncState): boolean {
  return state === "partial" || state === "failed";
}

/**
 * Tracks one job's state and reports every transition to a listener
 * (the orchestrator persists each one to sync_metadata).
 */
export class SyncStateMachine {
  private current: SyncState;

  constructor(
    initial: SyncState = "idle",
    private readonly onTransition?: (from: SyncState, to: SyncState, event: SyncEvent) => Promise<void>,
  ) {
    this.current = initial;
  }

  get state(): SyncState {
    return this.current;
  }

  async send(event: SyncEvent): Promise<SyncState> {
    const from = this.current;
    const to = nextState(from, event);
    this.current = to;
    await this.onTransition?.(from, to, event);
    return to;
  }
}
