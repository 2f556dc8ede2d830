import { describe, expect, it } from "vitest";
import { IllegalTransitionError, SyncStateMachine, isTerminal, nextState } from "../state-machine";
import type { SyncState } from "../types";

describe("sync state machine", () => {
  it("walks a clean run back to idle", () => {
    let state: SyncState = "idle";
    for (const event of ["trigger", "fetched", "done"] as const) {
      state = nextState(state, event);
    }
    expect(state).toBe("idle");
  });

  it("ends a run with record failures in partial", () => {
    expect(nextState("matching", "partial")).toBe("partial");
    expect(nextState("partial", "reset")).toBe("idle");
  });

  it("fails from either working state", () => {
    expect(nextState("syncing", "error")).toBe("failed");
    expect(nextState("matching", "error")).toBe("failed");
  });

  it("rejects transitions that are not in the table", () => {
    expect(() => nextState("idle", "done")).toThrow(IllegalTransitionError);
    expect(() => nextState("failed", "trigger")).toThrow("Illegal sync transition: trigger from failed");
  });

  it("only treats partial and failed as terminal", () => {
    const states: SyncState[] = ["idle", "syncing", "matching", "partial", "failed"];
    expect(states.filter(isTerminal)).toEqual(["partial", "failed"]);
  });

  it("reports each transition to its listener", async () => {
    const seen: string[] = [];
    const machine = new SyncStateMachine("idle", async (from, to, event) => {
      seen.push(`${from}-${event}->${to}`);
    });

    await machine.send("trigger");
    await machine.send("error");

    expect(machine.state).toBe("failed");
    expect(seen).toEqual(["idle-trigger->syncing", "syncing-error->failed"]);
  });

  it("keeps its state when a transition is illegal", async () => {
    const machine = new SyncStateMachine("partial");

    await expect(machine.send("fetched")).rejects.toBeInstanceOf(IllegalTransitionError);
    expect(machine.state).toBe("partial");
  });
});
