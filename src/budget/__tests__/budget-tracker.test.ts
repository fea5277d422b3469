import { describe, it, expect } from "vitest";
import { BudgetTracker } from "../budget-tracker.js";
import { BudgetExceededError, TurnLimitError, ValidationError } from "../../errors.js";

describe("BudgetTracker", () => {
  it("accumulates committed costs and counts turns", () => {
    const tracker = new BudgetTracker("run-a", 5);
    tracker.recordCall(100, 50, "gpt-4o", 0.1, 12);
    tracker.recordCall(200, 80, "gpt-4o", 0.2, 15);
    tracker.recordCall(300, 90, "gpt-4o-mini", 0.3, 9);

    expect(tracker.spentUsd).toBeCloseTo(0.6, 10);
    expect(tracker.turnCount).toBe(3);
    expect(tracker.remainingUsd).toBeCloseTo(4.4, 10);
    expect(tracker.isExceeded).toBe(false);
  });

  it("clamps spend to the ceiling instead of rejecting an overshooting commit", () => {
    const tracker = new BudgetTracker("run-a", 1);
    tracker.recordCall(10, 10, "gpt-4o", 0.7, 1);
    tracker.recordCall(10, 10, "gpt-4o", 0.5, 1);

    expect(tracker.spentUsd).toBe(1);
    expect(tracker.remainingUsd).toBe(0);
    expect(tracker.turnCount).toBe(2);
    expect(tracker.isExceeded).toBe(true);
    // The record keeps the reported cost; only the running total is clamped
    expect(tracker.summary().calls[1].costUsd).toBe(0.5);
  });

  describe("preCheck", () => {
    it("rejects an estimate equal to the remaining budget", () => {
      const tracker = new BudgetTracker("run-a", 1);
      tracker.recordCall(1, 1, "gpt-4o", 0.5, 1);

      expect(() => tracker.preCheck(0.5, "gpt-4o")).toThrow(BudgetExceededError);
      expect(() => tracker.preCheck(0.49, "gpt-4o")).not.toThrow();
    });

    it("carries the run, ceiling, projected spend and model", () => {
      const tracker = new BudgetTracker("run-b", 2);
      tracker.recordCall(1, 1, "gpt-4o", 1.95, 1);

      let caught: unknown;
      try {
        tracker.preCheck(0.1, "claude-3-haiku");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(BudgetExceededError);
      expect(caught).toMatchObject({
        code: "BUDGET_EXCEEDED",
        runId: "run-b",
        budgetUsd: 2,
        spentUsd: expect.closeTo(2.05, 10),
        lastModel: "claude-3-haiku",
      });
      expect(tracker.spentUsd).toBe(1.95);
      expect(tracker.turnCount).toBe(1);
    });

    it("defaults the model to unknown", () => {
      const tracker = new BudgetTracker("run-a", 0.1);
      let caught: unknown;
      try {
        tracker.preCheck(1);
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ lastModel: "unknown" });
    });

    it("rejects everything under a zero ceiling", () => {
      const tracker = new BudgetTracker("run-zero", 0);
      expect(tracker.isExceeded).toBe(true);
      expect(() => tracker.preCheck(0)).toThrow(BudgetExceededError);
    });
  });

  it("rejects a negative cost and leaves the ledger unchanged", () => {
    const tracker = new BudgetTracker("run-a", 1);
    tracker.recordCall(1, 1, "gpt-4o", 0.25, 1);

    expect(() => tracker.recordCall(1, 1, "gpt-4o", -0.01, 1)).toThrow(ValidationError);
    expect(tracker.spentUsd).toBe(0.25);
    expect(tracker.turnCount).toBe(1);
    expect(tracker.summary().calls).toHaveLength(1);
  });

  it("refuses the commit after max turns with the attempted turn number", () => {
    const tracker = new BudgetTracker("run-t", 10, 3);
    for (let i = 0; i < 3; i++) tracker.recordCall(1, 1, "gpt-4o", 0.1, 1);

    let caught: unknown;
    try {
      tracker.recordCall(1, 1, "gpt-4o", 0.1, 1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TurnLimitError);
    expect(caught).toMatchObject({ code: "TURN_LIMIT_EXCEEDED", currentTurn: 4, maxTurns: 3, runId: "run-t" });
    expect(tracker.turnCount).toBe(3);
    expect(tracker.spentUsd).toBeCloseTo(0.3, 10);
    expect(tracker.summary().calls).toHaveLength(3);
  });

  it("returns point-in-time summaries", () => {
    const tracker = new BudgetTracker("run-s", 3, 5);
    tracker.recordCall(120, 40, "gpt-4o", 0.5, 20);
    const before = tracker.summary();
    tracker.recordCall(80, 10, "gpt-4o", 0.25, 30);

    expect(before).toEqual({
      runId: "run-s",
      budgetUsd: 3,
      spentUsd: 0.5,
      remainingUsd: 2.5,
      turnCount: 1,
      calls: [{ inputTokens: 120, outputTokens: 40, model: "gpt-4o", costUsd: 0.5, durationMs: 20 }],
    });
    expect(tracker.summary().calls).toHaveLength(2);
    expect(Object.isFrozen(tracker.summary().calls[0])).toBe(true);
  });

  it("validates its limits", () => {
    expect(() => new BudgetTracker("run-a", -1)).toThrow(ValidationError);
    expect(() => new BudgetTracker("run-a", 1, 1.5)).toThrow(ValidationError);
    expect(() => new BudgetTracker("run-a", 1, -2)).toThrow(ValidationError);
  });

  describe("concurrent commits", () => {
    async function burst(tracker: BudgetTracker, workers: number, callsEach: number, cost: number) {
      await Promise.all(
        Array.from({ length: workers }, async (_, w) => {
          for (let k = 0; k < callsEach; k++) {
            // Yield between admission and commit, as an awaited model call would
            tracker.preCheck(0, `model-${w}`);
            await new Promise<void>((resolve) => setTimeout(resolve, (w + k) % 3));
            tracker.recordCall(1, 1, `model-${w}`, cost, 1);
          }
        }),
      );
    }

    it("loses no update across interleaved workers", async () => {
      const tracker = new BudgetTracker("run-c", 100);
      await burst(tracker, 10, 20, 0.01);

      expect(tracker.turnCount).toBe(200);
      expect(tracker.spentUsd).toBeCloseTo(2, 9);
      expect(tracker.summary().calls).toHaveLength(200);
    });

    it("clamps a concurrent burst to the ceiling", async () => {
      const tracker = new BudgetTracker("run-c", 1);
      const workers = Array.from({ length: 8 }, async () => {
        for (let k = 0; k < 10; k++) {
          await Promise.resolve();
          tracker.recordCall(1, 1, "gpt-4o", 0.05, 1);
        }
      });
      await Promise.all(workers);

      expect(tracker.spentUsd).toBe(1);
      expect(tracker.turnCount).toBe(80);
    });
  });
});
