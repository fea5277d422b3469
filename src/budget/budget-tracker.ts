// =============================================================================
// BudgetTracker — Per-run spend and call-count ledger
// =============================================================================

import { BudgetExceededError, TurnLimitError, ValidationError } from "../errors.js";

export interface CallRecord {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly model: string;
  readonly costUsd: number;
  readonly durationMs: number;
}

export interface BudgetSummary {
  runId: string;
  budgetUsd: number;
  spentUsd: number;
  remainingUsd: number;
  turnCount: number;
  calls: CallRecord[];
}

/**
 * Admission is checked with {@link BudgetTracker.preCheck} before a call runs;
 * {@link BudgetTracker.recordCall} commits the actual cost afterwards and clamps
 * spend to the ceiling instead of rejecting.
 *
 * Every reader and mutator runs inside {@link BudgetTracker.critical}. Sections
 * are synchronous, so concurrent callers can only interleave between them,
 * never inside one, and no section is held across an awaited invocation.
 */
export class BudgetTracker {
  readonly runId: string;
  readonly maxUsd: number;
  readonly maxTurns: number | undefined;

  private spent = 0;
  private turns = 0;
  private readonly calls: CallRecord[] = [];
  private locked = false;

  constructor(runId: string, maxUsd: number, maxTurns?: number) {
    if (!Number.isFinite(maxUsd) || maxUsd < 0) {
      throw new ValidationError("must be a non-negative number", "maxUsd");
    }
    if (maxTurns !== undefined && (!Number.isInteger(maxTurns) || maxTurns < 0)) {
      throw new ValidationError("must be a non-negative integer", "maxTurns");
    }
    this.runId = runId;
    this.maxUsd = maxUsd;
    this.maxTurns = maxTurns;
  }

  get spentUsd(): number {
    return this.critical(() => this.spent);
  }

  get remainingUsd(): number {
    return this.critical(() => Math.max(0, this.maxUsd - this.spent));
  }

  get turnCount(): number {
    return this.critical(() => this.turns);
  }

  get isExceeded(): boolean {
    return this.critical(() => this.spent >= this.maxUsd);
  }

  /** Throws when `spent + estimatedCost` reaches the ceiling. Never mutates. */
  preCheck(estimatedCost: number, model = "unknown"): void {
    this.critical(() => {
      const projected = this.spent + estimatedCost;
      if (projected >= this.maxUsd) {
        throw new BudgetExceededError(this.runId, this.maxUsd, projected, model);
      }
    });
  }

  recordCall(
    inputTokens: number,
    outputTokens: number,
    model: string,
    costUsd: number,
    durationMs: number,
  ): void {
    if (!(costUsd >= 0)) {
      throw new ValidationError("must be non-negative", "costUsd");
    }

    this.critical(() => {
      if (this.maxTurns !== undefined && this.turns >= this.maxTurns) {
        throw new TurnLimitError(this.runId, this.maxTurns, this.turns + 1);
      }

      this.spent += costUsd;
      this.turns += 1;
      if (this.spent > this.maxUsd) this.spent = this.maxUsd;

      this.calls.push(Object.freeze({ inputTokens, outputTokens, model, costUsd, durationMs }));
    });
  }

  summary(): BudgetSummary {
    return this.critical(() => ({
      runId: this.runId,
      budgetUsd: this.maxUsd,
      spentUsd: this.spent,
      remainingUsd: Math.max(0, this.maxUsd - this.spent),
      turnCount: this.turns,
      calls: [...this.calls],
    }));
  }

  private critical<T>(section: () => T): T {
    if (this.locked) {
      throw new Error(`BudgetTracker ${this.runId}: re-entrant access to the ledger`);
    }
    this.locked = true;
    try {
      return section();
    } finally {
      this.locked = false;
    }
  }
}
