// =============================================================================
// TraceCollector — Active-trace lifecycle for one run
// =============================================================================

import type { BudgetSummary } from "../budget/budget-tracker.js";
import { ValidationError } from "../errors.js";
import type { Span } from "./span.js";
import { Trace } from "./trace.js";

export class TraceCollector {
  private current: Trace | null = null;

  startTrace(runId: string, budgetSummary: BudgetSummary | null = null): Trace {
    if (this.current) {
      throw new ValidationError(`trace ${this.current.runId} is still active`, "runId");
    }
    this.current = new Trace(runId, budgetSummary);
    return this.current;
  }

  /** Spans arriving while no trace is active are dropped. */
  addSpan(span: Span): void {
    this.current?.addSpan(span);
  }

  /** Ends the active trace, recording `finalBudgetSummary` when given. */
  endTrace(finalBudgetSummary?: BudgetSummary): Trace | undefined {
    const trace = this.current;
    if (!trace) return undefined;
    trace.finish(new Date(), finalBudgetSummary);
    this.current = null;
    return trace;
  }

  getCurrentTrace(): Trace | undefined {
    return this.current ?? undefined;
  }
}
