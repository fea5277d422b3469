// =============================================================================
// Trace — Ordered spans and aggregate metrics for one run
// =============================================================================

import type { BudgetSummary } from "../budget/budget-tracker.js";
import { ValidationError } from "../errors.js";
import type { BudgetSummaryDocument, TraceDocument } from "./schema.js";
import { Span } from "./span.js";

export class Trace {
  readonly runId: string;
  /** Budget summary as it stood when the trace started */
  readonly budgetSummary: BudgetSummary | null;
  readonly startTime: Date;
  private finalSummary: BudgetSummary | null = null;
  private readonly spanList: Span[] = [];
  private finishedAt: Date | null = null;

  constructor(runId: string, budgetSummary: BudgetSummary | null = null, startTime: Date = new Date()) {
    this.runId = runId;
    this.budgetSummary = budgetSummary;
    this.startTime = startTime;
  }

  /** Budget summary recorded when the trace ended, if one was given */
  get finalBudgetSummary(): BudgetSummary | null {
    return this.finalSummary;
  }

  get spans(): readonly Span[] {
    return this.spanList;
  }

  get endTime(): Date | null {
    return this.finishedAt;
  }

  get totalCost(): number {
    return this.spanList.reduce((sum, span) => sum + (span.costUsd ?? 0), 0);
  }

  get totalInputTokens(): number {
    return this.spanList.reduce((sum, span) => sum + (span.inputTokens ?? 0), 0);
  }

  get totalOutputTokens(): number {
    return this.spanList.reduce((sum, span) => sum + (span.outputTokens ?? 0), 0);
  }

  addSpan(span: Span): void {
    this.spanList.push(span);
  }

  finish(at: Date = new Date(), finalBudgetSummary?: BudgetSummary): void {
    if (this.finishedAt) {
      throw new ValidationError(`trace ${this.runId} already ended`, "endTime");
    }
    this.finishedAt = at;
    if (finalBudgetSummary) this.finalSummary = finalBudgetSummary;
  }

  toJSON(): TraceDocument {
    return {
      run_id: this.runId,
      spans: this.spanList.map((span) => span.toJSON()),
      budget_summary: this.budgetSummary ? summaryToDocument(this.budgetSummary) : null,
      final_budget_summary: this.finalSummary ? summaryToDocument(this.finalSummary) : null,
      start_time: this.startTime.toISOString(),
      end_time: this.finishedAt ? this.finishedAt.toISOString() : null,
      total_cost: this.totalCost,
      total_input_tokens: this.totalInputTokens,
      total_output_tokens: this.totalOutputTokens,
    };
  }

  static fromJSON(doc: TraceDocument): Trace {
    const trace = new Trace(
      doc.run_id,
      doc.budget_summary ? summaryFromDocument(doc.budget_summary) : null,
      new Date(doc.start_time),
    );
    for (const span of doc.spans) trace.addSpan(Span.fromJSON(span));
    if (doc.end_time) {
      const final = doc.final_budget_summary ? summaryFromDocument(doc.final_budget_summary) : undefined;
      trace.finish(new Date(doc.end_time), final);
    }
    return trace;
  }
}

function summaryToDocument(summary: BudgetSummary): BudgetSummaryDocument {
  return {
    run_id: summary.runId,
    budget_usd: summary.budgetUsd,
    spent_usd: summary.spentUsd,
    remaining_usd: summary.remainingUsd,
    turn_count: summary.turnCount,
    calls: summary.calls.map((call) => ({
      input_tokens: call.inputTokens,
      output_tokens: call.outputTokens,
      model: call.model,
      cost_usd: call.costUsd,
      duration_ms: call.durationMs,
    })),
  };
}

function summaryFromDocument(doc: BudgetSummaryDocument): BudgetSummary {
  return {
    runId: doc.run_id,
    budgetUsd: doc.budget_usd,
    spentUsd: doc.spent_usd,
    remainingUsd: doc.remaining_usd,
    turnCount: doc.turn_count,
    calls: doc.calls.map((call) => ({
      inputTokens: call.input_tokens,
      outputTokens: call.output_tokens,
      model: call.model,
      costUsd: call.cost_usd,
      durationMs: call.duration_ms,
    })),
  };
}
