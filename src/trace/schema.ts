// =============================================================================
// Trace Schema — Exported trace document shape
// =============================================================================

import { z } from "zod";

export const SpanStatusSchema = z.enum(["ok", "error"]);

export const SpanDocumentSchema = z.object({
  span_id: z.string(),
  parent_span_id: z.string().nullable(),
  run_id: z.string(),
  timestamp: z.string().datetime(),
  duration_ms: z.number().nonnegative(),
  span_type: z.string(),
  model: z.string().nullable(),
  input_tokens: z.number().int().nonnegative().nullable(),
  output_tokens: z.number().int().nonnegative().nullable(),
  cost_usd: z.number().nonnegative().nullable(),
  status: SpanStatusSchema,
  metadata: z.record(z.unknown()),
  input_preview: z.string().nullable(),
  output_preview: z.string().nullable(),
});

export type SpanDocument = z.infer<typeof SpanDocumentSchema>;

export const CallRecordDocumentSchema = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
  model: z.string(),
  cost_usd: z.number(),
  duration_ms: z.number(),
});

export const BudgetSummaryDocumentSchema = z.object({
  run_id: z.string(),
  budget_usd: z.number(),
  spent_usd: z.number(),
  remaining_usd: z.number(),
  turn_count: z.number().int(),
  calls: z.array(CallRecordDocumentSchema),
});

export type BudgetSummaryDocument = z.infer<typeof BudgetSummaryDocumentSchema>;

export const TraceDocumentSchema = z.object({
  run_id: z.string(),
  spans: z.array(SpanDocumentSchema),
  budget_summary: BudgetSummaryDocumentSchema.nullable(),
  final_budget_summary: BudgetSummaryDocumentSchema.nullable().default(null),
  start_time: z.string().datetime(),
  end_time: z.string().datetime().nullable(),
  total_cost: z.number(),
  total_input_tokens: z.number(),
  total_output_tokens: z.number(),
});

export type TraceDocument = z.infer<typeof TraceDocumentSchema>;

export function parseTraceDocument(raw: unknown): TraceDocument {
  return TraceDocumentSchema.parse(raw);
}
