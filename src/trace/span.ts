// =============================================================================
// Span — One observed call attempt
// =============================================================================

import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors.js";
import type { SpanDocument } from "./schema.js";

export const MAX_PREVIEW_LENGTH = 200;
export const PREVIEW_ELLIPSIS = "...";

export type SpanStatus = "ok" | "error";

export interface SpanFields {
  durationMs: number;
  spanType: string;
  model?: string;
  inputTokens?: number;
  outputTokens?: number;
  costUsd?: number;
  status: SpanStatus;
  metadata: Record<string, unknown>;
  inputPreview?: string;
  outputPreview?: string;
}

export interface SpanInit extends Partial<SpanFields> {
  spanId?: string;
  parentSpanId?: string;
  runId?: string;
  timestamp?: Date;
}

export type SpanUpdate = Partial<SpanFields>;

export function generateId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 16);
}

export function truncatePreview(text: string | undefined): string | undefined {
  if (text === undefined || text.length <= MAX_PREVIEW_LENGTH) return text;
  // Never split a surrogate pair
  const last = text.charCodeAt(MAX_PREVIEW_LENGTH - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? MAX_PREVIEW_LENGTH - 1 : MAX_PREVIEW_LENGTH;
  return text.slice(0, end) + PREVIEW_ELLIPSIS;
}

/**
 * Fields stay writable through {@link Span.update} while the call is in flight;
 * {@link Span.close} freezes them.
 */
export class Span {
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly runId: string;
  readonly timestamp: Date;
  private fields: SpanFields;
  private closed = false;

  constructor(init: SpanInit = {}) {
    this.spanId = init.spanId ?? generateId();
    this.parentSpanId = init.parentSpanId;
    this.runId = init.runId ?? "";
    this.timestamp = init.timestamp ?? new Date();
    this.fields = {
      durationMs: init.durationMs ?? 0,
      spanType: init.spanType ?? "call",
      model: init.model,
      inputTokens: init.inputTokens,
      outputTokens: init.outputTokens,
      costUsd: init.costUsd,
      status: init.status ?? "ok",
      metadata: { ...init.metadata },
      inputPreview: truncatePreview(init.inputPreview),
      outputPreview: truncatePreview(init.outputPreview),
    };
  }

  get durationMs(): number { return this.fields.durationMs; }
  get spanType(): string { return this.fields.spanType; }
  get model(): string | undefined { return this.fields.model; }
  get inputTokens(): number | undefined { return this.fields.inputTokens; }
  get outputTokens(): number | undefined { return this.fields.outputTokens; }
  get costUsd(): number | undefined { return this.fields.costUsd; }
  get status(): SpanStatus { return this.fields.status; }
  get metadata(): Readonly<Record<string, unknown>> { return this.fields.metadata; }
  get inputPreview(): string | undefined { return this.fields.inputPreview; }
  get outputPreview(): string | undefined { return this.fields.outputPreview; }
  get isClosed(): boolean { return this.closed; }

  update(patch: SpanUpdate): this {
    if (this.closed) {
      throw new ValidationError(`span ${this.spanId} is closed`, "span");
    }
    const { metadata, inputPreview, outputPreview, ...rest } = patch;
    this.fields = {
      ...this.fields,
      ...rest,
      metadata: metadata ? { ...this.fields.metadata, ...metadata } : this.fields.metadata,
      inputPreview: "inputPreview" in patch ? truncatePreview(inputPreview) : this.fields.inputPreview,
      outputPreview: "outputPreview" in patch ? truncatePreview(outputPreview) : this.fields.outputPreview,
    };
    return this;
  }

  close(patch: SpanUpdate = {}): this {
    this.update(patch);
    this.closed = true;
    return this;
  }

  toJSON(): SpanDocument {
    return {
      span_id: this.spanId,
      parent_span_id: this.parentSpanId ?? null,
      run_id: this.runId,
      timestamp: this.timestamp.toISOString(),
      duration_ms: this.durationMs,
      span_type: this.spanType,
      model: this.model ?? null,
      input_tokens: this.inputTokens ?? null,
      output_tokens: this.outputTokens ?? null,
      cost_usd: this.costUsd ?? null,
      status: this.status,
      metadata: { ...this.metadata },
      input_preview: this.inputPreview ?? null,
      output_preview: this.outputPreview ?? null,
    };
  }

  static fromJSON(doc: SpanDocument): Span {
    return new Span({
      spanId: doc.span_id,
      parentSpanId: doc.parent_span_id ?? undefined,
      runId: doc.run_id,
      timestamp: new Date(doc.timestamp),
      durationMs: doc.duration_ms,
      spanType: doc.span_type,
      model: doc.model ?? undefined,
      inputTokens: doc.input_tokens ?? undefined,
      outputTokens: doc.output_tokens ?? undefined,
      costUsd: doc.cost_usd ?? undefined,
      status: doc.status,
      metadata: doc.metadata,
      inputPreview: doc.input_preview ?? undefined,
      outputPreview: doc.output_preview ?? undefined,
    }).close();
  }
}
