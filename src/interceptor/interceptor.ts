// =============================================================================
// Interceptor — Estimate, admit, invoke, commit and trace one metered call
// =============================================================================

import type { BudgetTracker } from "../budget/budget-tracker.js";
import { InterceptionError, errorMessage } from "../errors.js";
import { createLogger } from "../logging.js";
import type { HookPointPort } from "../ports/interception.port.js";
import type { PricingRegistry } from "../pricing/pricing-registry.js";
import type { TokenCounter } from "../tokens/token-counter.js";
import type { TraceCollector } from "../trace/collector.js";
import { Span } from "../trace/span.js";
import { claimHookPoint, releaseHookPoint } from "./activation-guard.js";
import { type CallRequest, readCallRequest, readOutputText, readUsage } from "./payload.js";

/**
 * Output tokens projected before a call, as a multiple of its input tokens.
 * Completion length is unknown until the call returns; this is a tunable guess,
 * not a measured ratio.
 */
export const DEFAULT_OUTPUT_TOKEN_RATIO = 1;

export const LLM_CALL_SPAN = "llm_call";

const logger = createLogger("interceptor");

export interface InterceptorOptions {
  tracker: BudgetTracker;
  tokenCounter: TokenCounter;
  pricing: PricingRegistry;
  collector: TraceCollector;
  outputTokenRatio?: number;
  /** Parent recorded on every span this interceptor opens */
  parentSpanId?: string;
}

interface AdmittedCall {
  model: string;
  span: Span;
  startedAt: number;
  estimatedInputTokens: number;
}

export class Interceptor {
  private readonly tracker: BudgetTracker;
  private readonly tokenCounter: TokenCounter;
  private readonly pricing: PricingRegistry;
  private readonly collector: TraceCollector;
  private readonly outputTokenRatio: number;
  private readonly parentSpanId?: string;
  private installed: HookPointPort[] = [];
  private active = false;

  constructor(options: InterceptorOptions) {
    this.tracker = options.tracker;
    this.tokenCounter = options.tokenCounter;
    this.pricing = options.pricing;
    this.collector = options.collector;
    this.outputTokenRatio = options.outputTokenRatio ?? DEFAULT_OUTPUT_TOKEN_RATIO;
    this.parentSpanId = options.parentSpanId;
  }

  get isActive(): boolean {
    return this.active;
  }

  // ── Hook lifecycle ──────────────────────────────────────────────────────

  /**
   * Claims every hook point, then installs them. A hook point held by another
   * interceptor fails the whole activation before anything is patched.
   */
  activate(hooks: readonly HookPointPort[] = []): void {
    if (this.active) throw new InterceptionError("Interceptor is already active");

    const claimed: HookPointPort[] = [];
    try {
      for (const hook of hooks) {
        claimHookPoint(hook.id, this);
        claimed.push(hook);
      }
    } catch (error) {
      for (const hook of claimed) releaseHookPoint(hook.id, this);
      throw error;
    }

    this.active = true;
    try {
      for (const hook of hooks) {
        hook.install((call) => {
          const request = readCallRequest(call.args);
          return hook.mode === "async"
            ? this.intercept(request, async () => call.invoke())
            : this.interceptSync(request, call.invoke);
        });
        this.installed.push(hook);
      }
    } catch (error) {
      this.deactivate(hooks);
      throw error;
    }
    logger.debug("activated", { runId: this.tracker.runId, hooks: hooks.map((h) => h.id) });
  }

  /** Restores every hook point and releases every claim, even if an uninstall throws. */
  deactivate(claimed: readonly HookPointPort[] = this.installed): void {
    if (!this.active) return;
    let firstError: unknown;
    for (const hook of claimed) {
      try {
        hook.uninstall();
      } catch (error) {
        firstError ??= error;
        logger.error("uninstall:failed", { hook: hook.id, error: errorMessage(error) });
      } finally {
        releaseHookPoint(hook.id, this);
      }
    }
    this.installed = [];
    this.active = false;
    if (firstError !== undefined) throw firstError;
  }

  // ── Call paths ──────────────────────────────────────────────────────────

  /** Meter one promise-returning operation. */
  async intercept<R>(request: CallRequest, invoke: () => Promise<R> | R): Promise<R> {
    const call = this.admit(request);
    let response: R;
    try {
      response = await invoke();
    } catch (error) {
      this.fail(call, error);
      throw error;
    }
    this.complete(call, response);
    return response;
  }

  /** Meter one synchronous operation. */
  interceptSync<R>(request: CallRequest, invoke: () => R): R {
    const call = this.admit(request);
    let response: R;
    try {
      response = invoke();
    } catch (error) {
      this.fail(call, error);
      throw error;
    }
    this.complete(call, response);
    return response;
  }

  /** Record a call whose usage is already known. Returns its cost. */
  trackCall(model: string, inputTokens: number, outputTokens: number): number {
    const costUsd = this.price(model, inputTokens, outputTokens);
    this.tracker.preCheck(costUsd, model);
    this.tracker.recordCall(inputTokens, outputTokens, model, costUsd, 0);
    this.collector.addSpan(
      new Span({
        runId: this.tracker.runId,
        parentSpanId: this.parentSpanId,
        spanType: LLM_CALL_SPAN,
        model,
        inputTokens,
        outputTokens,
        costUsd,
        status: "ok",
        metadata: { manual: true },
      }).close(),
    );
    return costUsd;
  }

  // ── Steps ───────────────────────────────────────────────────────────────

  private admit(request: CallRequest): AdmittedCall {
    const startedAt = performance.now();
    const { model, messages } = request;

    const estimatedInputTokens = this.estimateInputTokens(request);
    const projectedOutputTokens = Math.round(estimatedInputTokens * this.outputTokenRatio);
    const estimatedCostUsd = this.price(model, estimatedInputTokens, projectedOutputTokens);

    this.tracker.preCheck(estimatedCostUsd, model);

    const span = new Span({
      runId: this.tracker.runId,
      parentSpanId: this.parentSpanId,
      spanType: LLM_CALL_SPAN,
      model,
      inputTokens: estimatedInputTokens,
      inputPreview: messages[0]?.content,
      metadata: { estimatedInputTokens, estimatedCostUsd },
    });
    this.collector.addSpan(span);

    return { model, span, startedAt, estimatedInputTokens };
  }

  private fail(call: AdmittedCall, error: unknown): void {
    call.span.close({
      status: "error",
      durationMs: performance.now() - call.startedAt,
      metadata: { error: errorMessage(error) },
    });
  }

  private complete(call: AdmittedCall, response: unknown): void {
    const durationMs = performance.now() - call.startedAt;
    const usage = readUsage(response);
    const inputTokens = usage?.inputTokens ?? call.estimatedInputTokens;
    const outputTokens = usage?.outputTokens ?? 0;
    const costUsd = this.price(call.model, inputTokens, outputTokens);

    const actual = {
      inputTokens,
      outputTokens,
      costUsd,
      durationMs,
      outputPreview: readOutputText(response),
    };

    try {
      this.tracker.recordCall(inputTokens, outputTokens, call.model, costUsd, durationMs);
    } catch (error) {
      call.span.close({ ...actual, status: "error", metadata: { error: errorMessage(error) } });
      throw error;
    }
    call.span.close({ ...actual, status: "ok", metadata: { usageReported: usage !== undefined } });
  }

  private estimateInputTokens(request: CallRequest): number {
    try {
      return this.tokenCounter.countMessages(request.messages, request.model);
    } catch (error) {
      logger.warn("estimate:tokens-failed", { model: request.model, error: errorMessage(error) });
      return 0;
    }
  }

  /** Cost of a call, or 0 when no pricing source knows the model. */
  private price(model: string, inputTokens: number, outputTokens: number): number {
    try {
      return this.pricing.estimateCallCost(model, inputTokens, outputTokens);
    } catch (error) {
      logger.warn("pricing:failed", { model, error: errorMessage(error), fallback: 0 });
      return 0;
    }
  }
}
