// =============================================================================
// CircuitBreaker — One budgeted, traced run around a unit of work
// =============================================================================

import { createExporter } from "./adapters/exporter/index.js";
import { BudgetTracker } from "./budget/budget-tracker.js";
import { type TollgateConfig, type TraceExportKind, isExplicitlySet, loadConfig } from "./config.js";
import { BudgetExceededError, ValidationError, errorMessage } from "./errors.js";
import { Interceptor } from "./interceptor/interceptor.js";
import { configureLogging, createLogger } from "./logging.js";
import type { HookPointPort } from "./ports/interception.port.js";
import type { TraceExporterPort } from "./ports/trace-exporter.port.js";
import { PricingRegistry, type PricingRegistryOptions } from "./pricing/pricing-registry.js";
import { TokenCounter, type TokenCounterOptions } from "./tokens/token-counter.js";
import { TraceCollector } from "./trace/collector.js";
import { generateId } from "./trace/span.js";
import type { Trace } from "./trace/trace.js";

export type ExceedPolicy = "raise" | "return_undefined";

export type BreakerState = "idle" | "armed" | "executing" | "completed" | "aborted" | "torn_down";

export interface CircuitBreakerOptions {
  /** Dollar ceiling (default: config `defaultBudgetUsd`) */
  maxUsd?: number;
  /** Call-count ceiling (default: config `defaultMaxTurns`; `null` for none) */
  maxTurns?: number | null;
  /** What a budget breach does to the run's result (default: "raise") */
  onExceed?: ExceedPolicy;
  traceExport?: TraceExportKind;
  traceExportPath?: string;
  /** Replaces the exporter selected by `traceExport` */
  exporter?: TraceExporterPort;
  /** Call sites to intercept while the work runs */
  hooks?: readonly HookPointPort[];
  tokenCounter?: TokenCounterOptions;
  pricing?: PricingRegistryOptions;
  outputTokenRatio?: number;
  /** Config values that take precedence over the environment */
  config?: Partial<TollgateConfig>;
  env?: NodeJS.ProcessEnv;
}

/** Handed to the work so it can meter calls that do not pass through a hook. */
export interface RunContext {
  readonly runId: string;
  readonly tracker: BudgetTracker;
  readonly pricing: PricingRegistry;
  readonly interceptor: Interceptor;
}

interface ArmedRun {
  context: RunContext;
  collector: TraceCollector;
  exporter: TraceExporterPort | null;
}

const logger = createLogger("circuit-breaker");

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export function generateRunId(): string {
  return `run-${generateId().slice(0, 8)}`;
}

export class CircuitBreaker {
  private current: BreakerState = "idle";
  private lastRun: { runId: string; trace: Trace | undefined } | undefined;

  constructor(private readonly options: CircuitBreakerOptions = {}) {}

  get state(): BreakerState {
    return this.current;
  }

  get lastRunId(): string | undefined {
    return this.lastRun?.runId;
  }

  /** Trace of the most recent run, as handed to the exporter. */
  get lastTrace(): Trace | undefined {
    return this.lastRun?.trace;
  }

  /**
   * Run `work`, whether it returns a value or a promise. Resolves to
   * `undefined` when the budget is exceeded under `onExceed: "return_undefined"`.
   */
  async run<T>(work: (ctx: RunContext) => T | Promise<T>): Promise<T | undefined> {
    const armed = this.arm();
    try {
      armed.context.interceptor.activate(this.options.hooks);
      this.transition(armed, "executing");
      const result = await work(armed.context);
      this.transition(armed, "completed");
      return result;
    } catch (error) {
      this.transition(armed, "aborted");
      return this.applyExceedPolicy(error);
    } finally {
      this.tearDown(armed);
    }
  }

  /**
   * Synchronous counterpart of {@link run}. Work that returns a promise fails
   * with `ValidationError`, since hooks are restored before it could settle.
   */
  runSync<T>(work: (ctx: RunContext) => T): T | undefined {
    const armed = this.arm();
    try {
      armed.context.interceptor.activate(this.options.hooks);
      this.transition(armed, "executing");
      const result = work(armed.context);
      if (isThenable(result)) {
        const { runId } = armed.context;
        result.then(undefined, (error: unknown) => {
          logger.error("run-sync:async-work-failed", { runId, error: errorMessage(error) });
        });
        throw new ValidationError("must not return a promise; use run() for async work", "work");
      }
      this.transition(armed, "completed");
      return result;
    } catch (error) {
      this.transition(armed, "aborted");
      return this.applyExceedPolicy(error);
    } finally {
      this.tearDown(armed);
    }
  }

  private arm(): ArmedRun {
    if (this.current !== "idle" && this.current !== "torn_down") {
      throw new ValidationError(`a run is already in progress (state: ${this.current})`, "state");
    }

    const { options } = this;
    const config = loadConfig(
      { ...options.config, traceExport: options.traceExport, traceExportPath: options.traceExportPath },
      options.env,
    );
    // Leave a level the host configured alone unless one was asked for here
    if (isExplicitlySet("logLevel", options.config, options.env)) {
      configureLogging({ level: config.logLevel });
    }

    const runId = generateRunId();
    const maxTurns = options.maxTurns === null ? undefined : options.maxTurns ?? config.defaultMaxTurns;
    const tracker = new BudgetTracker(runId, options.maxUsd ?? config.defaultBudgetUsd, maxTurns);
    const tokenCounter = new TokenCounter({ backend: config.tokenCounterBackend, ...options.tokenCounter });
    const pricing = new PricingRegistry({ source: config.pricingSource, ...options.pricing });
    const collector = new TraceCollector();
    const interceptor = new Interceptor({
      tracker,
      tokenCounter,
      pricing,
      collector,
      outputTokenRatio: options.outputTokenRatio,
    });

    const exporter =
      config.traceExport === "none"
        ? null
        : options.exporter ?? createExporter(config.traceExport, config.traceExportPath);

    collector.startTrace(runId, tracker.summary());

    const armed: ArmedRun = { context: { runId, tracker, pricing, interceptor }, collector, exporter };
    this.transition(armed, "armed");
    return armed;
  }

  private applyExceedPolicy(error: unknown): undefined {
    if (error instanceof BudgetExceededError && this.options.onExceed === "return_undefined") {
      logger.warn("budget:exceeded", { runId: error.runId, spentUsd: error.spentUsd, budgetUsd: error.budgetUsd });
      return undefined;
    }
    throw error;
  }

  private tearDown(armed: ArmedRun): void {
    const { runId, interceptor, tracker } = armed.context;
    try {
      interceptor.deactivate();
    } catch (error) {
      logger.error("teardown:deactivate-failed", { runId, error: errorMessage(error) });
    }

    const trace = armed.collector.endTrace(tracker.summary());
    this.lastRun = { runId, trace };

    if (trace && armed.exporter) {
      try {
        armed.exporter.export(trace);
      } catch (error) {
        logger.error("teardown:export-failed", { runId, error: errorMessage(error) });
      }
    }
    this.transition(armed, "torn_down");
  }

  private transition(armed: ArmedRun, next: BreakerState): void {
    logger.debug("state", { runId: armed.context.runId, from: this.current, to: next });
    this.current = next;
  }
}

/**
 * Wrap `fn` so every call runs under its own budget:
 *
 * ```ts
 * const guarded = enforceBudget({ maxUsd: 0.5, maxTurns: 10 })(researchTopic);
 * const summary = await guarded("solar sails");
 * ```
 */
export function enforceBudget(options: CircuitBreakerOptions = {}) {
  return <A extends unknown[], R>(fn: (...args: A) => R | Promise<R>) =>
    (...args: A): Promise<R | undefined> =>
      new CircuitBreaker(options).run(() => fn(...args));
}

/** Synchronous counterpart of {@link enforceBudget}, built on {@link CircuitBreaker.runSync}. */
export function enforceBudgetSync(options: CircuitBreakerOptions = {}) {
  return <A extends unknown[], R>(fn: (...args: A) => R) =>
    (...args: A): R | undefined =>
      new CircuitBreaker(options).runSync(() => fn(...args));
}
