// =============================================================================
// tollgate — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Orchestration
// ─────────────────────────────────────────────────────────────────────────────

export {
  CircuitBreaker,
  enforceBudget,
  enforceBudgetSync,
  generateRunId,
  type BreakerState,
  type CircuitBreakerOptions,
  type ExceedPolicy,
  type RunContext,
} from "./circuit-breaker.js";

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export { BudgetTracker, type BudgetSummary, type CallRecord } from "./budget/budget-tracker.js";
export { PricingRegistry, type PricingRegistryOptions } from "./pricing/pricing-registry.js";
export { BUNDLED_PRICING, MODEL_ALIASES } from "./pricing/bundled.js";
export {
  TokenCounter,
  countTokens,
  countMessages,
  DEFAULT_COUNT_MODEL,
  type TokenCounterOptions,
} from "./tokens/token-counter.js";
export {
  Interceptor,
  DEFAULT_OUTPUT_TOKEN_RATIO,
  LLM_CALL_SPAN,
  type InterceptorOptions,
} from "./interceptor/interceptor.js";
export {
  readCallRequest,
  readUsage,
  readOutputText,
  type CallRequest,
  type ReportedUsage,
} from "./interceptor/payload.js";
export { isHookPointClaimed } from "./interceptor/activation-guard.js";

// ─────────────────────────────────────────────────────────────────────────────
// Tracing
// ─────────────────────────────────────────────────────────────────────────────

export {
  Span,
  MAX_PREVIEW_LENGTH,
  PREVIEW_ELLIPSIS,
  truncatePreview,
  type SpanInit,
  type SpanStatus,
  type SpanUpdate,
} from "./trace/span.js";
export { Trace } from "./trace/trace.js";
export { TraceCollector } from "./trace/collector.js";
export {
  TraceDocumentSchema,
  SpanDocumentSchema,
  parseTraceDocument,
  type TraceDocument,
  type SpanDocument,
} from "./trace/schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports & adapters
// ─────────────────────────────────────────────────────────────────────────────

export type { ChatMessage, TokenEstimatorPort } from "./ports/token-counter.port.js";
export type { PricingSourcePort, PriceDirection } from "./ports/pricing-source.port.js";
export type { TraceExporterPort } from "./ports/trace-exporter.port.js";
export type { HookPointPort, HookHandler, HookedCall, InvocationMode } from "./ports/interception.port.js";

export { TiktokenTokenCounter } from "./adapters/token-counter/tiktoken.adapter.js";
export { ApproximateTokenCounter } from "./adapters/token-counter/approximate.adapter.js";
export {
  ConsoleExporter,
  JsonFileExporter,
  NoopExporter,
  createExporter,
  type LineWriter,
} from "./adapters/exporter/index.js";
export { MethodPatchHookPoint, type MethodPatchOptions } from "./adapters/interception/method-patch.adapter.js";

// ─────────────────────────────────────────────────────────────────────────────
// Config, errors, logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  loadConfig,
  isExplicitlySet,
  TollgateConfigSchema,
  type TollgateConfig,
  type TokenCounterBackend,
  type PricingSource,
  type TraceExportKind,
} from "./config.js";
export {
  TollgateError,
  BudgetExceededError,
  TurnLimitError,
  TokenCountError,
  UnknownModelError,
  ValidationError,
  InterceptionError,
  isTollgateError,
  type TollgateErrorCode,
} from "./errors.js";
export {
  createLogger,
  configureLogging,
  resetLogging,
  getLogLevel,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
} from "./logging.js";
