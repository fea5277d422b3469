// =============================================================================
// HookPointPort — Reversible wrapping of one shared outbound call site
// =============================================================================

export type InvocationMode = "sync" | "async";

export interface HookedCall {
  /** Arguments the caller passed to the hooked function */
  args: readonly unknown[];
  /** Runs the original function with the caller's receiver and arguments */
  invoke: () => unknown;
}

export type HookHandler = (call: HookedCall) => unknown;

export interface HookPointPort {
  /** Identifies the shared call site; at most one interceptor may hold it */
  readonly id: string;
  /** Whether the hooked function returns a promise */
  readonly mode: InvocationMode;
  install(handler: HookHandler): void;
  /** Restores the original call site. Safe to call when not installed. */
  uninstall(): void;
}
