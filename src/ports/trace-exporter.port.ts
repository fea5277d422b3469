// =============================================================================
// TraceExporterPort — End-of-run trace sink contract
// =============================================================================

import type { Trace } from "../trace/trace.js";

export interface TraceExporterPort {
  export(trace: Trace): void;
}
