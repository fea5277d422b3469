// =============================================================================
// ConsoleExporter — Human-readable trace summary
// =============================================================================

import type { TraceExporterPort } from "../../ports/trace-exporter.port.js";
import type { Trace } from "../../trace/trace.js";

export type LineWriter = (line: string) => void;

// eslint-disable-next-line no-console
const stderrWriter: LineWriter = (line) => console.error(line);

export class ConsoleExporter implements TraceExporterPort {
  constructor(private readonly write: LineWriter = stderrWriter) {}

  export(trace: Trace): void {
    this.write(`=== Tollgate Trace: ${trace.runId} ===`);
    this.write(`Total Cost: $${trace.totalCost.toFixed(4)}`);
    this.write(`Input Tokens: ${trace.totalInputTokens}`);
    this.write(`Output Tokens: ${trace.totalOutputTokens}`);
    this.write(`Spans: ${trace.spans.length}`);
    this.write("");

    trace.spans.forEach((span, i) => {
      const status = span.status === "error" ? " [error]" : "";
      this.write(`  [${i + 1}] ${span.spanType}: ${span.model ?? "N/A"}${status}`);
      if (span.costUsd !== undefined) this.write(`      Cost: $${span.costUsd.toFixed(6)}`);
      if (span.inputTokens) this.write(`      Input: ${span.inputTokens} tokens`);
      if (span.outputTokens) this.write(`      Output: ${span.outputTokens} tokens`);
      this.write("");
    });
  }
}
