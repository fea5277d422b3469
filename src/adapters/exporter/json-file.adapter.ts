// =============================================================================
// JsonFileExporter — One JSON document per run
// =============================================================================

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { TraceExporterPort } from "../../ports/trace-exporter.port.js";
import type { Trace } from "../../trace/trace.js";

export class JsonFileExporter implements TraceExporterPort {
  constructor(readonly outputDir: string = "./traces/") {}

  /** Path the trace for `runId` is written to. */
  pathFor(runId: string): string {
    return join(this.outputDir, `${runId}.json`);
  }

  export(trace: Trace): void {
    mkdirSync(this.outputDir, { recursive: true });
    writeFileSync(this.pathFor(trace.runId), JSON.stringify(trace.toJSON(), null, 2) + "\n", "utf-8");
  }
}
