import type { TraceExportKind } from "../../config.js";
import { ValidationError } from "../../errors.js";
import type { TraceExporterPort } from "../../ports/trace-exporter.port.js";
import { ConsoleExporter } from "./console.adapter.js";
import { JsonFileExporter } from "./json-file.adapter.js";

export { ConsoleExporter, type LineWriter } from "./console.adapter.js";
export { JsonFileExporter } from "./json-file.adapter.js";

export class NoopExporter implements TraceExporterPort {
  export(): void {}
}

export function createExporter(kind: TraceExportKind | "noop", outputDir?: string): TraceExporterPort {
  switch (kind) {
    case "console":
      return new ConsoleExporter();
    case "json":
      return new JsonFileExporter(outputDir);
    case "none":
    case "noop":
      return new NoopExporter();
    default:
      throw new ValidationError(`unknown exporter "${String(kind)}"`, "traceExport");
  }
}
