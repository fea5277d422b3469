// =============================================================================
// Config — Defaults, environment overrides and call-site overrides
// =============================================================================

import { z } from "zod";
import { ValidationError } from "./errors.js";

export const TokenCounterBackendSchema = z.enum(["local", "external", "auto"]);
export type TokenCounterBackend = z.infer<typeof TokenCounterBackendSchema>;

export const PricingSourceSchema = z.enum(["bundled", "external"]);
export type PricingSource = z.infer<typeof PricingSourceSchema>;

export const TraceExportSchema = z.enum(["console", "json", "none"]);
export type TraceExportKind = z.infer<typeof TraceExportSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const TollgateConfigSchema = z.object({
  defaultBudgetUsd: z.number().nonnegative().default(10),
  defaultMaxTurns: z.number().int().nonnegative().default(50),
  tokenCounterBackend: TokenCounterBackendSchema.default("auto"),
  pricingSource: PricingSourceSchema.default("bundled"),
  traceExport: TraceExportSchema.default("console"),
  traceExportPath: z.string().min(1).default("./traces/"),
  logLevel: LogLevelSchema.default("warn"),
});

export type TollgateConfig = z.infer<typeof TollgateConfigSchema>;

type ConfigField = keyof TollgateConfig;

const ENV_VARS: Record<ConfigField, string> = {
  defaultBudgetUsd: "TOLLGATE_DEFAULT_BUDGET_USD",
  defaultMaxTurns: "TOLLGATE_DEFAULT_MAX_TURNS",
  tokenCounterBackend: "TOLLGATE_TOKEN_COUNTER_BACKEND",
  pricingSource: "TOLLGATE_PRICING_SOURCE",
  traceExport: "TOLLGATE_TRACE_EXPORT",
  traceExportPath: "TOLLGATE_TRACE_EXPORT_PATH",
  logLevel: "TOLLGATE_LOG_LEVEL",
};

const NUMERIC_FIELDS: ReadonlySet<string> = new Set<ConfigField>(["defaultBudgetUsd", "defaultMaxTurns"]);

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_VARS)) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    values[field] = NUMERIC_FIELDS.has(field) ? Number(raw) : raw;
  }
  return values;
}

/**
 * Resolve configuration. Explicit overrides win over the environment, which
 * wins over the schema defaults.
 */
export function loadConfig(
  overrides: Partial<TollgateConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): TollgateConfig {
  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const result = TollgateConfigSchema.safeParse({ ...readEnv(env), ...explicit });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue.message, issue.path.join("."));
  }
  return result.data;
}

/** Whether `field` comes from an override or its environment variable rather than the schema default. */
export function isExplicitlySet(
  field: ConfigField,
  overrides: Partial<TollgateConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return overrides[field] !== undefined || Boolean(env[ENV_VARS[field]]?.trim());
}
