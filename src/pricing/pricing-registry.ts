// =============================================================================
// PricingRegistry — Model pricing with aliases and a custom overlay
// =============================================================================

import type { PricingSource } from "../config.js";
import { UnknownModelError, ValidationError } from "../errors.js";
import type { PriceDirection, PricingSourcePort } from "../ports/pricing-source.port.js";
import { BUNDLED_PRICING, MODEL_ALIASES } from "./bundled.js";

export interface PricingRegistryOptions {
  /** "external" consults `externalSource` for models missing from the tables (default: "bundled") */
  source?: PricingSource;
  externalSource?: PricingSourcePort;
}

export class PricingRegistry {
  private readonly source: PricingSource;
  private readonly externalSource?: PricingSourcePort;
  private readonly bundled = new Map<string, readonly [number, number]>(Object.entries(BUNDLED_PRICING));
  private readonly custom = new Map<string, readonly [number, number]>();

  constructor(options: PricingRegistryOptions = {}) {
    this.source = options.source ?? "bundled";
    this.externalSource = options.externalSource;
  }

  /** Map shorthand names to canonical ids. Unknown names are returned as given. */
  resolveAlias(model: string): string {
    const normalized = model.trim().toLowerCase();
    return MODEL_ALIASES[normalized] ?? model;
  }

  getInputCost(model: string): number {
    return this.lookup(model, "input");
  }

  getOutputCost(model: string): number {
    return this.lookup(model, "output");
  }

  /** Linear per-1K-token cost of one call. */
  estimateCallCost(model: string, inputTokens: number, outputTokens: number): number {
    const inputCost = (this.getInputCost(model) * inputTokens) / 1000;
    const outputCost = (this.getOutputCost(model) * outputTokens) / 1000;
    return inputCost + outputCost;
  }

  registerCustomModel(model: string, inputCost: number, outputCost: number): void {
    if (!Number.isFinite(inputCost) || inputCost < 0) {
      throw new ValidationError("must be a non-negative number", "inputCost");
    }
    if (!Number.isFinite(outputCost) || outputCost < 0) {
      throw new ValidationError("must be a non-negative number", "outputCost");
    }
    this.custom.set(model, [inputCost, outputCost]);
  }

  hasModel(model: string): boolean {
    const resolved = this.resolveAlias(model);
    return this.custom.has(resolved) || this.bundled.has(resolved);
  }

  listModels(): string[] {
    return [...new Set([...this.bundled.keys(), ...this.custom.keys()])].sort();
  }

  private lookup(model: string, direction: PriceDirection): number {
    const index = direction === "input" ? 0 : 1;
    const resolved = this.resolveAlias(model);

    const entry = this.custom.get(resolved) ?? this.bundled.get(resolved);
    if (entry) return entry[index];

    if (this.source === "external") {
      if (!this.externalSource) {
        throw new UnknownModelError(model, "no external pricing source configured");
      }
      const cost = this.externalSource.getCostPer1K(model, direction);
      if (cost !== undefined) return cost;
    }

    throw new UnknownModelError(model);
  }
}
