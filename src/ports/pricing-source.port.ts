// =============================================================================
// PricingSourcePort — External per-token pricing lookup contract
// =============================================================================

export type PriceDirection = "input" | "output";

export interface PricingSourcePort {
  /** USD per 1K tokens, or undefined when the source has no price for the model. */
  getCostPer1K(model: string, direction: PriceDirection): number | undefined;
}
