import {
  ConfigurationError,
  type CostEstimate,
  type PricingConfig,
  PricingConfigSchema,
  type UsageResult,
} from "@/types";

const TOKENS_PER_PRICE_UNIT = 1000;

/**
 * Reject negative, non-finite or missing prices
 */
export function validatePricing(pricing: PricingConfig): PricingConfig {
  const parsed = PricingConfigSchema.safeParse(pricing);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => issue.path.join("."))
      .join(", ");
    throw new ConfigurationError(
      `Pricing must be finite and non-negative: ${fields}`,
    );
  }
  return parsed.data;
}

/**
 * Estimated cost of a single request in USD.
 * Returned at full precision; rounding is a presentation concern.
 */
export function estimateCost(
  usage: UsageResult,
  pricing: PricingConfig,
): CostEstimate {
  const { inputPricePer1k, outputPricePer1k } = validatePricing(pricing);

  const inputCost =
    (usage.promptTokens / TOKENS_PER_PRICE_UNIT) * inputPricePer1k;
  const outputCost =
    (usage.completionTokens / TOKENS_PER_PRICE_UNIT) * outputPricePer1k;

  return { cost: inputCost + outputCost };
}
