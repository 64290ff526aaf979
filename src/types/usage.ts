import { z } from "zod";

/**
 * Token usage reported by the LLM service for a single request.
 * totalTokens == promptTokens + completionTokens is checked by the client.
 */
export const UsageResultSchema = z.object({
  promptTokens: z.number().int().min(0),
  completionTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
});
export type UsageResult = z.infer<typeof UsageResultSchema>;

export const PricingConfigSchema = z.object({
  /** USD per 1,000 prompt tokens */
  inputPricePer1k: z.number().min(0),
  /** USD per 1,000 completion tokens */
  outputPricePer1k: z.number().min(0),
});
export type PricingConfig = z.infer<typeof PricingConfigSchema>;

export interface CostEstimate {
  /** Estimated cost in USD, full precision */
  cost: number;
}
