import type { ChatRequest } from "./chat-request";
import type { EncodingKind } from "./dataset";
import type { CostEstimate, PricingConfig, UsageResult } from "./usage";

/**
 * Outcome of one encode -> build -> complete -> estimate pass
 */
export interface VariantRun {
  kind: EncodingKind;
  /** Length of the embedded payload text */
  payloadCharacters: number;
  request: ChatRequest;
  usage: UsageResult;
  cost: CostEstimate;
  usageConsistent: boolean;
  responsePreview: string;
}

/**
 * Percentage reduction of TOON relative to JSON.
 * null when the JSON metric is zero and the reduction is undefined.
 */
export type Reduction = number | null;

export interface ComparisonResult {
  json: VariantRun;
  toon: VariantRun;
  promptTokenReduction: Reduction;
  totalTokenReduction: Reduction;
  costReduction: Reduction;
}

export interface ComparisonContext {
  deployment: string;
  model: string;
  pricing: PricingConfig;
}
