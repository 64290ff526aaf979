import type {
  ComparisonContext,
  ComparisonResult,
  Reduction,
  VariantRun,
} from "@/types";

export const PREVIEW_LIMIT = 400;
const TRUNCATION_SUFFIX = "...\n[truncated]";

const HEADER_BAR = "=".repeat(20);
const SUMMARY_TITLE = `${"=".repeat(24)} COMPARISON SUMMARY ${"=".repeat(24)}`;
const SUMMARY_FOOTER = "=".repeat(SUMMARY_TITLE.length);

/**
 * Shorten model output for display
 */
export function truncatePreview(text: string, limit = PREVIEW_LIMIT): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}${TRUNCATION_SUFFIX}`;
}

export function formatReduction(reduction: Reduction): string {
  return reduction === null ? "N/A" : `${reduction.toFixed(2)}%`;
}

export function formatCost(cost: number): string {
  return `$${cost.toFixed(6)}`;
}

function renderRun(run: VariantRun): string[] {
  const lines = [
    "",
    `--- ${run.kind.toUpperCase()} INPUT ---`,
    `Prompt tokens    : ${run.usage.promptTokens}`,
    `Completion tokens: ${run.usage.completionTokens}`,
    `Total tokens     : ${run.usage.totalTokens}`,
    `Estimated cost   : ${formatCost(run.cost.cost)}`,
  ];
  if (!run.usageConsistent) {
    lines.push(
      "Warning          : reported total differs from prompt + completion",
    );
  }
  lines.push("Sample output    :", run.responsePreview);
  return lines;
}

/**
 * Human-readable report: one block per encoding, then the reductions
 */
export function renderComparisonReport(
  result: ComparisonResult,
  context: ComparisonContext,
): string {
  const { inputPricePer1k, outputPricePer1k } = context.pricing;

  return [
    "",
    `${HEADER_BAR} JSON vs TOON (${context.model} on Azure, deployment ${context.deployment}) ${HEADER_BAR}`,
    ...renderRun(result.json),
    ...renderRun(result.toon),
    "",
    SUMMARY_TITLE,
    `Prompt token reduction : ${formatReduction(result.promptTokenReduction)}`,
    `Total token reduction  : ${formatReduction(result.totalTokenReduction)}`,
    `Cost reduction (est.)  : ${formatReduction(result.costReduction)}`,
    SUMMARY_FOOTER,
    "",
    `Note: Pricing numbers are approximate ($${inputPricePer1k} input / $${outputPricePer1k} output per 1K tokens). ` +
      "Set COMPARISON_INPUT_PRICE_PER_1K and COMPARISON_OUTPUT_PRICE_PER_1K to match your actual Azure pricing.",
    "",
  ].join("\n");
}

function runToJson(run: VariantRun) {
  return {
    payloadCharacters: run.payloadCharacters,
    usage: run.usage,
    usageConsistent: run.usageConsistent,
    cost: run.cost.cost,
    responsePreview: run.responsePreview,
  };
}

/**
 * Machine-readable form of the report, for COMPARISON_OUTPUT_FORMAT=json
 */
export function toComparisonJson(
  result: ComparisonResult,
  context: ComparisonContext,
) {
  return {
    deployment: context.deployment,
    model: context.model,
    pricing: context.pricing,
    runs: {
      json: runToJson(result.json),
      toon: runToJson(result.toon),
    },
    reductions: {
      promptTokens: result.promptTokenReduction,
      totalTokens: result.totalTokenReduction,
      cost: result.costReduction,
    },
  };
}
