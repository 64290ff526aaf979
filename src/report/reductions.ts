import type { ComparisonResult, Reduction, VariantRun } from "@/types";

/**
 * Percentage by which TOON undercuts JSON for one metric.
 * Negative when TOON is larger; null when the JSON value is not positive.
 */
export function percentageReduction(
  jsonValue: number,
  toonValue: number,
): Reduction {
  if (!(jsonValue > 0)) {
    return null;
  }
  return ((jsonValue - toonValue) / jsonValue) * 100;
}

function freezeRun(run: VariantRun): VariantRun {
  return Object.freeze({
    ...run,
    request: Object.freeze({ ...run.request }),
    usage: Object.freeze({ ...run.usage }),
    cost: Object.freeze({ ...run.cost }),
  });
}

/**
 * Snapshot both runs and derive the reductions from that snapshot, so later
 * changes to the inputs cannot desynchronize counts and percentages
 */
export function compareRuns(
  jsonRun: VariantRun,
  toonRun: VariantRun,
): ComparisonResult {
  const json = freezeRun(jsonRun);
  const toon = freezeRun(toonRun);

  return Object.freeze({
    json,
    toon,
    promptTokenReduction: percentageReduction(
      json.usage.promptTokens,
      toon.usage.promptTokens,
    ),
    totalTokenReduction: percentageReduction(
      json.usage.totalTokens,
      toon.usage.totalTokens,
    ),
    costReduction: percentageReduction(json.cost.cost, toon.cost.cost),
  });
}
