import type { CompletionClient } from "@/clients";
import { freezeDataset } from "@/datasets";
import { encodePayload } from "@/encoders";
import logger from "@/logging";
import { estimateCost } from "@/pricing";
import {
  buildChatRequest,
  CONDO_LISTINGS_TEMPLATE,
  type PromptTemplate,
} from "@/prompts";
import { compareRuns, truncatePreview } from "@/report";
import {
  type ComparisonContext,
  type ComparisonResult,
  type Dataset,
  type EncodingKind,
  RunCancelledError,
  type VariantRun,
} from "@/types";

export interface RunVariantParams {
  dataset: Dataset;
  kind: EncodingKind;
  client: CompletionClient;
  context: ComparisonContext;
  template?: PromptTemplate;
  /** Same format line and data marker for both notations; default true */
  strictTemplate?: boolean;
  signal?: AbortSignal;
}

export type RunComparisonParams = Omit<RunVariantParams, "kind">;

/**
 * encode -> build prompt -> complete -> estimate cost, for one notation
 */
export async function runVariant({
  dataset,
  kind,
  client,
  context,
  template = CONDO_LISTINGS_TEMPLATE,
  strictTemplate,
  signal,
}: RunVariantParams): Promise<VariantRun> {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }

  const payload = encodePayload(dataset, kind);
  const request = buildChatRequest({ template, payload, strictTemplate });

  logger.info(
    {
      kind,
      deployment: context.deployment,
      payloadCharacters: payload.text.length,
    },
    `[Comparison] Running ${kind.toUpperCase()} run`,
  );

  const completion = await client.complete(request, context.deployment, {
    signal,
  });
  const cost = estimateCost(completion.usage, context.pricing);

  logger.info(
    { kind, ...completion.usage, cost: cost.cost },
    `[Comparison] ${kind.toUpperCase()} run complete`,
  );

  return {
    kind,
    payloadCharacters: payload.text.length,
    request,
    usage: completion.usage,
    cost,
    usageConsistent: completion.usageConsistent,
    responsePreview: truncatePreview(completion.responseText),
  };
}

/**
 * Run the JSON variant, then the TOON variant, against the same frozen dataset.
 * Any failure aborts the comparison; there is no partial result.
 */
export async function runComparison(
  params: RunComparisonParams,
): Promise<ComparisonResult> {
  const dataset = freezeDataset(params.dataset);

  const jsonRun = await runVariant({ ...params, dataset, kind: "json" });
  const toonRun = await runVariant({ ...params, dataset, kind: "toon" });

  return compareRuns(jsonRun, toonRun);
}
