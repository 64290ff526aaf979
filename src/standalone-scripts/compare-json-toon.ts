/**
 * Send the same dataset to an Azure OpenAI deployment twice, once as JSON and
 * once as TOON, and report the token and cost difference.
 *
 * Usage:
 *   tsx src/standalone-scripts/compare-json-toon.ts
 *
 * Environment:
 *   AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_KEY, AZURE_OPENAI_DEPLOYMENT
 *   COMPARISON_DATASET_PATH   - JSON file to compare instead of the sample
 *   COMPARISON_OUTPUT_FORMAT  - text (default) or json
 *   COMPARISON_MOCK_LLM=true  - count prompt tokens locally, send nothing
 *   COMPARISON_STRICT_TEMPLATE=false - name the notation and add the TOON hint
 */
import { pathToFileURL } from "node:url";
import {
  AzureOpenAiCompletionClient,
  type CompletionClient,
  DryRunCompletionClient,
} from "@/clients";
import { runComparison } from "@/comparison";
import config, {
  getLlmConnectionConfig,
  getOutputFormat,
  getPricingConfig,
  getStrictTemplate,
  type LlmConnectionConfig,
} from "@/config";
import { buildSampleDataset, loadDataset } from "@/datasets";
import logger from "@/logging";
import { renderComparisonReport, toComparisonJson } from "@/report";
import { type ComparisonContext, isComparisonError } from "@/types";

export interface CompareOptions {
  useMockLlm?: boolean;
  datasetPath?: string;
  dryRunModel?: string;
  strictTemplate?: boolean;
  createClient?: (connection: LlmConnectionConfig) => CompletionClient;
  write?: (text: string) => void;
  signal?: AbortSignal;
}

const createAzureClient = (connection: LlmConnectionConfig) =>
  new AzureOpenAiCompletionClient(connection);

/**
 * Everything is validated before a client exists, so a misconfigured run
 * never reaches the network
 */
export async function compareJsonToon({
  useMockLlm = config.comparison.useMockLlm,
  datasetPath = config.comparison.datasetPath,
  dryRunModel = config.comparison.dryRunModel,
  strictTemplate,
  createClient = createAzureClient,
  write = (text) => process.stdout.write(text),
  signal,
}: CompareOptions = {}): Promise<void> {
  const outputFormat = getOutputFormat();
  const pricing = getPricingConfig();
  const useStrictTemplate = strictTemplate ?? getStrictTemplate();
  const dataset = datasetPath ? loadDataset(datasetPath) : buildSampleDataset();

  let client: CompletionClient;
  let context: ComparisonContext;
  if (useMockLlm) {
    logger.warn(
      { model: dryRunModel },
      "COMPARISON_MOCK_LLM is set: no requests will be sent, completion tokens will be 0",
    );
    client = new DryRunCompletionClient(dryRunModel);
    context = { deployment: "dry-run", model: dryRunModel, pricing };
  } else {
    const connection = getLlmConnectionConfig();
    client = createClient(connection);
    context = {
      deployment: connection.deployment,
      model: connection.model,
      pricing,
    };
  }

  const result = await runComparison({
    dataset,
    client,
    context,
    strictTemplate: useStrictTemplate,
    signal,
  });

  write(
    outputFormat === "json"
      ? `${JSON.stringify(toComparisonJson(result, context), null, 2)}\n`
      : renderComparisonReport(result, context),
  );
}

/**
 * Log a failure with its stage and hint; returns the process exit code
 */
export function reportFailure(error: unknown): number {
  if (isComparisonError(error)) {
    logger.error(
      { code: error.code, stage: error.stage, hint: error.hint },
      `Comparison failed during ${error.stage}: ${error.message}`,
    );
  } else {
    logger.error({ err: error }, "Comparison failed unexpectedly");
  }
  return 1;
}

/**
 * CLI entry point
 */
if (import.meta.url === pathToFileURL(process.argv[1]).href) {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted, cancelling the in-flight request");
    controller.abort();
  });

  compareJsonToon({ signal: controller.signal })
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      process.exit(reportFailure(error));
    });
}
