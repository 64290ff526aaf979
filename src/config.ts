import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";
import logger from "@/logging";
import { ConfigurationError, type PricingConfig } from "@/types";

/**
 * Load .env from the project root, whatever the working directory is
 */
const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../.env"), quiet: true });

export const DEFAULT_API_VERSION = "2024-10-21";
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_DRY_RUN_MODEL = "gpt-4o";

/**
 * Demo defaults (gpt-4o on Azure); adjust to your actual contract/region
 */
export const DEFAULT_PRICING: PricingConfig = {
  inputPricePer1k: 0.00275,
  outputPricePer1k: 0.011,
};

export const OutputFormatSchema = z.enum(["text", "json"]);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Everything the completion client needs to reach one Azure OpenAI deployment.
 * Built once at startup and never mutated.
 */
export const LlmConnectionConfigSchema = z.object({
  endpoint: z.url(),
  apiKey: z.string().min(1),
  apiVersion: z.string().min(1),
  deployment: z.string().min(1),
  /** Informational only, shown in the report header */
  model: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});
export type LlmConnectionConfig = Readonly<
  z.infer<typeof LlmConnectionConfigSchema>
>;

const readEnv = (name: string): string | undefined => {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Parse a positive integer env value, falling back to the default when unset
 */
export const parsePositiveInteger = (
  name: string,
  envValue: string | undefined,
  defaultValue: number,
): number => {
  if (!envValue?.trim()) {
    return defaultValue;
  }

  const trimmed = envValue.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${trimmed}"`,
    );
  }
  return Number.parseInt(trimmed, 10);
};

/**
 * Parse a price env value. Empty means "use the default"; anything else must be
 * a finite, non-negative number.
 */
export const parsePrice = (
  name: string,
  envValue: string | undefined,
  defaultValue: number,
): number => {
  if (!envValue?.trim()) {
    return defaultValue;
  }

  const value = Number(envValue.trim());
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      `${name} must be a finite, non-negative number, got "${envValue.trim()}"`,
    );
  }
  return value;
};

/**
 * Resolve and validate the Azure OpenAI connection settings.
 * Throws ConfigurationError before anything touches the network.
 */
export const getLlmConnectionConfig = (): LlmConnectionConfig => {
  const endpoint = readEnv("AZURE_OPENAI_ENDPOINT");
  const apiKey = readEnv("AZURE_OPENAI_API_KEY");
  const deployment = readEnv("AZURE_OPENAI_DEPLOYMENT");

  const missing = [
    !endpoint && "AZURE_OPENAI_ENDPOINT",
    !apiKey && "AZURE_OPENAI_API_KEY",
    !deployment && "AZURE_OPENAI_DEPLOYMENT",
  ].filter((name): name is string => typeof name === "string");

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
    );
  }

  const parsed = LlmConnectionConfigSchema.safeParse({
    endpoint,
    apiKey,
    apiVersion: readEnv("AZURE_OPENAI_API_VERSION") ?? DEFAULT_API_VERSION,
    deployment,
    model: readEnv("AZURE_OPENAI_MODEL") ?? deployment,
    timeoutMs: parsePositiveInteger(
      "COMPARISON_REQUEST_TIMEOUT_MS",
      process.env.COMPARISON_REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
  });

  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => issue.path.join("."))
      .join(", ");
    throw new ConfigurationError(`Invalid LLM connection settings: ${fields}`);
  }

  logger.debug(
    {
      endpoint: parsed.data.endpoint,
      apiVersion: parsed.data.apiVersion,
      deployment: parsed.data.deployment,
      model: parsed.data.model,
    },
    "Resolved LLM connection settings",
  );

  return Object.freeze(parsed.data);
};

/**
 * Per-1K-token prices, defaulted when absent and overridable from the environment
 */
export const getPricingConfig = (): PricingConfig => {
  return {
    inputPricePer1k: parsePrice(
      "COMPARISON_INPUT_PRICE_PER_1K",
      process.env.COMPARISON_INPUT_PRICE_PER_1K,
      DEFAULT_PRICING.inputPricePer1k,
    ),
    outputPricePer1k: parsePrice(
      "COMPARISON_OUTPUT_PRICE_PER_1K",
      process.env.COMPARISON_OUTPUT_PRICE_PER_1K,
      DEFAULT_PRICING.outputPricePer1k,
    ),
  };
};

export const getOutputFormat = (): OutputFormat => {
  const value = readEnv("COMPARISON_OUTPUT_FORMAT")?.toLowerCase() ?? "text";
  const parsed = OutputFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `COMPARISON_OUTPUT_FORMAT must be one of ${OutputFormatSchema.options.join(", ")}, got "${value}"`,
    );
  }
  return parsed.data;
};

/**
 * Strict templates give both notations the same wording around the payload.
 * COMPARISON_STRICT_TEMPLATE=false names the notation and adds the TOON hint.
 */
export const getStrictTemplate = (): boolean => {
  const value = readEnv("COMPARISON_STRICT_TEMPLATE")?.toLowerCase();
  if (value === undefined || value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  throw new ConfigurationError(
    `COMPARISON_STRICT_TEMPLATE must be true or false, got "${value}"`,
  );
};

export default {
  comparison: {
    datasetPath: process.env.COMPARISON_DATASET_PATH?.trim() || undefined,
    useMockLlm: process.env.COMPARISON_MOCK_LLM === "true",
    /** Tokenizer choice for dry runs, where no deployment is contacted */
    dryRunModel: process.env.AZURE_OPENAI_MODEL?.trim() || DEFAULT_DRY_RUN_MODEL,
  },
};
