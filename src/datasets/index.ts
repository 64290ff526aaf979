import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { assertEncodable } from "@/encoders/validate";
import logger from "@/logging";
import { ConfigurationError, type Dataset, type JsonValue } from "@/types";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLE_DATASET_PATH = path.join(__dirname, "condo-listings.json");

/**
 * Recursively freeze a dataset so neither run can mutate what the other reads
 */
export function freezeDataset<T extends JsonValue>(dataset: T): T {
  if (typeof dataset === "object" && dataset !== null) {
    for (const child of Object.values(dataset)) {
      freezeDataset(child);
    }
    Object.freeze(dataset);
  }
  return dataset;
}

/**
 * Read a JSON file and check it is a dataset both notations can carry
 */
export function loadDataset(filePath: string): Dataset {
  const resolved = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read dataset file ${resolved}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Dataset file ${resolved} is not valid JSON`,
      { cause: error },
    );
  }

  assertEncodable(parsed);
  logger.debug(
    { path: resolved, bytes: raw.length },
    "Loaded dataset from file",
  );
  return parsed;
}

/**
 * Small but realistic dataset: a buyer profile plus four condo listings.
 * Returns a fresh copy on every call.
 */
export function buildSampleDataset(): Dataset {
  return loadDataset(SAMPLE_DATASET_PATH);
}
