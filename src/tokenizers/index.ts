import type { TiktokenEncoding } from "tiktoken";
import { TiktokenTokenizer } from "./tiktoken";

export { BaseTokenizer, type ChatMessage, type Tokenizer } from "./base";
export { TiktokenTokenizer } from "./tiktoken";

/**
 * Model name prefixes that predate the o200k_base vocabulary
 */
const CL100K_MODEL_PREFIXES = ["gpt-4", "gpt-35", "gpt-3.5"];

/**
 * Pick the tiktoken vocabulary for a model or deployment name.
 * gpt-4o, gpt-4.1, o-series and anything unrecognized use o200k_base.
 */
export function encodingForModel(model: string): TiktokenEncoding {
  const lowerModel = model.toLowerCase();
  if (
    lowerModel.startsWith("gpt-4o") ||
    lowerModel.startsWith("gpt-4.") ||
    !CL100K_MODEL_PREFIXES.some((prefix) => lowerModel.startsWith(prefix))
  ) {
    return "o200k_base";
  }
  return "cl100k_base";
}

export function getTokenizer(model: string): TiktokenTokenizer {
  return new TiktokenTokenizer(encodingForModel(model));
}
