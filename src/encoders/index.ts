import { decode as toonDecode, encode as toonEncode } from "@toon-format/toon";
import logger from "@/logging";
import type {
  Dataset,
  EncodedPayload,
  EncodingKind,
  JsonValue,
} from "@/types";
import { assertEncodable } from "./validate";

export { assertEncodable, childPath } from "./validate";

const JSON_INDENT = 2;

/**
 * Serializers for each notation. Keys keep insertion order, so the same
 * dataset value always produces byte-identical text.
 */
const encoders: Record<EncodingKind, (dataset: JsonValue) => string> = {
  json: (dataset) => JSON.stringify(dataset, null, JSON_INDENT),
  toon: (dataset) => toonEncode(dataset),
};

const decoders: Record<EncodingKind, (text: string) => unknown> = {
  json: (text) => JSON.parse(text),
  toon: (text) => toonDecode(text),
};

/**
 * Serialize a dataset in the requested notation.
 * Throws EncodingError (with the offending path) for values that either
 * notation would silently coerce or drop.
 */
export function encodePayload(
  dataset: Dataset,
  kind: EncodingKind,
): EncodedPayload {
  assertEncodable(dataset);

  const text = encoders[kind](dataset);

  logger.debug(
    { kind, characters: text.length, preview: text.substring(0, 150) },
    "encodePayload: encoded dataset",
  );

  return { kind, text };
}

/**
 * Inverse of encodePayload, using each notation's own decoder
 */
export function decodePayload(payload: EncodedPayload): JsonValue {
  const decoded = decoders[payload.kind](payload.text);
  assertEncodable(decoded);
  return decoded;
}
