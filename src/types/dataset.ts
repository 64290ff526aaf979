import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Structured data embedded into the prompt. Constructed once per comparison
 * and shared read-only by both encoding paths.
 */
export type Dataset = JsonValue;

export const EncodingKindSchema = z.enum(["json", "toon"]);
export type EncodingKind = z.infer<typeof EncodingKindSchema>;

export interface EncodedPayload {
  kind: EncodingKind;
  text: string;
}
