import type { EncodingKind } from "@/types";

export interface PromptTemplate {
  systemInstruction: string;
  /** Sets the scene before the format description */
  preamble: string;
  /** Identical for every variant so only the payload differs */
  analyticalQuestion: string;
}

export const CONDO_LISTINGS_TEMPLATE: PromptTemplate = {
  systemInstruction: "You are a concise, expert real estate analyst.",
  preamble:
    "You are an AI assistant helping a real estate team evaluate condo listings for a buyer.",
  analyticalQuestion: [
    "1. Identify the top 2 listings for this buyer.",
    "2. For each, explain briefly why it is a strong match.",
    "3. Briefly mention any listings to avoid and why.",
    "",
    "Respond in 3-5 bullet points, concise and professional.",
  ].join("\n"),
};

/**
 * Format line and data marker shared by both notations in strict mode
 */
export const NEUTRAL_FORMAT_LINE = "You will receive the data below.";
export const NEUTRAL_DATA_MARKER = "DATA:";

export const FORMAT_LABELS: Record<EncodingKind, string> = {
  json: "JSON",
  toon: "TOON (Token-Oriented Object Notation)",
};

/**
 * Reading aid for models that have not seen TOON before.
 * Only used when the template is not strict.
 */
export const FORMAT_HINTS: Record<EncodingKind, string | null> = {
  json: null,
  toon: [
    "TOON basics:",
    "- Indentation indicates nesting (like YAML).",
    "- Lines like `listings[4]{field1,field2,...}:` declare an array of objects.",
    "- Each subsequent indented line is a row with comma-separated values in that field order.",
  ].join("\n"),
};
