import type { ChatRequest, EncodedPayload, EncodingKind } from "@/types";
import {
  FORMAT_HINTS,
  FORMAT_LABELS,
  NEUTRAL_DATA_MARKER,
  NEUTRAL_FORMAT_LINE,
  type PromptTemplate,
} from "./templates";

export {
  CONDO_LISTINGS_TEMPLATE,
  FORMAT_HINTS,
  FORMAT_LABELS,
  NEUTRAL_DATA_MARKER,
  NEUTRAL_FORMAT_LINE,
  type PromptTemplate,
} from "./templates";

/** Sampling temperature for every comparison request */
export const COMPARISON_TEMPERATURE = 0;

const DATA_MARKER_PATTERN = /\n(?:(?:JSON|TOON) )?DATA:\n/;

/**
 * Marker line that precedes the payload. Strict templates use the same
 * marker for every notation.
 */
export function dataMarker(
  kind: EncodingKind,
  strictTemplate = true,
): string {
  return strictTemplate ? NEUTRAL_DATA_MARKER : `${kind.toUpperCase()} DATA:`;
}

function formatSections(
  kind: EncodingKind,
  strictTemplate: boolean,
): string[] {
  if (strictTemplate) {
    return [NEUTRAL_FORMAT_LINE];
  }

  const sections = [
    `You will receive the data in ${FORMAT_LABELS[kind]} format.`,
  ];
  const hint = FORMAT_HINTS[kind];
  if (hint) {
    sections.push(hint);
  }
  return sections;
}

/**
 * Wrap an encoded payload into a chat request.
 *
 * Layout of the user instruction:
 *   preamble
 *   format line (+ TOON hint when not strict)
 *   analytical question
 *   data marker followed by the payload text
 *
 * With `strictTemplate` (the default) the JSON and TOON requests differ only
 * in the payload text. Turning it off names the notation and adds the TOON
 * reading hint.
 */
export function buildChatRequest(params: {
  template: PromptTemplate;
  payload: EncodedPayload;
  strictTemplate?: boolean;
}): ChatRequest {
  const { template, payload, strictTemplate = true } = params;

  const sections = [
    template.preamble,
    ...formatSections(payload.kind, strictTemplate),
    template.analyticalQuestion,
    `${dataMarker(payload.kind, strictTemplate)}\n${payload.text}`,
  ];

  return {
    systemInstruction: template.systemInstruction,
    userInstruction: sections.join("\n\n"),
    temperature: COMPARISON_TEMPERATURE,
  };
}

/**
 * Return the payload text embedded in a user instruction, or null when the
 * instruction has no data marker. The first marker wins, so payloads that
 * happen to contain the marker text are returned whole.
 */
export function extractPayloadSection(userInstruction: string): string | null {
  const match = DATA_MARKER_PATTERN.exec(userInstruction);
  if (!match) {
    return null;
  }
  return userInstruction.slice(match.index + match[0].length);
}
