/**
 * biome-ignore-all lint/correctness/noEmptyPattern: oddly enough in extend below this is required
 * see https://vitest.dev/guide/test-context.html#extend-test-context
 */
import { test as baseTest } from "vitest";
import type {
  ChatRequest,
  Dataset,
  EncodingKind,
  UsageResult,
  VariantRun,
} from "@/types";

/**
 * Vitest test extension with fixtures
 * https://vitest.dev/guide/test-context.html#extend-test-context
 */
interface TestFixtures {
  makeUsage: typeof makeUsage;
  makeChatRequest: typeof makeChatRequest;
  makeVariantRun: typeof makeVariantRun;
  makeDataset: typeof makeDataset;
}

/**
 * Usage counters with total derived from prompt + completion unless overridden
 */
function makeUsage(overrides: Partial<UsageResult> = {}): UsageResult {
  const promptTokens = overrides.promptTokens ?? 100;
  const completionTokens = overrides.completionTokens ?? 50;
  return {
    promptTokens,
    completionTokens,
    totalTokens: overrides.totalTokens ?? promptTokens + completionTokens,
  };
}

function makeChatRequest(overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    systemInstruction: "You are a test analyst.",
    userInstruction: "Summarize the data.\n\nJSON DATA:\n{}",
    temperature: 0,
    ...overrides,
  };
}

function makeVariantRun(
  kind: EncodingKind,
  overrides: Partial<Omit<VariantRun, "kind">> = {},
): VariantRun {
  return {
    kind,
    payloadCharacters: 10,
    request: makeChatRequest(),
    usage: makeUsage(),
    cost: { cost: 0.001 },
    usageConsistent: true,
    responsePreview: `${kind} answer`,
    ...overrides,
  };
}

/**
 * Dataset covering every supported value type, including an empty array and null
 */
function makeDataset(): Dataset {
  return {
    team: {
      name: "Platform",
      active: true,
      budget: 1250.5,
      lead: null,
      tags: [],
    },
    members: [
      { id: 1, name: "Ada", role: "owner", remote: false },
      { id: 2, name: "Linus, Jr.", role: "member", remote: true },
    ],
    notes: ["first: draft", "second"],
  };
}

export const test = baseTest.extend<TestFixtures>({
  makeUsage: async ({}, use) => {
    await use(makeUsage);
  },
  makeChatRequest: async ({}, use) => {
    await use(makeChatRequest);
  },
  makeVariantRun: async ({}, use) => {
    await use(makeVariantRun);
  },
  makeDataset: async ({}, use) => {
    await use(makeDataset);
  },
});
