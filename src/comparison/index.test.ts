import { MockCompletionClient } from "@/clients";
import { encodePayload } from "@/encoders";
import { extractPayloadSection } from "@/prompts";
import { describe, expect, test } from "@/test";
import {
  type ComparisonContext,
  RateLimitError,
  RunCancelledError,
} from "@/types";
import { runComparison, runVariant } from "./index";

const context: ComparisonContext = {
  deployment: "gpt-4o-test",
  model: "gpt-4o",
  pricing: { inputPricePer1k: 0.00275, outputPricePer1k: 0.011 },
};

const JSON_USAGE = {
  prompt_tokens: 538,
  completion_tokens: 265,
  total_tokens: 803,
};
const TOON_USAGE = {
  prompt_tokens: 364,
  completion_tokens: 207,
  total_tokens: 571,
};

describe("runVariant", () => {
  test("should embed the encoded payload and price the reported usage", async ({
    makeDataset,
  }) => {
    const dataset = makeDataset();
    const client = new MockCompletionClient([
      { responseText: "three bullets", usage: TOON_USAGE },
    ]);

    const run = await runVariant({ dataset, kind: "toon", client, context });
    const payload = encodePayload(dataset, "toon");

    expect(run.kind).toBe("toon");
    expect(run.payloadCharacters).toBe(payload.text.length);
    expect(extractPayloadSection(run.request.userInstruction)).toBe(
      payload.text,
    );
    expect(run.usage).toEqual({
      promptTokens: 364,
      completionTokens: 207,
      totalTokens: 571,
    });
    expect(run.cost.cost).toBeCloseTo(0.003278, 12);
    expect(run.responsePreview).toBe("three bullets");
    expect(client.calls).toEqual([
      { request: run.request, deployment: "gpt-4o-test" },
    ]);
  });

  test("should truncate long responses in the preview", async ({
    makeDataset,
  }) => {
    const client = new MockCompletionClient([
      { responseText: "z".repeat(450), usage: JSON_USAGE },
    ]);

    const run = await runVariant({
      dataset: makeDataset(),
      kind: "json",
      client,
      context,
    });

    expect(run.responsePreview).toBe(`${"z".repeat(400)}...\n[truncated]`);
  });

  test("should use the strict template unless told otherwise", async ({
    makeDataset,
  }) => {
    const client = new MockCompletionClient([{ usage: TOON_USAGE }]);

    const strict = await runVariant({
      dataset: makeDataset(),
      kind: "toon",
      client,
      context,
    });
    const annotated = await runVariant({
      dataset: makeDataset(),
      kind: "toon",
      client,
      context,
      strictTemplate: false,
    });

    expect(strict.request.userInstruction).not.toContain("TOON");
    expect(annotated.request.userInstruction).toContain("TOON basics:");
    expect(annotated.request.userInstruction).toContain("\nTOON DATA:\n");
  });

  test("should not call the client once the signal is aborted", async ({
    makeDataset,
  }) => {
    const client = new MockCompletionClient([{ usage: JSON_USAGE }]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      runVariant({
        dataset: makeDataset(),
        kind: "json",
        client,
        context,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(client.calls).toHaveLength(0);
  });
});

describe("runComparison", () => {
  test("should run JSON first, then TOON, and compare them", async ({
    makeDataset,
  }) => {
    const dataset = makeDataset();
    const client = new MockCompletionClient([
      { responseText: "json says", usage: JSON_USAGE },
      { responseText: "toon says", usage: TOON_USAGE },
    ]);

    const result = await runComparison({ dataset, client, context });

    expect(client.calls).toHaveLength(2);
    expect(extractPayloadSection(client.calls[0].request.userInstruction)).toBe(
      encodePayload(dataset, "json").text,
    );
    expect(extractPayloadSection(client.calls[1].request.userInstruction)).toBe(
      encodePayload(dataset, "toon").text,
    );
    expect(result.json.responsePreview).toBe("json says");
    expect(result.toon.responsePreview).toBe("toon says");
    expect(result.promptTokenReduction).toBeCloseTo(32.34, 2);
    expect(result.totalTokenReduction).toBeCloseTo(28.89, 2);
    expect(result.costReduction).toBeCloseTo(25.41, 2);
  });

  test("should send both variants the same system instruction and temperature", async ({
    makeDataset,
  }) => {
    const client = new MockCompletionClient([
      { usage: JSON_USAGE },
      { usage: TOON_USAGE },
    ]);

    await runComparison({ dataset: makeDataset(), client, context });

    const [jsonCall, toonCall] = client.calls;
    expect(jsonCall.request.systemInstruction).toBe(
      toonCall.request.systemInstruction,
    );
    expect(jsonCall.request.temperature).toBe(0);
    expect(toonCall.request.temperature).toBe(0);
  });

  test("should freeze the dataset before running", async ({ makeDataset }) => {
    const dataset = makeDataset();
    const client = new MockCompletionClient([{ usage: JSON_USAGE }]);

    await runComparison({ dataset, client, context });

    expect(Object.isFrozen(dataset)).toBe(true);
  });

  test("should fail without a partial result when the TOON run fails", async ({
    makeDataset,
  }) => {
    const client = new MockCompletionClient([
      { usage: JSON_USAGE },
      { error: new RateLimitError("Too many requests") },
    ]);

    await expect(
      runComparison({ dataset: makeDataset(), client, context }),
    ).rejects.toThrow(RateLimitError);
    expect(client.calls).toHaveLength(2);
  });

  test("should stop before the TOON run once cancelled", async ({
    makeDataset,
  }) => {
    const controller = new AbortController();
    const client = new MockCompletionClient([{ usage: JSON_USAGE }]);
    const complete = client.complete.bind(client);
    client.complete = async (request, deployment, options) => {
      const result = await complete(request, deployment, options);
      controller.abort();
      return result;
    };

    await expect(
      runComparison({
        dataset: makeDataset(),
        client,
        context,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(client.calls).toHaveLength(1);
  });
});
