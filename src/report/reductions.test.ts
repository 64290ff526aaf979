import { estimateCost } from "@/pricing";
import { describe, expect, test } from "@/test";
import { compareRuns, percentageReduction } from "./reductions";

const pricing = { inputPricePer1k: 0.00275, outputPricePer1k: 0.011 };

describe("percentageReduction", () => {
  test.each([
    [200, 150, 25],
    [100, 100, 0],
    [100, 0, 100],
    [100, 120, -20],
  ])("should compute the reduction from %d to %d as %d", (json, toon, expected) => {
    expect(percentageReduction(json, toon)).toBeCloseTo(expected, 10);
  });

  test("should return null instead of dividing by zero", () => {
    expect(percentageReduction(0, 0)).toBeNull();
    expect(percentageReduction(0, 10)).toBeNull();
  });

  test("should return null for a negative baseline", () => {
    expect(percentageReduction(-1, 10)).toBeNull();
  });
});

describe("compareRuns", () => {
  test("should derive all three reductions for the condo scenario", ({
    makeUsage,
    makeVariantRun,
  }) => {
    const jsonUsage = makeUsage({ promptTokens: 538, completionTokens: 265 });
    const toonUsage = makeUsage({ promptTokens: 364, completionTokens: 207 });

    const result = compareRuns(
      makeVariantRun("json", {
        usage: jsonUsage,
        cost: estimateCost(jsonUsage, pricing),
      }),
      makeVariantRun("toon", {
        usage: toonUsage,
        cost: estimateCost(toonUsage, pricing),
      }),
    );

    expect(jsonUsage.totalTokens).toBe(803);
    expect(toonUsage.totalTokens).toBe(571);
    expect(result.promptTokenReduction).toBeCloseTo(32.34, 2);
    expect(result.totalTokenReduction).toBeCloseTo(28.89, 2);
    expect(result.costReduction).toBeCloseTo(25.41, 2);
  });

  test("should keep negative reductions when TOON costs more", ({
    makeUsage,
    makeVariantRun,
  }) => {
    const result = compareRuns(
      makeVariantRun("json", {
        usage: makeUsage({ promptTokens: 100, completionTokens: 0 }),
        cost: { cost: 0.001 },
      }),
      makeVariantRun("toon", {
        usage: makeUsage({ promptTokens: 110, completionTokens: 0 }),
        cost: { cost: 0.0011 },
      }),
    );

    expect(result.promptTokenReduction).toBeCloseTo(-10, 10);
    expect(result.totalTokenReduction).toBeCloseTo(-10, 10);
    expect(result.costReduction).toBeCloseTo(-10, 10);
  });

  test("should report undefined reductions when the JSON run is free", ({
    makeUsage,
    makeVariantRun,
  }) => {
    const result = compareRuns(
      makeVariantRun("json", {
        usage: makeUsage({ promptTokens: 0, completionTokens: 0 }),
        cost: { cost: 0 },
      }),
      makeVariantRun("toon"),
    );

    expect(result.promptTokenReduction).toBeNull();
    expect(result.totalTokenReduction).toBeNull();
    expect(result.costReduction).toBeNull();
  });

  test("should freeze the result down to usage and cost", ({
    makeVariantRun,
  }) => {
    const result = compareRuns(makeVariantRun("json"), makeVariantRun("toon"));

    expect(Object.isFrozen(result)).toBe(true);
    for (const run of [result.json, result.toon]) {
      expect(Object.isFrozen(run)).toBe(true);
      expect(Object.isFrozen(run.request)).toBe(true);
      expect(Object.isFrozen(run.usage)).toBe(true);
      expect(Object.isFrozen(run.cost)).toBe(true);
    }
  });

  test("should not follow later changes to the input runs", ({
    makeUsage,
    makeVariantRun,
  }) => {
    const jsonRun = makeVariantRun("json", {
      usage: makeUsage({ promptTokens: 200, completionTokens: 0 }),
      cost: { cost: 0.002 },
    });
    const toonRun = makeVariantRun("toon", {
      usage: makeUsage({ promptTokens: 150, completionTokens: 0 }),
      cost: { cost: 0.0015 },
    });

    const result = compareRuns(jsonRun, toonRun);
    jsonRun.usage.promptTokens = 1;
    jsonRun.cost.cost = 1;

    expect(result.json.usage.promptTokens).toBe(200);
    expect(result.json.cost.cost).toBe(0.002);
    expect(result.promptTokenReduction).toBeCloseTo(25, 10);
  });
});
