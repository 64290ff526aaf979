import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { encodePayload } from "@/encoders";
import { afterEach, beforeEach, describe, expect, test } from "@/test";
import { ConfigurationError, EncodingError } from "@/types";
import { buildSampleDataset, freezeDataset, loadDataset } from "./index";

describe("loadDataset", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "toon-savings-"));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  function writeDataset(contents: string): string {
    const filePath = path.join(directory, "dataset.json");
    fs.writeFileSync(filePath, contents);
    return filePath;
  }

  test("should read a JSON file as the dataset", () => {
    const filePath = writeDataset('{"listings":[{"id":1,"price":250000}]}');

    expect(loadDataset(filePath)).toEqual({
      listings: [{ id: 1, price: 250000 }],
    });
  });

  test("should reject a file that is not JSON", () => {
    const filePath = writeDataset("listings: []");

    expect(() => loadDataset(filePath)).toThrow(
      new ConfigurationError(`Dataset file ${filePath} is not valid JSON`),
    );
  });

  test("should reject a __proto__ key rather than let TOON drop it", () => {
    const filePath = writeDataset('{"__proto__":{"x":1},"a":2}');

    expect(() => loadDataset(filePath)).toThrow(EncodingError);
    expect(() => loadDataset(filePath)).toThrow(
      'Key "__proto__" is not representable at $.__proto__',
    );
  });
});

describe("buildSampleDataset", () => {
  test("should return a fresh copy on every call", () => {
    const first = buildSampleDataset();

    freezeDataset(first);

    expect(Object.isFrozen(buildSampleDataset())).toBe(false);
    expect(buildSampleDataset()).toEqual(first);
  });

  test("should encode in both notations", () => {
    const dataset = buildSampleDataset();

    expect(encodePayload(dataset, "toon").text).toContain("listings[4]{");
    expect(encodePayload(dataset, "json").text.startsWith("{\n")).toBe(true);
  });
});
