import { EncodingError, type JsonValue } from "@/types";

const IDENTIFIER_KEY = /^[A-Za-z_$][\w$]*$/;

/**
 * Append an object key or array index to a `$.a.b[0]` style path
 */
export function childPath(parent: string, key: string | number): string {
  if (typeof key === "number") {
    return `${parent}[${key}]`;
  }
  return IDENTIFIER_KEY.test(key)
    ? `${parent}.${key}`
    : `${parent}[${JSON.stringify(key)}]`;
}

function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "number") return String(value);
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Walk a value and throw EncodingError at the first node that JSON and TOON
 * cannot both represent exactly. Both encoders coerce such values (undefined
 * and functions become null or vanish, Dates become strings), so they are
 * rejected up front instead.
 */
export function assertEncodable(
  value: unknown,
  path = "$",
  ancestors: object[] = [],
): asserts value is JsonValue {
  if (value === null) {
    return;
  }

  switch (typeof value) {
    case "string":
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) {
        throw new EncodingError(
          path,
          `Non-finite number ${describeValue(value)} is not representable`,
        );
      }
      return;
    case "object":
      break;
    default:
      throw new EncodingError(
        path,
        `Unsupported value of type ${describeValue(value)}`,
      );
  }

  if (ancestors.includes(value)) {
    throw new EncodingError(path, "Circular reference");
  }

  if (Array.isArray(value)) {
    const nextAncestors = [...ancestors, value];
    for (let index = 0; index < value.length; index++) {
      if (!(index in value)) {
        throw new EncodingError(
          childPath(path, index),
          "Sparse array hole is not representable",
        );
      }
      assertEncodable(value[index], childPath(path, index), nextAncestors);
    }
    return;
  }

  if (!isPlainObject(value)) {
    throw new EncodingError(
      path,
      `Unsupported object of type ${describeValue(value)}`,
    );
  }

  if (Object.getOwnPropertySymbols(value).length > 0) {
    throw new EncodingError(path, "Symbol-keyed properties are not supported");
  }

  const nextAncestors = [...ancestors, value];
  for (const [key, child] of Object.entries(value)) {
    // JSON.parse creates an own "__proto__" key, which the TOON encoder drops
    if (key === "__proto__") {
      throw new EncodingError(
        childPath(path, key),
        'Key "__proto__" is not representable',
      );
    }
    assertEncodable(child, childPath(path, key), nextAncestors);
  }
}
