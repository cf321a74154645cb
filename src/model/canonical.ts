/**
 * Canonical value model.
 * Purpose: one format-independent tree shape that YAML, JSON and TOML all parse into.
 * Assumptions: numbers are stored as normalized decimal text (see decimal.ts).
 * Usage: build values with the constructors below; compare with valuesEqual.
 */

import { decimalFromNumber, normalizeDecimal } from "./decimal.js";

// =============================================================================
// TYPES
// =============================================================================

export type NullValue = { kind: "null" };
export type BoolValue = { kind: "bool"; value: boolean };
export type NumberValue = { kind: "number"; value: string };
export type StringValue = { kind: "string"; value: string };
export type ListValue = { kind: "list"; items: CanonicalValue[] };
export type MapValue = { kind: "map"; entries: Array<[string, CanonicalValue]> };

export type CanonicalValue = NullValue | BoolValue | NumberValue | StringValue | ListValue | MapValue;

export type ScalarValue = NullValue | BoolValue | NumberValue | StringValue;
export type ContainerValue = ListValue | MapValue;

export type CanonicalKind = CanonicalValue["kind"];

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export const NULL_VALUE: NullValue = { kind: "null" };

export function boolValue(value: boolean): BoolValue {
  return { kind: "bool", value };
}

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function numberValue(value: number | bigint | string): NumberValue {
  if (typeof value === "string") {
    const normalized = normalizeDecimal(value);
    if (normalized === null) {
      throw new Error(`Not a decimal number: ${value}`);
    }
    return { kind: "number", value: normalized };
  }
  return { kind: "number", value: decimalFromNumber(value) };
}

export function listValue(items: CanonicalValue[]): ListValue {
  return { kind: "list", items };
}

export function mapValue(entries: Array<[string, CanonicalValue]>): MapValue {
  return { kind: "map", entries };
}

// =============================================================================
// PREDICATES
// =============================================================================

export function isContainer(value: CanonicalValue): value is ContainerValue {
  return value.kind === "list" || value.kind === "map";
}

export function isScalar(value: CanonicalValue): value is ScalarValue {
  return !isContainer(value);
}

export function isEmptyContainer(value: CanonicalValue): boolean {
  if (value.kind === "list") return value.items.length === 0;
  if (value.kind === "map") return value.entries.length === 0;
  return false;
}

// =============================================================================
// EQUALITY
// =============================================================================

export function valuesEqual(left: CanonicalValue, right: CanonicalValue): boolean {
  switch (left.kind) {
    case "null":
      return right.kind === "null";
    case "bool":
      return right.kind === "bool" && right.value === left.value;
    case "number":
      return right.kind === "number" && right.value === left.value;
    case "string":
      return right.kind === "string" && right.value === left.value;
    case "list":
      return (
        right.kind === "list" &&
        right.items.length === left.items.length &&
        left.items.every((item, index) => {
          const other = right.items[index];
          return other !== undefined && valuesEqual(item, other);
        })
      );
    case "map":
      return right.kind === "map" && mapsEqual(left, right);
  }
}

function mapsEqual(left: MapValue, right: MapValue): boolean {
  if (left.entries.length !== right.entries.length) return false;

  const lookup = new Map(right.entries);
  return left.entries.every(([key, value]) => {
    const other = lookup.get(key);
    return other !== undefined && valuesEqual(value, other);
  });
}

// =============================================================================
// RENDERING
// =============================================================================

/** Text form used by regex checks and messages; strings are returned unquoted. */
export function scalarText(value: ScalarValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
    case "string":
      return value.value;
  }
}

export function formatValue(value: CanonicalValue): string {
  if (isScalar(value)) {
    return scalarText(value);
  }
  return JSON.stringify(toPlainJson(value));
}

export type PlainJson = null | boolean | number | string | PlainJson[] | { [key: string]: PlainJson };

const NON_FINITE_NUMBERS = new Set(["NaN", "Infinity", "-Infinity"]);

/**
 * Lossy view for display: numbers that do not fit a JS number stay as text.
 * NaN and the infinities have no JSON literal and render as `{ "$number": "NaN" }`.
 */
export function toPlainJson(value: CanonicalValue): PlainJson {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
      return value.value;
    case "number": {
      if (NON_FINITE_NUMBERS.has(value.value)) return { $number: value.value };
      const parsed = Number(value.value);
      return Number.isFinite(parsed) && decimalFromNumber(parsed) === value.value
        ? parsed
        : value.value;
    }
    case "string":
      return value.value;
    case "list":
      return value.items.map(toPlainJson);
    case "map": {
      const out: { [key: string]: PlainJson } = {};
      for (const [key, item] of value.entries) {
        Object.defineProperty(out, key, {
          value: toPlainJson(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}
