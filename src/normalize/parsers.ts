/*
Purpose: wrap the YAML, JSON and TOML parser libraries and convert their output to canonical values.
Assumptions: input text is already decoded; nesting beyond maxDepth is rejected (JSON before parsing, others while converting).
Usage: parseYaml(text, maxDepth); parseJson(text, maxDepth); parseToml(text, maxDepth).
*/

import yaml from "js-yaml";
import jsonc, { type Node as JsonNode, type ParseError as JsonParseError } from "jsonc-parser";
import { parse as parseTomlText, TomlError } from "smol-toml";

import { ParseError, type SourceLocation } from "../core/errors.js";
import {
  NULL_VALUE,
  boolValue,
  listValue,
  mapValue,
  numberValue,
  stringValue,
  type CanonicalValue,
} from "../model/canonical.js";
import { normalizeDecimal } from "../model/decimal.js";
import type { ConfigFormat } from "./formats.js";
import { createYamlKeyOrder, orderedKeys, scanTomlKeyOrder, type KeyOrder, type KeyPath } from "./key-order.js";

// =============================================================================
// DECODING
// =============================================================================

export function decodeUtf8(bytes: Uint8Array, format: ConfigFormat): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ParseError({ format, reason: "content is not valid UTF-8", cause: err });
  }
}

// =============================================================================
// YAML
// =============================================================================

const YAML_INT = /^[-+]?(?:0b[01_]+|0o[0-7_]+|0x[0-9a-fA-F_]+|[0-9][0-9_]*)$/;
const YAML_FLOAT =
  /^(?:[-+]?[0-9][0-9_]*(?:\.[0-9_]*)?(?:[eE][-+]?[0-9]+)?|[-+]?\.[0-9_]+(?:[eE][-+]?[0-9]+)?|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/;

/** A YAML float kept as its canonical decimal text rather than a lossy JS number. */
class YamlDecimal {
  constructor(readonly text: string) {}

  // Mapping keys are stringified by the loader; this keeps `1.50: x` keyed as "1.5".
  get [Symbol.toStringTag](): string {
    return "YamlDecimal";
  }

  toString(): string {
    return this.text;
  }
}

function integerFromLexeme(data: string): bigint {
  const text = data.replace(/_/g, "");
  const unsigned = text.startsWith("-") || text.startsWith("+") ? text.slice(1) : text;
  const magnitude = BigInt(unsigned);
  return text.startsWith("-") ? -magnitude : magnitude;
}

function decimalFromLexeme(data: string): YamlDecimal {
  const text = data.replace(/_/g, "");
  const special = text.toLowerCase().replace(/^\+/, "");
  if (special === ".nan") return new YamlDecimal("NaN");
  if (special === ".inf") return new YamlDecimal("Infinity");
  if (special === "-.inf") return new YamlDecimal("-Infinity");
  return new YamlDecimal(normalizeDecimal(text) ?? String(Number(text)));
}

// Same resolution rules as the default schema, constructed from the lexeme so
// integers past 2^53 and long decimals survive.
const YAML_SCHEMA = yaml.DEFAULT_SCHEMA.extend({
  implicit: [
    new yaml.Type("tag:yaml.org,2002:int", {
      kind: "scalar",
      resolve: (data: unknown) => typeof data === "string" && YAML_INT.test(data) && !data.endsWith("_"),
      construct: (data: string) => integerFromLexeme(data),
    }),
    new yaml.Type("tag:yaml.org,2002:float", {
      kind: "scalar",
      resolve: (data: unknown) => typeof data === "string" && YAML_FLOAT.test(data) && !data.endsWith("_"),
      construct: (data: string) => decimalFromLexeme(data),
    }),
  ],
});

export function parseYaml(text: string, maxDepth: number): CanonicalValue | null {
  const order = createYamlKeyOrder();
  let documents: unknown[];
  try {
    documents = yaml.loadAll(text, null, { schema: YAML_SCHEMA, listener: order.listener });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new ParseError({
        format: "yaml",
        reason: err.reason,
        location: { line: err.mark.line + 1, column: err.mark.column + 1 },
        cause: err,
      });
    }
    // The loader recurses once per flow level.
    if (err instanceof RangeError) {
      throw new ParseError({ format: "yaml", reason: "nesting too deep to parse", cause: err });
    }
    throw err;
  }

  // Empty and comment-only documents load as null or undefined and contribute nothing.
  const present = documents.filter((document) => document !== undefined && document !== null);
  if (present.length === 0) return null;

  const conversion: PlainConversion = { format: "yaml", maxDepth, keyOrder: order.keyOrder };
  const converted = present.map((document) => fromPlainValue(document, conversion, 0, []));
  const [single] = converted;
  if (converted.length === 1 && single) return single;
  return listValue(converted);
}

// =============================================================================
// TOML
// =============================================================================

export function parseToml(text: string, maxDepth: number): CanonicalValue {
  let table: unknown;
  try {
    table = parseTomlText(text, { integersAsBigInt: "asNeeded" });
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ParseError({
        format: "toml",
        reason: firstLine(err.message),
        location: { line: err.line, column: err.column },
        cause: err,
      });
    }
    throw err;
  }

  return fromPlainValue(table, { format: "toml", maxDepth, keyOrder: scanTomlKeyOrder(text) }, 0, []);
}

// =============================================================================
// PLAIN VALUES (YAML / TOML)
// =============================================================================

type PlainConversion = {
  format: ConfigFormat;
  maxDepth: number;
  keyOrder: KeyOrder;
};

function fromPlainValue(
  value: unknown,
  conversion: PlainConversion,
  depth: number,
  path: KeyPath,
): CanonicalValue {
  if (value === null || value === undefined) return NULL_VALUE;

  switch (typeof value) {
    case "boolean":
      return boolValue(value);
    case "number":
    case "bigint":
      return numberValue(value);
    case "string":
      return stringValue(value);
    default:
      break;
  }

  if (value instanceof YamlDecimal) {
    return numberValue(value.text);
  }
  if (value instanceof Date) {
    // TOML dates override toISOString with their lexical form.
    return stringValue(value.toISOString());
  }
  if (value instanceof Uint8Array) {
    return stringValue(Buffer.from(value).toString("base64"));
  }

  const { format, maxDepth } = conversion;

  if (Array.isArray(value)) {
    assertDepth(format, maxDepth, depth + 1);
    const items: unknown[] = value;
    return listValue(items.map((item, index) => fromPlainValue(item, conversion, depth + 1, [...path, index])));
  }

  if (typeof value === "object") {
    assertDepth(format, maxDepth, depth + 1);
    const fields = new Map<string, unknown>(Object.entries(value));
    const keys = orderedKeys([...fields.keys()], conversion.keyOrder(value, path));
    return mapValue(
      keys.map((key): [string, CanonicalValue] => [
        key,
        fromPlainValue(fields.get(key), conversion, depth + 1, [...path, key]),
      ]),
    );
  }

  throw new ParseError({ format, reason: `unsupported value of type ${typeof value}` });
}

// =============================================================================
// JSON
// =============================================================================

export function parseJson(text: string, maxDepth: number): CanonicalValue {
  // The tree builder recurses per level, so depth is bounded before it runs.
  assertJsonNesting(text, maxDepth);

  const errors: JsonParseError[] = [];
  const root = jsonc.parseTree(text, errors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
  });

  const [first] = errors;
  if (first) {
    throw new ParseError({
      format: "json",
      reason: jsonc.printParseErrorCode(first.error),
      location: locationAt(text, first.offset),
    });
  }
  if (!root) {
    throw new ParseError({ format: "json", reason: "document is empty", location: null });
  }

  return fromJsonNode(root, text);
}

function fromJsonNode(node: JsonNode, text: string): CanonicalValue {
  switch (node.type) {
    case "null":
      return NULL_VALUE;
    case "boolean":
      return boolValue(node.value === true);
    case "string":
      return stringValue(typeof node.value === "string" ? node.value : "");
    case "number": {
      const lexeme = text.slice(node.offset, node.offset + node.length);
      const normalized = normalizeDecimal(lexeme);
      if (normalized === null) {
        throw new ParseError({
          format: "json",
          reason: `invalid number ${lexeme}`,
          location: locationAt(text, node.offset),
        });
      }
      return { kind: "number", value: normalized };
    }
    case "array":
      return listValue((node.children ?? []).map((child) => fromJsonNode(child, text)));
    case "object": {
      const seen = new Set<string>();
      const entries: Array<[string, CanonicalValue]> = [];

      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || typeof keyNode.value !== "string") continue;

        const key = keyNode.value;
        if (seen.has(key)) {
          throw new ParseError({
            format: "json",
            reason: `duplicated mapping key "${key}"`,
            location: locationAt(text, keyNode.offset),
          });
        }
        seen.add(key);
        entries.push([key, valueNode ? fromJsonNode(valueNode, text) : NULL_VALUE]);
      }
      return mapValue(entries);
    }
    case "property":
      throw new ParseError({
        format: "json",
        reason: "unexpected property node",
        location: locationAt(text, node.offset),
      });
  }
}

function assertJsonNesting(text: string, maxDepth: number): void {
  let depth = 0;
  let inString = false;
  for (let index = 0; index < text.length; index += 1) {
    const ch = text[index];
    if (inString) {
      if (ch === "\\") index += 1;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === "[" || ch === "{") {
      depth += 1;
      if (depth > maxDepth) assertDepth("json", maxDepth, depth, locationAt(text, index));
    } else if ((ch === "]" || ch === "}") && depth > 0) {
      depth -= 1;
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function assertDepth(
  format: ConfigFormat,
  maxDepth: number,
  depth: number,
  location: SourceLocation | null = null,
): void {
  if (depth > maxDepth) {
    throw new ParseError({ format, reason: `nesting deeper than ${maxDepth} levels`, location });
  }
}

export function locationAt(text: string, offset: number): SourceLocation {
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < offset && index < text.length; index += 1) {
    if (text[index] === "\n") {
      line += 1;
      lineStart = index + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}
