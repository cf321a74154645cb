/*
Purpose: recover mapping key order that plain JS objects lose for integer-like keys.
Assumptions: TOML text handed to scanTomlKeyOrder has already parsed cleanly.
Usage: const order = createYamlKeyOrder(); yaml.loadAll(text, null, { listener: order.listener }).
*/

import type { EventType, State } from "js-yaml";

export type KeyPath = ReadonlyArray<string | number>;

/** Source order of a mapping's keys, looked up by the parsed object or by its path. */
export type KeyOrder = (value: object, path: KeyPath) => readonly string[] | undefined;

const YAML_MERGE_KEY = "<<";

/**
 * Keys in source order. Keys the order does not name (YAML merge results) are
 * placed where the merge key sat, anything else unknown goes last.
 */
export function orderedKeys(keys: readonly string[], order: readonly string[] | undefined): string[] {
  if (!order) return [...keys];

  const remaining = new Set(keys);
  const named = new Set(order);
  const out: string[] = [];

  for (const key of order) {
    if (remaining.delete(key)) {
      out.push(key);
    } else if (key === YAML_MERGE_KEY) {
      for (const merged of keys) {
        if (!named.has(merged) && remaining.delete(merged)) out.push(merged);
      }
    }
  }
  for (const key of keys) {
    if (remaining.delete(key)) out.push(key);
  }
  return out;
}

// =============================================================================
// YAML
// =============================================================================

type YamlFrame = { keys: string[] };

export type YamlKeyOrder = {
  listener: (event: EventType, state: State) => void;
  keyOrder: KeyOrder;
};

/**
 * Records key order through js-yaml parse events. Every node opens and closes a
 * frame; a closed node followed by ":" is a mapping key of the enclosing frame.
 */
export function createYamlKeyOrder(): YamlKeyOrder {
  const orders = new WeakMap<object, string[]>();
  const stack: YamlFrame[] = [];

  const listener = (event: EventType, state: State): void => {
    if (event === "open") {
      stack.push({ keys: [] });
      return;
    }

    const frame = stack.pop();
    const result: unknown = state.result;

    // An alias closes with the anchored object; keep the order from its definition.
    if (frame && state.kind === "mapping" && typeof result === "object" && result !== null && !orders.has(result)) {
      orders.set(result, frame.keys);
    }

    const parent = stack[stack.length - 1];
    const key = yamlKeyText(result);
    if (parent && key !== null && followedByColon(state.input, state.position)) {
      parent.keys.push(key);
    }
  };

  return { listener, keyOrder: (value) => orders.get(value) };
}

function yamlKeyText(result: unknown): string | null {
  switch (typeof result) {
    case "string":
      return result;
    case "number":
    case "bigint":
    case "boolean":
      return String(result);
    case "object":
      if (result === null) return "null";
      return Object.prototype.toString.call(result) === "[object Object]" ? null : String(result);
    default:
      return null;
  }
}

function followedByColon(input: string, position: number): boolean {
  for (let index = position; index < input.length; index += 1) {
    const ch = input[index];
    if (ch === ":") return true;
    if (ch !== " " && ch !== "\t" && ch !== "\r" && ch !== "\n") return false;
  }
  return false;
}

// =============================================================================
// TOML
// =============================================================================

const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;

const BASIC_ESCAPES: Record<string, string> = {
  b: "\b",
  t: "\t",
  n: "\n",
  f: "\f",
  r: "\r",
  e: "\u001b",
  '"': '"',
  "\\": "\\",
};

function pathId(path: KeyPath): string {
  return JSON.stringify(path);
}

/** Walks TOML source and returns the key order of every table, by table path. */
export function scanTomlKeyOrder(text: string): KeyOrder {
  const orders = new Map<string, string[]>();
  const arrayTables = new Map<string, number>();
  let pos = 0;

  const note = (path: KeyPath, key: string): void => {
    const id = pathId(path);
    const keys = orders.get(id) ?? [];
    if (!keys.includes(key)) keys.push(key);
    orders.set(id, keys);
  };

  const noteAll = (base: KeyPath, segments: readonly string[]): void => {
    const path: Array<string | number> = [...base];
    for (const segment of segments) {
      note(path, segment);
      path.push(segment);
    }
  };

  const skipBlank = (newlines: boolean): void => {
    while (pos < text.length) {
      const ch = text[pos];
      if (ch === " " || ch === "\t" || (newlines && (ch === "\r" || ch === "\n"))) {
        pos += 1;
      } else if (newlines && ch === "#") {
        while (pos < text.length && text[pos] !== "\n") pos += 1;
      } else {
        return;
      }
    }
  };

  const readBasicString = (): string => {
    let out = "";
    pos += 1;
    while (pos < text.length && text[pos] !== '"') {
      const ch = text[pos] ?? "";
      if (ch !== "\\") {
        out += ch;
        pos += 1;
        continue;
      }
      const code = text[pos + 1] ?? "";
      const width = code === "u" ? 4 : code === "U" ? 8 : code === "x" ? 2 : 0;
      if (width > 0) {
        out += String.fromCodePoint(Number.parseInt(text.slice(pos + 2, pos + 2 + width), 16));
        pos += 2 + width;
      } else {
        out += BASIC_ESCAPES[code] ?? code;
        pos += 2;
      }
    }
    pos += 1;
    return out;
  };

  const readLiteralString = (): string => {
    const end = text.indexOf("'", pos + 1);
    const stop = end === -1 ? text.length : end;
    const out = text.slice(pos + 1, stop);
    pos = stop + 1;
    return out;
  };

  const readKey = (): string[] => {
    const segments: string[] = [];
    for (;;) {
      skipBlank(false);
      const ch = text[pos];
      if (ch === '"') {
        segments.push(readBasicString());
      } else if (ch === "'") {
        segments.push(readLiteralString());
      } else {
        const start = pos;
        while (pos < text.length && BARE_KEY_CHAR.test(text[pos] ?? "")) pos += 1;
        if (pos === start) return segments;
        segments.push(text.slice(start, pos));
      }
      skipBlank(false);
      if (text[pos] !== ".") return segments;
      pos += 1;
    }
  };

  const skipMultiline = (quote: string): void => {
    const fence = quote.repeat(3);
    pos += 3;
    while (pos < text.length && !text.startsWith(fence, pos)) {
      pos += quote === '"' && text[pos] === "\\" ? 2 : 1;
    }
    pos += 3;
    // Up to two quotes may close the content right before the fence.
    for (let extra = 0; extra < 2 && text[pos] === quote; extra += 1) pos += 1;
  };

  const skipValue = (path: KeyPath): void => {
    const ch = text[pos];
    if (text.startsWith('"""', pos) || text.startsWith("'''", pos)) {
      skipMultiline(ch === '"' ? '"' : "'");
    } else if (ch === '"') {
      readBasicString();
    } else if (ch === "'") {
      readLiteralString();
    } else if (ch === "{") {
      pos += 1;
      skipInlineTable(path);
    } else if (ch === "[") {
      pos += 1;
      skipArray(path);
    } else {
      while (pos < text.length && !",]}\r\n#".includes(text[pos] ?? "")) pos += 1;
    }
  };

  const skipInlineTable = (path: KeyPath): void => {
    while (pos < text.length) {
      skipBlank(true);
      if (text[pos] === "}") {
        pos += 1;
        return;
      }
      if (text[pos] === ",") {
        pos += 1;
        continue;
      }
      const start = pos;
      skipKeyValue(path);
      if (pos === start) pos += 1;
    }
  };

  const skipArray = (path: KeyPath): void => {
    let index = 0;
    while (pos < text.length) {
      skipBlank(true);
      if (text[pos] === "]") {
        pos += 1;
        return;
      }
      if (text[pos] === ",") {
        pos += 1;
        index += 1;
        continue;
      }
      const start = pos;
      skipValue([...path, index]);
      if (pos === start) pos += 1;
    }
  };

  const skipKeyValue = (table: KeyPath): void => {
    const segments = readKey();
    if (segments.length === 0) return;
    noteAll(table, segments);
    skipBlank(false);
    if (text[pos] !== "=") return;
    pos += 1;
    skipBlank(false);
    skipValue([...table, ...segments]);
  };

  // Header segments pass through the latest element of every array of tables.
  const resolveHeader = (segments: readonly string[]): Array<string | number> => {
    const path: Array<string | number> = [];
    for (const segment of segments) {
      note(path, segment);
      path.push(segment);
      const latest = arrayTables.get(pathId(path));
      if (latest !== undefined) path.push(latest);
    }
    return path;
  };

  const openArrayTable = (segments: readonly string[]): Array<string | number> => {
    const parent = resolveHeader(segments.slice(0, -1));
    const last = segments[segments.length - 1];
    if (last === undefined) return parent;
    note(parent, last);
    const arrayPath = [...parent, last];
    const index = (arrayTables.get(pathId(arrayPath)) ?? -1) + 1;
    arrayTables.set(pathId(arrayPath), index);
    return [...arrayPath, index];
  };

  let table: KeyPath = [];
  while (pos < text.length) {
    const start = pos;
    skipBlank(true);
    if (pos >= text.length) break;

    if (text.startsWith("[[", pos)) {
      pos += 2;
      table = openArrayTable(readKey());
      pos = Math.max(pos, text.indexOf("]]", pos) + 2);
    } else if (text[pos] === "[") {
      pos += 1;
      table = resolveHeader(readKey());
      pos = Math.max(pos, text.indexOf("]", pos) + 1);
    } else {
      skipKeyValue(table);
    }

    if (pos === start) pos += 1;
  }

  return (_value, path) => orders.get(pathId(path));
}
