// Flattening of canonical trees into key-path mappings.
// Purpose: produce one entry per reachable leaf; empty containers are kept as leaves.
// Iterative so that flattening never grows the call stack with document depth.

import {
  isContainer,
  isEmptyContainer,
  listValue,
  mapValue,
  type CanonicalValue,
} from "./canonical.js";
import { escapeKeySegment, joinKeyPath, ROOT_PATH, splitKeyPath } from "./key-path.js";

// =============================================================================
// TYPES
// =============================================================================

export type FlattenedMapping = ReadonlyMap<string, CanonicalValue>;

export type FlattenedEntry = {
  key_path: string;
  value: CanonicalValue;
};

export const EMPTY_MAPPING: FlattenedMapping = new Map();

// =============================================================================
// FLATTEN
// =============================================================================

export function flattenValue(root: CanonicalValue | null): FlattenedMapping {
  const mapping = new Map<string, CanonicalValue>();
  if (root === null) return mapping;

  const stack: Array<{ path: string | null; value: CanonicalValue }> = [{ path: null, value: root }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { path, value } = frame;

    if (!isContainer(value) || isEmptyContainer(value)) {
      mapping.set(path ?? ROOT_PATH, value);
      continue;
    }

    const children: Array<{ path: string; value: CanonicalValue }> =
      value.kind === "list"
        ? value.items.map((item, index) => ({ path: joinKeyPath(path, String(index)), value: item }))
        : value.entries.map(([key, item]) => ({
            path: joinKeyPath(path, escapeKeySegment(key)),
            value: item,
          }));

    // Reverse so the first child is popped first and document order is kept.
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) stack.push(child);
    }
  }

  return mapping;
}

export function mappingEntries(mapping: FlattenedMapping): FlattenedEntry[] {
  return Array.from(mapping, ([key_path, value]) => ({ key_path, value }));
}

export function mappingFromEntries(entries: FlattenedEntry[]): FlattenedMapping {
  return new Map(entries.map((entry) => [entry.key_path, entry.value]));
}

// =============================================================================
// REBUILD
// =============================================================================

type BuildNode = { leaf: CanonicalValue | null; children: Map<string, BuildNode> };

/**
 * Rebuilds the container below `prefix` from its flattened descendants.
 * Children named 0..n-1 become a list; anything else becomes a map.
 */
export function rebuildContainer(
  entries: Array<[string, CanonicalValue]>,
  prefix: string,
): CanonicalValue {
  const root: BuildNode = { leaf: null, children: new Map() };

  for (const [keyPath, value] of entries) {
    const relative = prefix === ROOT_PATH ? keyPath : keyPath.slice(prefix.length + 1);
    let node = root;
    for (const segment of splitKeyPath(relative)) {
      let next = node.children.get(segment);
      if (!next) {
        next = { leaf: null, children: new Map() };
        node.children.set(segment, next);
      }
      node = next;
    }
    node.leaf = value;
  }

  return buildFromNode(root);
}

function buildFromNode(node: BuildNode): CanonicalValue {
  if (node.children.size === 0) {
    return node.leaf ?? mapValue([]);
  }

  const keys = Array.from(node.children.keys());
  if (isIndexSequence(keys)) {
    const items: CanonicalValue[] = [];
    for (let index = 0; index < keys.length; index += 1) {
      const child = node.children.get(String(index));
      if (child) items.push(buildFromNode(child));
    }
    return listValue(items);
  }

  return mapValue(
    keys.flatMap((key): Array<[string, CanonicalValue]> => {
      const child = node.children.get(key);
      return child ? [[key, buildFromNode(child)]] : [];
    }),
  );
}

function isIndexSequence(keys: string[]): boolean {
  const indexes = keys.map((key) => (/^(0|[1-9]\d*)$/.test(key) ? Number(key) : -1));
  if (indexes.some((index) => index < 0)) return false;

  const sorted = [...indexes].sort((a, b) => a - b);
  return sorted.every((index, position) => index === position);
}
