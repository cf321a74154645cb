/**
 * Structural diff of two flattened key-path mappings.
 *
 * Keys only in `next` are added, keys only in `previous` are removed, and keys
 * on both sides with structurally different values are changed. When a key is
 * a leaf on one side and has descendants on the other, a single `changed` is
 * emitted at that key whose container side is rebuilt from the descendants.
 */

import { valuesEqual, type CanonicalValue } from "../model/canonical.js";
import { rebuildContainer, type FlattenedMapping } from "../model/flatten.js";
import {
  ROOT_PATH,
  compareKeyPaths,
  escapeKeySegment,
  isDescendantPath,
  joinKeyPath,
  splitKeyPath,
} from "../model/key-path.js";

// =============================================================================
// TYPES
// =============================================================================

export type AddedChange = {
  kind: "added";
  key_path: string;
  new_value: CanonicalValue;
};

export type RemovedChange = {
  kind: "removed";
  key_path: string;
  old_value: CanonicalValue;
};

export type ModifiedChange = {
  kind: "changed";
  key_path: string;
  old_value: CanonicalValue;
  new_value: CanonicalValue;
};

export type Change = AddedChange | RemovedChange | ModifiedChange;

export type ChangeKind = Change["kind"];

export type ChangeSummary = {
  added: number;
  removed: number;
  changed: number;
};

// =============================================================================
// DIFF
// =============================================================================

export function diffMappings(previous: FlattenedMapping, next: FlattenedMapping): Change[] {
  const changes: Change[] = [];
  const consumedPrevious = new Set<string>();
  const consumedNext = new Set<string>();

  collectTransitions(previous, next, "previous", changes, consumedPrevious, consumedNext);
  collectTransitions(next, previous, "next", changes, consumedNext, consumedPrevious);

  for (const [keyPath, oldValue] of previous) {
    if (consumedPrevious.has(keyPath)) continue;

    const newValue = next.get(keyPath);
    if (newValue === undefined) {
      changes.push({ kind: "removed", key_path: keyPath, old_value: oldValue });
    } else if (!valuesEqual(oldValue, newValue)) {
      changes.push({ kind: "changed", key_path: keyPath, old_value: oldValue, new_value: newValue });
    }
  }

  for (const [keyPath, newValue] of next) {
    if (consumedNext.has(keyPath) || previous.has(keyPath)) continue;
    changes.push({ kind: "added", key_path: keyPath, new_value: newValue });
  }

  return changes.sort((left, right) => compareKeyPaths(left.key_path, right.key_path));
}

/**
 * Finds leaves of `leafSide` that are interior paths of `branchSide` and emits one
 * `changed` for each, consuming the descendant entries so they are not reported again.
 */
function collectTransitions(
  leafSide: FlattenedMapping,
  branchSide: FlattenedMapping,
  leafRole: "previous" | "next",
  changes: Change[],
  consumedLeaf: Set<string>,
  consumedBranch: Set<string>,
): void {
  const interior = interiorPaths(branchSide);

  for (const [keyPath, leafValue] of leafSide) {
    if (branchSide.has(keyPath) || !interior.has(keyPath)) continue;

    const descendants: Array<[string, CanonicalValue]> = [];
    for (const [branchPath, branchValue] of branchSide) {
      if (isDescendantPath(branchPath, keyPath)) {
        descendants.push([branchPath, branchValue]);
        consumedBranch.add(branchPath);
      }
    }
    consumedLeaf.add(keyPath);

    const container = rebuildContainer(descendants, keyPath);
    changes.push(
      leafRole === "previous"
        ? { kind: "changed", key_path: keyPath, old_value: leafValue, new_value: container }
        : { kind: "changed", key_path: keyPath, old_value: container, new_value: leafValue },
    );
  }
}

// Every proper ancestor of every entry; the root counts as the ancestor of all non-root entries.
function interiorPaths(mapping: FlattenedMapping): Set<string> {
  const paths = new Set<string>();

  for (const keyPath of mapping.keys()) {
    if (keyPath === ROOT_PATH) continue;
    paths.add(ROOT_PATH);

    const segments = splitKeyPath(keyPath);
    let current: string | null = null;
    for (const segment of segments.slice(0, -1)) {
      current = joinKeyPath(current, escapeKeySegment(segment));
      paths.add(current);
    }
  }

  return paths;
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeChanges(changes: readonly Change[]): ChangeSummary {
  const summary: ChangeSummary = { added: 0, removed: 0, changed: 0 };
  for (const change of changes) {
    summary[change.kind] += 1;
  }
  return summary;
}

export function hasChanges(summary: ChangeSummary): boolean {
  return summary.added + summary.removed + summary.changed > 0;
}
