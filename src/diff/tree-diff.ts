// Tree diff.
// Purpose: match two sets of files by relative path and diff each matched pair.
// Files on one side only are reported whole; files that failed to parse are reported, not diffed.

import type { FlattenedMapping } from "../model/flatten.js";
import { compareKeyPaths } from "../model/key-path.js";
import { diffMappings, summarizeChanges, type Change, type ChangeSummary } from "./diff-engine.js";

export type TreeFile = {
  path: string;
  mapping: FlattenedMapping | null;
  error: string | null;
};

export type FileDiff = {
  path: string;
  changes: Change[];
  summary: ChangeSummary;
};

export type TreeDiffError = {
  path: string;
  side: "old" | "new";
  message: string;
};

export type TreeDiff = {
  files: FileDiff[];
  added_files: string[];
  removed_files: string[];
  errors: TreeDiffError[];
  summary: ChangeSummary & { files_changed: number };
};

export function diffTrees(oldFiles: readonly TreeFile[], newFiles: readonly TreeFile[]): TreeDiff {
  const oldByPath = new Map(oldFiles.map((file) => [file.path, file]));
  const newByPath = new Map(newFiles.map((file) => [file.path, file]));

  const files: FileDiff[] = [];
  const errors: TreeDiffError[] = [];
  const added_files: string[] = [];
  const removed_files: string[] = [];

  const allPaths = Array.from(new Set([...oldByPath.keys(), ...newByPath.keys()])).sort(compareKeyPaths);

  for (const filePath of allPaths) {
    const before = oldByPath.get(filePath);
    const after = newByPath.get(filePath);

    if (!before) {
      added_files.push(filePath);
      continue;
    }
    if (!after) {
      removed_files.push(filePath);
      continue;
    }

    const failed = collectErrors(before, after);
    if (failed.length > 0) {
      errors.push(...failed);
      continue;
    }
    if (!before.mapping || !after.mapping) continue;

    const changes = diffMappings(before.mapping, after.mapping);
    files.push({ path: filePath, changes, summary: summarizeChanges(changes) });
  }

  const allChanges = files.flatMap((file) => file.changes);
  return {
    files,
    added_files,
    removed_files,
    errors,
    summary: {
      ...summarizeChanges(allChanges),
      files_changed: files.filter((file) => file.changes.length > 0).length,
    },
  };
}

function collectErrors(before: TreeFile, after: TreeFile): TreeDiffError[] {
  const errors: TreeDiffError[] = [];
  if (before.error !== null || !before.mapping) {
    errors.push({ path: before.path, side: "old", message: before.error ?? "no parsed content" });
  }
  if (after.error !== null || !after.mapping) {
    errors.push({ path: after.path, side: "new", message: after.error ?? "no parsed content" });
  }
  return errors;
}

export function treeDiffHasChanges(diff: TreeDiff): boolean {
  return (
    diff.added_files.length > 0 ||
    diff.removed_files.length > 0 ||
    diff.files.some((file) => file.changes.length > 0)
  );
}
