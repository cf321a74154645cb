// JSON views.
// Purpose: project internal results into plain JSON, with canonical values rendered as ordinary JSON values.
// Assumes numbers that do not fit a JS number are rendered as their decimal text.

import { toPlainJson, type PlainJson } from "../model/canonical.js";
import type { Change } from "../diff/diff-engine.js";
import type { TreeDiff } from "../diff/tree-diff.js";
import type { RevisionChangeSet } from "../history/walker.js";
import type { AuditReport } from "./aggregator.js";
import type { Inventory } from "./inventory.js";

export type ChangeView = {
  kind: Change["kind"];
  key_path: string;
  old_value?: PlainJson;
  new_value?: PlainJson;
};

export function changeToJson(change: Change): ChangeView {
  switch (change.kind) {
    case "added":
      return { kind: "added", key_path: change.key_path, new_value: toPlainJson(change.new_value) };
    case "removed":
      return { kind: "removed", key_path: change.key_path, old_value: toPlainJson(change.old_value) };
    case "changed":
      return {
        kind: "changed",
        key_path: change.key_path,
        old_value: toPlainJson(change.old_value),
        new_value: toPlainJson(change.new_value),
      };
  }
}

export function treeDiffToJson(diff: TreeDiff) {
  return {
    summary: diff.summary,
    added_files: diff.added_files,
    removed_files: diff.removed_files,
    errors: diff.errors,
    files: diff.files.map((file) => ({
      path: file.path,
      summary: file.summary,
      changes: file.changes.map(changeToJson),
    })),
  };
}

export function changeSetToJson(changeSet: RevisionChangeSet) {
  return {
    ...changeSet,
    file_changes: changeSet.file_changes.map((file) => ({
      ...file,
      changes: file.changes.map(changeToJson),
    })),
  };
}

export function inventoryToJson(inventory: Inventory) {
  return {
    root: inventory.root,
    scanned_at: inventory.scanned_at,
    total_files: inventory.files.length,
    files: inventory.files.map((file) => ({
      path: file.path,
      format: file.format,
      sha256: file.sha256,
      size: file.size,
      key_count: file.key_count,
      error: file.error,
    })),
  };
}

export function auditReportToJson(report: AuditReport) {
  return {
    ...report,
    recent_changes: report.recent_changes.map(changeSetToJson),
  };
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
