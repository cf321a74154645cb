/*
Purpose: replay config changes across history, one RevisionChangeSet per revision, newest first.
Assumptions: all version-control access goes through ConfigHistorySource; failures for one file
  become entries in that revision's errors and never stop the walk.
Usage: for await (const changeSet of walkHistory(source, { limit: 10, policy })) { ... }
*/

import { DEFAULT_MAX_DEPTH } from "../core/config.js";
import { ParseError, RetrievalError } from "../core/errors.js";
import { logAuditEvent, type JsonlLogger } from "../core/logger.js";
import { EMPTY_MAPPING, type FlattenedMapping } from "../model/flatten.js";
import { compareKeyPaths } from "../model/key-path.js";
import { diffMappings, summarizeChanges, type Change, type ChangeSummary } from "../diff/diff-engine.js";
import { isConfigPath } from "../normalize/formats.js";
import { normalizeFile } from "../normalize/normalizer.js";
import { evaluatePolicy } from "../policy/evaluator.js";
import type { Policy, Violation } from "../policy/types.js";
import type { ConfigHistorySource, RevisionMetadata } from "./vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileChangeStatus = "added" | "modified" | "removed";

export type FileChange = {
  file_path: string;
  status: FileChangeStatus;
  changes: Change[];
  summary: ChangeSummary;
};

export type RevisionFileError = {
  file_path: string;
  side: "old" | "new";
  kind: "parse" | "retrieval";
  message: string;
  location: { line: number; column: number } | null;
};

export type RevisionChangeSet = {
  revision_id: string;
  short_id: string;
  parent_id: string | null;
  author: string | null;
  timestamp: string | null;
  message: string;
  file_changes: FileChange[];
  errors: RevisionFileError[];
  violations: Violation[];
};

export type WalkOptions = {
  range?: string;
  pathFilter?: string;
  limit?: number;
  policy?: Policy | null;
  maxDepth?: number;
  signal?: AbortSignal;
  logger?: JsonlLogger;
};

export type CompareOptions = Omit<WalkOptions, "range" | "limit">;

const SHORT_ID_LENGTH = 7;

// =============================================================================
// WALK
// =============================================================================

export async function* walkHistory(
  source: ConfigHistorySource,
  options: WalkOptions = {},
): AsyncGenerator<RevisionChangeSet, void, undefined> {
  if (options.signal?.aborted) return;

  const revisions = await source.log({
    range: options.range,
    pathFilter: options.pathFilter,
    limit: options.limit,
  });

  for (const revision of revisions) {
    if (options.signal?.aborted) return;

    const changeSet = await buildRevisionChangeSet(source, revision, options);
    if (!changeSet) return;

    logAuditEvent(options.logger, "history.revision", {
      revision: changeSet.revision_id,
      files: changeSet.file_changes.length,
      errors: changeSet.errors.length,
      violations: changeSet.violations.length,
    });
    yield changeSet;
  }
}

export async function collectHistory(
  source: ConfigHistorySource,
  options: WalkOptions = {},
): Promise<RevisionChangeSet[]> {
  const changeSets: RevisionChangeSet[] = [];
  for await (const changeSet of walkHistory(source, options)) {
    changeSets.push(changeSet);
  }
  return changeSets;
}

async function buildRevisionChangeSet(
  source: ConfigHistorySource,
  revision: RevisionMetadata,
  options: WalkOptions,
): Promise<RevisionChangeSet | null> {
  const touched = selectConfigFiles(revision.changed_paths, options.pathFilter);

  const accumulator = newAccumulator();
  for (const file of touched) {
    if (options.signal?.aborted) return null;
    await compareFile(source, file, revision.parent_id, revision.id, options, accumulator);
  }

  return {
    revision_id: revision.id,
    short_id: revision.id.slice(0, SHORT_ID_LENGTH),
    parent_id: revision.parent_id,
    author: revision.author,
    timestamp: revision.timestamp,
    message: revision.message,
    ...accumulator,
  };
}

// =============================================================================
// TWO-REF COMPARISON
// =============================================================================

/** One synthetic change set spanning `refA..refB` over every config file at either ref. */
export async function compareRevisions(
  source: ConfigHistorySource,
  refA: string,
  refB: string,
  options: CompareOptions = {},
): Promise<RevisionChangeSet | null> {
  const oldId = await source.describe(refA);
  const newId = await source.describe(refB);

  const [oldFiles, newFiles] = await Promise.all([
    source.listFiles(oldId, options.pathFilter),
    source.listFiles(newId, options.pathFilter),
  ]);
  const files = selectConfigFiles([...oldFiles, ...newFiles], options.pathFilter);

  const accumulator = newAccumulator();
  for (const file of files) {
    if (options.signal?.aborted) return null;
    await compareFile(source, file, oldId, newId, options, accumulator);
  }

  return {
    revision_id: `${oldId}..${newId}`,
    short_id: `${oldId.slice(0, SHORT_ID_LENGTH)}..${newId.slice(0, SHORT_ID_LENGTH)}`,
    parent_id: oldId,
    author: null,
    timestamp: null,
    message: `Comparison of ${refA} and ${refB}`,
    ...accumulator,
  };
}

// =============================================================================
// PER-FILE
// =============================================================================

type Accumulator = Pick<RevisionChangeSet, "file_changes" | "errors" | "violations">;

function newAccumulator(): Accumulator {
  return { file_changes: [], errors: [], violations: [] };
}

type SideState =
  | { state: "absent" }
  | { state: "present"; mapping: FlattenedMapping }
  | { state: "failed"; kind: "parse" | "retrieval" };

async function compareFile(
  source: ConfigHistorySource,
  file: string,
  oldRevision: string | null,
  newRevision: string,
  options: WalkOptions,
  out: Accumulator,
): Promise<void> {
  const before: SideState = oldRevision
    ? await loadSide(source, oldRevision, file, "old", options, out)
    : { state: "absent" };
  const after = await loadSide(source, newRevision, file, "new", options, out);

  if (after.state === "present" && options.policy) {
    out.violations.push(...evaluatePolicy(options.policy, after.mapping, file));
  }

  // A side that failed to parse has no mapping to diff against.
  if (before.state === "failed" && before.kind === "parse") return;
  if (after.state === "failed" && after.kind === "parse") return;

  const oldMapping = before.state === "present" ? before.mapping : null;
  const newMapping = after.state === "present" ? after.mapping : null;
  if (!oldMapping && !newMapping) return;

  const status: FileChangeStatus = !oldMapping ? "added" : !newMapping ? "removed" : "modified";
  const changes = diffMappings(oldMapping ?? EMPTY_MAPPING, newMapping ?? EMPTY_MAPPING);
  if (status === "modified" && changes.length === 0) return;

  out.file_changes.push({ file_path: file, status, changes, summary: summarizeChanges(changes) });
}

async function loadSide(
  source: ConfigHistorySource,
  revision: string,
  file: string,
  side: "old" | "new",
  options: WalkOptions,
  out: Accumulator,
): Promise<SideState> {
  try {
    const bytes = await source.contentAt(revision, file);
    if (bytes === null) return { state: "absent" };

    const normalized = normalizeFile(file, bytes, { maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH });
    return { state: "present", mapping: normalized.mapping };
  } catch (err) {
    if (err instanceof ParseError) {
      recordError(out, options, {
        file_path: file,
        side,
        kind: "parse",
        message: err.message,
        location: err.location,
      });
      return { state: "failed", kind: "parse" };
    }
    if (err instanceof RetrievalError) {
      recordError(out, options, {
        file_path: file,
        side,
        kind: "retrieval",
        message: err.message,
        location: null,
      });
      return { state: "failed", kind: "retrieval" };
    }
    throw err;
  }
}

function recordError(out: Accumulator, options: WalkOptions, error: RevisionFileError): void {
  out.errors.push(error);
  logAuditEvent(options.logger, "history.file_error", {
    file: error.file_path,
    side: error.side,
    kind: error.kind,
    message: error.message,
  });
}

// =============================================================================
// HELPERS
// =============================================================================

export function matchesPathFilter(file: string, pathFilter: string | undefined): boolean {
  if (!pathFilter) return true;
  const prefix = pathFilter.replace(/^\.\//, "").replace(/\/+$/, "");
  if (prefix === "" || prefix === ".") return true;
  return file === prefix || file.startsWith(`${prefix}/`);
}

function selectConfigFiles(files: string[], pathFilter: string | undefined): string[] {
  const selected = files.filter((file) => isConfigPath(file) && matchesPathFilter(file, pathFilter));
  return Array.from(new Set(selected)).sort(compareKeyPaths);
}
