// Inventory snapshots.
// Purpose: persist the flattened mapping of every scanned file so a later diff can use it as one side.
// Assumes snapshots are written by this tool; anything else is rejected with a ParseError.

import fs from "node:fs";

import fse from "fs-extra";
import { z } from "zod";

import { formatConfigIssues } from "../core/config.js";
import { ParseError } from "../core/errors.js";
import type { CanonicalValue } from "../model/canonical.js";
import { normalizeDecimal } from "../model/decimal.js";
import { mappingEntries, mappingFromEntries, type FlattenedEntry } from "../model/flatten.js";
import type { Inventory } from "../report/inventory.js";
import type { ConfigFormat } from "../normalize/formats.js";
import type { TreeFile } from "./tree-diff.js";

export const SNAPSHOT_SCHEMA_VERSION = 1;

// =============================================================================
// TYPES
// =============================================================================

export type SnapshotFile = {
  path: string;
  format: ConfigFormat;
  sha256: string;
  entries: FlattenedEntry[] | null;
  error: string | null;
};

export type Snapshot = {
  schema_version: typeof SNAPSHOT_SCHEMA_VERSION;
  created_at: string;
  root: string;
  files: SnapshotFile[];
};

// =============================================================================
// SCHEMA
// =============================================================================

const CanonicalValueSchema: z.ZodType<CanonicalValue> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("null") }).strict(),
    z.object({ kind: z.literal("bool"), value: z.boolean() }).strict(),
    z
      .object({
        kind: z.literal("number"),
        value: z.string().refine((text) => normalizeDecimal(text) === text, {
          message: "Expected a normalized decimal string",
        }),
      })
      .strict(),
    z.object({ kind: z.literal("string"), value: z.string() }).strict(),
    z.object({ kind: z.literal("list"), items: z.array(CanonicalValueSchema) }).strict(),
    z
      .object({ kind: z.literal("map"), entries: z.array(z.tuple([z.string(), CanonicalValueSchema])) })
      .strict(),
  ]),
);

const SnapshotFileSchema = z
  .object({
    path: z.string().min(1),
    format: z.enum(["yaml", "json", "toml"]),
    sha256: z.string(),
    entries: z
      .array(z.object({ key_path: z.string(), value: CanonicalValueSchema }).strict())
      .nullable(),
    error: z.string().nullable(),
  })
  .strict();

const SnapshotSchema = z
  .object({
    schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
    created_at: z.string(),
    root: z.string(),
    files: z.array(SnapshotFileSchema),
  })
  .strict();

// =============================================================================
// CREATE / WRITE / LOAD
// =============================================================================

export function createSnapshot(inventory: Inventory, now: Date = new Date()): Snapshot {
  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    created_at: now.toISOString(),
    root: inventory.root,
    files: inventory.files.map((file) => ({
      path: file.path,
      format: file.format,
      sha256: file.sha256,
      entries: file.mapping ? mappingEntries(file.mapping) : null,
      error: file.error,
    })),
  };
}

export function writeSnapshot(filePath: string, snapshot: Snapshot): void {
  fse.outputFileSync(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
}

export function parseSnapshot(raw: string, source: string): Snapshot {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new ParseError({
      format: "snapshot",
      reason: err instanceof Error ? err.message : String(err),
      file: source,
      cause: err,
    });
  }

  const parsed = SnapshotSchema.safeParse(document);
  if (!parsed.success) {
    throw new ParseError({
      format: "snapshot",
      reason: formatConfigIssues(parsed.error.issues).join("; "),
      file: source,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function loadSnapshot(filePath: string): Snapshot {
  return parseSnapshot(fs.readFileSync(filePath, "utf8"), filePath);
}

/** Cheap check used by `diff` to decide whether a side is a snapshot rather than a config file. */
export function looksLikeSnapshot(filePath: string): boolean {
  if (!filePath.endsWith(".json") || !fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    return false;
  }
  try {
    const document: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return typeof document === "object" && document !== null && "schema_version" in document && "files" in document;
  } catch {
    return false;
  }
}

export function snapshotTreeFiles(snapshot: Snapshot): TreeFile[] {
  return snapshot.files.map((file) => ({
    path: file.path,
    mapping: file.entries ? mappingFromEntries(file.entries) : null,
    error: file.error,
  }));
}
