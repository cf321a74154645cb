/*
Purpose: walk a directory (or take one file), hash and normalize every config file found.
Assumptions: paths in the result are relative to the scan root and use forward slashes.
Usage: const inventory = scanConfigTree("./deploy", { ignore: config.ignore, maxDepth: config.max_depth });
*/

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { minimatch } from "minimatch";

import { DEFAULT_IGNORE_GLOBS, DEFAULT_MAX_DEPTH } from "../core/config.js";
import { ParseError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { logAuditEvent, type JsonlLogger } from "../core/logger.js";
import type { FlattenedMapping } from "../model/flatten.js";
import { compareKeyPaths } from "../model/key-path.js";
import { detectFormat, type ConfigFormat } from "../normalize/formats.js";
import { normalize } from "../normalize/normalizer.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScannedFile = {
  path: string;
  absolute_path: string;
  format: ConfigFormat;
  sha256: string;
  size: number;
  key_count: number;
  mapping: FlattenedMapping | null;
  bytes: Uint8Array;
  error: string | null;
};

export type Inventory = {
  root: string;
  scanned_at: string;
  files: ScannedFile[];
};

export type ScanOptions = {
  ignore?: string[];
  maxDepth?: number;
  logger?: JsonlLogger;
};

// =============================================================================
// SCAN
// =============================================================================

export function scanConfigTree(root: string, options: ScanOptions = {}): Inventory {
  const resolvedRoot = path.resolve(root);
  const ignore = options.ignore ?? DEFAULT_IGNORE_GLOBS;

  if (!fs.existsSync(resolvedRoot)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Path not found.",
      message: `${resolvedRoot} does not exist.`,
      hint: "Pass a directory or a config file that exists.",
    });
  }

  const candidates = fs.statSync(resolvedRoot).isFile()
    ? [{ absolute: resolvedRoot, relative: path.basename(resolvedRoot) }]
    : listConfigFiles(resolvedRoot, ignore);

  const files = candidates
    .map((candidate) => scanFile(candidate.absolute, candidate.relative, options))
    .filter((file): file is ScannedFile => file !== null)
    .sort((left, right) => compareKeyPaths(left.path, right.path));

  return { root: resolvedRoot, scanned_at: new Date().toISOString(), files };
}

export function hashBytes(bytes: Uint8Array): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

function scanFile(absolute: string, relative: string, options: ScanOptions): ScannedFile | null {
  const format = detectFormat(absolute);
  if (!format) return null;

  const bytes = fs.readFileSync(absolute);
  const base = {
    path: relative,
    absolute_path: absolute,
    format,
    sha256: hashBytes(bytes),
    size: bytes.byteLength,
    bytes,
  };

  try {
    const mapping = normalize(bytes, format, { maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH });
    logAuditEvent(options.logger, "scan.file", { path: relative, format, keys: mapping.size });
    return { ...base, key_count: mapping.size, mapping, error: null };
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;

    const error = err.withFile(relative).message;
    logAuditEvent(options.logger, "scan.parse_error", { path: relative, format, error });
    return { ...base, key_count: 0, mapping: null, error };
  }
}

// =============================================================================
// WALK
// =============================================================================

type Candidate = { absolute: string; relative: string };

function listConfigFiles(root: string, ignore: string[]): Candidate[] {
  const found: Candidate[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const absolute = path.join(dir, entry.name);
      const relative = toPosixPath(path.relative(root, absolute));

      if (entry.isDirectory()) {
        if (!isIgnoredDirectory(relative, ignore)) pending.push(absolute);
        continue;
      }
      if (!entry.isFile() || detectFormat(entry.name) === null) continue;
      if (isIgnoredFile(relative, ignore)) continue;

      found.push({ absolute, relative });
    }
  }

  return found;
}

function isIgnoredFile(relative: string, ignore: string[]): boolean {
  return ignore.some((pattern) => minimatch(relative, pattern, { dot: true }));
}

// A glob ending in `/**` also prunes the directory it names.
function isIgnoredDirectory(relative: string, ignore: string[]): boolean {
  return ignore.some((pattern) => {
    if (!pattern.endsWith("/**")) return false;
    return minimatch(relative, pattern.slice(0, -3), { dot: true });
  });
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join("/");
}
