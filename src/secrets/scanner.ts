/*
Purpose: line-based secret detection over config files, with redacted snippets and key-path lookup.
Assumptions: findings never contain more than the first four characters of a match.
Usage: scanSecrets("app.yaml", text, mapping); scanInventorySecrets(inventory).
*/

import { scalarText, isScalar } from "../model/canonical.js";
import type { FlattenedMapping } from "../model/flatten.js";
import { compareKeyPaths, splitKeyPath } from "../model/key-path.js";
import { compareSeverityDesc, countBySeverity, type Severity, type SeverityCounts } from "../model/severity.js";
import type { Inventory } from "../report/inventory.js";
import {
  PLACEHOLDER_MARKERS,
  SECRET_PATTERNS,
  type SecretConfidence,
  type SecretType,
} from "./patterns.js";

// =============================================================================
// TYPES
// =============================================================================

export type SecretFinding = {
  file: string;
  line: number;
  key_path: string | null;
  secret_type: SecretType;
  severity: Severity;
  confidence: SecretConfidence;
  pattern_name: string;
  snippet: string;
};

export type SecretReport = {
  scanned_files: number;
  files_with_secrets: number;
  total_findings: number;
  counts: SeverityCounts;
  findings: SecretFinding[];
};

const SNIPPET_CONTEXT = 10;
const REDACT_VISIBLE = 4;

// =============================================================================
// SCAN
// =============================================================================

export function scanSecrets(
  file: string,
  text: string,
  mapping: FlattenedMapping | null = null,
): SecretFinding[] {
  const findings: SecretFinding[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (shouldSkipLine(line)) return;

    for (const pattern of SECRET_PATTERNS) {
      const match = pattern.regex.exec(line);
      if (!match) continue;

      findings.push({
        file,
        line: index + 1,
        key_path: mapping ? findKeyPath(mapping, line, match[0]) : null,
        secret_type: pattern.secret_type,
        severity: pattern.severity,
        confidence: pattern.confidence,
        pattern_name: pattern.name,
        snippet: buildSnippet(line, match.index, match[0]),
      });
    }
  });

  return findings;
}

export function scanInventorySecrets(inventory: Inventory): SecretReport {
  const decoder = new TextDecoder("utf-8");
  const findings = inventory.files.flatMap((file) =>
    scanSecrets(file.path, decoder.decode(file.bytes), file.mapping),
  );
  return buildSecretReport(inventory.files.length, findings);
}

export function buildSecretReport(scannedFiles: number, findings: SecretFinding[]): SecretReport {
  const sorted = [...findings].sort(compareFindings);
  return {
    scanned_files: scannedFiles,
    files_with_secrets: new Set(sorted.map((finding) => finding.file)).size,
    total_findings: sorted.length,
    counts: countBySeverity(sorted),
    findings: sorted,
  };
}

export function compareFindings(left: SecretFinding, right: SecretFinding): number {
  return (
    compareSeverityDesc(left.severity, right.severity) ||
    compareKeyPaths(left.file, right.file) ||
    left.line - right.line ||
    compareKeyPaths(left.pattern_name, right.pattern_name)
  );
}

// =============================================================================
// HELPERS
// =============================================================================

export function shouldSkipLine(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#") || trimmed.startsWith("//")) return true;
  return PLACEHOLDER_MARKERS.some((marker) => trimmed.includes(marker));
}

export function redactSecret(secret: string): string {
  if (secret.length <= REDACT_VISIBLE) return "...";
  return `${secret.slice(0, REDACT_VISIBLE)}...`;
}

function buildSnippet(line: string, start: number, matched: string): string {
  const end = start + matched.length;
  const before = line.slice(Math.max(0, start - SNIPPET_CONTEXT), start);
  const after = line.slice(end, end + SNIPPET_CONTEXT);
  return `${before}${redactSecret(matched)}${after}`;
}

/**
 * Picks the entry whose string value appears on the matched line, preferring one whose
 * last key segment also appears there. Returns null when nothing lines up.
 */
function findKeyPath(mapping: FlattenedMapping, line: string, matched: string): string | null {
  let fallback: string | null = null;

  for (const [keyPath, value] of mapping) {
    if (!isScalar(value) || value.kind !== "string" || value.value.length === 0) continue;

    const text = scalarText(value);
    const onLine = (text.length >= REDACT_VISIBLE && line.includes(text)) || text.includes(matched);
    if (!onLine) continue;

    const segments = splitKeyPath(keyPath);
    const lastSegment = segments[segments.length - 1] ?? "";
    if (lastSegment.length > 0 && line.includes(lastSegment)) return keyPath;
    if (fallback === null) fallback = keyPath;
  }

  return fallback;
}
