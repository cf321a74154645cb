/**
 * Audit aggregation.
 * Purpose: combine inventory, secret findings, policy violations and recent history into one report.
 * Assumptions: pure; callers do all I/O beforehand. Output ordering does not depend on input ordering.
 * Usage: const report = aggregateAudit({ inventory, secret_findings, violations, recent_changes });
 */

import { compareKeyPaths } from "../model/key-path.js";
import { compareSeverityDesc, countBySeverity, type SeverityCounts } from "../model/severity.js";
import type { ConfigFormat } from "../normalize/formats.js";
import type { Violation } from "../policy/types.js";
import type { RevisionChangeSet } from "../history/walker.js";
import { compareFindings, type SecretFinding } from "../secrets/scanner.js";
import type { Inventory } from "./inventory.js";

// =============================================================================
// TYPES
// =============================================================================

export type RiskLevel = "PASS" | "WARN" | "FAIL";

export type InventoryEntry = {
  path: string;
  format: ConfigFormat;
  sha256: string;
  key_count: number;
  error: string | null;
};

export type AuditOverview = {
  generated_at: string;
  root: string;
  total_files: number;
  formats: Record<ConfigFormat, number>;
  parse_errors: number;
};

export type AuditReport = {
  overview: AuditOverview;
  inventory: InventoryEntry[];
  secrets: {
    total: number;
    counts: SeverityCounts;
    findings: SecretFinding[];
  };
  policy: {
    total: number;
    counts: SeverityCounts;
    violations: Violation[];
  };
  recent_changes: RevisionChangeSet[];
  risk: RiskLevel;
  risk_summary: string;
};

export type AuditInput = {
  inventory: Inventory;
  secret_findings: readonly SecretFinding[];
  violations: readonly Violation[];
  recent_changes: readonly RevisionChangeSet[];
};

// =============================================================================
// AGGREGATION
// =============================================================================

export function aggregateAudit(input: AuditInput): AuditReport {
  const findings = [...input.secret_findings].sort(compareFindings);
  const violations = [...input.violations].sort(compareViolations);
  const inventory = input.inventory.files.map(
    (file): InventoryEntry => ({
      path: file.path,
      format: file.format,
      sha256: file.sha256,
      key_count: file.key_count,
      error: file.error,
    }),
  );
  inventory.sort((left, right) => compareKeyPaths(left.path, right.path));

  const formats: Record<ConfigFormat, number> = { yaml: 0, json: 0, toml: 0 };
  for (const entry of inventory) {
    formats[entry.format] += 1;
  }

  return {
    overview: {
      generated_at: input.inventory.scanned_at,
      root: input.inventory.root,
      total_files: inventory.length,
      formats,
      parse_errors: inventory.filter((entry) => entry.error !== null).length,
    },
    inventory,
    secrets: { total: findings.length, counts: countBySeverity(findings), findings },
    policy: { total: violations.length, counts: countBySeverity(violations), violations },
    recent_changes: [...input.recent_changes],
    risk: computeRisk(findings, violations),
    risk_summary: summarizeRisk(findings.length, violations.length),
  };
}

export function computeRisk(
  findings: readonly Pick<SecretFinding, "severity">[],
  violations: readonly Pick<Violation, "severity">[],
): RiskLevel {
  const critical =
    findings.some((finding) => finding.severity === "critical") ||
    violations.some((violation) => violation.severity === "critical");
  if (critical) return "FAIL";

  const elevated =
    findings.some((finding) => finding.severity === "high") ||
    violations.some((violation) => violation.severity === "medium" || violation.severity === "high");
  return elevated ? "WARN" : "PASS";
}

function summarizeRisk(findingCount: number, violationCount: number): string {
  const parts: string[] = [];
  if (findingCount > 0) parts.push(`${findingCount} ${findingCount === 1 ? "secret" : "secrets"} found`);
  if (violationCount > 0) {
    parts.push(`${violationCount} policy ${violationCount === 1 ? "violation" : "violations"}`);
  }
  return parts.length > 0 ? parts.join(", ") : "No issues found";
}

export function compareViolations(left: Violation, right: Violation): number {
  return (
    compareSeverityDesc(left.severity, right.severity) ||
    compareKeyPaths(left.file, right.file) ||
    compareKeyPaths(left.rule_id, right.rule_id) ||
    compareKeyPaths(left.key_path ?? "", right.key_path ?? "")
  );
}
