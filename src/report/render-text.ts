/*
Purpose: terminal renderings for every command's result.
Assumptions: callers pass an AnsiFormatter; a disabled formatter yields plain text.
Usage: console.log(renderTreeDiffText(diff, createAnsiFormatter(resolveColorEnabled({ stream: process.stdout }))));
*/

import type { AnsiFormatter, AnsiStyle } from "../core/error-format.js";
import { formatValue } from "../model/canonical.js";
import type { Severity, SeverityCounts } from "../model/severity.js";
import type { Change } from "../diff/diff-engine.js";
import type { TreeDiff } from "../diff/tree-diff.js";
import type { RevisionChangeSet } from "../history/walker.js";
import type { PolicyReport, Violation } from "../policy/types.js";
import type { SecretReport } from "../secrets/scanner.js";
import type { AuditReport, RiskLevel } from "./aggregator.js";
import type { Inventory } from "./inventory.js";

const PLAIN: AnsiFormatter = (value) => value;
const HASH_PREFIX_LENGTH = 12;

// =============================================================================
// SHARED
// =============================================================================

const SEVERITY_STYLES: Record<Severity, AnsiStyle[]> = {
  critical: ["red", "bold"],
  high: ["yellow", "bold"],
  medium: ["cyan"],
  low: ["dim"],
};

const RISK_STYLES: Record<RiskLevel, AnsiStyle[]> = {
  PASS: ["green", "bold"],
  WARN: ["yellow", "bold"],
  FAIL: ["red", "bold"],
};

function section(title: string, format: AnsiFormatter): string {
  return format(`--- ${title} ---`, ["bold"]);
}

function severityTag(severity: Severity, format: AnsiFormatter): string {
  return format(`[${severity.toUpperCase()}]`, SEVERITY_STYLES[severity]);
}

function severityCounts(counts: SeverityCounts, format: AnsiFormatter): string {
  return [
    format(`CRITICAL: ${counts.critical}`, ["red"]),
    format(`HIGH: ${counts.high}`, ["yellow"]),
    format(`MEDIUM: ${counts.medium}`, ["cyan"]),
    `LOW: ${counts.low}`,
  ].join(" | ");
}

export function renderChangeLine(change: Change, format: AnsiFormatter = PLAIN): string {
  switch (change.kind) {
    case "added":
      return format(`+ ${change.key_path}: ${formatValue(change.new_value)}`, ["green"]);
    case "removed":
      return format(`- ${change.key_path}: ${formatValue(change.old_value)}`, ["red"]);
    case "changed":
      return format(
        `~ ${change.key_path}: ${formatValue(change.old_value)} -> ${formatValue(change.new_value)}`,
        ["yellow"],
      );
  }
}

function groupByFile<T extends { file: string }>(items: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(item.file) ?? [];
    group.push(item);
    groups.set(item.file, group);
  }
  return groups;
}

// =============================================================================
// COMMANDS
// =============================================================================

export function renderInventoryText(inventory: Inventory, format: AnsiFormatter = PLAIN): string {
  const lines = [section("Config Inventory", format), `  Root: ${inventory.root}`];
  for (const file of inventory.files) {
    const status = file.error ? format(`parse error: ${file.error}`, ["red"]) : `${file.key_count} keys`;
    const hash = file.sha256.slice(0, HASH_PREFIX_LENGTH);
    lines.push(`  ${file.path.padEnd(40)} ${file.format.padEnd(4)} ${hash} ${status}`);
  }
  lines.push(`  ${inventory.files.length} config files`);
  return lines.join("\n");
}

export function renderTreeDiffText(diff: TreeDiff, format: AnsiFormatter = PLAIN): string {
  const lines: string[] = [];

  for (const file of diff.files) {
    if (file.changes.length === 0) continue;
    lines.push(format(file.path, ["bold"]));
    lines.push(...file.changes.map((change) => `  ${renderChangeLine(change, format)}`));
  }
  for (const added of diff.added_files) lines.push(format(`+ file ${added}`, ["green"]));
  for (const removed of diff.removed_files) lines.push(format(`- file ${removed}`, ["red"]));
  for (const error of diff.errors) {
    lines.push(format(`! ${error.path} (${error.side}): ${error.message}`, ["red"]));
  }

  const { added, removed, changed, files_changed } = diff.summary;
  lines.push(
    lines.length === 0
      ? "No changes."
      : `${files_changed} files changed: ${added} added, ${removed} removed, ${changed} changed`,
  );
  return lines.join("\n");
}

export function renderSecretsText(report: SecretReport, format: AnsiFormatter = PLAIN): string {
  const lines = [section("Secret Findings", format)];
  if (report.total_findings === 0) {
    lines.push(format("  No secrets found.", ["green"]));
  } else {
    lines.push(`  ${severityCounts(report.counts, format)}`);
    for (const [file, findings] of groupByFile(report.findings)) {
      lines.push(`  ${file}:`);
      for (const finding of findings) {
        const where = finding.key_path ? ` (${finding.key_path})` : "";
        lines.push(
          `    ${severityTag(finding.severity, format)} Line ${finding.line}${where}: ${finding.pattern_name} - ${finding.snippet}`,
        );
      }
    }
  }
  lines.push(`  Scanned ${report.scanned_files} files, ${report.files_with_secrets} with secrets`);
  return lines.join("\n");
}

export function renderViolationsText(violations: readonly Violation[], format: AnsiFormatter = PLAIN): string[] {
  const lines: string[] = [];
  for (const [file, group] of groupByFile(violations)) {
    lines.push(`  ${file}:`);
    for (const violation of group) {
      lines.push(`    ${severityTag(violation.severity, format)} ${violation.rule_id}: ${violation.message}`);
    }
  }
  return lines;
}

export function renderPolicyText(report: PolicyReport, format: AnsiFormatter = PLAIN): string {
  const lines = [section("Policy Violations", format), `  Policy: ${report.policy_name}`];
  if (report.total_violations === 0) {
    lines.push(format("  All checks passed.", ["green"]));
  } else {
    lines.push(`  ${severityCounts(report.counts, format)}`);
    lines.push(...renderViolationsText(report.violations, format));
  }
  for (const skipped of report.skipped_files) {
    lines.push(format(`  ! skipped ${skipped.path}: ${skipped.error}`, ["red"]));
  }
  lines.push(`  Checked ${report.total_files_checked} files, ${report.files_with_violations} with violations`);
  return lines.join("\n");
}

export function renderChangeSetText(changeSet: RevisionChangeSet, format: AnsiFormatter = PLAIN): string {
  const subject = changeSet.message.split("\n")[0] ?? "";
  const meta = [changeSet.author, changeSet.timestamp?.slice(0, 10)].filter(Boolean).join(", ");
  const lines = [`${format(changeSet.short_id, ["yellow"])} ${subject}${meta ? ` (${meta})` : ""}`];

  for (const file of changeSet.file_changes) {
    lines.push(`  ${file.file_path} [${file.status}]`);
    lines.push(...file.changes.map((change) => `    ${renderChangeLine(change, format)}`));
  }
  for (const error of changeSet.errors) {
    lines.push(format(`  ! ${error.file_path} (${error.side}, ${error.kind}): ${error.message}`, ["red"]));
  }
  if (changeSet.violations.length > 0) {
    lines.push(...renderViolationsText(changeSet.violations, format));
  }
  return lines.join("\n");
}

export function renderHistoryText(changeSets: readonly RevisionChangeSet[], format: AnsiFormatter = PLAIN): string {
  if (changeSets.length === 0) return "No config changes in the selected revisions.";
  return changeSets.map((changeSet) => renderChangeSetText(changeSet, format)).join("\n\n");
}

export function renderAuditText(report: AuditReport, format: AnsiFormatter = PLAIN): string {
  const { overview } = report;
  const lines = [
    format("Config Audit Report", ["bold"]),
    format("===================", ["bold"]),
    `Generated: ${overview.generated_at}`,
    `Path: ${overview.root}`,
    `Files: ${overview.total_files} (${overview.formats.yaml} yaml, ${overview.formats.json} json, ${overview.formats.toml} toml)`,
    "",
    section("Config Inventory", format),
    ...report.inventory.map((entry) => {
      const status = entry.error ? format(" parse error", ["red"]) : "";
      return `  ${entry.path.padEnd(40)} ${entry.sha256.slice(0, HASH_PREFIX_LENGTH)}${status}`;
    }),
    "",
    section("Secret Findings", format),
  ];

  if (report.secrets.total === 0) {
    lines.push(format("  No secrets found.", ["green"]));
  } else {
    lines.push(`  ${severityCounts(report.secrets.counts, format)}`);
    for (const finding of report.secrets.findings) {
      lines.push(
        `    ${severityTag(finding.severity, format)} ${finding.file}:${finding.line} ${finding.pattern_name} - ${finding.snippet}`,
      );
    }
  }

  lines.push("", section("Policy Violations", format));
  if (report.policy.total === 0) {
    lines.push(format("  All checks passed.", ["green"]));
  } else {
    lines.push(`  ${severityCounts(report.policy.counts, format)}`);
    lines.push(...renderViolationsText(report.policy.violations, format));
  }

  if (report.recent_changes.length > 0) {
    lines.push("", section(`Recent Changes (last ${report.recent_changes.length} commits)`, format));
    for (const changeSet of report.recent_changes) {
      const subject = changeSet.message.split("\n")[0] ?? "";
      lines.push(`  ${format(changeSet.short_id, ["yellow"])} - ${subject}`);
      for (const file of changeSet.file_changes) {
        lines.push(`    ${file.file_path}: ~${file.changes.length} keys changed`);
      }
    }
  }

  lines.push(
    "",
    section("Risk Summary", format),
    `  ${format(report.risk, RISK_STYLES[report.risk])} -- ${report.risk_summary}`,
  );
  return lines.join("\n");
}
