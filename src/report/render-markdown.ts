// Markdown rendering of the audit report.
// Pipes in cell text are escaped so table rows stay intact.

import type { AuditReport } from "./aggregator.js";

export function renderAuditMarkdown(report: AuditReport): string {
  const { overview } = report;
  const lines: string[] = [
    "# Config Audit Report",
    "",
    `**Risk:** ${report.risk} (${report.risk_summary})`,
    "",
    "## Overview",
    "",
    `- Generated: ${overview.generated_at}`,
    `- Path: \`${overview.root}\``,
    `- Files: ${overview.total_files} (${overview.formats.yaml} yaml, ${overview.formats.json} json, ${overview.formats.toml} toml)`,
    `- Parse errors: ${overview.parse_errors}`,
    "",
    "## Config Inventory",
    "",
    "| Path | Format | SHA-256 | Keys | Status |",
    "| --- | --- | --- | --- | --- |",
    ...report.inventory.map((entry) =>
      row([
        entry.path,
        entry.format,
        `\`${entry.sha256.slice(0, 12)}\``,
        String(entry.key_count),
        entry.error ?? "ok",
      ]),
    ),
    "",
    "## Secret Findings",
    "",
  ];

  if (report.secrets.total === 0) {
    lines.push("No secrets found.");
  } else {
    lines.push("| Severity | File | Line | Key | Pattern | Snippet |", "| --- | --- | --- | --- | --- | --- |");
    for (const finding of report.secrets.findings) {
      lines.push(
        row([
          finding.severity.toUpperCase(),
          finding.file,
          String(finding.line),
          finding.key_path ?? "",
          finding.pattern_name,
          `\`${finding.snippet}\``,
        ]),
      );
    }
  }

  lines.push("", "## Policy Violations", "");
  if (report.policy.total === 0) {
    lines.push("All checks passed.");
  } else {
    lines.push("| Severity | File | Rule | Message |", "| --- | --- | --- | --- |");
    for (const violation of report.policy.violations) {
      lines.push(row([violation.severity.toUpperCase(), violation.file, violation.rule_id, violation.message]));
    }
  }

  if (report.recent_changes.length > 0) {
    lines.push("", "## Recent Changes", "");
    for (const changeSet of report.recent_changes) {
      const subject = changeSet.message.split("\n")[0] ?? "";
      lines.push(`- \`${changeSet.short_id}\` ${subject}`);
      for (const file of changeSet.file_changes) {
        const { added, removed, changed } = file.summary;
        lines.push(`  - ${file.file_path} (${file.status}): +${added} -${removed} ~${changed}`);
      }
    }
  }

  lines.push("");
  return lines.join("\n");
}

function row(cells: string[]): string {
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\n/g, " ");
}
