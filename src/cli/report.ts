import fs from "node:fs";
import path from "node:path";

import { Option, type Command } from "commander";

import { HistoryError } from "../core/errors.js";
import { createGitHistorySource } from "../history/git-history.js";
import type { ConfigHistorySource } from "../history/vcs.js";
import { collectHistory, type RevisionChangeSet } from "../history/walker.js";
import { evaluatePolicyOnFiles } from "../policy/evaluator.js";
import type { Policy } from "../policy/types.js";
import { aggregateAudit } from "../report/aggregator.js";
import { auditReportToJson, renderJson } from "../report/render-json.js";
import { renderAuditMarkdown } from "../report/render-markdown.js";
import { renderAuditText } from "../report/render-text.js";
import { scanInventorySecrets } from "../secrets/scanner.js";
import { emitOutput, runWithContext, parseCount, resolvePolicy, scanTarget, type CliContext } from "./context.js";
import { toPathFilter } from "./git.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export type ReportCommandOptions = {
  policy?: string;
  historyLimit?: number;
  format: "text" | "json" | "markdown";
  output?: string;
};

/** Opens history for a directory; tests pass a fake. */
export type HistoryOpener = (cwd: string, ctx: CliContext) => Promise<ConfigHistorySource>;

const openGitHistory: HistoryOpener = (cwd, ctx) =>
  createGitHistorySource(cwd, { timeoutMs: ctx.config.history.timeout_ms });

export function registerReportCommand(program: Command, onExit: (code: ExitCode) => void): void {
  program
    .command("report")
    .description("Full audit: inventory, secrets, policy and recent changes")
    .argument("<path>", "Config file or directory")
    .option("--policy <file>", "Policy file (defaults to `policy` in .confaudit.yaml)")
    .option("--history-limit <n>", "Recent commits to include (0 disables history)", parseCount)
    .addOption(
      new Option("--format <format>", "Output format").choices(["text", "json", "markdown"]).default("text"),
    )
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (target: string, opts: ReportCommandOptions, command: Command) => {
      onExit(await runWithContext(command, "report", (ctx) => reportCommand(ctx, target, opts)));
    });
}

export async function reportCommand(
  ctx: CliContext,
  target: string,
  opts: ReportCommandOptions,
  openHistory: HistoryOpener = openGitHistory,
): Promise<ExitCode> {
  const policy = resolvePolicy(ctx, opts.policy);
  const inventory = scanTarget(ctx, target);

  const secrets = scanInventorySecrets(inventory);
  const violations = policy ? evaluatePolicyOnFiles(policy, inventory.files).violations : [];
  const recentChanges = await loadRecentChanges(ctx, inventory.root, policy, opts, openHistory);

  const report = aggregateAudit({
    inventory,
    secret_findings: secrets.findings,
    violations,
    recent_changes: recentChanges,
  });

  ctx.logger?.log({
    type: "report.complete",
    payload: {
      files: report.overview.total_files,
      secrets: report.secrets.total,
      violations: report.policy.total,
      risk: report.risk,
    },
  });

  emitOutput(ctx, renderReport(report, opts.format, ctx), opts.output);
  return report.risk === "PASS" ? EXIT_CODES.clean : EXIT_CODES.findings;
}

function renderReport(
  report: ReturnType<typeof aggregateAudit>,
  format: ReportCommandOptions["format"],
  ctx: CliContext,
): string {
  switch (format) {
    case "json":
      return renderJson(auditReportToJson(report));
    case "markdown":
      return renderAuditMarkdown(report);
    case "text":
      return renderAuditText(report, ctx.format);
  }
}

// A path outside any repository, or a repository without commits, gets a report
// without recent changes.
async function loadRecentChanges(
  ctx: CliContext,
  root: string,
  policy: Policy | null,
  opts: ReportCommandOptions,
  openHistory: HistoryOpener,
): Promise<RevisionChangeSet[]> {
  const limit = opts.historyLimit ?? ctx.config.report.history_limit;
  if (limit === 0) return [];

  const directory = fs.statSync(root).isFile() ? path.dirname(root) : root;
  try {
    const source = await openHistory(directory, ctx);
    return await collectHistory(source, {
      pathFilter: toPathFilter({ cwd: directory }, source, root),
      limit,
      policy,
      maxDepth: ctx.config.max_depth,
      logger: ctx.logger,
    });
  } catch (err) {
    if (!(err instanceof HistoryError)) throw err;
    ctx.logger?.log({ type: "report.history_skipped", payload: { root, reason: err.message } });
    return [];
  }
}
