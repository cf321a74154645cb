/*
Purpose: `confaudit git log` and `confaudit git diff`, the history views.
Assumptions: the working directory is inside a git repository; --path is relative to the working directory.
Usage: confaudit git log --range main~20..main --path deploy/ --policy policies/prod.yaml
*/

import path from "node:path";

import { Option, type Command } from "commander";

import { createGitHistorySource } from "../history/git-history.js";
import type { ConfigHistorySource } from "../history/vcs.js";
import { compareRevisions, walkHistory, type RevisionChangeSet } from "../history/walker.js";
import { toPosixPath } from "../report/inventory.js";
import { changeSetToJson, renderJson } from "../report/render-json.js";
import { renderChangeSetText, renderHistoryText } from "../report/render-text.js";
import { emitOutput, runWithContext, parseCount, resolvePolicy, type CliContext } from "./context.js";
import { EXIT_CODES, exitCodeForOutcome, type ExitCode } from "./exit-codes.js";
import { createStopSignalHandler } from "./signal-handlers.js";

export type GitLogOptions = {
  range?: string;
  path?: string;
  limit?: number;
  policy?: string;
  format: "text" | "json";
  output?: string;
};

export type GitDiffOptions = Omit<GitLogOptions, "range" | "limit">;

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerGitCommand(program: Command, onExit: (code: ExitCode) => void): void {
  const git = program.command("git").description("Explain config changes across git history");

  git
    .command("log")
    .description("Key-level config changes per commit, newest first")
    .option("--range <range>", "Revision range, e.g. main~10..main (defaults to HEAD)")
    .option("--path <path>", "Only files under this path")
    .option("--limit <n>", "Maximum number of commits", parseCount)
    .option("--policy <file>", "Check each changed file against a policy")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write the history to a file instead of stdout")
    .action(async (opts: GitLogOptions, command: Command) => {
      onExit(await runWithContext(command, "git log", (ctx) => gitLogCommand(ctx, opts)));
    });

  git
    .command("diff")
    .description("Key-level config changes between two refs")
    .argument("<refA>", "Old ref")
    .argument("<refB>", "New ref")
    .option("--path <path>", "Only files under this path")
    .option("--policy <file>", "Check files at <refB> against a policy")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write the comparison to a file instead of stdout")
    .action(async (refA: string, refB: string, opts: GitDiffOptions, command: Command) => {
      onExit(await runWithContext(command, "git diff", (ctx) => gitDiffCommand(ctx, refA, refB, opts)));
    });
}

// =============================================================================
// HANDLERS
// =============================================================================

export async function gitLogCommand(
  ctx: CliContext,
  opts: GitLogOptions,
  source?: ConfigHistorySource,
): Promise<ExitCode> {
  const history = source ?? (await openHistory(ctx));
  const policy = resolvePolicy(ctx, opts.policy);
  const stop = createStopSignalHandler({
    onSignal: (signal) => console.error(`Received ${signal}; stopping after the current file.`),
  });

  // Text without --output streams each revision as it is produced.
  const streaming = opts.format === "text" && !opts.output;
  const changeSets: RevisionChangeSet[] = [];
  try {
    for await (const changeSet of walkHistory(history, {
      range: opts.range,
      pathFilter: toPathFilter(ctx, history, opts.path),
      limit: opts.limit ?? ctx.config.history.limit,
      policy,
      maxDepth: ctx.config.max_depth,
      signal: stop.signal,
      logger: ctx.logger,
    })) {
      changeSets.push(changeSet);
      if (streaming) console.log(`${renderChangeSetText(changeSet, ctx.format)}\n`);
    }
  } finally {
    stop.cleanup();
  }

  if (streaming) {
    if (changeSets.length === 0) console.log(renderHistoryText([]));
  } else {
    const content =
      opts.format === "json"
        ? renderJson(changeSets.map(changeSetToJson))
        : renderHistoryText(changeSets, ctx.format);
    emitOutput(ctx, content, opts.output);
  }

  const stoppedBy = stop.stoppedBy();
  if (stoppedBy) {
    console.error(`Stopped by ${stoppedBy} after ${changeSets.length} revisions.`);
    return EXIT_CODES.error;
  }
  return exitCodeForOutcome(changeSets.some((changeSet) => changeSet.violations.length > 0));
}

export async function gitDiffCommand(
  ctx: CliContext,
  refA: string,
  refB: string,
  opts: GitDiffOptions,
  source?: ConfigHistorySource,
): Promise<ExitCode> {
  const history = source ?? (await openHistory(ctx));
  const policy = resolvePolicy(ctx, opts.policy);
  const stop = createStopSignalHandler();

  let changeSet: RevisionChangeSet | null;
  try {
    changeSet = await compareRevisions(history, refA, refB, {
      pathFilter: toPathFilter(ctx, history, opts.path),
      policy,
      maxDepth: ctx.config.max_depth,
      signal: stop.signal,
      logger: ctx.logger,
    });
  } finally {
    stop.cleanup();
  }

  if (!changeSet) {
    console.error("Stopped before the comparison finished.");
    return EXIT_CODES.error;
  }

  const content =
    opts.format === "json" ? renderJson(changeSetToJson(changeSet)) : renderComparisonText(changeSet, ctx);
  emitOutput(ctx, content, opts.output);

  const hasFindings = changeSet.file_changes.length > 0 || changeSet.violations.length > 0;
  return exitCodeForOutcome(hasFindings);
}

// =============================================================================
// HELPERS
// =============================================================================

function openHistory(ctx: CliContext): Promise<ConfigHistorySource> {
  return createGitHistorySource(ctx.cwd, { timeoutMs: ctx.config.history.timeout_ms });
}

function renderComparisonText(changeSet: RevisionChangeSet, ctx: CliContext): string {
  const body = renderChangeSetText(changeSet, ctx.format);
  return changeSet.file_changes.length === 0 && changeSet.errors.length === 0
    ? `${body}\nNo config changes.`
    : body;
}

/** Map a cwd-relative --path onto the repository-relative prefix the walker filters on. */
export function toPathFilter(
  ctx: Pick<CliContext, "cwd">,
  source: Pick<ConfigHistorySource, "root">,
  value: string | undefined,
): string | undefined {
  if (!value) return undefined;
  const relative = toPosixPath(path.relative(source.root, path.resolve(ctx.cwd, value)));
  return relative === "" ? undefined : relative;
}
