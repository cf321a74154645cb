import fs from "node:fs";
import path from "node:path";

import { Option, type Command } from "commander";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { loadSnapshot, looksLikeSnapshot, snapshotTreeFiles } from "../diff/snapshot.js";
import { diffTrees, treeDiffHasChanges, type TreeFile } from "../diff/tree-diff.js";
import { normalizeFile } from "../normalize/normalizer.js";
import { renderJson, treeDiffToJson } from "../report/render-json.js";
import { renderTreeDiffText } from "../report/render-text.js";
import { emitOutput, runWithContext, scanTarget, type CliContext } from "./context.js";
import { exitCodeForOutcome, type ExitCode } from "./exit-codes.js";

export type DiffCommandOptions = {
  format: "text" | "json";
  output?: string;
};

type DiffSide =
  | { kind: "file"; absolute: string }
  | { kind: "tree"; files: TreeFile[] };

export function registerDiffCommand(program: Command, onExit: (code: ExitCode) => void): void {
  program
    .command("diff")
    .description("Key-level diff between two config files, directories or snapshots")
    .argument("<old>", "Old side: config file, directory or snapshot")
    .argument("<new>", "New side: config file, directory or snapshot")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write the diff to a file instead of stdout")
    .action(async (oldTarget: string, newTarget: string, opts: DiffCommandOptions, command: Command) => {
      onExit(await runWithContext(command, "diff", (ctx) => diffCommand(ctx, oldTarget, newTarget, opts)));
    });
}

export function diffCommand(
  ctx: CliContext,
  oldTarget: string,
  newTarget: string,
  opts: DiffCommandOptions,
): ExitCode {
  const oldSide = loadSide(ctx, oldTarget);
  const newSide = loadSide(ctx, newTarget);

  // Two plain files are compared with each other whatever their names.
  const label = newSide.kind === "file" ? path.basename(newSide.absolute) : null;
  const diff = diffTrees(toTreeFiles(ctx, oldSide, label), toTreeFiles(ctx, newSide, label));

  ctx.logger?.log({
    type: "diff.complete",
    payload: {
      old: oldTarget,
      new: newTarget,
      files_changed: diff.summary.files_changed,
      added: diff.summary.added,
      removed: diff.summary.removed,
      changed: diff.summary.changed,
    },
  });

  const content =
    opts.format === "json" ? renderJson(treeDiffToJson(diff)) : renderTreeDiffText(diff, ctx.format);
  emitOutput(ctx, content, opts.output);
  return exitCodeForOutcome(treeDiffHasChanges(diff));
}

function loadSide(ctx: CliContext, target: string): DiffSide {
  const absolute = path.resolve(ctx.cwd, target);
  if (!fs.existsSync(absolute)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Path not found.",
      message: `${absolute} does not exist.`,
      hint: "Pass a config file, a directory or a snapshot written by `confaudit scan --snapshot`.",
    });
  }

  if (looksLikeSnapshot(absolute)) {
    return { kind: "tree", files: snapshotTreeFiles(loadSnapshot(absolute)) };
  }
  if (fs.statSync(absolute).isFile()) {
    return { kind: "file", absolute };
  }

  const inventory = scanTarget(ctx, absolute);
  return {
    kind: "tree",
    files: inventory.files.map((file) => ({ path: file.path, mapping: file.mapping, error: file.error })),
  };
}

function toTreeFiles(ctx: CliContext, side: DiffSide, label: string | null): TreeFile[] {
  if (side.kind === "tree") return side.files;

  // A file named directly must parse; its ParseError is fatal.
  const normalized = normalizeFile(side.absolute, fs.readFileSync(side.absolute), {
    maxDepth: ctx.config.max_depth,
  });
  return [{ path: label ?? path.basename(side.absolute), mapping: normalized.mapping, error: null }];
}
