// Per-command context.
// Purpose: resolve global flags, load the project config, open the audit log and pick a text formatter.
// Assumes global options are declared on the root program (see program.ts).

import fs from "node:fs";
import path from "node:path";

import { InvalidArgumentError, type Command } from "commander";
import fse from "fs-extra";

import { defaultProjectConfig, type ProjectConfig } from "../core/config.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath } from "../core/config-discovery.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createAnsiFormatter, resolveColorEnabled, type AnsiFormatter } from "../core/error-format.js";
import { JsonlLogger } from "../core/logger.js";
import { normalizeFile } from "../normalize/normalizer.js";
import { loadPolicy } from "../policy/loader.js";
import type { Policy } from "../policy/types.js";
import { scanConfigTree, type Inventory } from "../report/inventory.js";
import type { ExitCode } from "./exit-codes.js";

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
  color?: boolean;
};

export type CliContext = {
  cwd: string;
  config: ProjectConfig;
  configPath: string | null;
  logger?: JsonlLogger;
  format: AnsiFormatter;
};

export function readGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function createCliContext(command: Command, commandName: string): CliContext {
  const globals = readGlobalOptions(command);
  const cwd = process.cwd();
  const resolution = resolveProjectConfigPath({ explicitPath: globals.config, cwd });
  const config = resolution.configPath ? loadProjectConfig(resolution.configPath) : defaultProjectConfig();

  const useColor = globals.color === false ? false : undefined;
  return {
    cwd,
    config,
    configPath: resolution.configPath,
    logger: config.logging.file ? new JsonlLogger(config.logging.file, { command: commandName }) : undefined,
    format: createAnsiFormatter(resolveColorEnabled({ stream: process.stdout, useColor })),
  };
}

// =============================================================================
// INPUTS
// =============================================================================

/**
 * Scan a file or directory. A single file named directly must parse, so its
 * ParseError surfaces as a fatal error instead of an inventory entry.
 */
export function scanTarget(ctx: CliContext, target: string): Inventory {
  const resolved = path.resolve(ctx.cwd, target);
  if (fs.existsSync(resolved) && fs.statSync(resolved).isFile()) {
    normalizeFile(resolved, fs.readFileSync(resolved), { maxDepth: ctx.config.max_depth });
  }
  return scanConfigTree(resolved, {
    ignore: ctx.config.ignore,
    maxDepth: ctx.config.max_depth,
    logger: ctx.logger,
  });
}

export function resolvePolicy(ctx: CliContext, explicitPath: string | undefined): Policy | null {
  const policyPath = explicitPath ? path.resolve(ctx.cwd, explicitPath) : ctx.config.policy;
  if (!policyPath) return null;

  const policy = loadPolicy(policyPath);
  ctx.logger?.log({
    type: "policy.loaded",
    payload: { policy: policy.name, source: policyPath, rules: policy.rules.length },
  });
  return policy;
}

export function requirePolicy(ctx: CliContext, explicitPath: string | undefined): Policy {
  const policy = resolvePolicy(ctx, explicitPath);
  if (!policy) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "No policy given.",
      message: "This command needs a policy file.",
      hint: "Pass --policy <file> or set `policy` in .confaudit.yaml.",
    });
  }
  return policy;
}

// =============================================================================
// OUTPUT
// =============================================================================

export type OutputFormat = "text" | "json" | "markdown";

/** Print to stdout, or write to `outputPath` and print where it went. */
export function emitOutput(ctx: CliContext, content: string, outputPath: string | undefined): void {
  if (!outputPath) {
    console.log(content);
    return;
  }

  const resolved = path.resolve(ctx.cwd, outputPath);
  fse.outputFileSync(resolved, content.endsWith("\n") ? content : `${content}\n`, "utf8");
  console.log(`Wrote ${resolved}`);
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${value}'.`);
  }
  return parsed;
}

// =============================================================================
// COMMAND LIFECYCLE
// =============================================================================

/** Build the context, run the handler and log the outcome to the audit log. */
export async function runWithContext(
  command: Command,
  commandName: string,
  handler: (ctx: CliContext) => ExitCode | Promise<ExitCode>,
): Promise<ExitCode> {
  const ctx = createCliContext(command, commandName);
  const startedAt = Date.now();
  try {
    const exitCode = await handler(ctx);
    ctx.logger?.log({
      type: "command.complete",
      payload: { exit_code: exitCode, duration_ms: Date.now() - startedAt },
    });
    return exitCode;
  } catch (err) {
    ctx.logger?.log({
      type: "command.failed",
      payload: { error: err instanceof Error ? err.message : String(err) },
    });
    throw err;
  }
}
