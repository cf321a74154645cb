import { Command, CommanderError } from "commander";

import { createAnsiFormatter, formatErrorLines, renderErrorLines, resolveColorEnabled } from "../core/error-format.js";
import { registerDiffCommand } from "./diff.js";
import { EXIT_CODES, exitCodeForError, type ExitCode } from "./exit-codes.js";
import { registerGitCommand } from "./git.js";
import { registerInitCommand } from "./init.js";
import { registerPolicyCommand } from "./policy.js";
import { registerReportCommand } from "./report.js";
import { registerScanCommand } from "./scan.js";
import { registerSecretsCommand } from "./secrets.js";

export const CONFAUDIT_VERSION = "0.4.0";

export function buildProgram(onExit: (code: ExitCode) => void): Command {
  const program = new Command();

  program
    .name("confaudit")
    .description("Audit YAML, JSON and TOML config for drift, secrets and policy compliance")
    .version(CONFAUDIT_VERSION)
    .option("--config <path>", "Path to .confaudit.yaml (defaults to the nearest one above the working directory)")
    .option("--debug", "Show error causes and stack traces", false)
    .option("--no-color", "Disable ANSI colors")
    .exitOverride();

  registerScanCommand(program, onExit);
  registerDiffCommand(program, onExit);
  registerSecretsCommand(program, onExit);
  registerPolicyCommand(program, onExit);
  registerGitCommand(program, onExit);
  registerReportCommand(program, onExit);
  registerInitCommand(program, onExit);

  return program;
}

/** Parse `argv` (node-style, including the executable and script), run one command and return its exit code. */
export async function runCli(argv: string[]): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.clean;
  const program = buildProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (err) {
    // Commander has already printed usage errors, help and the version.
    if (err instanceof CommanderError) {
      return exitCodeForError(err);
    }

    const globals = program.opts<{ debug?: boolean; color?: boolean }>();
    const useColor = globals.color === false ? false : undefined;
    const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr, useColor }));
    const mode = globals.debug ? "debug" : "short";
    for (const line of renderErrorLines(formatErrorLines(err, { mode }), format)) {
      console.error(line);
    }
    return exitCodeForError(err);
  }
}
