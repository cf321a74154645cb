import { Option, type Command } from "commander";

import { renderJson } from "../report/render-json.js";
import { renderSecretsText } from "../report/render-text.js";
import { scanInventorySecrets } from "../secrets/scanner.js";
import { emitOutput, runWithContext, scanTarget, type CliContext } from "./context.js";
import { exitCodeForOutcome, type ExitCode } from "./exit-codes.js";

export type SecretsCommandOptions = {
  format: "text" | "json";
  output?: string;
};

export function registerSecretsCommand(program: Command, onExit: (code: ExitCode) => void): void {
  program
    .command("secrets")
    .description("Scan config files for embedded credentials")
    .argument("<path>", "Config file or directory")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write findings to a file instead of stdout")
    .action(async (target: string, opts: SecretsCommandOptions, command: Command) => {
      onExit(await runWithContext(command, "secrets", (ctx) => secretsCommand(ctx, target, opts)));
    });
}

export function secretsCommand(ctx: CliContext, target: string, opts: SecretsCommandOptions): ExitCode {
  const report = scanInventorySecrets(scanTarget(ctx, target));

  ctx.logger?.log({
    type: "secrets.complete",
    payload: { files: report.scanned_files, findings: report.total_findings },
  });

  const content = opts.format === "json" ? renderJson(report) : renderSecretsText(report, ctx.format);
  emitOutput(ctx, content, opts.output);
  return exitCodeForOutcome(report.total_findings > 0);
}
