import path from "node:path";

import { Option, type Command } from "commander";

import { evaluatePolicyOnFiles } from "../policy/evaluator.js";
import { loadPolicy } from "../policy/loader.js";
import { renderJson } from "../report/render-json.js";
import { renderPolicyText } from "../report/render-text.js";
import { emitOutput, runWithContext, requirePolicy, scanTarget, type CliContext } from "./context.js";
import { EXIT_CODES, exitCodeForOutcome, type ExitCode } from "./exit-codes.js";

export type PolicyCheckOptions = {
  policy?: string;
  format: "text" | "json";
  output?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerPolicyCommand(program: Command, onExit: (code: ExitCode) => void): void {
  const policy = program.command("policy").description("Evaluate and validate policy files");

  policy
    .command("check")
    .description("Check config files against a policy")
    .argument("<path>", "Config file or directory")
    .option("--policy <file>", "Policy file (defaults to `policy` in .confaudit.yaml)")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (target: string, opts: PolicyCheckOptions, command: Command) => {
      onExit(await runWithContext(command, "policy check", (ctx) => policyCheckCommand(ctx, target, opts)));
    });

  policy
    .command("validate")
    .description("Validate a policy file without checking anything")
    .argument("<file>", "Policy file")
    .action(async (file: string, _opts: unknown, command: Command) => {
      onExit(await runWithContext(command, "policy validate", (ctx) => policyValidateCommand(ctx, file)));
    });
}

// =============================================================================
// HANDLERS
// =============================================================================

export function policyCheckCommand(ctx: CliContext, target: string, opts: PolicyCheckOptions): ExitCode {
  const policy = requirePolicy(ctx, opts.policy);
  const inventory = scanTarget(ctx, target);
  const report = evaluatePolicyOnFiles(policy, inventory.files);

  ctx.logger?.log({
    type: "policy.complete",
    payload: {
      policy: report.policy_name,
      files_checked: report.total_files_checked,
      violations: report.total_violations,
    },
  });

  const content = opts.format === "json" ? renderJson(report) : renderPolicyText(report, ctx.format);
  emitOutput(ctx, content, opts.output);
  return exitCodeForOutcome(report.total_violations > 0);
}

export function policyValidateCommand(ctx: CliContext, file: string): ExitCode {
  const policy = loadPolicy(path.resolve(ctx.cwd, file));
  const ruleCount = policy.rules.length;
  console.log(`Policy '${policy.name}' is valid (${ruleCount} ${ruleCount === 1 ? "rule" : "rules"}).`);
  return EXIT_CODES.clean;
}
