import type { Command } from "commander";

import { initProjectConfig } from "../core/config-discovery.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export function registerInitCommand(program: Command, onExit: (code: ExitCode) => void): void {
  program
    .command("init")
    .description("Write a default .confaudit.yaml at the repository root")
    .option("--force", "Overwrite an existing config file", false)
    .action((opts: { force: boolean }) => {
      onExit(initCommand({ cwd: process.cwd(), force: opts.force }));
    });
}

export function initCommand(opts: { cwd: string; force?: boolean }): ExitCode {
  const result = initProjectConfig({ cwd: opts.cwd, force: opts.force });

  if (result.status === "created") {
    console.log(`Created confaudit config at ${result.configPath}`);
    console.log(`Edit ${result.configPath} to set ignore globs, a default policy and logging.`);
    return EXIT_CODES.clean;
  }

  if (result.status === "overwritten") {
    console.log(`Overwrote confaudit config at ${result.configPath}`);
    console.log(`Review ${result.configPath} for your project settings.`);
    return EXIT_CODES.clean;
  }

  console.log(`Config already exists at ${result.configPath}`);
  console.log("Pass --force to overwrite it.");
  return EXIT_CODES.clean;
}
