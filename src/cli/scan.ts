import path from "node:path";

import { Option, type Command } from "commander";

import { createSnapshot, writeSnapshot } from "../diff/snapshot.js";
import { inventoryToJson, renderJson } from "../report/render-json.js";
import { renderInventoryText } from "../report/render-text.js";
import { emitOutput, runWithContext, scanTarget, type CliContext } from "./context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export type ScanCommandOptions = {
  format: "text" | "json";
  output?: string;
  snapshot?: string;
};

export function registerScanCommand(program: Command, onExit: (code: ExitCode) => void): void {
  program
    .command("scan")
    .description("Inventory config files under a path")
    .argument("<path>", "Config file or directory")
    .addOption(new Option("--format <format>", "Output format").choices(["text", "json"]).default("text"))
    .option("--output <file>", "Write the inventory to a file instead of stdout")
    .option("--snapshot <file>", "Also save a snapshot for later `confaudit diff`")
    .action(async (target: string, opts: ScanCommandOptions, command: Command) => {
      onExit(await runWithContext(command, "scan", (ctx) => scanCommand(ctx, target, opts)));
    });
}

export function scanCommand(ctx: CliContext, target: string, opts: ScanCommandOptions): ExitCode {
  const inventory = scanTarget(ctx, target);

  const snapshotPath = opts.snapshot ? path.resolve(ctx.cwd, opts.snapshot) : null;
  if (snapshotPath) {
    const snapshot = createSnapshot(inventory);
    writeSnapshot(snapshotPath, snapshot);
    ctx.logger?.log({
      type: "snapshot.written",
      payload: { path: snapshotPath, files: snapshot.files.length },
    });
  }

  const content =
    opts.format === "json"
      ? renderJson(inventoryToJson(inventory))
      : renderInventoryText(inventory, ctx.format);
  emitOutput(ctx, content, opts.output);

  if (snapshotPath && opts.format === "text") {
    console.log(`Snapshot saved to ${snapshotPath}`);
  }
  return EXIT_CODES.clean;
}
