import fs from "node:fs";
import path from "node:path";

import { DEFAULT_IGNORE_GLOBS, DEFAULT_MAX_DEPTH } from "./config.js";

export const CONFIG_FILE_NAMES = [".confaudit.yaml", ".confaudit.yml"];

export type ConfigSource = "explicit" | "discovered" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const discovered = findUp(cwd, (dir) => findConfigIn(dir) !== null);
  if (discovered) {
    return { configPath: findConfigIn(discovered), source: "discovered" };
  }

  return { configPath: null, source: "defaults" };
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const root = findRepoRoot(cwd) ?? path.resolve(cwd);
  const existing = findConfigIn(root);
  const configPath = existing ?? path.join(root, CONFIG_FILE_NAMES[0] ?? ".confaudit.yaml");

  if (existing && !(args.force ?? false)) {
    return { configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { configPath, status: existing ? "overwritten" : "created" };
}

export function findRepoRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, ".git")));
}

function findConfigIn(dir: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(dir, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function buildDefaultConfig(): string {
  return [
    "# confaudit project config. Paths are relative to this file.",
    `max_depth: ${DEFAULT_MAX_DEPTH}`,
    "ignore:",
    ...DEFAULT_IGNORE_GLOBS.map((glob) => `  - ${JSON.stringify(glob)}`),
    "",
    "# policy: policies/default.yaml",
    "",
    "history:",
    "  limit: 10",
    "  timeout_ms: 10000",
    "",
    "report:",
    "  history_limit: 5",
    "",
    "# Set logging.file to append JSONL audit events, e.g. .confaudit/audit.jsonl",
    "logging: {}",
    "",
  ].join("\n");
}
