import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { ProjectConfigSchema, formatConfigIssues, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const CONFIG_HINT = "Run `confaudit init` to create a default .confaudit.yaml.";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No config file found at ${resolved}.`,
      hint: CONFIG_HINT,
    });
  }

  const raw = fs.readFileSync(resolved, "utf8");
  return parseProjectConfig(raw, resolved);
}

export function parseProjectConfig(raw: string, source: string): ProjectConfig {
  let document: unknown;
  try {
    document = yaml.load(raw, { filename: source });
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Could not parse ${source} as YAML.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Invalid YAML in ${source}`, err),
    });
  }

  const parsed = ProjectConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `${source} failed validation:\n  - ${issues.join("\n  - ")}`,
      hint: "Fix the listed keys in .confaudit.yaml.",
      cause: new ConfigError(issues.join("; "), parsed.error),
    });
  }

  const config = parsed.data;
  return {
    ...config,
    policy: resolveRelative(config.policy, source),
    logging: { ...config.logging, file: resolveRelative(config.logging.file, source) },
  };
}

function resolveRelative(value: string | undefined, source: string): string | undefined {
  if (value === undefined) return undefined;
  return path.isAbsolute(value) ? value : path.resolve(path.dirname(source), value);
}
