import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeTempDir, writeFiles } from "../__tests__/helpers.js";
import { DEFAULT_IGNORE_GLOBS, defaultProjectConfig } from "./config.js";
import { findRepoRoot, initProjectConfig, resolveProjectConfigPath } from "./config-discovery.js";
import { loadProjectConfig, parseProjectConfig } from "./config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

describe("parseProjectConfig", () => {
  it("fills defaults for an empty file", () => {
    expect(parseProjectConfig("", "/work/.confaudit.yaml")).toEqual({
      max_depth: 64,
      ignore: DEFAULT_IGNORE_GLOBS,
      policy: undefined,
      history: { limit: 10, timeout_ms: 10_000 },
      report: { history_limit: 5 },
      logging: { file: undefined },
    });
  });

  it("resolves policy and log paths against the config file", () => {
    const config = parseProjectConfig(
      "policy: policies/prod.yaml\nlogging:\n  file: /var/log/confaudit.jsonl\n",
      "/work/.confaudit.yaml",
    );

    expect(config.policy).toBe(path.resolve("/work", "policies/prod.yaml"));
    expect(config.logging.file).toBe("/var/log/confaudit.jsonl");
  });

  it("rejects unknown keys", () => {
    const result = (() => {
      try {
        return parseProjectConfig("colour: red\n", "/work/.confaudit.yaml");
      } catch (err) {
        return err;
      }
    })();

    expect(result).toBeInstanceOf(UserFacingError);
    expect(result).toHaveProperty("code", USER_FACING_ERROR_CODES.config);
    expect(result).toHaveProperty(
      "message",
      "/work/.confaudit.yaml failed validation:\n  - <root>: Unrecognized keys: colour",
    );
  });

  it("lists every invalid field", () => {
    expect(() =>
      parseProjectConfig("max_depth: deep\nhistory:\n  limit: 0\n", "/work/.confaudit.yaml"),
    ).toThrow(
      "/work/.confaudit.yaml failed validation:\n  - max_depth: Expected number, received string\n  - history.limit: Number must be greater than 0",
    );
  });

  it("reports YAML syntax errors as config errors", () => {
    expect(() => parseProjectConfig("ignore: [\n", "/work/.confaudit.yaml")).toThrow(
      "Could not parse /work/.confaudit.yaml as YAML.",
    );
  });
});

describe("config files on disk", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("confaudit-config-");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports a missing explicit config", () => {
    expect(() => loadProjectConfig(path.join(tmpDir, "missing.yaml"))).toThrow(
      `No config file found at ${path.join(tmpDir, "missing.yaml")}.`,
    );
  });

  it("discovers the nearest config in a parent directory", () => {
    writeFiles(tmpDir, { ".confaudit.yml": "max_depth: 8\n", "services/api/app.yaml": "a: 1\n" });

    const resolution = resolveProjectConfigPath({ cwd: path.join(tmpDir, "services/api") });

    expect(resolution).toEqual({ configPath: path.join(tmpDir, ".confaudit.yml"), source: "discovered" });
    expect(loadProjectConfig(path.join(tmpDir, ".confaudit.yml")).max_depth).toBe(8);
  });

  it("prefers an explicit path relative to the working directory", () => {
    expect(resolveProjectConfigPath({ explicitPath: "conf/audit.yaml", cwd: tmpDir })).toEqual({
      configPath: path.join(tmpDir, "conf/audit.yaml"),
      source: "explicit",
    });
  });

  it("finds the repository root by its .git directory", () => {
    fs.mkdirSync(path.join(tmpDir, ".git"));
    fs.mkdirSync(path.join(tmpDir, "deploy"));

    expect(findRepoRoot(path.join(tmpDir, "deploy"))).toBe(tmpDir);
  });

  it("writes a default config at the repository root that loads back to the defaults", () => {
    fs.mkdirSync(path.join(tmpDir, ".git"));
    fs.mkdirSync(path.join(tmpDir, "deploy"));

    const created = initProjectConfig({ cwd: path.join(tmpDir, "deploy") });

    expect(created).toEqual({ configPath: path.join(tmpDir, ".confaudit.yaml"), status: "created" });
    expect(loadProjectConfig(created.configPath)).toEqual(defaultProjectConfig());
  });

  it("keeps an existing config unless forced", () => {
    fs.mkdirSync(path.join(tmpDir, ".git"));
    writeFiles(tmpDir, { ".confaudit.yaml": "max_depth: 3\n" });
    const configPath = path.join(tmpDir, ".confaudit.yaml");

    expect(initProjectConfig({ cwd: tmpDir })).toEqual({ configPath, status: "exists" });
    expect(fs.readFileSync(configPath, "utf8")).toBe("max_depth: 3\n");

    expect(initProjectConfig({ cwd: tmpDir, force: true })).toEqual({ configPath, status: "overwritten" });
    expect(loadProjectConfig(configPath).max_depth).toBe(64);
  });
});
