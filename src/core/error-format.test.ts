import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import {
  HistoryError,
  ParseError,
  PolicyError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  toUserFacingError,
} from "./errors.js";

const plain = createAnsiFormatter(false);

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: "max_depth must be a positive integer",
      hint: "Fix the listed keys in .confaudit.yaml.",
      next: "Run confaudit init --force",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next"]);
    expect(lines[0]?.text).toBe("Project config invalid.");
    expect(lines[1]?.text).toBe("max_depth must be a positive integer");
  });

  it("includes the error code, class name and cause in debug mode", () => {
    const error = new PolicyError("Policy file team.yaml failed validation", {
      issues: ["rules: Policy must contain at least one rule"],
      cause: new Error("schema mismatch"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines).toContainEqual({ kind: "code", text: "POLICY_ERROR" });
    expect(lines).toContainEqual({ kind: "name", text: "PolicyError" });
    expect(lines).toContainEqual({ kind: "cause", text: "schema mismatch" });
    expect(lines.some((line) => line.kind === "stack")).toBe(true);
  });

  it("lists policy issues under the message", () => {
    const error = new PolicyError("Policy file team.yaml failed validation", {
      issues: ["rules.0.id: Required", "rules.1.check.regex: Invalid regex in rule 'x'"],
    });

    const lines = formatErrorLines(error);

    expect(lines[0]).toEqual({ kind: "title", text: "Policy file is invalid." });
    expect(lines[1]?.text).toBe(
      "Policy file team.yaml failed validation\n  - rules.0.id: Required\n  - rules.1.check.regex: Invalid regex in rule 'x'",
    );
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("toUserFacingError", () => {
  it("maps parse errors with their file and location", () => {
    const error = new ParseError({
      format: "yaml",
      reason: "bad indentation of a mapping entry",
      location: { line: 3, column: 5 },
      file: "deploy/app.yaml",
    });

    const mapped = toUserFacingError(error);

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.parse);
    expect(mapped.title).toBe("Config file could not be parsed.");
    expect(mapped.message).toBe(
      "Invalid YAML in deploy/app.yaml at line 3, column 5: bad indentation of a mapping entry",
    );
  });

  it("maps history errors to the history code", () => {
    const mapped = toUserFacingError(new HistoryError("Unknown revision 'nope'"));

    expect(mapped.code).toBe(USER_FACING_ERROR_CODES.history);
    expect(mapped.message).toBe("Unknown revision 'nope'");
  });

  it("returns user-facing errors unchanged", () => {
    const error = new UserFacingError({ code: USER_FACING_ERROR_CODES.usage, title: "t", message: "m" });
    expect(toUserFacingError(error)).toBe(error);
  });
});

describe("renderErrorLines", () => {
  it("prefixes titles, hints and next steps", () => {
    const lines = renderErrorLines(
      [
        { kind: "title", text: "Git history unavailable." },
        { kind: "message", text: "/tmp/x is not inside a git repository" },
        { kind: "hint", text: "Run inside a git repository." },
        { kind: "next", text: "git init" },
      ],
      plain,
    );

    expect(lines).toEqual([
      "Error: Git history unavailable.",
      "/tmp/x is not inside a git repository",
      "Hint: Run inside a git repository.",
      "Next: git init",
    ]);
  });

  it("renders a formatted error without color for a non-TTY stream", () => {
    const format = createAnsiFormatter(resolveColorEnabled({ stream: { isTTY: false } }));

    const lines = renderErrorLines(formatErrorLines(new HistoryError("Unknown revision 'nope'")), format);

    expect(lines).toEqual([
      "Error: Git history unavailable.",
      "Unknown revision 'nope'",
      "Hint: Run inside a git repository and pass refs that resolve to commits.",
    ]);
  });
});

describe("resolveColorEnabled", () => {
  let savedNoColor: string | undefined;

  beforeEach(() => {
    savedNoColor = process.env.NO_COLOR;
    delete process.env.NO_COLOR;
  });

  afterEach(() => {
    if (savedNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = savedNoColor;
    }
  });

  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("honors NO_COLOR when no flag is given", () => {
    process.env.NO_COLOR = "1";
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(false);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: true })).toBe(true);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(plain("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);
    expect(format("alert", ["red", "bold"])).toBe("\x1b[31m\x1b[1malert\x1b[0m");
  });
});
