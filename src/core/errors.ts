/*
Purpose: core error types shared by the normalizer, policy engine, history walker and CLI.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new PolicyError("...", { issues }); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

import type { ConfigFormat } from "../normalize/formats.js";

// =============================================================================
// CORE ERRORS
// =============================================================================

export class AuditError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AuditError";
  }
}

export class ConfigError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type SourceLocation = {
  line: number;
  column: number;
};

export type ParseErrorInput = {
  format: ConfigFormat | "snapshot";
  reason: string;
  location?: SourceLocation | null;
  file?: string;
  cause?: unknown;
};

export class ParseError extends AuditError {
  public readonly format: ConfigFormat | "snapshot";
  public readonly reason: string;
  public readonly location: SourceLocation | null;
  public readonly file: string | null;

  constructor(input: ParseErrorInput) {
    super(formatParseMessage(input), input.cause);
    this.name = "ParseError";
    this.format = input.format;
    this.reason = input.reason;
    this.location = input.location ?? null;
    this.file = input.file ?? null;
  }

  withFile(file: string): ParseError {
    return new ParseError({
      format: this.format,
      reason: this.reason,
      location: this.location,
      file,
      cause: this.cause,
    });
  }
}

export class PolicyError extends AuditError {
  public readonly issues: string[];

  constructor(message: string, opts: { issues?: string[]; cause?: unknown } = {}) {
    super(message, opts.cause);
    this.name = "PolicyError";
    this.issues = opts.issues ?? [];
  }
}

export class HistoryError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "HistoryError";
  }
}

export class RetrievalError extends AuditError {
  constructor(
    message: string,
    public readonly revision: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RetrievalError";
  }
}

export class GitError extends AuditError {
  constructor(
    message: string,
    public readonly stderr: string = "",
    public readonly exitCode: number | null = null,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "GitError";
  }
}

function formatParseMessage(input: ParseErrorInput): string {
  const where = input.location ? ` at line ${input.location.line}, column ${input.location.column}` : "";
  const file = input.file ? ` in ${input.file}` : "";
  return `Invalid ${input.format.toUpperCase()}${file}${where}: ${input.reason}`;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  parse: "PARSE_ERROR",
  policy: "POLICY_ERROR",
  history: "HISTORY_ERROR",
  usage: "USAGE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof ParseError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.parse,
      title: "Config file could not be parsed.",
      message: error.message,
      hint: "Fix the syntax error or exclude the file with an ignore glob.",
      cause: error,
    });
  }

  if (error instanceof PolicyError) {
    const details = error.issues.length > 0 ? `\n  - ${error.issues.join("\n  - ")}` : "";
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.policy,
      title: "Policy file is invalid.",
      message: `${error.message}${details}`,
      hint: "Check the policy with `confaudit policy validate <file>`.",
      cause: error,
    });
  }

  if (error instanceof HistoryError || error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.history,
      title: "Git history unavailable.",
      message: error.message,
      hint: "Run inside a git repository and pass refs that resolve to commits.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: error.message,
      hint: "Edit .confaudit.yaml or run `confaudit init --force` to regenerate it.",
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error",
    message,
    cause: error,
  });
}
