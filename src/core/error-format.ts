/*
Purpose: normalize errors into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: renderErrorLines(formatErrorLines(err, { mode }), createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }))).
*/

import { toUserFacingError, type UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream?.isTTY);

  if (options.useColor === undefined) {
    return isTty && process.env.NO_COLOR === undefined;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [];

  const title = normalizeRequiredText(normalized.title, DEFAULT_ERROR_TITLE);
  const message = normalizeRequiredText(normalized.message, DEFAULT_ERROR_MESSAGE);

  lines.push({ kind: "title", text: title });

  if (message !== title) {
    lines.push({ kind: "message", text: message });
  }

  const hint = normalizeOptionalText(normalized.hint);
  if (hint) {
    lines.push({ kind: "hint", text: hint });
  }

  const next = normalizeOptionalText(normalized.next);
  if (next) {
    lines.push({ kind: "next", text: next });
  }

  if (mode === "debug") {
    lines.push(...formatDebugLines(error, normalized, message));
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map((line) => {
    switch (line.kind) {
      case "title":
        return format(`Error: ${line.text}`, ["bold", "red"]);
      case "hint":
        return format(`Hint: ${line.text}`, ["yellow"]);
      case "next":
        return format(`Next: ${line.text}`, ["cyan"]);
      case "message":
        return line.text;
      default:
        return format(`${line.kind}: ${line.text}`, ["dim"]);
    }
  });
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = normalizeOptionalText(error.message);
    if (message) {
      return message;
    }

    const name = normalizeOptionalText(error.name);
    if (name) {
      return name;
    }
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function formatDebugLines(
  error: unknown,
  normalized: UserFacingError,
  message: string,
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [{ kind: "code", text: normalized.code }];
  const source = normalized.cause instanceof Error ? normalized.cause : error;

  if (source instanceof Error) {
    const name = normalizeOptionalText(source.name);
    if (name) {
      lines.push({ kind: "name", text: name });
    }
  }

  const innerCause = source instanceof Error ? source.cause : undefined;
  if (innerCause !== undefined && innerCause !== null) {
    const causeText = normalizeOptionalText(formatErrorMessage(innerCause));
    if (causeText && causeText !== message) {
      lines.push({ kind: "cause", text: causeText });
    }
  }

  if (source instanceof Error && source.stack) {
    lines.push({ kind: "stack", text: source.stack });
  }

  return lines;
}

function normalizeRequiredText(value: string | undefined, fallback: string): string {
  return normalizeOptionalText(value) ?? fallback;
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
