// JSONL event logging.
// Purpose: append structured audit events to a log file, one JSON object per line.
// Assumes callers pass JSON-serializable payloads; writes are synchronous and append-only.

import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type JsonlLoggerContext = {
  command?: string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  readonly filePath: string;
  private readonly context: JsonlLoggerContext;
  private ensured = false;

  constructor(filePath: string, context: JsonlLoggerContext = {}) {
    this.filePath = path.resolve(filePath);
    this.context = context;
  }

  log(event: LogEvent): void {
    if (!this.ensured) {
      fse.ensureDirSync(path.dirname(this.filePath));
      this.ensured = true;
    }

    const line: JsonObject = {
      ts: new Date().toISOString(),
      type: event.type,
      ...(this.context.command ? { command: this.context.command } : {}),
      ...(event.payload ?? {}),
    };
    fse.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

export function logAuditEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log({ type, payload });
}

export function readJsonlEvents(filePath: string): JsonObject[] {
  if (!fse.existsSync(filePath)) return [];

  return fse
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line): unknown => JSON.parse(line))
    .filter(isJsonObject);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
