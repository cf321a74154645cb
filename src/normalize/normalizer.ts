// Config normalizer.
// Purpose: turn raw config bytes into a canonical tree and its flattened key-path mapping.
// Assumes the format comes from the file extension unless the caller names one.

import { DEFAULT_MAX_DEPTH } from "../core/config.js";
import { ParseError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { CanonicalValue } from "../model/canonical.js";
import { flattenValue, type FlattenedMapping } from "../model/flatten.js";
import { detectFormat, type ConfigFormat } from "./formats.js";
import { decodeUtf8, parseJson, parseToml, parseYaml } from "./parsers.js";

export type NormalizeOptions = {
  maxDepth?: number;
};

export type NormalizeFileOptions = NormalizeOptions & {
  format?: ConfigFormat;
};

export type NormalizedFile = {
  path: string;
  format: ConfigFormat;
  mapping: FlattenedMapping;
};

export function parseConfig(
  bytes: Uint8Array,
  format: ConfigFormat,
  options: NormalizeOptions = {},
): CanonicalValue | null {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const text = decodeUtf8(bytes, format);

  switch (format) {
    case "yaml":
      return parseYaml(text, maxDepth);
    case "json":
      return parseJson(text, maxDepth);
    case "toml":
      return parseToml(text, maxDepth);
  }
}

export function normalize(
  bytes: Uint8Array,
  format: ConfigFormat,
  options: NormalizeOptions = {},
): FlattenedMapping {
  return flattenValue(parseConfig(bytes, format, options));
}

/** Normalizes one file's bytes; ParseErrors are re-thrown with the file path attached. */
export function normalizeFile(
  filePath: string,
  bytes: Uint8Array,
  options: NormalizeFileOptions = {},
): NormalizedFile {
  const format = options.format ?? detectFormat(filePath);
  if (!format) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Unsupported file type.",
      message: `Cannot detect the config format of ${filePath}.`,
      hint: "Use a .yaml, .yml, .json or .toml file.",
    });
  }

  try {
    return { path: filePath, format, mapping: normalize(bytes, format, options) };
  } catch (err) {
    if (err instanceof ParseError) throw err.withFile(filePath);
    throw err;
  }
}
