import path from "node:path";

export type ConfigFormat = "yaml" | "json" | "toml";

const EXTENSION_FORMATS: Record<string, ConfigFormat> = {
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
  ".toml": "toml",
};

export function detectFormat(filePath: string): ConfigFormat | null {
  const extension = path.extname(filePath).toLowerCase();
  return EXTENSION_FORMATS[extension] ?? null;
}

export function isConfigPath(filePath: string): boolean {
  return detectFormat(filePath) !== null;
}
