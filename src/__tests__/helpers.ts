import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { FlattenedMapping } from "../model/flatten.js";
import { normalize } from "../normalize/normalizer.js";

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

/** Flattened mapping of a plain JS document, parsed the way a JSON file would be. */
export function flat(document: unknown): FlattenedMapping {
  return normalize(encode(JSON.stringify(document)), "json");
}

export function makeTempDir(prefix = "confaudit-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, "utf8");
  }
}
