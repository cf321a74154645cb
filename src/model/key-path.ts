// Dotted key-path helpers.
// Purpose: join, split and relate key paths such as `database.hosts.0.port`.
// Map keys containing `.` or `\` are escaped with `\` so every path stays unique.

export const ROOT_PATH = "";

export function escapeKeySegment(segment: string): string {
  return segment.replace(/[\\.]/g, (char) => `\\${char}`);
}

export function joinKeyPath(parent: string | null, segment: string): string {
  return parent === null ? segment : `${parent}.${segment}`;
}

export function splitKeyPath(keyPath: string): string[] {
  const segments: string[] = [];
  let current = "";

  for (let index = 0; index < keyPath.length; index += 1) {
    const char = keyPath[index];
    if (char === "\\" && index + 1 < keyPath.length) {
      current += keyPath[index + 1];
      index += 1;
      continue;
    }
    if (char === ".") {
      segments.push(current);
      current = "";
      continue;
    }
    current += char;
  }

  segments.push(current);
  return segments;
}

/** True when `keyPath` sits strictly below `ancestor`. The root path is an ancestor of every other path. */
export function isDescendantPath(keyPath: string, ancestor: string): boolean {
  if (ancestor === ROOT_PATH) {
    return keyPath !== ROOT_PATH;
  }
  return keyPath.startsWith(`${ancestor}.`);
}

export function compareKeyPaths(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
