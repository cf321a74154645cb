// Git-backed history source.
// Purpose: implement ConfigHistorySource with git log, git show and git ls-tree.
// Assumes a non-bare checkout; paths are repository-relative with forward slashes.

import { GitError, HistoryError, RetrievalError } from "../core/errors.js";
import { git, gitBytes } from "../git/git.js";
import type { ConfigHistorySource, LogQuery, RevisionMetadata } from "./vcs.js";

const RECORD_SEPARATOR = "\x1e";
const FIELD_SEPARATOR = "\x1f";
const LOG_FORMAT = "--format=%x1e%H%x1f%P%x1f%an%x1f%aI%x1f%B%x1f";

// Paths are listed raw instead of C-quoted, so non-ASCII names match the tree.
const RAW_PATHS = ["-c", "core.quotePath=false"];

const MISSING_PATH_MARKERS = ["does not exist in", "exists on disk, but not in"];

export type GitHistoryOptions = {
  timeoutMs?: number;
};

export async function createGitHistorySource(
  cwd: string,
  options: GitHistoryOptions = {},
): Promise<ConfigHistorySource> {
  const result = await git(cwd, ["rev-parse", "--show-toplevel"], { allowFailure: true });
  if (result.exitCode !== 0) {
    throw new HistoryError(
      `${cwd} is not inside a git repository`,
      new GitError(result.stderr.trim(), result.stderr, result.exitCode),
    );
  }
  return new GitHistorySource(result.stdout.trim(), options.timeoutMs);
}

export class GitHistorySource implements ConfigHistorySource {
  constructor(
    readonly root: string,
    private readonly timeoutMs?: number,
  ) {}

  async log(query: LogQuery): Promise<RevisionMetadata[]> {
    const range = query.range ?? "HEAD";
    const args = [...RAW_PATHS, "log", "--first-parent", "-m", "--no-renames", "--name-only", LOG_FORMAT];
    if (query.limit !== undefined) args.push(`-n${query.limit}`);
    args.push(range, "--");
    if (query.pathFilter) args.push(query.pathFilter);

    const result = await git(this.root, args, { allowFailure: true, timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0) {
      throw new HistoryError(
        `Invalid revision range '${range}': ${result.stderr.trim() || "git log failed"}`,
        new GitError(result.stderr.trim(), result.stderr, result.exitCode),
      );
    }
    return parseLogOutput(result.stdout);
  }

  async contentAt(revision: string, filePath: string): Promise<Uint8Array | null> {
    const result = await gitBytes(this.root, ["show", `${revision}:${filePath}`], {
      allowFailure: true,
      timeoutMs: this.timeoutMs,
    });

    if (result.timedOut) {
      throw new RetrievalError(
        `Reading ${filePath} at ${revision} timed out after ${this.timeoutMs ?? 0}ms`,
        revision,
        filePath,
      );
    }
    if (result.exitCode === 0) return result.stdout;
    if (MISSING_PATH_MARKERS.some((marker) => result.stderr.includes(marker))) return null;

    throw new RetrievalError(
      `Could not read ${filePath} at ${revision}: ${result.stderr.trim()}`,
      revision,
      filePath,
      new GitError(result.stderr.trim(), result.stderr, result.exitCode),
    );
  }

  async listFiles(revision: string, pathFilter?: string): Promise<string[]> {
    const args = [...RAW_PATHS, "ls-tree", "-r", "--name-only", revision];
    if (pathFilter) args.push("--", pathFilter);

    const result = await git(this.root, args, { allowFailure: true, timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0) {
      throw new HistoryError(`Could not list files at ${revision}: ${result.stderr.trim()}`);
    }
    return splitLines(result.stdout);
  }

  async describe(ref: string): Promise<string> {
    const result = await git(this.root, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], {
      allowFailure: true,
    });
    const id = result.stdout.trim();
    if (result.exitCode !== 0 || id.length === 0) {
      throw new HistoryError(`Unknown revision '${ref}'`);
    }
    return id;
  }
}

// =============================================================================
// PARSING
// =============================================================================

export function parseLogOutput(stdout: string): RevisionMetadata[] {
  return stdout
    .split(RECORD_SEPARATOR)
    .filter((record) => record.trim().length > 0)
    .map(parseLogRecord);
}

function parseLogRecord(record: string): RevisionMetadata {
  const [id = "", parents = "", author = "", timestamp = "", message = "", paths = ""] =
    record.split(FIELD_SEPARATOR);
  const [firstParent] = parents.trim().split(" ").filter((parent) => parent.length > 0);

  return {
    id: id.trim(),
    parent_id: firstParent ?? null,
    author,
    timestamp,
    message: message.trim(),
    changed_paths: splitLines(paths),
  };
}

function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
