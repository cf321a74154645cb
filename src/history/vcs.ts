/**
 * Version-control port for the history walker.
 * Purpose: the only surface through which history is read, so the walker never touches git directly.
 * Assumptions: all operations are read-only; revisions are full commit ids once resolved.
 * Usage: implement with createGitHistorySource, or FakeHistorySource in tests.
 */

export type RevisionMetadata = {
  id: string;
  parent_id: string | null;
  author: string;
  timestamp: string;
  message: string;
  changed_paths: string[];
};

export type LogQuery = {
  range?: string;
  pathFilter?: string;
  limit?: number;
};

export interface ConfigHistorySource {
  readonly root: string;
  /** Newest first, following first parents. */
  log(query: LogQuery): Promise<RevisionMetadata[]>;
  /** Raw bytes of `filePath` at `revision`, or null when the file does not exist there. */
  contentAt(revision: string, filePath: string): Promise<Uint8Array | null>;
  listFiles(revision: string, pathFilter?: string): Promise<string[]>;
  /** Resolves a ref to a commit id; throws HistoryError when it does not resolve. */
  describe(ref: string): Promise<string>;
}
