/**
 * History test fakes.
 * Purpose: an in-memory ConfigHistorySource so walker tests never spawn git.
 * Assumptions: commits form a single first-parent chain, added oldest first.
 * Usage: const source = new FakeHistorySource(); source.commit("c1", { "app.yaml": "a: 1\n" });
 */

import { HistoryError, RetrievalError } from "../../core/errors.js";
import type { ConfigHistorySource, LogQuery, RevisionMetadata } from "../vcs.js";
import { matchesPathFilter } from "../walker.js";

type Tree = Map<string, Uint8Array>;

export type FakeCommitOptions = {
  author?: string;
  message?: string;
};

export class FakeHistorySource implements ConfigHistorySource {
  private readonly revisions: RevisionMetadata[] = [];
  private readonly trees = new Map<string, Tree>();
  private readonly failures = new Map<string, string>();

  readonly logCalls: LogQuery[] = [];
  readonly contentCalls: Array<{ revision: string; filePath: string }> = [];

  constructor(readonly root = "/repo") {}

  /** Adds a commit on top of the previous one; a null file content deletes the file. */
  commit(id: string, files: Record<string, string | null>, opts: FakeCommitOptions = {}): this {
    const parent = this.revisions[this.revisions.length - 1] ?? null;
    const tree: Tree = new Map(parent ? this.trees.get(parent.id) : undefined);

    for (const [filePath, content] of Object.entries(files)) {
      if (content === null) {
        tree.delete(filePath);
      } else {
        tree.set(filePath, new TextEncoder().encode(content));
      }
    }

    const index = this.revisions.length + 1;
    this.revisions.push({
      id,
      parent_id: parent?.id ?? null,
      author: opts.author ?? "Test Author",
      timestamp: `2026-01-${String(index).padStart(2, "0")}T10:00:00+00:00`,
      message: opts.message ?? `commit ${id}`,
      changed_paths: Object.keys(files),
    });
    this.trees.set(id, tree);
    return this;
  }

  failRetrieval(revision: string, filePath: string, message: string): this {
    this.failures.set(`${revision}:${filePath}`, message);
    return this;
  }

  async log(query: LogQuery): Promise<RevisionMetadata[]> {
    this.logCalls.push(query);

    const newestFirst = this.selectRange(query.range).reverse();
    const touched = newestFirst.filter((revision) =>
      revision.changed_paths.some((filePath) => matchesPathFilter(filePath, query.pathFilter)),
    );
    return query.limit === undefined ? touched : touched.slice(0, query.limit);
  }

  async contentAt(revision: string, filePath: string): Promise<Uint8Array | null> {
    this.contentCalls.push({ revision, filePath });

    const failure = this.failures.get(`${revision}:${filePath}`);
    if (failure !== undefined) {
      throw new RetrievalError(failure, revision, filePath);
    }
    return this.treeAt(revision).get(filePath) ?? null;
  }

  async listFiles(revision: string, pathFilter?: string): Promise<string[]> {
    return Array.from(this.treeAt(revision).keys()).filter((filePath) => matchesPathFilter(filePath, pathFilter));
  }

  async describe(ref: string): Promise<string> {
    if (ref === "HEAD") {
      const head = this.revisions[this.revisions.length - 1];
      if (head) return head.id;
    }
    if (this.trees.has(ref)) return ref;
    throw new HistoryError(`Unknown revision '${ref}'`);
  }

  // Supports HEAD, a single id, and `from..to`.
  private selectRange(range: string | undefined): RevisionMetadata[] {
    if (range === undefined || range === "HEAD") return [...this.revisions];

    const [from, to] = range.includes("..") ? range.split("..") : [undefined, range];
    const end = this.indexOf(to ?? "HEAD");
    const start = from === undefined ? 0 : this.indexOf(from) + 1;
    return this.revisions.slice(start, end + 1);
  }

  private indexOf(ref: string): number {
    if (ref === "HEAD") return this.revisions.length - 1;
    const index = this.revisions.findIndex((revision) => revision.id === ref);
    if (index < 0) throw new HistoryError(`Invalid revision range '${ref}'`);
    return index;
  }

  private treeAt(revision: string): Tree {
    const tree = this.trees.get(revision);
    if (!tree) throw new RetrievalError(`Unknown revision ${revision}`, revision, "");
    return tree;
  }
}
