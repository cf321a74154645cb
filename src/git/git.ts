// Git process helpers.
// Purpose: run git through execa and turn failures and timeouts into GitErrors.
// Assumes git is on PATH; callers that expect failures pass allowFailure and inspect exitCode.

import { execa } from "execa";

import { GitError } from "../core/errors.js";

export type GitOptions = {
  timeoutMs?: number;
  allowFailure?: boolean;
};

export type GitResult<T> = {
  stdout: T;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
};

export async function git(cwd: string, args: string[], opts: GitOptions = {}): Promise<GitResult<string>> {
  const result = await execa("git", args, {
    cwd,
    reject: false,
    stdio: "pipe",
    timeout: opts.timeoutMs,
  });

  const outcome: GitResult<string> = {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    timedOut: result.timedOut === true,
  };
  assertSucceeded(args, outcome, opts);
  return outcome;
}

/** Like `git`, but returns stdout as raw bytes with no newline stripping. */
export async function gitBytes(
  cwd: string,
  args: string[],
  opts: GitOptions = {},
): Promise<GitResult<Uint8Array>> {
  const result = await execa("git", args, {
    cwd,
    reject: false,
    stdio: "pipe",
    encoding: "buffer",
    stripFinalNewline: false,
    timeout: opts.timeoutMs,
  });

  const outcome: GitResult<Uint8Array> = {
    stdout: result.stdout,
    stderr: new TextDecoder().decode(result.stderr),
    exitCode: result.exitCode ?? null,
    timedOut: result.timedOut === true,
  };
  assertSucceeded(args, outcome, opts);
  return outcome;
}

function assertSucceeded<T>(args: string[], result: GitResult<T>, opts: GitOptions): void {
  if (opts.allowFailure) return;

  const command = `git ${args[0] ?? ""}`.trim();
  if (result.timedOut) {
    throw new GitError(`${command} timed out after ${opts.timeoutMs ?? 0}ms`, result.stderr, null);
  }
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new GitError(
      `${command} failed${detail ? `: ${detail}` : ""}`,
      result.stderr,
      result.exitCode,
    );
  }
}
