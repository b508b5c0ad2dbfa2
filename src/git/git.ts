import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      stripFinalNewline: false,
      ...opts,
    });
    return { stdout: asText(res.stdout), stderr: asText(res.stderr), exitCode: res.exitCode ?? -1 };
  } catch (err) {
    const { stdout, stderr } = readProcessOutput(err);
    const detail = stderr || (err instanceof Error ? err.message : String(err));
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail.trim()}`, {
      stdout,
      stderr,
    });
  }
}

export async function isInsideWorkTree(cwd: string): Promise<boolean> {
  try {
    const res = await git(cwd, ["rev-parse", "--is-inside-work-tree"]);
    return res.stdout.trim() === "true";
  } catch {
    return false;
  }
}

export async function workTreeRoot(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--show-toplevel"]);
  return res.stdout.trim();
}

/**
 * Ignored paths below `cwd`, relative to it. Wholly ignored directories are
 * listed once with a trailing "/".
 */
export async function listIgnoredPaths(cwd: string): Promise<string[]> {
  const res = await git(cwd, [
    "ls-files",
    "--exclude-standard",
    "--ignored",
    "--others",
    "--directory",
    "-z",
  ]);
  return res.stdout.split("\0").filter((entry) => entry.length > 0);
}

// =============================================================================
// INTERNALS
// =============================================================================

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

function readProcessOutput(err: unknown): { stdout: string; stderr: string } {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "" };
  }
  return {
    stdout: "stdout" in err ? asText(err.stdout) : "",
    stderr: "stderr" in err ? asText(err.stderr) : "",
  };
}
