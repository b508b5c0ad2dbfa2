// Version-control collaborator.
// Purpose: report ignored paths and submodules so the walker can leave them out.

import path from "node:path";

import fse from "fs-extra";

import { GitError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";

import { isInsideWorkTree, listIgnoredPaths } from "./git.js";

export type VcsMode = "auto" | "git" | "none";

export interface VcsStrategy {
  readonly name: "git" | "none";
  /** Project-relative ignored paths; directories end with "/". */
  listIgnored(): Promise<string[]>;
  /** Project-relative submodule directories. */
  listSubmodules(): Promise<string[]>;
}

export class NoVcs implements VcsStrategy {
  readonly name = "none";

  async listIgnored(): Promise<string[]> {
    return [];
  }

  async listSubmodules(): Promise<string[]> {
    return [];
  }
}

export class GitVcs implements VcsStrategy {
  readonly name = "git";

  constructor(private readonly root: string) {}

  async listIgnored(): Promise<string[]> {
    const entries = await listIgnoredPaths(this.root);
    return entries.map(toPosixPath);
  }

  async listSubmodules(): Promise<string[]> {
    const gitmodules = path.join(this.root, ".gitmodules");
    if (!(await fse.pathExists(gitmodules))) return [];
    return parseGitmodules(await fse.readFile(gitmodules, "utf8"));
  }
}

export async function createVcsStrategy(root: string, mode: VcsMode): Promise<VcsStrategy> {
  if (mode === "none") return new NoVcs();

  const insideGit = await isInsideWorkTree(root);
  if (insideGit) return new GitVcs(root);

  if (mode === "git") {
    throw new GitError(`${root} is not inside a git work tree`);
  }
  return new NoVcs();
}

export function parseGitmodules(text: string): string[] {
  const paths: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*path\s*=\s*(.+?)\s*$/.exec(line);
    if (match) paths.push(match[1].replace(/\/+$/, ""));
  }
  return paths;
}

/** True when `projectPath` is ignored itself or lies in an ignored directory. */
export function isIgnoredPath(projectPath: string, ignored: ReadonlySet<string>): boolean {
  if (ignored.has(projectPath)) return true;

  let index = projectPath.indexOf("/");
  while (index !== -1) {
    if (ignored.has(projectPath.slice(0, index + 1))) return true;
    index = projectPath.indexOf("/", index + 1);
  }
  return false;
}
