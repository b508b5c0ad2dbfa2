// Covered files.
// Purpose: walk the project and list the files that need licensing information,
// plus the configuration manifests found on the way.

import path from "node:path";

import fg from "fast-glob";

import { isIgnoredPath, type VcsStrategy } from "../git/vcs.js";

import { compareStrings, toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type CoveredFilesOptions = {
  licenseDir: string;
  manifestFilename: string;
  vcs: VcsStrategy;
  includeSubmodules: boolean;
  includeMesonSubprojects: boolean;
};

export type ProjectFiles = {
  /** Project-relative, sorted. */
  covered: string[];
  /** Project-relative manifest paths, sorted shallow to deep. */
  manifests: string[];
};

/** Excluded at any depth. */
const EXCLUDED_DIRECTORY_NAMES = [".git", ".hg", ".sl", "LICENSES", ".reuse"];

/** Directories whose children are Meson subprojects. */
const MESON_PARENT_DIRECTORY = "subprojects";

const EXCLUDED_FILE_PATTERNS = [
  /^LICEN[CS]E([-.].*)?$/,
  /^COPYING([-.].*)?$/,
  /^\.git$/,
  /^\.hgtags$/,
  /^.*\.license$/,
  /^REUSE\.toml$/,
  // License texts some tools drop beside the sources under their bare identifier.
  /^CAL-1\.0(-Combined-Work-Exception)?(\..+)?$/,
  /^SHL-2\.1(\..+)?$/,
  /^.*\.spdx$/,
  /^.*\.spdx\.(rdf|json|xml|ya?ml)$/,
];

// =============================================================================
// PATH FILTER
// =============================================================================

/**
 * Path-only exclusion rules shared by the tree walk and by explicit file lists.
 * Size and symlink checks need the file itself and stay with the walk.
 */
export class CoveredPathFilter {
  private constructor(
    private readonly excludedDirs: readonly string[],
    private readonly ignored: ReadonlySet<string>,
    private readonly options: CoveredFilesOptions,
  ) {}

  static async create(options: CoveredFilesOptions): Promise<CoveredPathFilter> {
    const ignored = new Set(await options.vcs.listIgnored());
    const excludedDirs = [normalizeDir(options.licenseDir)];
    if (!options.includeSubmodules) {
      excludedDirs.push(...(await options.vcs.listSubmodules()).map(normalizeDir));
    }
    return new CoveredPathFilter(excludedDirs, ignored, options);
  }

  /** Glob patterns for the walker; a coarse prefilter of the directory rules. */
  walkIgnorePatterns(): string[] {
    const patterns = EXCLUDED_DIRECTORY_NAMES.map((name) => `**/${name}/**`);
    if (!this.options.includeMesonSubprojects) {
      patterns.push(`**/${MESON_PARENT_DIRECTORY}/*/**`);
    }
    patterns.push(...this.excludedDirs.map((dir) => `${fg.escapePath(dir)}/**`));
    return patterns;
  }

  isManifest(projectPath: string): boolean {
    return path.posix.basename(projectPath) === this.options.manifestFilename;
  }

  /** True for files that are never covered, by name or by location. */
  isExcluded(projectPath: string): boolean {
    if (this.isManifest(projectPath)) return true;
    if (isExcludedFileName(path.posix.basename(projectPath))) return true;
    return this.isInExcludedLocation(projectPath);
  }

  /** True inside an excluded directory or on a VCS-ignored path. */
  isInExcludedLocation(projectPath: string): boolean {
    return this.isInExcludedDirectory(projectPath) || isIgnoredPath(projectPath, this.ignored);
  }

  private isInExcludedDirectory(projectPath: string): boolean {
    const dirs = projectPath.split("/").slice(0, -1);

    for (let i = 0; i < dirs.length; i += 1) {
      if (EXCLUDED_DIRECTORY_NAMES.includes(dirs[i])) return true;
      if (!this.options.includeMesonSubprojects && i > 0 && dirs[i - 1] === MESON_PARENT_DIRECTORY) {
        return true;
      }
    }

    return this.excludedDirs.some((dir) => projectPath.startsWith(`${dir}/`));
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function listProjectFiles(
  root: string,
  filter: CoveredPathFilter,
): Promise<ProjectFiles> {
  const entries = await fg("**", {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    stats: true,
    ignore: filter.walkIgnorePatterns(),
  });

  const covered: string[] = [];
  const manifests: string[] = [];

  for (const entry of entries) {
    const projectPath = toPosixPath(entry.path);

    if (filter.isManifest(projectPath)) {
      if (!filter.isInExcludedLocation(projectPath)) manifests.push(projectPath);
      continue;
    }

    const stats = entry.stats;
    if (!stats || !stats.isFile() || stats.size === 0) continue;
    if (filter.isExcluded(projectPath)) continue;

    covered.push(projectPath);
  }

  return {
    covered: covered.sort(compareStrings),
    manifests: manifests.sort(compareManifestDepth),
  };
}

export function isExcludedFileName(name: string): boolean {
  return EXCLUDED_FILE_PATTERNS.some((pattern) => pattern.test(name));
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeDir(dir: string): string {
  return path.posix.normalize(toPosixPath(dir)).replace(/\/+$/, "");
}

function compareManifestDepth(a: string, b: string): number {
  const depth = a.split("/").length - b.split("/").length;
  return depth !== 0 ? depth : compareStrings(a, b);
}
