// REUSE.toml annotation manifests.
// Purpose: parse manifests into ConfigEntry values and decide which entries apply to a path.
// Assumptions: all paths are project-relative and use "/" separators.

import path from "node:path";

import { Minimatch } from "minimatch";
import { parse as parseToml, TomlError } from "smol-toml";
import { z } from "zod";

import { normalizeCopyrightText } from "./copyright.js";
import { ManifestError } from "./errors.js";
import type { PrecedenceStrategy } from "./evidence.js";
import { formatIssues } from "./zod-issues.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigEntry = {
  readonly pathPatterns: readonly string[];
  /** `pathPatterns`, compiled once when the manifest is parsed. */
  readonly globs: readonly PathGlob[];
  readonly precedence: PrecedenceStrategy;
  readonly copyrightLines: readonly string[];
  readonly licenseExpressions: readonly string[];
  readonly contributorLines: readonly string[];
  /** Project-relative path of the manifest that declared the entry. */
  readonly manifestPath: string;
  /** Project-relative directory of the manifest; "" for the project root. */
  readonly manifestDir: string;
  readonly depth: number;
  /** Position of the entry inside its manifest. */
  readonly index: number;
};

export type ReuseManifest = {
  readonly path: string;
  readonly dir: string;
  readonly depth: number;
  readonly entries: readonly ConfigEntry[];
};

const StringOrList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

const AnnotationSchema = z.object({
  path: StringOrList.refine((value) => value.length > 0, { message: "At least one path is required" }),
  precedence: z.enum(["closest", "aggregate", "override"]).default("closest"),
  "SPDX-FileCopyrightText": StringOrList.default([]),
  "SPDX-License-Identifier": StringOrList.default([]),
  "SPDX-FileContributor": StringOrList.default([]),
});

const ManifestSchema = z.object({
  version: z.literal(1),
  annotations: z.array(AnnotationSchema).default([]),
});

const MATCH_OPTIONS = {
  dot: true,
  nobrace: true,
  noext: true,
  nonegate: true,
  nocomment: true,
} as const;

// =============================================================================
// PARSING
// =============================================================================

export function parseReuseToml(text: string, manifestPath: string): ReuseManifest {
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (err) {
    const location = err instanceof TomlError ? ` (line ${err.line}, column ${err.column})` : "";
    throw new ManifestError(`Failed to parse ${manifestPath}${location}`, manifestPath, err);
  }

  const parsed = ManifestSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ManifestError(
      `Invalid ${manifestPath}:\n${formatIssues(parsed.error.issues)}`,
      manifestPath,
      parsed.error,
    );
  }

  const dir = manifestDirectory(manifestPath);
  const depth = dir === "" ? 0 : dir.split("/").length;

  const entries = parsed.data.annotations.map((annotation, index): ConfigEntry => ({
    pathPatterns: Object.freeze([...annotation.path]),
    globs: Object.freeze(annotation.path.map((pattern) => new PathGlob(pattern))),
    precedence: annotation.precedence,
    copyrightLines: Object.freeze(
      annotation["SPDX-FileCopyrightText"].map(normalizeCopyrightText).filter(Boolean),
    ),
    licenseExpressions: Object.freeze(annotation["SPDX-License-Identifier"].map((v) => v.trim())),
    contributorLines: Object.freeze(annotation["SPDX-FileContributor"].map((v) => v.trim())),
    manifestPath,
    manifestDir: dir,
    depth,
    index,
  }));

  return { path: manifestPath, dir, depth, entries };
}

// =============================================================================
// MATCHING
// =============================================================================

/**
 * A manifest `path` glob, relative to the manifest directory. `**` crosses
 * directories, also inside a segment (`src/**.py`); `*` stays inside one
 * segment; `\*` is a literal star. Every other character is literal.
 */
export class PathGlob {
  private readonly matchers: readonly Minimatch[];

  constructor(readonly source: string) {
    this.matchers = expandInlineGlobstars(source).map(
      (pattern) => new Minimatch(escapeGlob(pattern), MATCH_OPTIONS),
    );
  }

  matches(relativePath: string): boolean {
    return this.matchers.some((matcher) => matcher.match(relativePath));
  }
}

export function globMatches(pattern: string, relativePath: string): boolean {
  return new PathGlob(pattern).matches(relativePath);
}

export function entryMatches(entry: ConfigEntry, projectPath: string): boolean {
  const relative = pathWithinDirectory(entry.manifestDir, projectPath);
  if (relative === null) return false;
  return entry.globs.some((glob) => glob.matches(relative));
}

/**
 * One entry per manifest that covers the path, ordered from the shallowest
 * manifest to the deepest.
 */
export function applicableEntries(
  entries: readonly ConfigEntry[],
  projectPath: string,
): ConfigEntry[] {
  const byManifest = new Map<string, ConfigEntry>();
  for (const entry of entries) {
    if (!entryMatches(entry, projectPath)) continue;
    const current = byManifest.get(entry.manifestPath);
    if (!current || entry.index > current.index) {
      byManifest.set(entry.manifestPath, entry);
    }
  }

  return Array.from(byManifest.values()).sort((a, b) => a.depth - b.depth);
}

export function manifestDirectory(manifestPath: string): string {
  const dir = path.posix.dirname(manifestPath);
  return dir === "." ? "" : dir;
}

// =============================================================================
// INTERNALS
// =============================================================================

function pathWithinDirectory(dir: string, projectPath: string): string | null {
  if (dir === "") return projectPath;
  const prefix = `${dir}/`;
  return projectPath.startsWith(prefix) ? projectPath.slice(prefix.length) : null;
}

/**
 * Rewrites a `**` inside a segment into the two forms minimatch understands:
 * one that stays in the segment and one that crosses into subdirectories.
 */
function expandInlineGlobstars(pattern: string): string[] {
  let variants = [""];

  pattern.split("/").forEach((segment, index) => {
    const pieces = segment === "**" ? [segment] : splitOnGlobstar(segment);
    let segmentVariants = [pieces[0]];
    for (const piece of pieces.slice(1)) {
      segmentVariants = segmentVariants.flatMap((variant) => [
        `${variant}*${piece}`,
        `${variant}*/**/*${piece}`,
      ]);
    }

    const separator = index === 0 ? "" : "/";
    variants = variants.flatMap((variant) =>
      segmentVariants.map((segmentVariant) => `${variant}${separator}${segmentVariant}`),
    );
  });

  return variants;
}

/** Splits a segment at every unescaped `**`. */
function splitOnGlobstar(segment: string): string[] {
  const pieces: string[] = [];
  let current = "";
  for (let i = 0; i < segment.length; i += 1) {
    const char = segment[i];
    if (char === "\\" && i + 1 < segment.length) {
      current += `${char}${segment[i + 1]}`;
      i += 1;
    } else if (char === "*" && segment[i + 1] === "*") {
      pieces.push(current);
      current = "";
      i += 1;
    } else {
      current += char;
    }
  }
  pieces.push(current);
  return pieces;
}

function escapeGlob(pattern: string): string {
  let result = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (char === "\\" && i + 1 < pattern.length) {
      result += `\\${pattern[i + 1]}`;
      i += 1;
    } else if (char === "?" || char === "[" || char === "]" || char === "(" || char === ")") {
      result += `\\${char}`;
    } else {
      result += char;
    }
  }
  return result;
}
