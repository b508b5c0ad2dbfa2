// Tag extraction from file text.
// Purpose: find copyright, license and contributor tags line by line, skipping ignore regions.
// Assumptions: text is already decoded; binary content never reaches this module.

import { normalizeCopyrightText } from "./copyright.js";
import type { ExpressionValidator } from "./spdx-expression.js";
import { sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExtractedTags = {
  copyrightLines: string[];
  licenseExpressions: string[];
  contributorLines: string[];
};

export type ExtractResult = {
  tags: ExtractedTags;
  /** License values dropped because they do not parse. */
  unparsable: string[];
};

export const IGNORE_START_MARKER = "REUSE-IgnoreStart";
export const IGNORE_END_MARKER = "REUSE-IgnoreEnd";

const LICENSE_TAG = /SPDX-License-Identifier:(.*)$/;
const CONTRIBUTOR_TAG = /SPDX-FileContributor:(.*)$/;
const COPYRIGHT_TAG =
  /(?:SPDX-(?:File|Snippet)CopyrightText:|(?=Copyright(?:\s|:|©|\()|©))(.*)$/;

// Comment leader left in front of a start marker, e.g. the "# " of "# REUSE-IgnoreStart".
const MARKER_LEADER = /[ \t]*(?:#|\/\/|\/\*|<!--|--|;|%)?[ \t]*$/;

// Longest first so "*/" wins over "*".
const COMMENT_CLOSERS = [
  "--]]",
  '"""',
  "'''",
  "-->",
  '"/>',
  "]::",
  "*/",
  "*|",
  "#}",
  "%}",
  "*)",
  "-}",
  "|#",
  "*",
];

// =============================================================================
// PUBLIC API
// =============================================================================

export function extract(text: string, validator: ExpressionValidator): ExtractResult {
  const copyrightLines: string[] = [];
  const licenseExpressions: string[] = [];
  const contributorLines: string[] = [];
  const unparsable: string[] = [];

  for (const line of visibleLines(text)) {
    const license = matchTag(LICENSE_TAG, line);
    if (license !== null) {
      if (validator.validate(license).parsed) {
        licenseExpressions.push(license);
      } else {
        unparsable.push(license);
      }
      continue;
    }

    const contributor = matchTag(CONTRIBUTOR_TAG, line);
    if (contributor !== null) {
      contributorLines.push(contributor);
      continue;
    }

    const copyright = matchTag(COPYRIGHT_TAG, line);
    if (copyright !== null) {
      const normalized = normalizeCopyrightText(copyright);
      if (normalized) copyrightLines.push(normalized);
    }
  }

  return {
    tags: {
      copyrightLines: sortedUnique(copyrightLines),
      licenseExpressions: sortedUnique(licenseExpressions),
      contributorLines: sortedUnique(contributorLines),
    },
    unparsable: sortedUnique(unparsable),
  };
}

export function hasTags(tags: ExtractedTags): boolean {
  return (
    tags.copyrightLines.length > 0 ||
    tags.licenseExpressions.length > 0 ||
    tags.contributorLines.length > 0
  );
}

export function stripCommentClosers(value: string): string {
  let result = value.trim();
  let changed = true;
  while (changed && result.length > 0) {
    changed = false;
    for (const closer of COMMENT_CLOSERS) {
      if (result.endsWith(closer)) {
        result = result.slice(0, -closer.length).trimEnd();
        changed = true;
        break;
      }
    }
  }
  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function visibleLines(text: string): string[] {
  return filterIgnoreRegions(text).split("\n");
}

/**
 * Removes ignore regions at character offsets, keeping text before a start
 * marker and after an end marker on the same lines. A region that opens on the
 * first line takes the whole of its marker lines with it. An unterminated region
 * runs to the end; stray end markers are dropped.
 */
export function filterIgnoreRegions(text: string): string {
  const parts: string[] = [];
  let cursor = 0;

  while (cursor <= text.length) {
    const start = text.indexOf(IGNORE_START_MARKER, cursor);
    if (start === -1) {
      parts.push(text.slice(cursor));
      break;
    }

    const opensOnFirstLine = !text.slice(0, start).includes("\n");
    if (!opensOnFirstLine) {
      parts.push(text.slice(cursor, start).replace(MARKER_LEADER, ""));
    }

    const end = text.indexOf(IGNORE_END_MARKER, start + IGNORE_START_MARKER.length);
    if (end === -1) break;
    cursor = end + IGNORE_END_MARKER.length;

    if (opensOnFirstLine) {
      const newline = text.indexOf("\n", cursor);
      cursor = newline === -1 ? text.length : newline + 1;
    }
  }

  return parts.join("").split(IGNORE_END_MARKER).join("");
}

function matchTag(pattern: RegExp, line: string): string | null {
  const match = pattern.exec(line);
  if (!match) return null;

  const value = stripCommentClosers(match[1] ?? "");
  return value.length > 0 ? value : null;
}
