// Deprecated global manifest (.reuse/dep5, Debian machine-readable copyright format).

import { normalizeCopyrightText } from "./copyright.js";
import { ManifestError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type Dep5Paragraph = {
  readonly patterns: readonly string[];
  readonly matchers: readonly RegExp[];
  readonly copyrightLines: readonly string[];
  readonly licenseExpression: string;
};

export type Dep5Manifest = {
  readonly path: string;
  readonly paragraphs: readonly Dep5Paragraph[];
};

type RawParagraph = {
  fields: Map<string, string[]>;
  line: number;
};

const FIELD_LINE = /^([A-Za-z][A-Za-z0-9-]*):\s?(.*)$/;

// =============================================================================
// PARSING
// =============================================================================

export function parseDep5(text: string, manifestPath: string): Dep5Manifest {
  const raw = splitParagraphs(text, manifestPath);
  if (raw.length === 0) {
    throw new ManifestError(`${manifestPath} is empty`, manifestPath);
  }

  const [header, ...rest] = raw;
  if (!header.fields.has("format")) {
    throw new ManifestError(
      `${manifestPath}: the first paragraph must declare Format (line ${header.line})`,
      manifestPath,
    );
  }

  const paragraphs: Dep5Paragraph[] = [];
  for (const paragraph of rest) {
    const files = paragraph.fields.get("files");
    if (!files) continue;

    const copyright = paragraph.fields.get("copyright");
    const license = paragraph.fields.get("license");
    if (!copyright || !license) {
      throw new ManifestError(
        `${manifestPath}: Files paragraph at line ${paragraph.line} needs Copyright and License`,
        manifestPath,
      );
    }

    const licenseExpression = license[0]?.trim() ?? "";
    if (!licenseExpression) {
      throw new ManifestError(
        `${manifestPath}: Files paragraph at line ${paragraph.line} has an empty License`,
        manifestPath,
      );
    }

    const patterns = files.join(" ").split(/\s+/).filter((p) => p.length > 0);
    paragraphs.push({
      patterns,
      matchers: patterns.map(dep5PatternToRegExp),
      copyrightLines: copyright
        .map((line) => normalizeCopyrightText(line))
        .filter((line) => line.length > 0),
      licenseExpression,
    });
  }

  return { path: manifestPath, paragraphs };
}

/** The last paragraph whose Files patterns match the project-relative path. */
export function findDep5Paragraph(
  manifest: Dep5Manifest,
  projectPath: string,
): Dep5Paragraph | undefined {
  for (let i = manifest.paragraphs.length - 1; i >= 0; i -= 1) {
    const paragraph = manifest.paragraphs[i];
    if (paragraph.matchers.some((matcher) => matcher.test(projectPath))) {
      return paragraph;
    }
  }
  return undefined;
}

/** `*` matches any run of characters including "/", `?` exactly one. */
export function dep5PatternToRegExp(pattern: string): RegExp {
  let source = "";
  const trimmed = pattern.replace(/^\.\//, "");
  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];
    if (char === "\\" && i + 1 < trimmed.length) {
      source += escapeRegExp(trimmed[i + 1]);
      i += 1;
    } else if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += escapeRegExp(char);
    }
  }
  // A directory pattern covers everything below it.
  if (trimmed.endsWith("/")) source += ".*";
  return new RegExp(`^${source}$`, "s");
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitParagraphs(text: string, manifestPath: string): RawParagraph[] {
  const paragraphs: RawParagraph[] = [];
  let current: RawParagraph | null = null;
  let lastField: string | null = null;

  const lines = text.replace(/\r\n/g, "\n").split("\n");
  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;

    if (line.trim() === "") {
      current = null;
      lastField = null;
      continue;
    }

    if (line.startsWith("#")) continue;

    if (/^\s/.test(line)) {
      if (!current || !lastField) {
        throw new ManifestError(
          `${manifestPath}: continuation line without a field at line ${lineNumber}`,
          manifestPath,
        );
      }
      const value = line.trim();
      current.fields.get(lastField)?.push(value === "." ? "" : value);
      continue;
    }

    const match = FIELD_LINE.exec(line);
    if (!match) {
      throw new ManifestError(`${manifestPath}: cannot parse line ${lineNumber}`, manifestPath);
    }

    if (!current) {
      current = { fields: new Map(), line: lineNumber };
      paragraphs.push(current);
    }

    const name = match[1].toLowerCase();
    const value = match[2].trim();
    current.fields.set(name, value ? [value] : []);
    lastField = name;
  }

  return paragraphs;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
