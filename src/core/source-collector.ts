// Source Collector.
// Purpose: gather header, sidecar and deprecated-manifest evidence for one project path.
// Config-manifest entries are matched later by the precedence resolver.

import path from "node:path";

import fse from "fs-extra";

import { findDep5Paragraph, type Dep5Manifest } from "./dep5.js";
import {
  createDeprecatedManifestEvidence,
  createHeaderEvidence,
  type EvidenceRecord,
} from "./evidence.js";
import { extract, hasTags } from "./extract.js";
import type { ExpressionValidator } from "./spdx-expression.js";

// =============================================================================
// TYPES
// =============================================================================

export type CollectorContext = {
  root: string;
  validator: ExpressionValidator;
  headerBytes: number;
  dep5?: Dep5Manifest;
};

export type CollectedEvidence = {
  records: EvidenceRecord[];
  unparsable: string[];
};

export const SIDECAR_SUFFIX = ".license";
export const SNIPPET_MARKER = "SPDX-SnippetBegin";

const BINARY_SNIFF_BYTES = 8000;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Reads the file (or its `.license` sidecar) and looks the path up in the
 * deprecated manifest. Read failures propagate; the caller records them.
 */
export async function collectEvidence(
  projectPath: string,
  context: CollectorContext,
): Promise<CollectedEvidence> {
  const records: EvidenceRecord[] = [];
  let unparsable: string[] = [];

  const absolutePath = path.join(context.root, projectPath);
  const sidecarPath = `${absolutePath}${SIDECAR_SUFFIX}`;
  const hasSidecar = await isRegularFile(sidecarPath);

  const text = hasSidecar
    ? await readText(sidecarPath, Number.POSITIVE_INFINITY)
    : await readText(absolutePath, context.headerBytes);

  if (text !== null) {
    const { tags, unparsable: dropped } = extract(text, context.validator);
    unparsable = dropped;
    if (hasTags(tags)) {
      records.push(
        createHeaderEvidence({
          ...tags,
          sourceKind: hasSidecar ? "dot-license" : "file-header",
          sourcePath: hasSidecar ? `${projectPath}${SIDECAR_SUFFIX}` : projectPath,
        }),
      );
    }
  }

  if (context.dep5) {
    const paragraph = findDep5Paragraph(context.dep5, projectPath);
    if (paragraph) {
      records.push(
        createDeprecatedManifestEvidence({
          copyrightLines: paragraph.copyrightLines,
          licenseExpressions: [paragraph.licenseExpression],
          sourcePath: context.dep5.path,
        }),
      );
    }
  }

  return { records, unparsable };
}

/**
 * Decoded text of the file, or null for binary content. Only the first
 * `headerBytes` are kept unless the file declares a snippet.
 */
export async function readText(filePath: string, headerBytes: number): Promise<string | null> {
  const buffer = await fse.readFile(filePath);

  if (buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    return null;
  }

  const limited =
    buffer.length > headerBytes && !buffer.includes(SNIPPET_MARKER)
      ? buffer.subarray(0, headerBytes)
      : buffer;

  return limited.toString("utf8").replace(/\r\n/g, "\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fse.stat(filePath);
    return stat.isFile();
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

function isMissingPathError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
