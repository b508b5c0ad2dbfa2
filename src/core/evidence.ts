import { EvidenceError } from "./errors.js";
import { sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type SourceKind = "file-header" | "dot-license" | "config-entry" | "deprecated-manifest";

export type PrecedenceStrategy = "closest" | "aggregate" | "override";

export type PrecedenceKey = {
  /** Higher is more specific. */
  rank: number;
  strategy: PrecedenceStrategy;
};

export type ReuseFields = {
  readonly copyrightLines: readonly string[];
  readonly licenseExpressions: readonly string[];
  readonly contributorLines: readonly string[];
};

type EvidenceBase<K extends SourceKind, S extends PrecedenceStrategy> = ReuseFields & {
  readonly sourceKind: K;
  /** Project-relative path of the file that carried the evidence. */
  readonly sourcePath: string;
  readonly precedence: { readonly rank: number; readonly strategy: S };
};

export type HeaderEvidence = EvidenceBase<"file-header" | "dot-license", "closest">;
export type ConfigEntryEvidence = EvidenceBase<"config-entry", PrecedenceStrategy>;
export type DeprecatedManifestEvidence = EvidenceBase<"deprecated-manifest", "aggregate">;

export type EvidenceRecord = HeaderEvidence | ConfigEntryEvidence | DeprecatedManifestEvidence;

export type EvidenceSource = {
  readonly kind: SourceKind;
  readonly path: string;
};

export type FileReuseInfo = ReuseFields & {
  readonly path: string;
  readonly sources: readonly EvidenceSource[];
  readonly unparsableExpressions: readonly string[];
};

export type FieldName = keyof ReuseFields;

export const REUSE_FIELDS: readonly FieldName[] = [
  "copyrightLines",
  "licenseExpressions",
  "contributorLines",
];

export const DEPRECATED_MANIFEST_RANK = 0;
export const HEADER_RANK = Number.MAX_SAFE_INTEGER;

export function configEntryRank(depth: number): number {
  return 1 + depth;
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

type FieldsInput = {
  copyrightLines?: Iterable<string>;
  licenseExpressions?: Iterable<string>;
  contributorLines?: Iterable<string>;
};

export function createHeaderEvidence(
  input: FieldsInput & { sourceKind: "file-header" | "dot-license"; sourcePath: string },
): HeaderEvidence {
  const record: HeaderEvidence = {
    ...normalizeFields(input),
    sourceKind: input.sourceKind,
    sourcePath: input.sourcePath,
    precedence: { rank: HEADER_RANK, strategy: "closest" },
  };
  return finalize(record);
}

export function createConfigEntryEvidence(
  input: FieldsInput & { sourcePath: string; depth: number; strategy: PrecedenceStrategy },
): ConfigEntryEvidence {
  const record: ConfigEntryEvidence = {
    ...normalizeFields(input),
    sourceKind: "config-entry",
    sourcePath: input.sourcePath,
    precedence: { rank: configEntryRank(input.depth), strategy: input.strategy },
  };
  return finalize(record);
}

export function createDeprecatedManifestEvidence(
  input: FieldsInput & { sourcePath: string },
): DeprecatedManifestEvidence {
  const record: DeprecatedManifestEvidence = {
    ...normalizeFields(input),
    sourceKind: "deprecated-manifest",
    sourcePath: input.sourcePath,
    precedence: { rank: DEPRECATED_MANIFEST_RANK, strategy: "aggregate" },
  };
  return finalize(record);
}

export function createFileReuseInfo(input: {
  path: string;
  fields: FieldsInput;
  sources?: readonly EvidenceSource[];
  unparsableExpressions?: Iterable<string>;
}): FileReuseInfo {
  const sources = [...(input.sources ?? [])].sort((a, b) =>
    a.path === b.path ? compareKind(a.kind, b.kind) : a.path < b.path ? -1 : 1,
  );

  return Object.freeze({
    path: input.path,
    ...normalizeFields(input.fields),
    sources: Object.freeze(sources.map((source) => Object.freeze({ ...source }))),
    unparsableExpressions: Object.freeze(sortedUnique(input.unparsableExpressions ?? [])),
  });
}

export function hasAnyField(fields: ReuseFields): boolean {
  return REUSE_FIELDS.some((field) => fields[field].length > 0);
}

// =============================================================================
// INTERNALS
// =============================================================================

const KIND_ORDER: Record<SourceKind, number> = {
  "deprecated-manifest": 0,
  "config-entry": 1,
  "dot-license": 2,
  "file-header": 3,
};

function compareKind(a: SourceKind, b: SourceKind): number {
  return KIND_ORDER[a] - KIND_ORDER[b];
}

function normalizeFields(input: FieldsInput): ReuseFields {
  return {
    copyrightLines: Object.freeze(sortedUnique(input.copyrightLines ?? [])),
    licenseExpressions: Object.freeze(sortedUnique(input.licenseExpressions ?? [])),
    contributorLines: Object.freeze(sortedUnique(input.contributorLines ?? [])),
  };
}

function finalize<T extends EvidenceRecord>(record: T): T {
  if (!hasAnyField(record)) {
    throw new EvidenceError(
      `Evidence from ${record.sourcePath} (${record.sourceKind}) carries no copyright, license or contributor lines`,
    );
  }
  Object.freeze(record.precedence);
  Object.freeze(record);
  return record;
}
