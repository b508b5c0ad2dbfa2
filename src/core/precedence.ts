// Precedence Resolver.
// Purpose: fold the evidence that applies to one path into its FileReuseInfo.
//
// Order of application:
// 1. Config entries: per manifest, the last entry matching the path.
// 2. override: the shallowest override entry is the entire result.
// 3. closest: per field, the deepest closest entry that has the field, unless
//    the file's own header or sidecar already has that field.
// 4. aggregate: every aggregate entry adds its fields.
// 5. Deprecated manifest: one aggregate record, only when no config entry applies.
// 6. A sidecar replaces the file's own header.

import { mergeCopyrightLines } from "./copyright.js";
import {
  REUSE_FIELDS,
  createConfigEntryEvidence,
  createFileReuseInfo,
  hasAnyField,
  type ConfigEntryEvidence,
  type EvidenceRecord,
  type EvidenceSource,
  type FieldName,
  type FileReuseInfo,
} from "./evidence.js";
import { applicableEntries, type ConfigEntry } from "./reuse-toml.js";

export type ResolveOptions = {
  mergeCopyrights?: boolean;
  /** Header license lines the extractor dropped; kept unless an override applies. */
  unparsableExpressions?: readonly string[];
};

type FieldValues = Record<FieldName, Set<string>>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolve(
  projectPath: string,
  records: readonly EvidenceRecord[],
  entries: readonly ConfigEntry[],
  options: ResolveOptions = {},
): FileReuseInfo {
  const applicable = applicableEntries(entries, projectPath);
  const configRecords = applicable
    .filter((entry) => hasAnyField(entry))
    .map(toEvidenceRecord);

  const override = configRecords.find((record) => record.precedence.strategy === "override");
  if (override) {
    return finish(projectPath, [override], collectFields([override]), {
      ...options,
      unparsableExpressions: [],
    });
  }

  const sidecar = records.find((record) => record.sourceKind === "dot-license");
  const own = sidecar
    ? [sidecar]
    : records.filter((record) => record.sourceKind === "file-header");

  const deprecated =
    applicable.length === 0
      ? records.filter((record) => record.sourceKind === "deprecated-manifest")
      : [];

  const aggregates = [
    ...configRecords.filter((record) => record.precedence.strategy === "aggregate"),
    ...deprecated,
  ];

  const closest = pickClosest(
    configRecords.filter((record) => record.precedence.strategy === "closest"),
    collectFields(own),
  );

  const contributing = [...own, ...closest, ...aggregates];
  return finish(projectPath, contributing, collectFields(contributing), options);
}

// =============================================================================
// INTERNALS
// =============================================================================

function toEvidenceRecord(entry: ConfigEntry): ConfigEntryEvidence {
  return createConfigEntryEvidence({
    copyrightLines: entry.copyrightLines,
    licenseExpressions: entry.licenseExpressions,
    contributorLines: entry.contributorLines,
    sourcePath: entry.manifestPath,
    depth: entry.depth,
    strategy: entry.precedence,
  });
}

/**
 * For each field the deepest closest record that has it, reduced to just that
 * field. Records are ordered shallow to deep.
 */
function pickClosest(
  candidates: readonly ConfigEntryEvidence[],
  ownFields: FieldValues,
): ConfigEntryEvidence[] {
  const picked = new Map<ConfigEntryEvidence, Set<FieldName>>();

  for (const field of REUSE_FIELDS) {
    if (ownFields[field].size > 0) continue;

    for (let i = candidates.length - 1; i >= 0; i -= 1) {
      const candidate = candidates[i];
      if (candidate[field].length === 0) continue;
      const fields = picked.get(candidate) ?? new Set<FieldName>();
      fields.add(field);
      picked.set(candidate, fields);
      break;
    }
  }

  return Array.from(picked, ([record, fields]) =>
    createConfigEntryEvidence({
      copyrightLines: fields.has("copyrightLines") ? record.copyrightLines : [],
      licenseExpressions: fields.has("licenseExpressions") ? record.licenseExpressions : [],
      contributorLines: fields.has("contributorLines") ? record.contributorLines : [],
      sourcePath: record.sourcePath,
      depth: record.precedence.rank - 1,
      strategy: "closest",
    }),
  );
}

function collectFields(records: readonly EvidenceRecord[]): FieldValues {
  const values: FieldValues = {
    copyrightLines: new Set(),
    licenseExpressions: new Set(),
    contributorLines: new Set(),
  };

  for (const record of records) {
    for (const field of REUSE_FIELDS) {
      for (const line of record[field]) {
        values[field].add(line);
      }
    }
  }

  return values;
}

function finish(
  projectPath: string,
  contributing: readonly EvidenceRecord[],
  values: FieldValues,
  options: ResolveOptions,
): FileReuseInfo {
  const copyrightLines = options.mergeCopyrights
    ? mergeCopyrightLines(Array.from(values.copyrightLines))
    : values.copyrightLines;

  const sources = new Map<string, EvidenceSource>();
  for (const record of contributing) {
    sources.set(`${record.sourceKind}:${record.sourcePath}`, {
      kind: record.sourceKind,
      path: record.sourcePath,
    });
  }

  return createFileReuseInfo({
    path: projectPath,
    fields: {
      copyrightLines,
      licenseExpressions: values.licenseExpressions,
      contributorLines: values.contributorLines,
    },
    sources: Array.from(sources.values()),
    unparsableExpressions: options.unparsableExpressions ?? [],
  });
}
