import { describe, expect, it } from "vitest";

import { EvidenceError } from "./errors.js";
import {
  HEADER_RANK,
  createConfigEntryEvidence,
  createDeprecatedManifestEvidence,
  createFileReuseInfo,
  createHeaderEvidence,
} from "./evidence.js";

describe("evidence constructors", () => {
  it("deduplicates and sorts field values", () => {
    const record = createHeaderEvidence({
      sourceKind: "file-header",
      sourcePath: "a.py",
      copyrightLines: ["2021 John Doe", "2020 Jane Doe", "2021 John Doe"],
    });

    expect(record.copyrightLines).toEqual(["2020 Jane Doe", "2021 John Doe"]);
    expect(record.licenseExpressions).toEqual([]);
    expect(record.precedence).toEqual({ rank: HEADER_RANK, strategy: "closest" });
  });

  it("ranks config entries by manifest depth above the deprecated manifest", () => {
    const shallow = createConfigEntryEvidence({
      sourcePath: "REUSE.toml",
      depth: 0,
      strategy: "aggregate",
      licenseExpressions: ["MIT"],
    });
    const deep = createConfigEntryEvidence({
      sourcePath: "src/REUSE.toml",
      depth: 1,
      strategy: "closest",
      licenseExpressions: ["MIT"],
    });
    const dep5 = createDeprecatedManifestEvidence({
      sourcePath: ".reuse/dep5",
      licenseExpressions: ["MIT"],
    });

    expect(dep5.precedence.rank).toBeLessThan(shallow.precedence.rank);
    expect(shallow.precedence.rank).toBeLessThan(deep.precedence.rank);
    expect(deep.precedence.rank).toBeLessThan(HEADER_RANK);
  });

  it("rejects records that carry no fields", () => {
    expect(() => createDeprecatedManifestEvidence({ sourcePath: ".reuse/dep5" })).toThrow(
      EvidenceError,
    );
  });

  it("freezes records and their fields", () => {
    const record = createHeaderEvidence({
      sourceKind: "dot-license",
      sourcePath: "logo.svg.license",
      licenseExpressions: ["CC0-1.0"],
    });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.licenseExpressions)).toBe(true);
    expect(Object.isFrozen(record.precedence)).toBe(true);
  });
});

describe("createFileReuseInfo", () => {
  it("orders sources by path then kind", () => {
    const info = createFileReuseInfo({
      path: "a.py",
      fields: { licenseExpressions: ["MIT"] },
      sources: [
        { kind: "file-header", path: "a.py" },
        { kind: "config-entry", path: "REUSE.toml" },
        { kind: "deprecated-manifest", path: ".reuse/dep5" },
      ],
    });

    expect(info.sources).toEqual([
      { kind: "deprecated-manifest", path: ".reuse/dep5" },
      { kind: "config-entry", path: "REUSE.toml" },
      { kind: "file-header", path: "a.py" },
    ]);
    expect(info.unparsableExpressions).toEqual([]);
  });
});
