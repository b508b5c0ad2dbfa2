import { isCompliant, type ClassificationSets } from "./compliance.js";
import type { FileReuseInfo } from "./evidence.js";
import type { LicenseInventory } from "./license-inventory.js";
import { compareStrings, deepFreeze } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportCounts = {
  filesTotal: number;
  filesWithCopyright: number;
  filesWithoutCopyright: number;
  filesWithLicenses: number;
  filesWithoutLicenses: number;
  readErrors: number;
};

export type ComplianceReport = Readonly<
  ClassificationSets & {
    root: string;
    compliant: boolean;
    counts: ReportCounts;
    licenses: ReadonlyArray<{ identifier: string; path: string }>;
    files: readonly FileReuseInfo[];
  }
>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildComplianceReport(input: {
  root: string;
  files: readonly FileReuseInfo[];
  classification: ClassificationSets;
  inventory: LicenseInventory;
}): ComplianceReport {
  const files = [...input.files].sort((a, b) => compareStrings(a.path, b.path));
  const { classification } = input;

  const withCopyright = files.filter((file) => file.copyrightLines.length > 0).length;
  const withLicenses = files.filter((file) => file.licenseExpressions.length > 0).length;

  return deepFreeze({
    ...classification,
    root: input.root,
    compliant: isCompliant(classification),
    counts: {
      filesTotal: files.length,
      filesWithCopyright: withCopyright,
      filesWithoutCopyright: files.length - withCopyright,
      filesWithLicenses: withLicenses,
      filesWithoutLicenses: files.length - withLicenses,
      readErrors: classification.readErrors.length,
    },
    licenses: input.inventory.records.map((record) => ({
      identifier: record.identifier,
      path: record.filePath,
    })),
    files,
  });
}
