// Compliance Classifier.
// Purpose: cross-reference resolved files with the license inventory.

import type { FileReuseInfo } from "./evidence.js";
import type { LicenseInventory } from "./license-inventory.js";
import { isLicenseRef } from "./spdx-catalog.js";
import type { ExpressionValidator } from "./spdx-expression.js";
import { compareStrings, sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type MissingLicense = {
  identifier: string;
  files: string[];
};

export type UnparsableFile = {
  path: string;
  expressions: string[];
};

export type ReadError = {
  path: string;
  message: string;
};

export type ClassificationSets = {
  badLicenses: string[];
  deprecatedLicenses: string[];
  licensesWithoutExtension: string[];
  missingLicenses: MissingLicense[];
  unusedLicenses: string[];
  unparsableExpressions: UnparsableFile[];
  filesWithoutInformation: string[];
  readErrors: ReadError[];
  /** Listed for display and counts; they do not decide compliance. */
  filesWithoutCopyright: string[];
  filesWithoutLicenses: string[];
  usedLicenses: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function classify(
  files: readonly FileReuseInfo[],
  inventory: LicenseInventory,
  validator: ExpressionValidator,
  readErrors: readonly ReadError[] = [],
): ClassificationSets {
  const referencedBy = new Map<string, Set<string>>();
  const unparsable: UnparsableFile[] = [];
  const withoutInformation: string[] = [];
  const withoutCopyright: string[] = [];
  const withoutLicenses: string[] = [];

  for (const file of files) {
    const broken = new Set(file.unparsableExpressions);

    for (const expression of file.licenseExpressions) {
      const result = validator.validate(expression);
      if (!result.parsed) {
        broken.add(expression);
        continue;
      }
      for (const atom of result.atoms) {
        const referrers = referencedBy.get(atom) ?? new Set<string>();
        referrers.add(file.path);
        referencedBy.set(atom, referrers);
      }
    }

    if (broken.size > 0) {
      unparsable.push({ path: file.path, expressions: sortedUnique(broken) });
    }

    if (isInsideDirectory(file.path, inventory.directory)) continue;

    const hasCopyright = file.copyrightLines.length > 0;
    const hasLicense = file.licenseExpressions.length > 0;
    if (!hasCopyright) withoutCopyright.push(file.path);
    if (!hasLicense) withoutLicenses.push(file.path);
    if (!hasCopyright && !hasLicense) withoutInformation.push(file.path);
  }

  const missingLicenses = Array.from(referencedBy)
    .filter(([identifier]) => !inventory.byIdentifier.has(identifier))
    .map(([identifier, referrers]) => ({ identifier, files: sortedUnique(referrers) }))
    .sort((a, b) => compareStrings(a.identifier, b.identifier));

  const records = inventory.records;

  return {
    badLicenses: sortedUnique(
      records
        .filter((record) => !record.isKnownSpdx && !isLicenseRef(record.identifier))
        .map((record) => record.identifier),
    ),
    deprecatedLicenses: sortedUnique(
      records.filter((record) => record.isDeprecated).map((record) => record.identifier),
    ),
    licensesWithoutExtension: sortedUnique(
      records
        .filter(
          (record) =>
            !record.hasRecognizedExtension &&
            (record.isKnownSpdx || isLicenseRef(record.identifier)),
        )
        .map((record) => record.identifier),
    ),
    missingLicenses,
    unusedLicenses: sortedUnique(
      records
        .filter((record) => !referencedBy.has(record.identifier))
        .map((record) => record.identifier),
    ),
    unparsableExpressions: unparsable.sort((a, b) => compareStrings(a.path, b.path)),
    filesWithoutInformation: sortedUnique(withoutInformation),
    readErrors: [...readErrors].sort((a, b) => compareStrings(a.path, b.path)),
    filesWithoutCopyright: sortedUnique(withoutCopyright),
    filesWithoutLicenses: sortedUnique(withoutLicenses),
    usedLicenses: sortedUnique(referencedBy.keys()),
  };
}

export function isCompliant(sets: ClassificationSets): boolean {
  return (
    sets.badLicenses.length === 0 &&
    sets.deprecatedLicenses.length === 0 &&
    sets.licensesWithoutExtension.length === 0 &&
    sets.missingLicenses.length === 0 &&
    sets.unusedLicenses.length === 0 &&
    sets.unparsableExpressions.length === 0 &&
    sets.filesWithoutInformation.length === 0 &&
    sets.readErrors.length === 0
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

function isInsideDirectory(projectPath: string, directory: string): boolean {
  return directory !== "" && projectPath.startsWith(`${directory}/`);
}
