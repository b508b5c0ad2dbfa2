// License Inventory.
// Purpose: list the license texts stored in the license directory and derive their identifiers.

import path from "node:path";

import fse from "fs-extra";

import { DuplicateLicenseError, LicenseDirectoryError } from "./errors.js";
import { isLicenseRef, type LicenseCatalog } from "./spdx-catalog.js";
import { compareStrings, toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LicenseRecord = {
  readonly identifier: string;
  /** Project-relative path of the license text. */
  readonly filePath: string;
  readonly isKnownSpdx: boolean;
  readonly isDeprecated: boolean;
  readonly hasRecognizedExtension: boolean;
};

export type LicenseInventory = {
  /** Project-relative license directory. */
  readonly directory: string;
  readonly records: readonly LicenseRecord[];
  readonly byIdentifier: ReadonlyMap<string, LicenseRecord>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function scanLicenseDirectory(
  root: string,
  licenseDir: string,
  catalog: LicenseCatalog,
): Promise<LicenseInventory> {
  const absoluteDir = path.resolve(root, licenseDir);
  const directory = toPosixPath(path.relative(root, absoluteDir));
  const names = await listDirectory(absoluteDir);

  const byIdentifier = new Map<string, LicenseRecord>();
  for (const name of names) {
    if (name.endsWith(".license")) continue;
    if (!(await isRegularFile(path.join(absoluteDir, name)))) continue;

    const record = describeLicenseFile(name, `${directory}/${name}`, catalog);
    const existing = byIdentifier.get(record.identifier);
    if (existing) {
      throw new DuplicateLicenseError(record.identifier, [existing.filePath, record.filePath]);
    }
    byIdentifier.set(record.identifier, record);
  }

  const records = Array.from(byIdentifier.values()).sort((a, b) =>
    compareStrings(a.identifier, b.identifier),
  );

  return Object.freeze({
    directory,
    records: Object.freeze(records),
    byIdentifier,
  });
}

/**
 * Identifier of one license file: the name without its last extension when that
 * names a known license or a LicenseRef, else the full name when that is known
 * (an extensionless text), else the stem, which will be reported as bad.
 */
export function describeLicenseFile(
  name: string,
  filePath: string,
  catalog: LicenseCatalog,
): LicenseRecord {
  const extension = path.extname(name);
  const stem = extension ? name.slice(0, -extension.length) : name;
  const recognized = (id: string): boolean => catalog.isKnown(id) || isLicenseRef(id);

  let identifier: string;
  let hasRecognizedExtension: boolean;
  if (extension && recognized(stem)) {
    identifier = stem;
    hasRecognizedExtension = true;
  } else if (recognized(name)) {
    identifier = name;
    hasRecognizedExtension = false;
  } else {
    identifier = stem;
    hasRecognizedExtension = extension.length > 0;
  }

  return Object.freeze({
    identifier,
    filePath,
    isKnownSpdx: catalog.isKnown(identifier),
    isDeprecated: catalog.isDeprecated(identifier),
    hasRecognizedExtension,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listDirectory(directory: string): Promise<string[]> {
  try {
    const names = await fse.readdir(directory);
    return names.sort(compareStrings);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw new LicenseDirectoryError(`Cannot list license directory ${directory}`, directory, err);
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fse.stat(filePath)).isFile();
  } catch (err) {
    // Dangling symlink.
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw new LicenseDirectoryError(`Cannot read ${filePath}`, path.dirname(filePath), err);
  }
}
