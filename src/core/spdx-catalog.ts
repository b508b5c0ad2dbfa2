// SPDX identifier catalog.
// Purpose: answer "is this a known license / exception / deprecated id" from a fixed table.
// The default table comes from the spdx-license-ids and spdx-exceptions packages; tests
// inject their own through LicenseCatalog.fromData.

import { createRequire } from "node:module";

import { z } from "zod";

import { ConfigError } from "./errors.js";

export const LICENSE_REF_PREFIX = "LicenseRef-";
export const DOCUMENT_REF_PREFIX = "DocumentRef-";

const IdListSchema = z.array(z.string().min(1));

export type LicenseCatalogData = {
  licenses: readonly string[];
  exceptions: readonly string[];
  deprecated: readonly string[];
};

// =============================================================================
// CATALOG
// =============================================================================

export class LicenseCatalog {
  private readonly licenses: ReadonlySet<string>;
  private readonly exceptions: ReadonlySet<string>;
  private readonly deprecated: ReadonlySet<string>;

  private constructor(data: LicenseCatalogData) {
    this.licenses = new Set(data.licenses);
    this.exceptions = new Set(data.exceptions);
    this.deprecated = new Set(data.deprecated);
  }

  static fromData(data: LicenseCatalogData): LicenseCatalog {
    return new LicenseCatalog(data);
  }

  /** Deprecated ids are still on the list, so they count as known. */
  isKnownLicense(identifier: string): boolean {
    return this.licenses.has(identifier) || this.deprecated.has(identifier);
  }

  isKnownException(identifier: string): boolean {
    return this.exceptions.has(identifier);
  }

  isKnown(identifier: string): boolean {
    return this.isKnownLicense(identifier) || this.isKnownException(identifier);
  }

  isDeprecated(identifier: string): boolean {
    return this.deprecated.has(identifier);
  }

  listLicenses(): string[] {
    return Array.from(this.licenses).sort();
  }

  listExceptions(): string[] {
    return Array.from(this.exceptions).sort();
  }
}

export function isLicenseRef(identifier: string): boolean {
  if (identifier.startsWith(LICENSE_REF_PREFIX)) {
    return identifier.length > LICENSE_REF_PREFIX.length;
  }

  if (identifier.startsWith(DOCUMENT_REF_PREFIX)) {
    const separator = identifier.indexOf(":");
    return (
      separator > DOCUMENT_REF_PREFIX.length &&
      isLicenseRef(identifier.slice(separator + 1))
    );
  }

  return false;
}

// =============================================================================
// DEFAULT TABLE
// =============================================================================

let defaultCatalog: LicenseCatalog | undefined;

export function loadDefaultCatalog(): LicenseCatalog {
  if (!defaultCatalog) {
    const require = createRequire(import.meta.url);
    defaultCatalog = LicenseCatalog.fromData({
      licenses: readIdList(require, "spdx-license-ids"),
      deprecated: readIdList(require, "spdx-license-ids/deprecated.json"),
      exceptions: readIdList(require, "spdx-exceptions"),
    });
  }

  return defaultCatalog;
}

function readIdList(require: NodeRequire, specifier: string): string[] {
  let raw: unknown;
  try {
    raw = require(specifier);
  } catch (err) {
    throw new ConfigError(`Failed to load the SPDX identifier list from ${specifier}`, err);
  }

  const parsed = IdListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`SPDX identifier list ${specifier} is not a list of strings`, parsed.error);
  }

  return parsed.data;
}
