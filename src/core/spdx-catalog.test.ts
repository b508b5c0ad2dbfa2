import { describe, expect, it } from "vitest";

import { createTestCatalog } from "../__tests__/helpers/test-catalog.js";

import { isLicenseRef, loadDefaultCatalog } from "./spdx-catalog.js";

describe("LicenseCatalog", () => {
  const catalog = createTestCatalog();

  it("treats deprecated ids as known licenses", () => {
    expect(catalog.isKnownLicense("GPL-3.0")).toBe(true);
    expect(catalog.isDeprecated("GPL-3.0")).toBe(true);
    expect(catalog.isDeprecated("GPL-3.0-only")).toBe(false);
  });

  it("keeps licenses and exceptions apart", () => {
    expect(catalog.isKnownException("LLVM-exception")).toBe(true);
    expect(catalog.isKnownLicense("LLVM-exception")).toBe(false);
    expect(catalog.isKnown("LLVM-exception")).toBe(true);
    expect(catalog.isKnown("mit")).toBe(false);
  });

  it("lists current ids in order", () => {
    expect(catalog.listExceptions()).toEqual(["Classpath-exception-2.0", "LLVM-exception"]);
    expect(catalog.listLicenses()[0]).toBe("Apache-2.0");
  });
});

describe("loadDefaultCatalog", () => {
  it("loads the installed SPDX lists once", () => {
    const catalog = loadDefaultCatalog();

    expect(catalog.isKnownLicense("MIT")).toBe(true);
    expect(catalog.isKnownException("Classpath-exception-2.0")).toBe(true);
    expect(loadDefaultCatalog()).toBe(catalog);
  });
});

describe("isLicenseRef", () => {
  it.each([
    ["LicenseRef-Proprietary", true],
    ["LicenseRef-", false],
    ["DocumentRef-spdx-tool-1.2:LicenseRef-MIT-Style-2", true],
    ["DocumentRef-doc:MIT", false],
    ["MIT", false],
  ])("%s -> %s", (identifier, expected) => {
    expect(isLicenseRef(identifier)).toBe(expected);
  });
});
