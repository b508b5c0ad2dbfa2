import { describe, expect, it } from "vitest";

import { createTestCatalog } from "../__tests__/helpers/test-catalog.js";

import { supportedLicensesText } from "./supported-licenses.js";

describe("supportedLicensesText", () => {
  it("lists licenses then exceptions with their counts", () => {
    const lines = supportedLicensesText(createTestCatalog()).split("\n");

    expect(lines.slice(0, 4)).toEqual(["# LICENSES (8)", "", "Apache-2.0", "BSD-3-Clause"]);
    expect(lines.slice(-4)).toEqual([
      "# EXCEPTIONS (2)",
      "",
      "Classpath-exception-2.0",
      "LLVM-exception",
    ]);
  });
});
