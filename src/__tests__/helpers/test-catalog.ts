import { LicenseCatalog } from "../../core/spdx-catalog.js";

// Small fixed catalog so tests do not depend on the installed SPDX list version.
export function createTestCatalog(): LicenseCatalog {
  return LicenseCatalog.fromData({
    licenses: [
      "Apache-2.0",
      "BSD-3-Clause",
      "CC0-1.0",
      "GPL-2.0-only",
      "GPL-2.0-or-later",
      "GPL-3.0-only",
      "GPL-3.0-or-later",
      "MIT",
    ],
    exceptions: ["Classpath-exception-2.0", "LLVM-exception"],
    deprecated: ["GPL-2.0", "GPL-2.0+", "GPL-3.0", "GPL-3.0+"],
  });
}
