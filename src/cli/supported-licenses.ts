import type { Command } from "commander";

import type { LicenseCatalog } from "../core/spdx-catalog.js";
import { loadDefaultCatalog } from "../core/spdx-catalog.js";

export function registerSupportedLicensesCommand(program: Command): void {
  program
    .command("supported-licenses")
    .description("List the SPDX license and exception identifiers this tool recognizes")
    .action(() => {
      console.log(supportedLicensesText(loadDefaultCatalog()));
    });
}

export function supportedLicensesText(catalog: LicenseCatalog): string {
  const licenses = catalog.listLicenses();
  const exceptions = catalog.listExceptions();

  return [
    `# LICENSES (${licenses.length})`,
    "",
    ...licenses,
    "",
    `# EXCEPTIONS (${exceptions.length})`,
    "",
    ...exceptions,
  ].join("\n");
}
