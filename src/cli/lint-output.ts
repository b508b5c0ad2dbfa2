// Report rendering for the lint commands: plain text, one problem per line, JSON.

import type { JsonObject } from "../core/logger.js";
import type { ComplianceReport } from "../core/report.js";

export type LintOutputFormat = "text" | "lines" | "json";

export const REPORT_FORMAT_VERSION = 1;

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderReport(report: ComplianceReport, format: LintOutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(reportToJson(report), null, 2);
    case "lines":
      return renderProblemLines(report).join("\n");
    case "text":
      return renderTextReport(report);
  }
}

export function renderTextReport(report: ComplianceReport): string {
  const sections: string[] = [];
  const licensePath = licensePathLookup(report);

  const listSection = (title: string, items: string[]): void => {
    if (items.length === 0) return;
    sections.push([`# ${title}`, "", ...items.map((item) => `* ${item}`)].join("\n"));
  };

  listSection(
    "BAD LICENSES",
    report.badLicenses.map((id) => `${id} (${licensePath(id)})`),
  );
  listSection(
    "DEPRECATED LICENSES",
    report.deprecatedLicenses.map((id) => `${id} (${licensePath(id)})`),
  );
  listSection(
    "LICENSES WITHOUT FILE EXTENSION",
    report.licensesWithoutExtension.map((id) => `${id} (${licensePath(id)})`),
  );
  listSection(
    "MISSING LICENSES",
    report.missingLicenses.map((missing) => `${missing.identifier} used in ${missing.files.join(", ")}`),
  );
  listSection(
    "UNUSED LICENSES",
    report.unusedLicenses.map((id) => `${id} (${licensePath(id)})`),
  );
  listSection(
    "UNPARSABLE LICENSE EXPRESSIONS",
    report.unparsableExpressions.map((file) => `${file.path}: ${file.expressions.join("; ")}`),
  );
  listSection(
    "READ ERRORS",
    report.readErrors.map((error) => `${error.path}: ${error.message}`),
  );
  listSection("FILES WITHOUT COPYRIGHT OR LICENSE INFORMATION", [...report.filesWithoutInformation]);
  listSection("FILES WITHOUT COPYRIGHT INFORMATION", onlyMissingOne(report, "copyright"));
  listSection("FILES WITHOUT LICENSE INFORMATION", onlyMissingOne(report, "license"));

  const { counts } = report;
  sections.push(
    [
      "# SUMMARY",
      "",
      `* Bad licenses: ${joinOrNone(report.badLicenses)}`,
      `* Deprecated licenses: ${joinOrNone(report.deprecatedLicenses)}`,
      `* Licenses without file extension: ${joinOrNone(report.licensesWithoutExtension)}`,
      `* Missing licenses: ${joinOrNone(report.missingLicenses.map((m) => m.identifier))}`,
      `* Unused licenses: ${joinOrNone(report.unusedLicenses)}`,
      `* Used licenses: ${joinOrNone(report.usedLicenses)}`,
      `* Read errors: ${counts.readErrors}`,
      `* Files with copyright information: ${counts.filesWithCopyright} / ${counts.filesTotal}`,
      `* Files with license information: ${counts.filesWithLicenses} / ${counts.filesTotal}`,
    ].join("\n"),
  );

  sections.push(
    report.compliant
      ? "The project is compliant: every file has copyright and licensing information."
      : "The project is not compliant.",
  );

  return sections.join("\n\n");
}

/** One `path: problem` line per finding, for editors and CI annotations. */
export function renderProblemLines(report: ComplianceReport): string[] {
  const lines: string[] = [];
  const licensePath = licensePathLookup(report);

  for (const id of report.badLicenses) lines.push(`${licensePath(id)}: bad license ${id}`);
  for (const id of report.deprecatedLicenses) lines.push(`${licensePath(id)}: deprecated license ${id}`);
  for (const id of report.licensesWithoutExtension) {
    lines.push(`${licensePath(id)}: license text without file extension ${id}`);
  }
  for (const missing of report.missingLicenses) {
    for (const file of missing.files) lines.push(`${file}: missing license ${missing.identifier}`);
  }
  for (const id of report.unusedLicenses) lines.push(`${licensePath(id)}: unused license ${id}`);
  for (const file of report.unparsableExpressions) {
    for (const expression of file.expressions) {
      lines.push(`${file.path}: unparsable license expression '${expression}'`);
    }
  }
  for (const error of report.readErrors) lines.push(`${error.path}: read error: ${error.message}`);
  for (const file of report.filesWithoutInformation) {
    lines.push(`${file}: no copyright and licensing information`);
  }

  return lines;
}

export function reportToJson(report: ComplianceReport): JsonObject {
  const licensePath = licensePathLookup(report);
  const byId = (ids: readonly string[]): JsonObject =>
    Object.fromEntries(ids.map((id) => [id, licensePath(id)]));

  return {
    report_format: REPORT_FORMAT_VERSION,
    root: report.root,
    compliant: report.compliant,
    non_compliant: {
      bad_licenses: byId(report.badLicenses),
      deprecated_licenses: byId(report.deprecatedLicenses),
      licenses_without_extension: byId(report.licensesWithoutExtension),
      missing_licenses: Object.fromEntries(
        report.missingLicenses.map((missing) => [missing.identifier, [...missing.files]]),
      ),
      unused_licenses: [...report.unusedLicenses],
      unparsable_expressions: Object.fromEntries(
        report.unparsableExpressions.map((file) => [file.path, [...file.expressions]]),
      ),
      files_without_information: [...report.filesWithoutInformation],
      read_errors: report.readErrors.map((error) => ({ path: error.path, message: error.message })),
    },
    files: report.files.map((file) => ({
      path: file.path,
      copyrights: [...file.copyrightLines],
      licenses: [...file.licenseExpressions],
      contributors: [...file.contributorLines],
      sources: file.sources.map((source) => ({ kind: source.kind, path: source.path })),
    })),
    summary: {
      used_licenses: [...report.usedLicenses],
      files_total: report.counts.filesTotal,
      files_with_copyright_info: report.counts.filesWithCopyright,
      files_with_licensing_info: report.counts.filesWithLicenses,
      files_without_copyright: [...report.filesWithoutCopyright],
      files_without_licenses: [...report.filesWithoutLicenses],
      read_errors: report.counts.readErrors,
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function licensePathLookup(report: ComplianceReport): (identifier: string) => string {
  const paths = new Map(report.licenses.map((license) => [license.identifier, license.path]));
  return (identifier) => paths.get(identifier) ?? identifier;
}

function onlyMissingOne(report: ComplianceReport, field: "copyright" | "license"): string[] {
  const bothMissing = new Set(report.filesWithoutInformation);
  const source = field === "copyright" ? report.filesWithoutCopyright : report.filesWithoutLicenses;
  return source.filter((file) => !bothMissing.has(file));
}

function joinOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : "none";
}
