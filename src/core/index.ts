export { classify, isCompliant } from "./compliance.js";
export type {
  ClassificationSets,
  MissingLicense,
  ReadError,
  UnparsableFile,
} from "./compliance.js";
export { LintConfigSchema, defaultLintConfig } from "./config.js";
export type { LintConfig } from "./config.js";
export { loadLintConfig } from "./config-loader.js";
export { mergeCopyrightLines, normalizeCopyrightText, parseCopyrightNotice } from "./copyright.js";
export { CoveredPathFilter, listProjectFiles } from "./covered-files.js";
export { findDep5Paragraph, parseDep5 } from "./dep5.js";
export * from "./errors.js";
export {
  createConfigEntryEvidence,
  createDeprecatedManifestEvidence,
  createFileReuseInfo,
  createHeaderEvidence,
} from "./evidence.js";
export type {
  EvidenceRecord,
  EvidenceSource,
  FileReuseInfo,
  PrecedenceStrategy,
  SourceKind,
} from "./evidence.js";
export { extract } from "./extract.js";
export type { ExtractResult, ExtractedTags } from "./extract.js";
export { describeLicenseFile, scanLicenseDirectory } from "./license-inventory.js";
export type { LicenseInventory, LicenseRecord } from "./license-inventory.js";
export { JsonlLogger, combineLoggers, createConsoleLogger, silentLogger } from "./logger.js";
export type { LogEvent, LogEventInput, ScanLogger } from "./logger.js";
export { runPool } from "./pool.js";
export { resolve } from "./precedence.js";
export type { ResolveOptions } from "./precedence.js";
export { lintFiles, lintProject } from "./project.js";
export type { LintFilesOptions, LintOptions } from "./project.js";
export { buildComplianceReport } from "./report.js";
export type { ComplianceReport, ReportCounts } from "./report.js";
export { applicableEntries, globMatches, parseReuseToml } from "./reuse-toml.js";
export type { ConfigEntry, ReuseManifest } from "./reuse-toml.js";
export { collectEvidence } from "./source-collector.js";
export { LicenseCatalog, isLicenseRef, loadDefaultCatalog } from "./spdx-catalog.js";
export { ExpressionValidator, parseLicenseExpression } from "./spdx-expression.js";
export type { AtomDetail, ExpressionNode, ValidationResult } from "./spdx-expression.js";
