// Project scan.
// Purpose: load the shared inputs once, fan per-file work out over a pool, and build the report.
// Assumptions: setup failures throw before any file is read; per-file failures become read errors.

import path from "node:path";

import fse from "fs-extra";

import { createVcsStrategy, type VcsStrategy } from "../git/vcs.js";

import { classify, type ClassificationSets, type ReadError } from "./compliance.js";
import type { LintConfig } from "./config.js";
import { CoveredPathFilter, listProjectFiles } from "./covered-files.js";
import { parseDep5, type Dep5Manifest } from "./dep5.js";
import { formatErrorMessage } from "./error-format.js";
import { ProjectRootError } from "./errors.js";
import type { FileReuseInfo } from "./evidence.js";
import { scanLicenseDirectory } from "./license-inventory.js";
import { logDebug, logWarning, silentLogger, type ScanLogger } from "./logger.js";
import { resolveConcurrency, runPool } from "./pool.js";
import { resolve } from "./precedence.js";
import { buildComplianceReport, type ComplianceReport } from "./report.js";
import { parseReuseToml, type ConfigEntry } from "./reuse-toml.js";
import { collectEvidence, type CollectorContext } from "./source-collector.js";
import { loadDefaultCatalog, type LicenseCatalog } from "./spdx-catalog.js";
import { ExpressionValidator } from "./spdx-expression.js";
import { toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LintOptions = {
  root: string;
  config: LintConfig;
  catalog?: LicenseCatalog;
  logger?: ScanLogger;
  vcs?: VcsStrategy;
};

export type LintFilesOptions = LintOptions & {
  /** Project-relative paths to check instead of every covered file. */
  paths: readonly string[];
};

type FileOutcome = { info: FileReuseInfo } | { readError: ReadError };

type SharedInputs = {
  root: string;
  validator: ExpressionValidator;
  entries: ConfigEntry[];
  collector: CollectorContext;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function lintProject(options: LintOptions): Promise<ComplianceReport> {
  return runScan(options, undefined);
}

/**
 * Checks only the given files. Findings about the license directory as a whole
 * (bad, deprecated, extensionless, unused) are left out, since a subset of files
 * cannot tell whether a license is used elsewhere.
 */
export async function lintFiles(options: LintFilesOptions): Promise<ComplianceReport> {
  return runScan(options, options.paths);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runScan(
  options: LintOptions,
  selectedPaths: readonly string[] | undefined,
): Promise<ComplianceReport> {
  const logger = options.logger ?? silentLogger;
  const { config } = options;
  const root = path.resolve(options.root);

  await assertProjectRoot(root);

  const catalog = options.catalog ?? loadDefaultCatalog();
  const validator = new ExpressionValidator(catalog);
  const vcs = options.vcs ?? (await createVcsStrategy(root, config.vcs));

  const inventory = await scanLicenseDirectory(root, config.license_dir, catalog);
  const filter = await CoveredPathFilter.create({
    licenseDir: config.license_dir,
    manifestFilename: config.manifest_filename,
    vcs,
    includeSubmodules: config.include_submodules,
    includeMesonSubprojects: config.include_meson_subprojects,
  });
  const projectFiles = await listProjectFiles(root, filter);

  const entries = await loadManifests(root, projectFiles.manifests, logger);
  const dep5 = await loadDep5(root, config.dep5_path, logger);

  const shared: SharedInputs = {
    root,
    validator,
    entries,
    collector: { root, validator, headerBytes: config.header_bytes, dep5 },
  };

  const targets = selectedPaths
    ? selectCoveredPaths(selectedPaths, filter, logger)
    : projectFiles.covered;
  const concurrency = resolveConcurrency({
    multiprocessing: config.multiprocessing,
    jobs: config.jobs,
  });

  logger.log({
    type: "scan.start",
    level: "debug",
    message: `Scanning ${targets.length} files with ${concurrency} workers`,
    payload: { root, files: targets.length, concurrency, vcs: vcs.name },
  });

  const outcomes = await runPool(targets, { concurrency }, (projectPath) =>
    scanFile(projectPath, shared, config.merge_copyrights),
  );

  const files: FileReuseInfo[] = [];
  const readErrors: ReadError[] = [];
  for (const outcome of outcomes) {
    if ("readError" in outcome) {
      readErrors.push(outcome.readError);
      logWarning(logger, "file.read_error", `Could not read ${outcome.readError.path}`, {
        path: outcome.readError.path,
        error: outcome.readError.message,
      });
      continue;
    }

    files.push(outcome.info);
    if (outcome.info.unparsableExpressions.length > 0) {
      logWarning(
        logger,
        "file.unparsable_expression",
        `Could not parse license expression in ${outcome.info.path}`,
        { path: outcome.info.path, expressions: [...outcome.info.unparsableExpressions] },
      );
    }
  }

  const sets = classify(files, inventory, validator, readErrors);
  const classification = selectedPaths ? withoutDirectoryFindings(sets) : sets;

  for (const missing of classification.missingLicenses) {
    logDebug(logger, "license.unresolved", `No license text for ${missing.identifier}`, {
      identifier: missing.identifier,
      files: missing.files,
    });
  }

  const report = buildComplianceReport({ root, files, classification, inventory });

  logger.log({
    type: "scan.complete",
    level: "debug",
    message: report.compliant ? "Project is compliant" : "Project is not compliant",
    payload: { compliant: report.compliant, files: report.counts.filesTotal },
  });

  return report;
}

async function scanFile(
  projectPath: string,
  shared: SharedInputs,
  mergeCopyrights: boolean,
): Promise<FileOutcome> {
  try {
    const { records, unparsable } = await collectEvidence(projectPath, shared.collector);
    const info = resolve(projectPath, records, shared.entries, {
      mergeCopyrights,
      unparsableExpressions: unparsable,
    });
    return { info };
  } catch (err) {
    return { readError: { path: projectPath, message: formatErrorMessage(err) } };
  }
}

async function assertProjectRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fse.stat(root)).isDirectory();
  } catch (err) {
    throw new ProjectRootError(`Project root ${root} does not exist`, root, err);
  }
  if (!isDirectory) {
    throw new ProjectRootError(`Project root ${root} is not a directory`, root);
  }
}

async function loadManifests(
  root: string,
  manifestPaths: readonly string[],
  logger: ScanLogger,
): Promise<ConfigEntry[]> {
  const entries: ConfigEntry[] = [];

  for (const manifestPath of manifestPaths) {
    try {
      const text = await fse.readFile(path.join(root, manifestPath), "utf8");
      entries.push(...parseReuseToml(text, manifestPath).entries);
    } catch (err) {
      logWarning(logger, "manifest.invalid", `Ignoring ${manifestPath}: ${formatErrorMessage(err)}`, {
        path: manifestPath,
      });
    }
  }

  return entries;
}

async function loadDep5(
  root: string,
  dep5Path: string,
  logger: ScanLogger,
): Promise<Dep5Manifest | undefined> {
  const absolutePath = path.join(root, dep5Path);
  if (!(await fse.pathExists(absolutePath))) return undefined;

  const projectPath = toPosixPath(dep5Path);
  logWarning(
    logger,
    "manifest.deprecated",
    `${projectPath} is deprecated; move its annotations to REUSE.toml`,
    { path: projectPath },
  );

  try {
    return parseDep5(await fse.readFile(absolutePath, "utf8"), projectPath);
  } catch (err) {
    logWarning(logger, "manifest.invalid", `Ignoring ${projectPath}: ${formatErrorMessage(err)}`, {
      path: projectPath,
    });
    return undefined;
  }
}

function selectCoveredPaths(
  selectedPaths: readonly string[],
  filter: CoveredPathFilter,
  logger: ScanLogger,
): string[] {
  const targets: string[] = [];
  for (const projectPath of new Set(selectedPaths.map(toPosixPath))) {
    if (filter.isExcluded(projectPath)) {
      logDebug(logger, "file.skipped", `Skipping ${projectPath}: not a covered file`, {
        path: projectPath,
      });
      continue;
    }
    targets.push(projectPath);
  }
  return targets;
}

function withoutDirectoryFindings(sets: ClassificationSets): ClassificationSets {
  return {
    ...sets,
    badLicenses: [],
    deprecatedLicenses: [],
    licensesWithoutExtension: [],
    unusedLicenses: [],
  };
}
