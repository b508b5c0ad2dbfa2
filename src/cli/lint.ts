import path from "node:path";

import { InvalidArgumentError, type Command } from "commander";
import { z } from "zod";

import type { LintConfig } from "../core/config.js";
import {
  LicenseDirectoryError,
  ProjectRootError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { lintFiles, lintProject, type LintOptions } from "../core/project.js";
import type { ComplianceReport } from "../core/report.js";
import { toPosixPath } from "../core/utils.js";

import { loadCliContext, type CliContext } from "./config.js";
import { renderReport, type LintOutputFormat } from "./lint-output.js";

// =============================================================================
// OPTIONS
// =============================================================================

export const GlobalOptionsSchema = z.object({
  root: z.string().optional(),
  config: z.string().optional(),
  debug: z.boolean().optional(),
  logFile: z.string().optional(),
});

const LintCommandOptionsSchema = z.object({
  json: z.boolean().default(false),
  lines: z.boolean().default(false),
  quiet: z.boolean().default(false),
  multiprocessing: z.boolean().default(true),
  jobs: z.number().int().positive().optional(),
});

const LintFileCommandOptionsSchema = z.object({
  json: z.boolean().default(false),
});

export type LintCommandOptions = z.infer<typeof LintCommandOptionsSchema>;

export type LintRunResult = {
  report: ComplianceReport;
  output: string | undefined;
};

type Write = (text: string) => void;

const writeStdout: Write = (text) => {
  process.stdout.write(`${text}\n`);
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerLintCommands(program: Command): void {
  program
    .command("lint")
    .description("Check every file in the project for copyright and licensing information")
    .option("--json", "Emit the report as JSON", false)
    .option("--lines", "Emit one line per problem", false)
    .option("-q, --quiet", "Print nothing; only set the exit code", false)
    .option("--no-multiprocessing", "Scan files one at a time")
    .option("-j, --jobs <n>", "Number of files scanned in parallel", parsePositiveInt)
    .action(async (rawOpts: unknown, command: Command) => {
      const globals = GlobalOptionsSchema.parse(command.optsWithGlobals());
      const opts = LintCommandOptionsSchema.parse(rawOpts);
      const context = await loadCliContext(globals);

      try {
        const result = await lintCommand(context, opts);
        if (result.output !== undefined) writeStdout(result.output);
        if (!result.report.compliant) process.exitCode = 1;
      } finally {
        context.close();
      }
    });

  program
    .command("lint-file")
    .description("Check only the given files; license directory findings are skipped")
    .argument("<files...>", "Files to check, relative to the working directory")
    .option("--json", "Emit the report as JSON", false)
    .action(async (files: string[], rawOpts: unknown, command: Command) => {
      const globals = GlobalOptionsSchema.parse(command.optsWithGlobals());
      const opts = LintFileCommandOptionsSchema.parse(rawOpts);
      const context = await loadCliContext(globals);

      try {
        const result = await lintFileCommand(context, files, {
          format: opts.json ? "json" : "lines",
          cwd: process.cwd(),
        });
        if (result.output !== undefined) writeStdout(result.output);
        if (!result.report.compliant) process.exitCode = 1;
      } finally {
        context.close();
      }
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function lintCommand(
  context: Pick<CliContext, "root" | "config" | "logger">,
  opts: Partial<LintCommandOptions>,
  overrides: Pick<LintOptions, "catalog" | "vcs"> = {},
): Promise<LintRunResult> {
  const config = applyCliOverrides(context.config, opts);
  const report = await withUserFacingErrors(() =>
    lintProject({ root: context.root, config, logger: context.logger, ...overrides }),
  );

  if (opts.quiet) {
    return { report, output: undefined };
  }

  return { report, output: renderReport(report, resolveFormat(opts)) };
}

export async function lintFileCommand(
  context: Pick<CliContext, "root" | "config" | "logger">,
  files: readonly string[],
  opts: { format: LintOutputFormat; cwd: string },
  overrides: Pick<LintOptions, "catalog" | "vcs"> = {},
): Promise<LintRunResult> {
  const paths = files.map((file) => toProjectPath(context.root, opts.cwd, file));
  const report = await withUserFacingErrors(() =>
    lintFiles({
      root: context.root,
      config: context.config,
      logger: context.logger,
      paths,
      ...overrides,
    }),
  );

  return { report, output: renderReport(report, opts.format) };
}

/** Flags can only narrow parallelism: --no-multiprocessing wins over the config file. */
export function applyCliOverrides(config: LintConfig, opts: Partial<LintCommandOptions>): LintConfig {
  return {
    ...config,
    multiprocessing: config.multiprocessing && opts.multiprocessing !== false,
    jobs: narrowJobs(config.jobs, opts.jobs),
  };
}

function narrowJobs(configured: number | undefined, requested: number | undefined): number | undefined {
  if (requested === undefined) return configured;
  return configured === undefined ? requested : Math.min(configured, requested);
}

export function toProjectPath(root: string, cwd: string, file: string): string {
  const absolute = path.resolve(cwd, file);
  const relative = path.relative(root, absolute);

  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "File outside project.",
      message: `${file} is not inside the project root ${root}.`,
      hint: "Pass files under the project root, or point --root at their project.",
    });
  }

  return toPosixPath(relative);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormat(opts: Partial<LintCommandOptions>): LintOutputFormat {
  if (opts.json) return "json";
  if (opts.lines) return "lines";
  return "text";
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

async function withUserFacingErrors<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof ProjectRootError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.projectRoot,
        title: "Project root unavailable.",
        message: err.message,
        hint: "Check the --root option or run from inside the project.",
        cause: err,
      });
    }

    if (err instanceof LicenseDirectoryError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.licenseDirectory,
        title: "License directory invalid.",
        message: err.message,
        hint: "Check that the license directory is readable and names each license once.",
        cause: err,
      });
    }

    throw err;
  }
}
