import path from "node:path";

import type { LintConfig } from "../core/config.js";
import { loadLintConfig } from "../core/config-loader.js";
import {
  JsonlLogger,
  combineLoggers,
  createConsoleLogger,
  type ScanLogger,
} from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";
import { isInsideWorkTree, workTreeRoot } from "../git/git.js";

// =============================================================================
// CLI CONTEXT
// =============================================================================

export type GlobalCliOptions = {
  root?: string;
  config?: string;
  debug?: boolean;
  logFile?: string;
};

export type CliContext = {
  root: string;
  config: LintConfig;
  logger: ScanLogger;
  debug: boolean;
  close: () => void;
};

export async function loadCliContext(
  opts: GlobalCliOptions,
  cwd: string = process.cwd(),
): Promise<CliContext> {
  const root = await resolveProjectRoot(opts.root, cwd);
  const config = loadLintConfig(root, opts.config ? path.resolve(cwd, opts.config) : undefined);
  const debug = Boolean(opts.debug);

  const fileLogger = opts.logFile
    ? new JsonlLogger(path.resolve(cwd, opts.logFile), { runId: defaultRunId() }, debug)
    : undefined;

  return {
    root,
    config,
    logger: combineLoggers(createConsoleLogger({ debug }), fileLogger),
    debug,
    close: () => fileLogger?.close(),
  };
}

/** --root, else the enclosing git work tree, else the working directory. */
export async function resolveProjectRoot(explicitRoot: string | undefined, cwd: string): Promise<string> {
  if (explicitRoot) {
    return path.resolve(cwd, explicitRoot);
  }

  if (await isInsideWorkTree(cwd)) {
    return workTreeRoot(cwd);
  }

  return cwd;
}
