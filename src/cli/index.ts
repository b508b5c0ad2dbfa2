import { Command } from "commander";

import { registerLintCommands } from "./lint.js";
import { registerSupportedLicensesCommand } from "./supported-licenses.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("licenselint")
    .description("Check that every file in a project carries copyright and licensing information")
    .version("0.1.0")
    .option("--root <dir>", "Project root (default: enclosing git work tree, else the working directory)")
    .option("--config <path>", "Tool config path (default: <root>/.licenselint.yaml)")
    .option("--debug", "Print debug events and error stacks", false)
    .option("--log-file <path>", "Append structured scan events to a JSONL file");

  registerLintCommands(program);
  registerSupportedLicensesCommand(program);

  return program;
}
