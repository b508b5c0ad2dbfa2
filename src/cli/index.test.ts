import { describe, expect, it } from "vitest";

import { buildCli } from "./index.js";

describe("buildCli", () => {
  it("registers the lint commands and global options", () => {
    const program = buildCli();

    expect(program.commands.map((command) => command.name())).toEqual([
      "lint",
      "lint-file",
      "supported-licenses",
    ]);
    expect(program.options.map((option) => option.long)).toEqual([
      "--version",
      "--root",
      "--config",
      "--debug",
      "--log-file",
    ]);
  });

  it("lists the lint flags", () => {
    const program = buildCli();
    const lint = program.commands.find((command) => command.name() === "lint");

    expect(lint?.options.map((option) => option.long)).toEqual([
      "--json",
      "--lines",
      "--quiet",
      "--no-multiprocessing",
      "--jobs",
    ]);
  });
});
