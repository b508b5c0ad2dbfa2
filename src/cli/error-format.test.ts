import { describe, expect, it } from "vitest";

import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file invalid.",
    message: "Config file at /project/.licenselint.yaml is invalid.",
    hint: "Fix the config file and rerun.",
    cause: new ConfigError("vcs: Expected one of \"auto\", \"git\", \"none\", received \"svn\""),
  });
}

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config file invalid.",
        "Config file at /project/.licenselint.yaml is invalid.",
        "Hint: Fix the config file and rerun.",
        'Cause: vcs: Expected one of "auto", "git", "none", received "svn"',
      ].join("\n"),
    );
  });

  it("adds the error code and stack in debug mode", () => {
    const output = renderCliError(buildUserFacingError(), { debug: true, stream: nonTtyStream });
    const lines = output.split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "Error: Config file invalid.",
      "Config file at /project/.licenselint.yaml is invalid.",
      "Hint: Fix the config file and rerun.",
      "Code: CONFIG_ERROR",
    ]);
    expect(lines).toContain("Stack:");
  });

  it("renders plain errors with their name in debug mode", () => {
    const output = renderCliError(new Error("boom"), { debug: true, stream: nonTtyStream });

    expect(output.split("\n").slice(0, 2)).toEqual(["Error: boom", "Name: Error"]);
  });

  it("renders non-error values", () => {
    expect(renderCliError("plain failure", { stream: nonTtyStream })).toBe("Error: plain failure");
  });

  it("colors the title when color is forced", () => {
    const output = renderCliError(new Error("boom"), { useColor: true });

    expect(output).toBe("\u001b[1m\u001b[31mError:\u001b[39m\u001b[22m \u001b[1mboom\u001b[22m");
  });
});
