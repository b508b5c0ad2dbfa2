import { describe, expect, it } from "vitest";

import { NoVcs, isIgnoredPath, parseGitmodules } from "./vcs.js";

describe("parseGitmodules", () => {
  it("reads submodule paths", () => {
    const text = [
      '[submodule "vendor/lib"]',
      "\tpath = vendor/lib",
      "\turl = https://example.com/lib.git",
      '[submodule "docs/theme"]',
      "  path=docs/theme/",
    ].join("\n");

    expect(parseGitmodules(text)).toEqual(["vendor/lib", "docs/theme"]);
  });
});

describe("isIgnoredPath", () => {
  const ignored = new Set(["build/", "notes.txt", "src/generated/"]);

  it.each([
    ["build/out.js", true],
    ["notes.txt", true],
    ["src/generated/a/b.ts", true],
    ["src/main.ts", false],
    ["buildings.txt", false],
  ])("%s -> %s", (projectPath, expected) => {
    expect(isIgnoredPath(projectPath, ignored)).toBe(expected);
  });
});

describe("NoVcs", () => {
  it("ignores nothing", async () => {
    const vcs = new NoVcs();

    await expect(vcs.listIgnored()).resolves.toEqual([]);
    await expect(vcs.listSubmodules()).resolves.toEqual([]);
  });
});
