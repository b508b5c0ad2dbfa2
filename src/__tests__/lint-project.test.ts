import { afterEach, describe, expect, it } from "vitest";

import { defaultLintConfig, type LintConfig } from "../core/config.js";
import { DuplicateLicenseError, ProjectRootError } from "../core/errors.js";
import type { LogEventInput } from "../core/logger.js";
import { lintFiles, lintProject } from "../core/project.js";
import { NoVcs } from "../git/vcs.js";

import { createTempProject, type TempProject } from "./helpers/temp-project.js";
import { createTestCatalog } from "./helpers/test-catalog.js";

let project: TempProject | null = null;

afterEach(async () => {
  if (!project) return;
  await project.cleanup();
  project = null;
});

const catalog = createTestCatalog();

function lint(root: string, config: Partial<LintConfig> = {}, events: LogEventInput[] = []) {
  return lintProject({
    root,
    config: { ...defaultLintConfig(), ...config },
    catalog,
    vcs: new NoVcs(),
    logger: { log: (event) => events.push(event) },
  });
}

function fileInfo(report: Awaited<ReturnType<typeof lint>>, path: string) {
  const info = report.files.find((file) => file.path === path);
  return info
    ? { copyright: [...info.copyrightLines], license: [...info.licenseExpressions] }
    : undefined;
}

const header = (...lines: string[]): string => `${lines.map((line) => `# ${line}`).join("\n")}\n`;

// =============================================================================
// SCENARIOS
// =============================================================================

describe("lintProject scenarios", () => {
  it("accepts a file whose header names a license stored in LICENSES", async () => {
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lint(project.root);

    expect(fileInfo(report, "a.py")).toEqual({ copyright: ["2020 Jane Doe"], license: ["MIT"] });
    expect(report.compliant).toBe(true);
    expect(report.usedLicenses).toEqual(["MIT"]);
  });

  it("reports an unknown, unreferenced license text as bad and unused", async () => {
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "LICENSES/MIT.txt": "MIT License text",
      "LICENSES/bad-license.txt": "Custom terms",
    });

    const report = await lint(project.root);

    expect(report.badLicenses).toEqual(["bad-license"]);
    expect(report.unusedLicenses).toEqual(["bad-license"]);
    expect(report.compliant).toBe(false);
  });

  it("unions an aggregate manifest entry with the file's own header", async () => {
    project = await createTempProject({
      "REUSE.toml": [
        "version = 1",
        "",
        "[[annotations]]",
        'path = "hello*.txt"',
        'precedence = "aggregate"',
        'SPDX-FileCopyrightText = "2018 Jane Doe"',
        'SPDX-License-Identifier = "MIT"',
      ].join("\n"),
      "hello_world.txt": "Copyright: 2019 John Doe\n\nHello, world!\n",
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lint(project.root);

    expect(fileInfo(report, "hello_world.txt")).toEqual({
      copyright: ["2018 Jane Doe", "2019 John Doe"],
      license: ["MIT"],
    });
    expect(report.compliant).toBe(true);
  });

  it("merges year statements of the same holder when configured", async () => {
    project = await createTempProject({
      "a.py": header(
        "SPDX-FileCopyrightText: 2016 Jane Doe",
        "SPDX-FileCopyrightText: 2018 Jane Doe",
        "SPDX-License-Identifier: MIT",
      ),
      "LICENSES/MIT.txt": "MIT License text",
    });

    const merged = await lint(project.root, { merge_copyrights: true });
    const separate = await lint(project.root);

    expect(fileInfo(merged, "a.py")?.copyright).toEqual(["2016-2018 Jane Doe"]);
    expect(fileInfo(separate, "a.py")?.copyright).toEqual(["2016 Jane Doe", "2018 Jane Doe"]);
  });

  it("does not alias a deprecated identifier to its current form", async () => {
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: GPL-3.0"),
      "LICENSES/GPL-3.0-only.txt": "GPL text",
    });

    const report = await lint(project.root);

    expect(report.missingLicenses).toEqual([{ identifier: "GPL-3.0", files: ["a.py"] }]);
    expect(report.unusedLicenses).toEqual(["GPL-3.0-only"]);
    expect(report.badLicenses).toEqual([]);
    expect(report.compliant).toBe(false);
  });
});

// =============================================================================
// PROJECT BEHAVIOUR
// =============================================================================

describe("lintProject", () => {
  it("lists files without any information and counts them", async () => {
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "notes.txt": "nothing here\n",
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lint(project.root);

    expect(report.filesWithoutInformation).toEqual(["notes.txt"]);
    expect(report.counts).toEqual({
      filesTotal: 2,
      filesWithCopyright: 1,
      filesWithoutCopyright: 1,
      filesWithLicenses: 1,
      filesWithoutLicenses: 1,
      readErrors: 0,
    });
    expect(report.compliant).toBe(false);
  });

  it("skips tags inside ignore blocks", async () => {
    project = await createTempProject({
      "a.py": header(
        "SPDX-FileCopyrightText: 2020 Jane Doe",
        "SPDX-License-Identifier: MIT",
        "REUSE-IgnoreStart",
        "SPDX-License-Identifier: Apache-2.0",
        "REUSE-IgnoreEnd",
      ),
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lint(project.root);

    expect(fileInfo(report, "a.py")?.license).toEqual(["MIT"]);
    expect(report.compliant).toBe(true);
  });

  it("lets an override entry replace the file's header", async () => {
    project = await createTempProject({
      "REUSE.toml": [
        "version = 1",
        "[[annotations]]",
        'path = "vendor/**"',
        'precedence = "override"',
        'SPDX-FileCopyrightText = "2015 Vendor Inc."',
        'SPDX-License-Identifier = "Apache-2.0"',
      ].join("\n"),
      "vendor/lib.c": "// SPDX-FileCopyrightText: 2020 Jane Doe\n// SPDX-License-Identifier: MIT\n",
      "LICENSES/Apache-2.0.txt": "Apache text",
    });

    const report = await lint(project.root);

    expect(fileInfo(report, "vendor/lib.c")).toEqual({
      copyright: ["2015 Vendor Inc."],
      license: ["Apache-2.0"],
    });
    expect(report.compliant).toBe(true);
  });

  it("reads the deprecated manifest and warns about it", async () => {
    const events: LogEventInput[] = [];
    project = await createTempProject({
      ".reuse/dep5": [
        "Format: https://www.debian.org/doc/packaging-manuals/copyright-format/1.0/",
        "",
        "Files: docs/*",
        "Copyright: 2017 Jane Doe",
        "License: CC0-1.0",
      ].join("\n"),
      "docs/guide.md": "# Guide\n",
      "LICENSES/CC0-1.0.txt": "CC0 text",
    });

    const report = await lint(project.root, {}, events);

    expect(fileInfo(report, "docs/guide.md")).toEqual({
      copyright: ["2017 Jane Doe"],
      license: ["CC0-1.0"],
    });
    expect(events.filter((event) => event.type === "manifest.deprecated")).toHaveLength(1);
  });

  it("logs and skips an invalid manifest", async () => {
    const events: LogEventInput[] = [];
    project = await createTempProject({
      "REUSE.toml": "version = 2\n",
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lint(project.root, {}, events);

    expect(report.compliant).toBe(true);
    expect(events.filter((event) => event.type === "manifest.invalid").map((e) => e.payload)).toEqual([
      { path: "REUSE.toml" },
    ]);
  });

  it("reports unparsable license expressions and warns", async () => {
    const events: LogEventInput[] = [];
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT AND"),
    });

    const report = await lint(project.root, {}, events);

    expect(report.unparsableExpressions).toEqual([{ path: "a.py", expressions: ["MIT AND"] }]);
    expect(events.map((event) => event.type)).toContain("file.unparsable_expression");
    expect(report.compliant).toBe(false);
  });

  it("gives the same report with one worker or many", async () => {
    const files: Record<string, string> = { "LICENSES/MIT.txt": "MIT License text" };
    for (let i = 0; i < 12; i += 1) {
      files[`src/file${i}.py`] = header(
        `SPDX-FileCopyrightText: ${2010 + i} Jane Doe`,
        "SPDX-License-Identifier: MIT",
      );
    }
    project = await createTempProject(files);

    const serial = await lint(project.root, { multiprocessing: false });
    const parallel = await lint(project.root, { jobs: 4 });

    expect(parallel).toEqual(serial);
  });

  it("fails when two license files share an identifier", async () => {
    project = await createTempProject({
      "LICENSES/MIT.txt": "MIT License text",
      "LICENSES/MIT.md": "MIT License text",
    });

    await expect(lint(project.root)).rejects.toBeInstanceOf(DuplicateLicenseError);
  });

  it("fails when the root does not exist", async () => {
    project = await createTempProject();

    await expect(lint(`${project.root}/missing`)).rejects.toBeInstanceOf(ProjectRootError);
  });
});

describe("lintFiles", () => {
  it("checks only the named files and leaves out license directory findings", async () => {
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "b.py": "print('no header')\n",
      "LICENSES/MIT.txt": "MIT License text",
      "LICENSES/Apache-2.0.txt": "Apache text",
    });

    const report = await lintFiles({
      root: project.root,
      config: defaultLintConfig(),
      catalog,
      vcs: new NoVcs(),
      paths: ["a.py"],
    });

    expect(report.files.map((file) => file.path)).toEqual(["a.py"]);
    expect(report.unusedLicenses).toEqual([]);
    expect(report.compliant).toBe(true);
  });

  it("skips named files that are never covered", async () => {
    const events: LogEventInput[] = [];
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "LICENSE": "MIT License text",
      "vendor/x/LICENSES/MIT.txt": "MIT License text",
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lintFiles({
      root: project.root,
      config: defaultLintConfig(),
      catalog,
      vcs: new NoVcs(),
      logger: { log: (event) => events.push(event) },
      paths: ["LICENSE", "a.py", "b.py.license", "vendor/x/LICENSES/MIT.txt", "LICENSES/MIT.txt"],
    });

    expect(report.files.map((file) => file.path)).toEqual(["a.py"]);
    expect(report.filesWithoutInformation).toEqual([]);
    expect(report.compliant).toBe(true);
    expect(events.filter((event) => event.type === "file.skipped")).toHaveLength(4);
  });

  it("reports a file that cannot be read and still resolves the others", async () => {
    const events: LogEventInput[] = [];
    project = await createTempProject({
      "a.py": header("SPDX-FileCopyrightText: 2020 Jane Doe", "SPDX-License-Identifier: MIT"),
      "LICENSES/MIT.txt": "MIT License text",
    });

    const report = await lintFiles({
      root: project.root,
      config: defaultLintConfig(),
      catalog,
      vcs: new NoVcs(),
      logger: { log: (event) => events.push(event) },
      paths: ["a.py", "gone.py"],
    });

    expect(report.files.map((file) => file.path)).toEqual(["a.py"]);
    expect(report.readErrors.map((error) => error.path)).toEqual(["gone.py"]);
    expect(report.counts.readErrors).toBe(1);
    expect(report.compliant).toBe(false);
    expect(
      events.filter((event) => event.type === "file.read_error").map((event) => event.payload?.path),
    ).toEqual(["gone.py"]);
  });
});
