import { describe, expect, it } from "vitest";

import { dep5PatternToRegExp, findDep5Paragraph, parseDep5 } from "./dep5.js";
import { ManifestError } from "./errors.js";

const DEP5 = [
  "Format: https://www.debian.org/doc/packaging-manuals/copyright-format/1.0/",
  "Upstream-Name: example",
  "Source: https://example.com/example",
  "",
  "Files: *",
  "Copyright: 2017 Jane Doe",
  "License: MIT",
  "",
  "# generated assets",
  "Files: assets/*.png",
  "  assets/icons/*",
  "Copyright: 2018 Example Corp",
  " Copyright (C) 2019 Alex Example",
  "License: CC-BY-4.0",
  " Full license text is in LICENSES.",
  "Comment: These are exported from the design files.",
].join("\n");

describe("parseDep5", () => {
  it("reads Files paragraphs with continuation lines", () => {
    const manifest = parseDep5(DEP5, ".reuse/dep5");

    expect(manifest.paragraphs.map(({ patterns, copyrightLines, licenseExpression }) => ({
      patterns,
      copyrightLines,
      licenseExpression,
    }))).toEqual([
      { patterns: ["*"], copyrightLines: ["2017 Jane Doe"], licenseExpression: "MIT" },
      {
        patterns: ["assets/*.png", "assets/icons/*"],
        copyrightLines: ["2018 Example Corp", "2019 Alex Example"],
        licenseExpression: "CC-BY-4.0",
      },
    ]);
  });

  it("uses the last matching paragraph", () => {
    const manifest = parseDep5(DEP5, ".reuse/dep5");

    expect(findDep5Paragraph(manifest, "assets/logo.png")?.licenseExpression).toBe("CC-BY-4.0");
    expect(findDep5Paragraph(manifest, "assets/icons/sub/x.svg")?.licenseExpression).toBe("CC-BY-4.0");
    expect(findDep5Paragraph(manifest, "src/main.c")?.licenseExpression).toBe("MIT");
  });

  it("rejects a manifest without a header paragraph", () => {
    expect(() => parseDep5("Files: *\nCopyright: x\nLicense: MIT\n", ".reuse/dep5")).toThrow(
      ".reuse/dep5: the first paragraph must declare Format (line 1)",
    );
  });

  it("rejects a Files paragraph without a License", () => {
    const text = "Format: x\n\nFiles: *\nCopyright: 2017 Jane Doe\n";

    expect(() => parseDep5(text, ".reuse/dep5")).toThrow(ManifestError);
  });

  it("rejects lines that are neither fields nor continuations", () => {
    expect(() => parseDep5("Format: x\nnot a field\n", ".reuse/dep5")).toThrow(
      ".reuse/dep5: cannot parse line 2",
    );
  });
});

describe("dep5PatternToRegExp", () => {
  it("lets a star cross directories", () => {
    expect(dep5PatternToRegExp("src/*.c").test("src/lib/a.c")).toBe(true);
  });

  it("matches a question mark against one character", () => {
    expect(dep5PatternToRegExp("file?.txt").test("file1.txt")).toBe(true);
    expect(dep5PatternToRegExp("file?.txt").test("file12.txt")).toBe(false);
  });

  it("keeps escaped stars literal", () => {
    expect(dep5PatternToRegExp("a\\*b").test("a*b")).toBe(true);
    expect(dep5PatternToRegExp("a\\*b").test("axb")).toBe(false);
  });
});
