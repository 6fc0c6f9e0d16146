/**
 * Unit tests for shell-style ignore patterns.
 */

import { describe, it, expect } from "vitest";
import { isIgnored, patternToRegExp, splitPatterns } from "../../src/sync/ignore.js";
import { DEFAULT_IGNORE_PATTERNS } from "../../src/types.js";

describe("patternToRegExp", () => {
  it("lets * match across directory separators", () => {
    expect(patternToRegExp("*.py").test("src/pkg/app.py")).toBe(true);
  });

  it("matches a single character with ?", () => {
    const regex = patternToRegExp("file?.txt");
    expect(regex.test("file1.txt")).toBe(true);
    expect(regex.test("file10.txt")).toBe(false);
  });

  it("supports character classes and negated classes", () => {
    expect(patternToRegExp("[abc].md").test("b.md")).toBe(true);
    expect(patternToRegExp("[abc].md").test("d.md")).toBe(false);
    expect(patternToRegExp("[!a]*").test("abc")).toBe(false);
    expect(patternToRegExp("[!a]*").test("xyz")).toBe(true);
  });

  it("treats regex metacharacters literally", () => {
    expect(patternToRegExp("a+b(1).txt").test("a+b(1).txt")).toBe(true);
    expect(patternToRegExp("a.txt").test("abtxt")).toBe(false);
  });

  it("treats an unterminated bracket literally", () => {
    expect(patternToRegExp("[draft").test("[draft")).toBe(true);
  });
});

describe("isIgnored", () => {
  it.each([
    [".git", true],
    [".git/HEAD", true],
    [".github/workflows/ci.yml", true],
    [".gitignore", true],
    ["sub/.gitattributes", true],
    ["app.py", false],
    ["docs/guide.md", false],
  ])("default patterns: %s → %s", (relativePath, expected) => {
    expect(isIgnored(relativePath, DEFAULT_IGNORE_PATTERNS)).toBe(expected);
  });

  it("matches a pattern against the basename", () => {
    expect(isIgnored("checkpoints/run1/model.ckpt", ["*.ckpt"])).toBe(true);
    expect(isIgnored("data/raw.csv", ["raw.csv"])).toBe(true);
  });

  it("matches a pattern against the full relative path", () => {
    expect(isIgnored("data/cache/a.bin", ["data/cache*"])).toBe(true);
    expect(isIgnored("other/cache/a.bin", ["data/cache*"])).toBe(false);
  });

  it("ignores nothing with no patterns", () => {
    expect(isIgnored(".git/HEAD", [])).toBe(false);
  });
});

describe("splitPatterns", () => {
  it("splits on commas and newlines and drops blanks", () => {
    expect(splitPatterns("*.ckpt, data/*\n\n*.tmp,")).toEqual(["*.ckpt", "data/*", "*.tmp"]);
  });

  it("returns an empty list for empty input", () => {
    expect(splitPatterns("")).toEqual([]);
    expect(splitPatterns(undefined)).toEqual([]);
  });
});
