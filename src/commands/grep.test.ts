/**
 * Tests for grep command
 */

import assert from "node:assert/strict";
import { LineKitError } from "../core/errors.ts";
import { MemoryLineSource } from "../vfs/memory-source.ts";
import {
  buildRegex,
  compileMatcher,
  formatGrepMatch,
  formatGrepResult,
  getMatches,
  grep,
  grepLines,
  testLine,
} from "./grep.ts";

const LOG = ["err: 1", "ok: 2", "err: 3"].join("\n") + "\n";

describe("buildRegex", () => {
  it("escapes fixed strings", () => {
    const regex = buildRegex({ pattern: "a.b", fixedStrings: true });
    assert.equal(regex.test("a.b"), true);
    assert.equal(regex.test("axb"), false);
  });

  it("wraps whole-word patterns in word boundaries", () => {
    const regex = buildRegex({ pattern: "cat|dog", wholeWord: true });
    assert.equal(regex.source, "\\b(?:cat|dog)\\b");
  });

  it("anchors whole-line patterns", () => {
    const regex = buildRegex({ pattern: "ok", wholeLine: true });
    assert.equal(regex.test("ok"), true);
    assert.equal(regex.test("ok!"), false);
  });

  it("sets the case-insensitive flag", () => {
    assert.equal(buildRegex({ pattern: "x", ignoreCase: true }).flags, "i");
  });

  it("reports invalid expressions as INVALID_PATTERN", () => {
    assert.throws(() => buildRegex({ pattern: "(" }), (error: unknown) => {
      assert.ok(error instanceof LineKitError);
      assert.equal(error.code, "INVALID_PATTERN");
      assert.equal(error.details?.pattern, "(");
      return true;
    });
  });
});

describe("testLine", () => {
  it("inverts after whole-word and case handling", () => {
    const matcher = compileMatcher({ pattern: "ERR", ignoreCase: true, wholeWord: true, invert: true });
    assert.equal(testLine("err: 1", matcher), false);
    assert.equal(testLine("errors", matcher), true);
  });
});

describe("getMatches", () => {
  it("returns every non-overlapping match", () => {
    assert.deepEqual(getMatches("a1b22c333", /\d+/), ["1", "22", "333"]);
  });

  it("terminates on zero-width matches", () => {
    assert.deepEqual(getMatches("ab", /x*/), ["", "", ""]);
  });
});

describe("grepLines", () => {
  it("filters lines", () => {
    assert.deepEqual(grepLines(["errcode: 1", "ok", "error: 2"], { pattern: "^err" }), [
      "errcode: 1",
      "error: 2",
    ]);
  });
});

describe("grep", () => {
  it("returns numbered matches for a single file", async () => {
    const source = new MemoryLineSource({ "/log.txt": LOG });
    const result = await grep({ pattern: "err" }, "/log.txt", { source });
    assert.deepEqual(result, {
      mode: "lines",
      matches: [
        { lineNumber: 1, line: "err: 1" },
        { lineNumber: 3, line: "err: 3" },
      ],
    });
  });

  it("matches an anchored pattern", async () => {
    const source = new MemoryLineSource({ "/log.txt": LOG });
    const result = await grep({ pattern: "^err" }, "/log.txt", { source });
    assert.equal(result.mode, "lines");
    if (result.mode === "lines") {
      assert.deepEqual(result.matches.map((m) => m.lineNumber), [1, 3]);
    }
  });

  it("only matches whole words", async () => {
    const source = new MemoryLineSource({ "/w.txt": "errors\nerr: 3\nterr\n" });
    const result = await grep({ pattern: "err", wholeWord: true }, "/w.txt", { source });
    assert.deepEqual(result, { mode: "lines", matches: [{ lineNumber: 2, line: "err: 3" }] });
  });

  it("omits line numbers on request", async () => {
    const source = new MemoryLineSource({ "/log.txt": LOG });
    const result = await grep({ pattern: "ok" }, "/log.txt", { source, lineNumbers: false });
    assert.deepEqual(result, { mode: "lines", matches: [{ line: "ok: 2" }] });
  });

  it("tags matches with their file when several files are searched", async () => {
    const source = new MemoryLineSource({
      "/d/a.txt": "hit\nmiss\n",
      "/d/sub/b.txt": "miss\nhit again\n",
    });
    const result = await grep({ pattern: "hit" }, "/d", { source, recursive: true });
    assert.deepEqual(result, {
      mode: "lines",
      matches: [
        { file: "/d/a.txt", lineNumber: 1, line: "hit" },
        { file: "/d/sub/b.txt", lineNumber: 2, line: "hit again" },
      ],
    });
  });

  it("counts matches per file", async () => {
    const source = new MemoryLineSource({ "/a": "x\nx\ny\n", "/b": "y\n" });
    const result = await grep({ pattern: "x" }, ["/a", "/b"], { source, countOnly: true });
    assert.equal(result.mode, "count");
    if (result.mode === "count") {
      assert.deepEqual([...result.counts], [["/a", 2], ["/b", 0]]);
    }
  });

  it("lists files with a match", async () => {
    const source = new MemoryLineSource({ "/a": "x\n", "/b": "y\n", "/c": "xx\n" });
    const result = await grep({ pattern: "x" }, ["/a", "/b", "/c"], { source, filesOnly: true });
    assert.deepEqual(result, { mode: "files", files: ["/a", "/c"] });
  });

  it("rejects a directory without recursive", async () => {
    const source = new MemoryLineSource({ "/d/a.txt": "x\n" });
    await assert.rejects(grep({ pattern: "x" }, "/d", { source }), (error: unknown) => {
      assert.ok(error instanceof LineKitError);
      assert.equal(error.code, "IS_A_DIRECTORY");
      return true;
    });
  });

  it("fails on an invalid pattern before reading files", async () => {
    const source = new MemoryLineSource();
    await assert.rejects(grep({ pattern: "[" }, "/missing", { source }), (error: unknown) => {
      assert.ok(error instanceof LineKitError);
      assert.equal(error.code, "INVALID_PATTERN");
      return true;
    });
  });

  it("fails when a later target is unreadable", async () => {
    const source = new MemoryLineSource({ "/a": "x\n", "/b": "x\n" });
    source.deny("/b");
    await assert.rejects(grep({ pattern: "x" }, ["/a", "/b"], { source }), (error: unknown) => {
      assert.ok(error instanceof LineKitError);
      assert.equal(error.code, "PERMISSION_DENIED");
      assert.equal(error.message, "/b: Permission denied");
      return true;
    });
  });

  it("reports a missing file", async () => {
    const source = new MemoryLineSource();
    await assert.rejects(grep({ pattern: "x" }, "/missing", { source }), (error: unknown) => {
      assert.ok(error instanceof LineKitError);
      assert.equal(error.code, "NOT_FOUND");
      return true;
    });
  });
});

describe("formatGrepMatch", () => {
  it("joins file, line number and text with colons", () => {
    assert.equal(formatGrepMatch({ file: "a.txt", lineNumber: 4, line: "x:y" }), "a.txt:4:x:y");
    assert.equal(formatGrepMatch({ line: "plain" }), "plain");
  });

  it("applies style decorators", () => {
    const text = formatGrepMatch(
      { file: "f", lineNumber: 2, line: "l" },
      { file: (s) => `<${s}>`, lineNumber: (s) => `[${s}]` },
    );
    assert.equal(text, "<f>:[2]:l");
  });
});

describe("formatGrepResult", () => {
  it("prints just the count for a single file", () => {
    const text = formatGrepResult({ mode: "count", counts: new Map([["a", 3]]) });
    assert.equal(text, "3\n");
  });

  it("prints file:count for several files", () => {
    const text = formatGrepResult({ mode: "count", counts: new Map([["a", 3], ["b", 0]]) });
    assert.equal(text, "a:3\nb:0\n");
  });

  it("prints one file per line", () => {
    assert.equal(formatGrepResult({ mode: "files", files: ["a", "b"] }), "a\nb\n");
  });

  it("prints nothing for no matches", () => {
    assert.equal(formatGrepResult({ mode: "lines", matches: [] }), "");
  });
});
