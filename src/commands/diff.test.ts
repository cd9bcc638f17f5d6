/**
 * Tests for diff command
 */

import assert from "node:assert/strict";
import { MemoryLineSource } from "../vfs/memory-source.ts";
import {
  applyEdits,
  diff,
  diffLines,
  formatPlainDiff,
  formatUnifiedDiff,
  hasChanges,
} from "./diff.ts";

const kinds = (a: string[], b: string[]) =>
  diffLines(a, b).map((op) => `${op.kind} ${op.text}`);

describe("diffLines", () => {
  it("replaces a changed line with a delete then an insert", () => {
    assert.deepEqual(diffLines(["a", "b", "c"], ["a", "x", "c"]), [
      { kind: "equal", text: "a", lineA: 1, lineB: 1 },
      { kind: "delete", text: "b", lineA: 2, lineB: 0 },
      { kind: "insert", text: "x", lineA: 0, lineB: 2 },
      { kind: "equal", text: "c", lineA: 3, lineB: 3 },
    ]);
  });

  it("handles empty inputs", () => {
    assert.deepEqual(diffLines([], []), []);
    assert.deepEqual(kinds([], ["a", "b"]), ["insert a", "insert b"]);
    assert.deepEqual(kinds(["a", "b"], []), ["delete a", "delete b"]);
  });

  it("reports identical inputs as all equal", () => {
    assert.deepEqual(kinds(["a", "b"], ["a", "b"]), ["equal a", "equal b"]);
  });

  it("keeps the longest common subsequence", () => {
    const ops = diffLines(["a", "b", "c", "d"], ["b", "c", "e"]);
    assert.equal(ops.filter((op) => op.kind === "equal").length, 2);
    assert.deepEqual(kinds(["a", "b", "c", "d"], ["b", "c", "e"]), [
      "delete a",
      "equal b",
      "equal c",
      "delete d",
      "insert e",
    ]);
  });
});

describe("applyEdits", () => {
  it("reconstructs the second sequence", () => {
    const a = ["one", "two", "three", "two"];
    const b = ["zero", "two", "three", "four"];
    assert.deepEqual(applyEdits(a, diffLines(a, b)), b);
  });
});

describe("hasChanges", () => {
  it("is false only for all-equal scripts", () => {
    assert.equal(hasChanges(diffLines(["a"], ["a"])), false);
    assert.equal(hasChanges(diffLines(["a"], ["b"])), true);
  });
});

describe("formatting", () => {
  const ops = diffLines(["a", "b", "c"], ["a", "x", "c"]);

  it("renders unified output with headers and every line", () => {
    assert.equal(
      formatUnifiedDiff(ops, "old.txt", "new.txt"),
      "--- old.txt\n+++ new.txt\n  a\n- b\n+ x\n  c\n",
    );
  });

  it("renders plain output with changed lines only", () => {
    assert.equal(formatPlainDiff(ops), "- b\n+ x\n");
  });

  it("passes each rendered op through the decorator", () => {
    const out = formatPlainDiff(ops, (op, text) => `${op.kind}|${text}`);
    assert.equal(out, "delete|- b\ninsert|+ x\n");
  });
});

describe("diff", () => {
  it("diffs two files in unified form by default", async () => {
    const source = new MemoryLineSource({ "/a": "a\nb\n", "/b": "a\nc\n" });
    assert.equal(await diff("/a", "/b", { source }), "--- /a\n+++ /b\n  a\n- b\n+ c\n");
  });

  it("produces nothing in plain form for identical files", async () => {
    const source = new MemoryLineSource({ "/a": "same\n", "/b": "same\n" });
    assert.equal(await diff("/a", "/b", { unified: false, source }), "");
  });

  it("does not truncate to context lines", async () => {
    const source = new MemoryLineSource({ "/a": "1\n2\n3\n4\n5\n", "/b": "1\n2\n3\n4\n6\n" });
    const out = await diff("/a", "/b", { contextLines: 1, source });
    assert.equal(out, "--- /a\n+++ /b\n  1\n  2\n  3\n  4\n- 5\n+ 6\n");
  });
});
