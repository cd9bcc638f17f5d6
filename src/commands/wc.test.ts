/**
 * Tests for wc command
 */

import assert from "node:assert/strict";
import { MemoryLineSource } from "../vfs/memory-source.ts";
import { countBytes, formatWcStats, selectedField, wc } from "./wc.ts";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("countBytes", () => {
  it("counts lines, words, chars and bytes", () => {
    assert.deepEqual(countBytes(bytes("hello world\nfoo\n")), {
      lines: 2,
      words: 3,
      chars: 16,
      bytes: 16,
    });
  });

  it("counts a final line without newline as a word but not a line", () => {
    assert.deepEqual(countBytes(bytes("a b")), { lines: 0, words: 2, chars: 3, bytes: 3 });
  });

  it("treats tabs, carriage returns and vertical whitespace as separators", () => {
    assert.equal(countBytes(bytes("a\tb\rc\vd\fe")).words, 5);
  });

  it("counts characters per byte", () => {
    assert.deepEqual(countBytes(bytes("é")), { lines: 0, words: 1, chars: 2, bytes: 2 });
  });

  it("counts nothing in an empty buffer", () => {
    assert.deepEqual(countBytes(new Uint8Array(0)), { lines: 0, words: 0, chars: 0, bytes: 0 });
  });
});

describe("selectedField", () => {
  it("prefers lines over words over chars over bytes", () => {
    assert.equal(selectedField({ bytesOnly: true, wordsOnly: true }), "words");
    assert.equal(selectedField({ charsOnly: true, bytesOnly: true }), "chars");
    assert.equal(selectedField({ linesOnly: true, charsOnly: true }), "lines");
    assert.equal(selectedField({}), undefined);
  });
});

describe("formatWcStats", () => {
  it("prints present counts tab-separated with the file name", () => {
    assert.equal(formatWcStats({ lines: 1, words: 2, chars: 3, bytes: 3 }, "f"), "1\t2\t3\t3\tf");
    assert.equal(formatWcStats({ words: 7 }), "7");
  });
});

describe("wc", () => {
  it("counts a file", async () => {
    const source = new MemoryLineSource({ "/t": "one two\nthree\n" });
    assert.deepEqual(await wc("/t", { source }), {
      file: "/t",
      lines: 2,
      words: 3,
      chars: 14,
      bytes: 14,
    });
  });

  it("restricts the result to one count", async () => {
    const source = new MemoryLineSource({ "/t": "one two\nthree\n" });
    assert.deepEqual(await wc("/t", { linesOnly: true, source }), { file: "/t", lines: 2 });
  });
});
