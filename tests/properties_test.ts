/**
 * Property checks over generated inputs
 *
 * Inputs come from a fixed-seed generator so every run sees the same cases.
 */

import assert from "node:assert/strict";
import { applyEdits, diffLines } from "../src/commands/diff.ts";
import { compareSets } from "../src/commands/comm.ts";
import { cutLines } from "../src/commands/cut.ts";
import { joinLines } from "../src/commands/join.ts";
import { pasteColumns } from "../src/commands/paste.ts";
import { sortLines } from "../src/commands/sort.ts";

const CASES = 200;

function generator(seed: number) {
  let state = seed >>> 0;
  const next = () => {
    // Numerical Recipes LCG
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
  const int = (max: number) => Math.floor(next() * max);
  const words = ["a", "b", "c", "d", "a b", "1", "10", "2", ""];
  const word = () => words[int(words.length)] ?? "";
  const lines = (max: number) => Array.from({ length: int(max + 1) }, word);
  return { int, word, lines };
}

describe("properties", () => {
  it("applying a diff to the first input gives the second", () => {
    const gen = generator(1);
    for (let n = 0; n < CASES; n++) {
      const a = gen.lines(8);
      const b = gen.lines(8);
      assert.deepEqual(applyEdits(a, diffLines(a, b)), b);
    }
  });

  it("diff accounts for every line of both inputs", () => {
    const gen = generator(2);
    for (let n = 0; n < CASES; n++) {
      const a = gen.lines(6);
      const b = gen.lines(6);
      const ops = diffLines(a, b);
      const equal = ops.filter((op) => op.kind === "equal").length;
      assert.equal(ops.length - equal, a.length + b.length - 2 * equal);
      assert.equal(ops.filter((op) => op.kind !== "insert").length, a.length);
    }
  });

  it("comm partitions the union of both sets", () => {
    const gen = generator(3);
    for (let n = 0; n < CASES; n++) {
      const a = gen.lines(8);
      const b = gen.lines(8);
      const { onlyInFirst, onlyInSecond, inBoth } = compareSets(a, b);
      const union = new Set([...a, ...b]);
      const all = [...onlyInFirst, ...onlyInSecond, ...inBoth];
      assert.equal(all.length, union.size);
      assert.deepEqual(new Set(all), union);
      for (const line of inBoth) {
        assert.ok(a.includes(line) && b.includes(line));
      }
    }
  });

  it("cutting a pasted column gives back that column", () => {
    const gen = generator(6);
    const pad = (lines: string[], length: number) =>
      Array.from({ length }, (_, i) => lines[i] ?? "");
    for (let n = 0; n < CASES; n++) {
      const a = gen.lines(6);
      const b = gen.lines(6);
      const pasted = pasteColumns([a, b]);
      const rows = Math.max(a.length, b.length);
      assert.deepEqual(cutLines(pasted, { fields: 1 }), pad(a, rows));
      assert.deepEqual(cutLines(pasted, { fields: 2 }), pad(b, rows));
    }
  });

  it("join emits one row per pair of lines with equal keys", () => {
    const gen = generator(4);
    const key = (line: string) => line.split(",")[0] ?? "";
    for (let n = 0; n < CASES; n++) {
      const left = gen.lines(6).map((w) => `${gen.int(3)},${w}`);
      const right = gen.lines(6).map((w) => `${gen.int(3)},${w}`);
      let pairs = 0;
      for (const l of left) {
        pairs += right.filter((r) => key(r) === key(l)).length;
      }
      assert.equal(joinLines(left, right, { separator: "," }).length, pairs);
    }
  });

  it("sorting twice gives the same result as sorting once", () => {
    const gen = generator(5);
    const variants = [{}, { numeric: true }, { key: 2 }, { ignoreCase: true, unique: true }];
    for (let n = 0; n < CASES; n++) {
      const lines = gen.lines(10);
      for (const options of variants) {
        const once = sortLines(lines, options);
        assert.deepEqual(sortLines(once, options), once);
      }
    }
  });
});
