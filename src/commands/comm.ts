/**
 * comm - Partition the lines of two files into three sets
 *
 * Lines are treated as set members: duplicates collapse and input order is
 * not used. Every output list is sorted by UTF-16 code unit, so the result
 * does not depend on whether the inputs were sorted.
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource } from "../core/line-source.ts";
import { compareText } from "./sort.ts";

export interface CommResult {
  onlyInFirst: string[];
  onlyInSecond: string[];
  inBoth: string[];
}

/**
 * Split two line collections into their difference and intersection
 *
 * @example
 * ```ts
 * compareSets(["b", "a", "a"], ["c", "b"]);
 * // { onlyInFirst: ["a"], onlyInSecond: ["c"], inBoth: ["b"] }
 * ```
 */
export function compareSets(
  first: readonly string[],
  second: readonly string[],
): CommResult {
  const setA = new Set(first);
  const setB = new Set(second);

  const onlyInFirst: string[] = [];
  const inBoth: string[] = [];
  for (const line of setA) {
    (setB.has(line) ? inBoth : onlyInFirst).push(line);
  }
  const onlyInSecond = [...setB].filter((line) => !setA.has(line));

  return {
    onlyInFirst: onlyInFirst.sort(compareText),
    onlyInSecond: onlyInSecond.sort(compareText),
    inBoth: inBoth.sort(compareText),
  };
}

/**
 * Compare the line sets of two files
 */
export async function comm(
  file1: string,
  file2: string,
  options: SourceOptions = {},
): Promise<CommResult> {
  const source = options.source ?? fsLineSource;
  const first = await source.readLines(file1);
  const second = await source.readLines(file2);
  return compareSets(first, second);
}
