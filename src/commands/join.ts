/**
 * join - Equi-join the lines of two files on a key field
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";
import { compileFieldKey, type CompiledFieldKey, keyField } from "./fields.ts";

export interface JoinOptions {
  /** Key field in the first input, 1-based (default: 1) */
  field1?: number;
  /** Key field in the second input, 1-based (default: 1) */
  field2?: number;
  /**
   * Single-character field separator, also placed between the joined
   * lines. Omit to split on whitespace and join with a space.
   */
  separator?: string;
}

/**
 * Lines of the second input grouped by key
 */
export type JoinIndex = Map<string, string[]>;

/**
 * Index lines by the value of their key field
 */
export function buildJoinIndex(
  lines: readonly string[],
  key: CompiledFieldKey,
): JoinIndex {
  const index: JoinIndex = new Map();
  for (const line of lines) {
    const value = keyField(line, key);
    const bucket = index.get(value);
    if (bucket) {
      bucket.push(line);
    } else {
      index.set(value, [line]);
    }
  }
  return index;
}

function compileJoinKeys(options: JoinOptions): [CompiledFieldKey, CompiledFieldKey] {
  const delimiter = options.separator;
  return [
    compileFieldKey({ delimiter, fields: options.field1 ?? 1 }),
    compileFieldKey({ delimiter, fields: options.field2 ?? 1 }),
  ];
}

/**
 * Inner-join two line sequences
 *
 * Each line of `left` produces one row per line of `right` sharing its
 * key, in `right` order; a line without partners produces nothing.
 *
 * @example
 * ```ts
 * joinLines(["1 alice"], ["1 admin", "1 dev"]);
 * // ["1 alice 1 admin", "1 alice 1 dev"]
 * ```
 */
export function joinLines(
  left: readonly string[],
  right: readonly string[],
  options: JoinOptions = {},
): string[] {
  const [key1, key2] = compileJoinKeys(options);
  const separator = options.separator ?? " ";
  const index = buildJoinIndex(right, key2);
  const result: string[] = [];

  for (const line of left) {
    const matches = index.get(keyField(line, key1));
    if (!matches) continue;
    for (const match of matches) {
      result.push(line + separator + match);
    }
  }

  return result;
}

/**
 * Join two files on a common field
 */
export async function join(
  file1: string,
  file2: string,
  options: JoinOptions & SourceOptions = {},
): Promise<string> {
  compileJoinKeys(options);
  const source = options.source ?? fsLineSource;
  const left = await source.readLines(file1);
  const right = await source.readLines(file2);
  return toText(joinLines(left, right, options));
}
