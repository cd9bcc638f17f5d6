/**
 * head - Output the first part of a file
 *
 * @module
 */

import type { FileContent, SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";

/**
 * Options for head command
 */
export interface HeadOptions {
  /** Number of lines to output (default: 10) */
  lines?: number;
  /** Number of bytes to output (overrides lines) */
  bytes?: number;
}

/**
 * Get the first N lines of a sequence
 *
 * @example
 * ```ts
 * headLines(["a", "b", "c"], 2); // ["a", "b"]
 * ```
 */
export function headLines(lines: readonly string[], n: number = 10): string[] {
  if (n <= 0) return [];
  return lines.slice(0, n);
}

/**
 * Get the first N bytes of a buffer
 */
export function headBytes(data: Uint8Array, n: number): Uint8Array {
  if (n <= 0) return new Uint8Array(0);
  return data.subarray(0, n);
}

/**
 * Read the beginning of a file
 *
 * Line mode returns text with every line re-terminated by a newline; byte
 * mode returns the leading bytes unchanged, even when the cut falls inside
 * a multi-byte character.
 */
export async function head(
  path: string,
  options: HeadOptions & SourceOptions = {},
): Promise<FileContent> {
  const source = options.source ?? fsLineSource;

  if (options.bytes !== undefined) {
    return headBytes(await source.readBytes(path), options.bytes);
  }

  return toText(headLines(await source.readLines(path), options.lines ?? 10));
}
