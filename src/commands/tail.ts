/**
 * tail - Output the last part of a file
 *
 * @module
 */

import type { FileContent, SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";

/**
 * Options for tail command
 */
export interface TailOptions {
  /** Number of lines to output (default: 10) */
  lines?: number;
  /** Number of bytes to output (overrides lines) */
  bytes?: number;
  /** Start from line N instead of counting from the end (like +N) */
  fromLine?: number;
}

/**
 * Get the last N lines of a sequence
 *
 * @example
 * ```ts
 * tailLines(["a", "b", "c"], 2); // ["b", "c"]
 * ```
 */
export function tailLines(lines: readonly string[], n: number = 10): string[] {
  if (n <= 0) return [];
  return lines.slice(-n);
}

/**
 * Get lines starting from line N (1-indexed)
 */
export function tailFromLine(lines: readonly string[], n: number): string[] {
  return lines.slice(Math.max(n, 1) - 1);
}

/**
 * Get the last N bytes of a buffer
 */
export function tailBytes(data: Uint8Array, n: number): Uint8Array {
  if (n <= 0) return new Uint8Array(0);
  return data.subarray(Math.max(data.length - n, 0));
}

/**
 * Read the end of a file
 *
 * `bytes` wins over `fromLine`, which wins over `lines`. Byte mode returns
 * the trailing bytes unchanged; the line modes return text.
 */
export async function tail(
  path: string,
  options: TailOptions & SourceOptions = {},
): Promise<FileContent> {
  const source = options.source ?? fsLineSource;

  if (options.bytes !== undefined) {
    return tailBytes(await source.readBytes(path), options.bytes);
  }

  const lines = await source.readLines(path);
  if (options.fromLine !== undefined) {
    return toText(tailFromLine(lines, options.fromLine));
  }
  return toText(tailLines(lines, options.lines ?? 10));
}
