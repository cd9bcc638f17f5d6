/**
 * wc - Line, word, character and byte count
 *
 * Counting runs over raw bytes. Characters are counted one per byte, so
 * `chars` and `bytes` agree for every input.
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource } from "../core/line-source.ts";

/**
 * Options for wc command
 *
 * At most one count is kept; when several flags are set the first of
 * lines, words, chars, bytes wins.
 */
export interface WcOptions {
  /** Count lines only (-l) */
  linesOnly?: boolean;
  /** Count words only (-w) */
  wordsOnly?: boolean;
  /** Count characters only (-m) */
  charsOnly?: boolean;
  /** Count bytes only (-c) */
  bytesOnly?: boolean;
}

/**
 * Word count statistics
 */
export interface WcStats {
  /** Number of newline bytes */
  lines: number;
  /** Number of maximal runs of non-whitespace bytes */
  words: number;
  /** Number of characters, one per byte */
  chars: number;
  /** Number of bytes */
  bytes: number;
}

export type WcField = keyof WcStats;

/**
 * Counts for one file, restricted to a single field by a *_only flag
 */
export type WcResult = Partial<WcStats> & { file: string };

const FIELD_ORDER: readonly WcField[] = ["lines", "words", "chars", "bytes"];

/** Tab, newline, vertical tab, form feed, carriage return and space */
function isSpace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

/**
 * Count statistics for a byte buffer
 *
 * @example
 * ```ts
 * countBytes(new TextEncoder().encode("hello world\n"));
 * // { lines: 1, words: 2, chars: 12, bytes: 12 }
 * ```
 */
export function countBytes(data: Uint8Array): WcStats {
  let lines = 0;
  let words = 0;
  let inWord = false;

  for (const byte of data) {
    if (byte === 0x0a) {
      lines++;
    }
    if (isSpace(byte)) {
      inWord = false;
    } else if (!inWord) {
      inWord = true;
      words++;
    }
  }

  return { lines, words, chars: data.length, bytes: data.length };
}

/**
 * The single field a set of options restricts output to, if any
 */
export function selectedField(options: WcOptions): WcField | undefined {
  if (options.linesOnly) return "lines";
  if (options.wordsOnly) return "words";
  if (options.charsOnly) return "chars";
  if (options.bytesOnly) return "bytes";
  return undefined;
}

/**
 * Format wc statistics as tab-separated counts, optionally followed by
 * the file name
 */
export function formatWcStats(stats: Partial<WcStats>, file?: string): string {
  const values: string[] = [];
  for (const field of FIELD_ORDER) {
    const value = stats[field];
    if (value !== undefined) {
      values.push(String(value));
    }
  }
  if (file !== undefined) {
    values.push(file);
  }
  return values.join("\t");
}

/**
 * Count a file
 *
 * @example
 * ```ts
 * await wc("notes.txt", { linesOnly: true }); // { file: "notes.txt", lines: 3 }
 * ```
 */
export async function wc(
  path: string,
  options: WcOptions & SourceOptions = {},
): Promise<WcResult> {
  const source = options.source ?? fsLineSource;
  const stats = countBytes(await source.readBytes(path));
  const field = selectedField(options);

  if (field === undefined) {
    return { file: path, ...stats };
  }
  const result: WcResult = { file: path };
  result[field] = stats[field];
  return result;
}
