/**
 * paste - Merge corresponding lines of several files
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";

export interface PasteOptions {
  /** Separator placed between columns (default: "\t") */
  delimiter?: string;
}

/**
 * Zip line sequences side by side
 *
 * Output has as many rows as the longest input; a sequence that has run
 * out contributes an empty field and the delimiters stay in place.
 *
 * @example
 * ```ts
 * pasteColumns([["a", "b"], ["1"]], { delimiter: "," }); // ["a,1", "b,"]
 * ```
 */
export function pasteColumns(
  columns: ReadonlyArray<readonly string[]>,
  options: PasteOptions = {},
): string[] {
  const delimiter = options.delimiter ?? "\t";
  const rows = Math.max(0, ...columns.map((c) => c.length));
  const result: string[] = [];

  for (let i = 0; i < rows; i++) {
    result.push(columns.map((column) => column[i] ?? "").join(delimiter));
  }

  return result;
}

/**
 * Paste files together line by line
 *
 * Every file is read before any output is produced.
 */
export async function paste(
  files: readonly string[],
  options: PasteOptions & SourceOptions = {},
): Promise<string> {
  const source = options.source ?? fsLineSource;
  const columns: string[][] = [];
  for (const file of files) {
    columns.push(await source.readLines(file));
  }
  return toText(pasteColumns(columns, options));
}
