/**
 * sort - Sort lines of text
 *
 * Lines are ordered by a key derived from one field (or the whole line),
 * compared numerically, case-insensitively or by UTF-16 code units. The
 * sort is stable; reverse and unique are applied to the sorted result.
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";
import { compileFieldKey, type CompiledFieldKey, keyField } from "./fields.ts";

/**
 * Options for sort command
 */
export interface SortOptions {
  /** Reverse the final order */
  reverse?: boolean;
  /** Compare keys as floating-point numbers */
  numeric?: boolean;
  /** Drop lines identical to the line before them in the output */
  unique?: boolean;
  /** Lowercase keys before comparing */
  ignoreCase?: boolean;
  /** Key field, 1-based; 0 or absent sorts on the whole line */
  key?: number | string;
  /** Field delimiter for the key; absent splits on whitespace */
  delimiter?: string;
}

/**
 * Compare strings by code unit, with no locale rules
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Parse the leading number of a key the way strtod does: surrounding
 * text after the number is ignored, and no number at all is NaN
 */
export function parseNumericKey(value: string): number {
  return parseFloat(value);
}

/**
 * Create a comparator function based on sort options
 *
 * In numeric mode a pair whose keys do not both parse is ordered by the
 * whole lines instead of the keys.
 */
function createComparator(
  key: CompiledFieldKey,
  options: SortOptions,
): (a: string, b: string) => number {
  if (options.numeric) {
    return (a, b) => {
      const numA = parseNumericKey(keyField(a, key));
      const numB = parseNumericKey(keyField(b, key));
      if (Number.isNaN(numA) || Number.isNaN(numB)) {
        return compareText(a, b);
      }
      return numA < numB ? -1 : numA > numB ? 1 : 0;
    };
  }

  if (options.ignoreCase) {
    return (a, b) =>
      compareText(keyField(a, key).toLowerCase(), keyField(b, key).toLowerCase());
  }

  return (a, b) => compareText(keyField(a, key), keyField(b, key));
}

/**
 * Remove lines equal to their immediate predecessor
 */
function dropAdjacentDuplicates(lines: string[]): string[] {
  return lines.filter((line, i) => i === 0 || line !== lines[i - 1]);
}

/**
 * Sort a line sequence
 *
 * @example
 * ```ts
 * sortLines(["b", "a", "c"]);                          // ["a", "b", "c"]
 * sortLines(["x 10", "y 9"], { key: 2, numeric: true }); // ["y 9", "x 10"]
 * ```
 */
export function sortLines(lines: readonly string[], options: SortOptions = {}): string[] {
  const key = compileFieldKey({ delimiter: options.delimiter, fields: options.key });
  const sorted = [...lines].sort(createComparator(key, options));

  if (options.reverse) {
    sorted.reverse();
  }

  return options.unique ? dropAdjacentDuplicates(sorted) : sorted;
}

/**
 * Sort the lines of a file
 *
 * @returns newline-terminated sorted text
 */
export async function sortFile(
  path: string,
  options: SortOptions & SourceOptions = {},
): Promise<string> {
  compileFieldKey({ delimiter: options.delimiter, fields: options.key });
  const source = options.source ?? fsLineSource;
  return toText(sortLines(await source.readLines(path), options));
}
