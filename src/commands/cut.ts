/**
 * cut - Extract selected fields from each line
 *
 * Fields are emitted in ascending index order with duplicates collapsed,
 * whatever order the selector lists them in.
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource, toText } from "../core/line-source.ts";
import {
  compileFieldKey,
  type CompiledFieldKey,
  selectFieldIndices,
  splitFields,
} from "./fields.ts";

/**
 * Options for cut command
 */
export interface CutOptions {
  /** Field delimiter, a single character (default: "\t") */
  delimiter?: string;
  /** Fields to extract (1-indexed, e.g., "1,3,5-7") */
  fields?: string | number;
  /** Invert selection (output non-selected fields) */
  complement?: boolean;
  /** Suppress lines without delimiters */
  onlyDelimited?: boolean;
  /** Output delimiter (default: same as input delimiter) */
  outputDelimiter?: string;
}

/**
 * Process a single line with a compiled key; null means "suppress"
 */
function processLine(
  line: string,
  key: CompiledFieldKey & { delimiter: string },
  options: CutOptions,
): string | null {
  const { complement = false, onlyDelimited = false } = options;
  const outDelim = options.outputDelimiter ?? key.delimiter;

  if (onlyDelimited && !line.includes(key.delimiter)) {
    return null;
  }

  if (key.ranges.length === 0) {
    return complement ? "" : line;
  }

  const fields = splitFields(line, key.delimiter);
  return selectFieldIndices(fields.length, key.ranges, complement)
    .map((i) => fields[i] ?? "")
    .join(outDelim);
}

function compileCutKey(options: CutOptions): CompiledFieldKey & { delimiter: string } {
  const delimiter = options.delimiter ?? "\t";
  const key = compileFieldKey({ delimiter, fields: options.fields ?? 1 });
  return { ...key, delimiter };
}

/**
 * Cut a single line
 *
 * @example
 * ```ts
 * cutLine("a:b:c", { delimiter: ":", fields: "1,3" }); // "a:c"
 * ```
 */
export function cutLine(line: string, options: CutOptions = {}): string {
  return processLine(line, compileCutKey(options), options) ?? "";
}

/**
 * Cut every line of a sequence, one output line per input line
 * (fewer with onlyDelimited)
 */
export function cutLines(lines: readonly string[], options: CutOptions = {}): string[] {
  const key = compileCutKey(options);
  const result: string[] = [];
  for (const line of lines) {
    const out = processLine(line, key, options);
    if (out !== null) {
      result.push(out);
    }
  }
  return result;
}

/**
 * Cut fields from every line of a file
 *
 * The field selector is validated before the file is read.
 *
 * @returns newline-terminated output text
 */
export async function cut(
  path: string,
  options: CutOptions & SourceOptions = {},
): Promise<string> {
  compileCutKey(options);
  const source = options.source ?? fsLineSource;
  const lines = await source.readLines(path);
  return toText(cutLines(lines, options));
}
