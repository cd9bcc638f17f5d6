/**
 * cat - Concatenate files
 *
 * @module
 */

import type { FileContent, SourceOptions } from "../core/types.ts";
import { concatBytes, fsLineSource, toText } from "../core/line-source.ts";

export interface CatOptions {
  /** Number every output line (-n) */
  numberLines?: boolean;
  /** Collapse runs of blank lines into one (-s) */
  squeezeBlank?: boolean;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Apply squeezing and numbering to a line sequence
 *
 * Blank means empty or whitespace only. Numbers are right-aligned to six
 * columns and followed by a tab, counting the lines that survive squeezing.
 *
 * @example
 * ```ts
 * catLines(["a", "", "", "b"], { squeezeBlank: true, numberLines: true });
 * // ["     1\ta", "     2\t", "     3\tb"]
 * ```
 */
export function catLines(lines: readonly string[], options: CatOptions = {}): string[] {
  let kept: string[] = [...lines];

  if (options.squeezeBlank) {
    kept = kept.filter((line, i) => !(isBlank(line) && i > 0 && isBlank(kept[i - 1] ?? "")));
  }

  if (options.numberLines) {
    kept = kept.map((line, i) => `${String(i + 1).padStart(6)}\t${line}`);
  }

  return kept;
}

/**
 * Concatenate files in order
 *
 * Without options the result is the files' bytes joined unchanged,
 * including a missing final newline. Numbering or squeezing works on lines
 * and returns text.
 */
export async function cat(
  paths: string | readonly string[],
  options: CatOptions & SourceOptions = {},
): Promise<FileContent> {
  const source = options.source ?? fsLineSource;
  const files = typeof paths === "string" ? [paths] : paths;

  if (options.numberLines || options.squeezeBlank) {
    const lines: string[] = [];
    for (const file of files) {
      lines.push(...await source.readLines(file));
    }
    return toText(catLines(lines, options));
  }

  const chunks: Uint8Array[] = [];
  for (const file of files) {
    chunks.push(await source.readBytes(file));
  }
  return concatBytes(chunks);
}
