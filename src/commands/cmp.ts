/**
 * cmp - Compare two files byte by byte
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource } from "../core/line-source.ts";

const NEWLINE = 0x0a;

export interface CmpOptions {
  /** Report only whether the files are identical (-s) */
  silent?: boolean;
}

export interface CmpResult {
  identical: boolean;
  /** 1-based offset of the first differing byte */
  byteOffset?: number;
  /** 1-based line of the first differing byte */
  lineNumber?: number;
  /** `<fileA> <fileB> differ: byte N, line M` */
  message?: string;
}

/**
 * Position of the first difference between two buffers
 */
export interface ByteDifference {
  byteOffset: number;
  lineNumber: number;
}

/**
 * Find the first difference between two byte sequences
 *
 * The line counter advances on every newline of the first input up to and
 * including the differing byte. When one input is a prefix of the other,
 * the difference is reported one byte past the shorter input.
 *
 * @returns null when the sequences are identical
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): ByteDifference | null {
  const common = Math.min(a.length, b.length);
  let lineNumber = 1;

  for (let i = 0; i < common; i++) {
    const byte = a[i];
    if (byte === NEWLINE) {
      lineNumber++;
    }
    if (byte !== b[i]) {
      return { byteOffset: i + 1, lineNumber };
    }
  }

  if (a.length === b.length) {
    return null;
  }
  return { byteOffset: common + 1, lineNumber };
}

/**
 * Compare two files
 *
 * @example
 * ```ts
 * const result = await cmp("a.bin", "b.bin");
 * if (!result.identical) console.log(result.message);
 * ```
 */
export async function cmp(
  file1: string,
  file2: string,
  options: CmpOptions & SourceOptions = {},
): Promise<CmpResult> {
  const source = options.source ?? fsLineSource;
  const a = await source.readBytes(file1);
  const b = await source.readBytes(file2);
  const difference = compareBytes(a, b);

  if (difference === null) {
    return { identical: true };
  }
  if (options.silent) {
    return { identical: false };
  }

  return {
    identical: false,
    byteOffset: difference.byteOffset,
    lineNumber: difference.lineNumber,
    message:
      `${file1} ${file2} differ: byte ${difference.byteOffset}, line ${difference.lineNumber}`,
  };
}
