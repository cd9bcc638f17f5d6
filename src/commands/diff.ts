/**
 * diff - Compare two line sequences
 *
 * Computes a longest-common-subsequence table over exact line equality
 * and walks it back from the end into a minimal edit script. Where the
 * walk could take either an insertion or a deletion, it takes the
 * insertion, so in the finished script deletions come before the
 * insertions that replace them.
 *
 * Time and memory are O(n·m).
 *
 * @module
 */

import type { SourceOptions } from "../core/types.ts";
import { fsLineSource } from "../core/line-source.ts";

/**
 * One step of an edit script. Positions are 1-based; the side an op does
 * not belong to carries 0.
 */
export type DiffOp =
  | { kind: "equal"; text: string; lineA: number; lineB: number }
  | { kind: "insert"; text: string; lineA: 0; lineB: number }
  | { kind: "delete"; text: string; lineA: number; lineB: 0 };

export type DiffKind = DiffOp["kind"];

export interface DiffOptions {
  /** Unified output with ---/+++ headers and every line (default: true) */
  unified?: boolean;
  /**
   * Accepted for compatibility; output is never truncated to context
   */
  contextLines?: number;
}

/**
 * Build the LCS length table: table[i][j] is the LCS length of
 * a[0..i) and b[0..j)
 */
function lcsTable(a: readonly string[], b: readonly string[]): Uint32Array[] {
  const n = a.length;
  const m = b.length;
  const table: Uint32Array[] = [];
  for (let i = 0; i <= n; i++) {
    table.push(new Uint32Array(m + 1));
  }

  for (let i = 1; i <= n; i++) {
    const row = table[i];
    const prev = table[i - 1];
    if (!row || !prev) continue;
    for (let j = 1; j <= m; j++) {
      if (a[i - 1] === b[j - 1]) {
        row[j] = (prev[j - 1] ?? 0) + 1;
      } else {
        row[j] = Math.max(prev[j] ?? 0, row[j - 1] ?? 0);
      }
    }
  }

  return table;
}

/**
 * Compute the edit script turning `a` into `b`
 *
 * @example
 * ```ts
 * diffLines(["a", "b", "c"], ["a", "x", "c"]).map((op) => `${op.kind} ${op.text}`);
 * // ["equal a", "delete b", "insert x", "equal c"]
 * ```
 */
export function diffLines(a: readonly string[], b: readonly string[]): DiffOp[] {
  const table = lcsTable(a, b);
  const at = (i: number, j: number) => table[i]?.[j] ?? 0;
  const ops: DiffOp[] = [];

  let i = a.length;
  let j = b.length;
  while (i > 0 || j > 0) {
    const lineA = a[i - 1];
    const lineB = b[j - 1];

    if (i > 0 && j > 0 && lineA === lineB && lineA !== undefined) {
      ops.push({ kind: "equal", text: lineA, lineA: i, lineB: j });
      i--;
      j--;
    } else if (lineB !== undefined && (i === 0 || at(i, j - 1) >= at(i - 1, j))) {
      ops.push({ kind: "insert", text: lineB, lineA: 0, lineB: j });
      j--;
    } else if (lineA !== undefined) {
      ops.push({ kind: "delete", text: lineA, lineA: i, lineB: 0 });
      i--;
    }
  }

  return ops.reverse();
}

/**
 * Apply an edit script to its source sequence
 *
 * Equal lines are kept, insertions added and deletions skipped; applying
 * `diffLines(a, b)` to `a` gives back `b`.
 */
export function applyEdits(a: readonly string[], ops: readonly DiffOp[]): string[] {
  const result: string[] = [];
  for (const op of ops) {
    if (op.kind === "equal") {
      result.push(a[op.lineA - 1] ?? op.text);
    } else if (op.kind === "insert") {
      result.push(op.text);
    }
  }
  return result;
}

const PREFIX: Record<DiffKind, string> = {
  equal: " ",
  insert: "+",
  delete: "-",
};

/**
 * Render one op as `<prefix> <text>`
 */
export function formatDiffOp(op: DiffOp): string {
  return `${PREFIX[op.kind]} ${op.text}`;
}

/**
 * Unified rendering: headers, then every op including equal lines
 */
export function formatUnifiedDiff(
  ops: readonly DiffOp[],
  labelA: string,
  labelB: string,
  decorate: (op: DiffOp, text: string) => string = (_op, text) => text,
): string {
  let out = `--- ${labelA}\n+++ ${labelB}\n`;
  for (const op of ops) {
    out += decorate(op, formatDiffOp(op)) + "\n";
  }
  return out;
}

/**
 * Plain rendering: insertions and deletions only
 */
export function formatPlainDiff(
  ops: readonly DiffOp[],
  decorate: (op: DiffOp, text: string) => string = (_op, text) => text,
): string {
  let out = "";
  for (const op of ops) {
    if (op.kind !== "equal") {
      out += decorate(op, formatDiffOp(op)) + "\n";
    }
  }
  return out;
}

/**
 * True when a script changes anything
 */
export function hasChanges(ops: readonly DiffOp[]): boolean {
  return ops.some((op) => op.kind !== "equal");
}

/**
 * Diff two files and render the result
 *
 * @example
 * ```ts
 * const text = await diff("old.txt", "new.txt", { unified: true });
 * ```
 */
export async function diff(
  file1: string,
  file2: string,
  options: DiffOptions & SourceOptions = {},
): Promise<string> {
  const source = options.source ?? fsLineSource;
  const a = await source.readLines(file1);
  const b = await source.readLines(file2);
  const ops = diffLines(a, b);
  return (options.unified ?? true)
    ? formatUnifiedDiff(ops, file1, file2)
    : formatPlainDiff(ops);
}
