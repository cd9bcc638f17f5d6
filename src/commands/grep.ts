/**
 * Grep Command - regular expression search over files
 *
 * A pattern is compiled once per request and evaluated against every
 * line of every target. Results come back in one of three shapes
 * depending on the output mode: matching lines, per-file counts or the
 * names of files with a match.
 *
 * @module
 */

import type { LineSource, SourceOptions } from "../core/types.ts";
import { invalidPattern } from "../core/errors.ts";
import { fsLineSource } from "../core/line-source.ts";

/**
 * What to look for and how
 */
export interface MatchSpec {
  /** Regular expression source (JavaScript syntax) */
  pattern: string;
  /** Case insensitive matching (-i) */
  ignoreCase?: boolean;
  /** Match whole words only (-w) */
  wholeWord?: boolean;
  /** Select non-matching lines (-v) */
  invert?: boolean;
  /** Treat the pattern as literal text (-F) */
  fixedStrings?: boolean;
  /** Match whole lines only (-x) */
  wholeLine?: boolean;
}

/**
 * Options for grep operations
 */
export interface GrepOptions extends SourceOptions {
  /** Expand directory targets into the files below them (-r) */
  recursive?: boolean;
  /** Include 1-based line numbers in matches (default: true) */
  lineNumbers?: boolean;
  /** Return the number of matching lines per file (-c) */
  countOnly?: boolean;
  /** Return only the names of files with a match (-l) */
  filesOnly?: boolean;
}

/**
 * A matching line
 */
export interface GrepMatch {
  /** Originating file; always present when more than one file was searched */
  file?: string;
  /** 1-based line number, unless line numbers were turned off */
  lineNumber?: number;
  /** The matched line content */
  line: string;
}

/**
 * Search result, one variant per output mode
 */
export type GrepResult =
  | { mode: "lines"; matches: GrepMatch[] }
  | { mode: "count"; counts: Map<string, number> }
  | { mode: "files"; files: string[] };

/**
 * Compiled matcher, reused for every candidate line
 */
export interface Matcher {
  regex: RegExp;
  invert: boolean;
}

/**
 * Build a RegExp from a pattern string and options
 *
 * @throws {LineKitError} INVALID_PATTERN when the expression does not compile
 */
export function buildRegex(spec: MatchSpec): RegExp {
  let regexPattern = spec.pattern;

  if (spec.fixedStrings) {
    regexPattern = regexPattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  }

  if (spec.wholeWord) {
    regexPattern = `\\b(?:${regexPattern})\\b`;
  }

  if (spec.wholeLine) {
    regexPattern = `^(?:${regexPattern})$`;
  }

  try {
    return new RegExp(regexPattern, spec.ignoreCase ? "i" : "");
  } catch (error) {
    throw invalidPattern(
      spec.pattern,
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function compileMatcher(spec: MatchSpec): Matcher {
  return { regex: buildRegex(spec), invert: spec.invert ?? false };
}

/**
 * Test if a line matches; inversion is applied after the match
 */
export function testLine(line: string, matcher: Matcher): boolean {
  const matches = matcher.regex.test(line);
  return matcher.invert ? !matches : matches;
}

/**
 * Get every non-overlapping match in a line (for -o style output)
 */
export function getMatches(line: string, regex: RegExp): string[] {
  const global = new RegExp(regex.source, regex.flags.includes("g") ? regex.flags : regex.flags + "g");
  const matches: string[] = [];
  let match: RegExpExecArray | null;

  while ((match = global.exec(line)) !== null) {
    matches.push(match[0]);
    // Prevent infinite loop on zero-width matches
    if (match[0].length === 0) {
      global.lastIndex++;
    }
  }

  return matches;
}

/**
 * 1-based numbers of the lines a matcher selects
 */
export function matchLineNumbers(lines: readonly string[], matcher: Matcher): number[] {
  const numbers: number[] = [];
  lines.forEach((line, i) => {
    if (testLine(line, matcher)) {
      numbers.push(i + 1);
    }
  });
  return numbers;
}

/**
 * Filter a line sequence down to the lines a spec selects
 *
 * @example
 * ```ts
 * grepLines(["errcode: 1", "ok", "error: 2"], { pattern: "^err" });
 * // ["errcode: 1", "error: 2"]
 * ```
 */
export function grepLines(lines: readonly string[], spec: MatchSpec): string[] {
  const matcher = compileMatcher(spec);
  return lines.filter((line) => testLine(line, matcher));
}

async function collectFiles(
  targets: readonly string[],
  recursive: boolean,
  source: LineSource,
): Promise<string[]> {
  const files: string[] = [];
  for (const target of targets) {
    files.push(...await source.expand(target, recursive));
  }
  return files;
}

/**
 * Search one or more files or directories
 *
 * The pattern is compiled before any file is touched, and every file is
 * read before results are assembled: one unreadable file fails the whole
 * call.
 *
 * @example
 * ```ts
 * const result = await grep({ pattern: "TODO", ignoreCase: true }, "src", {
 *   recursive: true,
 * });
 * if (result.mode === "lines") {
 *   for (const m of result.matches) console.log(`${m.file}:${m.lineNumber}: ${m.line}`);
 * }
 * ```
 */
export async function grep(
  spec: MatchSpec,
  target: string | readonly string[],
  options: GrepOptions = {},
): Promise<GrepResult> {
  const matcher = compileMatcher(spec);
  const source = options.source ?? fsLineSource;
  const targets = typeof target === "string" ? [target] : target;

  const files = await collectFiles(targets, options.recursive ?? false, source);
  const contents: Array<[string, string[]]> = [];
  for (const file of files) {
    contents.push([file, await source.readLines(file)]);
  }

  if (options.countOnly) {
    const counts = new Map<string, number>();
    for (const [file, lines] of contents) {
      counts.set(file, matchLineNumbers(lines, matcher).length);
    }
    return { mode: "count", counts };
  }

  if (options.filesOnly) {
    const matching = contents
      .filter(([, lines]) => lines.some((line) => testLine(line, matcher)))
      .map(([file]) => file);
    return { mode: "files", files: matching };
  }

  const multiFile = files.length > 1;
  const lineNumbers = options.lineNumbers ?? true;
  const matches: GrepMatch[] = [];

  for (const [file, lines] of contents) {
    for (const lineNumber of matchLineNumbers(lines, matcher)) {
      const match: GrepMatch = { line: lines[lineNumber - 1] ?? "" };
      if (multiFile) match.file = file;
      if (lineNumbers) match.lineNumber = lineNumber;
      matches.push(match);
    }
  }

  return { mode: "lines", matches };
}

/**
 * Optional decorators applied to file names and line numbers
 */
export interface GrepStyle {
  file?: (text: string) => string;
  lineNumber?: (text: string) => string;
}

/**
 * Format a GrepMatch for output, similar to GNU grep
 */
export function formatGrepMatch(
  match: GrepMatch,
  style: GrepStyle = {},
): string {
  const parts: string[] = [];

  if (match.file !== undefined) {
    parts.push(style.file ? style.file(match.file) : match.file);
  }
  if (match.lineNumber !== undefined) {
    const num = String(match.lineNumber);
    parts.push(style.lineNumber ? style.lineNumber(num) : num);
  }

  parts.push(match.line);
  return parts.join(":");
}

/**
 * Render any grep result as newline-terminated text
 *
 * Count mode prints `file:count`, or just the count for a single file.
 */
export function formatGrepResult(
  result: GrepResult,
  style: GrepStyle = {},
): string {
  let lines: string[];

  switch (result.mode) {
    case "lines":
      lines = result.matches.map((m) => formatGrepMatch(m, style));
      break;
    case "count": {
      const single = result.counts.size === 1;
      lines = [...result.counts].map(([file, count]) =>
        single ? String(count) : `${style.file ? style.file(file) : file}:${count}`
      );
      break;
    }
    case "files":
      lines = result.files.map((f) => (style.file ? style.file(f) : f));
      break;
  }

  return lines.map((line) => line + "\n").join("");
}
