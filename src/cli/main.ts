#!/usr/bin/env -S npx tsx
/**
 * linekit CLI entry point
 */

import minimist from "minimist";
import pc from "picocolors";
import { loadConfig } from "../core/config.ts";
import { isMainModule, NAME, VERSION } from "../core/constants.ts";
import { LineKitError } from "../core/errors.ts";
import { createFsLineSource } from "../core/line-source.ts";
import { createLogger, type Logger } from "../core/log.ts";
import type { ColorMode, FileContent, LineKitConfig, LineSource } from "../core/types.ts";
import { startServer } from "../mcp/server.ts";
import { cat } from "../commands/cat.ts";
import { cmp } from "../commands/cmp.ts";
import { comm, type CommResult } from "../commands/comm.ts";
import { cut } from "../commands/cut.ts";
import { diffLines, formatPlainDiff, formatUnifiedDiff, hasChanges } from "../commands/diff.ts";
import type { DiffOp } from "../commands/diff.ts";
import {
  buildRegex,
  formatGrepMatch,
  formatGrepResult,
  getMatches,
  grep,
  type GrepResult,
  type GrepStyle,
  type MatchSpec,
} from "../commands/grep.ts";
import { head } from "../commands/head.ts";
import { join } from "../commands/join.ts";
import { paste } from "../commands/paste.ts";
import { compareText, sortFile } from "../commands/sort.ts";
import { tail } from "../commands/tail.ts";
import { formatWcStats, wc, type WcField, type WcResult } from "../commands/wc.ts";

const HELP = `
linekit - line and field oriented text tools

USAGE:
  linekit <command> [options] <paths...>

COMMANDS:
  grep <pattern> <paths...>   Search lines matching a regular expression
  sort <file>                 Sort lines
  diff <file1> <file2>        Show line differences
  cmp <file1> <file2>         Report the first differing byte
  comm <file1> <file2>        Three-column set comparison
  wc <files...>               Count lines, words, characters and bytes
  cut <file>                  Extract fields from each line
  paste <files...>            Merge lines of files side by side
  join <file1> <file2>        Join lines sharing a key field
  cat <files...>              Concatenate files
  head <file>                 First lines or bytes of a file
  tail <file>                 Last lines or bytes of a file
  serve                       Start MCP server on stdio

OPTIONS:
  --verbose            Log diagnostics to stderr
  --color <when>       Colorize output: auto, always or never
  --no-color           Same as --color never
  -h, --help           Show this help (or a command's usage)
  --version            Show version

EXIT STATUS:
  0 success, 1 no match (grep) or files differ (diff, cmp), 2 error

EXAMPLES:
  linekit grep -rin todo src
  linekit sort -n -k 2 -t , scores.csv
  linekit diff old.txt new.txt
  linekit cut -d : -f 1,3 /etc/passwd
  linekit join -1 1 -2 2 users.txt groups.txt
`;

/**
 * Where the CLI reads and writes
 */
export interface CliIO {
  /** Receives text, or raw bytes from the byte modes of cat, head and tail */
  stdout: (data: FileContent) => void;
  stderr: (text: string) => void;
  /** Whether stdout is a terminal, for --color auto */
  isTTY: boolean;
  cwd: string;
  env: Record<string, string | undefined>;
  /** Home directory holding the global config (default: os.homedir()) */
  home?: string;
}

function defaultIO(): CliIO {
  return {
    stdout: (data) => process.stdout.write(data),
    stderr: (text) => process.stderr.write(text),
    isTTY: process.stdout.isTTY === true,
    cwd: process.cwd(),
    env: process.env,
  };
}

type Colors = ReturnType<typeof pc.createColors>;

interface CommandContext {
  args: minimist.ParsedArgs;
  paths: string[];
  config: LineKitConfig;
  source: LineSource;
  io: CliIO;
  colors: Colors;
  logger: Logger;
}

interface CommandSpec {
  usage: string;
  /** Minimum number of positional arguments */
  minArgs: number;
  /** Maximum number of positional arguments, if limited */
  maxArgs?: number;
  boolean?: string[];
  string?: string[];
  alias?: Record<string, string>;
  run: (ctx: CommandContext) => Promise<number>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ============================================================================
// Argument helpers
// ============================================================================

function flag(args: minimist.ParsedArgs, name: string): boolean | undefined {
  const value: unknown = args[name];
  return typeof value === "boolean" ? value : undefined;
}

function str(args: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === "string" ? last : undefined;
  }
  return typeof value === "string" ? value : undefined;
}

function int(args: minimist.ParsedArgs, name: string): number | undefined {
  const value = str(args, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`invalid number for --${name}: '${value}'`);
  }
  return Number(value);
}

function resolveColorMode(value: unknown, fallback: ColorMode | undefined): ColorMode {
  if (value === false) return "never";
  if (value === true || value === "") return "always";
  if (value === "auto" || value === "always" || value === "never") return value;
  if (value === undefined) return fallback ?? "auto";
  throw new UsageError(`invalid value for --color: '${String(value)}'`);
}

// ============================================================================
// Commands
// ============================================================================

function grepFound(result: GrepResult): boolean {
  switch (result.mode) {
    case "lines":
      return result.matches.length > 0;
    case "count":
      return [...result.counts.values()].some((n) => n > 0);
    case "files":
      return result.files.length > 0;
  }
}

function decorateDiff(colors: Colors) {
  return (op: DiffOp, text: string): string => {
    if (op.kind === "insert") return colors.green(text);
    if (op.kind === "delete") return colors.red(text);
    return text;
  };
}

/** comm's layout: first-only lines flush left, then one and two tabs */
function formatCommColumns(result: CommResult): string {
  const rows: Array<[string, string]> = [
    ...result.onlyInFirst.map((line): [string, string] => [line, ""]),
    ...result.onlyInSecond.map((line): [string, string] => [line, "\t"]),
    ...result.inBoth.map((line): [string, string] => [line, "\t\t"]),
  ];
  rows.sort((a, b) => compareText(a[0], b[0]));
  return rows.map(([line, indent]) => `${indent}${line}\n`).join("");
}

const WC_FIELDS: readonly WcField[] = ["lines", "words", "chars", "bytes"];

function wcTotal(results: readonly WcResult[]): WcResult {
  const total: WcResult = { file: "total" };
  for (const field of WC_FIELDS) {
    for (const result of results) {
      const value = result[field];
      if (value !== undefined) {
        total[field] = (total[field] ?? 0) + value;
      }
    }
  }
  return total;
}

const COMMANDS: Record<string, CommandSpec> = {
  grep: {
    usage: "linekit grep [-iwvxFrclon] [--no-line-number] <pattern> <paths...>",
    minArgs: 2,
    boolean: [
      "ignore-case",
      "word-regexp",
      "invert-match",
      "line-regexp",
      "fixed-strings",
      "recursive",
      "count",
      "files-with-matches",
      "only-matching",
      "line-number",
    ],
    alias: {
      i: "ignore-case",
      w: "word-regexp",
      v: "invert-match",
      x: "line-regexp",
      F: "fixed-strings",
      r: "recursive",
      c: "count",
      l: "files-with-matches",
      o: "only-matching",
      n: "line-number",
    },
    async run({ args, paths, config, source, io, colors, logger }) {
      const [pattern, ...targets] = paths;
      const spec: MatchSpec = {
        pattern: pattern ?? "",
        ignoreCase: flag(args, "ignore-case") || config.grep?.ignoreCase,
        wholeWord: flag(args, "word-regexp"),
        invert: flag(args, "invert-match"),
        wholeLine: flag(args, "line-regexp"),
        fixedStrings: flag(args, "fixed-strings"),
      };
      const result = await grep(spec, targets, {
        recursive: flag(args, "recursive") || config.grep?.recursive,
        lineNumbers: flag(args, "line-number") ?? config.grep?.lineNumbers,
        countOnly: flag(args, "count"),
        filesOnly: flag(args, "files-with-matches"),
        source,
      });

      const style: GrepStyle = { file: colors.magenta, lineNumber: colors.green };
      if (result.mode === "lines" && flag(args, "only-matching")) {
        const regex = buildRegex(spec);
        for (const match of result.matches) {
          for (const piece of getMatches(match.line, regex)) {
            io.stdout(formatGrepMatch({ ...match, line: colors.red(piece) }, style) + "\n");
          }
        }
      } else {
        io.stdout(formatGrepResult(result, style));
      }

      if (result.mode === "lines") {
        logger.debug(`grep: ${result.matches.length} matching line(s)`);
      }
      return grepFound(result) ? 0 : 1;
    },
  },

  sort: {
    usage: "linekit sort [-rnuf] [-k field] [-t delim] <file>",
    minArgs: 1,
    maxArgs: 1,
    boolean: ["reverse", "numeric-sort", "unique", "ignore-case"],
    string: ["key", "field-separator"],
    alias: {
      r: "reverse",
      n: "numeric-sort",
      u: "unique",
      f: "ignore-case",
      k: "key",
      t: "field-separator",
    },
    async run({ args, paths, config, source, io }) {
      io.stdout(
        await sortFile(paths[0] ?? "", {
          reverse: flag(args, "reverse"),
          numeric: flag(args, "numeric-sort") || config.sort?.numeric,
          unique: flag(args, "unique"),
          ignoreCase: flag(args, "ignore-case") || config.sort?.ignoreCase,
          key: str(args, "key"),
          delimiter: str(args, "field-separator") ?? config.sort?.delimiter,
          source,
        }),
      );
      return 0;
    },
  },

  diff: {
    usage: "linekit diff [--unified | --plain] [-U n] <file1> <file2>",
    minArgs: 2,
    maxArgs: 2,
    boolean: ["unified", "plain"],
    string: ["context"],
    alias: { u: "unified", U: "context" },
    async run({ args, paths, config, source, io, colors }) {
      const [file1 = "", file2 = ""] = paths;
      // Accepted for compatibility; every line is shown
      int(args, "context");
      const unified = flag(args, "plain")
        ? false
        : flag(args, "unified") ?? config.diff?.unified ?? true;

      const ops = diffLines(await source.readLines(file1), await source.readLines(file2));
      const decorate = decorateDiff(colors);
      io.stdout(
        unified ? formatUnifiedDiff(ops, file1, file2, decorate) : formatPlainDiff(ops, decorate),
      );
      return hasChanges(ops) ? 1 : 0;
    },
  },

  cmp: {
    usage: "linekit cmp [-s] <file1> <file2>",
    minArgs: 2,
    maxArgs: 2,
    boolean: ["silent"],
    alias: { s: "silent" },
    async run({ args, paths, source, io }) {
      const [file1 = "", file2 = ""] = paths;
      const result = await cmp(file1, file2, { silent: flag(args, "silent"), source });
      if (result.message !== undefined) {
        io.stdout(result.message + "\n");
      }
      return result.identical ? 0 : 1;
    },
  },

  comm: {
    usage: "linekit comm <file1> <file2>",
    minArgs: 2,
    maxArgs: 2,
    async run({ paths, source, io }) {
      const [file1 = "", file2 = ""] = paths;
      io.stdout(formatCommColumns(await comm(file1, file2, { source })));
      return 0;
    },
  },

  wc: {
    usage: "linekit wc [-l | -w | -m | -c] <files...>",
    minArgs: 1,
    boolean: ["lines", "words", "chars", "bytes"],
    alias: { l: "lines", w: "words", m: "chars", c: "bytes" },
    async run({ args, paths, source, io }) {
      const results: WcResult[] = [];
      for (const path of paths) {
        results.push(
          await wc(path, {
            linesOnly: flag(args, "lines"),
            wordsOnly: flag(args, "words"),
            charsOnly: flag(args, "chars"),
            bytesOnly: flag(args, "bytes"),
            source,
          }),
        );
      }
      if (results.length > 1) {
        results.push(wcTotal(results));
      }
      for (const { file, ...stats } of results) {
        io.stdout(formatWcStats(stats, file) + "\n");
      }
      return 0;
    },
  },

  cut: {
    usage: "linekit cut -f list [-d delim] [-s] [--complement] [--output-delimiter s] <file>",
    minArgs: 1,
    maxArgs: 1,
    boolean: ["complement", "only-delimited"],
    string: ["fields", "delimiter", "output-delimiter"],
    alias: { f: "fields", d: "delimiter", s: "only-delimited" },
    async run({ args, paths, config, source, io }) {
      io.stdout(
        await cut(paths[0] ?? "", {
          fields: str(args, "fields"),
          delimiter: str(args, "delimiter") ?? config.cut?.delimiter,
          complement: flag(args, "complement"),
          onlyDelimited: flag(args, "only-delimited"),
          outputDelimiter: str(args, "output-delimiter"),
          source,
        }),
      );
      return 0;
    },
  },

  paste: {
    usage: "linekit paste [-d delim] <files...>",
    minArgs: 1,
    string: ["delimiters"],
    alias: { d: "delimiters" },
    async run({ args, paths, config, source, io }) {
      io.stdout(
        await paste(paths, {
          delimiter: str(args, "delimiters") ?? config.paste?.delimiter,
          source,
        }),
      );
      return 0;
    },
  },

  join: {
    usage: "linekit join [-1 field] [-2 field] [-t char] <file1> <file2>",
    minArgs: 2,
    maxArgs: 2,
    string: ["1", "2", "separator"],
    alias: { t: "separator" },
    async run({ args, paths, config, source, io }) {
      const [file1 = "", file2 = ""] = paths;
      io.stdout(
        await join(file1, file2, {
          field1: int(args, "1"),
          field2: int(args, "2"),
          separator: str(args, "separator") ?? config.join?.separator,
          source,
        }),
      );
      return 0;
    },
  },

  cat: {
    usage: "linekit cat [-n] [-s] <files...>",
    minArgs: 1,
    boolean: ["number", "squeeze-blank"],
    alias: { n: "number", s: "squeeze-blank" },
    async run({ args, paths, source, io }) {
      io.stdout(
        await cat(paths, {
          numberLines: flag(args, "number"),
          squeezeBlank: flag(args, "squeeze-blank"),
          source,
        }),
      );
      return 0;
    },
  },

  head: {
    usage: "linekit head [-n lines | -c bytes] <file>",
    minArgs: 1,
    maxArgs: 1,
    string: ["lines", "bytes"],
    alias: { n: "lines", c: "bytes" },
    async run({ args, paths, config, source, io }) {
      io.stdout(
        await head(paths[0] ?? "", {
          lines: int(args, "lines") ?? config.head?.lines,
          bytes: int(args, "bytes"),
          source,
        }),
      );
      return 0;
    },
  },

  tail: {
    usage: "linekit tail [-n lines | -n +start | -c bytes] <file>",
    minArgs: 1,
    maxArgs: 1,
    string: ["lines", "bytes"],
    alias: { n: "lines", c: "bytes" },
    async run({ args, paths, config, source, io }) {
      const lines = str(args, "lines");
      const fromLine = lines?.startsWith("+") ? Number(lines.slice(1)) : undefined;
      if (fromLine !== undefined && !Number.isInteger(fromLine)) {
        throw new UsageError(`invalid number for --lines: '${lines}'`);
      }
      io.stdout(
        await tail(paths[0] ?? "", {
          lines: fromLine === undefined ? int(args, "lines") ?? config.tail?.lines : undefined,
          fromLine,
          bytes: int(args, "bytes"),
          source,
        }),
      );
      return 0;
    },
  },
};

// ============================================================================
// Entry
// ============================================================================

const GLOBAL_BOOLEANS = ["help", "version", "verbose"];

/**
 * Run the CLI and return its exit status
 *
 * @example
 * ```ts
 * const status = await runCli(["grep", "-n", "TODO", "notes.txt"]);
 * ```
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  const global = minimist([...argv], {
    boolean: GLOBAL_BOOLEANS,
    string: ["color"],
    alias: { h: "help" },
    stopEarly: true,
  });

  const [command, ...rest] = global._;

  if (command === undefined) {
    if (global.version === true) {
      io.stdout(`${NAME} ${VERSION}\n`);
      return 0;
    }
    io.stdout(HELP.trimStart());
    return 0;
  }

  if (command === "serve") {
    await startServer({ cwd: io.cwd, logger: createLogger({ verbose: global.verbose === true }) });
    return 0;
  }

  const spec = COMMANDS[command];
  if (!spec) {
    io.stderr(`${NAME}: unknown command '${command}'\n`);
    io.stderr(`Run '${NAME} --help' for usage.\n`);
    return 2;
  }

  const booleans = [...GLOBAL_BOOLEANS, ...(spec.boolean ?? [])];
  const unknown: string[] = [];
  const args = minimist(rest, {
    boolean: booleans,
    string: ["_", "color", ...(spec.string ?? [])],
    alias: { h: "help", ...spec.alias },
    // null marks a flag that was not given, so config values can apply
    default: Object.fromEntries(booleans.map((name) => [name, null])),
    unknown: (arg) => {
      if (arg.startsWith("-") && arg !== "-") {
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  if (args.help === true) {
    io.stdout(`Usage: ${spec.usage}\n`);
    return 0;
  }

  try {
    if (unknown.length > 0) {
      throw new UsageError(`unknown option '${unknown[0]}'`);
    }
    const paths = args._.map(String);
    if (paths.length < spec.minArgs || (spec.maxArgs !== undefined && paths.length > spec.maxArgs)) {
      const expected = spec.minArgs === spec.maxArgs ? `${spec.minArgs}` : `at least ${spec.minArgs}`;
      throw new UsageError(`expected ${expected} argument(s), got ${paths.length}`);
    }

    const sink = (line: string) => io.stderr(line + "\n");
    let logger = createLogger({ verbose: global.verbose === true || args.verbose === true, sink });
    const config = await loadConfig(io.cwd, { home: io.home, env: io.env, logger });
    if (config.verbose) {
      logger = createLogger({ verbose: true, sink });
    }

    const colorValue: unknown = args.color ?? global.color;
    const mode = resolveColorMode(colorValue, config.color);
    const colors = pc.createColors(mode === "always" || (mode === "auto" && io.isTTY));
    logger.debug(`${command}: ${paths.length} argument(s), color ${mode}`);

    return await spec.run({
      args,
      paths,
      config,
      source: createFsLineSource({ cwd: io.cwd }),
      io,
      colors,
      logger,
    });
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${NAME} ${command}: ${error.message}\n`);
      io.stderr(`Usage: ${spec.usage}\n`);
      return 2;
    }
    if (error instanceof LineKitError) {
      io.stderr(`${NAME} ${command}: ${error.message}\n`);
      return 2;
    }
    throw error;
  }
}

if (isMainModule(import.meta.url)) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`[${NAME}] error:`, error instanceof Error ? error.message : error);
      process.exitCode = 2;
    },
  );
}
