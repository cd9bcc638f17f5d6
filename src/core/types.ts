/**
 * linekit core type definitions
 */

// ============================================================================
// Line Source
// ============================================================================

/**
 * Supplies file contents to the engines.
 *
 * Implementations must be re-entrant: no state is cached across calls.
 */
export interface LineSource {
  /** Read a file as terminator-stripped lines */
  readLines(path: string): Promise<string[]>;
  /** Read a file as raw bytes */
  readBytes(path: string): Promise<Uint8Array>;
  /**
   * Expand a target into the regular files it denotes. A file expands to
   * itself; a directory expands to every regular file below it when
   * `recursive` is set and is an error otherwise.
   */
  expand(target: string, recursive: boolean): Promise<string[]>;
}

/**
 * Output of an operation that can hand back raw file bytes: text from line
 * modes, the bytes themselves from byte modes
 */
export type FileContent = string | Uint8Array;

/** Options shared by every file-level operation */
export interface SourceOptions {
  /** Where file contents come from (default: the local file system) */
  source?: LineSource;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type ColorMode = "auto" | "always" | "never";

export interface GrepDefaults {
  ignoreCase?: boolean;
  lineNumbers?: boolean;
  recursive?: boolean;
}

export interface SortDefaults {
  /** Field delimiter for key extraction (single character) */
  delimiter?: string;
  ignoreCase?: boolean;
  numeric?: boolean;
}

export interface DiffDefaults {
  unified?: boolean;
  contextLines?: number;
}

export interface LineKitConfig {
  /** Log diagnostic messages to stderr */
  verbose?: boolean;
  /** Colorize CLI output */
  color?: ColorMode;
  grep?: GrepDefaults;
  sort?: SortDefaults;
  diff?: DiffDefaults;
  cut?: { delimiter?: string };
  paste?: { delimiter?: string };
  join?: { separator?: string };
  head?: { lines?: number };
  tail?: { lines?: number };
}

