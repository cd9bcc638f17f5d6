/**
 * Configuration loading and merging
 *
 * Loads config from:
 * 1. Default built-in config
 * 2. Global ~/.config/linekit/config.json
 * 3. Project ./linekit.config.json, or the file named by LINEKIT_CONFIG
 *
 * Later configs override earlier ones field by field.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { LineKitConfig } from "./types.ts";
import { configError } from "./errors.ts";
import type { Logger } from "./log.ts";

// ============================================================================
// Schema
// ============================================================================

const delimiterSchema = z.string().length(1, "must be a single character");
const countSchema = z.number().int().nonnegative();

export const configSchema: z.ZodType<LineKitConfig> = z.object({
  verbose: z.boolean().optional(),
  color: z.enum(["auto", "always", "never"]).optional(),
  grep: z.object({
    ignoreCase: z.boolean().optional(),
    lineNumbers: z.boolean().optional(),
    recursive: z.boolean().optional(),
  }).strict().optional(),
  sort: z.object({
    delimiter: delimiterSchema.optional(),
    ignoreCase: z.boolean().optional(),
    numeric: z.boolean().optional(),
  }).strict().optional(),
  diff: z.object({
    unified: z.boolean().optional(),
    contextLines: countSchema.optional(),
  }).strict().optional(),
  cut: z.object({ delimiter: delimiterSchema.optional() }).strict().optional(),
  paste: z.object({ delimiter: z.string().optional() }).strict().optional(),
  join: z.object({ separator: delimiterSchema.optional() }).strict().optional(),
  head: z.object({ lines: countSchema.optional() }).strict().optional(),
  tail: z.object({ lines: countSchema.optional() }).strict().optional(),
}).strict();

// ============================================================================
// Defaults and merging
// ============================================================================

export const DEFAULT_CONFIG: LineKitConfig = {
  verbose: false,
  color: "auto",
  grep: { ignoreCase: false, lineNumbers: true, recursive: false },
  sort: { ignoreCase: false, numeric: false },
  diff: { unified: true, contextLines: 3 },
  cut: { delimiter: "\t" },
  paste: { delimiter: "\t" },
  join: {},
  head: { lines: 10 },
  tail: { lines: 10 },
};

/**
 * Merge two configs (later overrides earlier, section by section)
 */
export function mergeConfigs(
  base: LineKitConfig,
  override: LineKitConfig,
): LineKitConfig {
  return {
    verbose: override.verbose ?? base.verbose,
    color: override.color ?? base.color,
    grep: { ...base.grep, ...override.grep },
    sort: { ...base.sort, ...override.sort },
    diff: { ...base.diff, ...override.diff },
    cut: { ...base.cut, ...override.cut },
    paste: { ...base.paste, ...override.paste },
    join: { ...base.join, ...override.join },
    head: { ...base.head, ...override.head },
    tail: { ...base.tail, ...override.tail },
  };
}

// ============================================================================
// Validation
// ============================================================================

export interface ConfigValidation {
  errors: string[];
  warnings: string[];
}

function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.length > 0 ? path.join(".") : "(root)";
}

/**
 * Check a parsed JSON value against the config schema
 *
 * Errors are `path: message` lines, one per schema issue.
 */
export function validateConfig(value: unknown): ConfigValidation {
  const result: ConfigValidation = { errors: [], warnings: [] };
  const parsed = configSchema.safeParse(value);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      result.errors.push(`${formatIssuePath(issue.path)}: ${issue.message}`);
    }
    return result;
  }

  if (parsed.data.diff?.contextLines !== undefined && parsed.data.diff.unified === false) {
    result.warnings.push("diff.contextLines has no effect when diff.unified is false");
  }

  return result;
}

/**
 * Parse and validate config file content
 *
 * @throws {LineKitError} CONFIG_ERROR on invalid JSON or schema violations
 */
export function parseConfig(content: string, path: string): LineKitConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw configError(
      `Failed to load config from ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      path,
    );
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = validateConfig(raw).errors;
    throw configError(`Invalid config in ${path}:\n${issues.join("\n")}`, path);
  }
  return parsed.data;
}

// ============================================================================
// Paths and loading
// ============================================================================

export const CONFIG_ENV_VAR = "LINEKIT_CONFIG";
export const PROJECT_CONFIG_FILE = "linekit.config.json";

/**
 * Get the global config path
 */
export function getGlobalConfigPath(home: string = homedir()): string {
  return join(home, ".config", "linekit", "config.json");
}

/**
 * Get the project config path
 */
export function getProjectConfigPath(cwd: string): string {
  return join(cwd, PROJECT_CONFIG_FILE);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Load a JSON config file if it exists
 */
async function loadJsonConfigFile(path: string): Promise<LineKitConfig | null> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    // Config file doesn't exist, which is normal
    if (isMissingFile(error)) return null;
    throw configError(
      `Failed to load config from ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      path,
    );
  }
  return parseConfig(content, path);
}

/** Options for loading config */
export interface LoadConfigOptions {
  /** Home directory holding the global config (default: os.homedir()) */
  home?: string;
  /** Environment to read LINEKIT_CONFIG from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Receives debug messages and warnings */
  logger?: Logger;
}

/**
 * Load and merge all config files
 */
export async function loadConfig(
  cwd: string,
  options: LoadConfigOptions = {},
): Promise<LineKitConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger;
  let config = mergeConfigs({}, DEFAULT_CONFIG);

  const envPath = env[CONFIG_ENV_VAR];
  const explicit = envPath ? resolve(cwd, envPath) : undefined;
  const layers = [getGlobalConfigPath(options.home), explicit ?? getProjectConfigPath(cwd)];

  for (const path of layers) {
    const layer = await loadJsonConfigFile(path);
    if (!layer) {
      if (path === explicit) {
        logger?.warn(`config file named by ${CONFIG_ENV_VAR} not found: ${path}`);
      }
      continue;
    }
    logger?.debug(`loaded config from ${path}`);
    for (const warning of validateConfig(layer).warnings) {
      logger?.warn(`${path}: ${warning}`);
    }
    config = mergeConfigs(config, layer);
  }

  return config;
}
