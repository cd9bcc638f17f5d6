/**
 * File-system Line Source
 *
 * Reads whole files into memory and expands directory targets with
 * fast-glob. Paths are resolved against `cwd` for I/O but reported exactly
 * as the caller gave them.
 *
 * @module
 */

import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import fg from "fast-glob";
import type { FileContent, LineSource } from "./types.ts";
import { fromFsError, isADirectory } from "./errors.ts";

export interface FsLineSourceOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Split text into lines the way a line-by-line reader sees them.
 *
 * The terminating newline of the last line does not start another line,
 * so `"a\nb\n"` and `"a\nb"` both give `["a", "b"]` and `""` gives `[]`.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (text.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

/**
 * Join lines back into text, terminating every line with a newline
 */
export function toText(lines: readonly string[]): string {
  let out = "";
  for (const line of lines) {
    out += line + "\n";
  }
  return out;
}

const decoder = new TextDecoder();

/**
 * Join byte buffers end to end
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Render content as text, decoding bytes as UTF-8
 *
 * Only for surfaces that carry text alone; invalid sequences become U+FFFD.
 */
export function contentToText(content: FileContent): string {
  return typeof content === "string" ? content : decoder.decode(content);
}

/**
 * Decode raw bytes as UTF-8 and split them into lines
 */
export function bytesToLines(bytes: Uint8Array): string[] {
  return splitLines(decoder.decode(bytes));
}

function isDanglingLink(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "ELOOP";
}

/**
 * Create a Line Source backed by the local file system
 *
 * @example
 * ```ts
 * const source = createFsLineSource({ cwd: "/srv/data" });
 * const lines = await source.readLines("users.txt");
 * ```
 */
export function createFsLineSource(options: FsLineSourceOptions = {}): LineSource {
  const abs = (path: string) => resolve(options.cwd ?? process.cwd(), path);

  async function readBytes(path: string): Promise<Uint8Array> {
    try {
      const buffer = await readFile(abs(path));
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error) {
      throw fromFsError(error, path);
    }
  }

  async function readLines(path: string): Promise<string[]> {
    try {
      return splitLines(await readFile(abs(path), "utf8"));
    } catch (error) {
      throw fromFsError(error, path);
    }
  }

  async function expand(target: string, recursive: boolean): Promise<string[]> {
    let info: Stats;
    try {
      info = await stat(abs(target));
    } catch (error) {
      throw fromFsError(error, target);
    }

    if (info.isFile()) {
      return [target];
    }
    if (!info.isDirectory()) {
      // Sockets, FIFOs and devices are not searched
      return [];
    }
    if (!recursive) {
      throw isADirectory(target, "Pass recursive to search directories");
    }

    // Directory links are not descended; file links count as files
    const entries = await fg("**/*", {
      cwd: abs(target),
      onlyFiles: false,
      objectMode: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    const files: string[] = [];
    for (const entry of entries) {
      const path = join(target, entry.path);
      if (entry.dirent.isFile() || (entry.dirent.isSymbolicLink() && (await linksToFile(path)))) {
        files.push(path);
      }
    }
    return files.sort();
  }

  async function linksToFile(path: string): Promise<boolean> {
    try {
      return (await stat(abs(path))).isFile();
    } catch (error) {
      if (isDanglingLink(error)) return false;
      throw fromFsError(error, path);
    }
  }

  return { readLines, readBytes, expand };
}

/** Shared default source for operations called without one */
export const fsLineSource: LineSource = createFsLineSource();
