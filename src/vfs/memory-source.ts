/**
 * In-memory Line Source
 *
 * Holds a virtual file tree so the engines can run over content that never
 * touched the disk. Directories exist implicitly as prefixes of file paths.
 */

import { posix } from "node:path";
import type { LineSource } from "../core/types.ts";
import { isADirectory, notFound, permissionDenied } from "../core/errors.ts";
import { bytesToLines } from "../core/line-source.ts";

const encoder = new TextEncoder();

export class MemoryLineSource implements LineSource {
  private files = new Map<string, Uint8Array>();
  private denied = new Set<string>();

  constructor(files: Record<string, string | Uint8Array> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.write(path, content);
    }
  }

  /**
   * Normalize to an absolute path with `.` and `..` resolved
   */
  private normalizePath(path: string): string {
    const parts = path.split("/").filter((p) => p && p !== ".");
    const resolved: string[] = [];

    for (const part of parts) {
      if (part === "..") {
        resolved.pop();
      } else {
        resolved.push(part);
      }
    }

    return "/" + resolved.join("/");
  }

  private isDirectory(normalized: string): boolean {
    const prefix = normalized === "/" ? "/" : normalized + "/";
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }

  /**
   * Create or replace a file
   */
  write(path: string, content: string | Uint8Array): void {
    const data = typeof content === "string" ? encoder.encode(content) : content;
    this.files.set(this.normalizePath(path), data);
  }

  /**
   * Make reads of a path fail with PERMISSION_DENIED
   */
  deny(path: string): void {
    this.denied.add(this.normalizePath(path));
  }

  async readBytes(path: string): Promise<Uint8Array> {
    const normalized = this.normalizePath(path);
    const data = this.files.get(normalized);

    if (data === undefined) {
      throw this.isDirectory(normalized) ? isADirectory(path) : notFound(path);
    }
    if (this.denied.has(normalized)) {
      throw permissionDenied(path);
    }
    return data;
  }

  async readLines(path: string): Promise<string[]> {
    return bytesToLines(await this.readBytes(path));
  }

  async expand(target: string, recursive: boolean): Promise<string[]> {
    const normalized = this.normalizePath(target);

    if (this.files.has(normalized)) {
      return [target];
    }
    if (!this.isDirectory(normalized)) {
      throw notFound(target);
    }
    if (!recursive) {
      throw isADirectory(target, "Pass recursive to search directories");
    }

    const prefix = normalized === "/" ? "/" : normalized + "/";
    const relative: string[] = [];
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) {
        relative.push(key.substring(prefix.length));
      }
    }
    return relative.sort().map((entry) => posix.join(target, entry));
  }
}
