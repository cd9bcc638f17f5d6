/**
 * Test Helpers
 *
 * Temp directory setup and teardown shared by the file-system tests.
 */

import { mkdtempSync, realpathSync, rmSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** Resolved temp path (handles the macOS /tmp -> /private/tmp symlink) */
export const REAL_TMP = realpathSync(tmpdir());

/**
 * Create a unique test directory under REAL_TMP
 *
 * The directory is not removed automatically; use cleanupTestDir() or
 * withTestDir().
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(REAL_TMP, `${prefix}-`));
}

/**
 * Remove a test directory recursively
 *
 * Refuses to touch anything outside REAL_TMP.
 */
export function cleanupTestDir(path: string): void {
  if (!path.startsWith(REAL_TMP)) {
    console.warn(`Refusing to cleanup directory outside REAL_TMP: ${path}`);
    return;
  }
  rmSync(path, { recursive: true, force: true });
}

/**
 * Run a function with a temporary test directory, ensuring cleanup
 *
 * @example
 * ```typescript
 * await withTestDir("mytest", async (dir) => {
 *   await writeFiles(dir, { "a.txt": "content\n" });
 * });
 * ```
 */
export async function withTestDir<T>(
  prefix: string,
  fn: (dir: string) => T | Promise<T>,
): Promise<T> {
  const dir = createTestDir(prefix);
  try {
    return await fn(dir);
  } finally {
    cleanupTestDir(dir);
  }
}

/**
 * Write a tree of files below a directory, creating parents as needed
 */
export async function writeFiles(
  dir: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}
