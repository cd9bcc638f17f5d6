/**
 * Tests for test helpers module
 */

import assert from "node:assert/strict";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { cleanupTestDir, createTestDir, REAL_TMP, withTestDir, writeFiles } from "./helpers.ts";

describe("helpers", () => {
  it("creates unique directories under REAL_TMP", () => {
    const dir1 = createTestDir("test");
    const dir2 = createTestDir("test");
    try {
      assert.ok(dir1.startsWith(REAL_TMP));
      assert.notEqual(dir1, dir2);
      assert.ok(existsSync(dir1));
    } finally {
      cleanupTestDir(dir1);
      cleanupTestDir(dir2);
    }
    assert.equal(existsSync(dir1), false);
  });

  it("cleans up after withTestDir even when the body throws", async () => {
    let seen = "";
    await assert.rejects(
      withTestDir("throws", (dir) => {
        seen = dir;
        throw new Error("boom");
      }),
      /boom/,
    );
    assert.equal(existsSync(seen), false);
  });

  it("writes nested files", async () => {
    await withTestDir("files", async (dir) => {
      await writeFiles(dir, { "a/b/c.txt": "deep\n" });
      assert.equal(readFileSync(join(dir, "a/b/c.txt"), "utf8"), "deep\n");
    });
  });
});
