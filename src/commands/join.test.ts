/**
 * Tests for join command
 */

import assert from "node:assert/strict";
import { LineKitError } from "../core/errors.ts";
import { MemoryLineSource } from "../vfs/memory-source.ts";
import { compileFieldKey } from "./fields.ts";
import { buildJoinIndex, join, joinLines } from "./join.ts";

describe("buildJoinIndex", () => {
  it("groups lines by key in input order", () => {
    const index = buildJoinIndex(["1 a", "2 b", "1 c"], compileFieldKey({ fields: 1 }));
    assert.deepEqual([...index], [["1", ["1 a", "1 c"]], ["2", ["2 b"]]]);
  });
});

describe("joinLines", () => {
  it("emits one row per matching pair", () => {
    assert.deepEqual(joinLines(["1 alice", "2 bob"], ["1 admin", "1 dev", "3 ops"]), [
      "1 alice 1 admin",
      "1 alice 1 dev",
    ]);
  });

  it("drops lines without a partner", () => {
    assert.deepEqual(joinLines(["9 nobody"], ["1 admin"]), []);
  });

  it("joins on chosen fields with a separator", () => {
    assert.deepEqual(
      joinLines(["alice,1"], ["admin,1", "dev,2"], { field1: 2, field2: 2, separator: "," }),
      ["alice,1,admin,1"],
    );
  });

  it("matches missing key fields to each other as empty keys", () => {
    assert.deepEqual(joinLines(["solo"], ["x", "y z"], { field1: 2, field2: 2 }), ["solo x"]);
  });

  it("rejects a multi-character separator", () => {
    assert.throws(() => joinLines([], [], { separator: "::" }), LineKitError);
  });
});

describe("join", () => {
  it("joins two files", async () => {
    const source = new MemoryLineSource({ "/u": "1 amy\n2 bob\n", "/g": "2 staff\n1 wheel\n" });
    assert.equal(await join("/u", "/g", { source }), "1 amy 1 wheel\n2 bob 2 staff\n");
  });
});
