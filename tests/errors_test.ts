/**
 * Tests for core/errors.ts
 */

import assert from "node:assert/strict";
import {
  configError,
  fromFsError,
  invalidFieldSpec,
  invalidPattern,
  isADirectory,
  LineKitError,
  notFound,
  permissionDenied,
} from "../src/core/errors.ts";

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe("LineKitError", () => {
  it("extends Error with a name", () => {
    const err = new LineKitError("NOT_FOUND", "gone");
    assert.ok(err instanceof Error);
    assert.equal(err.name, "LineKitError");
  });

  it("serializes to JSON", () => {
    const err = new LineKitError("INVALID_PATTERN", "bad", { pattern: "(" }, "escape it");
    assert.deepEqual(err.toJSON(), {
      code: "INVALID_PATTERN",
      message: "bad",
      details: { pattern: "(" },
      suggestion: "escape it",
    });
  });
});

describe("error factories", () => {
  it("names the path", () => {
    assert.equal(notFound("a.txt").message, "a.txt: No such file or directory");
    assert.equal(isADirectory("src").message, "src: Is a directory");
    assert.equal(permissionDenied("x").message, "x: Permission denied");
    assert.deepEqual(notFound("a.txt").details, { path: "a.txt" });
  });

  it("describes invalid patterns and field specs", () => {
    const pattern = invalidPattern("(", "Unterminated group");
    assert.equal(pattern.code, "INVALID_PATTERN");
    assert.equal(pattern.message, "Invalid regular expression '(': Unterminated group");
    assert.ok(pattern.suggestion);

    const spec = invalidFieldSpec("3-1", "decreasing range");
    assert.equal(spec.code, "INVALID_FIELD_SPEC");
    assert.equal(spec.message, "Invalid field specification '3-1': decreasing range");
  });

  it("omits details from a config error without a path", () => {
    assert.equal(configError("broken").details, undefined);
    assert.deepEqual(configError("broken", "c.json").details, { path: "c.json" });
  });
});

describe("fromFsError", () => {
  it("maps errno codes", () => {
    const codes: Array<[string, string]> = [
      ["ENOENT", "NOT_FOUND"],
      ["ENOTDIR", "NOT_FOUND"],
      ["EISDIR", "IS_A_DIRECTORY"],
      ["EACCES", "PERMISSION_DENIED"],
      ["EPERM", "PERMISSION_DENIED"],
    ];
    for (const [errno, code] of codes) {
      const mapped = fromFsError(errnoError(errno), "f");
      assert.ok(mapped instanceof LineKitError);
      assert.equal(mapped.code, code);
    }
  });

  it("names the path in a permission error", () => {
    const mapped = fromFsError(errnoError("EACCES"), "secret.txt");
    assert.ok(mapped instanceof LineKitError);
    assert.equal(mapped.message, "secret.txt: Permission denied");
    assert.deepEqual(mapped.details, { path: "secret.txt" });
  });

  it("returns other errors unchanged", () => {
    const original = errnoError("EMFILE");
    assert.equal(fromFsError(original, "f"), original);
    assert.equal(fromFsError("text", "f"), "text");
  });
});
