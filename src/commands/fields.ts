/**
 * Field extraction shared by sort, cut and join
 *
 * A field key names a delimiter (absent means "split on runs of
 * whitespace") and a selector of 1-based field indices and ranges such as
 * "2", "1,3" or "2-4,7-". Index 0, or no selector at all, means the whole
 * line.
 *
 * @module
 */

import { invalidFieldSpec } from "../core/errors.ts";

/**
 * Field key as written by callers
 */
export interface FieldKey {
  /** Single-character delimiter; omit to split on whitespace runs */
  delimiter?: string;
  /** 1-based selector, e.g. 2, "1,3" or "2-4" */
  fields?: string | number;
}

/**
 * Inclusive 1-based range; `end` is null for an open range ("3-")
 */
export interface FieldRange {
  start: number;
  end: number | null;
}

/**
 * Validated field key. An empty `ranges` list selects the whole line.
 */
export interface CompiledFieldKey {
  delimiter: string | undefined;
  ranges: FieldRange[];
}

const SINGLE = /^\d+$/;
const RANGE = /^(\d*)-(\d*)$/;

/**
 * Parse a selector like "1,3,5-7" into ranges, keeping selector order
 *
 * @throws {LineKitError} INVALID_FIELD_SPEC for malformed selectors
 */
export function parseFieldSelector(spec: string | number): FieldRange[] {
  if (typeof spec === "number") {
    if (!Number.isInteger(spec) || spec < 0) {
      throw invalidFieldSpec(String(spec), "field index must be a non-negative integer");
    }
    return spec === 0 ? [] : [{ start: spec, end: spec }];
  }

  const trimmed = spec.trim();
  if (trimmed === "") {
    throw invalidFieldSpec(spec, "selector is empty");
  }
  if (trimmed === "0") {
    return [];
  }

  const ranges: FieldRange[] = [];
  for (const raw of trimmed.split(",")) {
    const part = raw.trim();

    if (SINGLE.test(part)) {
      const index = parseInt(part, 10);
      if (index === 0) {
        throw invalidFieldSpec(spec, "fields are numbered from 1");
      }
      ranges.push({ start: index, end: index });
      continue;
    }

    const match = RANGE.exec(part);
    if (!match || (match[1] === "" && match[2] === "")) {
      throw invalidFieldSpec(spec, `'${part}' is not a field index or range`);
    }

    const start = match[1] ? parseInt(match[1], 10) : 1;
    const end = match[2] ? parseInt(match[2], 10) : null;
    if (start === 0 || end === 0) {
      throw invalidFieldSpec(spec, "fields are numbered from 1");
    }
    if (end !== null && end < start) {
      throw invalidFieldSpec(spec, `range '${part}' is decreasing`);
    }
    ranges.push({ start, end });
  }

  return ranges;
}

/**
 * Reject delimiters that are not exactly one character
 */
export function validateDelimiter(delimiter: string | undefined): void {
  if (delimiter !== undefined && delimiter.length !== 1) {
    throw invalidFieldSpec(
      delimiter,
      "the delimiter must be a single character",
    );
  }
}

/**
 * Validate a field key once so it can be applied to many lines
 */
export function compileFieldKey(key: FieldKey = {}): CompiledFieldKey {
  validateDelimiter(key.delimiter);
  return {
    delimiter: key.delimiter,
    ranges: key.fields === undefined ? [] : parseFieldSelector(key.fields),
  };
}

/**
 * Split a line into its fields
 *
 * Without a delimiter, fields are the maximal runs of non-whitespace, so
 * leading and trailing blanks never produce empty fields. With one, a
 * delimiter at the end of the line closes the last field instead of opening
 * an empty one: `"a:b:"` has two fields and `""` has none.
 */
export function splitFields(line: string, delimiter?: string): string[] {
  if (delimiter === undefined) {
    return line.match(/\S+/g) ?? [];
  }
  const fields = line.split(delimiter);
  if (fields[fields.length - 1] === "") {
    fields.pop();
  }
  return fields;
}

function isCompiled(key: FieldKey | CompiledFieldKey): key is CompiledFieldKey {
  return "ranges" in key;
}

/**
 * Extract the selected fields of a line in selector order
 *
 * Repeated indices repeat their field and an index past the last field
 * yields an empty string.
 *
 * @example
 * ```ts
 * extractFields("a:b:c", { delimiter: ":", fields: "3,1" }); // ["c", "a"]
 * extractFields("a b", { fields: 5 });                      // [""]
 * ```
 */
export function extractFields(
  line: string,
  key: FieldKey | CompiledFieldKey,
): string[] {
  const compiled = isCompiled(key) ? key : compileFieldKey(key);
  if (compiled.ranges.length === 0) {
    return [line];
  }

  const fields = splitFields(line, compiled.delimiter);
  const result: string[] = [];

  for (const range of compiled.ranges) {
    const end = range.end ?? Math.max(fields.length, range.start);
    for (let i = range.start; i <= end; i++) {
      result.push(fields[i - 1] ?? "");
    }
  }

  return result;
}

/**
 * Derive the single key value used by sort and join
 *
 * Only the first selector entry counts (its start index for a range); a
 * missing field gives an empty key.
 */
export function keyField(line: string, key: CompiledFieldKey): string {
  const first = key.ranges[0];
  if (first === undefined) {
    return line;
  }
  return splitFields(line, key.delimiter)[first.start - 1] ?? "";
}

/**
 * Resolve ranges to ascending, de-duplicated 0-based indices of fields
 * that exist in a line with `count` fields
 */
export function selectFieldIndices(
  count: number,
  ranges: FieldRange[],
  complement = false,
): number[] {
  const selected = new Set<number>();

  for (const range of ranges) {
    const end = Math.min(range.end ?? count, count);
    for (let i = range.start; i <= end; i++) {
      selected.add(i - 1);
    }
  }

  const result: number[] = [];
  for (let i = 0; i < count; i++) {
    if (complement ? !selected.has(i) : selected.has(i)) {
      result.push(i);
    }
  }
  return result;
}
