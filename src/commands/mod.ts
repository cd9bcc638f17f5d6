/**
 * Text Processing Commands
 *
 * Line- and field-oriented engines over whole files:
 * - grep: Search lines with a regular expression
 * - sort: Order lines by a key
 * - diff: Edit script between two files
 * - cmp: First differing byte of two files
 * - comm: Three-way set partition of two files
 * - cut, paste, join: Field restructuring
 * - wc: Line, word, character and byte count
 * - cat, head, tail: Whole, leading and trailing content
 *
 * Every engine has a synchronous function over line arrays and an async
 * wrapper that reads through a LineSource.
 *
 * @module
 */

// field extraction shared by cut, sort and join
export {
  compileFieldKey,
  extractFields,
  keyField,
  parseFieldSelector,
  selectFieldIndices,
  splitFields,
  validateDelimiter,
  type CompiledFieldKey,
  type FieldKey,
  type FieldRange,
} from "./fields.ts";

// grep - pattern matching
export {
  buildRegex,
  compileMatcher,
  formatGrepMatch,
  formatGrepResult,
  getMatches,
  grep,
  grepLines,
  matchLineNumbers,
  testLine,
  type GrepMatch,
  type GrepOptions,
  type GrepResult,
  type GrepStyle,
  type Matcher,
  type MatchSpec,
} from "./grep.ts";

// sort - line sorting
export {
  compareText,
  parseNumericKey,
  sortFile,
  sortLines,
  type SortOptions,
} from "./sort.ts";

// diff - LCS edit scripts
export {
  applyEdits,
  diff,
  diffLines,
  formatDiffOp,
  formatPlainDiff,
  formatUnifiedDiff,
  hasChanges,
  type DiffKind,
  type DiffOp,
  type DiffOptions,
} from "./diff.ts";

// cmp - byte comparison
export {
  cmp,
  compareBytes,
  type ByteDifference,
  type CmpOptions,
  type CmpResult,
} from "./cmp.ts";

// comm - set partition
export { comm, compareSets, type CommResult } from "./comm.ts";

// cut, paste, join - field restructuring
export { cut, cutLine, cutLines, type CutOptions } from "./cut.ts";
export { paste, pasteColumns, type PasteOptions } from "./paste.ts";
export {
  buildJoinIndex,
  join,
  joinLines,
  type JoinIndex,
  type JoinOptions,
} from "./join.ts";

// wc - counting
export {
  countBytes,
  formatWcStats,
  selectedField,
  wc,
  type WcField,
  type WcOptions,
  type WcResult,
  type WcStats,
} from "./wc.ts";

// cat, head, tail
export { cat, catLines, type CatOptions } from "./cat.ts";
export { head, headBytes, headLines, type HeadOptions } from "./head.ts";
export {
  tail,
  tailBytes,
  tailFromLine,
  tailLines,
  type TailOptions,
} from "./tail.ts";
