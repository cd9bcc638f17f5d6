/**
 * Tool definitions for MCP server
 *
 * Names, descriptions and JSON input schemas advertised by tools/list.
 * Arguments are validated again with zod when a tool is called.
 */

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, object>;
    required?: string[];
  };
};

const pathProp = (description: string) => ({ type: "string", description });

const pathsProp = (description: string) => ({
  oneOf: [
    { type: "string" },
    { type: "array", items: { type: "string" }, minItems: 1 },
  ],
  description,
});

const flag = (description: string) => ({ type: "boolean", description });

const count = (description: string) => ({ type: "integer", minimum: 0, description });

const fieldsProp = {
  oneOf: [{ type: "string" }, { type: "integer", minimum: 0 }],
  description: "1-based field selector such as 2, \"1,3\", \"2-4\", \"-2\" or \"3-\"",
};

export const TOOLS: readonly ToolDefinition[] = [
  {
    name: "grep",
    description: `Search files for lines matching a JavaScript regular expression.

Returns "file:line:text" lines (file only when several files were searched).
countOnly returns per-file counts; filesOnly returns matching file names.`,
    inputSchema: {
      type: "object",
      properties: {
        pattern: { type: "string", description: "Regular expression (JavaScript syntax)" },
        paths: pathsProp("File or directory, or a list of them"),
        ignoreCase: flag("Case-insensitive matching"),
        wholeWord: flag("Match whole words only"),
        wholeLine: flag("Match whole lines only"),
        fixedStrings: flag("Treat pattern as literal text"),
        invert: flag("Select non-matching lines"),
        recursive: flag("Search directories recursively"),
        lineNumbers: flag("Include line numbers (default: true)"),
        countOnly: flag("Return counts of matching lines per file"),
        filesOnly: flag("Return only names of files with matches"),
      },
      required: ["pattern", "paths"],
    },
  },
  {
    name: "sort",
    description: "Sort the lines of a file by the whole line or a key field.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProp("File to sort"),
        key: fieldsProp,
        delimiter: { type: "string", description: "Single-character field delimiter (default: whitespace)" },
        numeric: flag("Compare keys as numbers"),
        ignoreCase: flag("Compare keys case-insensitively"),
        reverse: flag("Reverse the result"),
        unique: flag("Drop adjacent duplicate lines"),
      },
      required: ["path"],
    },
  },
  {
    name: "diff",
    description: `Compute a line diff between two files.

Unified output has ---/+++ headers and every line prefixed with "+", "-" or " ".
Plain output lists only added and removed lines.`,
    inputSchema: {
      type: "object",
      properties: {
        file1: pathProp("Original file"),
        file2: pathProp("Changed file"),
        unified: flag("Unified output (default: true)"),
        contextLines: count("Accepted for compatibility; all lines are shown"),
      },
      required: ["file1", "file2"],
    },
  },
  {
    name: "cmp",
    description: "Compare two files byte by byte and report the first difference as JSON.",
    inputSchema: {
      type: "object",
      properties: {
        file1: pathProp("First file"),
        file2: pathProp("Second file"),
        silent: flag("Only report whether the files are identical"),
      },
      required: ["file1", "file2"],
    },
  },
  {
    name: "comm",
    description: "Partition the lines of two files into onlyInFirst, onlyInSecond and inBoth (JSON).",
    inputSchema: {
      type: "object",
      properties: {
        file1: pathProp("First file"),
        file2: pathProp("Second file"),
      },
      required: ["file1", "file2"],
    },
  },
  {
    name: "wc",
    description: "Count lines, words, characters and bytes of a file (JSON).",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProp("File to count"),
        linesOnly: flag("Count lines only"),
        wordsOnly: flag("Count words only"),
        charsOnly: flag("Count characters only"),
        bytesOnly: flag("Count bytes only"),
      },
      required: ["path"],
    },
  },
  {
    name: "cut",
    description: "Extract selected fields from each line of a file.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProp("Input file"),
        fields: fieldsProp,
        delimiter: { type: "string", description: "Single-character delimiter (default: tab)" },
        outputDelimiter: { type: "string", description: "Separator for output fields" },
        complement: flag("Output the fields not selected"),
        onlyDelimited: flag("Skip lines without the delimiter"),
      },
      required: ["path"],
    },
  },
  {
    name: "paste",
    description: "Merge corresponding lines of several files side by side.",
    inputSchema: {
      type: "object",
      properties: {
        paths: { type: "array", items: { type: "string" }, minItems: 1, description: "Files to merge" },
        delimiter: { type: "string", description: "Column separator (default: tab)" },
      },
      required: ["paths"],
    },
  },
  {
    name: "join",
    description: "Join the lines of two files that share a key field.",
    inputSchema: {
      type: "object",
      properties: {
        file1: pathProp("Left file"),
        file2: pathProp("Right file"),
        field1: { type: "integer", minimum: 0, description: "Key field in file1 (default: 1)" },
        field2: { type: "integer", minimum: 0, description: "Key field in file2 (default: 1)" },
        separator: { type: "string", description: "Single-character separator (default: whitespace)" },
      },
      required: ["file1", "file2"],
    },
  },
  {
    name: "cat",
    description: "Concatenate files, optionally numbering lines or squeezing blank runs.",
    inputSchema: {
      type: "object",
      properties: {
        paths: pathsProp("File or list of files"),
        numberLines: flag("Number output lines"),
        squeezeBlank: flag("Collapse runs of blank lines"),
      },
      required: ["paths"],
    },
  },
  {
    name: "head",
    description: "Output the first lines (default 10) or bytes of a file.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProp("Input file"),
        lines: count("Number of lines"),
        bytes: count("Number of bytes (overrides lines), replied as UTF-8 text"),
      },
      required: ["path"],
    },
  },
  {
    name: "tail",
    description: "Output the last lines (default 10) or bytes of a file.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProp("Input file"),
        lines: count("Number of lines"),
        bytes: count("Number of bytes (overrides lines), replied as UTF-8 text"),
        fromLine: { type: "integer", minimum: 1, description: "Start at this line instead" },
      },
      required: ["path"],
    },
  },
];
