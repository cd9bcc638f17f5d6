/**
 * linekit MCP Server
 *
 * Exposes the text engines as MCP tools over stdio:
 * - grep: Regular expression search
 * - sort: Key-based line sorting
 * - diff, cmp, comm: File comparison
 * - cut, paste, join: Field restructuring
 * - wc, cat, head, tail: Counting and content
 *
 * String results come back as text and structured results as pretty JSON.
 * Diagnostics go to stderr; stdout carries the protocol.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { loadConfig } from "../core/config.ts";
import { isMainModule, NAME, VERSION } from "../core/constants.ts";
import { LineKitError } from "../core/errors.ts";
import { contentToText, createFsLineSource } from "../core/line-source.ts";
import { createLogger, type Logger } from "../core/log.ts";
import type { LineKitConfig, LineSource } from "../core/types.ts";
import { cat } from "../commands/cat.ts";
import { cmp } from "../commands/cmp.ts";
import { comm } from "../commands/comm.ts";
import { cut } from "../commands/cut.ts";
import { diff } from "../commands/diff.ts";
import { formatGrepResult, grep } from "../commands/grep.ts";
import { head } from "../commands/head.ts";
import { join } from "../commands/join.ts";
import { paste } from "../commands/paste.ts";
import { sortFile } from "../commands/sort.ts";
import { tail } from "../commands/tail.ts";
import { wc } from "../commands/wc.ts";
import { TOOLS } from "./tool-descriptions.ts";

// Tool schemas
const pathsSchema = z.union([z.string(), z.array(z.string()).min(1)]);
const fieldsSchema = z.union([z.string(), z.number().int().nonnegative()]);
const countSchema = z.number().int().nonnegative();

const GrepSchema = z.object({
  pattern: z.string(),
  paths: pathsSchema,
  ignoreCase: z.boolean().optional(),
  wholeWord: z.boolean().optional(),
  wholeLine: z.boolean().optional(),
  fixedStrings: z.boolean().optional(),
  invert: z.boolean().optional(),
  recursive: z.boolean().optional(),
  lineNumbers: z.boolean().optional(),
  countOnly: z.boolean().optional(),
  filesOnly: z.boolean().optional(),
});

const SortSchema = z.object({
  path: z.string(),
  key: fieldsSchema.optional(),
  delimiter: z.string().optional(),
  numeric: z.boolean().optional(),
  ignoreCase: z.boolean().optional(),
  reverse: z.boolean().optional(),
  unique: z.boolean().optional(),
});

const TwoFileSchema = z.object({
  file1: z.string(),
  file2: z.string(),
});

const DiffSchema = TwoFileSchema.extend({
  unified: z.boolean().optional(),
  contextLines: countSchema.optional(),
});

const CmpSchema = TwoFileSchema.extend({
  silent: z.boolean().optional(),
});

const WcSchema = z.object({
  path: z.string(),
  linesOnly: z.boolean().optional(),
  wordsOnly: z.boolean().optional(),
  charsOnly: z.boolean().optional(),
  bytesOnly: z.boolean().optional(),
});

const CutSchema = z.object({
  path: z.string(),
  fields: fieldsSchema.optional(),
  delimiter: z.string().optional(),
  outputDelimiter: z.string().optional(),
  complement: z.boolean().optional(),
  onlyDelimited: z.boolean().optional(),
});

const PasteSchema = z.object({
  paths: z.array(z.string()).min(1),
  delimiter: z.string().optional(),
});

const JoinSchema = TwoFileSchema.extend({
  field1: countSchema.optional(),
  field2: countSchema.optional(),
  separator: z.string().optional(),
});

const CatSchema = z.object({
  paths: pathsSchema,
  numberLines: z.boolean().optional(),
  squeezeBlank: z.boolean().optional(),
});

const HeadSchema = z.object({
  path: z.string(),
  lines: countSchema.optional(),
  bytes: countSchema.optional(),
});

const TailSchema = HeadSchema.extend({
  fromLine: z.number().int().positive().optional(),
});

/**
 * What a tool call runs against
 */
export interface ToolContext {
  config: LineKitConfig;
  source: LineSource;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Format error for MCP response
 */
export function formatError(error: {
  code: string;
  message: string;
  suggestion?: string;
}): string {
  let text = `Error [${error.code}]: ${error.message}`;
  if (error.suggestion) {
    text += `\n\nSuggestion: ${error.suggestion}`;
  }
  return text;
}

/**
 * Run one tool call
 *
 * Never throws: failures come back as `isError` results.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  ctx: ToolContext,
): Promise<ToolResult> {
  const { config, source } = ctx;
  const input = args ?? {};

  try {
    switch (name) {
      case "grep": {
        const parsed = GrepSchema.parse(input);
        const result = await grep(
          {
            pattern: parsed.pattern,
            ignoreCase: parsed.ignoreCase ?? config.grep?.ignoreCase,
            wholeWord: parsed.wholeWord,
            wholeLine: parsed.wholeLine,
            fixedStrings: parsed.fixedStrings,
            invert: parsed.invert,
          },
          parsed.paths,
          {
            recursive: parsed.recursive ?? config.grep?.recursive,
            lineNumbers: parsed.lineNumbers ?? config.grep?.lineNumbers,
            countOnly: parsed.countOnly,
            filesOnly: parsed.filesOnly,
            source,
          },
        );
        return textResult(formatGrepResult(result) || "(no matches)");
      }

      case "sort": {
        const parsed = SortSchema.parse(input);
        return textResult(
          await sortFile(parsed.path, {
            key: parsed.key,
            delimiter: parsed.delimiter ?? config.sort?.delimiter,
            numeric: parsed.numeric ?? config.sort?.numeric,
            ignoreCase: parsed.ignoreCase ?? config.sort?.ignoreCase,
            reverse: parsed.reverse,
            unique: parsed.unique,
            source,
          }),
        );
      }

      case "diff": {
        const parsed = DiffSchema.parse(input);
        const out = await diff(parsed.file1, parsed.file2, {
          unified: parsed.unified ?? config.diff?.unified,
          contextLines: parsed.contextLines ?? config.diff?.contextLines,
          source,
        });
        return textResult(out || "(no differences)");
      }

      case "cmp": {
        const parsed = CmpSchema.parse(input);
        return jsonResult(
          await cmp(parsed.file1, parsed.file2, { silent: parsed.silent, source }),
        );
      }

      case "comm": {
        const parsed = TwoFileSchema.parse(input);
        return jsonResult(await comm(parsed.file1, parsed.file2, { source }));
      }

      case "wc": {
        const parsed = WcSchema.parse(input);
        return jsonResult(await wc(parsed.path, { ...parsed, source }));
      }

      case "cut": {
        const parsed = CutSchema.parse(input);
        return textResult(
          await cut(parsed.path, {
            ...parsed,
            delimiter: parsed.delimiter ?? config.cut?.delimiter,
            source,
          }),
        );
      }

      case "paste": {
        const parsed = PasteSchema.parse(input);
        return textResult(
          await paste(parsed.paths, {
            delimiter: parsed.delimiter ?? config.paste?.delimiter,
            source,
          }),
        );
      }

      case "join": {
        const parsed = JoinSchema.parse(input);
        return textResult(
          await join(parsed.file1, parsed.file2, {
            field1: parsed.field1,
            field2: parsed.field2,
            separator: parsed.separator ?? config.join?.separator,
            source,
          }),
        );
      }

      case "cat": {
        const parsed = CatSchema.parse(input);
        return textResult(contentToText(await cat(parsed.paths, { ...parsed, source })));
      }

      case "head": {
        const parsed = HeadSchema.parse(input);
        return textResult(
          contentToText(await head(parsed.path, {
            lines: parsed.lines ?? config.head?.lines,
            bytes: parsed.bytes,
            source,
          })),
        );
      }

      case "tail": {
        const parsed = TailSchema.parse(input);
        return textResult(
          contentToText(await tail(parsed.path, {
            lines: parsed.lines ?? config.tail?.lines,
            bytes: parsed.bytes,
            fromLine: parsed.fromLine,
            source,
          })),
        );
      }

      default:
        return errorResult(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof LineKitError) {
      return errorResult(formatError(error));
    }

    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) =>
        `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
      );
      return errorResult(formatError({
        code: "INVALID_ARGUMENTS",
        message: `Invalid arguments for ${name}: ${issues.join("; ")}`,
      }));
    }

    return errorResult(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Create an MCP server answering tools/list and tools/call
 */
export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    {
      name: NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: [...TOOLS] };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return await handleToolCall(name, args, ctx);
  });

  return server;
}

export interface StartServerOptions {
  /** Base directory for relative paths and the project config */
  cwd?: string;
  logger?: Logger;
}

/**
 * Load configuration and serve tools over stdio
 */
export async function startServer(options: StartServerOptions = {}): Promise<Server> {
  const cwd = options.cwd ?? process.cwd();
  let logger = options.logger ?? createLogger();
  const config = await loadConfig(cwd, { logger });
  if (!options.logger && config.verbose) {
    logger = createLogger({ verbose: true });
  }

  const server = createServer({ config, source: createFsLineSource({ cwd }) });

  // Connect via stdio
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(`MCP server ${VERSION} started`);
  logger.debug(`cwd: ${cwd}`);
  return server;
}

// Run if this is the main module
if (isMainModule(import.meta.url)) {
  startServer().catch((error: unknown) => {
    console.error(
      "[linekit] error: failed to start server:",
      error instanceof Error ? error.message : error,
    );
    process.exit(1);
  });
}
