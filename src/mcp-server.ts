/**
 * Syntax tool server
 *
 * Exposes one SyntaxSession as MCP tools. The session is created by
 * syntax_load, kept current by syntax_edit and closed by syntax_close or
 * after a period of inactivity.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { DEFAULT_CONFIG, type Config } from "./config.js";
import {
  SyntaxSession,
  type HighlightSpan,
  type SyntaxSessionOptions,
} from "./engine/syntax-session.js";
import type { Range } from "./tree/length.js";
import { getVersion } from "./version.js";

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type MCPToolResult = CallToolResult;

export interface SyntaxServerOptions {
  config?: Config;
  /** Passed to every session the server opens */
  session?: Omit<SyntaxSessionOptions, "config">;
  /** Idle time before the open session is closed */
  sessionTimeoutMs?: number;
  /** Where lifecycle messages go; stdout belongs to the transport */
  log?: (message: string) => void;
}

export interface SyntaxServerInstance {
  name: string;
  getTools(): MCPTool[];
  callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult>;
  /** Close the open session, if any */
  close(reason: string): void;
  start(): Promise<void>;
}

export const SESSION_TIMEOUT_MS = 10 * 60 * 1000; // 10 minutes
const DEFAULT_HIGHLIGHT_LIMIT = 200;

function buildTools(sessionTimeoutMs: number): MCPTool[] {
  return [
    {
      name: "syntax_load",
      description: `Open a document and parse it. Starts a new session (closes any existing session).

The language is picked from the file extension unless "language" is given.
Pass "content" to parse text directly; "filePath" then only names it.

SESSION: Document stays loaded for ${sessionTimeoutMs / 60000} minutes.
Call syntax_close when done.`,
      inputSchema: {
        type: "object",
        properties: {
          filePath: {
            type: "string",
            description: "Path to the document to parse",
          },
          content: {
            type: "string",
            description: "Document text, instead of reading filePath",
          },
          language: {
            type: "string",
            description: "Registered language name (e.g., \"sexp\")",
          },
        },
      },
    },
    {
      name: "syntax_edit",
      description: `Replace a span of the document and reparse incrementally.

Indices are UTF-16 offsets into the current text: text[startIndex, oldEndIndex)
is replaced by newText. Returns the ranges whose syntax changed.`,
      inputSchema: {
        type: "object",
        properties: {
          startIndex: { type: "number", description: "Start of the replaced span" },
          oldEndIndex: { type: "number", description: "End of the replaced span" },
          newText: { type: "string", description: "Replacement text" },
        },
        required: ["startIndex", "oldEndIndex", "newText"],
      },
    },
    {
      name: "syntax_tree",
      description: "Show the current syntax tree as an S-expression of named nodes.",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "syntax_query",
      description: `Run a tree query against the document and list its matches.

Example: (pair key: (identifier) @key value: (number) @value)
Predicates such as (#eq? @key "name") and (#match? @key "^a") are supported.`,
      inputSchema: {
        type: "object",
        properties: {
          query: { type: "string", description: "Query source" },
        },
        required: ["query"],
      },
    },
    {
      name: "syntax_highlight",
      description: "List highlight tokens (capture name per span) of the document or a UTF-16 range of it.",
      inputSchema: {
        type: "object",
        properties: {
          startIndex: { type: "number", description: "Start of the range (default: 0)" },
          endIndex: { type: "number", description: "End of the range (default: end of text)" },
          limit: {
            type: "number",
            description: `Maximum tokens to list (default: ${DEFAULT_HIGHLIGHT_LIMIT})`,
          },
        },
      },
    },
    {
      name: "syntax_folds",
      description: "List foldable regions of the document with their collapsed text.",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "syntax_status",
      description: "Get current session status: document, language, edits and queries.",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "syntax_close",
      description: "Close the session and release the document.",
      inputSchema: { type: "object", properties: {} },
    },
  ];
}

function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function numberArg(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === "number" ? value : undefined;
}

const text = (value: string): MCPToolResult => ({ content: [{ type: "text", text: value }] });

const NO_SESSION = "Error: No active session. Use syntax_load first.";

export function formatRange(range: Range): string {
  const { startPosition: s, endPosition: e } = range;
  return `[${range.startIndex}, ${range.endIndex}) ${s.row + 1}:${s.column + 1}-${e.row + 1}:${e.column + 1}`;
}

export function formatSpans(spans: HighlightSpan[], source: string, limit: number): string {
  const lines = spans
    .filter((span) => span.capture !== null)
    .slice(0, limit)
    .map((span) => {
      const snippet = JSON.stringify(source.slice(span.start, span.start + span.length));
      return `  ${span.start}+${span.length} ${span.capture} ${snippet}`;
    });
  if (lines.length === 0) return "No highlighted tokens in range.";
  return `Highlights (${lines.length} shown):\n${lines.join("\n")}`;
}

/**
 * Create a syntax tool server for testing or direct use
 */
export function createSyntaxServer(options: SyntaxServerOptions = {}): SyntaxServerInstance {
  const config = options.config ?? DEFAULT_CONFIG;
  const sessionTimeoutMs = options.sessionTimeoutMs ?? SESSION_TIMEOUT_MS;
  const log = options.log ?? ((message: string) => console.error(`[Sylvan] ${message}`));
  const tools = buildTools(sessionTimeoutMs);

  let session: SyntaxSession | null = null;
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;

  function closeSession(reason: string): void {
    if (session) {
      const info = session.getSessionInfo();
      const duration = info.loadedAt ? Date.now() - info.loadedAt.getTime() : 0;
      log(
        `Session closed: ${reason} | ` +
          `Document: ${info.documentPath} | ` +
          `Duration: ${Math.round(duration / 1000)}s | ` +
          `Edits: ${info.editCount} | ` +
          `Queries: ${info.queryCount}`
      );
      session.close();
      session = null;
    }

    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
      timeoutHandle = null;
    }
  }

  function resetInactivityTimer(): void {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }

    timeoutHandle = setTimeout(() => {
      if (session) {
        log(`Session expired after ${sessionTimeoutMs / 1000}s inactivity`);
        closeSession("timeout");
      }
    }, sessionTimeoutMs);
    timeoutHandle.unref();
  }

  function describeSession(): string {
    if (!session || !session.isLoaded()) {
      return "No active session";
    }

    const info = session.getSessionInfo();
    const stats = session.getStats();
    const now = Date.now();
    const age = info.loadedAt ? Math.round((now - info.loadedAt.getTime()) / 1000) : 0;
    const idle = info.lastAccessedAt ? Math.round((now - info.lastAccessedAt.getTime()) / 1000) : 0;
    const timeout = Math.round((sessionTimeoutMs - idle * 1000) / 1000);

    return `Session active:
  Document: ${info.documentPath}
  Language: ${info.language}
  Size: ${(stats.bytes / 1024).toFixed(1)} KB
  Syntax errors: ${stats.hasErrors ? "yes" : "no"}
  Age: ${age}s
  Idle: ${idle}s
  Timeout in: ${Math.max(0, timeout)}s
  Edits: ${info.editCount}
  Queries: ${info.queryCount}`;
  }

  async function load(args: Record<string, unknown>): Promise<MCPToolResult> {
    const filePath = stringArg(args, "filePath");
    const content = stringArg(args, "content");
    const language = stringArg(args, "language");
    if (filePath === undefined && content === undefined) {
      return text("Error: filePath or content is required");
    }

    // Close existing session
    if (session) {
      closeSession("new document loaded");
    }

    const next = new SyntaxSession({ log, ...options.session, config });
    const stats =
      content !== undefined
        ? next.loadContent(content, filePath, language)
        : await next.loadFile(filePath ?? "", language);
    session = next;

    resetInactivityTimer();

    log(`Session started: ${stats.path} (${stats.language}, ${stats.lineCount} lines)`);

    return text(
      `Loaded ${stats.path}:\n` +
        `  Language: ${stats.language}\n` +
        `  Lines: ${stats.lineCount.toLocaleString("en-US")}\n` +
        `  Size: ${(stats.bytes / 1024).toFixed(1)} KB\n` +
        `  Syntax errors: ${stats.hasErrors ? "yes" : "no"}\n` +
        `  Session timeout: ${sessionTimeoutMs / 60000} minutes\n\n` +
        `Ready for edits and queries. Call syntax_close when done.`
    );
  }

  function run(current: SyntaxSession, name: string, args: Record<string, unknown>): MCPToolResult {
    switch (name) {
      case "syntax_edit": {
        const startIndex = numberArg(args, "startIndex");
        const oldEndIndex = numberArg(args, "oldEndIndex");
        const newText = stringArg(args, "newText");
        if (startIndex === undefined || oldEndIndex === undefined || newText === undefined) {
          return text("Error: startIndex, oldEndIndex and newText are required");
        }

        const changes = current.edit(startIndex, oldEndIndex, newText);
        if (changes.length === 0) {
          return text("Edit applied. Syntax unchanged.");
        }
        return text(`Edit applied. Changed ranges:\n${changes.map((r) => `  ${formatRange(r)}`).join("\n")}`);
      }

      case "syntax_tree":
        return text(current.tree());

      case "syntax_query": {
        const source = stringArg(args, "query");
        if (!source) {
          return text("Error: query is required");
        }

        const result = current.query(source);
        if (!result.success) {
          return text(`Error: ${result.error}`);
        }
        const matches = result.matches ?? [];
        if (matches.length === 0) {
          return text("No matches.");
        }
        const lines = matches.map((match, i) => {
          const captures = match.captures.map(
            (c) =>
              `    @${c.name} (${c.type}) ${c.startPosition.row + 1}:${c.startPosition.column + 1} ${JSON.stringify(c.text)}`
          );
          return [`  [${i}] pattern ${match.patternIndex}`, ...captures].join("\n");
        });
        return text(`${matches.length} matches:\n${lines.join("\n")}`);
      }

      case "syntax_highlight": {
        const spans = current.highlight({
          startIndex: numberArg(args, "startIndex"),
          endIndex: numberArg(args, "endIndex"),
        });
        return text(formatSpans(spans, current.text, numberArg(args, "limit") ?? DEFAULT_HIGHLIGHT_LIMIT));
      }

      case "syntax_folds": {
        const folds = current.folds();
        if (folds.length === 0) {
          return text("No foldable regions.");
        }
        const lines = folds.map(
          (fold) => `  ${formatRange(fold.range)}${fold.collapsedText !== null ? ` "${fold.collapsedText}"` : ""}`
        );
        return text(`${folds.length} folds:\n${lines.join("\n")}`);
      }

      case "syntax_close": {
        const info = current.getSessionInfo();
        const summary = `Closed session for ${info.documentPath} (${info.editCount} edits, ${info.queryCount} queries)`;
        closeSession("explicit close");
        return text(summary);
      }

      default:
        return text(`Unknown tool: ${name}`);
    }
  }

  return {
    name: "sylvan",

    getTools(): MCPTool[] {
      return tools;
    },

    async callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult> {
      try {
        if (name === "syntax_load") return await load(args);
        if (name === "syntax_status") return text(describeSession());
        if (!tools.some((tool) => tool.name === name)) return text(`Unknown tool: ${name}`);

        if (!session?.isLoaded()) {
          return text(name === "syntax_close" ? "No active session to close." : NO_SESSION);
        }
        if (name !== "syntax_close") resetInactivityTimer();
        return run(session, name, args);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return text(`Error: ${message}`);
      }
    },

    close(reason: string): void {
      closeSession(reason);
    },

    async start(): Promise<void> {
      const server = new Server(
        { name: "sylvan", version: getVersion() },
        { capabilities: { tools: {} } }
      );

      server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools,
      }));

      server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return this.callTool(name, args ?? {});
      });

      const transport = new StdioServerTransport();
      await server.connect(transport);

      log("MCP server started");
      log(`Session timeout: ${sessionTimeoutMs / 1000}s`);
      log(`Max document size: ${config.documents.maxDocumentBytes / 1024 / 1024}MB`);
    },
  };
}
