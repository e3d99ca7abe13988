import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createSyntaxServer,
  type MCPToolResult,
  type SyntaxServerInstance,
  type SyntaxServerOptions,
} from "../src/mcp-server.js";
import { GRAMMARS_DIR, loadSexp, parseSexp } from "./fixtures.js";

function resultText(result: MCPToolResult): string {
  const [first] = result.content;
  return first?.type === "text" ? first.text : "";
}

describe("Syntax MCP Server", () => {
  let server: SyntaxServerInstance;
  let messages: string[];

  function createServer(options: SyntaxServerOptions = {}): SyntaxServerInstance {
    return createSyntaxServer({
      session: { languageConfigPath: null, grammarsDir: GRAMMARS_DIR },
      log: (message) => messages.push(message),
      ...options,
    });
  }

  async function call(name: string, args: Record<string, unknown> = {}): Promise<string> {
    return resultText(await server.callTool(name, args));
  }

  beforeEach(() => {
    messages = [];
    server = createServer();
  });

  afterEach(() => {
    server.close("test finished");
    vi.useRealTimers();
  });

  describe("tools", () => {
    it("should list every tool", () => {
      expect(server.name).toBe("sylvan");
      expect(server.getTools().map((tool) => tool.name)).toEqual([
        "syntax_load",
        "syntax_edit",
        "syntax_tree",
        "syntax_query",
        "syntax_highlight",
        "syntax_folds",
        "syntax_status",
        "syntax_close",
      ]);
    });

    it("should require edit arguments in the schema", () => {
      const edit = server.getTools().find((tool) => tool.name === "syntax_edit");
      expect(edit?.inputSchema.required).toEqual(["startIndex", "oldEndIndex", "newText"]);
    });

    it("should reject unknown tools", async () => {
      expect(await call("nope")).toBe("Unknown tool: nope");
    });
  });

  describe("without a session", () => {
    it("should report no session", async () => {
      expect(await call("syntax_status")).toBe("No active session");
      expect(await call("syntax_tree")).toBe("Error: No active session. Use syntax_load first.");
      expect(await call("syntax_close")).toBe("No active session to close.");
    });

    it("should require a document to load", async () => {
      expect(await call("syntax_load")).toBe("Error: filePath or content is required");
    });

    it("should report a language it cannot pick", async () => {
      expect(await call("syntax_load", { content: "(a)" })).toBe("Error: Unknown language: <string>");
      expect(await call("syntax_status")).toBe("No active session");
    });
  });

  describe("loading", () => {
    it("should load content", async () => {
      expect(await call("syntax_load", { content: "(a b)", filePath: "x.sexp" })).toBe(
        "Loaded x.sexp:\n" +
          "  Language: sexp\n" +
          "  Lines: 1\n" +
          "  Size: 0.0 KB\n" +
          "  Syntax errors: no\n" +
          "  Session timeout: 10 minutes\n\n" +
          "Ready for edits and queries. Call syntax_close when done."
      );
      expect(messages).toEqual(["Session started: x.sexp (sexp, 1 lines)"]);
    });

    it("should load a file", async () => {
      const dir = mkdtempSync(join(tmpdir(), "sylvan-mcp-"));
      try {
        const path = join(dir, "a.sx");
        writeFileSync(path, "(a\n");
        const loaded = await call("syntax_load", { filePath: path });
        expect(loaded.startsWith(`Loaded ${path}:\n  Language: sexp\n  Lines: 2\n`)).toBe(true);
        expect(loaded).toContain("  Syntax errors: yes\n");
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should close the previous session", async () => {
      await call("syntax_load", { content: "(a)", filePath: "x.sexp" });
      await call("syntax_load", { content: "(b)", filePath: "y.sexp" });
      expect(messages[1]?.startsWith("Session closed: new document loaded | Document: x.sexp |")).toBe(true);
      expect(await call("syntax_tree")).toBe(parseSexp("(b)", loadSexp()).toString());
    });
  });

  describe("with a session", () => {
    beforeEach(async () => {
      await call("syntax_load", { content: "(a b)", filePath: "x.sexp" });
    });

    it("should apply edits", async () => {
      expect(await call("syntax_edit", { startIndex: 3, oldEndIndex: 4, newText: "c" })).toBe(
        "Edit applied. Changed ranges:\n  [3, 4) 1:4-1:5"
      );
      expect(await call("syntax_tree")).toBe(parseSexp("(a c)", loadSexp()).toString());
    });

    it("should report edit errors", async () => {
      expect(await call("syntax_edit", { startIndex: 3 })).toBe(
        "Error: startIndex, oldEndIndex and newText are required"
      );
      expect(await call("syntax_edit", { startIndex: 9, oldEndIndex: 10, newText: "" })).toBe(
        "Error: Invalid edit: range [9, 10) does not fit a text of length 5"
      );
    });

    it("should list query matches", async () => {
      expect(await call("syntax_query", { query: "(identifier) @id" })).toBe(
        '2 matches:\n  [0] pattern 0\n    @id (identifier) 1:2 "a"\n  [1] pattern 0\n    @id (identifier) 1:4 "b"'
      );
      expect(await call("syntax_query", { query: "(number) @n" })).toBe("No matches.");
    });

    it("should report query errors", async () => {
      expect(await call("syntax_query", {})).toBe("Error: query is required");
      expect(await call("syntax_query", { query: "(foo) @x" })).toBe(
        "Error: Query error at 1:2 (node_type): Invalid node type foo"
      );
    });

    it("should list highlighted tokens", async () => {
      await call("syntax_load", { content: "(f 1)", filePath: "x.sexp" });
      expect(await call("syntax_highlight")).toBe(
        'Highlights (4 shown):\n  0+1 punctuation.bracket "("\n  1+1 function "f"\n  3+1 number "1"\n  4+1 punctuation.bracket ")"'
      );
      expect(await call("syntax_highlight", { limit: 2 })).toBe(
        'Highlights (2 shown):\n  0+1 punctuation.bracket "("\n  1+1 function "f"'
      );
    });

    it("should list folds", async () => {
      await call("syntax_load", { content: "(a\n  (b c))", filePath: "x.sexp" });
      expect(await call("syntax_folds")).toBe('2 folds:\n  [0, 11) 1:1-2:9 "..."\n  [5, 10) 2:3-2:8 "..."');

      await call("syntax_load", { content: "a", filePath: "x.sexp" });
      expect(await call("syntax_folds")).toBe("No foldable regions.");
    });

    it("should describe the session", async () => {
      await call("syntax_query", { query: "(identifier) @id" });
      const status = await call("syntax_status");
      expect(status.startsWith("Session active:\n  Document: x.sexp\n  Language: sexp\n")).toBe(true);
      expect(status).toContain("\n  Syntax errors: no\n");
      expect(status.endsWith("\n  Edits: 0\n  Queries: 1")).toBe(true);
    });

    it("should close with a summary", async () => {
      await call("syntax_edit", { startIndex: 3, oldEndIndex: 4, newText: "c" });
      await call("syntax_query", { query: "(identifier) @id" });
      expect(await call("syntax_close")).toBe("Closed session for x.sexp (1 edits, 1 queries)");
      expect(await call("syntax_status")).toBe("No active session");
    });
  });

  it("should expire an idle session", async () => {
    vi.useFakeTimers();
    server = createServer({ sessionTimeoutMs: 1000 });
    await call("syntax_load", { content: "(a)", filePath: "x.sexp" });

    vi.advanceTimersByTime(999);
    expect(await call("syntax_status")).not.toBe("No active session");
    vi.advanceTimersByTime(1);
    expect(await call("syntax_status")).toBe("No active session");
    expect(messages).toContain("Session expired after 1s inactivity");
  });
});
