#!/usr/bin/env node
/**
 * Sylvan MCP Server - incremental syntax trees over stdio
 *
 * Opens one document at a time, parses it with a registered grammar and
 * keeps the tree current as edits arrive, so queries, highlights and
 * folds always reflect the latest text.
 *
 * SESSION LIFECYCLE:
 * - Sessions auto-expire after inactivity (default: 10 minutes)
 * - Loading a new document closes the previous session
 * - Explicit syntax_close tool for cleanup
 *
 * Usage:
 *   1. syntax_load - Open a document (starts session)
 *   2. syntax_edit - Apply edits; the tree is reparsed incrementally
 *   3. syntax_tree / syntax_query / syntax_highlight / syntax_folds
 *   4. syntax_close - End session
 */

import { loadConfig } from "./config.js";
import { createSyntaxServer } from "./mcp-server.js";
import { getVersion } from "./version.js";

async function main() {
  // Handle version flag
  if (process.argv.includes("-v") || process.argv.includes("--version")) {
    console.log(`sylvan-mcp v${getVersion()}`);
    process.exit(0);
  }

  const server = createSyntaxServer({ config: await loadConfig() });

  // Cleanup on exit
  process.on("SIGINT", () => {
    server.close("process interrupted");
    process.exit(0);
  });

  process.on("SIGTERM", () => {
    server.close("process terminated");
    process.exit(0);
  });

  await server.start();
}

main().catch((err) => {
  console.error("[Sylvan] Fatal error:", err);
  process.exit(1);
});
