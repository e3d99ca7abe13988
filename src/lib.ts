/**
 * Sylvan Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Languages
export {
  Language,
  loadLanguage,
  LANGUAGE_VERSION,
  MIN_COMPATIBLE_LANGUAGE_VERSION,
  END_SYMBOL,
  ERROR_SYMBOL,
  type LoadLanguageOptions,
} from "./language/language.js";
export type { ExternalScanner, LanguageBlob, ScannerLexer } from "./language/types.js";

// Parsing
export { Parser, type ParseOptions, type ParserOptions } from "./parser/parser.js";
export { createConsoleLogger, type LogType, type ParseLogger } from "./parser/logger.js";
export type { ParseInput, ReadCallback } from "./lexer/input.js";

// Trees
export { Tree } from "./tree/tree.js";
export { SyntaxNode } from "./tree/node.js";
export { TreeCursor } from "./tree/cursor.js";
export type { Edit } from "./tree/edit.js";
export type { Point, Range } from "./tree/length.js";

// Queries
export * from "./query/index.js";

// Editor features
export * from "./highlight/index.js";
export * from "./registry/index.js";
export * from "./document/index.js";

// Session
export * from "./engine/index.js";

// Configuration
export {
  loadConfig,
  DEFAULT_CONFIG,
  type Config,
  type DocumentConfig,
  type ParserConfig,
} from "./config.js";
export {
  loadLanguageConfig,
  saveLanguageConfig,
  addCustomLanguage,
  removeCustomLanguage,
  registerConfiguredLanguages,
  CONFIG_DIR,
  CONFIG_FILE,
  EXAMPLE_CONFIG,
  type LanguageConfig,
  type SylvanConfigFile,
} from "./config/language-config.js";

// Text offsets
export { byteOffsetAt, utf16IndexAt, utf8Length } from "./text/utf16.js";

// Errors
export * from "./errors.js";

// Tool server
export {
  createSyntaxServer,
  SESSION_TIMEOUT_MS,
  type MCPTool,
  type MCPToolResult,
  type SyntaxServerInstance,
  type SyntaxServerOptions,
} from "./mcp-server.js";
