/**
 * SyntaxSession - one open document behind the tool server
 *
 * Owns a language registry (built-in grammars plus those listed in the
 * language config), opens a document in it, and answers tree, query,
 * highlight and fold requests against the current parse.
 */

import { readFile } from "node:fs/promises";
import { DEFAULT_CONFIG, type Config } from "../config.js";
import { CONFIG_FILE, registerConfiguredLanguages } from "../config/language-config.js";
import { SyntaxDocument, type TextRange } from "../document/syntax-document.js";
import { SessionError, SylvanError, UnknownLanguageError } from "../errors.js";
import type { FoldRange } from "../highlight/ranges.js";
import { Query } from "../query/query.js";
import { registerBuiltinLanguages } from "../registry/builtin.js";
import { LanguageRegistry, type LanguageEntry } from "../registry/registry.js";
import { utf8Length } from "../text/utf16.js";
import type { Point, Range } from "../tree/length.js";

export interface SyntaxSessionOptions {
  config?: Config;
  /** Language config to read; null skips it */
  languageConfigPath?: string | null;
  /** Directory holding the built-in grammars */
  grammarsDir?: string;
  /** Receives warnings, such as a language config that failed to load */
  log?: (message: string) => void;
}

export interface DocumentStats {
  path: string;
  language: string;
  bytes: number;
  lineCount: number;
  hasErrors: boolean;
}

export interface CaptureSummary {
  name: string;
  type: string;
  text: string;
  startPosition: Point;
  endPosition: Point;
}

export interface MatchSummary {
  patternIndex: number;
  captures: CaptureSummary[];
}

/**
 * Result of running a query against the document
 */
export interface QueryResult {
  success: boolean;
  matches?: MatchSummary[];
  error?: string;
}

/** A highlight token, in UTF-16 units of the document text */
export interface HighlightSpan {
  start: number;
  length: number;
  /** Node type the token belongs to */
  kind: string;
  capture: string | null;
}

export interface SessionInfo {
  documentPath: string | null;
  language: string | null;
  loadedAt: Date | null;
  lastAccessedAt: Date | null;
  queryCount: number;
  editCount: number;
}

export class SyntaxSession {
  readonly registry = new LanguageRegistry();
  private readonly config: Config;
  private document: SyntaxDocument | null = null;
  private documentPath: string | null = null;
  private loadedAt: Date | null = null;
  private lastAccessedAt: Date | null = null;
  private queryCount = 0;
  private editCount = 0;

  constructor(options: SyntaxSessionOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    registerBuiltinLanguages(this.registry, options.grammarsDir);
    const languageConfigPath =
      options.languageConfigPath === undefined ? CONFIG_FILE : options.languageConfigPath;
    if (languageConfigPath !== null) {
      const log = options.log ?? ((message: string) => console.error(`[Sylvan] ${message}`));
      try {
        registerConfiguredLanguages(this.registry, languageConfigPath);
      } catch (error) {
        // A broken language config leaves the built-ins usable
        if (!(error instanceof SylvanError)) throw error;
        log(`Ignoring language config: ${error.message}`);
      }
    }
  }

  /**
   * Open a document from file. The language comes from `language` or the
   * file extension.
   */
  async loadFile(filePath: string, language?: string): Promise<DocumentStats> {
    const content = await readFile(filePath, "utf-8");
    return this.loadContent(content, filePath, language);
  }

  /**
   * Open a document from a string, replacing any open document
   *
   * @throws UnknownLanguageError when no language fits
   * @throws SessionError when the document is over the size limit
   */
  loadContent(content: string, path: string = "<string>", language?: string): DocumentStats {
    const entry = this.resolveLanguage(path, language);
    const bytes = utf8Length(content);
    const limit = this.config.documents.maxDocumentBytes;
    if (bytes > limit) {
      throw new SessionError(
        "document_too_large",
        `Document too large (${(bytes / 1024 / 1024).toFixed(1)}MB). ` +
          `Maximum size is ${(limit / 1024 / 1024).toFixed(1)}MB.`
      );
    }

    const document = new SyntaxDocument(entry, content, {
      parser: this.config.parser,
      timeoutMs: this.config.parser.timeoutMs,
    });
    this.document?.delete();
    this.document = document;
    this.documentPath = path;
    this.loadedAt = new Date();
    this.lastAccessedAt = this.loadedAt;
    this.queryCount = 0;
    this.editCount = 0;
    return this.getStats();
  }

  private resolveLanguage(path: string, language: string | undefined): LanguageEntry {
    if (language !== undefined) {
      const entry = this.registry.getByName(language);
      if (!entry) throw new UnknownLanguageError(language);
      return entry;
    }
    const entry = this.registry.forFile(path);
    if (!entry) throw new UnknownLanguageError(path);
    return entry;
  }

  isLoaded(): boolean {
    return this.document !== null;
  }

  private requireDocument(): SyntaxDocument {
    if (!this.document) {
      throw new SessionError("no_document", "No document loaded");
    }
    this.lastAccessedAt = new Date();
    return this.document;
  }

  getStats(): DocumentStats {
    const document = this.requireDocument();
    return {
      path: this.documentPath ?? "<string>",
      language: document.entry?.name ?? "unknown",
      bytes: utf8Length(document.text),
      lineCount: document.text.split("\n").length,
      hasErrors: document.tree.rootNode.hasError,
    };
  }

  /**
   * Replace `text[startIndex, oldEndIndex)` (UTF-16 indices) and reparse
   *
   * @returns ranges whose syntax changed
   */
  edit(startIndex: number, oldEndIndex: number, newText: string): Range[] {
    const changes = this.requireDocument().applyEdit(startIndex, oldEndIndex, newText);
    this.editCount++;
    return changes;
  }

  /** S-expression of the current tree */
  tree(): string {
    return this.requireDocument().tree.toString();
  }

  get text(): string {
    return this.requireDocument().text;
  }

  /**
   * Compile and run a query against the whole document
   */
  query(source: string): QueryResult {
    const document = this.requireDocument();
    this.queryCount++;

    let query: Query;
    try {
      query = new Query(document.language, source);
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : String(err) };
    }
    try {
      const matches: MatchSummary[] = [];
      for (const match of query.matches(document.tree.rootNode)) {
        matches.push({
          patternIndex: match.patternIndex,
          captures: match.captures.map((capture) => ({
            name: capture.name,
            type: capture.node.type,
            text: capture.node.text,
            startPosition: capture.node.startPosition,
            endPosition: capture.node.endPosition,
          })),
        });
      }
      return { success: true, matches };
    } finally {
      query.delete();
    }
  }

  /**
   * Highlight spans over a UTF-16 range
   *
   * @throws SessionError when the language has no highlights query
   */
  highlight(range: TextRange = {}): HighlightSpan[] {
    const document = this.requireDocument();
    const captureNames = document.entry?.highlights?.captureNames ?? [];
    const result = document.highlight(range);
    if (!result) {
      throw new SessionError(
        "no_highlights",
        `Language "${document.entry?.name ?? "unknown"}" has no highlights query`
      );
    }
    const spans: HighlightSpan[] = [];
    let start = result.start;
    for (const token of result.tokens) {
      spans.push({
        start,
        length: token.length,
        kind: document.language.symbolName(token.kindId),
        capture: token.captureId === null ? null : captureNames[token.captureId] ?? null,
      });
      start += token.length;
    }
    return spans;
  }

  folds(range: TextRange = {}): FoldRange[] {
    return this.requireDocument().folds(range);
  }

  getSessionInfo(): SessionInfo {
    return {
      documentPath: this.documentPath,
      language: this.document?.entry?.name ?? null,
      loadedAt: this.loadedAt,
      lastAccessedAt: this.lastAccessedAt,
      queryCount: this.queryCount,
      editCount: this.editCount,
    };
  }

  /**
   * Release the open document. The session can load another afterwards.
   */
  close(): void {
    this.document?.delete();
    this.document = null;
    this.documentPath = null;
    this.loadedAt = null;
    this.lastAccessedAt = null;
  }
}
