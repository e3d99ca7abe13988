/**
 * SyntaxDocument - text, parser and tree kept in step.
 *
 * Edits are given the way editors describe them, as UTF-16 indices into
 * the current text. The document turns them into byte and point edits,
 * reparses incrementally and reports what changed.
 */

import { InvalidEditRangeError } from "../errors.js";
import { highlightTokens } from "../highlight/highlight.js";
import type { ByteRange, Injection } from "../highlight/injections.js";
import type { FoldRange, MatchedRange } from "../highlight/ranges.js";
import type { Language } from "../language/language.js";
import type { ParseLogger } from "../parser/logger.js";
import { Parser, type ParserOptions } from "../parser/parser.js";
import type { LanguageEntry } from "../registry/registry.js";
import { advanceByBytes, byteOffsetAt, pointAt, utf16IndexAt } from "../text/utf16.js";
import type { Edit } from "../tree/edit.js";
import type { Range } from "../tree/length.js";
import type { Tree } from "../tree/tree.js";

export interface SyntaxDocumentOptions {
  parser?: ParserOptions;
  timeoutMs?: number;
  logger?: ParseLogger;
}

/** Highlight tokens measured in UTF-16 code units */
export interface DocumentHighlights {
  start: number;
  tokens: Array<{ kindId: number; captureId: number | null; length: number }>;
}

/** A UTF-16 range of the document text */
export interface TextRange {
  startIndex?: number;
  endIndex?: number;
}

/**
 * Build the byte and point edit replacing `text[startIndex, oldEndIndex)`
 * with `newText`.
 *
 * @throws InvalidEditRangeError when the indices do not fit `text`
 */
export function buildEdit(text: string, startIndex: number, oldEndIndex: number, newText: string): Edit {
  if (
    !Number.isInteger(startIndex) ||
    !Number.isInteger(oldEndIndex) ||
    startIndex < 0 ||
    startIndex > oldEndIndex ||
    oldEndIndex > text.length
  ) {
    throw new InvalidEditRangeError(
      `range [${startIndex}, ${oldEndIndex}) does not fit a text of length ${text.length}`
    );
  }
  const updated = text.slice(0, startIndex) + newText + text.slice(oldEndIndex);
  const start = byteOffsetAt(text, startIndex);
  return {
    startIndex: start,
    oldEndIndex: byteOffsetAt(text, oldEndIndex),
    newEndIndex: byteOffsetAt(updated, startIndex + newText.length),
    startPosition: pointAt(text, startIndex),
    oldEndPosition: pointAt(text, oldEndIndex),
    newEndPosition: pointAt(updated, startIndex + newText.length),
  };
}

export class SyntaxDocument {
  readonly language: Language;
  /** Registry entry, when the document was opened through one */
  readonly entry: LanguageEntry | null;
  private currentText: string;
  private currentTree: Tree;
  private readonly parser: Parser;
  /** Document this one was derived from by `withEdit`, and the edit */
  private origin: { document: SyntaxDocument; edit: Edit } | null = null;

  constructor(
    language: Language | LanguageEntry,
    text: string,
    private readonly options: SyntaxDocumentOptions = {}
  ) {
    if ("language" in language) {
      this.language = language.language;
      this.entry = language;
    } else {
      this.language = language;
      this.entry = null;
    }
    this.parser = new Parser(options.parser).setLanguage(this.language);
    if (options.timeoutMs !== undefined) this.parser.setTimeoutMs(options.timeoutMs);
    if (options.logger) this.parser.setLogger(options.logger);
    this.currentText = text;
    this.currentTree = this.parser.parse(text);
  }

  get text(): string {
    return this.currentText;
  }

  get tree(): Tree {
    return this.currentTree;
  }

  /**
   * Replace `text[startIndex, oldEndIndex)` with `newText` and reparse.
   *
   * @returns ranges whose syntax changed, in byte offsets of the new text
   */
  applyEdit(startIndex: number, oldEndIndex: number, newText: string): Range[] {
    const edit = buildEdit(this.currentText, startIndex, oldEndIndex, newText);
    const edited = this.currentTree.edit(edit);
    const text = this.currentText.slice(0, startIndex) + newText + this.currentText.slice(oldEndIndex);
    const tree = this.parser.parse(text, edited);
    const changes = edited.changedRanges(tree);
    this.currentText = text;
    this.currentTree = tree;
    this.origin = null;
    return changes;
  }

  /**
   * A copy of this document with an edit applied. This document is left
   * as it is.
   */
  withEdit(startIndex: number, oldEndIndex: number, newText: string): SyntaxDocument {
    const edit = buildEdit(this.currentText, startIndex, oldEndIndex, newText);
    const text = this.currentText.slice(0, startIndex) + newText + this.currentText.slice(oldEndIndex);
    const copy = new SyntaxDocument(this.entry ?? this.language, "", this.options);
    copy.currentText = text;
    copy.currentTree = copy.parser.parse(text, this.currentTree.edit(edit));
    copy.origin = { document: this, edit };
    return copy;
  }

  /**
   * Ranges whose syntax differs between `old` and this document. Exact
   * when this document came from `old` by `withEdit`; otherwise the trees
   * are compared position by position.
   */
  changedRanges(old: SyntaxDocument): Range[] {
    const base =
      this.origin?.document === old ? old.currentTree.edit(this.origin.edit) : old.currentTree;
    return base.changedRanges(this.currentTree);
  }

  private byteRange(range: TextRange): { startIndex: number; endIndex: number } {
    return {
      startIndex: byteOffsetAt(this.currentText, range.startIndex ?? 0),
      endIndex: byteOffsetAt(this.currentText, range.endIndex ?? this.currentText.length),
    };
  }

  /**
   * Highlight tokens covering a UTF-16 range, or null when the language
   * has no highlights query.
   */
  highlight(range: TextRange = {}): DocumentHighlights | null {
    const query = this.entry?.highlights;
    if (!query) return null;
    const result = highlightTokens(this.currentTree, query, this.byteRange(range));
    const start = utf16IndexAt(this.currentText, result.start);
    let index = start;
    const tokens = result.tokens.map((token) => {
      const next = advanceByBytes(this.currentText, index, token.length);
      const length = next - index;
      index = next;
      return { kindId: token.kindId, captureId: token.captureId, length };
    });
    return { start, tokens };
  }

  /** Fold ranges, empty when the language has no folds query */
  folds(range: TextRange = {}, inner = false): FoldRange[] {
    return this.entry?.folds?.folds(this.currentTree.rootNode, { ...this.byteRange(range), inner }) ?? [];
  }

  /** Indent ranges, empty when the language has no indents query */
  indents(range: TextRange = {}, inner = false): MatchedRange[] {
    return (
      this.entry?.indents?.collect(this.currentTree.rootNode, { ...this.byteRange(range), inner }) ?? []
    );
  }

  /**
   * Injections within the given byte ranges, or the whole document
   */
  injections(ranges?: readonly ByteRange[]): Injection[] {
    const query = this.entry?.injections;
    if (!query) return [];
    return query.collect(this.currentTree, ranges ?? [{ startIndex: 0, endIndex: this.currentTree.length }]);
  }

  delete(): void {
    this.parser.delete();
    this.currentTree.delete();
  }
}
