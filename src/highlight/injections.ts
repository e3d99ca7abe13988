/**
 * Language injections.
 *
 * An injection query marks regions of a document that hold text in another
 * language: `@injection.content` captures the region, and the language
 * comes from `#set! injection.language "name"` or from the text of an
 * `@injection.language` or `@injection.mimetype` capture.
 */

import { InjectionQueryError } from "../errors.js";
import type { Language } from "../language/language.js";
import { Query } from "../query/query.js";
import type { CaptureOffset, QueryOptions, TextProvider } from "../query/types.js";
import { pointAtByte } from "../text/utf16.js";
import type { Range } from "../tree/length.js";
import type { Tree } from "../tree/tree.js";

export type InjectionLanguage =
  | { type: "name"; name: string }
  | { type: "mimetype"; mimetype: string };

export interface ByteRange {
  startIndex: number;
  endIndex: number;
}

export interface Injection {
  patternIndex: number;
  language: InjectionLanguage;
  /** From the start of the first content range to the end of the last */
  enclosingRange: ByteRange;
  /** Content ranges, after `#offset!` adjustments */
  ranges: Range[];
  combined: boolean;
  includeChildren: boolean;
}

export interface InjectionCollectOptions {
  textProvider?: TextProvider;
}

interface PatternInfo {
  language: string | null;
  combined: boolean;
  includeChildren: boolean;
  offsets: ReadonlyMap<number, CaptureOffset>;
}

/** Bytes of context kept on each side of a requested range */
const RANGE_MARGIN = 2;

function applyOffset(range: Range, offset: CaptureOffset | undefined, source: string | null): Range {
  if (!offset) return range;
  const startIndex = Math.max(0, range.startIndex + offset.start);
  const endIndex = Math.max(startIndex, range.endIndex + offset.end);
  if (source !== null) {
    return {
      startIndex,
      endIndex,
      startPosition: pointAtByte(source, startIndex),
      endPosition: pointAtByte(source, endIndex),
    };
  }
  // Without the text, assume the shift stays on the same line.
  return {
    startIndex,
    endIndex,
    startPosition: {
      row: range.startPosition.row,
      column: Math.max(0, range.startPosition.column + (startIndex - range.startIndex)),
    },
    endPosition: {
      row: range.endPosition.row,
      column: Math.max(0, range.endPosition.column + (endIndex - range.endIndex)),
    },
  };
}

export class InjectionQuery {
  readonly query: Query;
  private readonly contentCapture: number;
  private readonly languageCapture: number | null;
  private readonly mimetypeCapture: number | null;
  private readonly patterns: PatternInfo[] = [];

  /**
   * @throws QueryCompileError when the source does not compile
   * @throws InjectionQueryError when captures or directives are unusable
   */
  constructor(language: Language, source: string, options: QueryOptions = {}) {
    this.query = new Query(language, source, options);
    const content = this.query.captureIndexForName("injection.content");
    if (content < 0) {
      throw new InjectionQueryError("missing_capture", "Query has no @injection.content capture");
    }
    this.contentCapture = content;
    const languageCapture = this.query.captureIndexForName("injection.language");
    const mimetypeCapture = this.query.captureIndexForName("injection.mimetype");
    this.languageCapture = languageCapture < 0 ? null : languageCapture;
    this.mimetypeCapture = mimetypeCapture < 0 ? null : mimetypeCapture;

    for (let i = 0; i < this.query.patternCount; i++) {
      this.patterns.push(this.readPattern(i));
    }
  }

  private readPattern(index: number): PatternInfo {
    const counts = this.query.captureCountsForPattern(index);
    const languageUses =
      (this.languageCapture === null ? 0 : counts.get(this.languageCapture) ?? 0) +
      (this.mimetypeCapture === null ? 0 : counts.get(this.mimetypeCapture) ?? 0);
    if (languageUses > 1) {
      throw new InjectionQueryError(
        "duplicate_capture",
        "More than one @injection.language or @injection.mimetype capture",
        index
      );
    }

    const info: PatternInfo = {
      language: null,
      combined: false,
      includeChildren: false,
      offsets: this.query.captureOffsetsForPattern(index),
    };
    for (const { key, value } of this.query.propertySettingsForPattern(index)) {
      switch (key) {
        case "injection.language":
          if (value === null) {
            throw new InjectionQueryError("invalid_property", `Invalid property "${key}"`, index);
          }
          if (info.language !== null) {
            throw new InjectionQueryError(
              "language_conflict",
              `Conflicting languages "${info.language}" and "${value}"`,
              index
            );
          }
          info.language = value;
          break;
        case "injection.combined":
        case "injection.include-children":
          if (value !== null) {
            throw new InjectionQueryError("invalid_property", `Invalid property "${key}"`, index);
          }
          if (key === "injection.combined") info.combined = true;
          else info.includeChildren = true;
          break;
      }
    }
    for (const predicate of this.query.predicatesForPattern(index)) {
      if (predicate.operator.endsWith("!")) {
        throw new InjectionQueryError(
          "invalid_predicate",
          `Invalid predicate "${predicate.operator}"`,
          index
        );
      }
    }
    return info;
  }

  /**
   * Injections intersecting `ranges`, each range widened by a couple of
   * bytes. One injection is kept per enclosing range; a later match
   * replaces an earlier one.
   */
  collect(
    tree: Tree,
    ranges: readonly ByteRange[],
    options: InjectionCollectOptions = {}
  ): Injection[] {
    const source = tree.hasText ? tree.text : null;
    const injections: Injection[] = [];
    const byRange = new Map<string, number>();
    const root = tree.rootNode;

    for (const requested of ranges) {
      const matches = this.query.matches(root, {
        startIndex: Math.max(0, requested.startIndex - RANGE_MARGIN),
        endIndex: requested.endIndex + RANGE_MARGIN,
        textProvider: options.textProvider,
      });
      for (const match of matches) {
        const info = this.patterns[match.patternIndex];
        if (!info) continue;
        const contentRanges: Range[] = [];
        let captured: InjectionLanguage | null = null;
        for (const capture of match.captures) {
          const range = applyOffset(capture.node.range, info.offsets.get(capture.captureId), source);
          if (capture.captureId === this.contentCapture) {
            contentRanges.push(range);
          } else if (capture.captureId === this.languageCapture) {
            captured = { type: "name", name: tree.getText(range.startIndex, range.endIndex) };
          } else if (capture.captureId === this.mimetypeCapture) {
            captured = { type: "mimetype", mimetype: tree.getText(range.startIndex, range.endIndex) };
          }
        }
        const first = contentRanges[0];
        const last = contentRanges[contentRanges.length - 1];
        if (!first || !last) continue;
        const language: InjectionLanguage | null =
          info.language !== null ? { type: "name", name: info.language } : captured;
        if (!language) continue;

        const enclosingRange = { startIndex: first.startIndex, endIndex: last.endIndex };
        const injection: Injection = {
          patternIndex: match.patternIndex,
          language,
          enclosingRange,
          ranges: contentRanges,
          combined: info.combined,
          includeChildren: info.includeChildren,
        };
        const key = `${enclosingRange.startIndex}:${enclosingRange.endIndex}`;
        const existing = byRange.get(key);
        if (existing === undefined) {
          byRange.set(key, injections.length);
          injections.push(injection);
        } else {
          injections[existing] = injection;
        }
      }
    }
    return injections;
  }
}
