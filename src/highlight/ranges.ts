/**
 * Fold and indent ranges.
 *
 * A ranges query names one main capture (`@fold` or `@indent`) and may
 * narrow it with `@start` and `@end`. Each match yields one range: the
 * span of its main captures, with the bounds replaced by the `@start` and
 * `@end` nodes where present.
 */

import { RangesQueryError } from "../errors.js";
import type { Language } from "../language/language.js";
import { Query } from "../query/query.js";
import type { QueryCursorOptions, QueryOptions } from "../query/types.js";
import type { Point, Range } from "../tree/length.js";
import type { SyntaxNode } from "../tree/node.js";

export interface RangesOptions extends QueryCursorOptions {
  /**
   * Take the inside of the delimiters: the range starts where `@start`
   * ends and ends where `@end` starts.
   */
  inner?: boolean;
}

export interface MatchedRange {
  patternIndex: number;
  range: Range;
}

export interface FoldRange {
  range: Range;
  /** `#set! fold.text "..."`: placeholder shown while collapsed */
  collapsedText: string | null;
  /** `#set! fold.collapsed`: fold when the document opens */
  collapsed: boolean;
}

interface Bound {
  index: number;
  position: Point;
}

export class RangesQuery {
  readonly query: Query;
  private readonly mainCapture: number;
  private readonly startCapture: number | null;
  private readonly endCapture: number | null;

  /**
   * @throws QueryCompileError when the source does not compile
   * @throws RangesQueryError when `@mainCapture` is absent or a pattern
   *   uses `@start` or `@end` more than once
   */
  constructor(language: Language, source: string, mainCapture: string, options: QueryOptions = {}) {
    this.query = new Query(language, source, options);
    const main = this.query.captureIndexForName(mainCapture);
    if (main < 0) {
      throw new RangesQueryError("missing_capture", `Query has no @${mainCapture} capture`);
    }
    this.mainCapture = main;
    const start = this.query.captureIndexForName("start");
    const end = this.query.captureIndexForName("end");
    this.startCapture = start < 0 ? null : start;
    this.endCapture = end < 0 ? null : end;

    for (let i = 0; i < this.query.patternCount; i++) {
      const counts = this.query.captureCountsForPattern(i);
      for (const [id, name] of [
        [start, "start"],
        [end, "end"],
      ] as const) {
        if ((counts.get(id) ?? 0) > 1) {
          throw new RangesQueryError(
            "duplicate_capture",
            `Pattern ${i} captures @${name} more than once`
          );
        }
      }
    }
  }

  /** One range per match, in match order */
  collect(node: SyntaxNode, options: RangesOptions = {}): MatchedRange[] {
    const inner = options.inner ?? false;
    const ranges: MatchedRange[] = [];
    for (const match of this.query.matches(node, options)) {
      let start: Bound | null = null;
      let end: Bound | null = null;
      for (const capture of match.captures) {
        if (capture.captureId !== this.mainCapture) continue;
        const n = capture.node;
        if (!start || n.startByte < start.index) {
          start = { index: n.startByte, position: n.startPosition };
        }
        if (!end || n.endByte > end.index) {
          end = { index: n.endByte, position: n.endPosition };
        }
      }
      for (const capture of match.captures) {
        const n = capture.node;
        if (capture.captureId === this.startCapture) {
          start = inner
            ? { index: n.endByte, position: n.endPosition }
            : { index: n.startByte, position: n.startPosition };
        } else if (capture.captureId === this.endCapture) {
          end = inner
            ? { index: n.startByte, position: n.startPosition }
            : { index: n.endByte, position: n.endPosition };
        }
      }
      if (!start || !end) continue;
      ranges.push({
        patternIndex: match.patternIndex,
        range: {
          startIndex: start.index,
          endIndex: end.index,
          startPosition: start.position,
          endPosition: end.position,
        },
      });
    }
    return ranges;
  }

  /** Ranges with the pattern's fold properties attached */
  folds(node: SyntaxNode, options: RangesOptions = {}): FoldRange[] {
    return this.collect(node, options).map(({ patternIndex, range }) => {
      const properties = this.query.setPropertiesForPattern(patternIndex);
      return {
        range,
        collapsedText: properties["fold.text"] ?? null,
        collapsed: Object.hasOwn(properties, "fold.collapsed"),
      };
    });
  }
}
