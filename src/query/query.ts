/**
 * Compiled queries.
 *
 * A Query is immutable once constructed and may be run against any number
 * of trees built from its language.
 */

import { ReleasedHandleError } from "../errors.js";
import type { Language } from "../language/language.js";
import type { SyntaxNode } from "../tree/node.js";
import { captureCounts, compilePattern } from "./compiler.js";
import { compilePredicates } from "./predicates.js";
import { parseQuery, queryError } from "./query-parser.js";
import type { CompiledPattern } from "./query-cursor.js";
import { runQuery } from "./query-cursor.js";
import type {
  CaptureOffset,
  Properties,
  PropertySetting,
  QueryCapture,
  QueryCursorOptions,
  QueryMatch,
  QueryOptions,
  QueryPredicate,
} from "./types.js";

const encoder = new TextEncoder();

export class Query {
  readonly captureNames: readonly string[];
  private readonly patterns: readonly CompiledPattern[];
  private released = false;

  /**
   * @throws QueryCompileError when the source does not compile against `language`
   */
  constructor(
    readonly language: Language,
    readonly source: string,
    options: QueryOptions = {}
  ) {
    language.assertAlive();
    const captureNames: string[] = [];
    const parsed = parseQuery(source, language, captureNames);
    const custom = options.predicates ?? {};
    this.patterns = parsed.map((pattern) => ({
      steps: compilePattern(pattern),
      captureCounts: captureCounts(pattern.item),
      startIndex: encoder.encode(source.slice(0, pattern.offset)).length,
      arrivals: new Map(),
      ...compilePredicates(pattern.predicates, custom, (reason, offset) =>
        queryError(source, "predicate", reason, offset)
      ),
    }));
    this.captureNames = captureNames;
  }

  private assertAlive(): void {
    if (this.released) throw new ReleasedHandleError("Query");
    this.language.assertAlive();
  }

  private pattern(index: number): CompiledPattern {
    const pattern = this.patterns[index];
    if (!pattern) throw new RangeError(`Pattern index ${index} out of range`);
    return pattern;
  }

  get patternCount(): number {
    return this.patterns.length;
  }

  /** -1 when the query has no such capture */
  captureIndexForName(name: string): number {
    return this.captureNames.indexOf(name);
  }

  /** Byte offset of a pattern within the query source */
  startIndexForPattern(index: number): number {
    return this.pattern(index).startIndex;
  }

  /** Predicates the query engine does not evaluate itself */
  predicatesForPattern(index: number): readonly QueryPredicate[] {
    return this.pattern(index).generalPredicates;
  }

  setPropertiesForPattern(index: number): Properties {
    return this.pattern(index).setProperties;
  }

  /** `#set!` directives in source order, including repeated keys */
  propertySettingsForPattern(index: number): readonly PropertySetting[] {
    return this.pattern(index).propertySettings;
  }

  /**
   * How many times each capture appears in a pattern. Alternatives count
   * once, by their largest use.
   */
  captureCountsForPattern(index: number): ReadonlyMap<number, number> {
    return this.pattern(index).captureCounts;
  }

  assertedPropertiesForPattern(index: number): Properties {
    return this.pattern(index).assertedProperties;
  }

  refutedPropertiesForPattern(index: number): Properties {
    return this.pattern(index).refutedProperties;
  }

  /** `#offset!` adjustments keyed by capture id */
  captureOffsetsForPattern(index: number): ReadonlyMap<number, CaptureOffset> {
    return this.pattern(index).captureOffsets;
  }

  /**
   * Lazily match every pattern below `node`. Matches come out ordered by
   * the start of their first node, then by pattern index.
   */
  matches(node: SyntaxNode, options: QueryCursorOptions = {}): Generator<QueryMatch> {
    this.assertAlive();
    if (node.tree.language !== this.language) {
      throw new Error(
        `Query for "${this.language.name}" cannot run on a "${node.tree.language.name}" tree`
      );
    }
    return runQuery({ patterns: this.patterns, captureNames: this.captureNames }, node, options);
  }

  /** Every capture of every match, in document order */
  captures(node: SyntaxNode, options: QueryCursorOptions = {}): QueryCapture[] {
    const captures: QueryCapture[] = [];
    for (const match of this.matches(node, options)) captures.push(...match.captures);
    return captures.sort(
      (a, b) =>
        a.node.startByte - b.node.startByte ||
        b.node.endByte - a.node.endByte ||
        a.patternIndex - b.patternIndex ||
        a.captureId - b.captureId
    );
  }

  delete(): void {
    this.released = true;
  }
}
