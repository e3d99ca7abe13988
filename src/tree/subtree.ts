/**
 * Immutable tree storage shared between tree versions.
 *
 * Positions are relative: each subtree records the whitespace before it
 * (`padding`) and its own extent (`size`). A subtree can therefore be
 * placed anywhere in a new tree without rewriting it, which is what lets
 * edits share every untouched subtree.
 */

import { ERROR_SYMBOL, type Language } from "../language/language.js";
import type { LexMode } from "../language/types.js";
import { lengthAdd, lengthSub, ZERO_LENGTH, type Length } from "./length.js";

let nextSubtreeId = 1;

export interface SubtreeFields {
  symbol: number;
  padding: Length;
  size: Length;
  children: readonly Subtree[];
  productionId: number;
  parseState: number;
  lexMode: LexMode | null;
  lookaheadBytes: number;
  visible: boolean;
  named: boolean;
  extra: boolean;
  missing: boolean;
  hasChanges: boolean;
}

export class Subtree {
  readonly id: number;
  readonly symbol: number;
  readonly padding: Length;
  readonly size: Length;
  readonly children: readonly Subtree[];
  /** Production that built this node; -1 for leaves */
  readonly productionId: number;
  /** Parser state on the stack below this node */
  readonly parseState: number;
  /** Lex mode a leaf was read in; null for interior nodes */
  readonly lexMode: LexMode | null;
  /** Bytes past the end that influenced how this subtree was built */
  readonly lookaheadBytes: number;
  readonly visible: boolean;
  readonly named: boolean;
  readonly isExtra: boolean;
  readonly isMissing: boolean;
  readonly hasChanges: boolean;
  readonly hasError: boolean;
  /** Visible children after flattening hidden ones */
  readonly visibleChildCount: number;
  readonly namedChildCount: number;
  /** Non-extra leaves; the price of discarding this subtree */
  readonly tokenCount: number;

  private cachedTotal: Length | null = null;
  private cachedOffsets: Length[] | null = null;

  constructor(fields: SubtreeFields) {
    this.id = nextSubtreeId++;
    this.symbol = fields.symbol;
    this.padding = fields.padding;
    this.size = fields.size;
    this.children = fields.children;
    this.productionId = fields.productionId;
    this.parseState = fields.parseState;
    this.lexMode = fields.lexMode;
    this.lookaheadBytes = fields.lookaheadBytes;
    this.visible = fields.visible;
    this.named = fields.named;
    this.isExtra = fields.extra;
    this.isMissing = fields.missing;
    this.hasChanges = fields.hasChanges;

    let hasError = fields.symbol === ERROR_SYMBOL || fields.missing;
    let visibleChildCount = 0;
    let namedChildCount = 0;
    let tokenCount = this.children.length === 0 && !fields.extra && !fields.missing ? 1 : 0;
    for (const child of this.children) {
      if (child.hasError) hasError = true;
      if (child.visible) {
        visibleChildCount++;
        if (child.named) namedChildCount++;
      } else if (child.children.length > 0) {
        visibleChildCount += child.visibleChildCount;
        namedChildCount += child.namedChildCount;
      }
      tokenCount += child.tokenCount;
    }
    this.hasError = hasError;
    this.visibleChildCount = visibleChildCount;
    this.namedChildCount = namedChildCount;
    this.tokenCount = tokenCount;
  }

  get total(): Length {
    if (!this.cachedTotal) this.cachedTotal = lengthAdd(this.padding, this.size);
    return this.cachedTotal;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  get isError(): boolean {
    return this.symbol === ERROR_SYMBOL;
  }

  /** Byte where the dependency range of this subtree ends, relative to its start */
  get dependencyEnd(): number {
    return this.total.bytes + this.lookaheadBytes;
  }

  /**
   * Where each child starts relative to this subtree's padding start.
   * Computed once and cached since subtrees never change.
   */
  childOffsets(): readonly Length[] {
    if (!this.cachedOffsets) {
      const offsets: Length[] = [];
      let offset = ZERO_LENGTH;
      for (const child of this.children) {
        offsets.push(offset);
        offset = lengthAdd(offset, child.total);
      }
      this.cachedOffsets = offsets;
    }
    return this.cachedOffsets;
  }

  /** First leaf in document order, or null when only empty nodes lead */
  firstLeaf(): Subtree | null {
    let node: Subtree = this;
    for (;;) {
      const first = node.children[0];
      if (!first) return node.productionId < 0 ? node : null;
      node = first;
    }
  }

  with(changes: Partial<SubtreeFields>): Subtree {
    return new Subtree({
      symbol: this.symbol,
      padding: this.padding,
      size: this.size,
      children: this.children,
      productionId: this.productionId,
      parseState: this.parseState,
      lexMode: this.lexMode,
      lookaheadBytes: this.lookaheadBytes,
      visible: this.visible,
      named: this.named,
      extra: this.isExtra,
      missing: this.isMissing,
      hasChanges: this.hasChanges,
      ...changes,
    });
  }
}

export interface LeafOptions {
  symbol: number;
  padding: Length;
  size: Length;
  parseState: number;
  lexMode: LexMode | null;
  lookaheadBytes: number;
  extra?: boolean;
  missing?: boolean;
}

export function createLeaf(language: Language, options: LeafOptions): Subtree {
  return new Subtree({
    symbol: options.symbol,
    padding: options.padding,
    size: options.size,
    children: [],
    productionId: -1,
    parseState: options.parseState,
    lexMode: options.lexMode,
    lookaheadBytes: options.lookaheadBytes,
    visible: language.isVisible(options.symbol),
    named: language.isNamed(options.symbol),
    extra: options.extra ?? false,
    missing: options.missing ?? false,
    hasChanges: false,
  });
}

export interface NodeOptions {
  productionId: number;
  parseState: number;
  extra?: boolean;
  /** Dependency end relative to the node's start, from the current lookahead */
  lookaheadEnd?: number;
}

/**
 * Build an interior node. Padding is taken from the first child and size
 * spans the remaining children.
 */
export function createNode(
  language: Language,
  symbol: number,
  children: readonly Subtree[],
  options: NodeOptions
): Subtree {
  let padding = ZERO_LENGTH;
  let total = ZERO_LENGTH;
  let dependencyEnd = options.lookaheadEnd ?? 0;
  const first = children[0];
  if (first) {
    padding = first.padding;
    for (const child of children) {
      dependencyEnd = Math.max(dependencyEnd, total.bytes + child.dependencyEnd);
      total = lengthAdd(total, child.total);
    }
  }
  return new Subtree({
    symbol,
    padding,
    size: lengthSub(total, padding),
    children,
    productionId: options.productionId,
    parseState: options.parseState,
    lexMode: null,
    lookaheadBytes: Math.max(0, dependencyEnd - total.bytes),
    visible: language.isVisible(symbol),
    named: language.isNamed(symbol),
    extra: options.extra ?? false,
    missing: false,
    hasChanges: false,
  });
}
