/**
 * Forward-only walk over an edited old tree, offering subtrees that start
 * at the parser's current position.
 */

import { END_SYMBOL } from "../language/language.js";
import type { LexMode } from "../language/types.js";
import type { Subtree } from "../tree/subtree.js";

interface ReuseFrame {
  subtree: Subtree;
  /** Absolute byte offset of the padding start */
  position: number;
  childIndex: number;
}

export class ReusableNodes {
  private stack: ReuseFrame[];

  constructor(root: Subtree) {
    this.stack = [{ subtree: root, position: 0, childIndex: 0 }];
  }

  /**
   * Subtrees starting exactly at `position`, largest first. Each entry is
   * the first child of the one before it, so they share a first leaf.
   * The root is never offered.
   */
  candidatesAt(position: number): Subtree[] {
    for (;;) {
      const top = this.stack[this.stack.length - 1];
      if (!top) return [];
      const isRoot = this.stack.length === 1;
      const start = top.position;
      const end = start + top.subtree.total.bytes;
      if (!isRoot && (end <= position || end === start)) {
        this.advance();
      } else if (isRoot || start < position) {
        if (top.subtree.children.length > 0) this.descend();
        else this.advance();
      } else if (start > position) {
        return [];
      } else {
        break;
      }
    }

    const chain: Subtree[] = [];
    let node = this.stack[this.stack.length - 1]?.subtree;
    while (node && node.total.bytes > 0 && node.symbol !== END_SYMBOL) {
      chain.push(node);
      node = node.children[0];
    }
    return chain;
  }

  private descend(): void {
    const top = this.stack[this.stack.length - 1];
    const child = top?.subtree.children[0];
    if (!top || !child) return;
    this.stack.push({ subtree: child, position: top.position, childIndex: 0 });
  }

  private advance(): void {
    while (this.stack.length > 1) {
      const frame = this.stack.pop();
      const parent = this.stack[this.stack.length - 1];
      if (!frame || !parent) break;
      const nextIndex = frame.childIndex + 1;
      const next = parent.subtree.children[nextIndex];
      if (next) {
        this.stack.push({
          subtree: next,
          position: frame.position + frame.subtree.total.bytes,
          childIndex: nextIndex,
        });
        return;
      }
    }
    // Exhausted: nothing more to offer.
    this.stack = [];
  }
}

export function sameLexMode(a: LexMode | null, b: LexMode): boolean {
  return a !== null && a.lexState === b.lexState && a.externalState === b.externalState;
}

/**
 * Whether a subtree from the old tree can stand in for freshly parsed
 * input.
 */
export function isReusable(subtree: Subtree): boolean {
  return !subtree.hasChanges && !subtree.hasError && subtree.symbol !== END_SYMBOL;
}
