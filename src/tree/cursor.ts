/**
 * Stateful navigation over a Tree.
 *
 * The cursor keeps a stack of frames for every subtree between its start
 * node and the current node, hidden ones included, so moving around never
 * searches from the root. Hidden frames are passed through transparently.
 *
 * A cursor borrows its Tree. Every operation checks that the Tree and its
 * Language are still alive and throws ReleasedHandleError otherwise.
 */

import { ReleasedHandleError } from "../errors.js";
import { lengthAdd, type Length } from "./length.js";
import { SyntaxNode } from "./node.js";
import type { Subtree } from "./subtree.js";
import type { Tree } from "./tree.js";

interface CursorFrame {
  subtree: Subtree;
  position: Length;
  /** Index in the parent's children */
  childIndex: number;
  /** Index among the parent's non-extra children */
  slot: number;
}

export class TreeCursor {
  private stack: CursorFrame[];
  private released = false;

  constructor(
    readonly tree: Tree,
    node: SyntaxNode
  ) {
    this.stack = [{ subtree: node.subtree, position: node.position, childIndex: 0, slot: 0 }];
  }

  private assertAlive(): void {
    if (this.released) throw new ReleasedHandleError("TreeCursor");
    this.tree.assertAlive();
  }

  private get top(): CursorFrame {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) throw new ReleasedHandleError("TreeCursor");
    return frame;
  }

  /** A frame counts as visible when it is the cursor's start node or a visible node */
  private isVisibleAt(index: number): boolean {
    const frame = this.stack[index];
    return index === 0 || (frame !== undefined && frame.subtree.visible);
  }

  get currentNode(): SyntaxNode {
    this.assertAlive();
    const frame = this.top;
    return new SyntaxNode(this.tree, frame.subtree, frame.position);
  }

  /** Depth of the current node below the start node, counting visible nodes */
  get currentDepth(): number {
    let depth = 0;
    for (let i = 1; i < this.stack.length; i++) {
      if (this.isVisibleAt(i)) depth++;
    }
    return depth;
  }

  get currentFieldId(): number | null {
    this.assertAlive();
    const language = this.tree.language;
    for (let i = this.stack.length - 1; i > 0; i--) {
      const frame = this.stack[i];
      const parent = this.stack[i - 1];
      if (!frame || !parent) break;
      if (!frame.subtree.isExtra) {
        const field = language.fieldForSlot(parent.subtree.productionId, frame.slot);
        if (field !== null) return field;
      }
      if (this.isVisibleAt(i - 1)) break;
    }
    return null;
  }

  get currentFieldName(): string | null {
    const field = this.currentFieldId;
    return field === null ? null : this.tree.language.fieldNameForId(field);
  }

  /**
   * Push the first child of the top frame that is visible or has visible
   * descendants, scanning from `fromIndex` in the given direction.
   * Returns "visible", "hidden" or null when nothing qualifies.
   */
  private pushChild(fromIndex: number, step: 1 | -1): "visible" | "hidden" | null {
    const parent = this.top;
    const children = parent.subtree.children;
    const offsets = parent.subtree.childOffsets();
    for (let i = fromIndex; i >= 0 && i < children.length; i += step) {
      const child = children[i];
      const offset = offsets[i];
      if (!child || !offset) continue;
      if (!child.visible && child.visibleChildCount === 0) continue;
      this.stack.push({
        subtree: child,
        position: lengthAdd(parent.position, offset),
        childIndex: i,
        slot: slotOf(parent.subtree, i),
      });
      return child.visible ? "visible" : "hidden";
    }
    return null;
  }

  private descendToVisible(step: 1 | -1): boolean {
    for (;;) {
      const children = this.top.subtree.children;
      const result = this.pushChild(step === 1 ? 0 : children.length - 1, step);
      if (result === null) return false;
      if (result === "visible") return true;
    }
  }

  gotoFirstChild(): boolean {
    this.assertAlive();
    const saved = this.stack.length;
    if (this.descendToVisible(1)) return true;
    this.stack.length = saved;
    return false;
  }

  gotoLastChild(): boolean {
    this.assertAlive();
    const saved = this.stack.length;
    if (this.descendToVisible(-1)) return true;
    this.stack.length = saved;
    return false;
  }

  private gotoSibling(step: 1 | -1): boolean {
    this.assertAlive();
    const saved = [...this.stack];
    while (this.stack.length > 1) {
      const frame = this.stack.pop();
      if (!frame) break;
      const result = this.pushChild(frame.childIndex + step, step);
      if (result === "visible") return true;
      if (result === "hidden") {
        if (this.descendToVisible(step)) return true;
        break;
      }
      if (this.isVisibleAt(this.stack.length - 1)) break;
    }
    this.stack = saved;
    return false;
  }

  gotoNextSibling(): boolean {
    return this.gotoSibling(1);
  }

  gotoPreviousSibling(): boolean {
    return this.gotoSibling(-1);
  }

  gotoParent(): boolean {
    this.assertAlive();
    for (let i = this.stack.length - 2; i >= 0; i--) {
      if (this.isVisibleAt(i)) {
        this.stack.length = i + 1;
        return true;
      }
    }
    return false;
  }

  /**
   * Move to the first child that ends after `byte`. Children are located by
   * binary search over their cached offsets. Returns the child's index
   * among the visible children, or -1 when there is none.
   */
  gotoFirstChildForByte(byte: number): number {
    this.assertAlive();
    const saved = this.stack.length;
    let from = this.firstChildEndingAfter(byte);
    for (;;) {
      const pushed = this.pushChild(from, 1);
      if (pushed === "visible") return this.visibleIndexFrom(saved);
      if (pushed === "hidden") {
        from = this.firstChildEndingAfter(byte);
        continue;
      }
      // A hidden frame with nothing left past `byte`: resume after it
      if (this.stack.length === saved) return -1;
      const frame = this.stack.pop();
      if (!frame) return -1;
      from = frame.childIndex + 1;
    }
  }

  /** Index of the top frame's first child whose extent ends after `byte` */
  private firstChildEndingAfter(byte: number): number {
    const parent = this.top;
    const children = parent.subtree.children;
    const offsets = parent.subtree.childOffsets();
    const base = parent.position.bytes;

    let low = 0;
    let high = children.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      const child = children[mid];
      const offset = offsets[mid];
      if (child && offset && base + offset.bytes + child.total.bytes <= byte) low = mid + 1;
      else high = mid;
    }
    return low;
  }

  /** Visible index of the top frame among the children of frame `depth - 1` */
  private visibleIndexFrom(depth: number): number {
    let index = 0;
    for (let i = depth; i < this.stack.length; i++) {
      const frame = this.stack[i];
      const parent = this.stack[i - 1];
      if (frame && parent) index += visibleCountBefore(parent.subtree, frame.childIndex);
    }
    return index;
  }

  /**
   * Descend to the smallest node containing `byte`. Returns false when the
   * cursor's current node does not contain it after the move.
   */
  seekToByte(byte: number): boolean {
    this.assertAlive();
    for (;;) {
      const saved = [...this.stack];
      if (this.gotoFirstChildForByte(byte) < 0) break;
      if (this.currentNode.startByte > byte) {
        this.stack = saved;
        break;
      }
    }
    const node = this.currentNode;
    return node.startByte <= byte && byte < node.endByte;
  }

  reset(node: SyntaxNode): void {
    this.assertAlive();
    this.stack = [{ subtree: node.subtree, position: node.position, childIndex: 0, slot: 0 }];
  }

  copy(): TreeCursor {
    this.assertAlive();
    const copy = new TreeCursor(this.tree, this.currentNode);
    copy.stack = this.stack.map((frame) => ({ ...frame }));
    return copy;
  }

  delete(): void {
    this.released = true;
  }
}

function slotOf(parent: Subtree, index: number): number {
  let slot = 0;
  for (let i = 0; i < index; i++) {
    if (!parent.children[i]?.isExtra) slot++;
  }
  return slot;
}

function visibleCountBefore(parent: Subtree, index: number): number {
  let count = 0;
  for (let i = 0; i < index; i++) {
    const child = parent.children[i];
    if (!child) continue;
    if (child.visible) count++;
    else if (child.children.length > 0) count += child.visibleChildCount;
  }
  return count;
}
