/**
 * An immutable syntax tree.
 *
 * Trees never change after the parser returns them. `edit` builds a new
 * Tree that shares every subtree outside the edited region, so the old
 * tree stays usable alongside the new one.
 */

import { ReleasedHandleError } from "../errors.js";
import type { Language } from "../language/language.js";
import { changedRanges } from "./changed-ranges.js";
import { TreeCursor } from "./cursor.js";
import { editSubtree, validateEdit, type Edit } from "./edit.js";
import { lengthToPoint, ZERO_LENGTH, type Range } from "./length.js";
import { SyntaxNode } from "./node.js";
import type { Subtree } from "./subtree.js";

const decoder = new TextDecoder();

export class Tree {
  private released = false;

  constructor(
    /** @internal */
    readonly root: Subtree,
    readonly language: Language,
    private readonly source: Uint8Array | null
  ) {}

  assertAlive(): void {
    if (this.released) throw new ReleasedHandleError("Tree");
    this.language.assertAlive();
  }

  get rootNode(): SyntaxNode {
    this.assertAlive();
    return new SyntaxNode(this, this.root, ZERO_LENGTH, null);
  }

  /** Length of the source in bytes */
  get length(): number {
    return this.root.total.bytes;
  }

  /** Whether node text is available; edited trees no longer hold their text */
  get hasText(): boolean {
    return this.source !== null;
  }

  get text(): string {
    return this.getText(0, this.length);
  }

  getText(startByte: number, endByte: number): string {
    if (!this.source) return "";
    return decoder.decode(this.source.subarray(startByte, endByte));
  }

  walk(): TreeCursor {
    return new TreeCursor(this, this.rootNode);
  }

  /**
   * Derive a tree with `edit` applied. Subtrees outside the edit are shared
   * with this tree; this tree is left untouched.
   *
   * @throws InvalidEditRangeError when the edit does not fit this tree
   */
  edit(edit: Edit): Tree {
    this.assertAlive();
    validateEdit(edit, this.length, lengthToPoint(this.root.total));
    return new Tree(editSubtree(this.root, edit), this.language, null);
  }

  /**
   * Ranges whose syntactic structure differs between this tree and `other`.
   * This tree should be the edited old tree, so positions line up.
   */
  changedRanges(other: Tree): Range[] {
    this.assertAlive();
    other.assertAlive();
    return changedRanges(this, other);
  }

  delete(): void {
    this.released = true;
  }

  toString(): string {
    return this.rootNode.toString();
  }
}
