/**
 * Public view of a node in a Tree.
 *
 * A SyntaxNode pairs a shared Subtree with the absolute position it has in
 * one particular Tree. Hidden nodes never surface here: their children are
 * reported as children of the nearest visible ancestor.
 */

import type { Language } from "../language/language.js";
import { lengthAdd, lengthToPoint, type Length, type Point, type Range } from "./length.js";
import type { Subtree } from "./subtree.js";
import type { Tree } from "./tree.js";
import { TreeCursor } from "./cursor.js";

export interface ChildEntry {
  subtree: Subtree;
  /** Absolute position of the child's padding start */
  position: Length;
  fieldId: number | null;
}

interface HiddenFrame {
  subtree: Subtree;
  index: number;
  position: Length;
  slot: number;
  inheritedField: number | null;
}

/**
 * Visible children of `subtree` in order, descending through hidden
 * children. A field assigned to a hidden child applies to the visible
 * nodes inside it unless the hidden child's own production says otherwise.
 */
export function* visibleChildren(
  language: Language,
  subtree: Subtree,
  position: Length
): Generator<ChildEntry> {
  const stack: HiddenFrame[] = [
    { subtree, index: 0, position, slot: 0, inheritedField: null },
  ];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;
    const child = frame.subtree.children[frame.index];
    if (!child) {
      stack.pop();
      continue;
    }
    const childPosition = frame.position;
    const field = child.isExtra
      ? null
      : language.fieldForSlot(frame.subtree.productionId, frame.slot) ?? frame.inheritedField;
    frame.index++;
    frame.position = lengthAdd(frame.position, child.total);
    if (!child.isExtra) frame.slot++;

    if (child.visible) {
      yield { subtree: child, position: childPosition, fieldId: field };
    } else if (child.visibleChildCount > 0) {
      stack.push({
        subtree: child,
        index: 0,
        position: childPosition,
        slot: 0,
        inheritedField: field,
      });
    }
  }
}

export class SyntaxNode {
  private parentCache: SyntaxNode | null | undefined;

  constructor(
    readonly tree: Tree,
    /** @internal */
    readonly subtree: Subtree,
    /** @internal Absolute position of the padding start */
    readonly position: Length,
    parent?: SyntaxNode | null
  ) {
    this.parentCache = parent;
  }

  private get isRoot(): boolean {
    return this.subtree === this.tree.root && this.position.bytes === 0;
  }

  private get language(): Language {
    return this.tree.language;
  }

  /** Stable for a given subtree; nodes shared between trees keep their id */
  get id(): number {
    return this.subtree.id;
  }

  get typeId(): number {
    return this.subtree.symbol;
  }

  get type(): string {
    return this.language.symbolName(this.subtree.symbol);
  }

  get isNamed(): boolean {
    return this.subtree.named;
  }

  get isExtra(): boolean {
    return this.subtree.isExtra;
  }

  get isMissing(): boolean {
    return this.subtree.isMissing;
  }

  get isError(): boolean {
    return this.subtree.isError;
  }

  get hasError(): boolean {
    return this.subtree.hasError;
  }

  get hasChanges(): boolean {
    return this.subtree.hasChanges;
  }

  get startByte(): number {
    if (this.isRoot) return 0;
    return this.position.bytes + this.subtree.padding.bytes;
  }

  get endByte(): number {
    return this.position.bytes + this.subtree.total.bytes;
  }

  get startPosition(): Point {
    if (this.isRoot) return { row: 0, column: 0 };
    return lengthToPoint(lengthAdd(this.position, this.subtree.padding));
  }

  get endPosition(): Point {
    return lengthToPoint(lengthAdd(this.position, this.subtree.total));
  }

  get range(): Range {
    return {
      startIndex: this.startByte,
      endIndex: this.endByte,
      startPosition: this.startPosition,
      endPosition: this.endPosition,
    };
  }

  get text(): string {
    return this.tree.getText(this.startByte, this.endByte);
  }

  get childCount(): number {
    return this.subtree.visibleChildCount;
  }

  get namedChildCount(): number {
    return this.subtree.namedChildCount;
  }

  private entries(): Generator<ChildEntry> {
    this.tree.assertAlive();
    return visibleChildren(this.language, this.subtree, this.position);
  }

  private wrap(entry: ChildEntry): SyntaxNode {
    return new SyntaxNode(this.tree, entry.subtree, entry.position, this);
  }

  get children(): SyntaxNode[] {
    return [...this.entries()].map((e) => this.wrap(e));
  }

  get namedChildren(): SyntaxNode[] {
    return [...this.entries()].filter((e) => e.subtree.named).map((e) => this.wrap(e));
  }

  child(index: number): SyntaxNode | null {
    if (index < 0) return null;
    let i = 0;
    for (const entry of this.entries()) {
      if (i++ === index) return this.wrap(entry);
    }
    return null;
  }

  namedChild(index: number): SyntaxNode | null {
    if (index < 0) return null;
    let i = 0;
    for (const entry of this.entries()) {
      if (!entry.subtree.named) continue;
      if (i++ === index) return this.wrap(entry);
    }
    return null;
  }

  get firstChild(): SyntaxNode | null {
    return this.child(0);
  }

  get lastChild(): SyntaxNode | null {
    return this.child(this.childCount - 1);
  }

  get firstNamedChild(): SyntaxNode | null {
    return this.namedChild(0);
  }

  get lastNamedChild(): SyntaxNode | null {
    return this.namedChild(this.namedChildCount - 1);
  }

  childForFieldName(name: string): SyntaxNode | null {
    const fieldId = this.language.fieldIdForName(name);
    return fieldId === null ? null : this.childForFieldId(fieldId);
  }

  childForFieldId(fieldId: number): SyntaxNode | null {
    for (const entry of this.entries()) {
      if (entry.fieldId === fieldId) return this.wrap(entry);
    }
    return null;
  }

  childrenForFieldName(name: string): SyntaxNode[] {
    const fieldId = this.language.fieldIdForName(name);
    if (fieldId === null) return [];
    return [...this.entries()].filter((e) => e.fieldId === fieldId).map((e) => this.wrap(e));
  }

  fieldNameForChild(index: number): string | null {
    let i = 0;
    for (const entry of this.entries()) {
      if (i++ === index) {
        return entry.fieldId === null ? null : this.language.fieldNameForId(entry.fieldId);
      }
    }
    return null;
  }

  get parent(): SyntaxNode | null {
    if (this.parentCache === undefined) this.parentCache = this.findParent();
    return this.parentCache;
  }

  private findParent(): SyntaxNode | null {
    if (this.isRoot) return null;
    const search = (node: SyntaxNode): SyntaxNode | null => {
      for (const entry of visibleChildren(this.language, node.subtree, node.position)) {
        if (entry.subtree === this.subtree && entry.position.bytes === this.position.bytes) {
          return node;
        }
        const start = entry.position.bytes;
        const end = start + entry.subtree.total.bytes;
        if (start <= this.position.bytes && this.endByte <= end && entry.subtree.visibleChildCount > 0) {
          const found = search(new SyntaxNode(this.tree, entry.subtree, entry.position, node));
          if (found) return found;
        }
      }
      return null;
    };
    return search(this.tree.rootNode);
  }

  private siblings(): SyntaxNode[] {
    return this.parent?.children ?? [];
  }

  private indexIn(siblings: SyntaxNode[]): number {
    return siblings.findIndex((s) => s.equals(this));
  }

  get nextSibling(): SyntaxNode | null {
    const siblings = this.siblings();
    return siblings[this.indexIn(siblings) + 1] ?? null;
  }

  get previousSibling(): SyntaxNode | null {
    const siblings = this.siblings();
    const index = this.indexIn(siblings);
    return index > 0 ? siblings[index - 1] ?? null : null;
  }

  get nextNamedSibling(): SyntaxNode | null {
    const siblings = this.siblings();
    return siblings.slice(this.indexIn(siblings) + 1).find((s) => s.isNamed) ?? null;
  }

  get previousNamedSibling(): SyntaxNode | null {
    const siblings = this.siblings();
    const index = this.indexIn(siblings);
    if (index <= 0) return null;
    const before = siblings.slice(0, index).filter((s) => s.isNamed);
    return before[before.length - 1] ?? null;
  }

  /** First child that ends after `byte` */
  firstChildForByte(byte: number): SyntaxNode | null {
    for (const child of this.children) {
      if (child.endByte > byte) return child;
    }
    return null;
  }

  firstNamedChildForByte(byte: number): SyntaxNode | null {
    for (const child of this.namedChildren) {
      if (child.endByte > byte) return child;
    }
    return null;
  }

  /** Smallest node that spans `[start, end]` */
  descendantForByteRange(start: number, end = start): SyntaxNode {
    return this.descend(start, end, false);
  }

  namedDescendantForByteRange(start: number, end = start): SyntaxNode {
    return this.descend(start, end, true);
  }

  private descend(start: number, end: number, namedOnly: boolean): SyntaxNode {
    let node: SyntaxNode = this;
    let best: SyntaxNode = this;
    for (;;) {
      const next = node.children.find(
        (c) => c.startByte <= start && c.endByte >= end && c.endByte > start
      );
      if (!next) return best;
      node = next;
      if (!namedOnly || next.isNamed) best = next;
    }
  }

  descendantsOfType(types: string | string[], start = 0, end = Infinity): SyntaxNode[] {
    const wanted = new Set(Array.isArray(types) ? types : [types]);
    const found: SyntaxNode[] = [];
    const cursor = this.walk();
    let done = false;
    while (!done) {
      const node = cursor.currentNode;
      if (node.endByte >= start && node.startByte <= end) {
        if (wanted.has(node.type) && !node.equals(this)) found.push(node);
        if (cursor.gotoFirstChild()) continue;
      }
      while (!cursor.gotoNextSibling()) {
        if (!cursor.gotoParent()) {
          done = true;
          break;
        }
      }
    }
    return found;
  }

  walk(): TreeCursor {
    return new TreeCursor(this.tree, this);
  }

  equals(other: SyntaxNode): boolean {
    return (
      this.tree === other.tree &&
      this.subtree === other.subtree &&
      this.position.bytes === other.position.bytes
    );
  }

  /**
   * S-expression of the named structure, e.g.
   * `(source_file (pair key: (identifier) value: (number)))`.
   */
  toString(): string {
    const parts: string[] = [];
    const write = (node: SyntaxNode, field: string | null): void => {
      if (field) parts.push(`${field}: `);
      if (node.isMissing) {
        const name = node.isNamed ? node.type : `"${node.type}"`;
        parts.push(`(MISSING ${name})`);
        return;
      }
      parts.push(`(${node.type}`);
      for (const entry of node.entries()) {
        if (!entry.subtree.named && !entry.subtree.isMissing) continue;
        parts.push(" ");
        const childField =
          entry.fieldId === null ? null : this.language.fieldNameForId(entry.fieldId);
        write(node.wrap(entry), childField);
      }
      parts.push(")");
    };
    write(this, null);
    return parts.join("");
  }
}
