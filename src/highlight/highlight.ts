/**
 * Highlight tokens.
 *
 * Splits a byte range of a document into consecutive tokens, each tagged
 * with the kind of the innermost node covering it and the innermost
 * highlight capture around it. Tokens cover the range with no gaps, so a
 * client can paint them by walking lengths.
 */

import type { Query } from "../query/query.js";
import type { TextProvider } from "../query/types.js";
import type { SyntaxNode } from "../tree/node.js";
import type { Tree } from "../tree/tree.js";

export interface HighlightToken {
  /** Symbol id of the node the token belongs to */
  kindId: number;
  /** Highlight capture around the token, or null for plain text */
  captureId: number | null;
  /** Length in bytes */
  length: number;
}

export interface HighlightResult {
  /** Byte offset of the first token; at or before the requested start */
  start: number;
  tokens: HighlightToken[];
}

export interface HighlightOptions {
  startIndex?: number;
  endIndex?: number;
  textProvider?: TextProvider;
}

interface Highlight {
  captureId: number;
  patternIndex: number;
}

const rangeKey = (node: SyntaxNode): string => `${node.startByte}:${node.endByte}`;
const nodeKey = (node: SyntaxNode): string => `${node.id}:${node.startByte}`;

/**
 * Capture per node range. When several captures cover the same range the
 * highest pattern index wins; captures named `_...` are skipped.
 */
function collectHighlights(
  tree: Tree,
  query: Query,
  startIndex: number,
  endIndex: number,
  textProvider: TextProvider | undefined
): Map<string, Highlight> {
  const highlights = new Map<string, Highlight>();
  for (const capture of query.captures(tree.rootNode, { startIndex, endIndex, textProvider })) {
    if (capture.name.startsWith("_")) continue;
    const key = rangeKey(capture.node);
    const existing = highlights.get(key);
    if (existing && capture.patternIndex < existing.patternIndex) continue;
    highlights.set(key, { captureId: capture.captureId, patternIndex: capture.patternIndex });
  }
  return highlights;
}

export function highlightTokens(
  tree: Tree,
  query: Query,
  options: HighlightOptions = {}
): HighlightResult {
  const startIndex = options.startIndex ?? 0;
  const endIndex = options.endIndex ?? tree.length;
  const highlights = collectHighlights(tree, query, startIndex, endIndex, options.textProvider);

  const active: Array<{ key: string; captureId: number }> = [];
  const enter = (node: SyntaxNode): void => {
    const highlight = highlights.get(rangeKey(node));
    if (highlight) active.push({ key: nodeKey(node), captureId: highlight.captureId });
  };
  const tokens: HighlightToken[] = [];
  const emit = (node: SyntaxNode, length: number): void => {
    tokens.push({
      kindId: node.typeId,
      captureId: active[active.length - 1]?.captureId ?? null,
      length,
    });
  };

  const cursor = tree.walk();
  const parents: SyntaxNode[] = [];
  let node = cursor.currentNode;
  enter(node);
  while (cursor.gotoFirstChildForByte(startIndex) >= 0) {
    parents.push(node);
    node = cursor.currentNode;
    enter(node);
  }

  const start = node.startByte;
  let current = start;
  while (current < endIndex) {
    if (current < node.endByte) {
      if (cursor.gotoFirstChild()) {
        const child = cursor.currentNode;
        if (child.startByte > current) {
          emit(node, child.startByte - current);
          current = child.startByte;
        }
        parents.push(node);
        node = child;
        enter(node);
      } else {
        emit(node, node.endByte - current);
        current = node.endByte;
      }
      continue;
    }

    if (active[active.length - 1]?.key === nodeKey(node)) active.pop();
    if (cursor.gotoNextSibling()) {
      const sibling = cursor.currentNode;
      const parent = parents[parents.length - 1];
      if (parent && sibling.startByte > current) {
        emit(parent, sibling.startByte - current);
        current = sibling.startByte;
      }
      node = sibling;
      enter(node);
    } else if (cursor.gotoParent()) {
      node = parents.pop() ?? cursor.currentNode;
      if (node.endByte > current) {
        emit(node, node.endByte - current);
        current = node.endByte;
      }
    } else {
      break;
    }
  }
  cursor.delete();
  return { start, tokens };
}
