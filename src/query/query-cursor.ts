/**
 * Query execution.
 *
 * One depth-first walk over the visible nodes below the start node drives
 * every pattern at once. A partial match is a state waiting at a match
 * step for a node at a particular depth; states are dropped when the walk
 * leaves the parent they were waiting in. Completed matches are held back
 * until nothing still running could be reported before them, so results
 * come out ordered by the start of their first node, then pattern index.
 */

import { SyntaxNode } from "../tree/node.js";
import type { PatternPredicates } from "./predicates.js";
import { satisfiesPredicates } from "./predicates.js";
import type {
  QueryCapture,
  QueryCursorOptions,
  QueryMatch,
  Step,
  TextProvider,
} from "./types.js";

type MatchStep = Extract<Step, { op: "match" }>;

export interface CompiledPattern extends PatternPredicates {
  steps: readonly Step[];
  /** Byte offset of the pattern in the query source */
  startIndex: number;
  captureCounts: ReadonlyMap<number, number>;
  /** Match and done steps reachable from a step without consuming a node */
  arrivals: Map<number, readonly number[]>;
}

interface CaptureEntry {
  captureId: number;
  node: SyntaxNode;
}

interface MatchState {
  pattern: number;
  pc: number;
  rootDepth: number;
  rootStart: number;
  /** Preorder index of the node the match started at */
  rootOrder: number;
  captures: readonly CaptureEntry[];
}

interface PendingGroup {
  pattern: number;
  rootStart: number;
  rootOrder: number;
  results: Array<readonly CaptureEntry[]>;
}

/**
 * Steps reachable from `pc` by following splits and jumps. Cached per
 * pattern since programs never change.
 */
export function arrivalsFrom(pattern: CompiledPattern, pc: number): readonly number[] {
  const cached = pattern.arrivals.get(pc);
  if (cached) return cached;
  const out: number[] = [];
  const seen = new Set<number>();
  const pending = [pc];
  while (pending.length > 0) {
    const at = pending.pop();
    if (at === undefined || seen.has(at)) continue;
    seen.add(at);
    const step = pattern.steps[at];
    if (!step) continue;
    if (step.op === "split") {
      pending.push(step.targets[1], step.targets[0]);
    } else if (step.op === "jump") {
      pending.push(step.target);
    } else {
      out.push(at);
    }
  }
  pattern.arrivals.set(pc, out);
  return out;
}

function stepMatches(step: MatchStep, node: SyntaxNode, fieldId: number | null): boolean {
  const matcher = step.matcher;
  if (matcher.missing && !node.isMissing) return false;
  if (matcher.symbols) {
    if (!matcher.symbols.has(node.typeId)) return false;
  } else if (matcher.namedOnly && !node.isNamed) {
    return false;
  }
  if (step.field !== null && fieldId !== step.field) return false;
  for (const field of step.negatedFields) {
    if (node.childForFieldId(field)) return false;
  }
  return true;
}

function captureKey(entry: CaptureEntry): string {
  return `${entry.captureId}:${entry.node.id}:${entry.node.startByte}`;
}

function isSubset(a: readonly CaptureEntry[], b: readonly CaptureEntry[]): boolean {
  if (a.length > b.length) return false;
  const keys = new Set(b.map(captureKey));
  return a.every((entry) => keys.has(captureKey(entry)));
}

function compareKeys(
  a: { rootStart: number; pattern: number; rootOrder: number },
  b: { rootStart: number; pattern: number; rootOrder: number }
): number {
  return a.rootStart - b.rootStart || a.pattern - b.pattern || a.rootOrder - b.rootOrder;
}

/**
 * Drop states that cannot add anything: a state is redundant when another
 * state of the same match, at the same step, holds every capture it holds.
 */
function pruneStates(states: readonly MatchState[]): MatchState[] {
  const byKey = new Map<string, MatchState[]>();
  const removed = new Set<MatchState>();
  const kept: MatchState[] = [];
  for (const state of states) {
    const key = `${state.pattern}:${state.rootOrder}:${state.pc}`;
    const peers = byKey.get(key) ?? [];
    if (peers.some((peer) => isSubset(state.captures, peer.captures))) continue;
    for (const peer of peers) {
      if (isSubset(peer.captures, state.captures)) removed.add(peer);
    }
    const survivors = peers.filter((peer) => !removed.has(peer));
    survivors.push(state);
    byKey.set(key, survivors);
    kept.push(state);
  }
  return kept.filter((state) => !removed.has(state));
}

/**
 * Keep only the maximal results of one group: a result whose captures are
 * all contained in another result is dropped, as are duplicates.
 */
function maximalResults(results: ReadonlyArray<readonly CaptureEntry[]>): Array<readonly CaptureEntry[]> {
  return results.filter((result, i) =>
    results.every((other, j) => {
      if (i === j || !isSubset(result, other)) return true;
      // Equal sets: keep the first one found.
      return isSubset(other, result) && i < j;
    })
  );
}

export interface QueryRunContext {
  patterns: readonly CompiledPattern[];
  captureNames: readonly string[];
}

export function* runQuery(
  context: QueryRunContext,
  start: SyntaxNode,
  options: QueryCursorOptions = {}
): Generator<QueryMatch> {
  const { patterns, captureNames } = context;
  const startIndex = options.startIndex ?? 0;
  const endIndex = options.endIndex ?? Infinity;
  const textOf: TextProvider = options.textProvider ?? ((node) => node.text);

  const intersects = (node: SyntaxNode): boolean =>
    node.startByte < endIndex &&
    (node.endByte > startIndex || (node.startByte === node.endByte && node.startByte >= startIndex));

  let live: MatchState[] = [];
  const pending = new Map<string, PendingGroup>();

  const complete = (state: MatchState, captures: readonly CaptureEntry[]): void => {
    const key = `${state.pattern}:${state.rootOrder}`;
    let group = pending.get(key);
    if (!group) {
      group = {
        pattern: state.pattern,
        rootStart: state.rootStart,
        rootOrder: state.rootOrder,
        results: [],
      };
      pending.set(key, group);
    }
    group.results.push(captures);
  };

  const advance = (state: MatchState, node: SyntaxNode, out: MatchState[]): void => {
    const pattern = patterns[state.pattern];
    const step = pattern?.steps[state.pc];
    if (!pattern || step?.op !== "match") return;
    if (step.lastChild && node.nextNamedSibling) return;
    const captures =
      step.captures.length === 0
        ? state.captures
        : [...state.captures, ...step.captures.map((captureId) => ({ captureId, node }))];
    for (const pc of arrivalsFrom(pattern, state.pc + 1)) {
      if (pattern.steps[pc]?.op === "done") complete(state, captures);
      else out.push({ ...state, pc, captures });
    }
  };

  const toMatch = (group: PendingGroup, entries: readonly CaptureEntry[]): QueryMatch => {
    const captures: QueryCapture[] = entries.map((entry) => ({
      name: captureNames[entry.captureId] ?? "",
      captureId: entry.captureId,
      node: entry.node,
      patternIndex: group.pattern,
    }));
    const captureMap = new Map<string, SyntaxNode[]>();
    for (const capture of captures) {
      const nodes = captureMap.get(capture.name);
      if (nodes) nodes.push(capture.node);
      else captureMap.set(capture.name, [capture.node]);
    }
    return {
      patternIndex: group.pattern,
      captures,
      captureMap,
      setProperties: patterns[group.pattern]?.setProperties ?? {},
    };
  };

  /** Emit groups that no running or future state can precede */
  function* flush(boundary: number): Generator<QueryMatch> {
    if (pending.size === 0) return;
    let blocker: MatchState | null = null;
    for (const state of live) {
      if (!blocker || compareKeys(state, blocker) < 0) blocker = state;
    }
    const groups = [...pending.values()].sort(compareKeys);
    for (const group of groups) {
      if (group.rootStart >= boundary) break;
      if (blocker && compareKeys(blocker, group) <= 0) break;
      pending.delete(`${group.pattern}:${group.rootOrder}`);
      const pattern = patterns[group.pattern];
      for (const entries of maximalResults(group.results)) {
        const match = toMatch(group, entries);
        if (!pattern || satisfiesPredicates(pattern.textPredicates, match, textOf)) yield match;
      }
    }
  }

  const cursor = start.walk();
  let depth = 0;
  let order = 0;
  // Visible ancestors of the current node, so sibling lookups stay local
  const ancestors: SyntaxNode[] = [];
  for (;;) {
    const visited = cursor.currentNode;
    const parent = depth === 0 ? undefined : ancestors[depth - 1];
    const node = parent ? new SyntaxNode(visited.tree, visited.subtree, visited.position, parent) : visited;
    ancestors[depth] = node;
    yield* flush(node.startByte);

    const fieldId = depth === 0 ? null : cursor.currentFieldId;
    const nodeOrder = order++;
    const next: MatchState[] = [];

    for (const state of live) {
      const step = patterns[state.pattern]?.steps[state.pc];
      if (step?.op !== "match") continue;
      const target = state.rootDepth + step.depth;
      if (depth < target) continue;
      if (depth > target) {
        next.push(state);
        continue;
      }
      if (stepMatches(step, node, fieldId)) advance(state, node, next);
      if (!(step.immediate && node.isNamed)) next.push(state);
    }

    if (intersects(node)) {
      patterns.forEach((pattern, index) => {
        for (const pc of arrivalsFrom(pattern, 0)) {
          const step = pattern.steps[pc];
          if (step?.op !== "match" || !stepMatches(step, node, null)) continue;
          const state: MatchState = {
            pattern: index,
            pc,
            rootDepth: depth,
            rootStart: node.startByte,
            rootOrder: nodeOrder,
            captures: [],
          };
          advance(state, node, next);
        }
      });
    }

    live = pruneStates(next);

    if ((intersects(node) || live.length > 0) && cursor.gotoFirstChild()) {
      depth++;
      continue;
    }
    let moved = false;
    while (depth > 0) {
      if (cursor.gotoNextSibling()) {
        moved = true;
        break;
      }
      cursor.gotoParent();
      depth--;
    }
    if (!moved) break;
    if (live.length === 0 && cursor.currentNode.startByte >= endIndex) break;
  }

  live = [];
  yield* flush(Infinity);
}
