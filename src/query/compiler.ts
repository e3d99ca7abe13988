/**
 * Compiles pattern ASTs into step programs.
 *
 * Each pattern becomes a flat list of steps. Match steps carry the depth
 * of the node they expect relative to the pattern's first node; split and
 * jump steps encode quantifiers and alternations. The query cursor follows
 * every branch, so the order of split targets carries no preference.
 */

import type { ParsedPattern, Pattern, PatternElement, PatternItem, Step } from "./types.js";

interface Anchoring {
  immediate: boolean;
  lastChild: boolean;
}

interface Modifiers extends Anchoring {
  field: number | null;
  captures: readonly number[];
}

class StepCompiler {
  readonly steps: Step[] = [];

  private emitSplit(): { op: "split"; targets: [number, number] } {
    const step: { op: "split"; targets: [number, number] } = { op: "split", targets: [-1, -1] };
    this.steps.push(step);
    return step;
  }

  compileItem(item: PatternItem, depth: number, anchoring: Anchoring): void {
    const modifiers: Modifiers = {
      ...anchoring,
      field: item.field,
      captures: item.captures,
    };
    const body = (): void => this.compilePattern(item.pattern, depth, modifiers);

    switch (item.quantifier) {
      case null:
        body();
        break;
      case "?": {
        const split = this.emitSplit();
        split.targets[0] = this.steps.length;
        body();
        split.targets[1] = this.steps.length;
        break;
      }
      case "*": {
        const loop = this.steps.length;
        const split = this.emitSplit();
        split.targets[0] = this.steps.length;
        body();
        this.steps.push({ op: "jump", target: loop });
        split.targets[1] = this.steps.length;
        break;
      }
      case "+": {
        const start = this.steps.length;
        body();
        const split = this.emitSplit();
        split.targets[0] = start;
        split.targets[1] = this.steps.length;
        break;
      }
    }
  }

  private compilePattern(pattern: Pattern, depth: number, modifiers: Modifiers): void {
    switch (pattern.type) {
      case "node":
        this.steps.push({
          op: "match",
          depth,
          matcher: pattern.matcher,
          field: modifiers.field,
          negatedFields: pattern.negatedFields,
          captures: modifiers.captures,
          immediate: modifiers.immediate,
          lastChild: modifiers.lastChild,
        });
        this.compileElements(pattern.children, depth + 1, {
          immediate: false,
          lastChild: false,
        });
        break;

      case "group":
        this.compileElements(pattern.children, depth, modifiers);
        break;

      case "alternation": {
        const exits: Array<{ op: "jump"; target: number }> = [];
        pattern.alternatives.forEach((alternative, i) => {
          const merged: PatternItem = {
            ...alternative,
            field: alternative.field ?? modifiers.field,
            captures: [...alternative.captures, ...modifiers.captures],
          };
          if (i === pattern.alternatives.length - 1) {
            this.compileItem(merged, depth, modifiers);
            return;
          }
          const split = this.emitSplit();
          split.targets[0] = this.steps.length;
          this.compileItem(merged, depth, modifiers);
          const exit: { op: "jump"; target: number } = { op: "jump", target: -1 };
          this.steps.push(exit);
          exits.push(exit);
          split.targets[1] = this.steps.length;
        });
        for (const exit of exits) exit.target = this.steps.length;
        break;
      }
    }
  }

  /**
   * Compile a sibling sequence. A leading anchor makes the first item
   * immediate; a trailing one makes the last item the last named child.
   */
  private compileElements(elements: readonly PatternElement[], depth: number, outer: Anchoring): void {
    const items: Array<{ item: PatternItem; immediate: boolean }> = [];
    let anchored = outer.immediate;
    for (const element of elements) {
      if (element.type === "anchor") {
        anchored = true;
        continue;
      }
      items.push({ item: element.item, immediate: anchored });
      anchored = false;
    }
    const trailing = anchored || outer.lastChild;

    items.forEach(({ item, immediate }, i) => {
      this.compileItem(item, depth, {
        immediate,
        lastChild: trailing && i === items.length - 1,
      });
    });
  }
}

/**
 * Compile one pattern into its step program, ending in a `done` step.
 */
export function compilePattern(pattern: ParsedPattern): Step[] {
  const compiler = new StepCompiler();
  compiler.compileItem(pattern.item, 0, { immediate: false, lastChild: false });
  compiler.steps.push({ op: "done" });
  return compiler.steps;
}

/** Per-capture use counts of an item; alternatives contribute their maximum */
export function captureCounts(item: PatternItem): Map<number, number> {
  const counts = new Map<number, number>();
  const add = (into: Map<number, number>, from: ReadonlyMap<number, number>): void => {
    for (const [id, n] of from) into.set(id, (into.get(id) ?? 0) + n);
  };
  for (const id of item.captures) counts.set(id, (counts.get(id) ?? 0) + 1);
  const pattern = item.pattern;
  if (pattern.type === "alternation") {
    const widest = new Map<number, number>();
    for (const alternative of pattern.alternatives) {
      for (const [id, n] of captureCounts(alternative)) {
        widest.set(id, Math.max(widest.get(id) ?? 0, n));
      }
    }
    add(counts, widest);
  } else {
    for (const element of pattern.children) {
      if (element.type === "item") add(counts, captureCounts(element.item));
    }
  }
  return counts;
}
