// src/layout/core/invariants.ts
// Structural checks over a Forest. Used by tests and by hosts that want to
// verify a forest after a batch of edits.

import { ForestError } from "../errors.js";
import type { NodeId } from "../interfaces.js";
import type { Forest } from "./forest.js";

const countOf = (list: readonly NodeId[], id: NodeId) => {
  let n = 0;
  for (const v of list) if (v === id) n++;
  return n;
};

/** Returns a description of every broken invariant; empty when the forest is consistent. */
export function checkForest(forest: Pick<Forest, "__columns">): string[] {
  const { nodes, children, parents } = forest.__columns();
  const problems: string[] = [];

  if (children.length !== nodes.length || parents.length !== nodes.length) {
    problems.push(
      `column lengths differ: nodes=${nodes.length} children=${children.length} parents=${parents.length}`
    );
    return problems;
  }

  const n = nodes.length;
  const inRange = (id: NodeId) => Number.isInteger(id) && id >= 0 && id < n;

  for (let id = 0; id < n; id++) {
    for (const c of children[id]) {
      if (!inRange(c)) {
        problems.push(`node ${id} lists unknown child ${c}`);
        continue;
      }
      // edges are a multiset: k copies of p->c need k copies of p in parents(c)
      const down = countOf(children[id], c);
      const up = countOf(parents[c], id);
      if (down !== up) problems.push(`edge ${id} -> ${c}: ${down} in children, ${up} in parents`);
    }
    for (const p of parents[id]) {
      if (!inRange(p)) {
        problems.push(`node ${id} lists unknown parent ${p}`);
        continue;
      }
      if (countOf(children[p], id) === 0) problems.push(`node ${id} lists parent ${p} that does not list it`);
    }

    const data = nodes[id];
    if (data.isDirty && (data.mainSizeCache !== undefined || data.otherCache !== undefined)) {
      problems.push(`node ${id} is dirty but holds a cache`);
    }
  }

  // duplicates of one edge are reported once per copy above; collapse them
  return Array.from(new Set(problems));
}

export function assertForest(forest: Pick<Forest, "__columns">): void {
  const problems = checkForest(forest);
  if (problems.length > 0) {
    throw new ForestError("invariant-violation", problems.join("; "));
  }
}
