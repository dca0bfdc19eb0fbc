// tests/layout/markDirty.test.ts
import { DirtyWorkspace, type Forest } from "../../src/layout/core/index.js";
import type { NodeId } from "../../src/layout/interfaces.js";
import { makeStyle } from "../../src/layout/style.js";
import { leaves, makeForest, settle, settleAll } from "../testUtils.js";

function dirtyState(forest: Forest, id: NodeId) {
  const data = forest.node(id);
  return { dirty: data.isDirty, main: data.mainSizeCache, other: data.otherCache };
}

describe("Forest.markDirty", () => {
  // L has two parents M and N, both children of R; S is R's other child; U is unrelated
  const diamond = () => {
    const forest = makeForest();
    const [l] = leaves(forest, 1);
    const m = forest.newWithChildren(makeStyle(), [l]);
    const n = forest.newWithChildren(makeStyle(), [l]);
    const s = forest.newLeaf(makeStyle());
    const r = forest.newWithChildren(makeStyle(), [m, n, s]);
    const u = forest.newLeaf(makeStyle());
    settleAll(forest);
    return { forest, l, m, n, s, r, u };
  };

  it("dirties every ancestor of a diamond", () => {
    const { forest, l, m, n, r } = diamond();

    forest.markDirty(l);

    for (const id of [l, m, n, r]) {
      expect(dirtyState(forest, id)).toEqual({ dirty: true, main: undefined, other: undefined });
    }
  });

  it("leaves nodes without an ancestor path untouched", () => {
    const { forest, l, s, u } = diamond();

    forest.markDirty(l);

    for (const id of [s, u]) {
      expect(forest.node(id).isDirty).toBe(false);
      expect(forest.node(id).mainSizeCache).toEqual({
        nodeSize: { width: undefined, height: undefined },
        parentSize: { width: undefined, height: undefined },
        performLayout: true,
        size: { width: id, height: id },
      });
      expect(forest.node(id).otherCache).toBeDefined();
    }
  });

  it("does not walk downwards", () => {
    const { forest, l, m } = diamond();

    forest.markDirty(m);

    expect(forest.node(l).isDirty).toBe(false);
  });

  it("is idempotent", () => {
    const { forest, l, m, n, s, r, u } = diamond();
    const ids = [l, m, n, s, r, u];

    forest.markDirty(m);
    const once = ids.map((id) => dirtyState(forest, id));
    forest.markDirty(m);
    const twice = ids.map((id) => dirtyState(forest, id));

    expect(twice).toEqual(once);
  });

  it("clears caches but keeps the stale layout in place", () => {
    const forest = makeForest();
    const [id] = leaves(forest, 1);
    const layout = { order: 3, size: { width: 10, height: 20 }, location: { x: 1, y: 2 } };
    settle(forest, id, layout);
    expect(forest.node(id).mainSizeCache).toBeDefined();

    forest.markDirty(id);

    const data = forest.node(id);
    expect(data.isDirty).toBe(true);
    expect(data.mainSizeCache).toBeUndefined();
    expect(data.otherCache).toBeUndefined();
    expect(data.layout).toEqual({ order: 3, size: { width: 10, height: 20 }, location: { x: 1, y: 2 } });
  });

  it("terminates on a parent cycle", () => {
    const forest = makeForest();
    const [a, b, c] = leaves(forest, 3);
    forest.addChild(a, b);
    forest.addChild(b, c);
    forest.addChild(c, a);
    settleAll(forest);

    forest.markDirty(b);

    expect([a, b, c].map((id) => forest.node(id).isDirty)).toEqual([true, true, true]);
  });

  it("walks a deep chain beyond the initial worklist size", () => {
    const forest = makeForest(1);
    let top = forest.newLeaf(makeStyle());
    const bottom = top;
    for (let i = 0; i < 500; i++) top = forest.newWithChildren(makeStyle(), [top]);
    settleAll(forest);

    forest.markDirty(bottom);

    expect(forest.node(top).isDirty).toBe(true);
    for (let id = 0; id < forest.len; id++) expect(forest.node(id).isDirty).toBe(true);
  });

  it("walks a wide fan of parents beyond the initial worklist size", () => {
    const forest = makeForest(1);
    const [leaf] = leaves(forest, 1);
    const parents: NodeId[] = [];
    for (let i = 0; i < 20; i++) parents.push(forest.newWithChildren(makeStyle(), [leaf]));
    settleAll(forest);

    forest.markDirty(leaf);

    expect(parents.every((p) => forest.node(p).isDirty)).toBe(true);
  });

  it("still reaches ancestors after ids were compacted", () => {
    const forest = makeForest();
    const [gone, leaf] = leaves(forest, 2);
    const mid = forest.newWithChildren(makeStyle(), [leaf]);
    const root = forest.newWithChildren(makeStyle(), [mid]);
    expect([gone, leaf, mid, root]).toEqual([0, 1, 2, 3]);

    // root moves from 3 to 0
    expect(forest.swapRemove(gone)).toBe(3);
    settleAll(forest);

    forest.markDirty(leaf);

    expect(forest.node(0).isDirty).toBe(true);
    expect(forest.node(mid).isDirty).toBe(true);
  });
});

describe("DirtyWorkspace", () => {
  it("grows the worklist in powers of two", () => {
    const ws = new DirtyWorkspace(1);
    ws.ensureStack(0);
    expect(ws.stack.length).toBe(1);
    ws.ensureStack(7);
    expect(ws.stack.length).toBe(8);
  });

  it("grows stamps to the node count and starts a fresh pass each time", () => {
    const ws = new DirtyWorkspace(1);
    expect(ws.begin(5)).toBe(1);
    expect(ws.stamp.length).toBe(8);
    ws.stamp[4] = 1;
    expect(ws.begin(5)).toBe(2);
    expect(ws.pass).toBe(2);
    expect(ws.stamp[4]).toBe(1);
  });
});
