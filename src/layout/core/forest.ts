// src/layout/core/forest.ts
import { ForestError } from "../errors.js";
import type { ForestConfig, ForestLogger, MeasureFunc, NodeId } from "../interfaces.js";
import { cloneStyle, type FlexboxStyle } from "../style.js";
import { DirtyWorkspace } from "./dirtyWorkspace.js";
import { NodeData } from "./nodeData.js";

export interface ForestColumns {
  readonly nodes: readonly NodeData[];
  readonly children: ReadonlyArray<readonly NodeId[]>;
  readonly parents: ReadonlyArray<readonly NodeId[]>;
}

const SILENT: ForestLogger = {
  debug: () => {},
  warn: () => {},
};

/** Swap the last element into `index`, then pop. Returns the removed element. */
function swapRemoveAt<T>(arr: T[], index: number): T {
  const removed = arr[index];
  const last = arr.length - 1;
  if (index !== last) arr[index] = arr[last];
  arr.length = last;
  return removed;
}

/** Removes every occurrence of `id`, keeping the order of the rest. */
function strikeAll(list: NodeId[], id: NodeId) {
  let w = 0;
  for (let r = 0; r < list.length; r++) {
    const v = list[r];
    if (v !== id) list[w++] = v;
  }
  list.length = w;
}

function removeOne(list: NodeId[], id: NodeId): boolean {
  const i = list.indexOf(id);
  if (i < 0) return false;
  list.splice(i, 1);
  return true;
}

function rewrite(list: NodeId[], from: NodeId, to: NodeId) {
  for (let i = 0; i < list.length; i++) {
    if (list[i] === from) list[i] = to;
  }
}

/**
 * Struct-of-arrays store for layout nodes.
 *
 * `nodes`, `children` and `parents` are kept at equal length and indexed by
 * the same NodeId. Ids stay dense: swapRemove() moves the last node into the
 * freed slot and returns its old id so callers can remap handles they hold.
 *
 * A node may have several parents (the topology is a DAG). Child order is the
 * flex item order; parent order carries no meaning.
 */
export class Forest {
  private _nodes: NodeData[] = [];
  private _children: NodeId[][] = [];
  private _parents: NodeId[][] = [];

  private readonly _dirty: DirtyWorkspace;
  private readonly log: ForestLogger;

  // bumped by forest-level mutations only; layout write-back on a NodeData does not count
  private _epoch = 0;

  constructor(cfg: ForestConfig = {}) {
    this._dirty = new DirtyWorkspace(cfg.initialCapacity ?? 64);
    this.log = cfg.logger ?? SILENT;
  }

  // ---- accessors
  get len(): number {
    return this._nodes.length;
  }
  get isEmpty(): boolean {
    return this._nodes.length === 0;
  }
  get epoch(): number {
    return this._epoch;
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this._nodes.length;
  }

  node(id: NodeId): NodeData {
    this.assertNode(id, "node");
    return this._nodes[id];
  }

  childrenOf(id: NodeId): readonly NodeId[] {
    this.assertNode(id, "childrenOf");
    return this._children[id];
  }

  parentsOf(id: NodeId): readonly NodeId[] {
    this.assertNode(id, "parentsOf");
    return this._parents[id];
  }

  childCount(id: NodeId): number {
    return this.childrenOf(id).length;
  }

  childAt(parent: NodeId, index: number): NodeId {
    const kids = this.childrenOf(parent);
    this.assertChildIndex(parent, kids, index, "childAt");
    return kids[index];
  }

  /** @internal Raw parallel columns, for invariant checks. */
  __columns(): ForestColumns {
    return { nodes: this._nodes, children: this._children, parents: this._parents };
  }

  protected assertNode(id: NodeId, op: string) {
    if (!this.has(id)) {
      throw new ForestError("unknown-node", `${op}: node ${id} is not in the forest (len ${this._nodes.length})`);
    }
  }

  protected assertChildIndex(parent: NodeId, kids: readonly NodeId[], index: number, op: string) {
    if (!Number.isInteger(index) || index < 0 || index >= kids.length) {
      throw new ForestError(
        "index-out-of-range",
        `${op}: index ${index} out of range for node ${parent} with ${kids.length} children`
      );
    }
  }

  // -----------------------------
  // creation
  // -----------------------------

  private push(data: NodeData, children: NodeId[]): NodeId {
    const id = this._nodes.length;
    this._nodes.push(data);
    this._children.push(children);
    this._parents.push([]);
    this._epoch++;
    return id;
  }

  /** Adds an unattached childless node; its id is the current length. */
  newLeaf(style: FlexboxStyle): NodeId {
    return this.push(NodeData.create(cloneStyle(style)), []);
  }

  /** Adds an unattached leaf whose size comes from `measure`. */
  newLeafWithMeasure(style: FlexboxStyle, measure: MeasureFunc): NodeId {
    return this.push(NodeData.createWithMeasure(cloneStyle(style), measure), []);
  }

  /**
   * Adds an unparented node with `children` attached in the given order.
   * The new id is registered as a parent on every child before the node itself is appended.
   */
  newWithChildren(style: FlexboxStyle, children: readonly NodeId[]): NodeId {
    for (const child of children) this.assertNode(child, "newWithChildren");

    const id = this._nodes.length;
    const seen = new Set<NodeId>();
    for (const child of children) {
      if (seen.has(child)) this.log.warn(`newWithChildren: node ${child} listed twice under new node ${id}`);
      seen.add(child);
      this._parents[child].push(id);
    }
    return this.push(NodeData.create(cloneStyle(style)), children.slice());
  }

  // -----------------------------
  // linking
  // -----------------------------

  /** Appends `child` to `parent`'s children. Repeating the call creates a duplicate edge. */
  addChild(parent: NodeId, child: NodeId) {
    this.assertNode(parent, "addChild");
    this.assertNode(child, "addChild");

    const kids = this._children[parent];
    if (kids.includes(child)) this.log.warn(`addChild: duplicate edge ${parent} -> ${child}`);

    this._parents[child].push(parent);
    kids.push(child);
    this.propagateDirty(parent);
  }

  /** Unlinks the first occurrence of `child` under `parent`. The child node is kept. */
  removeChild(parent: NodeId, child: NodeId): NodeId {
    this.assertNode(parent, "removeChild");
    this.assertNode(child, "removeChild");

    const index = this._children[parent].indexOf(child);
    if (index < 0) {
      throw new ForestError("missing-edge", `removeChild: node ${child} is not a child of ${parent}`);
    }
    return this.removeChildAtIndex(parent, index);
  }

  /** Unlinks the child at `index` under `parent` and returns its id. The child node is kept. */
  removeChildAtIndex(parent: NodeId, index: number): NodeId {
    this.assertNode(parent, "removeChildAtIndex");
    const kids = this._children[parent];
    this.assertChildIndex(parent, kids, index, "removeChildAtIndex");

    const child = kids[index];
    kids.splice(index, 1);
    // one reference per edge, so duplicate edges stay paired
    removeOne(this._parents[child], parent);

    this.propagateDirty(parent);
    return child;
  }

  /** Replaces the style of `node` and invalidates it and its ancestors. */
  setStyle(node: NodeId, style: FlexboxStyle) {
    this.assertNode(node, "setStyle");
    this._nodes[node].restyle(cloneStyle(style));
    this.propagateDirty(node);
  }

  // -----------------------------
  // removal
  // -----------------------------

  /**
   * Deletes `node` and all of its edges, keeping storage dense.
   *
   * The node in the last slot moves into `node`'s slot. When that happens the
   * moved node's previous id is returned and every handle equal to it must be
   * remapped to `node`. Returns undefined when nothing moved.
   */
  swapRemove(node: NodeId): NodeId | undefined {
    this.assertNode(node, "swapRemove");

    const last = this._nodes.length - 1;
    swapRemoveAt(this._nodes, node);
    this._epoch++;

    if (this._nodes.length === 0) {
      this._children.length = 0;
      this._parents.length = 0;
      return undefined;
    }

    // parents that lose an edge get invalidated once ids are settled
    const orphaned = this._parents[node].filter((p) => p !== node);

    // 1) drop every edge touching the removed node
    for (const child of this._children[node]) strikeAll(this._parents[child], node);
    for (const parent of this._parents[node]) strikeAll(this._children[parent], node);

    // 2) the last node takes id `node`; rewrite its neighbours' references.
    // Snapshots so a self-edge on `last` is rewritten on both sides.
    if (last !== node) {
      const movedChildren = this._children[last].slice();
      const movedParents = this._parents[last].slice();
      for (const child of movedChildren) rewrite(this._parents[child], last, node);
      for (const parent of movedParents) rewrite(this._children[parent], last, node);
    }

    swapRemoveAt(this._children, node);
    swapRemoveAt(this._parents, node);

    for (const p of orphaned) this.propagateDirty(p === last ? node : p);

    if (last === node) return undefined;
    this.log.debug(`swapRemove: node ${last} relocated to ${node}`);
    return last;
  }

  /** Removes all nodes. */
  clear() {
    const n = this._nodes.length;
    this._nodes.length = 0;
    this._children.length = 0;
    this._parents.length = 0;
    this._epoch++;
    this.log.debug(`clear: dropped ${n} nodes`);
  }

  // -----------------------------
  // invalidation
  // -----------------------------

  /**
   * Marks `node` and every ancestor reachable through any parent as dirty,
   * clearing their caches. The only sanctioned invalidation entry point for
   * callers that change what a node's layout depends on.
   */
  markDirty(node: NodeId) {
    this.assertNode(node, "markDirty");
    this.propagateDirty(node);
  }

  // Upward DFS on an explicit stack. Each node is marked once per pass, so
  // shared ancestors are not re-walked and a parent cycle cannot loop forever.
  private propagateDirty(start: NodeId) {
    const ws = this._dirty;
    const pass = ws.begin(this._nodes.length);

    let top = 0;
    ws.ensureStack(top);
    ws.stack[top] = start;
    ws.stamp[start] = pass;

    while (top >= 0) {
      const id = ws.stack[top--];
      this._nodes[id].markDirty();

      const parents = this._parents[id];
      for (let i = 0; i < parents.length; i++) {
        const p = parents[i];
        if (ws.stamp[p] === pass) continue;
        ws.stamp[p] = pass;
        ws.ensureStack(++top);
        ws.stack[top] = p;
      }
    }

    this._epoch++;
  }
}
