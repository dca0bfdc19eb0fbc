// src/layout/core/dirtyWorkspace.ts

const GROW = (n: number) => Math.max(2, n << 1);

// Workspace kept on the forest and reused across markDirty() calls
export class DirtyWorkspace {
  // Pending node ids (upward worklist)
  stack: Int32Array;
  // stamp[id] === pass  <=>  id already marked during the current pass
  stamp: Uint32Array;
  private _pass = 0;

  constructor(initialCapacity: number) {
    const cap = Math.max(1, initialCapacity | 0);
    this.stack = new Int32Array(cap);
    this.stamp = new Uint32Array(cap);
  }

  get pass(): number {
    return this._pass;
  }

  /** Starts a new marking pass over a forest of `nodeCount` nodes. */
  begin(nodeCount: number): number {
    if (nodeCount > this.stamp.length) {
      let n = this.stamp.length;
      while (n < nodeCount) n = GROW(n);
      // fresh stamps are zero, never equal to a live pass
      const next = new Uint32Array(n);
      next.set(this.stamp);
      this.stamp = next;
    }
    this._pass = (this._pass + 1) >>> 0;
    if (this._pass === 0) {
      // wrapped: stale stamps could collide with new passes
      this.stamp.fill(0);
      this._pass = 1;
    }
    return this._pass;
  }

  ensureStack(topNeeded: number) {
    const need = topNeeded | 0;
    if (need < this.stack.length) return;
    let n = this.stack.length;
    while (n <= need) n = GROW(n);
    const next = new Int32Array(n);
    next.set(this.stack);
    this.stack = next;
  }
}
