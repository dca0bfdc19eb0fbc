// src/layout/core/nodeData.ts
import { ForestError } from "../errors.js";
import { emptyLayout, type Cache, type CacheSlot, type Layout, type MeasureFunc } from "../interfaces.js";
import type { FlexboxStyle, StyleView } from "../style.js";

/**
 * Per-node layout state stored in a Forest.
 *
 * Invariant: a populated cache implies the node is clean. Caches are only
 * cleared by markDirty(), which also sets the dirty flag, and only written by
 * storeCache(), which requires the node to be clean.
 */
export class NodeData {
  readonly measure: MeasureFunc | undefined;
  /** Last computed box. Left in place by markDirty(); the dirty flag says whether to trust it. */
  layout: Layout;

  private _mainSizeCache: Cache | undefined = undefined;
  private _otherCache: Cache | undefined = undefined;
  private _isDirty = true;
  private _style: FlexboxStyle;

  private constructor(style: FlexboxStyle, measure: MeasureFunc | undefined) {
    this._style = style;
    this.measure = measure;
    this.layout = emptyLayout();
  }

  /** A never-measured node: no measure function, empty layout, no caches, dirty. */
  static create(style: FlexboxStyle): NodeData {
    return new NodeData(style, undefined);
  }

  /** Same as create(), for leaves sized by an external function rather than flex rules. */
  static createWithMeasure(style: FlexboxStyle, measure: MeasureFunc): NodeData {
    return new NodeData(style, measure);
  }

  get style(): StyleView {
    return this._style;
  }

  /**
   * @internal Swaps in an owned style and dirties this record only.
   * Forest.setStyle() calls this and then invalidates the ancestors.
   */
  restyle(style: FlexboxStyle): void {
    this._style = style;
    this.markDirty();
  }

  get isDirty(): boolean {
    return this._isDirty;
  }
  get mainSizeCache(): Cache | undefined {
    return this._mainSizeCache;
  }
  get otherCache(): Cache | undefined {
    return this._otherCache;
  }

  cache(slot: CacheSlot): Cache | undefined {
    return slot === "mainSize" ? this._mainSizeCache : this._otherCache;
  }

  /** Clears both caches and flags the node for recomputation. Idempotent. */
  markDirty(): void {
    this._mainSizeCache = undefined;
    this._otherCache = undefined;
    this._isDirty = true;
  }

  /** Called by the layout algorithm once `layout` holds a fresh result. */
  markClean(): void {
    this._isDirty = false;
  }

  storeCache(slot: CacheSlot, cache: Cache): void {
    if (this._isDirty) {
      throw new ForestError("dirty-cache-write", `Cannot store '${slot}' cache on a dirty node; call markClean() first`);
    }
    if (slot === "mainSize") this._mainSizeCache = cache;
    else this._otherCache = cache;
  }
}
