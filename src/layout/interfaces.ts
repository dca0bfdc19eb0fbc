// src/layout/interfaces.ts
import type { Point, Size } from "./geometry.js";

/**
 * Handle of a node inside one Forest. Dense: always in [0, forest.len).
 * Only valid until the next swapRemove, which may move another node into the freed slot.
 */
export type NodeId = number;

/** "No node" sentinel for callers that keep ids in typed arrays. */
export const NONE = -1;

/** Computed box of a node, written back by the layout algorithm. */
export interface Layout {
  order: number;
  size: Size<number>;
  location: Point<number>;
}

export function emptyLayout(): Layout {
  return { order: 0, size: { width: 0, height: 0 }, location: { x: 0, y: 0 } };
}

/**
 * Intrinsic sizing for leaves that measure themselves (text, images).
 * Receives the known constraint per axis; `undefined` means unconstrained.
 */
export type MeasureFunc = (constraint: Size<number | undefined>) => Size<number>;

/** Memoized result of one sizing pass. Opaque to the forest. */
export interface Cache {
  nodeSize: Size<number | undefined>;
  parentSize: Size<number | undefined>;
  performLayout: boolean;
  size: Size<number>;
}

/** The two independent memo slots of the two-pass measurement protocol. */
export type CacheSlot = "mainSize" | "other";

export interface ForestLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export interface ForestConfig {
  initialCapacity?: number; // default 64; sizes the dirty-propagation worklist
  logger?: ForestLogger; // default: silent
}
