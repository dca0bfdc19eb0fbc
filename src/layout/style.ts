// src/layout/style.ts
// Flexbox style schema: enumerated modes, the Dimension union and per-axis selectors.

import type { Rect, Size } from "./geometry.js";

export type AlignItems = "flex-start" | "flex-end" | "center" | "baseline" | "stretch";
export type AlignSelf = "auto" | AlignItems;
export type AlignContent = "flex-start" | "flex-end" | "center" | "stretch" | "space-between" | "space-around";
export type Display = "flex" | "none";
export type FlexDirection = "row" | "column" | "row-reverse" | "column-reverse";
export type JustifyContent =
  | "flex-start"
  | "flex-end"
  | "center"
  | "space-between"
  | "space-around"
  | "space-evenly";
export type PositionType = "relative" | "absolute";
export type FlexWrap = "nowrap" | "wrap" | "wrap-reverse";

export function isRow(direction: FlexDirection): boolean {
  return direction === "row" || direction === "row-reverse";
}

export function isColumn(direction: FlexDirection): boolean {
  return direction === "column" || direction === "column-reverse";
}

export function isReverse(direction: FlexDirection): boolean {
  return direction === "row-reverse" || direction === "column-reverse";
}

// -----------------------------
// Dimension
// -----------------------------

export type Dimension =
  | { readonly kind: "undefined" }
  | { readonly kind: "auto" }
  | { readonly kind: "points"; readonly value: number }
  | { readonly kind: "percent"; readonly value: number };

export const UNDEFINED: Dimension = Object.freeze({ kind: "undefined" } as const);
export const AUTO: Dimension = Object.freeze({ kind: "auto" } as const);

export function points(value: number): Dimension {
  return { kind: "points", value };
}

/** `value` is a fraction: 0.5 means 50%. */
export function percent(value: number): Dimension {
  return { kind: "percent", value };
}

/** Points and percentages are defined; `auto` and `undefined` are not. */
export function isDefined(d: Dimension): boolean {
  return d.kind === "points" || d.kind === "percent";
}

export function dimensionEquals(a: Dimension, b: Dimension): boolean {
  if (a.kind === "points" && b.kind === "points") return a.value === b.value;
  if (a.kind === "percent" && b.kind === "percent") return a.value === b.value;
  return a.kind === b.kind && !isDefined(a);
}

// ---- Rect<Dimension> / Size<Dimension> factories

const rectOf = (start: Dimension, end: Dimension, top: Dimension, bottom: Dimension): Rect<Dimension> => ({
  start,
  end,
  top,
  bottom,
});

export const RECT_UNDEFINED: Readonly<Rect<Dimension>> = Object.freeze(rectOf(UNDEFINED, UNDEFINED, UNDEFINED, UNDEFINED));
export const RECT_AUTO: Readonly<Rect<Dimension>> = Object.freeze(rectOf(AUTO, AUTO, AUTO, AUTO));

export const topFromPoints = (start: number, top: number) => rectOf(points(start), UNDEFINED, points(top), UNDEFINED);
export const botFromPoints = (end: number, bottom: number) => rectOf(UNDEFINED, points(end), UNDEFINED, points(bottom));
export const topFromPercent = (start: number, top: number) => rectOf(percent(start), UNDEFINED, percent(top), UNDEFINED);
export const botFromPercent = (end: number, bottom: number) => rectOf(UNDEFINED, percent(end), UNDEFINED, percent(bottom));

export function rectFromPoints(start: number, end: number, top: number, bottom: number): Rect<Dimension> {
  return rectOf(points(start), points(end), points(top), points(bottom));
}

export function rectFromPercent(start: number, end: number, top: number, bottom: number): Rect<Dimension> {
  return rectOf(percent(start), percent(end), percent(top), percent(bottom));
}

export const SIZE_AUTO: Readonly<Size<Dimension>> = Object.freeze({ width: AUTO, height: AUTO });
export const SIZE_DIMENSION_UNDEFINED: Readonly<Size<Dimension>> = Object.freeze({ width: UNDEFINED, height: UNDEFINED });

export function sizeFromPoints(width: number, height: number): Size<Dimension> {
  return { width: points(width), height: points(height) };
}

export function sizeFromPercent(width: number, height: number): Size<Dimension> {
  return { width: percent(width), height: percent(height) };
}

// -----------------------------
// FlexboxStyle
// -----------------------------

export interface FlexboxStyle {
  display: Display;
  positionType: PositionType;
  flexDirection: FlexDirection;
  flexWrap: FlexWrap;
  alignItems: AlignItems;
  alignSelf: AlignSelf;
  alignContent: AlignContent;
  justifyContent: JustifyContent;
  position: Rect<Dimension>;
  margin: Rect<Dimension>;
  padding: Rect<Dimension>;
  border: Rect<Dimension>;
  flexGrow: number;
  flexShrink: number;
  flexBasis: Dimension;
  size: Size<Dimension>;
  minSize: Size<Dimension>;
  maxSize: Size<Dimension>;
  aspectRatio: number | undefined;
}

/** A style as read back from a node. Changes go through Forest.setStyle(). */
export type StyleView = {
  readonly [K in keyof FlexboxStyle]: FlexboxStyle[K] extends object ? Readonly<FlexboxStyle[K]> : FlexboxStyle[K];
};

export function defaultStyle(): FlexboxStyle {
  return {
    display: "flex",
    positionType: "relative",
    flexDirection: "row",
    flexWrap: "nowrap",
    alignItems: "stretch",
    alignSelf: "auto",
    alignContent: "stretch",
    justifyContent: "flex-start",
    position: { ...RECT_UNDEFINED },
    margin: { ...RECT_UNDEFINED },
    padding: { ...RECT_UNDEFINED },
    border: { ...RECT_UNDEFINED },
    flexGrow: 0,
    flexShrink: 1,
    flexBasis: AUTO,
    size: { ...SIZE_AUTO },
    minSize: { ...SIZE_AUTO },
    maxSize: { ...SIZE_AUTO },
    aspectRatio: undefined,
  };
}

/** Defaults overlaid with `patch`. Rect and Size fields are copied so the result owns them. */
export function makeStyle(patch: Partial<FlexboxStyle> = {}): FlexboxStyle {
  return cloneStyle({ ...defaultStyle(), ...patch });
}

export function cloneStyle(style: FlexboxStyle): FlexboxStyle {
  return {
    ...style,
    position: { ...style.position },
    margin: { ...style.margin },
    padding: { ...style.padding },
    border: { ...style.border },
    size: { ...style.size },
    minSize: { ...style.minSize },
    maxSize: { ...style.maxSize },
  };
}

// ---- Per-axis selectors

export function minMainSize(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.minSize.width : style.minSize.height;
}

export function maxMainSize(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.maxSize.width : style.maxSize.height;
}

export function mainMarginStart(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.margin.start : style.margin.top;
}

export function mainMarginEnd(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.margin.end : style.margin.bottom;
}

export function crossSize(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.size.height : style.size.width;
}

export function minCrossSize(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.minSize.height : style.minSize.width;
}

export function maxCrossSize(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.maxSize.height : style.maxSize.width;
}

export function crossMarginStart(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.margin.top : style.margin.start;
}

export function crossMarginEnd(style: FlexboxStyle, direction: FlexDirection): Dimension {
  return isRow(direction) ? style.margin.bottom : style.margin.end;
}

/** Effective self-alignment; never returns "auto". */
export function resolveAlignSelf(style: FlexboxStyle, parent: FlexboxStyle): AlignItems {
  return style.alignSelf === "auto" ? parent.alignItems : style.alignSelf;
}
