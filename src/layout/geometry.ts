// src/layout/geometry.ts
// Geometric value records used by styles, layouts and measure functions.

import { isRow, type FlexDirection } from "./style.js";

/**
 * An axis-aligned rectangle of four sides. Used both for positions (edge
 * coordinates) and for per-side spacing such as padding or margin.
 * `start`/`end` are the horizontal sides, left/right in LTR text.
 */
export interface Rect<T> {
  start: T;
  end: T;
  top: T;
  bottom: T;
}

export interface Size<T> {
  width: T;
  height: T;
}

export interface Point<T> {
  x: T;
  y: T;
}

export const RECT_ZERO: Readonly<Rect<number>> = Object.freeze({ start: 0, end: 0, top: 0, bottom: 0 });
export const SIZE_ZERO: Readonly<Size<number>> = Object.freeze({ width: 0, height: 0 });
export const SIZE_UNDEFINED: Readonly<Size<number | undefined>> = Object.freeze({
  width: undefined,
  height: undefined,
});
export const POINT_ZERO: Readonly<Point<number>> = Object.freeze({ x: 0, y: 0 });

export function rect(start: number, end: number, top: number, bottom: number): Rect<number> {
  return { start, end, top, bottom };
}

/** A size whose axes are both known. */
export function definedSize(width: number, height: number): Size<number | undefined> {
  return { width, height };
}

// ---- Rect helpers

/**
 * Applies `f` to all four sides; horizontal sides are paired with the width,
 * vertical sides with the height.
 */
export function zipSize<T, U, R>(r: Rect<T>, size: Size<U>, f: (side: T, axis: U) => R): Rect<R> {
  return {
    start: f(r.start, size.width),
    end: f(r.end, size.width),
    top: f(r.top, size.height),
    bottom: f(r.bottom, size.height),
  };
}

export function horizontalAxisSum(r: Rect<number>): number {
  return r.start + r.end;
}

export function verticalAxisSum(r: Rect<number>): number {
  return r.top + r.bottom;
}

export function mainAxisSum(r: Rect<number>, direction: FlexDirection): number {
  return isRow(direction) ? horizontalAxisSum(r) : verticalAxisSum(r);
}

export function crossAxisSum(r: Rect<number>, direction: FlexDirection): number {
  return isRow(direction) ? verticalAxisSum(r) : horizontalAxisSum(r);
}

export function mainStart<T>(r: Rect<T>, direction: FlexDirection): T {
  return isRow(direction) ? r.start : r.top;
}

export function mainEnd<T>(r: Rect<T>, direction: FlexDirection): T {
  return isRow(direction) ? r.end : r.bottom;
}

export function crossStart<T>(r: Rect<T>, direction: FlexDirection): T {
  return isRow(direction) ? r.top : r.start;
}

export function crossEnd<T>(r: Rect<T>, direction: FlexDirection): T {
  return isRow(direction) ? r.bottom : r.end;
}

// ---- Size helpers

export function mapSize<T, R>(size: Size<T>, f: (axis: T) => R): Size<R> {
  return { width: f(size.width), height: f(size.height) };
}

export function main<T>(size: Size<T>, direction: FlexDirection): T {
  return isRow(direction) ? size.width : size.height;
}

export function cross<T>(size: Size<T>, direction: FlexDirection): T {
  return isRow(direction) ? size.height : size.width;
}

/** Writes the main-axis component in place. */
export function setMain<T>(size: Size<T>, direction: FlexDirection, value: T): void {
  if (isRow(direction)) size.width = value;
  else size.height = value;
}

/** Writes the cross-axis component in place. */
export function setCross<T>(size: Size<T>, direction: FlexDirection, value: T): void {
  if (isRow(direction)) size.height = value;
  else size.width = value;
}
