// Geometry utilities for bounds and clipping

import type { Bounds, BoxSpacing, Decoration } from './types.ts';

/**
 * Clamp a number to a range [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Normalise a cell count: floor fractions and clamp negatives to 0
 */
export function toCellCount(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.floor(value));
}

export function createBounds(x: number, y: number, width: number, height: number): Bounds {
  return { x, y, width: toCellCount(width), height: toCellCount(height) };
}

export function boundsRight(bounds: Bounds): number {
  return bounds.x + bounds.width;
}

export function boundsBottom(bounds: Bounds): number {
  return bounds.y + bounds.height;
}

export function isEmptyBounds(bounds: Bounds): boolean {
  return bounds.width <= 0 || bounds.height <= 0;
}

/**
 * Shrink bounds by the given insets.
 * Returns undefined when the insets do not fit, so callers never see a
 * negative width or height.
 */
export function insetBounds(bounds: Bounds, insets: BoxSpacing): Bounds | undefined {
  const width = bounds.width - insets.left - insets.right;
  const height = bounds.height - insets.top - insets.bottom;
  if (width < 0 || height < 0) {
    return undefined;
  }
  return {
    x: bounds.x + insets.left,
    y: bounds.y + insets.top,
    width,
    height,
  };
}

export function spacing(vertical: number, horizontal: number = vertical): BoxSpacing {
  return { top: vertical, right: horizontal, bottom: vertical, left: horizontal };
}

export function addSpacing(a: BoxSpacing, b: BoxSpacing): BoxSpacing {
  return {
    top: a.top + b.top,
    right: a.right + b.right,
    bottom: a.bottom + b.bottom,
    left: a.left + b.left,
  };
}

/**
 * Rows and columns a decoration takes from each side of its rectangle.
 * A title without a top border still occupies the top row.
 */
export function decorationInsets(decoration: Decoration): BoxSpacing {
  const { borders, title } = decoration;
  const borderInsets: BoxSpacing = {
    top: borders.top || (title !== undefined && title !== '') ? 1 : 0,
    right: borders.right ? 1 : 0,
    bottom: borders.bottom ? 1 : 0,
    left: borders.left ? 1 : 0,
  };
  return addSpacing(borderInsets, decoration.padding);
}

/**
 * Interior of a decorated rectangle, or undefined when the decoration does
 * not fit.
 */
export function decorationInner(bounds: Bounds, decoration: Decoration): Bounds | undefined {
  return insetBounds(bounds, decorationInsets(decoration));
}
