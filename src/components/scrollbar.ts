/**
 * Scroll metrics and the shared scrollbar renderer
 */

import type { TerminalBuffer } from '../buffer.ts';
import { PanetextConfig } from '../config/config.ts';
import { boundsBottom, boundsRight, clamp, toCellCount } from '../geometry.ts';
import type { Bounds, CellStyle, ScrollbarGlyphs } from '../types.ts';

export interface ScrollState {
  /** Rows all children need without clipping */
  contentHeight: number;
  /** Rows of the panel interior */
  viewportHeight: number;
  /** First content row shown, within [0, thumbSize] */
  scrollOffset: number;
  /** max(0, contentHeight - viewportHeight) */
  thumbSize: number;
}

export const UNICODE_SCROLLBAR_GLYPHS: Readonly<ScrollbarGlyphs> = { begin: '↑', end: '↓', track: '░', thumb: '█' };
export const ASCII_SCROLLBAR_GLYPHS: Readonly<ScrollbarGlyphs> = { begin: '^', end: 'v', track: '.', thumb: '#' };

export function getScrollbarGlyphs(ascii: boolean = PanetextConfig.get().asciiGlyphs): ScrollbarGlyphs {
  return { ...(ascii ? ASCII_SCROLLBAR_GLYPHS : UNICODE_SCROLLBAR_GLYPHS) };
}

export function computeScrollState(contentHeight: number, viewportHeight: number, scrollOffset: number = 0): ScrollState {
  const overflow = Math.max(0, contentHeight - viewportHeight);
  return {
    contentHeight,
    viewportHeight,
    scrollOffset: clamp(toCellCount(scrollOffset), 0, overflow),
    thumbSize: overflow,
  };
}

/**
 * Scrollbar region for a panel: the outer rectangle inset by one row at the
 * top and one at the bottom. Undefined when fewer than two rows remain for
 * the begin and end glyphs.
 */
export function scrollbarRegion(outer: Bounds): Bounds | undefined {
  const height = outer.height - 2;
  if (height < 2 || outer.width <= 0) {
    return undefined;
  }
  return { x: outer.x, y: outer.y + 1, width: outer.width, height };
}

export interface ScrollbarStyles {
  trackStyle?: CellStyle;
  thumbStyle?: CellStyle;
}

/**
 * Draw a vertical scrollbar in the rightmost column of bounds.
 * The thumb covers min(thumbSize, track length) cells starting at position,
 * clamped so it stays inside the track.
 */
export function renderScrollbar(
  buffer: TerminalBuffer,
  bounds: Bounds,
  thumbSize: number,
  position: number,
  glyphs: ScrollbarGlyphs,
  styles: ScrollbarStyles = {}
): void {
  if (bounds.width <= 0 || bounds.height < 2) return;

  const x = boundsRight(bounds) - 1;
  const trackTop = bounds.y + 1;
  const trackLength = bounds.height - 2;
  const thumbCells = clamp(thumbSize, 0, trackLength);
  const thumbPos = clamp(position, 0, trackLength - thumbCells);

  buffer.setCell(x, bounds.y, { ...styles.trackStyle, char: glyphs.begin });
  for (let i = 0; i < trackLength; i++) {
    const isThumb = i >= thumbPos && i < thumbPos + thumbCells;
    if (isThumb) {
      buffer.setCell(x, trackTop + i, { ...styles.thumbStyle, char: glyphs.thumb });
    } else {
      buffer.setCell(x, trackTop + i, { ...styles.trackStyle, char: glyphs.track });
    }
  }
  buffer.setCell(x, boundsBottom(bounds) - 1, { ...styles.trackStyle, char: glyphs.end });
}
