// Core types shared by the layout engine, the panel compositor and hosts

import type { Cell } from './buffer.ts';

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Rectangle in character cells; right = x + width, bottom = y + height */
export interface Bounds extends Position, Size {}

/** Style passed through to the host painter uninterpreted */
export type CellStyle = Omit<Partial<Cell>, 'char'>;

export interface BoxSpacing {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export type BorderStyle = 'thin' | 'thick' | 'double' | 'rounded' | 'ascii';

// Border character definitions: h=horizontal, v=vertical, tl/tr/bl/br=corners
export interface BorderChars {
  h: string;
  v: string;
  tl: string;
  tr: string;
  bl: string;
  br: string;
}

export const BORDER_CHARS: Record<BorderStyle, BorderChars> = {
  thin: { h: '─', v: '│', tl: '┌', tr: '┐', bl: '└', br: '┘' },
  thick: { h: '━', v: '┃', tl: '┏', tr: '┓', bl: '┗', br: '┛' },
  double: { h: '═', v: '║', tl: '╔', tr: '╗', bl: '╚', br: '╝' },
  rounded: { h: '─', v: '│', tl: '╭', tr: '╮', bl: '╰', br: '╯' },
  ascii: { h: '-', v: '|', tl: '+', tr: '+', bl: '+', br: '+' },
};

/** Which sides of a box carry a border line */
export interface Borders {
  top: boolean;
  right: boolean;
  bottom: boolean;
  left: boolean;
}

export const BORDERS_ALL: Readonly<Borders> = { top: true, right: true, bottom: true, left: true };
export const BORDERS_NONE: Readonly<Borders> = { top: false, right: false, bottom: false, left: false };

/** Border, title and padding drawn around a panel's content */
export interface Decoration {
  title?: string;
  borders: Borders;
  borderStyle: BorderStyle;
  padding: BoxSpacing;
  style?: CellStyle;
}

export interface ScrollbarGlyphs {
  begin: string;
  end: string;
  track: string;
  thumb: string;
}

/**
 * Rendering primitives a host supplies.
 * The layout engine and compositor only ever talk to the screen through these.
 */
export interface Painter {
  /** Write up to maxWidth columns of text starting at cell (x, y) */
  paintLine(x: number, y: number, text: string, maxWidth: number, style?: CellStyle): void;

  /** Draw the decoration into bounds and report the interior rectangle */
  paintDecoration(bounds: Bounds, decoration: Decoration): Bounds;

  /**
   * Draw a vertical scroll indicator in the rightmost column of bounds:
   * begin glyph on the first row, end glyph on the last, track between,
   * with thumbSize thumb cells starting position rows into the track.
   */
  paintScrollbarTrack(bounds: Bounds, thumbSize: number, position: number, glyphs?: ScrollbarGlyphs): void;
}

export interface RenderContext {
  /** Leading rows of the child's natural layout cut off by the scroll offset */
  rowOffset: number;
}

/**
 * A widget that can be stacked inside a panel.
 * New kinds implement this interface; the compositor never inspects `type`
 * beyond logging.
 */
export interface PanelChild {
  readonly type: string;

  /** Rows the child needs at the given width */
  getHeight(width: number): number;

  render(bounds: Bounds, painter: Painter, context?: RenderContext): void;
}
