// Painter implementation over a TerminalBuffer

import type { TerminalBuffer } from './buffer.ts';
import { getScrollbarGlyphs, renderScrollbar, type ScrollbarStyles } from './components/scrollbar.ts';
import { PanetextConfig } from './config/config.ts';
import { decorationInner, isEmptyBounds } from './geometry.ts';
import type { Bounds, CellStyle, Decoration, Painter, ScrollbarGlyphs } from './types.ts';

export interface BufferPainterOptions extends ScrollbarStyles {
  /** Use ASCII borders and scrollbar glyphs (defaults to config glyphs.ascii) */
  ascii?: boolean;
}

export class BufferPainter implements Painter {
  private readonly _ascii: boolean;

  constructor(private readonly _buffer: TerminalBuffer, private readonly _options: BufferPainterOptions = {}) {
    this._ascii = _options.ascii ?? PanetextConfig.get().asciiGlyphs;
  }

  get buffer(): TerminalBuffer {
    return this._buffer;
  }

  paintLine(x: number, y: number, text: string, maxWidth: number, style?: CellStyle): void {
    this._buffer.setText(x, y, text, style, maxWidth);
  }

  paintDecoration(bounds: Bounds, decoration: Decoration): Bounds {
    const inner = decorationInner(bounds, decoration);
    if (!inner || isEmptyBounds(bounds)) {
      return { x: bounds.x, y: bounds.y, width: 0, height: 0 };
    }

    const borderStyle = this._ascii ? 'ascii' : decoration.borderStyle;
    this._buffer.drawBorder(bounds, decoration.borders, decoration.style, borderStyle);

    if (decoration.title) {
      // Title sits on the top row, after the left border
      const titleX = bounds.x + (decoration.borders.left ? 1 : 0);
      const titleWidth = bounds.width - (decoration.borders.left ? 1 : 0) - (decoration.borders.right ? 1 : 0);
      this._buffer.setText(titleX, bounds.y, decoration.title, decoration.style, titleWidth);
    }

    return inner;
  }

  paintScrollbarTrack(bounds: Bounds, thumbSize: number, position: number, glyphs?: ScrollbarGlyphs): void {
    renderScrollbar(
      this._buffer,
      bounds,
      thumbSize,
      position,
      glyphs ?? getScrollbarGlyphs(this._ascii),
      this._options
    );
  }
}
