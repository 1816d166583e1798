/**
 * Separator Component
 *
 * A one-row horizontal line with optional centered label text.
 */

import { PanetextConfig } from '../config/config.ts';
import { BORDER_CHARS, type BorderStyle, type Bounds, type CellStyle, type PanelChild, type Painter, type RenderContext } from '../types.ts';

export interface SeparatorProps {
  /** Optional text centered in the line */
  label?: string;
  /** Line characters; ASCII when config glyphs.ascii is set */
  borderStyle?: BorderStyle;
  style?: CellStyle;
}

export class SeparatorElement implements PanelChild {
  readonly type = 'separator';
  readonly props: Readonly<SeparatorProps>;

  constructor(props: SeparatorProps = {}) {
    this.props = { ...props };
  }

  getHeight(_width: number): number {
    return 1;
  }

  render(bounds: Bounds, painter: Painter, context?: RenderContext): void {
    // The single row is either visible or scrolled away entirely
    if (bounds.width <= 0 || bounds.height <= 0 || (context?.rowOffset ?? 0) > 0) {
      return;
    }

    const borderStyle = this.props.borderStyle ?? (PanetextConfig.get().asciiGlyphs ? 'ascii' : 'thin');
    const chars = BORDER_CHARS[borderStyle];
    painter.paintLine(bounds.x, bounds.y, chars.h.repeat(bounds.width), bounds.width, this.props.style);

    const label = this.props.label;
    // Minimum width for label
    if (label && bounds.width >= 5) {
      const title = ` ${label} `;
      if (title.length <= bounds.width) {
        const startX = bounds.x + Math.floor((bounds.width - title.length) / 2);
        painter.paintLine(startX, bounds.y, title, title.length, this.props.style);
      }
    }
  }
}
