// Text component: an immutable string laid out under a wrap policy

import { PanetextConfig } from '../config/config.ts';
import { LayoutCache } from '../layout-cache.ts';
import { getLogger } from '../logging.ts';
import {
  computeLines,
  isWrapPolicySupported,
  lineText,
  lineTexts,
  parseWrapPolicy,
  type LineSpan,
  type WrapPolicy,
} from '../text-layout.ts';
import type { Bounds, CellStyle, PanelChild, Painter, RenderContext } from '../types.ts';

const logger = getLogger('Text');

export const ELLIPSIS = '...';

export interface TextProps {
  text: string;
  /** Defaults to the configured text.defaultWrap */
  wrap?: WrapPolicy;
  style?: CellStyle;
  /**
   * Layout memoisation. Defaults to a private cache sized by layout.cacheSize
   * (none when that is 0); false disables it.
   */
  cache?: LayoutCache | false;
}

export class TextElement implements PanelChild {
  readonly type = 'text';
  readonly text: string;
  readonly wrap: WrapPolicy;
  readonly style?: CellStyle;
  private readonly _cache?: LayoutCache;

  constructor(props: TextProps) {
    const config = PanetextConfig.get();
    this.text = props.text;
    this.wrap = props.wrap ?? parseWrapPolicy(config.defaultWrap);
    this.style = props.style;

    if (props.cache instanceof LayoutCache) {
      this._cache = props.cache;
    } else if (props.cache === undefined && config.layoutCacheSize > 0) {
      this._cache = new LayoutCache(config.layoutCacheSize);
    }
  }

  static from(text: string, wrap?: WrapPolicy): TextElement {
    return new TextElement({ text, wrap });
  }

  /**
   * Whether the wrap policy has a layout algorithm; layout of a reserved
   * policy throws UnimplementedPolicyError.
   */
  isLayoutSupported(): boolean {
    return isWrapPolicySupported(this.wrap);
  }

  /**
   * Line spans at the given width. Recomputed on every call unless a layout
   * cache is attached.
   */
  getLines(width: number): readonly LineSpan[] {
    if (this._cache) {
      return this._cache.getLines(this.text, width, this.wrap);
    }
    return computeLines(this.text, width, this.wrap);
  }

  getLineTexts(width: number): string[] {
    return lineTexts(this.text, this.getLines(width));
  }

  getHeight(width: number): number {
    return this.getLines(width).length;
  }

  /**
   * Paint lines top to bottom from bounds.y, left aligned and clipped to
   * bounds.width, stopping at the bottom of bounds.
   *
   * With `truncate-ellipsis`, a line that exactly fills the width has its
   * last three columns replaced by the ellipsis. Shorter lines are painted
   * unchanged.
   */
  render(bounds: Bounds, painter: Painter, context?: RenderContext): void {
    const { x, y, width, height } = bounds;
    const lines = this.getLines(width);
    const rowOffset = context?.rowOffset ?? 0;

    logger.trace('Rendering text', { bounds, rowOffset, lines: lines.length, wrap: this.wrap });

    if (this.wrap === 'truncate-ellipsis' && rowOffset === 0 && height > 0 && lines.length > 0) {
      const line = lines[0];
      if (line.end - line.start === width) {
        const marker = ELLIPSIS.slice(0, width);
        const visible = lineText(this.text, line);
        const kept = computeLines(visible, width - marker.length, 'truncate')[0];
        painter.paintLine(x, y, lineText(visible, kept), width, this.style);
        painter.paintLine(x + width - marker.length, y, marker, marker.length, this.style);
        return;
      }
    }

    for (let i = rowOffset; i < lines.length; i++) {
      const row = i - rowOffset;
      if (row >= height) break;
      painter.paintLine(x, y + row, lineText(this.text, lines[i]), width, this.style);
    }
  }
}
