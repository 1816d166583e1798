// Panel component: stacks children top to bottom inside an optional
// border/title decoration, clips them at the viewport and reports scroll metrics

import { PanetextConfig } from '../config/config.ts';
import { createBounds, decorationInner, spacing } from '../geometry.ts';
import { getLogger } from '../logging.ts';
import type { WrapPolicy } from '../text-layout.ts';
import {
  BORDERS_ALL,
  type BorderStyle,
  type Borders,
  type Bounds,
  type BoxSpacing,
  type CellStyle,
  type Decoration,
  type PanelChild,
  type Painter,
} from '../types.ts';
import { computeScrollState, scrollbarRegion, type ScrollState } from './scrollbar.ts';
import { TextElement } from './text.ts';

const logger = getLogger('Panel');

/** Padding used when a decorated panel is built without one */
export const DEFAULT_PANEL_PADDING: Readonly<BoxSpacing> = spacing(1, 2);

export interface ChildPlacement {
  child: PanelChild;
  index: number;
  /** Rows the child asked for at the interior width */
  naturalHeight: number;
  /** Row of the child's first line in the unclipped content */
  contentY: number;
  /** Where the child is painted; height is clipped to the viewport */
  bounds: Bounds;
  /** Leading rows hidden above the scroll offset */
  rowOffset: number;
  visible: boolean;
}

export interface PanelLayout {
  outer: Bounds;
  inner: Bounds;
  /** False when the outer rectangle cannot hold the decoration; nothing is painted */
  fits: boolean;
  placements: ChildPlacement[];
  scroll: ScrollState;
  scrollbar?: Bounds;
}

export interface PanelRenderOptions {
  /** First content row shown; clamped to the scrollable range */
  scrollOffset?: number;
}

export interface PanelProps {
  decoration?: Decoration;
  scrollbar: boolean;
  children: PanelChild[];
}

export class PanelElement {
  readonly type = 'panel';
  private readonly _decoration?: Decoration;
  private readonly _scrollbar: boolean;
  private readonly _children: readonly PanelChild[];

  constructor(props: PanelProps) {
    this._decoration = props.decoration;
    this._scrollbar = props.scrollbar;
    this._children = [...props.children];
  }

  /**
   * Start building a panel. A title makes the panel decorated; the scrollbar
   * flag defaults to config panel.scrollbar.
   */
  static builder(title?: string): PanelBuilder {
    return new PanelBuilder(title);
  }

  get decoration(): Decoration | undefined {
    return this._decoration;
  }

  get hasScrollbar(): boolean {
    return this._scrollbar;
  }

  get children(): readonly PanelChild[] {
    return this._children;
  }

  /**
   * Compute child rectangles and scroll metrics without painting.
   *
   * Children keep insertion order. Each one gets the interior width and its
   * natural height clipped to the rows left in the viewport; content height
   * is the sum of the unclipped heights.
   */
  layout(bounds: Bounds, options: PanelRenderOptions = {}): PanelLayout {
    const outer = createBounds(bounds.x, bounds.y, bounds.width, bounds.height);
    const inner = this._decoration ? decorationInner(outer, this._decoration) : outer;

    if (!inner) {
      const contentHeight = this._children.reduce((sum, child) => sum + child.getHeight(0), 0);
      logger.debug('Panel rectangle too small for its decoration, skipping render', { bounds: outer });
      return {
        outer,
        inner: { x: outer.x, y: outer.y, width: 0, height: 0 },
        fits: false,
        placements: [],
        scroll: computeScrollState(contentHeight, 0),
      };
    }

    return this._stack(outer, inner, options);
  }

  private _stack(outer: Bounds, inner: Bounds, options: PanelRenderOptions): PanelLayout {
    const heights = this._children.map(child => child.getHeight(inner.width));
    const contentHeight = heights.reduce((sum, height) => sum + height, 0);
    const scroll = computeScrollState(contentHeight, inner.height, options.scrollOffset ?? 0);

    const placements: ChildPlacement[] = [];
    let contentY = 0;

    this._children.forEach((child, index) => {
      const naturalHeight = heights[index];
      const top = contentY - scroll.scrollOffset;
      const rowOffset = Math.max(0, -top);
      const viewportTop = Math.min(Math.max(0, top), inner.height);
      const height = Math.min(Math.max(0, naturalHeight - rowOffset), inner.height - viewportTop);

      placements.push({
        child,
        index,
        naturalHeight,
        contentY,
        bounds: { x: inner.x, y: inner.y + viewportTop, width: inner.width, height },
        rowOffset,
        visible: height > 0,
      });
      contentY += naturalHeight;
    });

    const layout: PanelLayout = {
      outer,
      inner,
      fits: true,
      placements,
      scroll,
      scrollbar: this._scrollbar ? scrollbarRegion(outer) : undefined,
    };

    logger.trace('Panel layout', {
      inner,
      scroll,
      placements: placements.map(p => ({ type: p.child.type, bounds: p.bounds, rowOffset: p.rowOffset })),
    });

    return layout;
  }

  /**
   * Paint the decoration, the visible children and the scrollbar.
   * Children are stacked inside the interior the painter reports for the
   * decoration. Returns the layout that was painted.
   */
  render(bounds: Bounds, painter: Painter, options: PanelRenderOptions = {}): PanelLayout {
    let layout = this.layout(bounds, options);
    if (!layout.fits) {
      return layout;
    }

    if (this._decoration) {
      const reported = painter.paintDecoration(layout.outer, this._decoration);
      const inner = createBounds(reported.x, reported.y, reported.width, reported.height);
      if (!sameBounds(inner, layout.inner)) {
        logger.debug('Painter reported a different panel interior', { computed: layout.inner, reported: inner });
        layout = this._stack(layout.outer, inner, options);
      }
    }

    for (const placement of layout.placements) {
      if (placement.visible) {
        placement.child.render(placement.bounds, painter, { rowOffset: placement.rowOffset });
      }
    }

    if (layout.scrollbar) {
      painter.paintScrollbarTrack(layout.scrollbar, layout.scroll.thumbSize, layout.scroll.scrollOffset);
    }

    return layout;
  }
}

export class PanelBuilder {
  private _title?: string;
  private _borders?: Borders;
  private _borderStyle?: BorderStyle;
  private _padding?: BoxSpacing;
  private _style?: CellStyle;
  private _scrollbar: boolean;
  private readonly _children: PanelChild[] = [];

  constructor(title?: string) {
    this._title = title;
    this._scrollbar = PanetextConfig.get().panelScrollbar;
  }

  title(title: string): this {
    this._title = title;
    return this;
  }

  borders(borders: Borders): this {
    this._borders = { ...borders };
    return this;
  }

  borderStyle(borderStyle: BorderStyle): this {
    this._borderStyle = borderStyle;
    return this;
  }

  /** A number pads all four sides equally */
  padding(padding: BoxSpacing | number): this {
    this._padding = typeof padding === 'number' ? spacing(padding) : { ...padding };
    return this;
  }

  /** Style for the border and title */
  style(style: CellStyle): this {
    this._style = { ...style };
    return this;
  }

  scrollbar(enabled: boolean = true): this {
    this._scrollbar = enabled;
    return this;
  }

  addChild(child: PanelChild): this {
    this._children.push(child);
    return this;
  }

  addText(text: string, wrap?: WrapPolicy): this {
    return this.addChild(TextElement.from(text, wrap));
  }

  build(): PanelElement {
    const decorated = this._title !== undefined || this._borders !== undefined ||
                      this._padding !== undefined || this._borderStyle !== undefined;

    return new PanelElement({
      decoration: decorated ? {
        title: this._title,
        borders: this._borders ?? { ...BORDERS_ALL },
        borderStyle: this._borderStyle ?? 'thin',
        padding: this._padding ?? { ...DEFAULT_PANEL_PADDING },
        style: this._style,
      } : undefined,
      scrollbar: this._scrollbar,
      children: this._children,
    });
  }
}

function sameBounds(a: Bounds, b: Bounds): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}
