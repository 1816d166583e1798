// Cell buffer a host renders into; the default painter target

import { getCharWidth } from './char-width.ts';
import { BORDER_CHARS, type BorderStyle, type Borders, type Bounds, type CellStyle } from './types.ts';

export interface Cell {
  char: string;
  foreground?: string;
  background?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  dim?: boolean;
  reverse?: boolean;
  // Wide character support
  width?: number; // Character display width (1 or 2)
  isWideCharContinuation?: boolean; // True if this cell is the second part of a wide character
}

export class TerminalBuffer {
  private _width: number;
  private _height: number;
  private _cells: Cell[][];
  private _defaultCell: Cell;

  constructor(width: number, height: number, defaultCell: Cell = { char: ' ' }) {
    this._width = Math.max(0, width);
    this._height = Math.max(0, height);
    this._defaultCell = defaultCell;
    this._cells = this._createEmptyBuffer();
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get bounds(): Bounds {
    return { x: 0, y: 0, width: this._width, height: this._height };
  }

  private _createEmptyBuffer(): Cell[][] {
    const buffer: Cell[][] = [];
    for (let y = 0; y < this._height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this._width; x++) {
        row.push({ ...this._defaultCell });
      }
      buffer.push(row);
    }
    return buffer;
  }

  clear(): void {
    this._cells = this._createEmptyBuffer();
  }

  // Set a single cell with wide character support
  setCell(x: number, y: number, cell: Cell): void {
    if (isNaN(x) || isNaN(y)) {
      throw new Error(`Invalid coordinates: (${x}, ${y}) - coordinates cannot be NaN`);
    }
    if (x < 0 || x >= this._width || y < 0 || y >= this._height) {
      return;
    }

    this._clearWideCharAt(x, y);

    const charWidth = cell.width ?? getCharWidth(cell.char);
    const row = this._cells[y];

    if (charWidth === 2) {
      // Not enough space for wide character, skip
      if (x + 1 >= this._width) {
        return;
      }
      this._clearWideCharAt(x + 1, y);
      row[x] = { ...cell, width: 2 };
      row[x + 1] = {
        ...cell, // Copy style
        char: '',
        isWideCharContinuation: true,
        width: 0,
      };
    } else if (charWidth === 1) {
      row[x] = { ...cell, width: 1 };
    }
    // Zero-width and control characters are skipped
  }

  // Clear wide character at position if it exists
  private _clearWideCharAt(x: number, y: number): void {
    const row = this._cells[y];
    const cell = row[x];

    if (cell.isWideCharContinuation) {
      if (x > 0) {
        row[x - 1] = { ...this._defaultCell };
      }
      row[x] = { ...this._defaultCell };
    } else if (cell.width === 2) {
      if (x + 1 < this._width) {
        row[x + 1] = { ...this._defaultCell };
      }
      row[x] = { ...this._defaultCell };
    }
  }

  getCell(x: number, y: number): Cell | undefined {
    if (x >= 0 && x < this._width && y >= 0 && y < this._height) {
      return { ...this._cells[y][x] };
    }
    return undefined;
  }

  /**
   * Write text starting at (x, y), clipped to maxWidth columns and to the
   * buffer edge. Returns the number of columns written.
   */
  setText(x: number, y: number, text: string, style: CellStyle = {}, maxWidth: number = Infinity): number {
    const limit = Math.min(x + Math.max(0, maxWidth), this._width);
    let visualX = x;

    for (const char of text) {
      const charWidth = getCharWidth(char);
      if (charWidth <= 0) continue;
      if (visualX + charWidth > limit) break;

      this.setCell(visualX, y, { ...style, char, width: charWidth });
      visualX += charWidth;
    }

    return visualX - x;
  }

  /**
   * Draw border lines on the requested sides of a rectangle.
   * Corners are only drawn where both adjoining sides are.
   */
  drawBorder(
    bounds: Bounds,
    borders: Borders,
    style: CellStyle = {},
    borderStyle: BorderStyle = 'thin'
  ): void {
    const { x, y, width, height } = bounds;
    if (width <= 0 || height <= 0) return;

    const chars = BORDER_CHARS[borderStyle];
    const right = x + width - 1;
    const bottom = y + height - 1;

    if (borders.top) {
      for (let i = x; i <= right; i++) this.setCell(i, y, { ...style, char: chars.h });
    }
    if (borders.bottom) {
      for (let i = x; i <= right; i++) this.setCell(i, bottom, { ...style, char: chars.h });
    }
    if (borders.left) {
      for (let i = y; i <= bottom; i++) this.setCell(x, i, { ...style, char: chars.v });
    }
    if (borders.right) {
      for (let i = y; i <= bottom; i++) this.setCell(right, i, { ...style, char: chars.v });
    }

    if (borders.top && borders.left) this.setCell(x, y, { ...style, char: chars.tl });
    if (borders.top && borders.right) this.setCell(right, y, { ...style, char: chars.tr });
    if (borders.bottom && borders.left) this.setCell(x, bottom, { ...style, char: chars.bl });
    if (borders.bottom && borders.right) this.setCell(right, bottom, { ...style, char: chars.br });
  }

  /**
   * Rows as strings; wide character continuation cells are skipped
   */
  getLines(): string[] {
    return this._cells.map(row =>
      row.filter(cell => !cell.isWideCharContinuation).map(cell => cell.char).join('')
    );
  }

  toString(): string {
    return this.getLines().join('\n');
  }
}
