// Tests for the terminal cell buffer and the buffer painter

import { expect, test } from 'vitest';
import { BufferPainter, TerminalBuffer, type Cell } from '../mod.ts';

test('TerminalBuffer creation and basic operations', () => {
  const buffer = new TerminalBuffer(10, 5);

  expect(buffer.width).toBe(10);
  expect(buffer.height).toBe(5);
  expect(buffer.bounds).toEqual({ x: 0, y: 0, width: 10, height: 5 });
  expect(buffer.getCell(0, 0)?.char).toBe(' ');
});

test('TerminalBuffer setCell and getCell', () => {
  const buffer = new TerminalBuffer(5, 5);

  const testCell: Cell = {
    char: 'A',
    foreground: 'red',
    bold: true,
  };

  buffer.setCell(2, 3, testCell);
  const retrieved = buffer.getCell(2, 3);

  expect(retrieved?.char).toBe('A');
  expect(retrieved?.foreground).toBe('red');
  expect(retrieved?.bold).toBe(true);
});

test('TerminalBuffer bounds checking', () => {
  const buffer = new TerminalBuffer(3, 3);

  buffer.setCell(-1, 0, { char: 'X' });
  buffer.setCell(0, -1, { char: 'X' });
  buffer.setCell(3, 0, { char: 'X' });
  buffer.setCell(0, 3, { char: 'X' });

  expect(buffer.getCell(-1, 0)).toBeUndefined();
  expect(buffer.getCell(3, 0)).toBeUndefined();
  expect(buffer.getLines()).toEqual(['   ', '   ', '   ']);
  expect(() => buffer.setCell(NaN, 0, { char: 'X' })).toThrow('coordinates cannot be NaN');
});

test('TerminalBuffer setText clips to maxWidth', () => {
  const buffer = new TerminalBuffer(10, 2);

  expect(buffer.setText(2, 0, 'Hello', { foreground: 'blue' })).toBe(5);
  expect(buffer.setText(0, 1, 'Hello', {}, 3)).toBe(3);

  expect(buffer.getCell(2, 0)?.foreground).toBe('blue');
  expect(buffer.getLines()).toEqual(['  Hello   ', 'Hel       ']);
});

test('TerminalBuffer places wide characters in two cells', () => {
  const buffer = new TerminalBuffer(5, 1);

  expect(buffer.setText(0, 0, '日本', {}, 10)).toBe(4);
  expect(buffer.getCell(0, 0)?.width).toBe(2);
  expect(buffer.getCell(1, 0)?.isWideCharContinuation).toBe(true);
  expect(buffer.getLines()).toEqual(['日本 ']);
});

test('TerminalBuffer skips a wide character that does not fit', () => {
  const buffer = new TerminalBuffer(3, 1);

  expect(buffer.setText(2, 0, '日')).toBe(0);
  expect(buffer.getLines()).toEqual(['   ']);
});

test('TerminalBuffer overwriting half of a wide character clears it', () => {
  const buffer = new TerminalBuffer(3, 1);

  buffer.setText(0, 0, '日');
  buffer.setCell(1, 0, { char: 'x' });
  expect(buffer.getLines()).toEqual([' x ']);
});

test('TerminalBuffer drawBorder draws only the requested sides', () => {
  const buffer = new TerminalBuffer(4, 3);

  buffer.drawBorder(buffer.bounds, { top: true, right: false, bottom: false, left: true });
  expect(buffer.getLines()).toEqual(['┌───', '│   ', '│   ']);
});

test('TerminalBuffer drawBorder styles', () => {
  const buffer = new TerminalBuffer(3, 3);

  buffer.drawBorder(buffer.bounds, { top: true, right: true, bottom: true, left: true }, {}, 'double');
  expect(buffer.toString()).toBe('╔═╗\n║ ║\n╚═╝');
});

test('TerminalBuffer clear resets every cell', () => {
  const buffer = new TerminalBuffer(3, 2);

  buffer.setText(0, 0, 'abc');
  buffer.setText(1, 1, '#');
  expect(buffer.getLines()).toEqual(['abc', ' # ']);

  buffer.clear();
  expect(buffer.getLines()).toEqual(['   ', '   ']);
});

test('BufferPainter paintDecoration returns the interior', () => {
  const buffer = new TerminalBuffer(10, 4);
  const painter = new BufferPainter(buffer, { ascii: false });

  const inner = painter.paintDecoration(buffer.bounds, {
    title: 'A long title',
    borders: { top: true, right: true, bottom: true, left: true },
    borderStyle: 'rounded',
    padding: { top: 0, right: 1, bottom: 0, left: 1 },
  });

  expect(inner).toEqual({ x: 2, y: 1, width: 6, height: 2 });
  expect(buffer.getLines()).toEqual(['╭A long t╮', '│        │', '│        │', '╰────────╯']);
});

test('BufferPainter paintDecoration on a rectangle that is too small paints nothing', () => {
  const buffer = new TerminalBuffer(2, 2);
  const painter = new BufferPainter(buffer, { ascii: false });

  const inner = painter.paintDecoration(buffer.bounds, {
    borders: { top: true, right: true, bottom: true, left: true },
    borderStyle: 'thin',
    padding: { top: 1, right: 1, bottom: 1, left: 1 },
  });

  expect(inner).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  expect(buffer.getLines()).toEqual(['  ', '  ']);
});

test('BufferPainter paintScrollbarTrack places the thumb at the position', () => {
  const buffer = new TerminalBuffer(1, 6);
  const painter = new BufferPainter(buffer, { ascii: true });

  painter.paintScrollbarTrack(buffer.bounds, 2, 1);
  expect(buffer.getLines()).toEqual(['^', '.', '#', '#', '.', 'v']);
});

test('BufferPainter paintScrollbarTrack clamps a thumb larger than the track', () => {
  const buffer = new TerminalBuffer(1, 4);
  const painter = new BufferPainter(buffer, { ascii: false });

  painter.paintScrollbarTrack(buffer.bounds, 10, 3);
  expect(buffer.getLines()).toEqual(['↑', '█', '█', '↓']);
});
