// Tests for the text component rendered through the buffer painter

import { afterEach, beforeEach, expect, test } from 'vitest';
import {
  BufferPainter,
  LayoutCache,
  PanetextConfig,
  TerminalBuffer,
  TextElement,
  UnimplementedPolicyError,
  type WrapPolicy,
} from '../mod.ts';

function renderText(text: string, wrap: WrapPolicy, width: number, height: number, rowOffset = 0): string[] {
  const buffer = new TerminalBuffer(width, height);
  const element = new TextElement({ text, wrap });
  element.render(buffer.bounds, new BufferPainter(buffer, { ascii: false }), { rowOffset });
  return buffer.getLines();
}

beforeEach(() => {
  PanetextConfig.reset();
  PanetextConfig.init({ fileConfig: {} });
});

afterEach(() => {
  PanetextConfig.reset();
});

test('TextElement paints one line per row, left aligned', () => {
  expect(renderText('Hello 1!', 'wrap-words', 10, 2)).toEqual(['Hello 1!  ', '          ']);
});

test('TextElement stops painting at the bottom of its bounds', () => {
  const element = new TextElement({ text: 'aa bb cc', wrap: 'wrap-words' });
  expect(element.getLineTexts(2)).toEqual(['aa', 'bb', 'cc']);

  const buffer = new TerminalBuffer(2, 3);
  element.render({ x: 0, y: 0, width: 2, height: 2 }, new BufferPainter(buffer, { ascii: false }));
  expect(buffer.getLines()).toEqual(['aa', 'bb', '  ']);
});

test('TextElement skips rows hidden by the row offset', () => {
  expect(renderText('aa bb cc', 'wrap-words', 2, 2, 1)).toEqual(['bb', 'cc']);
});

test('truncate-ellipsis marks a line that fills the width', () => {
  expect(renderText('Hello, world!', 'truncate-ellipsis', 8, 1)).toEqual(['Hello...']);
  expect(renderText('abcdefgh', 'truncate-ellipsis', 8, 1)).toEqual(['abcde...']);
});

test('truncate-ellipsis leaves shorter lines unchanged', () => {
  expect(renderText('Hi', 'truncate-ellipsis', 8, 1)).toEqual(['Hi      ']);
});

test('truncate-ellipsis shortens the marker below three columns', () => {
  expect(renderText('abcdef', 'truncate-ellipsis', 2, 1)).toEqual(['..']);
});

test('truncate paints the prefix without a marker', () => {
  expect(renderText('Hello, world!', 'truncate', 8, 1)).toEqual(['Hello, w']);
});

test('TextElement uses the configured default wrap policy', () => {
  PanetextConfig.reset();
  PanetextConfig.init({ fileConfig: { 'text.defaultWrap': 'truncate' } });

  const element = TextElement.from('a b c');
  expect(element.wrap).toBe('truncate');
  expect(element.getHeight(1)).toBe(1);
});

test('TextElement with an explicit cache reuses layouts', () => {
  const cache = new LayoutCache(4);
  const element = new TextElement({ text: 'one two three', wrap: 'wrap-words', cache });

  const first = element.getLines(5);
  expect(element.getHeight(5)).toBe(3);
  expect(element.getLines(5)).toBe(first);
  expect(cache.getStats()).toEqual({ hits: 2, misses: 1, size: 1 });
});

test('TextElement creates a cache when layout.cacheSize is set', () => {
  PanetextConfig.reset();
  PanetextConfig.init({ fileConfig: { 'layout.cacheSize': 8 } });

  const cached = TextElement.from('one two three');
  expect(cached.getLines(5)).toBe(cached.getLines(5));

  const uncached = new TextElement({ text: 'one two three', cache: false });
  expect(uncached.getLines(5)).not.toBe(uncached.getLines(5));
  expect(uncached.getLines(5)).toEqual(cached.getLines(5));
});

test('TextElement with a reserved policy reports and throws', () => {
  const element = new TextElement({ text: 'x', wrap: 'wrap-centered' });
  expect(element.isLayoutSupported()).toBe(false);
  expect(() => element.getHeight(5)).toThrow(UnimplementedPolicyError);
});
