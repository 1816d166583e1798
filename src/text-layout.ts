// Text layout engine: splits a string into display lines under a wrap policy.
// Lines are offset pairs into the source string; nothing is copied until a
// caller asks for the line text.

import { isSurrogatePairStart, snapSliceEnd } from './char-width.ts';
import { InvalidPolicyError, UnimplementedPolicyError } from './errors.ts';
import { toCellCount } from './geometry.ts';
import { getLogger } from './logging.ts';

const logger = getLogger('TextLayout');

export const WRAP_POLICIES = [
  'truncate',
  'truncate-ellipsis',
  'wrap-exact',
  'wrap-words',
  'wrap-justified',
  'wrap-centered',
  'wrap-right-aligned',
] as const;

export type WrapPolicy = typeof WRAP_POLICIES[number];

export const DEFAULT_WRAP_POLICY: WrapPolicy = 'wrap-words';

// Declared for API stability; no layout algorithm exists for these yet
const RESERVED_POLICIES: ReadonlySet<WrapPolicy> = new Set<WrapPolicy>([
  'wrap-justified',
  'wrap-centered',
  'wrap-right-aligned',
]);

/** Half-open range [start, end) of UTF-16 offsets into the laid-out text */
export interface LineSpan {
  readonly start: number;
  readonly end: number;
}

export type LayoutResult =
  | { ok: true; lines: LineSpan[] }
  | { ok: false; error: UnimplementedPolicyError };

export function isWrapPolicy(value: string): value is WrapPolicy {
  return WRAP_POLICIES.some(policy => policy === value);
}

/**
 * Validate an untyped policy name (config values, host input)
 */
export function parseWrapPolicy(value: string): WrapPolicy {
  if (!isWrapPolicy(value)) {
    throw new InvalidPolicyError(value, WRAP_POLICIES);
  }
  return value;
}

export function isWrapPolicySupported(policy: WrapPolicy): boolean {
  return !RESERVED_POLICIES.has(policy);
}

/**
 * Compute the display lines of text at the given width.
 *
 * - `truncate`, `truncate-ellipsis`: always exactly one line, the first
 *   `width` units; embedded newlines are not interpreted. The ellipsis is a
 *   render-time concern.
 * - `wrap-exact`: fixed-width slices; a newline inside the window ends the
 *   line and is consumed.
 * - `wrap-words`: greedy word wrap; breaks at the last space in the window,
 *   hard-breaks words longer than the width, and skips the spaces that follow
 *   a break.
 *
 * Width 0 yields one empty line for the truncating policies and one empty
 * line per newline-separated segment for the wrapping ones.
 *
 * @throws UnimplementedPolicyError for reserved policies
 */
export function computeLines(text: string, width: number, policy: WrapPolicy = DEFAULT_WRAP_POLICY): LineSpan[] {
  const cells = toCellCount(width);
  let lines: LineSpan[];

  switch (policy) {
    case 'truncate':
    case 'truncate-ellipsis':
      lines = truncateLines(text, cells);
      break;
    case 'wrap-exact':
      lines = cells === 0 ? degenerateLines(text) : wrapExactLines(text, cells);
      break;
    case 'wrap-words':
      lines = cells === 0 ? degenerateLines(text) : wrapWordLines(text, cells);
      break;
    case 'wrap-justified':
    case 'wrap-centered':
    case 'wrap-right-aligned':
      throw new UnimplementedPolicyError(policy);
  }

  if (logger.isLevelEnabled('TRACE')) {
    logger.trace('Computed lines', {
      width: cells,
      policy,
      lines: lines.map(line => text.slice(line.start, line.end)),
    });
  }

  return lines;
}

export function computeHeight(text: string, width: number, policy: WrapPolicy = DEFAULT_WRAP_POLICY): number {
  return computeLines(text, width, policy).length;
}

/**
 * computeLines() for callers that branch on capability instead of catching
 */
export function tryComputeLines(text: string, width: number, policy: WrapPolicy = DEFAULT_WRAP_POLICY): LayoutResult {
  if (!isWrapPolicySupported(policy)) {
    return { ok: false, error: new UnimplementedPolicyError(policy) };
  }
  return { ok: true, lines: computeLines(text, width, policy) };
}

export function lineText(text: string, line: LineSpan): string {
  return text.slice(line.start, line.end);
}

export function lineTexts(text: string, lines: readonly LineSpan[]): string[] {
  return lines.map(line => lineText(text, line));
}

function truncateLines(text: string, width: number): LineSpan[] {
  let end = Math.min(text.length, width);
  // Truncation may drop a code point that does not fit, but never halves one
  if (end > 0 && end < text.length && isSurrogatePairStart(text, end - 1)) {
    end--;
  }
  return [{ start: 0, end }];
}

function degenerateLines(text: string): LineSpan[] {
  if (text.length === 0) {
    logger.debug('Zero width layout of empty text');
    return [];
  }

  const lines: LineSpan[] = [{ start: 0, end: 0 }];
  let newline = text.indexOf('\n');
  while (newline !== -1) {
    lines.push({ start: newline + 1, end: newline + 1 });
    newline = text.indexOf('\n', newline + 1);
  }

  logger.debug('Zero width layout', { segments: lines.length });
  return lines;
}

function wrapExactLines(text: string, width: number): LineSpan[] {
  const lines: LineSpan[] = [];
  let pos = 0;

  while (pos < text.length) {
    const end = snapSliceEnd(text, pos, Math.min(pos + width, text.length));

    const newline = text.indexOf('\n', pos);
    if (newline !== -1 && newline < end) {
      lines.push({ start: pos, end: newline });
      pos = newline + 1;
      continue;
    }

    lines.push({ start: pos, end });
    pos = end;
  }

  return lines;
}

function wrapWordLines(text: string, width: number): LineSpan[] {
  const lines: LineSpan[] = [];
  let pos = 0;

  while (pos < text.length) {
    const end = snapSliceEnd(text, pos, Math.min(pos + width, text.length));

    // Any newline inside the window wins over the word break
    const newline = text.indexOf('\n', pos);
    if (newline !== -1 && newline < end) {
      lines.push({ start: pos, end: newline });
      pos = newline + 1;
      continue;
    }

    let breakAt = end;
    if (end < text.length && text[end] !== ' ') {
      const space = text.lastIndexOf(' ', end - 1);
      if (space >= pos) {
        breakAt = space;
      }
    }

    lines.push({ start: pos, end: breakAt });
    pos = breakAt;

    while (pos < text.length && text[pos] === ' ') {
      pos++;
    }
  }

  return lines;
}
