// Component module exports

export * from './text.ts';
export * from './separator.ts';
export * from './panel.ts';
export * from './scrollbar.ts';
