// panetext library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Export all types
export * from './src/types.ts';

// Export geometry helpers
export * from './src/geometry.ts';

// Export buffer system and character width utilities
export * from './src/buffer.ts';
export * from './src/char-width.ts';
export * from './src/painter.ts';

// Export text layout engine
export * from './src/text-layout.ts';
export * from './src/layout-cache.ts';

// Export components
export * from './src/components/mod.ts';

// Export errors, configuration and logging
export * from './src/errors.ts';
export { PanetextConfig, type ConfigInitOptions, type ConfigSource, type LogLevelName } from './src/config/config.ts';
export {
  Logger,
  createLogger,
  getGlobalLogger,
  getLogger,
  setGlobalLogger,
  type ComponentLogger,
  type LogEntry,
  type LoggerOptions,
  type LoggerStats,
  type LogLevel,
} from './src/logging.ts';
