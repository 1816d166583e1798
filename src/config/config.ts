// Unified configuration system for panetext
// Schema-driven with layered overrides: defaults < file < env < runtime

import { readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import schema from './schema.json' with { type: 'json' };
import { Env } from '../env.ts';
import { getConfigDir } from '../xdg.ts';

/**
 * Schema property definition
 */
interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

/**
 * Config schema structure
 */
interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export type LogLevelName = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type ConfigSource = 'default' | 'file' | 'env' | 'runtime';

export interface ConfigInitOptions {
  /** Config values used instead of reading config.json (nested or dot-notation keys) */
  fileConfig?: Record<string, unknown>;
}

const configSchema: ConfigSchema = schema;

let _instance: PanetextConfig | null = null;

/**
 * Configuration for panetext.
 *
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. File config (~/.config/panetext/config.json)
 * 3. Env vars
 * 4. Runtime overrides via setValue()
 */
export class PanetextConfig {
  protected data: Record<string, unknown> = {};
  protected sources: Record<string, ConfigSource> = {};

  protected constructor(fileConfig: Record<string, unknown>) {
    for (const [path, prop] of Object.entries(configSchema.properties)) {
      const { value, source } = this.resolveValue(path, prop, fileConfig);
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = parseValue(envVal, prop);
        if (parsed !== undefined && isValidValue(parsed, prop)) {
          return { value: parsed, source: 'env' };
        }
      }
    }

    const fileVal = getPath(fileConfig, path);
    if (fileVal !== undefined && isValidValue(fileVal, prop)) {
      return { value: fileVal, source: 'file' };
    }

    return { value: prop.default, source: 'default' };
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options?: ConfigInitOptions): PanetextConfig {
    if (_instance) {
      throw new Error('PanetextConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    _instance = new PanetextConfig(options?.fileConfig ?? loadConfigFile());
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): PanetextConfig {
    return _instance ?? this.init();
  }

  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  static getSchema(): ConfigSchema {
    return configSchema;
  }

  static getConfigPath(): string {
    return join(getConfigDir(), 'config.json');
  }

  /**
   * Current config formatted as text, one `key = value` line per schema key
   */
  static getConfigText(): string {
    const instance = this.get();
    const configPath = this.getConfigPath();
    const lines: string[] = [];

    lines.push('panetext configuration');
    lines.push('');
    lines.push(`Config file: ${configPath} (${fileExists(configPath) ? 'exists' : 'not found'})`);
    lines.push('Priority: default < file < env < runtime');
    lines.push('');

    for (const [path, prop] of Object.entries(configSchema.properties)) {
      const value = instance.data[path];
      const displayValue = value === undefined ? '(not set)' : String(value);
      let sourceStr = '';
      switch (instance.sources[path]) {
        case 'env':
          sourceStr = ` <- ${prop.env}`;
          break;
        case 'file':
          sourceStr = ' <- config.json';
          break;
        case 'runtime':
          sourceStr = ' <- runtime';
          break;
        case 'default':
          break;
      }
      lines.push(`  ${path} = ${displayValue}${sourceStr}`);
    }

    return lines.join('\n');
  }

  getSource(key: string): ConfigSource | undefined {
    return this.sources[key];
  }

  getValue(key: string): unknown {
    return this.data[key];
  }

  /**
   * Set a config value at runtime.
   * Values that do not match the schema type are rejected.
   */
  setValue(key: string, value: unknown): void {
    const prop = configSchema.properties[key];
    if (!prop) {
      throw new Error(`Unknown config key: ${key}`);
    }
    const coerced = typeof value === 'string' ? parseValue(value, prop) : value;
    if (coerced === undefined || !isValidValue(coerced, prop)) {
      throw new Error(`Invalid value for ${key}: ${JSON.stringify(value)}`);
    }
    this.data[key] = coerced;
    this.sources[key] = 'runtime';
  }

  // Logging
  get logLevel(): LogLevelName {
    const value = this.data['log.level'];
    return isLogLevelName(value) ? value : 'INFO';
  }

  get logFile(): string | undefined {
    const value = this.data['log.file'];
    return typeof value === 'string' ? value : undefined;
  }

  // Layout
  get layoutCacheSize(): number {
    const value = this.data['layout.cacheSize'];
    return typeof value === 'number' ? value : 0;
  }

  get defaultWrap(): string {
    const value = this.data['text.defaultWrap'];
    return typeof value === 'string' ? value : 'wrap-words';
  }

  get panelScrollbar(): boolean {
    return this.data['panel.scrollbar'] !== false;
  }

  get asciiGlyphs(): boolean {
    return this.data['glyphs.ascii'] === true;
  }
}

function isLogLevelName(value: unknown): value is LogLevelName {
  return value === 'TRACE' || value === 'DEBUG' || value === 'INFO' ||
         value === 'WARN' || value === 'ERROR' || value === 'FATAL';
}

function parseValue(value: string, prop: ConfigProperty): unknown {
  switch (prop.type) {
    case 'boolean':
      return value === 'true' || value === '1';
    case 'integer': {
      const parsed = parseInt(value, 10);
      return isNaN(parsed) ? undefined : parsed;
    }
    case 'string':
      if (prop.enum) {
        return prop.enum.find(option => option.toLowerCase() === value.toLowerCase());
      }
      return value;
    default:
      return value;
  }
}

function isValidValue(value: unknown, prop: ConfigProperty): boolean {
  switch (prop.type) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value) &&
             (prop.minimum === undefined || value >= prop.minimum) &&
             (prop.maximum === undefined || value <= prop.maximum);
    case 'string':
      return typeof value === 'string' && (!prop.enum || prop.enum.includes(value));
    default:
      return true;
  }
}

function getPath(obj: Record<string, unknown>, path: string): unknown {
  // Flat dot-notation key first, then nested lookup
  if (path in obj) {
    return obj[path];
  }

  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

function loadConfigFile(): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(readFileSync(PanetextConfig.getConfigPath(), 'utf8'));
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return {};
  } catch {
    // Missing or unreadable config file means defaults
    return {};
  }
}

function fileExists(path: string): boolean {
  try {
    statSync(path);
    return true;
  } catch {
    return false;
  }
}
