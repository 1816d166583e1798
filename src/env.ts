/**
 * Environment variable access.
 * Values are read fresh from process.env on every call so tests and hosts can
 * change them at runtime.
 *
 * Use Env.get() instead of process.env throughout the codebase.
 */

export class Env {
  /**
   * Get env var value.
   * Returns undefined if the var is unset.
   */
  static get(name: string): string | undefined {
    return process.env[name];
  }
}
