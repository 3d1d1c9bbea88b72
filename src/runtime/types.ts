/**
 * Runtime Port: platform contract
 *
 * The handful of host services the messaging layer touches outside the
 * channel: environment variables and config files. Tests and
 * alternative hosts implement the same signatures.
 *
 * @module bastion/runtime/types
 */

// ─── Environment ─────────────────────────────────────────

/**
 * Get an environment variable.
 * Returns undefined if not set (never throws).
 */
export type EnvFn = (key: string) => string | undefined;

// ─── File System ─────────────────────────────────────────

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist (no throw on ENOENT).
 * Throws on other errors (permission denied, etc.).
 */
export type ReadTextFileFn = (path: string) => Promise<string | null>;

// ─── Port interface ──────────────────────────────────────

/**
 * Complete runtime port contract.
 *
 * @example
 * ```typescript
 * void ({ env, readTextFile } satisfies RuntimePort);
 * ```
 */
export interface RuntimePort {
  env: EnvFn;
  readTextFile: ReadTextFileFn;
}
