/**
 * Runtime adapter for Node.js
 *
 * @see types.ts for the port contract
 * @module bastion/runtime
 */

import { readFile } from "node:fs/promises";
import type { RuntimePort } from "./types.ts";

/**
 * Get an environment variable.
 */
export function env(key: string): string | undefined {
  return process.env[key];
}

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (
      err && typeof err === "object" && "code" in err && err.code === "ENOENT"
    ) {
      return null;
    }
    throw err;
  }
}

/** Compile-time check that this module satisfies RuntimePort */
void ({ env, readTextFile } satisfies RuntimePort);
