/**
 * Channel configuration loader.
 *
 * Loads the named options consumed by the router and the client engine
 * from a YAML file with env var overrides.
 * Priority: env vars > YAML > defaults
 *
 * @module bastion/config
 */

import { parse as parseYaml } from "yaml";
import { isPlainObject } from "../protocol/shape.ts";
import { env, readTextFile } from "../runtime/runtime.ts";
import type { ClientChannel, ServerChannel } from "../transport/channel.ts";
import type { ClientOptions, RouterOptions } from "../types.ts";

/**
 * Parsed channel configuration (after YAML + env merge).
 * Durations are in seconds, as written in the file.
 */
export interface ChannelConfig {
  /** Requests allowed per sender per rate limit window */
  maxRequestRate: number;
  /** Rate limit window (s) */
  rateLimitWindow: number;
  /** Client deadline per attempt (s) */
  requestTimeout: number;
  /** Oldest request the server accepts (s) */
  maxRequestAge: number;
  /** Minimum spacing between client requests for one action (s) */
  throttleInterval: number;
  /** Client attempts per request, including the first */
  retryAttempts: number;
  enableRateLimiting: boolean;
  enableRequestLogging: boolean;
}

export const DEFAULT_CHANNEL_CONFIG: Readonly<ChannelConfig> = {
  maxRequestRate: 30,
  rateLimitWindow: 1,
  requestTimeout: 10,
  maxRequestAge: 30,
  throttleInterval: 0.1,
  retryAttempts: 3,
  enableRateLimiting: true,
  enableRequestLogging: false,
};

type NumericKey =
  | "maxRequestRate"
  | "rateLimitWindow"
  | "requestTimeout"
  | "maxRequestAge"
  | "throttleInterval"
  | "retryAttempts";

type BooleanKey = "enableRateLimiting" | "enableRequestLogging";

const NUMERIC_ENV: Record<NumericKey, string> = {
  maxRequestRate: "BASTION_MAX_REQUEST_RATE",
  rateLimitWindow: "BASTION_RATE_LIMIT_WINDOW",
  requestTimeout: "BASTION_REQUEST_TIMEOUT",
  maxRequestAge: "BASTION_MAX_REQUEST_AGE",
  throttleInterval: "BASTION_THROTTLE_INTERVAL",
  retryAttempts: "BASTION_RETRY_ATTEMPTS",
};

const BOOLEAN_ENV: Record<BooleanKey, string> = {
  enableRateLimiting: "BASTION_ENABLE_RATE_LIMITING",
  enableRequestLogging: "BASTION_ENABLE_REQUEST_LOGGING",
};

const INTEGER_KEYS: ReadonlySet<NumericKey> = new Set([
  "maxRequestRate",
  "retryAttempts",
]);

/**
 * Load channel configuration from YAML file + env var overrides.
 *
 * 1. Reads YAML file (if it exists) and takes its `channel` section
 * 2. Overlays env vars (BASTION_* take precedence)
 * 3. Validates every value (fail-fast)
 * 4. Fills defaults for anything unset
 *
 * Env var mapping:
 * - BASTION_MAX_REQUEST_RATE → channel.maxRequestRate
 * - BASTION_RATE_LIMIT_WINDOW → channel.rateLimitWindow
 * - BASTION_REQUEST_TIMEOUT → channel.requestTimeout
 * - BASTION_MAX_REQUEST_AGE → channel.maxRequestAge
 * - BASTION_THROTTLE_INTERVAL → channel.throttleInterval
 * - BASTION_RETRY_ATTEMPTS → channel.retryAttempts
 * - BASTION_ENABLE_RATE_LIMITING → channel.enableRateLimiting
 * - BASTION_ENABLE_REQUEST_LOGGING → channel.enableRequestLogging
 *
 * @param configPath - Path to YAML config file. Defaults to "bastion.yaml" in cwd.
 * @throws Error if a value is invalid
 */
export async function loadChannelConfig(
  configPath?: string,
): Promise<ChannelConfig> {
  const yamlChannel = await loadYamlChannel(configPath ?? "bastion.yaml");
  const config: ChannelConfig = { ...DEFAULT_CHANNEL_CONFIG };

  for (const [key, envName] of entries(NUMERIC_ENV)) {
    const fromEnv = env(envName);
    if (fromEnv !== undefined) {
      config[key] = parseNumber(key, fromEnv, envName);
    } else if (yamlChannel && yamlChannel[key] !== undefined) {
      config[key] = parseNumber(key, yamlChannel[key], `channel.${key}`);
    }
  }

  for (const [key, envName] of entries(BOOLEAN_ENV)) {
    const fromEnv = env(envName);
    if (fromEnv !== undefined) {
      config[key] = parseBoolean(fromEnv, envName);
    } else if (yamlChannel && yamlChannel[key] !== undefined) {
      config[key] = parseBoolean(yamlChannel[key], `channel.${key}`);
    }
  }

  return config;
}

/**
 * Router options derived from a loaded config (seconds → ms).
 */
export function toRouterOptions(
  config: ChannelConfig,
  channel: ServerChannel,
): RouterOptions {
  return {
    channel,
    maxRequestRate: config.maxRequestRate,
    rateLimitWindowMs: config.rateLimitWindow * 1000,
    maxRequestAgeMs: config.maxRequestAge * 1000,
    enableRateLimiting: config.enableRateLimiting,
    enableRequestLogging: config.enableRequestLogging,
  };
}

/**
 * Client options derived from a loaded config (seconds → ms).
 * Retry is enabled when `retryAttempts > 1`, throttle when
 * `throttleInterval > 0`.
 */
export function toClientOptions(
  config: ChannelConfig,
  channel: ClientChannel,
  sessionId: string,
): ClientOptions {
  const options: ClientOptions = {
    channel,
    sessionId,
    requestTimeoutMs: config.requestTimeout * 1000,
    enableRequestLogging: config.enableRequestLogging,
  };
  if (config.throttleInterval > 0) {
    options.throttle = { intervalMs: config.throttleInterval * 1000 };
  }
  if (config.retryAttempts > 1) {
    options.retry = { maxAttempts: config.retryAttempts };
  }
  return options;
}

function parseNumber(key: NumericKey, raw: unknown, source: string): number {
  const value = typeof raw === "string" && raw.trim() !== ""
    ? Number(raw)
    : raw;
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(
      `[ChannelConfig] ${source} must be a positive number, got "${String(raw)}"`,
    );
  }
  if (INTEGER_KEYS.has(key) && !Number.isInteger(value)) {
    throw new Error(
      `[ChannelConfig] ${source} must be a positive integer, got "${String(raw)}"`,
    );
  }
  return value;
}

function parseBoolean(raw: unknown, source: string): boolean {
  if (typeof raw === "boolean") return raw;
  if (raw === "true" || raw === "1" || raw === 1) return true;
  if (raw === "false" || raw === "0" || raw === 0) return false;
  throw new Error(
    `[ChannelConfig] ${source} must be true/false/1/0, got "${String(raw)}"`,
  );
}

function entries<K extends string, V>(record: Record<K, V>): Array<[K, V]> {
  const keys = Object.keys(record).filter((k): k is K => k in record);
  return keys.map((k) => [k, record[k]]);
}

/**
 * Load the channel section from a YAML config file.
 * Returns null if file doesn't exist (not an error).
 */
async function loadYamlChannel(
  path: string,
): Promise<Record<string, unknown> | null> {
  // readTextFile returns null if file doesn't exist
  const text = await readTextFile(path);
  if (text === null) return null;

  const parsed: unknown = parseYaml(text);
  if (!isPlainObject(parsed)) return null;

  const { channel } = parsed;
  if (channel === undefined || channel === null) return null;
  if (!isPlainObject(channel)) {
    throw new Error(`[ChannelConfig] "channel" in ${path} must be a mapping`);
  }
  return channel;
}
