import { readFileSync } from "node:fs";
import { ConfigError } from "./errors.js";
import { ConfigSchema } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";
import type { LogLevel } from "./utils/logger.js";
import type { CueMode, MemoryPolicy, StorageFormat } from "./plan/types.js";

export type DagcacheConfig = {
  store: {
    root: string;
    metadataFile: string;
    objectsDir: string;
  };
  execution: {
    maxConcurrency: number;
    defaultRetries: number;
    /** 0 disables the timeout. */
    defaultTimeoutMs: number;
    defaultDeployment: string;
    defaultMemory: MemoryPolicy;
    defaultFormat: StorageFormat;
    defaultCue: CueMode;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  cache: {
    maxEntries: number;
  };
  hashing: {
    branchIdLength: number;
  };
  logging: {
    level: LogLevel;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: DagcacheConfig = {
  store: {
    root: ".dagcache",
    metadataFile: "meta.db",
    objectsDir: "objects",
  },
  execution: {
    maxConcurrency: 4,
    defaultRetries: 0,
    defaultTimeoutMs: 0,
    defaultDeployment: "worker",
    defaultMemory: "retain",
    defaultFormat: "json",
    defaultCue: "thorough",
  },
  retry: {
    baseDelayMs: 100,
    maxDelayMs: 5_000,
  },
  cache: {
    maxEntries: 500,
  },
  hashing: {
    branchIdLength: 12,
  },
  logging: {
    level: "info",
  },
};

let current: DagcacheConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function apply(overrides: Record<string, unknown>): void {
  const parsed = ConfigSchema.safeParse(deepMerge(DEFAULTS, overrides));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  current = parsed.data;
  setLogLevel(current.logging.level);
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<DagcacheConfig>): void {
  apply(overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
  setLogLevel(current.logging.level);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<DagcacheConfig> {
  return current;
}

/** Read a JSON config file and apply it on top of the defaults. */
export function loadConfigFile(path: string): Readonly<DagcacheConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config file "${path}"`, { cause: err });
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Config file "${path}" must contain a JSON object`);
  }
  apply(raw);
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<DagcacheConfig> = Object.freeze(DEFAULTS);
