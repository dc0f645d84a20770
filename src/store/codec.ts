import { createHash } from "node:crypto";
import { deserialize as v8Deserialize, serialize as v8Serialize } from "node:v8";
import type { StorageFormat } from "../plan/types.js";

/** SHA-256 hex digest of text or bytes. */
export function sha256(input: string | Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * JSON with object keys sorted, so equal values always produce equal text.
 * Throws a TypeError for anything JSON cannot round-trip.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value, "$"));
}

function canonicalize(value: unknown, path: string): unknown {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new TypeError(`${path}: ${value} is not representable in JSON`);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => canonicalize(item, `${path}[${i}]`));
  }
  if (typeof value === "object") {
    const proto = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      const ctor = value.constructor?.name ?? "object";
      throw new TypeError(`${path}: ${ctor} is not representable in JSON (use the "v8" format)`);
    }
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item: unknown = Reflect.get(value, key);
      if (item === undefined) continue;
      out[key] = canonicalize(item, `${path}.${key}`);
    }
    return out;
  }
  throw new TypeError(`${path}: ${typeof value} is not representable in JSON (use the "v8" format)`);
}

export function serialize(value: unknown, format: StorageFormat): Uint8Array {
  switch (format) {
    case "json":
      return Buffer.from(canonicalJson(value), "utf8");
    case "v8":
      return v8Serialize(value);
  }
}

export function deserialize(bytes: Uint8Array, format: StorageFormat): unknown {
  switch (format) {
    case "json":
      return JSON.parse(Buffer.from(bytes).toString("utf8"));
    case "v8":
      return v8Deserialize(bytes);
  }
}

/** Content hash of a value as it would be stored in the given format. */
export function hashValue(value: unknown, format: StorageFormat): string {
  return sha256(serialize(value, format));
}
