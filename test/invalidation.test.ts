import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { codeHash, isStale, literalHash, nodeFingerprint, patternValueHash } from "../src/invalidation/invalidation.js";
import type { CurrentFingerprint } from "../src/invalidation/invalidation.js";
import { literal, task } from "../src/plan/declare.js";
import type { Computation, TaskDefinition } from "../src/plan/types.js";
import { MemoryBlobBackend } from "../src/store/backends.js";
import { hashValue } from "../src/store/codec.js";
import { FingerprintStore } from "../src/store/fingerprint-store.js";
import { SqliteMetadataTable } from "../src/store/metadata.js";

const identity: Computation = ([x]) => x;

function current(def: TaskDefinition, value: unknown = 1): CurrentFingerprint {
  return { codeHash: codeHash(def), inputHashes: { "0:literal": literalHash(value) } };
}

describe("codeHash", () => {
  it("is stable for the same definition", () => {
    const a = task("t", identity, { args: [literal(1)] });
    const b = task("t", identity, { args: [literal(2)] });
    expect(codeHash(a)).toBe(codeHash(b));
  });

  it("changes with the function text and the version", () => {
    const base = task("t", identity);
    expect(codeHash(task("t", ([x]) => String(x)))).not.toBe(codeHash(base));
    expect(codeHash(task("t", identity, { version: "2" }))).not.toBe(codeHash(base));
  });

  it("ignores the storage format", () => {
    expect(codeHash(task("t", identity, { format: "v8" }))).toBe(codeHash(task("t", identity)));
  });
});

describe("hashes", () => {
  it("falls back to structured serialization for literals JSON cannot hold", () => {
    const value = new Map([[1, 2]]);
    expect(literalHash(value)).toBe(hashValue(value, "v8"));
    expect(literalHash({ b: 1, a: 2 })).toBe(literalHash({ a: 2, b: 1 }));
  });

  it("derives the fingerprint from code and inputs", () => {
    const a = nodeFingerprint({ codeHash: "c", inputHashes: { "0:x": "1" } });
    expect(nodeFingerprint({ codeHash: "c", inputHashes: { "0:x": "1" } })).toBe(a);
    expect(nodeFingerprint({ codeHash: "c", inputHashes: { "0:x": "2" } })).not.toBe(a);
  });

  it("summarizes patterns by branch order", () => {
    const ab = patternValueHash([
      ["p_a", "1"],
      ["p_b", "2"],
    ]);
    const ba = patternValueHash([
      ["p_b", "2"],
      ["p_a", "1"],
    ]);
    expect(ab).not.toBe(ba);
    expect(patternValueHash([])).toBe(patternValueHash([]));
  });
});

describe("isStale", () => {
  let blobs: MemoryBlobBackend;
  let store: FingerprintStore;
  const def = task("t", identity, { args: [literal(1)] });

  async function build(definition: TaskDefinition, fp: CurrentFingerprint): Promise<void> {
    await store.put("t", 1, {
      nodeId: "t",
      taskName: "t",
      kind: "static",
      fingerprint: nodeFingerprint(fp),
      codeHash: fp.codeHash,
      inputHashes: fp.inputHashes,
      format: definition.options.format,
      durationMs: 1,
      warnings: [],
      error: null,
      branches: null,
    });
  }

  beforeEach(() => {
    blobs = new MemoryBlobBackend();
    store = new FingerprintStore({ blobs, metadata: new SqliteMetadataTable(":memory:") });
  });

  afterEach(() => store.close());

  it("is stale when nothing was built", async () => {
    expect(await isStale("t", def, current(def), store)).toEqual({ stale: true, reason: "missing" });
  });

  it("is fresh when code and inputs match", async () => {
    await build(def, current(def));
    expect(await isStale("t", def, current(def), store)).toEqual({ stale: false, reason: "fresh" });
  });

  it("names the inputs that changed", async () => {
    await build(def, current(def));
    expect(await isStale("t", def, current(def, 2), store)).toEqual({
      stale: true,
      reason: "inputs-changed",
      changedInputs: ["0:literal"],
    });
  });

  it("notices a changed function", async () => {
    await build(def, current(def));
    const edited = task("t", ([x]) => [x], { args: [literal(1)] });
    expect((await isStale("t", edited, current(edited), store)).reason).toBe("code-changed");
  });

  it("notices a changed storage format", async () => {
    await build(def, current(def));
    const v8 = task("t", identity, { args: [literal(1)], format: "v8" });
    expect((await isStale("t", v8, current(v8), store)).reason).toBe("format-changed");
  });

  it("honors force and cue modes", async () => {
    await build(def, current(def));
    expect((await isStale("t", def, current(def), store, { forced: true })).reason).toBe("forced");

    const always = task("t", identity, { args: [literal(1)], cue: "always" });
    expect((await isStale("t", always, current(always), store)).reason).toBe("cue-always");

    const never = task("t", identity, { args: [literal(1)], cue: "never" });
    expect(await isStale("t", never, current(never, 99), store)).toEqual({ stale: false, reason: "fresh" });
  });

  it("is stale after an invalidation or a failure", async () => {
    await build(def, current(def));
    store.invalidate(["t"]);
    expect((await isStale("t", def, current(def), store)).reason).toBe("invalidated");

    await store.recordError("t", {
      nodeId: "t",
      taskName: "t",
      kind: "static",
      fingerprint: "",
      codeHash: codeHash(def),
      inputHashes: {},
      format: "json",
      durationMs: 0,
      warnings: [],
      error: "boom",
      branches: null,
    });
    expect((await isStale("t", def, current(def), store)).reason).toBe("errored");
  });

  it("is stale when the stored value is gone", async () => {
    await build(def, current(def));
    await blobs.delete("t");
    store.releaseMemory();
    expect((await isStale("t", def, current(def), store)).reason).toBe("value-missing");
  });
});
