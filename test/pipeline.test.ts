import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { Pipeline } from "../src/pipeline.js";
import { cross, literal, map, plan, ref, task } from "../src/plan/declare.js";
import type { Computation, PlanSource } from "../src/plan/types.js";
import { MemoryBlobBackend } from "../src/store/backends.js";
import { FingerprintStore, openMemoryStore } from "../src/store/fingerprint-store.js";
import { SqliteMetadataTable } from "../src/store/metadata.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/** Fails `exists` or `write` for chosen keys. */
class FaultyBlobBackend extends MemoryBlobBackend {
  unreadable = new Set<string>();
  unwritable = new Set<string>();

  override async exists(key: string): Promise<boolean> {
    if (this.unreadable.has(key)) throw new Error("EIO: disk read failed");
    return super.exists(key);
  }

  override async write(key: string, bytes: Uint8Array): Promise<string> {
    if (this.unwritable.has(key)) throw new Error("ENOSPC: no space left on device");
    return super.write(key, bytes);
  }
}

// Most plans here count calls through closures, which only in-process backends see.
beforeEach(() => configure({ execution: { defaultDeployment: "local" } }));
afterEach(() => resetConfig());

/** A: the literal list, B: [10, 20], C: one product per (a, b) combination. */
function cartesian(a: number[], calls: string[] = []): PlanSource {
  return plan(
    task(
      "A",
      ([xs], ctx) => {
        calls.push(ctx.nodeId);
        return xs;
      },
      { args: [literal(a)] },
    ),
    task("B", (_args, ctx) => {
      calls.push(ctx.nodeId);
      return [10, 20];
    }),
    task(
      "C",
      ([x, y], ctx) => {
        calls.push(ctx.nodeId);
        return Number(x) * Number(y);
      },
      { args: [ref("A"), ref("B")], pattern: cross("A", "B") },
    ),
  );
}

function squares(): PlanSource {
  return plan(
    task("src", () => [1, 2, 3]),
    task(
      "sq",
      ([x]) => {
        if (x === 2) throw new Error("bad element");
        return Number(x) ** 2;
      },
      { args: [ref("src")], pattern: map("src") },
    ),
    task("total", ([xs]) => (Array.isArray(xs) ? xs.length : -1), { args: [ref("sq")] }),
    task("side", () => "ok"),
  );
}

function statusOf(report: { nodes: Array<{ id: string; status: string }> }, id: string): string | undefined {
  return report.nodes.find((n) => n.id === id)?.status;
}

function branchesOf(pipeline: Pipeline, id: string): string[] {
  return pipeline.readMetadata(id)?.branches ?? [];
}

describe("Pipeline", () => {
  let pipeline: Pipeline;

  beforeEach(() => {
    pipeline = new Pipeline({ store: openMemoryStore() });
  });

  afterEach(() => pipeline.close());

  describe("cross expansion", () => {
    it("builds every combination in order", async () => {
      const report = await pipeline.run(cartesian([1, 2, 3]));

      expect(report.status).toBe("completed");
      expect(report.counts.completed).toBe(9);
      expect(report.errors).toEqual([]);
      expect(await pipeline.readValue("C")).toEqual({ found: true, value: [10, 20, 20, 40, 30, 60] });
      expect(branchesOf(pipeline, "C")).toHaveLength(6);
    });

    it("skips everything on an unchanged rerun", async () => {
      const calls: string[] = [];
      await pipeline.run(cartesian([1, 2, 3], calls));
      calls.length = 0;

      const report = await pipeline.run(cartesian([1, 2, 3], calls));

      expect(calls).toEqual([]);
      expect(report.counts.skipped).toBe(9);
      expect(report.counts.completed).toBe(0);
      expect(report.nodes.every((n) => n.status === "skipped")).toBe(true);
    });

    it("builds only the new branches when an element is appended", async () => {
      const calls: string[] = [];
      await pipeline.run(cartesian([1, 2, 3], calls));
      const before = branchesOf(pipeline, "C");
      calls.length = 0;

      const report = await pipeline.run(cartesian([1, 2, 3, 4], calls));

      expect(calls.filter((id) => id.startsWith("C_"))).toHaveLength(2);
      expect(calls).toContain("A");
      expect(calls).not.toContain("B");
      expect(report.counts.completed).toBe(4);
      expect(report.counts.skipped).toBe(7);
      expect(branchesOf(pipeline, "C").slice(0, 6)).toEqual(before);
      expect(await pipeline.readValue("C")).toEqual({ found: true, value: [10, 20, 20, 40, 30, 60, 40, 80] });
    });

    it("consolidates an empty expansion into an empty list", async () => {
      const source = plan(
        ...cartesian([]).tasks,
        task("count", ([xs]) => (Array.isArray(xs) ? xs.length : -1), { args: [ref("C")] }),
      );
      const report = await pipeline.run(source);

      expect(report.status).toBe("completed");
      expect(await pipeline.readValue("C")).toEqual({ found: true, value: [] });
      expect(await pipeline.readValue("count")).toEqual({ found: true, value: 0 });
      expect(branchesOf(pipeline, "C")).toEqual([]);
    });

    it("reports stored sizes for built and reused nodes", async () => {
      const first = await pipeline.run(cartesian([1, 2, 3]));
      expect(first.nodes.find((n) => n.id === "C")?.bytes).toBe(12);

      const rerun = await pipeline.run(cartesian([1, 2, 3]));
      expect(rerun.nodes.find((n) => n.id === "B")).toMatchObject({ status: "skipped", bytes: 7 });
      expect(rerun.nodes.find((n) => n.id === "C")).toMatchObject({ status: "skipped", bytes: 12 });
      expect(pipeline.readMetadata("C")?.bytes).toBe(12);
    });

    it("announces each expansion", async () => {
      const expansions: Array<[string, number]> = [];
      await pipeline.run(cartesian([1, 2, 3]), {
        callbacks: { onExpand: (id, branches) => expansions.push([id, branches.length]) },
      });
      expect(expansions).toEqual([["C", 6]]);
    });
  });

  describe("patterns", () => {
    it("maps over the branches of an upstream pattern", async () => {
      const source = plan(
        task("src", () => [1, 2, 3]),
        task("sq", ([x]) => Number(x) ** 2, { args: [ref("src")], pattern: map("src") }),
        task("plus", ([x]) => Number(x) + 1, { args: [ref("sq")], pattern: map("sq") }),
      );
      await pipeline.run(source);
      expect(await pipeline.readValue("plus")).toEqual({ found: true, value: [2, 5, 10] });

      const rerun = await pipeline.run(source);
      expect(rerun.counts.skipped).toBe(9);
    });

    it("fails a map over inputs of different lengths", async () => {
      const source = plan(
        task("A", () => [1, 2, 3]),
        task("B", () => [1, 2, 3, 4]),
        task("C", ([a, b]) => [a, b], { args: [ref("A"), ref("B")], pattern: map("A", "B") }),
      );
      const report = await pipeline.run(source);

      expect(report.status).toBe("failed");
      expect(report.errors).toEqual([{ id: "C", error: 'map pattern "C" needs inputs of equal length (A=3, B=4)' }]);
    });

    it("fails a pattern over a value that is not a list", async () => {
      const source = plan(
        task("A", () => 5),
        task("C", ([a]) => a, { args: [ref("A")], pattern: map("A") }),
      );
      const report = await pipeline.run(source);
      expect(report.errors).toEqual([{ id: "C", error: 'Pattern "C" input "A" is not a sequence (got number)' }]);
    });
  });

  describe("failures", () => {
    it("keeps a failure from reaching dependents but builds the rest", async () => {
      const report = await pipeline.run(squares());

      expect(report.status).toBe("failed");
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0].error).toBe("bad element");
      expect(report.counts).toEqual({ pending: 2, dispatched: 0, completed: 4, skipped: 0, errored: 1 });
      expect(statusOf(report, "sq")).toBe("pending");
      expect(statusOf(report, "total")).toBe("pending");
      expect(statusOf(report, "side")).toBe("completed");

      const failed = pipeline.readMetadata(report.errors[0].id);
      expect(failed).toMatchObject({ taskName: "sq", kind: "branch", error: "bad element", valueHash: null });
    });

    it("retries only the failed branch on the next run", async () => {
      await pipeline.run(squares());
      const report = await pipeline.run(squares());
      expect(report.counts).toEqual({ pending: 2, dispatched: 0, completed: 0, skipped: 4, errored: 1 });
    });

    it("records a timeout as the error", async () => {
      const report = await pipeline.run(plan(task("slowpoke", () => sleep(200), { timeoutMs: 20 })));
      expect(report.errors).toEqual([{ id: "slowpoke", error: 'Task "slowpoke" timed out after 20ms' }]);
    });

    it("fails a value the storage format cannot hold", async () => {
      const report = await pipeline.run(plan(task("m", () => new Map([["k", 1]]))));
      expect(report.errors[0].error).toBe('Failed to store "m": $: Map is not representable in JSON (use the "v8" format)');
    });

    it("confines a storage read failure to the node that hit it", async () => {
      const blobs = new FaultyBlobBackend();
      const local = new Pipeline({ store: new FingerprintStore({ blobs, metadata: new SqliteMetadataTable(":memory:") }) });
      const source = plan(
        task("bad", () => 1),
        task("good", () => 2),
      );
      await local.run(source);
      local.store.releaseMemory();
      blobs.unreadable.add("bad");

      const report = await local.run(source);

      expect(report.status).toBe("failed");
      expect(report.errors).toEqual([{ id: "bad", error: 'Failed to read "bad": EIO: disk read failed' }]);
      expect(statusOf(report, "good")).toBe("skipped");
      local.close();
    });

    it("confines a blob write failure to its node", async () => {
      const blobs = new FaultyBlobBackend();
      blobs.unwritable.add("bad");
      const local = new Pipeline({ store: new FingerprintStore({ blobs, metadata: new SqliteMetadataTable(":memory:") }) });
      const report = await local.run(
        plan(
          task("bad", () => 1),
          task("good", () => 2),
          task("after", ([x]) => x, { args: [ref("bad")] }),
        ),
      );

      expect(report.errors).toEqual([{ id: "bad", error: 'Failed to store "bad": ENOSPC: no space left on device' }]);
      expect(statusOf(report, "good")).toBe("completed");
      expect(statusOf(report, "after")).toBe("pending");
      expect(await blobs.keys()).toEqual(["good"]);
      local.close();
    });

    it("rejects unknown deployments before running anything", async () => {
      const calls: string[] = [];
      const source = plan(
        task("local", (_args, ctx) => calls.push(ctx.nodeId)),
        task("remote", () => 1, { deployment: "gpu" }),
      );
      await expect(pipeline.run(source)).rejects.toThrow('No worker backend named "gpu" (registered: worker, local, main)');
      expect(calls).toEqual([]);
    });

    it("rejects unknown targets", async () => {
      await expect(pipeline.run(cartesian([1]), { targets: ["nope"] })).rejects.toThrow('Unknown task "nope"');
    });
  });

  describe("run options", () => {
    it("builds only the targets and their ancestors", async () => {
      const report = await pipeline.run(cartesian([1, 2, 3]), { targets: ["B"] });
      expect(report.nodes.map((n) => n.id)).toEqual(["B"]);
      expect(await pipeline.readValue("A")).toEqual({ found: false, nodeId: "A" });
    });

    it("lets forced work stop where values did not change", async () => {
      const calls: string[] = [];
      await pipeline.run(cartesian([1, 2, 3], calls));
      calls.length = 0;

      const report = await pipeline.run(cartesian([1, 2, 3], calls), { force: ["B"] });
      expect(calls).toEqual(["B"]);
      expect(report.counts.completed).toBe(1);
      expect(report.counts.skipped).toBe(8);
    });

    it("forces every branch of a pattern", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      const report = await pipeline.run(cartesian([1, 2, 3]), { force: ["C"] });
      expect(report.counts.completed).toBe(7);
      expect(report.counts.skipped).toBe(2);
    });

    it("never exceeds maxConcurrency", async () => {
      let active = 0;
      let peak = 0;
      const work: Computation = async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(20);
        active--;
        return 1;
      };
      const source = plan(["a", "b", "c", "d", "e"].map((name) => task(name, work)));
      const report = await pipeline.run(source, { maxConcurrency: 2 });

      expect(report.counts.completed).toBe(5);
      expect(peak).toBe(2);
    });

    it("stops dispatching once cancelled", async () => {
      const controller = new AbortController();
      const source = plan(
        task("slow", () => sleep(200).then(() => 1)),
        task("after", ([x]) => x, { args: [ref("slow")] }),
      );
      const report = await pipeline.run(source, {
        signal: controller.signal,
        callbacks: { onNodeStart: () => controller.abort() },
      });

      expect(report.status).toBe("cancelled");
      expect(statusOf(report, "slow")).toBe("pending");
      expect(statusOf(report, "after")).toBe("pending");
      expect(pipeline.readMetadata("slow")).toBeUndefined();
    });

    it("keeps going when a callback throws", async () => {
      const report = await pipeline.run(cartesian([1]), {
        callbacks: {
          onNodeEnd: () => {
            throw new Error("reporter crashed");
          },
        },
      });
      expect(report.status).toBe("completed");
    });

    it("stores warnings with the value", async () => {
      const report = await pipeline.run(
        plan(
          task("noisy", (_args, ctx) => {
            ctx.warn("low sample size");
            return 1;
          }),
        ),
      );
      expect(report.nodes[0].warnings).toEqual(["low sample size"]);
      expect(pipeline.readMetadata("noisy")?.warnings).toEqual(["low sample size"]);
    });
  });

  describe("backends", () => {
    it("gives tasks the worker environment", async () => {
      pipeline.close();
      pipeline = new Pipeline({
        store: openMemoryStore(),
        environment: {
          values: { factor: 3 },
          setup: (env) => {
            env.ready = true;
          },
        },
      });
      const source = plan(
        task("scaled", ([x], ctx) => (ctx.env.ready ? Number(x) * Number(ctx.env.factor) : -1), {
          args: [literal(2)],
        }),
        task("onMain", (_args, ctx) => Number(ctx.env.factor) + 1, { deployment: "main" }),
      );
      await pipeline.run(source);

      expect(await pipeline.readValue("scaled")).toEqual({ found: true, value: 6 });
      expect(await pipeline.readValue("onMain")).toEqual({ found: true, value: 4 });
    });
  });

  describe("worker threads", () => {
    it("stops a blocking task at its timeout while a sibling completes", async () => {
      const source = plan(
        task(
          "spin",
          () => {
            const end = Date.now() + 2000;
            while (Date.now() < end) {
              // blocks its thread
            }
            return "done";
          },
          { deployment: "worker", timeoutMs: 100 },
        ),
        task("sibling", () => 7, { deployment: "worker" }),
      );
      const report = await pipeline.run(source);

      expect(report.errors).toEqual([{ id: "spin", error: 'Task "spin" timed out after 100ms' }]);
      expect(statusOf(report, "sibling")).toBe("completed");
      expect(await pipeline.readValue("sibling")).toEqual({ found: true, value: 7 });
    });

    it("runs setup in each thread and passes warnings back", async () => {
      pipeline.close();
      pipeline = new Pipeline({
        store: openMemoryStore(),
        workers: 2,
        environment: {
          values: { factor: 3 },
          setup: (env, worker) => {
            env.thread = worker.index;
          },
        },
      });
      const report = await pipeline.run(
        plan(
          task(
            "scaled",
            ([x], ctx) => {
              ctx.warn("from a thread");
              return typeof ctx.env.thread === "number" ? Number(x) * Number(ctx.env.factor) : -1;
            },
            { args: [literal(2)], deployment: "worker" },
          ),
        ),
      );

      expect(await pipeline.readValue("scaled")).toEqual({ found: true, value: 6 });
      expect(report.nodes[0].warnings).toEqual(["from a thread"]);
    });

    it("explains that closures do not reach a thread", async () => {
      const offsets = [1, 2];
      const report = await pipeline.run(plan(task("closure", () => offsets.length, { deployment: "worker" })));
      expect(report.errors).toEqual([
        {
          id: "closure",
          error:
            'offsets is not defined (worker threads receive only the function source; deploy tasks that use closures or imports to "local" or "main")',
        },
      ]);
    });
  });

  describe("getStatus", () => {
    it("reports missing nodes and what waits on them", async () => {
      const states = await pipeline.getStatus(cartesian([1, 2, 3]));
      expect(states.map((s) => [s.id, s.state, s.reason])).toEqual([
        ["A", "stale", "missing"],
        ["B", "stale", "missing"],
        ["C", "stale", "upstream-stale"],
      ]);
    });

    it("reports every node fresh after a run, branches included", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      const states = await pipeline.getStatus(cartesian([1, 2, 3]));

      expect(states.map((s) => s.id)).toEqual(["A", "B", "C", ...branchesOf(pipeline, "C")]);
      expect(states.every((s) => s.state === "fresh")).toBe(true);
    });

    it("names the reason a node went stale", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      const states = await pipeline.getStatus(cartesian([1, 2, 3, 4]));
      expect(states.map((s) => [s.id, s.reason])).toEqual([
        ["A", "inputs-changed"],
        ["B", "fresh"],
        ["C", "upstream-stale"],
      ]);
    });

    it("does not run anything", async () => {
      const calls: string[] = [];
      await pipeline.getStatus(cartesian([1, 2, 3], calls));
      expect(calls).toEqual([]);
      expect(pipeline.store.list()).toEqual([]);
    });
  });

  describe("invalidate", () => {
    it("rebuilds an invalidated node and nothing downstream of an equal value", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      expect(pipeline.invalidate("B")).toBe(1);

      const states = await pipeline.getStatus(cartesian([1, 2, 3]));
      expect(states.find((s) => s.id === "B")?.reason).toBe("invalidated");

      const report = await pipeline.run(cartesian([1, 2, 3]));
      expect(statusOf(report, "B")).toBe("completed");
      expect(report.counts.completed).toBe(1);
    });

    it("covers every branch of a pattern", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      expect(pipeline.invalidate("C")).toBe(7);
    });
  });

  describe("delete", () => {
    it("removes a pattern with its branches", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      const expected = ["C", ...branchesOf(pipeline, "C")].sort();

      expect(await pipeline.delete("C")).toEqual(expected);
      expect(await pipeline.readValue("C")).toEqual({ found: false, nodeId: "C" });
      expect(await pipeline.store.blobKeys()).toEqual(["A", "B"]);
    });

    it("removes nodes matching a pattern", async () => {
      await pipeline.run(cartesian([1, 2, 3]));
      expect(await pipeline.delete(/^C_/)).toHaveLength(6);
      expect(pipeline.readMetadata("C")).toBeDefined();
      expect(await pipeline.readValue("C")).toEqual({ found: false, nodeId: "C" });
    });
  });

  describe("prune", () => {
    it("drops branches the current expansion no longer has", async () => {
      await pipeline.run(cartesian([1, 2, 3, 4]));
      const before = branchesOf(pipeline, "C");
      await pipeline.run(cartesian([1, 2, 3]));
      const after = new Set(branchesOf(pipeline, "C"));

      const removed = await pipeline.prune(cartesian([1, 2, 3]));

      expect(removed).toEqual(before.filter((id) => !after.has(id)).sort());
      expect(removed).toHaveLength(2);
      expect(await pipeline.readValue("C")).toEqual({ found: true, value: [10, 20, 20, 40, 30, 60] });
    });

    it("keeps branches built by a run that did not finish", async () => {
      const pairs = (a: number[]) =>
        plan(
          task("A", ([xs]) => xs, { args: [literal(a)] }),
          task("B", () => [10, 20]),
          task(
            "C",
            ([x, y]) => {
              if (x === 4 && y === 20) throw new Error("bad pair");
              return Number(x) * Number(y);
            },
            { args: [ref("A"), ref("B")], pattern: cross("A", "B") },
          ),
        );
      await pipeline.run(pairs([1, 2, 3]));
      const report = await pipeline.run(pairs([1, 2, 3, 4]));
      const built = report.nodes.filter((n) => n.kind === "branch" && n.status === "completed").map((n) => n.id);
      expect(built).toHaveLength(1);
      expect(statusOf(report, "C")).toBe("pending");

      expect(await pipeline.prune(pairs([1, 2, 3, 4]))).toEqual([]);
      expect(await pipeline.readValue(built[0])).toEqual({ found: true, value: 40 });
    });

    it("drops tasks removed from the plan", async () => {
      await pipeline.run(cartesian([1, 2]));
      const expected = ["C", ...branchesOf(pipeline, "C")].sort();

      const removed = await pipeline.prune(plan(cartesian([1, 2]).tasks.slice(0, 2)));
      expect(removed).toEqual(expected);
      expect(pipeline.store.list().map((r) => r.nodeId)).toEqual(["A", "B"]);
    });

    it("removes blobs no record points to", async () => {
      const blobs = new MemoryBlobBackend();
      const store = new FingerprintStore({ blobs, metadata: new SqliteMetadataTable(":memory:") });
      const local = new Pipeline({ store });
      await local.run(cartesian([1]));
      await blobs.write("stray", Buffer.from("{}"));

      expect(await local.prune(cartesian([1]))).toEqual(["stray"]);
      expect(await blobs.keys()).toEqual(["A", "B", ...branchesOf(local, "C")].sort());
      local.close();
    });
  });
});

describe("Pipeline on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dagcache-pipeline-"));
  });

  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  it("skips work recorded by an earlier process", async () => {
    const first = new Pipeline({ root: dir });
    await first.run(cartesian([1, 2]));
    first.close();

    const calls: string[] = [];
    const second = new Pipeline({ root: dir });
    const report = await second.run(cartesian([1, 2], calls));
    second.close();

    expect(calls).toEqual([]);
    expect(report.counts.skipped).toBe(7);
  });
});
