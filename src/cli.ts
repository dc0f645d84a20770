#!/usr/bin/env node

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import { getConfig, loadConfigFile } from "./config.js";
import { describeError, ValidationError } from "./errors.js";
import { Pipeline } from "./pipeline.js";
import type { PipelineOptions } from "./pipeline.js";
import type { PlanSource } from "./plan/types.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", describeError(reason));
});

type GlobalOptions = { store?: string; config?: string; debug?: boolean };

const program = new Command();

program
  .name("dagcache")
  .description("Incremental, content-addressed pipeline runner")
  .version("0.1.0")
  .option("-s, --store <dir>", "Store directory")
  .option("-c, --config <file>", "JSON config file")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts: GlobalOptions = actionCmd.optsWithGlobals();
  if (opts.config) loadConfigFile(opts.config);
  setLogLevel(opts.debug ? "debug" : getConfig().logging.level);
});

function isPlanSource(value: unknown): value is PlanSource {
  return typeof value === "object" && value !== null && "tasks" in value && Array.isArray(value.tasks);
}

/** Import a plan module. Its default export is a plan or a function returning one. */
async function loadPlan(file: string): Promise<PlanSource> {
  const mod: unknown = await import(pathToFileURL(resolve(file)).href);
  const exported = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;
  const source = typeof exported === "function" ? await exported() : exported;
  if (!isPlanSource(source)) {
    throw new ValidationError("VALIDATION_FAILED", `${file} must default-export a plan (see plan(...))`);
  }
  return source;
}

/** Run an action against a pipeline, printing failures and closing the store. */
async function withPipeline(
  cmd: Command,
  action: (pipeline: Pipeline) => Promise<void>,
  pipelineOpts: PipelineOptions = {},
): Promise<void> {
  const { store }: GlobalOptions = cmd.optsWithGlobals();
  let pipeline: Pipeline;
  try {
    pipeline = new Pipeline({ ...pipelineOpts, root: store });
  } catch (err) {
    console.error("Error:", describeError(err));
    process.exitCode = 1;
    return;
  }
  try {
    await action(pipeline);
  } catch (err) {
    console.error("Error:", describeError(err));
    process.exitCode = 1;
  } finally {
    pipeline.close();
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- run ---
program
  .command("run")
  .description("Build every stale node of a plan")
  .argument("<plan>", "Plan module (.js/.mjs) whose default export is a plan")
  .option("-t, --target <task...>", "Build only these tasks and their ancestors")
  .option("-f, --force <task...>", "Rebuild these tasks even if fresh")
  .option("-j, --concurrency <n>", "Nodes in flight at once")
  .action(async (file: string, opts: { target?: string[]; force?: string[]; concurrency?: string }, cmd: Command) => {
    const concurrency = opts.concurrency === undefined ? undefined : Number(opts.concurrency);
    await withPipeline(cmd, async (pipeline) => {
      const source = await loadPlan(file);

      const controller = new AbortController();
      const onSigint = () => {
        console.error("\nCancelling; waiting for running nodes to finish...");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const report = await pipeline.run(source, {
          targets: opts.target,
          force: opts.force,
          maxConcurrency: concurrency,
          signal: controller.signal,
          callbacks: {
            onNodeEnd: (n) => console.log(`  [${n.status}] ${n.id}${n.durationMs != null ? ` ${n.durationMs}ms` : ""}`),
            onNodeSkipped: (n) => console.log(`  [skipped] ${n.id}`),
            onExpand: (id, branches) => console.log(`  [expand] ${id} -> ${branches.length} branch(es)`),
          },
        });

        for (const { id, error } of report.errors) console.error(`  ${id}: ${error}`);
        const { completed, skipped, errored, pending } = report.counts;
        console.log(
          `\n${report.status} in ${report.durationMs}ms (${completed} built, ${skipped} skipped, ${errored} errored, ${pending} pending)`,
        );
        if (report.status !== "completed") process.exitCode = 1;
      } finally {
        process.off("SIGINT", onSigint);
      }
    }, { workers: concurrency });
  });

// --- status ---
program
  .command("status")
  .description("Show which nodes the next run would rebuild, and why")
  .argument("<plan>", "Plan module")
  .option("--json", "Print JSON")
  .action(async (file: string, opts: { json?: boolean }, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      const states = await pipeline.getStatus(await loadPlan(file));
      if (opts.json) return printJson(states);
      for (const s of states) {
        console.log(`${s.state === "fresh" ? "+" : "x"} ${s.id} (${s.kind}) ${s.reason}`);
      }
    });
  });

// --- read ---
program
  .command("read")
  .description("Print a stored value as JSON")
  .argument("<node>", "Node id or pattern name")
  .action(async (id: string, _opts: unknown, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      const result = await pipeline.readValue(id);
      if (!result.found) throw new ValidationError("UNKNOWN_REFERENCE", `No stored value for "${id}"`);
      printJson(result.value);
    });
  });

// --- meta ---
program
  .command("meta")
  .description("Print stored metadata for a node, or list every record")
  .argument("[node]", "Node id")
  .action(async (id: string | undefined, _opts: unknown, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      if (!id) {
        for (const r of pipeline.store.list()) {
          console.log(`${r.nodeId} (${r.kind}) ${r.error ? "errored" : r.invalidated ? "invalidated" : "ok"} ${r.bytes}B`);
        }
        return;
      }
      const record = pipeline.readMetadata(id);
      if (!record) throw new ValidationError("UNKNOWN_REFERENCE", `No record for "${id}"`);
      printJson(record);
    });
  });

// --- invalidate ---
program
  .command("invalidate")
  .description("Mark a node (or every branch of a task) for rebuild")
  .argument("<target>", "Node id or task name")
  .action(async (target: string, _opts: unknown, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      console.log(`Invalidated ${pipeline.invalidate(target)} record(s)`);
    });
  });

// --- delete ---
program
  .command("delete")
  .description("Remove stored values and records")
  .argument("<target>", "Node id or task name")
  .option("-r, --regex", "Treat <target> as a regular expression over node ids")
  .action(async (target: string, opts: { regex?: boolean }, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      const removed = await pipeline.delete(opts.regex ? new RegExp(target) : target);
      console.log(`Deleted ${removed.length} record(s)`);
    });
  });

// --- prune ---
program
  .command("prune")
  .description("Remove stored entries the plan no longer produces")
  .argument("<plan>", "Plan module")
  .action(async (file: string, _opts: unknown, cmd: Command) => {
    await withPipeline(cmd, async (pipeline) => {
      const removed = await pipeline.prune(await loadPlan(file));
      for (const id of removed) console.log(`  - ${id}`);
      console.log(`Pruned ${removed.length} entr${removed.length === 1 ? "y" : "ies"}`);
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});
