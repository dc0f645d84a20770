import { getConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { parseOrThrow, TaskNameSchema, TaskOptionsSchema } from "../schemas.js";
import type {
  ArgBinding,
  BranchPattern,
  Computation,
  LiteralBinding,
  PlanSource,
  RefBinding,
  TaskDefinition,
  TaskOptions,
} from "./types.js";

export type TaskSpec = Partial<TaskOptions> & {
  args?: ArgBinding[];
  pattern?: BranchPattern;
};

/** Bind an argument to another task's output. */
export function ref(name: string): RefBinding {
  return { kind: "ref", name };
}

/** Bind an argument to a constant value. It is hashed into the node's inputs. */
export function literal(value: unknown): LiteralBinding {
  return { kind: "literal", value };
}

/** Branch element-wise over equally long upstream sequences. */
export function map(...refs: string[]): BranchPattern {
  if (refs.length === 0) throw new ValidationError("VALIDATION_FAILED", "map() needs at least one reference");
  return { kind: "map", refs };
}

/** Branch over every combination of the upstream sequences. */
export function cross(...refs: string[]): BranchPattern {
  if (refs.length === 0) throw new ValidationError("VALIDATION_FAILED", "cross() needs at least one reference");
  return { kind: "cross", refs };
}

/**
 * Declare a task. Options left out fall back to the `execution` section of the
 * current config.
 *
 * @example
 * const raw = task("raw", ([rows]) => rows, { args: [literal([1, 2, 3])] });
 * const squared = task("squared", ([x]) => Number(x) ** 2, {
 *   args: [ref("raw")],
 *   pattern: map("raw"),
 * });
 */
export function task(name: string, compute: Computation, spec: TaskSpec = {}): TaskDefinition {
  parseOrThrow(TaskNameSchema, name, `Task "${name}"`);
  if (typeof compute !== "function") {
    throw new ValidationError("VALIDATION_FAILED", `Task "${name}": compute must be a function`);
  }

  const { args = [], pattern = { kind: "none" }, ...overrides } = spec;
  const exec = getConfig().execution;
  const options = parseOrThrow(
    TaskOptionsSchema,
    {
      format: exec.defaultFormat,
      memory: exec.defaultMemory,
      deployment: exec.defaultDeployment,
      retries: exec.defaultRetries,
      timeoutMs: exec.defaultTimeoutMs,
      cue: exec.defaultCue,
      ...Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined)),
    },
    `Task "${name}" options`,
  );

  if (pattern.kind !== "none") {
    const argRefs = new Set(args.filter((a): a is RefBinding => a.kind === "ref").map((a) => a.name));
    for (const patternRef of pattern.refs) {
      if (!argRefs.has(patternRef)) {
        throw new ValidationError(
          "VALIDATION_FAILED",
          `Task "${name}": ${pattern.kind}() reference "${patternRef}" is not one of its arguments`,
        );
      }
    }
    if (new Set(pattern.refs).size !== pattern.refs.length) {
      throw new ValidationError("VALIDATION_FAILED", `Task "${name}": ${pattern.kind}() lists a reference twice`);
    }
  }

  return Object.freeze({
    name,
    compute,
    args: Object.freeze(args.map((a) => Object.freeze({ ...a }))),
    pattern: Object.freeze(pattern.kind === "none" ? pattern : { ...pattern, refs: [...pattern.refs] }),
    options: Object.freeze(options),
  });
}

/** Collect task definitions into a plan, preserving declaration order. */
export function plan(...tasks: Array<TaskDefinition | TaskDefinition[]>): PlanSource {
  return Object.freeze({ tasks: Object.freeze(tasks.flat()) });
}
