import { CyclicDependencyError, ValidationError } from "../errors.js";
import type { PlanSource, TaskDefinition } from "../plan/types.js";
import { Graph, isTerminalOk } from "./types.js";
import type { GraphNode } from "./types.js";

/** Names of the tasks a definition reads from, in argument order, without repeats. */
export function referencedTasks(def: TaskDefinition): string[] {
  const seen = new Set<string>();
  for (const arg of def.args) {
    if (arg.kind === "ref") seen.add(arg.name);
  }
  return [...seen];
}

/**
 * Compile a plan into a graph skeleton. Patterned tasks become single
 * `pattern` nodes; their branches are spliced in at run time.
 */
export function compilePlan(source: PlanSource): Graph {
  const defs = new Map<string, TaskDefinition>();
  for (const def of source.tasks) {
    if (defs.has(def.name)) {
      throw new ValidationError("DUPLICATE_TASK", `Task "${def.name}" is declared more than once`);
    }
    defs.set(def.name, def);
  }

  for (const def of source.tasks) {
    for (const dep of referencedTasks(def)) {
      if (dep === def.name) {
        throw new CyclicDependencyError([def.name, def.name]);
      }
      if (!defs.has(dep)) {
        throw new ValidationError("UNKNOWN_REFERENCE", `Task "${def.name}" references unknown task "${dep}"`);
      }
    }
  }

  const cycle = findCycle(source.tasks);
  if (cycle) throw new CyclicDependencyError(cycle);

  const graph = new Graph();
  for (const def of source.tasks) {
    const base = {
      id: def.name,
      taskName: def.name,
      definition: def,
      dependsOn: referencedTasks(def),
      status: "pending" as const,
      warnings: [],
    };
    if (def.pattern.kind === "none") {
      graph.add({ ...base, kind: "static" });
    } else {
      graph.add({ ...base, kind: "pattern", patternKind: def.pattern.kind });
    }
  }
  return graph;
}

/** Depth-first search with a recursion stack; returns the first cycle found. */
function findCycle(tasks: readonly TaskDefinition[]): string[] | undefined {
  const deps = new Map(tasks.map((t) => [t.name, referencedTasks(t)]));
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  function visit(name: string): string[] | undefined {
    stack.push(name);
    onStack.add(name);
    for (const dep of deps.get(name) ?? []) {
      if (onStack.has(dep)) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (!done.has(dep)) {
        const found = visit(dep);
        if (found) return found;
      }
    }
    stack.pop();
    onStack.delete(name);
    done.add(name);
    return undefined;
  }

  for (const t of tasks) {
    if (done.has(t.name)) continue;
    const found = visit(t.name);
    if (found) return found;
  }
  return undefined;
}

/** Return nodes in topological order (dependencies first). */
export function topologicalOrder(graph: Graph): GraphNode[] {
  const visited = new Set<string>();
  const sorted: GraphNode[] = [];

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    const node = graph.require(id);
    for (const dep of node.dependsOn) visit(dep);
    sorted.push(node);
  }

  for (const node of graph.list()) visit(node.id);
  return sorted;
}

/** The given nodes plus everything they transitively depend on. */
export function ancestorsOf(graph: Graph, ids: Iterable<string>): Set<string> {
  const result = new Set<string>();
  const queue = [...ids];
  while (queue.length > 0) {
    const id = queue.pop();
    if (id === undefined || result.has(id)) continue;
    result.add(id);
    queue.push(...graph.require(id).dependsOn);
  }
  return result;
}

/** Every node that transitively depends on `id` (not including `id`). */
export function descendantsOf(graph: Graph, id: string): Set<string> {
  const result = new Set<string>();
  const queue = graph.dependentsOf(id);
  while (queue.length > 0) {
    const next = queue.pop();
    if (next === undefined || result.has(next)) continue;
    result.add(next);
    queue.push(...graph.dependentsOf(next));
  }
  return result;
}

/** Pending nodes whose dependencies have all completed or been skipped. */
export function readyNodes(graph: Graph, within?: ReadonlySet<string>): GraphNode[] {
  return graph
    .list()
    .filter(
      (n) =>
        n.status === "pending" &&
        (!within || within.has(n.id)) &&
        n.dependsOn.every((d) => isTerminalOk(graph.require(d).status)),
    );
}

/** True when no node can make further progress. */
export function isSettled(graph: Graph, within?: ReadonlySet<string>): boolean {
  return readyNodes(graph, within).length === 0 && !graph.list().some((n) => n.status === "dispatched");
}
