import { ConfigurationError } from "../errors.js";

export type PhaseNode = {
  id: string;
  requires: readonly string[];
};

export type PhaseSelection =
  | { mode: "all" }
  | { mode: "from"; phaseId: string }
  | { mode: "only"; phaseId: string };

/** Reject duplicate ids, self edges and references to undeclared phases. */
export function checkGraph(nodes: readonly PhaseNode[]): void {
  const ids = new Set<string>();
  for (const node of nodes) {
    if (ids.has(node.id)) throw new ConfigurationError(`Duplicate phase id: ${node.id}`, { phase: node.id });
    ids.add(node.id);
  }
  for (const node of nodes) {
    for (const dep of node.requires) {
      if (dep === node.id) {
        throw new ConfigurationError(`Phase ${node.id} requires itself`, { phase: node.id });
      }
      if (!ids.has(dep)) {
        throw new ConfigurationError(`Phase ${node.id} requires unknown phase: ${dep}`, { phase: node.id, requires: dep });
      }
    }
  }
}

/**
 * Return one cycle as a closed path (first id repeated at the end), or null.
 */
export function findCycle(nodes: readonly PhaseNode[]): string[] | null {
  const byId = new Map(nodes.map((n) => [n.id, n]));
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  function visit(id: string): string[] | null {
    const mark = state.get(id);
    if (mark === "done") return null;
    if (mark === "visiting") {
      const start = stack.indexOf(id);
      return [...stack.slice(start), id];
    }
    state.set(id, "visiting");
    stack.push(id);
    for (const dep of byId.get(id)?.requires ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(id, "done");
    return null;
  }

  for (const node of nodes) {
    const cycle = visit(node.id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Topological order consistent with every prerequisite edge (Kahn's algorithm).
 * Among phases that are ready at the same time, declaration order wins.
 */
export function resolveOrder(nodes: readonly PhaseNode[]): string[] {
  checkGraph(nodes);
  const cycle = findCycle(nodes);
  if (cycle) {
    throw new ConfigurationError(`Phase graph has a cycle: ${cycle.join(" -> ")}`, { cycle });
  }

  const index = new Map(nodes.map((n, i) => [n.id, i]));
  const remaining = new Map(nodes.map((n) => [n.id, new Set(n.requires).size]));
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    for (const dep of new Set(node.requires)) {
      const list = dependents.get(dep) ?? [];
      list.push(node.id);
      dependents.set(dep, list);
    }
  }

  const byIndex = (a: string, b: string) => (index.get(a) ?? 0) - (index.get(b) ?? 0);
  const ready = nodes.filter((n) => remaining.get(n.id) === 0).map((n) => n.id);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(byIndex);
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);
    for (const child of dependents.get(id) ?? []) {
      const left = (remaining.get(child) ?? 0) - 1;
      remaining.set(child, left);
      if (left === 0) ready.push(child);
    }
  }

  return order;
}

/** Every phase that depends on `id`, directly or transitively. */
export function dependentsOf(nodes: readonly PhaseNode[], id: string): Set<string> {
  const result = new Set<string>();
  const queue = [id];
  while (queue.length > 0) {
    const current = queue.shift();
    for (const node of nodes) {
      if (current !== undefined && node.requires.includes(current) && !result.has(node.id)) {
        result.add(node.id);
        queue.push(node.id);
      }
    }
  }
  return result;
}

/** Narrow a resolved order to the requested selection. */
export function selectPhases(order: readonly string[], selection: PhaseSelection): string[] {
  if (selection.mode === "all") return [...order];

  const idx = order.indexOf(selection.phaseId);
  if (idx === -1) {
    throw new ConfigurationError(`Unknown phase: ${selection.phaseId}`, { phase: selection.phaseId });
  }
  return selection.mode === "from" ? order.slice(idx) : [order[idx]];
}
