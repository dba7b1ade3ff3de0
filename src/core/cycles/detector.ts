/**
 * Circular dependency detection over the module graph.
 *
 * Strongly connected components come from Tarjan's algorithm. Each component
 * of two or more modules is reported as one closed walk through all of its
 * members; every self-loop is reported on its own.
 */
import { successors } from '../graph/builder.js';
import { sortIdentities } from '../graph/order.js';
import type { DependencyGraph } from '../graph/types.js';
import type { Cycle } from './types.js';

function isIndex(value: number | undefined): value is number {
  return value !== undefined;
}

/**
 * All strongly connected components (singletons included). Members are sorted
 * by identity and components are ordered by their lowest member.
 */
export function findStronglyConnectedComponents(graph: DependencyGraph): string[][] {
  const ids = sortIdentities(graph.nodes.map((n) => n.id));
  const position = new Map(ids.map((id, i) => [id, i]));
  const adjacency = ids.map((id) =>
    sortIdentities(successors(graph, id)).map((target) => position.get(target)).filter(isIndex)
  );

  const n = ids.length;
  const index = new Array<number>(n).fill(-1);
  const low = new Array<number>(n).fill(0);
  const onStack = new Array<boolean>(n).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let counter = 0;

  const open = (v: number): void => {
    index[v] = counter;
    low[v] = counter;
    counter++;
    stack.push(v);
    onStack[v] = true;
  };

  const close = (v: number): void => {
    if (low[v] !== index[v]) return;
    const component: number[] = [];
    let w = stack.pop();
    while (w !== undefined) {
      onStack[w] = false;
      component.push(w);
      if (w === v) break;
      w = stack.pop();
    }
    components.push(component.sort((a, b) => a - b));
  };

  // Iterative, so chain length is not bounded by the call stack.
  const strongConnect = (root: number): void => {
    const frames: Array<{ v: number; edge: number }> = [{ v: root, edge: 0 }];
    open(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const { v } = frame;

      if (frame.edge < adjacency[v].length) {
        const w = adjacency[v][frame.edge];
        frame.edge++;
        if (index[w] === -1) {
          open(w);
          frames.push({ v: w, edge: 0 });
        } else if (onStack[w]) {
          low[v] = Math.min(low[v], index[w]);
        }
        continue;
      }

      frames.pop();
      close(v);
      const caller = frames.at(-1);
      if (caller) {
        low[caller.v] = Math.min(low[caller.v], low[v]);
      }
    }
  };

  for (let v = 0; v < n; v++) {
    if (index[v] === -1) {
      strongConnect(v);
    }
  }

  return components
    .sort((a, b) => a[0] - b[0])
    .map((component) => component.map((i) => ids[i]));
}

/**
 * Shortest path from `from` to `to` that stays inside `members`.
 * Neighbours are expanded in identity order, so ties resolve the same way
 * on every run.
 */
function shortestPathWithin(
  graph: DependencyGraph,
  from: string,
  to: string,
  members: ReadonlySet<string>
): string[] {
  const parent = new Map<string, string>();
  const visited = new Set<string>([from]);
  const queue: string[] = [from];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of sortIdentities(successors(graph, current))) {
      if (!members.has(next) || visited.has(next)) continue;
      visited.add(next);
      parent.set(next, current);
      if (next === to) {
        const path = [to];
        let step = parent.get(to);
        while (step !== undefined) {
          path.unshift(step);
          step = parent.get(step);
        }
        return path;
      }
      queue.push(next);
    }
  }

  throw new Error(`'${to}' is not reachable from '${from}' inside its component`);
}

/**
 * Closed walk visiting every member of a strongly connected component.
 * Starts at the lowest identity, hops to the lowest unvisited member each
 * time, then returns to the start (which is not repeated).
 */
export function componentWalk(graph: DependencyGraph, component: readonly string[]): Cycle {
  const members = new Set(component);
  const ordered = sortIdentities(component);
  const start = ordered[0];
  const walk: Cycle = [start];
  const visited = new Set<string>([start]);
  let current = start;

  for (const target of ordered) {
    if (visited.has(target)) continue;
    for (const step of shortestPathWithin(graph, current, target, members).slice(1)) {
      walk.push(step);
      visited.add(step);
    }
    current = target;
  }

  if (current !== start) {
    walk.push(...shortestPathWithin(graph, current, start, members).slice(1, -1));
  }

  return walk;
}

/**
 * Report circular dependencies: one walk per component of size two or more,
 * followed by that component's self-loops.
 */
export function findCycles(graph: DependencyGraph): Cycle[] {
  const cycles: Cycle[] = [];

  for (const component of findStronglyConnectedComponents(graph)) {
    if (component.length >= 2) {
      cycles.push(componentWalk(graph, component));
    }
    for (const id of component) {
      if (successors(graph, id).includes(id)) {
        cycles.push([id]);
      }
    }
  }

  return cycles;
}
