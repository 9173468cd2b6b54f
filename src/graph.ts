/**
 * Graph utilities over named nodes.
 *
 * Every graph here maps a node to the set of nodes it depends on
 * (`a -> {b}` means "a depends on b"). Nodes that only appear as a
 * dependency are still nodes.
 */

import { DependencyCycleError } from './errors';

export type Graph = ReadonlyMap<string, ReadonlySet<string>>;

const EMPTY: ReadonlySet<string> = new Set<string>();

function sortedNodes(graph: Graph): string[] {
    const nodes = new Set<string>();
    for (const [node, deps] of graph) {
        nodes.add(node);
        for (const d of deps) nodes.add(d);
    }
    return [...nodes].sort();
}

function depsOf(graph: Graph, node: string): string[] {
    return [...(graph.get(node) ?? EMPTY)].sort();
}

/**
 * Return nodes in dependency order (dependencies first). Kahn's algorithm.
 * Throws DependencyCycleError naming one cycle's participants, in cycle order.
 */
export function topologicalOrder(graph: Graph): string[] {
    const nodes = sortedNodes(graph);
    const remaining = new Map<string, number>();
    const dependents = invertGraph(graph);

    for (const n of nodes) remaining.set(n, (graph.get(n) ?? EMPTY).size);

    const queue = nodes.filter((n) => remaining.get(n) === 0);
    const order: string[] = [];

    while (queue.length > 0) {
        const node = queue.shift();
        if (node === undefined) break;
        order.push(node);
        for (const dependent of [...(dependents.get(node) ?? EMPTY)].sort()) {
            const left = (remaining.get(dependent) ?? 1) - 1;
            remaining.set(dependent, left);
            if (left === 0) queue.push(dependent);
        }
    }

    if (order.length !== nodes.length) {
        const placed = new Set(order);
        const residual = induceSubgraph(graph, new Set(nodes.filter((n) => !placed.has(n))));
        throw new DependencyCycleError(findFirstCycle(residual) ?? [...residual.keys()].sort());
    }

    return order;
}

/**
 * One cycle, or null for a DAG. A single colour-marking DFS over sorted
 * nodes, so linear in the graph; the result is rotated to start at its
 * smallest node.
 */
export function findFirstCycle(graph: Graph): string[] | null {
    const WHITE = 0;
    const GREY = 1;
    const BLACK = 2;
    const colour = new Map<string, number>();

    for (const root of sortedNodes(graph)) {
        if ((colour.get(root) ?? WHITE) !== WHITE) continue;
        const path: string[] = [root];
        colour.set(root, GREY);
        const stack: Array<{ next: string[]; idx: number }> = [{ next: depsOf(graph, root), idx: 0 }];

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            if (frame.idx >= frame.next.length) {
                stack.pop();
                const done = path.pop();
                if (done !== undefined) colour.set(done, BLACK);
                continue;
            }
            const n = frame.next[frame.idx++];
            const c = colour.get(n) ?? WHITE;
            if (c === GREY) {
                const cycle = path.slice(path.indexOf(n));
                const smallest = cycle.indexOf([...cycle].sort()[0]);
                return [...cycle.slice(smallest), ...cycle.slice(0, smallest)];
            }
            if (c === BLACK) continue;
            colour.set(n, GREY);
            path.push(n);
            stack.push({ next: depsOf(graph, n), idx: 0 });
        }
    }
    return null;
}

/**
 * Enumerate every simple cycle. Exponential on dense graphs: diagnostics
 * only, never on the build path. Each cycle starts at its lexicographically
 * smallest node and follows dependency edges; the list is sorted.
 */
export function findCycles(graph: Graph): string[][] {
    const nodes = sortedNodes(graph);
    const rank = new Map(nodes.map((n, i) => [n, i] as const));
    const cycles: string[][] = [];

    for (const start of nodes) {
        const startRank = rank.get(start) ?? 0;
        const path: string[] = [start];
        const onPath = new Set<string>([start]);
        // explicit stack of neighbour iterators keeps deep graphs off the call stack
        const stack: Array<{ next: string[]; idx: number }> = [{ next: depsOf(graph, start), idx: 0 }];

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            if (frame.idx >= frame.next.length) {
                stack.pop();
                const left = path.pop();
                if (left !== undefined) onPath.delete(left);
                continue;
            }
            const n = frame.next[frame.idx++];
            if (n === start) {
                cycles.push([...path]);
                continue;
            }
            if (onPath.has(n) || (rank.get(n) ?? 0) < startRank) continue;
            path.push(n);
            onPath.add(n);
            stack.push({ next: depsOf(graph, n), idx: 0 });
        }
    }

    return cycles.sort(compareSequences);
}

function compareSequences(a: string[], b: string[]): number {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
        if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
    }
    return a.length - b.length;
}

/** Restrict a graph to `nodes`, dropping edges that leave the set. */
export function induceSubgraph(graph: Graph, nodes: ReadonlySet<string>): Map<string, Set<string>> {
    const out = new Map<string, Set<string>>();
    for (const n of nodes) {
        const deps = new Set<string>();
        for (const d of graph.get(n) ?? EMPTY) {
            if (nodes.has(d)) deps.add(d);
        }
        out.set(n, deps);
    }
    return out;
}

/** Build the dependents map (reverse edges). Restricted to `within` when given. */
export function invertGraph(graph: Graph, within?: ReadonlySet<string>): Map<string, Set<string>> {
    const dependents = new Map<string, Set<string>>();
    for (const [node, deps] of graph) {
        if (within && !within.has(node)) continue;
        if (!dependents.has(node)) dependents.set(node, new Set());
        for (const dep of deps) {
            if (within && !within.has(dep)) continue;
            let set = dependents.get(dep);
            if (!set) {
                set = new Set();
                dependents.set(dep, set);
            }
            set.add(node);
        }
    }
    return dependents;
}

/**
 * If a module is stale, everything that depends on it (transitively) is stale.
 * Tolerates cycles: runs before cycle validation in some call sites.
 */
export function expandStaleModules(moduleDag: Graph, staleModules: Iterable<string>): Set<string> {
    const dependents = invertGraph(moduleDag);
    const expanded = new Set<string>(staleModules);
    const queue = [...expanded];

    while (queue.length > 0) {
        const m = queue.pop();
        if (m === undefined) break;
        for (const dependent of dependents.get(m) ?? EMPTY) {
            if (expanded.has(dependent)) continue;
            expanded.add(dependent);
            queue.push(dependent);
        }
    }
    return expanded;
}

/**
 * Priority heuristic: longest chain of dependents inside `modules`.
 * A node with no dependents in the working set scores 0.
 */
export function criticalPathLengths(modules: ReadonlySet<string>, dag: Graph): Map<string, number> {
    const dependents = invertGraph(induceSubgraph(dag, modules));
    const children = (m: string): string[] => [...(dependents.get(m) ?? EMPTY)].sort();

    const memo = new Map<string, number>();
    const onStack = new Set<string>();

    for (const root of [...modules].sort()) {
        if (memo.has(root)) continue;
        onStack.add(root);
        const stack: Array<{ node: string; next: string[]; idx: number }> = [
            { node: root, next: children(root), idx: 0 },
        ];

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            if (frame.idx < frame.next.length) {
                const c = frame.next[frame.idx++];
                if (memo.has(c) || onStack.has(c)) continue;
                onStack.add(c);
                stack.push({ node: c, next: children(c), idx: 0 });
                continue;
            }

            let length = 0;
            if (frame.next.length > 0) {
                length = 1 + Math.max(...frame.next.map((c) => memo.get(c) ?? 0));
            }
            memo.set(frame.node, length);
            onStack.delete(frame.node);
            stack.pop();
        }
    }

    return memo;
}

/** Return `modules` plus all of their dependencies (transitively). */
export function dependencyClosure(modules: Iterable<string>, graph: Graph): Set<string> {
    const seen = new Set<string>(modules);
    const stack = [...seen];
    while (stack.length > 0) {
        const m = stack.pop();
        if (m === undefined) break;
        for (const dep of graph.get(m) ?? EMPTY) {
            if (seen.has(dep)) continue;
            seen.add(dep);
            stack.push(dep);
        }
    }
    return seen;
}
