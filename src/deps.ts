// deps.ts — spec-level dependency graph and its module-level collapse

import { DiscoveryError } from './errors';
import { Graph } from './graph';
import { createLogger } from './logger';
import { SpecRef, parseSpecRef } from './spec_ref';
import { SpecEntry } from './spec_registry';
import { identifiersIn } from './ts_source';

const log = createLogger('deps');

export type SpecGraph = Map<SpecRef, Set<SpecRef>>;
export type ModuleDag = Map<string, Set<string>>;

export interface SpecGraphOptions {
    /** Infer edges from names referenced in stub source unless a stub opts out. */
    inferDefault: boolean;
}

/**
 * Resolve a referenced name to a spec. Same-module specs win; otherwise the
 * name must belong to exactly one spec across the project.
 */
function resolveName(
    name: string,
    fromModule: string,
    byName: ReadonlyMap<string, SpecRef[]>,
): SpecRef | undefined {
    const candidates = byName.get(name);
    if (!candidates) return undefined;
    const local = candidates.find((ref) => parseSpecRef(ref).module === fromModule);
    if (local) return local;
    return candidates.length === 1 ? candidates[0] : undefined;
}

export function buildSpecGraph(specs: ReadonlyMap<SpecRef, SpecEntry>, opts: SpecGraphOptions): SpecGraph {
    const byName = new Map<string, SpecRef[]>();
    for (const [ref, entry] of specs) {
        const list = byName.get(entry.qualname) ?? [];
        list.push(ref);
        byName.set(entry.qualname, list);
    }

    const graph: SpecGraph = new Map();
    for (const ref of [...specs.keys()].sort()) {
        const entry = specs.get(ref);
        if (!entry) continue;
        const deps = new Set<SpecRef>();

        for (const dep of entry.deps) {
            if (!specs.has(dep)) {
                throw new DiscoveryError(
                    `Unknown dependency ${dep} declared by ${ref}.`,
                    'Every @deps entry must name another @forge spec as "<module>:<Name>".',
                );
            }
            if (dep !== ref) deps.add(dep);
        }

        if (entry.inferDeps ?? opts.inferDefault) {
            for (const ident of identifiersIn(entry.source)) {
                if (ident === entry.qualname) continue;
                const target = resolveName(ident, entry.module, byName);
                if (target && target !== ref) deps.add(target);
            }
        }

        graph.set(ref, deps);
    }

    log.debug('Spec graph built', {
        specs: graph.size,
        edges: [...graph.values()].reduce((n, s) => n + s.size, 0),
    });
    return graph;
}

/** Collapse spec edges to module edges. Every module with a spec is a node; self edges are dropped. */
export function collapseToModuleDag(specGraph: Graph, specs: ReadonlyMap<SpecRef, SpecEntry>): ModuleDag {
    const dag: ModuleDag = new Map();
    for (const entry of specs.values()) {
        if (!dag.has(entry.module)) dag.set(entry.module, new Set());
    }
    for (const [ref, deps] of specGraph) {
        const from = specs.get(ref)?.module ?? parseSpecRef(ref).module;
        let set = dag.get(from);
        if (!set) {
            set = new Set();
            dag.set(from, set);
        }
        for (const dep of deps) {
            const to = specs.get(dep)?.module ?? parseSpecRef(dep).module;
            if (to !== from) set.add(to);
        }
    }
    return dag;
}
