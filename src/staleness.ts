// staleness.ts — which modules need regenerating

import { stripDigestPrefix, moduleDigest } from './digest';
import { Graph } from './graph';
import { createLogger } from './logger';
import { extractModuleDigest, readGeneratedModule } from './output_writer';
import { SpecRef } from './spec_ref';
import { SpecEntry } from './spec_registry';

const log = createLogger('staleness');

/**
 * Pure comparison. With `force` every module is stale; otherwise a module is
 * stale when its stored digest is absent or differs from the computed one.
 */
export function detectStale(
    moduleDigests: ReadonlyMap<string, string>,
    onDiskDigests: ReadonlyMap<string, string | null>,
    force: boolean,
): Set<string> {
    if (force) return new Set(moduleDigests.keys());

    const stale = new Set<string>();
    for (const [module, digest] of moduleDigests) {
        const stored = onDiskDigests.get(module);
        if (stored === undefined || stored === null || stripDigestPrefix(stored) !== stripDigestPrefix(digest)) {
            stale.add(module);
        }
    }
    return stale;
}

/** Stored digest per module; null for missing, unreadable or header-less artifacts. */
export function readOnDiskDigests(opts: {
    packageDir: string;
    generatedDir: string;
    modules: Iterable<string>;
}): Map<string, string | null> {
    const out = new Map<string, string | null>();
    for (const module of opts.modules) {
        const text = readGeneratedModule(opts.packageDir, opts.generatedDir, module);
        out.set(module, text === null ? null : extractModuleDigest(text));
    }
    return out;
}

export function computeModuleDigests(
    moduleSpecs: ReadonlyMap<string, readonly SpecEntry[]>,
    specs: ReadonlyMap<SpecRef, SpecEntry>,
    specGraph: Graph,
): Map<string, string> {
    const out = new Map<string, string>();
    for (const [module, entries] of moduleSpecs) {
        out.set(module, moduleDigest(module, entries, specs, specGraph));
    }
    return out;
}

export function detectStaleModules(opts: {
    packageDir: string;
    generatedDir: string;
    moduleSpecs: ReadonlyMap<string, readonly SpecEntry[]>;
    specs: ReadonlyMap<SpecRef, SpecEntry>;
    specGraph: Graph;
    force: boolean;
}): Set<string> {
    const digests = computeModuleDigests(opts.moduleSpecs, opts.specs, opts.specGraph);
    const onDisk = opts.force
        ? new Map<string, string | null>()
        : readOnDiskDigests({ packageDir: opts.packageDir, generatedDir: opts.generatedDir, modules: digests.keys() });
    const stale = detectStale(digests, onDisk, opts.force);
    log.debug('Staleness computed', { modules: digests.size, stale: stale.size, force: opts.force });
    return stale;
}
