/**
 * Content digests for staleness.
 *
 * A spec's local digest covers only its own stub. Its graph digest folds in
 * the local digests of everything it transitively depends on, and a module's
 * digest is taken over its specs' graph digests in sorted order.
 */

import * as crypto from 'crypto';
import { Graph, dependencyClosure } from './graph';
import { stableStringify } from './output_writer/stable_stringify';
import { SpecRef } from './spec_ref';
import { SpecEntry } from './spec_registry';

export const DIGEST_PREFIX = 'sha256:';

function sha256(text: string): string {
    return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Line endings and trailing whitespace never affect a digest. */
export function normalizeSource(source: string): string {
    return source
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map((l) => l.trimEnd())
        .join('\n')
        .trim();
}

export function localDigest(entry: SpecEntry): string {
    return sha256(
        stableStringify({
            ref: entry.specRef,
            kind: entry.kind,
            source: normalizeSource(entry.source),
            deps: [...entry.deps].sort(),
            prompt: entry.prompt ?? null,
        }),
    );
}

export function graphDigest(ref: SpecRef, specs: ReadonlyMap<SpecRef, SpecEntry>, graph: Graph): string {
    const entry = specs.get(ref);
    const own = entry ? localDigest(entry) : sha256(`missing:${ref}`);

    const closure = dependencyClosure([ref], graph);
    closure.delete(ref);
    const lines = [...closure].sort().map((dep) => {
        const depEntry = specs.get(dep);
        return `${dep}=${depEntry ? localDigest(depEntry) : 'missing'}`;
    });

    return sha256([own, ...lines].join('\n'));
}

/** Order-independent over `entries`. */
export function moduleDigest(
    module: string,
    entries: readonly SpecEntry[],
    specs: ReadonlyMap<SpecRef, SpecEntry>,
    graph: Graph,
): string {
    const lines = entries
        .map((e) => `${e.specRef}=${graphDigest(e.specRef, specs, graph)}`)
        .sort();
    return DIGEST_PREFIX + sha256([`module=${module}`, ...lines].join('\n'));
}

export function stripDigestPrefix(digest: string): string {
    const d = digest.trim();
    return d.startsWith(DIGEST_PREFIX) ? d.slice(DIGEST_PREFIX.length) : d;
}
