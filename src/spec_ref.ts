// spec_ref.ts — "<module>:<qualname>" references to spec entries

import { DiscoveryError } from './errors';

export type SpecRef = string;

const MODULE_RE = /^[A-Za-z0-9_$@-][A-Za-z0-9_$@.-]*(\/[A-Za-z0-9_$@-][A-Za-z0-9_$@.-]*)*$/;
const QUALNAME_RE = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

/** Canonical module name for a path relative to a source root: posix separators, no `.ts`. */
export function normalizeModuleName(raw: string): string {
    let m = raw.trim().replace(/\\/g, '/');
    while (m.startsWith('./')) m = m.slice(2);
    return m.replace(/\.(ts|tsx|mts|cts)$/, '');
}

export function normalizeSpecRef(raw: string): SpecRef {
    const s = raw.trim();
    const idx = s.indexOf(':');
    if (idx <= 0 || idx === s.length - 1) {
        throw new DiscoveryError(`Malformed spec ref "${raw}": expected "<module>:<name>".`);
    }
    const module = normalizeModuleName(s.slice(0, idx));
    const qualname = s.slice(idx + 1).trim();
    if (!MODULE_RE.test(module)) {
        throw new DiscoveryError(`Malformed module in spec ref "${raw}".`);
    }
    if (!QUALNAME_RE.test(qualname)) {
        throw new DiscoveryError(`Malformed name in spec ref "${raw}".`);
    }
    return `${module}:${qualname}`;
}

export function parseSpecRef(ref: SpecRef): { module: string; qualname: string } {
    const idx = ref.indexOf(':');
    return { module: ref.slice(0, idx), qualname: ref.slice(idx + 1) };
}
