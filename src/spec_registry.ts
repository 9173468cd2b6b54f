/**
 * Spec discovery — explicit registration pass.
 *
 * Walks the configured source roots and returns every exported function or
 * class whose JSDoc carries an `@forge` tag. Nothing is registered globally;
 * callers hand the returned collection to the graph builder and scheduler.
 *
 *   /**
 *    * Turn a title into a URL slug.
 *    * @forge
 *    * @deps text/normalize:collapseWhitespace
 *    * @prompt Only ASCII letters, digits and dashes survive.
 *    *\/
 *   export function slugify(title: string): string {
 *       throw new Error('generated');
 *   }
 */

import * as fs from 'fs';
import * as path from 'path';
import * as ts from 'typescript';
import { DiscoveryError, errorMessage } from './errors';
import { createLogger } from './logger';
import { SpecRef, normalizeModuleName, normalizeSpecRef } from './spec_ref';
import { hasExportModifier, jsDocTags, parseSource } from './ts_source';

const log = createLogger('discovery');

export type SpecKind = 'function' | 'class';

export interface SpecEntry {
    specRef: SpecRef;
    module: string;
    qualname: string;
    kind: SpecKind;
    sourceFile: string;
    /** JSDoc + declaration text of the stub. */
    source: string;
    /** Explicit `@deps`. */
    deps: SpecRef[];
    /** Free-text generation guidance from `@prompt`. */
    prompt?: string;
    /** `false` when the stub carries `@noInferDeps`. */
    inferDeps?: boolean;
}

export interface DiscoverOptions {
    root: string;
    sourceRoots: string[];
    generatedDir: string;
}

const SKIP_DIRS = new Set(['node_modules', 'dist', 'build', 'coverage']);

function isSpecCandidate(file: string): boolean {
    return file.endsWith('.ts') && !file.endsWith('.d.ts') && !/\.(test|spec)\.ts$/.test(file);
}

function walk(dir: string, generatedDir: string, out: string[]): void {
    let entries: fs.Dirent[];
    try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (e) {
        throw new DiscoveryError(`Cannot read source directory ${dir}: ${errorMessage(e)}`);
    }
    for (const ent of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        const full = path.join(dir, ent.name);
        if (ent.isDirectory()) {
            if (ent.name.startsWith('.') || SKIP_DIRS.has(ent.name) || ent.name === generatedDir) continue;
            walk(full, generatedDir, out);
        } else if (ent.isFile() && isSpecCandidate(ent.name)) {
            out.push(full);
        }
    }
}

/** Parse one spec file's text. `module` is the file's module name. */
export function extractSpecs(module: string, sourceFile: string, text: string): SpecEntry[] {
    if (!text.includes('@forge')) return [];

    const sf = parseSource(sourceFile, text);
    const out: SpecEntry[] = [];

    for (const st of sf.statements) {
        let kind: SpecKind;
        if (ts.isFunctionDeclaration(st)) kind = 'function';
        else if (ts.isClassDeclaration(st)) kind = 'class';
        else continue;

        if (!st.name || !hasExportModifier(st)) continue;
        const tags = jsDocTags(st);
        if (!tags.some((t) => t.name === 'forge')) continue;

        const qualname = st.name.text;
        const deps: SpecRef[] = [];
        const prompts: string[] = [];
        let inferDeps: boolean | undefined;

        for (const tag of tags) {
            if (tag.name === 'deps') {
                for (const raw of tag.text.split(/[\s,]+/).filter(Boolean)) {
                    // bare names refer to the same module
                    deps.push(normalizeSpecRef(raw.includes(':') ? raw : `${module}:${raw}`));
                }
            } else if (tag.name === 'prompt' && tag.text) {
                prompts.push(tag.text);
            } else if (tag.name === 'noInferDeps') {
                inferDeps = false;
            }
        }

        out.push({
            specRef: normalizeSpecRef(`${module}:${qualname}`),
            module,
            qualname,
            kind,
            sourceFile,
            source: text.slice(st.getStart(sf, true), st.end),
            deps: [...new Set(deps)].sort(),
            prompt: prompts.length > 0 ? prompts.join('\n') : undefined,
            inferDeps,
        });
    }

    return out;
}

export function discoverSpecs(opts: DiscoverOptions): SpecEntry[] {
    const entries: SpecEntry[] = [];
    const seen = new Map<SpecRef, string>();

    for (const sr of opts.sourceRoots) {
        const base = path.resolve(opts.root, sr);
        if (!fs.existsSync(base)) {
            log.debug('Source root missing, skipped', { root: base });
            continue;
        }

        const files: string[] = [];
        walk(base, opts.generatedDir, files);

        for (const file of files) {
            const module = normalizeModuleName(path.relative(base, file));
            const text = fs.readFileSync(file, 'utf8');
            for (const entry of extractSpecs(module, file, text)) {
                const prev = seen.get(entry.specRef);
                if (prev !== undefined) {
                    throw new DiscoveryError(
                        `Duplicate spec ${entry.specRef} in ${prev} and ${file}.`,
                        'Each source root must use distinct module paths.',
                    );
                }
                seen.set(entry.specRef, file);
                entries.push(entry);
            }
        }
    }

    log.debug('Discovery complete', { specs: entries.length });
    return entries.sort((a, b) => a.specRef.localeCompare(b.specRef));
}

export function indexSpecs(entries: Iterable<SpecEntry>): Map<SpecRef, SpecEntry> {
    const out = new Map<SpecRef, SpecEntry>();
    for (const e of entries) out.set(e.specRef, e);
    return out;
}

/** Group entries by owning module; entries within a module are sorted by name. */
export function groupByModule(entries: Iterable<SpecEntry>): Map<string, SpecEntry[]> {
    const out = new Map<string, SpecEntry[]>();
    for (const e of entries) {
        const list = out.get(e.module) ?? [];
        list.push(e);
        out.set(e.module, list);
    }
    for (const list of out.values()) list.sort((a, b) => a.qualname.localeCompare(b.qualname));
    return out;
}
