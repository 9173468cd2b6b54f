// generate/context.ts — the immutable input bundle for one generation call

import { SpecRef } from '../spec_ref';

export type ContextKind = 'build' | 'test';

export interface ModuleSpecContext {
    readonly kind: ContextKind;
    readonly specModule: string;
    readonly generatedModule: string;
    readonly expectedNames: readonly string[];
    readonly specSources: ReadonlyMap<SpecRef, string>;
    readonly specPrompts: ReadonlyMap<SpecRef, string>;
    readonly dependencyApis: ReadonlyMap<SpecRef, string>;
    readonly dependencyGeneratedModules: ReadonlyMap<string, string>;
    readonly sharedGuidance: string;
}

export interface ModuleContextInput {
    kind?: ContextKind;
    specModule: string;
    generatedModule: string;
    expectedNames: Iterable<string>;
    specSources: Iterable<readonly [SpecRef, string]>;
    specPrompts?: Iterable<readonly [SpecRef, string]>;
    dependencyApis?: Iterable<readonly [SpecRef, string]>;
    dependencyGeneratedModules?: Iterable<readonly [string, string]>;
    sharedGuidance?: string;
}

/** Map whose mutators throw; Object.freeze alone does not protect Map contents. */
class FrozenMap<K, V> extends Map<K, V> {
    private sealed = false;

    constructor(entries: Iterable<readonly [K, V]>) {
        super();
        for (const [k, v] of entries) super.set(k, v);
        this.sealed = true;
        Object.freeze(this);
    }

    override set(key: K, value: V): this {
        if (this.sealed) throw new TypeError('ModuleSpecContext maps are read-only');
        return super.set(key, value);
    }

    override delete(): boolean {
        throw new TypeError('ModuleSpecContext maps are read-only');
    }

    override clear(): void {
        throw new TypeError('ModuleSpecContext maps are read-only');
    }
}

function sortedEntries<V>(entries: Iterable<readonly [string, V]> | undefined): Array<readonly [string, V]> {
    return [...(entries ?? [])].sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/** Build a deep-frozen context. Map entries are stored sorted by key. */
export function createModuleContext(input: ModuleContextInput): ModuleSpecContext {
    const ctx: ModuleSpecContext = {
        kind: input.kind ?? 'build',
        specModule: input.specModule,
        generatedModule: input.generatedModule,
        expectedNames: Object.freeze([...new Set(input.expectedNames)].sort()),
        specSources: new FrozenMap(sortedEntries(input.specSources)),
        specPrompts: new FrozenMap(sortedEntries(input.specPrompts)),
        dependencyApis: new FrozenMap(sortedEntries(input.dependencyApis)),
        dependencyGeneratedModules: new FrozenMap(sortedEntries(input.dependencyGeneratedModules)),
        sharedGuidance: input.sharedGuidance ?? '',
    };
    return Object.freeze(ctx);
}
