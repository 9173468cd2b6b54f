import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { TokenUsage } from '../src/cost_tracker';
import { collapseToModuleDag, ModuleDag, SpecGraph } from '../src/deps';
import { GenerateOptions, GeneratedModule, GeneratorBackend } from '../src/generate/backend';
import type { ModuleSpecContext } from '../src/generate/context';
import { setLogLevel } from '../src/logger';
import type { SpecRef } from '../src/spec_ref';
import type { SpecEntry } from '../src/spec_registry';

setLogLevel('silent');

export function tmpDir(prefix = 'specforge-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** `fn_<module>` with non-word characters replaced. */
export function fnName(module: string): string {
    return `fn_${module.replace(/\W/g, '_')}`;
}

export function makeEntry(
    module: string,
    qualname: string,
    opts: { deps?: SpecRef[]; source?: string; prompt?: string } = {},
): SpecEntry {
    return {
        specRef: `${module}:${qualname}`,
        module,
        qualname,
        kind: 'function',
        sourceFile: `src/${module}.ts`,
        source: opts.source ?? `/** @forge */\nexport function ${qualname}(): string {\n    throw new Error('stub');\n}`,
        deps: [...(opts.deps ?? [])].sort(),
        prompt: opts.prompt,
    };
}

export interface Fixture {
    specs: Map<SpecRef, SpecEntry>;
    moduleSpecs: Map<string, SpecEntry[]>;
    specGraph: SpecGraph;
    moduleDag: ModuleDag;
}

/**
 * One spec per module. `deps` maps a module to the modules it depends on;
 * each module's single spec depends on each dependency's single spec.
 */
export function fixture(deps: Record<string, string[]>): Fixture {
    const specs = new Map<SpecRef, SpecEntry>();
    const moduleSpecs = new Map<string, SpecEntry[]>();
    const specGraph: SpecGraph = new Map();

    for (const [m, ds] of Object.entries(deps)) {
        const depRefs = ds.map((d) => `${d}:${fnName(d)}`);
        const entry = makeEntry(m, fnName(m), { deps: depRefs });
        specs.set(entry.specRef, entry);
        moduleSpecs.set(m, [entry]);
        specGraph.set(entry.specRef, new Set(depRefs));
    }
    return { specs, moduleSpecs, specGraph, moduleDag: collapseToModuleDag(specGraph, specs) };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/** A module exporting every expected name. */
export function validSource(ctx: ModuleSpecContext): string {
    return ctx.expectedNames.map((n) => `export function ${n}(): string {\n    return '${ctx.specModule}';\n}\n`).join('\n');
}

export interface FakeBackendOptions {
    model?: string;
    /** Source per call; defaults to `validSource`. */
    respond?: (ctx: ModuleSpecContext, call: number) => string | Promise<string>;
    delayMs?: (module: string) => number;
    usage?: { promptTokens: number; completionTokens: number };
    /** Modules whose generateModule call throws. */
    throwFor?: ReadonlySet<string>;
}

export class FakeBackend extends GeneratorBackend {
    readonly providerName = 'fake';
    readonly modelName: string;
    readonly calls: string[] = [];
    readonly contexts: ModuleSpecContext[] = [];
    readonly errorContexts: Array<readonly string[]> = [];
    active = 0;
    maxActive = 0;

    constructor(private readonly opts: FakeBackendOptions = {}) {
        super();
        this.modelName = opts.model ?? 'fake-model';
    }

    async generateModule(ctx: ModuleSpecContext, opts: GenerateOptions = {}): Promise<GeneratedModule> {
        this.calls.push(ctx.specModule);
        this.contexts.push(ctx);
        this.errorContexts.push(opts.extraErrorContext ?? []);
        const call = this.calls.length;
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            await sleep(this.opts.delayMs?.(ctx.specModule) ?? 1, opts.signal);
            if (this.opts.throwFor?.has(ctx.specModule)) {
                throw new Error(`provider exploded for ${ctx.specModule}`);
            }
            const source = this.opts.respond ? await this.opts.respond(ctx, call) : validSource(ctx);
            const usage: TokenUsage | undefined = this.opts.usage
                ? { ...this.opts.usage, model: this.modelName, provider: this.providerName }
                : undefined;
            return { source, usage };
        } finally {
            this.active--;
        }
    }
}
