import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { createModuleContext, ModuleContextInput } from '../src/generate/context';
import {
    CacheEntry,
    cacheKeyFromContext,
    CacheStore,
    FileCacheStore,
    parseCacheEntry,
    ResponseCache,
    SqliteCacheStore,
} from '../src/response_cache';
import { tmpDir } from './helpers';

const BASE: ModuleContextInput = {
    kind: 'build',
    specModule: 'm',
    generatedModule: '__generated__/m',
    expectedNames: ['f', 'g'],
    specSources: [['m:f', 'stub f']],
    specPrompts: [['m:f', 'prompt f']],
    dependencyApis: [['d:h', 'api h']],
    dependencyGeneratedModules: [['d', 'source d']],
    sharedGuidance: 'guide',
};
const ID = { model: 'model-x', provider: 'prov' };

const ENTRY: CacheEntry = {
    source: 'export function f() {}\n',
    promptTokens: 10,
    completionTokens: 5,
    model: 'model-x',
    provider: 'prov',
    cachedAt: 1700000000,
};

describe('cacheKeyFromContext', () => {
    const key = (over: Partial<ModuleContextInput> = {}, id = ID): string =>
        cacheKeyFromContext(createModuleContext({ ...BASE, ...over }), id);

    test('identical inputs give identical keys', () => {
        assert.equal(key(), key());
        assert.match(key(), /^[0-9a-f]{64}$/);
    });

    test('insensitive to input ordering', () => {
        assert.equal(key({ expectedNames: ['g', 'f'] }), key());
        assert.equal(
            key({ specSources: [['m:g', 'stub g'], ['m:f', 'stub f']] }),
            key({ specSources: [['m:f', 'stub f'], ['m:g', 'stub g']] }),
        );
    });

    test('every field changes the key', () => {
        const variants: Array<[string, string]> = [
            ['model', key({}, { ...ID, model: 'model-y' })],
            ['provider', key({}, { ...ID, provider: 'other' })],
            ['kind', key({ kind: 'test' })],
            ['specModule', key({ specModule: 'n' })],
            ['generatedModule', key({ generatedModule: '__generated__/n' })],
            ['expectedNames', key({ expectedNames: ['f'] })],
            ['specSources', key({ specSources: [['m:f', 'stub f2']] })],
            ['specPrompts', key({ specPrompts: [] })],
            ['dependencyApis', key({ dependencyApis: [['d:h', 'api h2']] })],
            ['dependencyGeneratedModules', key({ dependencyGeneratedModules: [['d', 'source d2']] })],
            ['sharedGuidance', key({ sharedGuidance: 'other guide' })],
        ];
        const base = key();
        for (const [field, k] of variants) assert.notEqual(k, base, field);
        assert.equal(new Set(variants.map(([, k]) => k)).size, variants.length);
    });

    test('a NUL inside a field cannot shift the field boundary', () => {
        assert.notEqual(key({}, { provider: 'a\0b', model: 'c' }), key({}, { provider: 'a', model: 'b\0c' }));
        assert.notEqual(
            key({ specModule: 'm\0x', generatedModule: 'g' }),
            key({ specModule: 'm', generatedModule: 'x\0g' }),
        );
    });
});

test('parseCacheEntry accepts snake_case JSON and rejects junk', () => {
    assert.deepEqual(
        parseCacheEntry({ source: 's', prompt_tokens: 1, completion_tokens: 2, model: 'm', provider: 'p', cached_at: 3 }),
        { source: 's', promptTokens: 1, completionTokens: 2, model: 'm', provider: 'p', cachedAt: 3 },
    );
    assert.equal(parseCacheEntry({ prompt_tokens: 1 }), null);
    assert.equal(parseCacheEntry('text'), null);
});

for (const [name, open] of [
    ['file', (dir: string): CacheStore => new FileCacheStore(path.join(dir, 'cache'))],
    ['sqlite', (dir: string): CacheStore => new SqliteCacheStore(path.join(dir, 'cache', 'cache.sqlite'))],
] as const) {
    describe(`ResponseCache over the ${name} store`, () => {
        let dir: string;
        let cache: ResponseCache;

        beforeEach(() => {
            dir = tmpDir('specforge-cache-');
            cache = new ResponseCache(open(dir));
        });

        afterEach(() => {
            cache.close();
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('stores and returns entries across instances', () => {
            const k = 'a'.repeat(64);
            assert.equal(cache.get(k), null);
            cache.put(k, ENTRY);
            cache.close();

            cache = new ResponseCache(open(dir));
            assert.deepEqual(cache.get(k), ENTRY);
            assert.equal(cache.hits, 1);
            assert.equal(cache.misses, 0);
        });

        test('malformed keys are misses and are never stored', () => {
            cache.put('../escape', ENTRY);
            assert.equal(cache.get('../escape'), null);
            assert.equal(cache.info().entries, 0);
        });

        test('info and clear', () => {
            cache.put('b'.repeat(64), ENTRY);
            cache.put('c'.repeat(64), ENTRY);
            const info = cache.info();
            assert.equal(info.backend, name);
            assert.equal(info.entries, 2);
            assert.ok(info.sizeBytes > 0);

            assert.equal(cache.clear(), 2);
            assert.equal(cache.get('b'.repeat(64)), null);
            assert.equal(cache.info().entries, 0);
        });
    });
}

test('a disabled cache misses and stores nothing', () => {
    const dir = tmpDir('specforge-cache-');
    const cache = new ResponseCache(new FileCacheStore(path.join(dir, 'cache')), { enabled: false });
    try {
        cache.put('d'.repeat(64), ENTRY);
        assert.equal(cache.get('d'.repeat(64)), null);
        assert.equal(cache.misses, 1);
        assert.equal(fs.existsSync(path.join(dir, 'cache')), false);
    } finally {
        cache.close();
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a corrupt file entry is a miss', () => {
    const dir = tmpDir('specforge-cache-');
    const store = new FileCacheStore(path.join(dir, 'cache'));
    const cache = new ResponseCache(store);
    try {
        const k = 'e'.repeat(64);
        store.write(k, '{not json');
        assert.equal(cache.get(k), null);
        assert.equal(cache.misses, 1);
    } finally {
        cache.close();
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

/** Every persistent operation throws. */
class BrokenStore implements CacheStore {
    readonly kind = 'file';
    readonly location = '/nowhere';
    reads = 0;
    writes = 0;

    read(): string | null {
        this.reads++;
        throw new Error('disk unavailable');
    }

    write(): void {
        this.writes++;
        throw new Error('disk full');
    }

    clear(): number {
        return 0;
    }

    stats(): { entries: number; sizeBytes: number } {
        return { entries: 0, sizeBytes: 0 };
    }

    close(): void {
        // nothing held open
    }
}

test('store failures degrade to the memo and to misses', () => {
    const store = new BrokenStore();
    const cache = new ResponseCache(store);
    const stored = 'a'.repeat(64);
    const other = 'b'.repeat(64);

    assert.doesNotThrow(() => cache.put(stored, ENTRY));
    assert.equal(store.writes, 1);
    assert.deepEqual(cache.get(stored), ENTRY);
    assert.equal(cache.hits, 1);

    assert.equal(cache.get(other), null);
    assert.equal(store.reads, 1);
    assert.equal(cache.misses, 1);
});
