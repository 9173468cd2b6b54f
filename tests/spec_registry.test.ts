import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { DiscoveryError } from '../src/errors';
import { normalizeModuleName, normalizeSpecRef, parseSpecRef } from '../src/spec_ref';
import { discoverSpecs, extractSpecs, groupByModule, indexSpecs } from '../src/spec_registry';
import { makeEntry, tmpDir } from './helpers';

const SLUG_SOURCE = `import { helper } from './helper';

/**
 * Turn a title into a URL slug.
 * @forge
 * @deps text/normalize:collapse
 * @prompt Lowercase ASCII only.
 */
export function slugify(title: string): string {
    throw new Error('stub');
}

/** Not a spec. */
export function helperTwo(): void {}

/**
 * @forge
 * @noInferDeps
 */
export class Router {}

/** @forge */
function hidden(): void {}
`;

describe('spec refs', () => {
    test('normalizes separators and extensions', () => {
        assert.equal(normalizeModuleName('./text\\normalize.ts'), 'text/normalize');
        assert.equal(normalizeSpecRef(' text\\normalize.ts:collapse '), 'text/normalize:collapse');
    });

    test('rejects malformed refs', () => {
        assert.throws(() => normalizeSpecRef('nocolon'), DiscoveryError);
        assert.throws(() => normalizeSpecRef('mod:'), DiscoveryError);
        assert.throws(() => normalizeSpecRef('mod:1bad'), DiscoveryError);
    });

    test('splits at the first colon', () => {
        assert.deepEqual(parseSpecRef('a/b:Name'), { module: 'a/b', qualname: 'Name' });
    });
});

describe('extractSpecs', () => {
    test('collects exported, tagged functions and classes', () => {
        const entries = extractSpecs('slug', 'src/slug.ts', SLUG_SOURCE);
        assert.deepEqual(
            entries.map((e) => [e.specRef, e.kind]),
            [
                ['slug:slugify', 'function'],
                ['slug:Router', 'class'],
            ],
        );

        const [slugify, router] = entries;
        assert.deepEqual(slugify.deps, ['text/normalize:collapse']);
        assert.equal(slugify.prompt, 'Lowercase ASCII only.');
        assert.equal(slugify.inferDeps, undefined);
        assert.ok(slugify.source.startsWith('/**\n * Turn a title into a URL slug.'));
        assert.ok(slugify.source.endsWith("throw new Error('stub');\n}"));
        assert.equal(router.inferDeps, false);
        assert.equal(router.prompt, undefined);
    });

    test('bare @deps names resolve in the same module', () => {
        const text = '/**\n * @forge\n * @deps parse\n */\nexport function run(): void {}\n';
        assert.deepEqual(extractSpecs('cli', 'cli.ts', text)[0].deps, ['cli:parse']);
    });

    test('files without the tag are ignored', () => {
        assert.deepEqual(extractSpecs('m', 'm.ts', 'export function f(): void {}\n'), []);
    });
});

describe('discoverSpecs', () => {
    test('walks source roots and skips generated, test and vendor files', () => {
        const root = tmpDir();
        try {
            const src = path.join(root, 'src');
            fs.mkdirSync(path.join(src, 'text'), { recursive: true });
            fs.mkdirSync(path.join(src, '__generated__'), { recursive: true });
            fs.mkdirSync(path.join(src, 'node_modules', 'dep'), { recursive: true });
            fs.writeFileSync(path.join(src, 'slug.ts'), SLUG_SOURCE);
            fs.writeFileSync(path.join(src, 'text', 'normalize.ts'), '/** @forge */\nexport function collapse(s: string): string {\n    return s;\n}\n');
            const tagged = '/** @forge */\nexport function nope(): void {}\n';
            fs.writeFileSync(path.join(src, '__generated__', 'slug.ts'), tagged);
            fs.writeFileSync(path.join(src, 'slug.test.ts'), tagged);
            fs.writeFileSync(path.join(src, 'types.d.ts'), tagged);
            fs.writeFileSync(path.join(src, 'node_modules', 'dep', 'index.ts'), tagged);

            const entries = discoverSpecs({ root, sourceRoots: ['src', 'missing'], generatedDir: '__generated__' });
            assert.deepEqual(
                entries.map((e) => e.specRef),
                ['slug:Router', 'slug:slugify', 'text/normalize:collapse'],
            );
            assert.equal(entries[2].sourceFile, path.join(src, 'text', 'normalize.ts'));
        } finally {
            fs.rmSync(root, { recursive: true, force: true });
        }
    });

    test('the same spec in two source roots is an error', () => {
        const root = tmpDir();
        try {
            for (const r of ['a', 'b']) {
                fs.mkdirSync(path.join(root, r), { recursive: true });
                fs.writeFileSync(path.join(root, r, 'm.ts'), '/** @forge */\nexport function f(): void {}\n');
            }
            assert.throws(
                () => discoverSpecs({ root, sourceRoots: ['a', 'b'], generatedDir: '__generated__' }),
                /Duplicate spec m:f/,
            );
        } finally {
            fs.rmSync(root, { recursive: true, force: true });
        }
    });
});

test('groupByModule sorts entries within a module by name', () => {
    const grouped = groupByModule([makeEntry('m', 'zeta'), makeEntry('n', 'one'), makeEntry('m', 'alpha')]);
    assert.deepEqual([...grouped.keys()], ['m', 'n']);
    assert.deepEqual(grouped.get('m')?.map((e) => e.qualname), ['alpha', 'zeta']);
    assert.equal(indexSpecs(grouped.get('m') ?? []).get('m:zeta')?.qualname, 'zeta');
});
