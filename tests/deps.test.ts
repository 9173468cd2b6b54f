import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { buildSpecGraph, collapseToModuleDag } from '../src/deps';
import { DiscoveryError } from '../src/errors';
import { indexSpecs } from '../src/spec_registry';
import { makeEntry } from './helpers';

const callSource = (name: string, callee: string): string =>
    `/** @forge */\nexport function ${name}(input: string): string {\n    return ${callee}(input);\n}`;

describe('buildSpecGraph', () => {
    test('keeps explicit deps and drops self references', () => {
        const specs = indexSpecs([
            makeEntry('a', 'one'),
            makeEntry('b', 'two', { deps: ['a:one', 'b:two'] }),
        ]);
        const graph = buildSpecGraph(specs, { inferDefault: false });
        assert.deepEqual([...(graph.get('b:two') ?? [])], ['a:one']);
        assert.deepEqual([...(graph.get('a:one') ?? [])], []);
    });

    test('unknown explicit deps are rejected', () => {
        const specs = indexSpecs([makeEntry('b', 'two', { deps: ['a:missing'] })]);
        assert.throws(
            () => buildSpecGraph(specs, { inferDefault: false }),
            (e: unknown) => e instanceof DiscoveryError && e.message === 'Unknown dependency a:missing declared by b:two.',
        );
    });

    test('infers edges from names used in the stub', () => {
        const specs = indexSpecs([
            makeEntry('util', 'slugify'),
            makeEntry('api', 'makeUrl', { source: callSource('makeUrl', 'slugify') }),
        ]);
        assert.deepEqual([...(buildSpecGraph(specs, { inferDefault: true }).get('api:makeUrl') ?? [])], ['util:slugify']);
        assert.equal(buildSpecGraph(specs, { inferDefault: false }).get('api:makeUrl')?.size, 0);
    });

    test('prefers a same-module match and skips ambiguous names', () => {
        const specs = indexSpecs([
            makeEntry('a', 'parse'),
            makeEntry('b', 'parse'),
            makeEntry('b', 'useLocal', { source: callSource('useLocal', 'parse') }),
            makeEntry('c', 'useAmbiguous', { source: callSource('useAmbiguous', 'parse') }),
        ]);
        const graph = buildSpecGraph(specs, { inferDefault: true });
        assert.deepEqual([...(graph.get('b:useLocal') ?? [])], ['b:parse']);
        assert.equal(graph.get('c:useAmbiguous')?.size, 0);
    });

    test('a stub can opt out of inference', () => {
        const entry = { ...makeEntry('api', 'makeUrl', { source: callSource('makeUrl', 'slugify') }), inferDeps: false };
        const specs = indexSpecs([makeEntry('util', 'slugify'), entry]);
        assert.equal(buildSpecGraph(specs, { inferDefault: true }).get('api:makeUrl')?.size, 0);
    });
});

test('collapseToModuleDag keeps every module and drops self edges', () => {
    const specs = indexSpecs([
        makeEntry('a', 'one'),
        makeEntry('a', 'two', { deps: ['a:one'] }),
        makeEntry('b', 'three', { deps: ['a:two'] }),
        makeEntry('c', 'four'),
    ]);
    const dag = collapseToModuleDag(buildSpecGraph(specs, { inferDefault: false }), specs);
    assert.deepEqual([...dag.keys()].sort(), ['a', 'b', 'c']);
    assert.deepEqual([...(dag.get('a') ?? [])], []);
    assert.deepEqual([...(dag.get('b') ?? [])], ['a']);
    assert.deepEqual([...(dag.get('c') ?? [])], []);
});
