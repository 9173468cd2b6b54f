import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import {
    CONFIG_FILE_NAME,
    defaultProjectConfig,
    estimateModelCost,
    findProjectRoot,
    getModelPricing,
    initialConfigText,
    loadProjectConfig,
    parseProjectConfig,
} from '../src/config';
import { ConfigError } from '../src/errors';
import { SchemaValidator } from '../src/schema_validator';
import { tmpDir } from './helpers';

function rejects(text: string, expected: string): void {
    assert.throws(
        () => parseProjectConfig(text, 'specforge.json'),
        (e: unknown) => {
            assert.ok(e instanceof ConfigError);
            assert.equal(e.message, expected);
            return true;
        },
    );
}

describe('parseProjectConfig', () => {
    test('fills defaults around a minimal document', () => {
        const c = parseProjectConfig('{"version": 1}', 'specforge.json');
        const d = defaultProjectConfig();
        assert.deepEqual(c.paths, { sourceRoots: ['src'], generatedDir: '__generated__' });
        assert.deepEqual(c.build, { ...d.build, maxCostUsd: undefined });
        assert.deepEqual(c.cache, { enabled: true, backend: 'file', dir: '.specforge/cache' });
        assert.equal(c.llm.apiKeyEnv, 'OPENROUTER_API_KEY');
    });

    test('keeps explicit values', () => {
        const c = parseProjectConfig(
            JSON.stringify({
                version: 1,
                paths: { sourceRoots: ['lib', 'shared'], generatedDir: 'gen' },
                build: { jobs: 2, maxCostUsd: 1.5, typeCheck: true },
                cache: { backend: 'sqlite', enabled: false },
            }),
            'specforge.json',
        );
        assert.deepEqual(c.paths, { sourceRoots: ['lib', 'shared'], generatedDir: 'gen' });
        assert.equal(c.build.jobs, 2);
        assert.equal(c.build.maxCostUsd, 1.5);
        assert.equal(c.build.typeCheck, true);
        assert.equal(c.cache.backend, 'sqlite');
        assert.equal(c.cache.enabled, false);
    });

    test('reports schema violations with their paths', () => {
        rejects('{}', 'Invalid specforge.json:\n  .version: Required field missing');
        rejects('{"version": 2}', 'Invalid specforge.json:\n  .version: Value must be one of: 1');
        rejects('{"version": 1, "build": {"jobs": 0}}', 'Invalid specforge.json:\n  .build.jobs: Value 0 < minimum 1');
        rejects('{"version": 1, "extra": true}', 'Invalid specforge.json:\n  .extra: Unknown field');
        rejects('[]', 'Invalid specforge.json:\n  (root): Expected type object, got array');
        rejects(
            '{"version": 1, "paths": {"generatedDir": "../out"}}',
            'Invalid specforge.json:\n  .paths.generatedDir: Value does not match pattern: ^[A-Za-z0-9_.-]+$',
        );
    });

    test('rejects malformed JSON', () => {
        assert.throws(
            () => parseProjectConfig('{not json', 'specforge.json'),
            (e: unknown) => e instanceof ConfigError && e.message.startsWith('specforge.json is not valid JSON: '),
        );
    });
});

describe('loading from disk', () => {
    test('findProjectRoot walks up to the config file', () => {
        const root = tmpDir();
        try {
            fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), initialConfigText());
            const nested = path.join(root, 'src', 'deep');
            fs.mkdirSync(nested, { recursive: true });
            assert.equal(findProjectRoot(nested), path.resolve(root));
        } finally {
            fs.rmSync(root, { recursive: true, force: true });
        }
    });

    test('missing config is a ConfigError', () => {
        const root = tmpDir();
        try {
            assert.throws(() => loadProjectConfig({ root }), ConfigError);
        } finally {
            fs.rmSync(root, { recursive: true, force: true });
        }
    });

    test('the starter config loads back to the defaults', () => {
        const root = tmpDir();
        try {
            fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), initialConfigText());
            const loaded = loadProjectConfig({ root });
            assert.equal(loaded.configPath, path.join(path.resolve(root), CONFIG_FILE_NAME));
            assert.deepEqual(loaded.config.paths, defaultProjectConfig().paths);
            assert.equal(loaded.config.build.jobs, 8);
        } finally {
            fs.rmSync(root, { recursive: true, force: true });
        }
    });
});

describe('model pricing', () => {
    test('longest prefix wins, with or without a provider', () => {
        assert.deepEqual(getModelPricing('openai/gpt-4.1-mini'), { prompt: 0.4, completion: 1.6 });
        assert.deepEqual(getModelPricing('gpt-4.1-2025-04-14'), { prompt: 2.0, completion: 8.0 });
        assert.equal(getModelPricing('unknown/model'), null);
    });

    test('estimateModelCost is per million tokens', () => {
        assert.equal(estimateModelCost('gpt-4.1', 1_000_000, 0), 2);
        assert.equal(estimateModelCost('unknown/model', 1000, 1000), 0);
    });
});

test('SchemaValidator reports an unknown schema', () => {
    const v = new SchemaValidator();
    assert.deepEqual(v.validate({}, 'nope'), { valid: false, errors: [{ path: '', message: 'Schema not found: nope' }] });
});
