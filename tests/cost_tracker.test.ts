import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { estimateModelCost, getModelPricing } from '../src/config';
import { CostTracker } from '../src/cost_tracker';
import { BudgetExceededError } from '../src/errors';

const usage = (promptTokens: number, completionTokens: number, model = 'openai/gpt-4.1') => ({
    promptTokens,
    completionTokens,
    model,
    provider: 'openrouter',
});

describe('model pricing', () => {
    test('longest prefix wins, with or without the provider part', () => {
        assert.deepEqual(getModelPricing('openai/gpt-4.1-mini'), { prompt: 0.4, completion: 1.6 });
        assert.deepEqual(getModelPricing('gpt-4.1'), { prompt: 2.0, completion: 8.0 });
        assert.equal(getModelPricing('acme/unknown-1'), null);
    });

    test('unknown models cost nothing', () => {
        assert.equal(estimateModelCost('acme/unknown-1', 1_000_000, 1_000_000), 0);
        assert.equal(estimateModelCost('openai/gpt-4.1', 1_000_000, 500_000), 6);
    });
});

describe('CostTracker', () => {
    test('aggregates tokens, calls and cache hits', () => {
        const t = new CostTracker();
        t.record('a', usage(1000, 200));
        t.record('b', usage(3000, 800));
        t.recordCacheHit();

        assert.equal(t.totalPromptTokens, 4000);
        assert.equal(t.totalCompletionTokens, 1000);
        assert.equal(t.totalTokens, 5000);
        assert.equal(t.apiCalls, 2);
        assert.equal(t.cacheHits, 1);
        assert.ok(Math.abs(t.estimatedCost - 0.016) < 1e-12);
        assert.deepEqual(t.ledger().map((r) => r.module), ['a', 'b']);
    });

    test('no ceiling never throws', () => {
        const t = new CostTracker();
        t.record('a', usage(10_000_000, 0));
        assert.doesNotThrow(() => t.checkBudget());
    });

    test('spend equal to the ceiling passes, above it throws', () => {
        const t = new CostTracker(2);
        t.record('a', usage(1_000_000, 0));
        assert.doesNotThrow(() => t.checkBudget());
        t.record('b', usage(1, 0));
        assert.throws(
            () => t.checkBudget(),
            (e: unknown) => e instanceof BudgetExceededError && e.budgetUsd === 2 && e.spentUsd > 2,
        );
    });

    test('formats a summary', () => {
        const t = new CostTracker(5);
        t.record('a', usage(1_000_000, 250_000));
        t.recordCacheHit();
        assert.equal(
            t.formatSummary(),
            [
                'Cost: 1 API call(s), 1 cache hit(s)',
                '  Tokens: 1,000,000 prompt + 250,000 completion = 1,250,000 total',
                '  Estimated cost: $4.0000',
                '  Budget limit: $5.0000',
            ].join('\n'),
        );
        assert.deepEqual(t.summary(), {
            api_calls: 1,
            cache_hits: 1,
            prompt_tokens: 1_000_000,
            completion_tokens: 250_000,
            total_tokens: 1_250_000,
            estimated_cost_usd: 4,
            budget_usd: 5,
        });
    });
});
