import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { FetchLike, ModelRequest, ModelRouter, sanitizeErrorSnippet } from '../src/model_router';

const REQ: ModelRequest = {
    model_id: 'openai/gpt-4.1-mini',
    messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
    ],
};

const OK_BODY = JSON.stringify({
    id: 'gen-1',
    model: 'openai/gpt-4.1-mini',
    choices: [{ message: { content: 'export const a = 1;' }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 1000, completion_tokens: 500 },
});

/** Replies in order; the last one repeats. */
function scripted(replies: Array<[number, string]>): { fetch: FetchLike; calls: () => number } {
    let n = 0;
    return {
        fetch: async () => {
            const [status, body] = replies[Math.min(n, replies.length - 1)];
            n++;
            return new Response(body, { status });
        },
        calls: () => n,
    };
}

function router(fetchImpl: FetchLike, maxAttempts = 3, maxConcurrent?: number): ModelRouter {
    return new ModelRouter({ apiKey: 'test-secret', fetch: fetchImpl, retryBackoffMs: [0], maxAttempts, maxConcurrent });
}

describe('ModelRouter', () => {
    test('parses a completion and prices it', async () => {
        const f = scripted([[200, OK_BODY]]);
        const res = await router(f.fetch).executeModelCall(REQ, { target_id: 'm' });
        assert.ok(res.ok);
        assert.equal(res.completion, 'export const a = 1;');
        assert.equal(res.finish_reason, 'stop');
        assert.deepEqual(res.tokenUsage, { promptTokens: 1000, completionTokens: 500, totalTokens: 1500 });
        assert.equal(res.costUsd, 0.0012);
        assert.equal(res.provider.requestId, 'gen-1');
        assert.equal(res.meta.attemptNo, 1);
        assert.match(res.meta.idempotencyKey, /^[0-9a-f]{64}$/);
    });

    test('retries a rate limit', async () => {
        const f = scripted([
            [429, 'slow down'],
            [200, OK_BODY],
        ]);
        const res = await router(f.fetch).executeModelCall(REQ);
        assert.ok(res.ok);
        assert.equal(res.meta.attemptNo, 2);
        assert.equal(f.calls(), 2);
    });

    test('does not retry a client error', async () => {
        const f = scripted([[400, 'bad request']]);
        const res = await router(f.fetch).executeModelCall(REQ);
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'INFRA_ERROR');
        assert.equal(res.retryable, false);
        assert.equal(res.httpStatus, 400);
        assert.equal(res.attemptsUsed, 1);
        assert.equal(res.providerBodySnippet, 'bad request');
        assert.equal(f.calls(), 1);
    });

    test('gives up on server errors after maxAttempts', async () => {
        const f = scripted([[503, 'unavailable']]);
        const res = await router(f.fetch, 3).executeModelCall(REQ);
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'INFRA_ERROR');
        assert.equal(res.retryable, true);
        assert.equal(res.attemptsUsed, 3);
        assert.equal(f.calls(), 3);
    });

    test('rejects a non-JSON body', async () => {
        const res = await router(scripted([[200, 'oops']]).fetch).executeModelCall(REQ);
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'MODEL_ERROR');
        assert.equal(res.message, 'provider_response_not_json');
        assert.equal(res.providerBodySnippet, 'oops');
    });

    test('reports network failures', async () => {
        const failing: FetchLike = async () => {
            throw new TypeError('connect refused');
        };
        const res = await router(failing, 1).executeModelCall(REQ);
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'NETWORK_ERROR');
        assert.equal(res.message, 'network_error: connect refused');
    });

    test('validates messages before calling out', async () => {
        const f = scripted([[200, OK_BODY]]);
        const r = router(f.fetch);
        const empty = await r.executeModelCall({ ...REQ, messages: [] });
        assert.ok(!empty.ok);
        assert.equal(empty.errorCode, 'INVALID_CONFIG');
        assert.equal(empty.message, 'messages must be a non-empty array');

        const blank = await r.executeModelCall({ ...REQ, messages: [{ role: 'user', content: '  ' }] });
        assert.ok(!blank.ok);
        assert.equal(blank.message, 'user message content must be non-empty');
        assert.equal(f.calls(), 0);
    });

    test('cancellation during a request', async () => {
        const hanging: FetchLike = (_url, init) =>
            new Promise((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
            });
        const ac = new AbortController();
        const pending = router(hanging).executeModelCall(REQ, undefined, ac.signal);
        setTimeout(() => ac.abort(), 10);
        const res = await pending;
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'CANCELLED');
        assert.equal(res.message, 'cancelled during request');
    });

    test('cancellation before a request never calls out', async () => {
        const f = scripted([[200, OK_BODY]]);
        const ac = new AbortController();
        ac.abort();
        const res = await router(f.fetch).executeModelCall(REQ, undefined, ac.signal);
        assert.ok(!res.ok);
        assert.equal(res.message, 'cancelled before request');
        assert.equal(f.calls(), 0);
    });

    test('opens the circuit after repeated failures', async () => {
        const f = scripted([[400, 'bad request']]);
        const r = router(f.fetch, 1);
        for (let i = 0; i < 5; i++) await r.executeModelCall(REQ);
        const res = await r.executeModelCall(REQ);
        assert.ok(!res.ok);
        assert.equal(res.errorCode, 'CIRCUIT_OPEN');
        assert.equal(f.calls(), 5);
    });

    test('limits concurrent calls', async () => {
        let active = 0;
        let maxActive = 0;
        const slow: FetchLike = async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise((r) => setTimeout(r, 20));
            active--;
            return new Response(OK_BODY, { status: 200 });
        };
        const r = router(slow, 1, 1);
        const results = await Promise.all([r.executeModelCall(REQ), r.executeModelCall(REQ), r.executeModelCall(REQ)]);
        assert.ok(results.every((x) => x.ok));
        assert.equal(maxActive, 1);
    });
});

describe('sanitizeErrorSnippet', () => {
    test('redacts keys, tokens and addresses', () => {
        assert.equal(sanitizeErrorSnippet('key sk-test-secret-placeholder from 10.0.0.1'), 'key [REDACTED] from [REDACTED]');
        assert.equal(sanitizeErrorSnippet('sent Authorization: Bearer test-token'), 'sent [REDACTED]');
        assert.equal(sanitizeErrorSnippet(`id ${'ab'.repeat(20)}`), 'id [REDACTED]');
    });

    test('flattens control characters and truncates', () => {
        assert.equal(sanitizeErrorSnippet('a\nb\tc'), 'a b c');
        assert.equal(sanitizeErrorSnippet('x'.repeat(600)).length, 500);
    });
});
