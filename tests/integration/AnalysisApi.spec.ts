/**
 * Integration Tests: Analysis HTTP API
 *
 * Full express stack over a real orchestrator with scripted backends,
 * listening on an ephemeral port.
 *
 * @see libs/http/app.ts
 * @see libs/http/routes/analyses.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import { SignJWT } from 'jose';
import type { BearerAuthSettings } from '../../libs/auth/bearerAuth.js';
import { BackpressureController } from '../../libs/backpressure/controller.js';
import { ArtifactCache } from '../../libs/cache/artifactCache.js';
import { ExecutionDispatcher } from '../../libs/execution/dispatcher.js';
import { HealthVerifier } from '../../libs/health/healthVerifier.js';
import { createApp } from '../../libs/http/app.js';
import { Orchestrator } from '../../libs/orchestrator/orchestrator.js';
import { RequestRegistry } from '../../libs/orchestrator/requestRegistry.js';
import { ScriptedBackend, succeed, untilAborted } from '../helpers/backends.js';
import { backpressureSettings, deferred, dispatchSettings, memoryNamespaces, RecordingAuditSink, TEST_SECRET } from '../helpers/fixtures.js';

const auth: BearerAuthSettings = {
    secret: TEST_SECRET,
    algorithm: 'HS256',
    audience: 'analyst-agent-api',
    issuer: 'analyst-agent'
};

/** Reads a nested field of a decoded JSON body */
function at(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Object.getOwnPropertyDescriptor(current, key)?.value;
    }
    return current;
}

describe('Analysis API', () => {
    const graphStarted = deferred<void>();
    const sandbox = new ScriptedBackend('sandbox', [succeed({ text: '1' })]);
    const graph = new ScriptedBackend('graph', [signal => {
        graphStarted.resolve();
        return untilAborted(signal);
    }]);

    let server: Server;
    let baseUrl = '';
    let token = '';

    before(async () => {
        const audit = new RecordingAuditSink();
        const controller = new BackpressureController(backpressureSettings());
        const orchestrator = new Orchestrator({
            controller,
            cache: new ArtifactCache(memoryNamespaces().namespaces),
            dispatcher: new ExecutionDispatcher({
                backends: [sandbox, graph],
                retryPolicy: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 10 },
                lineage: audit
            }),
            audit,
            registry: new RequestRegistry({ maxEntries: 100, ttlMs: 60_000 }),
            dispatch: dispatchSettings()
        });
        const health = new HealthVerifier([{ name: 'graph', required: true, probe: async () => true }], () => false);

        const app = createApp({ orchestrator, health, auth, corsOrigins: ['http://localhost:3000'] });
        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, () => resolve(listening));
        });
        const address = server.address();
        assert.ok(address !== null && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}/api/v1`;

        token = await new SignJWT({ scope: 'analyses:write' })
            .setProtectedHeader({ alg: 'HS256' })
            .setIssuer(auth.issuer)
            .setAudience(auth.audience)
            .setSubject('analyst-1')
            .setIssuedAt()
            .setExpirationTime('5m')
            .sign(new TextEncoder().encode(TEST_SECRET));
    });

    after(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    });

    function call(method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
        return fetch(`${baseUrl}${path}`, {
            method,
            headers: {
                authorization: `Bearer ${token}`,
                'content-type': 'application/json',
                ...headers
            },
            ...(body === undefined ? {} : { body: typeof body === 'string' ? body : JSON.stringify(body) })
        });
    }

    it('answers liveness and readiness without a token', async () => {
        const live = await fetch(`${baseUrl}/health/live`);
        assert.strictEqual(live.status, 200);
        assert.strictEqual(at(await live.json(), 'status'), 'alive');

        const ready = await fetch(`${baseUrl}/health/ready`);
        assert.strictEqual(ready.status, 200);
        const report = await ready.json();
        assert.strictEqual(at(report, 'status'), 'ready');
        assert.strictEqual(at(report, 'dependencies', '0', 'name'), 'graph');
    });

    it('requires a bearer token on analyses', async () => {
        const response = await fetch(`${baseUrl}/analyses`, { method: 'POST' });

        assert.strictEqual(response.status, 401);
        assert.strictEqual(response.headers.get('www-authenticate'), 'Bearer error="invalid_request"');
        assert.strictEqual(at(await response.json(), 'failure', 'kind'), 'Unauthenticated');
    });

    it('rejects a malformed bearer token', async () => {
        const response = await call('GET', '/load', undefined, { authorization: 'Bearer not-a-token' });

        assert.strictEqual(response.status, 401);
        assert.strictEqual(response.headers.get('www-authenticate'), 'Bearer error="invalid_token"');
    });

    it('completes a sandbox analysis and echoes the request id header', async () => {
        const response = await call('POST', '/analyses', { requestId: 'req-1', task: { type: 'sandbox', code: 'print(1)' } }, { 'x-request-id': 'trace-1' });

        assert.strictEqual(response.status, 200);
        assert.strictEqual(response.headers.get('x-request-id'), 'trace-1');
        const body = await response.json();
        assert.strictEqual(at(body, 'status'), 'completed');
        assert.strictEqual(at(body, 'requestId'), 'req-1');
        assert.strictEqual(at(body, 'source'), 'computed');
        assert.strictEqual(at(body, 'pollUrl'), undefined);
        assert.strictEqual(at(body, 'artifact', 'contentType'), 'application/json');
        assert.deepStrictEqual(at(body, 'artifact', 'result'), { text: '1' });
    });

    it('serves the same task from the cache', async () => {
        const response = await call('POST', '/analyses', { requestId: 'req-2', task: { type: 'sandbox', code: 'print(1)' } });

        assert.strictEqual(response.status, 200);
        assert.strictEqual(at(await response.json(), 'status'), 'cache_hit');
        assert.strictEqual(sandbox.calls, 1);
    });

    it('polls a tracked request and 404s an unknown one', async () => {
        const found = await call('GET', '/analyses/req-1');
        assert.strictEqual(found.status, 200);
        assert.strictEqual(at(await found.json(), 'status'), 'completed');

        const missing = await call('GET', '/analyses/req-unknown');
        assert.strictEqual(missing.status, 404);
        assert.deepStrictEqual(await missing.json(), {
            status: 'not_found',
            requestId: 'req-unknown',
            failure: { kind: 'NotFound', message: 'No request with this id is tracked.' }
        });
    });

    it('refuses to cancel a finished request', async () => {
        const response = await call('DELETE', '/analyses/req-1');

        assert.strictEqual(response.status, 409);
        assert.strictEqual(at(await response.json(), 'failure', 'kind'), 'AlreadyTerminal');
        assert.strictEqual((await call('DELETE', '/analyses/req-unknown')).status, 404);
    });

    it('cancels a running graph query', async () => {
        const pending = call('POST', '/analyses', { requestId: 'req-graph', task: { type: 'graph', query: 'MATCH (n) RETURN count(n)' } });
        await graphStarted.promise;

        const cancel = await call('DELETE', '/analyses/req-graph');
        assert.strictEqual(cancel.status, 202);
        assert.strictEqual(at(await cancel.json(), 'cancelRequested'), true);

        const response = await pending;
        assert.strictEqual(response.status, 409);
        const body = await response.json();
        assert.strictEqual(at(body, 'status'), 'failed');
        assert.strictEqual(at(body, 'failure', 'kind'), 'Cancelled');
    });

    it('rejects an invalid request with its issues', async () => {
        const response = await call('POST', '/analyses', { task: { type: 'sandbox', code: '' } });

        assert.strictEqual(response.status, 400);
        const body = await response.json();
        assert.strictEqual(at(body, 'status'), 'rejected');
        assert.strictEqual(at(body, 'failure', 'kind'), 'InvalidRequest');
        assert.deepStrictEqual(at(body, 'failure', 'details'), [{ path: 'task.code', message: 'String must contain at least 1 character(s)' }]);
    });

    it('rejects a body that is not JSON', async () => {
        const response = await call('POST', '/analyses', '{"task":');

        assert.strictEqual(response.status, 400);
        const body = await response.json();
        assert.deepStrictEqual(at(body, 'failure'), { kind: 'InvalidRequest', message: 'The analysis request is invalid.' });
    });

    it('reports the load view', async () => {
        const response = await call('GET', '/load');

        assert.strictEqual(response.status, 200);
        const view = await response.json();
        assert.strictEqual(at(view, 'capacity'), 2);
        assert.strictEqual(at(view, 'inFlight'), 0);
    });

    it('answers unknown routes with 404', async () => {
        const response = await call('GET', '/nope');

        assert.strictEqual(response.status, 404);
        assert.deepStrictEqual(await response.json(), {
            status: 'not_found',
            failure: { kind: 'NotFound', message: 'No route for GET /api/v1/nope' }
        });
    });
});
