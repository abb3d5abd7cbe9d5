/**
 * Unit Tests: Settings
 *
 * @see libs/bootstrap/settings.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadSettings, SettingsValidationError } from '../../libs/bootstrap/settings.js';
import { ConfigGuardViolation } from '../../libs/bootstrap/config-guard.js';
import { TEST_SECRET } from '../helpers/fixtures.js';

const baseEnv = {
    SECRET_KEY: TEST_SECRET,
    NEO4J_URI: 'bolt://localhost:7687',
    NEO4J_USERNAME: 'neo4j',
    NEO4J_PASSWORD: 'test-password',
    DATABASE_URL: 'postgres://localhost:5432/analyst_test'
};

function issuesOf(env: Record<string, string | undefined>) {
    try {
        loadSettings(env);
    } catch (error) {
        if (error instanceof SettingsValidationError) return error.issues;
        throw error;
    }
    return assert.fail('expected a SettingsValidationError');
}

describe('loadSettings', () => {
    it('applies defaults for every optional variable', () => {
        const settings = loadSettings(baseEnv);

        assert.strictEqual(settings.env, 'development');
        assert.strictEqual(settings.port, 8000);
        assert.deepStrictEqual(settings.auth, {
            secret: TEST_SECRET,
            algorithm: 'HS256',
            audience: 'analyst-agent-api',
            issuer: 'analyst-agent'
        });
        assert.deepStrictEqual(settings.corsOrigins, ['http://localhost:3000']);
        assert.deepStrictEqual(settings.cache.general, { url: 'redis://localhost:6379', database: 0 });
        assert.deepStrictEqual(settings.cache.dedicated, { url: 'redis://localhost:6380', database: 1 });
        assert.deepStrictEqual(settings.sandbox, { templateId: 'python-data-science' });
        assert.deepStrictEqual(settings.backpressure, {
            capacity: 8,
            queueBound: 32,
            queueWaitMs: 30_000,
            errorWindow: 20,
            errorMinSamples: 10,
            errorThreshold: 0.5,
            cooldownMs: 30_000
        });
        assert.deepStrictEqual(settings.dispatch, {
            defaultTimeoutMs: 60_000,
            maxTimeoutMs: 300_000,
            graphMaxRetries: 3,
            retryBaseMs: 200,
            retryMaxMs: 10_000
        });
        assert.strictEqual(settings.tracing.enabled, false);
    });

    it('coerces numbers and splits origin lists', () => {
        const settings = loadSettings({
            ...baseEnv,
            PORT: '9100',
            ORCH_CAPACITY: '3',
            CORS_ORIGINS: 'http://a.test, http://b.test,',
            E2B_API_KEY: 'test-sandbox-key',
            TRACE_SPANS: 'true',
            OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector.test:4318'
        });

        assert.strictEqual(settings.port, 9100);
        assert.strictEqual(settings.backpressure.capacity, 3);
        assert.deepStrictEqual(settings.corsOrigins, ['http://a.test', 'http://b.test']);
        assert.strictEqual(settings.sandbox.apiKey, 'test-sandbox-key');
        assert.deepStrictEqual(settings.tracing, {
            enabled: true,
            serviceName: 'analyst-orchestrator',
            environment: 'development',
            otlpEndpoint: 'http://collector.test:4318',
            console: false
        });
    });

    it('reports guard violations before parsing', () => {
        const { NEO4J_URI: _uri, ...env } = baseEnv;
        assert.throws(() => loadSettings(env), (error: unknown) => {
            assert.ok(error instanceof ConfigGuardViolation);
            assert.deepStrictEqual(error.violations, [
                'FATAL CONFIG: Required env var NEO4J_URI is missing',
                'FATAL CONFIG: NEO4J_URI must use a bolt:// or neo4j:// scheme'
            ]);
            return true;
        });
    });

    it('requires a sandbox key in production', () => {
        assert.throws(() => loadSettings({ ...baseEnv, NODE_ENV: 'production' }), (error: unknown) => {
            assert.ok(error instanceof ConfigGuardViolation);
            assert.deepStrictEqual(error.violations, [
                'FATAL CONFIG: Production requires E2B_API_KEY for sandboxed execution (Rule: E2B_API_KEY)'
            ]);
            return true;
        });
    });

    it('forbids both caches on the same Redis database', () => {
        assert.throws(
            () => loadSettings({ ...baseEnv, REDIS_CACHE_URL: 'redis://localhost:6379', REDIS_CACHE_DB: '0' }),
            ConfigGuardViolation
        );
    });

    it('rejects more minimum samples than the window holds', () => {
        assert.deepStrictEqual(issuesOf({ ...baseEnv, ORCH_ERROR_MIN_SAMPLES: '30' }), [
            { path: 'ORCH_ERROR_MIN_SAMPLES', message: 'must not exceed ORCH_ERROR_WINDOW' }
        ]);
    });

    it('rejects a retry cap below the last backoff delay', () => {
        assert.deepStrictEqual(issuesOf({ ...baseEnv, ORCH_RETRY_MAX_MS: '500' }), [
            { path: 'ORCH_RETRY_MAX_MS', message: 'must be at least 800 for 3 retries' }
        ]);
    });

    it('rejects a secret shorter than sixteen characters', () => {
        const issues = issuesOf({ ...baseEnv, SECRET_KEY: 'short' });
        assert.deepStrictEqual(issues.map(i => i.path), ['SECRET_KEY']);
    });
});
