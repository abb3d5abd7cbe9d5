import { z } from 'zod';
import { ConfigGuard, Env } from './config-guard.js';
import { AUTH_CONFIG_GUARDS } from './config/auth-config.js';
import { BACKEND_CONFIG_GUARDS } from './config/backend-config.js';
import { DB_CONFIG_GUARDS } from './config/db-config.js';
import type { TracingSettings } from '../observability/tracing.js';

const flag = z.enum(['true', 'false']).default('false').transform(v => v === 'true');
const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),

    SECRET_KEY: z.string().min(16),
    JWT_ALGORITHM: z.literal('HS256').default('HS256'),
    JWT_AUDIENCE: z.string().min(1).default('analyst-agent-api'),
    JWT_ISSUER: z.string().min(1).default('analyst-agent'),
    CORS_ORIGINS: z.string().default('http://localhost:3000'),

    NEO4J_URI: z.string().min(1),
    NEO4J_USERNAME: z.string().min(1),
    NEO4J_PASSWORD: z.string().min(1),
    NEO4J_DATABASE: z.string().min(1).default('neo4j'),

    DATABASE_URL: z.string().min(1),
    DB_POOL_MAX: int(10, 1),

    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
    REDIS_DB: int(0),
    REDIS_CACHE_URL: z.string().min(1).default('redis://localhost:6380'),
    REDIS_CACHE_DB: int(1),

    E2B_API_KEY: z.string().min(1).optional(),
    E2B_TEMPLATE_ID: z.string().min(1).default('python-data-science'),

    ORCH_CAPACITY: int(8, 1),
    ORCH_QUEUE_BOUND: int(32),
    ORCH_QUEUE_WAIT_MS: int(30_000, 1),
    ORCH_ERROR_WINDOW: int(20, 1),
    ORCH_ERROR_MIN_SAMPLES: int(10, 1),
    ORCH_ERROR_THRESHOLD: z.coerce.number().gt(0).lt(1).default(0.5),
    ORCH_COOLDOWN_MS: int(30_000),
    ORCH_DEFAULT_TIMEOUT_MS: int(60_000, 1),
    ORCH_MAX_TIMEOUT_MS: int(300_000, 1),
    ORCH_GRAPH_MAX_RETRIES: int(3),
    ORCH_RETRY_BASE_MS: int(200, 1),
    ORCH_RETRY_MAX_MS: int(10_000, 1),

    CACHE_MAX_ENTRIES: int(1000, 1),
    CACHE_MAX_BYTES: int(64 * 1024 * 1024, 1),
    CACHE_TTL_SECONDS: int(86_400, 1),
    REGISTRY_MAX_ENTRIES: int(10_000, 1),
    REGISTRY_TTL_MS: int(3_600_000, 1),

    TRACE_SPANS: flag,
    OTEL_SERVICE_NAME: z.string().min(1).default('analyst-orchestrator'),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
    OTLP_AUTH_TOKEN: z.string().min(1).optional(),
    OTEL_TRACE_CONSOLE: flag,
}).superRefine((env, ctx) => {
    if (env.ORCH_ERROR_MIN_SAMPLES > env.ORCH_ERROR_WINDOW) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ORCH_ERROR_MIN_SAMPLES'],
            message: 'must not exceed ORCH_ERROR_WINDOW',
        });
    }
    if (env.ORCH_DEFAULT_TIMEOUT_MS > env.ORCH_MAX_TIMEOUT_MS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ORCH_DEFAULT_TIMEOUT_MS'],
            message: 'must not exceed ORCH_MAX_TIMEOUT_MS',
        });
    }
    // The cap must never flatten the backoff curve, or delays stop increasing.
    const lastDelay = env.ORCH_RETRY_BASE_MS * 2 ** Math.max(0, env.ORCH_GRAPH_MAX_RETRIES - 1);
    if (env.ORCH_RETRY_MAX_MS < lastDelay) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ORCH_RETRY_MAX_MS'],
            message: `must be at least ${lastDelay} for ${env.ORCH_GRAPH_MAX_RETRIES} retries`,
        });
    }
});

export interface BackpressureSettings {
    readonly capacity: number;
    readonly queueBound: number;
    readonly queueWaitMs: number;
    readonly errorWindow: number;
    readonly errorMinSamples: number;
    readonly errorThreshold: number;
    readonly cooldownMs: number;
}

export interface DispatchSettings {
    readonly defaultTimeoutMs: number;
    readonly maxTimeoutMs: number;
    readonly graphMaxRetries: number;
    readonly retryBaseMs: number;
    readonly retryMaxMs: number;
}

export interface RedisEndpoint {
    readonly url: string;
    readonly database: number;
}

export interface CacheSettings {
    readonly general: RedisEndpoint;
    readonly dedicated: RedisEndpoint;
    readonly maxEntries: number;
    readonly maxBytes: number;
    readonly ttlSeconds: number;
}

export interface Settings {
    readonly env: 'development' | 'test' | 'staging' | 'production';
    readonly port: number;
    readonly auth: {
        readonly secret: string;
        readonly algorithm: 'HS256';
        readonly audience: string;
        readonly issuer: string;
    };
    readonly corsOrigins: readonly string[];
    readonly graph: {
        readonly uri: string;
        readonly username: string;
        readonly password: string;
        readonly database: string;
    };
    readonly database: {
        readonly url: string;
        readonly poolMax: number;
    };
    readonly cache: CacheSettings;
    readonly sandbox: {
        readonly apiKey?: string;
        readonly templateId: string;
    };
    readonly backpressure: BackpressureSettings;
    readonly dispatch: DispatchSettings;
    readonly registry: {
        readonly maxEntries: number;
        readonly ttlMs: number;
    };
    readonly tracing: TracingSettings;
}

export class SettingsValidationError extends Error {
    constructor(public readonly issues: readonly { path: string; message: string }[]) {
        super(`Invalid settings: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
        this.name = 'SettingsValidationError';
    }
}

/**
 * Guard, parse and shape the environment into typed settings.
 * Guards run first so missing variables are reported in operator terms.
 */
export function loadSettings(env: Env = process.env): Settings {
    ConfigGuard.enforce([...AUTH_CONFIG_GUARDS, ...DB_CONFIG_GUARDS, ...BACKEND_CONFIG_GUARDS], env);

    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new SettingsValidationError(parsed.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        })));
    }
    const e = parsed.data;

    return Object.freeze({
        env: e.NODE_ENV,
        port: e.PORT,
        auth: {
            secret: e.SECRET_KEY,
            algorithm: e.JWT_ALGORITHM,
            audience: e.JWT_AUDIENCE,
            issuer: e.JWT_ISSUER,
        },
        corsOrigins: e.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
        graph: {
            uri: e.NEO4J_URI,
            username: e.NEO4J_USERNAME,
            password: e.NEO4J_PASSWORD,
            database: e.NEO4J_DATABASE,
        },
        database: {
            url: e.DATABASE_URL,
            poolMax: e.DB_POOL_MAX,
        },
        cache: {
            general: { url: e.REDIS_URL, database: e.REDIS_DB },
            dedicated: { url: e.REDIS_CACHE_URL, database: e.REDIS_CACHE_DB },
            maxEntries: e.CACHE_MAX_ENTRIES,
            maxBytes: e.CACHE_MAX_BYTES,
            ttlSeconds: e.CACHE_TTL_SECONDS,
        },
        sandbox: {
            ...(e.E2B_API_KEY ? { apiKey: e.E2B_API_KEY } : {}),
            templateId: e.E2B_TEMPLATE_ID,
        },
        backpressure: {
            capacity: e.ORCH_CAPACITY,
            queueBound: e.ORCH_QUEUE_BOUND,
            queueWaitMs: e.ORCH_QUEUE_WAIT_MS,
            errorWindow: e.ORCH_ERROR_WINDOW,
            errorMinSamples: e.ORCH_ERROR_MIN_SAMPLES,
            errorThreshold: e.ORCH_ERROR_THRESHOLD,
            cooldownMs: e.ORCH_COOLDOWN_MS,
        },
        dispatch: {
            defaultTimeoutMs: e.ORCH_DEFAULT_TIMEOUT_MS,
            maxTimeoutMs: e.ORCH_MAX_TIMEOUT_MS,
            graphMaxRetries: e.ORCH_GRAPH_MAX_RETRIES,
            retryBaseMs: e.ORCH_RETRY_BASE_MS,
            retryMaxMs: e.ORCH_RETRY_MAX_MS,
        },
        registry: {
            maxEntries: e.REGISTRY_MAX_ENTRIES,
            ttlMs: e.REGISTRY_TTL_MS,
        },
        tracing: {
            enabled: e.TRACE_SPANS,
            serviceName: e.OTEL_SERVICE_NAME,
            environment: e.NODE_ENV,
            ...(e.OTEL_EXPORTER_OTLP_ENDPOINT ? { otlpEndpoint: e.OTEL_EXPORTER_OTLP_ENDPOINT } : {}),
            ...(e.OTLP_AUTH_TOKEN ? { otlpAuthToken: e.OTLP_AUTH_TOKEN } : {}),
            console: e.OTEL_TRACE_CONSOLE,
        },
    });
}
