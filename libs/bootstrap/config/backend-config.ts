import { GuardRule } from '../config-guard.js';

/**
 * Graph, cache and sandbox endpoint guards.
 * The sandbox key is optional: without it the service runs degraded and
 * sandbox tasks fail with BackendUnavailable.
 */
export const BACKEND_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'NEO4J_URI' },
    { type: 'required', name: 'NEO4J_USERNAME' },
    { type: 'required', name: 'NEO4J_PASSWORD' },
    {
        type: 'assert',
        check: (env) => /^(bolt|neo4j)(\+s|\+ssc)?:\/\//.test(env.NEO4J_URI ?? ''),
        message: 'NEO4J_URI must use a bolt:// or neo4j:// scheme',
    },
    {
        type: 'forbidIf',
        name: 'SHARED_CACHE_DATABASE',
        when: (env) =>
            (env.REDIS_URL ?? 'redis://localhost:6379') === (env.REDIS_CACHE_URL ?? 'redis://localhost:6380') &&
            (env.REDIS_DB ?? '0') === (env.REDIS_CACHE_DB ?? '1'),
        message: 'General and dedicated caches must not share the same Redis database',
    },
    {
        type: 'forbidIf',
        name: 'E2B_API_KEY',
        when: (env) => env.NODE_ENV === 'production' && !env.E2B_API_KEY,
        message: 'Production requires E2B_API_KEY for sandboxed execution',
    }
];
