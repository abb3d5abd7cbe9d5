import { GuardRule } from '../config-guard.js';

/**
 * Relational store guards. The audit trail is append-only and its schema is
 * managed elsewhere; only the connection string is required here.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DATABASE_URL' },
    {
        type: 'assert',
        check: (env) => /^postgres(ql)?:\/\//.test(env.DATABASE_URL ?? ''),
        message: 'DATABASE_URL must be a postgres:// or postgresql:// URL',
    },
    {
        type: 'assert',
        check: (env) => env.DB_POOL_MAX === undefined || /^\d+$/.test(env.DB_POOL_MAX),
        message: 'DB_POOL_MAX must be a positive integer',
    }
];
