import { GuardRule } from '../config-guard.js';

const PLACEHOLDER_SECRET = /change_in_production/i;

/**
 * Bearer-token verification guards.
 */
export const AUTH_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'SECRET_KEY' },
    {
        type: 'forbidIf',
        name: 'PLACEHOLDER_SECRET_KEY',
        when: (env) => env.NODE_ENV === 'production' && PLACEHOLDER_SECRET.test(env.SECRET_KEY ?? ''),
        message: 'Production cannot run with the placeholder SECRET_KEY',
    },
    {
        type: 'forbidIf',
        name: 'JWT_ALGORITHM',
        when: (env) => env.JWT_ALGORITHM !== undefined && env.JWT_ALGORITHM !== 'HS256',
        message: 'Only HS256 bearer tokens are accepted',
    }
];
