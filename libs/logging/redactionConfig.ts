/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output. Covers bearer credentials, backend
 * passwords and provider API keys at the root and one level down.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'bearer', '*.bearer',
    'jwt', '*.jwt',
    'rawToken', '*.rawToken',
    'secret', '*.secret',
    'secretKey', '*.secretKey',

    // Backend credentials (Root and Nested)
    'password', '*.password',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'connectionString', '*.connectionString',
    'otlpAuthToken', '*.otlpAuthToken',

    // Request headers as serialized by express
    'headers.authorization', 'req.headers.authorization'
];

export const REDACT_CENSOR = '[REDACTED]';
