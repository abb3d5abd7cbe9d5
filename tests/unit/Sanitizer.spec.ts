/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, OrchestrationError } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should create OrchestrationError with incidentId and public message', () => {
        const error = new OrchestrationError('Timeout', { secret: 'hidden' });

        assert.match(error.incidentId, /^[0-9a-f-]{36}$/);
        assert.strictEqual(error.publicMessage, 'The execution backend did not respond before the deadline.');
        assert.strictEqual(error.httpStatus, 504);
        assert.deepStrictEqual(error.toPublic(), {
            kind: 'Timeout',
            message: 'The execution backend did not respond before the deadline.',
            incidentId: error.incidentId
        });
    });

    it('should accept a custom public message', () => {
        const error = new OrchestrationError('ExecutionError', undefined, { publicMessage: 'Query failed.' });
        assert.strictEqual(error.message, 'Query failed.');
    });

    it('should sanitize raw errors without exposing their text', () => {
        const rawError = new Error('Database connection failed: password=placeholder-password');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'db-op', 'BackendUnavailable');

        assert.ok(sanitized instanceof OrchestrationError);
        assert.strictEqual(sanitized.kind, 'BackendUnavailable');
        assert.strictEqual(sanitized.publicMessage, 'An execution backend is temporarily unavailable.');
        assert.strictEqual(sanitized.cause, rawError);
        assert.strictEqual(sanitized.contextLabel, 'db-op');
    });

    it('should default to ExecutionError', () => {
        assert.strictEqual(ErrorSanitizer.sanitize('boom', 'ctx').kind, 'ExecutionError');
    });

    it('should pass through existing OrchestrationError unchanged', () => {
        const original = new OrchestrationError('QueueTimeout', { data: 'test' });
        const result = ErrorSanitizer.sanitize(original, 'test-context', 'ExecutionError');

        assert.strictEqual(result, original);
        assert.strictEqual(result.kind, 'QueueTimeout');
    });

    it('should describe errors, strings and error-like objects', () => {
        const coded = Object.assign(new Error('reset'), { code: 'ECONNRESET' });
        assert.strictEqual(ErrorSanitizer.describe(coded).code, 'ECONNRESET');
        assert.deepStrictEqual(ErrorSanitizer.describe('plain'), { message: 'plain' });
        assert.deepStrictEqual(ErrorSanitizer.describe({ message: 'obj', code: 503 }), {
            message: 'obj',
            stack: undefined,
            code: undefined
        });
        assert.deepStrictEqual(ErrorSanitizer.describe(42), { message: '42' });
    });
});
