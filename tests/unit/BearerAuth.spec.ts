/**
 * Unit Tests: Bearer authentication
 *
 * @see libs/auth/bearerAuth.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SignJWT } from 'jose';
import { AuthenticationError, BearerAuthSettings, verifyBearerToken } from '../../libs/auth/bearerAuth.js';
import { TEST_SECRET } from '../helpers/fixtures.js';

const settings: BearerAuthSettings = {
    secret: TEST_SECRET,
    algorithm: 'HS256',
    audience: 'analyst-agent-api',
    issuer: 'analyst-agent'
};
const key = new TextEncoder().encode(TEST_SECRET);

function token(overrides: { sub?: string; audience?: string; expiresAt?: number; secret?: string; scope?: string } = {}) {
    const now = Math.floor(Date.now() / 1000);
    let jwt = new SignJWT(overrides.scope ? { scope: overrides.scope } : {})
        .setProtectedHeader({ alg: 'HS256' })
        .setIssuer(settings.issuer)
        .setAudience(overrides.audience ?? settings.audience)
        .setIssuedAt(now)
        .setExpirationTime(overrides.expiresAt ?? now + 300);
    if (overrides.sub !== undefined) jwt = jwt.setSubject(overrides.sub);
    return jwt.sign(new TextEncoder().encode(overrides.secret ?? TEST_SECRET));
}

describe('verifyBearerToken', () => {
    it('returns the principal for a valid token', async () => {
        const expiresAt = Math.floor(Date.now() / 1000) + 300;
        const principal = await verifyBearerToken(await token({ sub: 'analyst-1', scope: 'analyses:write', expiresAt }), settings, key);
        assert.deepStrictEqual(principal, { subject: 'analyst-1', scope: 'analyses:write', expiresAt });
    });

    it('rejects a token signed with another secret', async () => {
        await assert.rejects(verifyBearerToken(await token({ sub: 'analyst-1', secret: 'another-test-secret-value' }), settings, key));
    });

    it('rejects a token for another audience', async () => {
        await assert.rejects(verifyBearerToken(await token({ sub: 'analyst-1', audience: 'other-api' }), settings, key));
    });

    it('rejects an expired token beyond the clock tolerance', async () => {
        const expired = Math.floor(Date.now() / 1000) - 120;
        await assert.rejects(verifyBearerToken(await token({ sub: 'analyst-1', expiresAt: expired }), settings, key));
    });

    it('rejects a token without a subject', async () => {
        await assert.rejects(verifyBearerToken(await token(), settings, key));
    });
});

describe('AuthenticationError', () => {
    it('carries a 401 status and a reason-specific message', () => {
        const missing = new AuthenticationError('missing_token');
        assert.strictEqual(missing.statusCode, 401);
        assert.strictEqual(missing.message, 'A bearer token is required.');
        assert.strictEqual(new AuthenticationError('invalid_token').message, 'The bearer token is invalid or expired.');
    });
});
