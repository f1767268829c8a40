import { describe, expect, it } from 'vitest';
import {
  authenticateRequest,
  getAuthConfig,
  issueAccessToken,
  verifyAccessToken,
  verifyCredentials
} from '../src/access';
import { AuthError } from '../src/errors';
import { buildEnv, createTestApp, jsonRequest, makeRequest, requestJson } from './helpers';

const NOW = Date.UTC(2025, 0, 1, 12);

describe('access tokens', () => {
  const config = getAuthConfig(buildEnv());

  it('issues a token that verifies back to its subject', async () => {
    const token = await issueAccessToken('admin', config, NOW);

    expect(token.token_type).toBe('bearer');
    expect(token.expires_at).toBe('2025-01-01T12:30:00.000Z');

    const claims = await verifyAccessToken(token.access_token, config, NOW);
    expect(claims).toEqual({ sub: 'admin', iat: NOW / 1000, exp: NOW / 1000 + 1800 });
  });

  it('rejects an expired token', async () => {
    const token = await issueAccessToken('admin', config, NOW);

    await expect(verifyAccessToken(token.access_token, config, NOW + 30 * 60 * 1000)).rejects.toThrow(
      'Access token is expired.'
    );
  });

  it('rejects a token signed with another key', async () => {
    const token = await issueAccessToken('admin', { ...config, secretKey: 'other-secret' }, NOW);

    await expect(verifyAccessToken(token.access_token, config, NOW)).rejects.toThrow('Invalid access token signature.');
  });

  it('rejects malformed tokens', async () => {
    await expect(verifyAccessToken('not-a-token', config, NOW)).rejects.toThrow('Malformed access token.');
  });

  it('refuses to issue or verify without a secret key', async () => {
    const unconfigured = { ...config, secretKey: '' };

    await expect(issueAccessToken('admin', unconfigured, NOW)).rejects.toThrow('Authentication is not configured.');
    await expect(verifyAccessToken('a.b.c', unconfigured, NOW)).rejects.toBeInstanceOf(AuthError);
  });

  it('requires a bearer authorization header', async () => {
    const missing = new Request('https://example.com/v1/auth/me');
    const basic = new Request('https://example.com/v1/auth/me', { headers: { Authorization: 'Basic abc' } });

    await expect(authenticateRequest(missing, config, NOW)).rejects.toThrow('Missing bearer token.');
    await expect(authenticateRequest(basic, config, NOW)).rejects.toThrow('Malformed authorization header.');
  });

  it('resolves the username from a valid bearer token', async () => {
    const token = await issueAccessToken('admin', config, NOW);
    const request = new Request('https://example.com/v1/auth/me', {
      headers: { Authorization: `Bearer ${token.access_token}` }
    });

    const auth = await authenticateRequest(request, config, NOW);

    expect(auth.username).toBe('admin');
  });
});

describe('credential check', () => {
  const config = getAuthConfig(buildEnv());

  it('accepts the configured admin only', async () => {
    await expect(verifyCredentials('admin', 'test-password', config)).resolves.toBe(true);
    await expect(verifyCredentials('admin', 'wrong-password', config)).resolves.toBe(false);
    await expect(verifyCredentials('someone', 'test-password', config)).resolves.toBe(false);
  });

  it('rejects everyone when no admin password is configured', async () => {
    await expect(verifyCredentials('admin', '', { ...config, adminPassword: '' })).resolves.toBe(false);
  });
});

describe('auth routes', () => {
  it('logs in and identifies the caller', async () => {
    const { app } = createTestApp();

    const login = await app.fetch(jsonRequest('/v1/auth/login', { username: 'admin', password: 'test-password' }));
    const token = await requestJson(login);

    expect(login.status).toBe(200);
    expect(token.token_type).toBe('bearer');

    const me = await app.fetch(
      makeRequest('/v1/auth/me', { headers: { Authorization: `Bearer ${String(token.access_token)}` } })
    );
    const body = await requestJson(me);

    expect(me.status).toBe(200);
    expect(body.username).toBe('admin');
    expect(body.authenticated).toBe(true);
  });

  it('rejects a wrong password with an authentication error', async () => {
    const { app } = createTestApp();

    const response = await app.fetch(jsonRequest('/v1/auth/login', { username: 'admin', password: 'nope' }));
    const body = await requestJson(response);
    const error = body.error as Record<string, unknown>;

    expect(response.status).toBe(401);
    expect(error.type).toBe('authentication_error');
    expect(error.message).toBe('Incorrect username or password.');
  });

  it('rejects protected routes without a token', async () => {
    const { app } = createTestApp();

    const response = await app.fetch(makeRequest('/v1/chat/sessions'));
    const body = await requestJson(response);
    const error = body.error as Record<string, unknown>;

    expect(response.status).toBe(401);
    expect(error.message).toBe('Missing bearer token.');
  });
});
