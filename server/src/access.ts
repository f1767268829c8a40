import { timingSafeEqual } from 'node:crypto';
import { parseIntBounded } from './aiConfig';
import { AuthError } from './errors';
import type { AccessClaims, AuthContext, Env, TokenResponse } from './types';

export interface AuthConfig {
  secretKey: string;
  passwordSalt: string;
  adminUsername: string;
  adminPassword: string;
  tokenTtlMinutes: number;
}

export const getAuthConfig = (env: Env): AuthConfig => ({
  secretKey: env.SECRET_KEY?.trim() || '',
  passwordSalt: env.PASSWORD_SALT || '',
  adminUsername: env.ADMIN_USERNAME?.trim() || 'admin',
  adminPassword: env.ADMIN_PASSWORD || '',
  tokenTtlMinutes: parseIntBounded(env.ACCESS_TOKEN_EXPIRE_MINUTES, 30, 1, 24 * 60)
});

const JWT_HEADER = { alg: 'HS256', typ: 'JWT' };

const textEncoder = new TextEncoder();

const decodeBase64UrlToBytes = (input: string) => {
  const padding = (4 - (input.length % 4)) % 4;
  const normalized = input.replace(/-/g, '+').replace(/_/g, '/') + '='.repeat(padding);
  const binary = atob(normalized);
  const bytes = new Uint8Array(binary.length);

  for (let index = 0; index < binary.length; index += 1) {
    bytes[index] = binary.charCodeAt(index);
  }

  return bytes;
};

const encodeBase64Url = (bytes: Uint8Array): string => {
  let binary = '';
  for (const value of bytes) {
    binary += String.fromCharCode(value);
  }

  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/g, '');
};

const encodeJsonSegment = (value: unknown): string => encodeBase64Url(textEncoder.encode(JSON.stringify(value)));

const decodeJsonSegment = (segment: string): unknown => {
  return JSON.parse(new TextDecoder().decode(decodeBase64UrlToBytes(segment)));
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const importSigningKey = (secretKey: string): Promise<CryptoKey> => {
  return crypto.subtle.importKey(
    'raw',
    textEncoder.encode(secretKey),
    { name: 'HMAC', hash: 'SHA-256' },
    false,
    ['sign', 'verify']
  );
};

const assertConfigured = (config: AuthConfig): void => {
  if (!config.secretKey) {
    throw new AuthError('Authentication is not configured.');
  }
};

const signSegments = async (signingInput: string, secretKey: string): Promise<string> => {
  const key = await importSigningKey(secretKey);
  const signature = await crypto.subtle.sign('HMAC', key, textEncoder.encode(signingInput));
  return encodeBase64Url(new Uint8Array(signature));
};

export const issueAccessToken = async (
  username: string,
  config: AuthConfig,
  nowMs = Date.now()
): Promise<TokenResponse> => {
  assertConfigured(config);
  const iat = Math.floor(nowMs / 1000);
  const claims: AccessClaims = {
    sub: username,
    iat,
    exp: iat + config.tokenTtlMinutes * 60
  };

  const signingInput = `${encodeJsonSegment(JWT_HEADER)}.${encodeJsonSegment(claims)}`;
  const signature = await signSegments(signingInput, config.secretKey);

  return {
    access_token: `${signingInput}.${signature}`,
    token_type: 'bearer',
    expires_at: new Date(claims.exp * 1000).toISOString()
  };
};

const decodeSignature = (segment: string) => {
  try {
    return decodeBase64UrlToBytes(segment);
  } catch {
    throw new AuthError('Malformed access token.');
  }
};

const parseClaims = (payload: unknown): AccessClaims => {
  if (!isRecord(payload)) {
    throw new AuthError('Malformed access token payload.');
  }

  const { sub, exp, iat } = payload;
  if (typeof sub !== 'string' || !sub || typeof exp !== 'number' || typeof iat !== 'number') {
    throw new AuthError('Malformed access token payload.');
  }

  return { sub, exp, iat };
};

export const verifyAccessToken = async (token: string, config: AuthConfig, nowMs = Date.now()): Promise<AccessClaims> => {
  assertConfigured(config);
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new AuthError('Malformed access token.');
  }

  const [headerSegment, payloadSegment, signatureSegment] = segments;
  let header: unknown;
  let payload: unknown;
  try {
    header = decodeJsonSegment(headerSegment);
    payload = decodeJsonSegment(payloadSegment);
  } catch {
    throw new AuthError('Malformed access token payload.');
  }

  if (!isRecord(header) || header.alg !== 'HS256') {
    throw new AuthError('Unsupported token algorithm.');
  }

  const key = await importSigningKey(config.secretKey);
  const signature = decodeSignature(signatureSegment);

  const verified = await crypto.subtle.verify(
    'HMAC',
    key,
    signature,
    textEncoder.encode(`${headerSegment}.${payloadSegment}`)
  );
  if (!verified) {
    throw new AuthError('Invalid access token signature.');
  }

  const claims = parseClaims(payload);
  if (claims.exp <= Math.floor(nowMs / 1000)) {
    throw new AuthError('Access token is expired.');
  }

  return claims;
};

export const authenticateRequest = async (request: Request, config: AuthConfig, nowMs = Date.now()): Promise<AuthContext> => {
  const header = request.headers.get('Authorization')?.trim();
  if (!header) {
    throw new AuthError('Missing bearer token.');
  }

  const match = header.match(/^Bearer\s+(\S+)$/i);
  if (!match) {
    throw new AuthError('Malformed authorization header.');
  }

  const claims = await verifyAccessToken(match[1], config, nowMs);
  return {
    claims,
    username: claims.sub
  };
};

const hashPassword = async (password: string, salt: string) => {
  const digest = await crypto.subtle.digest('SHA-256', textEncoder.encode(`${salt}${password}`));
  return new Uint8Array(digest);
};

/** Compares salted digests in constant time; the username check is not secret. */
export const verifyCredentials = async (username: string, password: string, config: AuthConfig): Promise<boolean> => {
  if (!config.adminPassword) return false;

  const [provided, expected] = await Promise.all([
    hashPassword(password, config.passwordSalt),
    hashPassword(config.adminPassword, config.passwordSalt)
  ]);
  const passwordMatches = timingSafeEqual(provided, expected);

  return passwordMatches && username === config.adminUsername;
};
