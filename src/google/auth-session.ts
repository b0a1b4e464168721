/**
 * Google Auth Session
 *
 * One AuthSession is built per scan run and shared by the Gmail and Drive
 * clients of that run. It owns the OAuth2Client (refresh token) or JWT
 * (service account with domain-wide delegation) and therefore the cached
 * bearer token. Nothing about it is process-wide.
 *
 * Auth mode is auto-detected:
 * 1. OAuth2 refresh token: GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * 2. Service account: GOOGLE_SERVICE_ACCOUNT_KEY (base64 JSON key), impersonating the mailbox
 *
 * call() is the single retry point for outbound requests: an HTTP 401 forces
 * one token refresh and one retry. A second failure propagates.
 */

import { JWT, OAuth2Client } from 'google-auth-library';
import { errorMessage, isUnauthorizedError } from './errors.js';

// ---------------------------------------------------------------------------
// Scopes
// ---------------------------------------------------------------------------

export const GMAIL_READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';
export const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

export type AuthSessionErrorCode = 'MISSING_CREDENTIALS' | 'INVALID_KEY' | 'REFRESH_FAILED';

export class AuthSessionError extends Error {
  readonly code: AuthSessionErrorCode;

  constructor(message: string, code: AuthSessionErrorCode) {
    super(message);
    this.name = 'AuthSessionError';
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Credential loading
// ---------------------------------------------------------------------------

function loadServiceAccountKey(encoded: string): { client_email: string; private_key: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new AuthSessionError(
      `GOOGLE_SERVICE_ACCOUNT_KEY is malformed: ${errorMessage(err)}. ` +
        'Ensure it is a base64-encoded JSON service account key file.',
      'INVALID_KEY',
    );
  }

  if (
    parsed === null ||
    typeof parsed !== 'object' ||
    !('client_email' in parsed) ||
    !('private_key' in parsed) ||
    typeof parsed.client_email !== 'string' ||
    typeof parsed.private_key !== 'string'
  ) {
    throw new AuthSessionError(
      'GOOGLE_SERVICE_ACCOUNT_KEY is missing client_email or private_key fields',
      'INVALID_KEY',
    );
  }

  return { client_email: parsed.client_email, private_key: parsed.private_key };
}

function createAuthFromEnv(scopes: string[], impersonateAs: string): OAuth2Client {
  const { GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, GOOGLE_REFRESH_TOKEN, GOOGLE_SERVICE_ACCOUNT_KEY } =
    process.env;

  if (GOOGLE_REFRESH_TOKEN) {
    if (!GOOGLE_CLIENT_ID || !GOOGLE_CLIENT_SECRET) {
      throw new AuthSessionError(
        'OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET ' +
          'alongside GOOGLE_REFRESH_TOKEN.',
        'MISSING_CREDENTIALS',
      );
    }
    // The refresh token decides the mailbox; impersonateAs only applies to service accounts.
    const client = new OAuth2Client(GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET);
    client.setCredentials({ refresh_token: GOOGLE_REFRESH_TOKEN });
    return client;
  }

  if (GOOGLE_SERVICE_ACCOUNT_KEY) {
    const key = loadServiceAccountKey(GOOGLE_SERVICE_ACCOUNT_KEY);
    return new JWT({
      email: key.client_email,
      key: key.private_key,
      scopes,
      subject: impersonateAs,
    });
  }

  throw new AuthSessionError(
    'No Google credentials found. Set either:\n' +
      '  - GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN (OAuth2), or\n' +
      '  - GOOGLE_SERVICE_ACCOUNT_KEY (service account with domain-wide delegation)',
    'MISSING_CREDENTIALS',
  );
}

// ---------------------------------------------------------------------------
// AuthSession
// ---------------------------------------------------------------------------

export class AuthSession {
  constructor(readonly auth: OAuth2Client) {}

  /** Builds a session from env credentials. Throws AuthSessionError when none are set. */
  static fromEnv(impersonateAs: string, scopes = [GMAIL_READONLY_SCOPE, DRIVE_SCOPE]): AuthSession {
    return new AuthSession(createAuthFromEnv(scopes, impersonateAs));
  }

  /** Current bearer token; google-auth-library refreshes it when it is close to expiry. */
  async getToken(): Promise<string> {
    const { token } = await this.auth.getAccessToken();
    if (!token) {
      throw new AuthSessionError('Token provider returned no access token', 'REFRESH_FAILED');
    }
    return token;
  }

  /** Drops the cached access token and fetches a new one. */
  async refresh(): Promise<void> {
    this.auth.setCredentials({
      ...this.auth.credentials,
      access_token: null,
      expiry_date: null,
    });
    try {
      await this.getToken();
    } catch (err) {
      if (err instanceof AuthSessionError) throw err;
      throw new AuthSessionError(`Token refresh failed: ${errorMessage(err)}`, 'REFRESH_FAILED');
    }
  }

  /**
   * Runs an outbound request. On a 401 the token is refreshed once and the
   * request retried once.
   */
  async call<T>(label: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      if (!isUnauthorizedError(err)) throw err;
      console.warn('[auth] Access token rejected, refreshing once', { request: label });
      await this.refresh();
      return request();
    }
  }
}
