import { createLogger } from './logger';
import { ExtendedError } from './errors';
import type { GoogleAuthContext, OAuthClientCredentials } from '@/types/auth';

const logger = createLogger('token-refresh');

export const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';

export interface RefreshedTokens {
  accessToken: string;
  expiresAt: number; // epoch seconds
  refreshToken: string; // may be same as input
}

interface TokenResponseBody {
  access_token?: string;
  expires_in?: number;
  refresh_token?: string;
  error?: string;
  error_description?: string;
}

function isTokenResponseBody(value: unknown): value is TokenResponseBody {
  return !!value && typeof value === 'object';
}

/**
 * Exchange a refresh token for a fresh Google OAuth access token.
 */
export async function refreshAccessToken(
  refreshToken: string,
  client: OAuthClientCredentials
): Promise<RefreshedTokens> {
  logger.info('Attempting to refresh access token');

  const response = await fetch(GOOGLE_TOKEN_ENDPOINT, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      client_id: client.clientId,
      client_secret: client.clientSecret,
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    }),
  });

  const body: unknown = await response.json();
  const tokens: TokenResponseBody = isTokenResponseBody(body) ? body : {};

  if (!response.ok || !tokens.access_token) {
    const error = new ExtendedError({
      message: tokens.error || 'Failed to refresh token',
      details: {
        statusCode: response.status,
        description: tokens.error_description,
      },
    });
    logger.error('Token refresh failed', error);
    throw error;
  }

  logger.info('Access token refreshed successfully', {
    expiresIn: tokens.expires_in,
  });

  return {
    accessToken: tokens.access_token,
    expiresAt: Math.floor(Date.now() / 1000) + (tokens.expires_in ?? 0),
    refreshToken: tokens.refresh_token ?? refreshToken,
  };
}

/**
 * Detect if an error represents an authorization failure that warrants a token refresh attempt.
 */
export function isAuthError(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;

  const message =
    'message' in error && typeof error.message === 'string'
      ? error.message.toLowerCase()
      : '';

  const candidates: unknown[] = [
    'code' in error ? error.code : undefined,
    'status' in error ? error.status : undefined,
    'statusCode' in error ? error.statusCode : undefined,
    'details' in error &&
    error.details &&
    typeof error.details === 'object' &&
    'statusCode' in error.details
      ? error.details.statusCode
      : undefined,
  ];
  if (candidates.some(code => code === 401)) return true;

  // googleapis sometimes reports errors like err.errors[0].reason === 'authError'
  if ('errors' in error && Array.isArray(error.errors)) {
    const hasAuthReason = error.errors.some(
      (e: unknown) =>
        !!e && typeof e === 'object' && 'reason' in e && e.reason === 'authError'
    );
    if (hasAuthReason) return true;
  }

  return (
    message.includes('unauthorized') || message.includes('invalid credentials')
  );
}

/**
 * Execute an async function that performs a Google API call, refreshing the access token once on 401.
 * The exec function is passed the auth context, whose access token may have been rotated.
 */
export async function withGoogleAuthRetry<T>(
  auth: GoogleAuthContext,
  exec: (auth: GoogleAuthContext) => Promise<T>
): Promise<{ result: T }> {
  try {
    const result = await exec(auth);
    return { result };
  } catch (err) {
    if (!auth.refreshToken || !isAuthError(err)) throw err;

    logger.warn(
      'Auth error detected, attempting single token refresh then retry',
      {
        error: err instanceof Error ? err.message : String(err),
      }
    );
    await auth.refresh();
    const result = await exec(auth);
    return { result };
  }
}
