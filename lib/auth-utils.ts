import type {
  AuthCredentials,
  GoogleAuthContext,
  OAuthClientCredentials,
} from '@/types/auth';
import { ExtendedError } from './errors';
import { createLogger } from './logger';
import { refreshAccessToken } from './token-refresh';

const logger = createLogger('auth-utils');

class GoogleAuthContextImpl implements GoogleAuthContext {
  constructor(
    private _accessToken: string,
    private _refreshToken: string,
    private readonly client: OAuthClientCredentials | undefined
  ) {}

  get accessToken() {
    return this._accessToken;
  }
  get refreshToken() {
    return this._refreshToken;
  }

  async refresh() {
    if (!this._refreshToken || !this.client) {
      throw new ExtendedError({
        message: 'Cannot refresh access token without a refresh token and OAuth client',
        details: {
          hasRefreshToken: !!this._refreshToken,
          hasClient: !!this.client,
        },
      });
    }
    const result = await refreshAccessToken(this._refreshToken, this.client);
    this._refreshToken = result.refreshToken;
    this._accessToken = result.accessToken;
  }
}

/**
 * Build an auth context from resolved credentials.
 * The access token may be empty when only a refresh token was supplied; it is
 * obtained on the first refresh.
 */
export function createAuthContext(credentials: AuthCredentials): GoogleAuthContext {
  if (!credentials.accessToken && !credentials.refreshToken) {
    throw new ExtendedError({
      message: 'Either an access token or a refresh token is required',
    });
  }

  logger.debug('Creating auth context', {
    hasAccessToken: !!credentials.accessToken,
    hasRefreshToken: !!credentials.refreshToken,
    hasClient: !!credentials.client,
  });

  return new GoogleAuthContextImpl(
    credentials.accessToken ?? '',
    credentials.refreshToken ?? '',
    credentials.client
  );
}
