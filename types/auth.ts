export interface GoogleAuthContext {
  readonly accessToken: string;
  readonly refreshToken: string;

  // Rotate the contained access token obtained from accessToken using the refreshToken
  refresh: () => Promise<void>;
}

/**
 * OAuth client used to exchange a refresh token for an access token
 */
export interface OAuthClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Credentials resolved from the command line and environment.
 * Either an access token, or a refresh token with the OAuth client that issued it.
 */
export interface AuthCredentials {
  accessToken?: string;
  refreshToken?: string;
  client?: OAuthClientCredentials;
}

