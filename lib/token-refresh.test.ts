import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { GoogleAuthContext } from '@/types/auth';
import { createAuthContext } from './auth-utils';
import { ExtendedError } from './errors';
import {
  GOOGLE_TOKEN_ENDPOINT,
  isAuthError,
  refreshAccessToken,
  withGoogleAuthRetry,
} from './token-refresh';

vi.mock('./logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const client = { clientId: 'test-client', clientSecret: 'test-secret' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

class FakeAuthContext implements GoogleAuthContext {
  refreshCount = 0;

  constructor(
    public accessToken: string,
    public refreshToken: string
  ) {}

  async refresh(): Promise<void> {
    this.refreshCount++;
    this.accessToken = `${this.accessToken}-refreshed`;
  }
}

describe('isAuthError', () => {
  it('should recognise 401 in any of the usual places', () => {
    expect(isAuthError({ code: 401 })).toBe(true);
    expect(isAuthError({ status: 401 })).toBe(true);
    expect(isAuthError({ statusCode: 401 })).toBe(true);
    expect(
      isAuthError(new ExtendedError({ message: 'Request failed', details: { statusCode: 401 } }))
    ).toBe(true);
  });

  it('should recognise googleapis auth reasons and messages', () => {
    expect(isAuthError({ errors: [{ reason: 'authError' }] })).toBe(true);
    expect(isAuthError(new Error('Invalid Credentials'))).toBe(true);
  });

  it('should not flag other failures', () => {
    expect(isAuthError({ code: 403 })).toBe(false);
    expect(isAuthError(new Error('Backend Error'))).toBe(false);
    expect(isAuthError(undefined)).toBe(false);
    expect(isAuthError('401')).toBe(false);
  });
});

describe('withGoogleAuthRetry', () => {
  it('should return the result without refreshing on success', async () => {
    const auth = new FakeAuthContext('test-access', 'test-refresh');

    const { result } = await withGoogleAuthRetry(auth, async current => current.accessToken);

    expect(result).toBe('test-access');
    expect(auth.refreshCount).toBe(0);
  });

  it('should refresh once and retry with the new token after a 401', async () => {
    const auth = new FakeAuthContext('test-access', 'test-refresh');
    const exec = vi
      .fn<(current: GoogleAuthContext) => Promise<string>>()
      .mockRejectedValueOnce({ code: 401, message: 'Unauthorized' })
      .mockImplementationOnce(async current => current.accessToken);

    const { result } = await withGoogleAuthRetry(auth, exec);

    expect(result).toBe('test-access-refreshed');
    expect(auth.refreshCount).toBe(1);
    expect(exec).toHaveBeenCalledTimes(2);
  });

  it('should not refresh without a refresh token', async () => {
    const auth = new FakeAuthContext('test-access', '');
    const failure = { code: 401, message: 'Unauthorized' };

    await expect(
      withGoogleAuthRetry(auth, () => Promise.reject(failure))
    ).rejects.toBe(failure);
    expect(auth.refreshCount).toBe(0);
  });

  it('should rethrow errors that are not auth errors', async () => {
    const auth = new FakeAuthContext('test-access', 'test-refresh');
    const failure = new Error('Backend Error');

    await expect(withGoogleAuthRetry(auth, () => Promise.reject(failure))).rejects.toBe(
      failure
    );
    expect(auth.refreshCount).toBe(0);
  });
});

describe('refreshAccessToken', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(Date, 'now').mockReturnValue(Date.UTC(2024, 2, 1));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it('should exchange the refresh token for a new access token', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ access_token: 'test-new-access', expires_in: 3600 })
    );

    const tokens = await refreshAccessToken('test-refresh', client);

    expect(tokens).toEqual({
      accessToken: 'test-new-access',
      expiresAt: Date.UTC(2024, 2, 1) / 1000 + 3600,
      refreshToken: 'test-refresh',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(GOOGLE_TOKEN_ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(String(init?.body)).toBe(
      'client_id=test-client&client_secret=test-secret&grant_type=refresh_token&refresh_token=test-refresh'
    );
  });

  it('should keep a rotated refresh token', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ access_token: 'test-new-access', refresh_token: 'test-rotated' })
    );

    const tokens = await refreshAccessToken('test-refresh', client);

    expect(tokens.refreshToken).toBe('test-rotated');
  });

  it('should throw with the status code when the exchange is refused', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: 'invalid_grant', error_description: 'Token has been revoked' }, 400)
    );

    const error = await refreshAccessToken('test-refresh', client).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ExtendedError);
    expect(error).toMatchObject({
      message: 'invalid_grant',
      details: { statusCode: 400, description: 'Token has been revoked' },
    });
  });
});

describe('createAuthContext', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should require at least one token', () => {
    expect(() => createAuthContext({})).toThrow(
      'Either an access token or a refresh token is required'
    );
  });

  it('should refuse to refresh without an OAuth client', async () => {
    const auth = createAuthContext({ accessToken: 'test-access', refreshToken: 'test-refresh' });

    await expect(auth.refresh()).rejects.toThrow(
      'Cannot refresh access token without a refresh token and OAuth client'
    );
  });

  it('should rotate both tokens on refresh', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(
          jsonResponse({ access_token: 'test-new-access', refresh_token: 'test-rotated' })
        )
    );
    const auth = createAuthContext({ refreshToken: 'test-refresh', client });

    expect(auth.accessToken).toBe('');
    await auth.refresh();

    expect(auth.accessToken).toBe('test-new-access');
    expect(auth.refreshToken).toBe('test-rotated');
  });
});
