import { describe, it, expect } from 'vitest';
import { hasCredentials, resolveConfig } from './config';

describe('resolveConfig', () => {
  it('should apply defaults when nothing is given', () => {
    const config = resolveConfig(undefined, {}, {});

    expect(config).toEqual({
      credentials: { accessToken: undefined, refreshToken: undefined, client: undefined },
      upload: {
        rootPath: undefined,
        recursive: false,
        remoteRootPath: undefined,
        withoutFolders: false,
        addAll: false,
        skipAll: false,
        replaceAll: false,
        disableRetries: false,
      },
      reportPath: undefined,
      logLevel: 'warn',
    });
  });

  it('should map command-line flags onto upload options', () => {
    const config = resolveConfig(
      ' /docs ',
      {
        recursive: true,
        remoteFolder: 'Archive/2009',
        withoutFolders: true,
        replaceAll: true,
        disableRetries: true,
        report: 'report.json',
      },
      {}
    );

    expect(config.upload).toEqual({
      rootPath: '/docs',
      recursive: true,
      remoteRootPath: 'Archive/2009',
      withoutFolders: true,
      addAll: false,
      skipAll: false,
      replaceAll: true,
      disableRetries: true,
    });
    expect(config.reportPath).toBe('report.json');
  });

  it('should read credentials from the environment', () => {
    const config = resolveConfig(undefined, {}, {
      GOOGLE_ACCESS_TOKEN: 'test-access',
      GOOGLE_REFRESH_TOKEN: 'test-refresh',
      AUTH_GOOGLE_ID: 'test-client',
      AUTH_GOOGLE_SECRET: 'test-secret',
    });

    expect(config.credentials).toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      client: { clientId: 'test-client', clientSecret: 'test-secret' },
    });
  });

  it('should prefer command-line credentials over the environment', () => {
    const config = resolveConfig(
      undefined,
      { token: 'test-cli-access' },
      { GOOGLE_ACCESS_TOKEN: 'test-env-access' }
    );

    expect(config.credentials.accessToken).toBe('test-cli-access');
  });

  it('should ignore blank values', () => {
    const config = resolveConfig('  ', { token: '   ', remoteFolder: '' }, {});

    expect(config.credentials.accessToken).toBeUndefined();
    expect(config.upload.rootPath).toBeUndefined();
    expect(config.upload.remoteRootPath).toBeUndefined();
  });

  it('should refuse a refresh token without the OAuth client', () => {
    expect(() =>
      resolveConfig(undefined, { refreshToken: 'test-refresh', clientId: 'test-client' }, {})
    ).toThrow(/A refresh token needs the OAuth client id and secret/);
  });

  it('should take the log level from the environment unless verbose', () => {
    expect(resolveConfig(undefined, {}, { LOG_LEVEL: 'info' }).logLevel).toBe('info');
    expect(resolveConfig(undefined, {}, { LOG_LEVEL: 'loud' }).logLevel).toBe('warn');
    expect(
      resolveConfig(undefined, { verbose: true }, { LOG_LEVEL: 'error' }).logLevel
    ).toBe('debug');
  });
});

describe('hasCredentials', () => {
  it('should need an access or a refresh token', () => {
    expect(hasCredentials({})).toBe(false);
    expect(hasCredentials({ accessToken: 'test-access' })).toBe(true);
    expect(hasCredentials({ refreshToken: 'test-refresh' })).toBe(true);
  });
});
