import type { AuthCredentials } from '@/types/auth';
import { ExtendedError } from './errors';
import type { UploadOptions } from './folder-sync';
import { type LogLevel, isLogLevel } from './logger';

/**
 * Options as parsed from the command line
 */
export type CliOptions = {
  recursive?: boolean;
  remoteFolder?: string;
  withoutFolders?: boolean;
  addAll?: boolean;
  skipAll?: boolean;
  replaceAll?: boolean;
  disableRetries?: boolean;
  token?: string;
  refreshToken?: string;
  clientId?: string;
  clientSecret?: string;
  report?: string;
  verbose?: boolean;
};

export interface ResolvedConfig {
  credentials: AuthCredentials;
  // rootPath is missing when it has to be asked for
  upload: Omit<UploadOptions, 'rootPath'> & { rootPath?: string };
  reportPath?: string;
  logLevel: LogLevel;
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Merge command-line options over the environment.
 *
 * Environment variables: GOOGLE_ACCESS_TOKEN, GOOGLE_REFRESH_TOKEN,
 * AUTH_GOOGLE_ID, AUTH_GOOGLE_SECRET, LOG_LEVEL.
 */
export function resolveConfig(
  rootPath: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const accessToken = nonEmpty(options.token) ?? nonEmpty(env.GOOGLE_ACCESS_TOKEN);
  const refreshToken =
    nonEmpty(options.refreshToken) ?? nonEmpty(env.GOOGLE_REFRESH_TOKEN);
  const clientId = nonEmpty(options.clientId) ?? nonEmpty(env.AUTH_GOOGLE_ID);
  const clientSecret =
    nonEmpty(options.clientSecret) ?? nonEmpty(env.AUTH_GOOGLE_SECRET);

  if (refreshToken && (!clientId || !clientSecret)) {
    throw new ExtendedError({
      message:
        'A refresh token needs the OAuth client id and secret (--client-id/--client-secret or AUTH_GOOGLE_ID/AUTH_GOOGLE_SECRET)',
      details: { hasClientId: !!clientId, hasClientSecret: !!clientSecret },
    });
  }

  const credentials: AuthCredentials = {
    accessToken,
    refreshToken,
    client:
      clientId && clientSecret ? { clientId, clientSecret } : undefined,
  };

  let logLevel: LogLevel = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOG_LEVEL;
  if (options.verbose) {
    logLevel = 'debug';
  }

  return {
    credentials,
    upload: {
      rootPath: nonEmpty(rootPath),
      recursive: options.recursive ?? false,
      remoteRootPath: nonEmpty(options.remoteFolder),
      withoutFolders: options.withoutFolders ?? false,
      addAll: options.addAll ?? false,
      skipAll: options.skipAll ?? false,
      replaceAll: options.replaceAll ?? false,
      disableRetries: options.disableRetries ?? false,
    },
    reportPath: nonEmpty(options.report),
    logLevel,
  };
}

export function hasCredentials(credentials: AuthCredentials): boolean {
  return !!credentials.accessToken || !!credentials.refreshToken;
}
