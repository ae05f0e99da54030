import fs from 'fs';
import { google, type drive_v3 } from 'googleapis';
import type { GoogleAuthContext } from '@/types/auth';
import {
  FOLDER_TYPE,
  type RemoteDocument,
  type RemoteFolderHandle,
} from '@/types/documents';
import type { DocumentStore } from './document-store';
import { RemoteError, type RemoteErrorKind, errorMessage } from './errors';
import {
  GOOGLE_MIME_TYPES,
  categoryOfMimeType,
  classify,
  remoteMimeType,
  sourceMimeType,
  toLocalFile,
} from './format-policy';
import { createLogger } from './logger';
import { type RetryOptions, retryWithBackoff } from './retry';
import { withGoogleAuthRetry } from './token-refresh';

const logger = createLogger('google-drive');

const ROOT_FOLDER_ID = 'root';
const LIST_PAGE_SIZE = 100;
const FILE_FIELDS = 'id, name, mimeType, parents';

// Upload rejections that will not go away by sending the same content again
const PERMANENT_UPLOAD_STATUSES = new Set([400, 404, 413, 415]);

/**
 * Initialize Google Drive API client with OAuth2 credentials
 */
function getDriveClient(accessToken: string): drive_v3.Drive {
  const oauth2Client = new google.auth.OAuth2();
  oauth2Client.setCredentials({ access_token: accessToken });

  return google.drive({ version: 'v3', auth: oauth2Client });
}

/**
 * Extract the HTTP status from a gaxios error or anything shaped like one
 */
export function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  if (
    'response' in error &&
    error.response &&
    typeof error.response === 'object' &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

export type DriveOperation = 'list' | 'create-folder' | 'upload' | 'trash' | 'authenticate';

/**
 * Map a Drive API failure onto the kind the uploader branches on
 */
export function classifyDriveError(
  error: unknown,
  operation: DriveOperation
): RemoteErrorKind {
  if (error instanceof RemoteError) return error.kind;

  const status = statusOf(error);
  if (operation === 'authenticate' || status === 401) return 'auth';
  if (operation === 'create-folder') {
    return status === undefined || status === 429 || status >= 500 ? 'transient' : 'creation';
  }
  if (
    operation === 'upload' &&
    status !== undefined &&
    PERMANENT_UPLOAD_STATUSES.has(status)
  ) {
    return 'permanent';
  }
  return 'transient';
}

function toRemoteError(
  error: unknown,
  operation: DriveOperation,
  message: string,
  details: Record<string, unknown>
): RemoteError {
  if (error instanceof RemoteError) return error;

  return new RemoteError({
    kind: classifyDriveError(error, operation),
    message: `${message}: ${errorMessage(error)}`,
    cause: error,
    details: { ...details, statusCode: statusOf(error) },
  });
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function parentIdOf(parent: RemoteFolderHandle | null): string {
  return parent ? parent.id : ROOT_FOLDER_ID;
}

export interface DriveDocumentStoreOptions {
  auth: GoogleAuthContext;
  // Backoff used for listing, folder creation and trashing
  retry?: RetryOptions;
}

/**
 * Google Drive backed document store
 */
export class DriveDocumentStore implements DocumentStore {
  private readonly auth: GoogleAuthContext;
  private readonly retry: RetryOptions;

  constructor({ auth, retry = {} }: DriveDocumentStoreOptions) {
    this.auth = auth;
    this.retry = { maxRetries: 3, ...retry };
  }

  private async call<T>(exec: (drive: drive_v3.Drive) => Promise<T>): Promise<T> {
    const { result } = await withGoogleAuthRetry(this.auth, async auth =>
      exec(getDriveClient(auth.accessToken))
    );
    return result;
  }

  private withRetry<T>(
    label: string,
    details: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.retry,
      onRetry: (error, attempt, delay) => {
        logger.warn(`Retrying ${label}`, {
          ...details,
          attempt,
          delay,
          error: error.message,
        });
        this.retry.onRetry?.(error, attempt, delay);
      },
    });
  }

  async authenticate(): Promise<void> {
    try {
      if (!this.auth.accessToken) {
        await this.auth.refresh();
      }

      const { data } = await this.call(drive =>
        drive.about.get({ fields: 'user(emailAddress, displayName)' })
      );

      logger.info('Authenticated with Google Drive', {
        user: data.user?.emailAddress,
      });
    } catch (error) {
      throw new RemoteError({
        kind: 'auth',
        message: `Authentication failed: ${errorMessage(error)}`,
        cause: error,
        details: { statusCode: statusOf(error) },
      });
    }
  }

  /**
   * Fetch every page of a files.list query
   */
  private async listAll(query: string): Promise<drive_v3.Schema$File[]> {
    const files: drive_v3.Schema$File[] = [];
    let pageToken: string | undefined;
    let pageCount = 0;

    do {
      const currentToken = pageToken;
      const { data } = await this.withRetry('list Drive files', { query }, async () => {
        try {
          return await this.call(drive =>
            drive.files.list({
              q: query,
              pageSize: LIST_PAGE_SIZE,
              pageToken: currentToken,
              fields: `nextPageToken, files(${FILE_FIELDS})`,
              orderBy: 'name',
            })
          );
        } catch (error) {
          throw toRemoteError(error, 'list', 'Failed to list Drive files', {
            query,
            hasPageToken: !!currentToken,
          });
        }
      });

      pageCount++;
      files.push(...(data.files ?? []));
      pageToken = data.nextPageToken ?? undefined;
    } while (pageToken);

    logger.debug('Listed Drive files', {
      query,
      fileCount: files.length,
      pageCount,
    });

    return files;
  }

  async listFoldersAt(parent: RemoteFolderHandle | null): Promise<RemoteFolderHandle[]> {
    const parentId = escapeQueryValue(parentIdOf(parent));
    const files = await this.listAll(
      `'${parentId}' in parents and trashed = false and mimeType = '${GOOGLE_MIME_TYPES.folder}'`
    );

    return files.flatMap(file =>
      file.id && file.name !== null && file.name !== undefined
        ? [{ id: file.id, title: file.name, type: FOLDER_TYPE }]
        : []
    );
  }

  async listDocumentsAt(parent: RemoteFolderHandle | null): Promise<RemoteDocument[]> {
    const parentId = escapeQueryValue(parentIdOf(parent));
    const files = await this.listAll(
      `'${parentId}' in parents and trashed = false and mimeType != '${GOOGLE_MIME_TYPES.folder}'`
    );

    return files.flatMap(file =>
      file.id && file.name !== null && file.name !== undefined
        ? [
            {
              id: file.id,
              title: file.name,
              type: categoryOfMimeType(file.mimeType ?? ''),
              parentId: file.parents?.[0] ?? undefined,
            },
          ]
        : []
    );
  }

  async createFolder(
    name: string,
    parent: RemoteFolderHandle | null
  ): Promise<RemoteFolderHandle> {
    const details = { name, parentId: parentIdOf(parent) };
    logger.debug('Creating Drive folder', details);

    try {
      const { data } = await this.withRetry('create Drive folder', details, async () => {
        try {
          return await this.call(drive =>
            drive.files.create({
              requestBody: {
                name,
                mimeType: GOOGLE_MIME_TYPES.folder,
                parents: [parentIdOf(parent)],
              },
              fields: FILE_FIELDS,
            })
          );
        } catch (error) {
          throw toRemoteError(error, 'create-folder', 'Failed to create Drive folder', details);
        }
      });

      if (!data.id) {
        throw new Error('Drive returned a folder without an id');
      }

      return { id: data.id, title: data.name ?? name, type: FOLDER_TYPE };
    } catch (error) {
      throw new RemoteError({
        kind: 'creation',
        message: `Failed to create folder ${name}: ${errorMessage(error)}`,
        cause: error,
        details,
      });
    }
  }

  async uploadFile(
    localPath: string,
    displayName: string,
    parent: RemoteFolderHandle | null
  ): Promise<RemoteDocument> {
    const file = toLocalFile(localPath, 0);
    const category = classify(file);
    const details = {
      localPath,
      displayName,
      parentId: parentIdOf(parent),
      category,
    };

    logger.debug('Uploading file to Drive', details);

    try {
      const { data } = await this.call(drive =>
        drive.files.create({
          requestBody: {
            name: displayName,
            mimeType: remoteMimeType(category),
            parents: [parentIdOf(parent)],
          },
          media: {
            mimeType: sourceMimeType(file.extension),
            body: fs.createReadStream(localPath),
          },
          fields: FILE_FIELDS,
        })
      );

      if (!data.id) {
        throw new Error('Drive returned a document without an id');
      }

      logger.debug('File uploaded to Drive', { ...details, id: data.id });

      return {
        id: data.id,
        title: data.name ?? displayName,
        type: categoryOfMimeType(data.mimeType ?? ''),
        parentId: data.parents?.[0] ?? undefined,
      };
    } catch (error) {
      throw toRemoteError(error, 'upload', 'Failed to upload file', details);
    }
  }

  async deleteDocument(id: string): Promise<void> {
    await this.withRetry('trash Drive document', { id }, async () => {
      try {
        await this.call(drive =>
          drive.files.update({
            fileId: id,
            requestBody: { trashed: true },
          })
        );
      } catch (error) {
        throw toRemoteError(error, 'trash', 'Failed to trash Drive document', { id });
      }
    });

    logger.debug('Moved Drive document to trash', { id });
  }
}
