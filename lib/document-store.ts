import type { RemoteDocument, RemoteFolderHandle } from '@/types/documents';

/**
 * Remote document store the uploader talks to.
 *
 * A `null` parent always means the root namespace. Implementations report
 * failures as `RemoteError` with the kind set, so callers can branch on it.
 */
export interface DocumentStore {
  /** Verify the credentials; rejects with a RemoteError of kind `auth` */
  authenticate(): Promise<void>;

  listFoldersAt(parent: RemoteFolderHandle | null): Promise<RemoteFolderHandle[]>;

  /** Documents directly inside `parent`, folders excluded */
  listDocumentsAt(parent: RemoteFolderHandle | null): Promise<RemoteDocument[]>;

  /** Rejects with a RemoteError of kind `creation` */
  createFolder(
    name: string,
    parent: RemoteFolderHandle | null
  ): Promise<RemoteFolderHandle>;

  /** Rejects with kind `permanent` for content the store will never accept, `transient` otherwise */
  uploadFile(
    localPath: string,
    displayName: string,
    parent: RemoteFolderHandle | null
  ): Promise<RemoteDocument>;

  /** Moves the document to the trash */
  deleteDocument(id: string): Promise<void>;
}
