/**
 * Local and remote document model shared by the upload pipeline
 */

export type DocumentCategory =
  | 'document'
  | 'spreadsheet'
  | 'presentation'
  | 'pdf'
  | 'other';

/**
 * Snapshot of a local file taken when its folder is visited
 */
export interface LocalFile {
  readonly path: string; // absolute
  readonly name: string;
  readonly baseName: string; // name without the extension
  readonly extension: string; // lower-cased, without the dot
  readonly size: number;
}

export const FOLDER_TYPE = 'folder' as const;

/**
 * A folder in the remote namespace. The root ("My Drive") has no handle and is
 * represented by `null` wherever a handle is expected.
 */
export interface RemoteFolderHandle {
  id: string;
  title: string;
  type: typeof FOLDER_TYPE;
}

export interface RemoteDocument {
  id: string;
  title: string;
  type: DocumentCategory;
  parentId?: string;
}

export type ConflictDecision = 'add' | 'skip' | 'replace';

export type ConflictChoice =
  | ConflictDecision
  | 'add-all'
  | 'skip-all'
  | 'replace-all';

export type UploadOutcome =
  | { status: 'uploaded'; document: RemoteDocument }
  | { status: 'skipped-unsupported-format' }
  | { status: 'skipped-oversize' }
  | { status: 'skipped-by-policy'; existing: RemoteDocument }
  | { status: 'skipped-after-retries-exhausted'; attempts: number; message: string }
  | { status: 'skipped-permanent-error'; message: string };

export type UploadOutcomeStatus = UploadOutcome['status'];
