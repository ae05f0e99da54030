import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type {
  LocalFile,
  RemoteDocument,
  RemoteFolderHandle,
  UploadOutcome,
} from '@/types/documents';
import {
  ConflictPolicyState,
  resolveConflict,
  type DecisionProvider,
} from './conflict-resolver';
import type { DocumentStore } from './document-store';
import { LocalPathNotFoundError, errorMessage } from './errors';
import { toLocalFile } from './format-policy';
import { createLogger } from './logger';
import type { OutputSink } from './output';
import { RemoteNamespaceResolver } from './remote-namespace';
import { DEFAULT_MAX_ATTEMPTS, attemptUpload, checkFormatPolicy } from './upload-retrier';

const logger = createLogger('folder-sync');

export interface UploadOptions {
  rootPath: string;
  recursive?: boolean;
  // Slash-separated remote destination; the root namespace when empty
  remoteRootPath?: string;
  // Upload every file into the destination instead of recreating sub-folders
  withoutFolders?: boolean;
  addAll?: boolean;
  skipAll?: boolean;
  replaceAll?: boolean;
  disableRetries?: boolean;
}

export type UploadOutcomeListener = (
  file: LocalFile,
  outcome: UploadOutcome
) => void | Promise<void>;

export interface FolderSynchronizerDeps {
  store: DocumentStore;
  output: OutputSink;
  decisions: DecisionProvider;
  onOutcome?: UploadOutcomeListener;
}

interface WalkContext {
  recursive: boolean;
  withoutFolders: boolean;
  maxAttempts: number;
  policy: ConflictPolicyState;
  progress: { current: number; total: number };
}

interface LocalFolderEntries {
  files: LocalFile[];
  directories: string[];
}

const FOLDER_FALLBACK_MESSAGE =
  ' - Skipped: failed to create the folder, files will be uploaded to the upper-level folder';

/**
 * Line printed under a file for its outcome, if any
 */
export function describeOutcome(outcome: UploadOutcome): string | null {
  switch (outcome.status) {
    case 'uploaded':
      return null;
    case 'skipped-unsupported-format':
      return ' - Skipped: the file format is not supported';
    case 'skipped-oversize':
      return ' - Skipped: the file size exceeds the limit';
    case 'skipped-by-policy':
      return ' - Skipped';
    case 'skipped-permanent-error':
      return ` - Skipped: ${outcome.message}`;
    case 'skipped-after-retries-exhausted':
      // The retrier has already reported each attempt
      return null;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Files and sub-directories of a local folder, each in name order.
 * Entries that cannot be read are logged and left out; an unreadable folder is empty.
 */
async function readLocalFolder(folderPath: string): Promise<LocalFolderEntries> {
  const files: LocalFile[] = [];
  const directories: string[] = [];

  let names: string[];
  try {
    names = (await fs.readdir(folderPath)).sort();
  } catch (error) {
    logger.error('Failed to read local folder', error, { path: folderPath });
    return { files, directories };
  }

  for (const name of names) {
    const entryPath = path.join(folderPath, name);
    let stats: Stats;
    try {
      stats = await fs.stat(entryPath);
    } catch (error) {
      // Dangling or looping symlink, or no permission
      logger.warn('Skipping unreadable local entry', {
        path: entryPath,
        error: errorMessage(error),
      });
      continue;
    }
    if (stats.isDirectory()) {
      directories.push(entryPath);
    } else if (stats.isFile()) {
      files.push(toLocalFile(entryPath, stats.size));
    }
  }

  return { files, directories };
}

/**
 * Number of files the walk will visit
 */
export async function countFiles(folderPath: string, recursive: boolean): Promise<number> {
  const { files, directories } = await readLocalFolder(folderPath);
  let count = files.length;
  if (recursive) {
    for (const directory of directories) {
      count += await countFiles(directory, recursive);
    }
  }
  return count;
}

/**
 * Mirrors a local file tree into the remote store, depth-first: the files of a
 * folder first, then each sub-folder.
 */
export class FolderSynchronizer {
  private readonly store: DocumentStore;
  private readonly output: OutputSink;
  private readonly decisions: DecisionProvider;
  private readonly onOutcome?: UploadOutcomeListener;
  private readonly resolver: RemoteNamespaceResolver;

  constructor({ store, output, decisions, onOutcome }: FolderSynchronizerDeps) {
    this.store = store;
    this.output = output;
    this.decisions = decisions;
    this.onOutcome = onOutcome;
    this.resolver = new RemoteNamespaceResolver(store);
  }

  /**
   * Upload `rootPath` (a folder or a single file) and return how many files were uploaded.
   * Throws LocalPathNotFoundError when the path does not exist.
   */
  async upload(options: UploadOptions): Promise<number> {
    const rootPath = path.resolve(options.rootPath);
    const stats = await statOrNull(rootPath);
    if (!stats) {
      throw new LocalPathNotFoundError(options.rootPath);
    }

    const remoteRootPath = options.remoteRootPath ?? '';
    const target = await this.resolver.resolveFolderPath(remoteRootPath);

    const context: WalkContext = {
      recursive: options.recursive ?? false,
      withoutFolders: options.withoutFolders ?? false,
      maxAttempts: options.disableRetries ? 1 : DEFAULT_MAX_ATTEMPTS,
      policy: new ConflictPolicyState({
        addAll: options.addAll,
        skipAll: options.skipAll,
        replaceAll: options.replaceAll,
      }),
      progress: { current: 0, total: 0 },
    };

    logger.info('Starting upload', {
      rootPath,
      remoteRootPath,
      targetId: target?.id ?? 'root',
      recursive: context.recursive,
      withoutFolders: context.withoutFolders,
      maxAttempts: context.maxAttempts,
    });

    if (!stats.isDirectory()) {
      return this.uploadSingleFile(toLocalFile(rootPath, stats.size), target, context);
    }

    let message = `Uploading${context.recursive ? ' recursively' : ''} the folder ${options.rootPath}`;
    if (remoteRootPath.length > 0) {
      message += ` to ${remoteRootPath}`;
    }
    this.output.writeLine();
    this.output.writeLine(message);
    this.output.writeLine();

    context.progress.total = await countFiles(rootPath, context.recursive);

    const uploaded = await this.uploadFolder(rootPath, target, context);

    this.output.writeLine();
    this.output.writeLine(`Files uploaded: ${uploaded}`);

    logger.info('Upload finished', {
      rootPath,
      uploaded,
      visited: context.progress.current,
      policy: context.policy.snapshot(),
    });

    return uploaded;
  }

  private async uploadSingleFile(
    file: LocalFile,
    target: RemoteFolderHandle | null,
    context: WalkContext
  ): Promise<number> {
    this.output.writeLine();
    this.output.writeLine(file.path);

    const remoteDocuments = await this.listDocuments(target);
    const outcome = await this.uploadFile(file, target, remoteDocuments, context);

    this.output.writeLine();
    if (outcome.status === 'uploaded') {
      this.output.writeLine('The file has been uploaded');
      return 1;
    }
    this.output.writeLine('The file has not been uploaded');
    return 0;
  }

  private async uploadFolder(
    folderPath: string,
    target: RemoteFolderHandle | null,
    context: WalkContext
  ): Promise<number> {
    // Listed afresh on every visit; nothing is cached across sibling branches
    const remoteSubFolders = await this.resolver.listSubFolders(target);
    const remoteDocuments = await this.listDocuments(target);
    const { files, directories } = await readLocalFolder(folderPath);

    let uploaded = 0;

    for (const file of files) {
      context.progress.current++;
      this.output.writeLine(
        `[${context.progress.current}/${context.progress.total}] ${file.path}`
      );

      const outcome = await this.uploadFile(file, target, remoteDocuments, context);
      if (outcome.status === 'uploaded') {
        uploaded++;
      }
    }

    if (!context.recursive) {
      return uploaded;
    }

    for (const directory of directories) {
      let childTarget = target;

      if (!context.withoutFolders) {
        const folder = await this.resolver.findOrCreateFolder(
          path.basename(directory),
          target,
          remoteSubFolders
        );
        if (folder) {
          childTarget = folder;
        } else {
          this.output.writeLine(directory);
          this.output.writeLine(FOLDER_FALLBACK_MESSAGE);
        }
      }

      uploaded += await this.uploadFolder(directory, childTarget, context);
    }

    return uploaded;
  }

  /**
   * Run one file through the policy, conflict and upload steps.
   * `remoteDocuments` is the listing taken when the folder was entered; documents
   * this run adds or trashes are not reflected in it.
   */
  private async uploadFile(
    file: LocalFile,
    target: RemoteFolderHandle | null,
    remoteDocuments: RemoteDocument[],
    context: WalkContext
  ): Promise<UploadOutcome> {
    const outcome = await this.decideAndUpload(file, target, remoteDocuments, context);

    const line = describeOutcome(outcome);
    if (line) {
      this.output.writeLine(line);
    }
    await this.onOutcome?.(file, outcome);
    return outcome;
  }

  private async decideAndUpload(
    file: LocalFile,
    target: RemoteFolderHandle | null,
    remoteDocuments: RemoteDocument[],
    context: WalkContext
  ): Promise<UploadOutcome> {
    const rejected = checkFormatPolicy(file);
    if (rejected) {
      return rejected;
    }

    const resolution = await resolveConflict(
      file,
      remoteDocuments,
      context.policy,
      this.decisions
    );

    if (resolution.decision === 'skip') {
      return { status: 'skipped-by-policy', existing: resolution.existing };
    }

    if (resolution.decision === 'replace') {
      await this.trashExisting(resolution.existing);
    }

    return attemptUpload(file, target, context.maxAttempts, {
      store: this.store,
      output: this.output,
    });
  }

  /**
   * Best effort: a failure is logged and the upload goes ahead
   */
  private async trashExisting(existing: RemoteDocument): Promise<void> {
    try {
      await this.store.deleteDocument(existing.id);
    } catch (error) {
      logger.error('Failed to move the existing document to trash', error, {
        documentId: existing.id,
        title: existing.title,
      });
    }
  }

  private async listDocuments(target: RemoteFolderHandle | null): Promise<RemoteDocument[]> {
    try {
      return await this.store.listDocumentsAt(target);
    } catch (error) {
      logger.error('Failed to list remote documents', error, {
        folderId: target?.id ?? 'root',
      });
      return [];
    }
  }
}
