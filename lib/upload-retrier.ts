import type { LocalFile, RemoteFolderHandle, UploadOutcome } from '@/types/documents';
import type { DocumentStore } from './document-store';
import { errorMessage, isRemoteError } from './errors';
import { isSupportedFormat, isWithinSizeLimit } from './format-policy';
import { createLogger } from './logger';
import type { OutputSink } from './output';

const logger = createLogger('upload-retrier');

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface UploadRetrierDeps {
  store: DocumentStore;
  output: OutputSink;
}

/**
 * Outcome for files that fail the format or size policy, or null when the file may be sent
 */
export function checkFormatPolicy(file: LocalFile): UploadOutcome | null {
  if (!isSupportedFormat(file)) {
    return { status: 'skipped-unsupported-format' };
  }
  if (!isWithinSizeLimit(file)) {
    return { status: 'skipped-oversize' };
  }
  return null;
}

/**
 * Upload one file into `targetFolder` (the root when null), retrying
 * immediately on transient failures up to `maxAttempts` attempts in total.
 */
export async function attemptUpload(
  file: LocalFile,
  targetFolder: RemoteFolderHandle | null,
  maxAttempts: number,
  { store, output }: UploadRetrierDeps
): Promise<UploadOutcome> {
  const rejected = checkFormatPolicy(file);
  if (rejected) {
    return rejected;
  }

  const attempts = Math.max(1, Math.floor(maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      const document = await store.uploadFile(file.path, file.baseName, targetFolder);
      logger.debug('File uploaded', {
        file: file.path,
        documentId: document.id,
        attempt,
      });
      return { status: 'uploaded', document };
    } catch (error) {
      const message = errorMessage(error);

      if (isRemoteError(error, 'permanent')) {
        logger.warn('Upload rejected permanently', { file: file.path, error: message });
        return { status: 'skipped-permanent-error', message };
      }

      output.writeLine(` - Upload error: ${message}`);
      logger.warn('Upload attempt failed', {
        file: file.path,
        attempt,
        maxAttempts: attempts,
        error: message,
      });

      if (attempt >= attempts) {
        output.writeLine(' - Skipped');
        return { status: 'skipped-after-retries-exhausted', attempts: attempt, message };
      }

      output.writeLine(' - Another try...');
    }
  }
}
