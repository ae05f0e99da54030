/**
 * drive-docs-upload
 *
 * Batch upload of documents to Google Drive, preserving folder structure.
 */

import 'dotenv/config';
import { ReadlinePrompter } from '@/lib/console-prompt';
import { DriveDocumentStore } from '@/lib/google-drive';
import { createLogger } from '@/lib/logger';
import { ConsoleOutput } from '@/lib/output';
import { run } from './program';

const logger = createLogger('cli');

run(process.argv, {
  output: new ConsoleOutput(),
  prompter: new ReadlinePrompter(),
  createStore: auth => new DriveDocumentStore({ auth }),
}).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Fatal error', error);
    process.exitCode = 1;
  }
);
