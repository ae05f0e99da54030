import { Command, CommanderError } from 'commander';
import type { GoogleAuthContext } from '@/types/auth';
import { createAuthContext } from '@/lib/auth-utils';
import { hasCredentials, resolveConfig, type CliOptions } from '@/lib/config';
import { ConsolePromptDecisionProvider, type LinePrompter } from '@/lib/console-prompt';
import type { DocumentStore } from '@/lib/document-store';
import { LocalPathNotFoundError, isRemoteError } from '@/lib/errors';
import { FolderSynchronizer } from '@/lib/folder-sync';
import { describeSupportedFormats } from '@/lib/format-policy';
import { createLogger, setLogLevel } from '@/lib/logger';
import type { OutputSink } from '@/lib/output';
import { UploadReport } from '@/lib/upload-report-db';

const logger = createLogger('cli');

const VERSION = '1.0.0';

const WELCOME_MESSAGE = [
  '',
  `Drive Docs Upload ${VERSION}`,
  'Using this tool, you can batch upload your documents to Google Drive preserving folder structure.',
  `Supported file formats are: ${describeSupportedFormats()}.`,
  "Type '--help' for a list of parameters.",
  '',
];

export interface CliDeps {
  output: OutputSink;
  prompter: LinePrompter;
  createStore: (auth: GoogleAuthContext) => DocumentStore;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(output?: OutputSink): Command {
  const program = new Command()
    .name('drive-docs-upload')
    .description('Batch upload documents to Google Drive preserving folder structure')
    .version(VERSION)
    .argument('[path]', 'File or folder to upload')
    .option('-r, --recursive', 'Recursively upload all subfolders')
    .option(
      '-f, --remote-folder <path>',
      "The remote folder path to upload the documents to, separated by '/'"
    )
    .option('-w, --without-folders', 'Do not recreate the folder structure in Drive')
    .option(
      '--add-all',
      'Upload all documents even if there are already documents with the same names'
    )
    .option(
      '--skip-all',
      'Skip all documents if there are already documents with the same names'
    )
    .option(
      '--replace-all',
      'Replace all documents in Drive which have the same names as the uploaded ones'
    )
    .option('-d, --disable-retries', 'Disable auto-retries in the cases of failed upload')
    .option('-t, --token <accessToken>', 'OAuth access token')
    .option('--refresh-token <refreshToken>', 'OAuth refresh token')
    .option('--client-id <clientId>', 'OAuth client id used to refresh tokens')
    .option('--client-secret <clientSecret>', 'OAuth client secret used to refresh tokens')
    .option('--report <file>', 'Append the outcome of every file to a JSON report')
    .option('-v, --verbose', 'Print diagnostic logs')
    .addHelpText('after', `\nSupported file formats are: ${describeSupportedFormats()}`)
    .exitOverride();

  if (output) {
    program.configureOutput({ writeOut: text => output.write(text) });
  }
  return program;
}

/**
 * Parse `argv`, authenticate and run the upload. Resolves to the exit code.
 */
export async function run(
  argv: string[],
  { output, prompter, createStore, env = process.env }: CliDeps
): Promise<number> {
  const program = buildProgram(output);
  let report: UploadReport | undefined;

  try {
    try {
      program.parse(argv);
    } catch (error) {
      if (error instanceof CommanderError) {
        if (error.code === 'commander.helpDisplayed') return 1;
        if (error.code === 'commander.version') return 0;
        return error.exitCode || 1;
      }
      throw error;
    }

    WELCOME_MESSAGE.forEach(line => output.writeLine(line));

    const config = resolveConfig(program.args[0], program.opts<CliOptions>(), env);
    setLogLevel(config.logLevel);

    const credentials = { ...config.credentials };
    if (!hasCredentials(credentials)) {
      credentials.accessToken = await prompter.ask('Access token: ');
    }
    if (!hasCredentials(credentials)) {
      logger.warn('No access token given');
      output.writeLine('Authentication error');
      return 1;
    }

    const store = createStore(createAuthContext(credentials));
    try {
      await store.authenticate();
    } catch (error) {
      if (!isRemoteError(error, 'auth')) throw error;
      logger.warn('Authentication failed', { error: error.message });
      output.writeLine('Authentication error');
      return 1;
    }

    const rootPath = config.upload.rootPath ?? (await prompter.ask('Path: '));

    if (config.reportPath) {
      report = await UploadReport.open(config.reportPath, {
        rootPath,
        remoteFolder: config.upload.remoteRootPath,
      });
    }
    const activeReport = report;

    const synchronizer = new FolderSynchronizer({
      store,
      output,
      decisions: new ConsolePromptDecisionProvider(prompter, output),
      onOutcome: activeReport
        ? (file, outcome) => activeReport.record(file, outcome)
        : undefined,
    });

    try {
      await synchronizer.upload({ ...config.upload, rootPath });
    } catch (error) {
      if (error instanceof LocalPathNotFoundError) {
        output.writeLine(error.message);
        return 1;
      }
      throw error;
    }

    return 0;
  } finally {
    prompter.close();
    await report?.finish();
  }
}
