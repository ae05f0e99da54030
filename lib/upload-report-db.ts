import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import type { LocalFile, UploadOutcome } from '@/types/documents';
import type { ReportEntry, ReportRun, UploadReportData } from '@/types/upload-report';
import { createLogger } from '@/lib/logger';

const logger = createLogger('upload-report-db');

function defaultData(): UploadReportData {
  return { runs: [] };
}

export function toReportEntry(file: LocalFile, outcome: UploadOutcome): ReportEntry {
  const entry: ReportEntry = {
    localPath: file.path,
    outcome: outcome.status,
    recordedAt: new Date().toISOString(),
  };

  switch (outcome.status) {
    case 'uploaded':
      entry.remoteId = outcome.document.id;
      break;
    case 'skipped-by-policy':
      entry.remoteId = outcome.existing.id;
      break;
    case 'skipped-permanent-error':
    case 'skipped-after-retries-exhausted':
      entry.message = outcome.message;
      break;
    default:
      break;
  }

  return entry;
}

/**
 * JSON report of every run, appended to on each outcome.
 * Informational only: nothing reads it back to skip files.
 */
export class UploadReport {
  private constructor(
    private readonly db: Low<UploadReportData>,
    private readonly run: ReportRun
  ) {}

  static async open(
    filePath: string,
    { rootPath, remoteFolder }: { rootPath: string; remoteFolder?: string }
  ): Promise<UploadReport> {
    const reportPath = path.resolve(filePath);
    logger.info('Opening upload report', { reportPath });

    const db = new Low<UploadReportData>(
      new JSONFile<UploadReportData>(reportPath),
      defaultData()
    );
    await db.read();

    if (!Array.isArray(db.data.runs)) {
      logger.warn('Upload report has no runs list, starting a new one', { reportPath });
      db.data = defaultData();
    }

    const run: ReportRun = {
      startedAt: new Date().toISOString(),
      rootPath: path.resolve(rootPath),
      remoteFolder: remoteFolder || undefined,
      uploaded: 0,
      entries: [],
    };
    db.data.runs.push(run);
    await db.write();

    return new UploadReport(db, run);
  }

  get entries(): readonly ReportEntry[] {
    return this.run.entries;
  }

  async record(file: LocalFile, outcome: UploadOutcome): Promise<void> {
    this.run.entries.push(toReportEntry(file, outcome));
    if (outcome.status === 'uploaded') {
      this.run.uploaded++;
    }

    try {
      await this.db.write();
    } catch (error) {
      logger.error('Failed to write upload report', error, { localPath: file.path });
    }
  }

  async finish(): Promise<void> {
    this.run.finishedAt = new Date().toISOString();
    await this.db.write();
    logger.info('Upload report written', {
      entries: this.run.entries.length,
      uploaded: this.run.uploaded,
    });
  }
}
