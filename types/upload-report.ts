/**
 * Run report schema
 */

import type { UploadOutcomeStatus } from './documents';

/**
 * Outcome of a single local file
 */
export interface ReportEntry {
  localPath: string;
  outcome: UploadOutcomeStatus;
  remoteId?: string;
  message?: string;
  recordedAt: string; // ISO timestamp
}

/**
 * One invocation of the uploader
 */
export interface ReportRun {
  startedAt: string; // ISO timestamp
  finishedAt?: string; // ISO timestamp
  rootPath: string;
  remoteFolder?: string;
  uploaded: number;
  entries: ReportEntry[];
}

/**
 * Root structure for the report file
 */
export interface UploadReportData {
  runs: ReportRun[];
}
