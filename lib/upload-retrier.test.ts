import { describe, it, expect, beforeEach, vi } from 'vitest';
import { toLocalFile } from './format-policy';
import { MemoryOutput } from './output';
import { InMemoryDocumentStore } from './testing/in-memory-document-store';
import { attemptUpload, checkFormatPolicy } from './upload-retrier';

vi.mock('./logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('checkFormatPolicy', () => {
  it('should reject unsupported formats before the size', () => {
    expect(checkFormatPolicy(toLocalFile('/docs/photo.jpg', 50_000_000))).toEqual({
      status: 'skipped-unsupported-format',
    });
  });

  it('should reject files over the category ceiling', () => {
    expect(checkFormatPolicy(toLocalFile('/docs/sheet.csv', 1_000_001))).toEqual({
      status: 'skipped-oversize',
    });
  });

  it('should let supported files within the ceiling through', () => {
    expect(checkFormatPolicy(toLocalFile('/docs/slides.ppt', 9_000_000))).toBeNull();
  });
});

describe('attemptUpload', () => {
  let store: InMemoryDocumentStore;
  let output: MemoryOutput;
  const report = toLocalFile('/docs/report.docx', 100);

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    output = new MemoryOutput();
  });

  it('should upload on the first attempt with a single call', async () => {
    const outcome = await attemptUpload(report, null, 3, { store, output });

    expect(outcome).toEqual({
      status: 'uploaded',
      document: { id: 'doc-1', title: 'report', type: 'document', parentId: undefined },
    });
    expect(store.callsOf('upload')).toEqual([
      { op: 'upload', localPath: '/docs/report.docx', displayName: 'report', parentId: null },
    ]);
    expect(output.lines).toEqual([]);
  });

  it('should upload into the given folder', async () => {
    const target = store.addFolder('Reports');

    await attemptUpload(report, target, 3, { store, output });

    expect(store.documentsIn(target).map(document => document.title)).toEqual(['report']);
  });

  it('should retry transient failures immediately until the upload succeeds', async () => {
    store.failUploads('report.docx', 'transient', 'transient');

    const outcome = await attemptUpload(report, null, 3, { store, output });

    expect(outcome.status).toBe('uploaded');
    expect(store.callsOf('upload')).toHaveLength(3);
    expect(output.lines).toEqual([
      ' - Upload error: Connection reset',
      ' - Another try...',
      ' - Upload error: Connection reset',
      ' - Another try...',
    ]);
  });

  it('should give up after the last attempt', async () => {
    store.failUploads('report.docx', 'transient', 'transient', 'transient');

    const outcome = await attemptUpload(report, null, 3, { store, output });

    expect(outcome).toEqual({
      status: 'skipped-after-retries-exhausted',
      attempts: 3,
      message: 'Connection reset',
    });
    expect(store.callsOf('upload')).toHaveLength(3);
    expect(output.lines).toEqual([
      ' - Upload error: Connection reset',
      ' - Another try...',
      ' - Upload error: Connection reset',
      ' - Another try...',
      ' - Upload error: Connection reset',
      ' - Skipped',
    ]);
  });

  it('should make exactly one attempt when retries are disabled', async () => {
    store.failUploads('report.docx', 'transient');

    const outcome = await attemptUpload(report, null, 1, { store, output });

    expect(outcome).toEqual({
      status: 'skipped-after-retries-exhausted',
      attempts: 1,
      message: 'Connection reset',
    });
    expect(store.callsOf('upload')).toHaveLength(1);
    expect(output.lines).toEqual([' - Upload error: Connection reset', ' - Skipped']);
  });

  it('should still attempt once when given no attempts', async () => {
    await attemptUpload(report, null, 0, { store, output });

    expect(store.callsOf('upload')).toHaveLength(1);
  });

  it('should stop at a permanent error without printing', async () => {
    store.failUploads('report.docx', 'permanent');

    const outcome = await attemptUpload(report, null, 3, { store, output });

    expect(outcome).toEqual({ status: 'skipped-permanent-error', message: 'Invalid entry' });
    expect(store.callsOf('upload')).toHaveLength(1);
    expect(output.lines).toEqual([]);
  });

  it('should not call the store for an unsupported format', async () => {
    const outcome = await attemptUpload(toLocalFile('/docs/photo.jpg', 10), null, 3, {
      store,
      output,
    });

    expect(outcome).toEqual({ status: 'skipped-unsupported-format' });
    expect(store.calls).toEqual([]);
  });

  it('should not call the store for an oversize file', async () => {
    const outcome = await attemptUpload(toLocalFile('/docs/big.txt', 500_001), null, 3, {
      store,
      output,
    });

    expect(outcome).toEqual({ status: 'skipped-oversize' });
    expect(store.calls).toEqual([]);
  });
});
