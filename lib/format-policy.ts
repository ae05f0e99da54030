import path from 'path';
import type { DocumentCategory, LocalFile } from '@/types/documents';

/**
 * Extensions Google Drive can convert into native documents
 */
export const SUPPORTED_FORMATS = [
  'csv',
  'doc',
  'docx',
  'html',
  'htm',
  'ods',
  'odt',
  'pdf',
  'ppt',
  'pps',
  'rtf',
  'sxw',
  'tsv',
  'tab',
  'txt',
  'xls',
  'xlsx',
] as const;

const CATEGORY_BY_EXTENSION: Record<string, DocumentCategory> = {
  doc: 'document',
  docx: 'document',
  htm: 'document',
  html: 'document',
  rtf: 'document',
  sxw: 'document',
  txt: 'document',
  odt: 'document',

  csv: 'spreadsheet',
  ods: 'spreadsheet',
  tab: 'spreadsheet',
  tsb: 'spreadsheet',
  tsv: 'spreadsheet',
  xls: 'spreadsheet',
  xlsx: 'spreadsheet',

  pps: 'presentation',
  ppt: 'presentation',

  pdf: 'pdf',
};

// Size ceilings in bytes; categories without an entry are unbounded
export const SIZE_LIMITS: Partial<Record<DocumentCategory, number>> = {
  document: 500_000,
  spreadsheet: 1_000_000,
  presentation: 10_000_000,
  pdf: 10_000_000,
};

const SOURCE_MIME_TYPES: Record<string, string> = {
  csv: 'text/csv',
  doc: 'application/msword',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  html: 'text/html',
  htm: 'text/html',
  ods: 'application/vnd.oasis.opendocument.spreadsheet',
  odt: 'application/vnd.oasis.opendocument.text',
  pdf: 'application/pdf',
  ppt: 'application/vnd.ms-powerpoint',
  pps: 'application/vnd.ms-powerpoint',
  rtf: 'application/rtf',
  sxw: 'application/vnd.sun.xml.writer',
  tsv: 'text/tab-separated-values',
  tab: 'text/tab-separated-values',
  txt: 'text/plain',
  xls: 'application/vnd.ms-excel',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export const GOOGLE_MIME_TYPES = {
  folder: 'application/vnd.google-apps.folder',
  document: 'application/vnd.google-apps.document',
  spreadsheet: 'application/vnd.google-apps.spreadsheet',
  presentation: 'application/vnd.google-apps.presentation',
} as const;

const SUPPORTED = new Set<string>(SUPPORTED_FORMATS);

/**
 * Build a LocalFile snapshot from a path and its size
 */
export function toLocalFile(filePath: string, size: number): LocalFile {
  const absolutePath = path.resolve(filePath);
  const name = path.basename(absolutePath);
  const dot = name.lastIndexOf('.');

  return {
    path: absolutePath,
    name,
    baseName: dot === -1 ? name : name.slice(0, dot),
    extension: dot === -1 ? '' : name.slice(dot + 1).toLowerCase(),
    size,
  };
}

export function isSupportedFormat(file: Pick<LocalFile, 'extension'>): boolean {
  return SUPPORTED.has(file.extension.toLowerCase());
}

export function classify(file: Pick<LocalFile, 'extension'>): DocumentCategory {
  const extension = file.extension.toLowerCase();
  return Object.hasOwn(CATEGORY_BY_EXTENSION, extension)
    ? CATEGORY_BY_EXTENSION[extension]
    : 'other';
}

export function isWithinSizeLimit(
  file: Pick<LocalFile, 'extension' | 'size'>
): boolean {
  const limit = SIZE_LIMITS[classify(file)];
  return limit === undefined || file.size <= limit;
}

/**
 * MIME type a local file is sent with
 */
export function sourceMimeType(extension: string): string {
  const key = extension.toLowerCase();
  return Object.hasOwn(SOURCE_MIME_TYPES, key)
    ? SOURCE_MIME_TYPES[key]
    : 'application/octet-stream';
}

/**
 * MIME type Drive stores a category as once converted.
 * Returns undefined for categories that are stored as-is.
 */
export function remoteMimeType(category: DocumentCategory): string | undefined {
  switch (category) {
    case 'document':
      return GOOGLE_MIME_TYPES.document;
    case 'spreadsheet':
      return GOOGLE_MIME_TYPES.spreadsheet;
    case 'presentation':
      return GOOGLE_MIME_TYPES.presentation;
    case 'pdf':
      return 'application/pdf';
    case 'other':
      return undefined;
  }
}

export function categoryOfMimeType(mimeType: string): DocumentCategory {
  switch (mimeType) {
    case GOOGLE_MIME_TYPES.document:
      return 'document';
    case GOOGLE_MIME_TYPES.spreadsheet:
      return 'spreadsheet';
    case GOOGLE_MIME_TYPES.presentation:
      return 'presentation';
    case 'application/pdf':
      return 'pdf';
    default:
      return 'other';
  }
}

export function describeSupportedFormats(): string {
  return SUPPORTED_FORMATS.join(', ');
}
