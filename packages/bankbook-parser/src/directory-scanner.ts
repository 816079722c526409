import { readdir, stat } from 'fs/promises';
import { join, normalize } from 'path';
import { lineFileFormatOf, type LineFileFormat } from './line-file.js';

export interface LineFileInfo {
  filePath: string;
  fileName: string;
  format: LineFileFormat;
  sizeBytes: number;
}

export type SkipReason = 'not-a-line-file' | 'temporary' | 'empty';

export interface SkippedFile {
  fileName: string;
  reason: SkipReason;
}

export interface ScanResult {
  files: LineFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

export type DirectoryCheck = { valid: true; path: string } | { valid: false; error: string };

const SKIP_REASON_TEXT: Record<SkipReason, string> = {
  'not-a-line-file': 'not a .json or .txt line file',
  temporary: 'temporary or hidden file',
  empty: 'empty file',
};

export function describeSkipReason(reason: SkipReason): string {
  return SKIP_REASON_TEXT[reason];
}

function isTemporaryName(fileName: string): boolean {
  return fileName.startsWith('~$') || fileName.startsWith('.');
}

/**
 * Collect the OCR line files of one directory, one page per file.
 *
 * Regular files that cannot be read as pages are reported in `skipped`;
 * subdirectories are not descended into. Pages are ordered by name with
 * numeric runs compared as numbers, so `page-2` precedes `page-10`.
 */
export async function scanDirectoryForLineFiles(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const files: LineFileInfo[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const fileName = entry.name;
    const format = lineFileFormatOf(fileName);
    if (format === undefined) {
      skipped.push({ fileName, reason: 'not-a-line-file' });
      continue;
    }
    if (isTemporaryName(fileName)) {
      skipped.push({ fileName, reason: 'temporary' });
      continue;
    }

    const filePath = join(normalizedPath, fileName);
    const { size } = await stat(filePath);
    if (size === 0) {
      skipped.push({ fileName, reason: 'empty' });
      continue;
    }

    files.push({ filePath, fileName, format, sizeBytes: size });
  }

  const byName = (a: { fileName: string }, b: { fileName: string }): number =>
    a.fileName.localeCompare(b.fileName, undefined, { numeric: true });
  files.sort(byName);
  skipped.sort(byName);

  return { files, skipped, directoryPath: normalizedPath };
}

const OPEN_ERRORS: Record<string, string> = {
  ENOENT: 'No such directory',
  EACCES: 'Directory is not readable',
};

export async function validateDirectory(directoryPath: string): Promise<DirectoryCheck> {
  const normalizedPath = normalize(directoryPath);
  try {
    const info = await stat(normalizedPath);
    return info.isDirectory()
      ? { valid: true, path: normalizedPath }
      : { valid: false, error: `Not a directory: ${normalizedPath}` };
  } catch (error) {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
    return { valid: false, error: `${OPEN_ERRORS[code] ?? 'Cannot open directory'}: ${normalizedPath}` };
  }
}
