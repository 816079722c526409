import { readFile } from 'fs/promises';
import { extname } from 'path';
import { z } from 'zod';

export type LineFileFormat = 'json' | 'text';

const FORMAT_BY_EXTENSION = new Map<string, LineFileFormat>([
  ['.json', 'json'],
  ['.txt', 'text'],
]);

/** Format of an OCR line file by extension, or undefined for anything else. */
export function lineFileFormatOf(fileName: string): LineFileFormat | undefined {
  return FORMAT_BY_EXTENSION.get(extname(fileName).toLowerCase());
}

const LineArraySchema = z.array(z.string());
const LineFileSchema = z.union([LineArraySchema, z.object({ lines: LineArraySchema })]);

/**
 * Parse OCR line file content. JSON content is either an array of strings or
 * an object with a `lines` array; anything else is read as one line per row.
 */
export function parseLineFileContent(content: string, format: LineFileFormat): string[] {
  if (format === 'text') {
    const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
    if (lines.at(-1) === '') lines.pop();
    return lines;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON line file: ${message}`);
  }

  const parsed = LineFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error('JSON line file must be an array of strings or an object with a "lines" array');
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.lines;
}

/** Files without a known extension are read as text. */
export async function readLineFile(
  filePath: string,
  format: LineFileFormat = lineFileFormatOf(filePath) ?? 'text'
): Promise<string[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseLineFileContent(content, format);
}
