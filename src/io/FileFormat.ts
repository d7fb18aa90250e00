/**
 * FileFormat - Maps file paths to the formats the formatter reads and writes.
 */

import * as path from 'path';
import { FileFormat } from '../types';
import { FormatterError } from '../errors/FormatterError';

const FORMAT_EXTENSIONS: Record<string, FileFormat> = {
  '.txt': 'txt',
  '.csv': 'csv',
};

export const SUPPORTED_EXTENSIONS = Object.keys(FORMAT_EXTENSIONS);

/**
 * Detect the format from a path's extension (case-insensitive).
 * Returns null for anything other than .txt or .csv.
 */
export function detectFileFormat(filePath: string): FileFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  return FORMAT_EXTENSIONS[ext] ?? null;
}

export function requireFileFormat(filePath: string, purpose: 'input' | 'output'): FileFormat {
  const format = detectFileFormat(filePath);
  if (!format) {
    throw new FormatterError(
      'UnsupportedFormat',
      `Unsupported ${purpose} format: ${filePath}. Please use .txt or .csv files.`
    );
  }
  return format;
}

/**
 * Append `.txt` to an output path without a supported extension.
 */
export function ensureOutputExtension(filePath: string): { path: string; changed: boolean } {
  const lower = filePath.toLowerCase();
  if (SUPPORTED_EXTENSIONS.some((ext) => lower.endsWith(ext))) {
    return { path: filePath, changed: false };
  }
  return { path: `${filePath}.txt`, changed: true };
}
