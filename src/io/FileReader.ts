/**
 * FileReader - Loads a .txt or .csv file into an ordered list of lines.
 *
 * - .txt: each line trimmed, blank lines dropped
 * - .csv: each non-empty row rejoined with `,`
 */

import * as fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { Line } from '../types';
import { FormatterError, errorMessage } from '../errors/FormatterError';
import { requireFileFormat } from './FileFormat';

const BOM = '\uFEFF';

export async function readDataFile(filePath: string): Promise<Line[]> {
  const format = requireFileFormat(filePath, 'input');

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new FormatterError('FileNotFound', `File not found: ${filePath}`, error);
    }
    throw new FormatterError('ReadError', `Error reading file: ${errorMessage(error)}`, error);
  }

  if (content.startsWith(BOM)) {
    content = content.slice(BOM.length);
  }

  try {
    return format === 'csv' ? parseCsvLines(content) : parseTextLines(content);
  } catch (error) {
    throw new FormatterError('ReadError', `Error reading file: ${errorMessage(error)}`, error);
  }
}

export function parseTextLines(content: string): Line[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function parseCsvLines(content: string): Line[] {
  const rows: string[][] = parse(content, {
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  return rows.filter((row) => row.some((field) => field !== '')).map((row) => row.join(','));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
