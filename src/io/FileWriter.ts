/**
 * FileWriter - Saves formatted lines as .txt (one per line) or .csv
 * (each line split on `|` into a row).
 */

import * as fs from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import { FIELD_SEPARATOR, FormattedLine } from '../types';
import { FormatterError, errorMessage } from '../errors/FormatterError';
import { requireFileFormat } from './FileFormat';

export async function writeDataFile(lines: FormattedLine[], outputPath: string): Promise<void> {
  const format = requireFileFormat(outputPath, 'output');
  const content = format === 'csv' ? serializeCsv(lines) : serializeText(lines);

  try {
    await fs.writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new FormatterError('WriteError', `Error saving output: ${errorMessage(error)}`, error);
  }
}

export function serializeText(lines: FormattedLine[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

export function serializeCsv(lines: FormattedLine[]): string {
  return stringify(
    lines.map((line) => line.split(FIELD_SEPARATOR)),
    { record_delimiter: 'windows' }
  );
}
