/**
 * FallbackPatternGenerator - Builds a capture-group pattern without the AI.
 *
 * The first sample line decides the delimiter (pipe, comma, tab, semicolon,
 * in that order, else whitespace) and the format hint decides how many
 * fields to capture.
 */

import { DELIMITER_PRIORITY, Delimiter, Line, Pattern } from '../types';

/** Matches a whole line as a single field */
export const CATCH_ALL_PATTERN: Pattern = '(.*)';

const DELIMITER_CHARS: Record<Exclude<Delimiter, 'whitespace'>, string> = {
  pipe: '|',
  comma: ',',
  tab: '\t',
  semicolon: ';',
};

/**
 * Number of output fields implied by a hint such as `[name]|[email]|[phone]`.
 */
export function countFields(formatHint: string): number {
  return formatHint.includes('|') ? formatHint.split('|').length : 1;
}

export function detectDelimiter(line: Line): Delimiter {
  for (const delimiter of DELIMITER_PRIORITY) {
    if (line.includes(DELIMITER_CHARS[delimiter])) {
      return delimiter;
    }
  }
  return 'whitespace';
}

function delimiterParts(delimiter: Delimiter): { group: string; separator: string } {
  switch (delimiter) {
    case 'pipe':
      return { group: '([^|]+)', separator: '\\|' };
    case 'comma':
      return { group: '([^,]+)', separator: ',' };
    case 'tab':
      return { group: '([^\\t]+)', separator: '\\t' };
    case 'semicolon':
      return { group: '([^;]+)', separator: ';' };
    case 'whitespace':
      return { group: '(\\S+)', separator: '\\s+' };
  }
}

/**
 * Pattern with one group per field, each group excluding the delimiter.
 */
export function buildDelimiterPattern(delimiter: Delimiter, fieldCount: number): Pattern {
  const count = Math.max(1, Math.floor(fieldCount));
  const { group, separator } = delimiterParts(delimiter);
  return group + (separator + group).repeat(count - 1);
}

export function generateFallbackPattern(sampleData: Line[], formatHint: string): Pattern {
  const firstLine = sampleData[0];
  if (firstLine === undefined) {
    return CATCH_ALL_PATTERN;
  }
  return buildDelimiterPattern(detectDelimiter(firstLine), countFields(formatHint));
}
