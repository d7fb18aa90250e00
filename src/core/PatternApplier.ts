/**
 * PatternApplier - Runs a pattern over every line and joins the captured
 * groups with `|`.
 *
 * The pattern is compiled before any line is touched, so an invalid pattern
 * never yields partial output. Lines without a match are skipped.
 */

import { FIELD_SEPARATOR, FormatResult, FormattedLine, Line, Pattern } from '../types';
import { FormatterError, errorMessage } from '../errors/FormatterError';

export function compilePattern(pattern: Pattern): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new FormatterError('InvalidPattern', `Invalid regex pattern: ${errorMessage(error)}`, error);
  }
}

/**
 * Number of capture groups in a pattern.
 */
export function countCaptureGroups(pattern: Pattern): number {
  compilePattern(pattern);
  // An empty alternative always matches, exposing every group slot
  const match = new RegExp(`(?:${pattern})|`).exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Format a single line, or return null when the pattern finds no match.
 */
export function formatLine(regex: RegExp, line: Line): FormattedLine | null {
  const match = regex.exec(line);
  if (!match) {
    return null;
  }
  return match
    .slice(1)
    .map((group) => group ?? '')
    .join(FIELD_SEPARATOR);
}

export function applyPattern(lines: Line[], pattern: Pattern): FormattedLine[] {
  return formatLines(lines, pattern).lines;
}

export function formatLines(lines: Line[], pattern: Pattern): FormatResult {
  const regex = compilePattern(pattern);
  const formatted: FormattedLine[] = [];

  for (const line of lines) {
    const result = formatLine(regex, line);
    if (result !== null) {
      formatted.push(result);
    }
  }

  return {
    lines: formatted,
    totalLines: lines.length,
    matchedLines: formatted.length,
    skippedLines: lines.length - formatted.length,
  };
}
