/**
 * Core types for the data pattern formatter.
 *
 * Data flows through four stages:
 *   - Read: a .txt or .csv file becomes an ordered list of lines
 *   - Suggest: an AI model (or the fallback generator) proposes a pattern
 *   - Apply: the pattern's capture groups are joined with `|` per line
 *   - Write: formatted lines are saved as .txt or .csv
 */

// ============================================================================
// LINES & PATTERNS
// ============================================================================

/** One element of the input sequence. Order is significant, duplicates allowed. */
export type Line = string;

/** A regular expression source with one or more capture groups. */
export type Pattern = string;

/** Captured groups of a pattern joined with `|`. */
export type FormattedLine = string;

/** Separator placed between captured groups in a formatted line */
export const FIELD_SEPARATOR = '|';

// ============================================================================
// DELIMITERS
// ============================================================================

/** Delimiters the fallback generator recognises, in detection priority order */
export type Delimiter = 'pipe' | 'comma' | 'tab' | 'semicolon' | 'whitespace';

export const DELIMITER_PRIORITY: readonly Exclude<Delimiter, 'whitespace'>[] = [
  'pipe',
  'comma',
  'tab',
  'semicolon',
];

// ============================================================================
// FILE FORMATS
// ============================================================================

export type FileFormat = 'txt' | 'csv';

// ============================================================================
// RESULTS
// ============================================================================

/** Where a suggested pattern came from */
export type SuggestionSource = 'ai' | 'fallback';

export interface PatternSuggestion {
  pattern: Pattern;
  source: SuggestionSource;
  /** Raw model output, when the AI answered */
  rawResponse?: string;
  /** Why the AI suggestion was not used */
  error?: string;
}

export interface FormatResult {
  lines: FormattedLine[];
  totalLines: number;
  matchedLines: number;
  skippedLines: number;
}
