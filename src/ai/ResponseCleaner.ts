/**
 * Reduce a model's answer to the bare pattern it contains.
 */

import { Pattern } from '../types';
import { FormatterError } from '../errors/FormatterError';

const LABEL_PREFIX = /^(regex pattern|regex|pattern|answer|result)\s*:\s*/i;

/**
 * Keep the first line that is not blank, not a code fence and not a `#`
 * comment, minus any leading label such as `Regex:`.
 */
export function cleanPatternResponse(raw: string): Pattern {
  for (const rawLine of raw.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('```') || line.startsWith('#')) {
      continue;
    }
    const pattern = line.replace(LABEL_PREFIX, '').trim();
    if (pattern) {
      return pattern;
    }
  }
  throw new FormatterError('EmptyResponse', 'AI response did not contain a pattern');
}
