/**
 * PatternSuggester - Asks the AI for a pattern and falls back to the
 * deterministic generator on any failure.
 */

import { Line, PatternSuggestion } from '../types';
import { errorMessage } from '../errors/FormatterError';
import { generateFallbackPattern } from '../core/FallbackPatternGenerator';
import { compilePattern } from '../core/PatternApplier';
import { TextGenerator } from './AIClient';
import { cleanPatternResponse } from './ResponseCleaner';

export interface PatternSuggesterConfig {
  /** Lines included in the prompt (default: 10) */
  sampleSize?: number;
  /** Log raw responses and failures */
  verbose?: boolean;
}

export function buildPatternPrompt(sampleData: Line[], formatHint: string, sampleSize = 10): string {
  return `Analyze the following data pattern and create a precise regex pattern to extract the required fields.

SAMPLE DATA:
${sampleData.slice(0, sampleSize).join('\n')}

EXPECTED OUTPUT FORMAT: ${formatHint}

INSTRUCTIONS:
1. Identify the separators, delimiters and structure of each line
2. Count how many fields the expected output format needs
3. Use one capture group () per field, in output order
4. Allow for varying field lengths and data types

Reply with ONLY the regex pattern: no explanation, no code block.

Regex Pattern:`;
}

export class PatternSuggester {
  private sampleSize: number;
  private verbose: boolean;

  /**
   * @param generator - AI text generator; null always uses the fallback
   */
  constructor(
    private generator: TextGenerator | null,
    config: PatternSuggesterConfig = {}
  ) {
    this.sampleSize = config.sampleSize ?? 10;
    this.verbose = config.verbose ?? false;
  }

  get aiEnabled(): boolean {
    return this.generator !== null;
  }

  async suggest(sampleData: Line[], formatHint: string): Promise<PatternSuggestion> {
    if (!this.generator) {
      return {
        pattern: generateFallbackPattern(sampleData, formatHint),
        source: 'fallback',
        error: 'AI suggestions are disabled',
      };
    }

    let rawResponse: string | undefined;
    try {
      rawResponse = await this.generator.generate(
        buildPatternPrompt(sampleData, formatHint, this.sampleSize)
      );
      if (this.verbose) {
        console.error(`Raw AI response: ${rawResponse}`);
      }
      const pattern = cleanPatternResponse(rawResponse);
      compilePattern(pattern);
      return { pattern, source: 'ai', rawResponse };
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`AI pattern suggestion failed (${message}), using fallback pattern`);
      return {
        pattern: generateFallbackPattern(sampleData, formatHint),
        source: 'fallback',
        rawResponse,
        error: message,
      };
    }
  }
}
