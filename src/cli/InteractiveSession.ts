/**
 * InteractiveSession - The menu loop behind the CLI.
 *
 * Menu:
 *   1  Suggest a regex pattern for a file (AI, with fallback)
 *   2  Format a whole file with a regex pattern
 *   3  Exit
 *
 * Every error is reported and the loop continues.
 */

import { Line } from '../types';
import { isFormatterError, errorMessage } from '../errors/FormatterError';
import { PatternSuggester } from '../ai/PatternSuggester';
import { applyPattern, formatLines } from '../core/PatternApplier';
import { readDataFile } from '../io/FileReader';
import { writeDataFile } from '../io/FileWriter';
import { ensureOutputExtension } from '../io/FileFormat';
import { Prompter } from './Prompter';

export interface OutputSink {
  write(text: string): unknown;
}

export interface InteractiveSessionOptions {
  prompter: Prompter;
  suggester: PatternSuggester;
  output?: OutputSink;
  /** Formatted lines previewed after formatting (default: 10) */
  previewSize?: number;
  verbose?: boolean;
}

const SAMPLE_LINES = 5;
const TEST_LINES = 5;
const TEST_RESULTS_SHOWN = 3;
const RULE = '='.repeat(50);

export class InteractiveSession {
  private prompter: Prompter;
  private suggester: PatternSuggester;
  private output: OutputSink;
  private previewSize: number;
  private verbose: boolean;

  constructor(options: InteractiveSessionOptions) {
    this.prompter = options.prompter;
    this.suggester = options.suggester;
    this.output = options.output ?? process.stdout;
    this.previewSize = options.previewSize ?? 10;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Run the menu until the user exits or input ends.
   */
  async run(): Promise<void> {
    this.println('=== Data Pattern Identifier and Formatter ===');

    for (;;) {
      this.showMenu();
      const choice = await this.prompter.ask('\nEnter your choice (1/2/3): ');

      if (choice === null || choice === '3') {
        this.println('\nGoodbye!');
        return;
      }

      switch (choice) {
        case '1':
          await this.guard(() => this.suggestPattern());
          break;
        case '2':
          await this.guard(() => this.formatFile());
          break;
        default:
          this.println('Invalid choice. Please select 1, 2, or 3.');
      }
    }
  }

  /**
   * Menu option 1.
   */
  async suggestPattern(): Promise<void> {
    this.println('\nPATTERN RECOGNITION MODE');
    const lines = await this.askForData();
    if (!lines) return;

    this.println('\nSpecify your desired output format:');
    this.println('Examples:');
    this.println('  - [field1]|[field2]|[field3]|[field4]    (for 4 fields)');
    this.println('  - [name]|[email]|[phone]                (for 3 fields)');
    this.println('  - [id]|[data]                           (for 2 fields)');
    const formatHint = await this.askRequired(
      'Enter expected output format: ',
      'No output format specified.'
    );
    if (formatHint === null) return;

    if (this.suggester.aiEnabled) {
      this.println('\nAnalyzing data with AI...');
    }
    const suggestion = await this.suggester.suggest(lines, formatHint);

    if (suggestion.source === 'fallback') {
      this.println(`AI suggestion unavailable (${suggestion.error ?? 'unknown error'}); using fallback pattern.`);
    }
    this.println('\nSUGGESTED REGEX PATTERN:');
    this.println(`  ${suggestion.pattern}`);
    this.println('\nCopy this pattern to use in option 2 for formatting your data.');

    const test = await this.prompter.ask('\nTest this pattern with sample data? (y/n): ');
    if (test?.toLowerCase() !== 'y') return;

    const results = applyPattern(lines.slice(0, TEST_LINES), suggestion.pattern);
    if (results.length === 0) {
      this.println("Pattern didn't match sample data. May need adjustment.");
      return;
    }
    this.println('\nPattern test results:');
    results.slice(0, TEST_RESULTS_SHOWN).forEach((result, i) => {
      this.println(`  ${i + 1}: ${result}`);
    });
  }

  /**
   * Menu option 2.
   */
  async formatFile(): Promise<void> {
    this.println('\nDATA FORMATTING MODE');
    const lines = await this.askForData();
    if (!lines) return;

    this.println('\nEnter your regex pattern:');
    this.println('Examples:');
    this.println('  - ([^|]+)\\|([^|]+)\\|([^|]+)\\|([^|]+)  (4 pipe-separated fields)');
    this.println('  - ([^,]+),([^,]+),([^,]+)               (3 comma-separated fields)');
    this.println('  - (\\w+)\\s+(\\w+)\\s+(\\d+)              (word word number)');
    const pattern = await this.askRequired('Regex pattern: ', 'No pattern provided.');
    if (pattern === null) return;

    this.println(`\nProcessing all ${lines.length} lines...`);
    const result = formatLines(lines, pattern);

    if (result.matchedLines === 0) {
      this.println('No matches found with the provided pattern.');
      this.println('Check your regex pattern and try again.');
      return;
    }

    this.println(
      `Successfully formatted ${result.matchedLines} lines out of ${result.totalLines} total lines.`
    );
    const preview = result.lines.slice(0, this.previewSize);
    this.println(`\nPreview (showing first ${preview.length} of ${result.matchedLines} formatted lines):`);
    preview.forEach((line, i) => {
      this.println(`  ${i + 1}: ${line}`);
    });
    if (result.matchedLines > preview.length) {
      this.println(`  ... and ${result.matchedLines - preview.length} more lines`);
    }

    const answer = await this.askRequired(
      `\nEnter output file path to save all ${result.matchedLines} formatted lines: `,
      'No output file specified.'
    );
    if (answer === null) return;

    const output = ensureOutputExtension(answer);
    if (output.changed) {
      this.println(`Added .txt extension: ${output.path}`);
    }
    await writeDataFile(result.lines, output.path);
    this.println(`Saved ${result.matchedLines} formatted lines to: ${output.path}`);
  }

  private async askForData(): Promise<Line[] | null> {
    const inputPath = await this.askRequired(
      '\nEnter the path to your input file (txt or csv): ',
      'No input file specified.'
    );
    if (inputPath === null) return null;

    const lines = await readDataFile(inputPath);
    this.println(`Read ${lines.length} lines from file.`);
    if (lines.length === 0) {
      this.println('No data found in file.');
      return null;
    }

    this.println(`\nSample data (first ${Math.min(SAMPLE_LINES, lines.length)} lines):`);
    lines.slice(0, SAMPLE_LINES).forEach((line, i) => {
      this.println(`  ${i + 1}: ${line}`);
    });
    return lines;
  }

  /**
   * Ask a question whose answer may not be blank. Returns null (after
   * reporting `emptyMessage`) for a blank answer, or silently at end of input.
   */
  private async askRequired(question: string, emptyMessage: string): Promise<string | null> {
    const answer = await this.prompter.ask(question);
    if (answer === null) return null;
    if (!answer) {
      this.println(emptyMessage);
      return null;
    }
    return answer;
  }

  private async guard(action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.println(`Error: ${errorMessage(error)}`);
      if (!isFormatterError(error) || this.verbose) {
        console.error(error);
      }
    }
  }

  private showMenu(): void {
    this.println(`\n${RULE}`);
    this.println('Select an option:');
    this.println('1. Get Regex Pattern (analyze data and suggest a pattern)');
    this.println('2. Format Data (apply your regex pattern to a whole file)');
    this.println('3. Exit');
    this.println(RULE);
  }

  private println(text: string = ''): void {
    this.output.write(`${text}\n`);
  }
}
