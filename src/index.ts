/**
 * data-pattern-formatter
 *
 * Suggest regex patterns for lines of text/CSV data (AI first, delimiter
 * detection as fallback) and reformat whole files with them.
 */

// Core types
export * from './types';
export { FormatterError, FormatterErrorKind, isFormatterError } from './errors/FormatterError';

// Core components
export {
  CATCH_ALL_PATTERN,
  countFields,
  detectDelimiter,
  buildDelimiterPattern,
  generateFallbackPattern,
} from './core/FallbackPatternGenerator';
export {
  applyPattern,
  compilePattern,
  countCaptureGroups,
  formatLine,
  formatLines,
} from './core/PatternApplier';

// File I/O
export { readDataFile, parseTextLines, parseCsvLines } from './io/FileReader';
export { writeDataFile, serializeText, serializeCsv } from './io/FileWriter';
export { detectFileFormat, ensureOutputExtension, SUPPORTED_EXTENSIONS } from './io/FileFormat';

// AI components
export { AIClient, AIClientConfig, AIStats, TextGenerator } from './ai/AIClient';
export { PatternSuggester, PatternSuggesterConfig, buildPatternPrompt } from './ai/PatternSuggester';
export { cleanPatternResponse } from './ai/ResponseCleaner';

// Configuration
export { loadConfig, FormatterConfig, LoadConfigOptions, DEFAULT_CONFIG } from './config/ConfigLoader';

// Interactive session
export { InteractiveSession, InteractiveSessionOptions, OutputSink } from './cli/InteractiveSession';
export { Prompter, ReadlinePrompter } from './cli/Prompter';
