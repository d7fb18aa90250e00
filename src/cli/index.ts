#!/usr/bin/env node
/**
 * pattern-formatter CLI - Suggest regex patterns for delimited data and
 * reformat files with them.
 *
 * Starts the interactive menu; options only tune configuration.
 */

import { Command } from 'commander';
import { AIClient, AIStats } from '../ai/AIClient';
import { PatternSuggester } from '../ai/PatternSuggester';
import { loadConfig, FormatterConfig } from '../config/ConfigLoader';
import { InteractiveSession } from './InteractiveSession';
import { ReadlinePrompter } from './Prompter';

interface CliOptions {
  config?: string;
  model?: string;
  ai: boolean;
  verbose?: boolean;
}

/**
 * Build the AI client from configuration, or null when AI is unavailable.
 */
export function createAIClient(config: FormatterConfig): AIClient | null {
  if (!config.ai.enabled) {
    return null;
  }
  if (!config.ai.apiKey) {
    console.warn('GROQ_API_KEY is not set; pattern suggestions will use the fallback generator');
    return null;
  }
  return new AIClient({
    apiKey: config.ai.apiKey,
    model: config.ai.model,
    temperature: config.ai.temperature,
    maxTokens: config.ai.maxTokens,
    timeoutMs: config.ai.timeoutMs,
  });
}

export function formatAIStats(stats: AIStats): string {
  return `AI calls: ${stats.callCount}, tokens used: ${stats.totalTokensUsed} (model: ${stats.model})`;
}

const program = new Command();

program
  .name('pattern-formatter')
  .description('Identify regex patterns in text/CSV data and reformat files with them')
  .version('0.1.0')
  .option('-c, --config <file>', 'Config file (default: ./.pattern-formatter.yml)')
  .option('-m, --model <name>', 'AI model used for pattern suggestions')
  .option('--no-ai', 'Always use the fallback pattern generator')
  .option('--verbose', 'Verbose output')
  .action(async (options: CliOptions) => {
    const prompter = new ReadlinePrompter();
    try {
      const config = await loadConfig({
        configPath: options.config,
        overrides: { model: options.model, aiEnabled: options.ai },
      });

      if (options.verbose) {
        console.error(`Config: ${config.source ?? 'defaults'}`);
        console.error(`AI enabled: ${config.ai.enabled} (model: ${config.ai.model})`);
      }

      const aiClient = createAIClient(config);
      const suggester = new PatternSuggester(aiClient, {
        sampleSize: config.sampleSize,
        verbose: options.verbose,
      });
      const session = new InteractiveSession({
        prompter,
        suggester,
        previewSize: config.previewSize,
        verbose: options.verbose,
      });
      await session.run();

      if (options.verbose && aiClient) {
        console.error(formatAIStats(aiClient.getStats()));
      }
    } catch (error) {
      console.error('pattern-formatter failed:', error);
      process.exitCode = 1;
    } finally {
      prompter.close();
    }
  });

if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
