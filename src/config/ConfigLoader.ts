/**
 * ConfigLoader - Resolve formatter settings from defaults, a YAML file,
 * environment variables and command-line overrides (later sources win).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { FormatterError, errorMessage } from '../errors/FormatterError';

export const DEFAULT_CONFIG_FILE = '.pattern-formatter.yml';

export interface AISettings {
  enabled: boolean;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface FormatterConfig {
  ai: AISettings;
  /** Lines sent to the model as samples */
  sampleSize: number;
  /** Formatted lines previewed after formatting */
  previewSize: number;
  /** File the settings were read from, if any */
  source?: string;
}

export interface ConfigOverrides {
  model?: string;
  aiEnabled?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Directory searched for the default config file */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export const DEFAULT_CONFIG: FormatterConfig = {
  ai: {
    enabled: true,
    apiKey: '',
    model: 'llama-3.3-70b-versatile',
    temperature: 0.1,
    maxTokens: 150,
    timeoutMs: 30000,
  },
  sampleSize: 10,
  previewSize: 10,
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<FormatterConfig> {
  const env = options.env ?? process.env;
  const config: FormatterConfig = { ...DEFAULT_CONFIG, ai: { ...DEFAULT_CONFIG.ai } };

  const filePath = options.configPath
    ? path.resolve(options.configPath)
    : path.join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  const content = await readConfigFile(filePath, options.configPath !== undefined);
  if (content !== null) {
    applyFileConfig(config, parseYaml(content, filePath), filePath);
    config.source = filePath;
  }

  const apiKey = env['GROQ_API_KEY'];
  if (apiKey) {
    config.ai.apiKey = apiKey;
  }
  const model = env['PATTERN_FORMATTER_MODEL'];
  if (model) {
    config.ai.model = model;
  }

  if (options.overrides?.model) {
    config.ai.model = options.overrides.model;
  }
  if (options.overrides?.aiEnabled === false) {
    config.ai.enabled = false;
  }

  return config;
}

async function readConfigFile(filePath: string, required: boolean): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new FormatterError(
      'ConfigError',
      `Cannot read config file ${filePath}: ${errorMessage(error)}`,
      error
    );
  }
}

function parseYaml(content: string, filePath: string): unknown {
  try {
    return yaml.load(content);
  } catch (error) {
    throw new FormatterError(
      'ConfigError',
      `Invalid YAML in ${filePath}: ${errorMessage(error)}`,
      error
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyFileConfig(config: FormatterConfig, raw: unknown, filePath: string): void {
  // An empty file parses to undefined
  if (raw === undefined || raw === null) return;
  if (!isRecord(raw)) {
    throw new FormatterError('ConfigError', `Config file ${filePath} must contain a mapping`);
  }

  const ai = raw['ai'];
  if (ai !== undefined) {
    if (!isRecord(ai)) {
      throw new FormatterError('ConfigError', `"ai" in ${filePath} must be a mapping`);
    }
    config.ai.enabled = readBoolean(ai, 'enabled', config.ai.enabled, filePath);
    config.ai.apiKey = readString(ai, 'apiKey', config.ai.apiKey, filePath);
    config.ai.model = readString(ai, 'model', config.ai.model, filePath);
    config.ai.temperature = readNumber(ai, 'temperature', config.ai.temperature, filePath);
    config.ai.maxTokens = readNumber(ai, 'maxTokens', config.ai.maxTokens, filePath);
    config.ai.timeoutMs = readNumber(ai, 'timeoutMs', config.ai.timeoutMs, filePath);
  }

  config.sampleSize = readNumber(raw, 'sampleSize', config.sampleSize, filePath);
  config.previewSize = readNumber(raw, 'previewSize', config.previewSize, filePath);
}

function readString(
  source: Record<string, unknown>,
  key: string,
  fallback: string,
  filePath: string
): string {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new FormatterError('ConfigError', `"${key}" in ${filePath} must be a string`);
  }
  return value;
}

function readNumber(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  filePath: string
): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new FormatterError('ConfigError', `"${key}" in ${filePath} must be a non-negative number`);
  }
  return value;
}

function readBoolean(
  source: Record<string, unknown>,
  key: string,
  fallback: boolean,
  filePath: string
): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new FormatterError('ConfigError', `"${key}" in ${filePath} must be true or false`);
  }
  return value;
}
