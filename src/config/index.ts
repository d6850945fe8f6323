/**
 * Agent Configuration
 *
 * Centralized configuration loading from environment variables.
 * Use this module to access configuration throughout the application.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Environment configuration interface
 */
export interface AgentEnvConfig {
  // Model
  modelId: string;
  maxTokens: number;
  temperature: number;
  awsRegion?: string;

  // Agent
  maxSteps: number;
  maxMessages: number;
  duplicateThreshold: number;
  stream: boolean;
  promptDir?: string;

  // Logging
  logLevel: LogLevel;
}

export const DEFAULT_MODEL_ID = 'anthropic.claude-3-5-sonnet-20240620-v1:0';

/**
 * Parse a boolean from environment variable
 */
function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer from environment variable
 */
function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseFloat(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentEnvConfig {
  return {
    // Model
    modelId: env.LLM_MODEL || DEFAULT_MODEL_ID,
    maxTokens: parseInt(env.LLM_MAX_TOKENS, 4096),
    temperature: parseFloat(env.LLM_TEMPERATURE, 0),
    awsRegion: env.AWS_REGION || undefined,

    // Agent
    maxSteps: parseInt(env.AGENT_MAX_STEPS, 20),
    maxMessages: parseInt(env.AGENT_MAX_MESSAGES, 100),
    duplicateThreshold: parseInt(env.AGENT_DUPLICATE_THRESHOLD, 2),
    stream: parseBool(env.AGENT_STREAM, false),
    promptDir: env.AGENT_PROMPT_DIR || undefined,

    // Logging
    logLevel: parseLogLevel(env.AGENT_LOG_LEVEL),
  };
}

/**
 * Cached configuration instance
 */
let cachedConfig: AgentEnvConfig | null = null;

/**
 * Get configuration (loads once and caches)
 */
export function getConfig(): AgentEnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Whether messages at `level` should be logged under the configured level
 */
export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getConfig().logLevel);
}

/**
 * Validate required configuration
 */
export function validateConfig(config: AgentEnvConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.modelId) {
    errors.push('LLM_MODEL is required');
  }
  if (config.maxTokens < 1) {
    errors.push('LLM_MAX_TOKENS must be a positive integer');
  }
  if (config.temperature < 0 || config.temperature > 1) {
    errors.push('LLM_TEMPERATURE must be between 0 and 1');
  }
  if (config.maxSteps < 1) {
    errors.push('AGENT_MAX_STEPS must be a positive integer');
  }
  if (config.maxMessages < 1) {
    errors.push('AGENT_MAX_MESSAGES must be a positive integer');
  }
  if (config.duplicateThreshold < 1) {
    errors.push('AGENT_DUPLICATE_THRESHOLD must be a positive integer');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
