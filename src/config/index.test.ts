import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_MODEL_ID, getConfig, loadConfig, resetConfig, shouldLog, validateConfig } from './index.js';

describe('config', () => {
  afterEach(() => {
    delete process.env.AGENT_LOG_LEVEL;
    resetConfig();
  });

  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      modelId: DEFAULT_MODEL_ID,
      maxTokens: 4096,
      temperature: 0,
      awsRegion: undefined,
      maxSteps: 20,
      maxMessages: 100,
      duplicateThreshold: 2,
      stream: false,
      promptDir: undefined,
      logLevel: 'info',
    });
  });

  it('parses environment values', () => {
    const config = loadConfig({
      LLM_MODEL: 'test-model',
      LLM_MAX_TOKENS: '1024',
      LLM_TEMPERATURE: '0.3',
      AWS_REGION: 'us-west-2',
      AGENT_MAX_STEPS: '5',
      AGENT_MAX_MESSAGES: '40',
      AGENT_DUPLICATE_THRESHOLD: '3',
      AGENT_STREAM: 'TRUE',
      AGENT_PROMPT_DIR: './prompts',
      AGENT_LOG_LEVEL: 'Debug',
    });

    expect(config).toEqual({
      modelId: 'test-model',
      maxTokens: 1024,
      temperature: 0.3,
      awsRegion: 'us-west-2',
      maxSteps: 5,
      maxMessages: 40,
      duplicateThreshold: 3,
      stream: true,
      promptDir: './prompts',
      logLevel: 'debug',
    });
  });

  it('falls back on unparseable values', () => {
    const config = loadConfig({ LLM_MAX_TOKENS: 'lots', AGENT_STREAM: '1', AGENT_LOG_LEVEL: 'loud' });
    expect(config.maxTokens).toBe(4096);
    expect(config.stream).toBe(true);
    expect(config.logLevel).toBe('info');
  });

  it('caches until reset', () => {
    process.env.AGENT_LOG_LEVEL = 'error';
    expect(getConfig().logLevel).toBe('error');
    process.env.AGENT_LOG_LEVEL = 'debug';
    expect(getConfig().logLevel).toBe('error');
    resetConfig();
    expect(getConfig().logLevel).toBe('debug');
  });

  it('gates log levels', () => {
    process.env.AGENT_LOG_LEVEL = 'warn';
    expect(shouldLog('debug')).toBe(false);
    expect(shouldLog('info')).toBe(false);
    expect(shouldLog('warn')).toBe(true);
    expect(shouldLog('error')).toBe(true);
  });

  it('validates ranges', () => {
    expect(validateConfig(loadConfig({}))).toEqual({ valid: true, errors: [] });
    expect(validateConfig(loadConfig({ LLM_TEMPERATURE: '1.5', AGENT_MAX_STEPS: '0' }))).toEqual({
      valid: false,
      errors: ['LLM_TEMPERATURE must be between 0 and 1', 'AGENT_MAX_STEPS must be a positive integer'],
    });
  });
});
