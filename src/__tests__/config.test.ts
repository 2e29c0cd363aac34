import { describe, it, expect } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { llmConfigFor, loadConfig, resolveSessionConfig, stageModelsFor } from '../config.js';
import { SessionValidationError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.acceptanceThreshold).toBe(7);
    expect(config.maxRevisionAttempts).toBe(2);
    expect(config.stageRetries).toBe(2);
    expect(config.stageTimeoutMs).toBe(120000);
    expect(config.retryDelayMs).toBe(1000);
    expect(config.budgetTier).toBe('balanced');
    expect(config.outputDir).toBe(join(homedir(), 'research-sessions'));
    expect(config.uploadDir).toBe(join(homedir(), 'research-sessions', 'uploads'));
    expect(config.provider).toBeUndefined();
    expect(config.stageModels).toEqual({});
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ RESEARCH_ACCEPT_THRESHOLD: '', GEMINI_API_KEY: '  ' });

    expect(config.acceptanceThreshold).toBe(7);
    expect(config.provider).toBeUndefined();
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ RESEARCH_ACCEPT_THRESHOLD: '8.5', RESEARCH_MAX_REVISIONS: '4', RESEARCH_OUTPUT_DIR: '/srv/reports' });

    expect(config.acceptanceThreshold).toBe(8.5);
    expect(config.maxRevisionAttempts).toBe(4);
    expect(config.uploadDir).toBe(join('/srv/reports', 'uploads'));
  });

  it('rejects an out-of-range threshold', () => {
    expect(() => loadConfig({ RESEARCH_ACCEPT_THRESHOLD: '11' })).toThrow();
  });

  it('picks the first provider with a key unless one is preferred', () => {
    const env = { OPENAI_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' };

    expect(loadConfig(env).provider).toBe('openai');
    expect(loadConfig({ ...env, RESEARCH_LLM_PROVIDER: 'anthropic' }).provider).toBe('anthropic');
    // Preferred provider without a key falls back to the available ones
    expect(loadConfig({ ...env, RESEARCH_LLM_PROVIDER: 'gemini' }).provider).toBe('openai');
  });

  it('maps every model-backed stage for the budget tier', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret' });

    expect(config.stageModels.review).toEqual({ provider: 'anthropic', model: 'claude-opus-4-1' });
    expect(config.stageModels.literature).toEqual({ provider: 'anthropic', model: 'claude-3-5-haiku-latest' });
    expect(config.stageModels.cite).toBeUndefined();
  });
});

describe('stageModelsFor', () => {
  it('returns no models without a provider', () => {
    expect(stageModelsFor('premium', undefined)).toEqual({});
  });

  it('uses the premium tier for literature', () => {
    expect(stageModelsFor('premium', 'gemini').literature).toEqual({ provider: 'gemini', model: 'gemini-2.5-flash' });
  });
});

describe('resolveSessionConfig', () => {
  const base = loadConfig({ GEMINI_API_KEY: 'test-secret' });

  it('runs simple workflows without revisions', () => {
    expect(resolveSessionConfig(base, 'simple').maxRevisionAttempts).toBe(0);
    expect(resolveSessionConfig(base, 'enhanced').maxRevisionAttempts).toBe(2);
  });

  it('lets an explicit override win over the workflow preset', () => {
    expect(resolveSessionConfig(base, 'simple', { maxRevisionAttempts: 1 }).maxRevisionAttempts).toBe(1);
  });

  it('recomputes stage models when the budget tier changes', () => {
    const config = resolveSessionConfig(base, 'enhanced', { budgetTier: 'economy' });

    expect(config.budgetTier).toBe('economy');
    expect(config.stageModels.draft).toEqual({ provider: 'gemini', model: 'gemini-2.5-flash' });
    expect(base.stageModels.draft).toEqual({ provider: 'gemini', model: 'gemini-2.5-pro' });
  });

  it('validates overrides', () => {
    expect(() => resolveSessionConfig(base, 'enhanced', { acceptanceThreshold: 0 })).toThrow(SessionValidationError);
    expect(() => resolveSessionConfig(base, 'enhanced', { maxRevisionAttempts: 1.5 })).toThrow(
      'maxRevisionAttempts must be a non-negative integer, got 1.5'
    );
  });
});

describe('llmConfigFor', () => {
  it('builds the call settings for a stage', () => {
    const config = loadConfig({ GEMINI_API_KEY: 'test-secret', RESEARCH_STAGE_TIMEOUT_MS: '30000' });

    expect(llmConfigFor(config, 'draft')).toEqual({
      provider: 'gemini',
      model: 'gemini-2.5-pro',
      apiKey: 'test-secret',
      timeout: 30000,
    });
  });

  it('returns null for deterministic stages and missing keys', () => {
    expect(llmConfigFor(loadConfig({ GEMINI_API_KEY: 'test-secret' }), 'cite')).toBeNull();
    expect(llmConfigFor(loadConfig({}), 'draft')).toBeNull();
  });
});
