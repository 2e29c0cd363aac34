import { z } from 'zod';
import { join } from 'path';
import { homedir } from 'os';
import type { LLMConfig, LLMProvider } from './clients/llm.js';
import { STAGE_KINDS } from './types/index.js';
import { SessionValidationError } from './errors.js';
import type { StageKind, WorkflowKind } from './types/index.js';

export type BudgetTier = 'economy' | 'balanced' | 'premium';

type ModelTier = 'basic' | 'standard' | 'advanced';

export interface ModelChoice {
  provider: LLMProvider;
  model: string;
}

export type StageModelMap = Partial<Record<StageKind, ModelChoice>>;

export interface ApiKeys {
  gemini?: string;
  openai?: string;
  anthropic?: string;
  perplexity?: string;
}

export interface OrchestratorConfig {
  acceptanceThreshold: number;   // Review score (1-10) needed to accept a draft
  maxRevisionAttempts: number;   // Revisions after the first draft
  stageRetries: number;          // Extra attempts after a transient stage failure
  stageTimeoutMs: number;
  retryDelayMs: number;          // Base wait before a retry, doubled each attempt
  outputDir: string;
  uploadDir: string;
  budgetTier: BudgetTier;
  provider?: LLMProvider;
  apiKeys: ApiKeys;
  stageModels: StageModelMap;
}

export interface SessionOverrides {
  acceptanceThreshold?: number;
  maxRevisionAttempts?: number;
  budgetTier?: BudgetTier;
  stageModels?: StageModelMap;
}

export const DEFAULT_ACCEPTANCE_THRESHOLD = 7;
export const DEFAULT_MAX_REVISIONS = 2;
export const DEFAULT_STAGE_RETRIES = 2;

const budgetTierSchema = z.enum(['economy', 'balanced', 'premium']);

const envSchema = z.object({
  RESEARCH_ACCEPT_THRESHOLD: z.coerce.number().min(1).max(10).default(DEFAULT_ACCEPTANCE_THRESHOLD),
  RESEARCH_MAX_REVISIONS: z.coerce.number().int().min(0).max(10).default(DEFAULT_MAX_REVISIONS),
  RESEARCH_STAGE_RETRIES: z.coerce.number().int().min(0).max(5).default(DEFAULT_STAGE_RETRIES),
  RESEARCH_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  RESEARCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RESEARCH_OUTPUT_DIR: z.string().optional(),
  RESEARCH_UPLOAD_DIR: z.string().optional(),
  RESEARCH_BUDGET_TIER: budgetTierSchema.default('balanced'),
  RESEARCH_LLM_PROVIDER: z.enum(['gemini', 'openai', 'anthropic']).optional(),
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  PERPLEXITY_API_KEY: z.string().optional(),
});

// Model names per provider and capability tier
const PROVIDER_MODELS: Record<LLMProvider, Record<ModelTier, string>> = {
  gemini: { basic: 'gemini-2.5-flash-lite', standard: 'gemini-2.5-flash', advanced: 'gemini-2.5-pro' },
  openai: { basic: 'gpt-4.1-mini', standard: 'gpt-4.1', advanced: 'gpt-4.1' },
  anthropic: { basic: 'claude-3-5-haiku-latest', standard: 'claude-sonnet-4-0', advanced: 'claude-opus-4-1' },
};

// Which capability tier each LLM-backed stage gets under a budget (cite is deterministic)
const BUDGET_STAGE_TIERS: Record<BudgetTier, Partial<Record<StageKind, ModelTier>>> = {
  economy: {
    literature: 'basic', analysis: 'basic', synthesis: 'basic', outline: 'standard', draft: 'standard',
    review: 'standard', revise: 'basic',
  },
  balanced: {
    literature: 'basic', analysis: 'standard', synthesis: 'standard', outline: 'advanced', draft: 'advanced',
    review: 'advanced', revise: 'standard',
  },
  premium: {
    literature: 'standard', analysis: 'advanced', synthesis: 'advanced', outline: 'advanced', draft: 'advanced',
    review: 'advanced', revise: 'advanced',
  },
};

function pickProvider(keys: ApiKeys, preferred?: LLMProvider): LLMProvider | undefined {
  if (preferred && keys[preferred]) return preferred;
  const order: LLMProvider[] = ['gemini', 'openai', 'anthropic'];
  return order.find(p => Boolean(keys[p]));
}

export function stageModelsFor(tier: BudgetTier, provider: LLMProvider | undefined): StageModelMap {
  if (!provider) return {};
  const tiers = BUDGET_STAGE_TIERS[tier];
  const models: StageModelMap = {};
  for (const stage of STAGE_KINDS) {
    const modelTier = tiers[stage];
    if (modelTier) {
      models[stage] = { provider, model: PROVIDER_MODELS[provider][modelTier] };
    }
  }
  return models;
}

/**
 * Build the orchestrator configuration from an env record (the MCP host
 * passes env from its JSON config). Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined>, overrides?: Partial<OrchestratorConfig>): OrchestratorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.parse(present);

  const apiKeys: ApiKeys = {
    gemini: parsed.GEMINI_API_KEY,
    openai: parsed.OPENAI_API_KEY,
    anthropic: parsed.ANTHROPIC_API_KEY,
    perplexity: parsed.PERPLEXITY_API_KEY,
  };
  const provider = pickProvider(apiKeys, parsed.RESEARCH_LLM_PROVIDER);
  const outputDir = parsed.RESEARCH_OUTPUT_DIR ?? join(homedir(), 'research-sessions');

  const config: OrchestratorConfig = {
    acceptanceThreshold: parsed.RESEARCH_ACCEPT_THRESHOLD,
    maxRevisionAttempts: parsed.RESEARCH_MAX_REVISIONS,
    stageRetries: parsed.RESEARCH_STAGE_RETRIES,
    stageTimeoutMs: parsed.RESEARCH_STAGE_TIMEOUT_MS,
    retryDelayMs: parsed.RESEARCH_RETRY_DELAY_MS,
    outputDir,
    uploadDir: parsed.RESEARCH_UPLOAD_DIR ?? join(outputDir, 'uploads'),
    budgetTier: parsed.RESEARCH_BUDGET_TIER,
    provider,
    apiKeys,
    stageModels: stageModelsFor(parsed.RESEARCH_BUDGET_TIER, provider),
    ...overrides,
  };
  return Object.freeze(config);
}

/**
 * Apply the workflow preset and per-session overrides on top of the base config.
 * `simple` runs a single draft with no revision round.
 */
export function resolveSessionConfig(
  base: OrchestratorConfig,
  workflowKind: WorkflowKind,
  overrides?: SessionOverrides
): OrchestratorConfig {
  const budgetTier = overrides?.budgetTier ?? base.budgetTier;
  const stageModels = {
    ...(budgetTier === base.budgetTier ? base.stageModels : stageModelsFor(budgetTier, base.provider)),
    ...overrides?.stageModels,
  };

  const acceptanceThreshold = overrides?.acceptanceThreshold ?? base.acceptanceThreshold;
  const maxRevisionAttempts = overrides?.maxRevisionAttempts ??
    (workflowKind === 'simple' ? 0 : base.maxRevisionAttempts);

  if (acceptanceThreshold < 1 || acceptanceThreshold > 10) {
    throw new SessionValidationError(`acceptanceThreshold must be between 1 and 10, got ${acceptanceThreshold}`);
  }
  if (!Number.isInteger(maxRevisionAttempts) || maxRevisionAttempts < 0) {
    throw new SessionValidationError(`maxRevisionAttempts must be a non-negative integer, got ${maxRevisionAttempts}`);
  }

  return Object.freeze({ ...base, budgetTier, stageModels, acceptanceThreshold, maxRevisionAttempts });
}

/**
 * LLM settings for one stage, or null when no provider key is configured.
 */
export function llmConfigFor(config: OrchestratorConfig, stage: StageKind): LLMConfig | null {
  const choice = config.stageModels[stage];
  if (!choice) return null;
  const apiKey = config.apiKeys[choice.provider];
  if (!apiKey) return null;
  return {
    provider: choice.provider,
    model: choice.model,
    apiKey,
    timeout: config.stageTimeoutMs,
  };
}
