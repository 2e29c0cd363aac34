import type { z } from 'zod';
import { callLLM } from '../clients/llm.js';
import type { LLMConfig } from '../clients/llm.js';
import { llmConfigFor } from '../config.js';
import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import { parseJsonReply } from '../json.js';
import type { StageContext } from '../stage-runner.js';
import type { DomainProfile, SourcedPoint, StageKind } from '../types/index.js';

export function requireModel(config: OrchestratorConfig, stage: StageKind): LLMConfig {
  const llm = llmConfigFor(config, stage);
  if (!llm) {
    throw new StageFailureError(
      `No model configured for ${stage} (set GEMINI_API_KEY, OPENAI_API_KEY or ANTHROPIC_API_KEY)`,
      'permanent',
      stage
    );
  }
  return llm;
}

/**
 * Call the stage's model and parse a JSON reply. An unusable reply is transient:
 * the same prompt usually parses on the next attempt.
 */
export async function askForJson<S extends z.ZodTypeAny>(
  prompt: string,
  llm: LLMConfig,
  schema: S,
  stage: StageKind,
  context: StageContext
): Promise<z.infer<S>> {
  const response = await callLLM(prompt, llm, { signal: context.signal });
  const parsed = parseJsonReply(response.content, schema);
  if (parsed === null) {
    throw new StageFailureError(`${stage}: model reply did not contain the expected JSON`, 'transient', stage);
  }
  return parsed;
}

export async function askForText(prompt: string, llm: LLMConfig, context: StageContext, minContentLength = 200): Promise<string> {
  const response = await callLLM(prompt, llm, { signal: context.signal, minContentLength });
  return response.content.trim();
}

export function domainGuidance(domain: DomainProfile | undefined): string {
  if (!domain) return '';
  return `
DOMAIN: ${domain.domain}
- Writing style: ${domain.writingStyle}
- Citations: ${domain.citationRequirements}
- Quality criteria: ${domain.qualityCriteria.join(', ')}
`;
}

export function formatPoints(points: readonly SourcedPoint[]): string {
  return points.map((p, i) => `[${i}] ${p.claim} (source: ${p.source})`).join('\n');
}
