import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { perplexitySearch } from '../services/perplexity.js';
import type { StageProcessor } from '../stage-runner.js';
import { askForJson, domainGuidance, requireModel } from './shared.js';

const literatureReplySchema = z.object({
  summary: z.string().min(1),
  sources: z.array(z.string()).default([]),
});

/**
 * Web search through Perplexity when a key is configured, otherwise the
 * stage model summarizes the literature it knows.
 */
export function createLiteratureProcessor(config: OrchestratorConfig): StageProcessor<'literature'> {
  return {
    kind: 'literature',
    reads: [],
    async invoke(context) {
      const query = `Find and summarize the published research relevant to this goal. Include key findings, disagreements and open questions.

Goal: ${context.goal}
${domainGuidance(context.domain)}`;

      if (config.apiKeys.perplexity) {
        const result = await perplexitySearch(query, config.apiKeys.perplexity, { signal: context.signal });
        return { ok: true, payload: { summary: result.content, sources: result.sources } };
      }

      const llm = requireModel(config, 'literature');
      const reply = await askForJson(`${query}
Respond with JSON only:
{"summary": "markdown summary of the literature", "sources": ["full reference or URL", ...]}`,
        llm, literatureReplySchema, 'literature', context);
      return { ok: true, payload: { summary: reply.summary, sources: reply.sources } };
    },
  };
}
