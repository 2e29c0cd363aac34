import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import { askForJson, domainGuidance, formatPoints, requireModel } from './shared.js';

const synthesisReplySchema = z.object({
  points: z.array(z.object({
    claim: z.string().min(1),
    source: z.string().default('unattributed'),
  })).min(1),
});

/**
 * Merges whatever branches survived the join into one list of sourced claims.
 */
export function createSynthesisProcessor(config: OrchestratorConfig): StageProcessor<'synthesis'> {
  return {
    kind: 'synthesis',
    reads: ['literature', 'analysis'],
    async invoke(context) {
      const { literature, analysis } = context.inputs;
      if (!literature && !analysis) {
        throw new StageFailureError('synthesis: no branch output to work from', 'permanent', 'synthesis');
      }

      const sections: string[] = [];
      if (literature) {
        sections.push(`LITERATURE FINDINGS:\n${literature.summary}\n\nSOURCES:\n${literature.sources.join('\n') || '(none listed)'}`);
      }
      if (analysis) {
        sections.push(`DATA ANALYSIS:\n${analysis.summary}\n\nDATA FINDINGS:\n${formatPoints(analysis.points) || '(none)'}`);
      }

      const llm = requireModel(config, 'synthesis');
      const reply = await askForJson(`Synthesize the material below into the distinct arguments a report on this goal should make.
Every point must keep the source it came from (a URL, a reference, or the data file name).

Goal: ${context.goal}
${domainGuidance(context.domain)}
${sections.join('\n\n')}

Respond with JSON only:
{"points": [{"claim": "one argument", "source": "where it comes from"}, ...]}`,
        llm, synthesisReplySchema, 'synthesis', context);

      return { ok: true, payload: { points: reply.points } };
    },
  };
}
