import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import { askForJson, domainGuidance, requireModel } from './shared.js';

const reviewReplySchema = z.object({
  score: z.coerce.number(),
  feedback: z.string().default(''),
  issues: z.array(z.string()).default([]),
});

/** Scores land on the 1-10 scale whatever the model returns. */
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 1;
  return Math.min(10, Math.max(1, Math.round(score * 10) / 10));
}

/**
 * The scoring oracle. The orchestrator trusts the score it returns.
 */
export function createReviewProcessor(config: OrchestratorConfig): StageProcessor<'review'> {
  return {
    kind: 'review',
    reads: ['synthesis', 'analysis'],
    async invoke(context) {
      if (!context.draft) {
        throw new StageFailureError('review: no draft to review', 'permanent', 'review');
      }
      const { analysis } = context.inputs;

      const llm = requireModel(config, 'review');
      const reply = await askForJson(`You are the chief reviewer for a demanding journal. Review this research report draft.

Goal: ${context.goal}
${domainGuidance(context.domain)}${analysis ? `\nAVAILABLE DATA ANALYSIS:\n${analysis.summary}\n` : ''}
DRAFT:
${context.draft}

Assess logical consistency, whether the evidence supports the conclusions, use of the available data,
attribution of claims and depth. Score 1-10 where 7 means ready to publish with minor edits.

Respond with JSON only:
{"score": 6, "feedback": "overall assessment", "issues": ["specific problem", ...]}`,
        llm, reviewReplySchema, 'review', context);

      return {
        ok: true,
        payload: { score: clampScore(reply.score), feedback: reply.feedback, issues: reply.issues },
      };
    },
  };
}
