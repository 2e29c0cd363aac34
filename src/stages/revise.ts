import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import { askForJson, requireModel } from './shared.js';

const revisionReplySchema = z.object({
  feedback: z.string().min(1),
  focus: z.array(z.string()).default([]),
});

/**
 * Turns a review into concrete instructions for the next draft.
 */
export function createReviseProcessor(config: OrchestratorConfig): StageProcessor<'revise'> {
  return {
    kind: 'revise',
    reads: [],
    async invoke(context) {
      if (!context.review || !context.draft) {
        throw new StageFailureError('revise: review or draft missing', 'permanent', 'revise');
      }

      const llm = requireModel(config, 'revise');
      const reply = await askForJson(`An editor scored this draft ${context.review.score}/10.

REVIEW:
${context.review.feedback}

ISSUES:
${context.review.issues.map(i => `- ${i}`).join('\n') || '- (none listed)'}

DRAFT:
${context.draft}

Write revision instructions for the author: what to change, in priority order.
Respond with JSON only:
{"feedback": "instructions", "focus": ["highest priority change", ...]}`,
        llm, revisionReplySchema, 'revise', context);

      return { ok: true, payload: { feedback: reply.feedback, focus: reply.focus } };
    },
  };
}
