import { z } from 'zod';
import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import type { Outline } from '../types/index.js';
import { askForJson, domainGuidance, formatPoints, requireModel } from './shared.js';

const outlineReplySchema = z.object({
  title: z.string().min(1),
  sections: z.array(z.object({
    heading: z.string().min(1),
    point_indices: z.array(z.number().int()).default([]),
  })).min(1),
});

/**
 * Drop point references the model invented; sections keep their order.
 */
export function normalizeOutline(reply: z.infer<typeof outlineReplySchema>, pointCount: number): Outline {
  return {
    title: reply.title.trim(),
    sections: reply.sections.map(s => ({
      heading: s.heading.trim(),
      pointIndices: [...new Set(s.point_indices)].filter(i => i >= 0 && i < pointCount),
    })),
  };
}

export function createOutlineProcessor(config: OrchestratorConfig): StageProcessor<'outline'> {
  return {
    kind: 'outline',
    reads: ['synthesis'],
    async invoke(context) {
      const synthesis = context.inputs.synthesis;
      if (!synthesis) {
        throw new StageFailureError('outline: synthesis output missing', 'permanent', 'outline');
      }

      const llm = requireModel(config, 'outline');
      const reply = await askForJson(`Plan the structure of a research report.

Goal: ${context.goal}
${domainGuidance(context.domain)}
ARGUMENTS (index, claim, source):
${formatPoints(synthesis.points)}

Group the arguments into sections in a logical order. Refer to arguments by index.
Respond with JSON only:
{"title": "report title", "sections": [{"heading": "section heading", "point_indices": [0, 2]}, ...]}`,
        llm, outlineReplySchema, 'outline', context);

      return { ok: true, payload: normalizeOutline(reply, synthesis.points.length) };
    },
  };
}
