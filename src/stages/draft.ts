import type { OrchestratorConfig } from '../config.js';
import { StageFailureError } from '../errors.js';
import type { StageContext, StageProcessor } from '../stage-runner.js';
import { askForText, domainGuidance, requireModel } from './shared.js';

function outlineText(context: StageContext): string {
  const { synthesis, outline } = context.inputs;
  if (!synthesis || !outline) return '';
  return outline.sections
    .map(section => {
      const points = section.pointIndices
        .map(i => synthesis.points[i])
        .filter(p => p !== undefined)
        .map(p => `  - ${p.claim} [${p.source}]`);
      return `## ${section.heading}\n${points.join('\n')}`;
    })
    .join('\n\n');
}

function revisionBrief(context: StageContext): string {
  if (!context.feedback || context.draft === undefined) return '';
  return `
This is revision attempt ${context.attempt}. Rewrite the previous draft and address the editor's feedback.

EDITOR FEEDBACK:
${context.feedback.feedback}

FOCUS ON:
${context.feedback.focus.map(f => `- ${f}`).join('\n')}

PREVIOUS DRAFT:
${context.draft}
`;
}

export function createDraftProcessor(config: OrchestratorConfig): StageProcessor<'draft'> {
  return {
    kind: 'draft',
    reads: ['synthesis', 'outline', 'analysis'],
    async invoke(context) {
      const { outline, analysis } = context.inputs;
      if (!outline) {
        throw new StageFailureError('draft: outline missing', 'permanent', 'draft');
      }

      const llm = requireModel(config, 'draft');
      const content = await askForText(`Write a research report in markdown.

Goal: ${context.goal}
Title: ${outline.title}
${domainGuidance(context.domain)}
OUTLINE (each bullet is an argument with its source in brackets):
${outlineText(context)}
${analysis ? `\nDATA SUMMARY:\n${analysis.summary}\n` : ''}
Rules:
- Start with "# ${outline.title}"
- Follow the outline's section order
- Attribute every claim to its bracketed source inline
- Do not add a reference list; it is generated separately
${revisionBrief(context)}`, llm, context);

      return { ok: true, payload: { content } };
    },
  };
}
