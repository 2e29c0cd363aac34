import { StageFailureError } from '../errors.js';
import type { StageProcessor } from '../stage-runner.js';
import type { AccumulatedOutputs, CitationList } from '../types/index.js';

const UNATTRIBUTED = new Set(['', 'unattributed', 'unknown', 'n/a']);

/**
 * Collect every source the report could rest on, ordered by where the draft
 * first mentions it; sources the draft never names follow in discovery order.
 */
export function buildCitationList(draft: string, inputs: Readonly<AccumulatedOutputs>): CitationList {
  const discovered: string[] = [];
  const seen = new Set<string>();
  const add = (source: string) => {
    const trimmed = source.trim();
    if (UNATTRIBUTED.has(trimmed.toLowerCase()) || seen.has(trimmed)) return;
    seen.add(trimmed);
    discovered.push(trimmed);
  };

  inputs.synthesis?.points.forEach(p => add(p.source));
  inputs.literature?.sources.forEach(add);
  inputs.analysis?.points.forEach(p => add(p.source));

  const position = (source: string) => {
    const index = draft.indexOf(source);
    return index === -1 ? Number.MAX_SAFE_INTEGER : index;
  };
  const references = discovered
    .map((source, order) => ({ source, order, at: position(source) }))
    .sort((a, b) => a.at - b.at || a.order - b.order)
    .map(entry => entry.source);

  const body = references.length > 0
    ? references.map((ref, i) => `${i + 1}. ${ref}`).join('\n')
    : 'No sources were cited.';
  return { references, markdown: `## References\n\n${body}\n` };
}

export function createCiteProcessor(): StageProcessor<'cite'> {
  return {
    kind: 'cite',
    reads: ['literature', 'analysis', 'synthesis'],
    async invoke(context) {
      if (context.draft === undefined) {
        throw new StageFailureError('cite: no selected draft', 'permanent', 'cite');
      }
      return { ok: true, payload: buildCitationList(context.draft, context.inputs) };
    },
  };
}
