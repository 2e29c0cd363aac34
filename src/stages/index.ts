import type { OrchestratorConfig } from '../config.js';
import type { StageProcessors } from '../stage-runner.js';
import { createAnalysisProcessor } from './analysis.js';
import { createCiteProcessor } from './cite.js';
import { createDraftProcessor } from './draft.js';
import { createLiteratureProcessor } from './literature.js';
import { createOutlineProcessor } from './outline.js';
import { createReviewProcessor } from './review.js';
import { createReviseProcessor } from './revise.js';
import { createSynthesisProcessor } from './synthesis.js';

export function createDefaultProcessors(config: OrchestratorConfig): StageProcessors {
  return {
    literature: createLiteratureProcessor(config),
    analysis: createAnalysisProcessor(config),
    synthesis: createSynthesisProcessor(config),
    outline: createOutlineProcessor(config),
    draft: createDraftProcessor(config),
    review: createReviewProcessor(config),
    revise: createReviseProcessor(config),
    cite: createCiteProcessor(),
  };
}
