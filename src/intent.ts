import { z } from 'zod';
import { callLLM } from './clients/llm.js';
import type { LLMConfig } from './clients/llm.js';
import { parseJsonReply } from './json.js';
import { errorMessage } from './errors.js';

export interface IntentSignal {
  /** The goal asks a research question that needs prior work, not just the data */
  literatureIntent: boolean;
  reason: string;
}

export interface IntentClassifier {
  classify(goal: string, dataFileRef?: string, signal?: AbortSignal): Promise<IntentSignal>;
}

const RESEARCH_QUESTION_PATTERNS: RegExp[] = [
  /\?/,
  /\bimpact of\b/i,
  /\beffects? of\b/i,
  /\binfluence\b/i,
  /\brelationship between\b/i,
  /\bcompared? (to|with)\b/i,
  /\bwhy\b/i,
  /\bhow (does|do|did|can|could)\b/i,
  /\bliterature\b/i,
  /\b(prior|previous|existing) (work|research|studies)\b/i,
  /\bevidence\b/i,
  /\btheor(y|ies)\b/i,
  /\bstate of the art\b/i,
];

const DATA_ONLY_PATTERNS: RegExp[] = [
  /\b(only|just) (the )?(data|dataset|file)\b/i,
  /\bdescribe (the|this) (data|dataset)\b/i,
];

/**
 * Regex heuristic: research-question phrasing means literature intent,
 * unless the goal explicitly restricts itself to the data.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  async classify(goal: string): Promise<IntentSignal> {
    if (DATA_ONLY_PATTERNS.some(p => p.test(goal))) {
      return { literatureIntent: false, reason: 'goal restricts itself to the data' };
    }
    const hit = RESEARCH_QUESTION_PATTERNS.find(p => p.test(goal));
    return hit
      ? { literatureIntent: true, reason: `research question phrasing (${hit.source})` }
      : { literatureIntent: false, reason: 'no research question phrasing' };
  }
}

const intentReplySchema = z.object({
  requires_literature: z.boolean(),
  reasoning: z.string().optional().default(''),
});

/**
 * Asks a model whether the goal needs a literature review on top of the data.
 * Any model failure or unusable reply falls back to the keyword heuristic.
 */
export class LLMIntentClassifier implements IntentClassifier {
  constructor(
    private readonly config: LLMConfig,
    private readonly fallback: IntentClassifier = new KeywordIntentClassifier()
  ) {}

  async classify(goal: string, dataFileRef?: string, signal?: AbortSignal): Promise<IntentSignal> {
    const prompt = `Classify this research request.

Goal: ${goal}
Data file: ${dataFileRef ?? 'none'}

Does answering the goal need a literature review (prior studies, published sources),
or can it be answered from the data file alone?

Respond with JSON only:
{"requires_literature": true/false, "reasoning": "one sentence"}`;

    try {
      const response = await callLLM(prompt, this.config, { signal, minContentLength: 2 });
      const reply = parseJsonReply(response.content, intentReplySchema);
      if (reply) {
        return { literatureIntent: reply.requires_literature, reason: reply.reasoning || 'model classification' };
      }
      console.error('[Intent] Unparseable classifier reply, using keyword heuristic');
    } catch (error) {
      if (signal?.aborted) throw error;
      console.error('[Intent] Classifier call failed, using keyword heuristic:', errorMessage(error));
    }
    return this.fallback.classify(goal, dataFileRef, signal);
  }
}
