import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../clients/llm.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../clients/llm.js')>()),
  callLLM: vi.fn(),
}));

import { callLLM } from '../clients/llm.js';
import type { LLMConfig } from '../clients/llm.js';
import { KeywordIntentClassifier, LLMIntentClassifier } from '../intent.js';

const llm: LLMConfig = { provider: 'gemini', model: 'test-model', apiKey: 'test-secret' };

describe('KeywordIntentClassifier', () => {
  const classifier = new KeywordIntentClassifier();

  it('flags research-question phrasing', async () => {
    expect(await classifier.classify('What drives churn in subscription apps?')).toEqual({
      literatureIntent: true,
      reason: 'research question phrasing (\\?)',
    });
    expect((await classifier.classify('Impact of remote work on office rents')).literatureIntent).toBe(true);
  });

  it('treats plain descriptive goals as data-only', async () => {
    expect(await classifier.classify('Summarize quarterly revenue by region')).toEqual({
      literatureIntent: false,
      reason: 'no research question phrasing',
    });
  });

  it('honors an explicit restriction to the data', async () => {
    expect(await classifier.classify('Describe the data and explain why sales dropped')).toEqual({
      literatureIntent: false,
      reason: 'goal restricts itself to the data',
    });
  });
});

describe('LLMIntentClassifier', () => {
  beforeEach(() => {
    vi.mocked(callLLM).mockReset();
  });

  it('uses the model verdict', async () => {
    vi.mocked(callLLM).mockResolvedValueOnce({
      model: 'test-model',
      content: '```json\n{"requires_literature": true, "reasoning": "needs prior studies"}\n```',
    });

    const signal = await new LLMIntentClassifier(llm).classify('Summarize quarterly revenue by region', '/data/q.csv');

    expect(signal).toEqual({ literatureIntent: true, reason: 'needs prior studies' });
  });

  it('falls back to keywords on an unusable reply', async () => {
    vi.mocked(callLLM).mockResolvedValueOnce({ model: 'test-model', content: 'Probably not.' });

    const signal = await new LLMIntentClassifier(llm).classify('Summarize quarterly revenue by region');

    expect(signal).toEqual({ literatureIntent: false, reason: 'no research question phrasing' });
  });

  it('falls back to keywords when the call fails', async () => {
    vi.mocked(callLLM).mockRejectedValueOnce(new Error('503 unavailable'));

    const signal = await new LLMIntentClassifier(llm).classify('Why did sales drop?');

    expect(signal.literatureIntent).toBe(true);
  });

  it('propagates the failure of a cancelled session', async () => {
    const controller = new AbortController();
    controller.abort();
    vi.mocked(callLLM).mockRejectedValueOnce(new Error('aborted'));

    await expect(new LLMIntentClassifier(llm).classify('Why?', undefined, controller.signal)).rejects.toThrow('aborted');
  });
});
