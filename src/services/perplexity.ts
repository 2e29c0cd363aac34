/**
 * Perplexity Sonar API integration for literature discovery
 */
import { z } from 'zod';

export interface PerplexityResult {
  content: string;
  sources: string[];
  model: string;
}

export interface PerplexityOptions {
  signal?: AbortSignal;
  model?: string;
  maxTokens?: number;
}

const sonarResponseSchema = z.object({
  model: z.string().optional(),
  citations: z.array(z.string()).optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).optional(),
});

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export class PerplexityError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'PerplexityError';
  }

  get transient(): boolean {
    return this.status !== undefined && RETRYABLE_STATUS.has(this.status);
  }
}

export async function perplexitySearch(
  query: string,
  apiKey: string | undefined,
  options?: PerplexityOptions
): Promise<PerplexityResult> {
  if (!apiKey) {
    throw new PerplexityError('PERPLEXITY_API_KEY is required');
  }

  try {
    const response = await fetch('https://api.perplexity.ai/chat/completions', {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: options?.model ?? 'sonar',
        messages: [
          {
            role: 'system',
            content: 'You are a literature scout. Summarize published research on the topic and cite every source you rely on.',
          },
          {
            role: 'user',
            content: query,
          },
        ],
        temperature: 0.2,
        max_tokens: options?.maxTokens ?? 3000,
      }),
      signal: options?.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new PerplexityError(`Perplexity API error (${response.status}): ${errorText}`, response.status);
    }

    const data = sonarResponseSchema.parse(await response.json());

    return {
      content: data.choices?.[0]?.message.content || 'No response from Perplexity',
      sources: data.citations ?? [],
      model: data.model ?? 'sonar',
    };
  } catch (error) {
    console.error('[Perplexity] Error:', error instanceof Error ? error.message : error);
    throw error;
  }
}
