import { z } from 'zod';

export type LLMProvider = 'gemini' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 60000)
  maxOutputTokens?: number;  // Max output tokens (default: 8000)
  temperature?: number;  // Temperature for sampling (default: 0.3)
}

export interface LLMResponse {
  model: string;
  content: string;
}

export interface LLMCallOptions {
  /** Aborts the request when the session is cancelled */
  signal?: AbortSignal;
  /** Minimum content length to consider response valid (default: 10) */
  minContentLength?: number;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly transient: boolean,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
  })).optional(),
});

const openaiResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  extract: (data: unknown) => string;
}

function buildRequest(prompt: string, config: LLMConfig, maxOutputTokens: number, temperature: number): ProviderRequest {
  switch (config.provider) {
    case 'gemini':
      return {
        url: `https://generativelanguage.googleapis.com/v1beta/models/${config.model}:generateContent?key=${config.apiKey}`,
        headers: { 'Content-Type': 'application/json' },
        body: {
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: { temperature, maxOutputTokens },
        },
        extract: (data) => geminiResponseSchema.parse(data).candidates?.[0]?.content?.parts?.[0]?.text ?? '',
      };
    case 'openai':
      return {
        url: 'https://api.openai.com/v1/chat/completions',
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: {
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          max_completion_tokens: maxOutputTokens,
        },
        extract: (data) => openaiResponseSchema.parse(data).choices?.[0]?.message.content ?? '',
      };
    case 'anthropic':
      return {
        url: 'https://api.anthropic.com/v1/messages',
        headers: {
          'x-api-key': config.apiKey,
          'anthropic-version': '2023-06-01',
          'Content-Type': 'application/json',
        },
        body: {
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: maxOutputTokens,
          temperature,
        },
        extract: (data) => anthropicResponseSchema.parse(data).content?.find(block => block.type === 'text')?.text ?? '',
      };
  }
}

/**
 * Call a single LLM. Always throws LLMError on failure; `transient` tells the
 * caller whether the same prompt is worth sending again.
 */
export async function callLLM(
  prompt: string,
  config: LLMConfig,
  options?: LLMCallOptions
): Promise<LLMResponse> {
  const { signal, minContentLength = 10 } = options || {};
  const timeout = config.timeout || 60000;
  const maxOutputTokens = config.maxOutputTokens || 8000;
  const temperature = config.temperature ?? 0.3;
  const request = buildRequest(prompt, config, maxOutputTokens, temperature);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(new Error(`timed out after ${timeout}ms`)), timeout);
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new LLMError(
        `${config.provider} API error: ${response.status} ${response.statusText}`,
        config.model,
        RETRYABLE_STATUS.has(response.status),
        response.status
      );
    }

    const content = request.extract(await response.json());
    if (content.length < minContentLength) {
      throw new LLMError(
        `LLM call returned insufficient content (${content.length} chars, need ${minContentLength})`,
        config.model,
        true
      );
    }

    return { model: config.model, content };
  } catch (error) {
    if (error instanceof LLMError) {
      console.error(`[LLM] ${config.model} failed:`, error.message);
      throw error;
    }

    const message = error instanceof Error ? error.message : String(error);
    // Caller-initiated aborts are not retryable; our own timeout is.
    const cancelled = signal?.aborted === true;
    console.error(`[LLM] ${config.model} failed:`, message);
    throw new LLMError(`LLM call failed: ${message}`, config.model, !cancelled, undefined, error);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

