/**
 * OpenAI implementation of the completion seam.
 */

import OpenAI from 'openai';
import type { CompletionProvider, CompletionRequest, CompletionResult } from './types.js';
import { DEFAULT_MODEL } from '../config.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';

export interface OpenAIProviderOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Override for OpenAI-compatible endpoints */
  baseURL?: string;
}

function resolveApiKey(explicit?: string): string {
  const key = explicit ?? process.env.OPENAI_API_KEY;
  if (!key) {
    throw new Error('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell or .env file.');
  }
  return key;
}

export class OpenAIProvider implements CompletionProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(opts: OpenAIProviderOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? SAFE_DEFAULTS.completionTimeoutMs;
    this.client = new OpenAI({
      apiKey: resolveApiKey(opts.apiKey),
      baseURL: opts.baseURL,
      timeout: this.timeoutMs,
      maxRetries: 1,
    });
    this.model = opts.model ?? DEFAULT_MODEL;
  }

  async complete(req: CompletionRequest): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: req.system },
          ...req.messages.map((m) =>
            m.role === 'assistant'
              ? { role: 'assistant' as const, content: m.content }
              : { role: 'user' as const, content: m.content },
          ),
        ],
        temperature: req.temperature ?? 0.1,
        max_tokens: req.maxTokens ?? 1024,
      },
      { signal: req.signal, timeout: this.timeoutMs },
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty response.');
    }
    return { text: content, model: response.model || this.model };
  }
}
