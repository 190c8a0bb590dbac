import OpenAI from 'openai';
import { createHash } from 'crypto';
import type { DB } from './db';
import { CollaboratorUnavailableError, errorMessage } from './errors';
import type { TextCompletionService } from './types';

export class OpenAICompletionService implements TextCompletionService {
  private openai: OpenAI;

  constructor(apiKey: string, client?: OpenAI) {
    this.openai = client ?? new OpenAI({ apiKey });
  }

  async complete(model: string, prompt: string): Promise<string> {
    try {
      const response = await this.openai.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0.3,
      });
      return response.choices[0]?.message.content ?? '';
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      console.error('❌ OpenAI API Error:', errorMessage(error));
      throw new CollaboratorUnavailableError(
        `Completion request failed: ${errorMessage(error)}`,
        'completion',
        status,
        error instanceof Error ? error : undefined,
      );
    }
  }
}

export function summaryCacheKey(model: string, prompt: string): string {
  return createHash('sha256').update(model).update('\n').update(prompt).digest('hex');
}

// Caches non-empty completions, keyed by model and prompt
export class CachedCompletionService implements TextCompletionService {
  constructor(
    private readonly inner: TextCompletionService,
    private readonly db: DB,
  ) {}

  async complete(model: string, prompt: string): Promise<string> {
    const cacheKey = summaryCacheKey(model, prompt);
    const cached = this.db.getSummary(cacheKey);
    if (cached) {
      return cached.summary;
    }

    const text = await this.inner.complete(model, prompt);
    if (text.trim() !== '') {
      this.db.insertSummary({
        cache_key: cacheKey,
        model,
        summary: text,
        created_at: new Date().toISOString(),
      });
    }
    return text;
  }
}
