import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type OpenAI from 'openai';
import { CachedCompletionService, OpenAICompletionService, summaryCacheKey } from '../completion';
import { CollaboratorUnavailableError } from '../errors';
import { DB } from '../db';
import type { TextCompletionService } from '../types';

function makeClient(create: Mock) {
  return { chat: { completions: { create } } } as unknown as OpenAI;
}

describe('OpenAICompletionService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('sends the prompt as a single user message', async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: 'A short summary.' } }] });
    const service = new OpenAICompletionService('test-key', makeClient(create));

    expect(await service.complete('gpt-4o-mini', 'Summarize these')).toBe('A short summary.');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Summarize these' }],
      temperature: 0.3,
    });
  });

  it('returns an empty string when the model sends no content', async () => {
    const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: null } }] });
    const service = new OpenAICompletionService('test-key', makeClient(create));

    expect(await service.complete('gpt-4o-mini', 'Summarize these')).toBe('');
  });

  it('wraps API failures', async () => {
    const create = vi.fn().mockRejectedValue(new Error('rate limited'));
    const service = new OpenAICompletionService('test-key', makeClient(create));

    const error = await service.complete('gpt-4o-mini', 'Summarize these').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CollaboratorUnavailableError);
    expect(error).toMatchObject({
      collaborator: 'completion',
      message: 'Completion request failed: rate limited',
    });
  });
});

describe('summaryCacheKey', () => {
  it('depends on model and prompt', () => {
    const key = summaryCacheKey('gpt-4o-mini', 'prompt');
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(summaryCacheKey('gpt-4o-mini', 'prompt')).toBe(key);
    expect(summaryCacheKey('gpt-4o', 'prompt')).not.toBe(key);
    expect(summaryCacheKey('gpt-4o-mini', 'other prompt')).not.toBe(key);
  });
});

describe('CachedCompletionService', () => {
  let db: DB;
  let complete: Mock<TextCompletionService['complete']>;
  let service: CachedCompletionService;

  beforeEach(() => {
    db = new DB(':memory:');
    complete = vi.fn<TextCompletionService['complete']>().mockResolvedValue('Cached summary.');
    service = new CachedCompletionService({ complete }, db);
  });

  afterEach(() => {
    db.close();
  });

  it('calls the inner service once per model and prompt', async () => {
    expect(await service.complete('gpt-4o-mini', 'prompt')).toBe('Cached summary.');
    expect(await service.complete('gpt-4o-mini', 'prompt')).toBe('Cached summary.');
    expect(complete).toHaveBeenCalledTimes(1);

    await service.complete('gpt-4o', 'prompt');
    expect(complete).toHaveBeenCalledTimes(2);

    expect(db.getSummary(summaryCacheKey('gpt-4o-mini', 'prompt'))).toMatchObject({
      model: 'gpt-4o-mini',
      summary: 'Cached summary.',
    });
  });

  it('does not cache empty completions', async () => {
    complete.mockResolvedValue('  ');
    await service.complete('gpt-4o-mini', 'prompt');
    await service.complete('gpt-4o-mini', 'prompt');

    expect(complete).toHaveBeenCalledTimes(2);
    expect(db.getSummary(summaryCacheKey('gpt-4o-mini', 'prompt'))).toBeUndefined();
  });

  it('passes failures through without caching', async () => {
    complete.mockRejectedValueOnce(new Error('timeout'));

    await expect(service.complete('gpt-4o-mini', 'prompt')).rejects.toThrow('timeout');
    expect(await service.complete('gpt-4o-mini', 'prompt')).toBe('Cached summary.');
    expect(complete).toHaveBeenCalledTimes(2);
  });
});
