import { CLEANUP_INSTRUCTION, compilePromptTemplate } from '@context-qa/core';
import { ProviderRequestError, type GenerateTextParams, type GenerateTextResult, type LLMProvider } from '@context-qa/providers';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAnswerService } from '../answer';
import type { ContextCacheHandle } from '../context-cache';

const invalidArgument = () =>
  new ProviderRequestError({
    message: 'Cached content expired',
    provider: 'vertex',
    model: 'gemini-test',
    status: 400,
    code: 'INVALID_ARGUMENT',
    retryable: false
  });

const unavailable = () =>
  new ProviderRequestError({
    message: 'Backend error',
    provider: 'vertex',
    model: 'gemini-test',
    status: 503,
    code: 'UNAVAILABLE',
    retryable: true
  });

const setup = () => {
  const generateText = vi.fn<(input: GenerateTextParams) => Promise<GenerateTextResult>>();
  const provider: LLMProvider = { name: 'vertex', generateText };
  const handle: ContextCacheHandle = { cacheName: 'cachedContents/7', model: 'gemini-test' };
  const cache = {
    current: vi.fn(() => handle),
    refresh: vi.fn(async () => ({ cacheName: 'cachedContents/8', model: 'gemini-test' }))
  };
  const sleep = vi.fn(async (_ms: number) => undefined);

  const service = createAnswerService({
    provider,
    cache,
    promptTemplate: compilePromptTemplate('History: {messages}\nQuestion: {question}'),
    cleanupModel: 'gemini-cleanup-test',
    retry: { sleep, random: () => 0 }
  });

  return { service, generateText, cache, sleep };
};

describe('createAnswerService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('generates against the cache and cleans the answer', async () => {
    const { service, generateText } = setup();
    generateText
      .mockResolvedValueOnce({ text: '  **Open** 9-5 😀 \n' })
      .mockResolvedValueOnce({ text: ' Open 9-5. ' });

    const answer = await service.answer({ question: 'Hours?', messages: [{ role: 'user', content: 'hi' }] });

    expect(answer).toBe('Open 9-5.');
    expect(generateText).toHaveBeenNthCalledWith(1, {
      model: 'gemini-test',
      prompt: 'History: [{"role":"user","content":"hi"}]\nQuestion: Hours?',
      cachedContent: 'cachedContents/7'
    });
    expect(generateText).toHaveBeenNthCalledWith(2, {
      model: 'gemini-cleanup-test',
      systemInstruction: CLEANUP_INSTRUCTION,
      prompt: '**Open** 9-5 😀'
    });
  });

  it('retries transient generation failures', async () => {
    const { service, generateText, sleep } = setup();
    generateText
      .mockRejectedValueOnce(unavailable())
      .mockResolvedValueOnce({ text: 'answer' })
      .mockResolvedValueOnce({ text: 'cleaned answer' });

    await expect(service.answer({ question: 'q', messages: [] })).resolves.toBe('cleaned answer');
    expect(generateText).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured attempts', async () => {
    const { service, generateText } = setup();
    generateText.mockRejectedValue(unavailable());

    await expect(service.answer({ question: 'q', messages: [] })).rejects.toThrow('Backend error');
    expect(generateText).toHaveBeenCalledTimes(6);
  });

  it('refreshes the cache after an invalid-argument failure and still rejects', async () => {
    const { service, generateText, cache } = setup();
    generateText.mockRejectedValueOnce(invalidArgument());

    await expect(service.answer({ question: 'q', messages: [] })).rejects.toThrow('Cached content expired');
    expect(cache.refresh).toHaveBeenCalledTimes(1);
    expect(generateText).toHaveBeenCalledTimes(1);
  });

  it('rejects with the generation error when the refresh also fails', async () => {
    const { service, generateText, cache } = setup();
    generateText.mockRejectedValueOnce(invalidArgument());
    cache.refresh.mockRejectedValueOnce(new Error('create failed'));

    await expect(service.answer({ question: 'q', messages: [] })).rejects.toThrow('Cached content expired');
    expect(console.error).toHaveBeenCalledWith(
      expect.objectContaining({ scope: 'context_cache', error: 'create failed' })
    );
  });

  it('does not refresh the cache for other failures', async () => {
    const { service, generateText, cache } = setup();
    generateText.mockRejectedValueOnce(new Error('boom'));

    await expect(service.answer({ question: 'q', messages: [] })).rejects.toThrow('boom');
    expect(cache.refresh).not.toHaveBeenCalled();
  });

  it('rejects an empty answer without calling the cleanup model', async () => {
    const { service, generateText } = setup();
    generateText.mockResolvedValueOnce({ text: '  ' });

    await expect(service.answer({ question: 'q', messages: [] })).rejects.toThrow('Model returned an empty answer');
    expect(generateText).toHaveBeenCalledTimes(1);
  });

  it('returns the original answer when cleaning fails', async () => {
    const { service, generateText } = setup();
    generateText.mockResolvedValueOnce({ text: 'raw answer' }).mockRejectedValueOnce(invalidArgument());

    await expect(service.answer({ question: 'q', messages: [] })).resolves.toBe('raw answer');
  });

  it('returns the original answer when cleaning comes back empty', async () => {
    const { service, generateText } = setup();
    generateText.mockResolvedValueOnce({ text: 'raw answer' }).mockResolvedValueOnce({ text: '   ' });

    await expect(service.answer({ question: 'q', messages: [] })).resolves.toBe('raw answer');
  });
});
