import { CLEANUP_INSTRUCTION, formatPrompt, retryWithBackoff, type PromptTemplate, type RetryOptions } from '@context-qa/core';
import {
  isInvalidArgumentError,
  isRetryableProviderError,
  type GenerateTextResult,
  type LLMProvider
} from '@context-qa/providers';
import type { AskRequest } from '@context-qa/shared';
import type { ContextCacheManager } from './context-cache';

export interface AnswerServiceDeps {
  provider: LLMProvider;
  cache: Pick<ContextCacheManager, 'current' | 'refresh'>;
  promptTemplate: PromptTemplate;
  cleanupModel: string;
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep' | 'random'>;
}

export interface AnswerService {
  answer(request: AskRequest): Promise<string>;
}

export const createAnswerService = (deps: AnswerServiceDeps): AnswerService => {
  const retryOptions = (scope: string): RetryOptions => ({
    ...deps.retry,
    shouldRetry: isRetryableProviderError,
    onRetry: ({ attempt, delayMs, error }) => {
      console.info({
        scope: 'retry',
        operation: scope,
        attempt,
        delayMs,
        error: error instanceof Error ? error.message : 'Unknown provider error'
      });
    }
  });

  const refreshAfterInvalidArgument = async (error: unknown): Promise<void> => {
    console.info({
      scope: 'context_cache',
      message: 'Generation rejected the request; refreshing the context cache.',
      error: error instanceof Error ? error.message : 'Unknown provider error'
    });

    try {
      await deps.cache.refresh();
    } catch (refreshError) {
      console.error({
        scope: 'context_cache',
        message: 'Context cache refresh failed.',
        error: refreshError instanceof Error ? refreshError.message : 'Unknown refresh error'
      });
    }
  };

  const generate = async (prompt: string): Promise<GenerateTextResult> => {
    const handle = deps.cache.current();

    try {
      return await retryWithBackoff(
        () =>
          deps.provider.generateText({
            model: handle.model,
            prompt,
            cachedContent: handle.cacheName
          }),
        retryOptions('generate')
      );
    } catch (error) {
      // The refreshed cache serves the next request; this one still fails.
      if (isInvalidArgumentError(error)) {
        await refreshAfterInvalidArgument(error);
      }
      throw error;
    }
  };

  const clean = async (answer: string): Promise<string> => {
    try {
      const result = await retryWithBackoff(
        () =>
          deps.provider.generateText({
            model: deps.cleanupModel,
            systemInstruction: CLEANUP_INSTRUCTION,
            prompt: answer
          }),
        retryOptions('cleanup')
      );

      const cleaned = result.text.trim();
      console.info({ scope: 'answer_cleanup', cleaned });
      return cleaned.length > 0 ? cleaned : answer;
    } catch (error) {
      console.error({
        scope: 'answer_cleanup',
        message: 'Error cleaning response; returning the original answer.',
        error: error instanceof Error ? error.message : 'Unknown cleanup error'
      });
      return answer;
    }
  };

  return {
    answer: async (request) => {
      const prompt = formatPrompt(deps.promptTemplate, request);
      const result = await generate(prompt);
      const raw = result.text.trim();
      if (raw.length === 0) {
        throw new Error('Model returned an empty answer');
      }
      console.info({ scope: 'ask', message: 'Generated answer.', answer: raw, usage: result.usage ?? null });
      return clean(raw);
    }
  };
};
