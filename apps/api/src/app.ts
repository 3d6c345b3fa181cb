import { zValidator } from '@hono/zod-validator';
import { routes } from '@context-qa/core';
import { askRequestSchema, healthSchema, toAskFailure, type AskResponse } from '@context-qa/shared';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AnswerService } from './answer';
import type { ContextCacheManager } from './context-cache';

export interface AppDeps {
  answers: AnswerService;
  cache: Pick<ContextCacheManager, 'peek'>;
  corsOrigins?: string[];
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();
  const corsOrigins = deps.corsOrigins ?? [];

  app.use(
    '*',
    cors({
      origin: corsOrigins.length === 0 ? '*' : corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type']
    })
  );

  app.use('*', async (c, next) => {
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    c.header('Cache-Control', 'no-store');
    await next();
  });

  app.get(routes.root, (c) => {
    console.info({ scope: 'liveness', message: 'Received GET request.' });
    return c.text('OK', 200);
  });

  app.get(routes.health, (c) =>
    c.json(healthSchema.parse({ ok: true, service: 'api', cache: deps.cache.peek()?.cacheName ?? null }))
  );

  app.post(
    routes.root,
    zValidator('json', askRequestSchema, (result, c) => {
      if (!result.success) {
        const details = result.error.issues
          .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
          .join('; ');
        console.error({ scope: 'ask', message: 'Rejected POST body.', error: details });
        return c.json(toAskFailure(new Error(`Invalid request body: ${details}`)), 200);
      }
    }),
    async (c) => {
      const payload = c.req.valid('json');
      console.info({ scope: 'ask', message: 'Received POST request.', question: payload.question, messages: payload.messages.length });

      try {
        const answer = await deps.answers.answer(payload);
        console.info({ scope: 'ask', message: 'Processed answer.' });
        const body: AskResponse = { answer };
        return c.json(body, 200);
      } catch (error) {
        console.error({
          scope: 'ask',
          message: 'Error processing POST request.',
          error: error instanceof Error ? error.message : 'Unknown error',
          stack: error instanceof Error ? error.stack : undefined
        });
        return c.json(toAskFailure(error), 200);
      }
    }
  );

  // Malformed JSON surfaces here from the validator; the POST route still answers 200.
  app.onError((error, c) => {
    console.error({ scope: 'ask', error: error instanceof Error ? error.message : 'Unknown error' });
    if (c.req.method === 'POST') {
      return c.json(toAskFailure(error), 200);
    }
    return c.text('Internal Server Error', 500);
  });

  return app;
};
