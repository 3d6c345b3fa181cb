import { serve } from '@hono/node-server';
import { VertexProvider, type ContextCacheProvider, type LLMProvider } from '@context-qa/providers';
import { createAnswerService } from './answer';
import { createApp } from './app';
import { loadConfig, type ApiConfig } from './config';
import { ContextCacheManager } from './context-cache';
import { loadPromptFiles } from './prompts';

export type ServerHandle = ReturnType<typeof serve>;

export interface StartServerOptions {
  env?: NodeJS.ProcessEnv;
  createProvider?: (config: ApiConfig) => LLMProvider & ContextCacheProvider;
  serve?: typeof serve;
}

const createVertexProvider = (config: ApiConfig): VertexProvider =>
  new VertexProvider({ project: config.projectId, location: config.location });

// Rejects before listening when config, prompt files or the context cache are unavailable.
export const startServer = async (options: StartServerOptions = {}): Promise<ServerHandle> => {
  console.info({ scope: 'bootstrap', message: 'Starting application...' });

  const config = loadConfig(options.env ?? process.env);
  const prompts = loadPromptFiles(config);
  const provider = (options.createProvider ?? createVertexProvider)(config);

  const cache = new ContextCacheManager(provider, {
    model: config.model,
    displayName: config.cacheName,
    systemInstruction: prompts.systemInstruction,
    documentUri: config.documentUri,
    documentMimeType: config.documentMimeType,
    ttlSeconds: config.cacheTtlSeconds
  });
  await cache.refresh();

  const answers = createAnswerService({
    provider,
    cache,
    promptTemplate: prompts.promptTemplate,
    cleanupModel: config.cleanupModel,
    retry: config.retry
  });

  const app = createApp({ answers, cache, corsOrigins: config.corsOrigins });
  const listen = options.serve ?? serve;

  return listen(
    {
      fetch: app.fetch,
      hostname: '0.0.0.0',
      port: config.port
    },
    (info) => {
      console.log(`API running on http://localhost:${info.port}`);
    }
  );
};
