import { ApiError, GoogleGenAI, type CachedContent, type GenerateContentResponse } from '@google/genai';

export type ProviderName = 'vertex';
export type ProviderErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'RESOURCE_EXHAUSTED'
  | 'UNAVAILABLE'
  | 'NETWORK_ERROR'
  | 'EMPTY_RESPONSE';

const DEFAULT_TIMEOUT_MS = 60_000;
const CACHE_LIST_PAGE_SIZE = 100;

const providerStatusRetryable = (status: number): boolean =>
  status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;

const codeForStatus = (status: number): ProviderErrorCode | undefined => {
  if (status === 400) return 'INVALID_ARGUMENT';
  if (status === 403) return 'PERMISSION_DENIED';
  if (status === 404) return 'NOT_FOUND';
  if (status === 429) return 'RESOURCE_EXHAUSTED';
  if (status >= 500) return 'UNAVAILABLE';
  return undefined;
};

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  cachedTokens?: number;
  totalTokens?: number;
}

export interface GenerateTextParams {
  model: string;
  prompt: string;
  cachedContent?: string;
  systemInstruction?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface GenerateTextResult {
  text: string;
  usage?: ProviderUsage;
}

export interface CreateContextCacheParams {
  model: string;
  displayName: string;
  systemInstruction: string;
  documentUri: string;
  mimeType: string;
  ttlSeconds: number;
}

export interface ContextCacheRecord {
  name: string;
  displayName?: string;
  model?: string;
  expireTime?: string;
}

export interface LLMProvider {
  readonly name: ProviderName;
  generateText(input: GenerateTextParams): Promise<GenerateTextResult>;
}

export interface ContextCacheProvider {
  createContextCache(input: CreateContextCacheParams): Promise<ContextCacheRecord>;
  listContextCaches(): Promise<ContextCacheRecord[]>;
}

export class ProviderRequestError extends Error {
  readonly provider: ProviderName;
  readonly model: string;
  readonly status: number | null;
  readonly code?: ProviderErrorCode;
  readonly retryable: boolean;

  constructor(params: {
    message: string;
    provider: ProviderName;
    model: string;
    status: number | null;
    retryable: boolean;
    code?: ProviderErrorCode;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'ProviderRequestError';
    this.provider = params.provider;
    this.model = params.model;
    this.status = params.status;
    this.code = params.code;
    this.retryable = params.retryable;
  }
}

export const isInvalidArgumentError = (error: unknown): boolean =>
  error instanceof ProviderRequestError && error.code === 'INVALID_ARGUMENT';

export const isRetryableProviderError = (error: unknown): boolean =>
  error instanceof ProviderRequestError && error.retryable;

const toProviderRequestError = (error: unknown, provider: ProviderName, model: string, action: string): ProviderRequestError => {
  if (error instanceof ProviderRequestError) {
    return error;
  }

  if (error instanceof ApiError) {
    return new ProviderRequestError({
      provider,
      model,
      status: error.status,
      code: codeForStatus(error.status),
      retryable: providerStatusRetryable(error.status),
      message: error.message || `${provider} ${action} failed with status ${error.status}`,
      cause: error
    });
  }

  return new ProviderRequestError({
    provider,
    model,
    status: null,
    code: 'NETWORK_ERROR',
    retryable: true,
    message: error instanceof Error ? error.message : `${provider} ${action} failed before response`,
    cause: error
  });
};

const parseUsage = (usage: GenerateContentResponse['usageMetadata']): ProviderUsage | undefined => {
  if (!usage) return undefined;

  const parsed: ProviderUsage = {
    inputTokens: usage.promptTokenCount,
    outputTokens: usage.candidatesTokenCount,
    cachedTokens: usage.cachedContentTokenCount,
    totalTokens: usage.totalTokenCount
  };

  return Object.values(parsed).some((value) => value !== undefined) ? parsed : undefined;
};

// Only the first candidate is used; its text parts are concatenated.
export const parseCandidateText = (response: GenerateContentResponse): string | null => {
  const candidate = response.candidates?.[0];
  if (!candidate) return null;

  return (candidate.content?.parts ?? [])
    .map((part) => part.text)
    .filter((text): text is string => typeof text === 'string')
    .join('');
};

const toCacheRecord = (cache: CachedContent): ContextCacheRecord | null => {
  if (!cache.name) return null;
  return {
    name: cache.name,
    displayName: cache.displayName,
    model: cache.model,
    expireTime: cache.expireTime
  };
};

export interface VertexProviderConfig {
  project: string;
  location: string;
  timeoutMs?: number;
}

export class VertexProvider implements LLMProvider, ContextCacheProvider {
  readonly name: ProviderName = 'vertex';

  private readonly client: GoogleGenAI;
  private readonly timeoutMs: number;

  constructor(config: VertexProviderConfig) {
    if (!config.project.trim() || !config.location.trim()) {
      throw new Error('VertexProvider requires a non-empty project and location');
    }

    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new GoogleGenAI({
      vertexai: true,
      project: config.project,
      location: config.location
    });
  }

  async generateText(input: GenerateTextParams): Promise<GenerateTextResult> {
    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: input.model,
        contents: input.prompt,
        config: {
          cachedContent: input.cachedContent,
          systemInstruction: input.systemInstruction,
          temperature: input.temperature,
          maxOutputTokens: input.maxTokens,
          httpOptions: { timeout: input.timeoutMs ?? this.timeoutMs }
        }
      });
    } catch (error) {
      throw toProviderRequestError(error, this.name, input.model, 'generateContent');
    }

    const text = parseCandidateText(response);
    if (text === null || text.trim().length === 0) {
      const finishReason = response.candidates?.[0]?.finishReason;
      throw new ProviderRequestError({
        provider: this.name,
        model: input.model,
        status: null,
        code: 'EMPTY_RESPONSE',
        retryable: false,
        message:
          text === null
            ? `${this.name} returned no candidates`
            : `${this.name} returned a candidate without text${finishReason ? ` (finishReason: ${finishReason})` : ''}`
      });
    }

    return {
      text,
      usage: parseUsage(response.usageMetadata)
    };
  }

  async createContextCache(input: CreateContextCacheParams): Promise<ContextCacheRecord> {
    let created: CachedContent;
    try {
      created = await this.client.caches.create({
        model: input.model,
        config: {
          displayName: input.displayName,
          systemInstruction: input.systemInstruction,
          contents: [
            {
              role: 'user',
              parts: [{ fileData: { fileUri: input.documentUri, mimeType: input.mimeType } }]
            }
          ],
          ttl: `${input.ttlSeconds}s`
        }
      });
    } catch (error) {
      throw toProviderRequestError(error, this.name, input.model, 'caches.create');
    }

    const record = toCacheRecord(created);
    if (!record) {
      throw new ProviderRequestError({
        provider: this.name,
        model: input.model,
        status: null,
        code: 'EMPTY_RESPONSE',
        retryable: false,
        message: `${this.name} created a context cache without a resource name`
      });
    }

    return record;
  }

  async listContextCaches(): Promise<ContextCacheRecord[]> {
    const records: ContextCacheRecord[] = [];
    try {
      const pager = await this.client.caches.list({ config: { pageSize: CACHE_LIST_PAGE_SIZE } });
      for await (const cache of pager) {
        const record = toCacheRecord(cache);
        if (record) records.push(record);
      }
    } catch (error) {
      throw toProviderRequestError(error, this.name, '', 'caches.list');
    }

    return records;
  }
}
