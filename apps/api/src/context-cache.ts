import type { ContextCacheProvider, ContextCacheRecord } from '@context-qa/providers';

export interface ContextCacheSettings {
  model: string;
  displayName: string;
  systemInstruction: string;
  documentUri: string;
  documentMimeType: string;
  ttlSeconds: number;
}

export interface ContextCacheHandle {
  cacheName: string;
  model: string;
}

export class ContextCacheUnavailableError extends Error {
  constructor() {
    super('Context cache has not been initialised');
    this.name = 'ContextCacheUnavailableError';
  }
}

const isLive = (record: ContextCacheRecord, now: Date): boolean => {
  if (!record.expireTime) return true;
  const expiresAt = Date.parse(record.expireTime);
  return Number.isNaN(expiresAt) || expiresAt > now.getTime();
};

/**
 * Owns the handle to the remote context cache that generation requests run against.
 *
 * `refresh()` reuses a live cache carrying the configured display name, or creates a
 * new one from the system instructions and the storage document. Concurrent refreshes
 * share the same in-flight promise, so the handle has a single writer.
 */
export class ContextCacheManager {
  private readonly provider: ContextCacheProvider;
  private readonly settings: ContextCacheSettings;
  private readonly now: () => Date;
  private handle: ContextCacheHandle | null = null;
  private pending: Promise<ContextCacheHandle> | null = null;

  constructor(provider: ContextCacheProvider, settings: ContextCacheSettings, now: () => Date = () => new Date()) {
    this.provider = provider;
    this.settings = settings;
    this.now = now;
  }

  current(): ContextCacheHandle {
    if (!this.handle) {
      throw new ContextCacheUnavailableError();
    }
    return this.handle;
  }

  peek(): ContextCacheHandle | null {
    return this.handle;
  }

  refresh(): Promise<ContextCacheHandle> {
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.resolveHandle()
      .then((handle) => {
        this.handle = handle;
        return handle;
      })
      .finally(() => {
        this.pending = null;
      });

    return this.pending;
  }

  private async resolveHandle(): Promise<ContextCacheHandle> {
    let existing: ContextCacheRecord | null = null;
    try {
      existing = await this.findByDisplayName();
    } catch (error) {
      console.info({
        scope: 'context_cache',
        message: 'Context cache lookup failed; creating a new one.',
        error: error instanceof Error ? error.message : 'Unknown lookup error'
      });
    }

    if (existing) {
      console.info({ scope: 'context_cache', message: 'Found context cache.', cacheName: existing.name });
      // Generation has to name the model the cache was built for.
      return { cacheName: existing.name, model: existing.model ?? this.settings.model };
    }

    const created = await this.provider.createContextCache({
      model: this.settings.model,
      displayName: this.settings.displayName,
      systemInstruction: this.settings.systemInstruction,
      documentUri: this.settings.documentUri,
      mimeType: this.settings.documentMimeType,
      ttlSeconds: this.settings.ttlSeconds
    });

    console.info({
      scope: 'context_cache',
      message: 'Created context cache.',
      cacheName: created.name,
      documentUri: this.settings.documentUri,
      expireTime: created.expireTime ?? null
    });

    return { cacheName: created.name, model: created.model ?? this.settings.model };
  }

  private async findByDisplayName(): Promise<ContextCacheRecord | null> {
    const now = this.now();
    const records = await this.provider.listContextCaches();
    return records.find((record) => record.displayName === this.settings.displayName && isLive(record, now)) ?? null;
  }
}
