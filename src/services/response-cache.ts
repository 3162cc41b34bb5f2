import { LRUCache } from 'lru-cache';
import { logger } from '../middleware/logger.js';
import { trackCacheHit, trackCacheMiss } from '../middleware/metrics.js';

export interface CacheKeyFields {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ResponseCacheOptions {
  maxEntries: number;
  /** Zero disables expiry. */
  ttlMs: number;
}

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

/**
 * JSON with object keys sorted at every depth and `undefined` written as
 * null, so two equal values serialize identically whatever their key order.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(toCanonical(value));
}

function toCanonical(value: unknown): Json {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value.map(toCanonical);
  if (typeof value === 'object') {
    const out: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = toCanonical(Reflect.get(value, key));
    }
    return out;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

export class ResponseCache {
  private cache: LRUCache<string, string>;

  constructor(options: ResponseCacheOptions = { maxEntries: 1000, ttlMs: 0 }) {
    this.cache = new LRUCache<string, string>({
      max: options.maxEntries,
      ...(options.ttlMs > 0 ? { ttl: options.ttlMs } : {}),
    });
  }

  static key(fields: CacheKeyFields): string {
    return canonicalize({
      prompt: fields.prompt,
      system_prompt: fields.systemPrompt,
      temperature: fields.temperature,
      max_tokens: fields.maxTokens,
    });
  }

  get(key: string): string | undefined {
    const value = this.cache.get(key);
    if (value === undefined) {
      trackCacheMiss('response');
      return undefined;
    }
    trackCacheHit('response');
    logger.debug({ key: key.slice(0, 80) }, 'Response cache hit');
    return value;
  }

  set(key: string, text: string): void {
    this.cache.set(key, text);
    logger.debug({ key: key.slice(0, 80), size: this.cache.size }, 'Response cache set');
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
