/**
 * translation.service.ts
 * Pluggable text translation with an in-memory cache in front of it
 */

import NodeCache from 'node-cache';
import config from '../config/config';
import logger from '../utils/logger';

export interface TextTranslator {
  translate(text: string): Promise<string>;
}

/**
 * Returns text unchanged. Used when no translation backend is configured.
 */
export class PassthroughTranslator implements TextTranslator {
  async translate(text: string): Promise<string> {
    return text;
  }
}

/**
 * Least-recently-used cache over a translation backend.
 * Key order in the cache tracks recency: a hit is re-inserted at the end,
 * and the first key is evicted when the cache is full.
 */
export class CachedTranslator implements TextTranslator {
  private readonly cache: NodeCache;

  constructor(
    private readonly backend: TextTranslator,
    private readonly maxEntries: number = config.TRANSLATION_CACHE_SIZE
  ) {
    this.cache = new NodeCache({ stdTTL: 0, maxKeys: maxEntries, useClones: false });
  }

  /**
   * Translate through the backend, falling back to the original text on failure.
   * Failures are not cached so a later call can retry.
   */
  async translate(text: string): Promise<string> {
    if (!text) {
      return '';
    }

    const cached = this.cache.get<string>(text);
    if (cached !== undefined) {
      this.cache.del(text);
      this.cache.set(text, cached);
      return cached;
    }

    let translated: string;
    try {
      translated = await this.backend.translate(text);
    } catch (error) {
      logger.warn('Translation failed, using original text', error);
      return text;
    }

    if (this.maxEntries <= 0) {
      return translated;
    }
    // maxKeys makes set() throw on a full cache
    while (this.size >= this.maxEntries) {
      this.cache.del(this.cache.keys()[0]);
    }
    this.cache.set(text, translated);
    return translated;
  }

  get size(): number {
    return this.cache.keys().length;
  }
}

export default new CachedTranslator(new PassthroughTranslator());
