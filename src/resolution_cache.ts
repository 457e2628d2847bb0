/**
 * Resolution Cache
 *
 * Read-through LRU cache from (protocol fingerprint, capacity) to the
 * resolved and converted sequence. Failed computations are not cached.
 */

import { LRUCache } from 'lru-cache';

import { RESOLUTION_CACHE } from './config';
import { createLogger } from './logger';
import { ConvertedSequence } from './rate_converter';

const log = createLogger('resolution_cache');

export interface CacheStats {
    hits: number;
    misses: number;
    size: number;
}

export function cacheKey(fingerprint: string, capacity_mAh: number | undefined): string {
    return `${fingerprint}:${capacity_mAh === undefined ? '-' : String(capacity_mAh)}`;
}

export class ResolutionCache {
    private readonly cache: LRUCache<string, ConvertedSequence>;
    private hits = 0;
    private misses = 0;

    constructor(maxEntries: number = RESOLUTION_CACHE.MAX_ENTRIES) {
        this.cache = new LRUCache<string, ConvertedSequence>({ max: maxEntries });
    }

    /** Returns the cached sequence, computing it at most once per key. */
    getOrCompute(fingerprint: string, capacity_mAh: number | undefined, compute: () => ConvertedSequence): ConvertedSequence {
        const key = cacheKey(fingerprint, capacity_mAh);
        const cached = this.cache.get(key);
        if (cached) {
            this.hits++;
            log.debug('Cache hit', { key });
            return cached;
        }

        this.misses++;
        const value = compute();
        this.cache.set(key, value);
        log.debug('Cache miss, stored', { key, size: this.cache.size });
        return value;
    }

    clear(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
    }

    stats(): CacheStats {
        return { hits: this.hits, misses: this.misses, size: this.cache.size };
    }
}
