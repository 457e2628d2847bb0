import { describe, test } from 'node:test';
import assert from 'node:assert/strict';

import { convert } from '../src/rate_converter';
import { ResolutionCache, cacheKey } from '../src/resolution_cache';
import { resolve } from '../src/sequence_resolver';
import { cycleProtocol } from './helpers';

describe('ResolutionCache', () => {
    const protocol = cycleProtocol();
    const compute = (capacity: number) => () => convert(resolve(protocol), capacity);

    test('computes once per key', () => {
        const cache = new ResolutionCache(8);
        let calls = 0;
        const counted = () => {
            calls++;
            return compute(45)();
        };
        const a = cache.getOrCompute('fp', 45, counted);
        const b = cache.getOrCompute('fp', 45, counted);
        assert.equal(a, b);
        assert.equal(calls, 1);
        assert.deepEqual(cache.stats(), { hits: 1, misses: 1, size: 1 });
    });

    test('keys on capacity', () => {
        const cache = new ResolutionCache(8);
        cache.getOrCompute('fp', 45, compute(45));
        cache.getOrCompute('fp', 50, compute(50));
        assert.deepEqual(cache.stats(), { hits: 0, misses: 2, size: 2 });
        assert.equal(cacheKey('fp', undefined), 'fp:-');
        assert.equal(cacheKey('fp', 45), 'fp:45');
    });

    test('does not cache failures', () => {
        const cache = new ResolutionCache(8);
        assert.throws(() => cache.getOrCompute('fp', undefined, () => convert(resolve(protocol))));
        assert.equal(cache.stats().size, 0);
        cache.getOrCompute('fp', undefined, compute(45));
        assert.deepEqual(cache.stats(), { hits: 0, misses: 2, size: 1 });
    });

    test('evicts the least recently used entry', () => {
        const cache = new ResolutionCache(1);
        cache.getOrCompute('a', 45, compute(45));
        cache.getOrCompute('b', 45, compute(45));
        cache.getOrCompute('a', 45, compute(45));
        assert.deepEqual(cache.stats(), { hits: 0, misses: 3, size: 1 });
    });

    test('clear resets entries and counters', () => {
        const cache = new ResolutionCache(8);
        cache.getOrCompute('a', 45, compute(45));
        cache.clear();
        assert.deepEqual(cache.stats(), { hits: 0, misses: 0, size: 0 });
    });
});
