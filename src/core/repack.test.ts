import assert from 'node:assert';
import { describe, it } from 'node:test';
import { KeyRegistry } from './registry.js';
import { mergeMappings, repack } from './repack.js';
import type { VarMapping } from './value/types.js';

function registryOf(...paths: string[][]): KeyRegistry {
    const registry = new KeyRegistry();
    for (const path of paths) registry.register(path);
    return registry;
}

describe('repack', () => {
    it('folds scalar duplicates into a list in source order', () => {
        const data: VarMapping = { a: 1, __dup_0: 2, __dup_1: 3, b: 'x' };
        assert.deepStrictEqual(repack(data, registryOf(['a'], ['a'])), { a: [1, 2, 3], b: 'x' });
    });

    it('keeps mixed shapes as a verbatim list', () => {
        const data: VarMapping = { k: 1, __dup_0: { __val__: 2, c: 'x' } };
        assert.deepStrictEqual(repack(data, registryOf(['k'])), { k: [1, { __val__: 2, c: 'x' }] });
    });

    it('merges duplicates that are all mappings into a one-element list', () => {
        const data: VarMapping = {
            k: { __val__: 1, c: 'x', only: true },
            __dup_0: { __val__: 2, c: 'y' },
        };
        assert.deepStrictEqual(repack(data, registryOf(['k'])), {
            k: [{ __val__: [1, 2], c: ['x', 'y'], only: true }],
        });
    });

    it('resolves duplicates below a synthetic key before folding it', () => {
        const data: VarMapping = {
            val2: {
                __val__: 2,
                val3: 3,
                __dup_0: { __val__: 4, val5: 5 },
                __dup_1: { __val__: 6, val5: 10, __dup_2: 11 },
                val5: 7,
            },
        };
        const registry = registryOf(['val2', 'val3'], ['val2', 'val3'], ['val2', '__dup_1', 'val5']);
        assert.deepStrictEqual(repack(data, registry), {
            val2: {
                __val__: 2,
                val3: [3, { __val__: 4, val5: 5 }, { __val__: 6, val5: [10, 11] }],
                val5: 7,
            },
        });
    });

    it('keeps a null first occurrence', () => {
        const data: VarMapping = { k: null, __dup_0: 1 };
        assert.deepStrictEqual(repack(data, registryOf(['k'])), { k: [null, 1] });
    });

    it('keeps the original key in place', () => {
        const data: VarMapping = { first: 0, k: 1, middle: 2, __dup_0: 3 };
        assert.deepStrictEqual(Object.keys(repack(data, registryOf(['k']))), ['first', 'k', 'middle']);
    });

    it('leaves data alone when the registry is empty', () => {
        const data: VarMapping = { a: { b: 1 } };
        assert.deepStrictEqual(repack(data, new KeyRegistry()), { a: { b: 1 } });
    });
});

describe('mergeMappings', () => {
    it('lists only fields seen more than once', () => {
        assert.deepStrictEqual(
            mergeMappings([{ a: 1, b: [1] }, { a: 2 }, { a: 3, c: null }]),
            { a: [1, 2, 3], b: [1], c: null }
        );
    });

    it('keeps fields named __proto__', () => {
        const merged = mergeMappings([JSON.parse('{"__proto__": 1}'), JSON.parse('{"__proto__": 2}')]);
        assert.deepStrictEqual(Object.keys(merged), ['__proto__']);
        assert.deepStrictEqual(Object.getOwnPropertyDescriptor(merged, '__proto__')?.value, [1, 2]);
    });
});
