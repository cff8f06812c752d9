import assert from 'node:assert';
import { describe, it } from 'node:test';
import { PathAccessor } from './accessor.js';
import { IndexOutOfRangeError, KeyNotFoundError, UnsupportedSegmentError } from './errors.js';
import { val } from './path/ast.js';
import type { VarMapping } from './value/types.js';

function sample(): VarMapping {
    return {
        val1: 1,
        val2: {
            __val__: 2,
            val3: [3, { __val__: 4, val5: 5 }, { __val__: 6, val5: [10, 11] }],
            val5: 7,
        },
    };
}

describe('PathAccessor.get', () => {
    it('projects own values across a list of variants', () => {
        const accessor = new PathAccessor(sample());
        assert.deepStrictEqual(accessor.get(['val2', val('val3')]), [3, 4, 6]);
        assert.deepStrictEqual(accessor.get(['val2', 'val3[2]', val('val5')]), [10, 11]);
    });

    it('extracts the own value of one variant', () => {
        const accessor = new PathAccessor(sample());
        assert.strictEqual(accessor.get(['val2', val('val3[0]')]), 3);
        assert.strictEqual(accessor.get(['val2', val('val3[1]')]), 4);
        assert.strictEqual(accessor.get(['val2', val('val3[-1]')]), 6);
    });

    it('returns whole variants for indexed keys', () => {
        const accessor = new PathAccessor(sample());
        assert.deepStrictEqual(accessor.get(['val2', 'val3[1]']), { __val__: 4, val5: 5 });
        assert.strictEqual(accessor.get(['val2', 'val3[2]', 'val5[1]']), 11);
    });

    it('does not unwrap a single mapping on unindexed extraction', () => {
        const accessor = new PathAccessor(sample());
        assert.deepStrictEqual(accessor.get([val('val2')]), sample().val2);
        assert.strictEqual(accessor.get([val('val1')]), 1);
    });

    it('accepts explicit segment objects', () => {
        const accessor = new PathAccessor(sample());
        assert.strictEqual(accessor.get([{ kind: 'key', key: 'val2' }, { kind: 'key', key: 'val5' }]), 7);
        assert.strictEqual(accessor.get([{ kind: 'key', key: 'val2' }, { kind: 'index', key: 'val3', index: 0 }]), 3);
    });

    it('throws KeyNotFoundError for missing keys and scalar parents', () => {
        const accessor = new PathAccessor(sample());
        assert.throws(() => accessor.get(['missing']), KeyNotFoundError);
        assert.throws(() => accessor.get(['val1', 'x']), (e: unknown) => e instanceof KeyNotFoundError && e.key === 'x' && e.path === 'val1');
    });

    it('throws IndexOutOfRangeError past the end or on a non-sequence', () => {
        const accessor = new PathAccessor(sample());
        assert.throws(
            () => accessor.get(['val2', 'val3[3]']),
            (e: unknown) => e instanceof IndexOutOfRangeError && e.index === 3 && e.length === 3
        );
        assert.throws(
            () => accessor.get(['val2', 'val5[0]']),
            (e: unknown) => e instanceof IndexOutOfRangeError && e.length === undefined
        );
    });

    it('rejects segments of unknown shape', () => {
        const accessor = new PathAccessor(sample());
        assert.throws(() => accessor.get(JSON.parse('[{"kind":"slice","key":"val2"}]')), UnsupportedSegmentError);
        assert.throws(() => accessor.get(JSON.parse('[7]')), UnsupportedSegmentError);
    });

    it('hands out projected lists as copies', () => {
        const accessor = new PathAccessor(sample());
        const projected = accessor.get(['val2', val('val3')]);
        assert.ok(Array.isArray(projected));
        projected.push(99);
        assert.deepStrictEqual(accessor.get(['val2', val('val3')]), [3, 4, 6]);
    });

    it('memoizes reads per path', () => {
        const accessor = new PathAccessor(sample());
        const first = accessor.get(['val2', 'val3[1]']);
        assert.strictEqual(accessor.get([{ kind: 'key', key: 'val2' }, 'val3[1]']), first);
        assert.strictEqual(accessor.cacheSize, 1);
    });

    it('reports presence without throwing', () => {
        const accessor = new PathAccessor(sample());
        assert.strictEqual(accessor.has(['val1']), true);
        assert.strictEqual(accessor.has(['val2', 'val3[5]']), false);
        assert.strictEqual(accessor.has(['nope']), false);
    });
});

describe('PathAccessor.set', () => {
    it('writes the own value of one variant and keeps its children', () => {
        const data = sample();
        const accessor = new PathAccessor(data);
        accessor.set(['val2', val('val3[1]')], 40);
        assert.deepStrictEqual(accessor.get(['val2', 'val3[1]']), { __val__: 40, val5: 5 });
    });

    it('invalidates cached projections', () => {
        const accessor = new PathAccessor(sample());
        assert.deepStrictEqual(accessor.get(['val2', val('val3')]), [3, 4, 6]);
        accessor.set(['val2', val('val3[0]')], 4);
        assert.strictEqual(accessor.cacheSize, 0);
        assert.strictEqual(accessor.get(['val2', val('val3[0]')]), 4);
        assert.deepStrictEqual(accessor.get(['val2', val('val3')]), [4, 4, 6]);
    });

    it('updates the own-value slot through a plain key', () => {
        const data = sample();
        new PathAccessor(data).set(['val2'], 20);
        assert.deepStrictEqual(data.val2, {
            __val__: 20,
            val3: [3, { __val__: 4, val5: 5 }, { __val__: 6, val5: [10, 11] }],
            val5: 7,
        });
    });

    it('replaces plain values and creates missing keys', () => {
        const data = sample();
        const accessor = new PathAccessor(data);
        accessor.set(['val1'], 'one');
        accessor.set(['added'], true);
        accessor.set([val('val1')], 'uno');
        assert.strictEqual(data.val1, 'uno');
        assert.strictEqual(data.added, true);
    });

    it('replaces a whole element through an indexed key', () => {
        const data = sample();
        new PathAccessor(data).set(['val2', 'val3[1]'], { x: 1 });
        assert.deepStrictEqual(new PathAccessor(data).get(['val2', 'val3']), [3, { x: 1 }, { __val__: 6, val5: [10, 11] }]);
    });

    it('refuses to extract from a missing key or assign an empty path', () => {
        const accessor = new PathAccessor(sample());
        assert.throws(() => accessor.set([val('missing')], 1), KeyNotFoundError);
        assert.throws(() => accessor.set(['val1', 'x'], 1), KeyNotFoundError);
        assert.throws(() => accessor.set(['val2', val('val3[9]')], 1), IndexOutOfRangeError);
        assert.throws(() => accessor.set([], 1), UnsupportedSegmentError);
    });

    it('creates a key named __proto__ as an own entry', () => {
        const data: VarMapping = {};
        new PathAccessor(data).set(['__proto__'], 1);
        assert.deepStrictEqual(Object.keys(data), ['__proto__']);
        assert.strictEqual(Object.getPrototypeOf(data), Object.prototype);
    });
});
