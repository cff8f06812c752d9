import assert from 'node:assert';
import { describe, it } from 'node:test';
import { VarDocument } from './document.js';
import { ParseError } from './errors.js';
import { val } from './path/ast.js';

const SHORT = [
    'val1: 1',
    'val2: 2',
    '    val3: 3',
    '    val3: 4',
    '        val5: 5',
].join('\n');

const FULL = `
    val1: 1
    val2: 2
        val3: 3
        val3: 4
            val5: 5
        val3 : 6
            val5: 10
            val5: 11
        val5: 7

`;

describe('VarDocument', () => {
    it('loads variants and own values', () => {
        const doc = VarDocument.load(SHORT);
        assert.deepStrictEqual(doc.get(['val2', val('val3')]), [3, 4]);
        assert.deepStrictEqual(doc.get(['val2', 'val3[1]']), { __val__: 4, val5: 5 });
        assert.strictEqual(doc.get(['val2', val('val3[0]')]), 3);
    });

    it('handles an indented document with nested duplicates', () => {
        const doc = VarDocument.load(FULL);
        assert.strictEqual(doc.get(['val1']), 1);
        assert.deepStrictEqual(doc.get(['val2', val('val3')]), [3, 4, 6]);
        assert.deepStrictEqual(doc.get(['val2', 'val3[2]', val('val5')]), [10, 11]);
        assert.strictEqual(doc.get(['val2', 'val3[2]', 'val5[1]']), 11);
        assert.strictEqual(doc.get(['val2', 'val5']), 7);
    });

    it('reflects writes in later reads', () => {
        const doc = VarDocument.load(FULL);
        assert.deepStrictEqual(doc.get(['val2', val('val3')]), [3, 4, 6]);
        doc.set(['val2', val('val3[0]')], 4);
        assert.strictEqual(doc.get(['val2', val('val3[0]')]), 4);
        assert.deepStrictEqual(doc.get(['val2', val('val3')]), [4, 4, 6]);
    });

    it('keeps children when writing an own value', () => {
        const doc = VarDocument.load(SHORT);
        doc.set(['val2', val('val3[1]')], 40);
        assert.deepStrictEqual(doc.get(['val2', 'val3[1]']), { __val__: 40, val5: 5 });
        assert.strictEqual(doc.dump(), SHORT.replace('val3: 4', 'val3: 40'));
    });

    it('dumps a document back to its source layout', () => {
        assert.strictEqual(VarDocument.load(SHORT).dump(), SHORT);
    });

    it('lists mixed-shape duplicates verbatim', () => {
        assert.deepStrictEqual(VarDocument.parse('k: 1\nk: 2\n    c: x'), { k: [1, { __val__: 2, c: 'x' }] });
    });

    it('merges duplicates that are all mappings', () => {
        assert.deepStrictEqual(
            VarDocument.parse('k:\n    a: 1\nk:\n    a: 2\n    b: 3'),
            { k: [{ a: [1, 2], b: 3 }] }
        );
    });

    it('drops comments and lines without a key', () => {
        assert.deepStrictEqual(VarDocument.parse('# note\na: 1\njunk line\nb: 2'), { a: 1, b: 2 });
    });

    it('loads empty text as an empty mapping', () => {
        assert.deepStrictEqual(VarDocument.parse(''), {});
    });

    it('reports decoder failures with the source line', () => {
        assert.throws(
            () => VarDocument.load('a: 1\nb: [unclosed'),
            (e: unknown) => e instanceof ParseError && e.line === 2
        );
    });

    it('answers presence queries', () => {
        const doc = VarDocument.load(SHORT);
        assert.strictEqual(doc.has(['val2', 'val3[1]', 'val5']), true);
        assert.strictEqual(doc.has(['val2', 'val3[5]']), false);
    });

    it('hands out an independent copy', () => {
        const doc = VarDocument.load(SHORT);
        const copy = doc.copy();
        copy.val1 = 'changed';
        assert.strictEqual(doc.get(['val1']), 1);
        assert.strictEqual(doc.data.val1, 1);
    });

    it('keeps a key named __proto__ as an ordinary key', () => {
        const data = VarDocument.parse('__proto__: 1\nb: 2');
        assert.deepStrictEqual(Object.keys(data), ['__proto__', 'b']);
        assert.strictEqual(Object.getPrototypeOf(data), Object.prototype);
        assert.strictEqual(new VarDocument(data).get(['__proto__']), 1);
    });
});
