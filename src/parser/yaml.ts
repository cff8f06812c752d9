import { parseDocument, stringify, LineCounter } from 'yaml';
import { ParseError } from '../core/errors.js';
import type { RewriteResult } from '../core/rewrite/rewriter.js';
import { isMapping, toVarValue, VarMapping, VarValue } from '../core/value/types.js';
import type { Location } from '../types/diagnostic.js';

export function stripBom(s: string): string {
    return s.charCodeAt(0) === 0xFEFF ? s.slice(1) : s;
}

/**
 * Maps an offset in the rewritten text to a position in the source text. The
 * column is only meaningful on lines the rewriter did not re-indent.
 */
function toSourceLocation(rewrite: Pick<RewriteResult, 'sourceLines'>, lineCounter: LineCounter, offset: number): Location {
    const pos = lineCounter.linePos(offset);
    const sourceLine = rewrite.sourceLines[pos.line - 1] ?? rewrite.sourceLines[rewrite.sourceLines.length - 1] ?? pos.line;
    return { line: sourceLine, col: pos.col, offset };
}

/**
 * Decodes the output of the duplicate-key rewriter with the YAML 1.2 core
 * schema. The rewritten text never repeats a sibling key, so `uniqueKeys`
 * stays on and any failure is reported as a `ParseError`.
 */
export function decodeRewritten(rewrite: Pick<RewriteResult, 'lines' | 'sourceLines'>): VarMapping {
    const text = rewrite.lines.join('\n');
    const lineCounter = new LineCounter();
    const doc = parseDocument(text, { lineCounter, uniqueKeys: true, prettyErrors: false });

    if (doc.errors.length > 0) {
        const error = doc.errors[0];
        throw new ParseError(error.message, toSourceLocation(rewrite, lineCounter, error.pos[0]));
    }

    const value = toVarValue(doc.toJS());
    if (value === undefined) {
        throw new ParseError('Document contains values that are not plain data');
    }
    if (value === null) {
        return {};
    }
    if (!isMapping(value)) {
        throw new ParseError('Document root must be a mapping');
    }
    return value;
}

/** Decodes a single YAML scalar or flow collection, as typed on a command line. */
export function decodeValue(text: string): VarValue {
    const doc = parseDocument(text, { prettyErrors: false });
    if (doc.errors.length > 0) {
        throw new ParseError(doc.errors[0].message);
    }
    const value = toVarValue(doc.toJS());
    if (value === undefined) {
        throw new ParseError(`Unsupported value: ${text}`);
    }
    return value;
}

/** One-line YAML text for a value, quoted when a plain scalar would decode differently. */
export function encodeInline(value: VarValue): string {
    return stringify(value, { collectionStyle: 'flow', lineWidth: 0, blockQuote: false }).trimEnd();
}
