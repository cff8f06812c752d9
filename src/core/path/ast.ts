import { Range } from './tokenizer.js';

export type KeySegment = { kind: 'key'; key: string };
export type IndexSegment = { kind: 'index'; key: string; index: number };
export type ValueSegment = { kind: 'value'; target: KeySegment | IndexSegment };

export type Segment = KeySegment | IndexSegment | ValueSegment;

/** What accessor methods accept: segments, or strings of the form `key` / `key[2]`. */
export type PathInput = string | Segment;
export type PathLike = readonly PathInput[];

export interface PathError {
    message: string;
    range: Range;
}

export interface PathResult {
    ok: boolean;
    errors: PathError[];
    segments?: Segment[];
}

const INDEXED = /^(.*)\[(-?\d+)\]$/;

export function keyRef(text: string): KeySegment | IndexSegment {
    const match = INDEXED.exec(text);
    if (match) {
        return { kind: 'index', key: match[1], index: Number(match[2]) };
    }
    return { kind: 'key', key: text };
}

/** Value-extraction segment: `val('task')`, `val('task[1]')`. */
export function val(target: string | KeySegment | IndexSegment): ValueSegment {
    return { kind: 'value', target: typeof target === 'string' ? keyRef(target) : target };
}

export function isSegment(input: unknown): input is Segment {
    if (typeof input !== 'object' || input === null || !('kind' in input)) return false;
    switch (input.kind) {
        case 'key':
            return 'key' in input && typeof input.key === 'string';
        case 'index':
            return 'key' in input && typeof input.key === 'string'
                && 'index' in input && Number.isInteger(input.index);
        case 'value':
            return 'target' in input && isSegment(input.target) && input.target.kind !== 'value';
        default:
            return false;
    }
}
