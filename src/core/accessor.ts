import { IndexOutOfRangeError, KeyNotFoundError, UnsupportedSegmentError } from './errors.js';
import { IndexSegment, isSegment, keyRef, PathInput, PathLike, Segment } from './path/ast.js';
import { formatPath } from './path/parser.js';
import { hasEntry, hasOwnValue, isMapping, isSequence, OWN_VALUE_KEY, setEntry, VarMapping, VarSequence, VarValue } from './value/types.js';

export function normalizeSegment(input: PathInput): Segment {
    if (typeof input === 'string') return keyRef(input);
    if (isSegment(input)) return input;
    throw new UnsupportedSegmentError(`Unsupported path segment: ${JSON.stringify(input)}`);
}

export function normalizePath(path: PathLike): Segment[] {
    return path.map(normalizeSegment);
}

/** The own-value slot of a mapping that has one, otherwise the value itself. */
function ownValueOf(value: VarValue): VarValue {
    return hasOwnValue(value) ? value[OWN_VALUE_KEY] : value;
}

function lookupKey(current: VarValue, key: string, trail: readonly Segment[]): VarValue {
    if (!isMapping(current) || !hasEntry(current, key)) {
        throw new KeyNotFoundError(key, formatPath(trail));
    }
    return current[key];
}

function resolveIndex(sequence: VarValue, segment: IndexSegment, trail: readonly Segment[]): { items: VarSequence; at: number } {
    if (!isSequence(sequence)) {
        throw new IndexOutOfRangeError(segment.key, segment.index, undefined, formatPath(trail));
    }
    const at = segment.index < 0 ? sequence.length + segment.index : segment.index;
    if (at < 0 || at >= sequence.length) {
        throw new IndexOutOfRangeError(segment.key, segment.index, sequence.length, formatPath(trail));
    }
    return { items: sequence, at };
}

function lookupIndex(current: VarValue, segment: IndexSegment, trail: readonly Segment[]): VarValue {
    const { items, at } = resolveIndex(lookupKey(current, segment.key, trail), segment, trail);
    return items[at];
}

export function resolvePath(root: VarValue, segments: readonly Segment[]): VarValue {
    let current = root;
    for (let i = 0; i < segments.length; i++) {
        const segment = segments[i];
        const trail = segments.slice(0, i);

        switch (segment.kind) {
            case 'key':
                current = lookupKey(current, segment.key, trail);
                break;
            case 'index':
                current = lookupIndex(current, segment, trail);
                break;
            case 'value': {
                const { target } = segment;
                if (target.kind === 'index') {
                    current = ownValueOf(lookupIndex(current, target, trail));
                    break;
                }
                // Unindexed extraction only projects across a list of variants
                const found = lookupKey(current, target.key, trail);
                current = isSequence(found) ? found.map(ownValueOf) : found;
                break;
            }
        }
    }
    return current;
}

/** Assigns to the own-value slot when the target has one, otherwise replaces the entry. */
function assignPreservingChildren(container: VarMapping | VarSequence, slot: string | number, value: VarValue): void {
    const existing = isSequence(container)
        ? container[Number(slot)]
        : hasEntry(container, String(slot)) ? container[slot] : undefined;
    if (hasOwnValue(existing)) {
        existing[OWN_VALUE_KEY] = value;
    } else if (isSequence(container)) {
        container[Number(slot)] = value;
    } else {
        setEntry(container, String(slot), value);
    }
}

export function assignPath(root: VarMapping, segments: readonly Segment[], value: VarValue): void {
    const last = segments[segments.length - 1];
    if (!last) {
        throw new UnsupportedSegmentError('Cannot assign to an empty path');
    }
    const parentSegments = segments.slice(0, -1);
    const target = resolvePath(root, parentSegments);

    const ref = last.kind === 'value' ? last.target : last;
    if (!isMapping(target)) {
        throw new KeyNotFoundError(ref.key, formatPath(parentSegments));
    }

    if (ref.kind === 'index') {
        const { items, at } = resolveIndex(lookupKey(target, ref.key, parentSegments), ref, parentSegments);
        if (last.kind === 'value') {
            assignPreservingChildren(items, at, value);
        } else {
            items[at] = value;
        }
        return;
    }

    if (last.kind === 'value' && !hasEntry(target, ref.key)) {
        throw new KeyNotFoundError(ref.key, formatPath(parentSegments));
    }
    assignPreservingChildren(target, ref.key, value);
}

/** True when the path ends in an unindexed value extraction, whose result is a list built for the call. */
function endsInProjection(segments: readonly Segment[]): boolean {
    const last = segments[segments.length - 1];
    return last?.kind === 'value' && last.target.kind === 'key';
}

/**
 * Read/write facade over a repacked document. Reads are memoized per
 * canonical path; every write clears the memo. Projected lists are handed out
 * as copies, anything else is the live value inside the document.
 */
export class PathAccessor {
    private cache = new Map<string, VarValue>();

    constructor(private readonly root: VarMapping) {}

    get(path: PathLike): VarValue {
        const segments = normalizePath(path);
        const cacheKey = formatPath(segments);
        let result = this.cache.get(cacheKey);
        if (result === undefined) {
            result = resolvePath(this.root, segments);
            this.cache.set(cacheKey, result);
        }
        return endsInProjection(segments) && isSequence(result) ? [...result] : result;
    }

    has(path: PathLike): boolean {
        try {
            this.get(path);
            return true;
        } catch (e) {
            if (e instanceof KeyNotFoundError || e instanceof IndexOutOfRangeError) return false;
            throw e;
        }
    }

    set(path: PathLike, value: VarValue): void {
        const segments = normalizePath(path);
        this.invalidate();
        assignPath(this.root, segments, value);
    }

    invalidate(): void {
        this.cache.clear();
    }

    get cacheSize(): number {
        return this.cache.size;
    }
}
