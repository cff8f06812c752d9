import type { Location } from '../types/diagnostic.js';

/** The rewritten text was rejected by the YAML decoder. Positions refer to the source text. */
export class ParseError extends Error {
    constructor(public reason: string, public location?: Location) {
        super(location ? `${reason} (line ${location.line}, col ${location.col})` : reason);
        this.name = 'ParseError';
    }

    get line(): number | undefined {
        return this.location?.line;
    }
}

/** Base class for accessor navigation failures. */
export class PathLookupError extends Error {
    constructor(message: string, public path: string) {
        super(message);
        this.name = 'PathLookupError';
    }
}

export class KeyNotFoundError extends PathLookupError {
    constructor(public key: string, path: string) {
        super(`Key "${key}" not found at ${path || '<root>'}`, path);
        this.name = 'KeyNotFoundError';
    }
}

export class IndexOutOfRangeError extends PathLookupError {
    constructor(public key: string, public index: number, public length: number | undefined, path: string) {
        super(
            length === undefined
                ? `Value at "${key}" is not a sequence (index ${index}) at ${path || '<root>'}`
                : `Index ${index} out of range for "${key}" (length ${length}) at ${path || '<root>'}`,
            path
        );
        this.name = 'IndexOutOfRangeError';
    }
}

export class UnsupportedSegmentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedSegmentError';
    }
}
