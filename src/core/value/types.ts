export type VarScalar = string | number | boolean | null;
export type VarSequence = VarValue[];
export interface VarMapping {
    [key: string]: VarValue;
}

export type VarValue = VarScalar | VarSequence | VarMapping;

/** Reserved child key holding a node's inline scalar when the node also has children. */
export const OWN_VALUE_KEY = '__val__';

export function isMapping(v: VarValue | undefined): v is VarMapping {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function isSequence(v: VarValue | undefined): v is VarSequence {
    return Array.isArray(v);
}

export function hasEntry(map: VarMapping, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(map, key);
}

/** Own, enumerable write; a plain assignment to `__proto__` would replace the prototype instead. */
export function setEntry(map: VarMapping, key: string, value: VarValue): void {
    Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

export function hasOwnValue(v: VarValue | undefined): v is VarMapping {
    return isMapping(v) && hasEntry(v, OWN_VALUE_KEY);
}

/**
 * Converts a decoder result into the value model. Returns `undefined` for
 * anything that is not plain data (dates, binary, maps with non-string keys).
 */
export function toVarValue(raw: unknown): VarValue | undefined {
    if (raw === null || raw === undefined) return null;
    if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
    if (typeof raw === 'number') return raw;
    if (typeof raw === 'bigint') return Number(raw);
    if (Array.isArray(raw)) {
        const items: VarSequence = [];
        for (const item of raw) {
            const converted = toVarValue(item);
            if (converted === undefined) return undefined;
            items.push(converted);
        }
        return items;
    }
    if (typeof raw === 'object' && Object.getPrototypeOf(raw) === Object.prototype) {
        const obj: VarMapping = {};
        for (const [k, v] of Object.entries(raw)) {
            const converted = toVarValue(v);
            if (converted === undefined) return undefined;
            setEntry(obj, k, converted);
        }
        return obj;
    }
    return undefined;
}
