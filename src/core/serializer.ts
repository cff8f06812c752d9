import { encodeInline } from '../parser/yaml.js';
import { hasEntry, isMapping, isSequence, OWN_VALUE_KEY, VarMapping, VarValue } from './value/types.js';

export interface DumpOptions {
    /** Spaces per nesting level. */
    indent?: number;
}

export const DEFAULT_INDENT = 4;

function inline(value: VarValue): string {
    return value === null ? '' : ` ${encodeInline(value)}`;
}

/** Keys are written plain where YAML reads them back as the same string. */
function formatKey(key: string): string {
    const plain = encodeInline(key);
    return plain === key && !key.includes(':') ? key : plain;
}

function renderEntry(key: string, value: VarValue, level: number, indent: number, out: string[]): void {
    const pad = ' '.repeat(level * indent);
    const name = formatKey(key);

    if (isMapping(value)) {
        const children = Object.keys(value).filter(k => k !== OWN_VALUE_KEY);
        if (!hasEntry(value, OWN_VALUE_KEY)) {
            out.push(children.length === 0 ? `${pad}${name}: {}` : `${pad}${name}:`);
            renderMapping(value, level + 1, indent, out);
            return;
        }
        if (children.length === 0) {
            // Without children an inline value reads back as a scalar, so the slot is spelled out
            out.push(`${pad}${name}:`);
            out.push(`${' '.repeat((level + 1) * indent)}${OWN_VALUE_KEY}: ${encodeInline(value[OWN_VALUE_KEY])}`);
            return;
        }
        out.push(`${pad}${name}: ${encodeInline(value[OWN_VALUE_KEY])}`);
        renderMapping(value, level + 1, indent, out);
        return;
    }

    out.push(`${pad}${name}:${inline(value)}`);
}

/**
 * How a list comes back through repacking decides its layout:
 * - two or more variants that are not all mappings repeat the key line;
 * - a single mapping is the merged form, written as the mapping plus an empty
 *   variant so the pair merges back into it;
 * - anything else is written as one flow sequence.
 */
function renderSequence(key: string, items: VarValue[], level: number, indent: number, out: string[]): void {
    const allMappings = items.every(isMapping);

    if (items.length >= 2 && !allMappings) {
        for (const variant of items) {
            renderEntry(key, variant, level, indent, out);
        }
        return;
    }

    if (items.length === 1 && isMapping(items[0])) {
        renderEntry(key, items[0], level, indent, out);
        out.push(`${' '.repeat(level * indent)}${formatKey(key)}: {}`);
        return;
    }

    out.push(`${' '.repeat(level * indent)}${formatKey(key)}: ${encodeInline(items)}`);
}

function renderMapping(mapping: VarMapping, level: number, indent: number, out: string[]): void {
    for (const [key, value] of Object.entries(mapping)) {
        if (key === OWN_VALUE_KEY) continue;

        if (isSequence(value)) {
            renderSequence(key, value, level, indent, out);
        } else {
            renderEntry(key, value, level, indent, out);
        }
    }
}

/**
 * Renders a repacked mapping back to indentation text. Key order follows the
 * mapping; re-parsing the output yields an equivalent structure.
 */
export function dumps(data: VarMapping, options: DumpOptions = {}): string {
    const indent = options.indent ?? DEFAULT_INDENT;
    const out: string[] = [];
    renderMapping(data, 0, indent, out);
    return out.join('\n');
}
