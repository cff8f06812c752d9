import { KeyRegistry } from './registry.js';
import { hasEntry, isMapping, setEntry, VarMapping, VarValue } from './value/types.js';

interface DuplicateGroup {
    parentPath: string[];
    key: string;
    /** Synthetic sibling names in id order. */
    synthetic: string[];
}

function groupByParent(registry: KeyRegistry): DuplicateGroup[] {
    const groups = new Map<string, DuplicateGroup>();
    for (const { id, path } of registry.entries()) {
        const parentPath = path.slice(0, -1);
        const key = path[path.length - 1];
        const groupId = JSON.stringify([parentPath, key]);

        let group = groups.get(groupId);
        if (!group) {
            group = { parentPath, key, synthetic: [] };
            groups.set(groupId, group);
        }
        group.synthetic.push(KeyRegistry.syntheticName(id));
    }

    // Deepest parents first: a group may sit below a synthetic key that a shallower group folds away
    return Array.from(groups.values()).sort((a, b) => b.parentPath.length - a.parentPath.length);
}

/**
 * Field-wise merge: a field carried by more than one mapping becomes the list
 * of its values, in order; a field carried by one keeps its value.
 */
export function mergeMappings(mappings: readonly VarMapping[]): VarMapping {
    const collected = new Map<string, VarValue[]>();
    for (const mapping of mappings) {
        for (const [k, v] of Object.entries(mapping)) {
            const values = collected.get(k);
            if (values) {
                values.push(v);
            } else {
                collected.set(k, [v]);
            }
        }
    }

    const merged: VarMapping = {};
    for (const [k, values] of collected) {
        setEntry(merged, k, values.length > 1 ? values : values[0]);
    }
    return merged;
}

function navigate(root: VarMapping, path: readonly string[]): VarMapping | undefined {
    let current: VarMapping = root;
    for (const part of path) {
        const next = hasEntry(current, part) ? current[part] : undefined;
        if (!isMapping(next)) return undefined;
        current = next;
    }
    return current;
}

/**
 * Folds synthetic duplicate keys back into their original key as a list of
 * variants. Mutates and returns `data`.
 */
export function repack(data: VarMapping, registry: KeyRegistry): VarMapping {
    for (const group of groupByParent(registry)) {
        const parent = navigate(data, group.parentPath);
        if (!parent) continue;

        const values: VarValue[] = [];
        if (hasEntry(parent, group.key)) {
            values.push(parent[group.key]);
        }
        for (const name of group.synthetic) {
            if (hasEntry(parent, name)) {
                values.push(parent[name]);
                delete parent[name];
            }
        }

        const mappings = values.filter(isMapping);
        setEntry(parent, group.key, mappings.length === values.length ? [mergeMappings(mappings)] : values);
    }
    return data;
}
