import { KeyRegistry } from '../registry.js';
import { OWN_VALUE_KEY } from '../value/types.js';
import { classifyLine, computeIndentUnit, depthOf, isBlank, isComment, LineShape } from './indent.js';

export interface SourceLine {
    /** 1-based line number in the source text. */
    line: number;
    text: string;
}

export interface SyntheticRename extends SourceLine {
    id: number;
    key: string;
    path: string[];
}

export interface RewriteResult {
    /** Lines handed to the YAML decoder; no two siblings share a key. */
    lines: string[];
    /** Source line (1-based) each rewritten line came from. */
    sourceLines: number[];
    registry: KeyRegistry;
    indentUnit: number | undefined;
    skipped: SourceLine[];
    renames: SyntheticRename[];
    /** Key lines that use a name of the synthetic form. */
    reserved: SourceLine[];
}

interface KeyLine extends SourceLine {
    depth: number;
    key: string;
    value: string;
}

export function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/**
 * Single top-to-bottom pass that renames the second and later occurrence of a
 * key at the same path to a synthetic name and splits lines carrying both a
 * value and children into a parent line plus an own-value child.
 *
 * Depths are taken relative to the shallowest key line, so the emitted text
 * always starts at column 0.
 */
export function rewriteDuplicates(text: string): RewriteResult {
    const lines = splitLines(text);
    const indentUnit = computeIndentUnit(lines);
    const unit = indentUnit ?? 0;

    const skipped: SourceLine[] = [];
    const keyLines: KeyLine[] = [];
    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i];
        if (isBlank(raw) || isComment(raw)) continue;

        const shape: LineShape = classifyLine(raw, indentUnit);
        if (!shape.isKeyValue || shape.key === undefined) {
            skipped.push({ line: i + 1, text: raw });
            continue;
        }
        keyLines.push({ line: i + 1, text: raw, depth: shape.depth, key: shape.key, value: shape.value ?? '' });
    }

    const baseDepth = keyLines.reduce((min, l) => Math.min(min, l.depth), keyLines[0]?.depth ?? 0);
    const maxDepth = keyLines.reduce((max, l) => Math.max(max, l.depth - baseDepth), 0);

    // One slot per depth holding the key currently open at that depth
    const paths: string[][] = Array.from({ length: maxDepth + 1 }, () => []);
    const keyCounts = new Map<string, number>();
    const registry = new KeyRegistry();
    const out: string[] = [];
    const sourceLines: number[] = [];
    const renames: SyntheticRename[] = [];
    const reserved: SourceLine[] = [];

    for (const current of keyLines) {
        const depth = current.depth - baseDepth;
        const value = current.value;
        let key = current.key;

        if (KeyRegistry.isSyntheticName(key)) {
            reserved.push({ line: current.line, text: current.text });
        }

        paths[depth] = [key];
        const fullPath = paths.slice(0, depth + 1).flat();
        const pathId = JSON.stringify(fullPath);

        const seen = keyCounts.get(pathId);
        if (seen === undefined) {
            keyCounts.set(pathId, 0);
        } else {
            keyCounts.set(pathId, seen + 1);
            const id = registry.register(fullPath);
            key = KeyRegistry.syntheticName(id);
            paths[depth][paths[depth].length - 1] = key;
            renames.push({ id, key: current.key, path: fullPath, line: current.line, text: current.text });
        }

        // current.line is 1-based, so it is also the index of the following line
        const hasChildren = nextDepth(lines, current.line, indentUnit) - baseDepth > depth;
        const pad = ' '.repeat(depth * unit);

        if (hasChildren) {
            out.push(`${pad}${key}:`);
            sourceLines.push(current.line);
            if (value) {
                out.push(`${' '.repeat((depth + 1) * unit)}${OWN_VALUE_KEY}: ${value}`);
                sourceLines.push(current.line);
            }
        } else {
            out.push(value ? `${pad}${key}: ${value}` : `${pad}${key}:`);
            sourceLines.push(current.line);
        }
    }

    return { lines: out, sourceLines, registry, indentUnit, skipped, renames, reserved };
}

/** Raw depth of the next non-blank, non-comment line, or -1 at end of input. */
function nextDepth(lines: readonly string[], from: number, indentUnit: number | undefined): number {
    for (let j = from; j < lines.length; j++) {
        const next = lines[j];
        if (isBlank(next) || isComment(next)) continue;
        return depthOf(next, indentUnit);
    }
    return -1;
}
