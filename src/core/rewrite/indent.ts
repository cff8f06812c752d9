export interface LineShape {
    isKeyValue: boolean;
    depth: number;
    key?: string;
    value?: string;
}

export function leadingWidth(line: string): number {
    return line.length - line.trimStart().length;
}

export function isBlank(line: string): boolean {
    return line.trim() === '';
}

export function isComment(line: string): boolean {
    return line.trimStart().startsWith('#');
}

/**
 * Width of one nesting level: the leading whitespace of the first indented
 * non-blank line. `undefined` when nothing is indented.
 */
export function computeIndentUnit(lines: readonly string[]): number | undefined {
    for (const line of lines) {
        if (isBlank(line)) continue;
        const width = leadingWidth(line);
        if (width > 0) return width;
    }
    return undefined;
}

export function depthOf(line: string, indentUnit: number | undefined): number {
    if (!indentUnit) return 0;
    return Math.floor(leadingWidth(line) / indentUnit);
}

/**
 * Splits `key: value` on the first colon. Lines without a colon, or with an
 * empty key, are not key/value lines.
 */
export function classifyLine(line: string, indentUnit: number | undefined): LineShape {
    const depth = depthOf(line, indentUnit);
    const colon = line.indexOf(':');
    if (colon === -1) {
        return { isKeyValue: false, depth };
    }

    const key = line.slice(0, colon).trim();
    if (key === '') {
        return { isKeyValue: false, depth };
    }

    return { isKeyValue: true, depth, key, value: line.slice(colon + 1).trim() };
}
