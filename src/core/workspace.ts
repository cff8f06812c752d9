import fg from 'fast-glob';
import { readFileSync, statSync } from 'fs';
import path from 'path';
import { decodeRewritten, stripBom } from '../parser/yaml.js';
import { Diagnostic, Range, RuleLevel } from '../types/diagnostic.js';
import { DEFAULT_RULES, RuleName, Rules } from './config.js';
import { ParseError } from './errors.js';
import { repack } from './repack.js';
import { rewriteDuplicates, SourceLine } from './rewrite/rewriter.js';
import type { VarMapping } from './value/types.js';

export interface CheckedFile {
    file: string;
    diagnostics: Diagnostic[];
    data?: VarMapping;
}

export interface WorkspaceOptions {
    include?: string[];
    ignore?: string[];
    rules?: Partial<Rules>;
}

function lineRange(line: number, text: string): Range {
    return {
        start: { line, col: 1, offset: 0 },
        end: { line, col: text.length + 1, offset: 0 }
    };
}

/**
 * A file or directory of documents to lint. Files are collected with
 * fast-glob; each one is rewritten, decoded and repacked, and every finding
 * becomes a diagnostic instead of an exception.
 */
export class Workspace {
    public rootPath: string;
    public files: CheckedFile[] = [];
    public include: string[];
    public ignorePatterns: string[];
    public rules: Rules;

    constructor(rootPath: string, opts?: WorkspaceOptions) {
        this.rootPath = path.resolve(rootPath);
        this.include = opts?.include?.length ? opts.include : ['**/*.vyaml'];
        this.ignorePatterns = opts?.ignore || [];
        this.rules = { ...DEFAULT_RULES, ...opts?.rules };
    }

    get diagnostics(): Diagnostic[] {
        return this.files.flatMap(f => f.diagnostics);
    }

    async listFiles(): Promise<string[]> {
        if (statSync(this.rootPath).isFile()) {
            return [this.rootPath];
        }
        const matches = await fg(this.include, {
            cwd: this.rootPath,
            absolute: true,
            ignore: ['**/node_modules/**', ...this.ignorePatterns]
        });
        return matches.sort();
    }

    async load(): Promise<CheckedFile[]> {
        this.files = [];
        for (const file of await this.listFiles()) {
            this.files.push(this.loadFile(file));
        }
        return this.files;
    }

    private loadFile(file: string): CheckedFile {
        let content: string;
        try {
            content = readFileSync(file, 'utf8');
        } catch (e) {
            return {
                file,
                diagnostics: [{
                    code: 'FILE_READ_ERROR',
                    message: `Failed to read file: ${e instanceof Error ? e.message : String(e)}`,
                    severity: 'error',
                    file
                }]
            };
        }
        return this.checkText(content, file);
    }

    checkText(text: string, file: string): CheckedFile {
        const diagnostics: Diagnostic[] = [];
        const rewrite = rewriteDuplicates(stripBom(text));

        this.report(diagnostics, 'malformed-line', 'MALFORMED_LINE', file, rewrite.skipped,
            l => `Line has no "key: value" shape and was skipped: ${l.text.trim()}`);
        this.report(diagnostics, 'reserved-key', 'RESERVED_KEY', file, rewrite.reserved,
            l => `Key "${l.text.split(':')[0].trim()}" uses the reserved duplicate-key form and may be folded into another key`);

        const level = this.rules['duplicate-key'];
        if (level !== 'off') {
            for (const rename of rewrite.renames) {
                diagnostics.push({
                    code: 'DUPLICATE_KEY',
                    message: `Key "${rename.key}" repeats at the same path and becomes a list of variants`,
                    severity: level,
                    file,
                    range: lineRange(rename.line, rename.text),
                    path: rename.path
                });
            }
        }

        try {
            const data = repack(decodeRewritten(rewrite), rewrite.registry);
            return { file, diagnostics, data };
        } catch (e) {
            if (!(e instanceof ParseError)) throw e;
            const loc = e.location;
            diagnostics.push({
                code: 'YAML_SYNTAX_ERROR',
                message: e.reason,
                severity: 'error',
                file,
                range: loc ? { start: loc, end: loc } : undefined
            });
            return { file, diagnostics };
        }
    }

    private report(
        diagnostics: Diagnostic[],
        rule: RuleName,
        code: string,
        file: string,
        lines: SourceLine[],
        message: (line: SourceLine) => string
    ): void {
        const level: RuleLevel = this.rules[rule];
        if (level === 'off') return;
        for (const line of lines) {
            diagnostics.push({
                code,
                message: message(line),
                severity: level,
                file,
                range: lineRange(line.line, line.text)
            });
        }
    }
}
