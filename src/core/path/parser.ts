import { Token, TokenType, tokenize, TokenizerError, BARE_CHAR } from './tokenizer.js';
import { IndexSegment, KeySegment, PathError, PathResult, Segment } from './ast.js';

/** Name that wraps a reference in a value extraction: `val(task[1])`. */
const VALUE_WRAPPER = 'val';

/**
 * Parser for textual paths:
 *
 *     path    := segment ('.' segment)*
 *     segment := 'val' '(' ref ')' | ref
 *     ref     := name ('[' integer ']')?
 *     name    := bare | "quoted"
 */
export class Parser {
    private tokens: Token[];
    private current: number = 0;
    private errors: PathError[] = [];

    constructor(input: string) {
        try {
            this.tokens = tokenize(input);
        } catch (e) {
            if (!(e instanceof TokenizerError)) throw e;
            this.tokens = [{ kind: 'EOF', value: '', range: { start: 0, end: 0 } }];
            this.errors.push({ message: e.message, range: e.range });
        }
    }

    public parse(): PathResult {
        if (this.errors.length > 0) {
            return { ok: false, errors: this.errors };
        }

        try {
            const segments: Segment[] = [this.parseSegment()];
            while (this.match('Dot')) {
                segments.push(this.parseSegment());
            }

            if (!this.isAtEnd()) {
                this.errors.push({
                    message: `Unexpected "${this.peek().value}" after path`,
                    range: this.peek().range
                });
            }

            return {
                ok: this.errors.length === 0,
                errors: this.errors,
                segments: this.errors.length === 0 ? segments : undefined
            };
        } catch (e) {
            if (!(e instanceof PathSyntaxError)) throw e;
            return { ok: false, errors: this.errors };
        }
    }

    private parseSegment(): Segment {
        const token = this.peek();
        if (token.kind === 'Name' && token.value === VALUE_WRAPPER && this.peekNext().kind === 'LParen') {
            this.advance();
            this.advance();
            const target = this.parseRef();
            this.consume('RParen', `Expected closing ")" after ${VALUE_WRAPPER}(`);
            return { kind: 'value', target };
        }
        return this.parseRef();
    }

    private parseRef(): KeySegment | IndexSegment {
        const name = this.peek();
        if (name.kind !== 'Name' && name.kind !== 'String') {
            throw this.error(name, name.kind === 'EOF' ? 'Expected a key name' : `Unexpected "${name.value}"`);
        }
        this.advance();

        if (!this.match('LBracket')) {
            return { kind: 'key', key: name.value };
        }

        const indexToken = this.consume('Name', 'Expected an index');
        if (!/^-?\d+$/.test(indexToken.value)) {
            throw this.error(indexToken, `Index must be an integer, got "${indexToken.value}"`);
        }
        this.consume('RBracket', 'Expected closing "]" after index');
        return { kind: 'index', key: name.value, index: Number(indexToken.value) };
    }

    // Helpers
    private isAtEnd(): boolean {
        return this.peek().kind === 'EOF';
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.tokens[this.current - 1] ?? this.peek();
    }

    private match(kind: TokenType): boolean {
        if (this.peek().kind === kind) {
            this.advance();
            return true;
        }
        return false;
    }

    private consume(kind: TokenType, message: string): Token {
        if (this.peek().kind === kind) return this.advance();
        throw this.error(this.peek(), message);
    }

    private error(token: Token, message: string): PathSyntaxError {
        this.errors.push({ message, range: token.range });
        return new PathSyntaxError(message, token.range.start);
    }
}

export class PathSyntaxError extends Error {
    constructor(message: string, public offset: number) {
        super(message);
        this.name = 'PathSyntaxError';
    }
}

export function parsePath(input: string): PathResult {
    return new Parser(input).parse();
}

/** Parses a textual path, throwing `PathSyntaxError` on the first problem. */
export function parsePathOrThrow(input: string): Segment[] {
    const result = parsePath(input);
    if (!result.ok || !result.segments) {
        const first = result.errors[0];
        throw new PathSyntaxError(first?.message ?? 'Invalid path', first?.range.start ?? 0);
    }
    return result.segments;
}

function formatName(name: string): string {
    const bare = name !== '' && name !== VALUE_WRAPPER && Array.from(name).every(c => BARE_CHAR.test(c));
    return bare ? name : `"${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatRef(segment: KeySegment | IndexSegment): string {
    return segment.kind === 'index' ? `${formatName(segment.key)}[${segment.index}]` : formatName(segment.key);
}

/** Canonical text of a path; `parsePath(formatPath(s))` yields `s` again. */
export function formatPath(segments: readonly Segment[]): string {
    return segments
        .map(s => s.kind === 'value' ? `${VALUE_WRAPPER}(${formatRef(s.target)})` : formatRef(s))
        .join('.');
}
