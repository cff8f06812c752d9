export type Range = { start: number; end: number };

export type TokenType =
    | 'Name'
    | 'String'
    | 'Dot'
    | 'LBracket'
    | 'RBracket'
    | 'LParen'
    | 'RParen'
    | 'EOF';

export interface Token {
    kind: TokenType;
    value: string;
    range: Range;
}

export class TokenizerError extends Error {
    constructor(message: string, public range: Range) {
        super(message);
        this.name = 'TokenizerError';
    }
}

const PUNCTUATION: Record<string, TokenType> = {
    '.': 'Dot',
    '[': 'LBracket',
    ']': 'RBracket',
    '(': 'LParen',
    ')': 'RParen',
};

/** Characters a key may use without quoting. */
export const BARE_CHAR = /[^\s.[\]()"]/;

export function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let current = 0;

    while (current < input.length) {
        const char = input[current];

        if (/\s/.test(char)) {
            current++;
            continue;
        }

        const punct = PUNCTUATION[char];
        if (punct) {
            tokens.push({ kind: punct, value: char, range: { start: current, end: current + 1 } });
            current++;
            continue;
        }

        // Quoted name, with \" and \\ escapes
        if (char === '"') {
            const start = current;
            let value = '';
            current++;
            while (current < input.length && input[current] !== '"') {
                if (input[current] === '\\' && current + 1 < input.length) {
                    current++;
                }
                value += input[current];
                current++;
            }
            if (current >= input.length) {
                throw new TokenizerError('Unterminated quoted name', { start, end: current });
            }
            current++;
            tokens.push({ kind: 'String', value, range: { start, end: current } });
            continue;
        }

        const start = current;
        let value = '';
        while (current < input.length && BARE_CHAR.test(input[current])) {
            value += input[current];
            current++;
        }
        tokens.push({ kind: 'Name', value, range: { start, end: current } });
    }

    tokens.push({ kind: 'EOF', value: '', range: { start: current, end: current } });
    return tokens;
}
