import { CSHARP_KEYWORDS } from './data/index.js';

/**
 * Lossless C# tokenizer.
 *
 * Every character of the input belongs to exactly one token, so joining the
 * token texts gives back the source. Contextual keywords (var, async, await,
 * get, set, record, ...) come out as identifiers.
 */

export type TokenKind =
    | 'whitespace'
    | 'newline'
    | 'comment'
    | 'preprocessor'
    | 'identifier'
    | 'keyword'
    | 'number'
    | 'string'
    | 'char'
    | 'punct';

export interface Token {
    kind: TokenKind;
    text: string;
    /** Offset of the first character. */
    start: number;
    /** Offset one past the last character. */
    end: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set(CSHARP_KEYWORDS);

const TRIVIA: ReadonlySet<TokenKind> = new Set(['whitespace', 'newline', 'comment', 'preprocessor']);

// Longest first; '>>' is left as two tokens so nested generics close cleanly.
const OPERATORS = [
    '??=', '<<=', '=>', '==', '!=', '<=', '>=', '&&', '||', '++', '--',
    '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '??', '?.', '::', '->', '<<'
];

const NUMBER = /(?:0[xX][0-9a-fA-F_]+|0[bB][01_]+|(?:\d[\d_]*)?\.?\d[\d_]*(?:[eE][+-]?\d+)?)(?:[uU][lL]?|[lL][uU]?|[fFdDmM])?/y;
const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_]/u;

export function isTrivia(token: Token): boolean {
    return TRIVIA.has(token.kind);
}

export function tokenize(source: string): Token[] {
    return new Lexer(source).run();
}

class Lexer {
    private pos = 0;
    private readonly tokens: Token[] = [];

    constructor(private readonly src: string) { }

    run(): Token[] {
        const src = this.src;
        while (this.pos < src.length) {
            const start = this.pos;
            const c = src[start];
            const next = src[start + 1];

            if (c === '\r' && next === '\n') {
                this.pos += 2;
                this.push('newline', start);
            } else if (c === '\n' || c === '\r') {
                this.pos += 1;
                this.push('newline', start);
            } else if (c === ' ' || c === '\t' || c === '\f' || c === '\v' || c === '\uFEFF') {
                while (this.pos < src.length && /[ \t\f\v\uFEFF]/.test(src[this.pos])) this.pos++;
                this.push('whitespace', start);
            } else if (c === '/' && next === '/') {
                this.toLineEnd();
                this.push('comment', start);
            } else if (c === '/' && next === '*') {
                const close = src.indexOf('*/', start + 2);
                this.pos = close === -1 ? src.length : close + 2;
                this.push('comment', start);
            } else if (c === '#' && this.atLineStart(start)) {
                this.toLineEnd();
                this.push('preprocessor', start);
            } else if (this.isStringStart(start)) {
                this.pos = this.scanString(start);
                this.push('string', start);
            } else if (c === '\'') {
                this.pos = this.scanChar(start);
                this.push('char', start);
            } else if (/\d/.test(c) || (c === '.' && next !== undefined && /\d/.test(next))) {
                NUMBER.lastIndex = start;
                const match = NUMBER.exec(src);
                this.pos = match && match[0].length > 0 ? start + match[0].length : start + 1;
                this.push('number', start);
            } else if (IDENT_START.test(c) || (c === '@' && next !== undefined && IDENT_START.test(next))) {
                this.pos = start + 1;
                while (this.pos < src.length && IDENT_PART.test(src[this.pos])) this.pos++;
                const text = src.slice(start, this.pos);
                this.push(KEYWORDS.has(text) ? 'keyword' : 'identifier', start);
            } else {
                const op = OPERATORS.find(o => src.startsWith(o, start));
                this.pos = start + (op ? op.length : 1);
                this.push('punct', start);
            }
        }
        return this.tokens;
    }

    private push(kind: TokenKind, start: number): void {
        this.tokens.push({ kind, text: this.src.slice(start, this.pos), start, end: this.pos });
    }

    private toLineEnd(): void {
        while (this.pos < this.src.length && this.src[this.pos] !== '\n' && this.src[this.pos] !== '\r') {
            this.pos++;
        }
    }

    private atLineStart(offset: number): boolean {
        for (let i = offset - 1; i >= 0; i--) {
            const ch = this.src[i];
            if (ch === '\n' || ch === '\r') return true;
            if (ch !== ' ' && ch !== '\t') return false;
        }
        return true;
    }

    private isStringStart(offset: number): boolean {
        const s = this.src;
        if (s[offset] === '"') return true;
        if ((s[offset] === '$' || s[offset] === '@') && s[offset + 1] === '"') return true;
        return (s.startsWith('$@"', offset) || s.startsWith('@$"', offset));
    }

    /** Returns the offset one past the closing quote (or the end of input). */
    private scanString(offset: number): number {
        const s = this.src;
        let i = offset;
        let verbatim = false;
        let interpolated = false;
        while (s[i] === '$' || s[i] === '@') {
            if (s[i] === '$') interpolated = true;
            else verbatim = true;
            i++;
        }

        if (s.startsWith('"""', i)) {
            let quotes = 0;
            while (s[i + quotes] === '"') quotes++;
            const fence = '"'.repeat(quotes);
            const close = s.indexOf(fence, i + quotes);
            return close === -1 ? s.length : close + quotes;
        }

        i++; // opening quote
        let depth = 0;
        while (i < s.length) {
            const ch = s[i];
            if (depth > 0) {
                if (this.isStringStart(i)) {
                    i = this.scanString(i);
                    continue;
                }
                if (ch === '\'') {
                    i = this.scanChar(i);
                    continue;
                }
                if (ch === '{') depth++;
                else if (ch === '}') depth--;
                i++;
                continue;
            }
            if (!verbatim && (ch === '\n' || ch === '\r')) return i;
            if (!verbatim && ch === '\\') {
                i += 2;
                continue;
            }
            if (ch === '"') {
                if (verbatim && s[i + 1] === '"') {
                    i += 2;
                    continue;
                }
                return i + 1;
            }
            if (interpolated && ch === '{') {
                if (s[i + 1] === '{') {
                    i += 2;
                    continue;
                }
                depth = 1;
            }
            i++;
        }
        return s.length;
    }

    private scanChar(offset: number): number {
        const s = this.src;
        let i = offset + 1;
        while (i < s.length && s[i] !== '\'' && s[i] !== '\n') {
            i += s[i] === '\\' ? 2 : 1;
        }
        return Math.min(s.length, i + 1);
    }
}
