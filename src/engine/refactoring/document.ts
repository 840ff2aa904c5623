import { isTrivia, tokenize, type Token } from './lexer.js';
import { RefactoringError } from './errors.js';

export interface TextEdit {
    start: number;
    end: number;
    text: string;
}

/**
 * A tokenized source file with a line index.
 *
 * Lines are 1-based and columns 0-based throughout, matching the tool
 * arguments.
 */
export class SourceDocument {
    readonly tokens: readonly Token[];
    readonly eol: string;
    private readonly lineStarts: number[];

    constructor(readonly path: string, readonly text: string) {
        this.tokens = tokenize(text);
        this.eol = text.includes('\r\n') ? '\r\n' : '\n';
        this.lineStarts = [0];
        for (let i = 0; i < text.length; i++) {
            if (text[i] === '\n') this.lineStarts.push(i + 1);
        }
    }

    get lineCount(): number {
        return this.lineStarts.length;
    }

    lineStart(line: number): number {
        this.assertLine(line);
        return this.lineStarts[line - 1];
    }

    /** Offset of the end of the line, before its line break. */
    lineEnd(line: number): number {
        this.assertLine(line);
        if (line === this.lineCount) return this.text.length;
        let end = this.lineStarts[line] - 1;
        if (end > this.lineStarts[line - 1] && this.text[end - 1] === '\r') end--;
        return end;
    }

    lineText(line: number): string {
        return this.text.slice(this.lineStart(line), this.lineEnd(line));
    }

    indentOf(line: number): string {
        const match = /^[ \t]*/.exec(this.lineText(line));
        return match ? match[0] : '';
    }

    /** Offset for a line/column pair; the column is clamped to the line length. */
    offsetAt(line: number, column: number): number {
        const start = this.lineStart(line);
        const end = this.lineEnd(line);
        return Math.min(start + Math.max(0, column), end);
    }

    lineOf(offset: number): number {
        let lo = 0;
        let hi = this.lineStarts.length - 1;
        while (lo < hi) {
            const mid = (lo + hi + 1) >> 1;
            if (this.lineStarts[mid] <= offset) lo = mid;
            else hi = mid - 1;
        }
        return lo + 1;
    }

    columnOf(offset: number): number {
        return offset - this.lineStarts[this.lineOf(offset) - 1];
    }

    /** Index of the token covering the offset, or -1. */
    tokenIndexAt(offset: number): number {
        let lo = 0;
        let hi = this.tokens.length - 1;
        while (lo <= hi) {
            const mid = (lo + hi) >> 1;
            const token = this.tokens[mid];
            if (offset < token.start) hi = mid - 1;
            else if (offset >= token.end) lo = mid + 1;
            else return mid;
        }
        return -1;
    }

    nextSignificant(index: number): number {
        for (let i = index + 1; i < this.tokens.length; i++) {
            if (!isTrivia(this.tokens[i])) return i;
        }
        return -1;
    }

    prevSignificant(index: number): number {
        for (let i = index - 1; i >= 0; i--) {
            if (!isTrivia(this.tokens[i])) return i;
        }
        return -1;
    }

    /** Indices of the non-trivia tokens that start on the given line. */
    significantOnLine(line: number): number[] {
        const start = this.lineStart(line);
        const end = this.lineEnd(line);
        const result: number[] = [];
        for (let i = Math.max(0, this.tokenIndexAt(start)); i < this.tokens.length; i++) {
            const token = this.tokens[i];
            if (token.start >= end) break;
            if (token.start >= start && !isTrivia(token)) result.push(i);
        }
        return result;
    }

    /**
     * Index of the token closing the bracket opened at `index`
     * (`(`, `[` or `{`), or -1 when it is never closed.
     */
    matchingClose(index: number): number {
        const open = this.tokens[index].text;
        const close = open === '(' ? ')' : open === '[' ? ']' : '}';
        let depth = 0;
        for (let i = index; i < this.tokens.length; i++) {
            const token = this.tokens[i];
            if (token.kind !== 'punct') continue;
            if (token.text === open) depth++;
            else if (token.text === close && --depth === 0) return i;
        }
        return -1;
    }

    matchingOpen(index: number): number {
        const close = this.tokens[index].text;
        const open = close === ')' ? '(' : close === ']' ? '[' : '{';
        let depth = 0;
        for (let i = index; i >= 0; i--) {
            const token = this.tokens[i];
            if (token.kind !== 'punct') continue;
            if (token.text === close) depth++;
            else if (token.text === open && --depth === 0) return i;
        }
        return -1;
    }

    slice(start: number, end: number): string {
        return this.text.slice(start, end);
    }

    /** Applies non-overlapping edits and returns the new text. */
    applyEdits(edits: readonly TextEdit[]): string {
        const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);
        let out = '';
        let cursor = 0;
        for (const e of sorted) {
            if (e.start < cursor) {
                throw new RefactoringError(`Overlapping edits at offset ${e.start}`);
            }
            out += this.text.slice(cursor, e.start) + e.text;
            cursor = e.end;
        }
        return out + this.text.slice(cursor);
    }

    private assertLine(line: number): void {
        if (!Number.isInteger(line) || line < 1 || line > this.lineStarts.length) {
            throw new RefactoringError(`Line ${line} is outside ${this.path} (1-${this.lineStarts.length})`);
        }
    }
}
