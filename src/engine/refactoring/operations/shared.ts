import { KEYWORDS, tokenize, type Token } from '../lexer.js';
import type { SourceDocument } from '../document.js';
import type { OperationRequest } from '../types.js';
import { RefactoringError } from '../errors.js';

export const TYPE_KEYWORDS: ReadonlySet<string> = new Set([
    'bool', 'byte', 'char', 'decimal', 'double', 'float', 'int', 'long', 'object',
    'sbyte', 'short', 'string', 'uint', 'ulong', 'ushort', 'void'
]);

export const ACCESS_MODIFIERS: ReadonlySet<string> = new Set(['public', 'private', 'protected', 'internal']);

export const MEMBER_MODIFIERS: ReadonlySet<string> = new Set([
    'public', 'private', 'protected', 'internal', 'static', 'readonly', 'virtual', 'override',
    'abstract', 'sealed', 'extern', 'unsafe', 'new', 'partial', 'const', 'volatile', 'async', 'required'
]);

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

export function isIdentifier(name: string): boolean {
    return IDENTIFIER.test(name) && !KEYWORDS.has(name);
}

export function requireIdentifier(name: string, argument: string): string {
    const trimmed = name.trim();
    if (!isIdentifier(trimmed)) {
        throw new RefactoringError(`${argument} '${trimmed}' is not a valid C# identifier`);
    }
    return trimmed;
}

/**
 * Index of the significant token at the request position. When the column
 * lands on whitespace, the next significant token on the same line is used.
 */
export function tokenAtPosition(doc: SourceDocument, request: OperationRequest): number {
    const offset = doc.offsetAt(request.lineNumber, request.columnNumber);
    const onLine = doc.significantOnLine(request.lineNumber);
    const hit = onLine.find(i => doc.tokens[i].start <= offset && offset < doc.tokens[i].end);
    if (hit !== undefined) return hit;
    const after = onLine.find(i => doc.tokens[i].start >= offset);
    if (after === undefined) {
        throw new RefactoringError(`Nothing found at line ${request.lineNumber}, column ${request.columnNumber}`);
    }
    return after;
}

export function isPunct(token: Token | undefined, ...texts: string[]): boolean {
    return token !== undefined && token.kind === 'punct' && texts.includes(token.text);
}

export function isWord(token: Token | undefined, ...texts: string[]): boolean {
    return token !== undefined && (token.kind === 'keyword' || token.kind === 'identifier') && texts.includes(token.text);
}

const DECLARATOR_FOLLOWERS = ['=', ';', ',', ')'];
const NOT_A_TYPE = new Set(['await', 'yield', 'nameof', 'when']);

/** True when the identifier at `index` is introduced by a declaration: `T name =`, `T name)`, `var x in`. */
export function declaresName(doc: SourceDocument, index: number): boolean {
    const token = doc.tokens[index];
    if (token.kind !== 'identifier') return false;
    const next = doc.tokens[doc.nextSignificant(index)];
    if (!(isPunct(next, ...DECLARATOR_FOLLOWERS) || isWord(next, 'in'))) return false;
    const prev = doc.tokens[doc.prevSignificant(index)];
    if (prev === undefined) return false;
    if (prev.kind === 'identifier') return !NOT_A_TYPE.has(prev.text);
    if (prev.kind === 'keyword') return TYPE_KEYWORDS.has(prev.text);
    return isPunct(prev, '>', ']', '?');
}

export function isMemberAccess(doc: SourceDocument, index: number): boolean {
    return isPunct(doc.tokens[doc.prevSignificant(index)], '.', '?.', '::');
}

const ASSIGNMENT_OPERATORS = ['=', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '??=', '<<=', '++', '--'];

/** True when the expression spanning `first`..`last` is written to rather than read. */
export function isAssigned(doc: SourceDocument, first: number, last: number): boolean {
    const prev = doc.tokens[doc.prevSignificant(first)];
    return isPunct(doc.tokens[doc.nextSignificant(last)], ...ASSIGNMENT_OPERATORS)
        || isPunct(prev, '++', '--')
        || isWord(prev, 'ref', 'out');
}

const BYTE_ORDER_MARK = '\uFEFF';

/** Moves an insertion at the very start of the file past a leading byte order mark. */
export function afterByteOrderMark(doc: SourceDocument, offset: number): number {
    return offset === 0 && doc.text.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK.length : offset;
}

/** Escapes a string for use inside a RegExp. */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function pluralize(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

const INVERSE_COMPARISON: Record<string, string> = {
    '==': '!=', '!=': '==', '<': '>=', '>=': '<', '>': '<=', '<=': '>'
};

const BINARY_OPERATORS = new Set(['==', '!=', '<', '>', '<=', '>=', '&&', '||', '?', '??', '+', '-', '*', '/', '%', '&', '|', '^']);

/** Logical negation of a C# boolean expression, kept as readable as possible. */
export function negateCondition(condition: string): string {
    const text = condition.trim();
    const tokens = tokenize(text).filter(t => t.kind !== 'whitespace' && t.kind !== 'newline' && t.kind !== 'comment');

    if (text === 'true') return 'false';
    if (text === 'false') return 'true';

    const topLevel: number[] = [];
    let loose = false;
    let depth = 0;
    tokens.forEach((token, i) => {
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && token.kind === 'punct' && BINARY_OPERATORS.has(token.text)) topLevel.push(i);
        else if (depth === 0 && (isWord(token, 'is', 'as', 'switch', 'with') || isPunct(token, '=>', '='))) loose = true;
    });

    if (topLevel.length === 0 && !loose) {
        if (!isPunct(tokens[0], '!') || tokens.length === 1) return `!${text}`;
        // !(x) and !x
        if (isPunct(tokens[1], '(') && closesAtEnd(tokens, 1)) {
            return text.slice(tokens[1].end, tokens[tokens.length - 1].start).trim();
        }
        return text.slice(tokens[1].start);
    }

    if (topLevel.length === 1 && !loose) {
        const op = tokens[topLevel[0]];
        const inverse = INVERSE_COMPARISON[op.text];
        const hasAngleElsewhere = tokens.some((t, i) => i !== topLevel[0] && isPunct(t, '<', '>'));
        if (inverse !== undefined && !hasAngleElsewhere) {
            return text.slice(0, op.start) + inverse + text.slice(op.end);
        }
    }

    return `!(${text})`;
}

function closesAtEnd(tokens: Token[], openIndex: number): boolean {
    let depth = 0;
    for (let i = openIndex; i < tokens.length; i++) {
        if (isPunct(tokens[i], '(')) depth++;
        else if (isPunct(tokens[i], ')') && --depth === 0) return i === tokens.length - 1;
    }
    return false;
}
