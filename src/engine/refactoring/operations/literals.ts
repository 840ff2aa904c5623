import { getString } from '../../../utils/arguments.js';
import type { SourceDocument } from '../document.js';
import { RefactoringError } from '../errors.js';
import type { TokenKind } from '../lexer.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { isPunct, isWord, pluralize, tokenAtPosition } from './shared.js';

type NumericFormat = 'dec' | 'hex' | 'bin';

const FORMAT_ALIASES: Record<string, NumericFormat> = {
    dec: 'dec', decimal: 'dec',
    hex: 'hex', hexadecimal: 'hex',
    bin: 'bin', binary: 'bin'
};

const INTEGER_SUFFIX = /(?:[uU][lL]?|[lL][uU]?)$/;

/**
 * The literal of the given kind under the cursor, or else the first one on
 * the cursor's line.
 */
function literalAt(doc: SourceDocument, request: OperationRequest, kind: TokenKind, what: string): number {
    const onLine = doc.significantOnLine(request.lineNumber);
    let index = -1;
    try {
        index = tokenAtPosition(doc, request);
    } catch (e) {
        if (!(e instanceof RefactoringError)) throw e;
    }
    if (index >= 0 && doc.tokens[index].kind === kind) return index;
    const first = onLine.find(i => doc.tokens[i].kind === kind);
    if (first === undefined) {
        throw new RefactoringError(`No ${what} found at line ${request.lineNumber}, column ${request.columnNumber}`);
    }
    return first;
}

export function parseIntegerLiteral(text: string): { value: bigint; suffix: string } {
    const suffix = INTEGER_SUFFIX.exec(text)?.[0] ?? '';
    const body = text.slice(0, text.length - suffix.length).replace(/_/g, '');
    if (/^0[xX][0-9a-fA-F]+$/.test(body)) return { value: BigInt(`0x${body.slice(2)}`), suffix };
    if (/^0[bB][01]+$/.test(body)) return { value: BigInt(`0b${body.slice(2)}`), suffix };
    if (/^\d+$/.test(body)) return { value: BigInt(body), suffix };
    throw new RefactoringError(`'${text}' is not an integer literal`);
}

export function formatInteger(value: bigint, format: NumericFormat): string {
    switch (format) {
        case 'dec': return value.toString();
        case 'hex': return `0x${value.toString(16).toUpperCase()}`;
        case 'bin': return `0b${value.toString(2)}`;
    }
}

export function convertNumericLiteral(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const requested = getString(request.arguments, 'target_format', 'hex').trim().toLowerCase();
    const format = FORMAT_ALIASES[requested];
    if (format === undefined) {
        throw new RefactoringError(`Unknown target_format '${requested}' (expected dec, hex or bin)`);
    }

    const token = doc.tokens[literalAt(doc, request, 'number', 'numeric literal')];
    const { value, suffix } = parseIntegerLiteral(token.text);
    const replacement = formatInteger(value, format) + suffix;
    if (replacement === token.text) {
        return edit(doc.text, `Literal ${token.text} is already in ${format} form`);
    }
    return edit(
        doc.applyEdits([{ start: token.start, end: token.end, text: replacement }]),
        `Converted ${token.text} to ${replacement}`
    );
}

const VERBATIM_SAFE_ESCAPES: Record<string, string> = { '\\': '\\', '"': '"', '\'': '\'' };

export function convertStringLiteral(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const token = doc.tokens[literalAt(doc, request, 'string', 'string literal')];
    const text = token.text;
    if (text.startsWith('$') || text.startsWith('@$') || /^\$*"""/.test(text)) {
        throw new RefactoringError('Interpolated and raw string literals cannot be converted');
    }

    let replacement: string;
    let form: string;
    if (text.startsWith('@')) {
        const body = text.slice(2, -1).replace(/""/g, '"');
        replacement = `"${body
            .replace(/\\/g, '\\\\')
            .replace(/"/g, '\\"')
            .replace(/\r/g, '\\r')
            .replace(/\n/g, '\\n')
            .replace(/\t/g, '\\t')}"`;
        form = 'regular';
    } else {
        const body = text.slice(1, -1).replace(/\\(.)/g, (_match, ch: string) => {
            const unescaped = VERBATIM_SAFE_ESCAPES[ch];
            if (unescaped === undefined) {
                throw new RefactoringError(`Escape sequence '\\${ch}' cannot be represented in a verbatim string`);
            }
            return unescaped;
        });
        replacement = `@"${body.replace(/"/g, '""')}"`;
        form = 'verbatim';
    }

    return edit(
        doc.applyEdits([{ start: token.start, end: token.end, text: replacement }]),
        `Converted string literal to ${form} form`
    );
}

/** Wraps an expression that would otherwise end an interpolation hole early. */
function holeExpression(expr: string): string {
    return /[?:]/.test(expr) ? `(${expr})` : expr;
}

/** Splits the tokens between two indices on top-level commas. */
function splitArguments(doc: SourceDocument, open: number, close: number): string[] {
    const args: string[] = [];
    let depth = 0;
    let start = doc.tokens[open].end;
    for (let i = open + 1; i < close; i++) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && isPunct(token, ',')) {
            args.push(doc.slice(start, token.start).trim());
            start = token.end;
        }
    }
    args.push(doc.slice(start, doc.tokens[close].start).trim());
    return args;
}

export function convertStringFormat(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const onLine = doc.significantOnLine(request.lineNumber);
    const call = onLine.find(i => {
        const dot = doc.nextSignificant(i);
        const name = doc.nextSignificant(dot);
        return isWord(doc.tokens[i], 'string', 'String')
            && isPunct(doc.tokens[dot], '.')
            && isWord(doc.tokens[name], 'Format')
            && isPunct(doc.tokens[doc.nextSignificant(name)], '(');
    });
    if (call === undefined) {
        throw new RefactoringError(`No string.Format call found at line ${request.lineNumber}`);
    }

    const open = doc.nextSignificant(doc.nextSignificant(doc.nextSignificant(call)));
    const close = doc.matchingClose(open);
    if (close < 0) {
        throw new RefactoringError('Unbalanced parentheses in string.Format call');
    }

    const [format, ...values] = splitArguments(doc, open, close);
    const verbatim = format.startsWith('@"');
    if (!/^@?"/.test(format) || format.includes('"""') || doc.tokens[doc.nextSignificant(open)].text !== format) {
        throw new RefactoringError('The format argument must be a single string literal');
    }

    const body = format.slice(verbatim ? 2 : 1, -1);
    const converted = body.replace(/\{\{|\}\}|\{(\d+)([^}]*)\}/g, (match, index: string | undefined, rest: string | undefined) => {
        if (index === undefined) return match;
        const value = values[Number(index)];
        if (value === undefined) {
            throw new RefactoringError(`Format item {${index}} has no matching argument`);
        }
        return `{${holeExpression(value)}${rest ?? ''}}`;
    });

    const replacement = `${verbatim ? '$@' : '$'}"${converted}"`;
    return edit(
        doc.applyEdits([{ start: doc.tokens[call].start, end: doc.tokens[close].end, text: replacement }]),
        'Converted string.Format call to interpolated string'
    );
}

const CHAIN_KEYWORDS = ['this', 'base', 'null', 'true', 'false', 'new', 'typeof', 'default', 'sizeof', 'checked', 'unchecked'];

function isChainToken(doc: SourceDocument, index: number): boolean {
    const token = doc.tokens[index];
    switch (token.kind) {
        case 'identifier':
        case 'number':
        case 'string':
        case 'char':
            return true;
        case 'keyword':
            return CHAIN_KEYWORDS.includes(token.text);
        case 'punct':
            return ['+', '.', '?.', '::'].includes(token.text);
        default:
            return false;
    }
}

/** First and last token index of the `+` chain around a string literal. */
function concatenationBounds(doc: SourceDocument, literal: number): [number, number] {
    let first = literal;
    for (let p = doc.prevSignificant(first); p >= 0; p = doc.prevSignificant(first)) {
        if (isPunct(doc.tokens[p], ')', ']')) {
            const open = doc.matchingOpen(p);
            if (open < 0) break;
            first = open;
        } else if (isChainToken(doc, p)) {
            first = p;
        } else {
            break;
        }
    }

    let last = literal;
    for (let n = doc.nextSignificant(last); n >= 0; n = doc.nextSignificant(last)) {
        if (isPunct(doc.tokens[n], '(', '[')) {
            const close = doc.matchingClose(n);
            if (close < 0) break;
            last = close;
        } else if (isChainToken(doc, n)) {
            last = n;
        } else {
            break;
        }
    }

    // A dangling '+' belongs to something else.
    while (isPunct(doc.tokens[first], '+')) first = doc.nextSignificant(first);
    while (isPunct(doc.tokens[last], '+')) last = doc.prevSignificant(last);
    return [first, last];
}

export function convertToInterpolatedString(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const literal = literalAt(doc, request, 'string', 'string literal');
    const [first, last] = concatenationBounds(doc, literal);

    const operands: { text: string; single: number }[] = [];
    let start = first;
    let depth = 0;
    for (let i = first; i <= last; i++) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[')) depth++;
        else if (isPunct(token, ')', ']')) depth--;
        if (i === last || (depth === 0 && isPunct(token, '+'))) {
            const end = i === last && !isPunct(token, '+') ? i : doc.prevSignificant(i);
            operands.push({
                text: doc.slice(doc.tokens[start].start, doc.tokens[end].end),
                single: start === end ? start : -1
            });
            start = doc.nextSignificant(i);
        }
    }

    if (operands.length < 2) {
        throw new RefactoringError(`No string concatenation found at line ${request.lineNumber}`);
    }

    const stringOperand = (operand: { single: number }) =>
        operand.single >= 0 && doc.tokens[operand.single].kind === 'string';
    if (!stringOperand(operands[0]) && !stringOperand(operands[1])) {
        throw new RefactoringError('The concatenation starts with two non-string operands; converting it would change the result');
    }

    let body = '';
    for (const operand of operands) {
        if (!stringOperand(operand)) {
            body += `{${holeExpression(operand.text)}}`;
        } else if (operand.text.startsWith('$"')) {
            body += operand.text.slice(2, -1);
        } else if (operand.text.startsWith('"') && !operand.text.startsWith('"""')) {
            body += operand.text.slice(1, -1).replace(/\{/g, '{{').replace(/\}/g, '}}');
        } else {
            throw new RefactoringError('Only regular and interpolated string literals can be merged');
        }
    }

    return edit(
        doc.applyEdits([{ start: doc.tokens[first].start, end: doc.tokens[last].end, text: `$"${body}"` }]),
        `Converted concatenation of ${pluralize(operands.length, 'operand')} to interpolated string`
    );
}
