import { getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import { tokenize } from '../lexer.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { enclosingType, memberLines } from './members.js';
import { parseIntegerLiteral } from './literals.js';
import { isPrimaryExpression } from './expressions.js';
import {
    MEMBER_MODIFIERS,
    TYPE_KEYWORDS,
    declaresName,
    escapeRegExp,
    isAssigned,
    isMemberAccess,
    isPunct,
    isWord,
    negateCondition
} from './shared.js';

/** First token on the request line that is the given keyword. */
function keywordOnLine(doc: SourceDocument, request: OperationRequest, keyword: string): number {
    const found = doc.significantOnLine(request.lineNumber).find(i => isWord(doc.tokens[i], keyword));
    if (found === undefined) {
        throw new RefactoringError(`No '${keyword}' statement found at line ${request.lineNumber}`);
    }
    return found;
}

function parenthesized(doc: SourceDocument, keyword: number): [number, number] {
    const open = doc.nextSignificant(keyword);
    const close = isPunct(doc.tokens[open], '(') ? doc.matchingClose(open) : -1;
    if (close < 0) {
        throw new RefactoringError(`Malformed '${doc.tokens[keyword].text}' statement`);
    }
    return [open, close];
}

function adjust(expr: string, delta: 1 | -1): string {
    if (/^\d+$/.test(expr)) return String(Number(expr) + delta);
    const cancel = delta === 1 ? /^(.*\S)\s*-\s*1$/ : /^(.*\S)\s*\+\s*1$/;
    const cancelled = cancel.exec(expr);
    if (cancelled) return cancelled[1];
    const operand = /[?&|^<>=]/.test(expr) ? `(${expr})` : expr;
    return `${operand} ${delta === 1 ? '+' : '-'} 1`;
}

const FOR_HEADER =
    /^\s*([\w.]+)\s+([A-Za-z_]\w*)\s*=\s*(.+?)\s*;\s*([A-Za-z_]\w*)\s*(<=|<|>=|>)\s*(.+?)\s*;\s*(?:([A-Za-z_]\w*)\s*(\+\+|--)|(\+\+|--)\s*([A-Za-z_]\w*)|([A-Za-z_]\w*)\s*([+-])=\s*1)\s*$/;

export function reverseForStatement(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const [open, close] = parenthesized(doc, keywordOnLine(doc, request, 'for'));
    const header = doc.slice(doc.tokens[open].end, doc.tokens[close].start);
    const match = FOR_HEADER.exec(header);
    const unsupported = () => new RefactoringError('Only counting loops of the form for (T i = a; i < b; i++) can be reversed');
    if (!match) throw unsupported();

    const [, type, variable, start, conditionVar, op, bound] = match;
    const stepVar = match[7] ?? match[10] ?? match[11];
    const step = match[8] ?? match[9] ?? (match[12] === '+' ? '++' : '--');
    if (conditionVar !== variable || stepVar !== variable) throw unsupported();
    const ascending = step === '++';
    if (ascending !== (op === '<' || op === '<=')) throw unsupported();

    let reversed: string;
    if (ascending) {
        const from = op === '<' ? adjust(bound, -1) : bound;
        reversed = `${type} ${variable} = ${from}; ${variable} >= ${start}; ${variable}--`;
    } else {
        const from = op === '>' ? adjust(bound, 1) : bound;
        const limit = /^(.*\S)\s*-\s*1$/.exec(start);
        const condition = limit ? `${variable} < ${limit[1]}` : `${variable} <= ${start}`;
        reversed = `${type} ${variable} = ${from}; ${condition}; ${variable}++`;
    }

    return edit(
        doc.applyEdits([{ start: doc.tokens[open].end, end: doc.tokens[close].start, text: reversed }]),
        'Reversed for loop'
    );
}

export function invertIfStatement(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const [open, close] = parenthesized(doc, keywordOnLine(doc, request, 'if'));

    const thenOpen = doc.nextSignificant(close);
    const thenClose = isPunct(doc.tokens[thenOpen], '{') ? doc.matchingClose(thenOpen) : -1;
    if (thenClose < 0) {
        throw new RefactoringError('The if branch must be a block');
    }
    const elseKeyword = doc.nextSignificant(thenClose);
    if (!isWord(doc.tokens[elseKeyword], 'else')) {
        throw new RefactoringError('The if statement has no else branch');
    }
    const elseOpen = doc.nextSignificant(elseKeyword);
    const elseClose = isPunct(doc.tokens[elseOpen], '{') ? doc.matchingClose(elseOpen) : -1;
    if (elseClose < 0) {
        throw new RefactoringError('The else branch must be a block; else-if chains cannot be inverted');
    }

    const condition = doc.slice(doc.tokens[open].end, doc.tokens[close].start);
    const thenBody = doc.slice(doc.tokens[thenOpen].end, doc.tokens[thenClose].start);
    const elseBody = doc.slice(doc.tokens[elseOpen].end, doc.tokens[elseClose].start);

    return edit(doc.applyEdits([
        { start: doc.tokens[open].end, end: doc.tokens[close].start, text: negateCondition(condition) },
        { start: doc.tokens[thenOpen].end, end: doc.tokens[thenClose].start, text: elseBody },
        { start: doc.tokens[elseOpen].end, end: doc.tokens[elseClose].start, text: thenBody }
    ]), 'Inverted if statement');
}

/** Type of a literal-like initializer, or undefined when it cannot be read off the tokens. */
export function inferInitializerType(doc: SourceDocument, first: number, last: number): string | undefined {
    let start = first;
    if (isPunct(doc.tokens[start], '-') && start !== last) start = doc.nextSignificant(start);
    const token = doc.tokens[start];

    if (start === last) {
        switch (token.kind) {
            case 'string': return 'string';
            case 'char': return 'char';
            case 'number': return numericLiteralType(token.text);
            case 'keyword':
                if (token.text === 'true' || token.text === 'false') return 'bool';
                return undefined;
            default: return undefined;
        }
    }

    if (isWord(token, 'new')) {
        const typeStart = doc.nextSignificant(start);
        let i = typeStart;
        while (i >= 0 && i <= last && !isPunct(doc.tokens[i], '(', '{', '[')) i = doc.nextSignificant(i);
        if (i === typeStart || i < 0 || i > last || isPunct(doc.tokens[i], '[')) return undefined;
        return doc.slice(doc.tokens[typeStart].start, doc.tokens[doc.prevSignificant(i)].end);
    }

    if (isWord(token, 'default') && isPunct(doc.tokens[doc.nextSignificant(start)], '(')) {
        const open = doc.nextSignificant(start);
        const close = doc.matchingClose(open);
        if (close === last) return doc.slice(doc.tokens[open].end, doc.tokens[close].start).trim();
    }
    return undefined;
}

function numericLiteralType(text: string): string {
    const hex = /^0[xX]/.test(text);
    if (!hex) {
        if (/[fF]$/.test(text)) return 'float';
        if (/[dD]$/.test(text)) return 'double';
        if (/[mM]$/.test(text)) return 'decimal';
        if (/[.eE]/.test(text)) return 'double';
    }
    const { value, suffix } = parseIntegerLiteral(text);
    const s = suffix.toLowerCase();
    if (s === 'ul' || s === 'lu') return 'ulong';
    if (s === 'u') return value <= 0xFFFFFFFFn ? 'uint' : 'ulong';
    if (s === 'l') return value <= 0x7FFFFFFFFFFFFFFFn ? 'long' : 'ulong';
    if (value <= 0x7FFFFFFFn) return 'int';
    if (value <= 0xFFFFFFFFn) return 'uint';
    return value <= 0x7FFFFFFFFFFFFFFFn ? 'long' : 'ulong';
}

/** Token index of the `;` ending the statement that starts at `first`. */
export function statementEnd(doc: SourceDocument, first: number): number {
    let depth = 0;
    for (let i = first; i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && isPunct(token, ';')) return i;
        if (depth < 0) break;
    }
    throw new RefactoringError('Unterminated statement');
}

export function useExplicitType(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const onLine = doc.significantOnLine(request.lineNumber);
    const varIndex = onLine.find(i => {
        const name = doc.nextSignificant(i);
        return doc.tokens[i].kind === 'identifier' && doc.tokens[i].text === 'var'
            && doc.tokens[name]?.kind === 'identifier'
            && isPunct(doc.tokens[doc.nextSignificant(name)], '=');
    });
    if (varIndex === undefined) {
        throw new RefactoringError(`No 'var' declaration found at line ${request.lineNumber}`);
    }

    const equals = doc.nextSignificant(doc.nextSignificant(varIndex));
    const end = statementEnd(doc, equals);
    const first = doc.nextSignificant(equals);
    const type = first < end ? inferInitializerType(doc, first, doc.prevSignificant(end)) : undefined;
    if (type === undefined) {
        const initializer = doc.slice(doc.tokens[equals].end, doc.tokens[end].start).trim();
        throw new RefactoringError(`Cannot infer the type of '${initializer}' without semantic information`);
    }

    const token = doc.tokens[varIndex];
    return edit(doc.applyEdits([{ start: token.start, end: token.end, text: type }]), `Replaced 'var' with '${type}'`);
}

export function useImplicitType(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const line = request.lineNumber;
    const onLine = doc.significantOnLine(line);
    const notFound = () => new RefactoringError(`No local variable declaration found at line ${line}`);
    if (onLine.length === 0) throw notFound();

    const first = onLine[0];
    if (MEMBER_MODIFIERS.has(doc.tokens[first].text)) {
        throw new RefactoringError("Fields and constants cannot be declared with 'var'");
    }
    const type = enclosingType(doc, request);
    if (type && memberLines(doc, type).includes(line)) {
        throw new RefactoringError("Fields cannot be declared with 'var'");
    }
    if (isWord(doc.tokens[first], 'var')) {
        throw new RefactoringError("The declaration already uses 'var'");
    }

    const equals = onLine.find(i => isPunct(doc.tokens[i], '='));
    if (equals === undefined) throw notFound();
    const name = doc.prevSignificant(equals);
    if (name <= first || doc.tokens[name].kind !== 'identifier') throw notFound();
    for (let i = first; i < name; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (token.kind === 'punct' && !['<', '>', '[', ']', '?', ',', '.'].includes(token.text)) throw notFound();
        if (token.kind === 'keyword' && !TYPE_KEYWORDS.has(token.text)) throw notFound();
    }
    const typeEnd = doc.tokens[doc.prevSignificant(name)].end;
    const declared = doc.slice(doc.tokens[first].start, typeEnd);

    const end = statementEnd(doc, equals);
    const initStart = doc.nextSignificant(equals);
    const initLast = doc.prevSignificant(end);
    if (initStart >= end) throw notFound();
    for (let i = initStart, depth = 0; i < end; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && isPunct(token, ',')) {
            throw new RefactoringError("Declarations with several variables cannot use 'var'");
        } else if (isPunct(token, '=>')) {
            throw new RefactoringError("Lambda initializers cannot use 'var'");
        }
    }

    const init = doc.tokens[initStart];
    if (initStart === initLast && (isWord(init, 'null', 'default'))) {
        throw new RefactoringError(`'${init.text}' has no type; 'var' cannot be used`);
    }

    const edits = [{ start: doc.tokens[first].start, end: typeEnd, text: 'var' }];
    if (isWord(init, 'new') && isPunct(doc.tokens[doc.nextSignificant(initStart)], '(')) {
        edits.push({ start: init.end, end: init.end, text: ` ${declared}` });
    } else {
        const inferred = inferInitializerType(doc, initStart, initLast);
        if (inferred !== undefined && inferred !== declared) {
            throw new RefactoringError(`The initializer has type '${inferred}', not '${declared}'`);
        }
    }

    return edit(doc.applyEdits(edits), `Replaced '${declared}' with 'var'`);
}

/** Last token of the embedded statement (block or single statement) starting at `start`. */
function embeddedEnd(doc: SourceDocument, start: number): number {
    const token = doc.tokens[start];
    if (isPunct(token, '{')) {
        const close = doc.matchingClose(start);
        if (close < 0) throw new RefactoringError('Unbalanced braces');
        return close;
    }
    if (isWord(token, 'if', 'while', 'for', 'foreach', 'using', 'lock', 'fixed')) {
        const [, close] = parenthesized(doc, start);
        const end = embeddedEnd(doc, doc.nextSignificant(close));
        const next = doc.nextSignificant(end);
        return isWord(token, 'if') && isWord(doc.tokens[next], 'else') ? embeddedEnd(doc, doc.nextSignificant(next)) : end;
    }
    if (isWord(token, 'do', 'try', 'switch', 'checked', 'unchecked', 'unsafe')) {
        throw new RefactoringError(`Wrap the '${token.text}' statement in braces first`);
    }
    return statementEnd(doc, start);
}

/** Indices of the `&&` and `||` operators outside any brackets between `open` and `close`. */
function logicalOperators(doc: SourceDocument, open: number, close: number): number[] {
    const found: number[] = [];
    let depth = 0;
    for (let i = doc.nextSignificant(open); i >= 0 && i < close; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && isPunct(token, '&&', '||')) found.push(i);
    }
    return found;
}

/** Parenthesizes a condition that would bind looser than `&&`. */
function andOperand(condition: string): string {
    let depth = 0;
    for (const token of tokenize(condition)) {
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        else if (depth === 0 && isPunct(token, '||', '?', '??', '=', '=>')) return `(${condition})`;
    }
    return condition;
}

function indentAfterBreaks(text: string, extra: string): string {
    return text.replace(/(\r?\n)(?=[^\r\n])/g, `$1${extra}`);
}

function splitIf(doc: SourceDocument, keyword: number, open: number, close: number): OperationOutcome {
    const operators = logicalOperators(doc, open, close);
    const ands = operators.filter(i => isPunct(doc.tokens[i], '&&'));
    if (ands.length === 0 || ands.length !== operators.length) {
        throw new RefactoringError("Only conditions joined by '&&' can be split");
    }
    const bodyEnd = embeddedEnd(doc, doc.nextSignificant(close));
    if (isWord(doc.tokens[doc.nextSignificant(bodyEnd)], 'else')) {
        throw new RefactoringError('An if statement with an else branch cannot be split');
    }

    const at = ands[ands.length - 1];
    const left = doc.slice(doc.tokens[open].end, doc.tokens[at].start).trim();
    const right = doc.slice(doc.tokens[at].end, doc.tokens[close].start).trim();
    const indent = doc.indentOf(doc.lineOf(doc.tokens[keyword].start));
    const eol = doc.eol;
    const body = indentAfterBreaks(doc.slice(doc.tokens[close].end, doc.tokens[bodyEnd].end), '    ');
    const text = `if (${left})${eol}${indent}{${eol}${indent}    if (${right})${body}${eol}${indent}}`;

    return edit(
        doc.applyEdits([{ start: doc.tokens[keyword].start, end: doc.tokens[bodyEnd].end, text }]),
        'Split if statement into nested if statements'
    );
}

function mergeIf(doc: SourceDocument, keyword: number, open: number, close: number): OperationOutcome {
    const notNested = () => new RefactoringError('The if statement does not contain a single nested if statement to merge');
    const bodyOpen = doc.nextSignificant(close);
    if (!isPunct(doc.tokens[bodyOpen], '{')) throw notNested();
    const bodyClose = doc.matchingClose(bodyOpen);
    if (bodyClose < 0) throw new RefactoringError('Unbalanced braces');
    if (isWord(doc.tokens[doc.nextSignificant(bodyClose)], 'else')) {
        throw new RefactoringError('An if statement with an else branch cannot be merged');
    }
    const inner = doc.nextSignificant(bodyOpen);
    if (!isWord(doc.tokens[inner], 'if')) throw notNested();
    const [innerOpen, innerClose] = parenthesized(doc, inner);
    const innerEnd = embeddedEnd(doc, doc.nextSignificant(innerClose));
    if (doc.nextSignificant(innerEnd) !== bodyClose) throw notNested();

    const outerCondition = andOperand(doc.slice(doc.tokens[open].end, doc.tokens[close].start).trim());
    const innerCondition = andOperand(doc.slice(doc.tokens[innerOpen].end, doc.tokens[innerClose].start).trim());
    const outerIndent = doc.indentOf(doc.lineOf(doc.tokens[keyword].start));
    const innerIndent = doc.indentOf(doc.lineOf(doc.tokens[inner].start));
    const extra = innerIndent.startsWith(outerIndent) ? innerIndent.slice(outerIndent.length) : '';
    let body = doc.slice(doc.tokens[innerClose].end, doc.tokens[innerEnd].end);
    if (extra !== '') body = body.replace(new RegExp(`(\\r?\\n)${escapeRegExp(extra)}`, 'g'), '$1');

    return edit(
        doc.applyEdits([{
            start: doc.tokens[keyword].start,
            end: doc.tokens[bodyClose].end,
            text: `if (${outerCondition} && ${innerCondition})${body}`
        }]),
        'Merged nested if statements'
    );
}

const IF_OPERATIONS = ['auto', 'split', 'merge'];

export function splitOrMergeIfStatements(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const requested = getString(request.arguments, 'operation', 'auto').trim().toLowerCase();
    if (!IF_OPERATIONS.includes(requested)) {
        throw new RefactoringError(`operation must be 'auto', 'split' or 'merge' (got '${requested}')`);
    }
    const keyword = keywordOnLine(doc, request, 'if');
    const [open, close] = parenthesized(doc, keyword);
    const split = requested === 'auto' ? logicalOperators(doc, open, close).length > 0 : requested === 'split';
    return split ? splitIf(doc, keyword, open, close) : mergeIf(doc, keyword, open, close);
}

const INDEXED_FOR =
    /^\s*(?:int|var)\s+([A-Za-z_]\w*)\s*=\s*0\s*;\s*([A-Za-z_]\w*)\s*<\s*(.+?)\s*\.\s*(?:Length|Count)\s*;\s*(?:([A-Za-z_]\w*)\s*\+\+|\+\+\s*([A-Za-z_]\w*))\s*$/;
const ELEMENT_NAMES = ['item', 'element', 'current', 'x', 'value'];
const INDEX_NAMES = ['i', 'j', 'k', 'index'];

function identifiersBetween(doc: SourceDocument, first: number, last: number): Set<string> {
    const names = new Set<string>();
    for (let i = first; i >= 0 && i <= last; i = doc.nextSignificant(i)) {
        if (doc.tokens[i].kind === 'identifier') names.add(doc.tokens[i].text);
    }
    return names;
}

function forToForeach(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const keyword = keywordOnLine(doc, request, 'for');
    const [open, close] = parenthesized(doc, keyword);
    const match = INDEXED_FOR.exec(doc.slice(doc.tokens[open].end, doc.tokens[close].start));
    const index = match?.[1];
    if (!match || match[2] !== index || (match[4] ?? match[5]) !== index) {
        throw new RefactoringError('Only loops of the form for (int i = 0; i < items.Length; i++) can be converted to foreach');
    }
    const collection = match[3];

    const bodyStart = doc.nextSignificant(close);
    const bodyEnd = embeddedEnd(doc, bodyStart);
    const used = identifiersBetween(doc, keyword, bodyEnd);
    const element = ELEMENT_NAMES.find(n => !used.has(n));
    if (element === undefined) {
        throw new RefactoringError(`No free name for the loop element (tried ${ELEMENT_NAMES.join(', ')})`);
    }

    const edits: TextEdit[] = [{
        start: doc.tokens[keyword].start,
        end: doc.tokens[close].end,
        text: `foreach (var ${element} in ${collection})`
    }];
    for (let i = bodyStart; i >= 0 && i <= bodyEnd; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (token.kind !== 'identifier' || token.text !== index || isMemberAccess(doc, i)) continue;
        const bracket = doc.prevSignificant(i);
        const closing = doc.nextSignificant(i);
        const collectionStart = doc.tokens[bracket].start - collection.length;
        const indexed = isPunct(doc.tokens[bracket], '[')
            && isPunct(doc.tokens[closing], ']')
            && doc.slice(collectionStart, doc.tokens[bracket].start) === collection
            && !/[\w.]/.test(doc.text[collectionStart - 1] ?? '');
        if (!indexed) {
            throw new RefactoringError(`The loop uses '${index}' other than to index '${collection}'`);
        }
        if (isAssigned(doc, doc.tokenIndexAt(collectionStart), closing)) {
            throw new RefactoringError(`The loop assigns elements of '${collection}'; a foreach variable is read-only`);
        }
        edits.push({ start: collectionStart, end: doc.tokens[closing].end, text: element });
    }

    return edit(doc.applyEdits(edits), `Converted for loop to foreach over '${collection}'`);
}

/** True when `name` is declared in the file as an array (`T[] name`). */
function declaredAsArray(doc: SourceDocument, name: string): boolean {
    return doc.tokens.some((t, i) =>
        t.kind === 'identifier' && t.text === name && declaresName(doc, i) && isPunct(doc.tokens[doc.prevSignificant(i)], ']'));
}

function foreachToFor(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const keyword = keywordOnLine(doc, request, 'foreach');
    if (isWord(doc.tokens[doc.prevSignificant(keyword)], 'await')) {
        throw new RefactoringError("'await foreach' loops cannot be converted");
    }
    const [open, close] = parenthesized(doc, keyword);
    let inKeyword = -1;
    for (let i = doc.nextSignificant(open), depth = 0; i >= 0 && i < close && inKeyword < 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '<')) depth++;
        else if (isPunct(token, ')', ']', '>')) depth--;
        else if (depth === 0 && isWord(token, 'in')) inKeyword = i;
    }
    if (inKeyword < 0) {
        throw new RefactoringError("Malformed 'foreach' statement");
    }
    const variable = doc.tokens[doc.prevSignificant(inKeyword)];
    if (variable.kind !== 'identifier') {
        throw new RefactoringError('Deconstructing foreach loops cannot be converted');
    }

    const source = doc.slice(doc.tokens[inKeyword].end, doc.tokens[close].start).trim();
    const collection = isPrimaryExpression(doc, doc.nextSignificant(inKeyword), doc.prevSignificant(close)) ? source : `(${source})`;
    const bodyStart = doc.nextSignificant(close);
    const bodyEnd = embeddedEnd(doc, bodyStart);
    const used = identifiersBetween(doc, keyword, bodyEnd);
    const index = INDEX_NAMES.find(n => !used.has(n));
    if (index === undefined) {
        throw new RefactoringError(`No free name for the loop index (tried ${INDEX_NAMES.join(', ')})`);
    }
    const size = declaredAsArray(doc, source) ? 'Length' : 'Count';

    const edits: TextEdit[] = [{
        start: doc.tokens[keyword].start,
        end: doc.tokens[close].end,
        text: `for (int ${index} = 0; ${index} < ${collection}.${size}; ${index}++)`
    }];
    for (let i = bodyStart; i >= 0 && i <= bodyEnd; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (token.kind === 'identifier' && token.text === variable.text && !isMemberAccess(doc, i)) {
            edits.push({ start: token.start, end: token.end, text: `${collection}[${index}]` });
        }
    }

    return edit(doc.applyEdits(edits), `Converted foreach loop to for loop over '${source}'`);
}

export function convertForLoop(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const target = getString(request.arguments, 'target_type', 'foreach').trim().toLowerCase();
    if (target === 'foreach') return forToForeach(doc, request);
    if (target === 'for') return foreachToFor(doc, request);
    throw new RefactoringError(`target_type must be 'foreach' or 'for' (got '${target}')`);
}
