import { getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import type { Token } from '../lexer.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { isPrimaryExpression, primaryExpressionBounds } from './expressions.js';
import { enclosingType, memberLines } from './members.js';
import { TYPE_KEYWORDS, declaresName, isAssigned, isMemberAccess, isPunct, isWord, pluralize, requireIdentifier, tokenAtPosition } from './shared.js';
import { statementEnd } from './statements.js';

interface LocalDeclaration {
    /** First token of the declaration statement. */
    first: number;
    name: number;
    /** The `=` before the initializer, or -1. */
    equals: number;
    /** The closing `;`. */
    end: number;
}

const NOT_A_TYPE = new Set(['await', 'yield', 'nameof']);

function isTypePart(token: Token, angle: number): boolean {
    return token.kind === 'identifier'
        || (token.kind === 'keyword' && TYPE_KEYWORDS.has(token.text))
        || isPunct(token, '[', ']', '?', '.', '::')
        || (angle > 0 && isPunct(token, ','));
}

/** The single-variable local declaration that starts the request line. */
function localDeclarationAt(doc: SourceDocument, request: OperationRequest): LocalDeclaration {
    const line = request.lineNumber;
    const notFound = () => new RefactoringError(`No local variable declaration found at line ${line}`);
    const onLine = doc.significantOnLine(line);
    if (onLine.length === 0) throw notFound();
    const type = enclosingType(doc, request);
    if (type && memberLines(doc, type).includes(line)) throw notFound();

    const first = onLine[0];
    const before = doc.tokens[doc.prevSignificant(first)];
    if (before !== undefined && !isPunct(before, ';', '{', '}')) throw notFound();

    const start = isWord(doc.tokens[first], 'const') ? doc.nextSignificant(first) : first;
    if (start < 0 || NOT_A_TYPE.has(doc.tokens[start].text)) throw notFound();
    let angle = 0;
    for (let i = start; i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        const next = doc.tokens[doc.nextSignificant(i)];
        if (i !== start && angle === 0 && token.kind === 'identifier'
            && isPunct(next, '=', ';', ',') && !isMemberAccess(doc, i)) {
            if (isPunct(next, ',')) {
                throw new RefactoringError('Only declarations of a single variable are supported');
            }
            return { first, name: i, equals: isPunct(next, '=') ? doc.nextSignificant(i) : -1, end: statementEnd(doc, i) };
        }
        if (isPunct(token, '<')) angle++;
        else if (isPunct(token, '>')) angle--;
        else if (!isTypePart(token, angle)) break;
    }
    throw notFound();
}

/** The `{` of the innermost block around `index`, or -1. */
function enclosingBlock(doc: SourceDocument, index: number): number {
    let depth = 0;
    for (let i = doc.prevSignificant(index); i >= 0; i = doc.prevSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '}')) depth++;
        else if (isPunct(token, '{')) {
            if (depth === 0) return i;
            depth--;
        }
    }
    return -1;
}

function continuesStatement(token: Token | undefined): boolean {
    return isWord(token, 'else', 'catch', 'finally', 'while') || isPunct(token, ';', ',', ')', '.', '?.');
}

/** First and last token of each statement directly inside a block. */
function blockStatements(doc: SourceDocument, open: number, close: number): [number, number][] {
    const statements: [number, number][] = [];
    let first = -1;
    let depth = 0;
    for (let i = doc.nextSignificant(open); i >= 0 && i < close; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        const next = doc.tokens[doc.nextSignificant(i)];
        if (first < 0) first = i;
        if (isPunct(token, '(', '[', '{')) {
            depth++;
        } else if (isPunct(token, ')', ']', '}')) {
            depth--;
            if (depth === 0 && isPunct(token, '}') && !continuesStatement(next)) {
                statements.push([first, i]);
                first = -1;
            }
        } else if (depth === 0 && isPunct(token, ';') && !isWord(next, 'else')) {
            statements.push([first, i]);
            first = -1;
        }
    }
    if (first >= 0) statements.push([first, doc.prevSignificant(close)]);
    return statements;
}

function ownsLines(doc: SourceDocument, first: number, last: number): boolean {
    const onFirst = doc.significantOnLine(doc.lineOf(doc.tokens[first].start));
    const onLast = doc.significantOnLine(doc.lineOf(doc.tokens[last].start));
    return onFirst[0] === first && onLast[onLast.length - 1] === last;
}

/** Deletes a statement, taking its whole lines with it when nothing else shares them. */
function statementRemoval(doc: SourceDocument, first: number, last: number): TextEdit {
    const lastLine = doc.lineOf(doc.tokens[last].start);
    if (ownsLines(doc, first, last)) {
        const end = lastLine < doc.lineCount ? doc.lineStart(lastLine + 1) : doc.text.length;
        return { start: doc.lineStart(doc.lineOf(doc.tokens[first].start)), end, text: '' };
    }
    const next = doc.nextSignificant(last);
    const end = next >= 0 && doc.lineOf(doc.tokens[next].start) === lastLine ? doc.tokens[next].start : doc.tokens[last].end;
    return { start: doc.tokens[first].start, end, text: '' };
}

function isReference(doc: SourceDocument, index: number, name: string): boolean {
    const token = doc.tokens[index];
    if (token.kind !== 'identifier' || token.text !== name || isMemberAccess(doc, index)) return false;
    const namedArgument = isPunct(doc.tokens[doc.nextSignificant(index)], ':')
        && isPunct(doc.tokens[doc.prevSignificant(index)], '(', ',');
    return !namedArgument;
}

function blockOf(doc: SourceDocument, declaration: LocalDeclaration): [number, number] {
    const open = enclosingBlock(doc, declaration.first);
    const close = open < 0 ? -1 : doc.matchingClose(open);
    if (close < 0) {
        throw new RefactoringError('Variable declaration must be inside a block');
    }
    return [open, close];
}

/** True when a value can replace the identifier at `index` without parentheses. */
function delimited(doc: SourceDocument, index: number): boolean {
    const prev = doc.tokens[doc.prevSignificant(index)];
    const next = doc.tokens[doc.nextSignificant(index)];
    return (isPunct(prev, '(', ',', '=', '[') || isWord(prev, 'return'))
        && isPunct(next, ')', ',', ';', ']');
}

export function inlineTemporaryVariable(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const declaration = localDeclarationAt(doc, request);
    const name = doc.tokens[declaration.name].text;
    if (declaration.equals < 0) {
        throw new RefactoringError(`Variable '${name}' must have an initializer`);
    }
    const [, close] = blockOf(doc, declaration);

    const initFirst = doc.nextSignificant(declaration.equals);
    const initLast = doc.prevSignificant(declaration.end);
    if (isPunct(doc.tokens[initFirst], '{')) {
        throw new RefactoringError('Array initializers cannot be inlined');
    }
    const initializer = doc.slice(doc.tokens[initFirst].start, doc.tokens[initLast].end);
    const primary = isPrimaryExpression(doc, initFirst, initLast);

    const references: number[] = [];
    for (let i = doc.nextSignificant(declaration.end); i >= 0 && i < close; i = doc.nextSignificant(i)) {
        if (!isReference(doc, i, name)) continue;
        if (isAssigned(doc, i, i)) {
            throw new RefactoringError(`Variable '${name}' is assigned after its declaration and cannot be inlined`);
        }
        references.push(i);
    }

    const edits: TextEdit[] = [statementRemoval(doc, declaration.first, declaration.end)];
    for (const i of references) {
        const token = doc.tokens[i];
        const text = primary || delimited(doc, i) ? initializer : `(${initializer})`;
        edits.push({ start: token.start, end: token.end, text });
    }
    const summary = references.length === 0
        ? `Removed unused temporary variable '${name}'`
        : `Inlined temporary variable '${name}' into ${pluralize(references.length, 'reference')}`;
    return edit(doc.applyEdits(edits), summary);
}

const LOOP_KEYWORDS = ['for', 'foreach', 'while', 'do'];
const HEADER_KEYWORDS = ['if', 'switch', 'using', 'lock'];

/** First token of the statement holding `first`, walking out of brackets but not out of blocks. */
function statementStart(doc: SourceDocument, first: number): number {
    let start = first;
    let depth = 0;
    for (let i = doc.prevSignificant(first); i >= 0; i = doc.prevSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, ')', ']')) depth++;
        else if (isPunct(token, '(', '[')) depth = Math.max(0, depth - 1);
        else if (depth === 0 && isPunct(token, ';', '{', '}')) break;
        else if (isPunct(token, '=>')) {
            throw new RefactoringError('Expressions inside a lambda or expression body cannot be moved to a local variable');
        }
        start = i;
    }
    return start;
}

export function introduceLocalVariable(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const name = requireIdentifier(getString(request.arguments, 'variable_name', 'temp'), 'variable_name');
    const [first, last] = primaryExpressionBounds(doc, tokenAtPosition(doc, request));
    if (first === last) {
        throw new RefactoringError(`No suitable expression found at line ${request.lineNumber}, column ${request.columnNumber}`);
    }
    if (isAssigned(doc, first, last)) {
        throw new RefactoringError('The expression is assigned to and cannot be replaced by a local variable');
    }

    const start = statementStart(doc, first);
    const line = doc.lineOf(doc.tokens[start].start);
    const type = enclosingType(doc, { ...request, lineNumber: line, columnNumber: doc.columnOf(doc.tokens[start].start) });
    if (type && memberLines(doc, type).includes(line)) {
        throw new RefactoringError('Only expressions inside method bodies can be moved to a local variable');
    }
    const keyword = doc.tokens[start];
    if (isWord(keyword, ...LOOP_KEYWORDS)) {
        throw new RefactoringError(`Expressions in a '${keyword.text}' loop cannot be moved to a local variable`);
    }
    if (isWord(keyword, 'else')) {
        throw new RefactoringError("Wrap the body of the 'else' clause in braces first");
    }
    if (isWord(keyword, ...HEADER_KEYWORDS)) {
        const open = doc.nextSignificant(start);
        const close = isPunct(doc.tokens[open], '(') ? doc.matchingClose(open) : -1;
        if (!(first > open && last < close)) {
            throw new RefactoringError(`Wrap the body of the '${keyword.text}' statement in braces first`);
        }
    }

    const before = doc.prevSignificant(first);
    const target = doc.prevSignificant(before);
    if (isPunct(doc.tokens[before], '=') && isPunct(doc.tokens[doc.nextSignificant(last)], ';') && declaresName(doc, target)) {
        throw new RefactoringError(`The expression already initializes '${doc.tokens[target].text}'`);
    }

    const block = enclosingBlock(doc, start);
    const scopeEnd = block < 0 ? doc.tokens.length - 1 : doc.matchingClose(block);
    for (let i = Math.max(0, block); i >= 0 && i <= scopeEnd; i = doc.nextSignificant(i)) {
        if (doc.tokens[i].kind === 'identifier' && doc.tokens[i].text === name) {
            throw new RefactoringError(`A symbol named '${name}' already exists`);
        }
    }

    const expression = doc.slice(doc.tokens[first].start, doc.tokens[last].end);
    const insertion: TextEdit = doc.significantOnLine(line)[0] === start
        ? { start: doc.lineStart(line), end: doc.lineStart(line), text: `${doc.indentOf(line)}var ${name} = ${expression};${doc.eol}` }
        : { start: keyword.start, end: keyword.start, text: `var ${name} = ${expression}; ` };
    return edit(
        doc.applyEdits([insertion, { start: doc.tokens[first].start, end: doc.tokens[last].end, text: name }]),
        `Introduced local variable '${name}' for '${expression}'`
    );
}

export function moveDeclarationNearReference(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const declaration = localDeclarationAt(doc, request);
    const name = doc.tokens[declaration.name].text;
    const [open, close] = blockOf(doc, declaration);
    const statements = blockStatements(doc, open, close);
    const own = statements.findIndex(([first]) => first === declaration.first);

    const uses = (first: number, last: number) => {
        for (let i = first; i >= 0 && i <= last; i = doc.nextSignificant(i)) {
            if (isReference(doc, i, name)) return true;
        }
        return false;
    };
    const user = statements.findIndex(([first, last], k) => k > own && uses(first, last));
    if (own < 0 || user < 0) {
        return edit(doc.text, `Variable '${name}' is not used after its declaration`);
    }
    if (user === own + 1) {
        return edit(doc.text, `Variable '${name}' is already next to its first use`);
    }

    const target = statements[user][0];
    const targetLine = doc.lineOf(doc.tokens[target].start);
    const statement = doc.slice(doc.tokens[declaration.first].start, doc.tokens[declaration.end].end);
    const insertion: TextEdit = doc.significantOnLine(targetLine)[0] === target
        ? { start: doc.lineStart(targetLine), end: doc.lineStart(targetLine), text: `${doc.indentOf(targetLine)}${statement}${doc.eol}` }
        : { start: doc.tokens[target].start, end: doc.tokens[target].start, text: `${statement} ` };
    return edit(
        doc.applyEdits([statementRemoval(doc, declaration.first, declaration.end), insertion]),
        `Moved declaration of '${name}' next to its first use at line ${targetLine}`
    );
}
