import { getInt, getString } from '../../../utils/arguments.js';
import type { SourceDocument } from '../document.js';
import { RefactoringError } from '../errors.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { findTypeDeclaration, memberLines } from './members.js';
import { MEMBER_MODIFIERS, declaresName, isMemberAccess, isPunct, isWord, pluralize, requireIdentifier } from './shared.js';

function declaredNames(doc: SourceDocument, from: number, to: number): Set<string> {
    const names = new Set<string>();
    for (let i = from; i >= 0 && i < to; i = doc.nextSignificant(i)) {
        if (declaresName(doc, i)) names.add(doc.tokens[i].text);
    }
    return names;
}

export function extractMethod(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const name = requireIdentifier(getString(request.arguments, 'method_name'), 'method_name');
    const startLine = request.lineNumber;
    const endLine = getInt(request.arguments, 'end_line_number', startLine);
    if (endLine < startLine) {
        throw new RefactoringError(`end_line_number ${endLine} is before line_number ${startLine}`);
    }
    doc.lineStart(endLine); // throws when the range runs past the file

    const selection: number[] = [];
    for (let line = startLine; line <= endLine; line++) selection.push(...doc.significantOnLine(line));
    if (selection.length === 0) {
        throw new RefactoringError(`No statements selected between lines ${startLine} and ${endLine}`);
    }
    const first = selection[0];
    const last = selection[selection.length - 1];

    // The enclosing method: the nearest member line above the selection that is not a lone brace.
    const type = findTypeDeclaration(doc, request);
    const memberLine = memberLines(doc, type)
        .filter(l => l < startLine && !isPunct(doc.tokens[doc.significantOnLine(l)[0]], '{'))
        .pop();
    const outside = () => new RefactoringError('The selection must be inside a method body');
    if (memberLine === undefined) throw outside();
    const memberFirst = doc.significantOnLine(memberLine)[0];
    let bodyOpen = -1;
    for (let i = memberFirst; i >= 0 && bodyOpen < 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(')) i = doc.matchingClose(i);
        else if (isPunct(token, '{')) bodyOpen = i;
        else if (isPunct(token, ';', '=>')) throw outside();
        if (i < 0) throw outside();
    }
    if (bodyOpen < 0) throw outside();
    const bodyClose = doc.matchingClose(bodyOpen);
    if (
        bodyClose < 0 ||
        doc.lineOf(doc.tokens[bodyOpen].start) >= startLine ||
        doc.lineOf(doc.tokens[bodyClose].start) <= endLine
    ) {
        throw outside();
    }

    let depth = 0;
    for (const i of selection) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
        if (depth < 0) break;
        if (isWord(token, 'return', 'goto')) {
            throw new RefactoringError(`The selection contains '${token.text}' and cannot be extracted`);
        }
        if (token.kind === 'identifier' && (token.text === 'await' || token.text === 'yield')) {
            throw new RefactoringError(`The selection contains '${token.text}' and cannot be extracted`);
        }
    }
    if (depth !== 0 || !isPunct(doc.tokens[last], ';', '}')) {
        throw new RefactoringError('The selection must contain complete statements');
    }

    const outer = declaredNames(doc, memberFirst, first);
    const inner = declaredNames(doc, first, last + 1);
    for (const i of selection) {
        const text = doc.tokens[i].text;
        if (doc.tokens[i].kind === 'identifier' && !isMemberAccess(doc, i) && outer.has(text) && !inner.has(text)) {
            throw new RefactoringError(`The selection uses '${text}', which is declared outside it`);
        }
    }
    for (let i = doc.nextSignificant(last); i >= 0 && i < bodyClose; i = doc.nextSignificant(i)) {
        const text = doc.tokens[i].text;
        if (doc.tokens[i].kind === 'identifier' && !isMemberAccess(doc, i) && inner.has(text)) {
            throw new RefactoringError(`'${text}' is declared in the selection and used after it`);
        }
    }

    for (let i = type.open; i < type.close; i++) {
        if (doc.tokens[i].text === name && isPunct(doc.tokens[doc.nextSignificant(i)], '(') && !isMemberAccess(doc, i)) {
            throw new RefactoringError(`A method named '${name}' already exists in '${type.name}'`);
        }
    }

    const modifiers: string[] = [];
    for (let i = memberFirst; i >= 0 && MEMBER_MODIFIERS.has(doc.tokens[i].text); i = doc.nextSignificant(i)) {
        modifiers.push(doc.tokens[i].text);
    }

    const eol = doc.eol;
    const memberIndent = doc.indentOf(memberLine);
    const lines: string[] = [];
    for (let line = startLine; line <= endLine; line++) lines.push(doc.lineText(line));
    const margin = Math.min(...lines.filter(l => l.trim() !== '').map(l => l.length - l.trimStart().length));
    const body = lines.map(l => (l.trim() === '' ? '' : `${memberIndent}    ${l.slice(margin)}`));
    const method = [
        '',
        `${memberIndent}private ${modifiers.includes('static') ? 'static ' : ''}void ${name}()`,
        `${memberIndent}{`,
        ...body,
        `${memberIndent}}`
    ].join(eol);

    const closeLineEnd = doc.lineEnd(doc.lineOf(doc.tokens[bodyClose].start));
    return edit(doc.applyEdits([
        { start: doc.lineStart(startLine), end: doc.lineEnd(endLine), text: `${doc.indentOf(startLine)}${name}();` },
        { start: closeLineEnd, end: closeLineEnd, text: eol + method }
    ]), `Extracted ${pluralize(endLine - startLine + 1, 'line')} into method '${name}'`);
}
