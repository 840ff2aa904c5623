import { basename } from 'path';
import { getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { ACCESS_MODIFIERS, MEMBER_MODIFIERS, declaresName, isMemberAccess, isPunct, isWord, requireIdentifier } from './shared.js';
import { usingInsertion } from './usings.js';

export type TypeKind = 'class' | 'struct' | 'interface' | 'record';

export interface TypeDeclaration {
    kind: TypeKind;
    name: string;
    /** Line of the first modifier (or the type keyword when there is none). */
    line: number;
    modifiers: string[];
    /** Token index of `{` and its matching `}`. */
    open: number;
    close: number;
}

function declarationAt(doc: SourceDocument, keyword: number): TypeDeclaration | undefined {
    const token = doc.tokens[keyword];
    let kind: TypeKind;
    const text = token.text;
    if (token.kind === 'keyword' && (text === 'class' || text === 'struct' || text === 'interface')) kind = text;
    else if (token.kind === 'identifier' && token.text === 'record') kind = 'record';
    else return undefined;

    const nameIndex = doc.nextSignificant(keyword);
    if (kind === 'record' && isWord(doc.tokens[nameIndex], 'class', 'struct')) return undefined;
    const nameToken = doc.tokens[nameIndex];
    if (nameToken === undefined || nameToken.kind !== 'identifier') return undefined;

    let open = -1;
    for (let i = doc.nextSignificant(nameIndex); i >= 0; i = doc.nextSignificant(i)) {
        const t = doc.tokens[i];
        if (isPunct(t, '(')) {
            i = doc.matchingClose(i);
            if (i < 0) return undefined;
        } else if (isPunct(t, '{')) {
            open = i;
            break;
        } else if (isPunct(t, ';', '}')) {
            return undefined;
        }
    }
    const close = open < 0 ? -1 : doc.matchingClose(open);
    if (close < 0) return undefined;

    const modifiers: string[] = [];
    let first = keyword;
    for (let p = doc.prevSignificant(keyword); p >= 0 && MEMBER_MODIFIERS.has(doc.tokens[p].text); p = doc.prevSignificant(p)) {
        modifiers.unshift(doc.tokens[p].text);
        first = p;
    }
    return { kind, name: nameToken.text, line: doc.lineOf(doc.tokens[first].start), modifiers, open, close };
}

/**
 * The innermost type declaration whose body contains the request position,
 * or whose header sits on the request line.
 */
export function enclosingType(doc: SourceDocument, request: OperationRequest): TypeDeclaration | undefined {
    const offset = doc.offsetAt(request.lineNumber, request.columnNumber);
    let best: TypeDeclaration | undefined;
    for (let i = 0; i < doc.tokens.length; i++) {
        const declaration = declarationAt(doc, i);
        if (!declaration) continue;
        const onHeader = request.lineNumber >= declaration.line && request.lineNumber <= doc.lineOf(doc.tokens[declaration.open].start);
        if (onHeader) return declaration;
        const inside = doc.tokens[declaration.open].start < offset && offset <= doc.tokens[declaration.close].start;
        if (inside) best = declaration;
    }
    return best;
}

/** Every type declaration in the file, outermost first. */
export function typeDeclarations(doc: SourceDocument): TypeDeclaration[] {
    const found: TypeDeclaration[] = [];
    for (let i = 0; i < doc.tokens.length; i++) {
        const declaration = declarationAt(doc, i);
        if (declaration) found.push(declaration);
    }
    return found;
}

export function findTypeDeclaration(doc: SourceDocument, request: OperationRequest): TypeDeclaration {
    const type = enclosingType(doc, request);
    if (!type) {
        throw new RefactoringError(`No type declaration found at line ${request.lineNumber}`);
    }
    return type;
}

/** Lines whose first token sits directly in the type body. */
export function memberLines(doc: SourceDocument, type: TypeDeclaration): number[] {
    const lines: number[] = [];
    let depth = 0;
    let lastLine = doc.lineOf(doc.tokens[type.open].start);
    for (let i = doc.nextSignificant(type.open); i >= 0 && i < type.close; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        const line = doc.lineOf(token.start);
        if (line !== lastLine && depth === 0) lines.push(line);
        lastLine = line;
        if (isPunct(token, '{')) depth++;
        else if (isPunct(token, '}')) depth--;
    }
    return lines;
}

const TYPE_NAME = String.raw`[\w.?[\]]+(?:<[^;{}]*>)?[?[\]]*`;

const PUBLIC_PROPERTY = new RegExp(
    String.raw`^\s*public\s+(?:(?:static|virtual|override|required|new|sealed)\s+)*${TYPE_NAME}\s+(\w+)\s*(?:\{\s*(?:get|set|init|private|protected|internal)\b|=>)`
);

function memberIndent(doc: SourceDocument, type: TypeDeclaration): string {
    const members = memberLines(doc, type);
    return members.length > 0 ? doc.indentOf(members[0]) : doc.indentOf(type.line) + '    ';
}

export function generateDefaultConstructor(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const type = findTypeDeclaration(doc, request);
    if (type.kind === 'interface') {
        throw new RefactoringError(`Interface '${type.name}' cannot declare a constructor`);
    }
    if (type.modifiers.includes('static')) {
        throw new RefactoringError(`Static class '${type.name}' cannot have an instance constructor`);
    }

    for (const line of memberLines(doc, type)) {
        const onLine = doc.significantOnLine(line);
        const nameAt = onLine.findIndex(i => doc.tokens[i].text === type.name);
        if (nameAt < 0 || onLine.slice(0, nameAt).some(i => !ACCESS_MODIFIERS.has(doc.tokens[i].text))) continue;
        const paren = onLine[nameAt + 1];
        if (isPunct(doc.tokens[paren], '(') && isPunct(doc.tokens[doc.nextSignificant(paren)], ')')) {
            throw new RefactoringError(`'${type.name}' already has a parameterless constructor`);
        }
    }

    const access = type.modifiers.includes('abstract') ? 'protected' : 'public';
    const indent = memberIndent(doc, type);
    const eol = doc.eol;
    const ctor = `${indent}${access} ${type.name}()${eol}${indent}{${eol}${indent}}`;
    const open = doc.tokens[type.open];
    const openLine = doc.lineOf(open.start);
    const hasMembers = doc.nextSignificant(type.open) !== type.close;

    let change: TextEdit;
    if (openLine === doc.lineOf(doc.tokens[type.close].start)) {
        change = {
            start: open.end,
            end: doc.tokens[type.close].start,
            text: eol + ctor + eol + doc.indentOf(openLine)
        };
    } else {
        const end = doc.lineEnd(openLine);
        change = { start: end, end, text: eol + ctor + (hasMembers ? eol : '') };
    }

    return edit(doc.applyEdits([change]), `Generated default constructor for '${type.name}'`);
}

function defaultDisplayFormat(doc: SourceDocument, type: TypeDeclaration): string {
    const properties: string[] = [];
    for (const line of memberLines(doc, type)) {
        const match = PUBLIC_PROPERTY.exec(doc.lineText(line));
        if (match) properties.push(match[1]);
        if (properties.length === 3) break;
    }
    if (properties.length === 0) return type.name;
    return `${type.name} { ${properties.map(p => `${p} = {${p}}`).join(', ')} }`;
}

export function addDebuggerDisplay(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const type = findTypeDeclaration(doc, request);
    if (type.kind === 'interface') {
        throw new RefactoringError('DebuggerDisplay cannot be applied to an interface');
    }

    for (let line = type.line - 1; line >= 1; line--) {
        const text = doc.lineText(line).trim();
        if (!text.startsWith('[')) break;
        if (text.includes('DebuggerDisplay')) {
            throw new RefactoringError(`'${type.name}' already has a DebuggerDisplay attribute`);
        }
    }

    const format = getString(request.arguments, 'display_format').trim() || defaultDisplayFormat(doc, type);
    const literal = format.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
    const start = doc.lineStart(type.line);
    const edits: TextEdit[] = [];
    const using = usingInsertion(doc, 'System.Diagnostics');
    if (using) edits.push(using);
    edits.push({ start, end: start, text: `${doc.indentOf(type.line)}[DebuggerDisplay("${literal}")]${doc.eol}` });

    return edit(doc.applyEdits(edits), `Added DebuggerDisplay attribute to '${type.name}'`);
}

/** Index of the token ending a member or local function declaration. */
export function declarationEnd(doc: SourceDocument, first: number): number {
    for (let i = first; i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[')) {
            i = doc.matchingClose(i);
            if (i < 0) break;
        } else if (isPunct(token, '{')) {
            return doc.matchingClose(i);
        } else if (isPunct(token, ';')) {
            return i;
        }
    }
    throw new RefactoringError('Unterminated declaration');
}

/** Name of the declared member: the identifier before its parameter list, body or initializer. */
export function declaredName(doc: SourceDocument, first: number, end: number): string | undefined {
    for (let i = first; i >= 0 && i <= end; i = doc.nextSignificant(i)) {
        if (!isPunct(doc.tokens[i], '(', '{', '=', ';', '=>')) continue;
        let p = doc.prevSignificant(i);
        if (isPunct(doc.tokens[p], '>')) {
            let depth = 0;
            for (; p >= first; p = doc.prevSignificant(p)) {
                if (isPunct(doc.tokens[p], '>')) depth++;
                else if (isPunct(doc.tokens[p], '<') && --depth === 0) break;
            }
            p = doc.prevSignificant(p);
        }
        const token = doc.tokens[p];
        return token !== undefined && token.kind === 'identifier' ? token.text : undefined;
    }
    return undefined;
}

function insertStatic(doc: SourceDocument, first: number, modifiers: number[]): TextEdit {
    const access = modifiers.filter(i => ACCESS_MODIFIERS.has(doc.tokens[i].text));
    const at = access.length > 0 ? doc.nextSignificant(access[access.length - 1]) : first;
    const start = doc.tokens[at].start;
    return { start, end: start, text: 'static ' };
}

export function makeMemberStatic(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const type = findTypeDeclaration(doc, request);
    if (!memberLines(doc, type).includes(request.lineNumber)) {
        throw new RefactoringError(`No member declaration found at line ${request.lineNumber}`);
    }
    const first = doc.significantOnLine(request.lineNumber)[0];
    const modifiers: number[] = [];
    for (let i = first; i >= 0 && MEMBER_MODIFIERS.has(doc.tokens[i].text); i = doc.nextSignificant(i)) modifiers.push(i);
    const words = modifiers.map(i => doc.tokens[i].text);

    const end = declarationEnd(doc, first);
    const name = declaredName(doc, first, end);
    if (name === undefined || name === type.name) {
        throw new RefactoringError(`No member declaration found at line ${request.lineNumber}`);
    }
    if (words.includes('static') || words.includes('const')) {
        throw new RefactoringError(`Member '${name}' is already static`);
    }
    if (words.some(w => w === 'virtual' || w === 'override' || w === 'abstract')) {
        throw new RefactoringError(`Virtual, override and abstract member '${name}' cannot be made static`);
    }
    for (let i = first; i >= 0 && i <= end; i = doc.nextSignificant(i)) {
        if (isWord(doc.tokens[i], 'this', 'base')) {
            throw new RefactoringError(`Member '${name}' uses '${doc.tokens[i].text}' and cannot be made static`);
        }
    }

    return edit(doc.applyEdits([insertStatic(doc, first, modifiers)]), `Made member '${name}' static`);
}

const LOCAL_FUNCTION_MODIFIERS = new Set(['async', 'unsafe', 'static', 'extern']);
const STATEMENT_KEYWORDS = new Set([
    'return', 'if', 'else', 'while', 'for', 'foreach', 'do', 'switch', 'case', 'using', 'lock',
    'throw', 'try', 'catch', 'finally', 'yield', 'goto', 'break', 'continue', 'fixed', 'new'
]);

export function makeLocalFunctionStatic(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const type = findTypeDeclaration(doc, request);
    const notFound = () => new RefactoringError(`No local function found at line ${request.lineNumber}`);
    if (memberLines(doc, type).includes(request.lineNumber)) throw notFound();

    const onLine = doc.significantOnLine(request.lineNumber);
    if (onLine.length === 0) throw notFound();
    const first = onLine[0];
    if (STATEMENT_KEYWORDS.has(doc.tokens[first].text)) throw notFound();

    const modifiers: number[] = [];
    let i = first;
    for (; i >= 0 && LOCAL_FUNCTION_MODIFIERS.has(doc.tokens[i].text); i = doc.nextSignificant(i)) modifiers.push(i);

    // Return type and name up to the parameter list; no assignment or call before it.
    let paren = -1;
    for (; i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(')) {
            paren = i;
            break;
        }
        if (token.kind === 'punct' && !['<', '>', '[', ']', '?', ',', '.'].includes(token.text)) throw notFound();
    }
    const name = paren > 0 ? doc.tokens[doc.prevSignificant(paren)] : undefined;
    if (name === undefined || name.kind !== 'identifier' || doc.prevSignificant(paren) === first) throw notFound();
    const close = doc.matchingClose(paren);
    const after = doc.tokens[doc.nextSignificant(close)];
    if (close < 0 || !(isPunct(after, '{', '=>') || isWord(after, 'where'))) throw notFound();

    if (modifiers.some(m => doc.tokens[m].text === 'static')) {
        throw new RefactoringError(`Local function '${name.text}' is already static`);
    }
    const start = doc.tokens[first].start;
    return edit(doc.applyEdits([{ start, end: start, text: 'static ' }]), `Made local function '${name.text}' static`);
}

const AUTO_PROPERTY = new RegExp(
    String.raw`^(\s*)((?:(?:public|private|protected|internal|static|virtual|override|required|new|sealed)\s+)*)(${TYPE_NAME})\s+([A-Za-z_]\w*)\s*\{\s*get\s*;\s*(?:((?:private|protected|internal)\s+)?(set|init)\s*;\s*)?\}\s*(?:=\s*(.+?)\s*;)?\s*$`
);

export function convertAutoProperty(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const line = request.lineNumber;
    const match = AUTO_PROPERTY.exec(doc.lineText(line));
    if (!match) {
        throw new RefactoringError(`No auto-implemented property found at line ${line}`);
    }
    const [, indent, modifiers, type, name, setterAccess, setter, initializer] = match;

    const field = `_${name[0].toLowerCase()}${name.slice(1)}`;
    if (doc.tokens.some(t => t.kind === 'identifier' && t.text === field)) {
        throw new RefactoringError(`A member named '${field}' already exists`);
    }

    const eol = doc.eol;
    const isStatic = /\bstatic\b/.test(modifiers);
    const lines = [
        `${indent}private ${isStatic ? 'static ' : ''}${type} ${field}${initializer ? ` = ${initializer}` : ''};`,
        `${indent}${modifiers}${type} ${name}`,
        `${indent}{`,
        `${indent}    get => ${field};`
    ];
    if (setter) lines.push(`${indent}    ${setterAccess ?? ''}${setter} => ${field} = value;`);
    lines.push(`${indent}}`);

    return edit(
        doc.applyEdits([{ start: doc.lineStart(line), end: doc.lineEnd(line), text: lines.join(eol) }]),
        `Converted auto property '${name}' to use backing field '${field}'`
    );
}

const FIELD = new RegExp(
    String.raw`^(\s*)((?:(?:public|private|protected|internal|static|readonly|volatile|new)\s+)*)(${TYPE_NAME})\s+([A-Za-z_]\w*)\s*(?:=\s*(.+?)\s*)?;\s*$`
);

export function encapsulateField(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const line = request.lineNumber;
    const notFound = () => new RefactoringError(`No field declaration found at line ${line}`);
    const type = enclosingType(doc, request);
    if (!type || !memberLines(doc, type).includes(line)) throw notFound();
    const text = doc.lineText(line);
    if (/\bconst\b/.test(text)) {
        throw new RefactoringError('Constants cannot be encapsulated');
    }
    const match = FIELD.exec(text);
    if (!match) throw notFound();
    const [, indent, modifiers, fieldType, name, initializer] = match;

    const base = name.replace(/^_+/, '');
    if (base === '') throw notFound();
    const property = base[0].toUpperCase() + base.slice(1);
    const field = `_${base[0].toLowerCase()}${base.slice(1)}`;
    for (const taken of [property, field]) {
        if (taken !== name && doc.tokens.some(t => t.kind === 'identifier' && t.text === taken)) {
            throw new RefactoringError(`A member named '${taken}' already exists`);
        }
    }

    const words = modifiers.trim().split(/\s+/).filter(w => w !== '');
    const access = words.filter(w => w === 'public' || w === 'protected' || w === 'internal');
    const isStatic = words.includes('static');
    const isReadonly = words.includes('readonly');
    const kept = words.filter(w => w === 'static' || w === 'readonly' || w === 'volatile');
    const eol = doc.eol;
    const lines = [
        `${indent}${['private', ...kept].join(' ')} ${fieldType} ${field}${initializer !== undefined ? ` = ${initializer}` : ''};`,
        `${indent}${access.length > 0 ? access.join(' ') : 'internal'} ${isStatic ? 'static ' : ''}${fieldType} ${property}`,
        `${indent}{`,
        `${indent}    get => ${field};`
    ];
    if (!isReadonly) lines.push(`${indent}    set => ${field} = value;`);
    lines.push(`${indent}}`);
    const edits: TextEdit[] = [{ start: doc.lineStart(line), end: doc.lineEnd(line), text: lines.join(eol) }];

    // Where a parameter or local reuses the name, only `this.name` can be told apart from it.
    const inBody: number[] = [];
    for (let i = type.open + 1; i < type.close; i++) {
        const token = doc.tokens[i];
        if (token.kind === 'identifier' && token.text === name && doc.lineOf(token.start) !== line) inBody.push(i);
    }
    const shadowed = inBody.some(i => declaresName(doc, i));
    for (const i of inBody) {
        const viaThis = isMemberAccess(doc, i) && isWord(doc.tokens[doc.prevSignificant(doc.prevSignificant(i))], 'this');
        if (viaThis || (!shadowed && !isMemberAccess(doc, i))) {
            edits.push({ start: doc.tokens[i].start, end: doc.tokens[i].end, text: property });
        }
    }

    return edit(doc.applyEdits(edits), `Encapsulated field '${name}' as property '${property}'`);
}

/**
 * Renames the file's primary type (its first public type, else its first
 * type) and every reference to it in the file to match the file name.
 */
export function syncTypeAndFile(doc: SourceDocument, _request: OperationRequest): OperationOutcome {
    const fileName = basename(doc.path);
    const stem = fileName.replace(/\.[^.]*$/, '');
    const types = typeDeclarations(doc);
    const primary = types.find(t => t.modifiers.includes('public')) ?? types[0];
    if (!primary) {
        throw new RefactoringError(`No type declaration found in ${doc.path}`);
    }
    if (primary.name === stem) {
        return edit(doc.text, 'File name and type name are already synchronized');
    }
    const name = requireIdentifier(stem, 'File name');
    if (doc.tokens.some(t => t.kind === 'identifier' && t.text === name)) {
        throw new RefactoringError(`'${name}' is already used in ${doc.path}`);
    }

    const edits: TextEdit[] = doc.tokens
        .filter(t => t.kind === 'identifier' && t.text === primary.name)
        .map(t => ({ start: t.start, end: t.end, text: name }));
    return edit(doc.applyEdits(edits), `Renamed type '${primary.name}' to '${name}' to match ${fileName}`);
}
