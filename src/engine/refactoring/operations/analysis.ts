import { getInt, getString } from '../../../utils/arguments.js';
import type { SourceDocument } from '../document.js';
import { RefactoringError } from '../errors.js';
import { report, type OperationOutcome, type OperationRequest } from '../types.js';
import { typeEnd } from './expressions.js';
import { declarationEnd, declaredName, enclosingType, memberLines, typeDeclarations, type TypeDeclaration } from './members.js';
import { MEMBER_MODIFIERS, escapeRegExp, isMemberAccess, isPunct, isWord, pluralize, tokenAtPosition } from './shared.js';

export interface SymbolEntry {
    line: number;
    kind: string;
    name: string;
}

const TYPE_KEYWORDS = ['class', 'struct', 'interface', 'enum', 'delegate'];

function typeSymbols(doc: SourceDocument): SymbolEntry[] {
    const symbols: SymbolEntry[] = [];
    doc.tokens.forEach((token, i) => {
        const isRecord = token.kind === 'identifier' && token.text === 'record';
        if (!(token.kind === 'keyword' && TYPE_KEYWORDS.includes(token.text)) && !isRecord) return;
        let nameIndex = doc.nextSignificant(i);
        if (isRecord && isWord(doc.tokens[nameIndex], 'class', 'struct')) return;
        if (token.text === 'delegate') {
            // delegate <return type> Name(
            while (nameIndex >= 0 && !isPunct(doc.tokens[doc.nextSignificant(nameIndex)], '(', ';', '{')) {
                nameIndex = doc.nextSignificant(nameIndex);
            }
        }
        const name = doc.tokens[nameIndex];
        if (name === undefined || name.kind !== 'identifier') return;
        if (token.text === 'delegate' && !isPunct(doc.tokens[doc.nextSignificant(nameIndex)], '(')) return;
        symbols.push({ line: doc.lineOf(name.start), kind: isRecord ? 'record' : token.text, name: name.text });
    });
    return symbols;
}

function memberSymbols(doc: SourceDocument, type: TypeDeclaration): SymbolEntry[] {
    const symbols: SymbolEntry[] = [];
    for (const line of memberLines(doc, type)) {
        const first = doc.significantOnLine(line)[0];
        let head = first;
        while (head >= 0 && MEMBER_MODIFIERS.has(doc.tokens[head].text)) head = doc.nextSignificant(head);
        const token = doc.tokens[head];
        if (token === undefined || token.kind === 'punct' || TYPE_KEYWORDS.includes(token.text) || token.text === 'record') continue;
        let end: number;
        try {
            end = declarationEnd(doc, first);
        } catch (e) {
            if (e instanceof RefactoringError) continue;
            throw e;
        }
        const name = declaredName(doc, first, end);
        if (name === undefined) continue;

        let kind = 'field';
        for (let i = first; i >= 0 && i <= end; i = doc.nextSignificant(i)) {
            const t = doc.tokens[i];
            if (isWord(t, 'event')) kind = 'event';
            if (isWord(t, 'const')) kind = 'constant';
            if (t.text !== name || t.kind !== 'identifier') continue;
            const next = doc.tokens[doc.nextSignificant(i)];
            if (isPunct(next, '(', '<')) kind = name === type.name ? 'constructor' : 'method';
            else if (isPunct(next, '{', '=>') && kind === 'field') kind = 'property';
            break;
        }
        symbols.push({ line, kind, name });
    }
    return symbols;
}

/** Declarations in the file: types, then the members of each type. */
export function collectSymbols(doc: SourceDocument): SymbolEntry[] {
    const symbols = typeSymbols(doc);
    const seen = new Set<string>();
    for (const entry of [...symbols]) {
        if (entry.kind !== 'class' && entry.kind !== 'struct' && entry.kind !== 'record' && entry.kind !== 'interface') continue;
        const type = enclosingType(doc, { filePath: doc.path, lineNumber: entry.line, columnNumber: 0, dryRun: true, arguments: undefined });
        if (!type || seen.has(`${type.name}:${type.open}`)) continue;
        seen.add(`${type.name}:${type.open}`);
        symbols.push(...memberSymbols(doc, type));
    }
    return symbols.sort((a, b) => a.line - b.line);
}

/** `*` matches any run of characters; without one the pattern matches as a substring. Case-insensitive. */
export function symbolMatcher(pattern: string): (name: string) => boolean {
    if (!pattern.includes('*')) {
        const needle = pattern.toLowerCase();
        return name => name.toLowerCase().includes(needle);
    }
    const regex = new RegExp(`^${pattern.split('*').map(escapeRegExp).join('.*')}$`, 'i');
    return name => regex.test(name);
}

export function findSymbols(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const pattern = getString(request.arguments, 'pattern').trim();
    if (pattern === '') {
        throw new RefactoringError('pattern is required for symbol search');
    }
    const matches = symbolMatcher(pattern);
    const found = collectSymbols(doc).filter(s => matches(s.name));
    if (found.length === 0) {
        return report(`No symbols found matching pattern '${pattern}'`);
    }
    return report([
        `Found ${pluralize(found.length, 'symbol')} matching '${pattern}':`,
        ...found.map(s => `${doc.path}:${s.line} ${s.kind} ${s.name}`)
    ].join('\n'));
}

function occurrenceLines(doc: SourceDocument, name: string): string[] {
    const bare = name.startsWith('@') ? name.slice(1) : name;
    return doc.tokens
        .filter(t => t.kind === 'identifier' && (t.text === bare || t.text === `@${bare}`))
        .map(t => {
            const line = doc.lineOf(t.start);
            return `${doc.path}:${line}:${doc.columnOf(t.start)} ${doc.lineText(line).trim()}`;
        });
}

export function findReferences(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const token = doc.tokens[tokenAtPosition(doc, request)];
    if (token.kind !== 'identifier') {
        throw new RefactoringError(`No symbol found at line ${request.lineNumber}, column ${request.columnNumber}`);
    }
    const lines = occurrenceLines(doc, token.text);
    return report([`Found ${pluralize(lines.length, 'reference')} to '${token.text}':`, ...lines].join('\n'));
}

export function findUsages(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const name = getString(request.arguments, 'symbol_name').trim();
    if (name === '') {
        throw new RefactoringError('symbol_name is required');
    }
    const lines = occurrenceLines(doc, name);
    if (lines.length === 0) {
        return report(`No usages found for symbol '${name}'`);
    }
    return report([`Found ${pluralize(lines.length, 'usage')} of '${name}':`, ...lines].join('\n'));
}

export interface DuplicateBlock {
    length: number;
    first: [number, number];
    second: [number, number];
}

const TRIVIAL_LINE = /^(?:[{}()[\];,]*|\/\/.*|using\s+[\w.=\s]+;|#.*)$/;

/**
 * Repeated runs of at least `minLines` meaningful lines. Lines are compared
 * after trimming and collapsing whitespace; blank lines, lone braces,
 * comments and using directives are skipped. Runs never overlap themselves.
 */
export function findDuplicateBlocks(doc: SourceDocument, minLines: number): DuplicateBlock[] {
    const lines: { line: number; text: string }[] = [];
    for (let line = 1; line <= doc.lineCount; line++) {
        const text = doc.lineText(line).trim().replace(/\s+/g, ' ');
        if (!TRIVIAL_LINE.test(text)) lines.push({ line, text });
    }

    const positions = new Map<string, number[]>();
    lines.forEach(({ text }, i) => positions.set(text, [...(positions.get(text) ?? []), i]));

    const blocks: DuplicateBlock[] = [];
    for (let i = 0; i < lines.length; i++) {
        for (const j of positions.get(lines[i].text) ?? []) {
            if (j <= i) continue;
            // Only report maximal runs: skip pairs that extend an earlier match.
            if (i > 0 && lines[i - 1].text === lines[j - 1].text) continue;
            let length = 0;
            while (j + length < lines.length && i + length < j && lines[i + length].text === lines[j + length].text) length++;
            if (length < minLines) continue;
            blocks.push({
                length,
                first: [lines[i].line, lines[i + length - 1].line],
                second: [lines[j].line, lines[j + length - 1].line]
            });
        }
    }
    return blocks;
}

export function findDuplicateCode(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const minLines = getInt(request.arguments, 'min_lines', 4);
    if (minLines < 2) {
        throw new RefactoringError(`min_lines must be at least 2 (got ${minLines})`);
    }
    const blocks = findDuplicateBlocks(doc, minLines);
    if (blocks.length === 0) {
        return report(`No duplicate code found in ${doc.path} (min_lines=${minLines})`);
    }
    return report([
        `Found ${pluralize(blocks.length, 'duplicate block')} in ${doc.path}:`,
        ...blocks.map(b => `Duplicate block (${b.length} lines): lines ${b.first[0]}-${b.first[1]} and ${b.second[0]}-${b.second[1]}`)
    ].join('\n'));
}

export type DependencyKind =
    | 'Base Type'
    | 'Field Type'
    | 'Property Type'
    | 'Return Type'
    | 'Parameter Type'
    | 'Local Variable Type'
    | 'Object Creation'
    | 'Static Member Access';

export interface Dependency {
    line: number;
    name: string;
    kind: DependencyKind;
}

const TYPE_LIKE = /^[A-Z]/;

function targetType(doc: SourceDocument, request: OperationRequest): TypeDeclaration {
    const name = getString(request.arguments, 'type_name').trim();
    if (name !== '') {
        const found = typeDeclarations(doc).find(t => t.name.toLowerCase() === name.toLowerCase());
        if (!found) {
            throw new RefactoringError(`Type '${name}' not found in ${doc.path}`);
        }
        return found;
    }
    const inRange = request.lineNumber >= 1 && request.lineNumber <= doc.lineCount;
    const type = inRange ? enclosingType(doc, request) : undefined;
    if (!type) {
        throw new RefactoringError('No type found. Pass type_name or a position inside a type declaration');
    }
    return type;
}

/** True when `index` sits in the parameter list of a method, constructor or delegate. */
function inParameterList(doc: SourceDocument, index: number): boolean {
    let depth = 0;
    for (let i = doc.prevSignificant(index); i >= 0; i = doc.prevSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, ')', ']')) depth++;
        else if (isPunct(token, '[')) depth = Math.max(0, depth - 1);
        else if (isPunct(token, '(')) {
            if (depth === 0) return doc.tokens[doc.prevSignificant(i)]?.kind === 'identifier';
            depth--;
        } else if (depth === 0 && isPunct(token, ';', '{', '}')) {
            return false;
        }
    }
    return false;
}

function isTypeName(doc: SourceDocument, index: number, own: string): boolean {
    const token = doc.tokens[index];
    return token.kind === 'identifier' && TYPE_LIKE.test(token.text) && token.text !== own && !isMemberAccess(doc, index);
}

/** Types the given type refers to, in source order. */
export function collectDependencies(doc: SourceDocument, type: TypeDeclaration): Dependency[] {
    const found: Dependency[] = [];
    const add = (index: number, kind: DependencyKind) =>
        found.push({ line: doc.lineOf(doc.tokens[index].start), name: doc.tokens[index].text, kind });

    let afterColon = false;
    const headerStart = doc.significantOnLine(type.line)[0];
    for (let i = headerStart, depth = 0; i >= 0 && i < type.open; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '<')) depth++;
        else if (isPunct(token, ')', '>')) depth--;
        else if (isWord(token, 'where')) break;
        else if (depth === 0 && isPunct(token, ':')) afterColon = true;
        else if (afterColon && isTypeName(doc, i, type.name) && !isPunct(doc.tokens[doc.nextSignificant(i)], '.')) add(i, 'Base Type');
    }

    const members = new Set(memberLines(doc, type));
    for (let i = doc.nextSignificant(type.open); i >= 0 && i < type.close; i = doc.nextSignificant(i)) {
        if (!isTypeName(doc, i, type.name)) continue;
        const prev = doc.tokens[doc.prevSignificant(i)];
        const next = doc.tokens[doc.nextSignificant(i)];
        if (isWord(prev, 'new')) {
            add(i, 'Object Creation');
            continue;
        }
        if (isPunct(next, '(')) continue;
        if (isPunct(next, '.')) {
            add(i, 'Static Member Access');
            continue;
        }

        const end = typeEnd(doc, i);
        const name = doc.nextSignificant(end);
        if (doc.tokens[name]?.kind !== 'identifier') continue;
        const after = doc.tokens[doc.nextSignificant(name)];
        let kind: DependencyKind;
        if (isPunct(after, '(', '<')) kind = 'Return Type';
        else if (isPunct(after, '{', '=>')) kind = 'Property Type';
        else if (inParameterList(doc, i)) kind = 'Parameter Type';
        else if (members.has(doc.lineOf(doc.tokens[i].start))) kind = 'Field Type';
        else kind = 'Local Variable Type';

        for (let j = i; j >= 0 && j <= end; j = doc.nextSignificant(j)) {
            if (isTypeName(doc, j, type.name)) add(j, kind);
        }
        i = end;
    }
    return found.sort((a, b) => a.line - b.line);
}

export function findDependencies(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const type = targetType(doc, request);
    const dependencies = collectDependencies(doc, type);
    if (dependencies.length === 0) {
        return report(`No dependencies found for type '${type.name}'`);
    }
    const count = dependencies.length;
    const unique = [...new Set(dependencies.map(d => d.name))].sort();
    return report([
        `Found ${count} ${count === 1 ? 'dependency' : 'dependencies'} for type '${type.name}':`,
        ...dependencies.map(d => `${doc.path}:${d.line} ${doc.lineText(d.line).trim()} // Dependency: ${d.kind}`),
        'Unique dependency types:',
        ...unique.map(name => `  - ${name}`)
    ].join('\n'));
}
