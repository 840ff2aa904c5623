import { getBool, getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import { NAMESPACE_TYPES } from '../data/index.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import { afterByteOrderMark, isWord, pluralize } from './shared.js';

export interface UsingDirective {
    line: number;
    namespace: string;
    alias?: string;
    isStatic: boolean;
    isGlobal: boolean;
    /** The directive line without its indentation. */
    text: string;
}

const DIRECTIVE =
    /^\s*(global\s+)?using\s+(static\s+)?(?:([A-Za-z_]\w*)\s*=\s*)?([A-Za-z_][\w.]*(?:<[^;]*>)?)\s*;\s*(?:\/\/.*)?$/;
const NAMESPACE_NAME = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*$/;
const TYPE_DECLARATION_KEYWORDS = ['class', 'struct', 'interface', 'enum', 'delegate'];

const KNOWN_NAMESPACES: ReadonlyMap<string, ReadonlySet<string>> = new Map(
    Object.entries(NAMESPACE_TYPES).map(([ns, types]) => [ns, new Set(types)])
);

/** Using directives that appear before the first type declaration. */
export function collectUsings(doc: SourceDocument): UsingDirective[] {
    const firstType = doc.tokens.find(t => t.kind === 'keyword' && TYPE_DECLARATION_KEYWORDS.includes(t.text));
    const lastLine = firstType ? doc.lineOf(firstType.start) : doc.lineCount;

    const result: UsingDirective[] = [];
    for (let line = 1; line <= lastLine; line++) {
        const onLine = doc.significantOnLine(line);
        if (onLine.length === 0 || !isWord(doc.tokens[onLine[0]], 'using', 'global')) continue;
        const text = doc.lineText(line);
        const match = DIRECTIVE.exec(text);
        if (!match) continue;
        result.push({
            line,
            namespace: match[4],
            alias: match[3],
            isStatic: match[2] !== undefined,
            isGlobal: match[1] !== undefined,
            text: text.trim()
        });
    }
    return result;
}

function isPlain(directive: UsingDirective): boolean {
    return !directive.isStatic && directive.alias === undefined;
}

function systemRank(ns: string): number {
    return ns === 'System' || ns.startsWith('System.') ? 0 : 1;
}

export function compareNamespaces(a: string, b: string, systemFirst = true): number {
    if (systemFirst) {
        const rank = systemRank(a) - systemRank(b);
        if (rank !== 0) return rank;
    }
    const la = a.toLowerCase();
    const lb = b.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Edit inserting `using <ns>;` in sorted position among the plain
 * directives, or null when it is already there.
 */
export function usingInsertion(doc: SourceDocument, ns: string): TextEdit | null {
    const usings = collectUsings(doc);
    if (usings.some(u => isPlain(u) && u.namespace === ns)) return null;

    const plain = usings.filter(isPlain);
    const directive = `using ${ns};`;

    if (plain.length === 0) {
        const anchor = usings[0]?.line ?? firstCodeLine(doc);
        if (anchor === undefined) {
            return { start: doc.text.length, end: doc.text.length, text: directive + doc.eol };
        }
        const start = afterByteOrderMark(doc, doc.lineStart(anchor));
        const separator = usings.length > 0 ? doc.eol : doc.eol + doc.eol;
        return { start, end: start, text: doc.indentOf(anchor) + directive + separator };
    }

    const before = plain.find(u => compareNamespaces(ns, u.namespace) < 0);
    if (before) {
        const start = afterByteOrderMark(doc, doc.lineStart(before.line));
        return { start, end: start, text: doc.indentOf(before.line) + directive + doc.eol };
    }
    const last = plain[plain.length - 1];
    const end = doc.lineEnd(last.line);
    return { start: end, end, text: doc.eol + doc.indentOf(last.line) + directive };
}

function firstCodeLine(doc: SourceDocument): number | undefined {
    const token = doc.tokens.find(t => t.kind !== 'whitespace' && t.kind !== 'newline' && t.kind !== 'comment');
    return token ? doc.lineOf(token.start) : undefined;
}

export function addUsing(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const ns = getString(request.arguments, 'namespace').trim();
    if (!NAMESPACE_NAME.test(ns)) {
        throw new RefactoringError(`'${ns}' is not a valid namespace name`);
    }
    const insertion = usingInsertion(doc, ns);
    if (!insertion) {
        return edit(doc.text, `Using directive for '${ns}' already present`);
    }
    return edit(doc.applyEdits([insertion]), `Added using directive for '${ns}'`);
}

export function sortUsings(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const systemFirst = getBool(request.arguments, 'system_first', true);
    const usings = collectUsings(doc);
    if (usings.length === 0) {
        throw new RefactoringError(`No using directives found in ${doc.path}`);
    }

    const byNamespace = (a: UsingDirective, b: UsingDirective) =>
        compareNamespaces(a.namespace, b.namespace, systemFirst);
    const sorted = [
        ...usings.filter(u => u.isGlobal && isPlain(u)).sort(byNamespace),
        ...usings.filter(u => !u.isGlobal && isPlain(u)).sort(byNamespace),
        ...usings.filter(u => u.isStatic).sort(byNamespace),
        ...usings
            .filter(u => !u.isStatic && u.alias !== undefined)
            .sort((a, b) => compareNamespaces(a.alias ?? '', b.alias ?? '', false))
    ];

    const edits: TextEdit[] = usings.map((slot, i) => ({
        start: afterByteOrderMark(doc, doc.lineStart(slot.line) + doc.indentOf(slot.line).length),
        end: doc.lineEnd(slot.line),
        text: sorted[i].text
    }));
    const text = doc.applyEdits(edits);
    if (text === doc.text) {
        return edit(text, 'Using directives already sorted');
    }
    return edit(text, `Sorted ${pluralize(usings.length, 'using directive')}`);
}

/** Attribute types are written with or without their `Attribute` suffix. */
function isReferenced(type: string, referenced: ReadonlySet<string>): boolean {
    if (referenced.has(type) || referenced.has(`${type}Attribute`)) return true;
    return type.endsWith('Attribute') && referenced.has(type.slice(0, -'Attribute'.length));
}

export function removeUnusedUsings(doc: SourceDocument, _request: OperationRequest): OperationOutcome {
    const usings = collectUsings(doc);
    const directiveLines = new Set(usings.map(u => u.line));
    const referenced = new Set<string>();
    for (const token of doc.tokens) {
        if (token.kind === 'identifier' && !directiveLines.has(doc.lineOf(token.start))) {
            referenced.add(token.text);
        }
    }

    const seen = new Set<string>();
    const removed: UsingDirective[] = [];
    for (const directive of usings) {
        const key = directive.text.replace(/\s+/g, ' ');
        const duplicate = seen.has(key);
        seen.add(key);

        const types = isPlain(directive) && !directive.isGlobal ? KNOWN_NAMESPACES.get(directive.namespace) : undefined;
        const unused = types !== undefined && ![...types].some(t => isReferenced(t, referenced));
        if (duplicate || unused) removed.push(directive);
    }

    if (removed.length === 0) {
        return edit(doc.text, 'No unused using directives found');
    }

    // The last line takes the preceding line break with it, so ranges can touch.
    const edits: TextEdit[] = [];
    for (const { line } of removed) {
        const range: TextEdit = line < doc.lineCount
            ? { start: afterByteOrderMark(doc, doc.lineStart(line)), end: doc.lineStart(line + 1), text: '' }
            : { start: line > 1 ? doc.lineEnd(line - 1) : afterByteOrderMark(doc, 0), end: doc.lineEnd(line), text: '' };
        const previous = edits[edits.length - 1];
        if (previous && range.start <= previous.end) previous.end = Math.max(previous.end, range.end);
        else edits.push(range);
    }
    return edit(doc.applyEdits(edits), `Removed ${pluralize(removed.length, 'unused using directive')}`);
}
