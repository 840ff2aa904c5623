import { getInt, getString } from '../../../utils/arguments.js';
import type { SourceDocument, TextEdit } from '../document.js';
import { RefactoringError } from '../errors.js';
import { edit, type OperationOutcome, type OperationRequest } from '../types.js';
import {
    MEMBER_MODIFIERS,
    TYPE_KEYWORDS,
    isPunct,
    isWord,
    negateCondition,
    pluralize,
    tokenAtPosition
} from './shared.js';

const OPERAND_KINDS = new Set(['identifier', 'number', 'string', 'char']);

function isOperandStart(doc: SourceDocument, index: number): boolean {
    const token = doc.tokens[index];
    return token !== undefined && (OPERAND_KINDS.has(token.kind) || isWord(token, 'this', 'base', 'true', 'false', 'null'));
}

/**
 * Token range of the member-access / invocation chain through `index`,
 * e.g. `client.Items[0].LoadAsync(token)`.
 */
export function primaryExpressionBounds(doc: SourceDocument, index: number): [number, number] {
    let first = index;
    let last = index;
    if (isPunct(doc.tokens[index], '(')) {
        last = doc.matchingClose(index);
        if (last < 0) throw new RefactoringError('Unbalanced parentheses');
    } else if (!isOperandStart(doc, index)) {
        throw new RefactoringError(`'${doc.tokens[index].text}' is not part of an expression`);
    }

    for (;;) {
        const dot = doc.prevSignificant(first);
        if (!isPunct(doc.tokens[dot], '.', '?.', '::')) break;
        let target = doc.prevSignificant(dot);
        if (isPunct(doc.tokens[target], ')', ']')) {
            const open = doc.matchingOpen(target);
            if (open < 0) break;
            target = open;
            const callee = doc.prevSignificant(open);
            if (callee >= 0 && doc.tokens[callee].kind === 'identifier') target = callee;
        } else if (!isOperandStart(doc, target)) {
            break;
        }
        first = target;
    }

    for (;;) {
        const next = doc.nextSignificant(last);
        if (isPunct(doc.tokens[next], '(', '[')) {
            const close = doc.matchingClose(next);
            if (close < 0) break;
            last = close;
        } else if (isPunct(doc.tokens[next], '.', '?.', '::') && doc.tokens[doc.nextSignificant(next)]?.kind === 'identifier') {
            last = doc.nextSignificant(next);
        } else {
            break;
        }
    }
    return [first, last];
}

/**
 * True when `first`..`last` is a single operand, a member-access chain or a
 * parenthesized expression, so it can stand anywhere an operand can.
 */
export function isPrimaryExpression(doc: SourceDocument, first: number, last: number): boolean {
    let expectOperand = true;
    for (let i = first; i >= 0 && i <= last; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[')) {
            if (expectOperand && isPunct(token, '[')) return false;
            i = doc.matchingClose(i);
            if (i < 0 || i > last) return false;
            expectOperand = false;
        } else if (isPunct(token, '.', '?.', '::')) {
            if (expectOperand) return false;
            expectOperand = true;
        } else if (expectOperand && (isOperandStart(doc, i) || (token.kind === 'keyword' && TYPE_KEYWORDS.has(token.text)))) {
            expectOperand = false;
        } else {
            return false;
        }
    }
    return !expectOperand;
}

const CAST_TYPE = /^[A-Za-z_][\w.]*(?:<[\w\s.,<>?[\]]*>)?\??(?:\[\s*,*\s*\])*$/;

export function addExplicitCast(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const castType = getString(request.arguments, 'cast_type').trim();
    if (!CAST_TYPE.test(castType)) {
        throw new RefactoringError(`'${castType}' is not a valid type name`);
    }

    const [first, last] = primaryExpressionBounds(doc, tokenAtPosition(doc, request));
    const close = doc.prevSignificant(first);
    if (isPunct(doc.tokens[close], ')')) {
        const open = doc.matchingOpen(close);
        if (open >= 0 && doc.slice(doc.tokens[open].end, doc.tokens[close].start).replace(/\s/g, '') === castType.replace(/\s/g, '')) {
            throw new RefactoringError(`The expression is already cast to '${castType}'`);
        }
    }

    const expression = doc.slice(doc.tokens[first].start, doc.tokens[last].end);
    const start = doc.tokens[first].start;
    return edit(
        doc.applyEdits([{ start, end: start, text: `(${castType})` }]),
        `Added explicit cast to '${castType}' on '${expression}'`
    );
}

export function addAwait(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const endsInCall = ([, last]: [number, number]) => isPunct(doc.tokens[last], ')');

    let bounds: [number, number] | undefined;
    const index = tokenAtPosition(doc, request);
    if (isOperandStart(doc, index)) {
        const candidate = primaryExpressionBounds(doc, index);
        if (endsInCall(candidate)) bounds = candidate;
    }
    if (!bounds) {
        const call = doc.significantOnLine(request.lineNumber).find(i =>
            doc.tokens[i].kind === 'identifier' && isPunct(doc.tokens[doc.nextSignificant(i)], '('));
        if (call !== undefined) bounds = primaryExpressionBounds(doc, call);
    }
    if (!bounds || !endsInCall(bounds)) {
        throw new RefactoringError(`No method call found at line ${request.lineNumber}`);
    }

    const [first, last] = bounds;
    if (isWord(doc.tokens[doc.prevSignificant(first)], 'await')) {
        throw new RefactoringError('The call is already awaited');
    }
    const expression = doc.slice(doc.tokens[first].start, doc.tokens[last].end);
    const start = doc.tokens[first].start;
    return edit(doc.applyEdits([{ start, end: start, text: 'await ' }]), `Added await to '${expression}'`);
}

const CONDITION_STOPS = new Set(['=', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '??=', '<<=', '=>', ',', ';', '{', '}', ':', '?', '??']);

/** The `:` pairing with the `?` at `question`, or -1. */
function matchingColon(doc: SourceDocument, question: number): number {
    let depth = 0;
    let pending = 0;
    for (let i = doc.nextSignificant(question); i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) {
            if (--depth < 0) return -1;
        } else if (depth === 0 && isPunct(token, ';', ',')) return -1;
        else if (depth === 0 && isPunct(token, '?')) pending++;
        else if (depth === 0 && isPunct(token, ':')) {
            if (pending === 0) return i;
            pending--;
        }
    }
    return -1;
}

export function invertConditionalExpressions(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const offset = doc.offsetAt(request.lineNumber, request.columnNumber);
    const questions = doc.significantOnLine(request.lineNumber)
        .filter(i => isPunct(doc.tokens[i], '?') && matchingColon(doc, i) >= 0);
    const question = questions.find(i => doc.tokens[i].start >= offset) ?? questions[0];
    if (question === undefined) {
        throw new RefactoringError(`No conditional expression found at line ${request.lineNumber}`);
    }
    const colon = matchingColon(doc, question);

    let first = question;
    for (let p = doc.prevSignificant(question); p >= 0; p = doc.prevSignificant(first)) {
        const token = doc.tokens[p];
        if (isPunct(token, ')', ']')) {
            const open = doc.matchingOpen(p);
            if (open < 0) break;
            first = open;
        } else if (isPunct(token, '(', '[') || (token.kind === 'punct' && CONDITION_STOPS.has(token.text)) || isWord(token, 'return', 'yield', 'case', 'in')) {
            break;
        } else {
            first = p;
        }
    }
    if (first === question) {
        throw new RefactoringError('The conditional expression has no condition');
    }

    let last = colon;
    let pending = 0;
    for (let n = doc.nextSignificant(colon), depth = 0; n >= 0; n = doc.nextSignificant(n)) {
        const token = doc.tokens[n];
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}') && --depth < 0) break;
        if (depth === 0 && isPunct(token, ';', ',')) break;
        if (depth === 0 && isPunct(token, '?')) pending++;
        if (depth === 0 && isPunct(token, ':') && pending-- === 0) break;
        last = n;
    }

    const condition = doc.slice(doc.tokens[first].start, doc.tokens[question].start);
    const whenTrue = doc.slice(doc.tokens[question].end, doc.tokens[colon].start).trim();
    const whenFalse = doc.slice(doc.tokens[colon].end, doc.tokens[last].end).trim();
    const replacement = `${negateCondition(condition)} ? ${whenFalse} : ${whenTrue}`;

    return edit(
        doc.applyEdits([{ start: doc.tokens[first].start, end: doc.tokens[last].end, text: replacement }]),
        'Inverted conditional expression'
    );
}

export function wrapBinaryExpressions(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const line = request.lineNumber;
    const onLine = doc.significantOnLine(line);
    if (onLine.length === 0) {
        throw new RefactoringError(`No binary expression found at line ${line}`);
    }

    const operators: { index: number; depth: number }[] = [];
    let depth = 0;
    for (let i = onLine[0]; i >= 0; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (isPunct(token, '(', '[')) depth++;
        else if (isPunct(token, ')', ']')) depth--;
        else if (isPunct(token, '&&', '||')) operators.push({ index: i, depth });
        if (depth < 0 || (depth === 0 && isPunct(token, ';', '{', '}'))) break;
    }

    const outermost = Math.min(...operators.map(o => o.depth));
    const indent = doc.indentOf(line) + '    ';
    const edits: TextEdit[] = operators
        .filter(o => o.depth === outermost)
        .filter(o => doc.lineOf(doc.tokens[doc.prevSignificant(o.index)].end) === doc.lineOf(doc.tokens[o.index].start))
        .map(o => ({
            start: doc.tokens[doc.prevSignificant(o.index)].end,
            end: doc.tokens[o.index].start,
            text: doc.eol + indent
        }));

    if (edits.length === 0) {
        throw new RefactoringError(`No unwrapped '&&' or '||' operators found at line ${line}`);
    }
    return edit(doc.applyEdits(edits), `Wrapped binary expression at ${pluralize(edits.length, 'operator')}`);
}

/** Index of the `(` opening the argument list of the call under the cursor. */
function invocationAt(doc: SourceDocument, request: OperationRequest): number {
    let start = tokenAtPosition(doc, request);
    const token = doc.tokens[start];
    if (token.kind === 'identifier' && isPunct(doc.tokens[doc.nextSignificant(start)], '(')) {
        return doc.nextSignificant(start);
    }
    if (isPunct(token, ')')) start = doc.matchingOpen(start);

    let depth = 0;
    for (let i = start; i >= 0; i = doc.prevSignificant(i)) {
        const t = doc.tokens[i];
        if (isPunct(t, ')')) depth++;
        else if (isPunct(t, '(')) {
            if (depth === 0 && doc.tokens[doc.prevSignificant(i)]?.kind === 'identifier') return i;
            if (depth > 0) depth--;
        } else if (depth === 0 && isPunct(t, ';', '{', '}')) break;
    }
    throw new RefactoringError(`No method invocation found at line ${request.lineNumber}`);
}

/** First and last token of each comma-separated item between a bracket pair. */
function listItems(doc: SourceDocument, open: number, close: number): [number, number][] {
    const items: [number, number][] = [];
    let first = -1;
    let depth = 0;
    for (let i = doc.nextSignificant(open); i >= 0 && i < close; i = doc.nextSignificant(i)) {
        const token = doc.tokens[i];
        if (depth === 0 && isPunct(token, ',')) {
            if (first >= 0) items.push([first, doc.prevSignificant(i)]);
            first = -1;
            continue;
        }
        if (first < 0) first = i;
        if (isPunct(token, '(', '[', '{')) depth++;
        else if (isPunct(token, ')', ']', '}')) depth--;
    }
    if (first >= 0) items.push([first, doc.prevSignificant(close)]);
    return items;
}

function parameterName(doc: SourceDocument, [first, last]: [number, number]): string | undefined {
    let name = last;
    for (let i = first; i >= 0 && i <= last; i = doc.nextSignificant(i)) {
        if (isPunct(doc.tokens[i], '=')) {
            name = doc.prevSignificant(i);
            break;
        }
    }
    const token = doc.tokens[name];
    if (name === first || token.kind !== 'identifier') return undefined;
    return token.text.startsWith('@') ? token.text.slice(1) : token.text;
}

const NOT_A_DECLARATION = new Set(['await', 'yield', 'nameof', 'new', 'return', 'throw', 'else', 'in']);

/** Parameter names of the method or constructor `name` declared in the file that can take `count` arguments. */
function declaredParameters(doc: SourceDocument, name: string, count: number, callOpen: number): string[] | undefined {
    const candidates: string[][] = [];
    for (let i = 0; i < doc.tokens.length; i++) {
        const token = doc.tokens[i];
        const open = doc.nextSignificant(i);
        if (token.kind !== 'identifier' || token.text !== name || open === callOpen || !isPunct(doc.tokens[open], '(')) continue;
        const prev = doc.tokens[doc.prevSignificant(i)];
        const typed = prev !== undefined && !NOT_A_DECLARATION.has(prev.text) && (
            prev.kind === 'identifier'
            || (prev.kind === 'keyword' && (TYPE_KEYWORDS.has(prev.text) || MEMBER_MODIFIERS.has(prev.text)))
            || isPunct(prev, '>', ']', '?'));
        const close = doc.matchingClose(open);
        if (!typed || close < 0) continue;
        const after = doc.tokens[doc.nextSignificant(close)];
        if (!isPunct(after, '{', '=>', ';', ':') && !isWord(after, 'where')) continue;
        const names = listItems(doc, open, close).map(item => parameterName(doc, item));
        const complete = names.filter((n): n is string => n !== undefined);
        if (complete.length === names.length && complete.length >= count) candidates.push(complete);
    }
    return candidates.find(c => c.length === count) ?? candidates[0];
}

export function addNamedArgument(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const requested = request.arguments?.['parameter_index'];
    const parameterIndex = requested === undefined ? undefined : getInt(request.arguments, 'parameter_index', -1);
    if (parameterIndex !== undefined && parameterIndex < 0) {
        throw new RefactoringError('parameter_index must be 0 or greater');
    }

    const open = invocationAt(doc, request);
    const close = doc.matchingClose(open);
    if (close < 0) {
        throw new RefactoringError('Unbalanced parentheses in method call');
    }
    const name = doc.tokens[doc.prevSignificant(open)].text;
    const items = listItems(doc, open, close);
    if (items.length === 0) {
        return edit(doc.text, `Call to '${name}' has no arguments to name`);
    }
    if (parameterIndex !== undefined && parameterIndex >= items.length) {
        throw new RefactoringError(`parameter_index ${parameterIndex} is out of range; the call has ${pluralize(items.length, 'argument')}`);
    }
    const parameters = declaredParameters(doc, name, items.length, open);
    if (parameters === undefined) {
        throw new RefactoringError(`Method '${name}' is not declared in ${doc.path}; its parameter names are unknown`);
    }

    const edits: TextEdit[] = [];
    items.forEach(([first], i) => {
        if (parameterIndex !== undefined && i !== parameterIndex) return;
        const named = doc.tokens[first].kind === 'identifier' && isPunct(doc.tokens[doc.nextSignificant(first)], ':');
        if (named) return;
        const start = doc.tokens[first].start;
        edits.push({ start, end: start, text: `${parameters[i]}: ` });
    });
    if (edits.length === 0) {
        return edit(doc.text, `Arguments to '${name}' are already named`);
    }
    return edit(doc.applyEdits(edits), `Added ${pluralize(edits.length, 'named argument')} to call to '${name}'`);
}

const VALUE_TYPE_KEYWORDS = new Set([...TYPE_KEYWORDS].filter(t => t !== 'string' && t !== 'object' && t !== 'void'));

interface CastExpression {
    open: number;
    close: number;
    operand: [number, number];
}

function castsOnLine(doc: SourceDocument, line: number): CastExpression[] {
    const casts: CastExpression[] = [];
    for (const i of doc.significantOnLine(line)) {
        if (!isPunct(doc.tokens[i], '(')) continue;
        const close = doc.matchingClose(i);
        if (close < 0 || !CAST_TYPE.test(doc.slice(doc.tokens[i].end, doc.tokens[close].start).replace(/\s/g, ''))) continue;
        const prev = doc.tokens[doc.prevSignificant(i)];
        if (prev !== undefined && !(prev.kind === 'punct' && !isPunct(prev, ')', ']')) && !isWord(prev, 'return')) continue;
        const next = doc.nextSignificant(close);
        if (!isOperandStart(doc, next) && !isPunct(doc.tokens[next], '(')) continue;
        casts.push({ open: i, close, operand: primaryExpressionBounds(doc, next) });
    }
    return casts;
}

function castToAs(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const offset = doc.offsetAt(request.lineNumber, request.columnNumber);
    const casts = castsOnLine(doc, request.lineNumber);
    const cast = casts.find(c => doc.tokens[c.open].start <= offset && offset < doc.tokens[c.operand[1]].end) ?? casts[0];
    if (cast === undefined) {
        throw new RefactoringError(`No cast expression found at line ${request.lineNumber}`);
    }
    const type = doc.slice(doc.tokens[cast.open].end, doc.tokens[cast.close].start).trim();
    if (VALUE_TYPE_KEYWORDS.has(type)) {
        throw new RefactoringError(`'as' cannot convert to the value type '${type}'; use a cast or a nullable type`);
    }

    const [first, last] = cast.operand;
    const operand = doc.slice(doc.tokens[first].start, doc.tokens[last].end);
    const prev = doc.tokens[doc.prevSignificant(cast.open)];
    const next = doc.tokens[doc.nextSignificant(last)];
    const bare = (next === undefined || isPunct(next, ';', ')', ',', ']', '}'))
        && (prev === undefined || isPunct(prev, '=', '(', ',', '=>', '[', '{', ':', '?') || isWord(prev, 'return'));
    const replacement = bare ? `${operand} as ${type}` : `(${operand} as ${type})`;

    return edit(
        doc.applyEdits([{ start: doc.tokens[cast.open].start, end: doc.tokens[last].end, text: replacement }]),
        `Converted cast to '${type}' into an 'as' expression`
    );
}

/** Last token of the type name starting at `start`: dotted, generic, nullable and array forms. */
export function typeEnd(doc: SourceDocument, start: number): number {
    let end = start;
    for (;;) {
        const next = doc.nextSignificant(end);
        const token = doc.tokens[next];
        if (isPunct(token, '.', '::') && doc.tokens[doc.nextSignificant(next)]?.kind === 'identifier') {
            end = doc.nextSignificant(next);
        } else if (isPunct(token, '<')) {
            let depth = 0;
            let i = next;
            for (; i >= 0; i = doc.nextSignificant(i)) {
                if (isPunct(doc.tokens[i], '<')) depth++;
                else if (isPunct(doc.tokens[i], '>') && --depth === 0) break;
                else if (isPunct(doc.tokens[i], ';', '(', ')', '{')) return end;
            }
            if (i < 0) return end;
            end = i;
        } else if (isPunct(token, '?') && !isOperandStart(doc, doc.nextSignificant(next))) {
            end = next;
        } else if (isPunct(token, '[') && isPunct(doc.tokens[doc.nextSignificant(next)], ']', ',')) {
            end = doc.matchingClose(next);
            if (end < 0) return next;
        } else {
            return end;
        }
    }
}

function asToCast(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const offset = doc.offsetAt(request.lineNumber, request.columnNumber);
    const candidates = doc.significantOnLine(request.lineNumber).filter(i => isWord(doc.tokens[i], 'as'));
    const keyword = candidates.find(i => doc.tokens[i].start >= offset) ?? candidates[0];
    const notFound = () => new RefactoringError(`No 'as' expression found at line ${request.lineNumber}`);
    if (keyword === undefined) throw notFound();

    const before = doc.prevSignificant(keyword);
    let anchor = before;
    if (isPunct(doc.tokens[before], ')', ']')) {
        const open = doc.matchingOpen(before);
        if (open < 0) throw notFound();
        const callee = doc.prevSignificant(open);
        anchor = doc.tokens[callee]?.kind === 'identifier' ? callee : open;
    }
    const [first, last] = primaryExpressionBounds(doc, anchor);
    const typeStart = doc.nextSignificant(keyword);
    const typeToken = doc.tokens[typeStart];
    if (last !== before || typeToken === undefined || (typeToken.kind !== 'identifier' && typeToken.kind !== 'keyword')) {
        throw notFound();
    }
    const end = typeEnd(doc, typeStart);
    const type = doc.slice(typeToken.start, doc.tokens[end].end);
    const operand = doc.slice(doc.tokens[first].start, doc.tokens[last].end);

    return edit(
        doc.applyEdits([{ start: doc.tokens[first].start, end: doc.tokens[end].end, text: `(${type})${operand}` }]),
        `Converted 'as' expression to a cast to '${type}'`
    );
}

export function convertCastToAsExpression(doc: SourceDocument, request: OperationRequest): OperationOutcome {
    const target = getString(request.arguments, 'target', 'as').trim().toLowerCase();
    if (target === 'as') return castToAs(doc, request);
    if (target === 'cast') return asToCast(doc, request);
    throw new RefactoringError(`target must be 'as' or 'cast' (got '${target}')`);
}
