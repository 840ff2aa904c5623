/**
 * Unified diff for dry-run previews.
 *
 * Line-based LCS over the region between the common prefix and suffix, with
 * three lines of context and adjacent hunks merged.
 */

const CONTEXT = 3;

type OpType = ' ' | '-' | '+';

interface DiffOp {
    type: OpType;
    text: string;
}

export function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}

/** `newPath` names where the changed text would be written, when that is not `path`. */
export function createUnifiedDiff(path: string, before: string, after: string, newPath = path): string {
    if (before === after) {
        return newPath === path
            ? `No changes would be made to ${path}`
            : `No changes; ${path} would be copied to ${newPath}`;
    }

    const ops = diffLines(splitLines(before), splitLines(after));
    const out: string[] = [`--- ${path}`, `+++ ${newPath}`];

    // Line numbers (1-based) of the next old/new line at each op index.
    const oldLine: number[] = [];
    const newLine: number[] = [];
    let o = 1;
    let n = 1;
    for (const op of ops) {
        oldLine.push(o);
        newLine.push(n);
        if (op.type !== '+') o++;
        if (op.type !== '-') n++;
    }

    let i = 0;
    while (i < ops.length) {
        if (ops[i].type === ' ') {
            i++;
            continue;
        }

        const start = Math.max(i - CONTEXT, 0);
        let lastChange = i;
        let k = i + 1;
        while (k < ops.length) {
            if (ops[k].type !== ' ') {
                lastChange = k;
                k++;
                continue;
            }
            let run = 0;
            while (k + run < ops.length && ops[k + run].type === ' ') run++;
            if (k + run >= ops.length || run > CONTEXT * 2) break;
            k += run;
        }
        const end = Math.min(lastChange + 1 + CONTEXT, ops.length);
        const hunk = ops.slice(start, end);

        const oldCount = hunk.filter(op => op.type !== '+').length;
        const newCount = hunk.filter(op => op.type !== '-').length;
        const oldStart = oldCount === 0 ? oldLine[start] - 1 : oldLine[start];
        const newStart = newCount === 0 ? newLine[start] - 1 : newLine[start];

        out.push(`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`);
        for (const op of hunk) out.push(op.type + op.text);
        i = end;
    }

    return out.join('\n');
}

function diffLines(a: string[], b: string[]): DiffOp[] {
    let prefix = 0;
    while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;
    let suffix = 0;
    while (
        suffix < a.length - prefix &&
        suffix < b.length - prefix &&
        a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
    ) suffix++;

    const midA = a.slice(prefix, a.length - suffix);
    const midB = b.slice(prefix, b.length - suffix);

    const ops: DiffOp[] = a.slice(0, prefix).map((text): DiffOp => ({ type: ' ', text }));
    ops.push(...lcsOps(midA, midB));
    ops.push(...a.slice(a.length - suffix).map((text): DiffOp => ({ type: ' ', text })));
    return ops;
}

function lcsOps(a: string[], b: string[]): DiffOp[] {
    const m = a.length;
    const n = b.length;
    // table[i][j] = LCS length of a[i..] and b[j..]
    const table: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
    for (let i = m - 1; i >= 0; i--) {
        for (let j = n - 1; j >= 0; j--) {
            table[i][j] = a[i] === b[j]
                ? table[i + 1][j + 1] + 1
                : Math.max(table[i + 1][j], table[i][j + 1]);
        }
    }

    const ops: DiffOp[] = [];
    let i = 0;
    let j = 0;
    while (i < m && j < n) {
        if (a[i] === b[j]) {
            ops.push({ type: ' ', text: a[i++] });
            j++;
        } else if (table[i + 1][j] >= table[i][j + 1]) {
            ops.push({ type: '-', text: a[i++] });
        } else {
            ops.push({ type: '+', text: b[j++] });
        }
    }
    while (i < m) ops.push({ type: '-', text: a[i++] });
    while (j < n) ops.push({ type: '+', text: b[j++] });
    return ops;
}
