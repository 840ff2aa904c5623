import { createUnifiedDiff } from '../../../src/engine/refactoring/diff.js';

const numbered = (count: number, replace: Record<number, string> = {}) =>
    Array.from({ length: count }, (_, i) => replace[i + 1] ?? String(i + 1)).join('\n');

describe('createUnifiedDiff', () => {
    it('reports identical input', () => {
        expect(createUnifiedDiff('Sample.cs', 'a', 'a')).toBe('No changes would be made to Sample.cs');
    });

    it('names a separate destination', () => {
        expect(createUnifiedDiff('A.cs', 'a', 'b', 'B.cs').split('\n')).toEqual(['--- A.cs', '+++ B.cs', '@@ -1,1 +1,1 @@', '-a', '+b']);
        expect(createUnifiedDiff('A.cs', 'a', 'a', 'B.cs')).toBe('No changes; A.cs would be copied to B.cs');
    });

    it('shows a change with three lines of context', () => {
        expect(createUnifiedDiff('Sample.cs', numbered(9), numbered(9, { 5: 'five' })).split('\n')).toEqual([
            '--- Sample.cs',
            '+++ Sample.cs',
            '@@ -2,7 +2,7 @@',
            ' 2',
            ' 3',
            ' 4',
            '-5',
            '+five',
            ' 6',
            ' 7',
            ' 8'
        ]);
    });

    it('counts appended lines', () => {
        expect(createUnifiedDiff('Sample.cs', 'a\nb', 'a\nb\nc').split('\n')).toEqual([
            '--- Sample.cs',
            '+++ Sample.cs',
            '@@ -1,2 +1,3 @@',
            ' a',
            ' b',
            '+c'
        ]);
    });

    it('splits distant changes into separate hunks', () => {
        const diff = createUnifiedDiff('Sample.cs', numbered(20), numbered(20, { 2: 'two', 18: 'eighteen' }));
        expect(diff.split('\n').filter(l => l.startsWith('@@'))).toEqual([
            '@@ -1,5 +1,5 @@',
            '@@ -15,6 +15,6 @@'
        ]);
    });
});
