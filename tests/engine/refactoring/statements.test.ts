import {
    convertForLoop,
    invertIfStatement,
    reverseForStatement,
    splitOrMergeIfStatements,
    useExplicitType,
    useImplicitType
} from '../../../src/engine/refactoring/operations/statements.js';
import { editWith, lines } from '../../fixtures.js';

describe('reverse-for-statement', () => {
    const loop = (header: string) => lines('void M(int n)', '{', `    for (${header})`, '    {', '    }', '}');

    it('reverses an ascending loop', () => {
        const result = editWith(reverseForStatement, loop('int i = 0; i < n; i++'), {}, { line: 3 });
        expect(result.text.split('\n')[2]).toBe('    for (int i = n - 1; i >= 0; i--)');
        expect(result.summary).toBe('Reversed for loop');
    });

    it('reverses a descending loop back', () => {
        const result = editWith(reverseForStatement, loop('int i = n - 1; i >= 0; i--'), {}, { line: 3 });
        expect(result.text.split('\n')[2]).toBe('    for (int i = 0; i < n; i++)');
    });

    it('keeps an inclusive bound', () => {
        const result = editWith(reverseForStatement, loop('var k = 0; k <= 10; k++'), {}, { line: 3 });
        expect(result.text.split('\n')[2]).toBe('    for (var k = 10; k >= 0; k--)');
    });

    it('refuses loops that do not count toward their bound', () => {
        expect(() => editWith(reverseForStatement, loop('int i = 0; i > n; i++'), {}, { line: 3 }))
            .toThrow('Only counting loops of the form for (T i = a; i < b; i++) can be reversed');
    });

    it('needs a for statement on the line', () => {
        expect(() => editWith(reverseForStatement, loop('int i = 0; i < n; i++'), {}, { line: 1 }))
            .toThrow("No 'for' statement found at line 1");
    });
});

describe('invert-if-statement', () => {
    it('negates the condition and swaps the branches', () => {
        const source = lines('if (x > 0)', '{', '    A();', '}', 'else', '{', '    B();', '}');
        const result = editWith(invertIfStatement, source);
        expect(result.text).toBe(lines('if (x <= 0)', '{', '    B();', '}', 'else', '{', '    A();', '}'));
        expect(result.summary).toBe('Inverted if statement');
    });

    it('removes a leading negation', () => {
        const result = editWith(invertIfStatement, 'if (!done) { Wait(); } else { Finish(); }');
        expect(result.text).toBe('if (done) { Finish(); } else { Wait(); }');
    });

    it('requires an else block', () => {
        expect(() => editWith(invertIfStatement, 'if (ok) { Run(); }')).toThrow('The if statement has no else branch');
        expect(() => editWith(invertIfStatement, 'if (ok) { A(); } else if (other) { B(); }'))
            .toThrow('The else branch must be a block; else-if chains cannot be inverted');
    });
});

describe('use-explicit-type', () => {
    it.each([
        ['var count = 42;', 'int count = 42;', 'int'],
        ['var big = 3000000000;', 'uint big = 3000000000;', 'uint'],
        ['var ratio = 0.5f;', 'float ratio = 0.5f;', 'float'],
        ['var name = "x";', 'string name = "x";', 'string'],
        ['var list = new List<int>();', 'List<int> list = new List<int>();', 'List<int>']
    ])('replaces var in %s', (source, expected, type) => {
        const result = editWith(useExplicitType, source);
        expect(result.text).toBe(expected);
        expect(result.summary).toBe(`Replaced 'var' with '${type}'`);
    });

    it('refuses initializers it cannot type', () => {
        expect(() => editWith(useExplicitType, 'var x = Compute();'))
            .toThrow("Cannot infer the type of 'Compute()' without semantic information");
    });
});

describe('use-implicit-type', () => {
    it('replaces a matching explicit type', () => {
        const result = editWith(useImplicitType, 'int count = 42;');
        expect(result.text).toBe('var count = 42;');
        expect(result.summary).toBe("Replaced 'int' with 'var'");
    });

    it('moves the type into a target-typed new', () => {
        expect(editWith(useImplicitType, 'List<int> xs = new();').text).toBe('var xs = new List<int>();');
    });

    it('refuses initializers of another type', () => {
        expect(() => editWith(useImplicitType, 'long total = 0;')).toThrow("The initializer has type 'int', not 'long'");
        expect(() => editWith(useImplicitType, 'string s = null;')).toThrow("'null' has no type; 'var' cannot be used");
    });

    it('refuses fields', () => {
        const source = lines('class A', '{', '    int count = 0;', '}');
        expect(() => editWith(useImplicitType, source, {}, { line: 3 })).toThrow("Fields cannot be declared with 'var'");
    });
});

describe('split-or-merge-if-statements', () => {
    it('splits a && condition into nested ifs', () => {
        const result = editWith(splitOrMergeIfStatements, lines('if (ready && count > 0)', '{', '    Run();', '}'));
        expect(result.text).toBe(lines('if (ready)', '{', '    if (count > 0)', '    {', '        Run();', '    }', '}'));
        expect(result.summary).toBe('Split if statement into nested if statements');
    });

    it('splits at the last && and keeps an unbraced body', () => {
        expect(editWith(splitOrMergeIfStatements, lines('if (a && b && c) Go();')).text)
            .toBe(lines('if (a && b)', '{', '    if (c) Go();', '}'));
    });

    it('merges a nested if, parenthesizing an || operand', () => {
        const source = lines('if (a)', '{', '    if (b || c)', '    {', '        Go();', '    }', '}');
        const result = editWith(splitOrMergeIfStatements, source);
        expect(result.text).toBe(lines('if (a && (b || c))', '{', '    Go();', '}'));
        expect(result.summary).toBe('Merged nested if statements');
    });

    it('refuses what it cannot restructure', () => {
        expect(() => editWith(splitOrMergeIfStatements, lines('if (a || b) Go();'), { operation: 'split' }))
            .toThrow("Only conditions joined by '&&' can be split");
        expect(() => editWith(splitOrMergeIfStatements, lines('if (a && b) Go();', 'else Stop();')))
            .toThrow('An if statement with an else branch cannot be split');
        expect(() => editWith(splitOrMergeIfStatements, lines('if (a) Go();'), { operation: 'merge' }))
            .toThrow('The if statement does not contain a single nested if statement to merge');
        expect(() => editWith(splitOrMergeIfStatements, lines('if (a) Go();'), { operation: 'join' }))
            .toThrow("operation must be 'auto', 'split' or 'merge' (got 'join')");
    });
});

describe('convert-for-loop', () => {
    it('turns an indexed for loop into foreach', () => {
        const source = lines('for (int i = 0; i < names.Length; i++)', '{', '    Console.WriteLine(names[i]);', '}');
        const result = editWith(convertForLoop, source);
        expect(result.text).toBe(lines('foreach (var item in names)', '{', '    Console.WriteLine(item);', '}'));
        expect(result.summary).toBe("Converted for loop to foreach over 'names'");
    });

    it('refuses a loop that uses the index for anything else', () => {
        const source = lines('for (int i = 0; i < names.Length; i++)', '{', '    Console.WriteLine(i + ": " + names[i]);', '}');
        expect(() => editWith(convertForLoop, source)).toThrow("The loop uses 'i' other than to index 'names'");
    });

    it('refuses a loop that writes elements', () => {
        const source = lines('for (int i = 0; i < counts.Count; i++)', '    counts[i] = 0;');
        expect(() => editWith(convertForLoop, source))
            .toThrow("The loop assigns elements of 'counts'; a foreach variable is read-only");
    });

    it('turns foreach over an array into an indexed loop', () => {
        const source = lines(
            'void Print(string[] names)',
            '{',
            '    foreach (var name in names)',
            '    {',
            '        Console.WriteLine(name);',
            '    }',
            '}'
        );
        const result = editWith(convertForLoop, source, { target_type: 'for' }, { line: 3 });
        expect(result.text).toBe(lines(
            'void Print(string[] names)',
            '{',
            '    for (int i = 0; i < names.Length; i++)',
            '    {',
            '        Console.WriteLine(names[i]);',
            '    }',
            '}'
        ));
        expect(result.summary).toBe("Converted foreach loop to for loop over 'names'");
    });

    it('uses Count for collections not declared as arrays', () => {
        expect(editWith(convertForLoop, lines('foreach (var order in orders)', '    Ship(order);'), { target_type: 'for' }).text)
            .toBe(lines('for (int i = 0; i < orders.Count; i++)', '    Ship(orders[i]);'));
    });

    it('rejects unknown target types', () => {
        expect(() => editWith(convertForLoop, lines('for (;;) { }'), { target_type: 'while' }))
            .toThrow("target_type must be 'foreach' or 'for' (got 'while')");
    });
});
