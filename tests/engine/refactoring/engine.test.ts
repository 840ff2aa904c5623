import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { SourceRefactoringEngine } from '../../../src/engine/refactoring/engine.js';
import { RefactoringError } from '../../../src/engine/refactoring/errors.js';
import { edit, report, type OperationDefinition, type OperationRequest } from '../../../src/engine/refactoring/types.js';
import { createScratch, type Scratch } from '../../fixtures.js';

const OPERATIONS: OperationDefinition[] = [
    { id: 'UpperCommand', parameters: [], run: doc => edit(doc.text.toUpperCase(), 'Uppercased text') },
    { id: 'KeepCommand', parameters: [], run: doc => edit(doc.text, 'Nothing to change') },
    { id: 'CountCommand', parameters: [], run: doc => report(`lines: ${doc.lineCount}`) }
];

describe('SourceRefactoringEngine', () => {
    let scratch: Scratch;
    let engine: SourceRefactoringEngine;
    let path: string;

    const request = (overrides: Partial<OperationRequest> = {}): OperationRequest => ({
        filePath: path,
        lineNumber: 1,
        columnNumber: 0,
        dryRun: false,
        arguments: {},
        ...overrides
    });

    beforeEach(async () => {
        scratch = await createScratch();
        engine = new SourceRefactoringEngine(OPERATIONS);
        path = await scratch.file('Sample.cs', 'class a');
    });

    afterEach(async () => {
        await scratch.cleanup();
    });

    it('ships the full operation catalog by default', () => {
        const ids = new SourceRefactoringEngine().listOperations().map(op => op.id);
        expect(ids).toHaveLength(37);
        expect(ids.every(id => id.endsWith('Command'))).toBe(true);
        expect(new Set(ids).size).toBe(37);
    });

    it('previews edits without touching the file', async () => {
        const result = await engine.execute('UpperCommand', request({ dryRun: true }));
        expect(result).toBe([
            '[DRY RUN] Uppercased text',
            `--- ${path}`,
            `+++ ${path}`,
            '@@ -1,1 +1,1 @@',
            '-class a',
            '+CLASS A'
        ].join('\n'));
        expect(await readFile(path, 'utf8')).toBe('class a');
    });

    it('labels a dry run diff with the output path', async () => {
        const output = join(scratch.dir, 'Out.cs');
        const result = await engine.execute('UpperCommand', request({ dryRun: true, outputPath: output }));
        expect(result.split('\n').slice(1, 3)).toEqual([`--- ${path}`, `+++ ${output}`]);
        expect(await readdir(scratch.dir)).toEqual(['Sample.cs']);
    });

    it('writes edits in place', async () => {
        expect(await engine.execute('UpperCommand', request())).toBe(`Uppercased text in ${path}`);
        expect(await readFile(path, 'utf8')).toBe('CLASS A');
        expect(await readdir(scratch.dir)).toEqual(['Sample.cs']);
    });

    it('writes to output_path and leaves the source alone', async () => {
        const output = join(scratch.dir, 'Out.cs');
        expect(await engine.execute('UpperCommand', request({ outputPath: output }))).toBe(`Uppercased text in ${output}`);
        expect(await readFile(output, 'utf8')).toBe('CLASS A');
        expect(await readFile(path, 'utf8')).toBe('class a');
    });

    it('skips the write when nothing changed', async () => {
        expect(await engine.execute('KeepCommand', request())).toBe('Nothing to change');
    });

    it('still copies unchanged text to a separate output path', async () => {
        const output = join(scratch.dir, 'Copy.cs');
        expect(await engine.execute('KeepCommand', request({ outputPath: output }))).toBe(`Nothing to change in ${output}`);
        expect(await readFile(output, 'utf8')).toBe('class a');
    });

    it('returns report text as is, even on dry runs', async () => {
        expect(await engine.execute('CountCommand', request())).toBe('lines: 1');
        expect(await engine.execute('CountCommand', request({ dryRun: true }))).toBe('lines: 1');
    });

    it('rejects unknown operations', async () => {
        await expect(engine.execute('MissingCommand', request())).rejects.toThrow(RefactoringError);
        await expect(engine.execute('MissingCommand', request())).rejects.toThrow('Unknown operation: MissingCommand');
    });

    it('does nothing once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(engine.execute('UpperCommand', request(), controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
        expect(await readFile(path, 'utf8')).toBe('class a');
    });

    it('surfaces read failures', async () => {
        await expect(engine.execute('UpperCommand', request({ filePath: join(scratch.dir, 'Missing.cs') })))
            .rejects.toMatchObject({ code: 'ENOENT' });
    });
});
