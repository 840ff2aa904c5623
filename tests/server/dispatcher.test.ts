import { buildCapabilityRegistry } from '../../src/server/capability-registry.js';
import { Dispatcher } from '../../src/server/dispatcher.js';
import type { CapabilityDescriptor } from '../../src/server/tool-metadata.js';
import { RefactoringError } from '../../src/engine/refactoring/errors.js';
import { createScratch, FakeEngine, type Scratch } from '../fixtures.js';

describe('Dispatcher', () => {
    let scratch: Scratch;
    let engine: FakeEngine;
    let dispatcher: Dispatcher;
    let rename: CapabilityDescriptor;
    let extract: CapabilityDescriptor;
    let file: string;

    beforeEach(async () => {
        vi.spyOn(console, 'error').mockImplementation(() => { });
        scratch = await createScratch();
        file = await scratch.file('Sample.cs', 'class Sample { }\n');
        engine = new FakeEngine();
        dispatcher = new Dispatcher(engine);
        const registry = buildCapabilityRegistry(engine);
        const resolve = (name: string) => {
            const descriptor = registry.resolve(name);
            if (!descriptor) throw new Error(`missing ${name}`);
            return descriptor;
        };
        rename = resolve('rename');
        extract = resolve('extract-method');
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await scratch.cleanup();
    });

    it('rejects a blank file_path before anything else', async () => {
        const outcome = await dispatcher.invoke(rename, { file_path: '  ' });
        expect(outcome).toEqual({
            isError: true,
            text: 'Error: file_path is required',
            failure: { kind: 'missing-argument', argument: 'file_path' }
        });
        expect(engine.calls).toHaveLength(0);
    });

    it('rejects a blank required extension argument', async () => {
        const outcome = await dispatcher.invoke(rename, { file_path: file, old_name: 'Sample', new_name: '' });
        expect(outcome.text).toBe('Error: new_name is required');
        expect(engine.calls).toHaveLength(0);
    });

    it('rejects a missing file without calling the engine', async () => {
        const missing = `${scratch.dir}/Missing.cs`;
        const outcome = await dispatcher.invoke(extract, { file_path: missing, method_name: 'Helper' });
        expect(outcome).toEqual({
            isError: true,
            text: `Error: File not found: ${missing}`,
            failure: { kind: 'target-not-found', path: missing }
        });
        expect(engine.calls).toHaveLength(0);
    });

    it('rejects a directory as the target', async () => {
        const outcome = await dispatcher.invoke(extract, { file_path: scratch.dir, method_name: 'Helper' });
        expect(outcome.text).toBe(`Error: File not found: ${scratch.dir}`);
    });

    it('binds the common arguments into the request', async () => {
        const args = {
            file_path: file,
            old_name: 'Sample',
            new_name: 'Example',
            line_number: 4,
            column_number: 2,
            output_path: ' out.cs ',
            dry_run: true
        };
        const outcome = await dispatcher.invoke(rename, args);
        expect(outcome).toEqual({ isError: false, text: 'ran RenameCommand' });
        expect(engine.calls).toEqual([{
            id: 'RenameCommand',
            request: { filePath: file, lineNumber: 4, columnNumber: 2, outputPath: 'out.cs', dryRun: true, arguments: args }
        }]);
    });

    it('defaults malformed optional arguments', async () => {
        await dispatcher.invoke(extract, { file_path: file, method_name: 'Helper', line_number: 'ten', dry_run: 'yes', output_path: '' });
        expect(engine.calls[0].request).toMatchObject({ lineNumber: 1, columnNumber: 0, outputPath: undefined, dryRun: false });
    });

    it('turns engine exceptions into error text', async () => {
        engine.handler = async () => {
            throw new RefactoringError("Symbol 'Sample' not found");
        };
        const outcome = await dispatcher.invoke(extract, { file_path: file, method_name: 'Helper' });
        expect(outcome).toEqual({
            isError: true,
            text: "Error: Symbol 'Sample' not found",
            failure: { kind: 'engine-failure', message: "Symbol 'Sample' not found" }
        });
    });

    it('reports non-Error rejections', async () => {
        engine.handler = () => Promise.reject('disk full');
        const outcome = await dispatcher.invoke(extract, { file_path: file, method_name: 'Helper' });
        expect(outcome.text).toBe('Error: disk full');
    });

    it('returns cancelled without calling the engine when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const outcome = await dispatcher.invoke(extract, { file_path: file, method_name: 'Helper' }, controller.signal);
        expect(outcome).toEqual({ isError: true, text: 'Error: Operation cancelled', failure: { kind: 'cancelled' } });
        expect(engine.calls).toHaveLength(0);
    });

    it('returns promptly when aborted while the engine runs', async () => {
        const controller = new AbortController();
        engine.handler = () => new Promise<string>(() => { });
        const pending = dispatcher.invoke(extract, { file_path: file, method_name: 'Helper' }, controller.signal);
        await vi.waitFor(() => expect(engine.calls).toHaveLength(1));
        controller.abort();
        await expect(pending).resolves.toEqual({
            isError: true,
            text: 'Error: Operation cancelled',
            failure: { kind: 'cancelled' }
        });
    });

    it('passes the signal through to the engine', async () => {
        const controller = new AbortController();
        let received: AbortSignal | undefined;
        engine.handler = async (_id, _request, signal) => {
            received = signal;
            return 'done';
        };
        await dispatcher.invoke(extract, { file_path: file, method_name: 'Helper' }, controller.signal);
        expect(received).toBe(controller.signal);
    });
});
