import { readFile } from 'fs/promises';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { SourceRefactoringEngine } from '../../src/engine/refactoring/engine.js';
import { createAdapter, createServer } from '../../src/server/index.js';
import { createScratch, type Scratch } from '../fixtures.js';

const SAMPLE = [
    'class Foo',
    '{',
    '    public Foo() { }',
    '    public static Foo Create() => new Foo();',
    '}',
    ''
].join('\n');

describe('MCP server over an in-memory transport', () => {
    let scratch: Scratch;
    let client: Client;

    beforeEach(async () => {
        vi.spyOn(console, 'error').mockImplementation(() => { });
        scratch = await createScratch();
        const server = createServer(createAdapter(new SourceRefactoringEngine()));
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        client = new Client({ name: 'test-client', version: '1.0.0' });
        await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    });

    afterEach(async () => {
        await client.close();
        await scratch.cleanup();
        vi.restoreAllMocks();
    });

    it('lists the catalog under prefixed names', async () => {
        const { tools } = await client.listTools();
        const rename = tools.find(t => t.name === 'cast_rename');
        expect(rename?.description).toBe('Rename a symbol at the specified location');
        expect(rename?.inputSchema.required).toEqual(['file_path', 'old_name', 'new_name']);
        expect(tools.every(t => t.name.startsWith('cast_'))).toBe(true);
        expect(tools.map(t => t.name)).toContain('cast_extract_method');
    });

    it('renames a symbol in a separate output file', async () => {
        const input = await scratch.file('Foo.cs', SAMPLE);
        const output = `${scratch.dir}/Bar.cs`;

        const result = await client.callTool({
            name: 'cast_rename',
            arguments: { file_path: input, old_name: 'Foo', new_name: 'Bar', output_path: output }
        });

        expect(result.isError).toBe(false);
        expect(result.content).toEqual([
            { type: 'text', text: `Renamed 'Foo' to 'Bar' (4 occurrences) in ${output}` }
        ]);
        const written = await readFile(output, 'utf8');
        expect(written).not.toMatch(/\bFoo\b/);
        expect(written.split('\n')[3]).toBe('    public static Bar Create() => new Bar();');
        expect(await readFile(input, 'utf8')).toBe(SAMPLE);
    });

    it('leaves the file untouched on a dry run', async () => {
        const input = await scratch.file('Foo.cs', SAMPLE);

        const result = await client.callTool({
            name: 'cast_rename',
            arguments: { file_path: input, old_name: 'Foo', new_name: 'Bar', dry_run: true }
        });

        expect(result.isError).toBe(false);
        expect(result.content).toEqual([{
            type: 'text',
            text: [
                "[DRY RUN] Renamed 'Foo' to 'Bar' (4 occurrences)",
                `--- ${input}`,
                `+++ ${input}`,
                '@@ -1,6 +1,6 @@',
                '-class Foo',
                '+class Bar',
                ' {',
                '-    public Foo() { }',
                '-    public static Foo Create() => new Foo();',
                '+    public Bar() { }',
                '+    public static Bar Create() => new Bar();',
                ' }',
                ' '
            ].join('\n')
        }]);
        expect(await readFile(input, 'utf8')).toBe(SAMPLE);
    });

    it('answers an unknown tool with an error result', async () => {
        const result = await client.callTool({ name: 'cast_nonexistent', arguments: { file_path: 'x.cs' } });
        expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: 'Unknown tool: cast_nonexistent' }] });
    });

    it('reports a missing file', async () => {
        const missing = `${scratch.dir}/Nope.cs`;
        const result = await client.callTool({ name: 'cast_sort_usings', arguments: { file_path: missing } });
        expect(result).toMatchObject({ isError: true, content: [{ type: 'text', text: `Error: File not found: ${missing}` }] });
    });

    it('serves concurrent list and call requests without cross-talk', async () => {
        const a = await scratch.file('A.cs', 'class Alpha { Alpha Self() => this; }\n');
        const b = await scratch.file('B.cs', 'class Beta { }\n');

        const [list, first, second, search] = await Promise.all([
            client.listTools(),
            client.callTool({ name: 'cast_rename', arguments: { file_path: a, old_name: 'Alpha', new_name: 'Gamma' } }),
            client.callTool({ name: 'cast_rename', arguments: { file_path: b, old_name: 'Beta', new_name: 'Delta' } }),
            client.callTool({ name: 'cast_find_usages', arguments: { file_path: b, symbol_name: 'Missing' } })
        ]);

        expect(list.tools.length).toBeGreaterThan(20);
        expect(first.content).toEqual([{ type: 'text', text: `Renamed 'Alpha' to 'Gamma' (2 occurrences) in ${a}` }]);
        expect(second.content).toEqual([{ type: 'text', text: `Renamed 'Beta' to 'Delta' (1 occurrence) in ${b}` }]);
        expect(search.content).toEqual([{ type: 'text', text: "No usages found for symbol 'Missing'" }]);
        expect(await readFile(a, 'utf8')).toBe('class Gamma { Gamma Self() => this; }\n');
    });
});
