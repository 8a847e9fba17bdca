import { StorageError } from "../common/errors";
import { SupabaseStorageBackend } from "./supabase-storage.backend";

interface FakeResult {
    data?: unknown;
    error?: { message: string } | null;
    count?: number | null;
}

/** Chainable stand-in for a PostgREST query; resolves to the canned result. */
class FakeQuery implements PromiseLike<FakeResult> {
    readonly calls: Array<[string, unknown[]]> = [];

    constructor(private readonly result: FakeResult) { }

    select(...args: unknown[]) { return this.record('select', args); }
    insert(...args: unknown[]) { return this.record('insert', args); }
    update(...args: unknown[]) { return this.record('update', args); }
    delete(...args: unknown[]) { return this.record('delete', args); }
    eq(...args: unknown[]) { return this.record('eq', args); }
    gte(...args: unknown[]) { return this.record('gte', args); }
    order(...args: unknown[]) { return this.record('order', args); }
    limit(...args: unknown[]) { return this.record('limit', args); }
    textSearch(...args: unknown[]) { return this.record('textSearch', args); }
    maybeSingle(...args: unknown[]) { return this.record('maybeSingle', args); }

    then<TResult1 = FakeResult, TResult2 = never>(
        onfulfilled?: ((value: FakeResult) => TResult1 | PromiseLike<TResult1>) | null,
        onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): PromiseLike<TResult1 | TResult2> {
        return Promise.resolve({ error: null, ...this.result }).then(onfulfilled, onrejected);
    }

    private record(method: string, args: unknown[]): this {
        this.calls.push([method, args]);
        return this;
    }
}

describe('SupabaseStorageBackend', () => {
    function setup(...results: FakeResult[]) {
        const queries = results.map(result => new FakeQuery(result));
        const from = jest.fn();
        queries.forEach(query => from.mockReturnValueOnce(query));
        const rpc = jest.fn().mockReturnValue(queries[0]);
        return { backend: new SupabaseStorageBackend({ from, rpc }), from, rpc, queries };
    }

    it('looks a document up by path', async () => {
        const { backend, from, queries } = setup({
            data: {
                id: 'doc-1',
                title: 'notes.txt',
                file_path: '/data/notes.txt',
                file_type: '.txt',
                file_size: 12,
                content_hash: 'abc',
                metadata: null,
                created_at: '2024-01-01T00:00:00.000Z',
            },
        });

        const document = await backend.findDocumentByPath('/data/notes.txt');

        expect(from).toHaveBeenCalledWith('documents');
        expect(queries[0].calls).toContainEqual(['eq', ['file_path', '/data/notes.txt']]);
        expect(document).toEqual({
            id: 'doc-1',
            title: 'notes.txt',
            filePath: '/data/notes.txt',
            fileType: '.txt',
            fileSize: 12,
            contentHash: 'abc',
            metadata: {},
            createdAt: new Date('2024-01-01T00:00:00.000Z'),
        });
    });

    it('returns the id of an inserted chunk', async () => {
        const { backend, queries } = setup({ data: [{ id: 'chunk-1' }] });

        const chunkId = await backend.insertChunk({
            documentId: 'doc-1',
            chunkIndex: 2,
            content: 'text',
            startPosition: null,
            endPosition: null,
            chunkType: 'markdown',
            metadata: {},
            embedding: '[1,0]',
        });

        expect(chunkId).toBe('chunk-1');
        expect(queries[0].calls[0]).toEqual(['insert', [{
            document_id: 'doc-1',
            chunk_index: 2,
            content: 'text',
            start_position: null,
            end_position: null,
            chunk_type: 'markdown',
            metadata: {},
            embedding: '[1,0]',
        }]]);
    });

    it('deletes chunks before the document and reports how many went', async () => {
        const { backend, from } = setup({ count: 4 }, {});

        await expect(backend.deleteDocument('doc-1')).resolves.toBe(4);

        expect(from.mock.calls).toEqual([['chunks'], ['documents']]);
    });

    it('deletes trailing chunks of a document', async () => {
        const { backend, from, queries } = setup({ count: 2 });

        await expect(backend.deleteChunksFrom('doc-1', 3)).resolves.toBe(2);

        expect(from).toHaveBeenCalledWith('chunks');
        expect(queries[0].calls).toEqual([
            ['delete', [{ count: 'exact' }]],
            ['eq', ['document_id', 'doc-1']],
            ['gte', ['chunk_index', 3]],
        ]);
    });

    it('raises StorageError for a PostgREST error', async () => {
        const { backend } = setup({ data: null, error: { message: 'permission denied' } });

        await expect(backend.countDocuments()).rejects.toThrow(StorageError);
    });

    it('filters chunk counts by document when asked', async () => {
        const { backend, queries } = setup({ count: 3 });

        await expect(backend.countChunks('doc-1')).resolves.toBe(3);
        expect(queries[0].calls).toContainEqual(['eq', ['document_id', 'doc-1']]);
    });

    it('searches text with websearch syntax', async () => {
        const { backend, queries } = setup({ data: [] });

        await backend.textSearch('vector store', 10);

        expect(queries[0].calls).toContainEqual(['textSearch', ['content', 'vector store', { type: 'websearch', config: 'english' }]]);
        expect(queries[0].calls).toContainEqual(['limit', [10]]);
    });

    it('runs similarity search through the match_chunks function', async () => {
        const { backend, rpc } = setup({
            data: [{
                id: 'chunk-1',
                document_id: 'doc-1',
                chunk_index: 0,
                content: 'text',
                chunk_type: 'markdown',
                metadata: {},
                similarity: 0.88,
            }],
        });

        const matches = await backend.similaritySearch('[1,0]', 3, 0.7);

        expect(rpc).toHaveBeenCalledWith('match_chunks', { query_embedding: '[1,0]', match_threshold: 0.7, match_count: 3 });
        expect(matches[0]).toMatchObject({ id: 'chunk-1', documentId: 'doc-1', similarity: 0.88 });
    });
});
