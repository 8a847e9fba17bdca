import { InMemoryStorageBackend } from "../../test/in-memory-storage.backend";
import { InsertError } from "../common/errors";
import { parseKnowledgeConfig, ReingestionPolicy } from "../config/knowledge.config";
import { NewDocument } from "../storage/storage-backend";
import { DocumentReconciler } from "./document-reconciler.service";

const document: NewDocument = {
    title: 'notes.txt',
    filePath: '/data/notes.txt',
    fileType: '.txt',
    fileSize: 42,
    contentHash: 'abc123',
    metadata: {},
};

function setup(policy: ReingestionPolicy) {
    const backend = new InMemoryStorageBackend();
    const reconciler = new DocumentReconciler(backend, parseKnowledgeConfig({ REINGESTION_POLICY: policy }));
    return { backend, reconciler };
}

async function addChunk(backend: InMemoryStorageBackend, documentId: string, chunkIndex: number) {
    await backend.insertChunk({
        documentId,
        chunkIndex,
        content: `chunk ${chunkIndex}`,
        startPosition: null,
        endPosition: null,
        chunkType: 'recursive_character',
        metadata: {},
        embedding: null,
    });
}

describe('DocumentReconciler', () => {
    it('inserts a document for an unknown path', async () => {
        const { backend, reconciler } = setup('delete-recreate');

        const documentId = await reconciler.reconcile(document);

        expect(backend.documents.get(documentId)).toMatchObject({ filePath: '/data/notes.txt', title: 'notes.txt' });
    });

    it('throws InsertError when the insert yields no id', async () => {
        const { backend, reconciler } = setup('delete-recreate');
        jest.spyOn(backend, 'insertDocument').mockResolvedValue(null);

        await expect(reconciler.reconcile(document)).rejects.toThrow(InsertError);
    });

    describe('reuse policy', () => {
        it('returns the existing id without writing', async () => {
            const { backend, reconciler } = setup('reuse');
            const first = await reconciler.reconcile(document);
            const insert = jest.spyOn(backend, 'insertDocument');
            const remove = jest.spyOn(backend, 'deleteDocument');

            const second = await reconciler.reconcile({ ...document, contentHash: 'changed' });

            expect(second).toBe(first);
            expect(insert).not.toHaveBeenCalled();
            expect(remove).not.toHaveBeenCalled();
            expect(backend.documents.size).toBe(1);
        });
    });

    describe('delete-recreate policy', () => {
        it('replaces the document and removes its chunks', async () => {
            const { backend, reconciler } = setup('delete-recreate');
            const first = await reconciler.reconcile(document);
            await addChunk(backend, first, 0);
            await addChunk(backend, first, 1);

            const second = await reconciler.reconcile(document);

            expect(second).not.toBe(first);
            expect([...backend.documents.keys()]).toEqual([second]);
            expect(await backend.countChunks(first)).toBe(0);
            expect(await backend.countChunks()).toBe(0);
        });

        it('propagates storage failures', async () => {
            const { backend, reconciler } = setup('delete-recreate');
            await reconciler.reconcile(document);
            jest.spyOn(backend, 'deleteDocument').mockRejectedValue(new Error('connection reset'));

            await expect(reconciler.reconcile(document)).rejects.toThrow('connection reset');
        });
    });
});
