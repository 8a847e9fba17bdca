import { randomUUID } from "crypto";
import { parseEmbedding } from "../src/chunks/embedding-vector";
import {
    ChunkRecord,
    ChunkWrite,
    DocumentRecord,
    NewDocument,
    SimilarityMatch,
    StorageBackend,
    VectorCapable,
} from "../src/storage/storage-backend";

/**
 * Process-local stand-in for the Postgres backend. Enforces the same
 * UNIQUE constraints the migration creates.
 */
export class InMemoryStorageBackend implements StorageBackend {
    readonly name: string = 'memory';

    readonly documents = new Map<string, DocumentRecord>();
    readonly chunks = new Map<string, ChunkRecord>();

    async findDocumentByPath(filePath: string): Promise<DocumentRecord | null> {
        return [...this.documents.values()].find(document => document.filePath === filePath) ?? null;
    }

    async insertDocument(document: NewDocument): Promise<string | null> {
        if (await this.findDocumentByPath(document.filePath)) {
            throw new Error(`duplicate key value violates unique constraint "documents_file_path_key"`);
        }
        const id = randomUUID();
        this.documents.set(id, { ...document, id, createdAt: new Date() });
        return id;
    }

    async deleteDocument(documentId: string): Promise<number> {
        let removed = 0;
        for (const [id, chunk] of this.chunks) {
            if (chunk.documentId === documentId) {
                this.chunks.delete(id);
                removed++;
            }
        }
        this.documents.delete(documentId);
        return removed;
    }

    async findChunk(documentId: string, chunkIndex: number): Promise<ChunkRecord | null> {
        return [...this.chunks.values()]
            .find(chunk => chunk.documentId === documentId && chunk.chunkIndex === chunkIndex) ?? null;
    }

    async findChunksByDocument(documentId: string): Promise<ChunkRecord[]> {
        return [...this.chunks.values()]
            .filter(chunk => chunk.documentId === documentId)
            .sort((a, b) => a.chunkIndex - b.chunkIndex);
    }

    async insertChunk(chunk: ChunkWrite): Promise<string | null> {
        if (!this.documents.has(chunk.documentId)) {
            throw new Error(`insert or update on table "chunks" violates foreign key constraint`);
        }
        if (await this.findChunk(chunk.documentId, chunk.chunkIndex)) {
            throw new Error(`duplicate key value violates unique constraint "uq_chunks_document_chunk_index"`);
        }
        const id = randomUUID();
        this.chunks.set(id, this.toRecord(id, chunk));
        return id;
    }

    async updateChunk(chunkId: string, chunk: ChunkWrite): Promise<boolean> {
        if (!this.chunks.has(chunkId)) {
            return false;
        }
        this.chunks.set(chunkId, this.toRecord(chunkId, chunk));
        return true;
    }

    async deleteChunksFrom(documentId: string, fromIndex: number): Promise<number> {
        let removed = 0;
        for (const [id, chunk] of this.chunks) {
            if (chunk.documentId === documentId && chunk.chunkIndex >= fromIndex) {
                this.chunks.delete(id);
                removed++;
            }
        }
        return removed;
    }

    async countDocuments(): Promise<number> {
        return this.documents.size;
    }

    async countChunks(documentId?: string): Promise<number> {
        if (documentId === undefined) {
            return this.chunks.size;
        }
        return (await this.findChunksByDocument(documentId)).length;
    }

    async textSearch(query: string, limit: number): Promise<ChunkRecord[]> {
        const terms = query.toLowerCase().split(/\s+/).filter(term => term.length > 0);
        return [...this.chunks.values()]
            .filter(chunk => terms.every(term => chunk.content.toLowerCase().includes(term)))
            .slice(0, limit);
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }

    private toRecord(id: string, chunk: ChunkWrite): ChunkRecord {
        return {
            id,
            documentId: chunk.documentId,
            chunkIndex: chunk.chunkIndex,
            content: chunk.content,
            startPosition: chunk.startPosition,
            endPosition: chunk.endPosition,
            chunkType: chunk.chunkType,
            metadata: chunk.metadata,
            embedding: chunk.embedding === null ? null : parseEmbedding(chunk.embedding),
        };
    }
}

export class InMemoryVectorStorageBackend extends InMemoryStorageBackend implements VectorCapable {
    readonly name: string = 'memory-vector';

    async similaritySearch(queryEmbedding: string, limit: number, threshold: number): Promise<SimilarityMatch[]> {
        const query = parseEmbedding(queryEmbedding);
        const matches: SimilarityMatch[] = [];

        for (const chunk of this.chunks.values()) {
            if (!chunk.embedding) {
                continue;
            }
            const similarity = calculateCosineSimilarity(query, chunk.embedding);
            if (similarity >= threshold) {
                matches.push({
                    id: chunk.id,
                    documentId: chunk.documentId,
                    chunkIndex: chunk.chunkIndex,
                    content: chunk.content,
                    chunkType: chunk.chunkType,
                    metadata: chunk.metadata,
                    similarity,
                });
            }
        }

        return matches
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, limit);
    }
}

function calculateCosineSimilarity(vectorA: number[], vectorB: number[]): number {
    if (vectorA.length !== vectorB.length) {
        throw new Error('Vectors must have the same length');
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < vectorA.length; i++) {
        dotProduct += vectorA[i] * vectorB[i];
        normA += vectorA[i] * vectorA[i];
        normB += vectorB[i] * vectorB[i];
    }

    const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

    if (magnitude === 0) {
        return 0;
    }

    return dotProduct / magnitude;
}
