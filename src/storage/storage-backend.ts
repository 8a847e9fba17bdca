export const STORAGE_BACKEND = Symbol('STORAGE_BACKEND');

export interface NewDocument {
    title: string;
    filePath: string;
    fileType: string;
    fileSize: number | null;
    contentHash: string | null;
    metadata: Record<string, unknown>;
}

export interface DocumentRecord extends NewDocument {
    id: string;
    createdAt: Date;
}

/**
 * Column values for a chunk insert or update. `embedding` is already in its
 * wire form (`[0.1,0.2,...]`) or null.
 */
export interface ChunkWrite {
    documentId: string;
    chunkIndex: number;
    content: string;
    startPosition: number | null;
    endPosition: number | null;
    chunkType: string;
    metadata: Record<string, unknown>;
    embedding: string | null;
}

export interface ChunkRecord {
    id: string;
    documentId: string;
    chunkIndex: number;
    content: string;
    startPosition: number | null;
    endPosition: number | null;
    chunkType: string;
    metadata: Record<string, unknown>;
    embedding: number[] | null;
}

export interface SimilarityMatch {
    id: string;
    documentId: string;
    chunkIndex: number;
    content: string;
    chunkType: string;
    metadata: Record<string, unknown>;
    similarity: number;
}

/**
 * Persistence primitives a backend provides. Reconciliation decisions are
 * made above this layer; every method acquires and releases its own
 * connection.
 */
export interface StorageBackend {
    readonly name: string;

    findDocumentByPath(filePath: string): Promise<DocumentRecord | null>;
    /** Resolves to the generated id, or null when the store reported no row. */
    insertDocument(document: NewDocument): Promise<string | null>;
    /** Deletes the document's chunks, then the document. Resolves to the number of chunks removed. */
    deleteDocument(documentId: string): Promise<number>;

    findChunk(documentId: string, chunkIndex: number): Promise<ChunkRecord | null>;
    findChunksByDocument(documentId: string): Promise<ChunkRecord[]>;
    insertChunk(chunk: ChunkWrite): Promise<string | null>;
    updateChunk(chunkId: string, chunk: ChunkWrite): Promise<boolean>;
    /** Deletes the document's chunks with `chunk_index >= fromIndex`. Resolves to the number removed. */
    deleteChunksFrom(documentId: string, fromIndex: number): Promise<number>;

    countDocuments(): Promise<number>;
    countChunks(documentId?: string): Promise<number>;
    textSearch(query: string, limit: number): Promise<ChunkRecord[]>;
    healthCheck(): Promise<boolean>;
}

export interface VectorCapable {
    similaritySearch(queryEmbedding: string, limit: number, threshold: number): Promise<SimilarityMatch[]>;
}

export function isVectorCapable<T extends StorageBackend>(backend: T): backend is T & VectorCapable {
    return 'similaritySearch' in backend && typeof backend.similaritySearch === 'function';
}
