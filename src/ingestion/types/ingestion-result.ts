export interface IngestionResult {
    documentId: string;
    filename: string;
    chunksCreated: number;
    chunksUpdated: number;
    chunksFailed: number;
    chunksWithoutEmbedding: number;
    totalChunks: number;
}

export type IngestionOutcome =
    | { path: string; ok: true; result: IngestionResult }
    | { path: string; ok: false; error: string };
