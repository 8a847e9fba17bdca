import { z } from "zod";
import { parseEmbedding } from "../chunks/embedding-vector";
import { StorageError } from "../common/errors";
import { ChunkRecord, SimilarityMatch } from "./storage-backend";

const metadataSchema = z.record(z.unknown()).nullable().transform((value) => value ?? {});

export const chunkRowSchema = z.object({
    id: z.string(),
    document_id: z.string(),
    chunk_index: z.number().int(),
    content: z.string(),
    start_position: z.number().int().nullable(),
    end_position: z.number().int().nullable(),
    chunk_type: z.string(),
    metadata: metadataSchema,
    // pgvector's text form, selected as `embedding::text` or returned by PostgREST
    embedding: z.string().nullable(),
});

export const similarityRowSchema = z.object({
    id: z.string(),
    document_id: z.string(),
    chunk_index: z.number().int(),
    content: z.string(),
    chunk_type: z.string(),
    metadata: metadataSchema,
    similarity: z.coerce.number(),
});

export const CHUNK_COLUMNS = 'id, document_id, chunk_index, content, start_position, end_position, chunk_type, metadata';

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown): z.output<T>[] {
    const result = z.array(schema).safeParse(rows);
    if (!result.success) {
        throw new StorageError(`Unexpected row shape: ${result.error.issues[0]?.message ?? 'unknown'}`, result.error);
    }
    return result.data;
}

export function toChunkRecords(rows: unknown): ChunkRecord[] {
    return parseRows(chunkRowSchema, rows).map((row) => ({
        id: row.id,
        documentId: row.document_id,
        chunkIndex: row.chunk_index,
        content: row.content,
        startPosition: row.start_position,
        endPosition: row.end_position,
        chunkType: row.chunk_type,
        metadata: row.metadata,
        embedding: row.embedding === null ? null : parseEmbedding(row.embedding),
    }));
}

export function toSimilarityMatches(rows: unknown): SimilarityMatch[] {
    return parseRows(similarityRowSchema, rows).map((row) => ({
        id: row.id,
        documentId: row.document_id,
        chunkIndex: row.chunk_index,
        content: row.content,
        chunkType: row.chunk_type,
        metadata: row.metadata,
        similarity: row.similarity,
    }));
}

export function toIds(rows: unknown): string[] {
    return parseRows(z.object({ id: z.string() }), rows).map((row) => row.id);
}
