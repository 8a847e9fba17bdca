import { Logger } from "@nestjs/common";
import { SupabaseClient } from "@supabase/supabase-js";
import { StorageError } from "../common/errors";
import { CHUNK_COLUMNS, toChunkRecords, toIds, toSimilarityMatches } from "./chunk-row";
import {
    ChunkRecord,
    ChunkWrite,
    DocumentRecord,
    NewDocument,
    SimilarityMatch,
    StorageBackend,
    VectorCapable,
} from "./storage-backend";

export type SupabaseQueryClient = Pick<SupabaseClient, 'from' | 'rpc'>;

interface DocumentRow {
    id: string;
    title: string;
    file_path: string;
    file_type: string;
    file_size: number | null;
    content_hash: string | null;
    metadata: Record<string, unknown> | null;
    created_at: string;
}

interface SupabaseError {
    message: string;
}

const DOCUMENT_COLUMNS = 'id, title, file_path, file_type, file_size, content_hash, metadata, created_at';

/**
 * Same schema served through PostgREST. Calls are stateless HTTP requests,
 * so the delete of a document and its chunks is not transactional.
 */
export class SupabaseStorageBackend implements StorageBackend, VectorCapable {
    readonly name = 'supabase';
    private readonly logger = new Logger(SupabaseStorageBackend.name);

    constructor(private readonly client: SupabaseQueryClient) { }

    async findDocumentByPath(filePath: string): Promise<DocumentRecord | null> {
        const { data, error } = await this.client
            .from('documents')
            .select(DOCUMENT_COLUMNS)
            .eq('file_path', filePath)
            .maybeSingle<DocumentRow>();
        this.check('findDocumentByPath', error);

        return data ? this.toDocumentRecord(data) : null;
    }

    async insertDocument(document: NewDocument): Promise<string | null> {
        const { data, error } = await this.client
            .from('documents')
            .insert({
                title: document.title,
                file_path: document.filePath,
                file_type: document.fileType,
                file_size: document.fileSize,
                content_hash: document.contentHash,
                metadata: document.metadata,
            })
            .select('id')
            .maybeSingle<{ id: string }>();
        this.check('insertDocument', error);

        return data?.id ?? null;
    }

    async deleteDocument(documentId: string): Promise<number> {
        const chunks = await this.client
            .from('chunks')
            .delete({ count: 'exact' })
            .eq('document_id', documentId);
        this.check('deleteDocument', chunks.error);

        const { error } = await this.client
            .from('documents')
            .delete()
            .eq('id', documentId);
        this.check('deleteDocument', error);

        return chunks.count ?? 0;
    }

    async findChunk(documentId: string, chunkIndex: number): Promise<ChunkRecord | null> {
        const { data, error } = await this.client
            .from('chunks')
            .select(`${CHUNK_COLUMNS}, embedding`)
            .eq('document_id', documentId)
            .eq('chunk_index', chunkIndex);
        this.check('findChunk', error);

        return toChunkRecords(data ?? []).at(0) ?? null;
    }

    async findChunksByDocument(documentId: string): Promise<ChunkRecord[]> {
        const { data, error } = await this.client
            .from('chunks')
            .select(`${CHUNK_COLUMNS}, embedding`)
            .eq('document_id', documentId)
            .order('chunk_index', { ascending: true });
        this.check('findChunksByDocument', error);

        return toChunkRecords(data ?? []);
    }

    async insertChunk(chunk: ChunkWrite): Promise<string | null> {
        const { data, error } = await this.client
            .from('chunks')
            .insert(this.toRow(chunk))
            .select('id');
        this.check('insertChunk', error);

        return toIds(data ?? []).at(0) ?? null;
    }

    async updateChunk(chunkId: string, chunk: ChunkWrite): Promise<boolean> {
        const { data, error } = await this.client
            .from('chunks')
            .update(this.toRow(chunk))
            .eq('id', chunkId)
            .select('id');
        this.check('updateChunk', error);

        return toIds(data ?? []).length > 0;
    }

    async deleteChunksFrom(documentId: string, fromIndex: number): Promise<number> {
        const { count, error } = await this.client
            .from('chunks')
            .delete({ count: 'exact' })
            .eq('document_id', documentId)
            .gte('chunk_index', fromIndex);
        this.check('deleteChunksFrom', error);

        return count ?? 0;
    }

    async countDocuments(): Promise<number> {
        const { count, error } = await this.client
            .from('documents')
            .select('id', { count: 'exact', head: true });
        this.check('countDocuments', error);

        return count ?? 0;
    }

    async countChunks(documentId?: string): Promise<number> {
        let query = this.client
            .from('chunks')
            .select('id', { count: 'exact', head: true });
        if (documentId !== undefined) {
            query = query.eq('document_id', documentId);
        }
        const { count, error } = await query;
        this.check('countChunks', error);

        return count ?? 0;
    }

    async textSearch(query: string, limit: number): Promise<ChunkRecord[]> {
        const { data, error } = await this.client
            .from('chunks')
            .select(`${CHUNK_COLUMNS}, embedding`)
            .textSearch('content', query, { type: 'websearch', config: 'english' })
            .limit(limit);
        this.check('textSearch', error);

        return toChunkRecords(data ?? []);
    }

    async similaritySearch(queryEmbedding: string, limit: number, threshold: number): Promise<SimilarityMatch[]> {
        const { data, error } = await this.client.rpc('match_chunks', {
            query_embedding: queryEmbedding,
            match_threshold: threshold,
            match_count: limit,
        });
        this.check('similaritySearch', error);

        return toSimilarityMatches(data ?? []);
    }

    async healthCheck(): Promise<boolean> {
        const { error } = await this.client
            .from('documents')
            .select('id')
            .limit(1);
        this.check('healthCheck', error);

        return true;
    }

    private check(operation: string, error: SupabaseError | null): void {
        if (error) {
            this.logger.error(`${operation} failed: ${error.message}`);
            throw new StorageError(`${operation} failed: ${error.message}`, error);
        }
    }

    private toRow(chunk: ChunkWrite) {
        return {
            document_id: chunk.documentId,
            chunk_index: chunk.chunkIndex,
            content: chunk.content,
            start_position: chunk.startPosition,
            end_position: chunk.endPosition,
            chunk_type: chunk.chunkType,
            metadata: chunk.metadata,
            embedding: chunk.embedding,
        };
    }

    private toDocumentRecord(row: DocumentRow): DocumentRecord {
        return {
            id: row.id,
            title: row.title,
            filePath: row.file_path,
            fileType: row.file_type,
            fileSize: row.file_size,
            contentHash: row.content_hash,
            metadata: row.metadata ?? {},
            createdAt: new Date(row.created_at),
        };
    }
}
