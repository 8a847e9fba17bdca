import { Logger } from "@nestjs/common";
import { DataSource, MoreThanOrEqual, QueryRunner } from "typeorm";
import { z } from "zod";
import { ChunkEntity } from "../chunks/entity/chunk.entity";
import { getErrorMessage, KnowledgeError, StorageError } from "../common/errors";
import { DocumentEntity } from "../documents/entity/document.entity";
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

export type QueryRunnerSource = Pick<DataSource, 'createQueryRunner'>;

const structuredResultSchema = z.object({
    records: z.array(z.unknown()),
    affected: z.number().nullish(),
});

const TS_CONFIG = 'english';

/**
 * Postgres + pgvector through TypeORM. Every operation checks a connection
 * out of the pool and releases it when done.
 */
export class TypeOrmStorageBackend implements StorageBackend, VectorCapable {
    readonly name = 'postgres';
    private readonly logger = new Logger(TypeOrmStorageBackend.name);

    constructor(private readonly dataSource: QueryRunnerSource) { }

    async findDocumentByPath(filePath: string): Promise<DocumentRecord | null> {
        return this.withRunner('findDocumentByPath', async (runner) => {
            const document = await runner.manager.findOne(DocumentEntity, { where: { filePath } });
            return document ? this.toDocumentRecord(document) : null;
        });
    }

    async insertDocument(document: NewDocument): Promise<string | null> {
        return this.withRunner('insertDocument', async (runner) => {
            const entity = runner.manager.create(DocumentEntity, {
                title: document.title,
                filePath: document.filePath,
                fileType: document.fileType,
                fileSize: document.fileSize,
                contentHash: document.contentHash,
                metadata: document.metadata,
            });
            const saved = await runner.manager.save(entity);
            return saved.id ?? null;
        });
    }

    async deleteDocument(documentId: string): Promise<number> {
        return this.withRunner('deleteDocument', async (runner) => {
            await runner.startTransaction();
            try {
                const removed = await runner.manager.delete(ChunkEntity, { documentId });
                await runner.manager.delete(DocumentEntity, { id: documentId });
                await runner.commitTransaction();
                return removed.affected ?? 0;
            } catch (error) {
                await runner.rollbackTransaction();
                throw error;
            }
        });
    }

    async findChunk(documentId: string, chunkIndex: number): Promise<ChunkRecord | null> {
        return this.withRunner('findChunk', async (runner) => {
            const { records } = await this.execute(
                runner,
                `SELECT ${CHUNK_COLUMNS}, embedding::text AS embedding
                 FROM chunks WHERE document_id = $1 AND chunk_index = $2`,
                [documentId, chunkIndex],
            );
            return toChunkRecords(records).at(0) ?? null;
        });
    }

    async findChunksByDocument(documentId: string): Promise<ChunkRecord[]> {
        return this.withRunner('findChunksByDocument', async (runner) => {
            const { records } = await this.execute(
                runner,
                `SELECT ${CHUNK_COLUMNS}, embedding::text AS embedding
                 FROM chunks WHERE document_id = $1 ORDER BY chunk_index`,
                [documentId],
            );
            return toChunkRecords(records);
        });
    }

    async insertChunk(chunk: ChunkWrite): Promise<string | null> {
        return this.withRunner('insertChunk', async (runner) => {
            const { records } = await this.execute(
                runner,
                `INSERT INTO chunks
                    (document_id, chunk_index, content, start_position, end_position, chunk_type, metadata, embedding)
                 VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::vector)
                 RETURNING id`,
                this.chunkParameters(chunk),
            );
            return toIds(records).at(0) ?? null;
        });
    }

    async updateChunk(chunkId: string, chunk: ChunkWrite): Promise<boolean> {
        return this.withRunner('updateChunk', async (runner) => {
            const { affected } = await this.execute(
                runner,
                `UPDATE chunks
                 SET document_id = $1, chunk_index = $2, content = $3, start_position = $4, end_position = $5,
                     chunk_type = $6, metadata = $7::jsonb, embedding = $8::vector
                 WHERE id = $9`,
                [...this.chunkParameters(chunk), chunkId],
            );
            return affected > 0;
        });
    }

    async deleteChunksFrom(documentId: string, fromIndex: number): Promise<number> {
        return this.withRunner('deleteChunksFrom', async (runner) => {
            const removed = await runner.manager.delete(ChunkEntity, {
                documentId,
                chunkIndex: MoreThanOrEqual(fromIndex),
            });
            return removed.affected ?? 0;
        });
    }

    async countDocuments(): Promise<number> {
        return this.withRunner('countDocuments', (runner) => runner.manager.count(DocumentEntity));
    }

    async countChunks(documentId?: string): Promise<number> {
        return this.withRunner('countChunks', (runner) =>
            runner.manager.count(ChunkEntity, documentId === undefined ? {} : { where: { documentId } }),
        );
    }

    async textSearch(query: string, limit: number): Promise<ChunkRecord[]> {
        return this.withRunner('textSearch', async (runner) => {
            const { records } = await this.execute(
                runner,
                `SELECT ${CHUNK_COLUMNS}, embedding::text AS embedding
                 FROM chunks
                 WHERE to_tsvector('${TS_CONFIG}', content) @@ websearch_to_tsquery('${TS_CONFIG}', $1)
                 ORDER BY ts_rank(to_tsvector('${TS_CONFIG}', content), websearch_to_tsquery('${TS_CONFIG}', $1)) DESC
                 LIMIT $2`,
                [query, limit],
            );
            return toChunkRecords(records);
        });
    }

    async similaritySearch(queryEmbedding: string, limit: number, threshold: number): Promise<SimilarityMatch[]> {
        return this.withRunner('similaritySearch', async (runner) => {
            const { records } = await this.execute(
                runner,
                'SELECT * FROM match_chunks($1::vector, $2, $3)',
                [queryEmbedding, threshold, limit],
            );
            return toSimilarityMatches(records);
        });
    }

    async healthCheck(): Promise<boolean> {
        return this.withRunner('healthCheck', async (runner) => {
            await runner.query('SELECT 1');
            return true;
        });
    }

    private async withRunner<T>(operation: string, work: (runner: QueryRunner) => Promise<T>): Promise<T> {
        const runner = this.dataSource.createQueryRunner();
        try {
            await runner.connect();
            return await work(runner);
        } catch (error) {
            if (error instanceof KnowledgeError) {
                throw error;
            }
            this.logger.error(`${operation} failed: ${getErrorMessage(error)}`);
            throw new StorageError(`${operation} failed: ${getErrorMessage(error)}`, error);
        } finally {
            await runner.release();
        }
    }

    private async execute(runner: QueryRunner, sql: string, parameters: unknown[]): Promise<{ records: unknown[]; affected: number }> {
        const result: unknown = await runner.query(sql, parameters, true);
        const parsed = structuredResultSchema.parse(result);
        return { records: parsed.records, affected: parsed.affected ?? 0 };
    }

    private chunkParameters(chunk: ChunkWrite): unknown[] {
        return [
            chunk.documentId,
            chunk.chunkIndex,
            chunk.content,
            chunk.startPosition,
            chunk.endPosition,
            chunk.chunkType,
            JSON.stringify(chunk.metadata),
            chunk.embedding,
        ];
    }

    private toDocumentRecord(document: DocumentEntity): DocumentRecord {
        return {
            id: document.id,
            title: document.title,
            filePath: document.filePath,
            fileType: document.fileType,
            fileSize: document.fileSize,
            contentHash: document.contentHash,
            metadata: document.metadata,
            createdAt: document.createdAt,
        };
    }
}
