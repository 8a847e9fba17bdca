import { Inject, Injectable, Logger } from "@nestjs/common";
import { ChunkFragment } from "../chunking/chunking.strategy";
import { getErrorMessage, StorageError } from "../common/errors";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { ChunkWrite, STORAGE_BACKEND, StorageBackend } from "../storage/storage-backend";
import { serializeEmbedding } from "./embedding-vector";

export type ChunkReconcileStatus = 'created' | 'updated' | 'failed';

export interface ChunkReconcileResult {
    status: ChunkReconcileStatus;
    chunkId?: string;
}

@Injectable()
export class ChunkReconciler {
    private readonly logger = new Logger(ChunkReconciler.name);

    constructor(
        @Inject(STORAGE_BACKEND)
        private readonly backend: StorageBackend,
        @Inject(knowledgeConfig.KEY)
        private readonly config: KnowledgeConfig,
    ) { }

    /**
     * Creates or updates the chunk at `(documentId, fragment.chunkIndex)`.
     * Throws `ValidationError` for a malformed embedding before touching
     * storage; storage failures are logged and reported as `failed`.
     */
    async reconcile(
        documentId: string,
        fragment: ChunkFragment,
        embedding: readonly unknown[] | null = null,
    ): Promise<ChunkReconcileResult> {
        const chunk: ChunkWrite = {
            documentId,
            chunkIndex: fragment.chunkIndex,
            content: fragment.content,
            startPosition: fragment.startPosition,
            endPosition: fragment.endPosition,
            chunkType: fragment.chunkType,
            metadata: fragment.metadata,
            embedding: embedding === null ? null : serializeEmbedding(embedding),
        };

        try {
            const existing = await this.backend.findChunk(documentId, fragment.chunkIndex);

            if (!existing) {
                const chunkId = await this.backend.insertChunk(chunk);
                if (!chunkId) {
                    this.logger.error(`Insert of chunk ${fragment.chunkIndex} for document ${documentId} returned no id`);
                    return { status: 'failed' };
                }
                return { status: 'created', chunkId };
            }

            if (this.config.storage.reingestionPolicy === 'delete-recreate') {
                this.logger.error(
                    `Chunk ${fragment.chunkIndex} of document ${documentId} already exists as ${existing.id}; not overwritten`,
                );
                return { status: 'failed' };
            }

            const updated = await this.backend.updateChunk(existing.id, chunk);
            if (!updated) {
                this.logger.error(`Update of chunk ${existing.id} touched no row`);
                return { status: 'failed' };
            }
            return { status: 'updated', chunkId: existing.id };
        } catch (error) {
            const storageError = error instanceof StorageError
                ? error
                : new StorageError(`Chunk ${fragment.chunkIndex} of document ${documentId}: ${getErrorMessage(error)}`, error);
            this.logger.error(storageError.message);
            return { status: 'failed' };
        }
    }
}
