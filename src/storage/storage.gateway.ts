import { Inject, Injectable, Logger } from "@nestjs/common";
import { ChunkFragment } from "../chunking/chunking.strategy";
import { ChunkReconciler, ChunkReconcileResult } from "../chunks/chunk-reconciler.service";
import { serializeEmbedding } from "../chunks/embedding-vector";
import { ConnectivityError, getErrorMessage } from "../common/errors";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { DocumentReconciler } from "../documents/document-reconciler.service";
import {
    ChunkRecord,
    isVectorCapable,
    NewDocument,
    SimilarityMatch,
    STORAGE_BACKEND,
    StorageBackend,
} from "./storage-backend";

/**
 * Single entry point to persistence for ingestion, search and health.
 * Read paths that serve queries recover to empty results; writes propagate.
 */
@Injectable()
export class StorageGateway {
    private readonly logger = new Logger(StorageGateway.name);

    constructor(
        @Inject(STORAGE_BACKEND)
        private readonly backend: StorageBackend,
        private readonly documentReconciler: DocumentReconciler,
        private readonly chunkReconciler: ChunkReconciler,
        @Inject(knowledgeConfig.KEY)
        private readonly config: KnowledgeConfig,
    ) { }

    get backendName(): string {
        return this.backend.name;
    }

    get supportsSimilaritySearch(): boolean {
        return isVectorCapable(this.backend);
    }

    reconcileDocument(document: NewDocument): Promise<string> {
        return this.documentReconciler.reconcile(document);
    }

    reconcileChunk(
        documentId: string,
        fragment: ChunkFragment,
        embedding: readonly unknown[] | null = null,
    ): Promise<ChunkReconcileResult> {
        return this.chunkReconciler.reconcile(documentId, fragment, embedding);
    }

    findChunksByDocument(documentId: string): Promise<ChunkRecord[]> {
        return this.backend.findChunksByDocument(documentId);
    }

    /** Removes chunks left over from a longer earlier version of the document. */
    deleteChunksFrom(documentId: string, fromIndex: number): Promise<number> {
        return this.backend.deleteChunksFrom(documentId, fromIndex);
    }

    countDocuments(): Promise<number> {
        return this.backend.countDocuments();
    }

    countChunks(documentId?: string): Promise<number> {
        return this.backend.countChunks(documentId);
    }

    async textSearch(query: string, limit = 10): Promise<ChunkRecord[]> {
        try {
            return await this.backend.textSearch(query, limit);
        } catch (error) {
            this.warn(new ConnectivityError(`Text search failed: ${getErrorMessage(error)}`, error));
            return [];
        }
    }

    async similaritySearch(queryEmbedding: readonly number[], limit = 5): Promise<SimilarityMatch[]> {
        const backend = this.backend;
        if (!isVectorCapable(backend)) {
            this.logger.warn(`Backend ${backend.name} does not support similarity search`);
            return [];
        }

        const serialized = serializeEmbedding(queryEmbedding);
        try {
            return await backend.similaritySearch(serialized, limit, this.config.storage.similarityThreshold);
        } catch (error) {
            this.warn(new ConnectivityError(`Similarity search failed: ${getErrorMessage(error)}`, error));
            return [];
        }
    }

    async healthCheck(): Promise<boolean> {
        try {
            return await this.backend.healthCheck();
        } catch (error) {
            this.warn(new ConnectivityError(`Health check failed: ${getErrorMessage(error)}`, error));
            return false;
        }
    }

    private warn(error: ConnectivityError): void {
        this.logger.warn(`${error.code}: ${error.message}`);
    }
}
