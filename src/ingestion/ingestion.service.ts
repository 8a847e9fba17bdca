import { Inject, Injectable, Logger } from "@nestjs/common";
import { createHash } from "crypto";
import { Stats } from "fs";
import { readFile, stat } from "fs/promises";
import { basename, extname, resolve } from "path";
import { FileTypeDetector } from "../chunking/file-type-detector";
import { EMBEDDING_GENERATOR, EmbeddingGenerator } from "../embeddings/embedding-generator";
import { GenerationError, getErrorMessage, NotFoundError, ReadError } from "../common/errors";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { StorageGateway } from "../storage/storage.gateway";
import { IngestionOutcome, IngestionResult } from "./types/ingestion-result";

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

interface SourceFile {
    filePath: string;
    content: string;
    size: number;
}

@Injectable()
export class IngestionService {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        private readonly storage: StorageGateway,
        private readonly fileTypeDetector: FileTypeDetector,
        @Inject(EMBEDDING_GENERATOR)
        private readonly embeddings: EmbeddingGenerator | null,
        @Inject(knowledgeConfig.KEY)
        private readonly config: KnowledgeConfig,
    ) { }

    async ingest(path: string): Promise<IngestionResult> {
        const source = await this.readSource(path);
        const filename = basename(source.filePath);
        const fileType = extname(source.filePath).toLowerCase();
        const strategy = this.fileTypeDetector.resolve(source.filePath);

        const documentId = await this.storage.reconcileDocument({
            title: filename,
            filePath: source.filePath,
            fileType,
            fileSize: source.size,
            contentHash: createHash('sha256').update(source.content).digest('hex'),
            metadata: { strategy_name: strategy.name },
        });

        const fragments = await strategy.chunk(source.content, {
            filename,
            file_path: source.filePath,
            file_type: fileType,
            strategy_name: strategy.name,
            document_id: documentId,
        });
        this.logger.log(`Split ${filename} into ${fragments.length} chunks with ${strategy.name}`);

        const result: IngestionResult = {
            documentId,
            filename,
            chunksCreated: 0,
            chunksUpdated: 0,
            chunksFailed: 0,
            chunksWithoutEmbedding: 0,
            totalChunks: fragments.length,
        };

        for (const fragment of fragments) {
            try {
                const embedding = await this.embed(fragment.content, fragment.chunkIndex);
                if (embedding === null) {
                    result.chunksWithoutEmbedding++;
                }

                const { status } = await this.storage.reconcileChunk(documentId, fragment, embedding);
                if (status === 'created') {
                    result.chunksCreated++;
                } else if (status === 'updated') {
                    result.chunksUpdated++;
                } else {
                    result.chunksFailed++;
                }
            } catch (error) {
                this.logger.error(`Chunk ${fragment.chunkIndex} of ${filename} failed: ${getErrorMessage(error)}`);
                result.chunksFailed++;
            }
        }

        // Upserts by index leave the tail of a longer earlier version; skipped after any failed chunk
        if (this.config.storage.reingestionPolicy === 'reuse' && result.chunksFailed === 0) {
            const removed = await this.storage.deleteChunksFrom(documentId, fragments.length);
            if (removed > 0) {
                this.logger.log(`Removed ${removed} trailing chunks of ${filename}`);
            }
        }

        this.logger.log(
            `Ingested ${filename}: ${result.chunksCreated} created, ${result.chunksUpdated} updated, ` +
            `${result.chunksFailed} failed, ${result.chunksWithoutEmbedding} without embedding`,
        );
        return result;
    }

    /**
     * Ingests each path in turn. A fatal error for one file is recorded and
     * the remaining files are still processed.
     */
    async ingestMany(paths: readonly string[]): Promise<IngestionOutcome[]> {
        const outcomes: IngestionOutcome[] = [];
        for (const path of paths) {
            try {
                outcomes.push({ path, ok: true, result: await this.ingest(path) });
            } catch (error) {
                this.logger.error(`Ingestion of ${path} failed: ${getErrorMessage(error)}`);
                outcomes.push({ path, ok: false, error: getErrorMessage(error) });
            }
        }
        return outcomes;
    }

    private async readSource(path: string): Promise<SourceFile> {
        const filePath = resolve(path);

        let stats: Stats;
        try {
            stats = await stat(filePath);
        } catch (error) {
            if (isMissing(error)) {
                throw new NotFoundError(`File not found: ${filePath}`, error);
            }
            throw new ReadError(`Could not stat ${filePath}: ${getErrorMessage(error)}`, error);
        }
        if (!stats.isFile()) {
            throw new NotFoundError(`File not found: ${filePath}`);
        }

        let bytes: Buffer;
        try {
            bytes = await readFile(filePath);
        } catch (error) {
            throw new ReadError(`Could not read ${filePath}: ${getErrorMessage(error)}`, error);
        }

        try {
            const content = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
            return { filePath, content, size: bytes.byteLength };
        } catch (error) {
            throw new ReadError(`${filePath} is not valid UTF-8 text`, error);
        }
    }

    private async embed(content: string, chunkIndex: number): Promise<number[] | null> {
        if (!this.embeddings) {
            return null;
        }
        try {
            return await this.embeddings.generate(content);
        } catch (error) {
            if (error instanceof GenerationError) {
                this.logger.warn(`No embedding for chunk ${chunkIndex}: ${error.message}`);
                return null;
            }
            throw error;
        }
    }
}
