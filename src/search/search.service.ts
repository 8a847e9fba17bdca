import { Inject, Injectable, Logger } from "@nestjs/common";
import { GenerationError } from "../common/errors";
import { EMBEDDING_GENERATOR, EmbeddingGenerator } from "../embeddings/embedding-generator";
import { ChunkRecord, SimilarityMatch } from "../storage/storage-backend";
import { StorageGateway } from "../storage/storage.gateway";

export type SearchHit = Omit<ChunkRecord, 'embedding' | 'startPosition' | 'endPosition'>;

@Injectable()
export class SearchService {
    private readonly logger = new Logger(SearchService.name);

    constructor(
        private readonly storage: StorageGateway,
        @Inject(EMBEDDING_GENERATOR)
        private readonly embeddings: EmbeddingGenerator | null,
    ) { }

    async textSearch(query: string, limit = 10): Promise<SearchHit[]> {
        const chunks = await this.storage.textSearch(query, limit);
        return chunks.map(({ id, documentId, chunkIndex, content, chunkType, metadata }) => ({
            id,
            documentId,
            chunkIndex,
            content,
            chunkType,
            metadata,
        }));
    }

    async similarTo(query: string, limit = 5): Promise<SimilarityMatch[]> {
        if (!this.embeddings) {
            this.logger.warn('Similarity search requested but no embedding generator is configured');
            return [];
        }

        let embedding: number[];
        try {
            embedding = await this.embeddings.generate(query);
        } catch (error) {
            if (error instanceof GenerationError) {
                this.logger.warn(`Could not embed query: ${error.message}`);
                return [];
            }
            throw error;
        }

        return this.storage.similaritySearch(embedding, limit);
    }
}
