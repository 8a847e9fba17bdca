import { Inject, Injectable, Logger } from "@nestjs/common";
import { getErrorMessage } from "../common/errors";
import { EMBEDDING_GENERATOR, EmbeddingGenerator } from "../embeddings/embedding-generator";
import { StorageGateway } from "../storage/storage.gateway";

export interface HealthReport {
    status: 'ok' | 'degraded';
    storage: boolean;
    backend: string;
    embeddings: boolean;
    vectorSearch: boolean;
    documents?: number;
    chunks?: number;
}

@Injectable()
export class HealthService {
    private readonly logger = new Logger(HealthService.name);

    constructor(
        private readonly storage: StorageGateway,
        @Inject(EMBEDDING_GENERATOR)
        private readonly embeddings: EmbeddingGenerator | null,
    ) { }

    async report(): Promise<HealthReport> {
        const storage = await this.storage.healthCheck();
        const report: HealthReport = {
            status: storage ? 'ok' : 'degraded',
            storage,
            backend: this.storage.backendName,
            embeddings: this.embeddings !== null,
            vectorSearch: this.storage.supportsSimilaritySearch,
        };
        if (!storage) {
            return report;
        }

        try {
            const documents = await this.storage.countDocuments();
            const chunks = await this.storage.countChunks();
            return { ...report, documents, chunks };
        } catch (error) {
            this.logger.warn(`Counting failed after a healthy probe: ${getErrorMessage(error)}`);
            return { ...report, status: 'degraded' };
        }
    }
}
