import { Inject, Injectable, Logger } from "@nestjs/common";
import { InsertError } from "../common/errors";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { NewDocument, STORAGE_BACKEND, StorageBackend } from "../storage/storage-backend";

/**
 * Keeps at most one document row per file path.
 */
@Injectable()
export class DocumentReconciler {
    private readonly logger = new Logger(DocumentReconciler.name);

    constructor(
        @Inject(STORAGE_BACKEND)
        private readonly backend: StorageBackend,
        @Inject(knowledgeConfig.KEY)
        private readonly config: KnowledgeConfig,
    ) { }

    async reconcile(document: NewDocument): Promise<string> {
        const existing = await this.backend.findDocumentByPath(document.filePath);

        if (!existing) {
            const documentId = await this.insert(document);
            this.logger.log(`Created document ${documentId} for ${document.filePath}`);
            return documentId;
        }

        if (this.config.storage.reingestionPolicy === 'reuse') {
            this.logger.log(`Reusing document ${existing.id} for ${document.filePath}`);
            return existing.id;
        }

        const retired = await this.backend.deleteDocument(existing.id);
        const documentId = await this.insert(document);
        this.logger.log(`Replaced document ${existing.id} with ${documentId}; ${retired} chunk ids retired`);
        return documentId;
    }

    private async insert(document: NewDocument): Promise<string> {
        const documentId = await this.backend.insertDocument(document);
        if (!documentId) {
            throw new InsertError(`Document insert for ${document.filePath} returned no id`);
        }
        return documentId;
    }
}
