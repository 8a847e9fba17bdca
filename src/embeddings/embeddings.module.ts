import { Module } from "@nestjs/common";
import OpenAI from "openai";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { EMBEDDING_GENERATOR, EmbeddingGenerator } from "./embedding-generator";
import { OpenAIEmbeddingService } from "./openai-embedding.service";

@Module({
    providers: [
        {
            provide: EMBEDDING_GENERATOR,
            useFactory: (config: KnowledgeConfig): EmbeddingGenerator | null => {
                if (!config.embedding.apiKey) {
                    return null;
                }
                return new OpenAIEmbeddingService(
                    new OpenAI({ apiKey: config.embedding.apiKey }).embeddings,
                    { model: config.embedding.model, dimension: config.embedding.dimension },
                );
            },
            inject: [knowledgeConfig.KEY],
        },
    ],
    exports: [EMBEDDING_GENERATOR],
})
export class EmbeddingsModule { }
