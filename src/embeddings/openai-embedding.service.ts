import { Logger } from "@nestjs/common";
import OpenAI from "openai";
import { GenerationError, getErrorMessage } from "../common/errors";
import { EmbeddingGenerator } from "./embedding-generator";

/** The slice of the OpenAI client this service calls; `new OpenAI().embeddings` satisfies it. */
export interface EmbeddingsApi {
    create(body: OpenAI.Embeddings.EmbeddingCreateParams): PromiseLike<OpenAI.Embeddings.CreateEmbeddingResponse>;
}

// Only the text-embedding-3 family accepts a `dimensions` parameter
const SHORTENABLE_MODEL = /^text-embedding-3-/;

export interface OpenAIEmbeddingOptions {
    model: string;
    dimension: number;
}

export class OpenAIEmbeddingService implements EmbeddingGenerator {
    private readonly logger = new Logger(OpenAIEmbeddingService.name);

    constructor(
        private readonly embeddings: EmbeddingsApi,
        private readonly options: OpenAIEmbeddingOptions,
    ) { }

    async generate(text: string): Promise<number[]> {
        let response: OpenAI.Embeddings.CreateEmbeddingResponse;
        try {
            response = await this.embeddings.create({
                model: this.options.model,
                input: text,
                ...(SHORTENABLE_MODEL.test(this.options.model) ? { dimensions: this.options.dimension } : {}),
            });
        } catch (error) {
            this.logger.warn(`Embedding request failed: ${getErrorMessage(error)}`);
            throw new GenerationError(`Embedding request failed: ${getErrorMessage(error)}`, error);
        }

        const embedding = response.data.at(0)?.embedding;
        if (!embedding || embedding.length === 0) {
            throw new GenerationError('Embedding response contained no vector');
        }
        if (embedding.length !== this.options.dimension) {
            throw new GenerationError(`Expected ${this.options.dimension} dimensions from ${this.options.model}, got ${embedding.length}`);
        }
        return embedding;
    }

    dimension(): number {
        return this.options.dimension;
    }
}
