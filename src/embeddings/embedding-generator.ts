export const EMBEDDING_GENERATOR = Symbol('EMBEDDING_GENERATOR');

export interface EmbeddingGenerator {
    /** Rejects with `GenerationError` when no vector could be produced. */
    generate(text: string): Promise<number[]>;
    dimension(): number;
}
