export const CHUNKING_STRATEGIES = Symbol('CHUNKING_STRATEGIES');

export interface ChunkFragment {
    content: string;
    chunkIndex: number;
    chunkType: string;
    /** First occurrence of `content` in the source; null when it does not appear verbatim. */
    startPosition: number | null;
    endPosition: number | null;
    metadata: Record<string, unknown>;
}

export interface ChunkingStrategy {
    readonly name: string;
    /** Lower-case extensions including the dot, e.g. `.md`. */
    readonly supportedExtensions: readonly string[];

    chunk(content: string, metadata: Record<string, unknown>): Promise<ChunkFragment[]>;
}
