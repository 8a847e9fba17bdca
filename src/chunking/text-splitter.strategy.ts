import { TextSplitter } from "@langchain/textsplitters";
import { ChunkFragment, ChunkingStrategy } from "./chunking.strategy";

// Document fields copied onto every chunk's metadata
const PRESERVED_METADATA_KEYS = ['filename', 'file_path', 'file_type', 'strategy_name', 'document_id'] as const;

export abstract class TextSplitterStrategy implements ChunkingStrategy {
    abstract readonly name: string;
    abstract readonly supportedExtensions: readonly string[];

    protected abstract readonly splitter: TextSplitter;

    async chunk(content: string, metadata: Record<string, unknown>): Promise<ChunkFragment[]> {
        if (content.trim().length === 0) {
            return [];
        }

        const texts = await this.splitter.splitText(content);
        const preserved = this.preservedMetadata(metadata);

        return texts.map((text, chunkIndex) => {
            const start = content.indexOf(text);

            return {
                content: text,
                chunkIndex,
                chunkType: this.name,
                startPosition: start >= 0 ? start : null,
                endPosition: start >= 0 ? start + text.length : null,
                metadata: {
                    ...preserved,
                    chunk_index: chunkIndex,
                    chunk_type: this.name,
                    chunk_size: text.length,
                },
            };
        });
    }

    private preservedMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
        const preserved: Record<string, unknown> = {};
        for (const key of PRESERVED_METADATA_KEYS) {
            if (metadata[key] !== undefined) {
                preserved[key] = metadata[key];
            }
        }
        return preserved;
    }
}
