import { extname } from "path";
import { ChunkingStrategy } from "./chunking.strategy";

/**
 * Routes a file to a chunking strategy by its extension.
 */
export class FileTypeDetector {
    private readonly strategies = new Map<string, ChunkingStrategy>();

    constructor(
        private readonly fallback: ChunkingStrategy,
        strategies: readonly ChunkingStrategy[] = [],
    ) {
        this.register(fallback);
        strategies.forEach(strategy => this.register(strategy));
    }

    register(strategy: ChunkingStrategy): void {
        for (const extension of strategy.supportedExtensions) {
            this.strategies.set(extension.toLowerCase(), strategy);
        }
    }

    resolve(filePath: string): ChunkingStrategy {
        return this.strategies.get(extname(filePath).toLowerCase()) ?? this.fallback;
    }
}
