import { Module } from "@nestjs/common";
import { CHUNKING_STRATEGIES, ChunkingStrategy } from "./chunking.strategy";
import { FileTypeDetector } from "./file-type-detector";
import { MarkdownStrategy } from "./markdown.strategy";
import { RecursiveCharacterStrategy } from "./recursive-character.strategy";

@Module({
    providers: [
        RecursiveCharacterStrategy,
        MarkdownStrategy,
        {
            provide: CHUNKING_STRATEGIES,
            useFactory: (recursive: RecursiveCharacterStrategy, markdown: MarkdownStrategy): ChunkingStrategy[] => [recursive, markdown],
            inject: [RecursiveCharacterStrategy, MarkdownStrategy],
        },
        {
            provide: FileTypeDetector,
            useFactory: (recursive: RecursiveCharacterStrategy, strategies: ChunkingStrategy[]) => new FileTypeDetector(recursive, strategies),
            inject: [RecursiveCharacterStrategy, CHUNKING_STRATEGIES],
        },
    ],
    exports: [FileTypeDetector, CHUNKING_STRATEGIES],
})
export class ChunkingModule { }
