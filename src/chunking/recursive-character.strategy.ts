import { Inject, Injectable } from "@nestjs/common";
import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { TextSplitterStrategy } from "./text-splitter.strategy";

@Injectable()
export class RecursiveCharacterStrategy extends TextSplitterStrategy {
    readonly name = 'recursive_character';
    readonly supportedExtensions = ['.txt', '.text', '.log'];

    protected readonly splitter: RecursiveCharacterTextSplitter;

    constructor(@Inject(knowledgeConfig.KEY) config: KnowledgeConfig) {
        super();
        this.splitter = new RecursiveCharacterTextSplitter({
            chunkSize: config.chunking.chunkSize,
            chunkOverlap: config.chunking.chunkOverlap,
            separators: ['\n\n', '\n', '. ', ' ', ''],
        });
    }
}
