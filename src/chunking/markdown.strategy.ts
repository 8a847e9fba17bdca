import { Inject, Injectable } from "@nestjs/common";
import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { TextSplitterStrategy } from "./text-splitter.strategy";

/**
 * Splits on markdown structure first (headings, code fences, rules) before
 * falling back to paragraphs and words.
 */
@Injectable()
export class MarkdownStrategy extends TextSplitterStrategy {
    readonly name = 'markdown';
    readonly supportedExtensions = ['.md', '.markdown'];

    protected readonly splitter: RecursiveCharacterTextSplitter;

    constructor(@Inject(knowledgeConfig.KEY) config: KnowledgeConfig) {
        super();
        this.splitter = RecursiveCharacterTextSplitter.fromLanguage('markdown', {
            chunkSize: config.chunking.chunkSize,
            chunkOverlap: config.chunking.chunkOverlap,
        });
    }
}
