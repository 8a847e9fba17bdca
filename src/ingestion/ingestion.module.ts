import { Module } from "@nestjs/common";
import { ChunkingModule } from "../chunking/chunking.module";
import { EmbeddingsModule } from "../embeddings/embeddings.module";
import { StorageModule } from "../storage/storage.module";
import { IngestionService } from "./ingestion.service";

@Module({
    imports: [ChunkingModule, EmbeddingsModule, StorageModule],
    providers: [IngestionService],
    exports: [IngestionService],
})
export class IngestionModule { }
