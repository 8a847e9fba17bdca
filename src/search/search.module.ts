import { Module } from "@nestjs/common";
import { EmbeddingsModule } from "../embeddings/embeddings.module";
import { StorageModule } from "../storage/storage.module";
import { SearchController } from "./search.controller";
import { SearchService } from "./search.service";

@Module({
    imports: [StorageModule, EmbeddingsModule],
    providers: [SearchService],
    controllers: [SearchController],
    exports: [SearchService],
})
export class SearchModule { }
