import { Module } from "@nestjs/common";
import { ChunkModule } from "../chunks/chunk.module";
import { DocumentsModule } from "../documents/documents.module";
import { StorageBackendModule } from "./storage-backend.module";
import { StorageGateway } from "./storage.gateway";

@Module({
    imports: [StorageBackendModule, DocumentsModule, ChunkModule],
    providers: [StorageGateway],
    exports: [StorageGateway],
})
export class StorageModule { }
