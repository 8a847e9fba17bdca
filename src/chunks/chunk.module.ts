import { Module } from "@nestjs/common";
import { StorageBackendModule } from "../storage/storage-backend.module";
import { ChunkReconciler } from "./chunk-reconciler.service";

@Module({
    imports: [StorageBackendModule],
    providers: [ChunkReconciler],
    exports: [ChunkReconciler],
})
export class ChunkModule { }
