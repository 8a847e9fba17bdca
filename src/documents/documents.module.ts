import { Module } from "@nestjs/common";
import { StorageBackendModule } from "../storage/storage-backend.module";
import { DocumentReconciler } from "./document-reconciler.service";

@Module({
    imports: [StorageBackendModule],
    providers: [DocumentReconciler],
    exports: [DocumentReconciler],
})
export class DocumentsModule { }
