import { Module } from "@nestjs/common";
import { EmbeddingsModule } from "../embeddings/embeddings.module";
import { StorageModule } from "../storage/storage.module";
import { HealthController } from "./health.controller";
import { HealthService } from "./health.service";

@Module({
    imports: [StorageModule, EmbeddingsModule],
    providers: [HealthService],
    controllers: [HealthController],
    exports: [HealthService],
})
export class HealthModule { }
