import { Module } from "@nestjs/common";
import { ConditionalModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { createClient } from "@supabase/supabase-js";
import { DataSource } from "typeorm";
import { ChunkEntity } from "../chunks/entity/chunk.entity";
import { ConfigurationError } from "../common/errors";
import { knowledgeConfig, KnowledgeConfig } from "../config/knowledge.config";
import { DocumentEntity } from "../documents/entity/document.entity";
import { InitialSchema1717000000000 } from "./migrations/1717000000000-initial-schema";
import { STORAGE_BACKEND, StorageBackend } from "./storage-backend";
import { SupabaseStorageBackend } from "./supabase-storage.backend";
import { TypeOrmStorageBackend } from "./typeorm-storage.backend";

/**
 * Provides the configured `StorageBackend`. The TypeORM connection is only
 * opened when the postgres backend is selected.
 */
@Module({
    imports: [
        ConditionalModule.registerWhen(
            TypeOrmModule.forRootAsync({
                useFactory: (config: KnowledgeConfig) => ({
                    type: 'postgres',
                    host: config.database.host,
                    port: config.database.port,
                    username: config.database.username,
                    password: config.database.password,
                    database: config.database.database,
                    entities: [DocumentEntity, ChunkEntity],
                    migrations: [InitialSchema1717000000000],
                    migrationsRun: config.database.runMigrations,
                    synchronize: false,
                    extra: { max: config.database.poolSize },
                }),
                inject: [knowledgeConfig.KEY],
            }),
            (env: NodeJS.ProcessEnv) => (env.STORAGE_BACKEND || 'postgres') === 'postgres',
        ),
    ],
    providers: [
        {
            provide: STORAGE_BACKEND,
            useFactory: (config: KnowledgeConfig, dataSource?: DataSource): StorageBackend => {
                if (config.storage.backend === 'supabase') {
                    if (!config.supabase) {
                        throw new ConfigurationError('Supabase backend selected without SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
                    }
                    return new SupabaseStorageBackend(createClient(config.supabase.url, config.supabase.serviceRoleKey, {
                        auth: { persistSession: false },
                    }));
                }
                if (!dataSource) {
                    throw new ConfigurationError('Postgres backend selected but no TypeORM data source was registered');
                }
                return new TypeOrmStorageBackend(dataSource);
            },
            inject: [knowledgeConfig.KEY, { token: DataSource, optional: true }],
        },
    ],
    exports: [STORAGE_BACKEND],
})
export class StorageBackendModule { }
