import { registerAs } from "@nestjs/config";
import { z } from "zod";
import { VECTOR_DIMENSION } from "../chunks/embedding-vector";
import { ConfigurationError } from "../common/errors";

export type StorageBackendKind = 'postgres' | 'supabase';

/**
 * How an already-known `file_path` is handled on re-ingestion.
 *
 * - `delete-recreate`: the document and its chunks are purged and inserted
 *   again; chunks are insert-only.
 * - `reuse`: the existing document id is kept; chunks are upserted by
 *   (document, chunk index).
 */
export type ReingestionPolicy = 'delete-recreate' | 'reuse';

export interface KnowledgeConfig {
    storage: {
        backend: StorageBackendKind;
        reingestionPolicy: ReingestionPolicy;
        similarityThreshold: number;
    };
    database: {
        host: string;
        port: number;
        username: string;
        password: string;
        database: string;
        poolSize: number;
        runMigrations: boolean;
    };
    supabase: {
        url: string;
        serviceRoleKey: string;
    } | null;
    embedding: {
        apiKey: string | null;
        model: string;
        dimension: number;
    };
    chunking: {
        chunkSize: number;
        chunkOverlap: number;
    };
    http: {
        port: number;
    };
}

const booleanString = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

const envSchema = z
    .object({
        STORAGE_BACKEND: z.enum(['postgres', 'supabase']).default('postgres'),
        DB_HOST: z.string().default('localhost'),
        DB_PORT: z.coerce.number().int().positive().default(5432),
        DB_USERNAME: z.string().default('postgres'),
        DB_PASSWORD: z.string().default(''),
        DB_NAME: z.string().default('knowledge'),
        DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
        DB_RUN_MIGRATIONS: booleanString.default('true'),
        SUPABASE_URL: z.string().url().optional(),
        SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
        OPENAI_API_KEY: z.string().optional(),
        EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
        EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(VECTOR_DIMENSION),
        CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
        CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
        REINGESTION_POLICY: z.enum(['delete-recreate', 'reuse']).default('delete-recreate'),
        SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.7),
        PORT: z.coerce.number().int().positive().default(3000),
    })
    .superRefine((env, ctx) => {
        if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['CHUNK_OVERLAP'],
                message: 'must be smaller than CHUNK_SIZE',
            });
        }
        if (env.EMBEDDING_DIMENSION !== VECTOR_DIMENSION) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['EMBEDDING_DIMENSION'],
                message: `must be ${VECTOR_DIMENSION} to match the embedding column`,
            });
        }
        if (env.STORAGE_BACKEND === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_URL'],
                message: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase backend',
            });
        }
    });

export function parseKnowledgeConfig(env: Record<string, string | undefined>): KnowledgeConfig {
    // dotenv leaves unset keys as empty strings
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
    );

    const result = envSchema.safeParse(present);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    const parsed = result.data;

    return {
        storage: {
            backend: parsed.STORAGE_BACKEND,
            reingestionPolicy: parsed.REINGESTION_POLICY,
            similarityThreshold: parsed.SIMILARITY_THRESHOLD,
        },
        database: {
            host: parsed.DB_HOST,
            port: parsed.DB_PORT,
            username: parsed.DB_USERNAME,
            password: parsed.DB_PASSWORD,
            database: parsed.DB_NAME,
            poolSize: parsed.DB_POOL_SIZE,
            runMigrations: parsed.DB_RUN_MIGRATIONS,
        },
        supabase: parsed.SUPABASE_URL && parsed.SUPABASE_SERVICE_ROLE_KEY
            ? { url: parsed.SUPABASE_URL, serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY }
            : null,
        embedding: {
            apiKey: parsed.OPENAI_API_KEY ?? null,
            model: parsed.EMBEDDING_MODEL,
            dimension: parsed.EMBEDDING_DIMENSION,
        },
        chunking: {
            chunkSize: parsed.CHUNK_SIZE,
            chunkOverlap: parsed.CHUNK_OVERLAP,
        },
        http: {
            port: parsed.PORT,
        },
    };
}

export const knowledgeConfig = registerAs('knowledge', (): KnowledgeConfig => parseKnowledgeConfig(process.env));
