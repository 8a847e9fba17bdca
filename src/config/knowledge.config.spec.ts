import { ConfigurationError } from "../common/errors";
import { parseKnowledgeConfig } from "./knowledge.config";

describe('parseKnowledgeConfig', () => {
    it('applies defaults to an empty environment', () => {
        const config = parseKnowledgeConfig({});

        expect(config.storage).toEqual({ backend: 'postgres', reingestionPolicy: 'delete-recreate', similarityThreshold: 0.7 });
        expect(config.chunking).toEqual({ chunkSize: 1000, chunkOverlap: 200 });
        expect(config.embedding).toEqual({ apiKey: null, model: 'text-embedding-3-small', dimension: 1536 });
        expect(config.database.port).toBe(5432);
        expect(config.database.runMigrations).toBe(true);
        expect(config.supabase).toBeNull();
        expect(config.http.port).toBe(3000);
    });

    it('coerces numeric and boolean variables', () => {
        const config = parseKnowledgeConfig({ DB_PORT: '6543', DB_RUN_MIGRATIONS: 'false', SIMILARITY_THRESHOLD: '0.82' });

        expect(config.database.port).toBe(6543);
        expect(config.database.runMigrations).toBe(false);
        expect(config.storage.similarityThreshold).toBe(0.82);
    });

    it('treats empty values as unset', () => {
        const config = parseKnowledgeConfig({ OPENAI_API_KEY: '', CHUNK_SIZE: ' ' });

        expect(config.embedding.apiKey).toBeNull();
        expect(config.chunking.chunkSize).toBe(1000);
    });

    it('rejects an overlap that is not smaller than the chunk size', () => {
        expect(() => parseKnowledgeConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(ConfigurationError);
        expect(() => parseKnowledgeConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(/CHUNK_OVERLAP/);
    });

    it('rejects an embedding dimension the schema cannot store', () => {
        expect(() => parseKnowledgeConfig({ EMBEDDING_DIMENSION: '768' })).toThrow(ConfigurationError);
        expect(() => parseKnowledgeConfig({ EMBEDDING_DIMENSION: '768' })).toThrow(
            'Invalid configuration: EMBEDDING_DIMENSION: must be 1536 to match the embedding column',
        );
        expect(parseKnowledgeConfig({ EMBEDDING_DIMENSION: '1536' }).embedding.dimension).toBe(1536);
    });

    it('rejects an unknown re-ingestion policy', () => {
        expect(() => parseKnowledgeConfig({ REINGESTION_POLICY: 'merge' })).toThrow(/REINGESTION_POLICY/);
    });

    it('requires credentials for the supabase backend', () => {
        expect(() => parseKnowledgeConfig({ STORAGE_BACKEND: 'supabase' })).toThrow(ConfigurationError);

        const config = parseKnowledgeConfig({
            STORAGE_BACKEND: 'supabase',
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_SERVICE_ROLE_KEY: 'test-service-role',
        });
        expect(config.supabase).toEqual({ url: 'https://example.supabase.co', serviceRoleKey: 'test-service-role' });
    });
});
