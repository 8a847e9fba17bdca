import { MigrationInterface, QueryRunner } from "typeorm";
import { VECTOR_DIMENSION } from "../../chunks/embedding-vector";

export class InitialSchema1717000000000 implements MigrationInterface {
    name = 'InitialSchema1717000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS vector`);
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS pgcrypto`);

        await queryRunner.query(`
            CREATE TABLE documents (
                id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
                title text NOT NULL,
                file_path text NOT NULL UNIQUE,
                file_type text NOT NULL,
                file_size bigint,
                content_hash text,
                metadata jsonb NOT NULL DEFAULT '{}',
                created_at timestamptz NOT NULL DEFAULT now(),
                updated_at timestamptz NOT NULL DEFAULT now()
            )
        `);

        await queryRunner.query(`
            CREATE TABLE chunks (
                id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
                document_id uuid NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
                content text NOT NULL,
                chunk_index integer NOT NULL,
                start_position integer,
                end_position integer,
                chunk_type text NOT NULL,
                metadata jsonb NOT NULL DEFAULT '{}',
                embedding vector(${VECTOR_DIMENSION}),
                created_at timestamptz NOT NULL DEFAULT now(),
                CONSTRAINT uq_chunks_document_chunk_index UNIQUE (document_id, chunk_index)
            )
        `);

        await queryRunner.query(`CREATE INDEX idx_documents_file_path ON documents (file_path)`);
        await queryRunner.query(`CREATE INDEX idx_chunks_document_id ON chunks (document_id)`);
        await queryRunner.query(`CREATE INDEX idx_chunks_chunk_type ON chunks (chunk_type)`);
        await queryRunner.query(`CREATE INDEX idx_chunks_metadata ON chunks USING gin (metadata)`);
        await queryRunner.query(`CREATE INDEX idx_chunks_content_fts ON chunks USING gin (to_tsvector('english', content))`);
        await queryRunner.query(`
            CREATE INDEX idx_chunks_embedding ON chunks
            USING ivfflat (embedding vector_cosine_ops) WITH (lists = 100)
        `);

        await queryRunner.query(`
            CREATE OR REPLACE FUNCTION match_chunks(
                query_embedding vector(${VECTOR_DIMENSION}),
                match_threshold float,
                match_count int
            )
            RETURNS TABLE (
                id uuid,
                document_id uuid,
                chunk_index integer,
                content text,
                chunk_type text,
                metadata jsonb,
                similarity float
            )
            LANGUAGE sql STABLE
            AS $$
                SELECT
                    c.id,
                    c.document_id,
                    c.chunk_index,
                    c.content,
                    c.chunk_type,
                    c.metadata,
                    1 - (c.embedding <=> query_embedding) AS similarity
                FROM chunks c
                WHERE c.embedding IS NOT NULL
                  AND 1 - (c.embedding <=> query_embedding) >= match_threshold
                ORDER BY c.embedding <=> query_embedding
                LIMIT match_count
            $$
        `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP FUNCTION IF EXISTS match_chunks(vector, float, int)`);
        await queryRunner.query(`DROP TABLE IF EXISTS chunks`);
        await queryRunner.query(`DROP TABLE IF EXISTS documents`);
    }
}
