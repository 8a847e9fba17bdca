import { DocumentEntity } from '../../documents/entity/document.entity';
import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, CreateDateColumn, Unique } from 'typeorm';

/**
 * The `embedding vector(1536)` column is created by the migration and only
 * read or written through SQL with a `::vector` cast, so it is not mapped here.
 */
@Entity('chunks')
@Unique('uq_chunks_document_chunk_index', ['documentId', 'chunkIndex'])
export class ChunkEntity {

    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column('uuid', { name: 'document_id' })
    documentId!: string;

    @ManyToOne(() => DocumentEntity, (document) => document.chunks, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'document_id' })
    document!: DocumentEntity;

    @Column('text')
    content!: string;

    @Column('integer', { name: 'chunk_index' })
    chunkIndex!: number;

    @Column('integer', { name: 'start_position', nullable: true })
    startPosition!: number | null;

    @Column('integer', { name: 'end_position', nullable: true })
    endPosition!: number | null;

    @Column('text', { name: 'chunk_type' })
    chunkType!: string;

    @Column('jsonb', { default: () => "'{}'" })
    metadata!: Record<string, unknown>;

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date;

}
