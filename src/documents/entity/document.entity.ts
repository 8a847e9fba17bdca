import { ChunkEntity } from '../../chunks/entity/chunk.entity';
import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany, UpdateDateColumn } from 'typeorm';

@Entity('documents')
export class DocumentEntity {
    @PrimaryGeneratedColumn('uuid')
    id!: string

    @Column('text')
    title!: string

    @Column('text', { name: 'file_path', unique: true })
    filePath!: string

    @Column('text', { name: 'file_type' })
    fileType!: string

    @Column('bigint', {
        name: 'file_size',
        nullable: true,
        transformer: {
            to: (value: number | null) => value,
            from: (value: string | null) => (value === null ? null : Number(value)),
        },
    })
    fileSize!: number | null

    @Column('text', { name: 'content_hash', nullable: true })
    contentHash!: string | null

    @Column('jsonb', { default: () => "'{}'" })
    metadata!: Record<string, unknown>

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date

    @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
    updatedAt!: Date

    @OneToMany(() => ChunkEntity, chunk => chunk.document)
    chunks!: ChunkEntity[]
}
