import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { z } from "zod";

export const textSearchQuerySchema = z.object({
    q: z.string().trim().min(1, 'q is required'),
    limit: z.coerce.number().int().min(1).max(50).default(10),
});

export const similarSearchBodySchema = z.object({
    query: z.string().trim().min(1, 'query is required'),
    limit: z.coerce.number().int().min(1).max(50).default(5),
});

export class SimilarSearchDto {
    @ApiProperty({ description: 'Text to embed and compare against stored chunks' })
    query!: string;

    @ApiPropertyOptional({ minimum: 1, maximum: 50, default: 5 })
    limit?: number;
}

export class SearchHitDto {
    @ApiProperty()
    id!: string;

    @ApiProperty()
    documentId!: string;

    @ApiProperty()
    chunkIndex!: number;

    @ApiProperty()
    content!: string;

    @ApiProperty({ example: 'recursive_character' })
    chunkType!: string;

    @ApiProperty({ type: 'object', additionalProperties: true })
    metadata!: Record<string, unknown>;
}

export class SimilarityMatchDto extends SearchHitDto {
    @ApiProperty({ description: 'Cosine similarity, 1 is identical' })
    similarity!: number;
}
