import { z } from "zod";
import { ValidationError } from "../common/errors";

/** Width of the `embedding vector(...)` column and of `match_chunks`' query argument. */
export const VECTOR_DIMENSION = 1536;

const embeddingSchema = z.array(z.number().finite(), {
    invalid_type_error: 'embedding must be a list of numbers',
});

/**
 * Serializes an embedding to the text form pgvector accepts, e.g. `[0.1,0.2,0.3]`.
 * The input is typed `unknown` because it comes from an external generator.
 */
export function serializeEmbedding(embedding: unknown): string {
    const result = embeddingSchema.safeParse(embedding);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue.path.length > 0 ? ` (element ${issue.path.join('.')})` : '';
        throw new ValidationError(`Invalid embedding${where}: ${issue.message}`);
    }
    return `[${result.data.map((value) => String(value)).join(',')}]`;
}

export function parseEmbedding(serialized: string): number[] {
    const trimmed = serialized.trim();
    if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
        throw new ValidationError(`Malformed embedding text: ${trimmed.slice(0, 32)}`);
    }

    const body = trimmed.slice(1, -1).trim();
    if (body.length === 0) {
        return [];
    }

    return body.split(',').map((part, index) => {
        const value = Number(part);
        if (part.trim() === '' || !Number.isFinite(value)) {
            throw new ValidationError(`Malformed embedding text: element ${index} is not a number`);
        }
        return value;
    });
}
