import { ValidationError } from "../common/errors";
import { parseEmbedding, serializeEmbedding } from "./embedding-vector";

describe('embedding-vector', () => {
    it('serializes to the bracketed decimal list', () => {
        expect(serializeEmbedding([0.1, 0.2, 0.3])).toBe('[0.1,0.2,0.3]');
    });

    it('keeps negative and integral values', () => {
        expect(serializeEmbedding([-0.456, 1, 0])).toBe('[-0.456,1,0]');
    });

    it('parses the serialized form back to the same numbers', () => {
        const parsed = parseEmbedding('[0.1,0.2,0.3]');

        expect(parsed).toHaveLength(3);
        expect(parsed[0]).toBeCloseTo(0.1);
        expect(parsed[1]).toBeCloseTo(0.2);
        expect(parsed[2]).toBeCloseTo(0.3);
    });

    it('parses the spacing pgvector may emit', () => {
        expect(parseEmbedding(' [1, -2.5 ,3] ')).toEqual([1, -2.5, 3]);
    });

    it('parses an empty vector', () => {
        expect(parseEmbedding('[]')).toEqual([]);
    });

    it('rejects a non-numeric element', () => {
        expect(() => serializeEmbedding([0.1, 'x', 0.3])).toThrow(ValidationError);
        expect(() => serializeEmbedding([0.1, 'x', 0.3])).toThrow(/element 1/);
    });

    it('rejects input that is not a list', () => {
        expect(() => serializeEmbedding('0.1,0.2')).toThrow(ValidationError);
        expect(() => serializeEmbedding(null)).toThrow(ValidationError);
        expect(() => serializeEmbedding({ 0: 0.1 })).toThrow(ValidationError);
    });

    it('rejects non-finite values', () => {
        expect(() => serializeEmbedding([0.1, Number.NaN])).toThrow(ValidationError);
        expect(() => serializeEmbedding([Number.POSITIVE_INFINITY])).toThrow(ValidationError);
    });

    it('rejects malformed text on read-back', () => {
        expect(() => parseEmbedding('0.1,0.2')).toThrow(ValidationError);
        expect(() => parseEmbedding('[0.1,,0.2]')).toThrow(ValidationError);
        expect(() => parseEmbedding('[0.1,abc]')).toThrow(ValidationError);
    });
});
